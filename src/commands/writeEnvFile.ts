import fs from 'fs';

import { EnvSyncError } from './EnvSyncError';

/** Write serialized env content, tagging failures as a `Write` error. */
export function writeEnvFile(filePath: string, content: string): void {
	try {
		fs.writeFileSync(filePath, content, 'utf-8');
	} catch (error) {
		throw new EnvSyncError('Write', filePath, error);
	}
}
