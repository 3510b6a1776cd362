import fs from 'fs';

import type { EnvEntry } from './EnvEntry';
import { EnvSyncError } from './EnvSyncError';
import { parseEnvContent } from './parseEnvContent';

export type EnvFileRole = 'local' | 'template';

/** Read and parse one side of a sync, tagging failures with that side. */
export function parseEnvFile(filePath: string, role: EnvFileRole): EnvEntry[] {
	let content: string;
	try {
		content = fs.readFileSync(filePath, 'utf-8');
	} catch (error) {
		throw new EnvSyncError(
			role === 'local' ? 'LocalIo' : 'TemplateIo',
			filePath,
			error
		);
	}

	try {
		return parseEnvContent(content);
	} catch (error) {
		throw new EnvSyncError(
			role === 'local' ? 'LocalParse' : 'TemplateParse',
			filePath,
			error
		);
	}
}
