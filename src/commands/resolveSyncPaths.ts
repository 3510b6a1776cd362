import path from 'path';

import { DEFAULT_LOCAL_FILENAME, DEFAULT_TEMPLATE_FILENAME } from './constants';
import type { SyncOptions } from './SyncOptions';

export interface SyncPaths {
	localPath: string;
	templatePath: string;
}

export function resolveSyncPaths(
	options: Pick<SyncOptions, 'local' | 'template'>,
	cwd: string = process.cwd()
): SyncPaths {
	return {
		localPath: path.resolve(cwd, options.local || DEFAULT_LOCAL_FILENAME),
		templatePath: path.resolve(
			cwd,
			options.template || DEFAULT_TEMPLATE_FILENAME
		),
	};
}
