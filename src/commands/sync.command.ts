import { createLogger } from '@/logs/createLogger';
import { resolveLogLevel } from '@/logs/resolveLogLevel';

import type { SyncOptions } from './SyncOptions';
import { syncEnvAction } from './syncEnvAction';

export function syncCommand(opts: SyncOptions) {
	const log = createLogger({ level: resolveLogLevel(opts) });
	try {
		syncEnvAction(opts, { log });
	} catch (error: unknown) {
		log.error(error instanceof Error ? error.message : String(error));
		process.exit(1);
	}
}
