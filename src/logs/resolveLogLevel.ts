import { LOG_LEVEL_ENV_VAR } from '@/commands/constants';

import { isLogLevel, type LogLevel } from './createLogger';

/**
 * `--silent` beats `--verbose`; `-v` is debug and `-vv` or more is trace.
 * Without either flag the level comes from ENV_SYNC_LOG, else `info`.
 */
export function resolveLogLevel(
	options: { silent?: boolean; verbose?: number },
	env: NodeJS.ProcessEnv = process.env
): LogLevel {
	if (options.silent) return 'silent';

	const verbosity = options.verbose ?? 0;
	if (verbosity >= 2) return 'trace';
	if (verbosity === 1) return 'debug';

	const fromEnv = env[LOG_LEVEL_ENV_VAR]?.trim().toLowerCase();
	if (fromEnv && isLogLevel(fromEnv)) return fromEnv;
	return 'info';
}
