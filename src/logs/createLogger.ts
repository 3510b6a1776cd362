import chalk from 'chalk';

export type LogLevel = 'silent' | 'info' | 'debug' | 'trace';

const LEVEL_ORDER: Record<LogLevel, number> = {
	silent: 0,
	info: 1,
	debug: 2,
	trace: 3,
};

export function isLogLevel(value: string): value is LogLevel {
	return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

export interface LoggerOptions {
	level: LogLevel;
	/** Defaults to console.log / console.error. */
	write?: (...args: unknown[]) => void;
	writeError?: (...args: unknown[]) => void;
}

export type Logger = ReturnType<typeof createLogger>;

export function createLogger(options: LoggerOptions) {
	const threshold = LEVEL_ORDER[options.level];
	const write = options.write ?? ((...args: unknown[]) => console.log(...args));
	const writeError =
		options.writeError ?? ((...args: unknown[]) => console.error(...args));

	const enabled = (level: LogLevel) => threshold >= LEVEL_ORDER[level];

	return {
		normal(...args: unknown[]) {
			if (enabled('info')) {
				write(...args);
			}
		},
		debug(...args: unknown[]) {
			if (enabled('debug')) {
				write(chalk.gray('debug'), ...args);
			}
		},
		trace(...args: unknown[]) {
			if (enabled('trace')) {
				write(chalk.gray('trace'), ...args);
			}
		},
		// output and errors are printed even when silent
		output(...args: unknown[]) {
			write(...args);
		},
		error(...args: unknown[]) {
			writeError(chalk.red('Error:'), ...args);
		},
	};
}
