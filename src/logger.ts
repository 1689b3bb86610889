/**
 * html-search — Diagnostics logger
 *
 * Search results go to stdout; everything else goes through winston to
 * stderr so that piping the output elsewhere never mixes the two.
 */

import winston from 'winston';

/** Environment variable selecting the log level. */
export const LOG_LEVEL_ENV = 'HTML_SEARCH_LOG_LEVEL';

const DEFAULT_LEVEL = 'warn';

export type Logger = winston.Logger;

export interface LoggerOptions {
	/** One of winston's npm levels; unknown names fall back to `warn`. */
	level?: string;
	/** Suppress all output (tests). */
	silent?: boolean;
}

/** Resolves the level from `--verbose` and the environment. */
export function resolveLogLevel(verbose: boolean, env: NodeJS.ProcessEnv = process.env): string {
	if (verbose) return 'debug';
	const level = env[LOG_LEVEL_ENV];
	return level !== undefined && level in winston.config.npm.levels ? level : DEFAULT_LEVEL;
}

export function createLogger(options: LoggerOptions = {}): Logger {
	const level = options.level !== undefined && options.level in winston.config.npm.levels ? options.level : DEFAULT_LEVEL;

	return winston.createLogger({
		level,
		silent: options.silent ?? false,
		format: winston.format.combine(
			winston.format.timestamp({ format: 'HH:mm:ss.SSS' }),
			winston.format.printf(({ timestamp, level, message, ...meta }) => {
				const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
				return `${String(timestamp)} [${level}]: ${String(message)}${metaStr}`;
			}),
		),
		transports: [
			new winston.transports.Console({
				stderrLevels: Object.keys(winston.config.npm.levels),
			}),
		],
	});
}
