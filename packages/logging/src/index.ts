/**
 * @dollhouse/logging
 *
 * Pino logger for code that runs outside a Fastify request (startup,
 * seeding, shutdown). Request handlers use `request.log`.
 */

import pino, { type Logger, type LoggerOptions } from 'pino';

export type { Logger } from 'pino';

export const LogLevel = {
	TRACE: 'trace',
	DEBUG: 'debug',
	INFO: 'info',
	WARN: 'warn',
	ERROR: 'error',
	FATAL: 'fatal',
} as const;

export type LogLevel = (typeof LogLevel)[keyof typeof LogLevel];

export interface LoggerConfig {
	level: LogLevel;
	/** Service name for structured logs */
	serviceName: string;
	/** Pretty printing through pino-pretty (development only) */
	pretty?: boolean;
	/** Additional base context */
	base?: Record<string, unknown>;
}

export function createLogger(config: LoggerConfig): Logger {
	const options: LoggerOptions = {
		level: config.level,
		base: {
			service: config.serviceName,
			...config.base,
		},
		timestamp: pino.stdTimeFunctions.isoTime,
		formatters: {
			level: (label) => ({ level: label }),
		},
	};

	if (config.pretty) {
		return pino({
			...options,
			transport: {
				target: 'pino-pretty',
				options: {
					colorize: true,
					translateTime: 'SYS:standard',
					ignore: 'pid,hostname',
				},
			},
		});
	}

	return pino(options);
}

let defaultLogger: Logger = pino({ level: 'info' });

/**
 * Replace the logger returned by `getLogger()`. Called once at startup.
 */
export function setDefaultLogger(logger: Logger): void {
	defaultLogger = logger;
}

export function getLogger(): Logger {
	return defaultLogger;
}
