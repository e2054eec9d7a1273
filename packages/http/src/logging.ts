/**
 * Structured Logging
 *
 * Pino options for Fastify's built-in logger. Fastify uses Pino natively, so
 * request logs and application logs share one format.
 */

import type { Logger, LoggerOptions } from 'pino';

export interface LoggingConfig {
	/** Log level (default: 'info') */
	readonly level?: string;
	/** Service name for log context */
	readonly serviceName?: string;
	/** Human-readable output through pino-pretty */
	readonly pretty?: boolean;
	/** Additional base context to include in all logs */
	readonly baseContext?: Record<string, unknown>;
}

/**
 * Create Fastify logger options.
 *
 * @example
 * ```typescript
 * const fastify = Fastify({
 *     logger: createFastifyLoggerOptions({ level: env.LOG_LEVEL, serviceName: 'inventory' }),
 * });
 * ```
 */
export function createFastifyLoggerOptions(config: LoggingConfig = {}): LoggerOptions {
	const { level = 'info', serviceName, pretty = false, baseContext = {} } = config;

	return {
		level,
		base: {
			...(serviceName ? { service: serviceName } : {}),
			...baseContext,
		},
		...(pretty
			? {
					transport: {
						target: 'pino-pretty',
						options: { colorize: true, translateTime: 'SYS:HH:MM:ss.l', ignore: 'pid,hostname' },
					},
				}
			: {}),
	};
}

export type { Logger, LoggerOptions };
