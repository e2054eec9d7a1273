/**
 * Error Handler
 *
 * Global error handler plugin for Fastify applications.
 * Catches exceptions and maps them to HTTP responses.
 */

import type { FastifyPluginAsync, FastifyError } from 'fastify';
import fp from 'fastify-plugin';
import type { ErrorResponse } from './types.js';

/**
 * Error thrown from route code to end the request with a given status.
 */
export class HttpError extends Error {
	constructor(
		readonly statusCode: number,
		readonly code: string,
		message: string,
		readonly details?: Record<string, unknown>,
	) {
		super(message);
		this.name = 'HttpError';
	}
}

export interface ErrorHandlerConfig {
	/** Whether to include stack traces in responses (default: false) */
	readonly includeStack?: boolean;
	/** Custom error mappers, tried in order before the defaults */
	readonly mappers?: ErrorMapper[];
}

export interface ErrorMapper {
	canHandle: (error: FastifyError) => boolean;
	toResponse: (error: FastifyError) => { status: number; body: ErrorResponse };
}

/**
 * Handles, in order:
 * - HttpError thrown by route code
 * - custom mappers (schema validation, malformed JSON, ...)
 * - other errors with a statusCode below 500
 * - everything else as 500 INTERNAL_ERROR, logged with the correlation ID
 *
 * @example
 * ```typescript
 * await fastify.register(errorHandlerPlugin, createStandardErrorHandlerOptions());
 * ```
 */
const errorHandlerPluginAsync: FastifyPluginAsync<ErrorHandlerConfig> = async (fastify, opts) => {
	const { includeStack = false, mappers = [] } = opts;

	fastify.setErrorHandler((error: FastifyError, request, reply) => {
		const log = request.log;
		const correlationId = request.tracing?.correlationId;

		if (error instanceof HttpError) {
			const body: ErrorResponse = {
				code: error.code,
				message: error.message,
				...(error.details ? { details: error.details } : {}),
			};
			return reply.status(error.statusCode).send(body);
		}

		for (const mapper of mappers) {
			if (mapper.canHandle(error)) {
				const { status, body } = mapper.toResponse(error);

				if (status >= 500) {
					log.error({ error: error.name, message: error.message, status, correlationId }, 'Mapped error');
				}

				return reply.status(status).send(body);
			}
		}

		const statusCode = error.statusCode ?? 500;
		if (statusCode < 500) {
			const body: ErrorResponse = {
				code: `HTTP_${statusCode}`,
				message: error.message || 'An error occurred',
			};
			return reply.status(statusCode).send(body);
		}

		log.error(
			{
				error: error.name,
				message: error.message,
				stack: error.stack,
				correlationId,
			},
			'Unhandled error',
		);

		const body: ErrorResponse = {
			code: 'INTERNAL_ERROR',
			message: 'An unexpected error occurred',
			...(includeStack && error.stack ? { details: { stack: error.stack } } : {}),
		};

		return reply.status(500).send(body);
	});
};

export const errorHandlerPlugin = fp(errorHandlerPluginAsync, {
	name: '@dollhouse/error-handler',
	fastify: '5.x',
});

/**
 * Mappers for schema validation failures and malformed JSON bodies.
 */
export function createCommonErrorMappers(): ErrorMapper[] {
	return [
		// TypeBox schemas validated by Fastify's AJV integration
		{
			canHandle: (e) => e.code === 'FST_ERR_VALIDATION' || e.validation !== undefined,
			toResponse: (e) => ({
				status: 400,
				body: {
					code: 'VALIDATION_ERROR',
					message: e.message || 'Request validation failed',
					...(e.validation ? { details: { errors: e.validation } } : {}),
				},
			}),
		},
		{
			canHandle: (e) => e instanceof SyntaxError || e.code === 'FST_ERR_CTP_INVALID_JSON_BODY',
			toResponse: () => ({
				status: 400,
				body: {
					code: 'INVALID_JSON',
					message: 'Invalid JSON in request body',
				},
			}),
		},
	];
}

export function createStandardErrorHandlerOptions(): ErrorHandlerConfig {
	return {
		mappers: createCommonErrorMappers(),
	};
}
