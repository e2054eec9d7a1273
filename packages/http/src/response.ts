/**
 * Response Utilities
 *
 * Map Result types to HTTP responses and send errors in one shape.
 */

import type { FastifyReply } from 'fastify';
import { Result, UseCaseError } from '@dollhouse/domain-core';
import type { ErrorResponse } from './types.js';

export function getErrorStatus(error: UseCaseError): number {
	return UseCaseError.httpStatus(error);
}

/**
 * Error body for a use case error. `details` is omitted when empty.
 */
export function toErrorResponse(error: UseCaseError): ErrorResponse {
	const hasDetails = Object.keys(error.details).length > 0;
	return {
		message: error.message,
		code: error.code,
		...(hasDetails ? { details: error.details } : {}),
	};
}

export interface SendResultOptions<T, R> {
	/** Status code for success (default: 200) */
	successStatus?: number;
	/** Transform success value before sending */
	transform?: (value: T) => R;
}

/**
 * Send a Result as an HTTP response.
 *
 * On success, sends the value (optionally transformed) with the success
 * status. A 204 success sends no body. On failure, maps the error to its
 * status and error body.
 *
 * @example
 * ```typescript
 * const result = await createDoll.execute(command, ctx);
 * return sendResult(reply, result, {
 *     successStatus: 201,
 *     transform: (event) => toDollResponse(event.doll),
 * });
 * ```
 */
export function sendResult<T, R = T>(
	reply: FastifyReply,
	result: Result<T>,
	options: SendResultOptions<T, R> = {},
): FastifyReply {
	const { successStatus = 200, transform } = options;

	if (Result.isSuccess(result)) {
		if (successStatus === 204) {
			return reply.status(204).send();
		}
		const value = transform ? transform(result.value) : result.value;
		return reply.status(successStatus).send(value);
	}

	return sendError(reply, result.error);
}

export function sendError(reply: FastifyReply, error: UseCaseError): FastifyReply {
	return reply.status(getErrorStatus(error)).send(toErrorResponse(error));
}

export function jsonSuccess<T>(reply: FastifyReply, data: T, status: number = 200): FastifyReply {
	return reply.status(status).send(data);
}

export function jsonCreated<T>(reply: FastifyReply, data: T): FastifyReply {
	return reply.status(201).send(data);
}

export function jsonError(
	reply: FastifyReply,
	status: number,
	code: string,
	message: string,
	details?: Record<string, unknown>,
): FastifyReply {
	const response: ErrorResponse = {
		code,
		message,
		...(details ? { details } : {}),
	};
	return reply.status(status).send(response);
}

export function notFound(reply: FastifyReply, message: string = 'Not found', code: string = 'NOT_FOUND'): FastifyReply {
	return jsonError(reply, 404, code, message);
}

export function unauthorized(
	reply: FastifyReply,
	message: string = 'Authentication required',
	code: string = 'UNAUTHENTICATED',
): FastifyReply {
	return jsonError(reply, 401, code, message);
}

export function forbidden(
	reply: FastifyReply,
	message: string = 'Access denied',
	details?: Record<string, unknown>,
): FastifyReply {
	return jsonError(reply, 403, 'PERMISSION_DENIED', message, details);
}

export function badRequest(reply: FastifyReply, message: string, details?: Record<string, unknown>): FastifyReply {
	return jsonError(reply, 400, 'BAD_REQUEST', message, details);
}
