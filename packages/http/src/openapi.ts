/**
 * OpenAPI Integration
 *
 * TypeBox schemas shared by route definitions. Fastify validates requests
 * and serializes responses straight from these JSON Schemas, and
 * @fastify/swagger renders them at /docs.
 */

import { Type, type Static, type TSchema, type TObject } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';

export const CommonSchemas = {
	/**
	 * Typed ID - entity prefix + underscore + TSID (e.g., "dol_0HZXEQ5Y8JY5Z").
	 */
	TypedId: Type.String({
		pattern: '^[a-z]+_[0-9A-HJKMNP-TV-Z]{13}$',
		description: 'Typed ID (prefix_TSID format)',
	}),

	DateTime: Type.String({
		format: 'date-time',
		description: 'ISO 8601 datetime',
	}),

	NonEmptyString: Type.String({
		minLength: 1,
		description: 'Non-empty string',
	}),

	/**
	 * Offset pagination query parameters. Routes clamp the limit themselves.
	 */
	OffsetQuery: Type.Object({
		limit: Type.Optional(Type.Integer({ minimum: 1 })),
		offset: Type.Optional(Type.Integer({ minimum: 0, default: 0 })),
	}),
};

export const ErrorResponseSchema = Type.Object({
	message: Type.String({ description: 'Human-readable error message' }),
	code: Type.String({ description: 'Machine-readable error code' }),
	details: Type.Optional(Type.Record(Type.String(), Type.Unknown(), { description: 'Additional error details' })),
});

export type ErrorResponseType = Static<typeof ErrorResponseSchema>;

/**
 * Offset-paginated list wrapper `{items, total, limit, offset}`.
 */
export function paginatedResponse<T extends TSchema>(itemSchema: T) {
	return Type.Object({
		items: Type.Array(itemSchema),
		total: Type.Integer({ minimum: 0 }),
		limit: Type.Integer({ minimum: 1 }),
		offset: Type.Integer({ minimum: 0 }),
	});
}

/**
 * Unpaginated list wrapper `{items, total}`.
 */
export function listResponse<T extends TSchema>(itemSchema: T) {
	return Type.Object({
		items: Type.Array(itemSchema),
		total: Type.Integer({ minimum: 0 }),
	});
}

function errorResponse(description: string) {
	return { description, ...ErrorResponseSchema };
}

/**
 * Fastify response schemas for common status codes, keyed by status.
 */
export const OpenAPIResponses = {
	badRequest: (description: string = 'Invalid request') => ({ 400: errorResponse(description) }),
	unauthorized: (description: string = 'Authentication required') => ({ 401: errorResponse(description) }),
	forbidden: (description: string = 'Permission denied') => ({ 403: errorResponse(description) }),
	notFound: (description: string = 'Resource not found') => ({ 404: errorResponse(description) }),
	conflict: (description: string = 'Conflict') => ({ 409: errorResponse(description) }),
	gone: (description: string = 'Resource already deleted') => ({ 410: errorResponse(description) }),
};

/**
 * Combine response definitions into one `response` map.
 *
 * @example
 * ```typescript
 * schema: {
 *     response: combineResponses(
 *         { 200: DollSchema },
 *         OpenAPIResponses.notFound('Doll not found'),
 *         OpenAPIResponses.forbidden(),
 *     ),
 * }
 * ```
 */
export function combineResponses(...responses: Array<Record<number, unknown>>): Record<number, unknown> {
	return Object.assign({}, ...responses);
}

function describeErrors<T extends TSchema>(schema: T, data: unknown): string {
	return [...Value.Errors(schema, data)].map((e) => `${e.path}: ${e.message}`).join(', ');
}

/**
 * Validate data against a TypeBox schema outside of route handlers.
 *
 * @throws Error if validation fails
 */
export function validateBody<T extends TSchema>(data: unknown, schema: T): Static<T> {
	if (!Value.Check(schema, data)) {
		throw new Error(`Validation failed: ${describeErrors(schema, data)}`);
	}
	return data;
}

export function safeValidate<T extends TSchema>(
	data: unknown,
	schema: T,
): { success: true; data: Static<T> } | { success: false; error: string } {
	if (Value.Check(schema, data)) {
		return { success: true, data };
	}
	return { success: false, error: describeErrors(schema, data) };
}

export { Type, Value, type Static, type TSchema, type TObject };
