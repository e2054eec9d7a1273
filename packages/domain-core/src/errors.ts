/**
 * Use Case Error Types
 *
 * Closed set of failures a use case can return. Each variant maps to one HTTP
 * status at the boundary:
 * - unauthenticated → 401
 * - forbidden → 403
 * - validation → 400
 * - not_found → 404
 * - gone → 410
 * - business_rule, concurrency → 409
 */

export interface UseCaseErrorBase {
	readonly type: string;
	readonly code: string;
	readonly message: string;
	readonly details: Record<string, unknown>;
}

/**
 * No identity could be established for the caller.
 */
export interface UnauthenticatedError extends UseCaseErrorBase {
	readonly type: 'unauthenticated';
}

/**
 * The caller is known but lacks the required permission.
 */
export interface ForbiddenError extends UseCaseErrorBase {
	readonly type: 'forbidden';
}

/**
 * Input was rejected (blank name, bad reference format, ...).
 */
export interface ValidationError extends UseCaseErrorBase {
	readonly type: 'validation';
}

export interface NotFoundError extends UseCaseErrorBase {
	readonly type: 'not_found';
}

/**
 * The target existed but has been soft-deleted.
 */
export interface GoneError extends UseCaseErrorBase {
	readonly type: 'gone';
}

/**
 * The entity is in a state that forbids the operation.
 */
export interface BusinessRuleViolation extends UseCaseErrorBase {
	readonly type: 'business_rule';
}

/**
 * The transaction could not be committed, or an aggregate changed between
 * load and commit (`STALE_AGGREGATE`).
 */
export interface ConcurrencyError extends UseCaseErrorBase {
	readonly type: 'concurrency';
}

export type UseCaseError =
	| UnauthenticatedError
	| ForbiddenError
	| ValidationError
	| NotFoundError
	| GoneError
	| BusinessRuleViolation
	| ConcurrencyError;

export type UseCaseErrorType = UseCaseError['type'];

const ERROR_TYPES: ReadonlySet<string> = new Set<UseCaseErrorType>([
	'unauthenticated',
	'forbidden',
	'validation',
	'not_found',
	'gone',
	'business_rule',
	'concurrency',
]);

export const STALE_AGGREGATE = 'STALE_AGGREGATE';

export const UseCaseError = {
	unauthenticated(code: string, message: string, details: Record<string, unknown> = {}): UnauthenticatedError {
		return { type: 'unauthenticated', code, message, details };
	},

	/**
	 * @example
	 * ```typescript
	 * UseCaseError.forbidden('PERMISSION_DENIED', 'Permission required: doll:delete', { required: 'doll:delete' })
	 * ```
	 */
	forbidden(code: string, message: string, details: Record<string, unknown> = {}): ForbiddenError {
		return { type: 'forbidden', code, message, details };
	},

	validation(code: string, message: string, details: Record<string, unknown> = {}): ValidationError {
		return { type: 'validation', code, message, details };
	},

	notFound(code: string, message: string, details: Record<string, unknown> = {}): NotFoundError {
		return { type: 'not_found', code, message, details };
	},

	gone(code: string, message: string, details: Record<string, unknown> = {}): GoneError {
		return { type: 'gone', code, message, details };
	},

	/**
	 * @example
	 * ```typescript
	 * UseCaseError.businessRule('CONTAINER_NOT_EMPTY', 'Container not empty', { dollCount: 3 })
	 * ```
	 */
	businessRule(code: string, message: string, details: Record<string, unknown> = {}): BusinessRuleViolation {
		return { type: 'business_rule', code, message, details };
	},

	concurrency(code: string, message: string, details: Record<string, unknown> = {}): ConcurrencyError {
		return { type: 'concurrency', code, message, details };
	},

	stale(message: string, details: Record<string, unknown> = {}): ConcurrencyError {
		return { type: 'concurrency', code: STALE_AGGREGATE, message, details };
	},

	/**
	 * Whether the failure came from a version check, so that reloading and
	 * running the use case again may succeed.
	 */
	isStale(error: UseCaseError): boolean {
		return error.type === 'concurrency' && error.code === STALE_AGGREGATE;
	},

	/**
	 * HTTP status code for an error.
	 */
	httpStatus(error: UseCaseError): number {
		switch (error.type) {
			case 'unauthenticated':
				return 401;
			case 'forbidden':
				return 403;
			case 'validation':
				return 400;
			case 'not_found':
				return 404;
			case 'gone':
				return 410;
			case 'business_rule':
			case 'concurrency':
				return 409;
		}
	},

	isUseCaseError(value: unknown): value is UseCaseError {
		if (typeof value !== 'object' || value === null) return false;
		if (!('type' in value) || !('code' in value) || !('message' in value) || !('details' in value)) return false;
		return (
			typeof value.type === 'string' &&
			ERROR_TYPES.has(value.type) &&
			typeof value.code === 'string' &&
			typeof value.message === 'string' &&
			typeof value.details === 'object' &&
			value.details !== null
		);
	},
};
