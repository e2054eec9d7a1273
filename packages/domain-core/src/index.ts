/**
 * @dollhouse/domain-core
 *
 * Core domain infrastructure:
 * - Result type with restricted success factory
 * - Use case error types with HTTP status mapping
 * - Execution context carrying the calling principal
 * - Domain event base
 * - Unit of Work contract for atomic commits
 *
 * @example
 * ```typescript
 * import { Result, UseCaseError, ExecutionContext } from '@dollhouse/domain-core';
 *
 * const ctx = ExecutionContext.create(principal, { correlationId });
 *
 * if (!name) {
 *     return Result.failure(UseCaseError.validation('NAME_REQUIRED', 'Name is required'));
 * }
 *
 * return unitOfWork.commit(doll, new DollCreated(ctx, doll, container), command);
 * ```
 */

// Error types
export {
	UseCaseError,
	STALE_AGGREGATE,
	type UseCaseErrorBase,
	type UseCaseErrorType,
	type UnauthenticatedError,
	type ForbiddenError,
	type ValidationError,
	type NotFoundError,
	type GoneError,
	type BusinessRuleViolation,
	type ConcurrencyError,
} from './errors.js';

// Result type
export {
	Result,
	isSuccess,
	isFailure,
	type Success,
	type Failure,
	// Internal exports for UnitOfWork implementations
	RESULT_SUCCESS_TOKEN,
	type ResultSuccessToken,
} from './result.js';

// Execution context
export {
	ExecutionContext,
	type Identity,
	type Principal,
	type TracingIds,
} from './execution-context.js';

// Domain events
export {
	DomainEvent,
	BaseDomainEvent,
	type DomainEventMetadata,
} from './domain-event.js';

// Unit of Work
export { type UnitOfWork, type Aggregate } from './unit-of-work.js';
