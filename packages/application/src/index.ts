/**
 * @dollhouse/application
 *
 * Application layer patterns:
 * - Command types for write operation inputs
 * - UseCase interfaces
 * - Permission guards that wrap use cases
 * - Validation utilities
 *
 * @example
 * ```typescript
 * import { createGuardedUseCase, validateName } from '@dollhouse/application';
 *
 * const createDoll = createGuardedUseCase(createCreateDollUseCase(deps), 'doll:create');
 * const result = await createDoll.execute(command, ctx);
 * ```
 */

// Command types
export { type Command, type DeleteCommand, createCommand } from './command.js';

// UseCase interfaces
export { type UseCase, withStaleRetry, DEFAULT_STALE_ATTEMPTS } from './use-case.js';

// Guards
export { type Guard, checkPermission, permissionGuard, allGuards, createGuardedUseCase } from './guard.js';

// Validation utilities
export { validateRequired, validateMaxLength, validateName } from './validation.js';

// Re-export commonly used types from domain-core for convenience
export {
	Result,
	isSuccess,
	isFailure,
	type Success,
	type Failure,
	UseCaseError,
	ExecutionContext,
	type DomainEvent,
	type UnitOfWork,
	type Principal,
} from '@dollhouse/domain-core';
