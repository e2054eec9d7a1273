/**
 * Use Case Guards
 *
 * Wrappers that check the calling principal before a use case runs. The
 * principal comes from the explicit ExecutionContext. A failed guard returns
 * `forbidden` and the wrapped use case never executes, so nothing is
 * committed.
 */

import { Result, UseCaseError, type ForbiddenError, type Principal } from '@dollhouse/domain-core';
import type { Command } from './command.js';
import type { UseCase } from './use-case.js';

/**
 * Decides whether a principal may run a command. Returns the error to report,
 * or null to let the use case run.
 */
export type Guard<TCommand> = (
	command: TCommand,
	principal: Principal,
) => UseCaseError | null | Promise<UseCaseError | null>;

/**
 * Check one permission on a principal.
 */
export function checkPermission(principal: Principal, permission: string): ForbiddenError | null {
	if (principal.permissions.has(permission)) {
		return null;
	}
	return UseCaseError.forbidden('PERMISSION_DENIED', `Permission required: ${permission}`, {
		required: permission,
	});
}

export function permissionGuard<TCommand>(permission: string): Guard<TCommand> {
	return (_command, principal) => checkPermission(principal, permission);
}

/**
 * Compose guards with AND semantics. The first failure wins.
 */
export function allGuards<TCommand>(...guards: Guard<TCommand>[]): Guard<TCommand> {
	return async (command, principal) => {
		for (const guard of guards) {
			const error = await guard(command, principal);
			if (error) return error;
		}
		return null;
	};
}

/**
 * Wrap a use case with a guard. A permission string is shorthand for
 * `permissionGuard(permission)`.
 *
 * @example
 * ```typescript
 * const deleteDoll = createGuardedUseCase(createDeleteDollUseCase(deps), Permissions.DOLL_DELETE);
 * ```
 */
export function createGuardedUseCase<TCommand extends Command, TResult>(
	useCase: UseCase<TCommand, TResult>,
	guard: Guard<TCommand> | string,
): UseCase<TCommand, TResult> {
	const check = typeof guard === 'string' ? permissionGuard<TCommand>(guard) : guard;

	return {
		async execute(command, context) {
			const error = await check(command, context.principal);
			if (error) {
				return Result.failure<TResult>(error);
			}
			return useCase.execute(command, context);
		},
	};
}
