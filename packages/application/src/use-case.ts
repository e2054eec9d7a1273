/**
 * UseCase Interface
 *
 * A use case is a single business operation. It takes a command and the
 * execution context (tracing IDs and the calling principal), checks its
 * rules, changes aggregates and returns the domain event on success.
 *
 * Use cases can ONLY return success through UnitOfWork, so every state
 * change is committed together with its event and audit log row.
 *
 * @example
 * ```typescript
 * export function createRenameDollUseCase(deps: RenameDollUseCaseDeps): UseCase<RenameDollCommand, DollRenamed> {
 *     return {
 *         async execute(command, context) {
 *             const doll = await deps.dollRepository.findById(command.dollId);
 *             if (!doll) {
 *                 return Result.failure(UseCaseError.notFound('DOLL_NOT_FOUND', 'Doll not found'));
 *             }
 *             const event = new DollRenamed(context, doll.id, { old_name: doll.name, new_name: command.name });
 *             return deps.unitOfWork.commit(renameDoll(doll, command.name), event, command);
 *         },
 *     };
 * }
 * ```
 */

import { Result, UseCaseError, type ExecutionContext } from '@dollhouse/domain-core';
import type { Command } from './command.js';

/**
 * UseCase for write operations.
 *
 * @typeParam TCommand - The command type (input data)
 * @typeParam TResult - What a successful commit yields, usually the event
 */
export interface UseCase<TCommand extends Command, TResult> {
	execute(command: TCommand, context: ExecutionContext): Promise<Result<TResult>>;
}

export const DEFAULT_STALE_ATTEMPTS = 5;

/**
 * Run the use case again, from its reads onward, while its commit fails on a
 * stale aggregate. Any other outcome is returned as is, as is the last stale
 * failure once `maxAttempts` runs are used up.
 *
 * @example
 * ```typescript
 * export function createDeleteDollUseCase(deps: DeleteDollUseCaseDeps): UseCase<DeleteDollCommand, DollDeleted> {
 *     return withStaleRetry<DeleteDollCommand, DollDeleted>({ async execute(command, context) { ... } });
 * }
 * ```
 */
export function withStaleRetry<TCommand extends Command, TResult>(
	useCase: UseCase<TCommand, TResult>,
	maxAttempts: number = DEFAULT_STALE_ATTEMPTS,
): UseCase<TCommand, TResult> {
	return {
		async execute(command, context) {
			let result = await useCase.execute(command, context);
			for (let attempt = 1; attempt < maxAttempts; attempt++) {
				if (!Result.isFailure(result) || !UseCaseError.isStale(result.error)) {
					break;
				}
				result = await useCase.execute(command, context);
			}
			return result;
		},
	};
}
