/**
 * Delete Doll Use Case
 *
 * Soft-deletes a doll. Deleting it again reports `DOLL_ALREADY_DELETED`
 * instead of not-found and records nothing. The loser of two racing deletes
 * finds the doll stale, reloads it and gets the same answer.
 */

import type { UseCase } from '@dollhouse/application';
import { withStaleRetry, Result, UseCaseError, ExecutionContext } from '@dollhouse/application';
import type { UnitOfWork } from '@dollhouse/domain-core';

import type { DollRepository } from '../../../infrastructure/persistence/index.js';
import { isDeleted, softDeleteDoll, DollDeleted } from '../../../domain/index.js';

import type { DeleteDollCommand } from './command.js';

export interface DeleteDollUseCaseDeps {
	readonly dollRepository: DollRepository;
	readonly unitOfWork: UnitOfWork;
}

export function createDeleteDollUseCase(deps: DeleteDollUseCaseDeps): UseCase<DeleteDollCommand, DollDeleted> {
	const { dollRepository, unitOfWork } = deps;

	return withStaleRetry<DeleteDollCommand, DollDeleted>({
		async execute(command, context) {
			const doll = await dollRepository.findById(command.dollId);
			if (!doll) {
				return Result.failure(
					UseCaseError.notFound('DOLL_NOT_FOUND', 'Doll not found', { dollId: command.dollId }),
				);
			}
			if (isDeleted(doll)) {
				return Result.failure(
					UseCaseError.gone('DOLL_ALREADY_DELETED', 'Doll already deleted', { dollId: command.dollId }),
				);
			}

			const deleted = softDeleteDoll(doll, ExecutionContext.principalId(context));
			const event = new DollDeleted(context, doll.id, { name: doll.name });

			return unitOfWork.commit(deleted, event, command);
		},
	});
}
