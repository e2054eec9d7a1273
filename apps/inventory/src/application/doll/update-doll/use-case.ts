/**
 * Update Doll Use Case
 *
 * Renames and/or moves a doll. Each changed field is its own mutation with
 * its own event; both are committed together. A field that matches the
 * current value records nothing. The old values in the events are those of
 * the version the commit replaces; a concurrent change makes the commit stale
 * and the update runs again against the new values.
 */

import type { Guard, UseCase } from '@dollhouse/application';
import { allGuards, checkPermission, validateName, withStaleRetry, Result, UseCaseError } from '@dollhouse/application';
import type { UnitOfWork } from '@dollhouse/domain-core';

import type { ContainerRepository, DollRepository } from '../../../infrastructure/persistence/index.js';
import {
	isDeleted,
	moveDoll,
	renameDoll,
	DollMoved,
	DollRenamed,
	DOLL_NAME_MAX_LENGTH,
	type Doll,
} from '../../../domain/index.js';
import { Permissions } from '../../../authorization/index.js';

import type { UpdateDollCommand } from './command.js';

export type DollUpdateEvent = DollRenamed | DollMoved;

/**
 * `doll:rename` when the name is given, `doll:move` when the container is.
 */
export const updateDollGuard: Guard<UpdateDollCommand> = allGuards<UpdateDollCommand>(
	(command, principal) =>
		command.name !== undefined ? checkPermission(principal, Permissions.DOLL_RENAME) : null,
	(command, principal) =>
		command.containerId !== undefined ? checkPermission(principal, Permissions.DOLL_MOVE) : null,
);

export interface UpdateDollUseCaseDeps {
	readonly dollRepository: DollRepository;
	readonly containerRepository: ContainerRepository;
	readonly unitOfWork: UnitOfWork;
}

export function createUpdateDollUseCase(
	deps: UpdateDollUseCaseDeps,
): UseCase<UpdateDollCommand, readonly DollUpdateEvent[]> {
	const { dollRepository, containerRepository, unitOfWork } = deps;

	return withStaleRetry<UpdateDollCommand, readonly DollUpdateEvent[]>({
		async execute(command, context) {
			const doll = await dollRepository.findById(command.dollId);
			if (!doll || isDeleted(doll)) {
				return Result.failure(
					UseCaseError.notFound('DOLL_NOT_FOUND', 'Doll not found', { dollId: command.dollId }),
				);
			}

			let updated: Doll = doll;
			const events: DollUpdateEvent[] = [];

			if (command.name !== undefined) {
				const name = validateName(command.name, 'name', DOLL_NAME_MAX_LENGTH);
				if (Result.isFailure(name)) {
					return Result.failure(name.error);
				}
				if (name.value !== doll.name) {
					updated = renameDoll(updated, name.value);
					events.push(new DollRenamed(context, doll.id, { old_name: doll.name, new_name: name.value }));
				}
			}

			if (command.containerId !== undefined) {
				const target = await containerRepository.findById(command.containerId);
				if (!target || !target.isActive) {
					return Result.failure(
						UseCaseError.notFound('CONTAINER_NOT_FOUND', 'Container not found', {
							containerId: command.containerId,
						}),
					);
				}
				if (target.id !== doll.containerId) {
					const current = await containerRepository.findById(doll.containerId);
					updated = moveDoll(updated, target.id);
					events.push(
						new DollMoved(context, doll.id, {
							old_container_id: doll.containerId,
							old_container_name: current?.name ?? doll.containerId,
							new_container_id: target.id,
							new_container_name: target.name,
						}),
					);
				}
			}

			return unitOfWork.commitBatch(events.length > 0 ? [updated] : [], events, command);
		},
	});
}
