/**
 * Update Container Use Case
 *
 * Renames a container and/or switches it active or inactive. Inactive
 * containers can be found and reactivated here; they keep their sort order.
 */

import type { UseCase } from '@dollhouse/application';
import { validateName, Result } from '@dollhouse/application';
import type { UnitOfWork } from '@dollhouse/domain-core';

import type { ContainerRepository } from '../../../infrastructure/persistence/index.js';
import {
	renameContainer,
	setContainerActive,
	ContainerUpdated,
	CONTAINER_NAME_MAX_LENGTH,
} from '../../../domain/index.js';

import type { UpdateContainerCommand } from './command.js';
import { containerNameTaken, containerNotEmpty, containerNotFound, systemContainerImmutable } from '../errors.js';

export interface UpdateContainerUseCaseDeps {
	readonly containerRepository: ContainerRepository;
	readonly unitOfWork: UnitOfWork;
}

export function createUpdateContainerUseCase(
	deps: UpdateContainerUseCaseDeps,
): UseCase<UpdateContainerCommand, readonly ContainerUpdated[]> {
	const { containerRepository, unitOfWork } = deps;

	return {
		async execute(command, context) {
			const container = await containerRepository.findById(command.containerId);
			if (!container) {
				return Result.failure(containerNotFound(command.containerId));
			}

			let name = container.name;
			if (command.name !== undefined) {
				const validated = validateName(command.name, 'name', CONTAINER_NAME_MAX_LENGTH);
				if (Result.isFailure(validated)) {
					return Result.failure(validated.error);
				}
				name = validated.value;
			}
			const isActive = command.isActive ?? container.isActive;

			const renamed = name !== container.name;
			const activeChanged = isActive !== container.isActive;
			if (!renamed && !activeChanged) {
				return unitOfWork.commitBatch([], [], command);
			}

			if (container.isSystem) {
				return Result.failure(systemContainerImmutable('renamed or deactivated'));
			}

			if (isActive) {
				if (await containerRepository.findActiveByName(name, container.id)) {
					return Result.failure(containerNameTaken(name));
				}
			}

			if (!isActive && activeChanged) {
				const dollCount = await containerRepository.countActiveDolls(container.id);
				if (dollCount > 0) {
					return Result.failure(containerNotEmpty(dollCount));
				}
			}

			const now = new Date();
			const updated = setContainerActive(renameContainer(container, name, now), isActive, now);
			const event = new ContainerUpdated(context, container.id, {
				old_name: container.name,
				new_name: updated.name,
				was_active: container.isActive,
				is_active: updated.isActive,
			});

			return unitOfWork.commitBatch([updated], [event], command);
		},
	};
}
