/**
 * Delete Container Use Case
 *
 * Deactivates an empty, non-system container.
 */

import type { UseCase } from '@dollhouse/application';
import { Result } from '@dollhouse/application';
import type { UnitOfWork } from '@dollhouse/domain-core';

import type { ContainerRepository } from '../../../infrastructure/persistence/index.js';
import { setContainerActive, ContainerDeleted } from '../../../domain/index.js';

import type { DeleteContainerCommand } from './command.js';
import { containerNotEmpty, containerNotFound, systemContainerImmutable } from '../errors.js';

export interface DeleteContainerUseCaseDeps {
	readonly containerRepository: ContainerRepository;
	readonly unitOfWork: UnitOfWork;
}

export function createDeleteContainerUseCase(
	deps: DeleteContainerUseCaseDeps,
): UseCase<DeleteContainerCommand, ContainerDeleted> {
	const { containerRepository, unitOfWork } = deps;

	return {
		async execute(command, context) {
			const container = await containerRepository.findById(command.containerId);
			if (!container || !container.isActive) {
				return Result.failure(containerNotFound(command.containerId));
			}

			if (container.isSystem) {
				return Result.failure(systemContainerImmutable('deleted'));
			}

			const dollCount = await containerRepository.countActiveDolls(container.id);
			if (dollCount > 0) {
				return Result.failure(containerNotEmpty(dollCount));
			}

			const event = new ContainerDeleted(context, container.id, { name: container.name });
			return unitOfWork.commit(setContainerActive(container, false), event, command);
		},
	};
}
