/**
 * Create Container Use Case
 *
 * Appends a container after the last one in sort order.
 */

import type { UseCase } from '@dollhouse/application';
import { validateName, Result } from '@dollhouse/application';
import type { UnitOfWork } from '@dollhouse/domain-core';

import type { ContainerRepository } from '../../../infrastructure/persistence/index.js';
import {
	createContainer,
	nextSortOrder,
	ContainerCreated,
	CONTAINER_NAME_MAX_LENGTH,
} from '../../../domain/index.js';

import type { CreateContainerCommand } from './command.js';
import { containerNameTaken } from '../errors.js';

export interface CreateContainerUseCaseDeps {
	readonly containerRepository: ContainerRepository;
	readonly unitOfWork: UnitOfWork;
}

export function createCreateContainerUseCase(
	deps: CreateContainerUseCaseDeps,
): UseCase<CreateContainerCommand, ContainerCreated> {
	const { containerRepository, unitOfWork } = deps;

	return {
		async execute(command, context) {
			const name = validateName(command.name, 'name', CONTAINER_NAME_MAX_LENGTH);
			if (Result.isFailure(name)) {
				return Result.failure(name.error);
			}

			if (await containerRepository.findActiveByName(name.value)) {
				return Result.failure(containerNameTaken(name.value));
			}

			const container = createContainer({
				name: name.value,
				sortOrder: nextSortOrder(await containerRepository.maxSortOrder()),
			});

			const event = new ContainerCreated(context, container.id, {
				name: container.name,
				sort_order: container.sortOrder,
				is_system: container.isSystem,
			});

			return unitOfWork.commit(container, event, command);
		},
	};
}

