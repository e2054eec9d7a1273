/**
 * Reorder Container Use Case
 *
 * Swaps the sort order of a container with its active neighbour. Both rows
 * are written in one commit.
 */

import type { UseCase } from '@dollhouse/application';
import { Result, UseCaseError } from '@dollhouse/application';
import type { UnitOfWork } from '@dollhouse/domain-core';

import type { ContainerRepository } from '../../../infrastructure/persistence/index.js';
import { swapSortOrder, ContainerReordered } from '../../../domain/index.js';

import type { ReorderContainerCommand } from './command.js';
import { containerNotFound } from '../errors.js';

export interface ReorderContainerUseCaseDeps {
	readonly containerRepository: ContainerRepository;
	readonly unitOfWork: UnitOfWork;
}

export function createReorderContainerUseCase(
	deps: ReorderContainerUseCaseDeps,
): UseCase<ReorderContainerCommand, ContainerReordered> {
	const { containerRepository, unitOfWork } = deps;

	return {
		async execute(command, context) {
			const container = await containerRepository.findById(command.containerId);
			if (!container || !container.isActive) {
				return Result.failure(containerNotFound(command.containerId));
			}

			const neighbour = await containerRepository.findNeighbour(container, command.direction);
			if (!neighbour) {
				return Result.failure(
					UseCaseError.validation(
						'NO_ADJACENT_CONTAINER',
						`Container is already at the ${command.direction === 'up' ? 'top' : 'bottom'}`,
						{ direction: command.direction },
					),
				);
			}

			const [moved, swapped] = swapSortOrder(container, neighbour);
			const event = new ContainerReordered(context, container.id, {
				direction: command.direction,
				swapped_with_id: neighbour.id,
				old_sort_order: container.sortOrder,
				new_sort_order: moved.sortOrder,
			});

			return unitOfWork.commitAll([moved, swapped], event, command);
		},
	};
}
