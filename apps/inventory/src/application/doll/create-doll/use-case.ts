/**
 * Create Doll Use Case
 *
 * Adds a doll to a container, Home unless another active container is given.
 */

import type { UseCase } from '@dollhouse/application';
import { validateName, Result, UseCaseError } from '@dollhouse/application';
import type { UnitOfWork } from '@dollhouse/domain-core';

import type { ContainerRepository } from '../../../infrastructure/persistence/index.js';
import {
	createDoll,
	isHttpUrl,
	DollCreated,
	DOLL_NAME_MAX_LENGTH,
	SystemContainers,
} from '../../../domain/index.js';

import type { CreateDollCommand } from './command.js';

export interface CreateDollUseCaseDeps {
	readonly containerRepository: ContainerRepository;
	readonly unitOfWork: UnitOfWork;
}

export function createCreateDollUseCase(deps: CreateDollUseCaseDeps): UseCase<CreateDollCommand, DollCreated> {
	const { containerRepository, unitOfWork } = deps;

	return {
		async execute(command, context) {
			const name = validateName(command.name, 'name', DOLL_NAME_MAX_LENGTH);
			if (Result.isFailure(name)) {
				return Result.failure(name.error);
			}

			// Blank means no URL
			const purchaseUrl = command.purchaseUrl?.trim() || null;
			if (purchaseUrl !== null && !isHttpUrl(purchaseUrl)) {
				return Result.failure(
					UseCaseError.validation('INVALID_PURCHASE_URL', 'Purchase URL must be an http or https URL', {
						field: 'purchase_url',
					}),
				);
			}

			const container = command.containerId
				? await containerRepository.findById(command.containerId)
				: await containerRepository.findSystem(SystemContainers.HOME);
			if (!container || !container.isActive) {
				return Result.failure(
					UseCaseError.notFound('CONTAINER_NOT_FOUND', 'Container not found', {
						containerId: command.containerId ?? SystemContainers.HOME,
					}),
				);
			}

			const doll = createDoll({ name: name.value, containerId: container.id, purchaseUrl });

			const event = new DollCreated(context, doll.id, {
				name: doll.name,
				container_id: container.id,
				container_name: container.name,
			});

			return unitOfWork.commit(doll, event, command);
		},
	};
}
