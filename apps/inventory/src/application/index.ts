/**
 * Inventory Use Cases
 *
 * Every use case is wrapped in its permission guard here, so routes only
 * ever see guarded instances.
 */

import { createGuardedUseCase, type UseCase } from '@dollhouse/application';
import type { UnitOfWork } from '@dollhouse/domain-core';

import type {
	ContainerRepository,
	DollRepository,
	PhotoRepository,
} from '../infrastructure/persistence/index.js';
import type {
	ContainerCreated,
	ContainerDeleted,
	ContainerReordered,
	ContainerUpdated,
	DollCreated,
	DollDeleted,
	PhotoAdded,
	PhotoSetPrimary,
} from '../domain/index.js';
import { Permissions } from '../authorization/index.js';

import {
	createCreateDollUseCase,
	createUpdateDollUseCase,
	createDeleteDollUseCase,
	updateDollGuard,
	type CreateDollCommand,
	type UpdateDollCommand,
	type DeleteDollCommand,
	type DollUpdateEvent,
} from './doll/index.js';
import {
	createCreateContainerUseCase,
	createUpdateContainerUseCase,
	createReorderContainerUseCase,
	createDeleteContainerUseCase,
	type CreateContainerCommand,
	type UpdateContainerCommand,
	type ReorderContainerCommand,
	type DeleteContainerCommand,
} from './container/index.js';
import {
	createAddPhotoUseCase,
	createSetPrimaryPhotoUseCase,
	type AddPhotoCommand,
	type SetPrimaryPhotoCommand,
} from './photo/index.js';

export * from './doll/index.js';
export * from './container/index.js';
export * from './photo/index.js';

export interface InventoryUseCaseDeps {
	readonly containerRepository: ContainerRepository;
	readonly dollRepository: DollRepository;
	readonly photoRepository: PhotoRepository;
	readonly unitOfWork: UnitOfWork;
}

export interface InventoryUseCases {
	readonly createDoll: UseCase<CreateDollCommand, DollCreated>;
	readonly updateDoll: UseCase<UpdateDollCommand, readonly DollUpdateEvent[]>;
	readonly deleteDoll: UseCase<DeleteDollCommand, DollDeleted>;
	readonly createContainer: UseCase<CreateContainerCommand, ContainerCreated>;
	readonly updateContainer: UseCase<UpdateContainerCommand, readonly ContainerUpdated[]>;
	readonly reorderContainer: UseCase<ReorderContainerCommand, ContainerReordered>;
	readonly deleteContainer: UseCase<DeleteContainerCommand, ContainerDeleted>;
	readonly addPhoto: UseCase<AddPhotoCommand, PhotoAdded>;
	readonly setPrimaryPhoto: UseCase<SetPrimaryPhotoCommand, PhotoSetPrimary>;
}

export function createInventoryUseCases(deps: InventoryUseCaseDeps): InventoryUseCases {
	return {
		createDoll: createGuardedUseCase(createCreateDollUseCase(deps), Permissions.DOLL_CREATE),
		updateDoll: createGuardedUseCase(createUpdateDollUseCase(deps), updateDollGuard),
		deleteDoll: createGuardedUseCase(createDeleteDollUseCase(deps), Permissions.DOLL_DELETE),
		createContainer: createGuardedUseCase(createCreateContainerUseCase(deps), Permissions.CONTAINER_MANAGE),
		updateContainer: createGuardedUseCase(createUpdateContainerUseCase(deps), Permissions.CONTAINER_MANAGE),
		reorderContainer: createGuardedUseCase(createReorderContainerUseCase(deps), Permissions.CONTAINER_MANAGE),
		deleteContainer: createGuardedUseCase(createDeleteContainerUseCase(deps), Permissions.CONTAINER_MANAGE),
		addPhoto: createGuardedUseCase(createAddPhotoUseCase(deps), Permissions.PHOTO_CREATE),
		setPrimaryPhoto: createGuardedUseCase(createSetPrimaryPhotoUseCase(deps), Permissions.PHOTO_SET_PRIMARY),
	};
}
