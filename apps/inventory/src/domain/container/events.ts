/**
 * Container Events
 *
 * Recorded in the audit log only; the doll event log holds doll events.
 */

import { BaseDomainEvent, type ExecutionContext } from '@dollhouse/domain-core';

export interface ContainerCreatedData {
	readonly name: string;
	readonly sort_order: number;
	readonly is_system: boolean;
}

export class ContainerCreated extends BaseDomainEvent<'CONTAINER_CREATED', ContainerCreatedData> {
	static readonly EVENT_TYPE = 'CONTAINER_CREATED';

	constructor(ctx: ExecutionContext, containerId: string, data: ContainerCreatedData) {
		super(ContainerCreated.EVENT_TYPE, containerId, ctx, data);
	}
}

export interface ContainerUpdatedData {
	readonly old_name: string;
	readonly new_name: string;
	readonly was_active: boolean;
	readonly is_active: boolean;
}

export class ContainerUpdated extends BaseDomainEvent<'CONTAINER_UPDATED', ContainerUpdatedData> {
	static readonly EVENT_TYPE = 'CONTAINER_UPDATED';

	constructor(ctx: ExecutionContext, containerId: string, data: ContainerUpdatedData) {
		super(ContainerUpdated.EVENT_TYPE, containerId, ctx, data);
	}
}

export interface ContainerReorderedData {
	readonly direction: 'up' | 'down';
	readonly swapped_with_id: string;
	readonly old_sort_order: number;
	readonly new_sort_order: number;
}

export class ContainerReordered extends BaseDomainEvent<'CONTAINER_REORDERED', ContainerReorderedData> {
	static readonly EVENT_TYPE = 'CONTAINER_REORDERED';

	constructor(ctx: ExecutionContext, containerId: string, data: ContainerReorderedData) {
		super(ContainerReordered.EVENT_TYPE, containerId, ctx, data);
	}
}

export interface ContainerDeletedData {
	readonly name: string;
}

export class ContainerDeleted extends BaseDomainEvent<'CONTAINER_DELETED', ContainerDeletedData> {
	static readonly EVENT_TYPE = 'CONTAINER_DELETED';

	constructor(ctx: ExecutionContext, containerId: string, data: ContainerDeletedData) {
		super(ContainerDeleted.EVENT_TYPE, containerId, ctx, data);
	}
}
