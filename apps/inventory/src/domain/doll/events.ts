/**
 * Doll Events
 *
 * One event per doll mutation. The subject is always the doll ID, so photo
 * events land in the doll's history too. Payload keys are snake_case because
 * they are stored and served as-is.
 */

import { BaseDomainEvent, type ExecutionContext } from '@dollhouse/domain-core';

export interface DollCreatedData {
	readonly name: string;
	readonly container_id: string;
	readonly container_name: string;
}

export class DollCreated extends BaseDomainEvent<'DOLL_CREATED', DollCreatedData> {
	static readonly EVENT_TYPE = 'DOLL_CREATED';

	constructor(ctx: ExecutionContext, dollId: string, data: DollCreatedData) {
		super(DollCreated.EVENT_TYPE, dollId, ctx, data);
	}
}

export interface DollRenamedData {
	readonly old_name: string;
	readonly new_name: string;
}

export class DollRenamed extends BaseDomainEvent<'DOLL_RENAMED', DollRenamedData> {
	static readonly EVENT_TYPE = 'DOLL_RENAMED';

	constructor(ctx: ExecutionContext, dollId: string, data: DollRenamedData) {
		super(DollRenamed.EVENT_TYPE, dollId, ctx, data);
	}
}

/**
 * Container names are captured so the history stays readable after a
 * container is renamed or removed.
 */
export interface DollMovedData {
	readonly old_container_id: string;
	readonly old_container_name: string;
	readonly new_container_id: string;
	readonly new_container_name: string;
}

export class DollMoved extends BaseDomainEvent<'DOLL_MOVED', DollMovedData> {
	static readonly EVENT_TYPE = 'DOLL_MOVED';

	constructor(ctx: ExecutionContext, dollId: string, data: DollMovedData) {
		super(DollMoved.EVENT_TYPE, dollId, ctx, data);
	}
}

export interface DollDeletedData {
	readonly name: string;
}

export class DollDeleted extends BaseDomainEvent<'DOLL_DELETED', DollDeletedData> {
	static readonly EVENT_TYPE = 'DOLL_DELETED';

	constructor(ctx: ExecutionContext, dollId: string, data: DollDeletedData) {
		super(DollDeleted.EVENT_TYPE, dollId, ctx, data);
	}
}

export interface PhotoAddedData {
	readonly photo_id: string;
	readonly is_primary: boolean;
}

export class PhotoAdded extends BaseDomainEvent<'PHOTO_ADDED', PhotoAddedData> {
	static readonly EVENT_TYPE = 'PHOTO_ADDED';

	constructor(ctx: ExecutionContext, dollId: string, data: PhotoAddedData) {
		super(PhotoAdded.EVENT_TYPE, dollId, ctx, data);
	}
}

export interface PhotoSetPrimaryData {
	readonly photo_id: string;
	readonly previous_photo_id: string | null;
}

export class PhotoSetPrimary extends BaseDomainEvent<'PHOTO_SET_PRIMARY', PhotoSetPrimaryData> {
	static readonly EVENT_TYPE = 'PHOTO_SET_PRIMARY';

	constructor(ctx: ExecutionContext, dollId: string, data: PhotoSetPrimaryData) {
		super(PhotoSetPrimary.EVENT_TYPE, dollId, ctx, data);
	}
}

export type DollEvent = DollCreated | DollRenamed | DollMoved | DollDeleted | PhotoAdded | PhotoSetPrimary;

export const DOLL_EVENT_TYPES = [
	DollCreated.EVENT_TYPE,
	DollRenamed.EVENT_TYPE,
	DollMoved.EVENT_TYPE,
	DollDeleted.EVENT_TYPE,
	PhotoAdded.EVENT_TYPE,
	PhotoSetPrimary.EVENT_TYPE,
] as const;

export type DollEventType = (typeof DOLL_EVENT_TYPES)[number];

export function isDollEventType(value: string): value is DollEventType {
	return DOLL_EVENT_TYPES.some((type) => type === value);
}
