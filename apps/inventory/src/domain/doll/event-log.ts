/**
 * Doll Event Log
 *
 * Stored events are a tagged union keyed by `event_type`. Rows are read back
 * through `readEventBody`, which checks the payload against the schema of its
 * variant before any code touches it.
 */

import { Type, type Static, type TSchema } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import type { DollEventType } from './events.js';

export const DollEventPayloads = {
	DOLL_CREATED: Type.Object({
		name: Type.String(),
		container_id: Type.String(),
		container_name: Type.String(),
	}),
	DOLL_RENAMED: Type.Object({
		old_name: Type.String(),
		new_name: Type.String(),
	}),
	DOLL_MOVED: Type.Object({
		old_container_id: Type.String(),
		old_container_name: Type.String(),
		new_container_id: Type.String(),
		new_container_name: Type.String(),
	}),
	DOLL_DELETED: Type.Object({
		name: Type.String(),
	}),
	PHOTO_ADDED: Type.Object({
		photo_id: Type.String(),
		is_primary: Type.Boolean(),
	}),
	PHOTO_SET_PRIMARY: Type.Object({
		photo_id: Type.String(),
		previous_photo_id: Type.Union([Type.String(), Type.Null()]),
	}),
} satisfies Record<DollEventType, TSchema>;

function variant<TType extends DollEventType, TPayload extends TSchema>(eventType: TType, payload: TPayload) {
	return Type.Object({ event_type: Type.Literal(eventType), payload });
}

export const DollEventBodySchema = Type.Union([
	variant('DOLL_CREATED', DollEventPayloads.DOLL_CREATED),
	variant('DOLL_RENAMED', DollEventPayloads.DOLL_RENAMED),
	variant('DOLL_MOVED', DollEventPayloads.DOLL_MOVED),
	variant('DOLL_DELETED', DollEventPayloads.DOLL_DELETED),
	variant('PHOTO_ADDED', DollEventPayloads.PHOTO_ADDED),
	variant('PHOTO_SET_PRIMARY', DollEventPayloads.PHOTO_SET_PRIMARY),
]);

export type DollEventBody = Static<typeof DollEventBodySchema>;

/**
 * Typed body of a stored event, or null when the type is unknown or the
 * payload does not match it.
 */
export function readEventBody(eventType: string, payload: unknown): DollEventBody | null {
	const candidate = { event_type: eventType, payload };
	return Value.Check(DollEventBodySchema, candidate) ? candidate : null;
}

/**
 * One human-readable line for an event.
 */
export function describeEvent(body: DollEventBody): string {
	switch (body.event_type) {
		case 'DOLL_CREATED':
			return `Created "${body.payload.name}" in ${body.payload.container_name}`;
		case 'DOLL_RENAMED':
			return `Renamed "${body.payload.old_name}" → "${body.payload.new_name}"`;
		case 'DOLL_MOVED':
			return `Moved from ${body.payload.old_container_name} → ${body.payload.new_container_name}`;
		case 'DOLL_DELETED':
			return `Deleted "${body.payload.name}"`;
		case 'PHOTO_ADDED':
			return body.payload.is_primary ? 'Added photo (primary)' : 'Added photo';
		case 'PHOTO_SET_PRIMARY':
			return body.payload.previous_photo_id
				? `Set primary photo ${body.payload.photo_id} (was ${body.payload.previous_photo_id})`
				: `Set primary photo ${body.payload.photo_id}`;
	}
}

/**
 * Summary line for a stored row. Unreadable rows fall back to their type.
 */
export function summarizeEvent(eventType: string, payload: unknown): string {
	const body = readEventBody(eventType, payload);
	return body ? describeEvent(body) : eventType;
}
