/**
 * Domain Event Interface
 *
 * Domain events are facts about what happened, named in past tense
 * (`DollRenamed`, not `RenameDoll`). Each event type has its own payload
 * shape, carried in `data`.
 *
 * Events are readonly once constructed.
 */

import { generate } from '@dollhouse/tsid';
import type { ExecutionContext } from './execution-context.js';

export interface DomainEvent<TType extends string = string, TData = unknown> {
	/** Unique, time-sorted identifier (`evn_...`) */
	readonly eventId: string;

	/** Event type code, e.g. `DOLL_RENAMED` */
	readonly eventType: TType;

	/** ID of the aggregate the event is about */
	readonly subject: string;

	readonly occurredAt: Date;

	/** All events of one use case execution share this ID */
	readonly executionId: string;

	readonly correlationId: string;

	readonly causationId: string | null;

	/** Identity that performed the action */
	readonly principalId: string;

	/** Event-specific payload */
	readonly data: TData;
}

export interface DomainEventMetadata {
	eventId: string;
	executionId: string;
	correlationId: string;
	causationId: string | null;
	principalId: string;
	occurredAt: Date;
}

export const DomainEvent = {
	generateId(): string {
		return generate('EVENT');
	},

	metadataFrom(ctx: ExecutionContext): DomainEventMetadata {
		return {
			eventId: generate('EVENT'),
			executionId: ctx.executionId,
			correlationId: ctx.correlationId,
			causationId: ctx.causationId,
			principalId: ctx.principal.identity.id,
			occurredAt: new Date(),
		};
	},

	/**
	 * Serialize the payload for storage.
	 */
	dataJson(event: DomainEvent): string {
		return JSON.stringify(event.data);
	},
};

/**
 * Base class for concrete events.
 *
 * @example
 * ```typescript
 * interface DollRenamedData {
 *     old_name: string;
 *     new_name: string;
 * }
 *
 * class DollRenamed extends BaseDomainEvent<'DOLL_RENAMED', DollRenamedData> {
 *     static readonly EVENT_TYPE = 'DOLL_RENAMED';
 *
 *     constructor(ctx: ExecutionContext, dollId: string, data: DollRenamedData) {
 *         super(DollRenamed.EVENT_TYPE, dollId, ctx, data);
 *     }
 * }
 * ```
 */
export abstract class BaseDomainEvent<TType extends string, TData> implements DomainEvent<TType, TData> {
	readonly eventId: string;
	readonly eventType: TType;
	readonly subject: string;
	readonly occurredAt: Date;
	readonly executionId: string;
	readonly correlationId: string;
	readonly causationId: string | null;
	readonly principalId: string;
	readonly data: TData;

	constructor(eventType: TType, subject: string, ctx: ExecutionContext, data: TData) {
		const metadata = DomainEvent.metadataFrom(ctx);

		this.eventId = metadata.eventId;
		this.eventType = eventType;
		this.subject = subject;
		this.occurredAt = metadata.occurredAt;
		this.executionId = metadata.executionId;
		this.correlationId = metadata.correlationId;
		this.causationId = metadata.causationId;
		this.principalId = metadata.principalId;
		this.data = data;
	}

	toDataJson(): string {
		return JSON.stringify(this.data);
	}
}
