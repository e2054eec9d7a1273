/**
 * Doll Event Writer
 *
 * Appends doll events to `doll_events` in the commit transaction. Container
 * events are left to the audit log.
 */

import type { DomainEvent } from '@dollhouse/domain-core';
import type { EventWriter, TransactionContext } from '@dollhouse/persistence';

import { dollEvents, type NewDollEventRecord } from './schema/index.js';
import { isDollEventType } from '../../domain/index.js';

export function toDollEventRecords(events: readonly DomainEvent[]): NewDollEventRecord[] {
	return events
		.filter((event) => isDollEventType(event.eventType))
		.map((event) => ({
			id: event.eventId,
			dollId: event.subject,
			eventType: event.eventType,
			payload: event.data,
			createdBy: event.principalId,
			createdAt: event.occurredAt,
		}));
}

export function createDollEventWriter(): EventWriter<TransactionContext> {
	return {
		async write(events, tx) {
			const records = toDollEventRecords(events);
			if (records.length === 0) {
				return;
			}
			await tx.db.insert(dollEvents).values(records);
		},
	};
}
