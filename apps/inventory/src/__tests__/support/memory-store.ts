/**
 * In-memory store standing in for PostgreSQL in tests.
 *
 * Transactions run one at a time. Each works on a copy of the committed
 * state and swaps it in only when the callback returns, so a throw leaves
 * the committed state untouched.
 */

import {
	StaleAggregateError,
	type AggregateHandler,
	type AuditLogWriter,
	type EventWriter,
	type NewAuditLog,
	type TransactionManager,
} from '@dollhouse/persistence';

import type { Container, Doll, Photo } from '../../domain/index.js';
import { isContainer, isDoll, isPhoto } from '../../domain/index.js';
import { toDollEventRecords, type DollEventEntry } from '../../infrastructure/persistence/index.js';

export interface MemoryState {
	readonly containers: Map<string, Container>;
	readonly dolls: Map<string, Doll>;
	readonly photos: Map<string, Photo>;
	readonly events: DollEventEntry[];
	readonly auditLogs: NewAuditLog[];
}

export interface MemoryTx {
	readonly state: MemoryState;
}

export interface MemoryStore {
	/** Committed state */
	state: MemoryState;
}

export function createMemoryStore(): MemoryStore {
	return {
		state: {
			containers: new Map(),
			dolls: new Map(),
			photos: new Map(),
			events: [],
			auditLogs: [],
		},
	};
}

function copyState(state: MemoryState): MemoryState {
	return {
		containers: new Map(state.containers),
		dolls: new Map(state.dolls),
		photos: new Map(state.photos),
		events: [...state.events],
		auditLogs: [...state.auditLogs],
	};
}

export function createMemoryTransactionManager(store: MemoryStore): TransactionManager<MemoryTx> {
	let tail: Promise<unknown> = Promise.resolve();

	return {
		inTransaction<T>(fn: (tx: MemoryTx) => Promise<T>): Promise<T> {
			const run = tail.then(async () => {
				const draft = copyState(store.state);
				const result = await fn({ state: draft });
				store.state = draft;
				return result;
			});
			// Keep the queue going after a rollback; the caller still sees the error through `run`
			tail = run.catch(() => undefined);
			return run;
		},
	};
}

export const memoryContainerHandler: AggregateHandler<Container, MemoryTx> = {
	typeName: 'Container',
	matches: isContainer,
	async persist(container, tx) {
		tx.state.containers.set(container.id, container);
	},
};

export const memoryDollHandler: AggregateHandler<Doll, MemoryTx> = {
	typeName: 'Doll',
	matches: isDoll,
	async persist(doll, tx) {
		const stored = tx.state.dolls.get(doll.id);
		if (!stored) {
			tx.state.dolls.set(doll.id, doll);
			return;
		}
		if (stored.version !== doll.version) {
			throw new StaleAggregateError('Doll', doll.id);
		}
		tx.state.dolls.set(doll.id, { ...doll, version: doll.version + 1 });
	},
};

export const memoryPhotoHandler: AggregateHandler<Photo, MemoryTx> = {
	typeName: 'Photo',
	matches: isPhoto,
	async persist(photo, tx) {
		if (photo.isPrimary) {
			for (const other of tx.state.photos.values()) {
				if (other.dollId === photo.dollId && other.isPrimary && other.id !== photo.id) {
					tx.state.photos.set(other.id, { ...other, isPrimary: false });
				}
			}
		}
		tx.state.photos.set(photo.id, photo);
	},
};

export const memoryEventWriter: EventWriter<MemoryTx> = {
	async write(events, tx) {
		for (const record of toDollEventRecords(events)) {
			tx.state.events.push({
				id: record.id,
				dollId: record.dollId,
				eventType: record.eventType,
				payload: record.payload,
				createdBy: record.createdBy,
				createdAt: record.createdAt ?? new Date(),
			});
		}
	},
};

export const memoryAuditLogWriter: AuditLogWriter<MemoryTx> = {
	async write(entry, tx) {
		tx.state.auditLogs.push(entry);
	},
};
