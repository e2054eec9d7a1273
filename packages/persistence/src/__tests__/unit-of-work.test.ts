import { describe, it, expect } from 'vitest';
import { Result, BaseDomainEvent, ExecutionContext, type Aggregate, type DomainEvent } from '@dollhouse/domain-core';
import { createAggregateRegistry, StaleAggregateError } from '../aggregate-registry.js';
import type { TransactionManager } from '../transaction.js';
import { createTransactionalUnitOfWork, type AuditLogWriter, type EventWriter } from '../unit-of-work.js';
import type { NewAuditLog } from '../schema/audit-logs.js';

interface Widget extends Aggregate {
	readonly name: string;
}

class WidgetRenamed extends BaseDomainEvent<'WIDGET_RENAMED', { old_name: string; new_name: string }> {
	constructor(ctx: ExecutionContext, widgetId: string, oldName: string, newName: string) {
		super('WIDGET_RENAMED', widgetId, ctx, { old_name: oldName, new_name: newName });
	}
}

/**
 * Writes are staged on the transaction and only reach `committed` when the
 * callback returns.
 */
interface FakeTx {
	readonly widgets: Widget[];
	readonly events: DomainEvent[];
	readonly audit: NewAuditLog[];
}

function createFakeStore(options: { failOn?: string; staleOn?: string } = {}) {
	const committed: FakeTx = { widgets: [], events: [], audit: [] };

	const transactionManager: TransactionManager<FakeTx> = {
		async inTransaction(fn) {
			const tx: FakeTx = { widgets: [], events: [], audit: [] };
			const result = await fn(tx);
			committed.widgets.push(...tx.widgets);
			committed.events.push(...tx.events);
			committed.audit.push(...tx.audit);
			return result;
		},
	};

	const aggregateRegistry = createAggregateRegistry<FakeTx>();
	aggregateRegistry.register<Widget>({
		typeName: 'Widget',
		matches: (aggregate): aggregate is Widget => aggregate.id.startsWith('wid_'),
		async persist(widget, tx) {
			if (widget.name === options.failOn) {
				throw new Error(`cannot store ${widget.name}`);
			}
			if (widget.name === options.staleOn) {
				throw new StaleAggregateError('Widget', widget.id);
			}
			tx.widgets.push(widget);
		},
	});

	const eventWriter: EventWriter<FakeTx> = {
		async write(events, tx) {
			tx.events.push(...events);
		},
	};

	const auditLogWriter: AuditLogWriter<FakeTx> = {
		async write(entry, tx) {
			tx.audit.push(entry);
		},
	};

	const unitOfWork = createTransactionalUnitOfWork({
		transactionManager,
		aggregateRegistry,
		eventWriter,
		auditLogWriter,
	});

	return { committed, unitOfWork };
}

const ctx = ExecutionContext.create({
	identity: { id: 'dana', email: 'dana@example.test', displayName: 'dana', groups: new Set() },
	permissions: new Set(),
});

describe('TransactionalUnitOfWork', () => {
	describe('commit', () => {
		it('should write aggregate, event and audit log together', async () => {
			const { committed, unitOfWork } = createFakeStore();
			const widget: Widget = { id: 'wid_1', name: 'Anna' };
			const event = new WidgetRenamed(ctx, widget.id, 'Ann', 'Anna');

			const result = await unitOfWork.commit(widget, event, { _type: 'RenameWidget', widgetId: 'wid_1' });

			expect(Result.isSuccess(result) && result.value).toBe(event);
			expect(committed.widgets).toEqual([widget]);
			expect(committed.events).toEqual([event]);
			expect(committed.audit).toHaveLength(1);
			expect(committed.audit[0]).toMatchObject({
				entityType: 'Widget',
				entityId: 'wid_1',
				operation: 'RenameWidget',
				operationJson: { _type: 'RenameWidget', widgetId: 'wid_1' },
				principalId: 'dana',
				performedAt: event.occurredAt,
			});
			expect(committed.audit[0]?.id).toMatch(/^aud_/);
		});

		it('should fall back to the event type as operation name', async () => {
			const { committed, unitOfWork } = createFakeStore();
			const widget: Widget = { id: 'wid_1', name: 'Anna' };

			await unitOfWork.commit(widget, new WidgetRenamed(ctx, widget.id, 'Ann', 'Anna'), { widgetId: 'wid_1' });

			expect(committed.audit[0]?.operation).toBe('WIDGET_RENAMED');
		});

		it('should leave nothing behind when persisting fails', async () => {
			const { committed, unitOfWork } = createFakeStore({ failOn: 'Anna' });
			const widget: Widget = { id: 'wid_1', name: 'Anna' };

			const result = await unitOfWork.commit(widget, new WidgetRenamed(ctx, widget.id, 'Ann', 'Anna'), {});

			expect(Result.isFailure(result)).toBe(true);
			if (Result.isFailure(result)) {
				expect(result.error).toEqual({
					type: 'concurrency',
					code: 'COMMIT_FAILED',
					message: 'cannot store Anna',
					details: { cause: 'Error' },
				});
			}
			expect(committed).toEqual({ widgets: [], events: [], audit: [] });
		});

		it('should report a version conflict as a stale aggregate', async () => {
			const { committed, unitOfWork } = createFakeStore({ staleOn: 'Anna' });
			const widget: Widget = { id: 'wid_1', name: 'Anna' };

			const result = await unitOfWork.commit(widget, new WidgetRenamed(ctx, widget.id, 'Ann', 'Anna'), {});

			expect(Result.isFailure(result) && result.error).toEqual({
				type: 'concurrency',
				code: 'STALE_AGGREGATE',
				message: 'Widget wid_1 was changed by another transaction',
				details: { aggregateType: 'Widget', aggregateId: 'wid_1' },
			});
			expect(committed).toEqual({ widgets: [], events: [], audit: [] });
		});

		it('should fail when no handler claims the aggregate', async () => {
			const { committed, unitOfWork } = createFakeStore();

			const result = await unitOfWork.commit({ id: 'zzz_1' }, new WidgetRenamed(ctx, 'zzz_1', 'a', 'b'), {});

			expect(Result.isFailure(result) && result.error.code).toBe('COMMIT_FAILED');
			expect(committed.events).toEqual([]);
		});
	});

	describe('commitAll', () => {
		it('should roll back every aggregate when one fails', async () => {
			const { committed, unitOfWork } = createFakeStore({ failOn: 'second' });
			const first: Widget = { id: 'wid_1', name: 'first' };
			const second: Widget = { id: 'wid_2', name: 'second' };

			const result = await unitOfWork.commitAll(
				[first, second],
				new WidgetRenamed(ctx, first.id, 'a', 'first'),
				{ _type: 'SwapWidgets' },
			);

			expect(Result.isFailure(result)).toBe(true);
			expect(committed).toEqual({ widgets: [], events: [], audit: [] });
		});

		it('should record one audit row for several aggregates', async () => {
			const { committed, unitOfWork } = createFakeStore();
			const first: Widget = { id: 'wid_1', name: 'first' };
			const second: Widget = { id: 'wid_2', name: 'second' };

			await unitOfWork.commitAll([first, second], new WidgetRenamed(ctx, first.id, 'a', 'first'), {
				_type: 'SwapWidgets',
			});

			expect(committed.widgets).toEqual([first, second]);
			expect(committed.audit).toHaveLength(1);
			expect(committed.audit[0]?.entityId).toBe('wid_1');
		});
	});

	describe('commitBatch', () => {
		it('should write every event in one transaction', async () => {
			const { committed, unitOfWork } = createFakeStore();
			const widget: Widget = { id: 'wid_1', name: 'Anna' };
			const events = [
				new WidgetRenamed(ctx, widget.id, 'Ann', 'Anne'),
				new WidgetRenamed(ctx, widget.id, 'Anne', 'Anna'),
			];

			const result = await unitOfWork.commitBatch([widget], events, { _type: 'UpdateWidget' });

			expect(Result.isSuccess(result) && result.value).toEqual(events);
			expect(committed.events).toEqual(events);
			expect(committed.audit).toHaveLength(1);
		});

		it('should write nothing without events', async () => {
			const { committed, unitOfWork } = createFakeStore();
			const widget: Widget = { id: 'wid_1', name: 'Anna' };

			const result = await unitOfWork.commitBatch([widget], [], { _type: 'UpdateWidget' });

			expect(Result.isSuccess(result) && result.value).toEqual([]);
			expect(committed).toEqual({ widgets: [], events: [], audit: [] });
		});
	});
});
