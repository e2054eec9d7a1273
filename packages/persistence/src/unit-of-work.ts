/**
 * Transactional Unit of Work
 *
 * UnitOfWork implementation that commits aggregate changes, domain events
 * and the audit log entry in one transaction of a TransactionManager.
 *
 * This is the ONLY way to create successful Results, so events and audit
 * logs are always written alongside state changes.
 */

import {
	type UnitOfWork,
	type Aggregate,
	type DomainEvent,
	Result,
	RESULT_SUCCESS_TOKEN,
	UseCaseError,
} from '@dollhouse/domain-core';
import { generate } from '@dollhouse/tsid';
import { StaleAggregateError, type AggregateRegistry } from './aggregate-registry.js';
import type { TransactionContext, TransactionManager } from './transaction.js';
import { auditLogs, type NewAuditLog } from './schema/audit-logs.js';

/**
 * Writes domain events inside the commit transaction. Event types the writer
 * does not store are skipped by the writer itself.
 */
export interface EventWriter<TTx = TransactionContext> {
	write(events: readonly DomainEvent[], tx: TTx): Promise<void>;
}

export interface AuditLogWriter<TTx = TransactionContext> {
	write(entry: NewAuditLog, tx: TTx): Promise<void>;
}

export interface TransactionalUnitOfWorkConfig<TTx> {
	readonly transactionManager: TransactionManager<TTx>;
	readonly aggregateRegistry: AggregateRegistry<TTx>;
	readonly eventWriter: EventWriter<TTx>;
	readonly auditLogWriter: AuditLogWriter<TTx>;
}

/**
 * Create a Unit of Work over any transaction manager.
 *
 * @example
 * ```typescript
 * const unitOfWork = createTransactionalUnitOfWork({
 *     transactionManager: createTransactionManager(database.db),
 *     aggregateRegistry: registry,
 *     eventWriter: createDollEventWriter(),
 *     auditLogWriter: createDrizzleAuditLogWriter(),
 * });
 * ```
 */
export function createTransactionalUnitOfWork<TTx>(config: TransactionalUnitOfWorkConfig<TTx>): UnitOfWork {
	const { transactionManager, aggregateRegistry, eventWriter, auditLogWriter } = config;

	async function commitInTransaction<T extends DomainEvent>(
		aggregates: readonly Aggregate[],
		events: readonly T[],
		command: unknown,
		principalId: string,
		fallbackOperation: string,
	): Promise<Result<readonly T[]>> {
		try {
			return await transactionManager.inTransaction(async (tx) => {
				for (const aggregate of aggregates) {
					await aggregateRegistry.persist(aggregate, tx);
				}

				await eventWriter.write(events, tx);

				await auditLogWriter.write(
					buildAuditLogEntry(aggregates, events, command, principalId, fallbackOperation, aggregateRegistry),
					tx,
				);

				return Result.success(RESULT_SUCCESS_TOKEN, events);
			});
		} catch (error) {
			if (error instanceof StaleAggregateError) {
				return Result.failure(
					UseCaseError.stale(error.message, {
						aggregateType: error.aggregateType,
						aggregateId: error.aggregateId,
					}),
				);
			}
			return Result.failure(
				UseCaseError.concurrency(
					'COMMIT_FAILED',
					error instanceof Error ? error.message : 'Unknown error during commit',
					{ cause: error instanceof Error ? error.name : 'Unknown' },
				),
			);
		}
	}

	function single<T>(result: Result<readonly T[]>, event: T): Result<T> {
		return Result.map(result, () => event);
	}

	return {
		async commit<T extends DomainEvent>(aggregate: Aggregate, event: T, command: unknown): Promise<Result<T>> {
			const result = await commitInTransaction([aggregate], [event], command, event.principalId, event.eventType);
			return single(result, event);
		},

		async commitAll<T extends DomainEvent>(
			aggregates: readonly Aggregate[],
			event: T,
			command: unknown,
		): Promise<Result<T>> {
			const result = await commitInTransaction(aggregates, [event], command, event.principalId, event.eventType);
			return single(result, event);
		},

		async commitBatch<T extends DomainEvent>(
			aggregates: readonly Aggregate[],
			events: readonly T[],
			command: unknown,
		): Promise<Result<readonly T[]>> {
			const first = events[0];
			if (!first) {
				return Result.success(RESULT_SUCCESS_TOKEN, events);
			}
			return commitInTransaction(aggregates, events, command, first.principalId, first.eventType);
		},
	};
}

/**
 * Audit log writer for the shared `audit_logs` table.
 */
export function createDrizzleAuditLogWriter(): AuditLogWriter<TransactionContext> {
	return {
		async write(entry, tx) {
			await tx.db.insert(auditLogs).values(entry);
		},
	};
}

function buildAuditLogEntry<TTx>(
	aggregates: readonly Aggregate[],
	events: readonly DomainEvent[],
	command: unknown,
	principalId: string,
	fallbackOperation: string,
	registry: AggregateRegistry<TTx>,
): NewAuditLog {
	const primary = aggregates[0];

	return {
		id: generate('AUDIT_LOG'),
		entityType: primary ? registry.typeNameOf(primary) : 'Unknown',
		entityId: primary?.id ?? events[0]?.subject ?? 'unknown',
		operation: getOperationName(command, fallbackOperation),
		operationJson: toJson(command),
		principalId,
		performedAt: events[0]?.occurredAt ?? new Date(),
	};
}

function getOperationName(command: unknown, fallback: string): string {
	if (typeof command === 'object' && command !== null && '_type' in command && typeof command._type === 'string') {
		return command._type;
	}
	return fallback;
}

function toJson(command: unknown): unknown {
	if (command === null || command === undefined) {
		return null;
	}
	return JSON.parse(JSON.stringify(command));
}
