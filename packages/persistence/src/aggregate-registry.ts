/**
 * Aggregate Registry
 *
 * Central dispatcher for persisting aggregates. Each handler claims the
 * aggregates it recognises (by their typed ID prefix) and writes them inside
 * the caller's transaction.
 */

import type { Aggregate } from '@dollhouse/domain-core';
import type { TransactionContext } from './transaction.js';

/**
 * Thrown by a handler whose version check finds the stored aggregate changed
 * since it was loaded. The unit of work reports it as `STALE_AGGREGATE`.
 */
export class StaleAggregateError extends Error {
	constructor(
		readonly aggregateType: string,
		readonly aggregateId: string,
	) {
		super(`${aggregateType} ${aggregateId} was changed by another transaction`);
		this.name = 'StaleAggregateError';
	}
}

/**
 * Handler for persisting one aggregate type.
 */
export interface AggregateHandler<T extends Aggregate, TTx = TransactionContext> {
	/** Aggregate type name, recorded as the audit log entity type */
	readonly typeName: string;

	matches(aggregate: Aggregate): aggregate is T;

	/**
	 * Insert or update the aggregate.
	 */
	persist(aggregate: T, tx: TTx): Promise<void>;
}

export interface AggregateRegistry<TTx = TransactionContext> {
	register<T extends Aggregate>(handler: AggregateHandler<T, TTx>): void;

	/**
	 * Persist an aggregate using its registered handler.
	 *
	 * @throws Error if no handler claims the aggregate
	 */
	persist(aggregate: Aggregate, tx: TTx): Promise<void>;

	/**
	 * Type name of an aggregate.
	 *
	 * @throws Error if no handler claims the aggregate
	 */
	typeNameOf(aggregate: Aggregate): string;
}

interface RegisteredHandler<TTx> {
	readonly typeName: string;
	matches(aggregate: Aggregate): boolean;
	persist(aggregate: Aggregate, tx: TTx): Promise<void>;
}

export function createAggregateRegistry<TTx = TransactionContext>(): AggregateRegistry<TTx> {
	const handlers: RegisteredHandler<TTx>[] = [];

	function handlerFor(aggregate: Aggregate): RegisteredHandler<TTx> {
		const handler = handlers.find((h) => h.matches(aggregate));
		if (!handler) {
			throw new Error(
				`No handler registered for aggregate: ${aggregate.id}. ` +
					`Registered types: ${handlers.map((h) => h.typeName).join(', ')}`,
			);
		}
		return handler;
	}

	return {
		register<T extends Aggregate>(handler: AggregateHandler<T, TTx>): void {
			if (handlers.some((h) => h.typeName === handler.typeName)) {
				throw new Error(`Handler already registered for aggregate type: ${handler.typeName}`);
			}
			handlers.push({
				typeName: handler.typeName,
				matches: (aggregate) => handler.matches(aggregate),
				async persist(aggregate, tx) {
					if (!handler.matches(aggregate)) {
						throw new Error(`Aggregate ${aggregate.id} is not a ${handler.typeName}`);
					}
					await handler.persist(aggregate, tx);
				},
			});
		},

		async persist(aggregate, tx) {
			await handlerFor(aggregate).persist(aggregate, tx);
		},

		typeNameOf(aggregate) {
			return handlerFor(aggregate).typeName;
		},
	};
}
