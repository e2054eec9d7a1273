/**
 * Transaction Management
 *
 * Transaction context and utilities for atomic database operations.
 * Uses postgres.js transactions with DrizzleORM.
 *
 * `TransactionManager` is generic over the transaction handle, so the unit of
 * work and the aggregate registry run unchanged against any store that can
 * offer all-or-nothing execution of a callback.
 */

import type { PgDatabase } from 'drizzle-orm/pg-core';
import type { PostgresJsQueryResultHKT } from 'drizzle-orm/postgres-js';

/**
 * Query builder shared by the root database and its transactions.
 */
export type Db = PgDatabase<PostgresJsQueryResultHKT>;

/**
 * Transaction context passed to aggregate handlers.
 */
export interface TransactionContext {
	/** DrizzleORM database instance scoped to this transaction */
	readonly db: Db;
}

export interface TransactionManager<TTx = TransactionContext> {
	/**
	 * Execute a function within a transaction.
	 * If the function throws, the transaction is rolled back and the error
	 * re-thrown. If it returns, the transaction is committed.
	 */
	inTransaction<T>(fn: (tx: TTx) => Promise<T>): Promise<T>;
}

export interface DrizzleTransactionManager extends TransactionManager<TransactionContext> {
	/**
	 * Database instance for non-transactional queries.
	 */
	readonly db: Db;
}

export function createTransactionManager(db: Db): DrizzleTransactionManager {
	return {
		db,
		async inTransaction<T>(fn: (tx: TransactionContext) => Promise<T>): Promise<T> {
			return db.transaction(async (tx) => fn({ db: tx }));
		},
	};
}
