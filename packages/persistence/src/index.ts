/**
 * @dollhouse/persistence
 *
 * Database persistence layer using DrizzleORM over postgres.js.
 *
 * Key components:
 * - Database connection and configuration
 * - Transaction management, generic over the transaction handle
 * - Aggregate registry for dispatching aggregate writes
 * - Transactional unit of work for atomic commits
 * - Shared schema (audit logs) and column helpers
 *
 * @example
 * ```typescript
 * import {
 *     createDatabase,
 *     createTransactionManager,
 *     createAggregateRegistry,
 *     createTransactionalUnitOfWork,
 *     createDrizzleAuditLogWriter,
 * } from '@dollhouse/persistence';
 *
 * const database = createDatabase({ url: env.DATABASE_URL });
 *
 * const aggregateRegistry = createAggregateRegistry();
 * aggregateRegistry.register(dollHandler);
 *
 * const unitOfWork = createTransactionalUnitOfWork({
 *     transactionManager: createTransactionManager(database.db),
 *     aggregateRegistry,
 *     eventWriter,
 *     auditLogWriter: createDrizzleAuditLogWriter(),
 * });
 * ```
 */

// Database connection
export { createDatabase, type Database, type DatabaseConfig } from './connection.js';

// Transaction management
export {
	createTransactionManager,
	type Db,
	type TransactionContext,
	type TransactionManager,
	type DrizzleTransactionManager,
} from './transaction.js';

// Repository types
export {
	type ReadRepository,
	type PageRequest,
	type PagedResult,
	createPagedResult,
} from './repository.js';

// Aggregate registry
export {
	createAggregateRegistry,
	StaleAggregateError,
	type AggregateRegistry,
	type AggregateHandler,
} from './aggregate-registry.js';

// Unit of Work
export {
	createTransactionalUnitOfWork,
	createDrizzleAuditLogWriter,
	type EventWriter,
	type AuditLogWriter,
	type TransactionalUnitOfWorkConfig,
} from './unit-of-work.js';

// Schema definitions
export {
	tsidColumn,
	identityColumn,
	timestampColumn,
	auditLogs,
	type AuditLogRecord,
	type NewAuditLog,
} from './schema/index.js';
