/**
 * Audit Logs Schema
 *
 * One row per committed use case, linking the entity, the operation and the
 * principal. Written by the unit of work in the commit transaction.
 */

import { pgTable, varchar, jsonb, index } from 'drizzle-orm/pg-core';
import { tsidColumn, identityColumn, timestampColumn } from './common.js';

export const auditLogs = pgTable(
	'audit_logs',
	{
		id: tsidColumn('id').primaryKey(),

		// Entity identification
		entityType: varchar('entity_type', { length: 100 }).notNull(),
		entityId: tsidColumn('entity_id').notNull(),

		// Operation details
		operation: varchar('operation', { length: 100 }).notNull(),
		operationJson: jsonb('operation_json'),

		principalId: identityColumn('principal_id'),

		performedAt: timestampColumn('performed_at').notNull().defaultNow(),
	},
	(table) => [
		index('idx_audit_logs_entity').on(table.entityType, table.entityId),
		index('idx_audit_logs_performed').on(table.performedAt),
		index('idx_audit_logs_principal').on(table.principalId),
	],
);

export type AuditLogRecord = typeof auditLogs.$inferSelect;

export type NewAuditLog = typeof auditLogs.$inferInsert;
