/**
 * Doll Events Schema
 *
 * Append-only. Rows are ordered by (doll_id, created_at, id); the TSID id
 * breaks ties between events written in the same millisecond.
 */

import { pgTable, varchar, jsonb, index } from 'drizzle-orm/pg-core';
import { tsidColumn, identityColumn, timestampColumn } from '@dollhouse/persistence';
import { dolls } from './dolls.js';

export const dollEvents = pgTable(
	'doll_events',
	{
		id: tsidColumn('id').primaryKey(),
		dollId: tsidColumn('doll_id')
			.notNull()
			.references(() => dolls.id, { onDelete: 'cascade' }),
		eventType: varchar('event_type', { length: 50 }).notNull(),
		payload: jsonb('payload').notNull(),
		createdBy: identityColumn('created_by').notNull(),
		createdAt: timestampColumn('created_at').notNull().defaultNow(),
	},
	(table) => [
		index('idx_doll_events_order').on(table.dollId, table.createdAt, table.id),
		index('idx_doll_events_type').on(table.eventType),
		index('idx_doll_events_created_at').on(table.createdAt),
	],
);

export type DollEventRecord = typeof dollEvents.$inferSelect;
export type NewDollEventRecord = typeof dollEvents.$inferInsert;
