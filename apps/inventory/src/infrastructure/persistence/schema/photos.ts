/**
 * Photos Schema
 */

import { sql } from 'drizzle-orm';
import { pgTable, varchar, boolean, index, uniqueIndex } from 'drizzle-orm/pg-core';
import { tsidColumn, identityColumn, timestampColumn } from '@dollhouse/persistence';
import { dolls } from './dolls.js';

export const photos = pgTable(
	'photos',
	{
		id: tsidColumn('id').primaryKey(),
		dollId: tsidColumn('doll_id')
			.notNull()
			.references(() => dolls.id, { onDelete: 'cascade' }),
		path: varchar('path', { length: 500 }).notNull(),
		isPrimary: boolean('is_primary').notNull().default(false),
		createdAt: timestampColumn('created_at').notNull().defaultNow(),
		createdBy: identityColumn('created_by').notNull(),
	},
	(table) => [
		index('idx_photos_doll').on(table.dollId),
		// At most one primary photo per doll
		uniqueIndex('uq_photos_primary_per_doll')
			.on(table.dollId)
			.where(sql`${table.isPrimary}`),
	],
);

export type PhotoRecord = typeof photos.$inferSelect;
export type NewPhotoRecord = typeof photos.$inferInsert;
