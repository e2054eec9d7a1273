/**
 * Containers Schema
 */

import { sql } from 'drizzle-orm';
import { pgTable, varchar, integer, boolean, index, uniqueIndex } from 'drizzle-orm/pg-core';
import { tsidColumn, timestampColumn } from '@dollhouse/persistence';

export const containers = pgTable(
	'containers',
	{
		id: tsidColumn('id').primaryKey(),
		name: varchar('name', { length: 255 }).notNull(),
		sortOrder: integer('sort_order').notNull(),
		isActive: boolean('is_active').notNull().default(true),
		isSystem: boolean('is_system').notNull().default(false),
		createdAt: timestampColumn('created_at').notNull().defaultNow(),
		updatedAt: timestampColumn('updated_at').notNull().defaultNow(),
	},
	(table) => [
		// Names are unique among active containers, ignoring case
		uniqueIndex('uq_containers_active_name')
			.on(sql`lower(${table.name})`)
			.where(sql`${table.isActive}`),
		index('idx_containers_sort_order').on(table.sortOrder),
		index('idx_containers_is_active').on(table.isActive),
	],
);

export type ContainerRecord = typeof containers.$inferSelect;
export type NewContainerRecord = typeof containers.$inferInsert;
