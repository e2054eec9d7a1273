/**
 * Dolls Schema
 */

import { pgTable, varchar, text, integer, index } from 'drizzle-orm/pg-core';
import { tsidColumn, identityColumn, timestampColumn } from '@dollhouse/persistence';
import { containers } from './containers.js';

export const dolls = pgTable(
	'dolls',
	{
		id: tsidColumn('id').primaryKey(),
		name: varchar('name', { length: 255 }).notNull(),
		containerId: tsidColumn('container_id')
			.notNull()
			.references(() => containers.id),
		purchaseUrl: text('purchase_url'),
		createdAt: timestampColumn('created_at').notNull().defaultNow(),
		updatedAt: timestampColumn('updated_at').notNull().defaultNow(),
		deletedAt: timestampColumn('deleted_at'),
		deletedBy: identityColumn('deleted_by'),
		version: integer('version').notNull().default(0),
	},
	(table) => [
		index('idx_dolls_name').on(table.name),
		index('idx_dolls_container').on(table.containerId),
		index('idx_dolls_deleted_at').on(table.deletedAt),
		index('idx_dolls_created_at').on(table.createdAt),
	],
);

export type DollRecord = typeof dolls.$inferSelect;
export type NewDollRecord = typeof dolls.$inferInsert;
