/**
 * Doll Event Repository
 *
 * Read access to the doll event log. Events are written only by the unit of
 * work's event writer.
 */

import { desc, eq, sql, type SQL } from 'drizzle-orm';
import { createPagedResult, type Db, type PageRequest, type PagedResult } from '@dollhouse/persistence';

import { dollEvents } from '../schema/index.js';

export interface DollEventEntry {
	readonly id: string;
	readonly dollId: string;
	readonly eventType: string;
	/** Stored payload; read it through `readEventBody` */
	readonly payload: unknown;
	readonly createdBy: string;
	readonly createdAt: Date;
}

export interface DollEventFilter {
	readonly eventType?: string;
}

export interface DollEventRepository {
	/** Newest first */
	listByDoll(dollId: string, page: PageRequest): Promise<PagedResult<DollEventEntry>>;
	/** Newest first across all dolls */
	list(filter: DollEventFilter, page: PageRequest): Promise<PagedResult<DollEventEntry>>;
}

export function createDollEventRepository(db: Db): DollEventRepository {
	async function page(where: SQL | undefined, request: PageRequest): Promise<PagedResult<DollEventEntry>> {
		const [records, countResult] = await Promise.all([
			db
				.select()
				.from(dollEvents)
				.where(where)
				.orderBy(desc(dollEvents.createdAt), desc(dollEvents.id))
				.limit(request.limit)
				.offset(request.offset),
			db.select({ count: sql<number>`count(*)` }).from(dollEvents).where(where),
		]);

		return createPagedResult(records, Number(countResult[0]?.count ?? 0), request);
	}

	return {
		listByDoll(dollId, request) {
			return page(eq(dollEvents.dollId, dollId), request);
		},

		list(filter, request) {
			return page(filter.eventType ? eq(dollEvents.eventType, filter.eventType) : undefined, request);
		},
	};
}
