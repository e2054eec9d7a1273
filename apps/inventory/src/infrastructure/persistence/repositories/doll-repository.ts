/**
 * Doll Repository
 *
 * Read access for dolls. Listings join the container and the primary photo
 * so a doll can be served in one row.
 */

import { and, desc, eq, ilike, isNull, sql, type SQL } from 'drizzle-orm';
import {
	createPagedResult,
	type Db,
	type PageRequest,
	type PagedResult,
	type ReadRepository,
} from '@dollhouse/persistence';

import { containers, dolls, photos, type DollRecord } from '../schema/index.js';
import type { Container, Doll } from '../../../domain/index.js';
import { containsPattern } from './like.js';

/**
 * A doll with the container it sits in and the path of its primary photo.
 */
export interface DollView {
	readonly doll: Doll;
	readonly container: Pick<Container, 'id' | 'name' | 'isSystem'>;
	readonly primaryPhotoPath: string | null;
}

export interface DollSearch {
	/** Case-insensitive substring of the name */
	readonly q?: string;
	readonly containerId?: string;
	readonly includeDeleted?: boolean;
}

export interface DollNameMatchQuery {
	readonly q: string;
	readonly containerId?: string;
	readonly limit: number;
}

export interface DollRepository extends ReadRepository<Doll> {
	/** Deleted dolls included */
	findView(id: string): Promise<DollView | undefined>;
	/** Newest first */
	search(filter: DollSearch, page: PageRequest): Promise<PagedResult<DollView>>;
	/** Non-deleted dolls whose name contains `q`, unranked */
	findNameMatches(query: DollNameMatchQuery): Promise<DollView[]>;
}

export function createDollRepository(db: Db): DollRepository {
	function selectViews() {
		return db
			.select({
				doll: dolls,
				container: { id: containers.id, name: containers.name, isSystem: containers.isSystem },
				primaryPhotoPath: photos.path,
			})
			.from(dolls)
			.innerJoin(containers, eq(dolls.containerId, containers.id))
			.leftJoin(photos, and(eq(photos.dollId, dolls.id), eq(photos.isPrimary, true)));
	}

	function toView(row: {
		doll: DollRecord;
		container: Pick<Container, 'id' | 'name' | 'isSystem'>;
		primaryPhotoPath: string | null;
	}): DollView {
		return { doll: recordToDoll(row.doll), container: row.container, primaryPhotoPath: row.primaryPhotoPath };
	}

	return {
		async findById(id) {
			const [record] = await db.select().from(dolls).where(eq(dolls.id, id)).limit(1);
			return record ? recordToDoll(record) : undefined;
		},

		async findView(id) {
			const [row] = await selectViews().where(eq(dolls.id, id)).limit(1);
			return row ? toView(row) : undefined;
		},

		async search(filter, page) {
			const conditions: SQL[] = [];
			if (!filter.includeDeleted) {
				conditions.push(isNull(dolls.deletedAt));
			}
			if (filter.q) {
				conditions.push(ilike(dolls.name, containsPattern(filter.q)));
			}
			if (filter.containerId) {
				conditions.push(eq(dolls.containerId, filter.containerId));
			}
			const where = conditions.length > 0 ? and(...conditions) : undefined;

			const [rows, countResult] = await Promise.all([
				selectViews()
					.where(where)
					.orderBy(desc(dolls.createdAt), desc(dolls.id))
					.limit(page.limit)
					.offset(page.offset),
				db.select({ count: sql<number>`count(*)` }).from(dolls).where(where),
			]);

			return createPagedResult(rows.map(toView), Number(countResult[0]?.count ?? 0), page);
		},

		async findNameMatches(query) {
			const conditions: SQL[] = [isNull(dolls.deletedAt), ilike(dolls.name, containsPattern(query.q))];
			if (query.containerId) {
				conditions.push(eq(dolls.containerId, query.containerId));
			}
			const rows = await selectViews()
				.where(and(...conditions))
				.limit(query.limit);
			return rows.map(toView);
		},
	};
}

export function recordToDoll(record: DollRecord): Doll {
	return {
		id: record.id,
		name: record.name,
		containerId: record.containerId,
		purchaseUrl: record.purchaseUrl,
		createdAt: record.createdAt,
		updatedAt: record.updatedAt,
		deletedAt: record.deletedAt,
		deletedBy: record.deletedBy,
		version: record.version,
	};
}
