/**
 * Photo Repository
 */

import { and, desc, eq, sql } from 'drizzle-orm';
import type { Db, ReadRepository } from '@dollhouse/persistence';

import { photos, type PhotoRecord } from '../schema/index.js';
import type { Photo } from '../../../domain/index.js';

export interface PhotoRepository extends ReadRepository<Photo> {
	findPrimary(dollId: string): Promise<Photo | undefined>;
	countByDoll(dollId: string): Promise<number>;
	/** Newest first */
	listByDoll(dollId: string): Promise<Photo[]>;
}

export function createPhotoRepository(db: Db): PhotoRepository {
	return {
		async findById(id) {
			const [record] = await db.select().from(photos).where(eq(photos.id, id)).limit(1);
			return record ? recordToPhoto(record) : undefined;
		},

		async findPrimary(dollId) {
			const [record] = await db
				.select()
				.from(photos)
				.where(and(eq(photos.dollId, dollId), eq(photos.isPrimary, true)))
				.limit(1);
			return record ? recordToPhoto(record) : undefined;
		},

		async countByDoll(dollId) {
			const [result] = await db
				.select({ count: sql<number>`count(*)` })
				.from(photos)
				.where(eq(photos.dollId, dollId));
			return Number(result?.count ?? 0);
		},

		async listByDoll(dollId) {
			const records = await db
				.select()
				.from(photos)
				.where(eq(photos.dollId, dollId))
				.orderBy(desc(photos.createdAt), desc(photos.id));
			return records.map(recordToPhoto);
		},
	};
}

export function recordToPhoto(record: PhotoRecord): Photo {
	return {
		id: record.id,
		dollId: record.dollId,
		path: record.path,
		isPrimary: record.isPrimary,
		createdAt: record.createdAt,
		createdBy: record.createdBy,
	};
}
