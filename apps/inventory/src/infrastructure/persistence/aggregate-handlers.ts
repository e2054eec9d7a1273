/**
 * Aggregate Handlers
 *
 * Writes for each aggregate type, run by the unit of work inside the commit
 * transaction. A handler that throws rolls back the whole commit.
 */

import { and, eq, ne, sql } from 'drizzle-orm';
import { StaleAggregateError, type AggregateHandler, type TransactionContext } from '@dollhouse/persistence';

import { containers, dolls, photos } from './schema/index.js';
import { isContainer, isDoll, isPhoto, type Container, type Doll, type Photo } from '../../domain/index.js';

export const containerHandler: AggregateHandler<Container, TransactionContext> = {
	typeName: 'Container',
	matches: isContainer,

	async persist(container, tx) {
		const values = {
			name: container.name,
			sortOrder: container.sortOrder,
			isActive: container.isActive,
			isSystem: container.isSystem,
			updatedAt: container.updatedAt,
		};
		await tx.db
			.insert(containers)
			.values({ id: container.id, createdAt: container.createdAt, ...values })
			.onConflictDoUpdate({ target: containers.id, set: values });
	},
};

/**
 * Every doll write is an upsert guarded on the version the doll was loaded
 * at. A doll changed or deleted by a concurrent commit matches no row and the
 * commit fails as stale, so the use case reloads and decides again.
 */
export const dollHandler: AggregateHandler<Doll, TransactionContext> = {
	typeName: 'Doll',
	matches: isDoll,

	async persist(doll, tx) {
		const values = {
			name: doll.name,
			containerId: doll.containerId,
			purchaseUrl: doll.purchaseUrl,
			updatedAt: doll.updatedAt,
			deletedAt: doll.deletedAt,
			deletedBy: doll.deletedBy,
		};
		const written = await tx.db
			.insert(dolls)
			.values({ id: doll.id, createdAt: doll.createdAt, version: doll.version, ...values })
			.onConflictDoUpdate({
				target: dolls.id,
				set: { ...values, version: sql`${dolls.version} + 1` },
				setWhere: eq(dolls.version, doll.version),
			})
			.returning({ id: dolls.id });
		if (written.length === 0) {
			throw new StaleAggregateError('Doll', doll.id);
		}
	},
};

/**
 * Persisting a primary photo first clears every other primary photo of the
 * doll, keeping the partial unique index satisfied.
 */
export const photoHandler: AggregateHandler<Photo, TransactionContext> = {
	typeName: 'Photo',
	matches: isPhoto,

	async persist(photo, tx) {
		if (photo.isPrimary) {
			await tx.db
				.update(photos)
				.set({ isPrimary: false })
				.where(and(eq(photos.dollId, photo.dollId), eq(photos.isPrimary, true), ne(photos.id, photo.id)));
		}

		await tx.db
			.insert(photos)
			.values({
				id: photo.id,
				dollId: photo.dollId,
				path: photo.path,
				isPrimary: photo.isPrimary,
				createdAt: photo.createdAt,
				createdBy: photo.createdBy,
			})
			.onConflictDoUpdate({ target: photos.id, set: { isPrimary: photo.isPrimary } });
	},
};
