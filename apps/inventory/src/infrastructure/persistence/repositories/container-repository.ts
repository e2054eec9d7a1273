/**
 * Container Repository
 *
 * Read access for containers. Writes go through the container aggregate
 * handler.
 */

import { and, asc, desc, eq, gt, isNull, lt, ne, sql, type SQL } from 'drizzle-orm';
import type { Db, ReadRepository } from '@dollhouse/persistence';

import { containers, dolls, type ContainerRecord } from '../schema/index.js';
import type { Container, SystemContainerName } from '../../../domain/index.js';

export type ReorderDirection = 'up' | 'down';

export interface ContainerRepository extends ReadRepository<Container> {
	/** The seeded system container with this name */
	findSystem(name: SystemContainerName): Promise<Container | undefined>;
	/** Active container whose name matches ignoring case */
	findActiveByName(name: string, excludeId?: string): Promise<Container | undefined>;
	/** Ordered by sort order */
	list(includeInactive: boolean): Promise<Container[]>;
	/** Highest sort order of any container, null when there are none */
	maxSortOrder(): Promise<number | null>;
	/** Nearest active container above (`up`) or below (`down`) in sort order */
	findNeighbour(container: Container, direction: ReorderDirection): Promise<Container | undefined>;
	/** Dolls in the container that are not deleted */
	countActiveDolls(containerId: string): Promise<number>;
}

export function createContainerRepository(db: Db): ContainerRepository {
	return {
		async findById(id) {
			const [record] = await db.select().from(containers).where(eq(containers.id, id)).limit(1);
			return record ? recordToContainer(record) : undefined;
		},

		async findSystem(name) {
			const [record] = await db
				.select()
				.from(containers)
				.where(and(eq(containers.isSystem, true), eq(containers.name, name)))
				.limit(1);
			return record ? recordToContainer(record) : undefined;
		},

		async findActiveByName(name, excludeId) {
			const conditions: SQL[] = [
				eq(containers.isActive, true),
				sql`lower(${containers.name}) = lower(${name})`,
			];
			if (excludeId) {
				conditions.push(ne(containers.id, excludeId));
			}
			const [record] = await db
				.select()
				.from(containers)
				.where(and(...conditions))
				.limit(1);
			return record ? recordToContainer(record) : undefined;
		},

		async list(includeInactive) {
			const records = await db
				.select()
				.from(containers)
				.where(includeInactive ? undefined : eq(containers.isActive, true))
				.orderBy(asc(containers.sortOrder), asc(containers.id));
			return records.map(recordToContainer);
		},

		async maxSortOrder() {
			const [result] = await db.select({ max: sql<number | null>`max(${containers.sortOrder})` }).from(containers);
			return result?.max === null || result?.max === undefined ? null : Number(result.max);
		},

		async findNeighbour(container, direction) {
			const [record] = await db
				.select()
				.from(containers)
				.where(
					and(
						eq(containers.isActive, true),
						direction === 'up'
							? lt(containers.sortOrder, container.sortOrder)
							: gt(containers.sortOrder, container.sortOrder),
					),
				)
				.orderBy(direction === 'up' ? desc(containers.sortOrder) : asc(containers.sortOrder))
				.limit(1);
			return record ? recordToContainer(record) : undefined;
		},

		async countActiveDolls(containerId) {
			const [result] = await db
				.select({ count: sql<number>`count(*)` })
				.from(dolls)
				.where(and(eq(dolls.containerId, containerId), isNull(dolls.deletedAt)));
			return Number(result?.count ?? 0);
		},
	};
}

export function recordToContainer(record: ContainerRecord): Container {
	return {
		id: record.id,
		name: record.name,
		sortOrder: record.sortOrder,
		isActive: record.isActive,
		isSystem: record.isSystem,
		createdAt: record.createdAt,
		updatedAt: record.updatedAt,
	};
}
