/**
 * Container Entity
 *
 * A place dolls are kept: Home, a numbered bag, the wishlist, or anything
 * the admin creates. System containers are seeded at startup and cannot be
 * renamed, deactivated or deleted.
 */

import { generate, isTypedId } from '@dollhouse/tsid';
import type { Aggregate } from '@dollhouse/domain-core';

export interface Container {
	readonly id: string;
	readonly name: string;
	/** Display order, ascending */
	readonly sortOrder: number;
	/** Inactive containers are soft-deleted */
	readonly isActive: boolean;
	readonly isSystem: boolean;
	readonly createdAt: Date;
	readonly updatedAt: Date;
}

export const SystemContainers = {
	HOME: 'Home',
	WISHLIST: 'Wishlist',
} as const;

export type SystemContainerName = (typeof SystemContainers)[keyof typeof SystemContainers];

export const CONTAINER_NAME_MAX_LENGTH = 255;

/** Gap left between neighbouring containers */
export const SORT_ORDER_STEP = 10;

export function isContainer(aggregate: Aggregate): aggregate is Container {
	return isTypedId('CONTAINER', aggregate.id);
}

export function createContainer(params: {
	name: string;
	sortOrder: number;
	isSystem?: boolean;
	now?: Date;
}): Container {
	const now = params.now ?? new Date();
	return {
		id: generate('CONTAINER'),
		name: params.name,
		sortOrder: params.sortOrder,
		isActive: true,
		isSystem: params.isSystem ?? false,
		createdAt: now,
		updatedAt: now,
	};
}

/**
 * Sort order for a container appended after `maxSortOrder`. An empty table
 * has no maximum.
 */
export function nextSortOrder(maxSortOrder: number | null): number {
	return (maxSortOrder ?? 0) + SORT_ORDER_STEP;
}

export function renameContainer(container: Container, name: string, now: Date = new Date()): Container {
	return { ...container, name, updatedAt: now };
}

export function setContainerActive(container: Container, isActive: boolean, now: Date = new Date()): Container {
	return { ...container, isActive, updatedAt: now };
}

/**
 * Exchange the sort orders of two containers.
 */
export function swapSortOrder(
	a: Container,
	b: Container,
	now: Date = new Date(),
): readonly [Container, Container] {
	return [
		{ ...a, sortOrder: b.sortOrder, updatedAt: now },
		{ ...b, sortOrder: a.sortOrder, updatedAt: now },
	];
}
