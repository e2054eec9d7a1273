/**
 * Doll Entity
 *
 * A doll sits in exactly one container. Dolls are soft-deleted: the row stays
 * so its event history remains addressable.
 *
 * `version` is the stored version the doll was loaded at. Each write of the
 * doll, including photo changes committed with it, must find that version
 * still stored and increments it.
 */

import { generate, isTypedId } from '@dollhouse/tsid';
import type { Aggregate } from '@dollhouse/domain-core';

export interface Doll {
	readonly id: string;
	readonly name: string;
	readonly containerId: string;
	readonly purchaseUrl: string | null;
	readonly createdAt: Date;
	readonly updatedAt: Date;
	readonly deletedAt: Date | null;
	/** Identity that deleted the doll */
	readonly deletedBy: string | null;
	readonly version: number;
}

export const DOLL_NAME_MAX_LENGTH = 255;

export function isDoll(aggregate: Aggregate): aggregate is Doll {
	return isTypedId('DOLL', aggregate.id);
}

export function createDoll(params: {
	name: string;
	containerId: string;
	purchaseUrl?: string | null;
	now?: Date;
}): Doll {
	const now = params.now ?? new Date();
	return {
		id: generate('DOLL'),
		name: params.name,
		containerId: params.containerId,
		purchaseUrl: params.purchaseUrl ?? null,
		createdAt: now,
		updatedAt: now,
		deletedAt: null,
		deletedBy: null,
		version: 0,
	};
}

export function isDeleted(doll: Doll): boolean {
	return doll.deletedAt !== null;
}

export function renameDoll(doll: Doll, name: string, now: Date = new Date()): Doll {
	return { ...doll, name, updatedAt: now };
}

export function moveDoll(doll: Doll, containerId: string, now: Date = new Date()): Doll {
	return { ...doll, containerId, updatedAt: now };
}

export function softDeleteDoll(doll: Doll, principalId: string, now: Date = new Date()): Doll {
	return { ...doll, deletedAt: now, deletedBy: principalId, updatedAt: now };
}

/**
 * True for absolute http and https URLs.
 */
export function isHttpUrl(value: string): boolean {
	try {
		const url = new URL(value);
		return url.protocol === 'http:' || url.protocol === 'https:';
	} catch {
		return false;
	}
}
