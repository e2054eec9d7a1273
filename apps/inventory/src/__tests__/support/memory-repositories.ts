/**
 * Repository implementations over the in-memory store. They read committed
 * state, like the Drizzle repositories read outside the commit transaction.
 */

import { createPagedResult, type PageRequest } from '@dollhouse/persistence';

import type { Doll, Photo } from '../../domain/index.js';
import type {
	ContainerRepository,
	DollEventEntry,
	DollEventRepository,
	DollRepository,
	DollView,
	PhotoRepository,
} from '../../infrastructure/persistence/index.js';
import type { MemoryStore } from './memory-store.js';

function newestFirst<T extends { readonly createdAt: Date; readonly id: string }>(a: T, b: T): number {
	const byTime = b.createdAt.getTime() - a.createdAt.getTime();
	if (byTime !== 0) return byTime;
	if (a.id === b.id) return 0;
	return a.id < b.id ? 1 : -1;
}

function page<T>(items: T[], request: PageRequest) {
	return createPagedResult(items.slice(request.offset, request.offset + request.limit), items.length, request);
}

export function createMemoryContainerRepository(store: MemoryStore): ContainerRepository {
	const all = () => [...store.state.containers.values()];

	return {
		async findById(id) {
			return store.state.containers.get(id);
		},

		async findSystem(name) {
			return all().find((c) => c.isSystem && c.name === name);
		},

		async findActiveByName(name, excludeId) {
			const lower = name.toLowerCase();
			return all().find((c) => c.isActive && c.name.toLowerCase() === lower && c.id !== excludeId);
		},

		async list(includeInactive) {
			return all()
				.filter((c) => includeInactive || c.isActive)
				.sort((a, b) => a.sortOrder - b.sortOrder || (a.id < b.id ? -1 : 1));
		},

		async maxSortOrder() {
			const orders = all().map((c) => c.sortOrder);
			return orders.length > 0 ? Math.max(...orders) : null;
		},

		async findNeighbour(container, direction) {
			const candidates = all().filter(
				(c) =>
					c.isActive &&
					(direction === 'up' ? c.sortOrder < container.sortOrder : c.sortOrder > container.sortOrder),
			);
			candidates.sort((a, b) => (direction === 'up' ? b.sortOrder - a.sortOrder : a.sortOrder - b.sortOrder));
			return candidates[0];
		},

		async countActiveDolls(containerId) {
			return [...store.state.dolls.values()].filter((d) => d.containerId === containerId && !d.deletedAt).length;
		},
	};
}

export function createMemoryDollRepository(store: MemoryStore): DollRepository {
	function toView(doll: Doll): DollView {
		const container = store.state.containers.get(doll.containerId);
		if (!container) {
			throw new Error(`Container ${doll.containerId} of doll ${doll.id} is missing`);
		}
		const primary = [...store.state.photos.values()].find((p) => p.dollId === doll.id && p.isPrimary);
		return {
			doll,
			container: { id: container.id, name: container.name, isSystem: container.isSystem },
			primaryPhotoPath: primary?.path ?? null,
		};
	}

	return {
		async findById(id) {
			return store.state.dolls.get(id);
		},

		async findView(id) {
			const doll = store.state.dolls.get(id);
			return doll ? toView(doll) : undefined;
		},

		async search(filter, request) {
			const q = filter.q?.toLowerCase();
			const matches = [...store.state.dolls.values()]
				.filter((d) => filter.includeDeleted || !d.deletedAt)
				.filter((d) => !q || d.name.toLowerCase().includes(q))
				.filter((d) => !filter.containerId || d.containerId === filter.containerId)
				.sort(newestFirst);
			return page(matches.map(toView), request);
		},

		async findNameMatches(query) {
			const q = query.q.toLowerCase();
			return [...store.state.dolls.values()]
				.filter((d) => !d.deletedAt && d.name.toLowerCase().includes(q))
				.filter((d) => !query.containerId || d.containerId === query.containerId)
				.slice(0, query.limit)
				.map(toView);
		},
	};
}

export function createMemoryPhotoRepository(store: MemoryStore): PhotoRepository {
	const ofDoll = (dollId: string): Photo[] => [...store.state.photos.values()].filter((p) => p.dollId === dollId);

	return {
		async findById(id) {
			return store.state.photos.get(id);
		},

		async findPrimary(dollId) {
			return ofDoll(dollId).find((p) => p.isPrimary);
		},

		async countByDoll(dollId) {
			return ofDoll(dollId).length;
		},

		async listByDoll(dollId) {
			return ofDoll(dollId).sort(newestFirst);
		},
	};
}

export function createMemoryDollEventRepository(store: MemoryStore): DollEventRepository {
	const sorted = (entries: DollEventEntry[]) => [...entries].sort(newestFirst);

	return {
		async listByDoll(dollId, request) {
			return page(sorted(store.state.events.filter((e) => e.dollId === dollId)), request);
		},

		async list(filter, request) {
			return page(sorted(store.state.events.filter((e) => !filter.eventType || e.eventType === filter.eventType)), request);
		},
	};
}
