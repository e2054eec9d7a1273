import { describe, it, expect, beforeEach } from 'vitest';

import type { AggregateHandler } from '@dollhouse/persistence';

import type { Container } from '../domain/index.js';
import { ADMIN, EDITOR, KID, contextFor, createHarness, type Harness } from './support/harness.js';
import { memoryContainerHandler, type MemoryTx } from './support/memory-store.js';
import { failureError, successValue } from './support/results.js';

const admin = contextFor([ADMIN], 'admin-1');

async function createContainer(h: Harness, name: string): Promise<string> {
	return successValue(await h.useCases.createContainer.execute({ name }, admin)).subject;
}

async function sortOrderOf(h: Harness, id: string): Promise<number | undefined> {
	return (await h.containerRepository.findById(id))?.sortOrder;
}

describe('container use cases', () => {
	let h: Harness;

	beforeEach(async () => {
		h = await createHarness();
	});

	describe('createContainer', () => {
		it('should append after the last container', async () => {
			const wishlist = await h.systemContainer('Wishlist');

			const id = await createContainer(h, 'Bag 1');

			expect(await sortOrderOf(h, id)).toBe(wishlist.sortOrder + 10);
		});

		it('should reject a name taken by an active container, ignoring case', async () => {
			const error = failureError(await h.useCases.createContainer.execute({ name: 'HOME' }, admin));

			expect(error.type).toBe('business_rule');
			expect(error.code).toBe('CONTAINER_NAME_TAKEN');
		});

		it('should allow the name of a deleted container', async () => {
			const id = await createContainer(h, 'Shelf');
			successValue(await h.useCases.deleteContainer.execute({ containerId: id }, admin));

			const again = await h.useCases.createContainer.execute({ name: 'shelf' }, admin);

			expect(again._tag).toBe('success');
		});

		it('should be denied to kids but allowed to editors', async () => {
			const denied = failureError(await h.useCases.createContainer.execute({ name: 'Box' }, contextFor([KID])));
			const allowed = await h.useCases.createContainer.execute({ name: 'Box' }, contextFor([EDITOR]));

			expect(denied.type).toBe('forbidden');
			expect(allowed._tag).toBe('success');
		});
	});

	describe('updateContainer', () => {
		it('should rename a container', async () => {
			const id = await createContainer(h, 'Box');

			const events = successValue(
				await h.useCases.updateContainer.execute({ containerId: id, name: 'Big Box' }, admin),
			);

			expect(events[0]?.data).toEqual({ old_name: 'Box', new_name: 'Big Box', was_active: true, is_active: true });
			expect((await h.containerRepository.findById(id))?.name).toBe('Big Box');
		});

		it('should refuse to rename or deactivate a system container', async () => {
			const home = await h.systemContainer('Home');

			const rename = failureError(await h.useCases.updateContainer.execute({ containerId: home.id, name: 'House' }, admin));
			const deactivate = failureError(
				await h.useCases.updateContainer.execute({ containerId: home.id, isActive: false }, admin),
			);

			expect(rename.code).toBe('SYSTEM_CONTAINER_IMMUTABLE');
			expect(deactivate.code).toBe('SYSTEM_CONTAINER_IMMUTABLE');
		});

		it('should refuse to deactivate a container holding dolls', async () => {
			const id = await createContainer(h, 'Box');
			successValue(await h.useCases.createDoll.execute({ name: 'Ann', containerId: id }, admin));

			const error = failureError(await h.useCases.updateContainer.execute({ containerId: id, isActive: false }, admin));

			expect(error.code).toBe('CONTAINER_NOT_EMPTY');
			expect(error.details).toEqual({ doll_count: 1 });
		});

		it('should reactivate only when the name is free', async () => {
			const id = await createContainer(h, 'Box');
			successValue(await h.useCases.deleteContainer.execute({ containerId: id }, admin));
			await createContainer(h, 'box');

			const error = failureError(await h.useCases.updateContainer.execute({ containerId: id, isActive: true }, admin));

			expect(error.code).toBe('CONTAINER_NAME_TAKEN');
		});
	});

	describe('reorderContainer', () => {
		it('should swap sort orders with the neighbour', async () => {
			const x = await createContainer(h, 'X');
			const y = await createContainer(h, 'Y');
			const xOrder = await sortOrderOf(h, x);
			const yOrder = await sortOrderOf(h, y);

			const event = successValue(
				await h.useCases.reorderContainer.execute({ containerId: x, direction: 'down' }, admin),
			);

			expect(await sortOrderOf(h, x)).toBe(yOrder);
			expect(await sortOrderOf(h, y)).toBe(xOrder);
			expect(event.data.swapped_with_id).toBe(y);
		});

		it('should skip inactive containers when finding the neighbour', async () => {
			const x = await createContainer(h, 'X');
			const gap = await createContainer(h, 'Gap');
			const y = await createContainer(h, 'Y');
			successValue(await h.useCases.deleteContainer.execute({ containerId: gap }, admin));

			const event = successValue(await h.useCases.reorderContainer.execute({ containerId: y, direction: 'up' }, admin));

			expect(event.data.swapped_with_id).toBe(x);
		});

		it('should fail at the edges', async () => {
			const home = await h.systemContainer('Home');
			const last = await createContainer(h, 'Last');

			const top = failureError(await h.useCases.reorderContainer.execute({ containerId: home.id, direction: 'up' }, admin));
			const bottom = failureError(
				await h.useCases.reorderContainer.execute({ containerId: last, direction: 'down' }, admin),
			);

			expect(top.type).toBe('validation');
			expect(top.code).toBe('NO_ADJACENT_CONTAINER');
			expect(top.message).toBe('Container is already at the top');
			expect(bottom.message).toBe('Container is already at the bottom');
		});
	});

	describe('deleteContainer', () => {
		it('should deactivate an empty container', async () => {
			const id = await createContainer(h, 'Box');

			successValue(await h.useCases.deleteContainer.execute({ containerId: id }, admin));

			expect((await h.containerRepository.findById(id))?.isActive).toBe(false);
			expect((await h.containerRepository.list(false)).map((c) => c.id)).not.toContain(id);
		});

		it('should report an inactive or unknown container as not found', async () => {
			const id = await createContainer(h, 'Box');
			successValue(await h.useCases.deleteContainer.execute({ containerId: id }, admin));

			const again = failureError(await h.useCases.deleteContainer.execute({ containerId: id }, admin));
			const unknown = failureError(await h.useCases.deleteContainer.execute({ containerId: 'ctr_missing' }, admin));

			expect(again.type).toBe('not_found');
			expect(unknown.type).toBe('not_found');
		});

		it('should refuse system containers and containers with dolls', async () => {
			const wishlist = await h.systemContainer('Wishlist');
			const id = await createContainer(h, 'Box');
			successValue(await h.useCases.createDoll.execute({ name: 'Ann', containerId: id }, admin));

			const system = failureError(await h.useCases.deleteContainer.execute({ containerId: wishlist.id }, admin));
			const notEmpty = failureError(await h.useCases.deleteContainer.execute({ containerId: id }, admin));

			expect(system.code).toBe('SYSTEM_CONTAINER_IMMUTABLE');
			expect(notEmpty.code).toBe('CONTAINER_NOT_EMPTY');
		});

		it('should ignore deleted dolls when checking emptiness', async () => {
			const id = await createContainer(h, 'Box');
			const doll = successValue(await h.useCases.createDoll.execute({ name: 'Ann', containerId: id }, admin));
			successValue(await h.useCases.deleteDoll.execute({ dollId: doll.subject }, admin));

			const result = await h.useCases.deleteContainer.execute({ containerId: id }, admin);

			expect(result._tag).toBe('success');
		});
	});
});

describe('reorder atomicity', () => {
	it('should leave both sort orders untouched when the second write fails', async () => {
		let armed = false;
		let writes = 0;
		const flakyHandler: AggregateHandler<Container, MemoryTx> = {
			...memoryContainerHandler,
			async persist(container, tx) {
				if (armed && ++writes === 2) {
					throw new Error('disk full');
				}
				await memoryContainerHandler.persist(container, tx);
			},
		};
		const h = await createHarness({ containerHandler: flakyHandler });
		const x = await createContainer(h, 'X');
		const y = await createContainer(h, 'Y');
		const xOrder = await sortOrderOf(h, x);
		const yOrder = await sortOrderOf(h, y);
		const auditRows = h.store.state.auditLogs.length;
		armed = true;

		const error = failureError(await h.useCases.reorderContainer.execute({ containerId: x, direction: 'down' }, admin));

		expect(error.type).toBe('concurrency');
		expect(error.code).toBe('COMMIT_FAILED');
		expect(await sortOrderOf(h, x)).toBe(xOrder);
		expect(await sortOrderOf(h, y)).toBe(yOrder);
		expect(h.store.state.auditLogs).toHaveLength(auditRows);
	});
});
