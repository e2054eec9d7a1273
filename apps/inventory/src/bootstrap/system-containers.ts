/**
 * System Containers
 *
 * Seeds the Home and Wishlist containers at startup. Runs on every start and
 * only creates what is missing. Seeding goes through the unit of work, so
 * each created container leaves an audit log row.
 */

import { createCommand, Result, ExecutionContext, type Principal } from '@dollhouse/application';
import type { UnitOfWork } from '@dollhouse/domain-core';

import type { ContainerRepository } from '../infrastructure/persistence/index.js';
import {
	createContainer,
	nextSortOrder,
	ContainerCreated,
	SystemContainers,
	type SystemContainerName,
} from '../domain/index.js';
import { ALL_PERMISSIONS } from '../authorization/index.js';

export const SYSTEM_PRINCIPAL: Principal = {
	identity: {
		id: 'system',
		email: 'system@localhost',
		displayName: 'System',
		groups: new Set(),
	},
	permissions: new Set(ALL_PERMISSIONS),
};

export interface SystemContainerDeps {
	readonly containerRepository: ContainerRepository;
	readonly unitOfWork: UnitOfWork;
	readonly logger: { info: (obj: unknown, msg?: string) => void; debug: (obj: unknown, msg?: string) => void };
}

/**
 * Create missing system containers. Home sorts first; Wishlist goes after
 * everything that exists.
 *
 * @returns names of the containers created
 * @throws Error if a commit fails
 */
export async function ensureSystemContainers(deps: SystemContainerDeps): Promise<SystemContainerName[]> {
	const { containerRepository, unitOfWork, logger } = deps;
	const created: SystemContainerName[] = [];

	for (const name of [SystemContainers.HOME, SystemContainers.WISHLIST]) {
		const existing = await containerRepository.findSystem(name);
		if (existing) {
			logger.debug({ containerId: existing.id, name }, 'System container present');
			continue;
		}

		const sortOrder = name === SystemContainers.HOME ? 0 : nextSortOrder(await containerRepository.maxSortOrder());
		const container = createContainer({ name, sortOrder, isSystem: true });
		const context = ExecutionContext.create(SYSTEM_PRINCIPAL);
		const event = new ContainerCreated(context, container.id, {
			name,
			sort_order: sortOrder,
			is_system: true,
		});

		const result = await unitOfWork.commit(container, event, createCommand('SeedSystemContainer', { name }));
		if (Result.isFailure(result)) {
			throw new Error(`Failed to seed system container ${name}: ${result.error.message}`);
		}

		logger.info({ containerId: container.id, name, sortOrder }, 'Seeded system container');
		created.push(name);
	}

	return created;
}
