/**
 * Errors shared by the container use cases.
 */

import { UseCaseError } from '@dollhouse/application';

export function containerNotFound(containerId: string) {
	return UseCaseError.notFound('CONTAINER_NOT_FOUND', 'Container not found', { containerId });
}

export function containerNameTaken(name: string) {
	return UseCaseError.businessRule('CONTAINER_NAME_TAKEN', `A container named "${name}" already exists`, { name });
}

export function systemContainerImmutable(action: string) {
	return UseCaseError.businessRule('SYSTEM_CONTAINER_IMMUTABLE', `System containers cannot be ${action}`);
}

export function containerNotEmpty(dollCount: number) {
	return UseCaseError.businessRule('CONTAINER_NOT_EMPTY', `Container still holds ${dollCount} doll(s)`, {
		doll_count: dollCount,
	});
}
