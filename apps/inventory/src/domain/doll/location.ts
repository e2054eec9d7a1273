/**
 * Legacy location view.
 *
 * Dolls used to be stored as HOME or BAG plus a bag number. The container is
 * now canonical; the pair is derived from it for older clients.
 */

import { SystemContainers } from '../container/container.js';

export type LegacyLocationKind = 'HOME' | 'BAG';

export interface LegacyLocation {
	readonly location: LegacyLocationKind | null;
	readonly bagNumber: number | null;
}

const BAG_NAME = /^Bag (\d+)$/;

export function deriveLocation(container: { readonly name: string; readonly isSystem: boolean }): LegacyLocation {
	if (container.isSystem && container.name === SystemContainers.HOME) {
		return { location: 'HOME', bagNumber: null };
	}

	const bag = BAG_NAME.exec(container.name);
	if (bag?.[1]) {
		return { location: 'BAG', bagNumber: Number.parseInt(bag[1], 10) };
	}

	return { location: null, bagNumber: null };
}
