/**
 * Permission Tiers
 *
 * Ordered rule table mapping identity groups to permissions. Rules are
 * evaluated top-down and the first match wins, so a caller in several groups
 * gets the highest tier only. Permissions are never merged across tiers.
 */

import { ALL_PERMISSIONS, Permissions, type Permission } from './permissions.js';

/**
 * Group names that select a tier, configured per deployment.
 */
export interface GroupNames {
	readonly admin: string;
	readonly editor: string;
	readonly kid: string;
}

export const DEFAULT_GROUP_NAMES: GroupNames = {
	admin: 'dolls_admin',
	editor: 'dolls_editor',
	kid: 'dolls_kid',
};

export type TierName = 'admin' | 'editor' | 'default';

export interface PermissionTier {
	readonly tier: TierName;
	/** Group that selects this tier */
	readonly group: keyof GroupNames;
	/** Whether the tier also applies to callers in none of the configured groups */
	readonly fallback: boolean;
	readonly permissions: ReadonlySet<Permission>;
}

export const PERMISSION_TIERS: readonly PermissionTier[] = [
	{
		tier: 'admin',
		group: 'admin',
		fallback: false,
		permissions: new Set(ALL_PERMISSIONS),
	},
	{
		tier: 'editor',
		group: 'editor',
		fallback: false,
		permissions: new Set(ALL_PERMISSIONS.filter((p) => p !== Permissions.DOLL_DELETE)),
	},
	{
		tier: 'default',
		group: 'kid',
		fallback: true,
		permissions: new Set<Permission>([
			Permissions.DOLL_READ,
			Permissions.CONTAINER_READ,
			Permissions.DOLL_MOVE,
			Permissions.PHOTO_CREATE,
			Permissions.EVENT_READ,
		]),
	},
];

/**
 * The first tier whose group the caller belongs to. The last tier is a
 * fallback, so every caller gets one.
 */
export function resolveTier(
	groups: ReadonlySet<string>,
	groupNames: GroupNames = DEFAULT_GROUP_NAMES,
	tiers: readonly PermissionTier[] = PERMISSION_TIERS,
): PermissionTier {
	const tier = tiers.find((t) => t.fallback || groups.has(groupNames[t.group]));
	if (!tier) {
		throw new Error('Permission tier table has no fallback tier');
	}
	return tier;
}

export function calculatePermissions(
	groups: ReadonlySet<string>,
	groupNames: GroupNames = DEFAULT_GROUP_NAMES,
): ReadonlySet<Permission> {
	return resolveTier(groups, groupNames).permissions;
}
