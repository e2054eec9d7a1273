/**
 * Authorization
 *
 * Identity resolution, the group → permission tier table and route guards.
 */

export { Permissions, ALL_PERMISSIONS, type Permission } from './permissions.js';
export {
	PERMISSION_TIERS,
	DEFAULT_GROUP_NAMES,
	resolveTier,
	calculatePermissions,
	type GroupNames,
	type PermissionTier,
	type TierName,
} from './permission-tiers.js';
export {
	LOCAL_IDENTITY_ID,
	localIdentity,
	parseGroups,
	resolveIdentity,
	toPrincipal,
	createPrincipalResolver,
	type AuthMode,
	type AuthConfig,
	type IdentityResolution,
	type RequestHeaders,
} from './identity-resolver.js';
export {
	requirePermission,
	requireAuthentication,
	hasPermission,
	requestHasPermission,
} from './require-permission.js';
