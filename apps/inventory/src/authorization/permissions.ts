/**
 * Permissions
 *
 * Closed set of capability tags. They are not hierarchical: holding
 * `doll:delete` says nothing about `doll:read`.
 */

export const Permissions = {
	DOLL_READ: 'doll:read',
	DOLL_CREATE: 'doll:create',
	DOLL_RENAME: 'doll:rename',
	DOLL_MOVE: 'doll:move',
	DOLL_DELETE: 'doll:delete',
	PHOTO_CREATE: 'photo:create',
	PHOTO_SET_PRIMARY: 'photo:set_primary',
	EVENT_READ: 'event:read',
	CONTAINER_READ: 'container:read',
	CONTAINER_MANAGE: 'container:manage',
} as const;

export type Permission = (typeof Permissions)[keyof typeof Permissions];

export const ALL_PERMISSIONS: readonly Permission[] = Object.values(Permissions);
