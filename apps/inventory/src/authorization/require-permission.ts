/**
 * Require Permission Hook
 *
 * Fastify preHandler hooks that enforce permission requirements on routes.
 */

import type { FastifyRequest, preHandlerHookHandler } from 'fastify';
import { checkPermission } from '@dollhouse/application';
import { sendError, unauthorized } from '@dollhouse/http';
import type { Principal } from '@dollhouse/domain-core';
import type { Permission } from './permissions.js';

/**
 * Create a preHandler hook that requires a specific permission.
 *
 * @example
 * fastify.delete('/dolls/:id', {
 *   preHandler: requirePermission(Permissions.DOLL_DELETE),
 * }, handler);
 */
export function requirePermission(permission: Permission): preHandlerHookHandler {
	return async (request, reply) => {
		const principal = request.audit.principal;

		if (!principal) {
			const authError = request.audit.authError;
			return unauthorized(reply, authError?.message, authError?.code);
		}

		const denied = checkPermission(principal, permission);
		if (denied) {
			return sendError(reply, denied);
		}
	};
}

/**
 * Create a preHandler hook that requires authentication but no specific permission.
 */
export function requireAuthentication(): preHandlerHookHandler {
	return async (request, reply) => {
		if (!request.audit.principal) {
			const authError = request.audit.authError;
			return unauthorized(reply, authError?.message, authError?.code);
		}
	};
}

export function hasPermission(principal: Principal, permission: Permission): boolean {
	return principal.permissions.has(permission);
}

/**
 * Whether the caller of a request holds a permission. False when
 * unauthenticated.
 */
export function requestHasPermission(request: FastifyRequest, permission: Permission): boolean {
	const principal = request.audit.principal;
	return principal !== null && hasPermission(principal, permission);
}
