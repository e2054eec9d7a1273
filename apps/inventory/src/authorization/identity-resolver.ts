/**
 * Identity Resolver
 *
 * Establishes who is calling. In `none` mode every request is the fixed
 * local admin identity; in `forwardauth` mode the identity comes from
 * headers set by an authenticating reverse proxy.
 */

import type { FastifyRequest } from 'fastify';
import { UseCaseError, type Identity, type Principal } from '@dollhouse/domain-core';
import { headerValue, type PrincipalResolution } from '@dollhouse/http';
import { calculatePermissions, type GroupNames } from './permission-tiers.js';

export type AuthMode = 'none' | 'forwardauth';

export interface AuthConfig {
	readonly mode: AuthMode;
	readonly headerUser: string;
	readonly headerEmail: string;
	readonly headerGroups: string;
	readonly groups: GroupNames;
}

export type IdentityResolution =
	| { readonly authenticated: true; readonly identity: Identity }
	| { readonly authenticated: false; readonly error: UseCaseError };

export type RequestHeaders = Record<string, string | string[] | undefined>;

export const LOCAL_IDENTITY_ID = 'local';

export function localIdentity(groups: GroupNames): Identity {
	return {
		id: LOCAL_IDENTITY_ID,
		email: 'local@localhost',
		displayName: 'Local Admin',
		groups: new Set([groups.admin]),
	};
}

/**
 * Split a groups header on runs of commas, semicolons or whitespace.
 */
export function parseGroups(value: string | undefined): ReadonlySet<string> {
	if (!value) {
		return new Set();
	}
	return new Set(
		value
			.split(/[,;\s]+/)
			.map((group) => group.trim())
			.filter((group) => group.length > 0),
	);
}

/**
 * Resolve the caller from request headers. Header names are matched
 * case-insensitively (Node lowercases incoming header names).
 */
export function resolveIdentity(headers: RequestHeaders, config: AuthConfig): IdentityResolution {
	if (config.mode === 'none') {
		return { authenticated: true, identity: localIdentity(config.groups) };
	}

	const user = headerValue(headers[config.headerUser.toLowerCase()]);
	const email = headerValue(headers[config.headerEmail.toLowerCase()]);

	if (!user || !email) {
		return {
			authenticated: false,
			error: UseCaseError.unauthenticated(
				'MISSING_IDENTITY_HEADERS',
				`Missing required auth headers: ${config.headerUser}, ${config.headerEmail}`,
			),
		};
	}

	return {
		authenticated: true,
		identity: {
			id: user,
			email,
			displayName: user,
			groups: parseGroups(headerValue(headers[config.headerGroups.toLowerCase()])),
		},
	};
}

export function toPrincipal(identity: Identity, groupNames: GroupNames): Principal {
	return {
		identity,
		permissions: calculatePermissions(identity.groups, groupNames),
	};
}

/**
 * Principal resolver for the audit plugin.
 */
export function createPrincipalResolver(config: AuthConfig): (request: FastifyRequest) => PrincipalResolution {
	return (request) => {
		const resolution = resolveIdentity(request.headers, config);
		if (!resolution.authenticated) {
			return resolution;
		}
		return { authenticated: true, principal: toPrincipal(resolution.identity, config.groups) };
	};
}
