/**
 * Audit Plugin
 *
 * Fastify plugin that establishes who is calling. It asks the configured
 * resolver for the principal and stores the outcome on `request.audit`.
 * Paths listed in `skipPaths` are left unauthenticated.
 */

import type { FastifyPluginAsync, FastifyRequest } from 'fastify';
import fp from 'fastify-plugin';
import type { Principal } from '@dollhouse/domain-core';
import type { AuditPluginOptions, AuditData } from '../types.js';
import { HttpError } from '../error-handler.js';

const ANONYMOUS: AuditData = { principalId: null, principal: null, authError: null };

function pathOf(url: string): string {
	const query = url.indexOf('?');
	return query === -1 ? url : url.slice(0, query);
}

/**
 * @example
 * ```typescript
 * await fastify.register(auditPlugin, {
 *     skipPaths: ['/health', '/docs'],
 *     resolvePrincipal: (request) => resolveFromHeaders(request.headers),
 * });
 *
 * fastify.get('/api/me', (request) => requirePrincipal(request).identity);
 * ```
 */
const auditPluginAsync: FastifyPluginAsync<AuditPluginOptions> = async (fastify, opts) => {
	const { skipPaths = [], resolvePrincipal } = opts;

	fastify.decorateRequest('audit', null);

	fastify.addHook('onRequest', async (request) => {
		const path = pathOf(request.url);
		if (skipPaths.some((skipPath) => path === skipPath || path.startsWith(`${skipPath}/`))) {
			request.audit = ANONYMOUS;
			return;
		}

		const resolution = await resolvePrincipal(request);
		if (!resolution.authenticated) {
			request.audit = { ...ANONYMOUS, authError: resolution.error };
			return;
		}

		request.audit = {
			principalId: resolution.principal.identity.id,
			principal: resolution.principal,
			authError: null,
		};
	});
};

export const auditPlugin = fp(auditPluginAsync, {
	name: '@dollhouse/audit',
	fastify: '5.x',
});

/**
 * The authenticated principal of a request.
 *
 * @throws HttpError (401) if the request is not authenticated
 */
export function requirePrincipal(request: FastifyRequest): Principal {
	const { principal, authError } = request.audit;
	if (!principal) {
		throw new HttpError(401, authError?.code ?? 'UNAUTHENTICATED', authError?.message ?? 'Authentication required');
	}
	return principal;
}
