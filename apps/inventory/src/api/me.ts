/**
 * Me API
 *
 * The calling identity and what it may do.
 */

import type { FastifyInstance } from 'fastify';
import { jsonSuccess, requirePrincipal, OpenAPIResponses } from '@dollhouse/http';

import { requireAuthentication } from '../authorization/index.js';

export interface MeResponse {
	id: string;
	email: string;
	display_name: string;
	groups: string[];
	permissions: string[];
}

export async function registerMeRoutes(fastify: FastifyInstance): Promise<void> {
	// GET /api/me
	fastify.get(
		'/me',
		{
			preHandler: requireAuthentication(),
			schema: { tags: ['me'], response: OpenAPIResponses.unauthorized() },
		},
		async (request, reply) => {
			const { identity, permissions } = requirePrincipal(request);

			const response: MeResponse = {
				id: identity.id,
				email: identity.email,
				display_name: identity.displayName,
				groups: [...identity.groups].sort(),
				permissions: [...permissions].sort(),
			};
			return jsonSuccess(reply, response);
		},
	);
}
