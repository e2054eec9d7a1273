/**
 * Health API
 */

import type { FastifyInstance } from 'fastify';

export async function registerHealthRoutes(fastify: FastifyInstance): Promise<void> {
	fastify.get('/health', { schema: { tags: ['health'] } }, async () => ({ status: 'ok' }));
}
