/**
 * Execution Context Plugin
 *
 * Creates the ExecutionContext for use case calls by combining the tracing
 * IDs with the resolved principal. Register after the tracing and audit
 * plugins.
 */

import type { FastifyPluginAsync, FastifyRequest } from 'fastify';
import fp from 'fastify-plugin';
import { ExecutionContext } from '@dollhouse/domain-core';
import { HttpError } from '../error-handler.js';

/**
 * @example
 * ```typescript
 * await fastify.register(tracingPlugin);
 * await fastify.register(auditPlugin, { resolvePrincipal });
 * await fastify.register(executionContextPlugin);
 *
 * fastify.post('/api/dolls', async (request, reply) => {
 *     const result = await createDoll.execute(command, requireExecutionContext(request));
 *     return sendResult(reply, result, { successStatus: 201 });
 * });
 * ```
 */
const executionContextPluginAsync: FastifyPluginAsync = async (fastify) => {
	fastify.decorateRequest('executionContext', null);

	fastify.addHook('onRequest', async (request) => {
		const principal = request.audit.principal;
		if (!principal) {
			request.executionContext = null;
			return;
		}

		request.executionContext = ExecutionContext.create(principal, {
			correlationId: request.tracing.correlationId,
			causationId: request.tracing.causationId,
		});
	});
};

export const executionContextPlugin = fp(executionContextPluginAsync, {
	name: '@dollhouse/execution-context',
	fastify: '5.x',
	dependencies: ['@dollhouse/tracing', '@dollhouse/audit'],
});

/**
 * @throws HttpError (401) if no principal was resolved for the request
 */
export function requireExecutionContext(request: FastifyRequest): ExecutionContext {
	const ctx = request.executionContext;
	if (!ctx) {
		const authError = request.audit.authError;
		throw new HttpError(401, authError?.code ?? 'UNAUTHENTICATED', authError?.message ?? 'Authentication required');
	}
	return ctx;
}
