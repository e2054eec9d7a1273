/**
 * Tracing Plugin
 *
 * Fastify plugin for request tracing. Extracts correlation and causation IDs
 * from request headers, propagates the correlation ID to response headers and
 * binds it to the request logger.
 */

import type { FastifyPluginAsync } from 'fastify';
import fp from 'fastify-plugin';
import { generateRaw } from '@dollhouse/tsid';
import type { TracingPluginOptions, TracingData } from '../types.js';

const DEFAULT_CORRELATION_ID_HEADER = 'x-correlation-id';
const DEFAULT_REQUEST_ID_HEADER = 'x-request-id';
const DEFAULT_CAUSATION_ID_HEADER = 'x-causation-id';

/**
 * First value of a header, or undefined when absent or blank.
 */
export function headerValue(value: string | string[] | undefined): string | undefined {
	const first = Array.isArray(value) ? value[0] : value;
	const trimmed = first?.trim();
	return trimmed ? trimmed : undefined;
}

/**
 * @example
 * ```typescript
 * await fastify.register(tracingPlugin);
 *
 * fastify.get('/api/dolls', (request) => {
 *     request.log.info({ executionId: request.tracing.executionId }, 'Listing dolls');
 * });
 * ```
 */
const tracingPluginAsync: FastifyPluginAsync<TracingPluginOptions> = async (fastify, opts) => {
	const correlationIdHeader = (opts.correlationIdHeader ?? DEFAULT_CORRELATION_ID_HEADER).toLowerCase();
	const requestIdHeader = (opts.requestIdHeader ?? DEFAULT_REQUEST_ID_HEADER).toLowerCase();
	const causationIdHeader = (opts.causationIdHeader ?? DEFAULT_CAUSATION_ID_HEADER).toLowerCase();
	const propagateToResponse = opts.propagateToResponse ?? true;

	fastify.decorateRequest('tracing', null);

	fastify.addHook('onRequest', async (request, reply) => {
		const correlationId =
			headerValue(request.headers[correlationIdHeader]) ??
			headerValue(request.headers[requestIdHeader]) ??
			`trace-${generateRaw()}`;

		const tracingData: TracingData = {
			correlationId,
			causationId: headerValue(request.headers[causationIdHeader]) ?? null,
			executionId: `exec-${generateRaw()}`,
			startTime: Date.now(),
		};
		request.tracing = tracingData;
		request.log = request.log.child({ correlationId });

		if (propagateToResponse) {
			reply.header(correlationIdHeader, correlationId);
		}
	});
};

export const tracingPlugin = fp(tracingPluginAsync, {
	name: '@dollhouse/tracing',
	fastify: '5.x',
});
