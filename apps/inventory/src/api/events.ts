/**
 * Events API
 *
 * The doll event log, newest first. Events of deleted dolls stay readable.
 */

import type { FastifyInstance } from 'fastify';
import { Type, type Static, jsonSuccess, notFound, OpenAPIResponses, combineResponses } from '@dollhouse/http';
import type { PagedResult } from '@dollhouse/persistence';

import type { DollEventEntry, DollEventRepository, DollRepository } from '../infrastructure/persistence/index.js';
import { DOLL_EVENT_TYPES } from '../domain/index.js';
import { Permissions, requirePermission } from '../authorization/index.js';
import { toEventResponse } from './responses.js';
import { IdParams, pageQuery } from './schemas.js';

const DollEventsQuery = Type.Object(pageQuery(20, 100));

const EventsQuery = Type.Object({
	event_type: Type.Optional(Type.Union(DOLL_EVENT_TYPES.map((eventType) => Type.Literal(eventType)))),
	...pageQuery(50, 200),
});

export interface EventsRoutesDeps {
	readonly dollRepository: DollRepository;
	readonly dollEventRepository: DollEventRepository;
}

function toEventListResponse(page: PagedResult<DollEventEntry>) {
	return {
		items: page.items.map(toEventResponse),
		total: page.total,
		limit: page.limit,
		offset: page.offset,
	};
}

export async function registerEventsRoutes(fastify: FastifyInstance, deps: EventsRoutesDeps): Promise<void> {
	const { dollRepository, dollEventRepository } = deps;

	// GET /api/dolls/:id/events
	fastify.get<{ Params: Static<typeof IdParams>; Querystring: Static<typeof DollEventsQuery> }>(
		'/dolls/:id/events',
		{
			preHandler: requirePermission(Permissions.EVENT_READ),
			schema: {
				tags: ['events'],
				params: IdParams,
				querystring: DollEventsQuery,
				response: combineResponses(OpenAPIResponses.badRequest(), OpenAPIResponses.notFound('Doll not found')),
			},
		},
		async (request, reply) => {
			const doll = await dollRepository.findById(request.params.id);
			if (!doll) {
				return notFound(reply, 'Doll not found', 'DOLL_NOT_FOUND');
			}

			const { limit, offset } = request.query;
			const page = await dollEventRepository.listByDoll(doll.id, { limit, offset });
			return jsonSuccess(reply, toEventListResponse(page));
		},
	);

	// GET /api/events
	fastify.get<{ Querystring: Static<typeof EventsQuery> }>(
		'/events',
		{
			preHandler: requirePermission(Permissions.EVENT_READ),
			schema: {
				tags: ['events'],
				querystring: EventsQuery,
				response: combineResponses(OpenAPIResponses.badRequest()),
			},
		},
		async (request, reply) => {
			const { event_type, limit, offset } = request.query;
			const page = await dollEventRepository.list({ eventType: event_type }, { limit, offset });
			return jsonSuccess(reply, toEventListResponse(page));
		},
	);
}
