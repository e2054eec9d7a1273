/**
 * Dolls API
 *
 * Listing, search suggestions, detail and the doll mutations. Photo and
 * event sub-resources live in their own modules.
 */

import type { FastifyInstance } from 'fastify';
import {
	Type,
	type Static,
	sendError,
	sendResult,
	jsonCreated,
	jsonSuccess,
	notFound,
	forbidden,
	requireExecutionContext,
	OpenAPIResponses,
	combineResponses,
} from '@dollhouse/http';
import { Result, createCommand } from '@dollhouse/application';

import type { InventoryUseCases } from '../application/index.js';
import type { DollRepository, PhotoRepository } from '../infrastructure/persistence/index.js';
import { rankSuggestions, SUGGESTION_CANDIDATES } from '../domain/index.js';
import {
	Permissions,
	requireAuthentication,
	requirePermission,
	requestHasPermission,
} from '../authorization/index.js';
import { toDollDetailResponse, toDollResponse, toSuggestionResponse } from './responses.js';
import { IdParams, pageQuery } from './schemas.js';

const ListDollsQuery = Type.Object({
	q: Type.Optional(Type.String()),
	container_id: Type.Optional(Type.String()),
	include_deleted: Type.Boolean({ default: false }),
	...pageQuery(50, 200),
});

const SuggestionsQuery = Type.Object({
	q: Type.String({ minLength: 1 }),
	container_id: Type.Optional(Type.String()),
	limit: Type.Integer({ minimum: 1, maximum: 20, default: 10 }),
});

const CreateDollBody = Type.Object({
	name: Type.String({ maxLength: 255 }),
	container_id: Type.Optional(Type.String()),
	purchase_url: Type.Optional(Type.String()),
});

const UpdateDollBody = Type.Object({
	name: Type.Optional(Type.String({ maxLength: 255 })),
	container_id: Type.Optional(Type.String({ minLength: 1 })),
});

export interface DollsRoutesDeps {
	readonly useCases: InventoryUseCases;
	readonly dollRepository: DollRepository;
	readonly photoRepository: PhotoRepository;
	readonly mediaBasePath: string;
}

export async function registerDollsRoutes(fastify: FastifyInstance, deps: DollsRoutesDeps): Promise<void> {
	const { useCases, dollRepository, photoRepository, mediaBasePath } = deps;

	// GET /api/dolls
	fastify.get<{ Querystring: Static<typeof ListDollsQuery> }>(
		'/dolls',
		{
			preHandler: requirePermission(Permissions.DOLL_READ),
			schema: {
				tags: ['dolls'],
				querystring: ListDollsQuery,
				response: combineResponses(OpenAPIResponses.badRequest(), OpenAPIResponses.forbidden()),
			},
		},
		async (request, reply) => {
			const { q, container_id, include_deleted, limit, offset } = request.query;
			if (include_deleted && !requestHasPermission(request, Permissions.DOLL_DELETE)) {
				return forbidden(reply, `Permission required: ${Permissions.DOLL_DELETE}`, {
					required: Permissions.DOLL_DELETE,
				});
			}

			const page = await dollRepository.search(
				{ q: q?.trim() || undefined, containerId: container_id || undefined, includeDeleted: include_deleted },
				{ limit, offset },
			);

			return jsonSuccess(reply, {
				items: page.items.map((view) => toDollResponse(view, mediaBasePath)),
				total: page.total,
				limit: page.limit,
				offset: page.offset,
			});
		},
	);

	// GET /api/dolls/suggestions
	fastify.get<{ Querystring: Static<typeof SuggestionsQuery> }>(
		'/dolls/suggestions',
		{
			preHandler: requirePermission(Permissions.DOLL_READ),
			schema: {
				tags: ['dolls'],
				querystring: SuggestionsQuery,
				response: combineResponses(OpenAPIResponses.badRequest(), OpenAPIResponses.forbidden()),
			},
		},
		async (request, reply) => {
			const { q, container_id, limit } = request.query;
			const candidates = await dollRepository.findNameMatches({
				q,
				containerId: container_id || undefined,
				limit: SUGGESTION_CANDIDATES,
			});

			return jsonSuccess(reply, {
				q,
				suggestions: rankSuggestions(
					candidates.map((view) => ({ name: view.doll.name, view })),
					q,
					limit,
				).map(({ view }) => toSuggestionResponse(view, mediaBasePath)),
			});
		},
	);

	// POST /api/dolls
	fastify.post<{ Body: Static<typeof CreateDollBody> }>(
		'/dolls',
		{
			preHandler: requirePermission(Permissions.DOLL_CREATE),
			schema: {
				tags: ['dolls'],
				body: CreateDollBody,
				response: combineResponses(
					OpenAPIResponses.badRequest(),
					OpenAPIResponses.notFound('Container not found'),
				),
			},
		},
		async (request, reply) => {
			const ctx = requireExecutionContext(request);
			const { name, container_id, purchase_url } = request.body;
			const command = createCommand('CreateDoll', {
				name,
				containerId: container_id || undefined,
				purchaseUrl: purchase_url,
			});

			const result = await useCases.createDoll.execute(command, ctx);
			if (Result.isFailure(result)) {
				return sendError(reply, result.error);
			}

			const view = await dollRepository.findView(result.value.subject);
			if (!view) {
				return notFound(reply, 'Doll not found', 'DOLL_NOT_FOUND');
			}
			return jsonCreated(reply, toDollResponse(view, mediaBasePath));
		},
	);

	// GET /api/dolls/:id
	fastify.get<{ Params: Static<typeof IdParams> }>(
		'/dolls/:id',
		{
			preHandler: requirePermission(Permissions.DOLL_READ),
			schema: {
				tags: ['dolls'],
				params: IdParams,
				response: combineResponses(OpenAPIResponses.notFound('Doll not found')),
			},
		},
		async (request, reply) => {
			const view = await dollRepository.findView(request.params.id);
			if (!view || view.doll.deletedAt) {
				return notFound(reply, 'Doll not found', 'DOLL_NOT_FOUND');
			}

			const photosCount = await photoRepository.countByDoll(view.doll.id);
			return jsonSuccess(reply, toDollDetailResponse(view, photosCount, mediaBasePath));
		},
	);

	// PATCH /api/dolls/:id - permissions are checked per field by the use case
	fastify.patch<{ Params: Static<typeof IdParams>; Body: Static<typeof UpdateDollBody> }>(
		'/dolls/:id',
		{
			preHandler: requireAuthentication(),
			schema: {
				tags: ['dolls'],
				params: IdParams,
				body: UpdateDollBody,
				response: combineResponses(
					OpenAPIResponses.badRequest(),
					OpenAPIResponses.forbidden(),
					OpenAPIResponses.notFound('Doll or container not found'),
				),
			},
		},
		async (request, reply) => {
			const ctx = requireExecutionContext(request);
			const { id } = request.params;
			const command = createCommand('UpdateDoll', {
				dollId: id,
				name: request.body.name,
				containerId: request.body.container_id,
			});

			const result = await useCases.updateDoll.execute(command, ctx);
			if (Result.isFailure(result)) {
				return sendError(reply, result.error);
			}

			const view = await dollRepository.findView(id);
			if (!view) {
				return notFound(reply, 'Doll not found', 'DOLL_NOT_FOUND');
			}
			return jsonSuccess(reply, toDollResponse(view, mediaBasePath));
		},
	);

	// DELETE /api/dolls/:id
	fastify.delete<{ Params: Static<typeof IdParams> }>(
		'/dolls/:id',
		{
			preHandler: requirePermission(Permissions.DOLL_DELETE),
			schema: {
				tags: ['dolls'],
				params: IdParams,
				response: combineResponses(
					OpenAPIResponses.notFound('Doll not found'),
					OpenAPIResponses.gone('Doll already deleted'),
				),
			},
		},
		async (request, reply) => {
			const ctx = requireExecutionContext(request);
			const command = createCommand('DeleteDoll', { dollId: request.params.id });

			const result = await useCases.deleteDoll.execute(command, ctx);
			return sendResult(reply, result, { successStatus: 204 });
		},
	);
}
