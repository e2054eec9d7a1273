/**
 * Containers API
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
import type { ContainerRepository } from '../infrastructure/persistence/index.js';
import { Permissions, requirePermission, requestHasPermission } from '../authorization/index.js';
import { toContainerResponse } from './responses.js';
import { IdParams } from './schemas.js';

const ListContainersQuery = Type.Object({
	include_inactive: Type.Boolean({ default: false }),
});

const CreateContainerBody = Type.Object({
	name: Type.String({ maxLength: 255 }),
});

const UpdateContainerBody = Type.Object({
	name: Type.Optional(Type.String({ maxLength: 255 })),
	is_active: Type.Optional(Type.Boolean()),
});

const ReorderContainerBody = Type.Object({
	direction: Type.Union([Type.Literal('up'), Type.Literal('down')]),
});

export interface ContainersRoutesDeps {
	readonly useCases: InventoryUseCases;
	readonly containerRepository: ContainerRepository;
}

export async function registerContainersRoutes(fastify: FastifyInstance, deps: ContainersRoutesDeps): Promise<void> {
	const { useCases, containerRepository } = deps;

	async function listResponse(includeInactive: boolean) {
		const containers = await containerRepository.list(includeInactive);
		return { items: containers.map(toContainerResponse), total: containers.length };
	}

	// GET /api/containers
	fastify.get<{ Querystring: Static<typeof ListContainersQuery> }>(
		'/containers',
		{
			preHandler: requirePermission(Permissions.CONTAINER_READ),
			schema: {
				tags: ['containers'],
				querystring: ListContainersQuery,
				response: combineResponses(OpenAPIResponses.unauthorized(), OpenAPIResponses.forbidden()),
			},
		},
		async (request, reply) => {
			const includeInactive = request.query.include_inactive;
			if (includeInactive && !requestHasPermission(request, Permissions.CONTAINER_MANAGE)) {
				return forbidden(reply, `Permission required: ${Permissions.CONTAINER_MANAGE}`, {
					required: Permissions.CONTAINER_MANAGE,
				});
			}
			return jsonSuccess(reply, await listResponse(includeInactive));
		},
	);

	// POST /api/containers
	fastify.post<{ Body: Static<typeof CreateContainerBody> }>(
		'/containers',
		{
			preHandler: requirePermission(Permissions.CONTAINER_MANAGE),
			schema: {
				tags: ['containers'],
				body: CreateContainerBody,
				response: combineResponses(OpenAPIResponses.badRequest(), OpenAPIResponses.conflict()),
			},
		},
		async (request, reply) => {
			const ctx = requireExecutionContext(request);
			const command = createCommand('CreateContainer', { name: request.body.name });

			const result = await useCases.createContainer.execute(command, ctx);
			if (Result.isFailure(result)) {
				return sendError(reply, result.error);
			}

			const container = await containerRepository.findById(result.value.subject);
			if (!container) {
				return notFound(reply, 'Container not found', 'CONTAINER_NOT_FOUND');
			}
			return jsonCreated(reply, toContainerResponse(container));
		},
	);

	// PATCH /api/containers/:id
	fastify.patch<{ Params: Static<typeof IdParams>; Body: Static<typeof UpdateContainerBody> }>(
		'/containers/:id',
		{
			preHandler: requirePermission(Permissions.CONTAINER_MANAGE),
			schema: {
				tags: ['containers'],
				params: IdParams,
				body: UpdateContainerBody,
				response: combineResponses(
					OpenAPIResponses.badRequest(),
					OpenAPIResponses.notFound('Container not found'),
					OpenAPIResponses.conflict(),
				),
			},
		},
		async (request, reply) => {
			const ctx = requireExecutionContext(request);
			const { id } = request.params;
			const command = createCommand('UpdateContainer', {
				containerId: id,
				name: request.body.name,
				isActive: request.body.is_active,
			});

			const result = await useCases.updateContainer.execute(command, ctx);
			if (Result.isFailure(result)) {
				return sendError(reply, result.error);
			}

			const container = await containerRepository.findById(id);
			if (!container) {
				return notFound(reply, 'Container not found', 'CONTAINER_NOT_FOUND');
			}
			return jsonSuccess(reply, toContainerResponse(container));
		},
	);

	// POST /api/containers/:id/reorder
	fastify.post<{ Params: Static<typeof IdParams>; Body: Static<typeof ReorderContainerBody> }>(
		'/containers/:id/reorder',
		{
			preHandler: requirePermission(Permissions.CONTAINER_MANAGE),
			schema: {
				tags: ['containers'],
				params: IdParams,
				body: ReorderContainerBody,
				response: combineResponses(
					OpenAPIResponses.badRequest('Nothing to swap with'),
					OpenAPIResponses.notFound('Container not found'),
				),
			},
		},
		async (request, reply) => {
			const ctx = requireExecutionContext(request);
			const command = createCommand('ReorderContainer', {
				containerId: request.params.id,
				direction: request.body.direction,
			});

			const result = await useCases.reorderContainer.execute(command, ctx);
			if (Result.isFailure(result)) {
				return sendError(reply, result.error);
			}
			return jsonSuccess(reply, await listResponse(false));
		},
	);

	// DELETE /api/containers/:id
	fastify.delete<{ Params: Static<typeof IdParams> }>(
		'/containers/:id',
		{
			preHandler: requirePermission(Permissions.CONTAINER_MANAGE),
			schema: {
				tags: ['containers'],
				params: IdParams,
				response: combineResponses(
					OpenAPIResponses.notFound('Container not found'),
					OpenAPIResponses.conflict('System or non-empty container'),
				),
			},
		},
		async (request, reply) => {
			const ctx = requireExecutionContext(request);
			const command = createCommand('DeleteContainer', { containerId: request.params.id });

			const result = await useCases.deleteContainer.execute(command, ctx);
			return sendResult(reply, result, { successStatus: 204 });
		},
	);
}
