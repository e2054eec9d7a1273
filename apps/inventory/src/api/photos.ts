/**
 * Photos API
 */

import type { FastifyInstance } from 'fastify';
import {
	Type,
	type Static,
	sendError,
	jsonCreated,
	jsonSuccess,
	notFound,
	requireExecutionContext,
	OpenAPIResponses,
	combineResponses,
} from '@dollhouse/http';
import { Result, createCommand } from '@dollhouse/application';

import type { InventoryUseCases } from '../application/index.js';
import type { DollRepository, PhotoRepository } from '../infrastructure/persistence/index.js';
import { Permissions, requirePermission } from '../authorization/index.js';
import { toPhotoResponse } from './responses.js';
import { IdParams } from './schemas.js';

const AddPhotoBody = Type.Object({
	path: Type.String({ minLength: 1, maxLength: 500 }),
	make_primary: Type.Boolean({ default: false }),
});

export interface PhotosRoutesDeps {
	readonly useCases: InventoryUseCases;
	readonly dollRepository: DollRepository;
	readonly photoRepository: PhotoRepository;
	readonly mediaBasePath: string;
}

export async function registerPhotosRoutes(fastify: FastifyInstance, deps: PhotosRoutesDeps): Promise<void> {
	const { useCases, dollRepository, photoRepository, mediaBasePath } = deps;

	// GET /api/dolls/:id/photos
	fastify.get<{ Params: Static<typeof IdParams> }>(
		'/dolls/:id/photos',
		{
			preHandler: requirePermission(Permissions.DOLL_READ),
			schema: {
				tags: ['photos'],
				params: IdParams,
				response: combineResponses(OpenAPIResponses.notFound('Doll not found')),
			},
		},
		async (request, reply) => {
			const doll = await dollRepository.findById(request.params.id);
			if (!doll || doll.deletedAt) {
				return notFound(reply, 'Doll not found', 'DOLL_NOT_FOUND');
			}

			const photos = await photoRepository.listByDoll(doll.id);
			return jsonSuccess(reply, {
				doll_id: doll.id,
				primary_photo_id: photos.find((photo) => photo.isPrimary)?.id ?? null,
				photos: photos.map((photo) => toPhotoResponse(photo, mediaBasePath)),
			});
		},
	);

	// POST /api/dolls/:id/photos
	fastify.post<{ Params: Static<typeof IdParams>; Body: Static<typeof AddPhotoBody> }>(
		'/dolls/:id/photos',
		{
			preHandler: requirePermission(Permissions.PHOTO_CREATE),
			schema: {
				tags: ['photos'],
				params: IdParams,
				body: AddPhotoBody,
				response: combineResponses(
					OpenAPIResponses.badRequest('Invalid photo path'),
					OpenAPIResponses.notFound('Doll not found'),
				),
			},
		},
		async (request, reply) => {
			const ctx = requireExecutionContext(request);
			const command = createCommand('AddPhoto', {
				dollId: request.params.id,
				path: request.body.path,
				makePrimary: request.body.make_primary,
			});

			const result = await useCases.addPhoto.execute(command, ctx);
			if (Result.isFailure(result)) {
				return sendError(reply, result.error);
			}

			const photo = await photoRepository.findById(result.value.data.photo_id);
			if (!photo) {
				return notFound(reply, 'Photo not found', 'PHOTO_NOT_FOUND');
			}
			return jsonCreated(reply, toPhotoResponse(photo, mediaBasePath));
		},
	);

	// POST /api/photos/:id/set-primary
	fastify.post<{ Params: Static<typeof IdParams> }>(
		'/photos/:id/set-primary',
		{
			preHandler: requirePermission(Permissions.PHOTO_SET_PRIMARY),
			schema: {
				tags: ['photos'],
				params: IdParams,
				response: combineResponses(OpenAPIResponses.notFound('Photo not found')),
			},
		},
		async (request, reply) => {
			const ctx = requireExecutionContext(request);
			const command = createCommand('SetPrimaryPhoto', { photoId: request.params.id });

			const result = await useCases.setPrimaryPhoto.execute(command, ctx);
			if (Result.isFailure(result)) {
				return sendError(reply, result.error);
			}

			const event = result.value;
			return jsonSuccess(reply, {
				doll_id: event.subject,
				primary_photo_id: event.data.photo_id,
				photo_id: event.data.photo_id,
			});
		},
	);
}
