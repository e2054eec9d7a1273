/**
 * API Layer
 *
 * REST endpoints of the inventory service, mounted under /api. The health
 * check sits at the root.
 */

import type { FastifyInstance } from 'fastify';

import { registerContainersRoutes, type ContainersRoutesDeps } from './containers.js';
import { registerDollsRoutes, type DollsRoutesDeps } from './dolls.js';
import { registerPhotosRoutes, type PhotosRoutesDeps } from './photos.js';
import { registerEventsRoutes, type EventsRoutesDeps } from './events.js';
import { registerMeRoutes } from './me.js';
import { registerHealthRoutes } from './health.js';

export interface ApiRoutesDeps extends ContainersRoutesDeps, DollsRoutesDeps, PhotosRoutesDeps, EventsRoutesDeps {}

export async function registerApiRoutes(fastify: FastifyInstance, deps: ApiRoutesDeps): Promise<void> {
	await registerHealthRoutes(fastify);

	await fastify.register(
		async (api) => {
			await registerMeRoutes(api);
			await registerContainersRoutes(api, deps);
			await registerDollsRoutes(api, deps);
			await registerPhotosRoutes(api, deps);
			await registerEventsRoutes(api, deps);
		},
		{ prefix: '/api' },
	);
}

export * from './responses.js';
