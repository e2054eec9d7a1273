/**
 * Fastify application
 *
 * Builds the HTTP server without opening a port or a database, so tests can
 * drive it with `inject` over in-memory repositories.
 */

import Fastify, { type FastifyInstance, type FastifyServerOptions } from 'fastify';
import cors from '@fastify/cors';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import {
	tracingPlugin,
	auditPlugin,
	executionContextPlugin,
	errorHandlerPlugin,
	createStandardErrorHandlerOptions,
} from '@dollhouse/http';

import { createPrincipalResolver, type AuthConfig } from './authorization/index.js';
import { registerApiRoutes, type ApiRoutesDeps } from './api/index.js';

export interface AppConfig {
	readonly auth: AuthConfig;
	readonly mediaBasePath: string;
	/** Fastify logger setting; off when omitted */
	readonly logger?: FastifyServerOptions['logger'];
}

export type AppDeps = Omit<ApiRoutesDeps, 'mediaBasePath'>;

export async function buildApp(config: AppConfig, deps: AppDeps): Promise<FastifyInstance> {
	const fastify = Fastify({ logger: config.logger ?? false });

	await fastify.register(cors, { origin: true });

	await fastify.register(swagger, {
		openapi: {
			openapi: '3.1.0',
			info: {
				title: 'Dollhouse Inventory API',
				version: '0.1.0',
				description: 'Dolls, their containers and photos, with an append-only event log.',
			},
			servers: [{ url: '/' }],
		},
	});

	await fastify.register(swaggerUi, {
		routePrefix: '/docs',
		uiConfig: {
			docExpansion: 'list',
			deepLinking: true,
		},
	});

	await fastify.register(errorHandlerPlugin, createStandardErrorHandlerOptions());

	// Correlation and execution IDs
	await fastify.register(tracingPlugin);

	// Caller identity from the local identity or forwarded headers
	await fastify.register(auditPlugin, {
		skipPaths: ['/health', '/docs'],
		resolvePrincipal: createPrincipalResolver(config.auth),
	});

	await fastify.register(executionContextPlugin);

	await registerApiRoutes(fastify, { ...deps, mediaBasePath: config.mediaBasePath });

	return fastify;
}
