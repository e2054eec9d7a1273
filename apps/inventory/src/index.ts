/**
 * Inventory Service
 *
 * Wires the Drizzle repositories, the unit of work and the use cases into
 * the Fastify app, seeds the system containers and starts listening.
 */

import type { FastifyInstance } from 'fastify';
import { createFastifyLoggerOptions } from '@dollhouse/http';
import { createLogger, setDefaultLogger, type Logger } from '@dollhouse/logging';
import {
	createDatabase,
	createTransactionManager,
	createAggregateRegistry,
	createTransactionalUnitOfWork,
	createDrizzleAuditLogWriter,
	type Database,
} from '@dollhouse/persistence';

import { getEnv, authConfigFromEnv } from './env.js';
import { buildApp } from './app.js';
import { createInventoryUseCases } from './application/index.js';
import { ensureSystemContainers } from './bootstrap/system-containers.js';
import {
	createContainerRepository,
	createDollRepository,
	createPhotoRepository,
	createDollEventRepository,
	createDollEventWriter,
	containerHandler,
	dollHandler,
	photoHandler,
} from './infrastructure/persistence/index.js';

export interface InventoryService {
	readonly fastify: FastifyInstance;
	readonly database: Database;
	readonly logger: Logger;
}

export async function startInventory(): Promise<InventoryService> {
	const env = getEnv();
	const logger = createLogger({ level: env.LOG_LEVEL, serviceName: 'inventory', pretty: env.LOG_PRETTY });
	setDefaultLogger(logger);

	const database = createDatabase({
		url: env.DATABASE_URL,
		maxConnections: env.DATABASE_MAX_CONNECTIONS,
		onQuery: env.LOG_LEVEL === 'trace' ? (query, params) => logger.trace({ query, params }, 'SQL') : undefined,
	});

	const containerRepository = createContainerRepository(database.db);
	const dollRepository = createDollRepository(database.db);
	const photoRepository = createPhotoRepository(database.db);
	const dollEventRepository = createDollEventRepository(database.db);

	const aggregateRegistry = createAggregateRegistry();
	aggregateRegistry.register(containerHandler);
	aggregateRegistry.register(dollHandler);
	aggregateRegistry.register(photoHandler);

	const unitOfWork = createTransactionalUnitOfWork({
		transactionManager: createTransactionManager(database.db),
		aggregateRegistry,
		eventWriter: createDollEventWriter(),
		auditLogWriter: createDrizzleAuditLogWriter(),
	});

	const useCases = createInventoryUseCases({ containerRepository, dollRepository, photoRepository, unitOfWork });

	await ensureSystemContainers({ containerRepository, unitOfWork, logger });

	const auth = authConfigFromEnv(env);
	if (auth.mode === 'none') {
		logger.warn('AUTH_MODE=none: every request runs as the local admin identity');
	} else {
		logger.info({ headerUser: auth.headerUser, headerEmail: auth.headerEmail }, 'Forwarded-header authentication');
	}

	const fastify = await buildApp(
		{
			auth,
			mediaBasePath: env.MEDIA_BASE_PATH,
			logger: createFastifyLoggerOptions({
				level: env.LOG_LEVEL,
				serviceName: 'inventory',
				pretty: env.LOG_PRETTY,
			}),
		},
		{ useCases, containerRepository, dollRepository, photoRepository, dollEventRepository },
	);

	await fastify.listen({ port: env.PORT, host: env.HOST });
	logger.info({ port: env.PORT, host: env.HOST }, 'Inventory service listening');

	return { fastify, database, logger };
}

export { buildApp, type AppConfig, type AppDeps } from './app.js';
