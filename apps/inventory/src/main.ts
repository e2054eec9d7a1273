/**
 * Entry point. Stops cleanly on SIGINT and SIGTERM.
 */

import { getLogger } from '@dollhouse/logging';
import { startInventory } from './index.js';

try {
	const { fastify, database, logger } = await startInventory();

	const shutdown = async (signal: string) => {
		logger.info({ signal }, 'Shutting down');
		try {
			await fastify.close();
			await database.close();
			process.exit(0);
		} catch (error) {
			logger.error({ err: error }, 'Shutdown failed');
			process.exit(1);
		}
	};

	process.once('SIGINT', (signal) => void shutdown(signal));
	process.once('SIGTERM', (signal) => void shutdown(signal));
} catch (error) {
	getLogger().fatal({ err: error }, 'Inventory service failed to start');
	process.exit(1);
}
