/**
 * Admin API entry point
 *
 * Environment Variables:
 *   DATABASE_URL - PostgreSQL connection string
 *   PORT - Listen port (default: 8080)
 *   LOG_LEVEL - Log level (default: info)
 *
 * @module packages/admin-api/main
 */

import type { Server } from 'node:http';

import { createProvisioningStack } from '../../provisioner/src/bootstrap.js';
import { getConfig } from '../../provisioner/src/config.js';
import { createLogger } from '../../provisioner/src/logger.js';
import { createAdminApp } from './app.js';

const config = getConfig();
const logger = createLogger({
  name: 'tenant-admin-api',
  level: config.logLevel,
  pretty: config.nodeEnv === 'development',
});

const stack = createProvisioningStack(config, logger);
let server: Server | null = null;

async function start(): Promise<void> {
  await stack.registry.ensureTable();
  logger.info({ registrySchema: config.registrySchema }, 'Tenant registry ready');

  const app = createAdminApp({ service: stack.service, logger });
  server = app.listen(config.port, () => {
    logger.info({ port: config.port }, 'Admin API listening');
  });
}

/**
 * Graceful shutdown
 */
async function shutdown(signal: string): Promise<void> {
  logger.info({ signal }, 'Shutdown signal received, starting graceful shutdown');

  if (server) {
    server.close();
    logger.info('HTTP server closed');
  }

  await stack.close();
  logger.info('Connection pool closed, shutdown complete');
  process.exit(0);
}

// Handle shutdown signals
process.on('SIGTERM', () => void shutdown('SIGTERM'));
process.on('SIGINT', () => void shutdown('SIGINT'));

process.on('unhandledRejection', (reason) => {
  logger.fatal({ reason }, 'Unhandled rejection, shutting down');
  process.exit(1);
});

start().catch((error: unknown) => {
  logger.fatal({ error }, 'Failed to start admin API');
  process.exit(1);
});
