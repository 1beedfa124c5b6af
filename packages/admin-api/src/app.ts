/**
 * Admin API application
 *
 * @module packages/admin-api/app
 */

import express, { type Express, type Request, type Response } from 'express';
import type { Logger } from 'pino';
import type { Registry } from 'prom-client';

import { provisionerRegistry } from '../../provisioner/src/metrics.js';
import { createTenantRoutes, type TenantOperations } from './routes/tenant.routes.js';

export interface AdminAppDeps {
  service: TenantOperations;
  logger: Logger;
  /** Defaults to the provisioner registry */
  metricsRegistry?: Registry;
}

export function createAdminApp(deps: AdminAppDeps): Express {
  const app = express();
  const registry = deps.metricsRegistry ?? provisionerRegistry;

  app.use(express.json());
  app.use('/api/tenants', createTenantRoutes({ service: deps.service, logger: deps.logger }));

  app.get('/metrics', async (_req: Request, res: Response) => {
    res.set('Content-Type', registry.contentType);
    res.send(await registry.metrics());
  });

  return app;
}
