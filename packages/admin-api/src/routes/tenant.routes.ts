/**
 * Tenant Admin Routes
 *
 * Routes (mounted under /api/tenants):
 *   POST /provision           Create and migrate a tenant schema
 *   POST /update              Apply pending steps to a tenant schema
 *   POST /rollback            Revert the last applied step
 *   GET  /                    List registered tenants
 *   GET  /:tenantId/status    Schema state and per-step ledger
 *   GET  /health              Liveness text
 *
 * Mutating routes take their parameters from the query string or a JSON
 * body and answer with plain text.
 *
 * @module packages/admin-api/routes/tenant
 */

import { Router } from 'express';
import type { Request, Response } from 'express';
import type { Logger } from 'pino';

import {
  provisionInputSchema,
  schemaTargetSchema,
  type TenantProvisioningService,
} from '../../../provisioner/src/services/tenant-provisioning.service.js';
import {
  describeError,
  ProvisioningError,
  ProvisioningErrorCode,
} from '../../../provisioner/src/types.js';

// --------------------------------------------------------------------------
// Types
// --------------------------------------------------------------------------

export type TenantOperations = Pick<
  TenantProvisioningService,
  'provision' | 'update' | 'rollbackLast' | 'status' | 'listTenants'
>;

/** Dependencies for tenant admin routes */
export interface TenantRoutesDeps {
  service: TenantOperations;
  logger: Logger;
}

export const HEALTH_MESSAGE = 'Tenant provisioning service is running';

// --------------------------------------------------------------------------
// Helpers
// --------------------------------------------------------------------------

/** Query string parameters overlaid with the JSON body, when there is one */
function requestParams(req: Request): Record<string, unknown> {
  const body: unknown = req.body;
  return {
    ...req.query,
    ...(typeof body === 'object' && body !== null && !Array.isArray(body) ? body : {}),
  };
}

function invalidInput(issues: { message: string }[]): string {
  return `Invalid input: ${issues.map((issue) => issue.message).join('; ')}`;
}

/** Text failure response: 400 for provisioning failures, 500 otherwise */
function sendTextFailure(res: Response, prefix: string, err: unknown): void {
  const status = err instanceof ProvisioningError ? 400 : 500;
  res.status(status).type('text/plain').send(`${prefix}: ${describeError(err)}`);
}

const JSON_STATUS: Partial<Record<ProvisioningErrorCode, number>> = {
  [ProvisioningErrorCode.INVALID_INPUT]: 400,
  [ProvisioningErrorCode.SCHEMA_NOT_FOUND]: 404,
  [ProvisioningErrorCode.CONNECTION_FAILED]: 503,
};

function sendJsonFailure(res: Response, err: unknown): void {
  if (err instanceof ProvisioningError) {
    res.status(JSON_STATUS[err.code] ?? 500).json({ error: err.code, message: err.message });
    return;
  }
  res.status(500).json({ error: 'INTERNAL_ERROR' });
}

// --------------------------------------------------------------------------
// Factory
// --------------------------------------------------------------------------

export function createTenantRoutes(deps: TenantRoutesDeps): Router {
  const router = Router();
  const log = deps.logger.child({ component: 'TenantRoutes' });

  // --------------------------------------------------------------------------
  // POST /provision
  // --------------------------------------------------------------------------

  router.post('/provision', async (req: Request, res: Response) => {
    const prefix = 'Failed to provision tenant';
    const parsed = provisionInputSchema.safeParse(requestParams(req));
    if (!parsed.success) {
      res.status(400).type('text/plain').send(`${prefix}: ${invalidInput(parsed.error.issues)}`);
      return;
    }

    try {
      const { tenant } = await deps.service.provision(parsed.data);
      res
        .type('text/plain')
        .send(`Tenant '${tenant.tenantName}' provisioned successfully with schema: ${tenant.schemaName}`);
    } catch (err) {
      log.warn({ tenantId: parsed.data.tenantId, error: err }, 'Provision request failed');
      sendTextFailure(res, prefix, err);
    }
  });

  // --------------------------------------------------------------------------
  // POST /update
  // --------------------------------------------------------------------------

  router.post('/update', async (req: Request, res: Response) => {
    const prefix = 'Failed to update schema';
    const parsed = schemaTargetSchema.safeParse(requestParams(req));
    if (!parsed.success) {
      res.status(400).type('text/plain').send(`${prefix}: ${invalidInput(parsed.error.issues)}`);
      return;
    }

    try {
      await deps.service.update(parsed.data);
      res.type('text/plain').send(`Schema updated successfully for tenant: ${parsed.data.tenantId}`);
    } catch (err) {
      log.warn({ tenantId: parsed.data.tenantId, error: err }, 'Update request failed');
      sendTextFailure(res, prefix, err);
    }
  });

  // --------------------------------------------------------------------------
  // POST /rollback
  // --------------------------------------------------------------------------

  router.post('/rollback', async (req: Request, res: Response) => {
    const prefix = 'Failed to roll back schema';
    const parsed = schemaTargetSchema.safeParse(requestParams(req));
    if (!parsed.success) {
      res.status(400).type('text/plain').send(`${prefix}: ${invalidInput(parsed.error.issues)}`);
      return;
    }

    try {
      const { reverted } = await deps.service.rollbackLast(parsed.data);
      res.type('text/plain').send(`Rolled back ${reverted} for tenant: ${parsed.data.tenantId}`);
    } catch (err) {
      log.warn({ tenantId: parsed.data.tenantId, error: err }, 'Rollback request failed');
      sendTextFailure(res, prefix, err);
    }
  });

  // --------------------------------------------------------------------------
  // GET /health
  // --------------------------------------------------------------------------

  router.get('/health', (_req: Request, res: Response) => {
    res.type('text/plain').send(HEALTH_MESSAGE);
  });

  // --------------------------------------------------------------------------
  // GET /
  // --------------------------------------------------------------------------

  router.get('/', async (_req: Request, res: Response) => {
    try {
      const tenants = await deps.service.listTenants();
      res.json({ tenants });
    } catch (err) {
      log.error({ error: err }, 'Tenant listing failed');
      sendJsonFailure(res, err);
    }
  });

  // --------------------------------------------------------------------------
  // GET /:tenantId/status
  // --------------------------------------------------------------------------

  router.get('/:tenantId/status', async (req: Request, res: Response) => {
    const schemaName = typeof req.query.schemaName === 'string' ? req.query.schemaName : undefined;
    try {
      const status = await deps.service.status({ tenantId: req.params.tenantId, schemaName });
      res.json(status);
    } catch (err) {
      sendJsonFailure(res, err);
    }
  });

  return router;
}
