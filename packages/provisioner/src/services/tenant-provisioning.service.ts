/**
 * Tenant Provisioning Service
 *
 * Entry point shared by the admin API and the CLI. Validates inbound
 * parameters, drives the SchemaProvisioner and keeps the tenant registry
 * in step with provisioned schemas.
 *
 * @module packages/provisioner/services/tenant-provisioning
 */

import type { Logger } from 'pino';
import { z } from 'zod';

import { MAX_SCHEMA_NAME_LENGTH } from '../schema-name.js';
import {
  describeError,
  ProvisioningError,
  ProvisioningErrorCode,
  type LedgerEntry,
  type MigrationRunResult,
  type RollbackResult,
  type SchemaState,
  type StoredTenantRecord,
  type TenantRecord,
} from '../types.js';
import type { SchemaProvisioner } from './schema-provisioner.js';
import type { TenantRepository } from './tenant-registry.js';

// =============================================================================
// Input Schemas
// =============================================================================

const tenantIdSchema = z
  .string({ required_error: 'tenantId is required' })
  .min(1, 'tenantId is required')
  .max(50, 'tenantId must be at most 50 characters');

const schemaNameSchema = z
  .string()
  .max(MAX_SCHEMA_NAME_LENGTH, `schemaName must be at most ${MAX_SCHEMA_NAME_LENGTH} characters`)
  .regex(/^[a-z_][a-z0-9_]*$/, 'schemaName must match ^[a-z_][a-z0-9_]*$');

export const provisionInputSchema = z.object({
  tenantId: tenantIdSchema,
  tenantName: z
    .string({ required_error: 'tenantName is required' })
    .min(1, 'tenantName is required')
    .max(100, 'tenantName must be at most 100 characters'),
  description: z.string().max(500, 'description must be at most 500 characters').optional(),
});

export const schemaTargetSchema = z.object({
  tenantId: tenantIdSchema,
  /** Defaults to the schema derived from tenantId */
  schemaName: schemaNameSchema.optional(),
});

export type ProvisionInput = z.infer<typeof provisionInputSchema>;
export type SchemaTarget = z.infer<typeof schemaTargetSchema>;

// =============================================================================
// Result Types
// =============================================================================

export interface ProvisionOutcome {
  tenant: TenantRecord;
  run: MigrationRunResult;
}

export interface TenantStatus {
  tenantId: string;
  schemaName: string;
  state: SchemaState;
  steps: LedgerEntry[];
}

/**
 * Provisioner operations the service drives, independent of connection type
 */
export type SchemaOperations = Pick<
  SchemaProvisioner,
  'deriveSchemaName' | 'getState' | 'provision' | 'update' | 'rollbackLast' | 'status' | 'listSchemas'
>;

/**
 * Configuration for TenantProvisioningService
 */
export interface TenantProvisioningServiceConfig {
  provisioner: SchemaOperations;

  /** Optional; without it provisioning skips the registry write */
  registry?: TenantRepository;

  logger: Logger;
}

// =============================================================================
// Service
// =============================================================================

export class TenantProvisioningService {
  private readonly provisioner: SchemaOperations;
  private readonly registry: TenantRepository | undefined;
  private readonly logger: Logger;

  constructor(config: TenantProvisioningServiceConfig) {
    this.provisioner = config.provisioner;
    this.registry = config.registry;
    this.logger = config.logger.child({ component: 'TenantProvisioningService' });
  }

  /**
   * Provision the tenant's schema and record the tenant
   */
  async provision(input: ProvisionInput): Promise<ProvisionOutcome> {
    const { tenantId, tenantName, description } = parseInput(provisionInputSchema, input, input.tenantId);

    const run = await this.provisioner.provision(tenantId);

    const tenant: TenantRecord = {
      tenantId,
      tenantName,
      schemaName: run.schemaName,
      active: true,
    };
    if (description !== undefined) {
      tenant.description = description;
    }

    if (this.registry) {
      try {
        await this.registry.save(tenant);
      } catch (error) {
        this.logger.error({ tenantId, schemaName: run.schemaName, error }, 'Failed to record tenant');
        throw new ProvisioningError(
          ProvisioningErrorCode.REGISTRY_FAILED,
          tenantId,
          `Schema ${run.schemaName} is provisioned but tenant '${tenantId}' could not be recorded: ${describeError(error)}`,
          { cause: error, schemaName: run.schemaName }
        );
      }
    }

    this.logger.info({ tenantId, schemaName: run.schemaName }, 'Tenant provisioned');
    return { tenant, run };
  }

  /**
   * Apply pending steps to the tenant's schema
   */
  async update(input: SchemaTarget): Promise<MigrationRunResult> {
    const { tenantId, schemaName } = this.resolveTarget(input);
    return this.provisioner.update(tenantId, schemaName);
  }

  /**
   * Revert the most recently applied step in the tenant's schema
   */
  async rollbackLast(input: SchemaTarget): Promise<RollbackResult> {
    const { tenantId, schemaName } = this.resolveTarget(input);
    return this.provisioner.rollbackLast(tenantId, schemaName);
  }

  /**
   * Lifecycle state and per-step ledger of the tenant's schema
   */
  async status(input: SchemaTarget): Promise<TenantStatus> {
    const { tenantId, schemaName } = this.resolveTarget(input);
    const steps = await this.provisioner.status(tenantId, schemaName);
    return {
      tenantId,
      schemaName,
      state: this.provisioner.getState(schemaName),
      steps,
    };
  }

  async listTenants(): Promise<StoredTenantRecord[]> {
    return this.withRegistry('*', (registry) => registry.list());
  }

  async getTenant(tenantId: string): Promise<StoredTenantRecord | null> {
    return this.withRegistry(tenantId, (registry) => registry.findById(tenantId));
  }

  /** Tenant schemas present in the database */
  async listSchemas(): Promise<string[]> {
    return this.provisioner.listSchemas();
  }

  // ===========================================================================
  // Private Helpers
  // ===========================================================================

  private resolveTarget(input: SchemaTarget): { tenantId: string; schemaName: string } {
    const { tenantId, schemaName } = parseInput(schemaTargetSchema, input, input.tenantId);
    return {
      tenantId,
      schemaName: schemaName ?? this.provisioner.deriveSchemaName(tenantId),
    };
  }

  private async withRegistry<T>(
    tenantId: string,
    work: (registry: TenantRepository) => Promise<T>
  ): Promise<T> {
    if (!this.registry) {
      throw new ProvisioningError(
        ProvisioningErrorCode.REGISTRY_FAILED,
        tenantId,
        'Tenant registry is not configured'
      );
    }
    try {
      return await work(this.registry);
    } catch (error) {
      this.logger.error({ tenantId, error }, 'Tenant registry lookup failed');
      throw new ProvisioningError(
        ProvisioningErrorCode.REGISTRY_FAILED,
        tenantId,
        `Tenant registry lookup failed: ${describeError(error)}`,
        { cause: error }
      );
    }
  }
}

/**
 * Parses input, turning zod issues into an INVALID_INPUT ProvisioningError
 */
function parseInput<T>(schema: z.ZodType<T>, input: unknown, tenantId: unknown): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    const details = result.error.issues.map((issue) => issue.message).join('; ');
    throw new ProvisioningError(
      ProvisioningErrorCode.INVALID_INPUT,
      typeof tenantId === 'string' ? tenantId : '',
      `Invalid input: ${details}`
    );
  }
  return result.data;
}
