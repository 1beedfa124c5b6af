/**
 * SchemaProvisioner - Tenant Schema Lifecycle Management
 *
 * Turns a tenant identifier into an isolated, migrated database schema:
 * derives the schema name, creates the schema, points the connection's
 * search path at it and hands the connection to the migration engine.
 * Also re-applies pending steps and reverts the most recently applied one.
 *
 * Every unit of work holds one connection for its whole duration and runs
 * under a lock keyed by schema name (in-process, plus a database advisory
 * lock when enabled). Failures are wrapped in ProvisioningError; nothing is
 * undone automatically, so a schema and any steps already applied stay in
 * place for inspection.
 *
 * @module packages/provisioner/services/schema-provisioner
 */

import type { Logger } from 'pino';

import type { SchemaDialect } from '../dialects/index.js';
import type { ConnectionFactory, MigrationEngine, TenantConnection } from '../engine/types.js';
import { recordOperation, stepsApplied, stepsReverted, type ProvisionerOperation } from '../metrics.js';
import { deriveSchemaName, isSafeSchemaName, TENANT_SCHEMA_PREFIX } from '../schema-name.js';
import {
  ConnectionError,
  describeError,
  errorCodeFor,
  InvalidTransitionError,
  MigrationStepError,
  ProvisioningError,
  ProvisioningErrorCode,
  RollbackError,
  SchemaCreationError,
  SchemaNotFoundError,
  VALID_STATE_TRANSITIONS,
  type LedgerEntry,
  type MigrationRunResult,
  type RollbackResult,
  type SchemaState,
} from '../types.js';
import { SchemaLock } from './schema-lock.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Configuration for SchemaProvisioner
 */
export interface SchemaProvisionerConfig<C extends TenantConnection> {
  /** Source of pinned connections */
  connections: ConnectionFactory<C>;

  /** Migration engine driving the shared step collection */
  engine: MigrationEngine<C>;

  /** Dialect chosen at startup */
  dialect: SchemaDialect;

  /** Logger instance */
  logger: Logger;

  /** Hold a database advisory lock per schema (default: true) */
  advisoryLocks?: boolean;

  /** In-process lock, shared when several provisioners target one database */
  lock?: SchemaLock;
}

type Operation = ProvisionerOperation | 'status' | 'list';

const OPERATION_LABELS: Record<Operation, string> = {
  provision: 'Provisioning',
  update: 'Schema update',
  rollback: 'Rollback',
  status: 'Status lookup',
  list: 'Schema listing',
};

// =============================================================================
// SchemaProvisioner
// =============================================================================

/**
 * Schema lifecycle driver
 *
 * Lifecycle states live in memory and are kept for every schema this
 * process has touched; entries are never evicted. That is sized for an
 * admin surface provisioning tenants one at a time, not for bulk traffic.
 */
export class SchemaProvisioner<C extends TenantConnection = TenantConnection> {
  private readonly connections: ConnectionFactory<C>;
  private readonly engine: MigrationEngine<C>;
  private readonly dialect: SchemaDialect;
  private readonly logger: Logger;
  private readonly advisoryLocks: boolean;
  private readonly lock: SchemaLock;
  private readonly states = new Map<string, SchemaState>();

  constructor(config: SchemaProvisionerConfig<C>) {
    this.connections = config.connections;
    this.engine = config.engine;
    this.dialect = config.dialect;
    this.logger = config.logger.child({ component: 'SchemaProvisioner' });
    this.advisoryLocks = config.advisoryLocks ?? true;
    this.lock = config.lock ?? new SchemaLock();
  }

  /**
   * Derive the schema name for a tenant (tenant_{sanitised id})
   */
  deriveSchemaName(tenantId: string): string {
    return deriveSchemaName(tenantId);
  }

  /**
   * Last known lifecycle state of a schema in this process
   *
   * Schemas this process has not touched report 'unprovisioned'.
   */
  getState(schemaName: string): SchemaState {
    return this.states.get(schemaName) ?? 'unprovisioned';
  }

  /**
   * Create the tenant schema if needed and apply every pending step
   *
   * Safe to repeat: a second call against a ready schema applies nothing.
   *
   * @throws ProvisioningError wrapping the failing stage
   */
  async provision(tenantId: string): Promise<MigrationRunResult> {
    const schemaName = this.schemaNameFor(tenantId);
    const startTime = Date.now();

    this.logger.info({ tenantId, schemaName }, 'Provisioning tenant schema');

    return this.run('provision', tenantId, schemaName, async (connection) => {
      const existed = await this.schemaExists(connection, schemaName);
      const from = this.states.get(schemaName) ?? (existed ? 'ready' : 'unprovisioned');
      const target: SchemaState = from === 'unprovisioned' ? 'provisioning' : 'migrating';

      return this.inState(schemaName, from, target, async () => {
        await this.createSchema(connection, schemaName);
        await this.setSearchPath(connection, schemaName);
        const applied = await this.applyPending(connection, schemaName);

        const result: MigrationRunResult = {
          schemaName,
          applied,
          schemaCreated: !existed,
          durationMs: Date.now() - startTime,
        };

        this.logger.info(
          { tenantId, schemaName, applied, schemaCreated: result.schemaCreated, durationMs: result.durationMs },
          'Tenant schema provisioned'
        );

        return result;
      });
    });
  }

  /**
   * Apply any pending steps to an existing schema
   *
   * A no-op when nothing is pending. Also the recovery path for a schema
   * left in the failed state.
   *
   * @throws ProvisioningError wrapping the failing stage
   */
  async update(tenantId: string, schemaName: string): Promise<MigrationRunResult> {
    const startTime = Date.now();

    this.logger.info({ tenantId, schemaName }, 'Updating tenant schema');

    return this.run('update', tenantId, schemaName, async (connection) => {
      await this.requireSchema(connection, schemaName);
      const from = this.states.get(schemaName) ?? 'ready';

      return this.inState(schemaName, from, 'migrating', async () => {
        await this.setSearchPath(connection, schemaName);
        const applied = await this.applyPending(connection, schemaName);
        const durationMs = Date.now() - startTime;

        this.logger.info(
          { tenantId, schemaName, applied, durationMs },
          applied.length > 0 ? 'Tenant schema updated' : 'Tenant schema already up to date'
        );

        return { schemaName, applied, schemaCreated: false, durationMs };
      });
    });
  }

  /**
   * Revert exactly the most recently applied step
   *
   * @throws ProvisioningError when nothing is applied, the step has no
   *   reverse action, or the reverse action fails
   */
  async rollbackLast(tenantId: string, schemaName: string): Promise<RollbackResult> {
    const startTime = Date.now();

    this.logger.info({ tenantId, schemaName }, 'Rolling back last step');

    return this.run('rollback', tenantId, schemaName, async (connection) => {
      await this.requireSchema(connection, schemaName);
      await this.setSearchPath(connection, schemaName);

      // Precondition failures leave the schema ready
      const ledger = await this.engine.getLedger(connection, schemaName);
      const applied = ledger.filter((entry) => entry.appliedAt !== null);
      const last = applied[applied.length - 1];
      if (!last) {
        throw new RollbackError(null, `No applied steps to revert in ${schemaName}`);
      }
      if (!last.reversible) {
        throw new RollbackError(last.name, `Step ${last.name} has no reverse action`);
      }

      const from = this.states.get(schemaName) ?? 'ready';
      return this.inState(schemaName, from, 'reverting', async () => {
        const reverted = await this.engine.migrateDown(connection, schemaName);
        stepsReverted.inc();

        const result: RollbackResult = {
          schemaName,
          reverted: reverted.name,
          durationMs: Date.now() - startTime,
        };

        this.logger.info(
          { tenantId, schemaName, reverted: result.reverted, durationMs: result.durationMs },
          'Rolled back last step'
        );

        return result;
      });
    });
  }

  /**
   * Every step in the collection with its ledger status for the schema
   */
  async status(tenantId: string, schemaName: string): Promise<LedgerEntry[]> {
    return this.run('status', tenantId, schemaName, async (connection) => {
      await this.requireSchema(connection, schemaName);
      await this.setSearchPath(connection, schemaName);
      return this.engine.getLedger(connection, schemaName);
    });
  }

  /**
   * Tenant schemas present in the database
   */
  async listSchemas(): Promise<string[]> {
    try {
      return await this.connect(async (connection) => {
        const statement = this.dialect.listSchemas(TENANT_SCHEMA_PREFIX);
        const rows = await connection.query(statement.text, statement.params);
        return rows.flatMap((row) => (typeof row.schema_name === 'string' ? [row.schema_name] : []));
      });
    } catch (error) {
      this.logger.error({ error }, 'Failed to list tenant schemas');
      throw this.wrap('list', '*', undefined, error);
    }
  }

  // ===========================================================================
  // Private Helpers
  // ===========================================================================

  private schemaNameFor(tenantId: string): string {
    try {
      return deriveSchemaName(tenantId);
    } catch (error) {
      throw new ProvisioningError(ProvisioningErrorCode.INVALID_INPUT, tenantId, describeError(error), {
        cause: error,
      });
    }
  }

  /**
   * Lock, connect, run and wrap one unit of work
   */
  private async run<T>(
    operation: Operation,
    tenantId: string,
    schemaName: string,
    work: (connection: C) => Promise<T>
  ): Promise<T> {
    if (!isSafeSchemaName(schemaName)) {
      throw new ProvisioningError(
        ProvisioningErrorCode.INVALID_INPUT,
        tenantId,
        `Invalid schema name '${schemaName}'`,
        { schemaName }
      );
    }

    const startTime = Date.now();

    return this.lock.withLock(schemaName, async () => {
      try {
        const result = await this.connect((connection) =>
          this.withAdvisoryLock(connection, schemaName, () => work(connection))
        );
        if (operation !== 'status' && operation !== 'list') {
          recordOperation(operation, 'success', Date.now() - startTime);
        }
        return result;
      } catch (error) {
        const durationMs = Date.now() - startTime;
        if (operation !== 'status' && operation !== 'list') {
          recordOperation(operation, 'failure', durationMs);
        }
        this.logger.error(
          { tenantId, schemaName, operation, error, durationMs },
          `${OPERATION_LABELS[operation]} failed`
        );
        throw this.wrap(operation, tenantId, schemaName, error);
      }
    });
  }

  /**
   * Runs work on a pinned connection, classifying acquisition failures
   */
  private async connect<T>(work: (connection: C) => Promise<T>): Promise<T> {
    let acquired = false;
    try {
      return await this.connections.withConnection((connection) => {
        acquired = true;
        return work(connection);
      });
    } catch (error) {
      if (!acquired) {
        throw new ConnectionError(`Cannot acquire a database connection: ${describeError(error)}`, {
          cause: error,
        });
      }
      throw error;
    }
  }

  private async withAdvisoryLock<T>(
    connection: C,
    schemaName: string,
    work: () => Promise<T>
  ): Promise<T> {
    if (!this.advisoryLocks) {
      return work();
    }

    const key = `tenant_schema:${schemaName}`;
    const acquire = this.dialect.acquireLock(key);
    try {
      await connection.query(acquire.text, acquire.params);
    } catch (error) {
      throw new ConnectionError(`Cannot acquire advisory lock for ${schemaName}: ${describeError(error)}`, {
        cause: error,
      });
    }

    try {
      return await work();
    } finally {
      const release = this.dialect.releaseLock(key);
      try {
        await connection.query(release.text, release.params);
      } catch (error) {
        // Session locks also end when the connection does
        this.logger.warn({ schemaName, error }, 'Failed to release advisory lock');
      }
    }
  }

  /**
   * Moves through `to` for the duration of work, ending in ready or failed
   */
  private async inState<T>(
    schemaName: string,
    from: SchemaState,
    to: SchemaState,
    work: () => Promise<T>
  ): Promise<T> {
    this.transition(schemaName, from, to);
    try {
      const result = await work();
      this.transition(schemaName, to, 'ready');
      return result;
    } catch (error) {
      this.transition(schemaName, to, 'failed');
      throw error;
    }
  }

  private transition(schemaName: string, from: SchemaState, to: SchemaState): void {
    if (!VALID_STATE_TRANSITIONS[from].includes(to)) {
      throw new InvalidTransitionError(schemaName, from, to);
    }
    this.logger.debug({ schemaName, from, to }, 'Schema state transition');
    this.states.set(schemaName, to);
  }

  private async schemaExists(connection: C, schemaName: string): Promise<boolean> {
    const statement = this.dialect.schemaExists(schemaName);
    try {
      const rows = await connection.query(statement.text, statement.params);
      return rows.length > 0;
    } catch (error) {
      throw new SchemaCreationError(
        schemaName,
        `Cannot check whether ${schemaName} exists: ${describeError(error)}`,
        { cause: error }
      );
    }
  }

  private async requireSchema(connection: C, schemaName: string): Promise<void> {
    if (!(await this.schemaExists(connection, schemaName))) {
      throw new SchemaNotFoundError(schemaName);
    }
  }

  private async createSchema(connection: C, schemaName: string): Promise<void> {
    try {
      await connection.execute(this.dialect.createSchema(schemaName));
    } catch (error) {
      throw new SchemaCreationError(
        schemaName,
        `Cannot create schema ${schemaName}: ${describeError(error)}`,
        { cause: error }
      );
    }
    this.logger.info({ schemaName }, 'Schema created or already exists');
  }

  private async setSearchPath(connection: C, schemaName: string): Promise<void> {
    try {
      await connection.execute(this.dialect.setSearchPath(schemaName));
    } catch (error) {
      throw new MigrationStepError(
        null,
        [],
        `Cannot set search path to ${schemaName}: ${describeError(error)}`,
        { cause: error }
      );
    }
  }

  private async applyPending(connection: C, schemaName: string): Promise<string[]> {
    let results;
    try {
      results = await this.engine.migrateToLatest(connection, schemaName);
    } catch (error) {
      if (error instanceof MigrationStepError) {
        stepsApplied.inc(error.applied.length);
        throw error;
      }
      throw new MigrationStepError(null, [], `Migration of ${schemaName} failed: ${describeError(error)}`, {
        cause: error,
      });
    }

    const applied = results.filter((result) => result.status === 'applied').map((result) => result.name);
    stepsApplied.inc(applied.length);
    return applied;
  }

  private wrap(
    operation: Operation,
    tenantId: string,
    schemaName: string | undefined,
    error: unknown
  ): ProvisioningError {
    if (error instanceof ProvisioningError) {
      return error;
    }
    return new ProvisioningError(
      errorCodeFor(error),
      tenantId,
      `${OPERATION_LABELS[operation]} failed for tenant '${tenantId}': ${describeError(error)}`,
      { cause: error, schemaName }
    );
  }
}
