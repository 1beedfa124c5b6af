/**
 * Kysely migration engine adapter
 *
 * Drives Kysely's Migrator against a single pinned connection whose search
 * path points at the tenant schema. The ledger (`tenant_changelog`) and the
 * lock row (`tenant_changelog_lock`) are created by the Migrator inside the
 * tenant schema itself.
 *
 * Steps run one Migrator call at a time so each step commits on its own: a
 * failure leaves every earlier step applied.
 *
 * @module packages/provisioner/engine/kysely-engine
 */

import {
  CompiledQuery,
  Kysely,
  Migrator,
  sql,
  type Migration,
  type MigrationProvider,
  type MigrationResult,
} from 'kysely';

import { loadChangelog, type OrderedChangeSet } from '../changelog/loader.js';
import type { PoolOptions, SchemaDialect } from '../dialects/index.js';
import {
  describeError,
  MigrationStepError,
  RollbackError,
  type LedgerEntry,
  type MigrationStepResult,
} from '../types.js';
import type { ConnectionFactory, MigrationEngine, TenantConnection } from './types.js';

// =============================================================================
// Connection
// =============================================================================

function isRow(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * TenantConnection over a connection-bound Kysely instance
 */
export class KyselyTenantConnection implements TenantConnection {
  constructor(readonly db: Kysely<unknown>) {}

  async execute(statement: string): Promise<void> {
    await sql.raw(statement).execute(this.db);
  }

  async query(text: string, params: unknown[]): Promise<Record<string, unknown>[]> {
    const result = await this.db.executeQuery(CompiledQuery.raw(text, params));
    return result.rows.filter(isRow);
  }
}

/**
 * Pins one pool connection per unit of work
 */
export class KyselyConnectionFactory implements ConnectionFactory<KyselyTenantConnection> {
  constructor(private readonly db: Kysely<unknown>) {}

  withConnection<T>(work: (connection: KyselyTenantConnection) => Promise<T>): Promise<T> {
    return this.db.connection().execute((db) => work(new KyselyTenantConnection(db)));
  }

  destroy(): Promise<void> {
    return this.db.destroy();
  }
}

/**
 * Opens a Kysely instance for the configured dialect
 */
export function createDatabase(dialect: SchemaDialect, options: PoolOptions): Kysely<unknown> {
  return new Kysely<unknown>({ dialect: dialect.createKyselyDialect(options) });
}

// =============================================================================
// Migration Provider
// =============================================================================

async function runStatements(db: Kysely<unknown>, statements: string[]): Promise<void> {
  for (const statement of statements) {
    await sql.raw(statement).execute(db);
  }
}

/**
 * Converts a change set into a Kysely migration
 *
 * A change set without a reverse action gets no `down`.
 */
export function toKyselyMigration(changeSet: OrderedChangeSet): Migration {
  const up = (db: Kysely<unknown>): Promise<void> => runStatements(db, changeSet.statements);
  const rollback = changeSet.rollback;

  if (rollback === null) {
    return { up };
  }

  return { up, down: (db: Kysely<unknown>) => runStatements(db, rollback) };
}

/**
 * Serves the SQL changelog directory as Kysely migrations
 */
export class SqlChangelogMigrationProvider implements MigrationProvider {
  constructor(private readonly changelogDir: string) {}

  async getMigrations(): Promise<Record<string, Migration>> {
    const changeSets = await loadChangelog(this.changelogDir);
    const migrations: Record<string, Migration> = {};
    for (const changeSet of changeSets) {
      migrations[changeSet.name] = toKyselyMigration(changeSet);
    }
    return migrations;
  }
}

// =============================================================================
// Engine
// =============================================================================

/**
 * Configuration for KyselyMigrationEngine
 */
export interface KyselyMigrationEngineConfig {
  provider: MigrationProvider;

  /** Ledger table inside each tenant schema */
  migrationTableName: string;

  /** Lock table inside each tenant schema */
  migrationLockTableName: string;
}

function toStepResult(result: MigrationResult): MigrationStepResult {
  const direction = result.direction === 'Up' ? 'up' : 'down';
  let status: MigrationStepResult['status'];
  if (result.status === 'Success') {
    status = direction === 'up' ? 'applied' : 'reverted';
  } else if (result.status === 'Error') {
    status = 'failed';
  } else {
    status = 'skipped';
  }
  return { name: result.migrationName, direction, status };
}

export class KyselyMigrationEngine implements MigrationEngine<KyselyTenantConnection> {
  constructor(private readonly config: KyselyMigrationEngineConfig) {}

  private createMigrator(connection: KyselyTenantConnection, schemaName: string): Migrator {
    return new Migrator({
      db: connection.db,
      provider: this.config.provider,
      migrationTableSchema: schemaName,
      migrationTableName: this.config.migrationTableName,
      migrationLockTableName: this.config.migrationLockTableName,
    });
  }

  async migrateToLatest(
    connection: KyselyTenantConnection,
    schemaName: string
  ): Promise<MigrationStepResult[]> {
    const migrator = this.createMigrator(connection, schemaName);
    const ran: MigrationStepResult[] = [];

    for (;;) {
      const { error, results = [] } = await migrator.migrateUp();
      const steps = results.map(toStepResult);
      const failed = steps.find((step) => step.status === 'failed');

      if (error !== undefined) {
        const applied = ran.map((step) => step.name);
        throw new MigrationStepError(
          failed?.name ?? null,
          applied,
          `Step ${failed?.name ?? '(unknown)'} failed in ${schemaName}: ${describeError(error)}`,
          { cause: error }
        );
      }

      const applied = steps.filter((step) => step.status === 'applied');
      if (applied.length === 0) {
        return ran;
      }
      ran.push(...applied);
    }
  }

  async migrateDown(
    connection: KyselyTenantConnection,
    schemaName: string
  ): Promise<MigrationStepResult> {
    const migrator = this.createMigrator(connection, schemaName);
    const migrations = await migrator.getMigrations();
    const executed = migrations.filter((info) => info.executedAt !== undefined);
    const last = executed[executed.length - 1];

    if (!last) {
      throw new RollbackError(null, `No applied steps to revert in ${schemaName}`);
    }
    if (!last.migration.down) {
      throw new RollbackError(last.name, `Step ${last.name} has no reverse action`);
    }

    const { error, results = [] } = await migrator.migrateDown();
    if (error !== undefined) {
      throw new RollbackError(
        last.name,
        `Reverse action of ${last.name} failed in ${schemaName}: ${describeError(error)}`,
        { cause: error }
      );
    }

    const reverted = results.map(toStepResult).find((step) => step.status === 'reverted');
    if (!reverted) {
      throw new RollbackError(last.name, `Step ${last.name} was not reverted`);
    }
    return reverted;
  }

  async getLedger(connection: KyselyTenantConnection, schemaName: string): Promise<LedgerEntry[]> {
    const migrations = await this.createMigrator(connection, schemaName).getMigrations();
    return migrations.map((info) => ({
      name: info.name,
      appliedAt: info.executedAt ?? null,
      reversible: info.migration.down !== undefined,
    }));
  }
}
