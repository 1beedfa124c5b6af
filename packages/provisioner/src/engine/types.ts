/**
 * Migration engine ports
 *
 * The provisioner talks to the database and to the migration runner only
 * through these interfaces. Production wiring uses the Kysely adapters;
 * tests use the in-memory engine with a fake connection.
 *
 * @module packages/provisioner/engine/types
 */

import type { LedgerEntry, MigrationStepResult } from '../types.js';

/**
 * A single pinned database connection
 */
export interface TenantConnection {
  /** Runs a statement, discarding any rows */
  execute(statement: string): Promise<void>;

  /** Runs a parameterised query and returns its rows */
  query(text: string, params: unknown[]): Promise<Record<string, unknown>[]>;
}

/**
 * Hands out one connection for the duration of a unit of work
 *
 * Rejections from acquiring the connection surface as-is; the provisioner
 * classifies them as connection failures.
 */
export interface ConnectionFactory<C extends TenantConnection = TenantConnection> {
  withConnection<T>(work: (connection: C) => Promise<T>): Promise<T>;

  /** Closes the underlying pool */
  destroy(): Promise<void>;
}

/**
 * Applies and reverts the ordered step collection against one schema
 *
 * The ledger of applied steps is owned by the engine and stored inside the
 * schema it migrates.
 */
export interface MigrationEngine<C extends TenantConnection = TenantConnection> {
  /**
   * Applies every pending step, in order
   *
   * @returns Results for the steps this call ran (empty when none pending)
   * @throws MigrationStepError when a step fails; earlier steps stay applied
   */
  migrateToLatest(connection: C, schemaName: string): Promise<MigrationStepResult[]>;

  /**
   * Reverts the most recently applied step
   *
   * @throws RollbackError when nothing is applied, the step has no reverse
   *   action, or the reverse action fails
   */
  migrateDown(connection: C, schemaName: string): Promise<MigrationStepResult>;

  /** Every step in the collection with its ledger status */
  getLedger(connection: C, schemaName: string): Promise<LedgerEntry[]>;
}
