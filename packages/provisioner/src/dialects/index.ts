/**
 * Dialect strategies
 *
 * The database dialect is chosen once at startup from a closed set. Each
 * strategy supplies the statements the provisioner issues itself and the
 * Kysely dialect the migration runner drives.
 *
 * @module packages/provisioner/dialects
 */

import type { Dialect } from 'kysely';

import { postgresDialect } from './postgres.js';

/**
 * Dialects the provisioner knows how to drive
 */
export const SUPPORTED_DIALECTS = ['postgres'] as const;

export type SupportedDialect = (typeof SUPPORTED_DIALECTS)[number];

/**
 * A parameterised statement
 */
export interface Statement {
  text: string;
  params: unknown[];
}

/**
 * Options for opening the connection pool
 */
export interface PoolOptions {
  connectionString: string;
  poolMax: number;
}

/**
 * Per-dialect SQL and driver construction
 *
 * Schema names passed in must already satisfy isSafeSchemaName.
 */
export interface SchemaDialect {
  readonly name: SupportedDialect;

  /** DDL that creates the schema, a no-op if it exists */
  createSchema(schemaName: string): string;

  /** Points unqualified names on the session at the schema */
  setSearchPath(schemaName: string): string;

  /** Returns one row when the schema exists */
  schemaExists(schemaName: string): Statement;

  /** Returns `schema_name` rows for schemas starting with the prefix */
  listSchemas(prefix: string): Statement;

  /** Session-level advisory lock keyed by a string */
  acquireLock(key: string): Statement;

  releaseLock(key: string): Statement;

  /** Kysely dialect backed by a connection pool */
  createKyselyDialect(options: PoolOptions): Dialect;
}

const DIALECTS: Record<SupportedDialect, SchemaDialect> = {
  postgres: postgresDialect,
};

/**
 * Resolves the strategy for a configured dialect name
 */
export function resolveDialect(name: SupportedDialect): SchemaDialect {
  return DIALECTS[name];
}

export { postgresDialect };
