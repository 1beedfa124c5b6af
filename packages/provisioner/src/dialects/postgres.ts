/**
 * PostgreSQL dialect strategy
 *
 * @module packages/provisioner/dialects/postgres
 */

import { PostgresDialect } from 'kysely';
import pg from 'pg';

import { quoteIdentifier } from '../schema-name.js';
import type { SchemaDialect } from './index.js';

/** Escapes LIKE wildcards so a prefix matches literally */
function likePrefix(prefix: string): string {
  return `${prefix.replace(/[\\%_]/g, (ch) => `\\${ch}`)}%`;
}

export const postgresDialect: SchemaDialect = {
  name: 'postgres',

  createSchema(schemaName) {
    return `CREATE SCHEMA IF NOT EXISTS ${quoteIdentifier(schemaName)}`;
  },

  setSearchPath(schemaName) {
    return `SET search_path TO ${quoteIdentifier(schemaName)}`;
  },

  schemaExists(schemaName) {
    return {
      text: 'SELECT 1 FROM information_schema.schemata WHERE schema_name = $1',
      params: [schemaName],
    };
  },

  listSchemas(prefix) {
    return {
      text:
        'SELECT schema_name FROM information_schema.schemata WHERE schema_name LIKE $1 ORDER BY schema_name',
      params: [likePrefix(prefix)],
    };
  },

  acquireLock(key) {
    return { text: 'SELECT pg_advisory_lock(hashtext($1))', params: [key] };
  },

  releaseLock(key) {
    return { text: 'SELECT pg_advisory_unlock(hashtext($1))', params: [key] };
  },

  createKyselyDialect({ connectionString, poolMax }) {
    return new PostgresDialect({
      pool: new pg.Pool({ connectionString, max: poolMax }),
    });
  },
};
