/**
 * Schema naming
 *
 * @module packages/provisioner/schema-name
 */

/** Literal prefix of every tenant schema */
export const TENANT_SCHEMA_PREFIX = 'tenant_';

/** PostgreSQL truncates identifiers beyond NAMEDATALEN - 1 bytes */
export const MAX_SCHEMA_NAME_LENGTH = 63;

const SAFE_IDENTIFIER = /^[a-z_][a-z0-9_]*$/;

/**
 * Derives the schema name for a tenant
 *
 * Lowercases the identifier and replaces every character outside
 * `[a-z0-9_]` with `_`, then prefixes `tenant_`.
 *
 * @example
 * deriveSchemaName('abc123')   // 'tenant_abc123'
 * deriveSchemaName('ABC-123!') // 'tenant_abc_123_'
 * deriveSchemaName('!!!')      // 'tenant____'
 *
 * @throws Error if tenantId is empty
 */
export function deriveSchemaName(tenantId: string): string {
  if (tenantId.length === 0) {
    throw new Error('Tenant identifier must be a non-empty string');
  }
  return TENANT_SCHEMA_PREFIX + tenantId.toLowerCase().replace(/[^a-z0-9_]/g, '_');
}

/**
 * Whether a string is safe to splice into DDL as a schema identifier
 */
export function isSafeSchemaName(schemaName: string): boolean {
  return schemaName.length <= MAX_SCHEMA_NAME_LENGTH && SAFE_IDENTIFIER.test(schemaName);
}

/**
 * Quotes an identifier that already passed isSafeSchemaName
 */
export function quoteIdentifier(identifier: string): string {
  if (!isSafeSchemaName(identifier)) {
    throw new Error(`Unsafe identifier: ${identifier}`);
  }
  return `"${identifier}"`;
}
