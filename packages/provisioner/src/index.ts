/**
 * Tenant schema provisioner
 *
 * Schema-per-tenant provisioning: derives schema names, creates schemas and
 * applies a shared, ordered step collection to each of them.
 *
 * @module packages/provisioner
 */

// Types
export * from './types.js';

// Naming
export { deriveSchemaName, isSafeSchemaName, quoteIdentifier, TENANT_SCHEMA_PREFIX } from './schema-name.js';

// Changelog
export { parseChangelog, splitStatements, type ChangeSet } from './changelog/parser.js';
export { loadChangelog, orderChangeSets, stepName, type OrderedChangeSet } from './changelog/loader.js';

// Dialects
export {
  postgresDialect,
  resolveDialect,
  SUPPORTED_DIALECTS,
  type SchemaDialect,
  type Statement,
  type SupportedDialect,
} from './dialects/index.js';

// Engines
export type { ConnectionFactory, MigrationEngine, TenantConnection } from './engine/types.js';
export {
  createDatabase,
  KyselyConnectionFactory,
  KyselyMigrationEngine,
  KyselyTenantConnection,
  SqlChangelogMigrationProvider,
} from './engine/kysely-engine.js';
export { InMemoryMigrationEngine, stepsFromChangeSets, type MigrationStep } from './engine/memory-engine.js';

// Services
export { SchemaLock } from './services/schema-lock.js';
export { SchemaProvisioner, type SchemaProvisionerConfig } from './services/schema-provisioner.js';
export {
  KyselyTenantRepository,
  type RegistryDatabase,
  type TenantRepository,
} from './services/tenant-registry.js';
export {
  provisionInputSchema,
  schemaTargetSchema,
  TenantProvisioningService,
  type ProvisionInput,
  type ProvisionOutcome,
  type SchemaOperations,
  type SchemaTarget,
  type TenantStatus,
} from './services/tenant-provisioning.service.js';

// Runtime
export { getConfig, loadConfig, resetConfig, type Config } from './config.js';
export { createLogger } from './logger.js';
export { createProvisioningStack, type ProvisioningStack } from './bootstrap.js';
export { provisionerRegistry } from './metrics.js';
