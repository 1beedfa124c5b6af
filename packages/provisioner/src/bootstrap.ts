/**
 * Wires the provisioning stack from configuration
 *
 * @module packages/provisioner/bootstrap
 */

import type { Kysely } from 'kysely';
import type { Logger } from 'pino';

import type { Config } from './config.js';
import { resolveDialect } from './dialects/index.js';
import {
  createDatabase,
  KyselyConnectionFactory,
  KyselyMigrationEngine,
  SqlChangelogMigrationProvider,
  type KyselyTenantConnection,
} from './engine/kysely-engine.js';
import { SchemaProvisioner } from './services/schema-provisioner.js';
import { TenantProvisioningService } from './services/tenant-provisioning.service.js';
import { KyselyTenantRepository, type RegistryDatabase } from './services/tenant-registry.js';

export interface ProvisioningStack {
  db: Kysely<unknown>;
  provisioner: SchemaProvisioner<KyselyTenantConnection>;
  registry: KyselyTenantRepository;
  service: TenantProvisioningService;

  /** Closes the connection pool */
  close(): Promise<void>;
}

export function createProvisioningStack(config: Config, logger: Logger): ProvisioningStack {
  const dialect = resolveDialect(config.dialect);
  const db = createDatabase(dialect, {
    connectionString: config.databaseUrl,
    poolMax: config.poolMax,
  });
  const connections = new KyselyConnectionFactory(db);

  const engine = new KyselyMigrationEngine({
    provider: new SqlChangelogMigrationProvider(config.changelogDir),
    migrationTableName: config.migrationTableName,
    migrationLockTableName: config.migrationLockTableName,
  });

  const provisioner = new SchemaProvisioner({
    connections,
    engine,
    dialect,
    logger,
    advisoryLocks: config.advisoryLocks,
  });

  const registry = new KyselyTenantRepository(db.withTables<RegistryDatabase>(), config.registrySchema);
  const service = new TenantProvisioningService({ provisioner, registry, logger });

  logger.debug(
    { dialect: dialect.name, poolMax: config.poolMax, changelogDir: config.changelogDir },
    'Provisioning stack created'
  );

  return {
    db,
    provisioner,
    registry,
    service,
    close: () => connections.destroy(),
  };
}
