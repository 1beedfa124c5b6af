import { fileURLToPath } from 'node:url';

import { z } from 'zod';

import { SUPPORTED_DIALECTS } from './dialects/index.js';

/** Changelog shipped beside the provisioner sources */
export const DEFAULT_CHANGELOG_DIR = fileURLToPath(new URL('../changelog', import.meta.url));

const identifier = z
  .string()
  .regex(/^[a-z_][a-z0-9_]*$/, 'must be a lowercase SQL identifier')
  .max(63);

/**
 * Configuration schema with validation
 */
const configSchema = z.object({
  // Database
  databaseUrl: z.string().url('DATABASE_URL must be a valid PostgreSQL URL'),
  dialect: z.enum(SUPPORTED_DIALECTS).default('postgres'),
  poolMax: z.number().int().min(1).max(100).default(5),

  // Migrations
  changelogDir: z.string().min(1).default(DEFAULT_CHANGELOG_DIR),
  migrationTableName: identifier.default('tenant_changelog'),
  migrationLockTableName: identifier.default('tenant_changelog_lock'),
  advisoryLocks: z.boolean().default(true),

  // Tenant registry
  registrySchema: identifier.default('public'),

  // Admin API
  port: z.number().int().min(1).max(65535).default(8080),

  // Environment
  nodeEnv: z.enum(['development', 'staging', 'production', 'test']).default('development'),
  logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
});

export type Config = z.infer<typeof configSchema>;

/**
 * Parse environment variables into configuration
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const raw = {
    databaseUrl: env['DATABASE_URL'],
    dialect: env['DB_DIALECT'] || 'postgres',
    poolMax: env['DB_POOL_MAX'] ? parseInt(env['DB_POOL_MAX'], 10) : 5,
    changelogDir: env['CHANGELOG_DIR'] || DEFAULT_CHANGELOG_DIR,
    migrationTableName: env['MIGRATION_TABLE_NAME'] || 'tenant_changelog',
    migrationLockTableName: env['MIGRATION_LOCK_TABLE_NAME'] || 'tenant_changelog_lock',
    advisoryLocks: env['ADVISORY_LOCKS'] !== 'false',
    registrySchema: env['REGISTRY_SCHEMA'] || 'public',
    port: env['PORT'] ? parseInt(env['PORT'], 10) : 8080,
    nodeEnv: env['NODE_ENV'] || 'development',
    logLevel: env['LOG_LEVEL'] || 'info',
  };

  const result = configSchema.safeParse(raw);

  if (!result.success) {
    const errors = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new Error(`Configuration validation failed:\n${errors.join('\n')}`);
  }

  return result.data;
}

// Singleton config instance
let configInstance: Config | null = null;

export function getConfig(): Config {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

// For testing - allow resetting config
export function resetConfig(): void {
  configInstance = null;
}
