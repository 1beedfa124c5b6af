/**
 * Tenant Registry
 *
 * Stores tenant records in a shared table (`<registry schema>.tenants`),
 * outside every tenant schema.
 *
 * @module packages/provisioner/services/tenant-registry
 */

import { sql, type Generated, type Kysely, type Selectable } from 'kysely';

import type { StoredTenantRecord, TenantRecord } from '../types.js';

// =============================================================================
// Table Types
// =============================================================================

export interface TenantsTable {
  tenant_id: string;
  tenant_name: string;
  schema_name: string;
  active: boolean;
  description: string | null;
  created_at: Generated<Date>;
  updated_at: Generated<Date>;
}

export type RegistryDatabase = {
  tenants: TenantsTable;
};

type TenantRow = Selectable<TenantsTable>;

// =============================================================================
// Repository Interface
// =============================================================================

/**
 * Persistence port for tenant records
 */
export interface TenantRepository {
  /** Creates the registry table if missing */
  ensureTable(): Promise<void>;

  /** Inserts the record, or updates name, flag and description by tenant id */
  save(record: TenantRecord): Promise<void>;

  findById(tenantId: string): Promise<StoredTenantRecord | null>;

  /** All tenants ordered by tenant id */
  list(): Promise<StoredTenantRecord[]>;
}

function toRecord(row: TenantRow): StoredTenantRecord {
  const record: StoredTenantRecord = {
    tenantId: row.tenant_id,
    tenantName: row.tenant_name,
    schemaName: row.schema_name,
    active: row.active,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
  if (row.description !== null) {
    record.description = row.description;
  }
  return record;
}

// =============================================================================
// Kysely Implementation
// =============================================================================

export class KyselyTenantRepository implements TenantRepository {
  constructor(
    private readonly db: Kysely<RegistryDatabase>,
    private readonly registrySchema: string
  ) {}

  async ensureTable(): Promise<void> {
    if (this.registrySchema !== 'public') {
      await this.db.schema.createSchema(this.registrySchema).ifNotExists().execute();
    }

    await this.db.schema
      .withSchema(this.registrySchema)
      .createTable('tenants')
      .ifNotExists()
      .addColumn('tenant_id', 'varchar(50)', (col) => col.primaryKey())
      .addColumn('tenant_name', 'varchar(100)', (col) => col.notNull())
      .addColumn('schema_name', 'varchar(63)', (col) => col.notNull().unique())
      .addColumn('active', 'boolean', (col) => col.notNull().defaultTo(true))
      .addColumn('description', 'varchar(500)')
      .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
      .addColumn('updated_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
      .execute();
  }

  async save(record: TenantRecord): Promise<void> {
    const description = record.description ?? null;

    await this.db
      .withSchema(this.registrySchema)
      .insertInto('tenants')
      .values({
        tenant_id: record.tenantId,
        tenant_name: record.tenantName,
        schema_name: record.schemaName,
        active: record.active,
        description,
      })
      .onConflict((oc) =>
        oc.column('tenant_id').doUpdateSet({
          tenant_name: record.tenantName,
          active: record.active,
          description,
          updated_at: sql<Date>`now()`,
        })
      )
      .execute();
  }

  async findById(tenantId: string): Promise<StoredTenantRecord | null> {
    const row = await this.db
      .withSchema(this.registrySchema)
      .selectFrom('tenants')
      .selectAll()
      .where('tenant_id', '=', tenantId)
      .executeTakeFirst();

    return row ? toRecord(row) : null;
  }

  async list(): Promise<StoredTenantRecord[]> {
    const rows = await this.db
      .withSchema(this.registrySchema)
      .selectFrom('tenants')
      .selectAll()
      .orderBy('tenant_id')
      .execute();

    return rows.map(toRecord);
  }
}
