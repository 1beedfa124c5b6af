/**
 * KyselyTenantRepository Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';

import { KyselyTenantRepository, type RegistryDatabase } from '../services/tenant-registry.js';
import { createRecordingDb, RecordingConnection } from './recording-dialect.js';

describe('KyselyTenantRepository', () => {
  let recorder: RecordingConnection;
  let repository: KyselyTenantRepository;

  beforeEach(() => {
    recorder = new RecordingConnection();
    repository = new KyselyTenantRepository(createRecordingDb<RegistryDatabase>(recorder), 'public');
  });

  describe('ensureTable', () => {
    it('should create the tenants table in the registry schema', async () => {
      await repository.ensureTable();

      expect(recorder.sql).toHaveLength(1);
      expect(recorder.sql[0]).toMatch(/^create table if not exists "public"\."tenants" \(/);
      expect(recorder.sql[0]).toContain('"tenant_id" varchar(50) primary key');
      expect(recorder.sql[0]).toContain('"schema_name" varchar(63)');
      expect(recorder.sql[0]).toContain('"description" varchar(500)');
    });

    it('should create a non-public registry schema first', async () => {
      repository = new KyselyTenantRepository(createRecordingDb<RegistryDatabase>(recorder), 'control');

      await repository.ensureTable();

      expect(recorder.sql[0]).toBe('create schema if not exists "control"');
      expect(recorder.sql[1]).toMatch(/^create table if not exists "control"\."tenants"/);
    });
  });

  describe('save', () => {
    it('should upsert by tenant id', async () => {
      await repository.save({
        tenantId: 'acme',
        tenantName: 'Acme Corp',
        schemaName: 'tenant_acme',
        active: true,
      });

      const [query] = recorder.queries;
      expect(query?.sql).toMatch(/^insert into "public"\."tenants"/);
      expect(query?.sql).toContain('on conflict ("tenant_id") do update set');
      expect(query?.parameters).toEqual(['acme', 'Acme Corp', 'tenant_acme', true, null, 'Acme Corp', true, null]);
    });
  });

  describe('findById', () => {
    it('should map a row to a tenant record', async () => {
      const createdAt = new Date('2026-02-01T00:00:00Z');
      recorder.results.push([
        {
          tenant_id: 'acme',
          tenant_name: 'Acme Corp',
          schema_name: 'tenant_acme',
          active: true,
          description: 'Pilot customer',
          created_at: createdAt,
          updated_at: createdAt,
        },
      ]);

      const record = await repository.findById('acme');

      expect(recorder.queries[0]?.parameters).toEqual(['acme']);
      expect(record).toEqual({
        tenantId: 'acme',
        tenantName: 'Acme Corp',
        schemaName: 'tenant_acme',
        active: true,
        description: 'Pilot customer',
        createdAt,
        updatedAt: createdAt,
      });
    });

    it('should return null when no row matches', async () => {
      await expect(repository.findById('missing')).resolves.toBeNull();
    });
  });

  describe('list', () => {
    it('should order by tenant id and drop null descriptions', async () => {
      const at = new Date('2026-02-01T00:00:00Z');
      recorder.results.push([
        {
          tenant_id: 'acme',
          tenant_name: 'Acme Corp',
          schema_name: 'tenant_acme',
          active: false,
          description: null,
          created_at: at,
          updated_at: at,
        },
      ]);

      const records = await repository.list();

      expect(recorder.sql[0]).toContain('order by "tenant_id"');
      expect(records).toEqual([
        {
          tenantId: 'acme',
          tenantName: 'Acme Corp',
          schemaName: 'tenant_acme',
          active: false,
          createdAt: at,
          updatedAt: at,
        },
      ]);
    });
  });
});
