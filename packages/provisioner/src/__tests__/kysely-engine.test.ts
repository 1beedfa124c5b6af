/**
 * Kysely engine adapter tests
 *
 * Kysely's Migrator is mocked; statements run against a recording dialect.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { Migrator } from 'kysely';

import { DEFAULT_CHANGELOG_DIR } from '../config.js';
import {
  KyselyConnectionFactory,
  KyselyMigrationEngine,
  KyselyTenantConnection,
  SqlChangelogMigrationProvider,
  toKyselyMigration,
} from '../engine/kysely-engine.js';
import { MigrationStepError, RollbackError } from '../types.js';
import { createRecordingDb, RecordingConnection } from './recording-dialect.js';

vi.mock('kysely', async (importOriginal) => {
  const actual = await importOriginal<typeof import('kysely')>();
  return { ...actual, Migrator: vi.fn() };
});

const upResult = (name: string, status: 'Success' | 'Error' = 'Success') => ({
  migrationName: name,
  direction: 'Up',
  status,
});

describe('KyselyTenantConnection', () => {
  it('should run raw statements and parameterised queries', async () => {
    const recorder = new RecordingConnection();
    recorder.results.push([], [{ schema_name: 'tenant_a' }]);
    const connection = new KyselyTenantConnection(createRecordingDb<unknown>(recorder));

    await connection.execute('SET search_path TO "tenant_a"');
    const rows = await connection.query('SELECT schema_name FROM x WHERE schema_name = $1', ['tenant_a']);

    expect(recorder.sql).toEqual([
      'SET search_path TO "tenant_a"',
      'SELECT schema_name FROM x WHERE schema_name = $1',
    ]);
    expect(recorder.queries[1]?.parameters).toEqual(['tenant_a']);
    expect(rows).toEqual([{ schema_name: 'tenant_a' }]);
  });
});

describe('KyselyConnectionFactory', () => {
  it('should hand the work a connection-bound instance', async () => {
    const recorder = new RecordingConnection();
    const factory = new KyselyConnectionFactory(createRecordingDb<unknown>(recorder));

    const result = await factory.withConnection(async (connection) => {
      await connection.execute('SELECT 1');
      return 'done';
    });

    expect(result).toBe('done');
    expect(recorder.sql).toEqual(['SELECT 1']);
  });
});

describe('toKyselyMigration', () => {
  const changeSet = {
    id: 'one',
    author: 'platform',
    source: '001_init.sql',
    name: '001_init/001_one',
    statements: ['CREATE TABLE a (id INT)', 'CREATE TABLE b (id INT)'],
    rollback: ['DROP TABLE b', 'DROP TABLE a'],
  };

  it('should run forward and reverse statements in order', async () => {
    const recorder = new RecordingConnection();
    const db = createRecordingDb<unknown>(recorder);
    const migration = toKyselyMigration(changeSet);

    await migration.up(db);
    await migration.down?.(db);

    expect(recorder.sql).toEqual([
      'CREATE TABLE a (id INT)',
      'CREATE TABLE b (id INT)',
      'DROP TABLE b',
      'DROP TABLE a',
    ]);
  });

  it('should omit down when there is no reverse action', () => {
    expect(toKyselyMigration({ ...changeSet, rollback: null }).down).toBeUndefined();
  });

  it('should keep a no-op down for an empty reverse action', () => {
    expect(toKyselyMigration({ ...changeSet, rollback: [] }).down).toBeTypeOf('function');
  });
});

describe('SqlChangelogMigrationProvider', () => {
  it('should key migrations by ledger name', async () => {
    const provider = new SqlChangelogMigrationProvider(DEFAULT_CHANGELOG_DIR);

    const migrations = await provider.getMigrations();

    expect(Object.keys(migrations)).toEqual(['001_create_users_table/001_create-users-table']);
  });
});

describe('KyselyMigrationEngine', () => {
  const migrator = {
    migrateUp: vi.fn(),
    migrateDown: vi.fn(),
    getMigrations: vi.fn(),
  };
  const provider = { getMigrations: vi.fn(async () => ({})) };
  let connection: KyselyTenantConnection;
  let engine: KyselyMigrationEngine;

  beforeEach(() => {
    vi.clearAllMocks();
    migrator.migrateUp.mockReset();
    migrator.migrateDown.mockReset();
    migrator.getMigrations.mockReset();
    vi.mocked(Migrator).mockImplementation(function () {
      return migrator as unknown as Migrator;
    });

    connection = new KyselyTenantConnection(createRecordingDb<unknown>(new RecordingConnection()));
    engine = new KyselyMigrationEngine({
      provider,
      migrationTableName: 'tenant_changelog',
      migrationLockTableName: 'tenant_changelog_lock',
    });
  });

  describe('migrateToLatest', () => {
    it('should keep the ledger inside the tenant schema', async () => {
      migrator.migrateUp.mockResolvedValueOnce({ results: [] });

      await engine.migrateToLatest(connection, 'tenant_acme');

      expect(Migrator).toHaveBeenCalledWith({
        db: connection.db,
        provider,
        migrationTableSchema: 'tenant_acme',
        migrationTableName: 'tenant_changelog',
        migrationLockTableName: 'tenant_changelog_lock',
      });
    });

    it('should apply one step per call until none remain', async () => {
      migrator.migrateUp
        .mockResolvedValueOnce({ results: [upResult('s1')] })
        .mockResolvedValueOnce({ results: [upResult('s2')] })
        .mockResolvedValueOnce({ results: [] });

      const results = await engine.migrateToLatest(connection, 'tenant_acme');

      expect(results).toEqual([
        { name: 's1', direction: 'up', status: 'applied' },
        { name: 's2', direction: 'up', status: 'applied' },
      ]);
      expect(migrator.migrateUp).toHaveBeenCalledTimes(3);
    });

    it('should report the failing step and those applied before it', async () => {
      migrator.migrateUp
        .mockResolvedValueOnce({ results: [upResult('s1')] })
        .mockResolvedValueOnce({
          error: new Error('syntax error at or near "TABEL"'),
          results: [upResult('s2', 'Error')],
        });

      const error = await engine.migrateToLatest(connection, 'tenant_acme').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(MigrationStepError);
      expect(error).toMatchObject({
        stepName: 's2',
        applied: ['s1'],
        message: 'Step s2 failed in tenant_acme: syntax error at or near "TABEL"',
      });
    });
  });

  describe('migrateDown', () => {
    const up = async () => undefined;

    it('should revert the last executed step', async () => {
      migrator.getMigrations.mockResolvedValueOnce([
        { name: 's1', executedAt: new Date(), migration: { up, down: up } },
        { name: 's2', executedAt: undefined, migration: { up, down: up } },
      ]);
      migrator.migrateDown.mockResolvedValueOnce({
        results: [{ migrationName: 's1', direction: 'Down', status: 'Success' }],
      });

      await expect(engine.migrateDown(connection, 'tenant_acme')).resolves.toEqual({
        name: 's1',
        direction: 'down',
        status: 'reverted',
      });
    });

    it('should refuse a step without a reverse action', async () => {
      migrator.getMigrations.mockResolvedValueOnce([
        { name: 's1', executedAt: new Date(), migration: { up } },
      ]);

      await expect(engine.migrateDown(connection, 'tenant_acme')).rejects.toThrow(
        'Step s1 has no reverse action'
      );
      expect(migrator.migrateDown).not.toHaveBeenCalled();
    });

    it('should fail when nothing is applied', async () => {
      migrator.getMigrations.mockResolvedValueOnce([{ name: 's1', executedAt: undefined, migration: { up } }]);

      await expect(engine.migrateDown(connection, 'tenant_acme')).rejects.toBeInstanceOf(RollbackError);
    });

    it('should wrap a failing reverse action', async () => {
      migrator.getMigrations.mockResolvedValueOnce([
        { name: 's1', executedAt: new Date(), migration: { up, down: up } },
      ]);
      migrator.migrateDown.mockResolvedValueOnce({
        error: new Error('cannot drop table users'),
        results: [{ migrationName: 's1', direction: 'Down', status: 'Error' }],
      });

      await expect(engine.migrateDown(connection, 'tenant_acme')).rejects.toThrow(
        'Reverse action of s1 failed in tenant_acme: cannot drop table users'
      );
    });
  });

  describe('getLedger', () => {
    it('should map executed and pending steps', async () => {
      const executedAt = new Date('2026-03-01T12:00:00Z');
      migrator.getMigrations.mockResolvedValueOnce([
        { name: 's1', executedAt, migration: { up: async () => undefined } },
        { name: 's2', executedAt: undefined, migration: { up: async () => undefined, down: async () => undefined } },
      ]);

      await expect(engine.getLedger(connection, 'tenant_acme')).resolves.toEqual([
        { name: 's1', appliedAt: executedAt, reversible: false },
        { name: 's2', appliedAt: null, reversible: true },
      ]);
    });
  });
});
