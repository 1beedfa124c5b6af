/**
 * Shared test doubles: mock logger and an in-process stand-in for the
 * database behind the TenantConnection port.
 */

import { vi } from 'vitest';
import type { Logger } from 'pino';

import type { ConnectionFactory, TenantConnection } from '../engine/types.js';

// Mock logger
export const createMockLogger = (): Logger => {
  const logger = {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    trace: vi.fn(),
    fatal: vi.fn(),
    child: vi.fn(() => logger),
  } as unknown as Logger;
  return logger;
};

export interface ExecutedStatement {
  /** search_path of the connection when the statement ran */
  schema: string;
  statement: string;
}

const CREATE_SCHEMA = /^CREATE SCHEMA IF NOT EXISTS "([^"]+)"$/;
const SET_SEARCH_PATH = /^SET search_path TO "([^"]+)"$/;

/**
 * Database state shared by every FakeConnection it hands out
 */
export class FakeDatabase {
  readonly schemas = new Set<string>();
  readonly log: ExecutedStatement[] = [];
  readonly tables = new Map<string, Set<string>>();

  /** Rejects connection acquisition when set */
  connectError: Error | null = null;

  opened = 0;
  released = 0;

  private readonly failures: Array<{ match: RegExp; error: Error }> = [];

  failOn(match: RegExp, message: string): void {
    this.failures.push({ match, error: new Error(message) });
  }

  clearFailures(): void {
    this.failures.length = 0;
  }

  check(statement: string): void {
    const failure = this.failures.find((candidate) => candidate.match.test(statement));
    if (failure) {
      throw failure.error;
    }
  }

  /** Statements other than search-path and lock bookkeeping, per schema */
  statementsIn(schema: string): string[] {
    return this.log
      .filter((entry) => entry.schema === schema)
      .map((entry) => entry.statement)
      .filter((statement) => !SET_SEARCH_PATH.test(statement) && !statement.startsWith('SELECT'));
  }

  tablesIn(schema: string): string[] {
    return [...(this.tables.get(schema) ?? [])].sort();
  }
}

export class FakeConnection implements TenantConnection {
  searchPath = 'public';

  constructor(private readonly db: FakeDatabase) {}

  async execute(statement: string): Promise<void> {
    this.db.check(statement);
    this.db.log.push({ schema: this.searchPath, statement });

    const create = CREATE_SCHEMA.exec(statement);
    if (create) {
      this.db.schemas.add(create[1]);
      return;
    }

    const searchPath = SET_SEARCH_PATH.exec(statement);
    if (searchPath) {
      this.searchPath = searchPath[1];
      return;
    }

    const createTable = /^CREATE TABLE (\w+)/.exec(statement);
    if (createTable) {
      const tables = this.db.tables.get(this.searchPath) ?? new Set<string>();
      tables.add(createTable[1]);
      this.db.tables.set(this.searchPath, tables);
      return;
    }

    const dropTable = /^DROP TABLE (?:IF EXISTS )?(\w+)/.exec(statement);
    if (dropTable) {
      this.db.tables.get(this.searchPath)?.delete(dropTable[1]);
    }
  }

  async query(text: string, params: unknown[]): Promise<Record<string, unknown>[]> {
    this.db.check(text);
    this.db.log.push({ schema: this.searchPath, statement: text });

    if (text.includes('information_schema.schemata WHERE schema_name = $1')) {
      return this.db.schemas.has(String(params[0])) ? [{ exists: 1 }] : [];
    }

    if (text.includes('schema_name LIKE $1')) {
      const prefix = String(params[0]).replace(/%$/, '').replace(/\\(.)/g, '$1');
      return [...this.db.schemas]
        .filter((schema) => schema.startsWith(prefix))
        .sort()
        .map((schema) => ({ schema_name: schema }));
    }

    return [{}];
  }
}

export class FakeConnectionFactory implements ConnectionFactory<FakeConnection> {
  constructor(readonly db: FakeDatabase) {}

  async withConnection<T>(work: (connection: FakeConnection) => Promise<T>): Promise<T> {
    if (this.db.connectError) {
      throw this.db.connectError;
    }
    this.db.opened++;
    try {
      return await work(new FakeConnection(this.db));
    } finally {
      this.db.released++;
    }
  }

  async destroy(): Promise<void> {}
}
