/**
 * In-memory migration engine
 *
 * Runs a step set supplied in code against a TenantConnection and keeps
 * the per-schema ledger in process memory. The ordering contract is the same
 * as the Kysely engine's.
 *
 * @module packages/provisioner/engine/memory-engine
 */

import type { OrderedChangeSet } from '../changelog/loader.js';
import {
  describeError,
  MigrationStepError,
  RollbackError,
  type LedgerEntry,
  type MigrationStepResult,
} from '../types.js';
import type { MigrationEngine, TenantConnection } from './types.js';

/**
 * One step of an in-memory collection
 */
export interface MigrationStep<C extends TenantConnection = TenantConnection> {
  name: string;
  up(connection: C): Promise<void>;
  down?: (connection: C) => Promise<void>;
}

interface AppliedStep {
  name: string;
  appliedAt: Date;
}

/**
 * Builds steps that execute change set statements on the connection
 */
export function stepsFromChangeSets(changeSets: OrderedChangeSet[]): MigrationStep[] {
  return changeSets.map((changeSet) => {
    const run = async (connection: TenantConnection, statements: string[]): Promise<void> => {
      for (const statement of statements) {
        await connection.execute(statement);
      }
    };
    const rollback = changeSet.rollback;
    return {
      name: changeSet.name,
      up: (connection) => run(connection, changeSet.statements),
      down: rollback === null ? undefined : (connection) => run(connection, rollback),
    };
  });
}

/**
 * Computes the steps still to apply
 *
 * The applied names must be a prefix of the collection; anything else means
 * the ledger and the collection diverged.
 *
 * @throws MigrationStepError on divergence
 */
export function pendingSteps<S extends { name: string }>(steps: S[], applied: string[]): S[] {
  applied.forEach((name, index) => {
    if (steps[index]?.name !== name) {
      throw new MigrationStepError(
        name,
        [],
        `Ledger entry ${name} does not match step ${steps[index]?.name ?? '(none)'} at position ${index + 1}`
      );
    }
  });
  return steps.slice(applied.length);
}

export class InMemoryMigrationEngine<C extends TenantConnection = TenantConnection>
  implements MigrationEngine<C>
{
  private readonly ledgers = new Map<string, AppliedStep[]>();

  constructor(private readonly steps: MigrationStep<C>[]) {}

  private ledger(schemaName: string): AppliedStep[] {
    let ledger = this.ledgers.get(schemaName);
    if (!ledger) {
      ledger = [];
      this.ledgers.set(schemaName, ledger);
    }
    return ledger;
  }

  /** Names of the steps applied to a schema, in order */
  applied(schemaName: string): string[] {
    return (this.ledgers.get(schemaName) ?? []).map((entry) => entry.name);
  }

  async migrateToLatest(connection: C, schemaName: string): Promise<MigrationStepResult[]> {
    const ledger = this.ledger(schemaName);
    const pending = pendingSteps(
      this.steps,
      ledger.map((entry) => entry.name)
    );
    const results: MigrationStepResult[] = [];

    for (const step of pending) {
      try {
        await step.up(connection);
      } catch (error) {
        throw new MigrationStepError(
          step.name,
          results.map((result) => result.name),
          `Step ${step.name} failed in ${schemaName}: ${describeError(error)}`,
          { cause: error }
        );
      }
      ledger.push({ name: step.name, appliedAt: new Date() });
      results.push({ name: step.name, direction: 'up', status: 'applied' });
    }

    return results;
  }

  async migrateDown(connection: C, schemaName: string): Promise<MigrationStepResult> {
    const ledger = this.ledger(schemaName);
    const last = ledger[ledger.length - 1];

    if (!last) {
      throw new RollbackError(null, `No applied steps to revert in ${schemaName}`);
    }

    const step = this.steps.find((candidate) => candidate.name === last.name);
    if (!step?.down) {
      throw new RollbackError(last.name, `Step ${last.name} has no reverse action`);
    }

    try {
      await step.down(connection);
    } catch (error) {
      throw new RollbackError(
        last.name,
        `Reverse action of ${last.name} failed in ${schemaName}: ${describeError(error)}`,
        { cause: error }
      );
    }

    ledger.pop();
    return { name: last.name, direction: 'down', status: 'reverted' };
  }

  async getLedger(_connection: C, schemaName: string): Promise<LedgerEntry[]> {
    const applied = new Map(
      (this.ledgers.get(schemaName) ?? []).map((entry): [string, AppliedStep] => [entry.name, entry])
    );
    return this.steps.map((step) => ({
      name: step.name,
      appliedAt: applied.get(step.name)?.appliedAt ?? null,
      reversible: step.down !== undefined,
    }));
  }
}
