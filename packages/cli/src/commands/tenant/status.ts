/**
 * Status Command - tenantctl tenant status
 *
 * Shows the lifecycle state and per-step ledger of a tenant schema.
 *
 * @module packages/cli/commands/tenant/status
 */

import chalk from 'chalk';

import type { SchemaState } from '../../../../provisioner/src/types.js';
import {
  closeProvisioningStack,
  createSilentLogger,
  formatDate,
  getProvisioningStack,
  handleError,
} from './utils.js';

/**
 * Options for status command
 */
export interface StatusCommandOptions {
  json?: boolean;
  quiet?: boolean;
}

function colorState(state: SchemaState): string {
  switch (state) {
    case 'ready':
      return chalk.green(state);
    case 'failed':
      return chalk.red(state);
    default:
      return chalk.yellow(state);
  }
}

/**
 * Executes the status command
 *
 * @param tenantId - Tenant identifier
 * @param schemaName - Target schema (defaults to the derived name)
 * @param options - Command options
 */
export async function statusCommand(
  tenantId: string,
  schemaName: string | undefined,
  options: StatusCommandOptions
): Promise<void> {
  try {
    const stack = getProvisioningStack(createSilentLogger());
    const status = await stack.service.status({ tenantId, schemaName });
    const pending = status.steps.filter((step) => step.appliedAt === null);

    if (options.json) {
      console.log(JSON.stringify(status, null, 2));
      return;
    }

    if (options.quiet) {
      console.log(pending.length === 0 ? 'up-to-date' : `pending:${pending.length}`);
      return;
    }

    console.log(chalk.bold(`Tenant: ${status.tenantId}`));
    console.log(`  Schema: ${chalk.cyan(status.schemaName)}`);
    console.log(`  State:  ${colorState(status.state)}`);
    console.log(`  Steps:  ${status.steps.length - pending.length} applied, ${pending.length} pending`);
    console.log();

    for (const step of status.steps) {
      const mark = step.appliedAt ? chalk.green('[x]') : chalk.dim('[ ]');
      const reversible = step.reversible ? '' : chalk.dim(' (irreversible)');
      console.log(`  ${mark} ${step.name}  ${formatDate(step.appliedAt)}${reversible}`);
    }
  } catch (error) {
    handleError(error, options.json);
  } finally {
    await closeProvisioningStack();
  }
}
