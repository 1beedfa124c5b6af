/**
 * Rollback Command - tenantctl tenant rollback
 *
 * Reverts the most recently applied changelog step in a tenant schema.
 *
 * @module packages/cli/commands/tenant/rollback
 */

import chalk from 'chalk';
import ora from 'ora';
import * as readline from 'readline';

import { deriveSchemaName } from '../../../../provisioner/src/schema-name.js';
import {
  canPrompt,
  closeProvisioningStack,
  createSilentLogger,
  getProvisioningStack,
  handleError,
  isInteractive,
  succeed,
} from './utils.js';

/**
 * Options for rollback command
 */
export interface RollbackCommandOptions {
  yes?: boolean;
  json?: boolean;
  quiet?: boolean;
}

/**
 * Prompts for confirmation
 *
 * @param message - Confirmation message
 * @returns True if confirmed
 */
async function confirm(message: string): Promise<boolean> {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  return new Promise((resolve) => {
    rl.question(`${message} [y/N] `, (answer) => {
      rl.close();
      resolve(answer.toLowerCase() === 'y' || answer.toLowerCase() === 'yes');
    });
  });
}

/**
 * Executes the rollback command
 *
 * @param tenantId - Tenant identifier
 * @param schemaName - Target schema (defaults to the derived name)
 * @param options - Command options
 */
export async function rollbackCommand(
  tenantId: string,
  schemaName: string | undefined,
  options: RollbackCommandOptions
): Promise<void> {
  const spinner = isInteractive() && !options.json && !options.quiet ? ora() : null;

  try {
    if (!options.yes && !options.json) {
      if (!canPrompt()) {
        console.error(chalk.red('Error: Cannot prompt for confirmation in non-interactive mode.'));
        console.error(chalk.yellow('Use --yes to skip confirmation.'));
        process.exit(1);
      }

      const target = schemaName ?? deriveSchemaName(tenantId);
      const confirmed = await confirm(
        chalk.yellow(`Revert the last applied step in ${chalk.cyan(target)}?`)
      );
      if (!confirmed) {
        console.log('Rollback cancelled.');
        return;
      }
    }

    spinner?.start(`Rolling back schema for tenant '${tenantId}'...`);

    const stack = getProvisioningStack(createSilentLogger());
    const result = await stack.service.rollbackLast({ tenantId, schemaName });

    if (options.json) {
      console.log(
        JSON.stringify(
          {
            success: true,
            tenantId,
            schemaName: result.schemaName,
            reverted: result.reverted,
            durationMs: result.durationMs,
          },
          null,
          2
        )
      );
    } else if (options.quiet) {
      console.log(result.reverted);
    } else {
      succeed(spinner, `Reverted ${chalk.cyan(result.reverted)} in ${result.schemaName}`);
    }
  } catch (error) {
    spinner?.fail(chalk.red('Rollback failed'));
    handleError(error, options.json);
  } finally {
    await closeProvisioningStack();
  }
}
