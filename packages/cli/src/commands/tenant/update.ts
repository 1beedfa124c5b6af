/**
 * Update Command - tenantctl tenant update
 *
 * Applies pending changelog steps to an existing tenant schema.
 *
 * @module packages/cli/commands/tenant/update
 */

import chalk from 'chalk';
import ora from 'ora';

import {
  closeProvisioningStack,
  createSilentLogger,
  getProvisioningStack,
  handleError,
  isInteractive,
  succeed,
} from './utils.js';

/**
 * Options for update command
 */
export interface UpdateCommandOptions {
  json?: boolean;
  quiet?: boolean;
}

/**
 * Executes the update command
 *
 * @param tenantId - Tenant identifier
 * @param schemaName - Target schema (defaults to the derived name)
 * @param options - Command options
 */
export async function updateCommand(
  tenantId: string,
  schemaName: string | undefined,
  options: UpdateCommandOptions
): Promise<void> {
  const spinner = isInteractive() && !options.json && !options.quiet ? ora() : null;

  try {
    spinner?.start(`Updating schema for tenant '${tenantId}'...`);

    const stack = getProvisioningStack(createSilentLogger());
    const run = await stack.service.update({ tenantId, schemaName });

    if (options.json) {
      console.log(
        JSON.stringify(
          {
            success: true,
            tenantId,
            schemaName: run.schemaName,
            applied: run.applied,
            durationMs: run.durationMs,
          },
          null,
          2
        )
      );
    } else if (options.quiet) {
      for (const step of run.applied) {
        console.log(step);
      }
    } else {
      succeed(
        spinner,
        run.applied.length === 0
          ? `Schema ${chalk.cyan(run.schemaName)} is up to date`
          : `Applied ${run.applied.length} step(s) to ${chalk.cyan(run.schemaName)}`
      );
      for (const step of run.applied) {
        console.log(`  ${chalk.green('+')} ${step}`);
      }
    }
  } catch (error) {
    spinner?.fail(chalk.red('Schema update failed'));
    handleError(error, options.json);
  } finally {
    await closeProvisioningStack();
  }
}
