/**
 * Provision Command - tenantctl tenant provision
 *
 * Creates a tenant's schema, applies every changelog step and records the
 * tenant in the registry.
 *
 * @module packages/cli/commands/tenant/provision
 */

import chalk from 'chalk';
import ora from 'ora';

import { loadChangelog } from '../../../../provisioner/src/changelog/loader.js';
import { deriveSchemaName } from '../../../../provisioner/src/schema-name.js';
import {
  closeProvisioningStack,
  createSilentLogger,
  getChangelogDir,
  getProvisioningStack,
  handleError,
  isInteractive,
  succeed,
} from './utils.js';

/**
 * Options for provision command
 */
export interface ProvisionCommandOptions {
  description?: string;
  dryRun?: boolean;
  json?: boolean;
  quiet?: boolean;
}

/**
 * Executes the provision command
 *
 * @param tenantId - Tenant identifier
 * @param tenantName - Display name recorded in the registry
 * @param options - Command options
 */
export async function provisionCommand(
  tenantId: string,
  tenantName: string,
  options: ProvisionCommandOptions
): Promise<void> {
  // Only show spinner in interactive TTY mode, not in quiet mode
  const spinner = isInteractive() && !options.json && !options.quiet ? ora() : null;

  try {
    if (options.dryRun) {
      const schemaName = deriveSchemaName(tenantId);
      const steps = await loadChangelog(getChangelogDir());

      if (options.json) {
        console.log(
          JSON.stringify(
            {
              dryRun: true,
              wouldProvision: {
                tenantId,
                tenantName,
                schemaName,
                steps: steps.map((step) => step.name),
              },
            },
            null,
            2
          )
        );
      } else {
        console.log(chalk.yellow('DRY RUN - No changes will be made'));
        console.log();
        console.log('Would provision tenant:');
        console.log(`  Tenant: ${chalk.cyan(tenantId)} (${tenantName})`);
        console.log(`  Schema: ${schemaName}`);
        console.log(`  Steps:  ${steps.length}`);
        for (const step of steps) {
          console.log(`    ${step.name}`);
        }
      }
      return;
    }

    spinner?.start(`Provisioning tenant '${tenantId}'...`);

    const stack = getProvisioningStack(createSilentLogger());
    await stack.registry.ensureTable();
    const { tenant, run } = await stack.service.provision({
      tenantId,
      tenantName,
      description: options.description,
    });

    if (options.json) {
      console.log(
        JSON.stringify(
          {
            success: true,
            tenant,
            schemaCreated: run.schemaCreated,
            applied: run.applied,
            durationMs: run.durationMs,
          },
          null,
          2
        )
      );
    } else if (options.quiet) {
      console.log(run.schemaName);
    } else {
      succeed(spinner, `Tenant '${tenant.tenantName}' provisioned with schema ${chalk.cyan(run.schemaName)}`);
      if (run.applied.length === 0) {
        console.log(chalk.dim('  Schema is up to date'));
      }
      for (const step of run.applied) {
        console.log(`  ${chalk.green('+')} ${step}`);
      }
    }
  } catch (error) {
    spinner?.fail(chalk.red('Provisioning failed'));
    handleError(error, options.json);
  } finally {
    await closeProvisioningStack();
  }
}
