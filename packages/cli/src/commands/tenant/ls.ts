/**
 * List Commands - tenantctl tenant ls / tenantctl tenant schemas
 *
 * Lists registered tenants, or the tenant schemas present in the database.
 *
 * @module packages/cli/commands/tenant/ls
 */

import chalk from 'chalk';

import {
  closeProvisioningStack,
  createSilentLogger,
  formatDate,
  getProvisioningStack,
  handleError,
} from './utils.js';

/**
 * Options for list commands
 */
export interface ListCommandOptions {
  json?: boolean;
  quiet?: boolean;
}

/**
 * Lists tenants recorded in the registry
 */
export async function listCommand(options: ListCommandOptions): Promise<void> {
  try {
    const stack = getProvisioningStack(createSilentLogger());
    await stack.registry.ensureTable();
    const tenants = await stack.service.listTenants();

    if (options.json) {
      console.log(JSON.stringify({ tenants }, null, 2));
      return;
    }

    if (options.quiet) {
      for (const tenant of tenants) {
        console.log(tenant.tenantId);
      }
      return;
    }

    if (tenants.length === 0) {
      console.log(chalk.dim('No tenants found.'));
      return;
    }

    const idWidth = Math.max(6, ...tenants.map((t) => t.tenantId.length));
    const schemaWidth = Math.max(6, ...tenants.map((t) => t.schemaName.length));

    console.log(
      chalk.bold(`${'TENANT'.padEnd(idWidth)}  ${'SCHEMA'.padEnd(schemaWidth)}  ${'ACTIVE'.padEnd(6)}  CREATED`)
    );
    for (const tenant of tenants) {
      console.log(
        `${tenant.tenantId.padEnd(idWidth)}  ${tenant.schemaName.padEnd(schemaWidth)}  ${(tenant.active ? 'yes' : 'no').padEnd(6)}  ${formatDate(tenant.createdAt)}`
      );
    }
  } catch (error) {
    handleError(error, options.json);
  } finally {
    await closeProvisioningStack();
  }
}

/**
 * Lists tenant schemas present in the database
 */
export async function schemasCommand(options: ListCommandOptions): Promise<void> {
  try {
    const stack = getProvisioningStack(createSilentLogger());
    const schemas = await stack.service.listSchemas();

    if (options.json) {
      console.log(JSON.stringify({ schemas }, null, 2));
      return;
    }

    if (schemas.length === 0 && !options.quiet) {
      console.log(chalk.dim('No tenant schemas found.'));
      return;
    }

    for (const schema of schemas) {
      console.log(schema);
    }
  } catch (error) {
    handleError(error, options.json);
  } finally {
    await closeProvisioningStack();
  }
}
