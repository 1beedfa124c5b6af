/**
 * Tenant Command Group
 *
 * Registers the `tenantctl tenant` command group with all subcommands.
 *
 * @module packages/cli/commands/tenant
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { shouldUseColor } from './utils.js';

/**
 * Options every subcommand accepts
 */
interface OutputOptions {
  json?: boolean;
}

/**
 * Creates the tenant command group
 *
 * @returns Commander command with all tenant subcommands
 */
export function createTenantCommand(): Command {
  const tenant = new Command('tenant')
    .description('Provision and migrate per-tenant database schemas')
    .option('--no-color', 'Disable colored output')
    .option('-q, --quiet', 'Suppress non-essential output')
    .hook('preAction', (thisCommand) => {
      const opts = thisCommand.optsWithGlobals();
      // Disable colors if --no-color flag, NO_COLOR env, TERM=dumb, or non-TTY
      if (opts.color === false || !shouldUseColor()) {
        chalk.level = 0;
      }
    })
    .addHelpText(
      'after',
      `
Examples:
  $ tenantctl tenant provision acme "Acme Corp"     Create schema tenant_acme and apply all steps
  $ tenantctl tenant provision acme "Acme" -n       Show the schema and steps without touching the database
  $ tenantctl tenant update acme                    Apply pending steps to tenant_acme
  $ tenantctl tenant rollback acme --yes            Revert the last applied step
  $ tenantctl tenant status acme --json             Ledger of tenant_acme as JSON
  $ tenantctl tenant ls                             List registered tenants
  $ tenantctl tenant schemas                        List tenant schemas in the database
  $ tenantctl tenant schema-name "ACME-01"          Print the derived schema name
`
    );

  registerProvisionCommand(tenant);
  registerUpdateCommand(tenant);
  registerRollbackCommand(tenant);
  registerStatusCommand(tenant);
  registerLsCommand(tenant);
  registerSchemasCommand(tenant);
  registerSchemaNameCommand(tenant);

  return tenant;
}

/**
 * Quiet flag from the group, merged into subcommand options
 */
function globalQuiet(parent: Command): boolean {
  return parent.optsWithGlobals().quiet === true;
}

/**
 * Registers the 'provision' subcommand
 */
function registerProvisionCommand(parent: Command): void {
  parent
    .command('provision <tenantId> <tenantName>')
    .description('Create a tenant schema, apply all steps and record the tenant')
    .option('-d, --description <text>', 'Tenant description')
    .option('--json', 'Output as JSON')
    .option('-n, --dry-run', 'Show what would be provisioned without doing it')
    .action(
      async (
        tenantId: string,
        tenantName: string,
        options: OutputOptions & { description?: string; dryRun?: boolean }
      ) => {
        const { provisionCommand } = await import('./provision.js');
        await provisionCommand(tenantId, tenantName, { ...options, quiet: globalQuiet(parent) });
      }
    );
}

/**
 * Registers the 'update' subcommand
 */
function registerUpdateCommand(parent: Command): void {
  parent
    .command('update <tenantId> [schemaName]')
    .description('Apply pending steps to an existing tenant schema')
    .option('--json', 'Output as JSON')
    .action(async (tenantId: string, schemaName: string | undefined, options: OutputOptions) => {
      const { updateCommand } = await import('./update.js');
      await updateCommand(tenantId, schemaName, { ...options, quiet: globalQuiet(parent) });
    });
}

/**
 * Registers the 'rollback' subcommand
 */
function registerRollbackCommand(parent: Command): void {
  parent
    .command('rollback <tenantId> [schemaName]')
    .description('Revert the most recently applied step')
    .option('-y, --yes', 'Skip confirmation prompt')
    .option('--json', 'Output as JSON')
    .action(
      async (tenantId: string, schemaName: string | undefined, options: OutputOptions & { yes?: boolean }) => {
        const { rollbackCommand } = await import('./rollback.js');
        await rollbackCommand(tenantId, schemaName, { ...options, quiet: globalQuiet(parent) });
      }
    );
}

/**
 * Registers the 'status' subcommand
 */
function registerStatusCommand(parent: Command): void {
  parent
    .command('status <tenantId> [schemaName]')
    .description('Show the lifecycle state and step ledger of a tenant schema')
    .option('--json', 'Output as JSON')
    .action(async (tenantId: string, schemaName: string | undefined, options: OutputOptions) => {
      const { statusCommand } = await import('./status.js');
      await statusCommand(tenantId, schemaName, { ...options, quiet: globalQuiet(parent) });
    });
}

/**
 * Registers the 'ls' subcommand (list registered tenants)
 */
function registerLsCommand(parent: Command): void {
  parent
    .command('ls')
    .description('List registered tenants')
    .option('--json', 'Output as JSON')
    .action(async (options: OutputOptions) => {
      const { listCommand } = await import('./ls.js');
      await listCommand({ ...options, quiet: globalQuiet(parent) });
    });
}

/**
 * Registers the 'schemas' subcommand
 */
function registerSchemasCommand(parent: Command): void {
  parent
    .command('schemas')
    .description('List tenant schemas present in the database')
    .option('--json', 'Output as JSON')
    .action(async (options: OutputOptions) => {
      const { schemasCommand } = await import('./ls.js');
      await schemasCommand({ ...options, quiet: globalQuiet(parent) });
    });
}

/**
 * Registers the 'schema-name' subcommand
 */
function registerSchemaNameCommand(parent: Command): void {
  parent
    .command('schema-name <tenantId>')
    .description('Print the schema name derived from a tenant identifier')
    .option('--json', 'Output as JSON')
    .action(async (tenantId: string, options: OutputOptions) => {
      const { schemaNameCommand } = await import('./schema-name.js');
      schemaNameCommand(tenantId, options);
    });
}
