/**
 * tenantctl program definition
 *
 * @module packages/cli/program
 */

import { Command } from 'commander';
import { registerCommands } from './commands/index.js';

/**
 * Builds the root command with every command group registered
 */
export function createProgram(): Command {
  const program = new Command()
    .name('tenantctl')
    .description('Provision and migrate per-tenant PostgreSQL schemas')
    .version('1.0.0')
    .showSuggestionAfterError();

  registerCommands(program);

  return program;
}
