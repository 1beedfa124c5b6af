/**
 * CLI Commands Registry
 *
 * Registers all command groups with the main program.
 *
 * @module packages/cli/commands
 */

import type { Command } from 'commander';
import { createTenantCommand } from './tenant/index.js';

/**
 * Registers all command groups with the program
 *
 * @param program - Commander program instance
 */
export function registerCommands(program: Command): void {
  program.addCommand(createTenantCommand());
}

export { createTenantCommand };
