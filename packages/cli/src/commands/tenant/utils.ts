/**
 * Tenant CLI Utilities
 *
 * Shared utilities for tenant CLI commands.
 *
 * @module packages/cli/commands/tenant/utils
 */

import type { Logger } from 'pino';
import type { Ora } from 'ora';

import { createProvisioningStack, type ProvisioningStack } from '../../../../provisioner/src/bootstrap.js';
import { DEFAULT_CHANGELOG_DIR, getConfig } from '../../../../provisioner/src/config.js';
import { createLogger } from '../../../../provisioner/src/logger.js';
import { ProvisioningError } from '../../../../provisioner/src/types.js';

// =============================================================================
// Provisioning Stack
// =============================================================================

let cachedStack: ProvisioningStack | null = null;

/**
 * Gets the provisioning stack for the configured database
 *
 * Caches the instance for reuse within the same process.
 *
 * @throws Error if the environment configuration is invalid
 */
export function getProvisioningStack(logger: Logger): ProvisioningStack {
  if (cachedStack) {
    return cachedStack;
  }
  cachedStack = createProvisioningStack(getConfig(), logger);
  return cachedStack;
}

/**
 * Closes the cached stack's connection pool so the process can exit
 */
export async function closeProvisioningStack(): Promise<void> {
  if (cachedStack) {
    const stack = cachedStack;
    cachedStack = null;
    await stack.close();
  }
}

/**
 * Changelog directory, readable without a database configuration
 */
export function getChangelogDir(): string {
  return process.env.CHANGELOG_DIR || DEFAULT_CHANGELOG_DIR;
}

// =============================================================================
// Terminal
// =============================================================================

/**
 * Determines if colors should be used in output
 *
 * Respects NO_COLOR, TERM=dumb and non-TTY stdout.
 */
export function shouldUseColor(): boolean {
  if (process.env.NO_COLOR !== undefined) return false;
  if (process.env.TERM === 'dumb') return false;
  if (!process.stdout.isTTY) return false;
  return true;
}

/**
 * Determines if the terminal supports interactive features
 */
export function isInteractive(): boolean {
  return process.stdout.isTTY === true;
}

/**
 * Whether a confirmation prompt can be shown
 */
export function canPrompt(): boolean {
  return process.stdin.isTTY === true && process.stdout.isTTY === true;
}

/**
 * Reports success through the spinner, or on stdout when there is none
 */
export function succeed(spinner: Ora | null, text: string): void {
  if (spinner) {
    spinner.succeed(text);
  } else {
    console.log(text);
  }
}

// =============================================================================
// Output Formatting
// =============================================================================

/**
 * Formats a date for display
 *
 * @returns ISO 8601 string, or '-' when absent
 */
export function formatDate(date: Date | null): string {
  if (!date) {
    return '-';
  }
  return date.toISOString();
}

// =============================================================================
// Error Handling
// =============================================================================

/**
 * Handles errors in CLI commands
 *
 * @param error - Error to handle
 * @param json - Whether to output as JSON
 */
export function handleError(error: unknown, json: boolean = false): never {
  const message = error instanceof Error ? error.message : String(error);
  const code = error instanceof ProvisioningError ? error.code : undefined;

  if (json) {
    console.log(
      JSON.stringify(
        {
          success: false,
          error: {
            message,
            code: code || 'UNKNOWN',
          },
        },
        null,
        2
      )
    );
  } else {
    console.error(`Error: ${message}`);
    if (code) {
      console.error(`Code: ${code}`);
    }
  }

  process.exit(1);
}

// =============================================================================
// Silent Logger
// =============================================================================

/**
 * Creates a silent logger for CLI usage
 *
 * Failures reach the user through handleError instead.
 */
export function createSilentLogger(): Logger {
  return createLogger({ name: 'tenantctl', level: 'silent' });
}
