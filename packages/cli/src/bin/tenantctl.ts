#!/usr/bin/env node
/**
 * tenantctl - tenant schema provisioning CLI
 *
 * Entry point for the `tenantctl` command. Unknown commands, at the top
 * level or inside a group, are answered by commander with the closest match.
 *
 * @module packages/cli/bin/tenantctl
 */

import { createProgram } from '../program.js';

createProgram()
  .parseAsync()
  .catch((error: unknown) => {
    console.error(error instanceof Error ? error.message : String(error));
    process.exit(1);
  });
