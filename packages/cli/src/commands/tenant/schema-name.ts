/**
 * Schema Name Command - tenantctl tenant schema-name
 *
 * Prints the schema a tenant identifier maps to. Needs no database.
 *
 * @module packages/cli/commands/tenant/schema-name
 */

import { deriveSchemaName } from '../../../../provisioner/src/schema-name.js';
import { handleError } from './utils.js';

export interface SchemaNameCommandOptions {
  json?: boolean;
}

export function schemaNameCommand(tenantId: string, options: SchemaNameCommandOptions): void {
  try {
    const schemaName = deriveSchemaName(tenantId);
    if (options.json) {
      console.log(JSON.stringify({ tenantId, schemaName }, null, 2));
    } else {
      console.log(schemaName);
    }
  } catch (error) {
    handleError(error, options.json);
  }
}
