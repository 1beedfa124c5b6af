/**
 * Provisioner Types - TypeScript type definitions
 *
 * Tenant records, per-schema lifecycle states, ledger shapes and the error
 * taxonomy shared by the provisioner, the admin API and the CLI.
 *
 * @module packages/provisioner/types
 */

// =============================================================================
// Tenant Record
// =============================================================================

/**
 * A tenant mapped 1:1 to a database schema
 */
export interface TenantRecord {
  /** Externally supplied unique identifier */
  tenantId: string;

  /** Display name */
  tenantName: string;

  /** Derived schema name (tenant_{id}), immutable once provisioned */
  schemaName: string;

  /** Toggled by administrative processes; true at provisioning time */
  active: boolean;

  /** Optional free-text description */
  description?: string;
}

/**
 * Tenant record as stored in the registry table
 */
export interface StoredTenantRecord extends TenantRecord {
  createdAt: Date;
  updatedAt: Date;
}

// =============================================================================
// Schema State
// =============================================================================

/**
 * Lifecycle state of a tenant schema
 *
 * State transitions:
 * - unprovisioned → provisioning → ready
 * - ready → migrating → ready (update, re-provision)
 * - ready → reverting → ready (rollback)
 * - provisioning | migrating | reverting → failed
 * - failed → migrating (operator reruns update)
 */
export type SchemaState =
  | 'unprovisioned'
  | 'provisioning'
  | 'ready'
  | 'migrating'
  | 'reverting'
  | 'failed';

/**
 * Valid state transitions
 */
export const VALID_STATE_TRANSITIONS: Record<SchemaState, SchemaState[]> = {
  unprovisioned: ['provisioning'],
  provisioning: ['ready', 'failed'],
  ready: ['migrating', 'reverting'],
  migrating: ['ready', 'failed'],
  reverting: ['ready', 'failed'],
  failed: ['migrating'],
};

// =============================================================================
// Migration Ledger
// =============================================================================

/**
 * Direction a migration step was run in
 */
export type StepDirection = 'up' | 'down';

/**
 * Outcome of one step within a migration run
 */
export interface MigrationStepResult {
  /** Ledger name of the step */
  name: string;

  direction: StepDirection;

  status: 'applied' | 'reverted' | 'failed' | 'skipped';
}

/**
 * One step in the collection with its ledger status for a schema
 */
export interface LedgerEntry {
  name: string;

  /** When the step was applied (null = pending) */
  appliedAt: Date | null;

  /** Whether the step declares a reverse action */
  reversible: boolean;
}

/**
 * Result of a provision or update call
 */
export interface MigrationRunResult {
  schemaName: string;

  /** Steps applied by this call, in order (empty when nothing was pending) */
  applied: string[];

  /** Whether the schema had to be created by this call */
  schemaCreated: boolean;

  durationMs: number;
}

/**
 * Result of a rollbackLast call
 */
export interface RollbackResult {
  schemaName: string;

  /** Step that was reverted */
  reverted: string;

  durationMs: number;
}

// =============================================================================
// Error Types
// =============================================================================

/**
 * Provisioning error codes
 */
export enum ProvisioningErrorCode {
  /** Cannot acquire a database connection */
  CONNECTION_FAILED = 'PROVISION_001',
  /** CREATE SCHEMA failed */
  SCHEMA_CREATION_FAILED = 'PROVISION_002',
  /** A forward migration step failed */
  MIGRATION_FAILED = 'PROVISION_003',
  /** Nothing to revert, no reverse action, or the reverse action failed */
  ROLLBACK_FAILED = 'PROVISION_004',
  /** Schema does not exist */
  SCHEMA_NOT_FOUND = 'PROVISION_005',
  /** Operation not allowed in the schema's current state */
  INVALID_TRANSITION = 'PROVISION_006',
  /** Inbound parameters failed validation */
  INVALID_INPUT = 'PROVISION_007',
  /** Tenant registry read or write failed */
  REGISTRY_FAILED = 'PROVISION_008',
  /** Step collection could not be loaded */
  CHANGELOG_INVALID = 'PROVISION_009',
}

/**
 * Cannot acquire a database connection
 */
export class ConnectionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConnectionError';
  }
}

/**
 * The CREATE SCHEMA statement failed
 */
export class SchemaCreationError extends Error {
  constructor(
    public readonly schemaName: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'SchemaCreationError';
  }
}

/**
 * A forward step failed mid-sequence
 *
 * `applied` lists the steps that completed before the failure; they stay in
 * place.
 */
export class MigrationStepError extends Error {
  constructor(
    public readonly stepName: string | null,
    public readonly applied: string[],
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'MigrationStepError';
  }
}

/**
 * No applied step to revert, no reverse action, or the reverse action failed
 */
export class RollbackError extends Error {
  constructor(
    public readonly stepName: string | null,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'RollbackError';
  }
}

/**
 * update / rollback targeted a schema that does not exist
 */
export class SchemaNotFoundError extends Error {
  constructor(public readonly schemaName: string) {
    super(`Schema '${schemaName}' does not exist`);
    this.name = 'SchemaNotFoundError';
  }
}

/**
 * Operation not permitted from the schema's current state
 */
export class InvalidTransitionError extends Error {
  constructor(
    public readonly schemaName: string,
    public readonly from: SchemaState,
    public readonly to: SchemaState
  ) {
    super(`Schema '${schemaName}' cannot move from ${from} to ${to}`);
    this.name = 'InvalidTransitionError';
  }
}

/**
 * The step collection is malformed or unreadable
 */
export class ChangelogError extends Error {
  constructor(
    public readonly source: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ChangelogError';
  }
}

/**
 * Boundary error carrying the tenant identifier and the underlying cause
 */
export class ProvisioningError extends Error {
  public readonly schemaName: string | undefined;

  constructor(
    public readonly code: ProvisioningErrorCode,
    public readonly tenantId: string,
    message: string,
    options: { cause?: unknown; schemaName?: string } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = 'ProvisioningError';
    this.schemaName = options.schemaName;
  }
}

/**
 * Maps a cause to the boundary error code
 */
export function errorCodeFor(cause: unknown): ProvisioningErrorCode {
  if (cause instanceof ConnectionError) return ProvisioningErrorCode.CONNECTION_FAILED;
  if (cause instanceof SchemaCreationError) return ProvisioningErrorCode.SCHEMA_CREATION_FAILED;
  if (cause instanceof RollbackError) return ProvisioningErrorCode.ROLLBACK_FAILED;
  if (cause instanceof SchemaNotFoundError) return ProvisioningErrorCode.SCHEMA_NOT_FOUND;
  if (cause instanceof InvalidTransitionError) return ProvisioningErrorCode.INVALID_TRANSITION;
  if (cause instanceof ChangelogError) return ProvisioningErrorCode.CHANGELOG_INVALID;
  return ProvisioningErrorCode.MIGRATION_FAILED;
}

/**
 * Extracts a printable message from an unknown thrown value
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
