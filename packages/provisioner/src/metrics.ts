/**
 * Provisioner Metrics
 *
 * Prometheus-compatible metrics for schema provisioning operations.
 *
 * @module packages/provisioner/metrics
 */

import { Counter, Histogram, Registry } from 'prom-client';

// =============================================================================
// Registry
// =============================================================================

/**
 * Provisioner metrics registry
 *
 * Can be merged with an application registry:
 * ```typescript
 * import { register } from 'prom-client';
 * register.merge(provisionerRegistry);
 * ```
 */
export const provisionerRegistry = new Registry();

// =============================================================================
// Operation Metrics
// =============================================================================

export type ProvisionerOperation = 'provision' | 'update' | 'rollback';

export const operationsTotal = new Counter({
  name: 'tenant_schema_operations_total',
  help: 'Total provisioning operations by outcome',
  labelNames: ['operation', 'status'] as const,
  registers: [provisionerRegistry],
});

export const operationDuration = new Histogram({
  name: 'tenant_schema_operation_duration_seconds',
  help: 'Provisioning operation duration in seconds',
  labelNames: ['operation'] as const,
  buckets: [0.1, 0.5, 1, 2, 5, 10, 30],
  registers: [provisionerRegistry],
});

// =============================================================================
// Step Metrics
// =============================================================================

export const stepsApplied = new Counter({
  name: 'tenant_schema_steps_applied_total',
  help: 'Total migration steps applied across tenant schemas',
  registers: [provisionerRegistry],
});

export const stepsReverted = new Counter({
  name: 'tenant_schema_steps_reverted_total',
  help: 'Total migration steps reverted across tenant schemas',
  registers: [provisionerRegistry],
});

// =============================================================================
// Helper Functions
// =============================================================================

/**
 * Record the outcome of a provisioner operation
 */
export function recordOperation(
  operation: ProvisionerOperation,
  status: 'success' | 'failure',
  durationMs: number
): void {
  operationsTotal.inc({ operation, status });
  operationDuration.observe({ operation }, durationMs / 1000);
}
