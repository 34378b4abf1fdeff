import type { Counter, Histogram, Meter } from '@opentelemetry/api';

export interface GroupDirectoryMetrics {
  groupsCreatedTotal: Counter;
  groupsDeletedTotal: Counter;
  storeErrorsTotal: Counter;
  resolveDurationMs: Histogram;
}

export function createGroupDirectoryMetrics(meter: Meter, prefix: string): GroupDirectoryMetrics {
  return {
    groupsCreatedTotal: meter.createCounter(`${prefix}_groups_created_total`, {
      description: 'Total number of groups created',
    }),
    groupsDeletedTotal: meter.createCounter(`${prefix}_groups_deleted_total`, {
      description: 'Total number of group deletions committed',
    }),
    storeErrorsTotal: meter.createCounter(`${prefix}_store_errors_total`, {
      description: 'Total number of failed group directory operations by operation',
    }),
    resolveDurationMs: meter.createHistogram(`${prefix}_resolve_duration_ms`, {
      description: 'Duration of batch group resolution for secrets in milliseconds',
      unit: 'ms',
    }),
  };
}
