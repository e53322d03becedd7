import { Counter, Histogram, Gauge, Registry, collectDefaultMetrics } from 'prom-client';

export const registry = new Registry();
collectDefaultMetrics({ register: registry });

// Terminal job outcomes (status=completed|failed)
export const jobsTotal = new Counter({
  name: 'jobs_total',
  help: 'Total connector jobs that reached a terminal status',
  labelNames: ['status'] as const,
  registers: [registry],
});

export const jobDurationSeconds = new Histogram({
  name: 'job_duration_seconds',
  help: 'Wall time from job start to terminal status (seconds)',
  buckets: [0.05, 0.25, 1, 5, 15, 60, 300, 900],
  registers: [registry],
});

export const findingsRecordedTotal = new Counter({
  name: 'findings_recorded_total',
  help: 'Raw findings appended to the finding store',
  labelNames: ['source_type'] as const,
  registers: [registry],
});

export const findingsUnresolvedTotal = new Counter({
  name: 'findings_unresolved_total',
  help: 'Findings that could not be fingerprinted',
  labelNames: ['source_type'] as const,
  registers: [registry],
});

// action=created|updated
export const identitiesUpsertedTotal = new Counter({
  name: 'identities_upserted_total',
  help: 'Identity inserts and merges performed by normalization',
  labelNames: ['action'] as const,
  registers: [registry],
});

export const storageConflictRetriesTotal = new Counter({
  name: 'storage_conflict_retries_total',
  help: 'Normalization retries after a concurrent write on the same fingerprint',
  registers: [registry],
});

// mode=implicit|append
export const ingestBatchesTotal = new Counter({
  name: 'ingest_batches_total',
  help: 'Pushed ingest batches accepted',
  labelNames: ['mode'] as const,
  registers: [registry],
});

// Scheduler last tick (unix seconds)
export const schedulerLastTickSeconds = new Gauge({
  name: 'scheduler_last_tick_seconds',
  help: 'Unix timestamp (seconds) of the last scheduler tick',
  registers: [registry],
});
