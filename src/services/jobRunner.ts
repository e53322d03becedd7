import { EventBus } from '../events/eventBus.js';
import type { Connector, Job, JobTrigger, RawAttributes } from '../core/types.js';
import {
  EnclaveScopeError,
  JobStateError,
  JobTimeoutError,
  UnsupportedSourceTypeError,
  ValidationError,
} from '../core/errors.js';
import { JobRepository } from '../repositories/jobRepository.js';
import { ConnectorRepository } from '../repositories/connectorRepository.js';
import { FindingRepository } from '../repositories/findingRepository.js';
import { SourceFamilyRegistry } from '../sources/index.js';
import {
  CONNECTOR_SOURCE_FAMILY,
  createDefaultFetchers,
  deepFreeze,
  dispatchFetch,
  errorMessage,
  parseConnectorConfig,
  type BatchResult,
  type ConnectorFetchers,
} from '../connectors/index.js';
import { NormalizationEngine } from './normalizationEngine.js';
import { loadConfig } from '../config/index.js';
import { getLogger } from '../utils/logging.js';
import { findingsRecordedTotal, jobDurationSeconds, jobsTotal } from '../metrics/index.js';

export interface JobEvents {
  [k: string]: unknown;
  jobStarted: { job: Job; connector: Connector };
  jobCompleted: { job: Job; connector: Connector; durationMs: number };
  jobFailed: { job: Job; connector: Connector; error: string; durationMs: number | null };
}

export interface RunHandle {
  /** The job as created (pending). */
  job: Job;
  /** Resolves with the terminal job. Never rejects; failures are recorded on the job. */
  done: Promise<Job>;
}

export interface SubmitOptions {
  discoveredAt?: Date;
}

export interface JobRunnerOptions {
  jobs?: JobRepository;
  connectors?: ConnectorRepository;
  findings?: FindingRepository;
  engine?: NormalizationEngine;
  fetchers?: Partial<ConnectorFetchers>;
  bus?: EventBus<JobEvents>;
  timeoutMs?: number;
  staleAfterMs?: number;
}

export const ABANDONED_MESSAGE = 'abandoned: runner stopped before completion';

/**
 * Per-connector job state machine. Serialization comes from the storage-level
 * conditional insert; this class only drives jobs it has claimed.
 */
export class JobRunner {
  private readonly jobs: JobRepository;
  private readonly connectors: ConnectorRepository;
  private readonly findings: FindingRepository;
  private readonly engine: NormalizationEngine;
  private readonly fetchers: ConnectorFetchers;
  private readonly bus: EventBus<JobEvents>;
  private readonly timeoutMs: number;
  private readonly staleAfterMs: number;
  private readonly controllers = new Map<string, AbortController>();
  private readonly inflight = new Map<string, Promise<Job>>();
  private completedCount = 0;
  private failedCount = 0;
  private lastFinishedAt: Date | null = null;

  constructor(opts: JobRunnerOptions = {}) {
    const cfg = loadConfig();
    this.jobs = opts.jobs ?? new JobRepository();
    this.connectors = opts.connectors ?? new ConnectorRepository();
    this.findings = opts.findings ?? new FindingRepository();
    this.engine = opts.engine ?? new NormalizationEngine({ jobs: this.jobs, connectors: this.connectors });
    this.fetchers = createDefaultFetchers(opts.fetchers);
    this.bus = opts.bus ?? new EventBus<JobEvents>();
    this.timeoutMs = opts.timeoutMs ?? cfg.jobs.timeoutMs;
    this.staleAfterMs = opts.staleAfterMs ?? cfg.jobs.staleAfterMs;

    this.bus.on('jobStarted', ({ job, connector }) => {
      getLogger().info(
        { jobId: job.id, connectorId: connector.id, enclaveId: connector.enclaveId, triggeredBy: job.triggeredBy },
        'job-started',
      );
    });
    this.bus.on('jobCompleted', ({ job, connector, durationMs }) => {
      this.completedCount += 1;
      this.lastFinishedAt = new Date();
      jobsTotal.inc({ status: 'completed' });
      jobDurationSeconds.observe(durationMs / 1000);
      getLogger().info(
        {
          jobId: job.id,
          connectorId: connector.id,
          enclaveId: connector.enclaveId,
          findings: job.findingsCount,
          unresolved: job.unresolvedCount,
          created: job.identitiesCreated,
          updated: job.identitiesUpdated,
          durationMs,
        },
        'job-completed',
      );
    });
    this.bus.on('jobFailed', ({ job, connector, error, durationMs }) => {
      this.failedCount += 1;
      this.lastFinishedAt = new Date();
      jobsTotal.inc({ status: 'failed' });
      if (durationMs !== null) jobDurationSeconds.observe(durationMs / 1000);
      getLogger().warn(
        { jobId: job.id, connectorId: connector.id, enclaveId: connector.enclaveId, error, durationMs },
        'job-failed',
      );
    });
  }

  get eventBus() {
    return this.bus;
  }

  /**
   * Creates a pending job and starts it in the background.
   * @throws DuplicateJobInProgressError when the connector already has a pending or running job
   */
  async requestRun(enclaveId: string, connectorId: string, triggeredBy: JobTrigger = 'manual'): Promise<RunHandle> {
    const connector = await this.connectors.get(connectorId);
    if (connector.enclaveId !== enclaveId) throw new EnclaveScopeError('Connector', connectorId);
    const job = await this.jobs.createIfIdle(connectorId, triggeredBy);
    getLogger().debug({ jobId: job.id, connectorId, triggeredBy }, 'job-requested');
    return { job, done: this.track(job) };
  }

  /**
   * Claims a pending job and runs its connector's fetch to a terminal status.
   * A job already claimed elsewhere is returned as found.
   */
  async execute(jobId: string): Promise<Job> {
    const claimed = await this.jobs.claim(jobId);
    if (!claimed) {
      getLogger().debug({ jobId }, 'job-already-claimed');
      return this.jobs.get(jobId);
    }
    const started = Date.now();
    const job = await this.jobs.get(jobId);
    const connector = await this.connectors.get(job.connectorId, { includeDeleted: true });
    const controller = new AbortController();
    this.controllers.set(jobId, controller);
    const timer = setTimeout(() => controller.abort(new JobTimeoutError(this.timeoutMs)), this.timeoutMs);
    try {
      const typed = deepFreeze(parseConnectorConfig(connector.type, connector.config));
      await this.bus.emit('jobStarted', { job, connector });
      await this.raceAbort(
        dispatchFetch(this.fetchers, typed, {
          jobId,
          connector: deepFreeze(structuredClone(connector)),
          signal: controller.signal,
          submitBatch: (sourceType, records) => this.submitBatch(jobId, sourceType, records),
          logger: getLogger(),
        }),
        controller.signal,
      );
      controller.signal.throwIfAborted();
      return await this.finish(jobId, connector, started);
    } catch (err) {
      return this.finish(jobId, connector, started, err);
    } finally {
      clearTimeout(timer);
      this.controllers.delete(jobId);
    }
  }

  /**
   * The only path from fetched records to storage: append findings, normalize
   * them, add the counts to the job.
   */
  async submitBatch(
    jobId: string,
    sourceType: string,
    records: RawAttributes[],
    opts: SubmitOptions = {},
  ): Promise<BatchResult> {
    this.controllers.get(jobId)?.signal.throwIfAborted();
    const job = await this.jobs.get(jobId);
    if (job.status !== 'running') throw new JobStateError(jobId, job.status, 'submit findings to');
    const connector = await this.connectors.get(job.connectorId, { includeDeleted: true });
    const resolved = SourceFamilyRegistry.resolve(sourceType);
    if (!resolved) throw new UnsupportedSourceTypeError(sourceType);
    const expected = CONNECTOR_SOURCE_FAMILY[connector.type];
    if (resolved !== expected) {
      throw new ValidationError(`Source type ${resolved} does not match connector type ${connector.type}`);
    }

    const findings = await this.findings.recordBatch(
      records.map((rawAttributes) => ({
        jobId,
        connectorId: connector.id,
        enclaveId: connector.enclaveId,
        sourceType: resolved,
        rawAttributes,
        discoveredAt: opts.discoveredAt,
      })),
    );
    if (findings.length > 0) findingsRecordedTotal.inc({ source_type: resolved }, findings.length);
    // Recorded findings count toward the job even if normalization fails below
    await this.jobs.addProgress(jobId, { findings: findings.length, unresolved: 0, created: 0, updated: 0 });
    const result = await this.engine.normalizeFindings(connector.enclaveId, findings);
    await this.jobs.addProgress(jobId, {
      findings: 0,
      unresolved: result.unresolved,
      created: result.created,
      updated: result.updated,
    });
    getLogger().debug(
      { jobId, connectorId: connector.id, findings: findings.length, unresolved: result.unresolved },
      'batch-submitted',
    );
    return {
      findingsCreated: findings.length,
      unresolved: result.unresolved,
      created: result.created,
      updated: result.updated,
    };
  }

  /**
   * Moves a running job to its terminal status, records the outcome on the
   * connector and emits the lifecycle event. An error argument means failure.
   */
  async finish(jobId: string, connector: Connector, startedMs: number | null, error?: unknown): Promise<Job> {
    const durationMs = startedMs === null ? null : Date.now() - startedMs;
    let final: Job;
    if (error === undefined) {
      final = await this.jobs.complete(jobId);
      await this.connectors.recordRun(connector.id, new Date(), final.status);
      await this.bus.emit('jobCompleted', { job: final, connector, durationMs: durationMs ?? 0 });
      return final;
    }
    const message = errorMessage(error);
    final = await this.jobs.fail(jobId, message);
    await this.connectors.recordRun(connector.id, new Date(), final.status);
    await this.bus.emit('jobFailed', { job: final, connector, error: message, durationMs });
    return final;
  }

  /** Starts pending jobs left by other processes. Returns how many were started. */
  async runPending(): Promise<number> {
    const pending = await this.jobs.listPending();
    let started = 0;
    for (const job of pending) {
      if (this.inflight.has(job.id)) continue;
      void this.track(job);
      started += 1;
    }
    return started;
  }

  /** Fails non-terminal jobs older than the threshold so a crashed runner cannot block a connector. */
  async failStaleJobs(olderThanMs: number = this.staleAfterMs): Promise<Job[]> {
    const cutoff = new Date(Date.now() - olderThanMs);
    const stale = await this.jobs.failStale(cutoff, ABANDONED_MESSAGE);
    for (const job of stale) {
      this.controllers.get(job.id)?.abort(new JobStateError(job.id, 'failed', 'continue'));
      const connector = await this.connectors.get(job.connectorId, { includeDeleted: true });
      await this.connectors.recordRun(connector.id, new Date(), 'failed');
      await this.bus.emit('jobFailed', { job, connector, error: ABANDONED_MESSAGE, durationMs: null });
    }
    return stale;
  }

  /** Resolves once every job started by this runner has settled. */
  async idle(): Promise<void> {
    while (this.inflight.size > 0) {
      await Promise.all(this.inflight.values());
    }
  }

  // Health info snapshot
  info() {
    return {
      activeJobs: this.inflight.size,
      completed: this.completedCount,
      failed: this.failedCount,
      lastJobFinishedAt: this.lastFinishedAt?.toISOString() ?? null,
      timeoutMs: this.timeoutMs,
    };
  }

  private track(job: Job): Promise<Job> {
    const done = this.execute(job.id)
      .catch(async (err: unknown) => {
        getLogger().error({ err, jobId: job.id }, 'job-execution-error');
        try {
          return await this.jobs.get(job.id);
        } catch (getErr) {
          getLogger().error({ err: getErr, jobId: job.id }, 'job-reload-failed');
          return job;
        }
      })
      .finally(() => this.inflight.delete(job.id));
    this.inflight.set(job.id, done);
    return done;
  }

  private raceAbort(work: Promise<void>, signal: AbortSignal): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const onAbort = () => reject(signal.reason);
      signal.addEventListener('abort', onAbort, { once: true });
      work.then(
        () => {
          signal.removeEventListener('abort', onAbort);
          resolve();
        },
        (err: unknown) => {
          signal.removeEventListener('abort', onAbort);
          if (signal.aborted) {
            getLogger().debug({ err }, 'fetch-settled-after-abort');
          }
          reject(err);
        },
      );
    });
  }
}
