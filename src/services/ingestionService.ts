import type { Connector, Job, JobStatus, RawAttributes } from '../core/types.js';
import { isTerminalStatus } from '../core/types.js';
import { EnclaveScopeError, JobStateError, UnsupportedSourceTypeError, ValidationError } from '../core/errors.js';
import { ConnectorRepository } from '../repositories/connectorRepository.js';
import { JobRepository } from '../repositories/jobRepository.js';
import { SourceFamilyRegistry } from '../sources/index.js';
import { CONNECTOR_SOURCE_FAMILY, type BatchResult } from '../connectors/index.js';
import { JobRunner } from './jobRunner.js';
import { getLogger } from '../utils/logging.js';
import { ingestBatchesTotal } from '../metrics/index.js';

export interface IngestRequest {
  jobId?: string;
  sourceType?: string;
  records: unknown[];
  /** Discovery time applied to every record; defaults to now. Used for backfills. */
  discoveredAt?: Date;
  /**
   * Close the push job after this batch. Defaults to true for an implicit job
   * and false when appending to an open one.
   */
  complete?: boolean;
}

export interface IngestResult {
  jobId: string;
  findingsCreated: number;
  unresolved: number;
  jobStatus: JobStatus;
}

function isRecord(value: unknown): value is RawAttributes {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Push path for externally collected batches. Routes them through the same
 * job state machine and submitBatch path as connector fetches.
 */
export class IngestionService {
  constructor(
    private readonly runner: JobRunner,
    private readonly connectors = new ConnectorRepository(),
    private readonly jobs = new JobRepository(),
  ) {}

  async ingest(enclaveId: string, connectorId: string, req: IngestRequest): Promise<IngestResult> {
    const connector = await this.connectors.get(connectorId);
    if (connector.enclaveId !== enclaveId) throw new EnclaveScopeError('Connector', connectorId);
    const sourceType = this.resolveSourceType(connector, req.sourceType);
    const records: RawAttributes[] = [];
    req.records.forEach((record, index) => {
      if (!isRecord(record)) throw new ValidationError(`records[${index}] must be an object`);
      records.push(record);
    });

    const result = req.jobId
      ? await this.appendToJob(connector, req.jobId, sourceType, records, req)
      : await this.runImplicitJob(connector, sourceType, records, req);
    getLogger().info(
      {
        jobId: result.jobId,
        connectorId,
        enclaveId,
        mode: req.jobId ? 'append' : 'implicit',
        findings: result.findingsCreated,
        unresolved: result.unresolved,
        jobStatus: result.jobStatus,
      },
      'ingest-accepted',
    );
    return result;
  }

  private resolveSourceType(connector: Connector, requested: string | undefined) {
    const expected = CONNECTOR_SOURCE_FAMILY[connector.type];
    if (requested === undefined) return expected;
    const resolved = SourceFamilyRegistry.resolve(requested);
    if (!resolved) throw new UnsupportedSourceTypeError(requested);
    if (resolved !== expected) {
      throw new ValidationError(`Source type ${resolved} does not match connector type ${connector.type}`);
    }
    return resolved;
  }

  /**
   * Appends to an open job. A push job may be claimed from pending and closed
   * by the caller; a job started by the runner only accepts records while it
   * is running and is finished by the runner.
   */
  private async appendToJob(
    connector: Connector,
    jobId: string,
    sourceType: string,
    records: RawAttributes[],
    req: IngestRequest,
  ): Promise<IngestResult> {
    let job = await this.jobs.get(jobId);
    if (job.connectorId !== connector.id) {
      throw new ValidationError(`Job ${jobId} does not belong to connector ${connector.id}`);
    }
    if (isTerminalStatus(job.status)) throw new JobStateError(jobId, job.status, 'ingest into');
    const pushOwned = job.triggeredBy === 'push';
    if (!pushOwned && job.status === 'pending') throw new JobStateError(jobId, job.status, 'ingest into');
    if (!pushOwned && req.complete) {
      throw new ValidationError(`Job ${jobId} was started by ${job.triggeredBy} and is completed by the runner`);
    }
    if (job.status === 'pending') {
      await this.jobs.claim(jobId);
      job = await this.jobs.get(jobId);
      if (job.status !== 'running') throw new JobStateError(jobId, job.status, 'ingest into');
    }

    const batch = await this.runner.submitBatch(jobId, sourceType, records, { discoveredAt: req.discoveredAt });
    ingestBatchesTotal.inc({ mode: 'append' });
    if (req.complete) {
      const final = await this.runner.finish(jobId, connector, startedMs(job));
      return toResult(final, batch);
    }
    return toResult(job, batch);
  }

  /** Opens a push job, submits the batch, and closes it unless `complete` is false. */
  private async runImplicitJob(
    connector: Connector,
    sourceType: string,
    records: RawAttributes[],
    req: IngestRequest,
  ): Promise<IngestResult> {
    const created = await this.jobs.createIfIdle(connector.id, 'push');
    const started = Date.now();
    if (!(await this.jobs.claim(created.id))) {
      const current = await this.jobs.get(created.id);
      throw new JobStateError(created.id, current.status, 'claim');
    }
    let batch: BatchResult;
    try {
      batch = await this.runner.submitBatch(created.id, sourceType, records, { discoveredAt: req.discoveredAt });
    } catch (err) {
      await this.runner.finish(created.id, connector, started, err);
      throw err;
    }
    ingestBatchesTotal.inc({ mode: 'implicit' });
    if (req.complete === false) return toResult(await this.jobs.get(created.id), batch);
    return toResult(await this.runner.finish(created.id, connector, started), batch);
  }
}

function startedMs(job: Job): number | null {
  return job.startedAt ? job.startedAt.getTime() : null;
}

function toResult(job: Job, batch: BatchResult): IngestResult {
  return { jobId: job.id, findingsCreated: batch.findingsCreated, unresolved: batch.unresolved, jobStatus: job.status };
}
