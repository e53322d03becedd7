import { randomUUID } from 'crypto';
import { getDb, type Db, type Row } from '../db/client.js';
import { isJobStatus, isJobTrigger, type Job, type JobTrigger, type Page } from '../core/types.js';
import { DuplicateJobInProgressError, JobStateError } from '../core/errors.js';
import { NotFoundError, RepositoryError, isUniqueViolation, wrapStorageError } from './errors.js';
import { clampLimit, clampOffset, int, text, textOrNull, toDate, toDateOrNull } from './rows.js';

function map(row: Row): Job {
  const id = text(row, 'id');
  const status = text(row, 'status');
  const triggeredBy = text(row, 'triggered_by');
  if (!isJobStatus(status) || !isJobTrigger(triggeredBy)) {
    throw new RepositoryError(`Job ${id} has an unknown status or trigger`);
  }
  return {
    id,
    connectorId: text(row, 'connector_id'),
    status,
    triggeredBy,
    createdAt: toDate(text(row, 'created_at')),
    startedAt: toDateOrNull(textOrNull(row, 'started_at')),
    completedAt: toDateOrNull(textOrNull(row, 'completed_at')),
    findingsCount: int(row, 'findings_count'),
    unresolvedCount: int(row, 'unresolved_count'),
    identitiesCreated: int(row, 'identities_created'),
    identitiesUpdated: int(row, 'identities_updated'),
    errorMessage: textOrNull(row, 'error_message'),
  };
}

export interface JobProgress {
  findings: number;
  unresolved: number;
  created: number;
  updated: number;
}

export class JobRepository {
  constructor(private readonly db: Db = getDb()) {}

  /**
   * Inserts a pending job unless the connector already has a pending or
   * running one. The partial unique index catches writers racing past the
   * NOT EXISTS check.
   */
  async createIfIdle(connectorId: string, triggeredBy: JobTrigger): Promise<Job> {
    const id = randomUUID();
    const now = new Date().toISOString();
    let inserted: boolean;
    try {
      const result = this.db
        .prepare(
          `INSERT INTO jobs (id, connector_id, status, triggered_by, created_at)
           SELECT @id, @connector_id, 'pending', @triggered_by, @created_at
           WHERE NOT EXISTS (
             SELECT 1 FROM jobs WHERE connector_id = @connector_id AND status IN ('pending', 'running')
           )`,
        )
        .run({ id, connector_id: connectorId, triggered_by: triggeredBy, created_at: now });
      inserted = result.changes === 1;
    } catch (err) {
      if (!isUniqueViolation(err)) throw wrapStorageError(`Failed to create job for connector ${connectorId}`, err);
      inserted = false;
    }
    if (!inserted) {
      const active = await this.findActive(connectorId);
      throw new DuplicateJobInProgressError(connectorId, active?.id ?? null);
    }
    return this.get(id);
  }

  async get(id: string): Promise<Job> {
    try {
      const row = this.db.prepare('SELECT * FROM jobs WHERE id = ?').get(id);
      if (!row) throw new NotFoundError(`Job ${id} not found`);
      return map(row);
    } catch (err) {
      throw wrapStorageError(`Failed to get job ${id}`, err);
    }
  }

  async findActive(connectorId: string): Promise<Job | null> {
    try {
      const row = this.db
        .prepare(
          `SELECT * FROM jobs WHERE connector_id = ? AND status IN ('pending', 'running') LIMIT 1`,
        )
        .get(connectorId);
      return row ? map(row) : null;
    } catch (err) {
      throw wrapStorageError(`Failed to find active job for connector ${connectorId}`, err);
    }
  }

  /** Newest first. */
  async listByConnector(connectorId: string, page: Page = {}): Promise<Job[]> {
    try {
      const rows = this.db
        .prepare(
          `SELECT * FROM jobs WHERE connector_id = ?
           ORDER BY created_at DESC, rowid DESC LIMIT ? OFFSET ?`,
        )
        .all(connectorId, clampLimit(page.limit), clampOffset(page.offset));
      return rows.map(map);
    } catch (err) {
      throw wrapStorageError(`Failed to list jobs for connector ${connectorId}`, err);
    }
  }

  async listPending(): Promise<Job[]> {
    try {
      const rows = this.db
        .prepare(`SELECT * FROM jobs WHERE status = 'pending' ORDER BY created_at ASC`)
        .all();
      return rows.map(map);
    } catch (err) {
      throw wrapStorageError('Failed to list pending jobs', err);
    }
  }

  /** pending -> running. Returns false when another runner claimed it first. */
  async claim(id: string): Promise<boolean> {
    try {
      const result = this.db
        .prepare(`UPDATE jobs SET status = 'running', started_at = ? WHERE id = ? AND status = 'pending'`)
        .run(new Date().toISOString(), id);
      return result.changes === 1;
    } catch (err) {
      throw wrapStorageError(`Failed to claim job ${id}`, err);
    }
  }

  async addProgress(id: string, progress: JobProgress): Promise<void> {
    try {
      const result = this.db
        .prepare(
          `UPDATE jobs SET
             findings_count = findings_count + @findings,
             unresolved_count = unresolved_count + @unresolved,
             identities_created = identities_created + @created,
             identities_updated = identities_updated + @updated
           WHERE id = @id AND status = 'running'`,
        )
        .run({ id, ...progress });
      if (result.changes === 0) await this.rejectTransition(id, 'update');
    } catch (err) {
      throw wrapStorageError(`Failed to record progress for job ${id}`, err);
    }
  }

  /** running -> completed */
  async complete(id: string): Promise<Job> {
    try {
      const result = this.db
        .prepare(`UPDATE jobs SET status = 'completed', completed_at = ? WHERE id = ? AND status = 'running'`)
        .run(new Date().toISOString(), id);
      if (result.changes === 0) await this.rejectTransition(id, 'complete');
      return this.get(id);
    } catch (err) {
      throw wrapStorageError(`Failed to complete job ${id}`, err);
    }
  }

  /** pending|running -> failed */
  async fail(id: string, errorMessage: string): Promise<Job> {
    try {
      const result = this.db
        .prepare(
          `UPDATE jobs SET status = 'failed', completed_at = ?, error_message = ?
           WHERE id = ? AND status IN ('pending', 'running')`,
        )
        .run(new Date().toISOString(), errorMessage, id);
      if (result.changes === 0) await this.rejectTransition(id, 'fail');
      return this.get(id);
    } catch (err) {
      throw wrapStorageError(`Failed to fail job ${id}`, err);
    }
  }

  /** Fails non-terminal jobs whose start (or creation, if never started) is before the cutoff. */
  async failStale(cutoff: Date, errorMessage: string): Promise<Job[]> {
    const cutoffIso = cutoff.toISOString();
    try {
      const stale = this.db
        .prepare(
          `SELECT * FROM jobs
           WHERE status IN ('pending', 'running') AND COALESCE(started_at, created_at) < ?`,
        )
        .all(cutoffIso);
      const failed: Job[] = [];
      const now = new Date().toISOString();
      const stmt = this.db.prepare(
        `UPDATE jobs SET status = 'failed', completed_at = ?, error_message = ?
         WHERE id = ? AND status IN ('pending', 'running')`,
      );
      for (const row of stale) {
        if (stmt.run(now, errorMessage, text(row, 'id')).changes === 1) {
          failed.push(map({ ...row, status: 'failed', completed_at: now, error_message: errorMessage }));
        }
      }
      return failed;
    } catch (err) {
      throw wrapStorageError('Failed to fail stale jobs', err);
    }
  }

  private async rejectTransition(id: string, action: string): Promise<never> {
    const job = await this.get(id);
    throw new JobStateError(id, job.status, action);
  }
}
