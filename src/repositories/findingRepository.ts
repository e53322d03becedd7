import { randomUUID } from 'crypto';
import { getDb, type Db, type Row } from '../db/client.js';
import { isSourceType, type Finding, type RawAttributes, type SourceType, type UnresolvedFinding } from '../core/types.js';
import { contentHash } from '../utils/canonical.js';
import { RepositoryError, wrapStorageError } from './errors.js';
import { int, parseJsonObject, text, toDate } from './rows.js';

type FindingRow = {
  id: string;
  seq: number;
  job_id: string;
  connector_id: string;
  enclave_id: string;
  source_type: string;
  raw_json: string;
  content_hash: string;
  discovered_at: string;
};

function map(row: Row): Finding {
  const id = text(row, 'id');
  const sourceType = text(row, 'source_type');
  if (!isSourceType(sourceType)) {
    throw new RepositoryError(`Finding ${id} has unknown source type ${sourceType}`);
  }
  return {
    id,
    jobId: text(row, 'job_id'),
    connectorId: text(row, 'connector_id'),
    enclaveId: text(row, 'enclave_id'),
    sourceType,
    rawAttributes: parseJsonObject(text(row, 'raw_json')),
    contentHash: text(row, 'content_hash'),
    discoveredAt: toDate(text(row, 'discovered_at')),
    sequence: int(row, 'seq'),
  };
}

export interface RecordFindingInput {
  jobId: string;
  connectorId: string;
  enclaveId: string;
  sourceType: SourceType;
  rawAttributes: RawAttributes;
  discoveredAt?: Date;
}

/** Append-only ledger of raw connector records. */
export class FindingRepository {
  constructor(private readonly db: Db = getDb()) {}

  async record(input: RecordFindingInput): Promise<Finding> {
    const [finding] = await this.recordBatch([input]);
    return finding;
  }

  /** Records the batch in one transaction; sequence numbers follow input order. */
  async recordBatch(inputs: RecordFindingInput[]): Promise<Finding[]> {
    if (inputs.length === 0) return [];
    const insert = this.db.prepare(
      `INSERT INTO findings (id, seq, job_id, connector_id, enclave_id, source_type, raw_json, content_hash, discovered_at)
       VALUES (@id, @seq, @job_id, @connector_id, @enclave_id, @source_type, @raw_json, @content_hash, @discovered_at)`,
    );
    const nextSeq = this.db.prepare('SELECT COALESCE(MAX(seq), 0) + 1 AS seq FROM findings');
    try {
      return this.db.transaction(() => {
        const next = nextSeq.get();
        const start = next ? int(next, 'seq') : 1;
        const now = new Date();
        return inputs.map((input, i) => {
          const row: FindingRow = {
            id: randomUUID(),
            seq: start + i,
            job_id: input.jobId,
            connector_id: input.connectorId,
            enclave_id: input.enclaveId,
            source_type: input.sourceType,
            raw_json: JSON.stringify(input.rawAttributes),
            content_hash: contentHash(input.rawAttributes),
            discovered_at: (input.discoveredAt ?? now).toISOString(),
          };
          insert.run(row);
          return map(row);
        });
      });
    } catch (err) {
      throw wrapStorageError('Failed to record findings', err);
    }
  }

  /** Discovery order. */
  async listByJob(jobId: string): Promise<Finding[]> {
    try {
      const rows = this.db
        .prepare('SELECT * FROM findings WHERE job_id = ? ORDER BY discovered_at ASC, seq ASC')
        .all(jobId);
      return rows.map(map);
    } catch (err) {
      throw wrapStorageError(`Failed to list findings for job ${jobId}`, err);
    }
  }

  async markUnresolved(findingId: string, jobId: string, reason: string): Promise<boolean> {
    try {
      const result = this.db
        .prepare(
          `INSERT OR IGNORE INTO unresolved_findings (finding_id, job_id, reason, recorded_at)
           VALUES (?, ?, ?, ?)`,
        )
        .run(findingId, jobId, reason, new Date().toISOString());
      return result.changes === 1;
    } catch (err) {
      throw wrapStorageError(`Failed to mark finding ${findingId} unresolved`, err);
    }
  }

  async listUnresolvedByJob(jobId: string): Promise<UnresolvedFinding[]> {
    try {
      const rows = this.db
        .prepare(
          `SELECT u.* FROM unresolved_findings u
           JOIN findings f ON f.id = u.finding_id
           WHERE u.job_id = ? ORDER BY f.seq ASC`,
        )
        .all(jobId);
      return rows.map((row) => ({
        findingId: text(row, 'finding_id'),
        jobId: text(row, 'job_id'),
        reason: text(row, 'reason'),
        recordedAt: toDate(text(row, 'recorded_at')),
      }));
    } catch (err) {
      throw wrapStorageError(`Failed to list unresolved findings for job ${jobId}`, err);
    }
  }
}
