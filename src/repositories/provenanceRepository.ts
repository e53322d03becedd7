import { getDb, type Db, type Row } from '../db/client.js';
import { isSourceType, type Finding, type Page, type ProvenanceLink } from '../core/types.js';
import { RepositoryError, wrapStorageError } from './errors.js';
import { clampLimit, clampOffset, int, parseJsonObject, text, toDate } from './rows.js';

export interface ProvenanceEntry extends ProvenanceLink {
  finding: Finding;
}

export interface LinkInput {
  identityId: string;
  findingId: string;
  jobId: string;
  discoveredAt: Date;
  attributesChanged: boolean;
}

function mapLink(row: Row): ProvenanceLink {
  return {
    identityId: text(row, 'identity_id'),
    findingId: text(row, 'finding_id'),
    jobId: text(row, 'job_id'),
    discoveredAt: toDate(text(row, 'discovered_at')),
    attributesChanged: int(row, 'attributes_changed') === 1,
    linkedAt: toDate(text(row, 'linked_at')),
  };
}

/** Rows from the link/finding join, finding columns prefixed with `f_`. */
function mapEntry(row: Row): ProvenanceEntry {
  const link = mapLink(row);
  const sourceType = text(row, 'f_source_type');
  if (!isSourceType(sourceType)) {
    throw new RepositoryError(`Finding ${link.findingId} has unknown source type ${sourceType}`);
  }
  return {
    ...link,
    finding: {
      id: link.findingId,
      jobId: link.jobId,
      connectorId: text(row, 'f_connector_id'),
      enclaveId: text(row, 'f_enclave_id'),
      sourceType,
      rawAttributes: parseJsonObject(text(row, 'f_raw_json')),
      contentHash: text(row, 'f_content_hash'),
      discoveredAt: toDate(text(row, 'f_discovered_at')),
      sequence: int(row, 'f_seq'),
    },
  };
}

export class ProvenanceRepository {
  constructor(private readonly db: Db = getDb()) {}

  /** Idempotent on (identity, finding). Returns true when a new link was written. */
  async link(input: LinkInput): Promise<boolean> {
    try {
      const result = this.db
        .prepare(
          `INSERT OR IGNORE INTO provenance_links (identity_id, finding_id, job_id, discovered_at, attributes_changed, linked_at)
           VALUES (?, ?, ?, ?, ?, ?)`,
        )
        .run(
          input.identityId,
          input.findingId,
          input.jobId,
          input.discoveredAt.toISOString(),
          input.attributesChanged ? 1 : 0,
          new Date().toISOString(),
        );
      return result.changes === 1;
    } catch (err) {
      throw wrapStorageError(`Failed to link finding ${input.findingId} to identity ${input.identityId}`, err);
    }
  }

  /** Links with their findings, ordered by discovery time then finding sequence. */
  async listByIdentity(identityId: string, page: Page = {}): Promise<ProvenanceEntry[]> {
    try {
      const rows = this.db
        .prepare(
          `SELECT p.*, f.seq AS f_seq, f.connector_id AS f_connector_id, f.enclave_id AS f_enclave_id,
             f.source_type AS f_source_type, f.raw_json AS f_raw_json, f.content_hash AS f_content_hash,
             f.discovered_at AS f_discovered_at
           FROM provenance_links p
           JOIN findings f ON f.id = p.finding_id
           WHERE p.identity_id = ?
           ORDER BY p.discovered_at ASC, f.seq ASC
           LIMIT ? OFFSET ?`,
        )
        .all(identityId, clampLimit(page.limit), clampOffset(page.offset));
      return rows.map(mapEntry);
    } catch (err) {
      throw wrapStorageError(`Failed to list provenance for identity ${identityId}`, err);
    }
  }

  async countByIdentity(identityId: string): Promise<number> {
    try {
      const row = this.db
        .prepare('SELECT COUNT(*) AS n FROM provenance_links WHERE identity_id = ?')
        .get(identityId);
      return row ? int(row, 'n') : 0;
    } catch (err) {
      throw wrapStorageError(`Failed to count provenance for identity ${identityId}`, err);
    }
  }
}
