import { randomUUID } from 'crypto';
import { getDb, type Db, type Row } from '../db/client.js';
import {
  isIdentityType,
  isSourceType,
  type Identity,
  type IdentityAttributes,
  type IdentityType,
  type Page,
  type RiskFactor,
  type SourceType,
} from '../core/types.js';
import { NotFoundError, RepositoryError, StorageConflictError, isUniqueViolation, wrapStorageError } from './errors.js';
import { clampLimit, clampOffset, int, parseJsonObject, parseRiskFactors, text, textOrNull, toDate } from './rows.js';

type IdentityRow = {
  id: string;
  enclave_id: string;
  fingerprint: string;
  identity_type: string;
  source_type: string;
  display_name: string;
  owner: string | null;
  linked_system: string | null;
  risk_score: number;
  risk_factors_json: string;
  attributes_json: string;
  first_seen: string;
  last_seen: string;
  attributes_observed_at: string;
  version: number;
  created_at: string;
  updated_at: string;
};

function map(row: Row): Identity {
  const id = text(row, 'id');
  const identityType = text(row, 'identity_type');
  const sourceType = text(row, 'source_type');
  if (!isIdentityType(identityType) || !isSourceType(sourceType)) {
    throw new RepositoryError(`Identity ${id} has an unknown identity or source type`);
  }
  return {
    id,
    enclaveId: text(row, 'enclave_id'),
    fingerprint: text(row, 'fingerprint'),
    identityType,
    sourceType,
    displayName: text(row, 'display_name'),
    owner: textOrNull(row, 'owner'),
    linkedSystem: textOrNull(row, 'linked_system'),
    riskScore: int(row, 'risk_score'),
    riskFactors: parseRiskFactors(text(row, 'risk_factors_json')),
    attributes: parseJsonObject(text(row, 'attributes_json')),
    firstSeen: toDate(text(row, 'first_seen')),
    lastSeen: toDate(text(row, 'last_seen')),
    attributesObservedAt: toDate(text(row, 'attributes_observed_at')),
    version: int(row, 'version'),
    createdAt: toDate(text(row, 'created_at')),
    updatedAt: toDate(text(row, 'updated_at')),
  };
}

export interface InsertIdentityInput {
  enclaveId: string;
  fingerprint: string;
  identityType: IdentityType;
  sourceType: SourceType;
  displayName: string;
  attributes: IdentityAttributes;
  riskScore: number;
  riskFactors: RiskFactor[];
  discoveredAt: Date;
}

/** Fields the normalization merge may change. owner and linkedSystem are not among them. */
export interface ObservedUpdate {
  displayName: string;
  attributes: IdentityAttributes;
  riskScore: number;
  riskFactors: RiskFactor[];
  firstSeen: Date;
  lastSeen: Date;
  attributesObservedAt: Date;
}

export interface EnrichmentUpdate {
  owner: string | null;
  linkedSystem: string | null;
  riskScore: number;
  riskFactors: RiskFactor[];
}

export interface IdentityFilters extends Page {
  identityType?: IdentityType;
  owner?: string;
  linkedSystem?: string;
  search?: string;
  minRisk?: number;
  maxRisk?: number;
}

export class IdentityRepository {
  constructor(private readonly db: Db = getDb()) {}

  async findByFingerprint(enclaveId: string, fingerprint: string): Promise<Identity | null> {
    try {
      const row = this.db
        .prepare('SELECT * FROM identities WHERE enclave_id = ? AND fingerprint = ?')
        .get(enclaveId, fingerprint);
      return row ? map(row) : null;
    } catch (err) {
      throw wrapStorageError(`Failed to look up identity ${fingerprint}`, err);
    }
  }

  async get(id: string): Promise<Identity> {
    try {
      const row = this.db.prepare('SELECT * FROM identities WHERE id = ?').get(id);
      if (!row) throw new NotFoundError(`Identity ${id} not found`);
      return map(row);
    } catch (err) {
      throw wrapStorageError(`Failed to get identity ${id}`, err);
    }
  }

  /** @throws StorageConflictError when the fingerprint already exists in the enclave */
  async insert(data: InsertIdentityInput): Promise<Identity> {
    const now = new Date().toISOString();
    const seen = data.discoveredAt.toISOString();
    const row: IdentityRow = {
      id: randomUUID(),
      enclave_id: data.enclaveId,
      fingerprint: data.fingerprint,
      identity_type: data.identityType,
      source_type: data.sourceType,
      display_name: data.displayName,
      owner: null,
      linked_system: null,
      risk_score: data.riskScore,
      risk_factors_json: JSON.stringify(data.riskFactors),
      attributes_json: JSON.stringify(data.attributes),
      first_seen: seen,
      last_seen: seen,
      attributes_observed_at: seen,
      version: 1,
      created_at: now,
      updated_at: now,
    };
    try {
      this.db
        .prepare(
          `INSERT INTO identities (id, enclave_id, fingerprint, identity_type, source_type, display_name, owner,
             linked_system, risk_score, risk_factors_json, attributes_json, first_seen, last_seen,
             attributes_observed_at, version, created_at, updated_at)
           VALUES (@id, @enclave_id, @fingerprint, @identity_type, @source_type, @display_name, @owner,
             @linked_system, @risk_score, @risk_factors_json, @attributes_json, @first_seen, @last_seen,
             @attributes_observed_at, @version, @created_at, @updated_at)`,
        )
        .run(row);
      return map(row);
    } catch (err) {
      if (isUniqueViolation(err)) {
        throw new StorageConflictError(`Identity ${data.fingerprint} already exists in enclave ${data.enclaveId}`, err);
      }
      throw wrapStorageError(`Failed to insert identity ${data.fingerprint}`, err);
    }
  }

  /**
   * Optimistic write of a merge result.
   * @throws StorageConflictError when the stored version no longer matches
   */
  async updateObserved(id: string, expectedVersion: number, data: ObservedUpdate): Promise<Identity> {
    try {
      const result = this.db
        .prepare(
          `UPDATE identities SET display_name = @display_name, attributes_json = @attributes_json,
             risk_score = @risk_score, risk_factors_json = @risk_factors_json, first_seen = @first_seen,
             last_seen = @last_seen, attributes_observed_at = @attributes_observed_at,
             version = version + 1, updated_at = @updated_at
           WHERE id = @id AND version = @version`,
        )
        .run({
          id,
          version: expectedVersion,
          display_name: data.displayName,
          attributes_json: JSON.stringify(data.attributes),
          risk_score: data.riskScore,
          risk_factors_json: JSON.stringify(data.riskFactors),
          first_seen: data.firstSeen.toISOString(),
          last_seen: data.lastSeen.toISOString(),
          attributes_observed_at: data.attributesObservedAt.toISOString(),
          updated_at: new Date().toISOString(),
        });
      if (result.changes === 0) {
        throw new StorageConflictError(`Identity ${id} changed concurrently (expected version ${expectedVersion})`);
      }
      return this.get(id);
    } catch (err) {
      throw wrapStorageError(`Failed to update identity ${id}`, err);
    }
  }

  async updateEnrichment(id: string, expectedVersion: number, data: EnrichmentUpdate): Promise<Identity> {
    try {
      const result = this.db
        .prepare(
          `UPDATE identities SET owner = @owner, linked_system = @linked_system, risk_score = @risk_score,
             risk_factors_json = @risk_factors_json, version = version + 1, updated_at = @updated_at
           WHERE id = @id AND version = @version`,
        )
        .run({
          id,
          version: expectedVersion,
          owner: data.owner,
          linked_system: data.linkedSystem,
          risk_score: data.riskScore,
          risk_factors_json: JSON.stringify(data.riskFactors),
          updated_at: new Date().toISOString(),
        });
      if (result.changes === 0) {
        throw new StorageConflictError(`Identity ${id} changed concurrently (expected version ${expectedVersion})`);
      }
      return this.get(id);
    } catch (err) {
      throw wrapStorageError(`Failed to update identity ${id}`, err);
    }
  }

  /** Risk-only write used by rescoring; does not bump the version. */
  async updateRisk(id: string, riskScore: number, riskFactors: RiskFactor[]): Promise<void> {
    try {
      this.db
        .prepare('UPDATE identities SET risk_score = ?, risk_factors_json = ?, updated_at = ? WHERE id = ?')
        .run(riskScore, JSON.stringify(riskFactors), new Date().toISOString(), id);
    } catch (err) {
      throw wrapStorageError(`Failed to update risk for identity ${id}`, err);
    }
  }

  async list(enclaveId: string, filters: IdentityFilters = {}): Promise<Identity[]> {
    const clauses = ['enclave_id = @enclaveId'];
    const params: Record<string, string | number> = {
      enclaveId,
      limit: clampLimit(filters.limit),
      offset: clampOffset(filters.offset),
    };
    if (filters.identityType) {
      clauses.push('identity_type = @identityType');
      params.identityType = filters.identityType;
    }
    if (filters.owner !== undefined) {
      clauses.push('owner = @owner');
      params.owner = filters.owner;
    }
    if (filters.linkedSystem !== undefined) {
      clauses.push('linked_system = @linkedSystem');
      params.linkedSystem = filters.linkedSystem;
    }
    if (filters.search) {
      clauses.push(`LOWER(display_name) LIKE @search ESCAPE '\\'`);
      params.search = `%${filters.search.toLowerCase().replace(/[\\%_]/g, (c) => `\\${c}`)}%`;
    }
    if (filters.minRisk !== undefined) {
      clauses.push('risk_score >= @minRisk');
      params.minRisk = filters.minRisk;
    }
    if (filters.maxRisk !== undefined) {
      clauses.push('risk_score <= @maxRisk');
      params.maxRisk = filters.maxRisk;
    }
    try {
      const rows = this.db
        .prepare(
          `SELECT * FROM identities WHERE ${clauses.join(' AND ')}
           ORDER BY display_name ASC, id ASC LIMIT @limit OFFSET @offset`,
        )
        .all(params);
      return rows.map(map);
    } catch (err) {
      throw wrapStorageError(`Failed to list identities for enclave ${enclaveId}`, err);
    }
  }

  async listAllByEnclave(enclaveId: string): Promise<Identity[]> {
    try {
      const rows = this.db
        .prepare('SELECT * FROM identities WHERE enclave_id = ? ORDER BY display_name ASC')
        .all(enclaveId);
      return rows.map(map);
    } catch (err) {
      throw wrapStorageError(`Failed to list identities for enclave ${enclaveId}`, err);
    }
  }

  async listByType(enclaveId: string, identityType: IdentityType): Promise<Identity[]> {
    try {
      const rows = this.db
        .prepare('SELECT * FROM identities WHERE enclave_id = ? AND identity_type = ? ORDER BY display_name ASC, id ASC')
        .all(enclaveId, identityType);
      return rows.map(map);
    } catch (err) {
      throw wrapStorageError(`Failed to list ${identityType} identities for enclave ${enclaveId}`, err);
    }
  }

  /** Identities missing an owner or a linked system, highest risk first. */
  async listOrphaned(enclaveId: string): Promise<Identity[]> {
    try {
      const rows = this.db
        .prepare(
          `SELECT * FROM identities
           WHERE enclave_id = ?
             AND (owner IS NULL OR owner = '' OR linked_system IS NULL OR linked_system = '')
           ORDER BY risk_score DESC, display_name ASC, id ASC`,
        )
        .all(enclaveId);
      return rows.map(map);
    } catch (err) {
      throw wrapStorageError(`Failed to list orphaned identities for enclave ${enclaveId}`, err);
    }
  }
}
