import type { Finding, Identity, IdentityAttributes } from '../core/types.js';
import { EnclaveScopeError, MissingKeyAttributeError, UnsupportedSourceTypeError } from '../core/errors.js';
import { IdentityRepository } from '../repositories/identityRepository.js';
import { FindingRepository } from '../repositories/findingRepository.js';
import { ProvenanceRepository } from '../repositories/provenanceRepository.js';
import { JobRepository } from '../repositories/jobRepository.js';
import { ConnectorRepository } from '../repositories/connectorRepository.js';
import { StorageConflictError } from '../repositories/errors.js';
import { SourceFamilyRegistry, computeFingerprint, type NormalizedRecord } from '../sources/index.js';
import { RiskScorer, defaultRiskScorer, type RiskAssessment } from '../risk/riskScorer.js';
import { sameContent } from '../utils/canonical.js';
import { getLogger } from '../utils/logging.js';
import {
  findingsUnresolvedTotal,
  identitiesUpsertedTotal,
  storageConflictRetriesTotal,
} from '../metrics/index.js';

export interface NormalizationResult {
  created: number;
  updated: number;
  unresolved: number;
  linked: number;
  identityIds: string[];
}

export interface RescoreResult {
  total: number;
  changed: number;
}

type UpsertAction = 'created' | 'updated' | 'unchanged';

interface UpsertOutcome {
  identity: Identity;
  action: UpsertAction;
  attributesChanged: boolean;
}

function emptyResult(): NormalizationResult {
  return { created: 0, updated: 0, unresolved: 0, linked: 0, identityIds: [] };
}

function byDiscovery(a: Finding, b: Finding): number {
  return a.discoveredAt.getTime() - b.discoveredAt.getTime() || a.sequence - b.sequence;
}

function sameRisk(identity: Identity, risk: RiskAssessment): boolean {
  return identity.riskScore === risk.score && sameContent(identity.riskFactors, risk.factors);
}

/**
 * Merge a normalized snapshot into a stored one. A finding at least as new as
 * the stored snapshot overwrites per field; an older one only fills gaps.
 */
export function mergeAttributes(
  stored: IdentityAttributes,
  incoming: IdentityAttributes,
  incomingIsNewer: boolean,
): IdentityAttributes {
  return incomingIsNewer ? { ...stored, ...incoming } : { ...incoming, ...stored };
}

export interface NormalizationEngineOptions {
  identities?: IdentityRepository;
  findings?: FindingRepository;
  provenance?: ProvenanceRepository;
  jobs?: JobRepository;
  connectors?: ConnectorRepository;
  scorer?: RiskScorer;
  clock?: () => Date;
}

/**
 * Folds findings into the enclave's identity graph: fingerprint, upsert,
 * provenance link, re-score. Safe to replay.
 */
export class NormalizationEngine {
  private readonly identities: IdentityRepository;
  private readonly findings: FindingRepository;
  private readonly provenance: ProvenanceRepository;
  private readonly jobs: JobRepository;
  private readonly connectors: ConnectorRepository;
  private readonly scorer: RiskScorer;
  private readonly clock: () => Date;

  constructor(opts: NormalizationEngineOptions = {}) {
    this.identities = opts.identities ?? new IdentityRepository();
    this.findings = opts.findings ?? new FindingRepository();
    this.provenance = opts.provenance ?? new ProvenanceRepository();
    this.jobs = opts.jobs ?? new JobRepository();
    this.connectors = opts.connectors ?? new ConnectorRepository();
    this.scorer = opts.scorer ?? defaultRiskScorer;
    this.clock = opts.clock ?? (() => new Date());
  }

  async normalizeFindings(enclaveId: string, findings: Finding[]): Promise<NormalizationResult> {
    const result = emptyResult();
    const seen = new Set<string>();
    for (const finding of [...findings].sort(byDiscovery)) {
      if (finding.enclaveId !== enclaveId) throw new EnclaveScopeError('Finding', finding.id);

      let fingerprint: string;
      let normalized: NormalizedRecord;
      try {
        fingerprint = computeFingerprint(finding.sourceType, finding.rawAttributes);
        normalized = SourceFamilyRegistry.get(finding.sourceType).normalize(finding.rawAttributes);
      } catch (err) {
        if (err instanceof MissingKeyAttributeError || err instanceof UnsupportedSourceTypeError) {
          await this.findings.markUnresolved(finding.id, finding.jobId, err.message);
          findingsUnresolvedTotal.inc({ source_type: finding.sourceType });
          getLogger().warn(
            { findingId: finding.id, jobId: finding.jobId, code: err.code, reason: err.message },
            'finding-unresolved',
          );
          result.unresolved += 1;
          continue;
        }
        throw err;
      }

      const outcome = await this.upsertWithRetry(enclaveId, fingerprint, finding, normalized);
      if (outcome.action === 'created') result.created += 1;
      if (outcome.action === 'updated') result.updated += 1;

      const linked = await this.provenance.link({
        identityId: outcome.identity.id,
        findingId: finding.id,
        jobId: finding.jobId,
        discoveredAt: finding.discoveredAt,
        attributesChanged: outcome.attributesChanged,
      });
      if (linked) result.linked += 1;
      if (!seen.has(outcome.identity.id)) {
        seen.add(outcome.identity.id);
        result.identityIds.push(outcome.identity.id);
      }
    }
    return result;
  }

  /** Replays every finding of a job through the engine. */
  async renormalizeJob(enclaveId: string, jobId: string): Promise<NormalizationResult> {
    const job = await this.jobs.get(jobId);
    const connector = await this.connectors.get(job.connectorId, { includeDeleted: true });
    if (connector.enclaveId !== enclaveId) throw new EnclaveScopeError('Job', jobId);
    const findings = await this.findings.listByJob(jobId);
    const result = await this.normalizeFindings(enclaveId, findings);
    getLogger().info(
      { jobId, enclaveId, created: result.created, updated: result.updated, unresolved: result.unresolved },
      'job-renormalized',
    );
    return result;
  }

  /** Recomputes risk for every identity in the enclave; expiry tiers move with time alone. */
  async rescoreEnclave(enclaveId: string, now: Date = this.clock()): Promise<RescoreResult> {
    const all = await this.identities.listAllByEnclave(enclaveId);
    let changed = 0;
    for (const identity of all) {
      const risk = this.scorer.score({
        identityType: identity.identityType,
        owner: identity.owner,
        linkedSystem: identity.linkedSystem,
        attributes: identity.attributes,
        now,
      });
      if (sameRisk(identity, risk)) continue;
      await this.identities.updateRisk(identity.id, risk.score, risk.factors);
      changed += 1;
    }
    getLogger().info({ enclaveId, total: all.length, changed }, 'enclave-rescored');
    return { total: all.length, changed };
  }

  private async upsertWithRetry(
    enclaveId: string,
    fingerprint: string,
    finding: Finding,
    normalized: NormalizedRecord,
  ): Promise<UpsertOutcome> {
    try {
      return await this.upsert(enclaveId, fingerprint, finding, normalized);
    } catch (err) {
      if (!(err instanceof StorageConflictError)) throw err;
      storageConflictRetriesTotal.inc();
      getLogger().debug({ fingerprint, findingId: finding.id, err: err.message }, 'identity-upsert-retry');
      return this.upsert(enclaveId, fingerprint, finding, normalized);
    }
  }

  private async upsert(
    enclaveId: string,
    fingerprint: string,
    finding: Finding,
    normalized: NormalizedRecord,
  ): Promise<UpsertOutcome> {
    const now = this.clock();
    const existing = await this.identities.findByFingerprint(enclaveId, fingerprint);

    if (!existing) {
      const risk = this.scorer.score({
        identityType: normalized.identityType,
        owner: null,
        linkedSystem: null,
        attributes: normalized.attributes,
        now,
      });
      const identity = await this.identities.insert({
        enclaveId,
        fingerprint,
        identityType: normalized.identityType,
        sourceType: finding.sourceType,
        displayName: normalized.displayName,
        attributes: normalized.attributes,
        riskScore: risk.score,
        riskFactors: risk.factors,
        discoveredAt: finding.discoveredAt,
      });
      identitiesUpsertedTotal.inc({ action: 'created' });
      getLogger().info(
        { identityId: identity.id, fingerprint, enclaveId, findingId: finding.id, riskScore: risk.score },
        'identity-created',
      );
      return { identity, action: 'created', attributesChanged: true };
    }

    const discovered = finding.discoveredAt.getTime();
    const newer = discovered >= existing.attributesObservedAt.getTime();
    const attributes = mergeAttributes(existing.attributes, normalized.attributes, newer);
    const attributesChanged = !sameContent(attributes, existing.attributes);
    const displayName = newer ? normalized.displayName : existing.displayName;
    const firstSeen = new Date(Math.min(existing.firstSeen.getTime(), discovered));
    const lastSeen = new Date(Math.max(existing.lastSeen.getTime(), discovered));
    const attributesObservedAt = newer ? finding.discoveredAt : existing.attributesObservedAt;
    const risk = this.scorer.score({
      identityType: existing.identityType,
      owner: existing.owner,
      linkedSystem: existing.linkedSystem,
      attributes,
      now,
    });

    const unchanged =
      !attributesChanged &&
      displayName === existing.displayName &&
      firstSeen.getTime() === existing.firstSeen.getTime() &&
      lastSeen.getTime() === existing.lastSeen.getTime() &&
      attributesObservedAt.getTime() === existing.attributesObservedAt.getTime() &&
      sameRisk(existing, risk);
    if (unchanged) {
      return { identity: existing, action: 'unchanged', attributesChanged: false };
    }

    const identity = await this.identities.updateObserved(existing.id, existing.version, {
      displayName,
      attributes,
      riskScore: risk.score,
      riskFactors: risk.factors,
      firstSeen,
      lastSeen,
      attributesObservedAt,
    });
    identitiesUpsertedTotal.inc({ action: 'updated' });
    getLogger().debug(
      { identityId: identity.id, fingerprint, findingId: finding.id, attributesChanged, riskScore: risk.score },
      'identity-updated',
    );
    return { identity, action: 'updated', attributesChanged };
  }
}
