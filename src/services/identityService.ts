import type { Identity, Page } from '../core/types.js';
import { EnclaveScopeError } from '../core/errors.js';
import { IdentityRepository, type IdentityFilters } from '../repositories/identityRepository.js';
import { ProvenanceRepository, type ProvenanceEntry } from '../repositories/provenanceRepository.js';
import { StorageConflictError } from '../repositories/errors.js';
import { RiskScorer, defaultRiskScorer } from '../risk/riskScorer.js';
import { getLogger } from '../utils/logging.js';
import { NormalizationEngine, type RescoreResult } from './normalizationEngine.js';

/** `null` clears the field; an omitted field stays as stored. */
export interface IdentityEnrichment {
  owner?: string | null;
  linkedSystem?: string | null;
}

function blankToNull(value: string | null): string | null {
  return value === null || value.trim() === '' ? null : value.trim();
}

export class IdentityService {
  constructor(
    private readonly identities = new IdentityRepository(),
    private readonly provenance = new ProvenanceRepository(),
    private readonly engine = new NormalizationEngine(),
    private readonly scorer: RiskScorer = defaultRiskScorer,
  ) {}

  async get(enclaveId: string, id: string): Promise<Identity> {
    const identity = await this.identities.get(id);
    if (identity.enclaveId !== enclaveId) throw new EnclaveScopeError('Identity', id);
    return identity;
  }

  async list(enclaveId: string, filters: IdentityFilters = {}): Promise<Identity[]> {
    return this.identities.list(enclaveId, filters);
  }

  async listProvenance(enclaveId: string, id: string, page: Page = {}): Promise<ProvenanceEntry[]> {
    await this.get(enclaveId, id);
    return this.provenance.listByIdentity(id, page);
  }

  /**
   * The only write path for owner and linkedSystem. Re-scores on every call;
   * retries once when a normalization merge lands in between.
   */
  async updateIdentity(enclaveId: string, id: string, patch: IdentityEnrichment): Promise<Identity> {
    try {
      return await this.applyEnrichment(enclaveId, id, patch);
    } catch (err) {
      if (!(err instanceof StorageConflictError)) throw err;
      getLogger().debug({ identityId: id, err: err.message }, 'identity-enrichment-retry');
      return this.applyEnrichment(enclaveId, id, patch);
    }
  }

  async rescore(enclaveId: string, now?: Date): Promise<RescoreResult> {
    return this.engine.rescoreEnclave(enclaveId, now);
  }

  private async applyEnrichment(enclaveId: string, id: string, patch: IdentityEnrichment): Promise<Identity> {
    const current = await this.get(enclaveId, id);
    const owner = patch.owner === undefined ? current.owner : blankToNull(patch.owner);
    const linkedSystem = patch.linkedSystem === undefined ? current.linkedSystem : blankToNull(patch.linkedSystem);
    const risk = this.scorer.score({
      identityType: current.identityType,
      owner,
      linkedSystem,
      attributes: current.attributes,
      now: new Date(),
    });
    const updated = await this.identities.updateEnrichment(id, current.version, {
      owner,
      linkedSystem,
      riskScore: risk.score,
      riskFactors: risk.factors,
    });
    getLogger().info({ identityId: id, enclaveId, owner, linkedSystem, riskScore: risk.score }, 'identity-enriched');
    return updated;
  }
}
