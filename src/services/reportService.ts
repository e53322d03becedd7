import type { Identity } from '../core/types.js';
import { EnclaveRepository } from '../repositories/enclaveRepository.js';
import { IdentityRepository } from '../repositories/identityRepository.js';
import { MS_PER_DAY, daysFrom, parseTimestamp } from '../utils/time.js';

export interface ExpiringCertificate {
  identity: Identity;
  notAfter: Date;
  /** Whole days left; 0 once expired. */
  daysRemaining: number;
  expired: boolean;
}

export type OrphanGap = 'owner' | 'linkedSystem';

export interface OrphanedIdentity {
  identity: Identity;
  missing: OrphanGap[];
}

export const DEFAULT_EXPIRY_WINDOW_DAYS = 90;

/** Read-only views over an enclave's identities: certificate expiry and missing enrichment. */
export class ReportService {
  constructor(
    private readonly identities = new IdentityRepository(),
    private readonly enclaves = new EnclaveRepository(),
    private readonly clock: () => Date = () => new Date(),
  ) {}

  /**
   * Certificates whose not_after falls within `days` of now, already expired
   * ones included, soonest first. Certificates without a readable not_after
   * are left out.
   */
  async expiringCertificates(enclaveId: string, days = DEFAULT_EXPIRY_WINDOW_DAYS): Promise<ExpiringCertificate[]> {
    await this.enclaves.get(enclaveId);
    const now = this.clock();
    const cutoff = daysFrom(now, days);
    const report: ExpiringCertificate[] = [];
    for (const identity of await this.identities.listByType(enclaveId, 'cert')) {
      const notAfter = parseTimestamp(identity.attributes.not_after);
      if (!notAfter || notAfter > cutoff) continue;
      const remainingMs = notAfter.getTime() - now.getTime();
      report.push({
        identity,
        notAfter,
        daysRemaining: Math.max(0, Math.floor(remainingMs / MS_PER_DAY)),
        expired: remainingMs <= 0,
      });
    }
    return report.sort((a, b) => a.notAfter.getTime() - b.notAfter.getTime());
  }

  async orphanedIdentities(enclaveId: string): Promise<OrphanedIdentity[]> {
    await this.enclaves.get(enclaveId);
    const orphaned = await this.identities.listOrphaned(enclaveId);
    return orphaned.map((identity) => {
      const missing: OrphanGap[] = [];
      if (!identity.owner) missing.push('owner');
      if (!identity.linkedSystem) missing.push('linkedSystem');
      return { identity, missing };
    });
  }
}
