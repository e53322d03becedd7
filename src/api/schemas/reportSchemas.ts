import { z } from 'zod';
import { DEFAULT_EXPIRY_WINDOW_DAYS, type ExpiringCertificate, type OrphanedIdentity } from '../../services/reportService.js';

export const expiringQuerySchema = z.object({
  days: z.coerce.number().int().min(1).max(3650).default(DEFAULT_EXPIRY_WINDOW_DAYS),
});

export function toPublicExpiring(entry: ExpiringCertificate) {
  return {
    identityId: entry.identity.id,
    displayName: entry.identity.displayName,
    fingerprint: entry.identity.fingerprint,
    owner: entry.identity.owner,
    linkedSystem: entry.identity.linkedSystem,
    riskScore: entry.identity.riskScore,
    notAfter: entry.notAfter,
    daysRemaining: entry.daysRemaining,
    expired: entry.expired,
  };
}

export function toPublicOrphaned(entry: OrphanedIdentity) {
  return {
    identityId: entry.identity.id,
    displayName: entry.identity.displayName,
    identityType: entry.identity.identityType,
    owner: entry.identity.owner,
    linkedSystem: entry.identity.linkedSystem,
    riskScore: entry.identity.riskScore,
    missing: entry.missing,
  };
}
