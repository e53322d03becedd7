import { z } from 'zod';
import { IDENTITY_TYPES, type Identity } from '../../core/types.js';
import type { ProvenanceEntry } from '../../repositories/provenanceRepository.js';
import { pageQuerySchema } from './common.js';

const risk = z.coerce.number().int().min(0).max(100);

export const listIdentitiesQuerySchema = pageQuerySchema.extend({
  identityType: z.enum(IDENTITY_TYPES).optional(),
  owner: z.string().min(1).optional(),
  linkedSystem: z.string().min(1).optional(),
  search: z.string().min(1).optional(),
  minRisk: risk.optional(),
  maxRisk: risk.optional(),
});

const nullableText = z.string().max(500).nullable().optional();

/** Accepts linked_system as an alias of linkedSystem. */
export const updateIdentityBodySchema = z
  .object({
    owner: nullableText,
    linkedSystem: nullableText,
    linked_system: nullableText,
  })
  .strict()
  .refine((b) => b.linkedSystem === undefined || b.linked_system === undefined, {
    message: 'send linkedSystem or linked_system, not both',
  })
  .transform((b) => ({ owner: b.owner, linkedSystem: b.linkedSystem !== undefined ? b.linkedSystem : b.linked_system }));

export function toPublicIdentity(identity: Identity) {
  return {
    id: identity.id,
    enclaveId: identity.enclaveId,
    fingerprint: identity.fingerprint,
    identityType: identity.identityType,
    sourceType: identity.sourceType,
    displayName: identity.displayName,
    owner: identity.owner,
    linkedSystem: identity.linkedSystem,
    riskScore: identity.riskScore,
    riskFactors: identity.riskFactors,
    attributes: identity.attributes,
    firstSeen: identity.firstSeen,
    lastSeen: identity.lastSeen,
    createdAt: identity.createdAt,
    updatedAt: identity.updatedAt,
  };
}

export function toPublicProvenance(entry: ProvenanceEntry) {
  return {
    findingId: entry.findingId,
    jobId: entry.jobId,
    discoveredAt: entry.discoveredAt,
    attributesChanged: entry.attributesChanged,
    linkedAt: entry.linkedAt,
    finding: {
      id: entry.finding.id,
      connectorId: entry.finding.connectorId,
      sourceType: entry.finding.sourceType,
      rawAttributes: entry.finding.rawAttributes,
      contentHash: entry.finding.contentHash,
      sequence: entry.finding.sequence,
    },
  };
}
