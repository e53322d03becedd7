import { z } from 'zod';
import type { Job } from '../../core/types.js';

export const createEnclaveBodySchema = z
  .object({
    name: z.string().trim().min(1).max(200),
    description: z.string().max(2000).nullable().optional(),
  })
  .strict();

export const updateEnclaveBodySchema = createEnclaveBodySchema.partial();

export const createConnectorBodySchema = z
  .object({
    type: z.string().min(1),
    name: z.string().trim().min(1).max(200),
    config: z.record(z.unknown()).default({}),
    cronExpression: z.string().nullable().optional(),
    enabled: z.boolean().optional(),
  })
  .strict();

export const updateConnectorBodySchema = z
  .object({
    name: z.string().trim().min(1).max(200).optional(),
    config: z.record(z.unknown()).optional(),
    cronExpression: z.string().nullable().optional(),
    enabled: z.boolean().optional(),
  })
  .strict();

export function toPublicJob(job: Job) {
  return {
    id: job.id,
    connectorId: job.connectorId,
    status: job.status,
    triggeredBy: job.triggeredBy,
    createdAt: job.createdAt,
    startedAt: job.startedAt,
    completedAt: job.completedAt,
    findingsCount: job.findingsCount,
    unresolvedCount: job.unresolvedCount,
    identitiesCreated: job.identitiesCreated,
    identitiesUpdated: job.identitiesUpdated,
    errorMessage: job.errorMessage,
  };
}
