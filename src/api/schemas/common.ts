import { z } from 'zod';

export const pageQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(500).optional(),
  offset: z.coerce.number().int().min(0).optional(),
});

export const enclaveParamsSchema = z.object({ enclaveId: z.string().min(1) });
export const connectorParamsSchema = enclaveParamsSchema.extend({ connectorId: z.string().min(1) });
export const jobParamsSchema = enclaveParamsSchema.extend({ jobId: z.string().min(1) });
export const identityParamsSchema = enclaveParamsSchema.extend({ identityId: z.string().min(1) });
