import { z } from 'zod';

const discoveredAt = z
  .string()
  .datetime({ offset: true })
  .transform((value) => new Date(value))
  .optional();

export const ingestBodySchema = z
  .object({
    sourceType: z.string().min(1).optional(),
    jobId: z.string().min(1).optional(),
    discoveredAt,
    complete: z.boolean().optional(),
    records: z.array(z.record(z.unknown())),
  })
  .strict();

// CSV pushes carry the batch options in the query string
export const ingestQuerySchema = z.object({
  sourceType: z.string().min(1).optional(),
  jobId: z.string().min(1).optional(),
  discoveredAt,
  complete: z
    .enum(['true', 'false'])
    .transform((value) => value === 'true')
    .optional(),
});
