import type { FastifyInstance } from 'fastify';
import type { ApiDeps } from '../deps.js';
import { enclaveParamsSchema } from '../schemas/common.js';
import { expiringQuerySchema, toPublicExpiring, toPublicOrphaned } from '../schemas/reportSchemas.js';
import { formatZodError, validationBody } from '../errors.js';

export async function reportRoutes(app: FastifyInstance, opts: { deps: ApiDeps }) {
  const { reports } = opts.deps;

  app.get('/v1/enclaves/:enclaveId/reports/expiring', async (req, reply) => {
    const { enclaveId } = enclaveParamsSchema.parse(req.params);
    const query = expiringQuerySchema.safeParse(req.query);
    if (!query.success) return reply.status(400).send(validationBody(formatZodError(query.error)));
    const certificates = await reports.expiringCertificates(enclaveId, query.data.days);
    return { days: query.data.days, certificates: certificates.map(toPublicExpiring) };
  });

  app.get('/v1/enclaves/:enclaveId/reports/orphaned', async (req) => {
    const { enclaveId } = enclaveParamsSchema.parse(req.params);
    const orphaned = await reports.orphanedIdentities(enclaveId);
    return { identities: orphaned.map(toPublicOrphaned) };
  });
}
