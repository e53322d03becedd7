import type { FastifyInstance } from 'fastify';
import type { ApiDeps } from '../deps.js';
import { enclaveParamsSchema, identityParamsSchema, pageQuerySchema } from '../schemas/common.js';
import {
  listIdentitiesQuerySchema,
  toPublicIdentity,
  toPublicProvenance,
  updateIdentityBodySchema,
} from '../schemas/identitySchemas.js';
import { formatZodError, validationBody } from '../errors.js';

export async function identityRoutes(app: FastifyInstance, opts: { deps: ApiDeps }) {
  const { identities } = opts.deps;

  app.get('/v1/enclaves/:enclaveId/identities', async (req, reply) => {
    const { enclaveId } = enclaveParamsSchema.parse(req.params);
    const query = listIdentitiesQuerySchema.safeParse(req.query);
    if (!query.success) return reply.status(400).send(validationBody(formatZodError(query.error)));
    const list = await identities.list(enclaveId, query.data);
    return { identities: list.map(toPublicIdentity) };
  });

  app.post('/v1/enclaves/:enclaveId/identities/rescore', async (req) => {
    const { enclaveId } = enclaveParamsSchema.parse(req.params);
    return identities.rescore(enclaveId);
  });

  app.get('/v1/enclaves/:enclaveId/identities/:identityId', async (req) => {
    const { enclaveId, identityId } = identityParamsSchema.parse(req.params);
    return { identity: toPublicIdentity(await identities.get(enclaveId, identityId)) };
  });

  app.patch('/v1/enclaves/:enclaveId/identities/:identityId', async (req, reply) => {
    const { enclaveId, identityId } = identityParamsSchema.parse(req.params);
    const parsed = updateIdentityBodySchema.safeParse(req.body ?? {});
    if (!parsed.success) return reply.status(400).send(validationBody(formatZodError(parsed.error)));
    const identity = await identities.updateIdentity(enclaveId, identityId, parsed.data);
    return { identity: toPublicIdentity(identity) };
  });

  app.get('/v1/enclaves/:enclaveId/identities/:identityId/provenance', async (req, reply) => {
    const { enclaveId, identityId } = identityParamsSchema.parse(req.params);
    const page = pageQuerySchema.safeParse(req.query);
    if (!page.success) return reply.status(400).send(validationBody(formatZodError(page.error)));
    const entries = await identities.listProvenance(enclaveId, identityId, page.data);
    return { provenance: entries.map(toPublicProvenance) };
  });
}
