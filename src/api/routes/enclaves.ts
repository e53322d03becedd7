import type { FastifyInstance } from 'fastify';
import type { ApiDeps } from '../deps.js';
import { createEnclaveBodySchema, updateEnclaveBodySchema } from '../schemas/adminSchemas.js';
import { enclaveParamsSchema } from '../schemas/common.js';
import { formatZodError, validationBody } from '../errors.js';

export async function enclaveRoutes(app: FastifyInstance, opts: { deps: ApiDeps }) {
  const { enclaves } = opts.deps;

  app.post('/v1/enclaves', async (req, reply) => {
    const parsed = createEnclaveBodySchema.safeParse(req.body);
    if (!parsed.success) return reply.status(400).send(validationBody(formatZodError(parsed.error)));
    const enclave = await enclaves.create(parsed.data);
    return reply.status(201).send({ enclave });
  });

  app.get('/v1/enclaves', async () => {
    return { enclaves: await enclaves.list() };
  });

  app.get('/v1/enclaves/:enclaveId', async (req) => {
    const { enclaveId } = enclaveParamsSchema.parse(req.params);
    return { enclave: await enclaves.get(enclaveId) };
  });

  app.patch('/v1/enclaves/:enclaveId', async (req, reply) => {
    const { enclaveId } = enclaveParamsSchema.parse(req.params);
    const parsed = updateEnclaveBodySchema.safeParse(req.body);
    if (!parsed.success) return reply.status(400).send(validationBody(formatZodError(parsed.error)));
    return { enclave: await enclaves.update(enclaveId, parsed.data) };
  });

  app.delete('/v1/enclaves/:enclaveId', async (req, reply) => {
    const { enclaveId } = enclaveParamsSchema.parse(req.params);
    await enclaves.delete(enclaveId);
    return reply.status(204).send();
  });
}
