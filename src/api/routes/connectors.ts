import type { FastifyInstance } from 'fastify';
import type { ApiDeps } from '../deps.js';
import { toConnectorView } from '../../services/adminService.js';
import { parseCertificateCsv } from '../../connectors/index.js';
import { createConnectorBodySchema, toPublicJob, updateConnectorBodySchema } from '../schemas/adminSchemas.js';
import { connectorParamsSchema, enclaveParamsSchema, jobParamsSchema, pageQuerySchema } from '../schemas/common.js';
import { ingestBodySchema, ingestQuerySchema } from '../schemas/ingestSchemas.js';
import { formatZodError, validationBody } from '../errors.js';
import type { IngestRequest } from '../../services/ingestionService.js';

const INGEST_BODY_LIMIT = 20 * 1024 * 1024;

export async function connectorRoutes(app: FastifyInstance, opts: { deps: ApiDeps }) {
  const { connectors, runner, ingestion } = opts.deps;

  app.post('/v1/enclaves/:enclaveId/connectors', async (req, reply) => {
    const { enclaveId } = enclaveParamsSchema.parse(req.params);
    const parsed = createConnectorBodySchema.safeParse(req.body);
    if (!parsed.success) return reply.status(400).send(validationBody(formatZodError(parsed.error)));
    const connector = await connectors.create(enclaveId, parsed.data);
    return reply.status(201).send({ connector: toConnectorView(connector) });
  });

  app.get('/v1/enclaves/:enclaveId/connectors', async (req) => {
    const { enclaveId } = enclaveParamsSchema.parse(req.params);
    const list = await connectors.list(enclaveId);
    return { connectors: list.map(toConnectorView) };
  });

  app.get('/v1/enclaves/:enclaveId/connectors/:connectorId', async (req) => {
    const { enclaveId, connectorId } = connectorParamsSchema.parse(req.params);
    return { connector: toConnectorView(await connectors.get(enclaveId, connectorId)) };
  });

  app.patch('/v1/enclaves/:enclaveId/connectors/:connectorId', async (req, reply) => {
    const { enclaveId, connectorId } = connectorParamsSchema.parse(req.params);
    const parsed = updateConnectorBodySchema.safeParse(req.body);
    if (!parsed.success) return reply.status(400).send(validationBody(formatZodError(parsed.error)));
    const connector = await connectors.update(enclaveId, connectorId, parsed.data);
    return { connector: toConnectorView(connector) };
  });

  app.delete('/v1/enclaves/:enclaveId/connectors/:connectorId', async (req, reply) => {
    const { enclaveId, connectorId } = connectorParamsSchema.parse(req.params);
    await connectors.delete(enclaveId, connectorId);
    return reply.status(204).send();
  });

  // Run now: returns the pending job; poll the job resource for progress
  app.post('/v1/enclaves/:enclaveId/connectors/:connectorId/run', async (req, reply) => {
    const { enclaveId, connectorId } = connectorParamsSchema.parse(req.params);
    const { job } = await runner.requestRun(enclaveId, connectorId, 'manual');
    return reply.status(202).send({ job: toPublicJob(job) });
  });

  app.post('/v1/enclaves/:enclaveId/connectors/:connectorId/test', async (req) => {
    const { enclaveId, connectorId } = connectorParamsSchema.parse(req.params);
    return connectors.testConnection(enclaveId, connectorId);
  });

  app.get('/v1/enclaves/:enclaveId/connectors/:connectorId/jobs', async (req, reply) => {
    const { enclaveId, connectorId } = connectorParamsSchema.parse(req.params);
    const page = pageQuerySchema.safeParse(req.query);
    if (!page.success) return reply.status(400).send(validationBody(formatZodError(page.error)));
    const jobs = await connectors.listJobs(enclaveId, connectorId, page.data);
    return { jobs: jobs.map(toPublicJob) };
  });

  app.get('/v1/enclaves/:enclaveId/jobs/:jobId', async (req) => {
    const { enclaveId, jobId } = jobParamsSchema.parse(req.params);
    return { job: toPublicJob(await connectors.getJob(enclaveId, jobId)) };
  });

  app.get('/v1/enclaves/:enclaveId/jobs/:jobId/unresolved', async (req) => {
    const { enclaveId, jobId } = jobParamsSchema.parse(req.params);
    return { unresolved: await connectors.listUnresolved(enclaveId, jobId) };
  });

  app.post(
    '/v1/enclaves/:enclaveId/connectors/:connectorId/ingest',
    { bodyLimit: INGEST_BODY_LIMIT },
    async (req, reply) => {
      const { enclaveId, connectorId } = connectorParamsSchema.parse(req.params);
      let request: IngestRequest;
      if (typeof req.body === 'string') {
        const query = ingestQuerySchema.safeParse(req.query);
        if (!query.success) return reply.status(400).send(validationBody(formatZodError(query.error)));
        let records: IngestRequest['records'];
        try {
          records = parseCertificateCsv(req.body);
        } catch (err) {
          const message = err instanceof Error ? err.message : String(err);
          return reply.status(400).send(validationBody(`Invalid CSV: ${message}`));
        }
        request = { ...query.data, records };
      } else {
        const parsed = ingestBodySchema.safeParse(req.body);
        if (!parsed.success) return reply.status(400).send(validationBody(formatZodError(parsed.error)));
        request = parsed.data;
      }
      const result = await ingestion.ingest(enclaveId, connectorId, request);
      return reply.status(201).send(result);
    },
  );
}
