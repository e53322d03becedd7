import Fastify from 'fastify';
import { getLogger } from '../utils/logging.js';
import { loadConfig } from '../config/index.js';
import { registry } from '../metrics/index.js';
import { ConnectorScheduler } from '../scheduler/connectorScheduler.js';
import type { ConnectorFetchers } from '../connectors/index.js';
import { loadSqlEngine } from '../db/client.js';
import { createDeps, type ApiDeps } from './deps.js';
import { toHttpError } from './errors.js';
import { enclaveRoutes } from './routes/enclaves.js';
import { connectorRoutes } from './routes/connectors.js';
import { identityRoutes } from './routes/identities.js';
import { reportRoutes } from './routes/reports.js';

export interface BuildServerOptions {
  deps?: Partial<ApiDeps>;
  fetchers?: Partial<ConnectorFetchers>;
  /** Overrides the configured scheduler switch. */
  scheduler?: boolean;
}

export async function buildServer(opts: BuildServerOptions = {}) {
  const cfg = loadConfig();
  await loadSqlEngine();
  const app = Fastify({ logger: getLogger() });
  const deps = createDeps(opts.deps, opts.fetchers);

  const scheduler = new ConnectorScheduler(deps.runner);
  if (opts.scheduler ?? cfg.scheduler.enabled) scheduler.start();
  app.addHook('onClose', async () => {
    scheduler.stop();
  });

  // CSV certificate exports are pushed as-is; the ingest route parses them
  app.addContentTypeParser('text/csv', { parseAs: 'string' }, (_req, body, done) => {
    done(null, body);
  });

  app.get('/healthz', async () => {
    return {
      status: 'ok',
      time: new Date().toISOString(),
      build: {
        version: process.env.npm_package_version || 'dev',
        node: process.version,
      },
      jobs: deps.runner.info(),
      scheduler: scheduler.info(),
    };
  });

  app.get('/metrics', async (_req, reply) => {
    const body = await registry.metrics();
    reply.header('Content-Type', registry.contentType);
    return reply.send(body);
  });

  // Set before the route plugins register so their encapsulated contexts inherit it
  app.setErrorHandler((error, _req, reply) => {
    const mapped = toHttpError(error);
    if (mapped) return reply.status(mapped.status).send(mapped.body);
    app.log.error({ err: error }, 'Unhandled error');
    return reply.status(500).send({ error: { code: 'INTERNAL', message: 'Internal Server Error' } });
  });

  await app.register(enclaveRoutes, { deps });
  await app.register(connectorRoutes, { deps });
  await app.register(identityRoutes, { deps });
  await app.register(reportRoutes, { deps });

  return app;
}
