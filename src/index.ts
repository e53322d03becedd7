import { buildServer } from './api/server.js';
import { loadConfig } from './config/index.js';
import { getLogger } from './utils/logging.js';

async function main() {
  const cfg = loadConfig();
  const server = await buildServer();
  const port = Number(process.env.PORT || 3000);
  await server.listen({ port, host: '0.0.0.0' });
  getLogger().info({ port, envDb: cfg.database.url, scheduler: cfg.scheduler.enabled }, 'Server started');

  const shutdown = (signal: string) => {
    getLogger().info({ signal }, 'Server stopping');
    server.close().then(
      () => process.exit(0),
      (err: unknown) => {
        getLogger().error({ err }, 'Shutdown failed');
        process.exit(1);
      },
    );
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch(err => {
  console.error(err);
  process.exit(1);
});
