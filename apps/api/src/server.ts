import 'dotenv/config';
import { closePool, pingDatabase } from '@transit-pulse/adapters';
import { buildApp, buildHttpServer } from './app.js';
import { loadConfig } from './config/env.js';
import { createPostgresCollaborators, createServices } from './container.js';

async function main() {
  const config = loadConfig();

  await pingDatabase();
  console.log('[server] database connected');

  const services = createServices(config, createPostgresCollaborators(config));
  services.modelLoader.start();

  const app = buildApp(services);
  const { httpServer, wsGateway } = buildHttpServer(app, services);

  httpServer.listen(config.port, () => {
    console.log(`[server] listening on http://0.0.0.0:${config.port}`);
    for (const loop of services.loops) loop.start();
  });

  let stopping = false;
  const shutdown = async () => {
    if (stopping) return;
    stopping = true;
    console.log('[server] shutting down...');
    try {
      await Promise.all(services.loops.map((loop) => loop.stop()));
      await wsGateway.close();
      await new Promise<void>((resolve) => httpServer.close(() => resolve()));
      await closePool();
      process.exit(0);
    } catch (err) {
      console.error('[server] shutdown failed', err);
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown());
  process.on('SIGINT', () => void shutdown());
}

main().catch((err) => {
  console.error('[server] fatal startup error', err);
  process.exit(1);
});
