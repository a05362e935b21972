import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import { createServer } from 'http';

import { telemetryRouter } from './controllers/telemetry.controller.js';
import { etaRouter } from './controllers/eta.controller.js';
import { ridersRouter } from './controllers/riders.controller.js';
import { modelRouter } from './controllers/model.controller.js';
import { WsGateway } from './ws/ws-gateway.js';
import { errorHandler } from './middleware/error-handler.js';
import type { Services } from './container.js';

export function buildApp(services: Services): ReturnType<typeof express> {
  const app = express();

  // ─── Middleware ─────────────────────────────────────────────────────────────
  app.use(helmet());
  app.use(cors({ origin: services.config.corsOrigin }));
  app.use(morgan('combined'));
  app.use(express.json({ limit: '1mb' }));

  // ─── Routes ─────────────────────────────────────────────────────────────────
  app.use('/api/telemetry', telemetryRouter(services.ingestion));
  app.use('/api/eta', etaRouter(services.eta, services.etaSubscriptions));
  app.use('/api/riders', ridersRouter(services.proximity, services.snapshots));
  app.use('/api/model', modelRouter(services.modelLoader));

  app.get('/healthz', (_req, res) => {
    res.json({
      status: 'ok',
      ts: new Date().toISOString(),
      model: services.modelLoader.getStatus(),
      routeCache: services.snapper.stats(),
      realtime: services.hub.stats(),
      loops: services.loops.map((loop) => loop.getStats()),
    });
  });

  // ─── Error handler (must be last) ───────────────────────────────────────────
  app.use(errorHandler);

  return app;
}

export function buildHttpServer(app: ReturnType<typeof express>, services: Services) {
  const httpServer = createServer(app);
  const wsGateway = new WsGateway(httpServer, services.hub, services.snapshots);
  return { httpServer, wsGateway };
}
