import 'dotenv/config';
import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import { createServer } from 'http';
import type { TelemetryIngestionPort } from '@uwb-locator/domain';

import { createRawIngestRouter } from './controllers/raw-ingest.controller.js';
import { createProcessingRouter } from './controllers/processing.controller.js';
import { WsGateway } from './ws/ws-gateway.js';
import { errorHandler } from './middleware/error-handler.js';

export const API_VERSION = '0.1.0';

export interface AppDeps {
  ingestion: TelemetryIngestionPort;
  corsOrigin?: string;
  /** Access logging; disabled in tests. */
  logRequests?: boolean;
}

export function buildApp(deps: AppDeps): ReturnType<typeof express> {
  const app = express();

  // ─── Middleware ─────────────────────────────────────────────────────────────
  app.use(helmet());
  app.use(cors({ origin: deps.corsOrigin ?? '*' }));
  if (deps.logRequests ?? true) app.use(morgan('combined'));
  app.use(express.json({ limit: '1mb' }));

  // ─── Routes ─────────────────────────────────────────────────────────────────
  app.use('/api/raw', createRawIngestRouter(deps.ingestion));
  app.use('/api/processing', createProcessingRouter(deps.ingestion));

  app.get('/healthz', (_req, res) => {
    res.json({ status: 'ok', ts: new Date().toISOString(), version: API_VERSION });
  });

  // ─── Error handler (must be last) ───────────────────────────────────────────
  app.use(errorHandler);

  return app;
}

export function buildHttpServer(app: ReturnType<typeof express>) {
  const httpServer = createServer(app);
  const wsGateway = new WsGateway(httpServer);
  return { httpServer, wsGateway };
}
