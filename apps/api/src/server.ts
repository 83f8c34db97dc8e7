import {
  DisabledReadingForwarder,
  HttpReadingForwarder,
  InMemoryMotionCache,
  PgIngestStore,
  SystemClock,
  closePool,
  getPool,
} from '@uwb-locator/adapters';
import { buildApp, buildHttpServer } from './app.js';
import { loadConfig } from './config/ingest-config.js';
import { IngestionService } from './services/ingest/ingestion.service.js';
import { gatewayPublisher } from './ws/ws-gateway.js';

async function main() {
  const config = loadConfig();
  if (!config.databaseUrl) {
    throw new Error('DATABASE_URL is not set');
  }

  // Verify DB connection
  await getPool().query('SELECT 1');
  console.log('[server] database connected');

  const forwarder = config.forwardUrl
    ? new HttpReadingForwarder({ url: config.forwardUrl, timeoutMs: config.forwardTimeoutMs })
    : new DisabledReadingForwarder();
  if (!config.forwardUrl) {
    console.warn('[server] FORWARD_URL not set, raw readings will not be forwarded');
  }

  // Odometry lives only as long as this process.
  const motionCache = new InMemoryMotionCache();

  const ingestion = new IngestionService({
    store: new PgIngestStore(),
    forwarder,
    motionCache,
    clock: new SystemClock(),
    calibration: config.calibration,
    publisher: gatewayPublisher,
  });

  const app = buildApp({ ingestion, corsOrigin: config.corsOrigin });
  const { httpServer, wsGateway } = buildHttpServer(app);

  httpServer.listen(config.port, () => {
    console.log(
      `[server] listening on http://0.0.0.0:${config.port} ` +
        `(offset=${config.calibration.offset}, calibration tags=${[...config.calibration.calibrationTagIds].join(',')})`,
    );
  });

  const shutdown = async () => {
    console.log('[server] shutting down...');
    wsGateway.close();
    httpServer.close();
    await closePool();
    process.exit(0);
  };

  process.on('SIGTERM', shutdown);
  process.on('SIGINT', shutdown);
}

main().catch((err) => {
  console.error('[server] fatal startup error', err);
  process.exit(1);
});
