// ─── PostgreSQL Adapters ───────────────────────────────────────────────────────
export { getPool, closePool, withTransaction } from './postgres/pool.js';
export type { DbPool, DbClient } from './postgres/pool.js';
export { PgIngestStore } from './postgres/ingest.store.js';
export { PgReadingRepository } from './postgres/reading.repository.js';
export { PgPositionRepository } from './postgres/position.repository.js';
export { PgReportSessionRepository } from './postgres/report-session.repository.js';

// ─── Downstream Forwarder ─────────────────────────────────────────────────────
export {
  HttpReadingForwarder,
  DisabledReadingForwarder,
} from './http/reading-forwarder.adapter.js';
export type { HttpReadingForwarderOptions } from './http/reading-forwarder.adapter.js';

// ─── Motion Cache ─────────────────────────────────────────────────────────────
export { InMemoryMotionCache } from './memory/in-memory-motion-cache.js';

// ─── Clock ────────────────────────────────────────────────────────────────────
export { SystemClock, ManualClock } from './clock/clock.js';
