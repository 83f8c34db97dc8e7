// ─── Entities ─────────────────────────────────────────────────────────────────
export * from './entities/raw-reading.js';
export * from './entities/calibrated-reading.js';
export * from './entities/processed-record.js';
export * from './entities/motion-cache-entry.js';
export * from './entities/report-session.js';
export * from './entities/ingest-summary.js';

// ─── Inbound Ports ────────────────────────────────────────────────────────────
export * from './ports/inbound/telemetry-ingestion.port.js';

// ─── Outbound Ports ───────────────────────────────────────────────────────────
export * from './ports/outbound/ingest-store.port.js';
export * from './ports/outbound/reading-forwarder.port.js';
export * from './ports/outbound/motion-cache.port.js';
export * from './ports/outbound/position-publisher.port.js';
export * from './ports/outbound/clock.port.js';
