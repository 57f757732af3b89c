// ─── Values / Errors ──────────────────────────────────────────────────────────
export * from './values/coercion.js';
export * from './values/payload-codec.js';
export * from './errors.js';

// ─── Entities ─────────────────────────────────────────────────────────────────
export * from './entities/trip-record.js';
export * from './entities/record-outcome.js';
export * from './entities/stage-response.js';

// ─── Inbound Ports ────────────────────────────────────────────────────────────
export * from './ports/inbound/trip-ingestion.port.js';
export * from './ports/inbound/trip-enrichment.port.js';
export * from './ports/inbound/fare-processing.port.js';

// ─── Outbound Ports ───────────────────────────────────────────────────────────
export * from './ports/outbound/trip-source.port.js';
export * from './ports/outbound/stream-publisher.port.js';
export * from './ports/outbound/reverse-geocoder.port.js';
export * from './ports/outbound/work-queue.port.js';
export * from './ports/outbound/trip-store.port.js';
export * from './ports/outbound/analytics-sink.port.js';
