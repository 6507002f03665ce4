// ─── Entities ─────────────────────────────────────────────────────────────────
export * from './entities/geo-point.js';
export * from './entities/station.js';
export * from './entities/vehicle-observation.js';
export * from './entities/fleet-snapshot.js';
export * from './entities/trip.js';

// ─── Geometry ─────────────────────────────────────────────────────────────────
export * from './geo/distance.js';
export * from './geo/station-index.js';

// ─── Tracking ─────────────────────────────────────────────────────────────────
export * from './tracking/thresholds.js';
export * from './tracking/fleet-state.js';
export * from './tracking/trip-log.js';
export * from './tracking/trip-detector.js';
export * from './tracking/fleet-tracker.js';

// ─── Inbound Ports ────────────────────────────────────────────────────────────
export * from './ports/inbound/snapshot-ingestion.port.js';
export * from './ports/inbound/fleet-query.port.js';

// ─── Outbound Ports ───────────────────────────────────────────────────────────
export * from './ports/outbound/feed-source.port.js';
export * from './ports/outbound/trip-sink.port.js';
export * from './ports/outbound/clock.port.js';
