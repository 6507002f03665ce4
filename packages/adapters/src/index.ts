// ─── GBFS Feed Adapter ────────────────────────────────────────────────────────
export { GbfsFeedClient, discoverFeeds } from './gbfs/gbfs-feed.client.js';
export type { GbfsFeedClientOptions, GbfsFeedUrls, HttpOptions } from './gbfs/gbfs-feed.client.js';
export { FeedError, FeedRequestError, FeedDecodeError } from './gbfs/feed-errors.js';
export type { FeedName } from './gbfs/feed-errors.js';

// ─── Trip Sinks ───────────────────────────────────────────────────────────────
export { JsonTripFileWriter } from './file/json-trip-file.writer.js';
export { getPool, closePool, withTransaction } from './postgres/pool.js';
export type { DbPool, Queryable } from './postgres/pool.js';
export { PgTripRepository } from './postgres/trip.repository.js';
export type { TransactionRunner } from './postgres/trip.repository.js';

// ─── Clock ────────────────────────────────────────────────────────────────────
export { systemClock, ManualClock } from './clock/clock.js';
