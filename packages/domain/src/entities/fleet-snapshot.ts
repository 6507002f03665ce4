import type { FeedVehicle } from './vehicle-observation.js';

/** One decoded poll of the vehicle feed */
export interface FleetSnapshot {
  readonly lastUpdated: number; // epoch seconds
  readonly ttl: number; // seconds until the next expected refresh
  readonly vehicles: readonly FeedVehicle[];
}
