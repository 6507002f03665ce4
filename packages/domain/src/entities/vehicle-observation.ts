import type { GeoPoint } from './geo-point.js';

/** One vehicle as listed in a decoded feed snapshot */
export interface FeedVehicle extends GeoPoint {
  readonly id: string;
  readonly enabled: boolean;
}

/** A feed vehicle stamped with the snapshot instant it was observed at */
export interface VehicleObservation extends FeedVehicle {
  readonly observedAt: number; // epoch seconds
}

/** FleetState entry: the last at-rest sample known for a vehicle */
export interface TrackedVehicle extends GeoPoint {
  readonly id: string;
  readonly lastSeen: number; // epoch seconds
}
