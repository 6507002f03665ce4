import type { TrackedVehicle } from '../../entities/vehicle-observation.js';
import type { TripRecord } from '../../entities/trip.js';

export interface FleetSummary {
  lastUpdated: number | null;
  ttl: number | null;
  trackedVehicles: number;
  stations: number;
  trips: number;
}

export type TripOrder = 'detected' | 'started';

export interface TripListQuery {
  order?: TripOrder;
  limit?: number;
  offset?: number;
}

export interface TripPage {
  data: TripRecord[];
  total: number;
}

export interface FleetQueryPort {
  getSummary(): FleetSummary;
  getVehicle(vehicleId: string): TrackedVehicle | null;
  listTrips(query?: TripListQuery): TripPage;
}
