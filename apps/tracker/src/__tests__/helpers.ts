import { FleetTracker, StationIndex } from '@fleet-trips/domain';
import type { FeedVehicle, FleetSnapshot } from '@fleet-trips/domain';

export function makeTracker(): FleetTracker {
  const result = StationIndex.build([
    { id: 's1', name: 'Station One', lat: 0, lon: 0 },
    { id: 's2', name: 'Station Two', lat: 0, lon: 0.002 },
  ]);
  if (!result.ok) throw result.error;
  return new FleetTracker(result.index);
}

export function bike(id: string, lat: number, lon: number, enabled = true): FeedVehicle {
  return { id, lat, lon, enabled };
}

export function snapshot(lastUpdated: number, vehicles: FeedVehicle[], ttl = 60): FleetSnapshot {
  return { lastUpdated, ttl, vehicles };
}
