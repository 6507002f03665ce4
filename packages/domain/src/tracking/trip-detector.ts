import type { TrackedVehicle, VehicleObservation } from '../entities/vehicle-observation.js';
import { createTrip } from '../entities/trip.js';
import type { Trip } from '../entities/trip.js';
import { distanceMeters } from '../geo/distance.js';
import type { StationIndex } from '../geo/station-index.js';
import { DEFAULT_DETECTION_THRESHOLDS } from './thresholds.js';
import type { DetectionThresholds } from './thresholds.js';

export type ReconcileOutcome =
  /** Disabled and never tracked */
  | { readonly kind: 'ignored' }
  /** First enabled sighting */
  | { readonly kind: 'tracked'; readonly vehicle: TrackedVehicle }
  /** No trip; lastSeen refreshed, coordinates replaced only when `moved` */
  | { readonly kind: 'refreshed'; readonly vehicle: TrackedVehicle; readonly moved: boolean }
  | { readonly kind: 'trip'; readonly vehicle: TrackedVehicle; readonly trip: Trip };

function toTracked(observation: VehicleObservation): TrackedVehicle {
  return {
    id: observation.id,
    lat: observation.lat,
    lon: observation.lon,
    lastSeen: observation.observedAt,
  };
}

/**
 * Decides what a new observation means for a vehicle by comparing it to the
 * vehicle's last at-rest sample. There is no in-trip state: a trip is
 * inferred after the fact from two samples far enough apart in both space
 * and time. A vehicle that vanishes from the feed is not noticed, so a
 * round trip back to the same spot goes unrecorded.
 */
export class TripDetector {
  constructor(
    private readonly stations: StationIndex,
    private readonly thresholds: DetectionThresholds = DEFAULT_DETECTION_THRESHOLDS,
  ) {}

  reconcile(previous: TrackedVehicle | undefined, current: VehicleObservation): ReconcileOutcome {
    if (previous === undefined) {
      return current.enabled ? { kind: 'tracked', vehicle: toTracked(current) } : { kind: 'ignored' };
    }

    const movedFar = distanceMeters(previous, current) > this.thresholds.minTripDistanceM;
    const elapsed = current.observedAt - previous.lastSeen;
    if (movedFar && elapsed > this.thresholds.minTripDurationS) {
      const trip = createTrip(
        current.id,
        this.stations.nearest(previous),
        this.stations.nearest(current),
        previous.lastSeen,
        current.observedAt,
      );
      return { kind: 'trip', vehicle: toTracked(current), trip };
    }

    const moved = previous.lat !== current.lat || previous.lon !== current.lon;
    const vehicle = moved ? toTracked(current) : { ...previous, lastSeen: current.observedAt };
    return { kind: 'refreshed', vehicle, moved };
  }
}
