import type { FleetSnapshot } from '../entities/fleet-snapshot.js';
import type { TrackedVehicle } from '../entities/vehicle-observation.js';
import { toTripRecord } from '../entities/trip.js';
import type { Trip } from '../entities/trip.js';
import type { StationIndex } from '../geo/station-index.js';
import type { PollCounters, SnapshotIngestionPort, SnapshotResult } from '../ports/inbound/snapshot-ingestion.port.js';
import type { FleetQueryPort, FleetSummary, TripListQuery, TripPage } from '../ports/inbound/fleet-query.port.js';
import { FleetState } from './fleet-state.js';
import { TripLog } from './trip-log.js';
import { TripDetector } from './trip-detector.js';
import { DEFAULT_DETECTION_THRESHOLDS } from './thresholds.js';
import type { DetectionThresholds } from './thresholds.js';

const DEFAULT_TRIP_PAGE_SIZE = 50;

/**
 * Owns everything one poll loop mutates: fleet state, trip log and the
 * last applied feed timestamp. Snapshots must be applied one at a time.
 */
export class FleetTracker implements SnapshotIngestionPort, FleetQueryPort {
  readonly fleet = new FleetState();
  readonly trips = new TripLog();
  private readonly detector: TripDetector;
  private lastUpdated: number | null = null;
  private ttl: number | null = null;

  constructor(
    readonly stations: StationIndex,
    thresholds: DetectionThresholds = DEFAULT_DETECTION_THRESHOLDS,
  ) {
    this.detector = new TripDetector(stations, thresholds);
  }

  applySnapshot(snapshot: FleetSnapshot): SnapshotResult {
    if (this.lastUpdated !== null && snapshot.lastUpdated <= this.lastUpdated) {
      return {
        status: 'skipped',
        lastUpdated: snapshot.lastUpdated,
        reason: snapshot.lastUpdated === this.lastUpdated ? 'duplicate' : 'stale',
      };
    }
    this.lastUpdated = snapshot.lastUpdated;
    this.ttl = snapshot.ttl;

    const counters: PollCounters = { tracked: 0, ignored: 0, stationary: 0, repositioned: 0, trips: 0 };
    const detected: Trip[] = [];

    for (const vehicle of snapshot.vehicles) {
      const outcome = this.detector.reconcile(this.fleet.get(vehicle.id), {
        ...vehicle,
        observedAt: snapshot.lastUpdated,
      });
      switch (outcome.kind) {
        case 'ignored':
          counters.ignored++;
          break;
        case 'tracked':
          counters.tracked++;
          this.fleet.set(outcome.vehicle);
          break;
        case 'refreshed':
          if (outcome.moved) counters.repositioned++;
          else counters.stationary++;
          this.fleet.set(outcome.vehicle);
          break;
        case 'trip':
          counters.trips++;
          this.fleet.set(outcome.vehicle);
          this.trips.append(outcome.trip);
          detected.push(outcome.trip);
          break;
      }
    }

    return { status: 'applied', lastUpdated: snapshot.lastUpdated, ttl: snapshot.ttl, trips: detected, counters };
  }

  getSummary(): FleetSummary {
    return {
      lastUpdated: this.lastUpdated,
      ttl: this.ttl,
      trackedVehicles: this.fleet.size,
      stations: this.stations.size,
      trips: this.trips.size,
    };
  }

  getVehicle(vehicleId: string): TrackedVehicle | null {
    return this.fleet.get(vehicleId) ?? null;
  }

  listTrips(query: TripListQuery = {}): TripPage {
    const ordered = query.order === 'detected' ? this.trips.inDetectionOrder() : this.trips.sortedByStart();
    const offset = query.offset ?? 0;
    const limit = query.limit ?? DEFAULT_TRIP_PAGE_SIZE;
    return {
      data: ordered.slice(offset, offset + limit).map(toTripRecord),
      total: ordered.length,
    };
  }
}
