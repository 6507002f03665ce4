import type { FleetSnapshot } from '../../entities/fleet-snapshot.js';
import type { Trip } from '../../entities/trip.js';

export interface PollCounters {
  /** Vehicles seen for the first time while enabled */
  tracked: number;
  /** Disabled vehicles never tracked before */
  ignored: number;
  /** Known vehicles that stayed put */
  stationary: number;
  /** Known vehicles whose coordinates changed without a trip */
  repositioned: number;
  trips: number;
}

export type SnapshotResult =
  | {
      readonly status: 'skipped';
      readonly lastUpdated: number;
      readonly reason: 'duplicate' | 'stale';
    }
  | {
      readonly status: 'applied';
      readonly lastUpdated: number;
      readonly ttl: number;
      readonly trips: readonly Trip[];
      readonly counters: PollCounters;
    };

export interface SnapshotIngestionPort {
  applySnapshot(snapshot: FleetSnapshot): SnapshotResult;
}
