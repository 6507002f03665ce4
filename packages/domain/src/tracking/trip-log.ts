import type { Trip } from '../entities/trip.js';

/**
 * Append-only trip list kept in detection order, which follows poll and
 * payload order rather than start time.
 */
export class TripLog {
  private readonly trips: Trip[] = [];

  append(trip: Trip): void {
    this.trips.push(trip);
  }

  get size(): number {
    return this.trips.length;
  }

  inDetectionOrder(): readonly Trip[] {
    return [...this.trips];
  }

  /** Copy sorted ascending by start time; equal starts keep detection order */
  sortedByStart(): Trip[] {
    return [...this.trips].sort((a, b) => a.startedAt - b.startedAt);
  }
}
