import { toTripRecord } from '@fleet-trips/domain';
import type { FleetTracker, TripSinkPort } from '@fleet-trips/domain';

export interface ExportSummary {
  trips: number;
  failedSinks: string[];
}

/**
 * Hands the start-time-ordered trip log to every sink. A failing sink is
 * logged and reported without keeping the others from running.
 */
export async function exportTrips(tracker: FleetTracker, sinks: readonly TripSinkPort[]): Promise<ExportSummary> {
  const records = tracker.trips.sortedByStart().map(toTripRecord);
  const failedSinks: string[] = [];

  for (const sink of sinks) {
    try {
      await sink.saveAll(records);
      console.log(`[trip-store] saved ${records.length} trips to ${sink.name}`);
    } catch (err) {
      console.error(`[trip-store] could not save trips to ${sink.name}`, err);
      failedSinks.push(sink.name);
    }
  }

  return { trips: records.length, failedSinks };
}
