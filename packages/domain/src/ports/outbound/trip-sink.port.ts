import type { TripRecord } from '../../entities/trip.js';

export interface TripSinkPort {
  /** Short label for logs, e.g. "json-file" */
  readonly name: string;
  saveAll(records: readonly TripRecord[]): Promise<void>;
}
