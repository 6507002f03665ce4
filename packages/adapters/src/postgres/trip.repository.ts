import type { TripRecord, TripSinkPort } from '@fleet-trips/domain';
import { withTransaction } from './pool.js';
import type { Queryable } from './pool.js';

export type TransactionRunner = <T>(fn: (client: Queryable) => Promise<T>) => Promise<T>;

const COLUMNS = [
  'started_at',
  'ended_at',
  'duration_s',
  'start_station_id',
  'start_station_name',
  'start_station_lat',
  'start_station_lon',
  'end_station_id',
  'end_station_name',
  'end_station_lat',
  'end_station_lon',
] as const;

// keeps each statement well under pg's 65535 bind parameter limit
const ROWS_PER_INSERT = 1_000;

function recordValues(r: TripRecord): unknown[] {
  return [
    r.started_at,
    r.ended_at,
    r.duration,
    String(r.start_station_id),
    r.start_station_name,
    r.start_station_latitude,
    r.start_station_longitude,
    String(r.end_station_id),
    r.end_station_name,
    r.end_station_latitude,
    r.end_station_longitude,
  ];
}

export class PgTripRepository implements TripSinkPort {
  readonly name = 'postgres';

  constructor(private readonly transact: TransactionRunner = withTransaction) {}

  async saveAll(records: readonly TripRecord[]): Promise<void> {
    if (records.length === 0) return;
    await this.transact(async (client) => {
      for (let start = 0; start < records.length; start += ROWS_PER_INSERT) {
        const chunk = records.slice(start, start + ROWS_PER_INSERT);
        const values: unknown[] = [];
        const placeholders = chunk.map((r, i) => {
          values.push(...recordValues(r));
          const base = i * COLUMNS.length;
          const cols = COLUMNS.map((_, k) => `$${base + k + 1}`);
          return `(${cols.join(',')})`;
        });
        await client.query(
          `INSERT INTO bikeshare.trips (${COLUMNS.join(', ')})
           VALUES ${placeholders.join(',')}`,
          values,
        );
      }
    });
  }
}
