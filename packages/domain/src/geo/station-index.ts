import type { GeoPoint } from '../entities/geo-point.js';
import { flexParkingAt } from '../entities/station.js';
import type { Station } from '../entities/station.js';
import { distanceMeters } from './distance.js';

export const DEFAULT_STATION_MATCH_RADIUS_M = 10;

export type StationLoadReason = 'empty' | 'malformed_station' | 'invalid_radius';

export class StationLoadError extends Error {
  constructor(
    readonly reason: StationLoadReason,
    message: string,
  ) {
    super(message);
    this.name = 'StationLoadError';
  }
}

export type StationIndexResult =
  | { readonly ok: true; readonly index: StationIndex }
  | { readonly ok: false; readonly error: StationLoadError };

export interface StationIndexOptions {
  /** A station matches only when strictly closer than this */
  matchRadiusM?: number;
}

function isValidStation(station: Station): boolean {
  return (
    typeof station.name === 'string' &&
    (typeof station.id === 'string' || typeof station.id === 'number') &&
    Number.isFinite(station.lat) &&
    Number.isFinite(station.lon) &&
    Math.abs(station.lat) <= 90 &&
    Math.abs(station.lon) <= 180
  );
}

/**
 * Immutable station lookup sorted by longitude.
 *
 * `nearest()` is a longitude-local search: it binary-searches the query
 * longitude and only weighs the stations bordering that slot (left
 * neighbour, any exact-longitude matches, right neighbour). A station
 * further along the longitude axis but close in latitude can be missed.
 */
export class StationIndex {
  private constructor(
    private readonly sorted: readonly Station[],
    readonly matchRadiusM: number,
  ) {}

  static build(stations: readonly Station[], options: StationIndexOptions = {}): StationIndexResult {
    const matchRadiusM = options.matchRadiusM ?? DEFAULT_STATION_MATCH_RADIUS_M;
    if (!Number.isFinite(matchRadiusM) || matchRadiusM <= 0) {
      return {
        ok: false,
        error: new StationLoadError('invalid_radius', `Station match radius must be positive, got ${matchRadiusM}`),
      };
    }
    if (stations.length === 0) {
      return { ok: false, error: new StationLoadError('empty', 'Station list is empty') };
    }
    const badIndex = stations.findIndex((s) => !isValidStation(s));
    if (badIndex !== -1) {
      return {
        ok: false,
        error: new StationLoadError('malformed_station', `Station at position ${badIndex} has invalid fields`),
      };
    }

    const sorted = [...stations].sort((a, b) => a.lon - b.lon);
    return { ok: true, index: new StationIndex(sorted, matchRadiusM) };
  }

  get size(): number {
    return this.sorted.length;
  }

  /** Stations in ascending longitude order */
  list(): readonly Station[] {
    return this.sorted;
  }

  /** Closest bordering station within the match radius, else a flex parking placeholder at `point`. */
  nearest(point: GeoPoint): Station {
    const lo = this.lowerBound(point.lon);
    const hi = this.upperBound(point.lon, lo);
    const from = Math.max(0, lo - 1);
    const to = Math.min(this.sorted.length, hi + 1);

    let best: Station | null = null;
    let bestDistance = Infinity;
    for (let i = from; i < to; i++) {
      const candidate = this.sorted[i];
      if (candidate === undefined) continue;
      const d = distanceMeters(candidate, point);
      if (d < bestDistance) {
        best = candidate;
        bestDistance = d;
      }
    }

    if (best !== null && bestDistance < this.matchRadiusM) return best;
    return flexParkingAt(point);
  }

  /** First slot whose longitude is >= lon */
  private lowerBound(lon: number): number {
    let lo = 0;
    let hi = this.sorted.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      const station = this.sorted[mid];
      if (station !== undefined && station.lon < lon) lo = mid + 1;
      else hi = mid;
    }
    return lo;
  }

  /** First slot whose longitude is > lon, searching from `start` */
  private upperBound(lon: number, start: number): number {
    let lo = start;
    let hi = this.sorted.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      const station = this.sorted[mid];
      if (station !== undefined && station.lon <= lon) lo = mid + 1;
      else hi = mid;
    }
    return lo;
  }
}
