import type { Station, StationId } from './station.js';

/**
 * A rental inferred from two consecutive at-rest samples of one vehicle.
 * Endpoint stations are copied in at detection time and never revised.
 */
export interface Trip {
  readonly vehicleId: string;
  readonly startStation: Station;
  readonly endStation: Station;
  readonly startedAt: number; // epoch seconds
  readonly endedAt: number; // epoch seconds
  readonly durationSeconds: number;
}

/** Persisted trip shape. Downstream tooling reads these exact keys. */
export interface TripRecord {
  started_at: string;
  ended_at: string;
  duration: number;
  start_station_id: StationId;
  start_station_name: string;
  start_station_latitude: number;
  start_station_longitude: number;
  end_station_id: StationId;
  end_station_name: string;
  end_station_latitude: number;
  end_station_longitude: number;
}

export function createTrip(
  vehicleId: string,
  startStation: Station,
  endStation: Station,
  startedAt: number,
  endedAt: number,
): Trip {
  return {
    vehicleId,
    startStation,
    endStation,
    startedAt,
    endedAt,
    durationSeconds: endedAt - startedAt,
  };
}

/**
 * Renders epoch seconds as `YYYY-MM-DD HH:MM:SS+00:00`, with a
 * `.ffffff` fraction only when the instant is not on a whole second.
 */
export function formatUtcInstant(epochSeconds: number): string {
  const wholeSeconds = Math.floor(epochSeconds);
  const micros = Math.round((epochSeconds - wholeSeconds) * 1_000_000);
  const base = new Date(wholeSeconds * 1000).toISOString().slice(0, 19).replace('T', ' ');
  const fraction = micros > 0 ? `.${String(micros).padStart(6, '0')}` : '';
  return `${base}${fraction}+00:00`;
}

export function toTripRecord(trip: Trip): TripRecord {
  return {
    started_at: formatUtcInstant(trip.startedAt),
    ended_at: formatUtcInstant(trip.endedAt),
    duration: Math.round(trip.durationSeconds),
    start_station_id: trip.startStation.id,
    start_station_name: trip.startStation.name,
    start_station_latitude: trip.startStation.lat,
    start_station_longitude: trip.startStation.lon,
    end_station_id: trip.endStation.id,
    end_station_name: trip.endStation.name,
    end_station_latitude: trip.endStation.lat,
    end_station_longitude: trip.endStation.lon,
  };
}
