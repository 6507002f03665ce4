import type { GeoPoint } from './geo-point.js';

// GBFS feeds disagree on whether station_id is a string or a number
export type StationId = string | number;

export interface Station extends GeoPoint {
  readonly id: StationId;
  readonly name: string;
}

export const FLEX_PARKING_STATION_ID = 0;
export const FLEX_PARKING_STATION_NAME = 'Flex parking';

/**
 * Placeholder station for a vehicle left outside any station radius
 * (dockless parking). It sits exactly on the vehicle's position.
 */
export function flexParkingAt(point: GeoPoint): Station {
  return {
    id: FLEX_PARKING_STATION_ID,
    name: FLEX_PARKING_STATION_NAME,
    lat: point.lat,
    lon: point.lon,
  };
}

export function isFlexParking(station: Station): boolean {
  return station.id === FLEX_PARKING_STATION_ID && station.name === FLEX_PARKING_STATION_NAME;
}
