import type { GeoPoint } from '../entities/geo-point.js';

export const EARTH_RADIUS_M = 6_371_000;

const toRadians = (deg: number): number => (deg * Math.PI) / 180;

/**
 * Equirectangular (flat-earth) distance in meters. Good enough for the
 * few-hundred-meter spans compared here; no antimeridian or polar handling.
 */
export function distanceMeters(a: GeoPoint, b: GeoPoint): number {
  const lat1 = toRadians(a.lat);
  const lat2 = toRadians(b.lat);
  const dLat = lat2 - lat1;
  const dLon = toRadians(b.lon - a.lon);
  const meanLat = (lat1 + lat2) / 2;
  return EARTH_RADIUS_M * Math.sqrt(dLat ** 2 + (Math.cos(meanLat) * dLon) ** 2);
}
