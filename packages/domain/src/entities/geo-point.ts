/** WGS84 coordinate in decimal degrees */
export interface GeoPoint {
  readonly lat: number;
  readonly lon: number;
}
