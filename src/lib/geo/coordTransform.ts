import type { Position } from 'geojson';

/** Local 2D point in meters relative to an origin */
export interface LocalPoint {
  x: number;
  y: number;
}

export interface GeoOrigin {
  lng: number;
  lat: number;
}

const METERS_PER_DEG_LNG_AT_EQUATOR = 111320;
const METERS_PER_DEG_LAT = 110540;

/**
 * Convert a WGS84 coordinate to local meters relative to an origin.
 * Equirectangular approximation, fine at city scale.
 */
export function wgs84ToLocal(lng: number, lat: number, origin: GeoOrigin): LocalPoint {
  const x = (lng - origin.lng) * Math.cos((origin.lat * Math.PI) / 180) * METERS_PER_DEG_LNG_AT_EQUATOR;
  const y = (lat - origin.lat) * METERS_PER_DEG_LAT;
  return { x, y };
}

/** Project a GeoJSON line ([lng, lat] positions) into local meters */
export function lineToLocal(positions: Position[], origin: GeoOrigin): LocalPoint[] {
  return positions.map(([lng, lat]) => wgs84ToLocal(lng, lat, origin));
}
