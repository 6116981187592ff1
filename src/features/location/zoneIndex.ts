import { bbox, booleanPointInPolygon } from '@turf/turf';
import { GridIndex } from '@/lib/geo/gridIndex';
import type { Zone } from '@/types/zoning';

/**
 * Zone polygons filed by bounding box in the lon/lat plane.
 * Read-only once built.
 */
export interface ZoneIndex {
  readonly zones: readonly Zone[];
  readonly grid: GridIndex;
}

export function buildZoneIndex(zones: Zone[]): ZoneIndex {
  const boxes = zones.map((zone) => {
    const [minX, minY, maxX, maxY] = bbox(zone.geometry);
    return { minX, minY, maxX, maxY };
  });
  return { zones: [...zones], grid: GridIndex.build(boxes) };
}

/**
 * Zone containing the coordinate, or null when the point falls outside every
 * polygon (e.g. beyond the municipal boundary). Points on a boundary count as
 * inside; when polygons overlap the first one in source order wins.
 */
export function findZoneForPoint(index: ZoneIndex, lat: number, lon: number): Zone | null {
  if (!Number.isFinite(lat) || !Number.isFinite(lon)) return null;

  const candidates = index.grid.query({ minX: lon, minY: lat, maxX: lon, maxY: lat });
  for (const id of candidates) {
    const zone = index.zones[id];
    if (booleanPointInPolygon([lon, lat], zone.geometry)) {
      return zone;
    }
  }
  return null;
}
