import { bbox } from '@turf/turf';
import type { Position } from 'geojson';
import { lineToLocal, wgs84ToLocal, type GeoOrigin, type LocalPoint } from '@/lib/geo/coordTransform';
import { bboxAround, GridIndex } from '@/lib/geo/gridIndex';
import { distanceToPolylines, polylineBounds } from '@/lib/utils/geometry';
import type { Street, StreetGeometry, StreetMatch } from '@/types/zoning';

export const DEFAULT_MAX_STREET_DISTANCE_M = 120;

/**
 * Street lines projected to a local metric plane around the dataset centre,
 * so distances come out in meters. Read-only once built.
 */
export interface StreetIndex {
  readonly streets: readonly Street[];
  readonly origin: GeoOrigin;
  readonly lines: readonly LocalPoint[][][];
  readonly grid: GridIndex;
}

function linePositions(geometry: StreetGeometry): Position[][] {
  return geometry.type === 'LineString' ? [geometry.coordinates] : geometry.coordinates;
}

function datasetOrigin(streets: Street[]): GeoOrigin {
  if (streets.length === 0) return { lng: 0, lat: 0 };
  const [minX, minY, maxX, maxY] = bbox({
    type: 'GeometryCollection',
    geometries: streets.map((s) => s.geometry),
  });
  return { lng: (minX + maxX) / 2, lat: (minY + maxY) / 2 };
}

export function buildStreetIndex(streets: Street[]): StreetIndex {
  const origin = datasetOrigin(streets);
  const lines = streets.map((street) =>
    linePositions(street.geometry).map((positions) => lineToLocal(positions, origin)),
  );
  const grid = GridIndex.build(lines.map((parts) => polylineBounds(parts)));
  return { streets: [...streets], origin, lines, grid };
}

/** Distance in meters from the coordinate to one street of the index */
export function distanceToStreet(index: StreetIndex, streetId: number, lat: number, lon: number): number {
  const p = wgs84ToLocal(lon, lat, index.origin);
  return distanceToPolylines(p, index.lines[streetId]);
}

/**
 * Nearest street within maxDistanceM, or null. Ties keep the street that
 * comes first in the source layer.
 */
export function findNearestStreet(
  index: StreetIndex,
  lat: number,
  lon: number,
  maxDistanceM: number = DEFAULT_MAX_STREET_DISTANCE_M,
): StreetMatch | null {
  if (!Number.isFinite(lat) || !Number.isFinite(lon) || maxDistanceM < 0) return null;

  const p = wgs84ToLocal(lon, lat, index.origin);
  const candidates = index.grid.query(bboxAround(p.x, p.y, maxDistanceM));

  let bestId = -1;
  let bestDistance = Infinity;
  for (const id of candidates) {
    const d = distanceToPolylines(p, index.lines[id]);
    if (d < bestDistance) {
      bestDistance = d;
      bestId = id;
    }
  }

  if (bestId < 0 || bestDistance > maxDistanceM) return null;
  return { street: index.streets[bestId], distanceM: bestDistance };
}
