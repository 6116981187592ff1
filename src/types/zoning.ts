import type {
  GeoJsonProperties,
  LineString,
  MultiLineString,
  MultiPolygon,
  Polygon,
} from 'geojson';
import type { FeasibilityIssue } from '@/lib/errors';

export type ZoneGeometry = Polygon | MultiPolygon;
export type StreetGeometry = LineString | MultiLineString;

/** Zoning polygon as loaded from the static zoning layer */
export interface Zone {
  id: number;
  /** Short code (sigla), e.g. "ZAM" */
  code: string;
  /** Display name */
  name: string | null;
  geometry: ZoneGeometry;
  properties: GeoJsonProperties;
}

export interface Street {
  id: number;
  /** Official street name (logradouro oficial) */
  name: string | null;
  /** Road hierarchy as registered: "Local", "Coletora", "Arterial"... */
  hierarchy: string | null;
  geometry: StreetGeometry;
  properties: GeoJsonProperties;
}

export interface StreetMatch {
  street: Street;
  distanceM: number;
}

export interface LocationResult {
  lat: number;
  lon: number;
  zone: Zone | null;
  street: StreetMatch | null;
  zoneCode: string | null;
  zoneName: string | null;
  streetName: string | null;
  streetHierarchy: string | null;
  streetDistanceM: number | null;
  issues: FeasibilityIssue[];
}
