import fs from 'node:fs';
import { z } from 'zod';
import type { GeoJsonProperties } from 'geojson';
import type { Street, StreetGeometry, Zone, ZoneGeometry } from '@/types/zoning';

/** Property keys the zoning and street layers use, in priority order */
export const ZONE_CODE_KEYS = ['sigla', 'SIGLA', 'zona_sigla', 'ZONA_SIGLA', 'name'] as const;
export const ZONE_NAME_KEYS = ['zona', 'ZONA', 'nome', 'NOME'] as const;
export const STREET_NAME_KEYS = ['log_ofic', 'LOG_OFIC', 'name', 'nome', 'NOME'] as const;
export const STREET_HIERARCHY_KEYS = ['hierarquia', 'HIERARQUIA'] as const;

const position = z.array(z.number()).min(2);
const ring = z.array(position).min(4);

const ZoneGeometrySchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('Polygon'), coordinates: z.array(ring).min(1) }),
  z.object({ type: z.literal('MultiPolygon'), coordinates: z.array(z.array(ring).min(1)).min(1) }),
]);

const StreetGeometrySchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('LineString'), coordinates: z.array(position).min(2) }),
  z.object({ type: z.literal('MultiLineString'), coordinates: z.array(z.array(position).min(2)).min(1) }),
]);

const FeatureCollectionSchema = z.object({
  type: z.literal('FeatureCollection'),
  features: z.array(
    z.object({
      geometry: z.unknown(),
      properties: z.record(z.unknown()).nullable().optional(),
    }),
  ),
});

export type RawFeatureCollection = z.infer<typeof FeatureCollectionSchema>;

export interface LoadedLayer<T> {
  items: T[];
  skipped: number;
}

/** First non-empty value among the keys, as a trimmed string */
export function pickProperty(props: GeoJsonProperties, keys: readonly string[]): string | null {
  if (!props) return null;
  for (const key of keys) {
    const value: unknown = props[key];
    if (value === null || value === undefined) continue;
    const text = String(value).trim();
    if (text !== '') return text;
  }
  return null;
}

export function parseFeatureCollection(json: unknown, label: string): RawFeatureCollection {
  const parsed = FeatureCollectionSchema.safeParse(json);
  if (!parsed.success) {
    throw new Error(`${label}: not a GeoJSON FeatureCollection`);
  }
  return parsed.data;
}

/** Zones from a zoning layer. Features without polygon geometry or code are skipped. */
export function zonesFromGeoJson(collection: RawFeatureCollection): LoadedLayer<Zone> {
  const items: Zone[] = [];
  let skipped = 0;

  for (const feature of collection.features) {
    const geometry = ZoneGeometrySchema.safeParse(feature.geometry);
    const properties = feature.properties ?? null;
    const code = pickProperty(properties, ZONE_CODE_KEYS);
    if (!geometry.success || !code) {
      skipped++;
      continue;
    }
    const zoneGeometry: ZoneGeometry = geometry.data;
    items.push({
      id: items.length,
      code,
      name: pickProperty(properties, ZONE_NAME_KEYS),
      geometry: zoneGeometry,
      properties,
    });
  }

  return { items, skipped };
}

/** Streets from a street layer. Features without line geometry are skipped. */
export function streetsFromGeoJson(collection: RawFeatureCollection): LoadedLayer<Street> {
  const items: Street[] = [];
  let skipped = 0;

  for (const feature of collection.features) {
    const geometry = StreetGeometrySchema.safeParse(feature.geometry);
    if (!geometry.success) {
      skipped++;
      continue;
    }
    const properties = feature.properties ?? null;
    const streetGeometry: StreetGeometry = geometry.data;
    items.push({
      id: items.length,
      name: pickProperty(properties, STREET_NAME_KEYS),
      hierarchy: pickProperty(properties, STREET_HIERARCHY_KEYS),
      geometry: streetGeometry,
      properties,
    });
  }

  return { items, skipped };
}

function readJson(filePath: string): unknown {
  return JSON.parse(fs.readFileSync(filePath, 'utf-8'));
}

export function loadZonesFile(filePath: string): Zone[] {
  const layer = zonesFromGeoJson(parseFeatureCollection(readJson(filePath), filePath));
  if (layer.skipped > 0) {
    console.warn(`Zoning layer ${filePath}: ${layer.skipped} feature(s) skipped`);
  }
  return layer.items;
}

export function loadStreetsFile(filePath: string): Street[] {
  const layer = streetsFromGeoJson(parseFeatureCollection(readJson(filePath), filePath));
  if (layer.skipped > 0) {
    console.warn(`Street layer ${filePath}: ${layer.skipped} feature(s) skipped`);
  }
  return layer.items;
}
