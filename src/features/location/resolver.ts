import { fail, ok, streetNotFound, zoneNotFound, type FeasibilityIssue, type Outcome } from '@/lib/errors';
import type { LocationResult, Zone } from '@/types/zoning';
import type { AppConfig } from '@/lib/config';
import { buildZoneIndex, findZoneForPoint, type ZoneIndex } from './zoneIndex';
import {
  buildStreetIndex,
  DEFAULT_MAX_STREET_DISTANCE_M,
  findNearestStreet,
  type StreetIndex,
} from './streetIndex';
import { loadStreetsFile, loadZonesFile } from './geoJsonSource';

export interface LocationResolverOptions {
  zoneIndex: ZoneIndex;
  streetIndex: StreetIndex;
  maxStreetDistanceM?: number;
}

export interface LocationResolver {
  resolve(lat: number, lon: number): LocationResult;
}

/**
 * Zone and street lookups run independently: a zone without a nearby street
 * is a valid result, and so is the reverse.
 */
export function createLocationResolver(options: LocationResolverOptions): LocationResolver {
  const { zoneIndex, streetIndex } = options;
  const maxDistanceM = options.maxStreetDistanceM ?? DEFAULT_MAX_STREET_DISTANCE_M;

  return {
    resolve(lat, lon) {
      const zone = findZoneForPoint(zoneIndex, lat, lon);
      const street = findNearestStreet(streetIndex, lat, lon, maxDistanceM);

      const issues: FeasibilityIssue[] = [];
      if (!zone) issues.push(zoneNotFound(lat, lon));
      if (!street) issues.push(streetNotFound(lat, lon, maxDistanceM));

      return {
        lat,
        lon,
        zone,
        street,
        zoneCode: zone?.code ?? null,
        zoneName: zone?.name ?? null,
        streetName: street?.street.name ?? null,
        streetHierarchy: street?.street.hierarchy ?? null,
        streetDistanceM: street?.distanceM ?? null,
        issues,
      };
    },
  };
}

export function createLocationResolverFromFiles(
  config: Pick<AppConfig, 'zoneGeoJsonPath' | 'streetGeoJsonPath' | 'streetMaxDistanceM'>,
): LocationResolver {
  const zones = loadZonesFile(config.zoneGeoJsonPath);
  const streets = loadStreetsFile(config.streetGeoJsonPath);
  return createLocationResolver({
    zoneIndex: buildZoneIndex(zones),
    streetIndex: buildStreetIndex(streets),
    maxStreetDistanceM: config.streetMaxDistanceM,
  });
}

/** The study flow cannot go on without a zone */
export function requireZone(location: LocationResult): Outcome<Zone> {
  return location.zone ? ok(location.zone) : fail(zoneNotFound(location.lat, location.lon));
}

function normalize(text: string): string {
  return text
    .normalize('NFD')
    .replace(/[̀-ͯ]/g, '')
    .trim()
    .toLowerCase();
}

/** "Local", "Via Local", "LOCAL"... */
export function isLocalStreet(hierarchy: string | null): boolean {
  if (!hierarchy) return false;
  return /\blocal\b/.test(normalize(hierarchy));
}
