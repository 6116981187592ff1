export type { ZoneIndex } from './zoneIndex';
export { buildZoneIndex, findZoneForPoint } from './zoneIndex';

export type { StreetIndex } from './streetIndex';
export {
  buildStreetIndex,
  findNearestStreet,
  distanceToStreet,
  DEFAULT_MAX_STREET_DISTANCE_M,
} from './streetIndex';

export type { LocationResolver, LocationResolverOptions } from './resolver';
export {
  createLocationResolver,
  createLocationResolverFromFiles,
  requireZone,
  isLocalStreet,
} from './resolver';

export type { LoadedLayer, RawFeatureCollection } from './geoJsonSource';
export {
  parseFeatureCollection,
  zonesFromGeoJson,
  streetsFromGeoJson,
  loadZonesFile,
  loadStreetsFile,
  pickProperty,
} from './geoJsonSource';
