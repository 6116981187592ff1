import path from 'node:path';
import dotenv from 'dotenv';
import { z } from 'zod';

const commaList = z
  .string()
  .default('')
  .transform((raw) =>
    raw
      .split(',')
      .map((code) => code.trim())
      .filter((code) => code.length > 0),
  );

const EnvSchema = z.object({
  DATABASE_URL: z.string().min(1).optional(),
  ZONE_GEOJSON_PATH: z.string().min(1).default('data/zoneamento.json'),
  STREET_GEOJSON_PATH: z.string().min(1).default('data/ruas.json'),
  STREET_MAX_DISTANCE_M: z.coerce.number().positive().default(120),
  RULE_CACHE_TTL_MS: z.coerce.number().int().nonnegative().default(5 * 60 * 1000),
  DB_QUERY_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  NEIGHBORHOOD_USE_CODES: commaList,
});

export interface AppConfig {
  databaseUrl: string | null;
  zoneGeoJsonPath: string;
  streetGeoJsonPath: string;
  streetMaxDistanceM: number;
  ruleCacheTtlMs: number;
  dbQueryTimeoutMs: number;
  /** Neighbourhood-serving uses that may take the setback flexibility variant */
  neighborhoodUseCodes: string[];
}

/** Validate an environment record. Throws with the offending keys listed. */
export function loadConfig(env: Record<string, string | undefined>): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const keys = parsed.error.issues.map((issue) => issue.path.join('.')).join(', ');
    throw new Error(`Invalid configuration: ${keys}`);
  }
  const e = parsed.data;
  return {
    databaseUrl: e.DATABASE_URL ?? null,
    zoneGeoJsonPath: e.ZONE_GEOJSON_PATH,
    streetGeoJsonPath: e.STREET_GEOJSON_PATH,
    streetMaxDistanceM: e.STREET_MAX_DISTANCE_M,
    ruleCacheTtlMs: e.RULE_CACHE_TTL_MS,
    dbQueryTimeoutMs: e.DB_QUERY_TIMEOUT_MS,
    neighborhoodUseCodes: e.NEIGHBORHOOD_USE_CODES,
  };
}

/** .env.local → .env, then validate process.env */
export function getConfig(cwd: string = process.cwd()): AppConfig {
  dotenv.config({ path: path.resolve(cwd, '.env.local') });
  dotenv.config({ path: path.resolve(cwd, '.env') });
  return loadConfig(process.env);
}
