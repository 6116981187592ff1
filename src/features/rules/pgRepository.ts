import pg from 'pg';
import type { Pool } from 'pg';
import { RepositoryUnavailableError } from '@/lib/errors';
import type { AppConfig } from '@/lib/config';
import type { RuleRepository } from './repository';
import {
  toCurrentParkingRule,
  toLegacyParkingRule,
  toSanitaryProfile,
  toUseSanitaryProfile,
  toUseType,
  toZoneRule,
} from './schemas';

/** The slice of `pg.Pool` / `pg.Client` the repository needs */
export interface Queryable {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;
}

export function createPool(config: Pick<AppConfig, 'databaseUrl' | 'dbQueryTimeoutMs'>): Pool {
  if (!config.databaseUrl) {
    throw new Error('DATABASE_URL is not set');
  }
  return new pg.Pool({
    connectionString: config.databaseUrl,
    query_timeout: config.dbQueryTimeoutMs,
    connectionTimeoutMillis: config.dbQueryTimeoutMs,
    max: 5,
  });
}

const ZONE_RULE_SQL = `
  SELECT zone_sigla, use_type_code,
         to_max, tp_min, ia_min, ia_max, to_sub_max,
         recuo_frontal_m, recuo_lateral_m, recuo_fundos_m,
         gabarito_m, gabarito_pav,
         area_min_lote_m2, area_max_lote_m2,
         testada_min_meio_m, testada_min_esquina_m, testada_max_m,
         allow_attach_one_side, notes, special_area_tag,
         observacoes, source_ref, requires_subzone, subzone_code
    FROM zone_rules
   WHERE zone_sigla = $1 AND use_type_code = $2
   LIMIT 1`;

const CURRENT_PARKING_SQL = `
  SELECT use_code, base_metric, rule_json, general_notes, source_ref, notes
    FROM parking_rules_v2
   WHERE use_code = $1
   LIMIT 1`;

const LEGACY_PARKING_SQL = `
  SELECT use_type_code, metric, value, min_vagas, source_ref, rule_json
    FROM parking_rules
   WHERE use_type_code = $1
   LIMIT 1`;

const SANITARY_MAPPING_SQL = `
  SELECT use_type_code, sanitary_profile, notes
    FROM use_sanitary_profile
   WHERE use_type_code = $1
   LIMIT 1`;

const SANITARY_PROFILE_SQL = `
  SELECT sanitary_profile, title, rule_json, source_ref, notes
    FROM sanitary_profiles
   WHERE sanitary_profile = $1
   LIMIT 1`;

const USE_TYPES_SQL = `
  SELECT code, label, category
    FROM use_types
   WHERE is_active = TRUE
   ORDER BY category, label`;

export function createPgRuleRepository(db: Queryable): RuleRepository {
  async function rows(operation: string, sql: string, values: unknown[] = []): Promise<unknown[]> {
    try {
      const result = await db.query(sql, values);
      return result.rows;
    } catch (err) {
      console.error(`Rule store error (${operation}):`, err);
      throw new RepositoryUnavailableError(operation, err);
    }
  }

  async function first<T>(
    operation: string,
    sql: string,
    values: unknown[],
    convert: (row: unknown) => T,
  ): Promise<T | null> {
    const [row] = await rows(operation, sql, values);
    return row === undefined ? null : convert(row);
  }

  return {
    async getZoneRule(zoneCode, useCode) {
      if (!zoneCode || !useCode) return null;
      return first('getZoneRule', ZONE_RULE_SQL, [zoneCode, useCode], toZoneRule);
    },

    async getCurrentParkingRule(useCode) {
      if (!useCode) return null;
      return first('getCurrentParkingRule', CURRENT_PARKING_SQL, [useCode], toCurrentParkingRule);
    },

    async getLegacyParkingRule(useCode) {
      if (!useCode) return null;
      return first('getLegacyParkingRule', LEGACY_PARKING_SQL, [useCode], toLegacyParkingRule);
    },

    async getSanitaryProfile(profileId) {
      if (!profileId) return null;
      return first('getSanitaryProfile', SANITARY_PROFILE_SQL, [profileId], toSanitaryProfile);
    },

    async getUseSanitaryProfileMapping(useCode) {
      if (!useCode) return null;
      return first('getUseSanitaryProfileMapping', SANITARY_MAPPING_SQL, [useCode], toUseSanitaryProfile);
    },

    async listActiveUseTypes() {
      const result = await rows('listActiveUseTypes', USE_TYPES_SQL);
      return result.map(toUseType);
    },
  };
}
