import { TtlCache } from '@/lib/api/cache';
import type { ZoneRule } from '@/types/regulation';
import type { ParkingRule } from '@/types/parking';
import type { SanitaryProfile, UseSanitaryProfile } from '@/types/sanitary';
import type { UseType } from '@/types/rules';
import type { RuleRepository } from './repository';

export interface CachedRuleRepository extends RuleRepository {
  /** Drop every cached lookup; returns how many entries went */
  invalidate(): number;
}

export interface CacheOptions {
  ttlMs: number;
  now?: () => number;
}

/**
 * Memoises lookups, `null` answers included, for `ttlMs`.
 * Rejections are never cached, so the next call goes back to the store.
 */
export function createCachedRuleRepository(inner: RuleRepository, options: CacheOptions): CachedRuleRepository {
  const { ttlMs, now } = options;
  const zoneRules = new TtlCache<ZoneRule | null>(ttlMs, now);
  const currentParking = new TtlCache<ParkingRule | null>(ttlMs, now);
  const legacyParking = new TtlCache<ParkingRule | null>(ttlMs, now);
  const profiles = new TtlCache<SanitaryProfile | null>(ttlMs, now);
  const mappings = new TtlCache<UseSanitaryProfile | null>(ttlMs, now);
  const useTypes = new TtlCache<UseType[]>(ttlMs, now);

  async function through<T>(cache: TtlCache<T>, key: string, load: () => Promise<T>): Promise<T> {
    const hit = cache.get(key);
    if (hit !== undefined) return hit;
    const value = await load();
    cache.set(key, value);
    return value;
  }

  return {
    getZoneRule: (zoneCode, useCode) =>
      through(zoneRules, `${zoneCode}:${useCode}`, () => inner.getZoneRule(zoneCode, useCode)),
    getCurrentParkingRule: (useCode) =>
      through(currentParking, useCode, () => inner.getCurrentParkingRule(useCode)),
    getLegacyParkingRule: (useCode) =>
      through(legacyParking, useCode, () => inner.getLegacyParkingRule(useCode)),
    getSanitaryProfile: (profileId) =>
      through(profiles, profileId, () => inner.getSanitaryProfile(profileId)),
    getUseSanitaryProfileMapping: (useCode) =>
      through(mappings, useCode, () => inner.getUseSanitaryProfileMapping(useCode)),
    listActiveUseTypes: () => through(useTypes, 'all', () => inner.listActiveUseTypes()),

    invalidate() {
      return [zoneRules, currentParking, legacyParking, profiles, mappings, useTypes].reduce(
        (count, cache) => count + cache.clear(),
        0,
      );
    },
  };
}
