import type { ZoneRule } from '@/types/regulation';
import type { ParkingRule } from '@/types/parking';
import type { SanitaryProfile, UseSanitaryProfile } from '@/types/sanitary';
import type { UseType } from '@/types/rules';
import type { RuleRepository } from './repository';

export interface MemoryRuleSet {
  zoneRules?: ZoneRule[];
  currentParking?: ParkingRule[];
  legacyParking?: ParkingRule[];
  sanitaryProfiles?: SanitaryProfile[];
  sanitaryMappings?: UseSanitaryProfile[];
  useTypes?: UseType[];
}

function indexBy<T>(items: T[] | undefined, key: (item: T) => string): Map<string, T> {
  return new Map((items ?? []).map((item): [string, T] => [key(item), item]));
}

/** Repository over records already in the rule model; used offline and in tests */
export function createMemoryRuleRepository(rules: MemoryRuleSet = {}): RuleRepository {
  const zoneRules = indexBy(rules.zoneRules, (r) => `${r.zoneCode}:${r.useCode}`);
  const currentParking = indexBy(rules.currentParking, (r) => r.useCode);
  const legacyParking = indexBy(rules.legacyParking, (r) => r.useCode);
  const profiles = indexBy(rules.sanitaryProfiles, (p) => p.profileId);
  const mappings = indexBy(rules.sanitaryMappings, (m) => m.useCode);
  const useTypes = [...(rules.useTypes ?? [])];

  return {
    getZoneRule: async (zoneCode, useCode) => zoneRules.get(`${zoneCode}:${useCode}`) ?? null,
    getCurrentParkingRule: async (useCode) => currentParking.get(useCode) ?? null,
    getLegacyParkingRule: async (useCode) => legacyParking.get(useCode) ?? null,
    getSanitaryProfile: async (profileId) => profiles.get(profileId) ?? null,
    getUseSanitaryProfileMapping: async (useCode) => mappings.get(useCode) ?? null,
    listActiveUseTypes: async () => [...useTypes],
  };
}
