import type { ZoneRule } from '@/types/regulation';
import type { ParkingRule } from '@/types/parking';
import type { SanitaryProfile, UseSanitaryProfile } from '@/types/sanitary';
import type { UseType } from '@/types/rules';

/**
 * Read-only access to the legal rule store.
 *
 * Every lookup resolves to the record or `null` when nothing is registered.
 * Failures reject with `RepositoryUnavailableError` (store unreachable or
 * timed out) or `MalformedRuleDataError` (a row that does not parse into
 * the rule model). Implementations never retry.
 */
export interface RuleRepository {
  getZoneRule(zoneCode: string, useCode: string): Promise<ZoneRule | null>;
  getCurrentParkingRule(useCode: string): Promise<ParkingRule | null>;
  getLegacyParkingRule(useCode: string): Promise<ParkingRule | null>;
  getSanitaryProfile(profileId: string): Promise<SanitaryProfile | null>;
  getUseSanitaryProfileMapping(useCode: string): Promise<UseSanitaryProfile | null>;
  listActiveUseTypes(): Promise<UseType[]>;
}
