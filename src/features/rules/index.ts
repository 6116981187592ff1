export type { RuleRepository } from './repository';
export type { Queryable } from './pgRepository';
export { createPgRuleRepository, createPool } from './pgRepository';
export type { CachedRuleRepository, CacheOptions } from './cachedRepository';
export { createCachedRuleRepository } from './cachedRepository';
export type { MemoryRuleSet } from './memoryRepository';
export { createMemoryRuleRepository } from './memoryRepository';
export {
  toZoneRule,
  toCurrentParkingRule,
  toLegacyParkingRule,
  toSanitaryProfile,
  toUseSanitaryProfile,
  toUseType,
  assertBandsOrdered,
} from './schemas';
export type { UseClass, UseCategoryGroup } from './useCategories';
export {
  classifyUse,
  isSingleFamily,
  isMultiFamily,
  isResidential,
  groupUseTypesByCategory,
  PREFERRED_CATEGORY_ORDER,
} from './useCategories';
