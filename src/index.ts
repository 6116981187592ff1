export * from './features/location';
export * from './features/rules';
export * from './features/regulations';
export * from './features/parking';
export * from './features/sanitary';
export * from './features/feasibility';

export type { FeasibilityIssue, Outcome, RuleType, EligibilityFeature } from './lib/errors';
export { RepositoryUnavailableError, MalformedRuleDataError, issueFromError } from './lib/errors';
export type { AppConfig } from './lib/config';
export { loadConfig, getConfig } from './lib/config';
export { formatArea, formatMeters, formatRatio } from './lib/utils/format';

export type * from './types/zoning';
export type * from './types/regulation';
export type * from './types/parking';
export type * from './types/sanitary';
export type * from './types/rules';
