import type { AppConfig } from '@/lib/config';
import { createLocationResolverFromFiles } from '@/features/location/resolver';
import { createCachedRuleRepository } from '@/features/rules/cachedRepository';
import { createPgRuleRepository, createPool, type Queryable } from '@/features/rules/pgRepository';
import type { StudyContext } from './pipeline';

/**
 * Wire a context from configuration: geometry from the GeoJSON files, rules
 * from Postgres behind a TTL cache. Pass `db` to reuse an existing pool.
 */
export function createStudyContext(config: AppConfig, db?: Queryable): StudyContext {
  const resolver = createLocationResolverFromFiles(config);
  const store = createPgRuleRepository(db ?? createPool(config));
  const repository = createCachedRuleRepository(store, { ttlMs: config.ruleCacheTtlMs });
  return {
    resolver,
    repository,
    settings: { neighborhoodUseCodes: config.neighborhoodUseCodes },
  };
}
