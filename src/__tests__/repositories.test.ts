/**
 * Tests for the rule repositories: pg-backed, cached, in-memory
 */

import { afterEach, describe, it, expect, vi } from 'vitest';
import { createPgRuleRepository, createPool, type Queryable } from '@/features/rules/pgRepository';
import { createCachedRuleRepository } from '@/features/rules/cachedRepository';
import { createMemoryRuleRepository } from '@/features/rules/memoryRepository';
import type { RuleRepository } from '@/features/rules/repository';
import { MalformedRuleDataError, RepositoryUnavailableError } from '@/lib/errors';
import { makeZoneRule } from './fixtures';

interface RecordedQuery {
  text: string;
  values: unknown[] | undefined;
}

// In-process stand-in for a pg pool: every query answers with the same rows
function stubDb(rows: unknown[] = []) {
  const queries: RecordedQuery[] = [];
  const db: Queryable = {
    async query(text, values) {
      queries.push({ text, values });
      return { rows };
    },
  };
  return { db, queries };
}

function failingDb(error: Error): Queryable {
  return {
    async query() {
      throw error;
    },
  };
}

afterEach(() => {
  vi.restoreAllMocks();
});

// ══════════════════════════════════════════════════════════════════════
// pg repository
// ══════════════════════════════════════════════════════════════════════

describe('createPgRuleRepository', () => {
  it('queries one zone rule by zone and use', async () => {
    const { db, queries } = stubDb([{ zone_sigla: 'ZR1', use_type_code: 'RES_UNI', to_max: '0.60', tp_min: '0.20' }]);
    const rule = await createPgRuleRepository(db).getZoneRule('ZR1', 'RES_UNI');

    expect(rule?.occupancyMax).toBe(0.6);
    expect(queries).toHaveLength(1);
    expect(queries[0].text).toContain('FROM zone_rules');
    expect(queries[0].values).toEqual(['ZR1', 'RES_UNI']);
  });

  it('returns null when nothing matches', async () => {
    const { db } = stubDb([]);
    expect(await createPgRuleRepository(db).getCurrentParkingRule('IND_LEVE')).toBeNull();
  });

  it('does not query for empty codes', async () => {
    const { db, queries } = stubDb([]);
    const repo = createPgRuleRepository(db);
    expect(await repo.getZoneRule('', 'RES_UNI')).toBeNull();
    expect(await repo.getUseSanitaryProfileMapping('')).toBeNull();
    expect(queries).toEqual([]);
  });

  it('reads legacy parking rows from their own table', async () => {
    const { db, queries } = stubDb([{ use_type_code: 'IND_LEVE', metric: 'per_area', value: '0.01', min_vagas: '2' }]);
    const rule = await createPgRuleRepository(db).getLegacyParkingRule('IND_LEVE');
    expect(rule?.generation).toBe('legacy');
    expect(queries[0].text).toContain('FROM parking_rules\n');
  });

  it('reads sanitary profiles and mappings', async () => {
    const profileDb = stubDb([{ sanitary_profile: 'ESCRITORIO', title: null, rule_json: { bands: [{ toilets: 1 }] } }]);
    const profile = await createPgRuleRepository(profileDb.db).getSanitaryProfile('ESCRITORIO');
    expect(profile?.groups[0].name).toBe('GERAL');

    const mappingDb = stubDb([{ use_type_code: 'SERV_ESCRITORIO', sanitary_profile: 'ESCRITORIO' }]);
    const mapping = await createPgRuleRepository(mappingDb.db).getUseSanitaryProfileMapping('SERV_ESCRITORIO');
    expect(mapping?.profileId).toBe('ESCRITORIO');
  });

  it('lists active use types', async () => {
    const { db, queries } = stubDb([
      { code: 'RES_UNI', label: 'Casa', category: 'Residencial' },
      { code: 'COM_VAREJO', label: 'Comércio', category: null },
    ]);
    const uses = await createPgRuleRepository(db).listActiveUseTypes();
    expect(uses.map((u) => u.code)).toEqual(['RES_UNI', 'COM_VAREJO']);
    expect(queries[0].text).toContain('is_active = TRUE');
    expect(queries[0].values).toEqual([]);
  });

  it('wraps store failures and logs them', async () => {
    const log = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const repo = createPgRuleRepository(failingDb(new Error('connection refused')));

    await expect(repo.getZoneRule('ZR1', 'RES_UNI')).rejects.toBeInstanceOf(RepositoryUnavailableError);
    expect(log).toHaveBeenCalledTimes(1);
    expect(log.mock.calls[0][0]).toBe('Rule store error (getZoneRule):');
  });

  it('lets malformed rows surface as malformed', async () => {
    const { db } = stubDb([{ zone_sigla: 'ZR1', use_type_code: 'RES_UNI', to_max: 'n/a' }]);
    await expect(createPgRuleRepository(db).getZoneRule('ZR1', 'RES_UNI')).rejects.toBeInstanceOf(
      MalformedRuleDataError,
    );
  });
});

describe('createPool', () => {
  it('needs a database URL', () => {
    expect(() => createPool({ databaseUrl: null, dbQueryTimeoutMs: 1000 })).toThrow('DATABASE_URL is not set');
  });
});

// ══════════════════════════════════════════════════════════════════════
// Cached repository
// ══════════════════════════════════════════════════════════════════════

// Wraps a repository and counts how often each method reaches it
function counting(inner: RuleRepository) {
  const calls: Record<string, number> = {};
  const hit = (name: string) => {
    calls[name] = (calls[name] ?? 0) + 1;
  };
  const repo: RuleRepository = {
    getZoneRule: (zoneCode, useCode) => {
      hit('getZoneRule');
      return inner.getZoneRule(zoneCode, useCode);
    },
    getCurrentParkingRule: (useCode) => {
      hit('getCurrentParkingRule');
      return inner.getCurrentParkingRule(useCode);
    },
    getLegacyParkingRule: (useCode) => {
      hit('getLegacyParkingRule');
      return inner.getLegacyParkingRule(useCode);
    },
    getSanitaryProfile: (profileId) => {
      hit('getSanitaryProfile');
      return inner.getSanitaryProfile(profileId);
    },
    getUseSanitaryProfileMapping: (useCode) => {
      hit('getUseSanitaryProfileMapping');
      return inner.getUseSanitaryProfileMapping(useCode);
    },
    listActiveUseTypes: () => {
      hit('listActiveUseTypes');
      return inner.listActiveUseTypes();
    },
  };
  return { repo, calls };
}

describe('createCachedRuleRepository', () => {
  const memory = createMemoryRuleRepository({
    zoneRules: [makeZoneRule({ zoneCode: 'ZR1', useCode: 'RES_UNI', occupancyMax: 0.6 })],
    useTypes: [{ code: 'RES_UNI', label: 'Casa', category: 'Residencial' }],
  });

  it('serves repeated lookups from the cache until they expire', async () => {
    let clock = 0;
    const { repo, calls } = counting(memory);
    const cached = createCachedRuleRepository(repo, { ttlMs: 1000, now: () => clock });

    await cached.getZoneRule('ZR1', 'RES_UNI');
    clock = 1000;
    const rule = await cached.getZoneRule('ZR1', 'RES_UNI');
    expect(rule?.occupancyMax).toBe(0.6);
    expect(calls.getZoneRule).toBe(1);

    clock = 1001;
    await cached.getZoneRule('ZR1', 'RES_UNI');
    expect(calls.getZoneRule).toBe(2);
  });

  it('caches null answers', async () => {
    const { repo, calls } = counting(memory);
    const cached = createCachedRuleRepository(repo, { ttlMs: 1000, now: () => 0 });

    expect(await cached.getZoneRule('ZX', 'RES_UNI')).toBeNull();
    expect(await cached.getZoneRule('ZX', 'RES_UNI')).toBeNull();
    expect(calls.getZoneRule).toBe(1);
  });

  it('keys lookups separately', async () => {
    const { repo, calls } = counting(memory);
    const cached = createCachedRuleRepository(repo, { ttlMs: 1000, now: () => 0 });

    await cached.getCurrentParkingRule('RES_UNI');
    await cached.getLegacyParkingRule('RES_UNI');
    await cached.getCurrentParkingRule('COM_VAREJO');
    await cached.listActiveUseTypes();
    await cached.listActiveUseTypes();
    expect(calls).toEqual({ getCurrentParkingRule: 2, getLegacyParkingRule: 1, listActiveUseTypes: 1 });
  });

  it('never caches a failure', async () => {
    let attempts = 0;
    const flaky: RuleRepository = {
      ...memory,
      getZoneRule: async (zoneCode, useCode) => {
        attempts++;
        if (attempts === 1) throw new RepositoryUnavailableError('getZoneRule');
        return memory.getZoneRule(zoneCode, useCode);
      },
    };
    const cached = createCachedRuleRepository(flaky, { ttlMs: 1000, now: () => 0 });

    await expect(cached.getZoneRule('ZR1', 'RES_UNI')).rejects.toBeInstanceOf(RepositoryUnavailableError);
    expect((await cached.getZoneRule('ZR1', 'RES_UNI'))?.zoneCode).toBe('ZR1');
    expect(attempts).toBe(2);
  });

  it('drops everything on invalidate', async () => {
    const { repo, calls } = counting(memory);
    const cached = createCachedRuleRepository(repo, { ttlMs: 1000, now: () => 0 });

    await cached.getZoneRule('ZR1', 'RES_UNI');
    await cached.getSanitaryProfile('COMERCIO');
    await cached.getUseSanitaryProfileMapping('COM_VAREJO');
    expect(cached.invalidate()).toBe(3);

    await cached.getZoneRule('ZR1', 'RES_UNI');
    expect(calls.getZoneRule).toBe(2);
  });

  it('passes straight through with a zero TTL', async () => {
    const { repo, calls } = counting(memory);
    const cached = createCachedRuleRepository(repo, { ttlMs: 0 });

    await cached.getZoneRule('ZR1', 'RES_UNI');
    await cached.getZoneRule('ZR1', 'RES_UNI');
    expect(calls.getZoneRule).toBe(2);
  });
});

// ══════════════════════════════════════════════════════════════════════
// In-memory repository
// ══════════════════════════════════════════════════════════════════════

describe('createMemoryRuleRepository', () => {
  it('answers null for anything it does not hold', async () => {
    const repo = createMemoryRuleRepository();
    expect(await repo.getZoneRule('ZR1', 'RES_UNI')).toBeNull();
    expect(await repo.getSanitaryProfile('COMERCIO')).toBeNull();
    expect(await repo.listActiveUseTypes()).toEqual([]);
  });
});
