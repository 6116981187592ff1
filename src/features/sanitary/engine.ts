import { fail, issueFromError, ok, sanitaryRuleNotFound, type Outcome } from '@/lib/errors';
import type { RuleRepository } from '@/features/rules/repository';
import {
  FIXTURE_KINDS,
  type FixtureCounts,
  type FixtureKind,
  type SanitaryBand,
  type SanitaryGroupResult,
  type SanitaryProfile,
  type SanitaryResult,
} from '@/types/sanitary';
import { evaluateFixture } from './formula';

export interface BandSelection {
  index: number;
  band: SanitaryBand;
  extrapolated: boolean;
}

/**
 * Band for a usable area, over bands sorted by `minM2`.
 * Every non-negative area maps to exactly one band: inside a `[min, max)`
 * range that band; in a gap the band just below; past the last band the
 * last one, flagged as extrapolated; below the first band the first one.
 */
export function selectBand(bands: readonly SanitaryBand[], areaM2: number): BandSelection | null {
  if (bands.length === 0) return null;

  let below = -1;
  for (let i = 0; i < bands.length; i++) {
    const band = bands[i];
    if (areaM2 < band.minM2) break;
    if (band.maxM2 === null || areaM2 < band.maxM2) {
      return { index: i, band, extrapolated: false };
    }
    below = i;
  }

  if (below === -1) return { index: 0, band: bands[0], extrapolated: false };
  return { index: below, band: bands[below], extrapolated: below === bands.length - 1 };
}

function emptyTotals(): Record<FixtureKind, number> {
  return { lavatories: 0, toilets: 0, urinals: 0, showers: 0 };
}

/** Fixture counts per group and summed over groups. Pure. */
export function evaluateSanitaryProfile(
  profile: SanitaryProfile,
  useCode: string,
  usableAreaM2: number,
): SanitaryResult {
  const area = Math.max(usableAreaM2, 0);
  const totals = emptyTotals();
  const groups: SanitaryGroupResult[] = [];

  for (const group of profile.groups) {
    const selection = selectBand(group.bands, area);
    if (!selection) continue;

    const fixtures: FixtureCounts = { lavatories: null, toilets: null, urinals: null, showers: null };
    for (const kind of FIXTURE_KINDS) {
      const fixture = selection.band.fixtures[kind];
      if (fixture === null) continue;
      const count = evaluateFixture(fixture, area);
      fixtures[kind] = count;
      totals[kind] += count;
    }

    groups.push({
      name: group.name,
      bandIndex: selection.index,
      band: { minM2: selection.band.minM2, maxM2: selection.band.maxM2 },
      extrapolated: selection.extrapolated,
      fixtures,
      note: selection.band.note,
    });
  }

  return {
    useCode,
    profileId: profile.profileId,
    title: profile.title,
    sourceRef: profile.sourceRef,
    usableAreaM2: area,
    groups,
    totals,
  };
}

/** use → profile mapping → profile → evaluation */
export async function computeSanitary(
  repository: RuleRepository,
  useCode: string,
  usableAreaM2: number,
): Promise<Outcome<SanitaryResult>> {
  try {
    const mapping = await repository.getUseSanitaryProfileMapping(useCode);
    if (!mapping) return fail(sanitaryRuleNotFound('sanitary_mapping', useCode));

    const profile = await repository.getSanitaryProfile(mapping.profileId);
    if (!profile) return fail(sanitaryRuleNotFound('sanitary_profile', mapping.profileId));

    return ok(evaluateSanitaryProfile(profile, useCode, usableAreaM2));
  } catch (err) {
    return fail(issueFromError(err));
  }
}
