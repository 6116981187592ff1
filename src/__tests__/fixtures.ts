import type { FeasibilityIssue, Outcome } from '@/lib/errors';
import type { Lot, ZoneRule } from '@/types/regulation';
import type { ParkingRule, ParkingTerm } from '@/types/parking';
import type { FixtureCount, FixtureKind, SanitaryBand, SanitaryProfile } from '@/types/sanitary';

/** A rule with nothing registered except the codes; tests fill in what they need */
export function makeZoneRule(overrides: Partial<ZoneRule> = {}): ZoneRule {
  return {
    zoneCode: 'ZR1',
    useCode: 'RES_UNI',
    occupancyMax: null,
    permeabilityMin: null,
    floorAreaMin: null,
    floorAreaMax: null,
    subOccupancyMax: null,
    setbackFront: null,
    setbackLateral: null,
    setbackRear: null,
    allowAttachOneSide: false,
    heightLimitM: null,
    heightLimitFloors: null,
    minLotAreaM2: null,
    maxLotAreaM2: null,
    minFrontageMidBlockM: null,
    minFrontageCornerM: null,
    maxFrontageM: null,
    notes: null,
    observations: null,
    specialAreaTag: null,
    requiresSubzone: false,
    subzoneCode: null,
    sourceRef: null,
    ...overrides,
  };
}

/** TO 0.6, TP 0.2, IA 1.5, setbacks 3 / 1.5 / 3, 9 m height limit */
export function residentialRule(overrides: Partial<ZoneRule> = {}): ZoneRule {
  return makeZoneRule({
    occupancyMax: 0.6,
    permeabilityMin: 0.2,
    floorAreaMax: 1.5,
    setbackFront: 3,
    setbackLateral: 1.5,
    setbackRear: 3,
    heightLimitM: 9,
    ...overrides,
  });
}

export function makeLot(overrides: Partial<Lot> = {}): Lot {
  return { frontage: 10, depth: 20, corner: false, twoFronts: false, ...overrides };
}

export function makeParkingRule(useCode: string, terms: ParkingTerm[], overrides: Partial<ParkingRule> = {}): ParkingRule {
  return {
    useCode,
    generation: 'current',
    baseMetric: 'usable_area',
    terms,
    notes: [],
    generalNotes: [],
    cargoLoadingText: null,
    sourceRef: null,
    ...overrides,
  };
}

export function band(
  minM2: number,
  maxM2: number | null,
  fixtures: Partial<Record<FixtureKind, FixtureCount>> = {},
): SanitaryBand {
  return {
    minM2,
    maxM2,
    fixtures: {
      lavatories: fixtures.lavatories ?? null,
      toilets: fixtures.toilets ?? null,
      urinals: fixtures.urinals ?? null,
      showers: fixtures.showers ?? null,
    },
    note: null,
  };
}

export function literal(count: number): FixtureCount {
  return { kind: 'literal', count };
}

export function perArea(perM2: number): FixtureCount {
  return { kind: 'per_area', perM2, text: `1/${perM2}m²` };
}

export function makeProfile(profileId: string, groups: SanitaryProfile['groups']): SanitaryProfile {
  return { profileId, title: null, sourceRef: null, groups };
}

export function unwrap<T>(outcome: Outcome<T>): T {
  if (!outcome.ok) throw new Error(`expected ok, got ${outcome.issue.kind}: ${outcome.issue.message}`);
  return outcome.value;
}

export function issueOf<T>(outcome: Outcome<T>): FeasibilityIssue {
  if (outcome.ok) throw new Error('expected a failed outcome');
  return outcome.issue;
}
