export const FIXTURE_KINDS = ['lavatories', 'toilets', 'urinals', 'showers'] as const;

export type FixtureKind = (typeof FIXTURE_KINDS)[number];

/** Either a literal count or "1 per N m² or fraction" */
export type FixtureCount =
  | { kind: 'literal'; count: number }
  | { kind: 'per_area'; perM2: number; text: string };

export interface SanitaryBand {
  minM2: number;
  /** null = open-ended */
  maxM2: number | null;
  fixtures: Record<FixtureKind, FixtureCount | null>;
  note: string | null;
}

export interface SanitaryGroup {
  name: string;
  bands: SanitaryBand[];
}

export interface SanitaryProfile {
  profileId: string;
  title: string | null;
  sourceRef: string | null;
  groups: SanitaryGroup[];
}

export interface UseSanitaryProfile {
  useCode: string;
  profileId: string;
  notes: string | null;
}

export type FixtureCounts = Record<FixtureKind, number | null>;

export interface SanitaryGroupResult {
  name: string;
  bandIndex: number;
  band: { minM2: number; maxM2: number | null };
  /** Area beyond every band: last band used as open-ended */
  extrapolated: boolean;
  fixtures: FixtureCounts;
  note: string | null;
}

export interface SanitaryResult {
  useCode: string;
  profileId: string;
  title: string | null;
  sourceRef: string | null;
  usableAreaM2: number;
  groups: SanitaryGroupResult[];
  totals: Record<FixtureKind, number>;
}
