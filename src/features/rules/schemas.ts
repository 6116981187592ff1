import { z } from 'zod';
import { MalformedRuleDataError } from '@/lib/errors';
import { parseFixtureFormula } from '@/features/sanitary/formula';
import type { ZoneRule } from '@/types/regulation';
import type { UseType } from '@/types/rules';
import {
  PARKING_METRICS,
  type ParkingBand,
  type ParkingMetric,
  type ParkingRule,
  type ParkingTerm,
} from '@/types/parking';
import {
  FIXTURE_KINDS,
  type FixtureCount,
  type FixtureKind,
  type SanitaryBand,
  type SanitaryGroup,
  type SanitaryProfile,
  type UseSanitaryProfile,
} from '@/types/sanitary';

// ── Primitive column parsers ──

/** pg returns NUMERIC as string; an absent column is "not registered" */
const numeric = z
  .union([z.number(), z.string().trim().min(1).transform(Number)])
  .pipe(z.number().finite())
  .nullish()
  .transform((v) => v ?? null);

const text = z
  .string()
  .nullish()
  .transform((v) => {
    const trimmed = v?.trim() ?? '';
    return trimmed === '' ? null : trimmed;
  });

const flag = z
  .boolean()
  .nullish()
  .transform((v) => v ?? false);

const textList = z
  .union([z.array(z.string()), z.string()])
  .nullish()
  .transform((v) => (v == null ? [] : typeof v === 'string' ? [v] : v));

/** jsonb arrives parsed; a text column arrives as a JSON string */
const jsonPayload = z.unknown().transform((value, ctx) => {
  if (typeof value !== 'string') return value;
  try {
    const parsed: unknown = JSON.parse(value);
    return parsed;
  } catch {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'rule_json is not valid JSON' });
    return z.NEVER;
  }
});

function parseOrThrow<S extends z.ZodTypeAny>(schema: S, value: unknown, source: string): z.output<S> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new MalformedRuleDataError(source, detail);
  }
  return parsed.data;
}

// ── zone_rules ──

export const ZoneRuleRowSchema = z.object({
  zone_sigla: z.string().min(1),
  use_type_code: z.string().min(1),
  to_max: numeric,
  tp_min: numeric,
  ia_min: numeric,
  ia_max: numeric,
  to_sub_max: numeric,
  recuo_frontal_m: numeric,
  recuo_lateral_m: numeric,
  recuo_fundos_m: numeric,
  gabarito_m: numeric,
  gabarito_pav: numeric,
  area_min_lote_m2: numeric,
  area_max_lote_m2: numeric,
  testada_min_meio_m: numeric,
  testada_min_esquina_m: numeric,
  testada_max_m: numeric,
  allow_attach_one_side: flag,
  notes: text,
  observacoes: text,
  special_area_tag: text,
  requires_subzone: flag,
  subzone_code: text,
  source_ref: text,
});

export function toZoneRule(row: unknown): ZoneRule {
  const r = parseOrThrow(ZoneRuleRowSchema, row, 'zone_rules');
  return {
    zoneCode: r.zone_sigla,
    useCode: r.use_type_code,
    occupancyMax: r.to_max,
    permeabilityMin: r.tp_min,
    floorAreaMin: r.ia_min,
    floorAreaMax: r.ia_max,
    subOccupancyMax: r.to_sub_max,
    setbackFront: r.recuo_frontal_m,
    setbackLateral: r.recuo_lateral_m,
    setbackRear: r.recuo_fundos_m,
    allowAttachOneSide: r.allow_attach_one_side,
    heightLimitM: r.gabarito_m,
    heightLimitFloors: r.gabarito_pav,
    minLotAreaM2: r.area_min_lote_m2,
    maxLotAreaM2: r.area_max_lote_m2,
    minFrontageMidBlockM: r.testada_min_meio_m,
    minFrontageCornerM: r.testada_min_esquina_m,
    maxFrontageM: r.testada_max_m,
    notes: r.notes,
    observations: r.observacoes,
    specialAreaTag: r.special_area_tag,
    requiresSubzone: r.requires_subzone,
    subzoneCode: r.subzone_code,
    sourceRef: r.source_ref,
  };
}

// ── use_types ──

const UseTypeRowSchema = z.object({
  code: z.string().min(1),
  label: z.string().min(1),
  category: text,
});

export function toUseType(row: unknown): UseType {
  return parseOrThrow(UseTypeRowSchema, row, 'use_types');
}

// ── parking_rules_v2 (current generation) ──

/** Metric names found in rule payloads, mapped onto the closed metric set */
const METRIC_ALIASES: Record<string, ParkingMetric> = {
  area_util_m2: 'usable_area',
  area_construida_m2: 'usable_area',
  area_lote_m2: 'lot_area',
  area_terreno_m2: 'lot_area',
  unidades: 'units',
  apartamentos: 'units',
  leitos: 'beds',
  quartos: 'rooms',
  assentos: 'seats',
  lugares: 'seats',
};

function isParkingMetric(value: string): value is ParkingMetric {
  return PARKING_METRICS.some((metric) => metric === value);
}

const metric = z.string().transform((value, ctx) => {
  const key = value.trim().toLowerCase();
  if (isParkingMetric(key)) return key;
  const alias = METRIC_ALIASES[key];
  if (alias) return alias;
  ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unknown base metric "${value}"` });
  return z.NEVER;
});

const positive = z.coerce.number().finite().positive();
const nonNegative = z.coerce.number().finite().nonnegative();

const BandSchema = z.object({
  min_m2: nonNegative.default(0),
  max_m2: nonNegative.nullish().transform((v) => v ?? null),
  per_m2: positive,
  text: text,
});

const TermSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('ratio'),
    per_m2: positive.optional(),
    per_units: positive.optional(),
    text: text,
  }),
  z.object({ type: z.literal('fixed'), value: nonNegative, text: text }),
  z.object({ type: z.literal('band_ratio'), bands: z.array(BandSchema).min(1), text: text }),
  z.object({
    type: z.enum(['threshold_fixed', 'fixed_or_band']),
    max_m2: nonNegative,
    count: nonNegative,
    text: text,
  }),
  z.object({
    type: z.literal('ratio_above_threshold'),
    min_m2: nonNegative,
    per_m2: positive,
    text: text,
  }),
  z.object({
    type: z.literal('per_unit'),
    value: nonNegative.optional(),
    per_unit: nonNegative.optional(),
    text: text,
  }),
]);

type TermRow = z.output<typeof TermSchema>;

const CurrentPayloadSchema = z.object({
  use_code: text,
  base_metric: metric.optional(),
  rules: z.array(z.unknown()).min(1),
  general_notes: textList,
  cargo_loading: z
    .object({ text: text })
    .nullish()
    .transform((v) => v?.text ?? null),
});

const CurrentParkingRowSchema = z.object({
  use_code: z.string().min(1),
  base_metric: metric.nullish(),
  rule_json: jsonPayload,
  general_notes: textList,
  source_ref: text,
  notes: textList,
});

function toTerm(row: TermRow): ParkingTerm {
  switch (row.type) {
    case 'ratio': {
      const perUnit = row.per_m2 ?? row.per_units;
      if (perUnit === undefined) {
        throw new MalformedRuleDataError('parking_rules_v2', 'ratio term without per_m2 or per_units');
      }
      return { kind: 'ratio', perUnit, text: row.text };
    }
    case 'fixed':
      return { kind: 'fixed', value: row.value, text: row.text };
    case 'band_ratio': {
      const bands: ParkingBand[] = row.bands.map((b) => ({
        minM2: b.min_m2,
        maxM2: b.max_m2,
        perUnit: b.per_m2,
        text: b.text,
      }));
      return { kind: 'band_ratio', bands, text: row.text };
    }
    case 'threshold_fixed':
    case 'fixed_or_band':
      return { kind: 'threshold_fixed', maxM2: row.max_m2, count: row.count, text: row.text };
    case 'ratio_above_threshold':
      return { kind: 'ratio_above_threshold', minM2: row.min_m2, perUnit: row.per_m2, text: row.text };
    case 'per_unit': {
      const spaces = row.value ?? row.per_unit;
      if (!spaces) {
        throw new MalformedRuleDataError('parking_rules_v2', 'per_unit term without a positive value');
      }
      return { kind: 'ratio', perUnit: 1 / spaces, text: row.text };
    }
  }
}

export function toCurrentParkingRule(row: unknown): ParkingRule {
  const source = 'parking_rules_v2';
  const r = parseOrThrow(CurrentParkingRowSchema, row, source);
  const payload = parseOrThrow(CurrentPayloadSchema, r.rule_json, source);
  const baseMetric = r.base_metric ?? payload.base_metric;
  if (!baseMetric) {
    throw new MalformedRuleDataError(source, `no base metric for ${r.use_code}`);
  }

  const terms = payload.rules.map((raw, index) => toTerm(parseOrThrow(TermSchema, raw, `${source}.rules[${index}]`)));
  const generalNotes = payload.general_notes.length > 0 ? payload.general_notes : r.general_notes;

  return {
    useCode: r.use_code,
    generation: 'current',
    baseMetric,
    terms,
    notes: r.notes,
    generalNotes,
    cargoLoadingText: payload.cargo_loading,
    sourceRef: r.source_ref,
  };
}

// ── parking_rules (legacy generation) ──

const DEFAULT_UNIT_AREA_THRESHOLD_M2 = 90;

const UnitAreaPayloadSchema = z.object({
  type: z.literal('per_unit_by_unit_area'),
  threshold_unit_area_m2: positive.default(DEFAULT_UNIT_AREA_THRESHOLD_M2),
  rate_below: nonNegative.default(1),
  rate_at_or_above: nonNegative.default(1.5),
  display_text: text,
  moto_percent_max: z.coerce.number().min(0).max(1).nullish(),
});

const LegacyParkingRowSchema = z.object({
  use_type_code: z.string().min(1),
  metric: z.enum(['fixed', 'per_unit', 'per_area', 'json_rule']),
  value: numeric,
  min_vagas: numeric,
  source_ref: text,
  rule_json: jsonPayload.optional(),
});

function requireValue(value: number | null, metricName: string): number {
  if (value === null || value <= 0) {
    throw new MalformedRuleDataError('parking_rules', `${metricName} rule without a positive value`);
  }
  return value;
}

type LegacyRow = z.output<typeof LegacyParkingRowSchema>;

function legacyTerms(r: LegacyRow): { baseMetric: ParkingMetric; terms: ParkingTerm[]; notes: string[] } {
  switch (r.metric) {
    case 'fixed':
      return { baseMetric: 'usable_area', terms: [{ kind: 'fixed', value: requireValue(r.value, 'fixed'), text: null }], notes: [] };
    case 'per_unit':
      return {
        baseMetric: 'units',
        terms: [{ kind: 'ratio', perUnit: 1 / requireValue(r.value, 'per_unit'), text: null }],
        notes: [],
      };
    case 'per_area':
      return {
        baseMetric: 'lot_area',
        terms: [{ kind: 'ratio', perUnit: 1 / requireValue(r.value, 'per_area'), text: null }],
        notes: [],
      };
    case 'json_rule': {
      const payload = parseOrThrow(UnitAreaPayloadSchema, r.rule_json, 'parking_rules.rule_json');
      const notes: string[] = [];
      if (payload.moto_percent_max != null) {
        notes.push(`Até ${Math.round(payload.moto_percent_max * 100)}% das vagas podem ser destinadas a motos.`);
      }
      return {
        baseMetric: 'units',
        terms: [
          {
            kind: 'unit_area_tiered',
            thresholdM2: payload.threshold_unit_area_m2,
            rateBelow: payload.rate_below,
            rateAtOrAbove: payload.rate_at_or_above,
            text: payload.display_text,
          },
        ],
        notes,
      };
    }
  }
}

/**
 * The legacy table stores one flat rule per use. It is rewritten into the
 * same term list the current generation uses; min_vagas becomes a fixed floor.
 */
export function toLegacyParkingRule(row: unknown): ParkingRule {
  const r = parseOrThrow(LegacyParkingRowSchema, row, 'parking_rules');
  const { baseMetric, terms, notes } = legacyTerms(r);

  if (r.min_vagas !== null && r.min_vagas > 0) {
    terms.push({ kind: 'fixed', value: r.min_vagas, text: 'Mínimo de vagas' });
  }

  return {
    useCode: r.use_type_code,
    generation: 'legacy',
    baseMetric,
    terms,
    notes,
    generalNotes: [],
    cargoLoadingText: null,
    sourceRef: r.source_ref,
  };
}

// ── use_sanitary_profile / sanitary_profiles ──

const SanitaryMappingRowSchema = z.object({
  use_type_code: z.string().min(1),
  sanitary_profile: z.string().min(1),
  notes: text,
});

export function toUseSanitaryProfile(row: unknown): UseSanitaryProfile {
  const r = parseOrThrow(SanitaryMappingRowSchema, row, 'use_sanitary_profile');
  return { useCode: r.use_type_code, profileId: r.sanitary_profile, notes: r.notes };
}

/** Payload keys for each fixture, current names first */
const FIXTURE_KEYS: Record<FixtureKind, readonly string[]> = {
  lavatories: ['lavatories', 'lavatórios', 'lavatorios'],
  toilets: ['toilets', 'aparelhos_sanitários', 'aparelhos_sanitarios', 'bacias'],
  urinals: ['urinals', 'mictórios', 'mictorios'],
  showers: ['showers', 'chuveiros'],
};

const RawBandSchema = z
  .object({
    min_m2: nonNegative.default(0),
    max_m2: nonNegative.nullish().transform((v) => v ?? null),
    note: text,
  })
  .passthrough();

const ProfilePayloadSchema = z.union([
  z.object({
    groups: z
      .array(z.object({ group: text, name: text, bands: z.array(z.unknown()).min(1) }))
      .min(1),
  }),
  z.object({ bands: z.array(z.unknown()).min(1) }),
]);

const SanitaryProfileRowSchema = z.object({
  sanitary_profile: z.string().min(1),
  title: text,
  rule_json: jsonPayload,
  source_ref: text,
});

function readFixture(band: Record<string, unknown>, kind: FixtureKind, source: string): FixtureCount | null {
  for (const key of FIXTURE_KEYS[kind]) {
    const literal = band[key];
    if (typeof literal === 'number') {
      if (!Number.isInteger(literal) || literal < 0) {
        throw new MalformedRuleDataError(source, `${key} must be a non-negative integer`);
      }
      return { kind: 'literal', count: literal };
    }
    if (typeof literal === 'string' && literal.trim() !== '') {
      return parseFixtureFormula(literal, source);
    }
    const formula = band[`${key}_formula`];
    if (typeof formula === 'string' && formula.trim() !== '') {
      return parseFixtureFormula(formula, source);
    }
  }
  return null;
}

function toBand(raw: unknown, source: string): SanitaryBand {
  const band = parseOrThrow(RawBandSchema, raw, source);
  const fixtures: Record<FixtureKind, FixtureCount | null> = {
    lavatories: null,
    toilets: null,
    urinals: null,
    showers: null,
  };
  for (const kind of FIXTURE_KINDS) {
    fixtures[kind] = readFixture(band, kind, source);
  }
  if (band.max_m2 !== null && band.max_m2 <= band.min_m2) {
    throw new MalformedRuleDataError(source, `band ${band.min_m2}-${band.max_m2} is empty`);
  }
  return { minM2: band.min_m2, maxM2: band.max_m2, fixtures, note: band.note };
}

/** Bands must ascend without overlapping; only the last one may be open-ended */
export function assertBandsOrdered(bands: SanitaryBand[], source: string): void {
  for (let i = 1; i < bands.length; i++) {
    const prev = bands[i - 1];
    const curr = bands[i];
    if (prev.maxM2 === null) {
      throw new MalformedRuleDataError(source, `open-ended band at position ${i - 1} is not the last one`);
    }
    if (curr.minM2 < prev.maxM2) {
      throw new MalformedRuleDataError(source, `band starting at ${curr.minM2} overlaps the previous one`);
    }
  }
}

export function toSanitaryProfile(row: unknown): SanitaryProfile {
  const r = parseOrThrow(SanitaryProfileRowSchema, row, 'sanitary_profiles');
  const source = `sanitary_profiles.${r.sanitary_profile}`;
  const payload = parseOrThrow(ProfilePayloadSchema, r.rule_json, source);

  const rawGroups =
    'groups' in payload
      ? payload.groups.map((g) => ({ name: g.group ?? g.name ?? 'GERAL', bands: g.bands }))
      : [{ name: 'GERAL', bands: payload.bands }];

  const groups: SanitaryGroup[] = rawGroups.map((g) => {
    const bands = g.bands.map((b, index) => toBand(b, `${source}.${g.name}[${index}]`));
    assertBandsOrdered(bands, `${source}.${g.name}`);
    return { name: g.name, bands };
  });

  return { profileId: r.sanitary_profile, title: r.title, sourceRef: r.source_ref, groups };
}
