import { fail, issueFromError, ok, type Outcome } from '@/lib/errors';
import { SMALL_FOOTPRINT_EXEMPTION_M2 } from '@/lib/constants/regulations';
import type { RuleRepository } from '@/features/rules/repository';
import { isResidential, isSingleFamily } from '@/features/rules/useCategories';
import type {
  AppliedTerm,
  ParkingAdjustment,
  ParkingMetric,
  ParkingMetricInput,
  ParkingOptions,
  ParkingResult,
  ParkingRule,
  ParkingTerm,
} from '@/types/parking';
import { applyTransitReduction, roundRequirement } from './rounding';
import { parkingStrategies, resolveParkingRule } from './resolution';

const SINGLE_FAMILY_REASON = 'Residencial unifamiliar: sem exigência mínima de vagas.';

const METRIC_LABELS: Record<ParkingMetric, string> = {
  usable_area: 'a área útil',
  lot_area: 'a área do lote',
  units: 'o número de unidades',
  beds: 'o número de leitos',
  rooms: 'o número de quartos',
  seats: 'o número de lugares',
};

interface TermValue {
  raw: number;
  text: string | null;
}

/** Raw spaces for one term, or null when the term does not apply to this value */
export function evaluateTerm(term: ParkingTerm, metricValue: number, options: ParkingOptions = {}): TermValue | null {
  switch (term.kind) {
    case 'ratio':
      return { raw: metricValue / term.perUnit, text: term.text };
    case 'fixed':
      return { raw: term.value, text: term.text };
    case 'band_ratio': {
      const band = term.bands.find((b) => metricValue >= b.minM2 && (b.maxM2 === null || metricValue <= b.maxM2));
      return band ? { raw: metricValue / band.perUnit, text: band.text ?? term.text } : null;
    }
    case 'threshold_fixed':
      return metricValue <= term.maxM2 ? { raw: term.count, text: term.text } : null;
    case 'ratio_above_threshold':
      return metricValue >= term.minM2 ? { raw: metricValue / term.perUnit, text: term.text } : null;
    case 'unit_area_tiered': {
      const unitArea = options.averageUnitAreaM2;
      if (unitArea === undefined || !(unitArea > 0)) return null;
      const rate = unitArea < term.thresholdM2 ? term.rateBelow : term.rateAtOrAbove;
      return { raw: metricValue * rate, text: term.text };
    }
  }
}

/**
 * Evaluate a resolved rule. The requirement is the largest value among the
 * applicable terms, so a ratio never drops below an applicable fixed floor.
 */
export function evaluateParkingRule(
  rule: ParkingRule,
  metric: ParkingMetricInput,
  options: ParkingOptions = {},
): ParkingResult {
  const { useCode } = rule;

  if (isSingleFamily(useCode)) {
    return { status: 'not_required', useCode, reason: SINGLE_FAMILY_REASON };
  }

  const metricValue = typeof metric === 'number' ? metric : metric[rule.baseMetric];
  if (metricValue === undefined || !Number.isFinite(metricValue) || metricValue < 0) {
    return {
      status: 'undetermined',
      useCode,
      reason: 'no_metric_value',
      message: `Informe ${METRIC_LABELS[rule.baseMetric]} para calcular as vagas.`,
    };
  }

  if (
    options.localStreet &&
    rule.baseMetric === 'usable_area' &&
    !isResidential(useCode) &&
    metricValue <= SMALL_FOOTPRINT_EXEMPTION_M2
  ) {
    return {
      status: 'exempt',
      useCode,
      generation: rule.generation,
      metricValue,
      reason: `Dispensa: uso não residencial com até ${SMALL_FOOTPRINT_EXEMPTION_M2} m² em via local.`,
    };
  }

  let applied: AppliedTerm | null = null;
  for (let index = 0; index < rule.terms.length; index++) {
    const term = rule.terms[index];
    const value = evaluateTerm(term, metricValue, options);
    if (value && (applied === null || value.raw > applied.raw)) {
      applied = { index, kind: term.kind, text: value.text, raw: value.raw };
    }
  }

  if (applied === null) {
    return {
      status: 'undetermined',
      useCode,
      reason: 'no_applicable_term',
      message: 'Sem dados suficientes para calcular automaticamente as vagas.',
    };
  }
  const rounded = roundRequirement(applied.raw);
  const adjustments: ParkingAdjustment[] = [];
  let required = rounded;
  if (options.nearTransit && required > 0) {
    const reduced = applyTransitReduction(required);
    adjustments.push({ type: 'transit_reduction', from: required, to: reduced });
    required = reduced;
  }

  return {
    status: 'required',
    useCode,
    generation: rule.generation,
    baseMetric: rule.baseMetric,
    metricValue,
    raw: applied.raw,
    rounded,
    required,
    appliedTerm: applied,
    adjustments,
    notes: rule.notes,
    generalNotes: rule.generalNotes,
    cargoLoadingText: rule.cargoLoadingText,
    sourceRef: rule.sourceRef,
  };
}

/**
 * Parking requirement for a use. Single-family residential short-circuits
 * before any lookup; a use with no rule in either generation is undetermined.
 */
export async function computeParking(
  repository: RuleRepository,
  useCode: string,
  metric: ParkingMetricInput,
  options: ParkingOptions = {},
): Promise<Outcome<ParkingResult>> {
  if (isSingleFamily(useCode)) {
    const notRequired: ParkingResult = { status: 'not_required', useCode, reason: SINGLE_FAMILY_REASON };
    return ok(notRequired);
  }

  let rule: ParkingRule | null;
  try {
    rule = await resolveParkingRule(parkingStrategies(repository), useCode);
  } catch (err) {
    return fail(issueFromError(err));
  }

  if (!rule) {
    const undetermined: ParkingResult = {
      status: 'undetermined',
      useCode,
      reason: 'no_rule',
      message: `Sem regra de estacionamento cadastrada para o uso ${useCode}.`,
    };
    return ok(undetermined);
  }
  return ok(evaluateParkingRule(rule, metric, options));
}
