import {
  fail,
  invalidLotDimensions,
  ok,
  ruleIncomplete,
  useNotEligible,
  type Outcome,
} from '@/lib/errors';
import { DEFAULT_FLOOR_HEIGHT_M, DEFAULT_FLOORS } from '@/lib/constants/regulations';
import { isMultiFamily, isSingleFamily } from '@/features/rules/useCategories';
import type {
  Envelope,
  EnvelopeVariant,
  FloorSource,
  ImplantationOptions,
  Lot,
  LotCheck,
  OccupancyLimit,
  UrbanismResult,
  ZoneRule,
} from '@/types/regulation';
import { computeEnvelope, type SetbackDistances } from './envelope';

export interface UrbanismOptions {
  /** Neighbourhood-serving uses that may take the flexibility variant */
  neighborhoodUseCodes?: readonly string[];
}

export interface FloorEstimate {
  floors: number;
  source: FloorSource;
}

export function isFlexibilityEligible(useCode: string, options: UrbanismOptions = {}): boolean {
  return isSingleFamily(useCode) || (options.neighborhoodUseCodes ?? []).includes(useCode);
}

export function estimateFloors(rule: Pick<ZoneRule, 'heightLimitFloors' | 'heightLimitM'>): FloorEstimate {
  if (rule.heightLimitFloors !== null && rule.heightLimitFloors > 0) {
    return { floors: Math.max(1, Math.floor(rule.heightLimitFloors)), source: 'rule_floors' };
  }
  if (rule.heightLimitM !== null && rule.heightLimitM > 0) {
    return {
      floors: Math.max(1, Math.floor(rule.heightLimitM / DEFAULT_FLOOR_HEIGHT_M)),
      source: 'height_limit',
    };
  }
  return { floors: DEFAULT_FLOORS, source: 'default' };
}

/** Compare the lot with the zone's lot-size limits; unregistered limits are skipped */
export function checkLotDimensions(lot: Lot, rule: ZoneRule): LotCheck[] {
  const lotArea = lot.frontage * lot.depth;
  const checks: LotCheck[] = [];

  if (rule.minLotAreaM2 !== null) {
    const passed = lotArea >= rule.minLotAreaM2;
    checks.push({
      key: 'min_lot_area',
      passed,
      actual: lotArea,
      limit: rule.minLotAreaM2,
      message: passed ? 'Área do lote atende ao mínimo da zona.' : 'Área do lote abaixo do mínimo da zona.',
    });
  }
  if (rule.maxLotAreaM2 !== null) {
    const passed = lotArea <= rule.maxLotAreaM2;
    checks.push({
      key: 'max_lot_area',
      passed,
      actual: lotArea,
      limit: rule.maxLotAreaM2,
      message: passed ? 'Área do lote dentro do máximo da zona.' : 'Área do lote acima do máximo da zona.',
    });
  }

  const minFrontage = lot.corner ? (rule.minFrontageCornerM ?? rule.minFrontageMidBlockM) : rule.minFrontageMidBlockM;
  if (minFrontage !== null) {
    const passed = lot.frontage >= minFrontage;
    const where = lot.corner ? 'lote de esquina' : 'lote de meio de quadra';
    checks.push({
      key: 'min_frontage',
      passed,
      actual: lot.frontage,
      limit: minFrontage,
      message: passed
        ? `Testada atende ao mínimo para ${where}.`
        : `Testada abaixo do mínimo para ${where}.`,
    });
  }
  if (rule.maxFrontageM !== null) {
    const passed = lot.frontage <= rule.maxFrontageM;
    checks.push({
      key: 'max_frontage',
      passed,
      actual: lot.frontage,
      limit: rule.maxFrontageM,
      message: passed ? 'Testada dentro do máximo da zona.' : 'Testada acima do máximo da zona.',
    });
  }

  return checks;
}

function isPositiveFinite(value: number): boolean {
  return Number.isFinite(value) && value > 0;
}

function registeredSetbacks(rule: ZoneRule): SetbackDistances | null {
  if (rule.setbackFront === null || rule.setbackLateral === null || rule.setbackRear === null) return null;
  return { front: rule.setbackFront, lateral: rule.setbackLateral, rear: rule.setbackRear };
}

/**
 * Occupancy, permeability and floor-area limits plus the setback envelope
 * for one lot under one rule. Pure.
 *
 * The `flexibility` variant zeroes frontal and lateral setbacks and keeps
 * the rear one; occupancy and permeability limits are unchanged.
 */
export function computeUrbanism(
  lot: Lot,
  rule: ZoneRule,
  useCode: string,
  variant: EnvelopeVariant = 'standard',
  options: UrbanismOptions = {},
): Outcome<UrbanismResult> {
  if (!isPositiveFinite(lot.frontage) || !isPositiveFinite(lot.depth)) {
    return fail(invalidLotDimensions(lot.frontage, lot.depth));
  }

  const missing: string[] = [];
  if (rule.occupancyMax === null) missing.push('occupancyMax');
  if (rule.permeabilityMin === null) missing.push('permeabilityMin');
  if (rule.occupancyMax === null || rule.permeabilityMin === null) {
    return fail(ruleIncomplete(rule.zoneCode, useCode, missing));
  }
  const occupancyMax = rule.occupancyMax;
  const permeabilityMin = rule.permeabilityMin;

  const warnings: string[] = [];
  let envelope: Envelope | null = null;

  if (variant === 'flexibility') {
    if (!isFlexibilityEligible(useCode, options)) {
      return fail(useNotEligible(useCode, 'flexibility'));
    }
    if (rule.setbackRear === null) {
      return fail(ruleIncomplete(rule.zoneCode, useCode, ['setbackRear']));
    }
    envelope = computeEnvelope(lot, { front: 0, lateral: 0, rear: rule.setbackRear }, false);
  } else {
    let attach = false;
    if (lot.attachOneSide) {
      if (!rule.allowAttachOneSide) {
        warnings.push('A zona não permite encostar em uma divisa lateral; recuos laterais mantidos.');
      } else if (isMultiFamily(useCode)) {
        warnings.push('Encostar em uma divisa lateral não se aplica a residencial multifamiliar; recuos laterais mantidos.');
      } else {
        attach = true;
      }
    }
    const setbacks = registeredSetbacks(rule);
    if (setbacks) {
      envelope = computeEnvelope(lot, setbacks, attach);
    } else {
      warnings.push('Recuos não cadastrados para esta combinação: envelope não verificado.');
    }
  }

  if (rule.requiresSubzone) {
    warnings.push(
      rule.subzoneCode
        ? `A zona exige enquadramento na subzona ${rule.subzoneCode}.`
        : 'A zona exige enquadramento em subzona.',
    );
  }
  if (rule.specialAreaTag) {
    warnings.push(`Lote sujeito a regras de área especial (${rule.specialAreaTag}).`);
  }

  const lotArea = lot.frontage * lot.depth;
  const maxOccupancyArea = occupancyMax * lotArea;
  const minPermeableArea = permeabilityMin * lotArea;

  // A tie keeps occupancy as the limiting factor.
  const coreArea = envelope ? envelope.coreArea : null;
  const limitingFactor: OccupancyLimit =
    coreArea !== null && coreArea < maxOccupancyArea ? 'setbacks' : 'occupancy';
  const realMaxOccupancyArea = coreArea === null ? maxOccupancyArea : Math.min(maxOccupancyArea, coreArea);

  const { floors, source } = estimateFloors(rule);

  return ok({
    variant,
    zoneCode: rule.zoneCode,
    useCode,
    lotArea,
    occupancyMax,
    permeabilityMin,
    floorAreaMax: rule.floorAreaMax,
    maxOccupancyArea,
    minPermeableArea,
    maxTotalBuiltArea: rule.floorAreaMax === null ? null : rule.floorAreaMax * lotArea,
    minTotalBuiltArea: rule.floorAreaMin === null ? null : rule.floorAreaMin * lotArea,
    maxBasementArea: rule.subOccupancyMax === null ? null : rule.subOccupancyMax * lotArea,
    envelope,
    envelopeVerified: envelope !== null,
    realMaxOccupancyArea: Math.max(realMaxOccupancyArea, 0),
    limitingFactor,
    estimatedFloors: floors,
    floorSource: source,
    lotChecks: checkLotDimensions(lot, rule),
    warnings,
    sourceRef: rule.sourceRef,
  });
}

/**
 * Standard setbacks and the flexibility variant side by side.
 * `flexibility` is null when the use does not qualify or no rear setback is registered.
 */
export function computeImplantationOptions(
  lot: Lot,
  rule: ZoneRule,
  useCode: string,
  options: UrbanismOptions = {},
): Outcome<ImplantationOptions> {
  const standard = computeUrbanism(lot, rule, useCode, 'standard', options);
  if (!standard.ok) return standard;

  if (!isFlexibilityEligible(useCode, options) || rule.setbackRear === null) {
    return ok({ standard: standard.value, flexibility: null });
  }

  const flexibility = computeUrbanism(lot, rule, useCode, 'flexibility', options);
  if (!flexibility.ok) return flexibility;
  return ok({ standard: standard.value, flexibility: flexibility.value });
}
