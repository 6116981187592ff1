export const PARKING_METRICS = [
  'usable_area',
  'lot_area',
  'units',
  'beds',
  'rooms',
  'seats',
] as const;

export type ParkingMetric = (typeof PARKING_METRICS)[number];

/** A single value for the rule's base metric, or values per metric */
export type ParkingMetricInput = number | Partial<Record<ParkingMetric, number>>;

export type ParkingGeneration = 'current' | 'legacy';

export interface ParkingBand {
  minM2: number;
  maxM2: number | null;
  perUnit: number;
  text: string | null;
}

export type ParkingTerm =
  | { kind: 'ratio'; perUnit: number; text: string | null }
  | { kind: 'fixed'; value: number; text: string | null }
  | { kind: 'band_ratio'; bands: ParkingBand[]; text: string | null }
  | { kind: 'threshold_fixed'; maxM2: number; count: number; text: string | null }
  | { kind: 'ratio_above_threshold'; minM2: number; perUnit: number; text: string | null }
  | {
      kind: 'unit_area_tiered';
      thresholdM2: number;
      rateBelow: number;
      rateAtOrAbove: number;
      text: string | null;
    };

export interface ParkingRule {
  useCode: string;
  generation: ParkingGeneration;
  baseMetric: ParkingMetric;
  /** Evaluated in order; the largest applicable requirement wins */
  terms: ParkingTerm[];
  notes: string[];
  generalNotes: string[];
  cargoLoadingText: string | null;
  sourceRef: string | null;
}

export interface ParkingOptions {
  nearTransit?: boolean;
  localStreet?: boolean;
  /** Needed by unit_area_tiered terms */
  averageUnitAreaM2?: number;
}

export interface ParkingAdjustment {
  type: 'transit_reduction';
  from: number;
  to: number;
}

export interface AppliedTerm {
  index: number;
  kind: ParkingTerm['kind'];
  text: string | null;
  raw: number;
}

export type ParkingResult =
  | { status: 'not_required'; useCode: string; reason: string }
  | {
      status: 'exempt';
      useCode: string;
      generation: ParkingGeneration;
      metricValue: number;
      reason: string;
    }
  | {
      status: 'required';
      useCode: string;
      generation: ParkingGeneration;
      baseMetric: ParkingMetric;
      metricValue: number;
      raw: number;
      /** Count after the one-decimal round-half-up rule */
      rounded: number;
      required: number;
      appliedTerm: AppliedTerm;
      adjustments: ParkingAdjustment[];
      notes: string[];
      generalNotes: string[];
      cargoLoadingText: string | null;
      sourceRef: string | null;
    }
  | {
      status: 'undetermined';
      useCode: string;
      reason: 'no_rule' | 'no_applicable_term' | 'no_metric_value';
      message: string;
    };
