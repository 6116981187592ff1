/**
 * Legal parameters for one (zone, use) pair.
 * Ratios are fractions (0.6 = 60%). A null field means "not registered",
 * which is never the same as zero.
 */
export interface ZoneRule {
  zoneCode: string;
  useCode: string;
  /** TO */
  occupancyMax: number | null;
  /** TP */
  permeabilityMin: number | null;
  /** IA min / max */
  floorAreaMin: number | null;
  floorAreaMax: number | null;
  /** Basement occupancy */
  subOccupancyMax: number | null;
  setbackFront: number | null;
  /** Applies to each side */
  setbackLateral: number | null;
  setbackRear: number | null;
  allowAttachOneSide: boolean;
  heightLimitM: number | null;
  heightLimitFloors: number | null;
  minLotAreaM2: number | null;
  maxLotAreaM2: number | null;
  minFrontageMidBlockM: number | null;
  minFrontageCornerM: number | null;
  maxFrontageM: number | null;
  notes: string | null;
  observations: string | null;
  specialAreaTag: string | null;
  requiresSubzone: boolean;
  subzoneCode: string | null;
  sourceRef: string | null;
}

export interface Lot {
  /** Testada (m) */
  frontage: number;
  /** Profundidade (m) */
  depth: number;
  corner: boolean;
  /** Only meaningful on a corner lot */
  twoFronts: boolean;
  /** Request to build on one lateral boundary */
  attachOneSide?: boolean;
}

export type EnvelopeVariant = 'standard' | 'flexibility';
export type CornerModel = 'mid_block' | 'corner_two_fronts' | 'corner_single_front';
export type OccupancyLimit = 'occupancy' | 'setbacks';
export type FloorSource = 'rule_floors' | 'height_limit' | 'default';

export interface AppliedSetbacks {
  front: number;
  lateral: number;
  rear: number;
  /** Lateral sides actually deducted (0, 1 or 2) */
  lateralSides: number;
  attachedOneSide: boolean;
}

export interface Envelope {
  setbacks: AppliedSetbacks;
  cornerModel: CornerModel;
  usableWidth: number;
  usableDepth: number;
  coreArea: number;
}

export type LotCheckKey =
  | 'min_lot_area'
  | 'max_lot_area'
  | 'min_frontage'
  | 'max_frontage';

export interface LotCheck {
  key: LotCheckKey;
  passed: boolean;
  actual: number;
  limit: number;
  message: string;
}

export interface UrbanismResult {
  variant: EnvelopeVariant;
  zoneCode: string;
  useCode: string;
  lotArea: number;
  occupancyMax: number;
  permeabilityMin: number;
  floorAreaMax: number | null;
  maxOccupancyArea: number;
  minPermeableArea: number;
  maxTotalBuiltArea: number | null;
  minTotalBuiltArea: number | null;
  maxBasementArea: number | null;
  /** null when the rule lacks setbacks */
  envelope: Envelope | null;
  envelopeVerified: boolean;
  realMaxOccupancyArea: number;
  limitingFactor: OccupancyLimit;
  estimatedFloors: number;
  floorSource: FloorSource;
  lotChecks: LotCheck[];
  warnings: string[];
  sourceRef: string | null;
}

export interface ImplantationOptions {
  standard: UrbanismResult;
  /** null when the use does not qualify for the flexibility variant */
  flexibility: UrbanismResult | null;
}

export type SimulationMode = 'auto_limits' | 'project';
export type SimulationConstraint = 'occupancy' | 'built_area' | 'permeability';

export interface SimulationCheck {
  constraint: SimulationConstraint;
  passed: boolean;
  /** false when the rule lacks the limit needed for this check */
  verifiable: boolean;
  actual: number;
  limit: number | null;
}

export interface SimulationInput {
  /** Total built area across all floors; omitted or 0 = use the computed maximum */
  desiredBuiltAreaM2?: number;
  /** Omitted or 0 = use the estimated floor count */
  desiredFloors?: number;
  /** Usable area for parking/sanitary; omitted = total built area */
  usableAreaM2?: number;
}

export interface SimulationVerdict {
  verdict: 'viable' | 'non_viable';
  mode: SimulationMode;
  variant: EnvelopeVariant;
  floors: number;
  totalBuiltAreaM2: number;
  footprintM2: number;
  remainingLotAreaM2: number;
  occupancyRatio: number;
  usableAreaM2: number;
  checks: SimulationCheck[];
  failing: SimulationConstraint[];
  reasons: string[];
}
