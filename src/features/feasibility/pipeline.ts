import { fail, issueFromError, ok, zoneRuleNotFound, type Outcome } from '@/lib/errors';
import type { LocationResolver } from '@/features/location/resolver';
import { isLocalStreet, requireZone } from '@/features/location/resolver';
import type { RuleRepository } from '@/features/rules/repository';
import { classifyUse } from '@/features/rules/useCategories';
import { computeImplantationOptions } from '@/features/regulations/engine';
import { simulateResidentialProject } from '@/features/regulations/simulation';
import { computeParking } from '@/features/parking/engine';
import { computeSanitary } from '@/features/sanitary/engine';
import type { LocationResult } from '@/types/zoning';
import type {
  EnvelopeVariant,
  ImplantationOptions,
  Lot,
  SimulationInput,
  SimulationVerdict,
  UrbanismResult,
  ZoneRule,
} from '@/types/regulation';
import type { ParkingMetric, ParkingResult } from '@/types/parking';
import type { SanitaryResult } from '@/types/sanitary';

export interface StudySettings {
  neighborhoodUseCodes: readonly string[];
}

/** Everything one study needs, passed explicitly; nothing is kept between studies */
export interface StudyContext {
  resolver: LocationResolver;
  repository: RuleRepository;
  settings: StudySettings;
}

export interface StudyRequest {
  lat: number;
  lon: number;
  useCode: string;
  lot: Lot;
  /** Envelope the simulation runs on; falls back to standard when the variant is unavailable */
  variant?: EnvelopeVariant;
  simulation?: SimulationInput;
  /** Usable area for parking and sanitary; defaults to the simulated or maximum built area */
  usableAreaM2?: number;
  parking?: {
    metrics?: Partial<Record<ParkingMetric, number>>;
    nearTransit?: boolean;
    /** Overrides the street hierarchy found at the coordinate */
    localStreet?: boolean;
    averageUnitAreaM2?: number;
  };
}

export interface FeasibilityStudy {
  location: LocationResult;
  rule: ZoneRule;
  implantation: ImplantationOptions;
  /** null for non-residential uses */
  simulation: Outcome<SimulationVerdict> | null;
  usableAreaM2: number;
  parking: Outcome<ParkingResult>;
  sanitary: Outcome<SanitaryResult>;
}

function pickUrbanism(implantation: ImplantationOptions, variant: EnvelopeVariant | undefined): UrbanismResult {
  if (variant === 'flexibility' && implantation.flexibility) return implantation.flexibility;
  return implantation.standard;
}

function reportMalformed(stage: string, outcome: Outcome<unknown>): void {
  if (!outcome.ok && outcome.issue.kind === 'MalformedRuleData') {
    console.error(`Malformed rule data (${stage}):`, outcome.issue.source, outcome.issue.detail);
  }
}

/**
 * coordinate → zone and street → zone rule → implantation options →
 * simulation, parking and sanitary.
 *
 * Stops at the first missing prerequisite (zone, zone rule, usable lot).
 * Parking and sanitary fail independently and come back as outcomes.
 */
export async function runFeasibilityStudy(
  context: StudyContext,
  request: StudyRequest,
): Promise<Outcome<FeasibilityStudy>> {
  const { resolver, repository, settings } = context;
  const { useCode, lot } = request;

  const location = resolver.resolve(request.lat, request.lon);
  const zone = requireZone(location);
  if (!zone.ok) return zone;

  let rule: ZoneRule | null;
  try {
    rule = await repository.getZoneRule(zone.value.code, useCode);
  } catch (err) {
    const outcome = fail<FeasibilityStudy>(issueFromError(err));
    reportMalformed('zone rule', outcome);
    return outcome;
  }
  if (!rule) return fail(zoneRuleNotFound(zone.value.code, useCode));

  const implantation = computeImplantationOptions(lot, rule, useCode, {
    neighborhoodUseCodes: settings.neighborhoodUseCodes,
  });
  if (!implantation.ok) return implantation;

  const urbanism = pickUrbanism(implantation.value, request.variant);
  const useClass = classifyUse(useCode);
  const simulation =
    useClass === 'single_family' || useClass === 'multi_family'
      ? simulateResidentialProject(urbanism, useCode, request.simulation)
      : null;

  const usableAreaM2 =
    request.usableAreaM2 ??
    (simulation?.ok ? simulation.value.usableAreaM2 : (urbanism.maxTotalBuiltArea ?? urbanism.realMaxOccupancyArea));

  const [parking, sanitary] = await Promise.all([
    computeParking(
      repository,
      useCode,
      { usable_area: usableAreaM2, lot_area: urbanism.lotArea, ...request.parking?.metrics },
      {
        nearTransit: request.parking?.nearTransit,
        localStreet: request.parking?.localStreet ?? isLocalStreet(location.streetHierarchy),
        averageUnitAreaM2: request.parking?.averageUnitAreaM2,
      },
    ),
    computeSanitary(repository, useCode, usableAreaM2),
  ]);
  reportMalformed('parking', parking);
  reportMalformed('sanitary', sanitary);

  const study: FeasibilityStudy = {
    location,
    rule,
    implantation: implantation.value,
    simulation,
    usableAreaM2,
    parking,
    sanitary,
  };
  return ok(study);
}
