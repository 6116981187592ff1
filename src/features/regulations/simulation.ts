import { fail, ok, useNotEligible, type Outcome } from '@/lib/errors';
import { LIMIT_TOLERANCE } from '@/lib/constants/regulations';
import { formatArea } from '@/lib/utils/format';
import { classifyUse } from '@/features/rules/useCategories';
import type {
  SimulationCheck,
  SimulationConstraint,
  SimulationInput,
  SimulationVerdict,
  UrbanismResult,
} from '@/types/regulation';

function checkReason(check: SimulationCheck): string {
  switch (check.constraint) {
    case 'occupancy':
      return `Ocupação no térreo (${formatArea(check.actual)}) acima do máximo permitido pela TO considerando recuos (${formatArea(check.limit)}).`;
    case 'built_area':
      return check.verifiable
        ? `Área total construída (${formatArea(check.actual)}) acima do máximo permitido pelo IA (${formatArea(check.limit)}).`
        : 'IA máximo não cadastrado para esta combinação: não é possível confirmar a área total.';
    case 'permeability':
      return `Área livre do lote (${formatArea(check.actual)}) abaixo da área permeável mínima (${formatArea(check.limit)}).`;
  }
}

/**
 * Viable / non-viable verdict for a simple residential project.
 *
 * Without a desired built area the simulation takes the largest total the
 * zone allows for the floor count (auto mode); with one, it checks that
 * proposal. The footprint is the total spread evenly over the floors.
 */
export function simulateResidentialProject(
  urbanism: UrbanismResult,
  useCode: string,
  input: SimulationInput = {},
): Outcome<SimulationVerdict> {
  const useClass = classifyUse(useCode);
  if (useClass !== 'single_family' && useClass !== 'multi_family') {
    return fail(useNotEligible(useCode, 'simulation'));
  }

  const desiredFloors = input.desiredFloors ?? 0;
  const floors = desiredFloors > 0 ? Math.max(1, Math.floor(desiredFloors)) : urbanism.estimatedFloors;

  const desiredArea = input.desiredBuiltAreaM2 ?? 0;
  const mode = desiredArea > 0 ? 'project' : 'auto_limits';

  const stacked = urbanism.realMaxOccupancyArea * floors;
  const totalBuiltAreaM2 =
    mode === 'project'
      ? desiredArea
      : urbanism.maxTotalBuiltArea === null
        ? stacked
        : Math.min(urbanism.maxTotalBuiltArea, stacked);

  const footprintM2 = totalBuiltAreaM2 / floors;
  const remainingLotAreaM2 = urbanism.lotArea - footprintM2;

  const checks: SimulationCheck[] = [
    {
      constraint: 'occupancy',
      passed: footprintM2 <= urbanism.realMaxOccupancyArea + LIMIT_TOLERANCE,
      verifiable: true,
      actual: footprintM2,
      limit: urbanism.realMaxOccupancyArea,
    },
    urbanism.maxTotalBuiltArea === null
      ? { constraint: 'built_area', passed: false, verifiable: false, actual: totalBuiltAreaM2, limit: null }
      : {
          constraint: 'built_area',
          passed: totalBuiltAreaM2 <= urbanism.maxTotalBuiltArea + LIMIT_TOLERANCE,
          verifiable: true,
          actual: totalBuiltAreaM2,
          limit: urbanism.maxTotalBuiltArea,
        },
    {
      constraint: 'permeability',
      passed: remainingLotAreaM2 + LIMIT_TOLERANCE >= urbanism.minPermeableArea,
      verifiable: true,
      actual: remainingLotAreaM2,
      limit: urbanism.minPermeableArea,
    },
  ];

  const failing: SimulationConstraint[] = checks.filter((c) => !c.passed).map((c) => c.constraint);
  const reasons = checks.filter((c) => !c.passed).map(checkReason);
  if (!urbanism.envelopeVerified) {
    reasons.push('Recuos não cadastrados: a ocupação foi verificada sem o envelope de recuos.');
  }

  const usableAreaM2 = input.usableAreaM2 !== undefined && input.usableAreaM2 > 0 ? input.usableAreaM2 : totalBuiltAreaM2;

  const verdict: SimulationVerdict = {
    verdict: failing.length === 0 ? 'viable' : 'non_viable',
    mode,
    variant: urbanism.variant,
    floors,
    totalBuiltAreaM2,
    footprintM2,
    remainingLotAreaM2,
    occupancyRatio: footprintM2 / urbanism.lotArea,
    usableAreaM2,
    checks,
    failing,
    reasons,
  };
  return ok(verdict);
}
