import type { RuleRepository } from '@/features/rules/repository';
import type { ParkingGeneration, ParkingRule } from '@/types/parking';

export interface ParkingRuleStrategy {
  generation: ParkingGeneration;
  load(useCode: string): Promise<ParkingRule | null>;
}

/** Current generation first, legacy table as fallback */
export function parkingStrategies(repository: RuleRepository): ParkingRuleStrategy[] {
  return [
    { generation: 'current', load: (useCode) => repository.getCurrentParkingRule(useCode) },
    { generation: 'legacy', load: (useCode) => repository.getLegacyParkingRule(useCode) },
  ];
}

/** First strategy that finds a rule wins; `null` once every strategy is exhausted */
export async function resolveParkingRule(
  strategies: readonly ParkingRuleStrategy[],
  useCode: string,
): Promise<ParkingRule | null> {
  for (const strategy of strategies) {
    const rule = await strategy.load(useCode);
    if (rule) return rule;
  }
  return null;
}
