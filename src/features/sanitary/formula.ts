import { MalformedRuleDataError } from '@/lib/errors';
import type { FixtureCount } from '@/types/sanitary';

/**
 * "1/300,00m² ou fração", "1 / 1.500 m2", "1 per 300 m² or fraction".
 * A dot followed by exactly three digits groups thousands; any other dot,
 * like the comma, is the decimal mark.
 */
const PER_AREA = /^\s*1\s*(?:\/|per|por|a cada)\s*([\d.,]+)\s*m/i;

function parseDecimal(raw: string): number {
  return Number(raw.replace(/\.(?=\d{3}(?!\d))/g, '').replace(',', '.'));
}

/** Parse once at the repository boundary; evaluation is a divide-then-ceil */
export function parseFixtureFormula(text: string, source = 'sanitary_profiles'): FixtureCount {
  const match = PER_AREA.exec(text);
  if (!match) {
    throw new MalformedRuleDataError(source, `unparseable fixture formula "${text}"`);
  }
  const perM2 = parseDecimal(match[1]);
  if (!Number.isFinite(perM2) || perM2 <= 0) {
    throw new MalformedRuleDataError(source, `fixture formula "${text}" has no positive area`);
  }
  return { kind: 'per_area', perM2, text };
}

export function evaluateFixture(fixture: FixtureCount, usableAreaM2: number): number {
  if (fixture.kind === 'literal') return fixture.count;
  if (usableAreaM2 <= 0) return 0;
  return Math.ceil(usableAreaM2 / fixture.perM2);
}
