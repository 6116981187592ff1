/**
 * Tests for features/parking (rounding, rule resolution, evaluation)
 */

import { describe, it, expect } from 'vitest';
import { applyTransitReduction, roundRequirement } from '@/features/parking/rounding';
import { computeParking, evaluateParkingRule, evaluateTerm } from '@/features/parking/engine';
import { parkingStrategies, resolveParkingRule } from '@/features/parking/resolution';
import { createMemoryRuleRepository } from '@/features/rules/memoryRepository';
import { toLegacyParkingRule } from '@/features/rules/schemas';
import { RepositoryUnavailableError } from '@/lib/errors';
import type { RuleRepository } from '@/features/rules/repository';
import type { ParkingResult } from '@/types/parking';
import { issueOf, makeParkingRule, unwrap } from './fixtures';

const officeRule = makeParkingRule('SERV_ESCRITORIO', [{ kind: 'ratio', perUnit: 30, text: '1 vaga a cada 30 m²' }]);

const retailRule = makeParkingRule('COM_VAREJO', [
  { kind: 'threshold_fixed', maxM2: 150, count: 2, text: 'Até 150 m²: 2 vagas' },
  { kind: 'ratio_above_threshold', minM2: 150, perUnit: 50, text: 'Acima de 150 m²: 1 vaga a cada 50 m²' },
]);

const clinicRule = makeParkingRule('SAUDE_CLINICA', [
  {
    kind: 'band_ratio',
    bands: [
      { minM2: 0, maxM2: 500, perUnit: 50, text: null },
      { minM2: 500, maxM2: null, perUnit: 35, text: 'Acima de 500 m²' },
    ],
    text: 'Faixas',
  },
  { kind: 'fixed', value: 2, text: 'Mínimo de 2 vagas' },
]);

const industryRule = toLegacyParkingRule({
  use_type_code: 'IND_LEVE',
  metric: 'per_area',
  value: 0.01,
  min_vagas: 2,
  source_ref: null,
});

const apartmentsRule = toLegacyParkingRule({
  use_type_code: 'RES_MULTI',
  metric: 'json_rule',
  value: null,
  min_vagas: null,
  source_ref: null,
  rule_json: { type: 'per_unit_by_unit_area' },
});

function required(result: ParkingResult) {
  if (result.status !== 'required') throw new Error(`expected required, got ${result.status}`);
  return result;
}

// ══════════════════════════════════════════════════════════════════════
// Rounding
// ══════════════════════════════════════════════════════════════════════

describe('roundRequirement', () => {
  it('rounds to one decimal first, then up from five tenths', () => {
    expect(roundRequirement(290 / 30)).toBe(10);
    expect(roundRequirement(9.65)).toBe(10);
    expect(roundRequirement(9.64)).toBe(10);
    expect(roundRequirement(9.44)).toBe(9);
    expect(roundRequirement(9.04)).toBe(9);
  });

  it('keeps whole counts', () => {
    expect(roundRequirement(3)).toBe(3);
  });

  it('returns zero for zero, negative or NaN input', () => {
    expect(roundRequirement(0)).toBe(0);
    expect(roundRequirement(-4)).toBe(0);
    expect(roundRequirement(Number.NaN)).toBe(0);
  });
});

describe('applyTransitReduction', () => {
  it('takes 20% off and rounds up', () => {
    expect(applyTransitReduction(10)).toBe(8);
    expect(applyTransitReduction(5)).toBe(4);
    expect(applyTransitReduction(3)).toBe(3);
    expect(applyTransitReduction(1)).toBe(1);
  });

  it('leaves zero at zero', () => {
    expect(applyTransitReduction(0)).toBe(0);
  });
});

// ══════════════════════════════════════════════════════════════════════
// evaluateTerm
// ══════════════════════════════════════════════════════════════════════

describe('evaluateTerm', () => {
  it('includes the upper bound of a band', () => {
    const [bands] = clinicRule.terms;
    expect(evaluateTerm(bands, 500)).toEqual({ raw: 10, text: 'Faixas' });
    expect(evaluateTerm(bands, 700)).toEqual({ raw: 20, text: 'Acima de 500 m²' });
  });

  it('applies threshold terms on their own side only', () => {
    const [upTo, above] = retailRule.terms;
    expect(evaluateTerm(upTo, 150)?.raw).toBe(2);
    expect(evaluateTerm(upTo, 151)).toBeNull();
    expect(evaluateTerm(above, 149)).toBeNull();
    expect(evaluateTerm(above, 200)?.raw).toBe(4);
  });

  it('needs the average unit area for tiered terms', () => {
    const [tiered] = apartmentsRule.terms;
    expect(evaluateTerm(tiered, 10)).toBeNull();
    expect(evaluateTerm(tiered, 10, { averageUnitAreaM2: 60 })?.raw).toBe(10);
    expect(evaluateTerm(tiered, 10, { averageUnitAreaM2: 90 })?.raw).toBe(15);
  });
});

// ══════════════════════════════════════════════════════════════════════
// evaluateParkingRule
// ══════════════════════════════════════════════════════════════════════

describe('evaluateParkingRule', () => {
  it('computes 290 m² of offices at one space per 30 m²', () => {
    const r = required(evaluateParkingRule(officeRule, 290));
    expect(r.raw).toBeCloseTo(9.6667, 4);
    expect(r.rounded).toBe(10);
    expect(r.required).toBe(10);
    expect(r.adjustments).toEqual([]);
    expect(r.appliedTerm).toMatchObject({ index: 0, kind: 'ratio', text: '1 vaga a cada 30 m²' });
  });

  it('reduces the count near rapid transit', () => {
    const r = required(evaluateParkingRule(officeRule, 290, { nearTransit: true }));
    expect(r.rounded).toBe(10);
    expect(r.required).toBe(8);
    expect(r.adjustments).toEqual([{ type: 'transit_reduction', from: 10, to: 8 }]);
  });

  it('takes the largest applicable term', () => {
    const r = required(evaluateParkingRule(clinicRule, 60));
    expect(r.raw).toBe(2);
    expect(r.appliedTerm.index).toBe(1);
    expect(r.appliedTerm.text).toBe('Mínimo de 2 vagas');
  });

  it('keeps the first term on a tie', () => {
    const r = required(evaluateParkingRule(clinicRule, 100));
    expect(r.raw).toBe(2);
    expect(r.appliedTerm.index).toBe(0);
  });

  it('reads the base metric out of a metric map', () => {
    const r = required(evaluateParkingRule(officeRule, { usable_area: 120, lot_area: 900 }));
    expect(r.metricValue).toBe(120);
    expect(r.required).toBe(4);
  });

  it('asks for the missing metric', () => {
    expect(evaluateParkingRule(officeRule, { lot_area: 300 })).toEqual({
      status: 'undetermined',
      useCode: 'SERV_ESCRITORIO',
      reason: 'no_metric_value',
      message: 'Informe a área útil para calcular as vagas.',
    });
  });

  it('rejects a negative metric value', () => {
    const r = evaluateParkingRule(officeRule, -1);
    expect(r.status).toBe('undetermined');
  });

  it('is undetermined when no term applies', () => {
    const rule = makeParkingRule('COM_VAREJO', [retailRule.terms[0]]);
    const r = evaluateParkingRule(rule, 400);
    expect(r).toMatchObject({ status: 'undetermined', reason: 'no_applicable_term' });
  });

  it('exempts small non-residential uses on local streets', () => {
    expect(evaluateParkingRule(officeRule, 100, { localStreet: true })).toEqual({
      status: 'exempt',
      useCode: 'SERV_ESCRITORIO',
      generation: 'current',
      metricValue: 100,
      reason: 'Dispensa: uso não residencial com até 100 m² em via local.',
    });
  });

  it('does not exempt above the footprint limit or off local streets', () => {
    expect(evaluateParkingRule(officeRule, 101, { localStreet: true }).status).toBe('required');
    expect(evaluateParkingRule(officeRule, 80).status).toBe('required');
  });

  it('does not exempt residential uses', () => {
    const rule = makeParkingRule('RES_MULTI', [{ kind: 'ratio', perUnit: 50, text: null }]);
    expect(evaluateParkingRule(rule, 80, { localStreet: true }).status).toBe('required');
  });

  it('never requires spaces for single-family houses', () => {
    const rule = makeParkingRule('RES_UNI', [{ kind: 'fixed', value: 1, text: null }]);
    expect(evaluateParkingRule(rule, 200)).toEqual({
      status: 'not_required',
      useCode: 'RES_UNI',
      reason: 'Residencial unifamiliar: sem exigência mínima de vagas.',
    });
  });

  it('applies the legacy minimum as a floor', () => {
    const small = required(evaluateParkingRule(industryRule, { lot_area: 100 }));
    expect(small.required).toBe(2);
    expect(small.appliedTerm.text).toBe('Mínimo de vagas');

    const large = required(evaluateParkingRule(industryRule, { lot_area: 500 }));
    expect(large.raw).toBeCloseTo(5);
    expect(large.required).toBe(5);
    expect(large.generation).toBe('legacy');
  });
});

describe('parking requirement growth', () => {
  const rules = [
    ['ratio', officeRule],
    ['threshold then ratio', retailRule],
    ['bands with a fixed minimum', clinicRule],
    ['legacy ratio with a minimum', industryRule],
  ] as const;

  for (const [name, rule] of rules) {
    it(`never decreases as the metric grows (${name})`, () => {
      for (const nearTransit of [false, true]) {
        let previous = 0;
        for (let value = 0; value <= 3000; value += 7) {
          const r = required(evaluateParkingRule(rule, value, { nearTransit }));
          expect(r.required).toBeGreaterThanOrEqual(previous);
          previous = r.required;
        }
      }
    });
  }
});

// ══════════════════════════════════════════════════════════════════════
// Rule resolution and computeParking
// ══════════════════════════════════════════════════════════════════════

describe('resolveParkingRule', () => {
  it('prefers the current generation', async () => {
    const legacyOffice = makeParkingRule('SERV_ESCRITORIO', [], { generation: 'legacy' });
    const repo = createMemoryRuleRepository({ currentParking: [officeRule], legacyParking: [legacyOffice] });
    const rule = await resolveParkingRule(parkingStrategies(repo), 'SERV_ESCRITORIO');
    expect(rule?.generation).toBe('current');
  });

  it('falls back to the legacy table', async () => {
    const repo = createMemoryRuleRepository({ legacyParking: [industryRule] });
    const rule = await resolveParkingRule(parkingStrategies(repo), 'IND_LEVE');
    expect(rule?.generation).toBe('legacy');
  });

  it('returns null once every generation is exhausted', async () => {
    const rule = await resolveParkingRule(parkingStrategies(createMemoryRuleRepository()), 'IND_LEVE');
    expect(rule).toBeNull();
  });
});

describe('computeParking', () => {
  const repo = createMemoryRuleRepository({
    currentParking: [officeRule, makeParkingRule('RES_UNI', [{ kind: 'fixed', value: 3, text: null }])],
    legacyParking: [industryRule],
  });

  it('resolves and evaluates in one call', async () => {
    const r = required(unwrap(await computeParking(repo, 'SERV_ESCRITORIO', 290, { nearTransit: true })));
    expect(r.required).toBe(8);
  });

  it('short-circuits single-family even when a rule exists', async () => {
    const r = unwrap(await computeParking(repo, 'RES_UNI', 500));
    expect(r.status).toBe('not_required');
  });

  it('uses the legacy rule when no current one exists', async () => {
    const r = required(unwrap(await computeParking(repo, 'IND_LEVE', { usable_area: 50, lot_area: 500 })));
    expect(r.generation).toBe('legacy');
    expect(r.baseMetric).toBe('lot_area');
    expect(r.required).toBe(5);
  });

  it('is undetermined for a use without any rule', async () => {
    expect(unwrap(await computeParking(repo, 'COM_VAREJO', 200))).toEqual({
      status: 'undetermined',
      useCode: 'COM_VAREJO',
      reason: 'no_rule',
      message: 'Sem regra de estacionamento cadastrada para o uso COM_VAREJO.',
    });
  });

  it('turns a store failure into an issue', async () => {
    const broken: RuleRepository = {
      ...createMemoryRuleRepository(),
      getCurrentParkingRule: async () => {
        throw new RepositoryUnavailableError('getCurrentParkingRule', new Error('timeout'));
      },
    };
    const issue = issueOf(await computeParking(broken, 'SERV_ESCRITORIO', 100));
    expect(issue).toMatchObject({ kind: 'RepositoryUnavailable', operation: 'getCurrentParkingRule', detail: 'timeout' });
  });

  it('lets programming errors through', async () => {
    const broken: RuleRepository = {
      ...createMemoryRuleRepository(),
      getCurrentParkingRule: async () => {
        throw new TypeError('boom');
      },
    };
    await expect(computeParking(broken, 'SERV_ESCRITORIO', 100)).rejects.toThrow('boom');
  });
});
