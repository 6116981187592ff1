/**
 * Outcome taxonomy shared by every stage of a feasibility study.
 * Each issue carries a Portuguese `message` meant to be shown verbatim.
 */

export type FeasibilityIssue =
  | { kind: 'ZoneNotFound'; message: string; lat: number; lon: number }
  | { kind: 'StreetNotFound'; message: string; lat: number; lon: number; maxDistanceM: number }
  | { kind: 'RuleNotFound'; message: string; ruleType: RuleType; key: string }
  | { kind: 'RuleIncomplete'; message: string; zoneCode: string; useCode: string; missingFields: string[] }
  | { kind: 'InvalidLotDimensions'; message: string; frontage: number; depth: number }
  | { kind: 'MalformedRuleData'; message: string; source: string; detail: string }
  | { kind: 'RepositoryUnavailable'; message: string; operation: string; detail: string }
  | { kind: 'UseNotEligible'; message: string; useCode: string; feature: EligibilityFeature };

export type RuleType = 'zone' | 'sanitary_mapping' | 'sanitary_profile';
export type EligibilityFeature = 'flexibility' | 'simulation';

export type Outcome<T> = { ok: true; value: T } | { ok: false; issue: FeasibilityIssue };

export function ok<T>(value: T): Outcome<T> {
  return { ok: true, value };
}

export function fail<T>(issue: FeasibilityIssue): Outcome<T> {
  return { ok: false, issue };
}

// ── Issue builders ──

export function zoneNotFound(lat: number, lon: number): FeasibilityIssue {
  return {
    kind: 'ZoneNotFound',
    message: 'Ponto fora das zonas do zoneamento municipal.',
    lat,
    lon,
  };
}

export function streetNotFound(lat: number, lon: number, maxDistanceM: number): FeasibilityIssue {
  return {
    kind: 'StreetNotFound',
    message: `Nenhuma rua encontrada a menos de ${maxDistanceM} m do ponto.`,
    lat,
    lon,
    maxDistanceM,
  };
}

export function zoneRuleNotFound(zoneCode: string, useCode: string): FeasibilityIssue {
  return {
    kind: 'RuleNotFound',
    message: `Sem regra cadastrada para ${zoneCode} + ${useCode}.`,
    ruleType: 'zone',
    key: `${zoneCode}:${useCode}`,
  };
}

export function sanitaryRuleNotFound(ruleType: 'sanitary_mapping' | 'sanitary_profile', key: string): FeasibilityIssue {
  const message =
    ruleType === 'sanitary_mapping'
      ? `Uso ${key} sem perfil sanitário cadastrado.`
      : `Perfil sanitário ${key} não cadastrado.`;
  return { kind: 'RuleNotFound', message, ruleType, key };
}

export function ruleIncomplete(zoneCode: string, useCode: string, missingFields: string[]): FeasibilityIssue {
  return {
    kind: 'RuleIncomplete',
    message: `Regra ${zoneCode} + ${useCode} incompleta: faltam ${missingFields.join(', ')}.`,
    zoneCode,
    useCode,
    missingFields,
  };
}

export function invalidLotDimensions(frontage: number, depth: number): FeasibilityIssue {
  return {
    kind: 'InvalidLotDimensions',
    message: 'Testada e profundidade do lote devem ser maiores que zero.',
    frontage,
    depth,
  };
}

export function useNotEligible(useCode: string, feature: EligibilityFeature): FeasibilityIssue {
  const message =
    feature === 'flexibility'
      ? `O uso ${useCode} não admite a flexibilização de recuos.`
      : `A simulação para leigo só atende usos residenciais (uso ${useCode}).`;
  return { kind: 'UseNotEligible', message, useCode, feature };
}

// ── Errors thrown at the repository boundary ──

export class RepositoryUnavailableError extends Error {
  readonly operation: string;

  constructor(operation: string, cause?: unknown) {
    super(`Rule repository unavailable during ${operation}`, { cause });
    this.name = 'RepositoryUnavailableError';
    this.operation = operation;
  }
}

export class MalformedRuleDataError extends Error {
  readonly source: string;
  readonly detail: string;

  constructor(source: string, detail: string) {
    super(`Malformed rule data in ${source}: ${detail}`);
    this.name = 'MalformedRuleDataError';
    this.source = source;
    this.detail = detail;
  }
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  return cause === undefined ? '' : String(cause);
}

/**
 * Map an error thrown by a repository call into an issue.
 * Anything that is not one of the boundary errors is rethrown.
 */
export function issueFromError(error: unknown): FeasibilityIssue {
  if (error instanceof RepositoryUnavailableError) {
    return {
      kind: 'RepositoryUnavailable',
      message: 'Base de regras indisponível no momento. Tente novamente.',
      operation: error.operation,
      detail: describeCause(error.cause),
    };
  }
  if (error instanceof MalformedRuleDataError) {
    return {
      kind: 'MalformedRuleData',
      message: `Regra cadastrada com formato inválido (${error.source}).`,
      source: error.source,
      detail: error.detail,
    };
  }
  throw error;
}
