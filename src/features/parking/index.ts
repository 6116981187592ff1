export { computeParking, evaluateParkingRule, evaluateTerm } from './engine';
export type { ParkingRuleStrategy } from './resolution';
export { parkingStrategies, resolveParkingRule } from './resolution';
export { roundRequirement, applyTransitReduction } from './rounding';
