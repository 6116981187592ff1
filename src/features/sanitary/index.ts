export type { BandSelection } from './engine';
export { computeSanitary, evaluateSanitaryProfile, selectBand } from './engine';
export { parseFixtureFormula, evaluateFixture } from './formula';
