export type { UrbanismOptions, FloorEstimate } from './engine';
export {
  computeUrbanism,
  computeImplantationOptions,
  estimateFloors,
  checkLotDimensions,
  isFlexibilityEligible,
} from './engine';

export type { SetbackDistances } from './envelope';
export { computeEnvelope } from './envelope';

export { simulateResidentialProject } from './simulation';
