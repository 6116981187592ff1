import type { AppliedSetbacks, CornerModel, Envelope, Lot } from '@/types/regulation';

export interface SetbackDistances {
  front: number;
  lateral: number;
  rear: number;
}

function cornerModel(lot: Lot): CornerModel {
  if (!lot.corner) return 'mid_block';
  return lot.twoFronts ? 'corner_two_fronts' : 'corner_single_front';
}

/**
 * Buildable core left after setbacks, for a rectangular lot.
 *
 * A corner lot with two fronts takes the frontal setback on the side street
 * as well, in place of one lateral setback. Attaching to one side drops one
 * more lateral setback. Over-constrained lots give a zero core.
 */
export function computeEnvelope(lot: Lot, setbacks: SetbackDistances, attachOneSide: boolean): Envelope {
  const model = cornerModel(lot);
  const { front, lateral, rear } = setbacks;

  const lateralSides = Math.max((model === 'corner_two_fronts' ? 1 : 2) - (attachOneSide ? 1 : 0), 0);
  const sideStreetFront = model === 'corner_two_fronts' ? front : 0;

  const usableWidth = Math.max(lot.frontage - sideStreetFront - lateral * lateralSides, 0);
  const usableDepth = Math.max(lot.depth - front - rear, 0);

  const applied: AppliedSetbacks = {
    front,
    lateral,
    rear,
    lateralSides,
    attachedOneSide: attachOneSide,
  };

  return {
    setbacks: applied,
    cornerModel: model,
    usableWidth,
    usableDepth,
    coreArea: usableWidth * usableDepth,
  };
}
