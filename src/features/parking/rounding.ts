import { TRANSIT_REDUCTION_PERCENT } from '@/lib/constants/regulations';

/**
 * Round a raw space count: one decimal first, then up when the tenths digit
 * is 5 or more. 9.65 → 9.7 → 10, 9.64 → 9.6 → 10, 9.44 → 9.4 → 9.
 */
export function roundRequirement(raw: number): number {
  if (!(raw > 0)) return 0;
  const tenths = Math.round(raw * 10);
  const whole = Math.floor(tenths / 10);
  return tenths % 10 >= 5 ? whole + 1 : whole;
}

/** Reduced count near rapid transit, rounded up. Integer math keeps 10 → 8 exact. */
export function applyTransitReduction(required: number): number {
  if (required <= 0) return 0;
  return Math.ceil((required * (100 - TRANSIT_REDUCTION_PERCENT)) / 100);
}
