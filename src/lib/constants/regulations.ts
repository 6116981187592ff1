/** Assumed floor-to-floor height when only a height limit is registered (m) */
export const DEFAULT_FLOOR_HEIGHT_M = 3.0;

/** Floor count when the rule registers neither floors nor height */
export const DEFAULT_FLOORS = 1;

/** Parking reduction near rapid transit, in percent */
export const TRANSIT_REDUCTION_PERCENT = 20;

/** Non-residential uses up to this usable area on a local street need no parking (m²) */
export const SMALL_FOOTPRINT_EXEMPTION_M2 = 100;

/** Slack for floating-point comparisons against legal limits */
export const LIMIT_TOLERANCE = 1e-9;
