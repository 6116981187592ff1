const DASH = '—';

function decimal(value: number, digits: number): string {
  return value.toLocaleString('pt-BR', {
    minimumFractionDigits: digits,
    maximumFractionDigits: digits,
  });
}

/** Format an area in square meters, e.g. "1.234,50 m²" */
export function formatArea(m2: number | undefined | null): string {
  if (m2 === undefined || m2 === null || !Number.isFinite(m2)) return DASH;
  return `${decimal(m2, 2)} m²`;
}

/** Format a distance in meters */
export function formatMeters(meters: number | undefined | null): string {
  if (meters === undefined || meters === null || !Number.isFinite(meters)) return DASH;
  return `${decimal(meters, 2)} m`;
}

/** Format a 0..1 ratio as a percentage */
export function formatRatio(ratio: number | undefined | null): string {
  if (ratio === undefined || ratio === null || !Number.isFinite(ratio)) return DASH;
  return `${decimal(ratio * 100, 1)}%`;
}
