import type { LocalPoint } from '@/lib/geo/coordTransform';
import type { BBox } from '@/lib/geo/gridIndex';

/** Calculate distance between two 2D points */
export function distance2D(a: LocalPoint, b: LocalPoint): number {
  return Math.sqrt((a.x - b.x) ** 2 + (a.y - b.y) ** 2);
}

/** Shortest distance from a point to the segment ab */
export function distanceToSegment(p: LocalPoint, a: LocalPoint, b: LocalPoint): number {
  const dx = b.x - a.x;
  const dy = b.y - a.y;
  const lenSq = dx * dx + dy * dy;
  if (lenSq === 0) return distance2D(p, a);

  const t = Math.max(0, Math.min(1, ((p.x - a.x) * dx + (p.y - a.y) * dy) / lenSq));
  return distance2D(p, { x: a.x + t * dx, y: a.y + t * dy });
}

/** Shortest distance from a point to any of the polylines */
export function distanceToPolylines(p: LocalPoint, lines: LocalPoint[][]): number {
  let best = Infinity;
  for (const line of lines) {
    if (line.length === 1) {
      best = Math.min(best, distance2D(p, line[0]));
      continue;
    }
    for (let i = 0; i + 1 < line.length; i++) {
      const d = distanceToSegment(p, line[i], line[i + 1]);
      if (d < best) best = d;
    }
  }
  return best;
}

/** Bounding box of a set of polylines */
export function polylineBounds(lines: LocalPoint[][]): BBox {
  let minX = Infinity, maxX = -Infinity;
  let minY = Infinity, maxY = -Infinity;
  for (const line of lines) {
    for (const p of line) {
      if (p.x < minX) minX = p.x;
      if (p.x > maxX) maxX = p.x;
      if (p.y < minY) minY = p.y;
      if (p.y > maxY) maxY = p.y;
    }
  }
  return { minX, minY, maxX, maxY };
}
