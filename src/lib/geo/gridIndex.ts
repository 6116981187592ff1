/** Axis-aligned bounding box in whatever plane the caller works in */
export interface BBox {
  minX: number;
  minY: number;
  maxX: number;
  maxY: number;
}

export function bboxIntersects(a: BBox, b: BBox): boolean {
  return a.minX <= b.maxX && a.maxX >= b.minX && a.minY <= b.maxY && a.maxY >= b.minY;
}

export function bboxAround(x: number, y: number, radius: number): BBox {
  return { minX: x - radius, minY: y - radius, maxX: x + radius, maxY: y + radius };
}

function extentOf(boxes: BBox[]): BBox {
  let minX = Infinity, minY = Infinity;
  let maxX = -Infinity, maxY = -Infinity;
  for (const b of boxes) {
    if (b.minX < minX) minX = b.minX;
    if (b.minY < minY) minY = b.minY;
    if (b.maxX > maxX) maxX = b.maxX;
    if (b.maxY > maxY) maxY = b.maxY;
  }
  return { minX, minY, maxX, maxY };
}

/**
 * Static uniform grid over bounding boxes. Built once, read-only afterwards.
 * Queries return item ids (positions in the input array) in ascending order,
 * so callers iterate candidates in source order.
 */
export class GridIndex {
  private constructor(
    private readonly boxes: readonly BBox[],
    private readonly extent: BBox,
    private readonly cols: number,
    private readonly rows: number,
    private readonly cellWidth: number,
    private readonly cellHeight: number,
    private readonly cells: readonly number[][],
  ) {}

  static build(boxes: BBox[]): GridIndex {
    if (boxes.length === 0) {
      return new GridIndex([], { minX: 0, minY: 0, maxX: 0, maxY: 0 }, 1, 1, 1, 1, [[]]);
    }

    const extent = extentOf(boxes);
    const side = Math.max(1, Math.ceil(Math.sqrt(boxes.length)));
    const width = extent.maxX - extent.minX;
    const height = extent.maxY - extent.minY;
    const cols = width > 0 ? side : 1;
    const rows = height > 0 ? side : 1;
    const cellWidth = width > 0 ? width / cols : 1;
    const cellHeight = height > 0 ? height / rows : 1;

    const cells: number[][] = Array.from({ length: cols * rows }, () => []);
    const index = new GridIndex(boxes, extent, cols, rows, cellWidth, cellHeight, cells);

    boxes.forEach((box, id) => {
      const [c0, c1, r0, r1] = index.cellRange(box);
      for (let r = r0; r <= r1; r++) {
        for (let c = c0; c <= c1; c++) {
          cells[r * cols + c].push(id);
        }
      }
    });

    return index;
  }

  get size(): number {
    return this.boxes.length;
  }

  /** Ids whose bounding box intersects the query box, ascending */
  query(box: BBox): number[] {
    if (this.boxes.length === 0 || !bboxIntersects(box, this.extent)) return [];

    const [c0, c1, r0, r1] = this.cellRange(box);
    const found = new Set<number>();
    for (let r = r0; r <= r1; r++) {
      for (let c = c0; c <= c1; c++) {
        for (const id of this.cells[r * this.cols + c]) {
          if (!found.has(id) && bboxIntersects(this.boxes[id], box)) {
            found.add(id);
          }
        }
      }
    }
    return [...found].sort((a, b) => a - b);
  }

  private cellRange(box: BBox): [number, number, number, number] {
    const clampCol = (v: number) => Math.min(this.cols - 1, Math.max(0, v));
    const clampRow = (v: number) => Math.min(this.rows - 1, Math.max(0, v));
    return [
      clampCol(Math.floor((box.minX - this.extent.minX) / this.cellWidth)),
      clampCol(Math.floor((box.maxX - this.extent.minX) / this.cellWidth)),
      clampRow(Math.floor((box.minY - this.extent.minY) / this.cellHeight)),
      clampRow(Math.floor((box.maxY - this.extent.minY) / this.cellHeight)),
    ];
  }
}
