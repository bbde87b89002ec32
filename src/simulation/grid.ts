import type { Coordinate, IGridView } from "../types/grid-types";

/** Row/column offsets of the eight surrounding cells. */
const NEIGHBOR_OFFSETS: readonly Coordinate[] = [
  [-1, -1], [-1, 0], [-1, 1],
  [0, -1], [0, 1],
  [1, -1], [1, 0], [1, 1],
];

/**
 * Fixed-size binary cell field, stored row-major in a Uint8Array
 * (0 = dead, 1 = alive).
 *
 * Edges are hard: there is no wrap-around in either direction, and
 * positions outside [0, rows) x [0, cols) have no cell. Dimensions are
 * validated by LifeEngine before a grid is created.
 */
export class Grid implements IGridView {
  readonly rows: number;
  readonly cols: number;
  readonly cells: Uint8Array;

  constructor(rows: number, cols: number) {
    this.rows = rows;
    this.cols = cols;
    this.cells = new Uint8Array(rows * cols);
  }

  idx(r: number, c: number): number {
    return r * this.cols + c;
  }

  inBounds(r: number, c: number): boolean {
    return r >= 0 && r < this.rows && c >= 0 && c < this.cols;
  }

  isAlive(r: number, c: number): boolean {
    return this.cells[this.idx(r, c)] === 1;
  }

  setAlive(r: number, c: number, alive: boolean): void {
    this.cells[this.idx(r, c)] = alive ? 1 : 0;
  }

  /** In-bounds neighbors of (r, c): 3 at a corner, 5 on an edge, 8 elsewhere. */
  neighbors(r: number, c: number): Coordinate[] {
    const result: Coordinate[] = [];
    for (const [dr, dc] of NEIGHBOR_OFFSETS) {
      const nr = r + dr;
      const nc = c + dc;
      if (this.inBounds(nr, nc)) result.push([nr, nc]);
    }
    return result;
  }

  liveNeighborCount(r: number, c: number): number {
    let count = 0;
    for (const [dr, dc] of NEIGHBOR_OFFSETS) {
      const nr = r + dr;
      const nc = c + dc;
      if (this.inBounds(nr, nc) && this.cells[this.idx(nr, nc)] === 1) count++;
    }
    return count;
  }
}
