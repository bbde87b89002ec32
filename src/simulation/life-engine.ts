import { Grid } from "./grid";
import { ConfigurationError, InvariantViolation } from "../errors";
import { MAX_CELLS } from "../constants";
import type { Coordinate, IGridView } from "../types/grid-types";

/** Cells that changed state in one call to `step()`. */
export interface StepResult {
  /** Generation number reached by this step. */
  generation: number;
  births: Coordinate[];
  deaths: Coordinate[];
}

/**
 * Conway's Game of Life (B3/S23) on a bounded grid.
 *
 * Keeps the grid and an explicit list of live cells in lockstep. Each step
 * only visits live cells and the dead cells next to them, so the cost grows
 * with the population rather than with rows * cols.
 */
export class LifeEngine {
  private readonly grid: Grid;
  /** Live cells keyed by grid index; Map iteration keeps insertion order. */
  private readonly live = new Map<number, Coordinate>();
  private gen = 0;

  constructor(seed: Iterable<Coordinate>, rows: number, cols: number) {
    if (!Number.isInteger(rows) || rows <= 0 || !Number.isInteger(cols) || cols <= 0) {
      throw new ConfigurationError(`Grid dimensions must be positive integers, got ${rows}x${cols}`);
    }
    if (rows * cols > MAX_CELLS) {
      throw new ConfigurationError(`Grid of ${rows}x${cols} exceeds the ${MAX_CELLS}-cell limit`);
    }
    const grid = new Grid(rows, cols);

    for (const [r, c] of seed) {
      if (!grid.inBounds(r, c) || !Number.isInteger(r) || !Number.isInteger(c)) {
        throw new ConfigurationError(
          `Seed cell [${r}, ${c}] is outside the ${rows}x${cols} grid`,
        );
      }
      const i = grid.idx(r, c);
      if (this.live.has(i)) continue;
      grid.setAlive(r, c, true);
      this.live.set(i, [r, c]);
    }

    this.grid = grid;
  }

  get rows(): number {
    return this.grid.rows;
  }

  get cols(): number {
    return this.grid.cols;
  }

  /** Number of steps taken since construction. */
  get generation(): number {
    return this.gen;
  }

  get population(): number {
    return this.live.size;
  }

  /** Copy of the live cells, in insertion order. */
  liveCells(): Coordinate[] {
    return Array.from(this.live.values());
  }

  /**
   * Advance one generation.
   *
   * 1. Collect the dead neighbors of every live cell, each once
   * 2. Births: candidates with exactly 3 live neighbors
   * 3. Deaths: live cells with fewer than 2 or more than 3 live neighbors
   * 4. Commit deaths, then births, to both the grid and the live list
   *
   * Steps 1-3 read only the current generation; nothing is written until 4.
   */
  step(): StepResult {
    const { grid, live } = this;

    // Step 1: candidate dead cells, deduplicated by grid index
    const candidates = new Map<number, Coordinate>();
    for (const [r, c] of live.values()) {
      for (const [nr, nc] of grid.neighbors(r, c)) {
        const i = grid.idx(nr, nc);
        if (grid.cells[i] === 0 && !candidates.has(i)) {
          candidates.set(i, [nr, nc]);
        }
      }
    }

    // Step 2: births
    const births: Coordinate[] = [];
    for (const [r, c] of candidates.values()) {
      if (grid.liveNeighborCount(r, c) === 3) births.push([r, c]);
    }

    // Step 3: deaths
    const deaths: Coordinate[] = [];
    for (const [r, c] of live.values()) {
      const n = grid.liveNeighborCount(r, c);
      if (n < 2 || n > 3) deaths.push([r, c]);
    }

    // Step 4: commit
    for (const [r, c] of deaths) {
      grid.setAlive(r, c, false);
      live.delete(grid.idx(r, c));
    }
    for (const [r, c] of births) {
      grid.setAlive(r, c, true);
      live.set(grid.idx(r, c), [r, c]);
    }

    this.gen++;
    return { generation: this.gen, births, deaths };
  }

  /** Read-only view of the current grid. Positions off the grid read as dead. */
  renderView(): IGridView {
    const { grid } = this;
    return {
      rows: grid.rows,
      cols: grid.cols,
      isAlive: (row: number, col: number) => grid.inBounds(row, col) && grid.isAlive(row, col),
    };
  }

  /** Throws InvariantViolation if the grid and the live list disagree. */
  checkInvariant(): void {
    const { grid, live } = this;
    let alive = 0;
    for (let i = 0; i < grid.cells.length; i++) {
      if (grid.cells[i] === 0) continue;
      alive++;
      if (!live.has(i)) {
        const r = Math.floor(i / grid.cols);
        throw new InvariantViolation(`Cell [${r}, ${i % grid.cols}] is alive but not tracked`);
      }
    }
    if (alive !== live.size) {
      throw new InvariantViolation(`Grid has ${alive} live cells, live list has ${live.size}`);
    }
  }
}
