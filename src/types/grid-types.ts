/** A `[row, col]` cell position. */
export type Coordinate = readonly [row: number, col: number];

/**
 * Read-only view of the simulation grid.
 * Used by renderers and anything else that inspects state without mutating it.
 */
export interface IGridView {
  readonly rows: number;
  readonly cols: number;
  isAlive(row: number, col: number): boolean;
}
