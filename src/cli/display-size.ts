import { FALLBACK_ROWS, FALLBACK_COLS } from "../constants";

/** The parts of a tty.WriteStream the size probe reads. */
export interface SizedStream {
  isTTY?: boolean;
  rows?: number;
  columns?: number;
}

export interface DisplaySize {
  rows: number;
  cols: number;
}

/**
 * Rows and columns of the terminal behind `stream`, or the fallback size
 * when it is not a TTY or reports no usable size.
 */
export function detectDisplaySize(stream: SizedStream): DisplaySize {
  const { isTTY, rows, columns } = stream;
  if (isTTY && rows !== undefined && columns !== undefined && rows > 0 && columns > 0) {
    return { rows, cols: columns };
  }
  return { rows: FALLBACK_ROWS, cols: FALLBACK_COLS };
}
