// ── Rendering ──

/** Glyph printed for a live cell. */
export const ALIVE_GLYPH = "\u2588"; // full block

/** Glyph printed for a dead cell. */
export const DEAD_GLYPH = "\u2591"; // light shade

/** ANSI sequence moving the cursor to the top-left corner before a frame. */
export const CURSOR_HOME = "\u001b[H";

// ── Animation ──

/** Delay between generations in the terminal loop, in ms. */
export const FRAME_INTERVAL_MS = 1000;

/** Default simulation steps executed per second in the browser view. */
export const DEFAULT_STEPS_PER_SECOND = 1;

/** Target rendering frame rate for the browser view's rAF loop. */
export const TARGET_FPS = 30;

// ── Seed ──

/** Seed document read from the working directory at startup. */
export const DEFAULT_SEED_FILE = "default.json";

/** Largest coordinate a seed may carry (unsigned 16-bit). */
export const MAX_COORDINATE = 65535;

// ── Grid ──

/** Largest grid, in cells (rows * cols), an engine will allocate. */
export const MAX_CELLS = 4096 * 4096;

// ── Display ──

/** Rows used when the output stream reports no size (not a TTY). */
export const FALLBACK_ROWS = 24;

/** Columns used when the output stream reports no size (not a TTY). */
export const FALLBACK_COLS = 80;
