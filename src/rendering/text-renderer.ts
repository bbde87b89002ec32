import { ALIVE_GLYPH, DEAD_GLYPH, CURSOR_HOME } from "../constants";
import type { IGridView } from "../types/grid-types";
import type { Renderer, RendererMetrics, RendererOptions } from "../types/renderer-types";

export interface Glyphs {
  alive: string;
  dead: string;
}

export const DEFAULT_GLYPHS: Glyphs = { alive: ALIVE_GLYPH, dead: DEAD_GLYPH };

/**
 * One glyph per cell, row by row. Rows are separated by "\n" with no
 * trailing newline after the last row.
 */
export function renderFrame(view: IGridView, glyphs: Glyphs = DEFAULT_GLYPHS): string {
  const lines: string[] = [];
  for (let r = 0; r < view.rows; r++) {
    let line = "";
    for (let c = 0; c < view.cols; c++) {
      line += view.isAlive(r, c) ? glyphs.alive : glyphs.dead;
    }
    lines.push(line);
  }
  return lines.join("\n");
}

/** Minimal sink the terminal renderer writes to (process.stdout in the CLI). */
export interface FrameSink {
  write(chunk: string): unknown;
}

export interface TerminalRendererOptions {
  glyphs?: Glyphs;
  /** Move the cursor home before each frame so frames overwrite each other. */
  clearScreen?: boolean;
}

export function createTerminalRenderer(out: FrameSink, options: TerminalRendererOptions = {}): Renderer {
  const glyphs = options.glyphs ?? DEFAULT_GLYPHS;
  const clearScreen = options.clearScreen ?? false;
  let destroyed = false;

  return {
    update(view: IGridView, opts: RendererOptions): RendererMetrics {
      const t0 = performance.now();
      if (!destroyed) {
        const frame = renderFrame(view, glyphs);
        out.write(clearScreen ? CURSOR_HOME + frame : frame + "\n");
      }
      return {
        generation: opts.generation,
        population: opts.population,
        renderTimeMs: performance.now() - t0,
      };
    },
    destroy(): void {
      destroyed = true;
    },
  };
}
