import type { IGridView } from "./grid-types";

export interface RendererOptions {
  generation: number;
  population: number;
}

export interface RendererMetrics {
  generation: number;
  population: number;
  /** Time spent building and writing the frame, in ms. */
  renderTimeMs: number;
}

export interface Renderer {
  update(view: IGridView, opts: RendererOptions): RendererMetrics;
  destroy(): void;
}
