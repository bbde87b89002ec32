import { setTimeout as delay } from "timers/promises";
import type { LifeEngine } from "../simulation/life-engine";
import type { Renderer, RendererMetrics } from "../types/renderer-types";
import { FRAME_INTERVAL_MS } from "../constants";

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

const defaultSleep: Sleep = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};

export interface AnimationOptions {
  engine: LifeEngine;
  renderer: Renderer;
  intervalMs?: number;
  sleep?: Sleep;
  /** Stops the loop; without it the loop never ends on its own. */
  signal?: AbortSignal;
  /** Stop after this many steps. */
  maxGenerations?: number;
  onFrame?: (metrics: RendererMetrics) => void;
}

function draw(engine: LifeEngine, renderer: Renderer): RendererMetrics {
  return renderer.update(engine.renderView(), {
    generation: engine.generation,
    population: engine.population,
  });
}

/**
 * Renders the current generation, then repeatedly waits, steps and renders.
 * Resolves with the last generation drawn once aborted or once
 * `maxGenerations` steps have run.
 */
export async function runAnimation(opts: AnimationOptions): Promise<number> {
  const { engine, renderer, signal, maxGenerations, onFrame } = opts;
  const intervalMs = opts.intervalMs ?? FRAME_INTERVAL_MS;
  const sleep = opts.sleep ?? defaultSleep;

  const first = draw(engine, renderer);
  onFrame?.(first);

  let steps = 0;
  while (!signal?.aborted && (maxGenerations === undefined || steps < maxGenerations)) {
    try {
      await sleep(intervalMs, signal);
    } catch (err) {
      if (signal?.aborted) break;
      throw err;
    }
    engine.step();
    steps++;
    const metrics = draw(engine, renderer);
    onFrame?.(metrics);
  }

  return engine.generation;
}
