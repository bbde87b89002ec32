import path from "path";
import { LifeEngine } from "../simulation/life-engine";
import { loadSeedFile } from "../simulation/seed";
import { createTerminalRenderer, FrameSink } from "../rendering/text-renderer";
import { detectDisplaySize, SizedStream } from "./display-size";
import { runAnimation, Sleep } from "./animation";
import { DEFAULT_SEED_FILE, FRAME_INTERVAL_MS } from "../constants";

/** What the terminal front end needs from stdout: somewhere to write and a size. */
export type TerminalStream = FrameSink & SizedStream;

export interface RunOptions {
  stdout: TerminalStream;
  /** Directory holding the seed document. */
  cwd: string;
  signal?: AbortSignal;
  sleep?: Sleep;
  maxGenerations?: number;
}

/**
 * Loads the seed from `cwd`, sizes the grid to `stdout` and animates until
 * the signal aborts. Frames are redrawn in place on a TTY and appended
 * otherwise. Rejects with a ConfigurationError on a bad seed.
 */
export async function run(opts: RunOptions): Promise<number> {
  const { stdout, cwd, signal, sleep, maxGenerations } = opts;
  const seed = loadSeedFile(path.resolve(cwd, DEFAULT_SEED_FILE));
  const { rows, cols } = detectDisplaySize(stdout);
  const engine = new LifeEngine(seed, rows, cols);
  const renderer = createTerminalRenderer(stdout, { clearScreen: stdout.isTTY === true });

  let generation: number;
  try {
    generation = await runAnimation({
      engine, renderer, intervalMs: FRAME_INTERVAL_MS, sleep, signal, maxGenerations,
    });
  } finally {
    renderer.destroy();
  }
  stdout.write("\n");
  return generation;
}
