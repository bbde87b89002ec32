import { runAnimation, Sleep } from "./animation";
import { LifeEngine } from "../simulation/life-engine";
import { createTerminalRenderer } from "../rendering/text-renderer";
import type { RendererMetrics } from "../types/renderer-types";

const BLINKER: [number, number][] = [[1, 0], [1, 1], [1, 2]];
const VERTICAL = ".#.\n.#.\n.#.\n";
const HORIZONTAL = "...\n###\n...\n";

function setup() {
  const frames: string[] = [];
  const engine = new LifeEngine(BLINKER, 3, 3);
  const renderer = createTerminalRenderer(
    { write: (chunk: string) => frames.push(chunk) },
    { glyphs: { alive: "#", dead: "." } },
  );
  return { frames, engine, renderer };
}

describe("runAnimation", () => {
  it("draws the seed, then one frame per step", async () => {
    const { frames, engine, renderer } = setup();
    const delays: number[] = [];
    const sleep: Sleep = async (ms) => { delays.push(ms); };

    const generation = await runAnimation({ engine, renderer, sleep, maxGenerations: 3 });

    expect(generation).toBe(3);
    expect(frames).toEqual([HORIZONTAL, VERTICAL, HORIZONTAL, VERTICAL]);
    expect(delays).toEqual([1000, 1000, 1000]);
  });

  it("writes frames when no frame callback is given", async () => {
    const { frames, engine, renderer } = setup();
    const controller = new AbortController();

    const generation = await runAnimation({
      engine, renderer, intervalMs: 1, signal: controller.signal, maxGenerations: 2,
    });

    expect(generation).toBe(2);
    expect(frames).toEqual([HORIZONTAL, VERTICAL, HORIZONTAL]);
  });

  it("waits the configured interval between frames", async () => {
    const { engine, renderer } = setup();
    const delays: number[] = [];
    const sleep: Sleep = async (ms) => { delays.push(ms); };

    await runAnimation({ engine, renderer, sleep, intervalMs: 250, maxGenerations: 2 });

    expect(delays).toEqual([250, 250]);
  });

  it("reports metrics for every frame", async () => {
    const { engine, renderer } = setup();
    const seen: RendererMetrics[] = [];

    await runAnimation({
      engine, renderer, maxGenerations: 2,
      sleep: async () => undefined,
      onFrame: (m) => seen.push(m),
    });

    expect(seen.map(m => m.generation)).toEqual([0, 1, 2]);
    expect(seen.map(m => m.population)).toEqual([3, 3, 3]);
  });

  it("stops when the signal aborts", async () => {
    const { frames, engine, renderer } = setup();
    const controller = new AbortController();

    const generation = await runAnimation({
      engine, renderer, signal: controller.signal,
      sleep: async () => undefined,
      onFrame: (m) => { if (m.generation === 1) controller.abort(); },
    });

    expect(generation).toBe(1);
    expect(frames).toEqual([HORIZONTAL, VERTICAL]);
  });

  it("treats a sleep interrupted by abort as a clean stop", async () => {
    const { frames, engine, renderer } = setup();
    const controller = new AbortController();
    const sleep: Sleep = async () => {
      controller.abort();
      throw new Error("aborted");
    };

    const generation = await runAnimation({ engine, renderer, sleep, signal: controller.signal });

    expect(generation).toBe(0);
    expect(frames).toEqual([HORIZONTAL]);
  });

  it("propagates sleep failures that are not aborts", async () => {
    const { engine, renderer } = setup();
    const sleep: Sleep = async () => { throw new Error("timer broke"); };

    await expect(runAnimation({ engine, renderer, sleep })).rejects.toThrow("timer broke");
  });

  it("aborts the default sleep through the signal", async () => {
    const { frames, engine, renderer } = setup();
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 10);

    const generation = await runAnimation({ engine, renderer, intervalMs: 60_000, signal: controller.signal });

    expect(generation).toBe(0);
    expect(frames).toEqual([HORIZONTAL]);
  });
});
