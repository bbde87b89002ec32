export { LifeEngine } from "./simulation/life-engine";
export type { StepResult } from "./simulation/life-engine";
export { Grid } from "./simulation/grid";
export { SimulationStepper } from "./simulation/simulation-stepper";
export { parseSeed, loadSeedFile, SeedSchema } from "./simulation/seed";
export type { SeedDocument } from "./simulation/seed";
export { renderFrame, createTerminalRenderer, DEFAULT_GLYPHS } from "./rendering/text-renderer";
export type { Glyphs, FrameSink, TerminalRendererOptions } from "./rendering/text-renderer";
export { detectDisplaySize } from "./cli/display-size";
export { runAnimation } from "./cli/animation";
export { run } from "./cli/run";
export type { RunOptions, TerminalStream } from "./cli/run";
export type { AnimationOptions, Sleep } from "./cli/animation";
export { ConfigurationError, SeedError, InvariantViolation } from "./errors";
export type { Coordinate, IGridView } from "./types/grid-types";
export type { Renderer, RendererMetrics, RendererOptions } from "./types/renderer-types";
export { App } from "./components/app";
export { LifeBoard } from "./components/life-board";
export type { BoardMetrics } from "./components/life-board";
