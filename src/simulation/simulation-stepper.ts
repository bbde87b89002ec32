import type { StepResult } from "./life-engine";

/**
 * Runs generations at a target steps-per-second rate, independent of frame
 * rate. Tracks timing and birth/death totals for display.
 */
export class SimulationStepper {
  targetStepsPerSecond = 1;
  paused = false;

  /** EMA-smoothed actual steps per second. */
  actualStepsPerSecond = 0;

  /** EMA-smoothed time spent in step() calls per frame, in ms. */
  stepTimeMs = 0;

  /** Steps run by the most recent advance(). */
  lastStepsThisFrame = 0;

  totalBirths = 0;
  totalDeaths = 0;

  private accumulator = 0;
  private readonly stepFn: () => StepResult;

  /** Weight of the newest frame in the moving averages. */
  private readonly emaAlpha = 0.05;

  constructor(stepFn: () => StepResult) {
    this.stepFn = stepFn;
  }

  /**
   * Called once per frame. Works out how many generations are due from the
   * elapsed time and the target rate, then runs them.
   *
   * @param deltaMs — milliseconds since the last frame
   */
  advance(deltaMs: number): void {
    if (this.paused) {
      this.stepTimeMs = 0;
      this.lastStepsThisFrame = 0;
      return;
    }

    const deltaSeconds = deltaMs / 1000;
    if (deltaSeconds <= 0) return;

    this.accumulator += this.targetStepsPerSecond * deltaSeconds;
    const stepsThisFrame = Math.floor(this.accumulator);
    this.accumulator -= stepsThisFrame;
    this.lastStepsThisFrame = stepsThisFrame;

    const t0 = performance.now();
    for (let i = 0; i < stepsThisFrame; i++) {
      this.stepOnce();
    }
    const rawStepTimeMs = performance.now() - t0;
    this.stepTimeMs =
      this.emaAlpha * rawStepTimeMs +
      (1 - this.emaAlpha) * this.stepTimeMs;

    const instantStepsPerSecond = stepsThisFrame / deltaSeconds;
    this.actualStepsPerSecond =
      this.emaAlpha * instantStepsPerSecond +
      (1 - this.emaAlpha) * this.actualStepsPerSecond;
  }

  /** Advance exactly one generation, regardless of rate or pause state. */
  stepOnce(): void {
    const { births, deaths } = this.stepFn();
    this.totalBirths += births.length;
    this.totalDeaths += deaths.length;
  }
}
