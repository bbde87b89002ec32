import React, { useRef, useEffect, useState } from "react";
import type { LifeEngine } from "../simulation/life-engine";
import { SimulationStepper } from "../simulation/simulation-stepper";
import { renderFrame } from "../rendering/text-renderer";
import { TARGET_FPS } from "../constants";

export interface BoardMetrics {
  generation: number;
  population: number;
  actualStepsPerSecond: number;
  stepTimeMs: number;
  totalBirths: number;
  totalDeaths: number;
}

interface Props {
  engine: LifeEngine;
  targetStepsPerSecond: number;
  paused: boolean;
  /** Bumped by the parent to request a single step. */
  stepRequest: number;
  onMetrics?: (metrics: BoardMetrics) => void;
}

function collectMetrics(engine: LifeEngine, stepper: SimulationStepper): BoardMetrics {
  return {
    generation: engine.generation,
    population: engine.population,
    actualStepsPerSecond: stepper.actualStepsPerSecond,
    stepTimeMs: stepper.stepTimeMs,
    totalBirths: stepper.totalBirths,
    totalDeaths: stepper.totalDeaths,
  };
}

export const LifeBoard: React.FC<Props> = ({
  engine, targetStepsPerSecond, paused, stepRequest, onMetrics,
}) => {
  const [frame, setFrame] = useState(() => renderFrame(engine.renderView()));
  const stepperRef = useRef<SimulationStepper | null>(null);
  const targetStepsPerSecondRef = useRef(targetStepsPerSecond);
  targetStepsPerSecondRef.current = targetStepsPerSecond;
  const pausedRef = useRef(paused);
  pausedRef.current = paused;
  const onMetricsRef = useRef(onMetrics);
  onMetricsRef.current = onMetrics;

  // Rebuild the stepper and the rAF loop whenever a new engine arrives.
  useEffect(() => {
    let rafId = 0;
    let destroyed = false;
    const stepper = new SimulationStepper(() => engine.step());
    stepperRef.current = stepper;

    // 1ms tolerance so rAF jitter doesn't skip frames that land just short
    const minFrameInterval = 1000 / TARGET_FPS - 1;
    let lastFrameTime = -1;
    let lastDrawnGeneration = -1;

    function publish(): void {
      if (engine.generation !== lastDrawnGeneration) {
        setFrame(renderFrame(engine.renderView()));
        lastDrawnGeneration = engine.generation;
      }
      onMetricsRef.current?.(collectMetrics(engine, stepper));
    }

    function tick(timestamp: number): void {
      if (destroyed) return;
      if (lastFrameTime < 0) lastFrameTime = timestamp;

      const elapsed = timestamp - lastFrameTime;
      if (elapsed >= minFrameInterval) {
        lastFrameTime = timestamp;
        stepper.paused = pausedRef.current;
        stepper.targetStepsPerSecond = targetStepsPerSecondRef.current;
        stepper.advance(elapsed);
        if (stepper.lastStepsThisFrame > 0) publish();
      }
      rafId = requestAnimationFrame(tick);
    }

    publish();
    rafId = requestAnimationFrame(tick);

    return () => {
      destroyed = true;
      cancelAnimationFrame(rafId);
      stepperRef.current = null;
    };
  }, [engine]);

  // Single steps requested by the parent; a new engine does not replay them.
  const handledStepRequestRef = useRef(stepRequest);
  useEffect(() => {
    const stepper = stepperRef.current;
    if (stepRequest === handledStepRequestRef.current || !stepper) return;
    handledStepRequestRef.current = stepRequest;
    stepper.stepOnce();
    setFrame(renderFrame(engine.renderView()));
    onMetricsRef.current?.(collectMetrics(engine, stepper));
  // eslint-disable-next-line react-hooks/exhaustive-deps
  }, [stepRequest]);

  return <pre className="life-board" data-testid="life-board">{frame}</pre>;
};
