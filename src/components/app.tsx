import React, { useState, useCallback } from "react";
import { LifeBoard, BoardMetrics } from "./life-board";
import { LifeEngine } from "../simulation/life-engine";
import { parseSeed } from "../simulation/seed";
import { ConfigurationError } from "../errors";
import { DEFAULT_STEPS_PER_SECOND } from "../constants";

const GLIDER_SEED = JSON.stringify({ cells: [[0, 1], [1, 2], [2, 0], [2, 1], [2, 2]] });

type BuildResult = { engine: LifeEngine; error: null } | { engine: null; error: string };

/** Parse the seed text and construct an engine, reporting configuration errors as text. */
export function buildEngine(seedText: string, rows: number, cols: number): BuildResult {
  try {
    return { engine: new LifeEngine(parseSeed(seedText), rows, cols), error: null };
  } catch (err) {
    if (err instanceof ConfigurationError) return { engine: null, error: err.message };
    throw err;
  }
}

export const App = () => {
  const [seedText, setSeedText] = useState(GLIDER_SEED);
  const [rows, setRows] = useState(20);
  const [cols, setCols] = useState(40);
  const [build, setBuild] = useState<BuildResult>(() => buildEngine(GLIDER_SEED, 20, 40));
  const [targetStepsPerSecond, setTargetStepsPerSecond] = useState(DEFAULT_STEPS_PER_SECOND);
  const [paused, setPaused] = useState(true);
  const [stepRequest, setStepRequest] = useState(0);
  const [metrics, setMetrics] = useState<BoardMetrics | null>(null);

  const applySeed = useCallback(() => {
    setBuild(buildEngine(seedText, rows, cols));
    setMetrics(null);
    setPaused(true);
  }, [seedText, rows, cols]);

  const speedOptions = [1, 2, 5, 10, 30];

  return (
    <div className="app">
      <div className="controls">
        <label>
          Seed:
          <textarea value={seedText} rows={4} cols={40}
            onChange={e => setSeedText(e.target.value)} />
        </label>
        <label>
          Rows:
          <input type="number" min="1" value={rows}
            onChange={e => setRows(Number(e.target.value))} />
        </label>
        <label>
          Columns:
          <input type="number" min="1" value={cols}
            onChange={e => setCols(Number(e.target.value))} />
        </label>
        <button onClick={applySeed}>Apply</button>
        <button onClick={() => setPaused(p => !p)} disabled={!build.engine}>
          {paused ? "Play" : "Pause"}
        </button>
        <button onClick={() => setStepRequest(n => n + 1)} disabled={!build.engine || !paused}>
          Step
        </button>
        <label>
          Speed: {targetStepsPerSecond} steps/s
          <select value={targetStepsPerSecond} onChange={e => setTargetStepsPerSecond(Number(e.target.value))}>
            {speedOptions.map(s => <option key={s} value={s}>{s} steps/s</option>)}
          </select>
        </label>
      </div>
      {build.error !== null && <div className="seed-error" role="alert">{build.error}</div>}
      {build.engine && (
        <LifeBoard
          engine={build.engine}
          targetStepsPerSecond={targetStepsPerSecond}
          paused={paused}
          stepRequest={stepRequest}
          onMetrics={setMetrics}
        />
      )}
      {metrics && (
        <div className="legend">
          {`Generation ${metrics.generation} | Population ${metrics.population}` +
            ` | ${metrics.totalBirths} births, ${metrics.totalDeaths} deaths`}
        </div>
      )}
    </div>
  );
};
