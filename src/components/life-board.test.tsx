/**
 * @jest-environment jsdom
 */
import React from "react";
import { render, screen } from "@testing-library/react";
import { LifeBoard, BoardMetrics } from "./life-board";
import { LifeEngine } from "../simulation/life-engine";

describe("LifeBoard", () => {
  it("renders the engine's current frame", () => {
    const engine = new LifeEngine([[0, 1]], 2, 3);
    render(<LifeBoard engine={engine} targetStepsPerSecond={1} paused={true} stepRequest={0} />);
    expect(screen.getByTestId("life-board").textContent).toBe("░█░\n░░░");
  });

  it("reports metrics on mount without stepping", () => {
    const engine = new LifeEngine([[1, 0], [1, 1], [1, 2]], 3, 3);
    const onMetrics = jest.fn<void, [BoardMetrics]>();
    render(
      <LifeBoard engine={engine} targetStepsPerSecond={1} paused={true} stepRequest={0} onMetrics={onMetrics} />,
    );
    expect(onMetrics).toHaveBeenCalledWith({
      generation: 0, population: 3, actualStepsPerSecond: 0, stepTimeMs: 0, totalBirths: 0, totalDeaths: 0,
    });
    expect(engine.generation).toBe(0);
  });

  it("steps once per new step request", () => {
    const engine = new LifeEngine([[1, 0], [1, 1], [1, 2]], 3, 3);
    const { rerender } = render(
      <LifeBoard engine={engine} targetStepsPerSecond={1} paused={true} stepRequest={0} />,
    );
    rerender(<LifeBoard engine={engine} targetStepsPerSecond={1} paused={true} stepRequest={1} />);
    expect(engine.generation).toBe(1);
    expect(screen.getByTestId("life-board").textContent).toBe("░█░\n░█░\n░█░");

    // same request again does nothing
    rerender(<LifeBoard engine={engine} targetStepsPerSecond={1} paused={true} stepRequest={1} />);
    expect(engine.generation).toBe(1);
  });

  it("does not replay an earlier step request on a new engine", () => {
    const first = new LifeEngine([[0, 0]], 2, 2);
    const second = new LifeEngine([[1, 1]], 2, 2);
    const { rerender } = render(
      <LifeBoard engine={first} targetStepsPerSecond={1} paused={true} stepRequest={3} />,
    );
    rerender(<LifeBoard engine={second} targetStepsPerSecond={1} paused={true} stepRequest={3} />);
    expect(second.generation).toBe(0);
    expect(screen.getByTestId("life-board").textContent).toBe("░░\n░█");
  });
});
