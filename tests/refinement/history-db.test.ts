/**
 * Tests for RefinementHistory
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { RefinementHistory } from "../../src/refinement/history-db.js";

describe("RefinementHistory", () => {
  let history: RefinementHistory;

  beforeEach(() => {
    history = new RefinementHistory();
  });

  afterEach(() => {
    history.close();
  });

  const row = (runId: string, iteration: number, accuracy: number, state: string) => ({
    runId,
    artifact: "pay",
    iteration,
    version: `1.${iteration - 1}.0`,
    accuracy,
    delta: null,
    failures: 4 - Math.round(accuracy * 4),
    refinements: state === "evaluate" ? 2 : 0,
    state,
    recordedAt: 1000 + iteration,
  });

  it("should return the iterations of a run in order", () => {
    history.record(row("run-a", 2, 0.5, "evaluate"));
    history.record(row("run-a", 1, 0.25, "evaluate"));
    history.record(row("run-a", 3, 1, "target-met"));

    const rows = history.getRun("run-a");
    expect(rows.map((r) => r.iteration)).toEqual([1, 2, 3]);
    expect(rows[2]).toEqual({
      runId: "run-a",
      artifact: "pay",
      iteration: 3,
      version: "1.2.0",
      accuracy: 1,
      delta: null,
      failures: 0,
      refinements: 0,
      state: "target-met",
      recordedAt: 1003,
    });
  });

  it("should find the best accuracy across runs", () => {
    history.record(row("run-a", 1, 0.25, "evaluate"));
    history.record(row("run-a", 2, 0.5, "plateau"));
    history.record({ ...row("run-b", 1, 0.75, "max-iterations"), recordedAt: 2000 });

    expect(history.bestAccuracy("pay")).toEqual({
      artifact: "pay",
      runId: "run-b",
      version: "1.0.0",
      accuracy: 0.75,
    });
    expect(history.bestAccuracy("unknown")).toBeNull();
    expect(history.runIds("pay")).toEqual(["run-a", "run-b"]);
    expect(history.getArtifact("pay")).toHaveLength(3);
  });

  it("should store a delta", () => {
    history.record({ ...row("run-a", 2, 0.5, "evaluate"), delta: 0.25 });
    expect(history.getRun("run-a")[0].delta).toBe(0.25);
  });

  it("should return nothing once closed", () => {
    history.record(row("run-a", 1, 0.25, "evaluate"));
    history.close();
    expect(history.isOpen()).toBe(false);
    expect(history.getRun("run-a")).toEqual([]);
  });
});
