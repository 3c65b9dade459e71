import { describe, it, expect, beforeEach } from "vitest";
import { LearningModel } from "../../../src/learning/learning.js";
import { result } from "../helpers/fixtures.js";

describe("LearningModel", () => {
  let clock: number;
  let model: LearningModel;

  beforeEach(() => {
    clock = 0;
    model = new LearningModel({ alpha: 0.5, windowMs: 1_000 }, () => clock);
  });

  it("should know nothing before any observation", () => {
    expect(model.riskSignal("write", "internal")).toBe(0);
    expect(model.estimateDurationMs("write")).toBeNull();
  });

  it("should revise a weight at most once per window", () => {
    model.observeResult(result("s1", 1, "FAILED"));
    expect(model.riskSignal("write", "internal")).toBe(0.5);

    clock = 100;
    model.observeResult(result("s1", 2, "FAILED"));
    expect(model.riskSignal("write", "internal")).toBe(0.5);
    expect(model.snapshot().categories).toEqual([
      { key: "write", weight: 0.5, revisions: 1, pending: 1, revisedAt: "1970-01-01T00:00:00.000Z" },
    ]);

    clock = 1_000;
    expect(model.riskSignal("write", "internal")).toBe(0.75);
    expect(model.snapshot().categories[0]?.revisions).toBe(2);
  });

  it("should average the observations buffered in a window", () => {
    model.observeResult(result("s1", 1));
    clock = 10;
    model.observeResult(result("s1", 2, "FAILED"));
    model.observeResult(result("s1", 3, "TIMEOUT"));
    model.observeResult(result("s1", 4));

    clock = 1_000;
    // mean of (1, 1, 0) = 2/3; 0 + 0.5 * 2/3
    expect(model.riskSignal("write", "internal")).toBeCloseTo(1 / 3);
  });

  it("should ignore compensation results", () => {
    model.observeResult(result("s1", 1, "FAILED", "compensation"));
    expect(model.riskSignal("write", "internal")).toBe(0);
  });

  it("should take the higher of the category and sensitivity signals", () => {
    model.observeResult({ ...result("s1", 1, "FAILED"), sensitivity: "restricted" });

    expect(model.riskSignal("write", "public")).toBe(0.5);
    expect(model.riskSignal("read", "restricted")).toBe(0.5);
    expect(model.riskSignal("read", "public")).toBe(0);
  });

  it("should turn ratings into category weights", () => {
    model.observeFeedback(
      { taskId: "task-1", humanRating: 1, correctionNotes: "", timestamp: "2026-01-01T00:00:00.000Z" },
      ["communicate", "read", "communicate"],
    );

    expect(model.riskSignal("communicate", "internal")).toBe(0.5);
    expect(model.riskSignal("read", "internal")).toBe(0.5);
    expect(model.snapshot().categories.map((c) => c.key)).toEqual(["communicate", "read"]);
  });

  it("should smooth durations of successful steps", () => {
    model.observeResult({ ...result("s1", 1), durationMs: 100 });
    model.observeResult({ ...result("s2", 1), durationMs: 200 });
    model.observeResult({ ...result("s3", 1, "FAILED"), durationMs: 5_000 });

    expect(model.estimateDurationMs("write")).toBe(150);
    expect(model.snapshot().durations).toEqual([{ category: "write", estimateMs: 150, samples: 2 }]);
  });
});
