import { describe, expect, it } from "vitest";
import { Metrics } from "../../src/observability/metrics.js";

describe("Metrics", () => {
  it("初始快照全部为零", () => {
    expect(new Metrics().snapshot()).toEqual({
      runs: {},
      tasks: {},
      retries: 0,
      stateConflicts: 0,
      compensation: { executed: 0, failed: 0 },
      taskLatency: {},
    });
  });

  it("统计运行、任务与延迟", () => {
    const metrics = new Metrics();
    metrics.runFinished("ADMITTED");
    metrics.runFinished("BLOCKED");
    metrics.runFinished("ADMITTED");
    metrics.taskFinished("lint", "SUCCESS", 120);
    metrics.taskFinished("lint", "FAILURE", 80);
    metrics.taskFinished("docs", "SKIPPED");
    metrics.taskRetried();
    metrics.stateConflict();
    metrics.compensation("executed");
    metrics.compensation("failed");

    const snapshot = metrics.snapshot();
    expect(snapshot.runs).toEqual({ ADMITTED: 2, BLOCKED: 1 });
    expect(snapshot.tasks).toEqual({ SUCCESS: 1, FAILURE: 1, SKIPPED: 1 });
    expect(snapshot.taskLatency).toEqual({ lint: { count: 2, sumMs: 200, minMs: 80, maxMs: 120 } });
    expect(snapshot.retries).toBe(1);
    expect(snapshot.stateConflicts).toBe(1);
    expect(snapshot.compensation).toEqual({ executed: 1, failed: 1 });
  });

  it("快照与内部状态隔离", () => {
    const metrics = new Metrics();
    metrics.taskFinished("lint", "SUCCESS", 10);
    const first = metrics.snapshot();
    metrics.taskFinished("lint", "SUCCESS", 30);
    expect(first.taskLatency.lint).toEqual({ count: 1, sumMs: 10, minMs: 10, maxMs: 10 });
  });
});
