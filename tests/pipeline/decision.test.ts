import { describe, expect, it } from "vitest";
import { aggregate } from "../../src/pipeline/aggregator.js";
import { decide } from "../../src/pipeline/decision.js";
import type { DecisionPolicy, TaskResult } from "../../src/types/index.js";
import { makeResult } from "../helpers/fixtures.js";

const NOW = new Date("2026-03-01T10:00:00.000Z");

function policyWith(overrides: Partial<DecisionPolicy> = {}): DecisionPolicy {
  return {
    blockingSeverity: "HIGH",
    maxCounts: {},
    requiredFailureBlocks: {},
    overrideLabels: [],
    ...overrides,
  };
}

function run(results: TaskResult[], policy: DecisionPolicy, labels: string[] = []) {
  return decide(aggregate(results, policy), policy, { labels }, NOW);
}

describe("decide", () => {
  it("没有阻断问题时放行", () => {
    const decision = run([makeResult({ taskId: "a", required: true })], policyWith());
    expect(decision).toEqual({
      outcome: "ADMIT",
      code: "NO_BLOCKING_ISSUES",
      reason: "no blocking issues",
      factors: [{ kind: "task_result", taskId: "a", status: "SUCCESS", severity: "NONE" }],
      warnings: [],
      decidedAt: "2026-03-01T10:00:00.000Z",
    });
  });

  it("必需任务失败时阻断并列出任务", () => {
    const decision = run([makeResult({ taskId: "lint", required: true, status: "FAILURE" })], policyWith());
    expect(decision.outcome).toBe("BLOCK");
    expect(decision.code).toBe("REQUIRED_TASK_FAILED");
    expect(decision.reason).toBe("required task failed: lint (FAILURE)");
    expect(decision.factors).toEqual([{ kind: "required_task_failed", taskId: "lint", status: "FAILURE" }]);
  });

  it("严重程度达到阈值时阻断", () => {
    const decision = run([makeResult({ taskId: "sec", severity: "CRITICAL" })], policyWith());
    expect(decision.code).toBe("SEVERITY_THRESHOLD");
    expect(decision.reason).toBe("severity at or above HIGH: sec (CRITICAL)");
    expect(decision.factors).toEqual([
      { kind: "severity_threshold", taskId: "sec", severity: "CRITICAL", threshold: "HIGH" },
    ]);
  });

  it("超过数量上限时阻断", () => {
    const decision = run(
      [
        makeResult({ taskId: "a", severity: "MEDIUM" }),
        makeResult({ taskId: "b", severity: "MEDIUM" }),
        makeResult({ taskId: "c", severity: "MEDIUM" }),
      ],
      policyWith({ maxCounts: { MEDIUM: 2 } }),
    );
    expect(decision.code).toBe("SEVERITY_COUNT_EXCEEDED");
    expect(decision.reason).toBe("3 medium findings exceed max 2");
    expect(decision.factors).toEqual([{ kind: "severity_count", severity: "MEDIUM", count: 3, max: 2 }]);
  });

  it("非必需任务超时只产生 warning", () => {
    const decision = run(
      [makeResult({ taskId: "a", required: true }), makeResult({ taskId: "docs", status: "TIMEOUT" })],
      policyWith(),
    );
    expect(decision.outcome).toBe("ADMIT");
    expect(decision.warnings).toEqual(['non-required task "docs" ended with TIMEOUT']);
  });

  it("覆盖标签优先于必需任务失败", () => {
    const decision = run(
      [makeResult({ taskId: "lint", required: true, status: "FAILURE" })],
      policyWith({ overrideLabels: ["review-override"] }),
      ["wip", "review-override"],
    );
    expect(decision.outcome).toBe("ADMIT");
    expect(decision.code).toBe("OVERRIDE_APPLIED");
    expect(decision.reason).toBe("override applied");
    expect(decision.factors).toEqual([{ kind: "override_label", label: "review-override" }]);
  });

  it("未配置的标签不触发覆盖", () => {
    const decision = run(
      [makeResult({ taskId: "lint", required: true, status: "FAILURE" })],
      policyWith({ overrideLabels: ["review-override"] }),
      ["skip-review"],
    );
    expect(decision.outcome).toBe("BLOCK");
  });

  it("相同输入产出相同决策", () => {
    const results = [
      makeResult({ taskId: "a", severity: "HIGH" }),
      makeResult({ taskId: "b", required: true, status: "TIMEOUT" }),
    ];
    expect(run(results, policyWith())).toEqual(run([...results].reverse(), policyWith()));
  });
});
