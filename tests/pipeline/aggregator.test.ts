import { describe, expect, it } from "vitest";
import { DEFAULT_AGGREGATION, aggregate, severityForScore } from "../../src/pipeline/aggregator.js";
import { SEVERITIES, severityRank } from "../../src/pipeline/severity.js";
import { makeResult } from "../helpers/fixtures.js";

const policy = { blockingSeverity: "HIGH" as const, requiredFailureBlocks: {} };

describe("aggregate", () => {
  it("空结果集应为 NONE 且无阻断问题", () => {
    const agg = aggregate([], policy);
    expect(agg.overallSeverity).toBe("NONE");
    expect(agg.score).toBe(0);
    expect(agg.blockingIssuesFound).toBe(false);
    expect(agg.failedTasks).toEqual([]);
  });

  it("max 模式取最高严重程度并统计数量", () => {
    const agg = aggregate(
      [
        makeResult({ taskId: "a", severity: "LOW" }),
        makeResult({ taskId: "b", severity: "MEDIUM" }),
        makeResult({ taskId: "c", severity: "LOW" }),
      ],
      policy,
    );
    expect(agg.overallSeverity).toBe("MEDIUM");
    expect(agg.counts).toEqual({ NONE: 0, LOW: 2, MEDIUM: 1, HIGH: 0, CRITICAL: 0 });
    expect(agg.score).toBe(5);
    expect(agg.blockingIssuesFound).toBe(false);
  });

  it("SKIPPED 结果只计入状态统计", () => {
    const agg = aggregate(
      [makeResult({ taskId: "a", status: "SKIPPED", severity: "CRITICAL", flags: { risky: true } })],
      policy,
    );
    expect(agg.statusCounts.SKIPPED).toBe(1);
    expect(agg.counts.CRITICAL).toBe(0);
    expect(agg.overallSeverity).toBe("NONE");
    expect(agg.flags).toEqual({});
  });

  it("达到阻断阈值的结果应记为阻断问题", () => {
    const agg = aggregate([makeResult({ taskId: "sec", severity: "HIGH" })], policy);
    expect(agg.blockingIssues).toEqual([{ taskId: "sec", kind: "severity", status: "SUCCESS", severity: "HIGH" }]);
  });

  it("必需任务失败为阻断问题，非必需任务失败只进入 failedTasks", () => {
    const agg = aggregate(
      [
        makeResult({ taskId: "lint", required: true, status: "FAILURE" }),
        makeResult({ taskId: "docs", required: false, status: "TIMEOUT" }),
      ],
      policy,
    );
    expect(agg.failedTasks).toEqual([
      { taskId: "docs", status: "TIMEOUT", required: false },
      { taskId: "lint", status: "FAILURE", required: true },
    ]);
    expect(agg.blockingIssues).toEqual([
      { taskId: "lint", kind: "required_failure", status: "FAILURE", severity: "NONE" },
    ]);
  });

  it("requiredFailureBlocks=false 时必需任务失败不阻断", () => {
    const agg = aggregate([makeResult({ taskId: "lint", required: true, status: "FAILURE" })], {
      blockingSeverity: "HIGH",
      requiredFailureBlocks: { lint: false },
    });
    expect(agg.blockingIssuesFound).toBe(false);
    expect(agg.failedTasks).toHaveLength(1);
  });

  it("flags 按 OR 合并", () => {
    const agg = aggregate(
      [
        makeResult({ taskId: "a", flags: { high_risk: false, needs_docs: true } }),
        makeResult({ taskId: "b", flags: { high_risk: true } }),
      ],
      policy,
    );
    expect(agg.flags).toEqual({ high_risk: true, needs_docs: true });
  });

  it("结果顺序不影响输出", () => {
    const results = [
      makeResult({ taskId: "b", required: true, status: "FAILURE", severity: "HIGH" }),
      makeResult({ taskId: "a", severity: "CRITICAL" }),
      makeResult({ taskId: "c", status: "TIMEOUT" }),
    ];
    expect(aggregate([...results].reverse(), policy)).toEqual(aggregate(results, policy));
  });

  it("weighted 模式按得分映射严重程度", () => {
    const weighted = { ...DEFAULT_AGGREGATION, mode: "weighted" as const };
    const agg = aggregate(
      [
        makeResult({ taskId: "a", severity: "MEDIUM" }),
        makeResult({ taskId: "b", severity: "MEDIUM" }),
        makeResult({ taskId: "c", severity: "LOW" }),
      ],
      policy,
      weighted,
    );
    // 3 + 3 + 1 = 7 → HIGH
    expect(agg.score).toBe(7);
    expect(agg.overallSeverity).toBe("HIGH");
    // 阻断判断仍按单个结果
    expect(agg.blockingIssuesFound).toBe(false);
  });

  it("参与任务按 taskId 排序且不含跳过的任务", () => {
    const agg = aggregate(
      [
        makeResult({ taskId: "b", status: "FAILURE", severity: "HIGH" }),
        makeResult({ taskId: "c", status: "SKIPPED" }),
        makeResult({ taskId: "a", severity: "LOW" }),
      ],
      policy,
    );
    expect(agg.contributors).toEqual([
      { taskId: "a", status: "SUCCESS", severity: "LOW" },
      { taskId: "b", status: "FAILURE", severity: "HIGH" },
    ]);
  });

  describe.each([
    ["max", DEFAULT_AGGREGATION],
    ["weighted", { ...DEFAULT_AGGREGATION, mode: "weighted" as const }],
  ])("%s 模式的单调性", (_mode, aggregation) => {
    const low = makeResult({ taskId: "a", severity: "LOW" });
    const base = [low, makeResult({ taskId: "b", severity: "MEDIUM" })];
    const baseRank = severityRank(aggregate(base, policy, aggregation).overallSeverity);

    it("增加任意结果不会降低整体严重程度", () => {
      for (const severity of SEVERITIES) {
        const agg = aggregate([...base, makeResult({ taskId: "c", severity })], policy, aggregation);
        expect(severityRank(agg.overallSeverity)).toBeGreaterThanOrEqual(baseRank);
      }
    });

    it("提高单个结果的严重程度不会降低整体严重程度", () => {
      let previous = -1;
      for (const severity of SEVERITIES) {
        const agg = aggregate([low, makeResult({ taskId: "b", severity })], policy, aggregation);
        const rank = severityRank(agg.overallSeverity);
        expect(rank).toBeGreaterThanOrEqual(previous);
        previous = rank;
      }
    });
  });
});

describe("severityForScore", () => {
  const weights = DEFAULT_AGGREGATION.weights;

  it.each([
    [0, "NONE"],
    [1, "LOW"],
    [2, "LOW"],
    [3, "MEDIUM"],
    [14, "HIGH"],
    [15, "CRITICAL"],
    [40, "CRITICAL"],
  ] as const)("得分 %d → %s", (score, expected) => {
    expect(severityForScore(score, weights)).toBe(expected);
  });

  it("权重为 0 的级别不参与映射", () => {
    expect(severityForScore(5, { NONE: 0, LOW: 0, MEDIUM: 0, HIGH: 5, CRITICAL: 0 })).toBe("HIGH");
    expect(severityForScore(4, { NONE: 0, LOW: 0, MEDIUM: 0, HIGH: 5, CRITICAL: 0 })).toBe("NONE");
  });
});
