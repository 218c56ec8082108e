/**
 * 结果聚合 — 纯函数，每次从完整结果集重新计算
 *
 * 不做增量更新，保证恢复执行或部分重放后结果一致。
 */

import type {
  AggregatedResult,
  AggregationConfig,
  BlockingIssue,
  DecisionPolicy,
  Severity,
  TaskResult,
  TaskStatus,
} from "../types/index.js";
import { SEVERITIES, emptySeverityCounts, maxSeverity, meetsSeverity } from "./severity.js";

export const DEFAULT_AGGREGATION: AggregationConfig = {
  mode: "max",
  weights: { NONE: 0, LOW: 1, MEDIUM: 3, HIGH: 7, CRITICAL: 15 },
};

/** 加权模式：得分映射回达到其权重的最高严重程度 */
export function severityForScore(score: number, weights: Record<Severity, number>): Severity {
  let result: Severity = "NONE";
  for (const severity of SEVERITIES) {
    if (weights[severity] > 0 && score >= weights[severity]) {
      result = maxSeverity(result, severity);
    }
  }
  return result;
}

function isFailed(status: TaskStatus): boolean {
  return status === "FAILURE" || status === "TIMEOUT";
}

export function aggregate(
  results: readonly TaskResult[],
  policy: Pick<DecisionPolicy, "blockingSeverity" | "requiredFailureBlocks">,
  aggregation: AggregationConfig = DEFAULT_AGGREGATION,
): AggregatedResult {
  const counts = emptySeverityCounts();
  const statusCounts: Record<TaskStatus, number> = { SUCCESS: 0, FAILURE: 0, TIMEOUT: 0, SKIPPED: 0 };
  const blockingIssues: BlockingIssue[] = [];
  const failedTasks: AggregatedResult["failedTasks"] = [];
  const contributors: AggregatedResult["contributors"] = [];
  const flags: Record<string, boolean> = {};

  let maxSeen: Severity = "NONE";
  let score = 0;

  // 按 taskId 排序，保证输出与结果到达顺序无关
  const ordered = [...results].sort((a, b) => a.taskId.localeCompare(b.taskId));

  for (const result of ordered) {
    statusCounts[result.status]++;
    if (result.status === "SKIPPED") continue;

    contributors.push({ taskId: result.taskId, status: result.status, severity: result.severity });
    counts[result.severity]++;
    maxSeen = maxSeverity(maxSeen, result.severity);
    score += aggregation.weights[result.severity];

    for (const [name, value] of Object.entries(result.flags)) {
      flags[name] = (flags[name] ?? false) || value;
    }

    if (isFailed(result.status)) {
      failedTasks.push({ taskId: result.taskId, status: result.status, required: result.required });
      if (result.required && policy.requiredFailureBlocks[result.taskId] !== false) {
        blockingIssues.push({
          taskId: result.taskId,
          kind: "required_failure",
          status: result.status,
          severity: result.severity,
        });
      }
    }

    if (meetsSeverity(result.severity, policy.blockingSeverity)) {
      blockingIssues.push({
        taskId: result.taskId,
        kind: "severity",
        status: result.status,
        severity: result.severity,
      });
    }
  }

  const overallSeverity = aggregation.mode === "weighted" ? severityForScore(score, aggregation.weights) : maxSeen;

  return {
    overallSeverity,
    score,
    counts,
    statusCounts,
    blockingIssuesFound: blockingIssues.length > 0,
    blockingIssues,
    failedTasks,
    contributors,
    flags,
  };
}
