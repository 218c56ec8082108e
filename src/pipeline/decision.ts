/**
 * 准入决策
 *
 * 顺序：覆盖标签 → 阻断问题 → 计数阈值 → 放行。
 * 非必需任务的失败只作为 warning，不单独导致阻断。
 */

import type {
  AggregatedResult,
  Decision,
  DecisionFactor,
  DecisionPolicy,
  RunContext,
  Severity,
} from "../types/index.js";
import { SEVERITIES } from "./severity.js";

export function decide(
  aggregated: AggregatedResult,
  policy: DecisionPolicy,
  context: Pick<RunContext, "labels">,
  now: Date = new Date(),
): Decision {
  const decidedAt = now.toISOString();
  const warnings = aggregated.failedTasks
    .filter((t) => !t.required)
    .map((t) => `non-required task "${t.taskId}" ended with ${t.status}`);

  const override = policy.overrideLabels.find((label) => context.labels.includes(label));
  if (override !== undefined) {
    return {
      outcome: "ADMIT",
      code: "OVERRIDE_APPLIED",
      reason: "override applied",
      factors: [{ kind: "override_label", label: override }],
      warnings,
      decidedAt,
    };
  }

  if (aggregated.blockingIssuesFound) {
    const factors: DecisionFactor[] = aggregated.blockingIssues.map((issue) =>
      issue.kind === "required_failure"
        ? { kind: "required_task_failed", taskId: issue.taskId, status: issue.status }
        : {
            kind: "severity_threshold",
            taskId: issue.taskId,
            severity: issue.severity,
            threshold: policy.blockingSeverity,
          },
    );
    const requiredFailures = aggregated.blockingIssues.filter((i) => i.kind === "required_failure");

    if (requiredFailures.length > 0) {
      const ids = requiredFailures.map((i) => `${i.taskId} (${i.status})`).join(", ");
      return {
        outcome: "BLOCK",
        code: "REQUIRED_TASK_FAILED",
        reason: `required task failed: ${ids}`,
        factors,
        warnings,
        decidedAt,
      };
    }

    const ids = aggregated.blockingIssues.map((i) => `${i.taskId} (${i.severity})`).join(", ");
    return {
      outcome: "BLOCK",
      code: "SEVERITY_THRESHOLD",
      reason: `severity at or above ${policy.blockingSeverity}: ${ids}`,
      factors,
      warnings,
      decidedAt,
    };
  }

  const exceeded: DecisionFactor[] = [];
  for (const severity of SEVERITIES) {
    const max = policy.maxCounts[severity];
    if (max === undefined) continue;
    const count = aggregated.counts[severity];
    if (count > max) {
      exceeded.push({ kind: "severity_count", severity, count, max });
    }
  }
  if (exceeded.length > 0) {
    return {
      outcome: "BLOCK",
      code: "SEVERITY_COUNT_EXCEEDED",
      reason: exceeded.map(describeCount).join("; "),
      factors: exceeded,
      warnings,
      decidedAt,
    };
  }

  return {
    outcome: "ADMIT",
    code: "NO_BLOCKING_ISSUES",
    reason: "no blocking issues",
    factors: aggregated.contributors.map((c): DecisionFactor => ({ kind: "task_result", ...c })),
    warnings,
    decidedAt,
  };
}

function describeCount(factor: DecisionFactor): string {
  if (factor.kind !== "severity_count") return factor.kind;
  return `${factor.count} ${label(factor.severity)} findings exceed max ${factor.max}`;
}

function label(severity: Severity): string {
  return severity.toLowerCase();
}
