/**
 * 严重程度排序工具
 */

import type { Severity } from "../types/index.js";

export const SEVERITIES: readonly Severity[] = ["NONE", "LOW", "MEDIUM", "HIGH", "CRITICAL"];

export function severityRank(severity: Severity): number {
  return SEVERITIES.indexOf(severity);
}

export function isSeverity(value: unknown): value is Severity {
  return typeof value === "string" && (SEVERITIES as readonly string[]).includes(value);
}

export function maxSeverity(a: Severity, b: Severity): Severity {
  return severityRank(a) >= severityRank(b) ? a : b;
}

/** a 是否达到或超过 b */
export function meetsSeverity(a: Severity, b: Severity): boolean {
  return severityRank(a) >= severityRank(b);
}

export function emptySeverityCounts(): Record<Severity, number> {
  return { NONE: 0, LOW: 0, MEDIUM: 0, HIGH: 0, CRITICAL: 0 };
}
