/**
 * 进程内指标 — 计数器 + 延迟摘要，通过 /api/metrics 以 JSON 暴露
 */

import type { RunStatus, TaskStatus } from "../types/index.js";

export interface LatencySummary {
  count: number;
  sumMs: number;
  minMs: number;
  maxMs: number;
}

export interface MetricsSnapshot {
  runs: Record<string, number>;
  tasks: Record<string, number>;
  retries: number;
  stateConflicts: number;
  compensation: { executed: number; failed: number };
  taskLatency: Record<string, LatencySummary>;
}

export class Metrics {
  private runs = new Map<string, number>();
  private tasks = new Map<string, number>();
  private retries = 0;
  private stateConflicts = 0;
  private compensationExecuted = 0;
  private compensationFailed = 0;
  private latency = new Map<string, LatencySummary>();

  /** 运行到达终态 */
  runFinished(status: RunStatus): void {
    increment(this.runs, status);
  }

  taskFinished(ref: string, status: TaskStatus, durationMs?: number): void {
    increment(this.tasks, status);
    if (durationMs === undefined) return;

    const current = this.latency.get(ref);
    if (!current) {
      this.latency.set(ref, { count: 1, sumMs: durationMs, minMs: durationMs, maxMs: durationMs });
      return;
    }
    current.count++;
    current.sumMs += durationMs;
    current.minMs = Math.min(current.minMs, durationMs);
    current.maxMs = Math.max(current.maxMs, durationMs);
  }

  taskRetried(): void {
    this.retries++;
  }

  stateConflict(): void {
    this.stateConflicts++;
  }

  compensation(outcome: "executed" | "failed"): void {
    if (outcome === "executed") this.compensationExecuted++;
    else this.compensationFailed++;
  }

  snapshot(): MetricsSnapshot {
    return {
      runs: Object.fromEntries(this.runs),
      tasks: Object.fromEntries(this.tasks),
      retries: this.retries,
      stateConflicts: this.stateConflicts,
      compensation: { executed: this.compensationExecuted, failed: this.compensationFailed },
      taskLatency: Object.fromEntries([...this.latency].map(([ref, s]) => [ref, { ...s }])),
    };
  }
}

function increment(map: Map<string, number>, key: string): void {
  map.set(key, (map.get(key) ?? 0) + 1);
}
