/**
 * 分片调用 — 变更文件超过 chunking.maxFiles 时按文件拆成多次调用
 *
 * 失败的分片被丢弃；只要有一个分片完成，任务就按已完成分片的合并结果记录。
 */

import type { TaskChunking } from "../types/index.js";
import type { CompletedOutcome, TaskOutcome } from "./invoker.js";
import { maxSeverity } from "./severity.js";

/** 单个分片的调用结果 */
export interface ChunkAttempt {
  index: number;
  outcome?: TaskOutcome;
  error?: unknown;
}

export interface MergedChunks {
  /** 没有任何分片完成时为 undefined */
  outcome?: CompletedOutcome;
  failedChunks: number[];
  /** 所有分片都失败时，取第一个分片的错误 */
  error?: unknown;
}

/** 按文件数切分；未配置或不超过上限时返回单个分片 */
export function splitFiles(files: readonly string[], chunking: TaskChunking | undefined): string[][] {
  if (!chunking || files.length <= chunking.maxFiles) return [[...files]];
  const chunks: string[][] = [];
  for (let i = 0; i < files.length; i += chunking.maxFiles) {
    chunks.push(files.slice(i, i + chunking.maxFiles));
  }
  return chunks;
}

export function mergeChunkOutcomes(attempts: readonly ChunkAttempt[]): MergedChunks {
  const ordered = [...attempts].sort((a, b) => a.index - b.index);
  const completed: { index: number; outcome: CompletedOutcome }[] = [];
  const failedChunks: number[] = [];
  let firstError: unknown;

  for (const attempt of ordered) {
    if (attempt.outcome?.kind === "completed") {
      completed.push({ index: attempt.index, outcome: attempt.outcome });
      continue;
    }
    failedChunks.push(attempt.index);
    if (firstError === undefined) {
      // 分片不支持等待外部事件
      firstError = attempt.outcome?.kind === "pending" ? new Error(`chunk ${attempt.index} returned PENDING`) : attempt.error;
    }
  }

  if (completed.length === 0) {
    return { failedChunks, error: firstError ?? new Error("no chunk completed") };
  }

  const flags: Record<string, boolean> = {};
  let severity = completed[0]?.outcome.severity ?? "NONE";
  for (const { outcome } of completed) {
    severity = maxSeverity(severity, outcome.severity);
    for (const [name, value] of Object.entries(outcome.flags)) {
      flags[name] = (flags[name] ?? false) || value;
    }
  }

  return {
    outcome: {
      kind: "completed",
      status: completed.some((c) => c.outcome.status === "FAILURE") ? "FAILURE" : "SUCCESS",
      severity,
      flags,
      payload: {
        chunks: ordered.length,
        failedChunks,
        results: completed.map((c) => ({
          chunk: c.index,
          status: c.outcome.status,
          severity: c.outcome.severity,
          payload: c.outcome.payload,
        })),
      },
    },
    failedChunks,
  };
}
