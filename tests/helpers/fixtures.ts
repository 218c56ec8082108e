/**
 * 测试公共构造函数
 */

import { parseDefinition } from "../../src/definition/loader.js";
import { createDefaultPredicates } from "../../src/definition/predicates.js";
import type { PipelineDefinition, RunState, TaskResult } from "../../src/types/index.js";

export function makeResult(overrides: Partial<TaskResult> & { taskId: string }): TaskResult {
  return {
    ref: overrides.taskId,
    required: false,
    status: "SUCCESS",
    severity: "NONE",
    flags: {},
    attempt: 1,
    retryCount: 0,
    startedAt: "2026-01-01T00:00:00.000Z",
    completedAt: "2026-01-01T00:00:01.000Z",
    ...overrides,
  };
}

/** 通过真实的加载流程构造定义（填充默认值并校验） */
export function makeDefinition(raw: Record<string, unknown>, compensationTypes?: string[]): PipelineDefinition {
  return parseDefinition(
    { name: "review", version: 1, ...raw },
    { predicates: createDefaultPredicates(), compensationTypes },
  );
}

export function makeRunState(overrides: Partial<RunState> = {}): RunState {
  return {
    schemaVersion: 1,
    runId: "run-1",
    pipeline: { name: "review", version: 1 },
    status: "CREATED",
    currentStage: 0,
    context: { subject: "acme/api#1", labels: [], files: [], metadata: {} },
    results: {},
    awaiting: {},
    signals: [],
    pendingSignals: [],
    compensationActions: [],
    version: 0,
    createdAt: "2026-01-01T00:00:00.000Z",
    updatedAt: "2026-01-01T00:00:00.000Z",
    deadline: "2026-01-02T00:00:00.000Z",
    ...overrides,
  };
}
