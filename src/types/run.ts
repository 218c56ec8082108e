/**
 * 运行状态相关类型
 */

import type { PipelineRef, Severity } from "./pipeline.js";

/** 运行上下文 — 创建后不可变 */
export interface RunContext {
  /** 逻辑变更标识，如 "acme/api#123"，同一 subject 的新运行会取代旧运行 */
  subject: string;
  author?: string;
  labels: string[];
  files: string[];
  metadata: Record<string, unknown>;
}

/** 任务结果状态 */
export type TaskStatus = "SUCCESS" | "FAILURE" | "TIMEOUT" | "SKIPPED";

/** 任务结果 */
export interface TaskResult {
  taskId: string;
  ref: string;
  required: boolean;
  status: TaskStatus;
  severity: Severity;
  payload?: unknown;
  /** 领域扩展标记，聚合时按 OR 合并 */
  flags: Record<string, boolean>;
  attempt: number;
  retryCount: number;
  startedAt: string;
  completedAt: string;
  error?: string;
  /** 跳过 / 截断原因 */
  reason?: string;
}

/** 运行状态 */
export type RunStatus =
  | "CREATED"
  | "RUNNING"
  | "SUSPENDED"
  | "ADMITTED"
  | "BLOCKED"
  | "CANCELLED"
  | "FAILED";

/** 等待外部事件的任务 */
export interface AwaitingTask {
  taskId: string;
  attempt: number;
  since: string;
  /** 远程任务返回的关联信息（如审批单号） */
  token?: string;
}

/** 已持久化、尚未被执行方处理的恢复信号 */
export interface PendingSignal extends ResumeEvent {
  id: string;
  receivedAt: string;
}

/** 已处理的恢复信号 */
export interface SignalRecord {
  taskId: string;
  event: string;
  receivedAt: string;
}

/** 补偿动作执行记录 */
export interface CompensationRecord {
  actionId: string;
  type: string;
  status: "executed" | "failed";
  attempts: number;
  lastAttemptAt: string;
  executedAt?: string;
  detail?: string;
  error?: string;
}

/** 决策结果 */
export type DecisionOutcome = "ADMIT" | "BLOCK";

export type DecisionCode =
  | "OVERRIDE_APPLIED"
  | "REQUIRED_TASK_FAILED"
  | "SEVERITY_THRESHOLD"
  | "SEVERITY_COUNT_EXCEEDED"
  | "NO_BLOCKING_ISSUES";

/** 决策依据 */
export type DecisionFactor =
  | { kind: "override_label"; label: string }
  | { kind: "required_task_failed"; taskId: string; status: TaskStatus }
  | { kind: "severity_threshold"; taskId: string; severity: Severity; threshold: Severity }
  | { kind: "severity_count"; severity: Severity; count: number; max: number }
  | { kind: "task_result"; taskId: string; status: TaskStatus; severity: Severity };

/** 终态的参与任务（id / 状态 / 严重程度） */
export interface TaskContribution {
  taskId: string;
  status: TaskStatus;
  severity: Severity;
}

export interface Decision {
  outcome: DecisionOutcome;
  code: DecisionCode;
  reason: string;
  factors: DecisionFactor[];
  warnings: string[];
  decidedAt: string;
}

/** 运行持有者租约 */
export interface Lease {
  ownerId: string;
  expiresAt: string;
}

/** 持久化的运行快照 */
export interface RunState {
  schemaVersion: 1;
  runId: string;
  pipeline: PipelineRef;
  status: RunStatus;
  currentStage: number;
  context: RunContext;
  results: Record<string, TaskResult>;
  awaiting: Record<string, AwaitingTask>;
  signals: SignalRecord[];
  /** 按到达顺序追加，由持有租约的执行方在波次边界取出 */
  pendingSignals: PendingSignal[];
  compensationActions: CompensationRecord[];
  /** 所有适用的补偿动作均已执行 */
  compensationCompletedAt?: string;
  decision?: Decision;
  reason?: string;
  /** 进入终态时已记录的任务结果摘要 */
  contributors?: TaskContribution[];
  cancelRequested?: { reason: string; requestedAt: string };
  owner?: Lease;
  version: number;
  createdAt: string;
  updatedAt: string;
  deadline: string;
  completedAt?: string;
}

/** 聚合结果（派生，不持久化） */
export interface BlockingIssue {
  taskId: string;
  kind: "required_failure" | "severity";
  status: TaskStatus;
  severity: Severity;
}

export interface AggregatedResult {
  overallSeverity: Severity;
  score: number;
  counts: Record<Severity, number>;
  statusCounts: Record<TaskStatus, number>;
  blockingIssuesFound: boolean;
  blockingIssues: BlockingIssue[];
  /** 失败或超时的任务 */
  failedTasks: { taskId: string; status: TaskStatus; required: boolean }[];
  /** 参与聚合的任务（跳过的除外），按 taskId 排序 */
  contributors: TaskContribution[];
  flags: Record<string, boolean>;
}

/** 外部恢复事件（审批通过 / 拒绝等） */
export interface ResumeEvent {
  /** 缺省时取当前唯一等待中的任务 */
  taskId?: string;
  event: string;
  status: "SUCCESS" | "FAILURE";
  severity?: Severity;
  payload?: unknown;
  flags?: Record<string, boolean>;
}

export const TERMINAL_STATUSES: readonly RunStatus[] = ["ADMITTED", "BLOCKED", "CANCELLED", "FAILED"];

export function isTerminal(status: RunStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}
