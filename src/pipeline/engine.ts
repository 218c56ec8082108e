/**
 * 执行引擎 — 单次运行的状态机
 *
 * CREATED → RUNNING(stage i) → RUNNING(stage i+1) | SUSPENDED | ADMITTED | BLOCKED | CANCELLED | FAILED
 *
 * 所有状态变更都通过 commit()：对 version 做 CAS，冲突时重新加载并重放变更函数。
 * 每个任务结果在派发下一波次前落盘，已记录（或等待中）的任务不会再次调用。
 */

import { randomUUID } from "node:crypto";
import PQueue from "p-queue";
import pino from "pino";
import type { AuditLogger } from "../audit/logger.js";
import { config } from "../config.js";
import type { PipelineRegistry } from "../definition/registry.js";
import {
  LeaseDeniedError,
  RunNotFoundError,
  StateCorruptionError,
  TaskInvocationError,
  TaskTimeoutError,
  errorMessage,
} from "../errors.js";
import type { Metrics } from "../observability/metrics.js";
import type {
  PendingSignal,
  PipelineDefinition,
  ResumeEvent,
  RunState,
  RunStatus,
  Stage,
  TaskContribution,
  TaskResult,
  TaskSpec,
} from "../types/index.js";
import { isTerminal } from "../types/index.js";
import { aggregate } from "./aggregator.js";
import { mergeChunkOutcomes, splitFiles, type ChunkAttempt } from "./chunking.js";
import { applyCompensationRecord, isCompensationComplete, type CompensationHandler } from "./compensation.js";
import type { ConditionEvaluator } from "./condition.js";
import { decide } from "./decision.js";
import type { TaskInvoker, TaskOutcome } from "./invoker.js";
import { withRetry } from "./retry.js";
import { idempotencyKey, updateRun, type StateStore } from "./state.js";
import { planWaves } from "./waves.js";

const logger = pino({ name: "engine" });

/** 释放租约后发现新信号时重新认领的最大轮数 */
const MAX_SETTLE_ROUNDS = 10;

export interface EngineOptions {
  store: StateStore;
  registry: PipelineRegistry;
  evaluator: ConditionEvaluator;
  invoker: TaskInvoker;
  auditLogger: AuditLogger;
  compensation: CompensationHandler;
  metrics?: Metrics;
  ownerId?: string;
  leaseTtlMs?: number;
  clock?: () => Date;
}

/** 一次 execute 调用期间持有的运行上下文 */
interface Session {
  runId: string;
  state: RunState;
  definition: PipelineDefinition;
  controller: AbortController;
}

type StageOutcome = "completed" | "suspended" | "truncated" | "cancelled";

type Prepare = (session: Session) => void;

/** 一个任务（或分片）的调用结果 */
interface Attempted {
  attempt: number;
  outcome?: TaskOutcome;
  error?: unknown;
}

function isFailedStatus(status: TaskResult["status"]): boolean {
  return status === "FAILURE" || status === "TIMEOUT";
}

/** 终态摘要：已记录的任务结果（跳过的任务除外） */
export function contributorsOf(state: RunState): TaskContribution[] {
  return Object.values(state.results)
    .filter((r) => r.status !== "SKIPPED")
    .map((r) => ({ taskId: r.taskId, status: r.status, severity: r.severity }));
}

/** 查找任务定义及其所在阶段 */
export function findTask(definition: PipelineDefinition, taskId: string): { stage: Stage; task: TaskSpec } | undefined {
  for (const stage of definition.stages) {
    const task = stage.tasks.find((t) => t.id === taskId);
    if (task) return { stage, task };
  }
  return undefined;
}

export class ExecutionEngine {
  private readonly store: StateStore;
  private readonly registry: PipelineRegistry;
  private readonly evaluator: ConditionEvaluator;
  private readonly invoker: TaskInvoker;
  private readonly auditLogger: AuditLogger;
  private readonly compensation: CompensationHandler;
  private readonly metrics?: Metrics;
  private readonly now: () => Date;
  /** 本进程正在执行的运行 */
  private readonly active = new Map<string, AbortController>();

  readonly ownerId: string;
  readonly leaseTtlMs: number;

  constructor(options: EngineOptions) {
    this.store = options.store;
    this.registry = options.registry;
    this.evaluator = options.evaluator;
    this.invoker = options.invoker;
    this.auditLogger = options.auditLogger;
    this.compensation = options.compensation;
    this.metrics = options.metrics;
    this.ownerId = options.ownerId ?? config.ownerId;
    this.leaseTtlMs = options.leaseTtlMs ?? config.leaseTtlMs;
    this.now = options.clock ?? (() => new Date());
  }

  /**
   * 执行（或恢复）一次运行
   * @returns 本次调用结束时的状态；租约被他人持有时返回 null
   * @throws StateCorruptionError 状态损坏，运行已被标记为 FAILED
   */
  async execute(runId: string, signal?: ResumeEvent): Promise<RunState | null> {
    if (signal) this.recordSignal(runId, signal);
    return this.settle(runId);
  }

  /** 挂起超过 deadline 的运行：等待中的任务记为 TIMEOUT 后继续执行 */
  async expireAwaiting(runId: string): Promise<RunState | null> {
    return this.settle(runId, (session) => this.applyDeadline(session));
  }

  /**
   * 持久化恢复信号，不需要持有租约；持有方在认领时和每个波次边界处理
   * @throws RunNotFoundError
   */
  recordSignal(runId: string, signal: ResumeEvent): PendingSignal {
    const pending: PendingSignal = { ...signal, id: randomUUID(), receivedAt: this.now().toISOString() };
    updateRun(
      this.store,
      runId,
      (state) => ({ ...state, pendingSignals: [...state.pendingSignals, pending] }),
      () => this.metrics?.stateConflict(),
    );
    this.auditLogger.event(runId, "signal_received", {
      taskId: signal.taskId,
      metadata: { signalId: pending.id, event: signal.event, status: signal.status },
    });
    return pending;
  }

  /** 重新执行未完成的补偿动作 */
  async retryCompensation(runId: string): Promise<RunState | null> {
    const session = this.claimOrMark(runId);
    if (!session) return null;
    try {
      if (isTerminal(session.state.status)) {
        await this.runCompensation(session);
      }
      return this.release(session);
    } catch (err) {
      if (err instanceof StateCorruptionError) this.handleCorruption(err);
      throw err;
    } finally {
      this.active.delete(runId);
    }
  }

  /** 通知本进程内正在进行的调用尽快取消 */
  abortInFlight(runId: string, reason = "cancel requested"): boolean {
    const controller = this.active.get(runId);
    if (!controller) return false;
    controller.abort(new Error(reason));
    return true;
  }

  // ========== 主流程 ==========

  /** 执行后若仍有未处理信号（与释放租约并发写入），重新认领处理 */
  private async settle(runId: string, prepare?: Prepare): Promise<RunState | null> {
    let state = await this.drive(runId, prepare);
    for (let round = 0; state && round < MAX_SETTLE_ROUNDS; round++) {
      const latest = this.store.get(runId);
      if (!latest || isTerminal(latest.status) || latest.pendingSignals.length === 0) break;
      state = await this.drive(runId);
    }
    return state;
  }

  private async drive(runId: string, prepare?: Prepare): Promise<RunState | null> {
    const claimed = this.claimOrMark(runId);
    if (!claimed) return null;
    const session = claimed;

    const heartbeat = setInterval(() => this.heartbeat(session), Math.max(Math.floor(this.leaseTtlMs / 3), 10));
    heartbeat.unref();

    try {
      return await this.run(session, prepare);
    } catch (err) {
      if (err instanceof StateCorruptionError) {
        this.handleCorruption(err);
        throw err;
      }
      if (err instanceof LeaseDeniedError) {
        logger.warn({ runId, holder: err.holder }, "Lost run ownership, stopping");
        session.controller.abort(err);
        return null;
      }
      if (err instanceof RunNotFoundError) throw err;
      return this.fail(session, `engine error: ${errorMessage(err)}`);
    } finally {
      clearInterval(heartbeat);
      this.active.delete(runId);
    }
  }

  private async run(session: Session, prepare?: Prepare): Promise<RunState | null> {
    const initialStatus = session.state.status;

    if (isTerminal(initialStatus)) {
      // 终态运行上的信号只记录为忽略
      this.drainSignals(session);
      if (!isCompensationComplete(session.state, session.definition)) {
        await this.runCompensation(session);
      }
      return this.release(session);
    }

    if (session.state.cancelRequested) {
      return this.finishCancelled(session);
    }

    this.drainSignals(session);
    prepare?.(session);

    if (Object.keys(session.state.awaiting).length > 0) {
      // 仍在等待外部事件
      if (session.state.status !== "SUSPENDED") {
        return this.suspend(session);
      }
      return this.release(session);
    }

    this.commit(session, (s) => ({ ...s, status: "RUNNING" }));
    this.auditLogger.event(session.runId, initialStatus === "CREATED" ? "run_started" : "run_resumed", {
      metadata: {
        pipeline: `${session.definition.name}@${session.definition.version}`,
        fromStage: session.state.currentStage,
        previousStatus: initialStatus,
      },
    });

    const stages = session.definition.stages;
    while (session.state.currentStage < stages.length) {
      const index = session.state.currentStage;
      const stage = stages[index];
      if (!stage) break;

      const outcome = await this.runStage(session, stage);
      if (outcome === "suspended") return this.suspend(session);
      if (outcome === "cancelled") return this.finishCancelled(session);
      if (outcome === "truncated") break;

      this.commit(session, (s) => (s.currentStage === index ? { ...s, currentStage: index + 1 } : s));
    }

    return this.finishDecided(session);
  }

  // ========== 阶段 / 波次 ==========

  private async runStage(session: Session, stage: Stage): Promise<StageOutcome> {
    const { runId, definition } = session;
    const startedAt = this.now().getTime();
    const entered = stage.tasks.some((t) => t.id in session.state.results || t.id in session.state.awaiting);

    // 已部分执行过的阶段说明条件当时成立，不再重新评估
    if (!entered && !this.evaluator.evaluate(stage.condition, session.state.context, session.state.results)) {
      this.skipStage(session, stage);
      return "completed";
    }

    const failFast = stage.failFast ?? definition.defaults.failFast;
    this.auditLogger.event(runId, "stage_started", {
      stage: stage.id,
      metadata: { mode: stage.mode, tasks: stage.tasks.length, resumed: entered },
    });

    // 恢复时按已记录结果重新判断 fail-fast，保证与不中断执行的结果一致
    if (failFast && this.requiredFailure(session, stage)) {
      return this.truncate(session, stage);
    }

    const { waves } = planWaves(stage.tasks);
    const concurrency = stage.mode === "sequential" ? 1 : (stage.maxParallel ?? definition.defaults.maxParallel);

    for (const wave of waves) {
      if (this.cancelRequested(session)) return "cancelled";
      this.drainSignals(session);

      const todo = wave.filter((t) => !(t.id in session.state.results) && !(t.id in session.state.awaiting));
      if (todo.length > 0) {
        await this.runWave(session, stage, todo, concurrency, failFast);
      }

      if (this.cancelRequested(session)) return "cancelled";
      this.drainSignals(session);
      if (failFast && this.requiredFailure(session, stage)) {
        return this.truncate(session, stage);
      }
      if (Object.keys(session.state.awaiting).length > 0) {
        return "suspended";
      }
    }

    this.auditLogger.event(runId, "stage_completed", {
      stage: stage.id,
      duration: this.now().getTime() - startedAt,
    });
    return "completed";
  }

  private async runWave(
    session: Session,
    stage: Stage,
    tasks: TaskSpec[],
    concurrency: number,
    failFast: boolean,
  ): Promise<void> {
    const queue = new PQueue({ concurrency });
    const errors: unknown[] = [];

    for (const task of tasks) {
      void queue.add(async () => {
        if (session.controller.signal.aborted || errors.length > 0) return;
        try {
          const result = await this.runTask(session, stage, task);
          // 必需任务失败：不再派发排队中的任务，已派发的继续完成
          if (failFast && result && result.required && isFailedStatus(result.status)) {
            queue.clear();
          }
        } catch (err) {
          errors.push(err);
          queue.clear();
        }
      });
    }

    await queue.onIdle();
    if (errors.length > 0) throw errors[0];
  }

  private skipStage(session: Session, stage: Stage): void {
    const at = this.now().toISOString();
    const skipped = stage.tasks
      .filter((t) => !(t.id in session.state.results))
      .map((task) =>
        this.store.recordTaskResult(session.runId, {
          taskId: task.id,
          ref: task.ref,
          required: task.required ?? stage.required,
          status: "SKIPPED",
          severity: "NONE",
          flags: {},
          attempt: 0,
          retryCount: 0,
          startedAt: at,
          completedAt: at,
          reason: "stage condition not met",
        }),
      );

    this.commit(session, (s) => {
      const results = { ...s.results };
      for (const r of skipped) {
        if (!(r.taskId in results)) results[r.taskId] = r;
      }
      return { ...s, results };
    });
    for (const r of skipped) this.metrics?.taskFinished(r.ref, "SKIPPED");
    this.auditLogger.event(session.runId, "stage_skipped", {
      stage: stage.id,
      metadata: { tasks: skipped.map((r) => r.taskId) },
    });
  }

  private truncate(session: Session, stage: Stage): StageOutcome {
    const failed = stage.tasks
      .map((t) => session.state.results[t.id])
      .filter((r): r is TaskResult => r !== undefined && r.required && isFailedStatus(r.status))
      .map((r) => r.taskId);
    const unrecorded = stage.tasks.filter((t) => !(t.id in session.state.results)).map((t) => t.id);
    logger.info({ runId: session.runId, stage: stage.id, failed }, "Fail-fast truncated stage");
    this.auditLogger.event(session.runId, "stage_truncated", {
      stage: stage.id,
      metadata: { failed, unrecorded },
    });
    return "truncated";
  }

  private requiredFailure(session: Session, stage: Stage): boolean {
    return stage.tasks.some((t) => {
      const r = session.state.results[t.id];
      return r !== undefined && r.required && isFailedStatus(r.status);
    });
  }

  // ========== 任务 ==========

  private async runTask(session: Session, stage: Stage, task: TaskSpec): Promise<TaskResult | undefined> {
    const { runId } = session;
    const required = task.required ?? stage.required;
    const started = this.now();

    if (!this.evaluator.evaluate(task.condition, session.state.context, session.state.results)) {
      const result = this.persistResult(session, {
        taskId: task.id,
        ref: task.ref,
        required,
        status: "SKIPPED",
        severity: "NONE",
        flags: {},
        attempt: 0,
        retryCount: 0,
        startedAt: started.toISOString(),
        completedAt: started.toISOString(),
        reason: "task condition not met",
      });
      this.metrics?.taskFinished(task.ref, "SKIPPED");
      this.auditLogger.event(runId, "task_skipped", { stage: stage.id, taskId: task.id });
      return result;
    }

    const payload = this.buildPayload(session, task);
    const chunks = splitFiles(session.state.context.files, task.chunking);
    this.auditLogger.event(runId, "task_started", {
      stage: stage.id,
      taskId: task.id,
      metadata: { ref: task.ref, ...(chunks.length > 1 ? { chunks: chunks.length } : {}) },
    });

    const { attempt, outcome, error } =
      chunks.length > 1
        ? await this.invokeChunked(session, stage, task, payload, chunks)
        : await this.invokeWithRetry(session, stage, task, payload);

    const completed = this.now();
    const duration = completed.getTime() - started.getTime();

    if (outcome?.kind === "pending") {
      if (session.controller.signal.aborted) {
        this.auditLogger.event(runId, "task_result_ignored", {
          stage: stage.id,
          taskId: task.id,
          metadata: { reason: "pending response after cancellation" },
        });
        return undefined;
      }
      const awaiting = { taskId: task.id, attempt, since: started.toISOString(), token: outcome.token };
      this.commit(session, (s) =>
        task.id in s.results ? s : { ...s, awaiting: { ...s.awaiting, [task.id]: awaiting } },
      );
      this.auditLogger.event(runId, "task_awaiting", {
        stage: stage.id,
        taskId: task.id,
        metadata: { token: outcome.token },
      });
      return undefined;
    }

    const base = {
      taskId: task.id,
      ref: task.ref,
      required,
      attempt,
      retryCount: attempt - 1,
      startedAt: started.toISOString(),
      completedAt: completed.toISOString(),
    };
    const result: TaskResult = outcome
      ? { ...base, status: outcome.status, severity: outcome.severity, payload: outcome.payload, flags: outcome.flags }
      : {
          ...base,
          status: error instanceof TaskTimeoutError ? "TIMEOUT" : "FAILURE",
          severity: "NONE",
          flags: {},
          error: errorMessage(error),
        };

    // 取消后到达的结果只落盘，不并入运行状态
    if (session.controller.signal.aborted) {
      this.store.recordTaskResult(runId, result);
      this.auditLogger.event(runId, "task_result_ignored", {
        stage: stage.id,
        taskId: task.id,
        metadata: { status: result.status, reason: "arrived after cancellation" },
      });
      return undefined;
    }

    const stored = this.persistResult(session, result);
    this.metrics?.taskFinished(task.ref, stored.status, duration);
    this.auditLogger.event(runId, "task_completed", {
      stage: stage.id,
      taskId: task.id,
      duration,
      metadata: {
        status: stored.status,
        severity: stored.severity,
        attempt: stored.attempt,
        retryCount: stored.retryCount,
        error: stored.error,
      },
    });
    return stored;
  }

  /** 带重试的单次任务调用；keySuffix 区分同一尝试内的分片 */
  private async invokeWithRetry(
    session: Session,
    stage: Stage,
    task: TaskSpec,
    payload: Record<string, unknown>,
    keySuffix?: string,
  ): Promise<Attempted> {
    const { runId, definition } = session;
    const maxRetries = task.maxRetries ?? definition.defaults.maxRetries;
    const timeoutMs = task.timeoutMs ?? definition.defaults.timeoutMs;
    let attempt = 1;

    try {
      const outcome = await withRetry(
        (n) => {
          attempt = n + 1;
          const key = idempotencyKey(runId, task.id, attempt);
          return this.invoker.invoke(
            {
              runId,
              taskId: task.id,
              attempt,
              ref: task.ref,
              payload,
              timeoutMs,
              idempotencyKey: keySuffix ? `${key}:${keySuffix}` : key,
            },
            session.controller.signal,
          );
        },
        {
          maxRetries,
          baseDelay: definition.defaults.retryBaseDelayMs,
          maxDelay: definition.defaults.retryMaxDelayMs,
          signal: session.controller.signal,
          shouldRetry: (err) => {
            if (err instanceof TaskTimeoutError) return task.retryOnTimeout === true;
            return err instanceof TaskInvocationError && err.retryable;
          },
          onRetry: (err, retry, delay) => {
            this.metrics?.taskRetried();
            logger.warn({ runId, taskId: task.id, retry, delay, err: err.message }, "Retrying task");
            this.auditLogger.event(runId, "task_retried", {
              stage: stage.id,
              taskId: task.id,
              metadata: { retry, delayMs: Math.round(delay), error: err.message, ...(keySuffix ? { part: keySuffix } : {}) },
            });
          },
        },
      );
      return { attempt, outcome };
    } catch (err) {
      return { attempt, error: err };
    }
  }

  /** 按文件分片并行调用，合并已完成分片的结果 */
  private async invokeChunked(
    session: Session,
    stage: Stage,
    task: TaskSpec,
    payload: Record<string, unknown>,
    chunks: string[][],
  ): Promise<Attempted> {
    const queue = new PQueue({ concurrency: task.chunking?.maxParallel ?? chunks.length });
    const attempts: (ChunkAttempt & { attempt: number })[] = [];

    chunks.forEach((files, index) => {
      void queue.add(async () => {
        const chunkPayload = {
          ...payload,
          context: { ...session.state.context, files },
          chunk: { index, total: chunks.length },
        };
        const attempted = await this.invokeWithRetry(session, stage, task, chunkPayload, `chunk-${index}`);
        attempts.push({ index, ...attempted });
      });
    });
    await queue.onIdle();

    const merged = mergeChunkOutcomes(attempts);
    if (merged.failedChunks.length > 0) {
      logger.warn({ runId: session.runId, taskId: task.id, failedChunks: merged.failedChunks }, "Dropped failed chunks");
    }
    return {
      attempt: Math.max(1, ...attempts.map((a) => a.attempt)),
      outcome: merged.outcome,
      error: merged.error,
    };
  }

  /** 调用载荷：静态 input + 运行上下文 + 依赖任务的结果 */
  private buildPayload(session: Session, task: TaskSpec): Record<string, unknown> {
    const dependencies: Record<string, unknown> = {};
    for (const dep of task.dependsOn) {
      const r = session.state.results[dep];
      if (r) dependencies[dep] = { status: r.status, severity: r.severity, payload: r.payload };
    }
    return { ...task.input, context: session.state.context, dependencies };
  }

  /** 先幂等写入结果表，再并入运行状态 */
  private persistResult(session: Session, result: TaskResult): TaskResult {
    const stored = this.store.recordTaskResult(session.runId, result);
    this.commit(session, (s) =>
      stored.taskId in s.results ? s : { ...s, results: { ...s.results, [stored.taskId]: stored } },
    );
    return session.state.results[stored.taskId] ?? stored;
  }

  // ========== 恢复信号 / 超时 ==========

  /** 按到达顺序处理已落盘的信号，每个信号处理后从收件箱移除 */
  private drainSignals(session: Session): void {
    for (const signal of session.state.pendingSignals) this.applySignal(session, signal);
  }

  private applySignal(session: Session, signal: PendingSignal): void {
    const dequeue = (s: RunState): RunState => ({
      ...s,
      pendingSignals: s.pendingSignals.filter((p) => p.id !== signal.id),
    });
    const awaitingIds = Object.keys(session.state.awaiting);
    const taskId = signal.taskId ?? (awaitingIds.length === 1 ? awaitingIds[0] : undefined);
    const awaiting = taskId !== undefined ? session.state.awaiting[taskId] : undefined;
    const located = taskId !== undefined ? findTask(session.definition, taskId) : undefined;

    if (!awaiting || !located || taskId === undefined) {
      logger.warn({ runId: session.runId, taskId: signal.taskId, event: signal.event }, "Signal matches no awaiting task");
      this.commit(session, dequeue);
      this.auditLogger.event(session.runId, "task_result_ignored", {
        taskId: signal.taskId,
        metadata: { signalId: signal.id, event: signal.event, reason: "no matching awaiting task" },
      });
      return;
    }

    const at = this.now().toISOString();
    const stored = this.store.recordTaskResult(session.runId, {
      taskId,
      ref: located.task.ref,
      required: located.task.required ?? located.stage.required,
      status: signal.status,
      severity: signal.severity ?? "NONE",
      payload: signal.payload,
      flags: signal.flags ?? {},
      attempt: awaiting.attempt,
      retryCount: awaiting.attempt - 1,
      startedAt: awaiting.since,
      completedAt: at,
    });

    this.commit(session, (s) => {
      const { [taskId]: _done, ...rest } = s.awaiting;
      return {
        ...dequeue(s),
        awaiting: rest,
        results: taskId in s.results ? s.results : { ...s.results, [taskId]: stored },
        signals: [...s.signals, { taskId, event: signal.event, receivedAt: signal.receivedAt }],
      };
    });
    this.metrics?.taskFinished(stored.ref, stored.status, Date.parse(at) - Date.parse(awaiting.since));
    this.auditLogger.event(session.runId, "task_signalled", {
      stage: located.stage.id,
      taskId,
      metadata: { event: signal.event, status: stored.status, severity: stored.severity },
    });
  }

  private applyDeadline(session: Session): void {
    const at = this.now();
    if (Date.parse(session.state.deadline) > at.getTime()) return;

    for (const awaiting of Object.values(session.state.awaiting)) {
      const located = findTask(session.definition, awaiting.taskId);
      if (!located) continue;
      const stored = this.store.recordTaskResult(session.runId, {
        taskId: awaiting.taskId,
        ref: located.task.ref,
        required: located.task.required ?? located.stage.required,
        status: "TIMEOUT",
        severity: "NONE",
        flags: {},
        attempt: awaiting.attempt,
        retryCount: awaiting.attempt - 1,
        startedAt: awaiting.since,
        completedAt: at.toISOString(),
        error: `no signal received before deadline ${session.state.deadline}`,
      });
      this.commit(session, (s) => {
        const { [stored.taskId]: _done, ...rest } = s.awaiting;
        return {
          ...s,
          awaiting: rest,
          results: stored.taskId in s.results ? s.results : { ...s.results, [stored.taskId]: stored },
        };
      });
      this.metrics?.taskFinished(stored.ref, "TIMEOUT");
      this.auditLogger.event(session.runId, "task_completed", {
        stage: located.stage.id,
        taskId: stored.taskId,
        metadata: { status: "TIMEOUT", reason: "deadline exceeded" },
      });
    }
  }

  // ========== 终态 ==========

  private async finishDecided(session: Session): Promise<RunState> {
    const { definition } = session;
    const aggregated = aggregate(Object.values(session.state.results), definition.policy, definition.aggregation);
    const decision = decide(aggregated, definition.policy, session.state.context, this.now());
    const status: RunStatus = decision.outcome === "ADMIT" ? "ADMITTED" : "BLOCKED";

    this.commit(session, (s) => ({
      ...s,
      status,
      decision,
      reason: decision.reason,
      awaiting: {},
      contributors: contributorsOf(s),
      completedAt: decision.decidedAt,
    }));
    this.metrics?.runFinished(status);
    logger.info({ runId: session.runId, status, code: decision.code }, "Run decided");
    this.auditLogger.event(session.runId, "run_decided", {
      metadata: {
        status,
        code: decision.code,
        reason: decision.reason,
        overallSeverity: aggregated.overallSeverity,
        score: aggregated.score,
        factors: decision.factors,
        warnings: decision.warnings,
      },
    });

    // 补偿失败只记录在 compensationActions 中，不改变终态
    await this.runCompensation(session);
    return this.release(session);
  }

  private finishCancelled(session: Session): RunState {
    const at = this.now().toISOString();
    this.commit(session, (s) => ({
      ...s,
      status: "CANCELLED",
      reason: s.cancelRequested?.reason ?? "cancelled",
      awaiting: {},
      contributors: contributorsOf(s),
      completedAt: at,
    }));
    this.metrics?.runFinished("CANCELLED");
    this.auditLogger.event(session.runId, "run_cancelled", {
      metadata: { reason: session.state.reason, contributors: session.state.contributors },
    });
    return this.release(session);
  }

  private async fail(session: Session, reason: string): Promise<RunState> {
    logger.error({ runId: session.runId, reason }, "Run failed");
    const at = this.now().toISOString();
    const before = session.state.status;
    this.commit(session, (s) =>
      isTerminal(s.status)
        ? s
        : { ...s, status: "FAILED", reason, awaiting: {}, contributors: contributorsOf(s), completedAt: at },
    );
    if (!isTerminal(before) && session.state.status === "FAILED") {
      this.metrics?.runFinished("FAILED");
      this.auditLogger.event(session.runId, "run_failed", {
        metadata: { reason, contributors: session.state.contributors },
      });
    }
    await this.runCompensation(session);
    return this.release(session);
  }

  private async runCompensation(session: Session): Promise<void> {
    const { definition } = session;
    await this.compensation.run(session.state, definition, async (record) =>
      this.commit(session, (s) => applyCompensationRecord(s, record, definition)),
    );
  }

  private suspend(session: Session): RunState {
    const awaiting = Object.keys(session.state.awaiting);
    this.commit(session, (s) => ({ ...s, status: "SUSPENDED" }));
    logger.info({ runId: session.runId, awaiting }, "Run suspended");
    this.auditLogger.event(session.runId, "run_suspended", {
      metadata: { awaiting, stage: session.state.currentStage },
    });
    return this.release(session);
  }

  // ========== 租约 / CAS ==========

  /** 认领租约；加载时发现损坏则标记 FAILED 并抛出 */
  private claimOrMark(runId: string): Session | null {
    try {
      return this.claim(runId);
    } catch (err) {
      if (err instanceof StateCorruptionError) this.handleCorruption(err);
      throw err;
    }
  }

  private claim(runId: string): Session | null {
    // 本进程已在执行：信号已落盘，由正在执行的 drive 在波次边界处理
    if (this.active.has(runId)) {
      logger.debug({ runId }, "Run is already executing in this process");
      return null;
    }
    const result = this.store.leaseClaim(runId, this.ownerId, this.leaseTtlMs);
    if (!result.ok) {
      if (result.reason === "not_found") throw new RunNotFoundError(runId);
      logger.debug({ runId, holder: result.holder }, "Run is owned elsewhere");
      return null;
    }

    const state = result.state;
    const definition = this.registry.get(state.pipeline);
    if (!definition) {
      // 运行固定的定义版本不可用：无法继续，也无法补偿
      const { name, version } = state.pipeline;
      const reason = `pipeline ${name}@${version} is not registered`;
      const next: RunState = isTerminal(state.status)
        ? { ...state, owner: undefined }
        : { ...state, owner: undefined, status: "FAILED", reason, completedAt: this.now().toISOString() };
      const released = this.store.conditionalPut(next, state.version);
      if (released.ok && !isTerminal(state.status)) {
        this.metrics?.runFinished("FAILED");
        this.auditLogger.event(runId, "run_failed", { metadata: { reason } });
      }
      logger.error({ runId, pipeline: `${name}@${version}` }, "Pinned pipeline definition missing");
      return null;
    }

    const controller = new AbortController();
    this.active.set(runId, controller);
    return { runId, state, definition, controller };
  }

  /**
   * CAS 写入：冲突时重新加载并重放 mutate，直到写入成功或租约丢失；每次写入同时续约
   * @throws LeaseDeniedError 租约已不属于本进程
   */
  private commit(session: Session, mutate: (state: RunState) => RunState, release = false): RunState {
    let current = session.state;

    for (;;) {
      const next = mutate(current);
      const expiresAt = new Date(this.now().getTime() + this.leaseTtlMs).toISOString();
      const candidate: RunState = release
        ? { ...next, owner: undefined }
        : { ...next, owner: { ownerId: this.ownerId, expiresAt } };

      const result = this.store.conditionalPut(candidate, current.version);
      if (result.ok) {
        session.state = result.state;
        return result.state;
      }
      if (result.reason === "not_found") throw new RunNotFoundError(session.runId);

      this.metrics?.stateConflict();
      this.auditLogger.event(session.runId, "state_conflict", { metadata: { expectedVersion: current.version } });

      const reloaded = this.store.get(session.runId);
      if (!reloaded) throw new RunNotFoundError(session.runId);
      if (reloaded.owner?.ownerId !== this.ownerId) {
        throw new LeaseDeniedError(session.runId, reloaded.owner?.ownerId ?? "none");
      }
      current = reloaded;
      session.state = reloaded;
    }
  }

  private release(session: Session): RunState {
    return this.commit(session, (s) => s, true);
  }

  private heartbeat(session: Session): void {
    try {
      this.commit(session, (s) => s);
    } catch (err) {
      logger.warn({ runId: session.runId, err: errorMessage(err) }, "Lease renewal failed, aborting in-flight work");
      session.controller.abort(err);
    }
  }

  /** 波次边界：读取最新状态，检查是否有取消请求 */
  private cancelRequested(session: Session): boolean {
    if (session.state.cancelRequested) return true;
    const latest = this.store.get(session.runId);
    if (!latest) throw new RunNotFoundError(session.runId);
    if (latest.version !== session.state.version) {
      if (latest.owner?.ownerId !== this.ownerId) {
        throw new LeaseDeniedError(session.runId, latest.owner?.ownerId ?? "none");
      }
      session.state = latest;
    }
    return latest.cancelRequested !== undefined;
  }

  private handleCorruption(err: StateCorruptionError): void {
    logger.error({ runId: err.runId, detail: err.detail }, "Run state corrupted, marking FAILED");
    this.store.markCorrupted(err.runId, err.detail);
    this.metrics?.runFinished("FAILED");
    this.auditLogger.event(err.runId, "run_failed", { metadata: { reason: err.message, corrupted: true } });
  }
}
