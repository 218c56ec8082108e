/**
 * 触发接口 — createRun / cancelRun / resumeSignal
 *
 * 同一 subject 的新运行会取消仍在进行的旧运行。
 */

import { randomUUID } from "node:crypto";
import pino from "pino";
import { z } from "zod";
import type { AuditLogger } from "../audit/logger.js";
import { config } from "../config.js";
import type { PipelineRegistry } from "../definition/registry.js";
import { RunContextSchema, SeveritySchema, toIssues } from "../definition/schema.js";
import { DefinitionValidationError, InvalidSignalError, RunNotFoundError } from "../errors.js";
import type { ResumeEvent, RunState } from "../types/index.js";
import { isTerminal } from "../types/index.js";
import type { ExecutionEngine } from "./engine.js";
import type { RunQueue } from "./queue.js";
import { RUN_STATE_SCHEMA_VERSION } from "./state-schema.js";
import { updateRun, type StateStore } from "./state.js";

const logger = pino({ name: "trigger" });

export const ResumeEventSchema: z.ZodType<ResumeEvent, z.ZodTypeDef, unknown> = z.object({
  taskId: z.string().min(1).optional(),
  event: z.string().min(1),
  status: z.enum(["SUCCESS", "FAILURE"]),
  severity: SeveritySchema.optional(),
  payload: z.unknown(),
  flags: z.record(z.boolean()).optional(),
});

export interface TriggerOptions {
  store: StateStore;
  registry: PipelineRegistry;
  engine: ExecutionEngine;
  queue: RunQueue;
  auditLogger: AuditLogger;
  defaultSlaMs?: number;
  clock?: () => Date;
  idGenerator?: () => string;
}

export class RunTrigger {
  private readonly store: StateStore;
  private readonly registry: PipelineRegistry;
  private readonly engine: ExecutionEngine;
  private readonly queue: RunQueue;
  private readonly auditLogger: AuditLogger;
  private readonly defaultSlaMs: number;
  private readonly now: () => Date;
  private readonly nextId: () => string;

  constructor(options: TriggerOptions) {
    this.store = options.store;
    this.registry = options.registry;
    this.engine = options.engine;
    this.queue = options.queue;
    this.auditLogger = options.auditLogger;
    this.defaultSlaMs = options.defaultSlaMs ?? config.defaultSlaMs;
    this.now = options.clock ?? (() => new Date());
    this.nextId = options.idGenerator ?? randomUUID;
  }

  /**
   * 创建运行并入队
   * @throws DefinitionValidationError 未知流水线或上下文不合法，运行不会被创建
   */
  async createRun(pipelineRef: string, context: unknown): Promise<string> {
    const definition = this.registry.resolve(pipelineRef);
    const parsed = RunContextSchema.safeParse(context);
    if (!parsed.success) {
      throw new DefinitionValidationError("Invalid run context", toIssues(parsed.error));
    }

    const runId = this.nextId();
    const superseded = this.store.listActiveBySubject(parsed.data.subject);
    for (const previous of superseded) {
      await this.cancelRun(previous.runId, `superseded by run ${runId}`);
    }

    const created = this.now();
    const slaMs = definition.defaults.slaMs ?? this.defaultSlaMs;
    const state: RunState = {
      schemaVersion: RUN_STATE_SCHEMA_VERSION,
      runId,
      pipeline: { name: definition.name, version: definition.version },
      status: "CREATED",
      currentStage: 0,
      context: parsed.data,
      results: {},
      awaiting: {},
      signals: [],
      pendingSignals: [],
      compensationActions: [],
      version: 0,
      createdAt: created.toISOString(),
      updatedAt: created.toISOString(),
      deadline: new Date(created.getTime() + slaMs).toISOString(),
    };
    this.store.create(state);

    logger.info({ runId, pipeline: `${definition.name}@${definition.version}`, subject: state.context.subject }, "Run created");
    this.auditLogger.event(runId, "run_created", {
      metadata: {
        pipeline: `${definition.name}@${definition.version}`,
        subject: state.context.subject,
        superseded: superseded.map((s) => s.runId),
      },
    });

    this.queue.enqueue({ kind: "execute", runId });
    return runId;
  }

  /**
   * 请求取消：记录取消请求并中止本进程内的调用；无人执行时立即转为 CANCELLED
   * @throws RunNotFoundError
   */
  async cancelRun(runId: string, reason: string): Promise<RunState> {
    const state = this.requestCancel(runId, reason);
    if (isTerminal(state.status)) return state;

    this.engine.abortInFlight(runId, reason);

    const owner = state.owner;
    const owned = owner !== undefined && Date.parse(owner.expiresAt) > this.now().getTime();
    if (!owned) {
      await this.engine.execute(runId);
    }
    return this.store.get(runId) ?? state;
  }

  /**
   * 外部事件（审批等）恢复挂起的运行
   * @throws InvalidSignalError 事件格式不合法，或运行没有对应的等待中任务
   */
  resumeSignal(runId: string, event: unknown): void {
    const parsed = ResumeEventSchema.safeParse(event);
    if (!parsed.success) {
      const detail = toIssues(parsed.error)
        .map((i) => `${i.path || "(root)"}: ${i.message}`)
        .join("; ");
      throw new InvalidSignalError(`Invalid resume event: ${detail}`);
    }
    const signal = parsed.data;

    const state = this.store.get(runId);
    if (!state) throw new RunNotFoundError(runId);
    if (isTerminal(state.status)) {
      throw new InvalidSignalError(`Run ${runId} is already ${state.status}`);
    }

    const awaiting = Object.keys(state.awaiting);
    if (signal.taskId !== undefined ? !awaiting.includes(signal.taskId) : awaiting.length !== 1) {
      const target = signal.taskId ?? "(unspecified)";
      throw new InvalidSignalError(
        `Run ${runId} is not awaiting task ${target} (awaiting: ${awaiting.join(", ") || "none"})`,
      );
    }

    // 先落盘再入队：持有租约的执行方（可能在其他实例上）会在波次边界取出
    this.engine.recordSignal(runId, signal);
    this.queue.enqueue({ kind: "execute", runId });
  }

  /** CAS 写入取消请求，已终态或已请求过则原样返回 */
  private requestCancel(runId: string, reason: string): RunState {
    const { state, written } = updateRun(this.store, runId, (current) =>
      isTerminal(current.status) || current.cancelRequested
        ? null
        : { ...current, cancelRequested: { reason, requestedAt: this.now().toISOString() } },
    );
    if (written) {
      logger.info({ runId, reason }, "Cancel requested");
      this.auditLogger.event(runId, "run_cancel_requested", { metadata: { reason } });
    }
    return state;
  }
}
