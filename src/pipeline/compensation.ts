/**
 * 补偿处理 — 仅在 BLOCKED / FAILED 终态执行声明的补偿动作
 *
 * 每个动作的结果写入 RunState.compensationActions；已 executed 的动作
 * 在后续补偿轮次中跳过，failed 的动作重新执行。
 */

import pino from "pino";
import type { AuditLogger } from "../audit/logger.js";
import { errorMessage } from "../errors.js";
import type { Metrics } from "../observability/metrics.js";
import type {
  CompensationActionSpec,
  CompensationRecord,
  PipelineDefinition,
  RunState,
} from "../types/index.js";

const logger = pino({ name: "compensation" });

/** 补偿动作执行器，返回值作为 detail 记录 */
export interface CompensationExecutor {
  readonly type: string;
  execute(action: CompensationActionSpec, run: RunState): Promise<string | undefined>;
}

export class CompensationRegistry {
  private executors = new Map<string, CompensationExecutor>();

  register(executor: CompensationExecutor): this {
    if (this.executors.has(executor.type)) {
      throw new Error(`Compensation executor "${executor.type}" already registered`);
    }
    this.executors.set(executor.type, executor);
    return this;
  }

  get(type: string): CompensationExecutor | undefined {
    return this.executors.get(type);
  }

  types(): string[] {
    return [...this.executors.keys()];
  }
}

/** 持久化一条补偿记录，返回写入后的最新状态 */
export type PersistCompensation = (record: CompensationRecord) => Promise<RunState>;

/** 当前终态下应执行的动作 */
export function applicableActions(state: RunState, definition: PipelineDefinition): CompensationActionSpec[] {
  const status = state.status;
  if (status !== "BLOCKED" && status !== "FAILED") return [];
  return definition.compensation.filter((action) => action.on.includes(status));
}

export function isCompensationComplete(state: RunState, definition: PipelineDefinition): boolean {
  return applicableActions(state, definition).every((action) =>
    state.compensationActions.some((r) => r.actionId === action.id && r.status === "executed"),
  );
}

/** 替换同 actionId 的记录；全部动作完成时打上 compensationCompletedAt */
export function applyCompensationRecord(
  state: RunState,
  record: CompensationRecord,
  definition: PipelineDefinition,
): RunState {
  const compensationActions = [
    ...state.compensationActions.filter((r) => r.actionId !== record.actionId),
    record,
  ];
  const next: RunState = { ...state, compensationActions };
  if (next.compensationCompletedAt === undefined && isCompensationComplete(next, definition)) {
    next.compensationCompletedAt = record.lastAttemptAt;
  }
  return next;
}

export class CompensationHandler {
  private readonly now: () => Date;

  constructor(
    private readonly registry: CompensationRegistry,
    private readonly auditLogger?: AuditLogger,
    private readonly metrics?: Metrics,
    clock?: () => Date,
  ) {
    this.now = clock ?? (() => new Date());
  }

  types(): string[] {
    return this.registry.types();
  }

  async run(state: RunState, definition: PipelineDefinition, persist: PersistCompensation): Promise<RunState> {
    let current = state;

    for (const action of applicableActions(state, definition)) {
      const previous = current.compensationActions.find((r) => r.actionId === action.id);
      if (previous?.status === "executed") {
        this.auditLogger?.event(current.runId, "compensation_skipped", {
          metadata: { actionId: action.id, type: action.type },
        });
        continue;
      }

      const attempts = (previous?.attempts ?? 0) + 1;
      const executor = this.registry.get(action.type);
      let record: CompensationRecord;

      try {
        if (!executor) {
          throw new Error(`No executor registered for compensation type "${action.type}"`);
        }
        const detail = await executor.execute(action, current);
        const at = this.now().toISOString();
        record = {
          actionId: action.id,
          type: action.type,
          status: "executed",
          attempts,
          lastAttemptAt: at,
          executedAt: at,
          detail,
        };
        logger.info({ runId: current.runId, actionId: action.id, type: action.type }, "Compensation executed");
        this.auditLogger?.event(current.runId, "compensation_executed", {
          metadata: { actionId: action.id, type: action.type, attempts, detail },
        });
        this.metrics?.compensation("executed");
      } catch (err) {
        const error = errorMessage(err);
        record = {
          actionId: action.id,
          type: action.type,
          status: "failed",
          attempts,
          lastAttemptAt: this.now().toISOString(),
          error,
        };
        logger.warn({ runId: current.runId, actionId: action.id, err }, "Compensation failed");
        this.auditLogger?.event(current.runId, "compensation_failed", {
          metadata: { actionId: action.id, type: action.type, attempts, error },
        });
        this.metrics?.compensation("failed");
      }

      current = await persist(record);
    }

    return current;
  }
}
