/**
 * 任务调用器 — 单次远程调用 + 超时 + 响应规范化
 *
 * 无状态，不了解流水线结构；重试由引擎通过 withRetry 驱动。
 */

import { z } from "zod";
import { SeveritySchema } from "../definition/schema.js";
import { TaskInvocationError, TaskTimeoutError, errorMessage } from "../errors.js";
import type { Severity } from "../types/index.js";

/** 单次调用请求 */
export interface TaskRequest {
  runId: string;
  taskId: string;
  /** 从 1 开始的尝试序号 */
  attempt: number;
  ref: string;
  payload: Record<string, unknown>;
  timeoutMs: number;
  /** runId:taskId:attempt，远端据此去重 */
  idempotencyKey: string;
}

/** 规范化后的调用结果 */
export type TaskOutcome =
  | {
      kind: "completed";
      status: "SUCCESS" | "FAILURE";
      severity: Severity;
      payload?: unknown;
      flags: Record<string, boolean>;
    }
  | {
      /** 等待外部事件（人工审批等），由恢复信号补全结果 */
      kind: "pending";
      token?: string;
      payload?: unknown;
    };

export type CompletedOutcome = Extract<TaskOutcome, { kind: "completed" }>;

/** 传输层：返回远端原始响应体 */
export interface TaskTransport {
  invoke(request: TaskRequest, signal: AbortSignal): Promise<unknown>;
}

const TaskResponseSchema = z.object({
  status: z.enum(["SUCCESS", "FAILURE", "PENDING"]),
  severity: SeveritySchema.optional(),
  payload: z.unknown(),
  flags: z.record(z.boolean()).optional(),
  token: z.string().optional(),
});

/** 校验远端响应并转换为 TaskOutcome */
export function normalizeResponse(raw: unknown, ref: string): TaskOutcome {
  const parsed = TaskResponseSchema.safeParse(raw);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
    throw new TaskInvocationError(`Task "${ref}" returned a malformed response: ${detail}`, false);
  }

  const body = parsed.data;
  if (body.status === "PENDING") {
    return { kind: "pending", token: body.token, payload: body.payload };
  }
  return {
    kind: "completed",
    status: body.status,
    severity: body.severity ?? "NONE",
    payload: body.payload,
    flags: body.flags ?? {},
  };
}

export class TaskInvoker {
  constructor(private readonly transport: TaskTransport) {}

  /**
   * 调用远程任务
   * @throws TaskTimeoutError 超时
   * @throws TaskInvocationError 传输 / 响应错误（retryable 标明是否可重试）
   */
  async invoke(request: TaskRequest, signal?: AbortSignal): Promise<TaskOutcome> {
    if (signal?.aborted) {
      throw new TaskInvocationError(`Task "${request.ref}" was cancelled`, false);
    }
    const controller = new AbortController();
    const onAbort = () => controller.abort(signal?.reason);
    signal?.addEventListener("abort", onAbort, { once: true });

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new TaskTimeoutError(request.ref, request.timeoutMs));
      }, request.timeoutMs);
    });

    try {
      const raw = await Promise.race([this.transport.invoke(request, controller.signal), timeout]);
      return normalizeResponse(raw, request.ref);
    } catch (err) {
      if (err instanceof TaskTimeoutError || err instanceof TaskInvocationError) throw err;
      if (signal?.aborted) {
        throw new TaskInvocationError(`Task "${request.ref}" was cancelled`, false);
      }
      throw new TaskInvocationError(`Task "${request.ref}" failed: ${errorMessage(err)}`, true);
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);
    }
  }
}
