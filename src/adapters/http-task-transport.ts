/**
 * HTTP 任务传输 — 使用 undici fetch 调用远程 Agent 服务
 *
 * 相对引用 "code_quality" → POST {baseUrl}/tasks/code_quality
 * 绝对引用 "https://…" 原样使用
 */

import { fetch, type Dispatcher } from "undici";
import { config } from "../config.js";
import { TaskInvocationError } from "../errors.js";
import type { TaskRequest, TaskTransport } from "../pipeline/invoker.js";

export interface HttpTaskTransportOptions {
  baseUrl: string;
  authToken?: string;
  /** 自定义 undici dispatcher（代理、测试 mock） */
  dispatcher?: Dispatcher;
}

export class HttpTaskTransport implements TaskTransport {
  private readonly options: HttpTaskTransportOptions;

  constructor(options?: HttpTaskTransportOptions) {
    this.options = options ?? { baseUrl: config.tasks.baseUrl, authToken: config.tasks.authToken };
  }

  resolveUrl(ref: string): string {
    if (/^https?:\/\//i.test(ref)) return ref;
    const base = this.options.baseUrl.endsWith("/") ? this.options.baseUrl : `${this.options.baseUrl}/`;
    return new URL(`tasks/${encodeURIComponent(ref)}`, base).toString();
  }

  async invoke(request: TaskRequest, signal: AbortSignal): Promise<unknown> {
    const headers: Record<string, string> = {
      "Content-Type": "application/json",
      "Idempotency-Key": request.idempotencyKey,
    };
    if (this.options.authToken) {
      headers.Authorization = `Bearer ${this.options.authToken}`;
    }

    const resp = await fetch(this.resolveUrl(request.ref), {
      method: "POST",
      headers,
      body: JSON.stringify({
        runId: request.runId,
        taskId: request.taskId,
        attempt: request.attempt,
        payload: request.payload,
      }),
      signal,
      dispatcher: this.options.dispatcher,
    });

    if (!resp.ok) {
      const body = await resp.text();
      // 5xx / 429 / 408 视为暂时性故障
      const retryable = resp.status >= 500 || resp.status === 429 || resp.status === 408;
      throw new TaskInvocationError(
        `Task endpoint responded ${resp.status}: ${body.slice(0, 200)}`,
        retryable,
        resp.status,
      );
    }

    try {
      return await resp.json();
    } catch {
      throw new TaskInvocationError(`Task endpoint returned invalid JSON for "${request.ref}"`, false, resp.status);
    }
  }
}
