/**
 * 运行队列 — p-queue 封装，限制全局并发执行的运行数
 */

import PQueue from "p-queue";
import pino from "pino";
import type { ExecutionEngine } from "./engine.js";

const logger = pino({ name: "run-queue" });

export type RunJob =
  | { kind: "execute"; runId: string }
  | { kind: "expire"; runId: string }
  | { kind: "compensate"; runId: string };

export type RunHandler = (job: RunJob) => Promise<void>;

/** 把队列任务分发到引擎 */
export function createRunHandler(engine: ExecutionEngine): RunHandler {
  return async (job) => {
    const state =
      job.kind === "execute"
        ? await engine.execute(job.runId)
        : job.kind === "expire"
          ? await engine.expireAwaiting(job.runId)
          : await engine.retryCompensation(job.runId);
    if (state) {
      logger.info({ runId: job.runId, kind: job.kind, status: state.status }, "Run job finished");
    }
  };
}

export class RunQueue {
  private queue: PQueue;
  private handler: RunHandler | null = null;
  /** 已排队但未开始的任务，避免同一运行重复入队 */
  private queued = new Set<string>();

  constructor(concurrency: number = 5) {
    this.queue = new PQueue({ concurrency });
  }

  /** 注册处理函数 */
  onJob(handler: RunHandler): void {
    this.handler = handler;
  }

  /** 投递任务到队列，返回是否实际入队 */
  enqueue(job: RunJob): boolean {
    if (!this.handler) {
      throw new Error("No run handler registered");
    }
    const handler = this.handler;
    const key = `${job.kind}:${job.runId}`;
    if (this.queued.has(key)) return false;
    this.queued.add(key);

    void this.queue.add(async () => {
      this.queued.delete(key);
      try {
        await handler(job);
      } catch (err) {
        logger.error({ runId: job.runId, kind: job.kind, err }, "Run job failed");
      }
    });
    return true;
  }

  /** 获取队列状态 */
  get size(): number {
    return this.queue.size;
  }

  get pending(): number {
    return this.queue.pending;
  }

  /** 等待所有任务完成 */
  async drain(): Promise<void> {
    await this.queue.onIdle();
  }

  /** 暂停队列 */
  pause(): void {
    this.queue.pause();
  }

  /** 丢弃尚未开始的任务（运行状态已落盘，由巡检重新入队） */
  clear(): void {
    this.queue.clear();
    this.queued.clear();
  }

  /** 恢复队列 */
  start(): void {
    this.queue.start();
  }
}
