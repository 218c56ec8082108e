/**
 * 周期巡检 — 进程启动时及每个间隔执行一次
 *
 * 1. 重新入队无人持有的非终态运行
 * 2. 挂起超过 deadline 的运行：等待任务记为 TIMEOUT
 * 3. 重试未完成的补偿
 * 4. 清理超过保留期的终态运行
 */

import pino from "pino";
import type { AuditLogger } from "../audit/logger.js";
import { config } from "../config.js";
import type { RunQueue } from "./queue.js";
import type { StateStore } from "./state.js";

const logger = pino({ name: "reconciler" });

export interface ReconcileReport {
  resumed: string[];
  expired: string[];
  compensations: string[];
  purged: string[];
}

export interface ReconcilerOptions {
  store: StateStore;
  queue: RunQueue;
  auditLogger?: AuditLogger;
  intervalMs?: number;
  retentionMs?: number;
}

export class Reconciler {
  private readonly intervalMs: number;
  private readonly retentionMs: number;
  private timer: NodeJS.Timeout | null = null;

  constructor(private readonly options: ReconcilerOptions) {
    this.intervalMs = options.intervalMs ?? config.reconcileIntervalMs;
    this.retentionMs = options.retentionMs ?? config.retentionMs;
  }

  reconcileOnce(): ReconcileReport {
    const { store, queue } = this.options;

    const resumed = store.listResumable().filter((runId) => queue.enqueue({ kind: "execute", runId }));
    const expired = store.listOverdue().filter((runId) => queue.enqueue({ kind: "expire", runId }));
    const compensations = store
      .listCompensationPending()
      .filter((runId) => queue.enqueue({ kind: "compensate", runId }));

    const purged = store.purgeExpired(this.retentionMs);
    for (const runId of purged) {
      this.options.auditLogger?.remove(runId);
    }

    if (resumed.length + expired.length + compensations.length + purged.length > 0) {
      logger.info(
        { resumed: resumed.length, expired: expired.length, compensations: compensations.length, purged: purged.length },
        "Reconcile pass finished",
      );
    }
    return { resumed, expired, compensations, purged };
  }

  /** 立即执行一次，之后按间隔执行 */
  start(): void {
    if (this.timer) return;
    this.tick();
    this.timer = setInterval(() => this.tick(), this.intervalMs);
    this.timer.unref();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  private tick(): void {
    try {
      this.reconcileOnce();
    } catch (err) {
      logger.error({ err }, "Reconcile pass failed");
    }
  }
}
