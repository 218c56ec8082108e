/**
 * 内置补偿动作
 *
 * - notify：写日志，并向所有已注册的通知渠道发送消息
 * - comment：在变更（MR / PR）上写评论
 * - open_tracking_record：开一条 Issue 跟踪
 *
 * 追踪目标取自 RunContext.metadata 的 source / project / changeNumber，
 * 动作 params 中的同名字段优先。
 */

import pino from "pino";
import { isTrackerSource } from "../adapters/adapter-factory.js";
import type { TrackerAdapter, TrackerSource } from "../adapters/tracker-adapter.js";
import type { NotificationChannel, NotificationMessage } from "../notification/channel.js";
import type { CompensationActionSpec, RunState } from "../types/index.js";
import type { CompensationExecutor } from "./compensation.js";

const logger = pino({ name: "notifier" });

export type AdapterProvider = (source: TrackerSource) => TrackerAdapter;

interface TrackerTarget {
  source: TrackerSource;
  project: string;
  changeNumber?: number;
}

/** 终态原因 + 相关任务 */
export function describeOutcome(run: RunState): { reason: string; factors: string[] } {
  const reason = run.decision?.reason ?? run.reason ?? "no reason recorded";
  const factors: string[] = [];
  for (const factor of run.decision?.factors ?? []) {
    switch (factor.kind) {
      case "required_task_failed":
        factors.push(`${factor.taskId} (${factor.status})`);
        break;
      case "severity_threshold":
        factors.push(`${factor.taskId} (${factor.severity})`);
        break;
      case "severity_count":
        factors.push(`${factor.severity} x${factor.count}`);
        break;
      case "override_label":
        factors.push(`label ${factor.label}`);
        break;
      case "task_result":
        factors.push(`${factor.taskId} (${factor.status}, ${factor.severity})`);
        break;
    }
  }
  // 没有决策的终态（失败 / 取消）列出参与任务
  if (!run.decision) {
    for (const c of run.contributors ?? []) {
      factors.push(`${c.taskId} (${c.status}, ${c.severity})`);
    }
  }
  return { reason, factors };
}

export function renderReport(run: RunState): string {
  const { reason, factors } = describeOutcome(run);
  return [
    `## 评审流水线结果：${run.status}`,
    ``,
    `**运行 ID**: \`${run.runId}\``,
    `**流水线**: ${run.pipeline.name}@${run.pipeline.version}`,
    `**原因**: ${reason}`,
    ...(factors.length > 0 ? [`**相关任务**: ${factors.join(", ")}`] : []),
    ...(run.decision && run.decision.warnings.length > 0
      ? [``, `**警告**:`, ...run.decision.warnings.map((w) => `- ${w}`)]
      : []),
  ].join("\n");
}

function stringParam(params: Record<string, unknown>, key: string): string | undefined {
  const value = params[key];
  return typeof value === "string" && value !== "" ? value : undefined;
}

function numberParam(params: Record<string, unknown>, key: string): number | undefined {
  const value = params[key];
  if (typeof value === "number" && Number.isInteger(value)) return value;
  if (typeof value === "string" && /^\d+$/.test(value)) return Number(value);
  return undefined;
}

/** 解析追踪目标，缺少必要字段时抛错（补偿记录为 failed） */
export function resolveTarget(action: CompensationActionSpec, run: RunState): TrackerTarget {
  const meta = run.context.metadata;
  const source = action.params.source ?? meta.source;
  if (!isTrackerSource(source)) {
    throw new Error(`Action "${action.id}" has no tracker source (expected gitlab or github)`);
  }
  const project = stringParam(action.params, "project") ?? stringParam(meta, "project");
  if (!project) {
    throw new Error(`Action "${action.id}" has no tracker project`);
  }
  return { source, project, changeNumber: numberParam(action.params, "changeNumber") ?? numberParam(meta, "changeNumber") };
}

export class NotifyExecutor implements CompensationExecutor {
  readonly type = "notify";

  constructor(
    private channels: NotificationChannel[] = [],
    private clock: () => Date = () => new Date(),
  ) {}

  async execute(_action: CompensationActionSpec, run: RunState): Promise<string | undefined> {
    const { reason, factors } = describeOutcome(run);
    logger.warn({ runId: run.runId, subject: run.context.subject, status: run.status, reason }, "评审流水线需要人工关注");

    if (this.channels.length === 0) return "logged";

    const message: NotificationMessage = {
      runId: run.runId,
      pipeline: `${run.pipeline.name}@${run.pipeline.version}`,
      subject: run.context.subject,
      status: run.status === "FAILED" ? "FAILED" : "BLOCKED",
      reason,
      factors,
      timestamp: this.clock().toISOString(),
    };

    // 单个渠道失败不影响其他渠道
    const results = await Promise.allSettled(this.channels.map((ch) => ch.send(message)));
    const failed = this.channels.filter((_, i) => results[i]?.status === "rejected").map((ch) => ch.name);
    if (failed.length > 0) {
      throw new Error(`Notification failed on channel(s): ${failed.join(", ")}`);
    }
    return `sent to ${this.channels.map((ch) => ch.name).join(", ")}`;
  }
}

export class CommentExecutor implements CompensationExecutor {
  readonly type = "comment";

  constructor(private getAdapter: AdapterProvider) {}

  async execute(action: CompensationActionSpec, run: RunState): Promise<string | undefined> {
    const target = resolveTarget(action, run);
    if (target.changeNumber === undefined) {
      throw new Error(`Action "${action.id}" has no change number to comment on`);
    }
    await this.getAdapter(target.source).addComment(target.project, target.changeNumber, renderReport(run));
    return `${target.source}:${target.project}#${target.changeNumber}`;
  }
}

export class TrackingRecordExecutor implements CompensationExecutor {
  readonly type = "open_tracking_record";

  constructor(private getAdapter: AdapterProvider) {}

  async execute(action: CompensationActionSpec, run: RunState): Promise<string | undefined> {
    const target = resolveTarget(action, run);
    const labels = Array.isArray(action.params.labels)
      ? action.params.labels.filter((l): l is string => typeof l === "string")
      : undefined;
    const record = await this.getAdapter(target.source).createTrackingRecord(target.project, {
      title: `[${run.status}] ${run.context.subject}`,
      body: renderReport(run),
      labels,
    });
    return record.url;
  }
}
