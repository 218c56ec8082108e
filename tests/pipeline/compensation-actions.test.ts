import { describe, expect, it, vi } from "vitest";
import type { TrackerAdapter, TrackerSource } from "../../src/adapters/tracker-adapter.js";
import type { NotificationChannel, NotificationMessage } from "../../src/notification/channel.js";
import {
  CommentExecutor,
  NotifyExecutor,
  TrackingRecordExecutor,
  describeOutcome,
  renderReport,
  resolveTarget,
} from "../../src/pipeline/compensation-actions.js";
import type { CompensationActionSpec, RunState } from "../../src/types/index.js";
import { makeRunState } from "../helpers/fixtures.js";

const blockedRun: RunState = makeRunState({
  runId: "run-42",
  status: "BLOCKED",
  reason: "required task failed: code_quality (FAILURE)",
  context: {
    subject: "acme/api#12",
    labels: [],
    files: [],
    metadata: { source: "github", project: "acme/api", changeNumber: 12 },
  },
  decision: {
    outcome: "BLOCK",
    code: "REQUIRED_TASK_FAILED",
    reason: "required task failed: code_quality (FAILURE)",
    factors: [{ kind: "required_task_failed", taskId: "code_quality", status: "FAILURE" }],
    warnings: ['non-required task "docs" ended with TIMEOUT'],
    decidedAt: "2026-01-01T00:00:00.000Z",
  },
});

function action(type: string, params: Record<string, unknown> = {}): CompensationActionSpec {
  return { id: `${type}-action`, type, on: ["BLOCKED", "FAILED"], params };
}

function fakeAdapter() {
  const addComment = vi.fn<TrackerAdapter["addComment"]>(async () => undefined);
  const createTrackingRecord = vi.fn<TrackerAdapter["createTrackingRecord"]>(async () => ({
    id: 5,
    url: "https://github.com/acme/api/issues/5",
  }));
  const sources: TrackerSource[] = [];
  const provider = (source: TrackerSource): TrackerAdapter => {
    sources.push(source);
    return { source, addComment, createTrackingRecord };
  };
  return { provider, addComment, createTrackingRecord, sources };
}

describe("describeOutcome", () => {
  it("汇总原因与相关任务", () => {
    expect(describeOutcome(blockedRun)).toEqual({
      reason: "required task failed: code_quality (FAILURE)",
      factors: ["code_quality (FAILURE)"],
    });
  });

  it("没有决策时使用运行原因", () => {
    expect(describeOutcome(makeRunState({ status: "FAILED", reason: "engine error: boom" }))).toEqual({
      reason: "engine error: boom",
      factors: [],
    });
  });

  it("失败的运行列出参与任务", () => {
    const failed = makeRunState({
      status: "FAILED",
      reason: "engine error: boom",
      contributors: [{ taskId: "code_quality", status: "TIMEOUT", severity: "NONE" }],
    });
    expect(describeOutcome(failed)).toEqual({
      reason: "engine error: boom",
      factors: ["code_quality (TIMEOUT, NONE)"],
    });
  });
});

describe("renderReport", () => {
  it("生成 markdown 报告", () => {
    expect(renderReport(blockedRun)).toBe(
      [
        "## 评审流水线结果：BLOCKED",
        "",
        "**运行 ID**: `run-42`",
        "**流水线**: review@1",
        "**原因**: required task failed: code_quality (FAILURE)",
        "**相关任务**: code_quality (FAILURE)",
        "",
        "**警告**:",
        '- non-required task "docs" ended with TIMEOUT',
      ].join("\n"),
    );
  });
});

describe("resolveTarget", () => {
  it("默认取运行上下文中的目标", () => {
    expect(resolveTarget(action("comment"), blockedRun)).toEqual({
      source: "github",
      project: "acme/api",
      changeNumber: 12,
    });
  });

  it("动作参数优先", () => {
    expect(resolveTarget(action("comment", { source: "gitlab", project: "group/app", changeNumber: "9" }), blockedRun)).toEqual({
      source: "gitlab",
      project: "group/app",
      changeNumber: 9,
    });
  });

  it("缺少来源时抛错", () => {
    expect(() => resolveTarget(action("comment"), makeRunState())).toThrow(
      'Action "comment-action" has no tracker source (expected gitlab or github)',
    );
  });
});

describe("NotifyExecutor", () => {
  const clock = () => new Date("2026-01-01T09:00:00.000Z");

  it("没有通知渠道时只写日志", async () => {
    await expect(new NotifyExecutor([], clock).execute(action("notify"), blockedRun)).resolves.toBe("logged");
  });

  it("向所有渠道发送消息", async () => {
    const sent: NotificationMessage[] = [];
    const channel: NotificationChannel = {
      name: "wecom",
      send: async (message) => {
        sent.push(message);
      },
    };

    await expect(new NotifyExecutor([channel], clock).execute(action("notify"), blockedRun)).resolves.toBe(
      "sent to wecom",
    );
    expect(sent).toEqual([
      {
        runId: "run-42",
        pipeline: "review@1",
        subject: "acme/api#12",
        status: "BLOCKED",
        reason: "required task failed: code_quality (FAILURE)",
        factors: ["code_quality (FAILURE)"],
        timestamp: "2026-01-01T09:00:00.000Z",
      },
    ]);
  });

  it("任一渠道失败时抛错，其余渠道照常发送", async () => {
    const ok = { name: "ok", send: vi.fn(async () => undefined) };
    const broken = {
      name: "broken",
      send: vi.fn(async () => {
        throw new Error("down");
      }),
    };

    await expect(new NotifyExecutor([broken, ok], clock).execute(action("notify"), blockedRun)).rejects.toThrow(
      "Notification failed on channel(s): broken",
    );
    expect(ok.send).toHaveBeenCalledTimes(1);
  });
});

describe("CommentExecutor", () => {
  it("在变更上评论报告", async () => {
    const adapter = fakeAdapter();
    const detail = await new CommentExecutor(adapter.provider).execute(action("comment"), blockedRun);

    expect(detail).toBe("github:acme/api#12");
    expect(adapter.sources).toEqual(["github"]);
    expect(adapter.addComment).toHaveBeenCalledWith("acme/api", 12, renderReport(blockedRun));
  });

  it("缺少变更编号时抛错", async () => {
    const adapter = fakeAdapter();
    const run = makeRunState({
      context: { subject: "x", labels: [], files: [], metadata: { source: "gitlab", project: "group/app" } },
    });
    await expect(new CommentExecutor(adapter.provider).execute(action("comment"), run)).rejects.toThrow(
      'Action "comment-action" has no change number to comment on',
    );
    expect(adapter.addComment).not.toHaveBeenCalled();
  });
});

describe("TrackingRecordExecutor", () => {
  it("创建跟踪记录并返回链接", async () => {
    const adapter = fakeAdapter();
    const detail = await new TrackingRecordExecutor(adapter.provider).execute(
      action("open_tracking_record", { labels: ["incident", 3] }),
      blockedRun,
    );

    expect(detail).toBe("https://github.com/acme/api/issues/5");
    expect(adapter.createTrackingRecord).toHaveBeenCalledWith("acme/api", {
      title: "[BLOCKED] acme/api#12",
      body: renderReport(blockedRun),
      labels: ["incident"],
    });
  });
});
