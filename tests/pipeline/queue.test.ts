import { describe, expect, it, vi } from "vitest";
import { RunQueue, type RunJob } from "../../src/pipeline/queue.js";

describe("RunQueue", () => {
  it("未注册处理函数时拒绝入队", () => {
    const queue = new RunQueue(1);
    expect(() => queue.enqueue({ kind: "execute", runId: "run-1" })).toThrow("No run handler registered");
  });

  it("同一运行的同类任务排队期间只入队一次", async () => {
    const queue = new RunQueue(1);
    const handler = vi.fn(async (_job: RunJob) => undefined);
    queue.onJob(handler);
    queue.pause();

    expect(queue.enqueue({ kind: "execute", runId: "run-1" })).toBe(true);
    expect(queue.enqueue({ kind: "execute", runId: "run-1" })).toBe(false);
    expect(queue.enqueue({ kind: "expire", runId: "run-1" })).toBe(true);
    expect(queue.enqueue({ kind: "execute", runId: "run-2" })).toBe(true);
    expect(queue.size).toBe(3);

    queue.start();
    await queue.drain();
    expect(handler.mock.calls.map(([job]) => `${job.kind}:${job.runId}`)).toEqual([
      "execute:run-1",
      "expire:run-1",
      "execute:run-2",
    ]);
    expect(queue.enqueue({ kind: "execute", runId: "run-1" })).toBe(true);
    await queue.drain();
  });

  it("处理函数抛错不影响后续任务", async () => {
    const queue = new RunQueue(1);
    const seen: string[] = [];
    queue.onJob(async (job) => {
      seen.push(job.runId);
      if (job.runId === "run-1") throw new Error("engine exploded");
    });

    queue.enqueue({ kind: "execute", runId: "run-1" });
    queue.enqueue({ kind: "execute", runId: "run-2" });
    await queue.drain();

    expect(seen).toEqual(["run-1", "run-2"]);
  });

  it("clear 丢弃未开始的任务并允许重新入队", async () => {
    const queue = new RunQueue(1);
    const handler = vi.fn(async (_job: RunJob) => undefined);
    queue.onJob(handler);
    queue.pause();
    queue.enqueue({ kind: "compensate", runId: "run-1" });

    queue.clear();
    expect(queue.size).toBe(0);
    expect(queue.enqueue({ kind: "compensate", runId: "run-1" })).toBe(true);

    queue.start();
    await queue.drain();
    expect(handler).toHaveBeenCalledTimes(1);
  });
});
