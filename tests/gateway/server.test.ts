import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createServer } from "../../src/gateway/server.js";
import { RunQueue, type RunJob } from "../../src/pipeline/queue.js";
import { RunTrigger } from "../../src/pipeline/trigger.js";
import { Harness, ScriptedTransport } from "../helpers/harness.js";

describe("Gateway server", () => {
  let h: Harness;
  let queue: RunQueue;
  let app: ReturnType<typeof createServer>;

  beforeEach(() => {
    h = new Harness();
    h.define({ stages: [{ id: "s1", tasks: [{ id: "a", ref: "a" }] }] });
    queue = new RunQueue(1);
    queue.onJob(vi.fn<(job: RunJob) => Promise<void>>(async () => undefined));
    let seq = 0;
    const trigger = new RunTrigger({
      store: h.store,
      registry: h.registry,
      engine: h.engine(new ScriptedTransport()),
      queue,
      auditLogger: h.auditLogger,
      idGenerator: () => `run-${++seq}`,
    });
    app = createServer({
      trigger,
      store: h.store,
      registry: h.registry,
      auditLogger: h.auditLogger,
      metrics: h.metrics,
      logger: false,
    });
  });

  afterEach(async () => {
    await app.close();
    await queue.drain();
    h.cleanup();
  });

  it("POST /api/runs 创建运行", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/api/runs",
      payload: { pipeline: "review", context: { subject: "acme/api#7" } },
    });

    expect(res.statusCode).toBe(201);
    expect(res.json()).toEqual({ ok: true, runId: "run-1" });
    expect(h.state("run-1").status).toBe("CREATED");
  });

  it("请求体不合法返回 400 与问题列表", async () => {
    const res = await app.inject({ method: "POST", url: "/api/runs", payload: { context: {} } });

    expect(res.statusCode).toBe(400);
    const body = res.json();
    expect(body.ok).toBe(false);
    expect(body.error).toBe("Invalid request body");
    expect(body.issues[0].path).toBe("pipeline");
  });

  it("未知流水线返回 400", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/api/runs",
      payload: { pipeline: "deploy", context: { subject: "acme/api#7" } },
    });

    expect(res.statusCode).toBe(400);
    expect(res.json().error).toBe('Unknown pipeline "deploy"');
  });

  it("GET /api/runs/:id 查询运行详情，未知运行返回 404", async () => {
    await app.inject({
      method: "POST",
      url: "/api/runs",
      payload: { pipeline: "review", context: { subject: "acme/api#7" } },
    });

    const found = await app.inject({ method: "GET", url: "/api/runs/run-1" });
    expect(found.statusCode).toBe(200);
    expect(found.json().run.runId).toBe("run-1");
    expect(found.json().aggregate.overallSeverity).toBe("NONE");

    const missing = await app.inject({ method: "GET", url: "/api/runs/ghost" });
    expect(missing.statusCode).toBe(404);
    expect(missing.json()).toEqual({ ok: false, error: "Run ghost not found" });
  });

  it("POST /api/runs/:id/cancel 取消无人持有的运行", async () => {
    await app.inject({
      method: "POST",
      url: "/api/runs",
      payload: { pipeline: "review", context: { subject: "acme/api#7" } },
    });

    const res = await app.inject({ method: "POST", url: "/api/runs/run-1/cancel" });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ ok: true, runId: "run-1", status: "CANCELLED", reason: "cancelled via API" });
  });

  it("POST /api/runs/:id/signal 拒绝没有等待任务的运行", async () => {
    await app.inject({
      method: "POST",
      url: "/api/runs",
      payload: { pipeline: "review", context: { subject: "acme/api#7" } },
    });

    const res = await app.inject({
      method: "POST",
      url: "/api/runs/run-1/signal",
      payload: { event: "approved", status: "SUCCESS" },
    });

    expect(res.statusCode).toBe(400);
    expect(res.json().error).toBe("Run run-1 is not awaiting task (unspecified) (awaiting: none)");
  });

  it("GET /api/runs/:id/events 返回审计记录，未知运行返回 404", async () => {
    await app.inject({
      method: "POST",
      url: "/api/runs",
      payload: { pipeline: "review", context: { subject: "acme/api#7" } },
    });

    const found = await app.inject({ method: "GET", url: "/api/runs/run-1/events" });
    expect(found.statusCode).toBe(200);
    expect(found.json()[0]).toMatchObject({ runId: "run-1", event: "run_created" });

    const missing = await app.inject({ method: "GET", url: "/api/runs/ghost/events" });
    expect(missing.statusCode).toBe(404);
    expect(missing.json()).toEqual({ ok: false, error: "Run ghost not found" });

    const traversal = await app.inject({ method: "GET", url: "/api/runs/..%2Fsecret/events" });
    expect(traversal.statusCode).toBe(404);
  });

  it("列表查询参数不合法返回 400", async () => {
    const res = await app.inject({ method: "GET", url: "/api/runs?status=UNKNOWN" });
    expect(res.statusCode).toBe(400);
  });

  it("GET /api/pipelines 列出已注册定义", async () => {
    const res = await app.inject({ method: "GET", url: "/api/pipelines" });
    expect(res.json()).toEqual([{ name: "review", version: 1, stages: ["s1"] }]);
  });

  it("GET /health", async () => {
    const res = await app.inject({ method: "GET", url: "/health" });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ status: "ok" });
  });
});
