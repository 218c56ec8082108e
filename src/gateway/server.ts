/**
 * Gateway HTTP 服务 — Fastify 实例，暴露触发接口与运行查询 API
 */

import Fastify from "fastify";
import { z } from "zod";
import type { AuditLogger } from "../audit/logger.js";
import type { PipelineRegistry } from "../definition/registry.js";
import { toIssues } from "../definition/schema.js";
import {
  DefinitionValidationError,
  InvalidSignalError,
  RunNotFoundError,
  StateCorruptionError,
  errorMessage,
} from "../errors.js";
import type { Metrics } from "../observability/metrics.js";
import { aggregate } from "../pipeline/aggregator.js";
import type { StateStore } from "../pipeline/state.js";
import type { RunTrigger } from "../pipeline/trigger.js";

/** 服务依赖 */
export interface ServerDeps {
  trigger: RunTrigger;
  store: StateStore;
  registry: PipelineRegistry;
  auditLogger: AuditLogger;
  metrics: Metrics;
  logger?: boolean;
}

const CreateRunBodySchema = z.object({
  pipeline: z.string().min(1),
  context: z.unknown(),
});

const CancelBodySchema = z
  .object({ reason: z.string().min(1).default("cancelled via API") })
  .default({});

const ListQuerySchema = z.object({
  status: z.enum(["CREATED", "RUNNING", "SUSPENDED", "ADMITTED", "BLOCKED", "CANCELLED", "FAILED"]).optional(),
  subject: z.string().optional(),
  pipeline: z.string().optional(),
  limit: z.coerce.number().int().positive().max(500).optional(),
});

/** 把 zod 校验失败转为 400 */
function parseOr400<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown, what: string): T {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new DefinitionValidationError(`Invalid ${what}`, toIssues(parsed.error));
  }
  return parsed.data;
}

function statusCodeOf(err: unknown): number {
  if (err instanceof DefinitionValidationError || err instanceof InvalidSignalError) return 400;
  if (err instanceof RunNotFoundError) return 404;
  if (err instanceof StateCorruptionError) return 409;
  if (typeof err === "object" && err !== null && "statusCode" in err && typeof err.statusCode === "number") {
    return err.statusCode;
  }
  return 500;
}

/** 已损坏的运行记录同样视为存在，仍可查询其审计日志 */
function runExists(store: StateStore, runId: string): boolean {
  try {
    return store.get(runId) !== null;
  } catch (err) {
    if (err instanceof StateCorruptionError) return true;
    throw err;
  }
}

/**
 * 创建 Fastify 服务实例
 */
export function createServer(deps: ServerDeps) {
  const { trigger, store, registry, auditLogger, metrics } = deps;
  const app = Fastify({ logger: deps.logger ?? true });

  app.setErrorHandler((err, request, reply) => {
    const code = statusCodeOf(err);
    if (code >= 500) {
      request.log.error(err, "请求处理失败");
    }
    return reply.code(code).send({
      ok: false,
      error: errorMessage(err),
      ...(err instanceof DefinitionValidationError ? { issues: err.issues } : {}),
    });
  });

  // ========== 触发接口 ==========

  /** 创建运行 */
  app.post("/api/runs", async (request, reply) => {
    const body = parseOr400(CreateRunBodySchema, request.body, "request body");
    const runId = await trigger.createRun(body.pipeline, body.context);
    return reply.code(201).send({ ok: true, runId });
  });

  /** 取消运行 */
  app.post<{ Params: { id: string } }>("/api/runs/:id/cancel", async (request, reply) => {
    const body = parseOr400(CancelBodySchema, request.body ?? undefined, "request body");
    const state = await trigger.cancelRun(request.params.id, body.reason);
    return reply.send({ ok: true, runId: state.runId, status: state.status, reason: state.reason });
  });

  /** 外部事件恢复挂起的运行 */
  app.post<{ Params: { id: string } }>("/api/runs/:id/signal", async (request, reply) => {
    trigger.resumeSignal(request.params.id, request.body);
    return reply.code(202).send({ ok: true, runId: request.params.id });
  });

  // ========== 查询接口 ==========

  /** 运行列表 */
  app.get("/api/runs", async (request, reply) => {
    const query = parseOr400(ListQuerySchema, request.query, "query");
    const runs = store.list(query).map((s) => ({
      runId: s.runId,
      pipeline: `${s.pipeline.name}@${s.pipeline.version}`,
      subject: s.context.subject,
      status: s.status,
      currentStage: s.currentStage,
      reason: s.reason,
      createdAt: s.createdAt,
      updatedAt: s.updatedAt,
    }));
    return reply.send(runs);
  });

  /** 运行详情（附带重新计算的聚合结果） */
  app.get<{ Params: { id: string } }>("/api/runs/:id", async (request, reply) => {
    const state = store.get(request.params.id);
    if (!state) throw new RunNotFoundError(request.params.id);
    const definition = registry.get(state.pipeline);
    const aggregated = definition
      ? aggregate(Object.values(state.results), definition.policy, definition.aggregation)
      : null;
    return reply.send({ run: state, aggregate: aggregated });
  });

  /** 运行审计日志 */
  app.get<{ Params: { id: string } }>("/api/runs/:id/events", async (request, reply) => {
    const runId = request.params.id;
    if (!runExists(store, runId)) throw new RunNotFoundError(runId);
    return reply.send(auditLogger.getRunLog(runId));
  });

  /** 已注册的流水线定义 */
  app.get("/api/pipelines", async (_request, reply) => {
    return reply.send(registry.list());
  });

  /** 指标快照 */
  app.get("/api/metrics", async (_request, reply) => {
    return reply.send(metrics.snapshot());
  });

  // ========== 基础路由 ==========

  /** 健康检查 */
  app.get("/health", async (_request, reply) => {
    return reply.code(200).send({ status: "ok" });
  });

  return app;
}
