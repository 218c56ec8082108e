/**
 * 服务入口 — 启动 Fastify + 运行队列 + 巡检 + 优雅关闭
 */

import pino from "pino";
import { createAdapter } from "./adapters/adapter-factory.js";
import { HttpTaskTransport } from "./adapters/http-task-transport.js";
import { AuditLogger } from "./audit/logger.js";
import { config } from "./config.js";
import { createDefaultPredicates } from "./definition/predicates.js";
import { PipelineRegistry } from "./definition/registry.js";
import { createServer } from "./gateway/server.js";
import type { NotificationChannel } from "./notification/channel.js";
import { WeComChannel } from "./notification/wecom-channel.js";
import { Metrics } from "./observability/metrics.js";
import { CommentExecutor, NotifyExecutor, TrackingRecordExecutor } from "./pipeline/compensation-actions.js";
import { CompensationHandler, CompensationRegistry } from "./pipeline/compensation.js";
import { ConditionEvaluator } from "./pipeline/condition.js";
import { ExecutionEngine } from "./pipeline/engine.js";
import { TaskInvoker } from "./pipeline/invoker.js";
import { RunQueue, createRunHandler } from "./pipeline/queue.js";
import { Reconciler } from "./pipeline/reconciler.js";
import { SqliteStateStore } from "./pipeline/state.js";
import { RunTrigger } from "./pipeline/trigger.js";

const logger = pino({ name: "review-orchestrator" });

async function main() {
  logger.info("Starting review orchestrator...");

  // 初始化核心组件
  const store = new SqliteStateStore(config.sqlitePath);
  const auditLogger = new AuditLogger(config.auditDir);
  const metrics = new Metrics();
  const predicates = createDefaultPredicates();

  const channels: NotificationChannel[] = [];
  if (config.wecomWebhookUrl) {
    channels.push(new WeComChannel(config.wecomWebhookUrl));
  }
  const compensationRegistry = new CompensationRegistry()
    .register(new NotifyExecutor(channels))
    .register(new CommentExecutor(createAdapter))
    .register(new TrackingRecordExecutor(createAdapter));

  // 加载流水线定义
  const registry = new PipelineRegistry({ predicates, compensationTypes: compensationRegistry.types() });
  const definitions = registry.loadDirectory(config.pipelinesDir);
  logger.info({ count: definitions.length, dir: config.pipelinesDir }, "Pipeline definitions registered");

  // 初始化执行引擎
  const engine = new ExecutionEngine({
    store,
    registry,
    evaluator: new ConditionEvaluator(predicates),
    invoker: new TaskInvoker(new HttpTaskTransport()),
    auditLogger,
    compensation: new CompensationHandler(compensationRegistry, auditLogger, metrics),
    metrics,
  });

  const queue = new RunQueue(config.runConcurrency);
  queue.onJob(createRunHandler(engine));

  const trigger = new RunTrigger({ store, registry, engine, queue, auditLogger });

  // 恢复无人持有的运行、处理超时与未完成补偿
  const reconciler = new Reconciler({ store, queue, auditLogger });
  reconciler.start();

  // 启动 HTTP 服务
  const server = createServer({ trigger, store, registry, auditLogger, metrics });
  await server.listen({ port: config.port, host: "0.0.0.0" });
  logger.info(`Server listening on port ${config.port}`);

  // 优雅关闭
  const shutdown = async (signal: string) => {
    logger.info(`Received ${signal}, shutting down...`);
    reconciler.stop();
    queue.pause();
    queue.clear();
    await server.close();
    await queue.drain();
    store.close();
    logger.info("Shutdown complete");
    process.exit(0);
  };

  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGINT", () => void shutdown("SIGINT"));
}

main().catch((err) => {
  logger.fatal(err, "Failed to start");
  process.exit(1);
});
