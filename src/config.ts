/**
 * 配置模块 — 从环境变量读取所有配置项
 */

import "dotenv/config";
import os from "node:os";
import path from "node:path";

export interface GitLabConfig {
  url: string;
  token: string;
}

export interface GitHubConfig {
  token: string;
}

export interface TaskTransportConfig {
  /** 相对任务引用（如 "code_quality"）拼接到该地址 */
  baseUrl: string;
  authToken: string;
}

export interface Config {
  port: number;
  nodeEnv: string;
  sqlitePath: string;
  auditDir: string;
  pipelinesDir: string;
  /** 当前进程作为运行持有者的标识 */
  ownerId: string;
  leaseTtlMs: number;
  reconcileIntervalMs: number;
  /** 终态运行记录保留时长 */
  retentionMs: number;
  runConcurrency: number;
  defaultSlaMs: number;
  tasks: TaskTransportConfig;
  gitlab: GitLabConfig;
  github: GitHubConfig;
  wecomWebhookUrl: string;
}

function env(key: string, fallback = ""): string {
  return process.env[key] ?? fallback;
}

function envInt(key: string, fallback: number): number {
  const parsed = parseInt(env(key), 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

export function loadConfig(): Config {
  return {
    port: envInt("PORT", 8080),
    nodeEnv: env("NODE_ENV", "development"),
    sqlitePath: env("SQLITE_PATH", "./data/orchestrator.db"),
    auditDir: path.resolve(env("AUDIT_DIR", "./data/audit")),
    pipelinesDir: path.resolve(env("PIPELINES_DIR", "./pipelines")),
    ownerId: env("ENGINE_OWNER_ID", `${os.hostname()}:${process.pid}`),
    leaseTtlMs: envInt("LEASE_TTL_MS", 5 * 60_000),
    reconcileIntervalMs: envInt("RECONCILE_INTERVAL_MS", 60_000),
    retentionMs: envInt("RETENTION_MS", 30 * 24 * 3_600_000),
    runConcurrency: envInt("RUN_CONCURRENCY", 5),
    defaultSlaMs: envInt("DEFAULT_SLA_MS", 24 * 3_600_000),
    tasks: {
      baseUrl: env("TASK_BASE_URL", "http://localhost:9000"),
      authToken: env("TASK_AUTH_TOKEN"),
    },
    gitlab: {
      url: env("GITLAB_URL"),
      token: env("GITLAB_TOKEN"),
    },
    github: {
      token: env("GITHUB_TOKEN"),
    },
    wecomWebhookUrl: env("WECOM_WEBHOOK_URL"),
  };
}

/** 全局配置单例 */
export const config = loadConfig();
