/**
 * 持久化 RunState 的结构校验，加载时不符合即判定为状态损坏
 */

import { z } from "zod";
import { RunContextSchema, SeveritySchema } from "../definition/schema.js";
import type { RunState, TaskResult } from "../types/index.js";

export const RUN_STATE_SCHEMA_VERSION = 1;

const TaskStatusSchema = z.enum(["SUCCESS", "FAILURE", "TIMEOUT", "SKIPPED"]);

export const TaskResultSchema: z.ZodType<TaskResult, z.ZodTypeDef, unknown> = z.object({
  taskId: z.string(),
  ref: z.string(),
  required: z.boolean(),
  status: TaskStatusSchema,
  severity: SeveritySchema,
  payload: z.unknown(),
  flags: z.record(z.boolean()),
  attempt: z.number().int().min(0),
  retryCount: z.number().int().min(0),
  startedAt: z.string(),
  completedAt: z.string(),
  error: z.string().optional(),
  reason: z.string().optional(),
});

const DecisionFactorSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("override_label"), label: z.string() }),
  z.object({ kind: z.literal("required_task_failed"), taskId: z.string(), status: TaskStatusSchema }),
  z.object({
    kind: z.literal("severity_threshold"),
    taskId: z.string(),
    severity: SeveritySchema,
    threshold: SeveritySchema,
  }),
  z.object({
    kind: z.literal("severity_count"),
    severity: SeveritySchema,
    count: z.number(),
    max: z.number(),
  }),
  z.object({
    kind: z.literal("task_result"),
    taskId: z.string(),
    status: TaskStatusSchema,
    severity: SeveritySchema,
  }),
]);

const DecisionSchema = z.object({
  outcome: z.enum(["ADMIT", "BLOCK"]),
  code: z.enum([
    "OVERRIDE_APPLIED",
    "REQUIRED_TASK_FAILED",
    "SEVERITY_THRESHOLD",
    "SEVERITY_COUNT_EXCEEDED",
    "NO_BLOCKING_ISSUES",
  ]),
  reason: z.string(),
  factors: z.array(DecisionFactorSchema),
  warnings: z.array(z.string()),
  decidedAt: z.string(),
});

export const RunStateSchema: z.ZodType<RunState, z.ZodTypeDef, unknown> = z.object({
  schemaVersion: z.literal(RUN_STATE_SCHEMA_VERSION),
  runId: z.string().min(1),
  pipeline: z.object({ name: z.string(), version: z.number().int().positive() }),
  status: z.enum(["CREATED", "RUNNING", "SUSPENDED", "ADMITTED", "BLOCKED", "CANCELLED", "FAILED"]),
  currentStage: z.number().int().min(0),
  context: RunContextSchema,
  results: z.record(TaskResultSchema),
  awaiting: z.record(
    z.object({
      taskId: z.string(),
      attempt: z.number().int().min(1),
      since: z.string(),
      token: z.string().optional(),
    }),
  ),
  signals: z.array(z.object({ taskId: z.string(), event: z.string(), receivedAt: z.string() })),
  pendingSignals: z
    .array(
      z.object({
        id: z.string(),
        receivedAt: z.string(),
        taskId: z.string().optional(),
        event: z.string(),
        status: z.enum(["SUCCESS", "FAILURE"]),
        severity: SeveritySchema.optional(),
        payload: z.unknown(),
        flags: z.record(z.boolean()).optional(),
      }),
    )
    .default([]),
  compensationActions: z.array(
    z.object({
      actionId: z.string(),
      type: z.string(),
      status: z.enum(["executed", "failed"]),
      attempts: z.number().int().min(1),
      lastAttemptAt: z.string(),
      executedAt: z.string().optional(),
      detail: z.string().optional(),
      error: z.string().optional(),
    }),
  ),
  compensationCompletedAt: z.string().optional(),
  decision: DecisionSchema.optional(),
  reason: z.string().optional(),
  contributors: z
    .array(z.object({ taskId: z.string(), status: TaskStatusSchema, severity: SeveritySchema }))
    .optional(),
  cancelRequested: z.object({ reason: z.string(), requestedAt: z.string() }).optional(),
  owner: z.object({ ownerId: z.string(), expiresAt: z.string() }).optional(),
  version: z.number().int().min(0),
  createdAt: z.string(),
  updatedAt: z.string(),
  deadline: z.string(),
  completedAt: z.string().optional(),
});
