/**
 * 流水线定义结构校验（zod）
 *
 * 这里只做结构层面的检查与默认值填充，
 * 重复 id、依赖环、未注册断言等语义检查见 validator.ts。
 */

import { z } from "zod";
import type { Condition, PipelineDefinition, RunContext } from "../types/index.js";

export const SeveritySchema = z.enum(["NONE", "LOW", "MEDIUM", "HIGH", "CRITICAL"]);

export const ConditionOperatorSchema = z.enum([
  "eq",
  "ne",
  "gt",
  "lt",
  "contains",
  "matches",
  "exists",
  "not_exists",
]);

const IdSchema = z
  .string()
  .min(1)
  .regex(/^[A-Za-z0-9][A-Za-z0-9_.-]*$/, "must contain only letters, digits, '_', '.', '-'");

export const ConditionSchema: z.ZodType<Condition, z.ZodTypeDef, unknown> = z.discriminatedUnion("type", [
  z.object({ type: z.literal("always") }),
  z.object({ type: z.literal("never") }),
  z.object({
    type: z.literal("field"),
    path: z.string().min(1),
    operator: ConditionOperatorSchema,
    value: z.unknown(),
  }),
  z.object({
    type: z.literal("result"),
    taskId: IdSchema,
    field: z.string().min(1),
    operator: ConditionOperatorSchema,
    value: z.unknown(),
  }),
  z.object({ type: z.literal("custom"), name: z.string().min(1) }),
]);

export const TaskSpecSchema = z.object({
  id: IdSchema,
  ref: z.string().min(1),
  timeoutMs: z.number().int().positive().optional(),
  maxRetries: z.number().int().min(0).optional(),
  retryOnTimeout: z.boolean().optional(),
  condition: ConditionSchema.optional(),
  dependsOn: z.array(IdSchema).default([]),
  required: z.boolean().optional(),
  input: z.record(z.unknown()).optional(),
  chunking: z
    .object({
      maxFiles: z.number().int().positive(),
      maxParallel: z.number().int().positive().optional(),
    })
    .optional(),
});

export const StageSchema = z.object({
  id: IdSchema,
  mode: z.enum(["sequential", "parallel"]).default("sequential"),
  condition: ConditionSchema.optional(),
  required: z.boolean().default(false),
  failFast: z.boolean().optional(),
  maxParallel: z.number().int().positive().optional(),
  tasks: z.array(TaskSpecSchema).min(1),
});

export const PipelineDefaultsSchema = z
  .object({
    timeoutMs: z.number().int().positive().default(180_000),
    maxRetries: z.number().int().min(0).default(2),
    maxParallel: z.number().int().positive().default(4),
    failFast: z.boolean().default(false),
    retryBaseDelayMs: z.number().int().min(0).default(1000),
    retryMaxDelayMs: z.number().int().min(0).default(30_000),
    slaMs: z.number().int().positive().optional(),
  })
  .default({});

const SeverityCountsSchema = z.object({
  NONE: z.number().int().min(0).optional(),
  LOW: z.number().int().min(0).optional(),
  MEDIUM: z.number().int().min(0).optional(),
  HIGH: z.number().int().min(0).optional(),
  CRITICAL: z.number().int().min(0).optional(),
});

export const DecisionPolicySchema = z
  .object({
    blockingSeverity: SeveritySchema.default("HIGH"),
    maxCounts: SeverityCountsSchema.default({}),
    requiredFailureBlocks: z.record(z.string(), z.boolean()).default({}),
    overrideLabels: z.array(z.string().min(1)).default([]),
  })
  .default({});

export const AggregationSchema = z
  .object({
    mode: z.enum(["max", "weighted"]).default("max"),
    weights: z
      .object({
        NONE: z.number().min(0).default(0),
        LOW: z.number().min(0).default(1),
        MEDIUM: z.number().min(0).default(3),
        HIGH: z.number().min(0).default(7),
        CRITICAL: z.number().min(0).default(15),
      })
      .default({}),
  })
  .default({});

export const CompensationActionSchema = z.object({
  id: IdSchema,
  type: z.string().min(1),
  on: z.array(z.enum(["BLOCKED", "FAILED"])).min(1).default(["BLOCKED", "FAILED"]),
  params: z.record(z.unknown()).default({}),
});

export const PipelineDefinitionSchema: z.ZodType<PipelineDefinition, z.ZodTypeDef, unknown> = z.object({
  name: IdSchema,
  version: z.number().int().positive(),
  description: z.string().optional(),
  defaults: PipelineDefaultsSchema,
  stages: z.array(StageSchema).min(1),
  policy: DecisionPolicySchema,
  aggregation: AggregationSchema,
  compensation: z.array(CompensationActionSchema).default([]),
});

export const RunContextSchema: z.ZodType<RunContext, z.ZodTypeDef, unknown> = z.object({
  subject: z.string().min(1),
  author: z.string().optional(),
  labels: z.array(z.string()).default([]),
  files: z.array(z.string()).default([]),
  metadata: z.record(z.unknown()).default({}),
});

/** 将 zod 错误转为定义校验问题列表 */
export function toIssues(error: z.ZodError): { path: string; message: string }[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}
