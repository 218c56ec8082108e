/**
 * 流水线定义相关类型 — 声明式、可序列化、加载后不可变
 */

/** 严重程度（有序） */
export type Severity = "NONE" | "LOW" | "MEDIUM" | "HIGH" | "CRITICAL";

/** 条件运算符 */
export type ConditionOperator =
  | "eq"
  | "ne"
  | "gt"
  | "lt"
  | "contains"
  | "matches"
  | "exists"
  | "not_exists";

export interface AlwaysCondition {
  type: "always";
}

export interface NeverCondition {
  type: "never";
}

/** 针对运行上下文的字段断言，path 为点分路径 */
export interface FieldCondition {
  type: "field";
  path: string;
  operator: ConditionOperator;
  value?: unknown;
}

/** 针对已产出任务结果的断言 */
export interface ResultCondition {
  type: "result";
  taskId: string;
  field: string;
  operator: ConditionOperator;
  value?: unknown;
}

/** 自定义断言 — 只保存名称，加载时从注册表解析 */
export interface CustomCondition {
  type: "custom";
  name: string;
}

export type Condition =
  | AlwaysCondition
  | NeverCondition
  | FieldCondition
  | ResultCondition
  | CustomCondition;

/** 阶段调度模式 */
export type StageMode = "sequential" | "parallel";

/** 按变更文件分片并行调用，合并各分片结果 */
export interface TaskChunking {
  /** 每个分片的最大文件数，文件数不超过时不分片 */
  maxFiles: number;
  maxParallel?: number;
}

/** 任务定义 */
export interface TaskSpec {
  id: string;
  /** 远程调用引用（绝对 URL 或相对任务名） */
  ref: string;
  timeoutMs?: number;
  maxRetries?: number;
  /** 超时是否也按重试策略重试（默认否） */
  retryOnTimeout?: boolean;
  condition?: Condition;
  dependsOn: string[];
  /** 未设置时继承所在阶段的 required */
  required?: boolean;
  /** 静态输入，随调用一起发送 */
  input?: Record<string, unknown>;
  chunking?: TaskChunking;
}

/** 阶段定义 */
export interface Stage {
  id: string;
  mode: StageMode;
  condition?: Condition;
  required: boolean;
  failFast?: boolean;
  maxParallel?: number;
  tasks: TaskSpec[];
}

/** 全局默认值 */
export interface PipelineDefaults {
  timeoutMs: number;
  maxRetries: number;
  maxParallel: number;
  failFast: boolean;
  retryBaseDelayMs: number;
  retryMaxDelayMs: number;
  /** 运行 SLA，决定 RunState.deadline；未设置时取 DEFAULT_SLA_MS */
  slaMs?: number;
}

/** 决策策略 */
export interface DecisionPolicy {
  /** 达到或超过该严重程度即视为阻断问题 */
  blockingSeverity: Severity;
  /** 各严重程度允许的最大数量 */
  maxCounts: Partial<Record<Severity, number>>;
  /** 按任务覆盖「必需任务失败即阻断」，默认 true */
  requiredFailureBlocks: Record<string, boolean>;
  overrideLabels: string[];
}

/** 聚合模式 */
export type AggregationMode = "max" | "weighted";

export interface AggregationConfig {
  mode: AggregationMode;
  weights: Record<Severity, number>;
}

/** 终态中可触发补偿的状态 */
export type CompensationTrigger = "BLOCKED" | "FAILED";

/** 补偿动作定义 */
export interface CompensationActionSpec {
  id: string;
  /** 执行器类型：notify / comment / open_tracking_record 等 */
  type: string;
  on: CompensationTrigger[];
  params: Record<string, unknown>;
}

/** 流水线定义 */
export interface PipelineDefinition {
  name: string;
  version: number;
  description?: string;
  defaults: PipelineDefaults;
  stages: Stage[];
  policy: DecisionPolicy;
  aggregation: AggregationConfig;
  compensation: CompensationActionSpec[];
}

/** 运行记录中固定的定义引用 */
export interface PipelineRef {
  name: string;
  version: number;
}
