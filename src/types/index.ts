export type { AuditEvent, AuditRecord } from "./events.js";
export type {
  AggregationConfig,
  AggregationMode,
  AlwaysCondition,
  CompensationActionSpec,
  CompensationTrigger,
  Condition,
  ConditionOperator,
  CustomCondition,
  DecisionPolicy,
  FieldCondition,
  NeverCondition,
  PipelineDefaults,
  PipelineDefinition,
  PipelineRef,
  ResultCondition,
  Severity,
  Stage,
  StageMode,
  TaskChunking,
  TaskSpec,
} from "./pipeline.js";
export type {
  AggregatedResult,
  AwaitingTask,
  BlockingIssue,
  CompensationRecord,
  Decision,
  DecisionCode,
  DecisionFactor,
  DecisionOutcome,
  Lease,
  PendingSignal,
  ResumeEvent,
  RunContext,
  RunState,
  RunStatus,
  SignalRecord,
  TaskContribution,
  TaskResult,
  TaskStatus,
} from "./run.js";
export { TERMINAL_STATUSES, isTerminal } from "./run.js";
