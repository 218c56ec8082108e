/**
 * 审计事件定义
 */

/** 审计记录事件类型 */
export type AuditEvent =
  | "run_created"
  | "run_started"
  | "run_resumed"
  | "run_suspended"
  | "run_cancel_requested"
  | "run_cancelled"
  | "run_decided"
  | "run_failed"
  | "stage_started"
  | "stage_skipped"
  | "stage_completed"
  | "stage_truncated"
  | "task_started"
  | "task_completed"
  | "task_retried"
  | "task_skipped"
  | "task_awaiting"
  | "task_signalled"
  | "task_result_ignored"
  | "signal_received"
  | "state_conflict"
  | "compensation_executed"
  | "compensation_failed"
  | "compensation_skipped";

/** 审计记录 */
export interface AuditRecord {
  timestamp: string;
  runId: string;
  stage?: string;
  taskId?: string;
  event: AuditEvent;
  duration?: number;
  metadata?: Record<string, unknown>;
}
