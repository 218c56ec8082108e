/**
 * 通知渠道接口 — 定义通用通知消息结构与渠道抽象
 */

/** 通知消息 */
export interface NotificationMessage {
  runId: string;
  pipeline: string;
  subject: string;
  status: "BLOCKED" | "FAILED";
  reason: string;
  /** 导致阻断的任务及严重程度，如 "architect (HIGH)" */
  factors: string[];
  timestamp: string;
}

/** 通知渠道抽象 */
export interface NotificationChannel {
  readonly name: string;
  send(message: NotificationMessage): Promise<void>;
}
