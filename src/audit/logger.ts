/**
 * 审计日志模块 — 以 JSON Lines 格式记录每次运行的事件
 */

import fs from "node:fs";
import path from "node:path";

import { config } from "../config.js";
import type { AuditEvent, AuditRecord } from "../types/index.js";

export type AuditFields = Omit<AuditRecord, "timestamp" | "runId" | "event">;

export class AuditLogger {
  private readonly auditDir: string;
  private readonly now: () => Date;

  constructor(auditDir?: string, clock?: () => Date) {
    this.auditDir = auditDir ?? config.auditDir;
    this.now = clock ?? (() => new Date());
    this.ensureDir();
  }

  /** 追加一条审计记录到对应运行的日志文件 */
  log(record: AuditRecord): void {
    const filePath = this.filePath(record.runId);
    const line = JSON.stringify(record) + "\n";
    fs.appendFileSync(filePath, line, "utf-8");
  }

  /** 以当前时间记录事件 */
  event(runId: string, event: AuditEvent, fields: AuditFields = {}): void {
    this.log({ timestamp: this.now().toISOString(), runId, event, ...fields });
  }

  /** 读取指定运行的全部审计记录 */
  getRunLog(runId: string): AuditRecord[] {
    const filePath = this.filePath(runId);
    if (!fs.existsSync(filePath)) {
      return [];
    }
    const content = fs.readFileSync(filePath, "utf-8");
    return content
      .split("\n")
      .filter((line) => line.trim() !== "")
      .map((line) => JSON.parse(line) as AuditRecord);
  }

  /** 删除运行的审计文件（随运行记录一起清理） */
  remove(runId: string): void {
    fs.rmSync(this.filePath(runId), { force: true });
  }

  /** 获取日志文件路径 */
  private filePath(runId: string): string {
    if (runId === "" || path.basename(runId) !== runId) {
      throw new Error(`Invalid run id for audit file: ${JSON.stringify(runId)}`);
    }
    return path.join(this.auditDir, `${runId}.jsonl`);
  }

  /** 确保审计目录存在 */
  private ensureDir(): void {
    if (!fs.existsSync(this.auditDir)) {
      fs.mkdirSync(this.auditDir, { recursive: true });
    }
  }
}
