/**
 * 运行状态持久化 — SQLite
 *
 * 所有写入都是基于 version 的条件写（CAS）；租约保存在同一行上，
 * 认领租约本身也是一次条件写。加载时重新校验 JSON 结构，不符即视为损坏。
 */

import Database from "better-sqlite3";
import fs from "node:fs";
import path from "node:path";
import pino from "pino";
import { config } from "../config.js";
import { RunNotFoundError, StateCorruptionError, errorMessage } from "../errors.js";
import type { RunState, RunStatus, TaskResult } from "../types/index.js";
import { TERMINAL_STATUSES } from "../types/index.js";
import { RunStateSchema, TaskResultSchema } from "./state-schema.js";

const logger = pino({ name: "state-store" });

export type PutResult =
  | { ok: true; state: RunState }
  | { ok: false; reason: "conflict" }
  | { ok: false; reason: "not_found" };

export type LeaseResult =
  | { ok: true; state: RunState }
  | { ok: false; reason: "denied"; holder: string }
  | { ok: false; reason: "not_found" };

export interface RunFilters {
  status?: RunStatus;
  subject?: string;
  pipeline?: string;
  limit?: number;
}

/** 状态存储接口 */
export interface StateStore {
  create(state: RunState): RunState;
  get(runId: string): RunState | null;
  /** 仅当存储中的 version 等于 expectedVersion 时写入，写入后 version + 1 */
  conditionalPut(state: RunState, expectedVersion: number): PutResult;
  leaseClaim(runId: string, ownerId: string, ttlMs: number): LeaseResult;
  leaseRelease(runId: string, ownerId: string): boolean;
  /** 幂等写入，键为 runId:taskId:attempt；返回最先写入的那条 */
  recordTaskResult(runId: string, result: TaskResult): TaskResult;
  listTaskResults(runId: string): TaskResult[];
  /** 没有有效租约、需要继续执行的运行：未挂起，或挂起但已有待处理信号 */
  listResumable(): string[];
  /** 已挂起且超过 deadline 的运行 */
  listOverdue(): string[];
  /** 补偿尚未全部完成的 BLOCKED / FAILED 运行 */
  listCompensationPending(): string[];
  listActiveBySubject(subject: string): RunState[];
  list(filters?: RunFilters): RunState[];
  markCorrupted(runId: string, reason: string): void;
  purgeExpired(retentionMs: number): string[];
  close(): void;
}

/**
 * 不持有租约的一方（取消、信号）使用的 CAS 更新：冲突时重新加载并重放 mutate，直到写入成功。
 * mutate 返回 null 表示无需写入。
 * @throws RunNotFoundError
 */
export function updateRun(
  store: StateStore,
  runId: string,
  mutate: (state: RunState) => RunState | null,
  onConflict?: () => void,
): { state: RunState; written: boolean } {
  for (;;) {
    const state = store.get(runId);
    if (!state) throw new RunNotFoundError(runId);
    const next = mutate(state);
    if (next === null) return { state, written: false };

    const result = store.conditionalPut(next, state.version);
    if (result.ok) return { state: result.state, written: true };
    if (result.reason === "not_found") throw new RunNotFoundError(runId);
    onConflict?.();
  }
}

export function idempotencyKey(runId: string, taskId: string, attempt: number): string {
  return `${runId}:${taskId}:${attempt}`;
}

const TERMINAL_SQL = TERMINAL_STATUSES.map((s) => `'${s}'`).join(", ");

interface RunRow {
  id: string;
  data: string;
  version: number;
  failure_reason: string | null;
}

export class SqliteStateStore implements StateStore {
  private db: Database.Database;
  private readonly now: () => Date;

  constructor(dbPath?: string, clock?: () => Date) {
    const resolvedPath = dbPath ?? config.sqlitePath;
    if (resolvedPath !== ":memory:") {
      fs.mkdirSync(path.dirname(resolvedPath), { recursive: true });
    }
    this.db = new Database(resolvedPath);
    this.now = clock ?? (() => new Date());
    this.init();
  }

  private init(): void {
    this.db.pragma("journal_mode = WAL");
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS runs (
        id TEXT PRIMARY KEY,
        data TEXT NOT NULL,
        status TEXT NOT NULL,
        subject TEXT NOT NULL,
        pipeline TEXT NOT NULL,
        version INTEGER NOT NULL,
        owner_id TEXT,
        lease_expires_at TEXT,
        deadline TEXT NOT NULL,
        compensation_pending INTEGER NOT NULL DEFAULT 0,
        failure_reason TEXT,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL
      )
    `);
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS task_results (
        idempotency_key TEXT PRIMARY KEY,
        run_id TEXT NOT NULL,
        task_id TEXT NOT NULL,
        attempt INTEGER NOT NULL,
        data TEXT NOT NULL,
        recorded_at TEXT NOT NULL
      )
    `);
    this.db.exec(`CREATE INDEX IF NOT EXISTS idx_runs_status ON runs(status)`);
    this.db.exec(`CREATE INDEX IF NOT EXISTS idx_runs_subject ON runs(subject)`);
    this.db.exec(`CREATE INDEX IF NOT EXISTS idx_task_results_run ON task_results(run_id)`);
  }

  private nowIso(): string {
    return this.now().toISOString();
  }

  /** 由 RunState 派生出的索引列 */
  private columns(state: RunState) {
    const pending =
      (state.status === "BLOCKED" || state.status === "FAILED") && state.compensationCompletedAt === undefined;
    return {
      status: state.status,
      subject: state.context.subject,
      pipeline: `${state.pipeline.name}@${state.pipeline.version}`,
      owner_id: state.owner?.ownerId ?? null,
      lease_expires_at: state.owner?.expiresAt ?? null,
      deadline: state.deadline,
      compensation_pending: pending ? 1 : 0,
    };
  }

  /** 创建运行记录 */
  create(state: RunState): RunState {
    const cols = this.columns(state);
    this.db
      .prepare(
        `INSERT INTO runs (id, data, status, subject, pipeline, version, owner_id, lease_expires_at, deadline,
           compensation_pending, created_at, updated_at)
         VALUES (@id, @data, @status, @subject, @pipeline, @version, @owner_id, @lease_expires_at, @deadline,
           @compensation_pending, @created_at, @updated_at)`,
      )
      .run({
        ...cols,
        id: state.runId,
        data: JSON.stringify(state),
        version: state.version,
        created_at: state.createdAt,
        updated_at: state.updatedAt,
      });
    return state;
  }

  /** 获取运行状态；结构或版本不符时抛出 StateCorruptionError */
  get(runId: string): RunState | null {
    const row = this.db
      .prepare("SELECT id, data, version, failure_reason FROM runs WHERE id = ?")
      .get(runId) as RunRow | undefined;
    return row ? this.decode(row) : null;
  }

  private decode(row: RunRow): RunState {
    if (row.failure_reason !== null) {
      throw new StateCorruptionError(row.id, row.failure_reason);
    }
    let raw: unknown;
    try {
      raw = JSON.parse(row.data);
    } catch (err) {
      throw new StateCorruptionError(row.id, `invalid JSON: ${errorMessage(err)}`);
    }
    const parsed = RunStateSchema.safeParse(raw);
    if (!parsed.success) {
      const detail = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
      throw new StateCorruptionError(row.id, `schema mismatch: ${detail}`);
    }
    if (parsed.data.version !== row.version || parsed.data.runId !== row.id) {
      throw new StateCorruptionError(row.id, `version mismatch (row ${row.version}, data ${parsed.data.version})`);
    }
    return parsed.data;
  }

  conditionalPut(state: RunState, expectedVersion: number): PutResult {
    const stored: RunState = { ...state, version: expectedVersion + 1, updatedAt: this.nowIso() };
    const cols = this.columns(stored);
    const info = this.db
      .prepare(
        `UPDATE runs SET data = @data, status = @status, version = @version, owner_id = @owner_id,
           lease_expires_at = @lease_expires_at, deadline = @deadline,
           compensation_pending = @compensation_pending, updated_at = @updated_at
         WHERE id = @id AND version = @expected AND failure_reason IS NULL`,
      )
      .run({
        id: stored.runId,
        data: JSON.stringify(stored),
        status: cols.status,
        version: stored.version,
        owner_id: cols.owner_id,
        lease_expires_at: cols.lease_expires_at,
        deadline: cols.deadline,
        compensation_pending: cols.compensation_pending,
        updated_at: stored.updatedAt,
        expected: expectedVersion,
      });

    if (info.changes === 0) {
      const exists = this.db.prepare("SELECT 1 FROM runs WHERE id = ?").get(stored.runId) !== undefined;
      return { ok: false, reason: exists ? "conflict" : "not_found" };
    }
    return { ok: true, state: stored };
  }

  /** 认领租约：无持有者、持有者是自己或租约已过期时成功 */
  leaseClaim(runId: string, ownerId: string, ttlMs: number): LeaseResult {
    for (let attempt = 0; attempt < 3; attempt++) {
      const state = this.get(runId);
      if (!state) return { ok: false, reason: "not_found" };

      const now = this.now();
      const holder = state.owner;
      if (holder && holder.ownerId !== ownerId && Date.parse(holder.expiresAt) > now.getTime()) {
        return { ok: false, reason: "denied", holder: holder.ownerId };
      }

      const result = this.conditionalPut(
        { ...state, owner: { ownerId, expiresAt: new Date(now.getTime() + ttlMs).toISOString() } },
        state.version,
      );
      if (result.ok) return result;
      if (result.reason === "not_found") return result;
      logger.debug({ runId, ownerId }, "Lease claim lost a race, retrying");
    }
    const latest = this.get(runId);
    return { ok: false, reason: "denied", holder: latest?.owner?.ownerId ?? "unknown" };
  }

  leaseRelease(runId: string, ownerId: string): boolean {
    const state = this.get(runId);
    if (!state || state.owner?.ownerId !== ownerId) return false;
    const { owner: _owner, ...rest } = state;
    return this.conditionalPut(rest, state.version).ok;
  }

  recordTaskResult(runId: string, result: TaskResult): TaskResult {
    const key = idempotencyKey(runId, result.taskId, result.attempt);
    this.db
      .prepare(
        `INSERT OR IGNORE INTO task_results (idempotency_key, run_id, task_id, attempt, data, recorded_at)
         VALUES (?, ?, ?, ?, ?, ?)`,
      )
      .run(key, runId, result.taskId, result.attempt, JSON.stringify(result), this.nowIso());

    const row = this.db.prepare("SELECT data FROM task_results WHERE idempotency_key = ?").get(key) as
      | { data: string }
      | undefined;
    return row ? this.decodeResult(runId, row.data) : result;
  }

  private decodeResult(runId: string, data: string): TaskResult {
    const parsed = TaskResultSchema.safeParse(JSON.parse(data));
    if (!parsed.success) {
      throw new StateCorruptionError(runId, `task result schema mismatch: ${parsed.error.issues[0]?.message ?? "unknown"}`);
    }
    return parsed.data;
  }

  listTaskResults(runId: string): TaskResult[] {
    const rows = this.db
      .prepare("SELECT data FROM task_results WHERE run_id = ? ORDER BY rowid ASC")
      .all(runId) as { data: string }[];
    return rows.map((r) => this.decodeResult(runId, r.data));
  }

  listResumable(): string[] {
    const rows = this.db
      .prepare(
        `SELECT id FROM runs
         WHERE (status IN ('CREATED', 'RUNNING')
             OR (status = 'SUSPENDED' AND json_array_length(data, '$.pendingSignals') > 0))
           AND failure_reason IS NULL
           AND (owner_id IS NULL OR lease_expires_at < ?)
         ORDER BY created_at ASC`,
      )
      .all(this.nowIso()) as { id: string }[];
    return rows.map((r) => r.id);
  }

  listOverdue(): string[] {
    const now = this.nowIso();
    const rows = this.db
      .prepare(
        `SELECT id FROM runs
         WHERE status = 'SUSPENDED' AND failure_reason IS NULL AND deadline < ?
           AND (owner_id IS NULL OR lease_expires_at < ?)
         ORDER BY deadline ASC`,
      )
      .all(now, now) as { id: string }[];
    return rows.map((r) => r.id);
  }

  listCompensationPending(): string[] {
    const rows = this.db
      .prepare(
        `SELECT id FROM runs
         WHERE compensation_pending = 1 AND failure_reason IS NULL
           AND (owner_id IS NULL OR lease_expires_at < ?)
         ORDER BY updated_at ASC`,
      )
      .all(this.nowIso()) as { id: string }[];
    return rows.map((r) => r.id);
  }

  /** 同一 subject 的非终态运行；损坏的记录标记为 FAILED 后跳过 */
  listActiveBySubject(subject: string): RunState[] {
    const rows = this.db
      .prepare(
        `SELECT id, data, version, failure_reason FROM runs
         WHERE subject = ? AND status NOT IN (${TERMINAL_SQL}) AND failure_reason IS NULL
         ORDER BY created_at ASC`,
      )
      .all(subject) as RunRow[];
    const states: RunState[] = [];
    for (const row of rows) {
      try {
        states.push(this.decode(row));
      } catch (err) {
        if (!(err instanceof StateCorruptionError)) throw err;
        logger.warn({ runId: row.id, detail: err.detail }, "Marking corrupted run record as FAILED");
        this.markCorrupted(row.id, err.detail);
      }
    }
    return states;
  }

  /** 列出运行（跳过损坏记录） */
  list(filters?: RunFilters): RunState[] {
    let sql = "SELECT id, data, version, failure_reason FROM runs WHERE failure_reason IS NULL";
    const params: (string | number)[] = [];
    if (filters?.status) {
      sql += " AND status = ?";
      params.push(filters.status);
    }
    if (filters?.subject) {
      sql += " AND subject = ?";
      params.push(filters.subject);
    }
    if (filters?.pipeline) {
      sql += " AND pipeline LIKE ?";
      params.push(`${filters.pipeline}@%`);
    }
    sql += " ORDER BY created_at DESC LIMIT ?";
    params.push(filters?.limit ?? 100);

    const rows = this.db.prepare(sql).all(...params) as RunRow[];
    const states: RunState[] = [];
    for (const row of rows) {
      try {
        states.push(this.decode(row));
      } catch (err) {
        logger.warn({ runId: row.id, err }, "Skipping corrupted run record");
      }
    }
    return states;
  }

  /** 将损坏记录标记为 FAILED；原始数据保持不动，不做修复 */
  markCorrupted(runId: string, reason: string): void {
    this.db
      .prepare(
        `UPDATE runs SET status = 'FAILED', failure_reason = ?, owner_id = NULL, lease_expires_at = NULL,
           compensation_pending = 0, updated_at = ?
         WHERE id = ?`,
      )
      .run(reason, this.nowIso(), runId);
  }

  /** 清理超过保留期的终态运行，返回被删除的 runId */
  purgeExpired(retentionMs: number): string[] {
    const cutoff = new Date(this.now().getTime() - retentionMs).toISOString();
    const expired = `status IN (${TERMINAL_SQL}) AND compensation_pending = 0 AND updated_at < ?`;
    const purge = this.db.transaction((before: string) => {
      const ids = (this.db.prepare(`SELECT id FROM runs WHERE ${expired}`).all(before) as { id: string }[]).map(
        (r) => r.id,
      );
      this.db.prepare(`DELETE FROM task_results WHERE run_id IN (SELECT id FROM runs WHERE ${expired})`).run(before);
      this.db.prepare(`DELETE FROM runs WHERE ${expired}`).run(before);
      return ids;
    });
    return purge(cutoff);
  }

  /** 关闭数据库连接 */
  close(): void {
    this.db.close();
  }
}
