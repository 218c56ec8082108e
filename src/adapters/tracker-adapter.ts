/**
 * 追踪系统适配器接口 — GitLab / GitHub 统一抽象
 *
 * 只覆盖补偿动作需要的两个操作：在变更上评论、开一条跟踪记录。
 */

export type TrackerSource = "gitlab" | "github";

export interface TrackingRecordOptions {
  title: string;
  body: string;
  labels?: string[];
}

export interface TrackingRecord {
  id: number;
  url: string;
}

export interface TrackerAdapter {
  readonly source: TrackerSource;
  /** 在 MR / PR 上追加评论 */
  addComment(projectId: string, changeNumber: number, body: string): Promise<void>;
  /** 创建 Issue */
  createTrackingRecord(projectId: string, opts: TrackingRecordOptions): Promise<TrackingRecord>;
}
