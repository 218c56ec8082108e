/**
 * GitLab 适配器 — 基于 @gitbeaker/rest，兼容 GitLab 12.4 v4 API
 */

import { Gitlab } from "@gitbeaker/rest";
import { config } from "../config.js";
import type { TrackerAdapter, TrackingRecord, TrackingRecordOptions } from "./tracker-adapter.js";

export class GitLabAdapter implements TrackerAdapter {
  readonly source = "gitlab";
  private readonly api: InstanceType<typeof Gitlab>;
  private readonly gitlabUrl: string;

  constructor(options?: { url: string; token: string }) {
    this.gitlabUrl = options?.url ?? config.gitlab.url;
    this.api = new Gitlab({
      host: this.gitlabUrl,
      token: options?.token ?? config.gitlab.token,
    });
  }

  async addComment(projectId: string, changeNumber: number, body: string): Promise<void> {
    await this.api.MergeRequestNotes.create(projectId, changeNumber, body);
  }

  async createTrackingRecord(projectId: string, opts: TrackingRecordOptions): Promise<TrackingRecord> {
    const issue = await this.api.Issues.create(projectId, opts.title, {
      description: opts.body,
      labels: opts.labels?.join(","),
    });
    const id = Number(issue.iid);
    // 12.4 部分响应缺少 web_url，手动拼接
    const url = typeof issue.web_url === "string" ? issue.web_url : `${this.gitlabUrl}/${projectId}/-/issues/${id}`;
    return { id, url };
  }
}
