/**
 * GitHub 适配器 — 基于 @octokit/rest
 */

import { Octokit } from "@octokit/rest";
import { config } from "../config.js";
import type { TrackerAdapter, TrackingRecord, TrackingRecordOptions } from "./tracker-adapter.js";

export class GitHubAdapter implements TrackerAdapter {
  readonly source = "github";
  private readonly api: Octokit;

  constructor(token?: string) {
    this.api = new Octokit({ auth: token ?? config.github.token });
  }

  /** 将 "owner/repo" 拆分为 owner 和 repo */
  private split(projectId: string): { owner: string; repo: string } {
    const [owner, repo, ...rest] = projectId.split("/");
    if (!owner || !repo || rest.length > 0) {
      throw new Error(`GitHub 项目标识应为 owner/repo: ${projectId}`);
    }
    return { owner, repo };
  }

  async addComment(projectId: string, changeNumber: number, body: string): Promise<void> {
    // GitHub 的 PR 和 Issue 共用 issue_number
    const { owner, repo } = this.split(projectId);
    await this.api.issues.createComment({
      owner,
      repo,
      issue_number: changeNumber,
      body,
    });
  }

  async createTrackingRecord(projectId: string, opts: TrackingRecordOptions): Promise<TrackingRecord> {
    const { owner, repo } = this.split(projectId);
    const { data } = await this.api.issues.create({
      owner,
      repo,
      title: opts.title,
      body: opts.body,
      labels: opts.labels,
    });
    return { id: data.number, url: data.html_url };
  }
}
