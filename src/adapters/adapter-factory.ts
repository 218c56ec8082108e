/**
 * 适配器工厂 — 根据来源创建对应的追踪系统适配器实例
 */

import type { TrackerAdapter, TrackerSource } from "./tracker-adapter.js";
import { GitHubAdapter } from "./github-adapter.js";
import { GitLabAdapter } from "./gitlab-adapter.js";

export function createAdapter(source: TrackerSource): TrackerAdapter {
  switch (source) {
    case "gitlab":
      return new GitLabAdapter();
    case "github":
      return new GitHubAdapter();
    default:
      throw new Error(`不支持的追踪系统来源: ${source satisfies never}`);
  }
}

export function isTrackerSource(value: unknown): value is TrackerSource {
  return value === "gitlab" || value === "github";
}
