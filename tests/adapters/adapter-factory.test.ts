/**
 * 适配器工厂单元测试
 */

import { describe, expect, it, vi } from "vitest";

// mock 掉实际的 API 客户端，避免测试时需要真实配置
vi.mock("@gitbeaker/rest", () => ({
  Gitlab: class MockGitlab {},
}));
vi.mock("@octokit/rest", () => ({
  Octokit: class MockOctokit {},
}));

import { createAdapter, isTrackerSource } from "../../src/adapters/adapter-factory.js";
import { GitHubAdapter } from "../../src/adapters/github-adapter.js";
import { GitLabAdapter } from "../../src/adapters/gitlab-adapter.js";

describe("createAdapter", () => {
  it("应返回 GitLabAdapter 实例", () => {
    const adapter = createAdapter("gitlab");
    expect(adapter).toBeInstanceOf(GitLabAdapter);
    expect(adapter.source).toBe("gitlab");
  });

  it("应返回 GitHubAdapter 实例", () => {
    const adapter = createAdapter("github");
    expect(adapter).toBeInstanceOf(GitHubAdapter);
    expect(adapter.source).toBe("github");
  });
});

describe("isTrackerSource", () => {
  it("只接受已支持的来源", () => {
    expect(isTrackerSource("gitlab")).toBe(true);
    expect(isTrackerSource("github")).toBe(true);
    expect(isTrackerSource("bitbucket")).toBe(false);
    expect(isTrackerSource(undefined)).toBe(false);
  });
});
