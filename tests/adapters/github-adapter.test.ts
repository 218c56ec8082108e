import { beforeEach, describe, expect, it, vi } from "vitest";

const { createComment, createIssue } = vi.hoisted(() => ({ createComment: vi.fn(), createIssue: vi.fn() }));

vi.mock("@octokit/rest", () => ({
  Octokit: class MockOctokit {
    issues = { createComment, create: createIssue };
  },
}));

import { GitHubAdapter } from "../../src/adapters/github-adapter.js";

describe("GitHubAdapter", () => {
  beforeEach(() => {
    createComment.mockReset();
    createIssue.mockReset();
  });

  it("在 PR 上写评论", async () => {
    createComment.mockResolvedValue({ data: {} });
    await new GitHubAdapter("test-token").addComment("acme/api", 12, "report");
    expect(createComment).toHaveBeenCalledWith({ owner: "acme", repo: "api", issue_number: 12, body: "report" });
  });

  it("创建 Issue 并返回编号与链接", async () => {
    createIssue.mockResolvedValue({ data: { number: 31, html_url: "https://github.com/acme/api/issues/31" } });
    const record = await new GitHubAdapter("test-token").createTrackingRecord("acme/api", {
      title: "[FAILED] acme/api#12",
      body: "report",
      labels: ["incident"],
    });
    expect(record).toEqual({ id: 31, url: "https://github.com/acme/api/issues/31" });
    expect(createIssue).toHaveBeenCalledWith({
      owner: "acme",
      repo: "api",
      title: "[FAILED] acme/api#12",
      body: "report",
      labels: ["incident"],
    });
  });

  it("项目标识格式错误时抛错", async () => {
    await expect(new GitHubAdapter("test-token").addComment("acme", 1, "x")).rejects.toThrow(
      "GitHub 项目标识应为 owner/repo: acme",
    );
    expect(createComment).not.toHaveBeenCalled();
  });
});
