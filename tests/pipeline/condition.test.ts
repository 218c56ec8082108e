import { describe, expect, it, vi } from "vitest";
import { createDefaultPredicates } from "../../src/definition/predicates.js";
import { ConditionEvaluator, PredicateRegistry, resolvePath } from "../../src/pipeline/condition.js";
import type { RunContext, TaskResult } from "../../src/types/index.js";
import { makeResult } from "../helpers/fixtures.js";

const context: RunContext = {
  subject: "acme/api#7",
  author: "renovate[bot]",
  labels: ["backend", "security"],
  files: ["src/server.ts"],
  metadata: { lines: 420, branch: "feature/login", designDocUrl: "https://docs.example.com/lld/7" },
};

function evaluator() {
  const warn = vi.fn();
  return { warn, ev: new ConditionEvaluator(createDefaultPredicates(), warn) };
}

describe("resolvePath", () => {
  it("按点分路径取值", () => {
    expect(resolvePath(context, "metadata.lines")).toEqual({ found: true, value: 420 });
  });

  it("路径缺失时 found 为 false", () => {
    expect(resolvePath(context, "metadata.missing.deep")).toEqual({ found: false, value: undefined });
  });

  it("不访问原型链上的属性", () => {
    expect(resolvePath({}, "toString").found).toBe(false);
  });
});

describe("ConditionEvaluator", () => {
  it("未声明条件视为恒真", () => {
    expect(evaluator().ev.evaluate(undefined, context, {})).toBe(true);
  });

  it("always / never", () => {
    const { ev } = evaluator();
    expect(ev.evaluate({ type: "always" }, context, {})).toBe(true);
    expect(ev.evaluate({ type: "never" }, context, {})).toBe(false);
  });

  describe("field", () => {
    it.each([
      [{ path: "metadata.lines", operator: "gt", value: 400 }, true],
      [{ path: "metadata.lines", operator: "lt", value: 400 }, false],
      [{ path: "metadata.lines", operator: "eq", value: 420 }, true],
      [{ path: "metadata.branch", operator: "ne", value: "main" }, true],
      [{ path: "labels", operator: "contains", value: "security" }, true],
      [{ path: "metadata.branch", operator: "contains", value: "login" }, true],
      [{ path: "metadata.branch", operator: "matches", value: "^feature/" }, true],
      [{ path: "metadata.designDocUrl", operator: "exists" }, true],
      [{ path: "metadata.ticket", operator: "exists" }, false],
      [{ path: "metadata.ticket", operator: "not_exists" }, true],
    ] as const)("%j → %s", (cond, expected) => {
      expect(evaluator().ev.evaluate({ type: "field", ...cond }, context, {})).toBe(expected);
    });

    it("字段缺失时为 false", () => {
      const { ev, warn } = evaluator();
      expect(ev.evaluate({ type: "field", path: "metadata.ticket", operator: "eq", value: "X-1" }, context, {})).toBe(
        false,
      );
      expect(warn).not.toHaveBeenCalled();
    });

    it("类型不匹配时记 warning 并返回 false", () => {
      const { ev, warn } = evaluator();
      expect(ev.evaluate({ type: "field", path: "metadata.lines", operator: "gt", value: "400" }, context, {})).toBe(
        false,
      );
      expect(warn).toHaveBeenCalledWith("Condition operand type mismatch", {
        operand: "metadata.lines",
        operator: "gt",
        actualType: "number",
        expectedType: "string",
      });
    });
  });

  describe("result", () => {
    const results: Record<string, TaskResult> = {
      architect: makeResult({ taskId: "architect", severity: "HIGH", flags: { high_risk: true } }),
      docs: makeResult({ taskId: "docs", status: "SKIPPED" }),
    };

    it("读取已有结果的字段", () => {
      const { ev } = evaluator();
      expect(
        ev.evaluate({ type: "result", taskId: "architect", field: "flags.high_risk", operator: "eq", value: true }, context, results),
      ).toBe(true);
    });

    it("severity 按等级顺序比较", () => {
      const { ev } = evaluator();
      expect(
        ev.evaluate({ type: "result", taskId: "architect", field: "severity", operator: "gt", value: "MEDIUM" }, context, results),
      ).toBe(true);
      expect(
        ev.evaluate({ type: "result", taskId: "architect", field: "severity", operator: "lt", value: "CRITICAL" }, context, results),
      ).toBe(true);
    });

    it("任务尚未执行或被跳过时为 false", () => {
      const { ev } = evaluator();
      expect(
        ev.evaluate({ type: "result", taskId: "missing", field: "status", operator: "eq", value: "SUCCESS" }, context, results),
      ).toBe(false);
      expect(
        ev.evaluate({ type: "result", taskId: "docs", field: "status", operator: "not_exists" }, context, results),
      ).toBe(false);
    });
  });

  describe("custom", () => {
    it("解析内置断言", () => {
      const { ev } = evaluator();
      expect(ev.evaluate({ type: "custom", name: "has-design-doc" }, context, {})).toBe(true);
      expect(ev.evaluate({ type: "custom", name: "author-is-bot" }, context, {})).toBe(true);
      expect(ev.evaluate({ type: "custom", name: "has-changed-files" }, { ...context, files: [] }, {})).toBe(false);
    });

    it("未注册的断言为 false", () => {
      const { ev, warn } = evaluator();
      expect(ev.evaluate({ type: "custom", name: "nope" }, context, {})).toBe(false);
      expect(warn).toHaveBeenCalledWith("Custom predicate is not registered", { predicate: "nope" });
    });

    it("断言抛错时为 false", () => {
      const warn = vi.fn();
      const registry = new PredicateRegistry().register("boom", () => {
        throw new Error("boom");
      });
      const ev = new ConditionEvaluator(registry, warn);
      expect(ev.evaluate({ type: "custom", name: "boom" }, context, {})).toBe(false);
      expect(warn).toHaveBeenCalledTimes(1);
    });

    it("重复注册应抛错", () => {
      const registry = new PredicateRegistry().register("x", () => true);
      expect(() => registry.register("x", () => false)).toThrow('Predicate "x" is already registered');
    });
  });
});
