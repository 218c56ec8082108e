/**
 * 条件求值 — 纯函数，决定阶段 / 任务是否执行
 *
 * - field：对运行上下文按点分路径取值；路径不存在时为 false（not_exists 除外）
 * - result：对已产出的任务结果取值；任务被跳过或尚未执行时一律为 false
 * - custom：按名称从注册表解析，定义中不允许内联函数
 *
 * 类型不匹配只记 warning 并返回 false，从不抛出。
 */

import { isDeepStrictEqual } from "node:util";
import pino from "pino";
import type { Condition, ConditionOperator, RunContext, TaskResult } from "../types/index.js";
import { isSeverity, severityRank } from "./severity.js";

const logger = pino({ name: "condition" });

/** 自定义断言签名 */
export type CustomPredicate = (
  context: Readonly<RunContext>,
  results: Readonly<Record<string, TaskResult>>,
) => boolean;

/** 告警输出 */
export type WarningSink = (message: string, detail: Record<string, unknown>) => void;

/** 自定义断言注册表（固定集合，按名称解析） */
export class PredicateRegistry {
  private predicates = new Map<string, CustomPredicate>();

  register(name: string, predicate: CustomPredicate): this {
    if (this.predicates.has(name)) {
      throw new Error(`Predicate "${name}" is already registered`);
    }
    this.predicates.set(name, predicate);
    return this;
  }

  has(name: string): boolean {
    return this.predicates.has(name);
  }

  get(name: string): CustomPredicate | undefined {
    return this.predicates.get(name);
  }

  names(): string[] {
    return [...this.predicates.keys()].sort();
  }
}

interface Resolved {
  found: boolean;
  value: unknown;
}

/** 按点分路径取值，仅访问自有属性 */
export function resolvePath(root: unknown, path: string): Resolved {
  let current: unknown = root;
  for (const segment of path.split(".")) {
    if (typeof current !== "object" || current === null || !Object.hasOwn(current, segment)) {
      return { found: false, value: undefined };
    }
    current = Reflect.get(current, segment);
  }
  return { found: current !== undefined, value: current };
}

function describe(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
}

export class ConditionEvaluator {
  private readonly warn: WarningSink;

  constructor(
    private readonly registry: PredicateRegistry,
    warn?: WarningSink,
  ) {
    this.warn = warn ?? ((message, detail) => logger.warn(detail, message));
  }

  /** 未声明条件视为恒真 */
  evaluate(
    condition: Condition | undefined,
    context: Readonly<RunContext>,
    results: Readonly<Record<string, TaskResult>>,
  ): boolean {
    if (!condition) return true;

    switch (condition.type) {
      case "always":
        return true;
      case "never":
        return false;
      case "field":
        return this.compare(resolvePath(context, condition.path), condition.operator, condition.value, condition.path);
      case "result": {
        const result = Object.hasOwn(results, condition.taskId) ? results[condition.taskId] : undefined;
        // 缺少证据按「条件不满足」处理
        if (!result || result.status === "SKIPPED") return false;
        const resolved = resolvePath(result, condition.field);
        const label = `${condition.taskId}.${condition.field}`;
        if (condition.field === "severity" && resolved.found) {
          return this.compareSeverity(resolved.value, condition.operator, condition.value, label);
        }
        return this.compare(resolved, condition.operator, condition.value, label);
      }
      case "custom":
        return this.evaluateCustom(condition.name, context, results);
    }
  }

  private evaluateCustom(
    name: string,
    context: Readonly<RunContext>,
    results: Readonly<Record<string, TaskResult>>,
  ): boolean {
    const predicate = this.registry.get(name);
    if (!predicate) {
      this.warn("Custom predicate is not registered", { predicate: name });
      return false;
    }
    try {
      return predicate(context, results) === true;
    } catch (err) {
      this.warn("Custom predicate threw", { predicate: name, err });
      return false;
    }
  }

  private compareSeverity(actual: unknown, operator: ConditionOperator, expected: unknown, label: string): boolean {
    if (operator === "exists") return true;
    if (operator === "not_exists") return false;
    if (!isSeverity(actual) || !isSeverity(expected)) {
      return this.compare({ found: true, value: actual }, operator, expected, label);
    }
    const diff = severityRank(actual) - severityRank(expected);
    switch (operator) {
      case "eq":
        return diff === 0;
      case "ne":
        return diff !== 0;
      case "gt":
        return diff > 0;
      case "lt":
        return diff < 0;
      default:
        return this.compare({ found: true, value: actual }, operator, expected, label);
    }
  }

  private compare(resolved: Resolved, operator: ConditionOperator, expected: unknown, label: string): boolean {
    if (operator === "not_exists") return !resolved.found;
    if (operator === "exists") return resolved.found;
    if (!resolved.found) return false;

    const actual = resolved.value;
    const mismatch = (): false => {
      this.warn("Condition operand type mismatch", {
        operand: label,
        operator,
        actualType: describe(actual),
        expectedType: describe(expected),
      });
      return false;
    };

    switch (operator) {
      case "eq":
      case "ne": {
        if (describe(actual) !== describe(expected)) return mismatch();
        const equal = isDeepStrictEqual(actual, expected);
        return operator === "eq" ? equal : !equal;
      }
      case "gt":
      case "lt": {
        if (typeof actual === "number" && typeof expected === "number") {
          return operator === "gt" ? actual > expected : actual < expected;
        }
        if (typeof actual === "string" && typeof expected === "string") {
          return operator === "gt" ? actual > expected : actual < expected;
        }
        return mismatch();
      }
      case "contains": {
        if (Array.isArray(actual)) {
          return actual.some((item) => isDeepStrictEqual(item, expected));
        }
        if (typeof actual === "string" && typeof expected === "string") {
          return actual.includes(expected);
        }
        return mismatch();
      }
      case "matches": {
        if (typeof actual !== "string" || typeof expected !== "string") return mismatch();
        try {
          return new RegExp(expected).test(actual);
        } catch (err) {
          this.warn("Invalid regular expression in condition", { operand: label, pattern: expected, err });
          return false;
        }
      }
    }
  }
}
