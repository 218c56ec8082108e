/**
 * 流水线定义加载 — JSON / YAML 文件 → 校验 → 冻结
 */

import fs from "node:fs";
import path from "node:path";
import YAML from "yaml";
import { DefinitionValidationError, errorMessage } from "../errors.js";
import type { PipelineDefinition } from "../types/index.js";
import { PipelineDefinitionSchema, toIssues } from "./schema.js";
import { validateDefinition, type ValidationOptions } from "./validator.js";

export const DEFINITION_EXTENSIONS = [".json", ".yaml", ".yml"];

/** 递归冻结，定义加载后即不可变 */
export function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

/** 校验原始文档并返回不可变定义 */
export function parseDefinition(raw: unknown, options: ValidationOptions): PipelineDefinition {
  const parsed = PipelineDefinitionSchema.safeParse(raw);
  if (!parsed.success) {
    throw new DefinitionValidationError("Pipeline definition is malformed", toIssues(parsed.error));
  }

  const definition = parsed.data;
  const issues = validateDefinition(definition, options);
  if (issues.length > 0) {
    throw new DefinitionValidationError(
      `Pipeline definition "${definition.name}@${definition.version}" is invalid`,
      issues,
    );
  }
  return deepFreeze(definition);
}

/** 从文件加载定义（按扩展名选择解析器） */
export function loadDefinitionFile(filePath: string, options: ValidationOptions): PipelineDefinition {
  const ext = path.extname(filePath).toLowerCase();
  if (!DEFINITION_EXTENSIONS.includes(ext)) {
    throw new DefinitionValidationError(`Unsupported definition file: ${filePath}`, [
      { path: "", message: `expected one of ${DEFINITION_EXTENSIONS.join(", ")}` },
    ]);
  }

  const text = fs.readFileSync(filePath, "utf-8");
  let raw: unknown;
  try {
    raw = ext === ".json" ? JSON.parse(text) : YAML.parse(text);
  } catch (err) {
    throw new DefinitionValidationError(`Cannot parse ${filePath}`, [{ path: "", message: errorMessage(err) }]);
  }
  return parseDefinition(raw, options);
}
