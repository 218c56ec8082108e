/**
 * 流水线定义注册表 — 以 name@version 为键，版本一经注册不可改写
 */

import fs from "node:fs";
import path from "node:path";
import { isDeepStrictEqual } from "node:util";
import pino from "pino";
import { DefinitionValidationError } from "../errors.js";
import type { PipelineDefinition, PipelineRef } from "../types/index.js";
import { DEFINITION_EXTENSIONS, loadDefinitionFile, parseDefinition } from "./loader.js";
import type { ValidationOptions } from "./validator.js";

const logger = pino({ name: "pipeline-registry" });

/** 定义摘要 */
export interface PipelineSummary {
  name: string;
  version: number;
  description?: string;
  stages: string[];
}

function keyOf(ref: PipelineRef): string {
  return `${ref.name}@${ref.version}`;
}

export class PipelineRegistry {
  private definitions = new Map<string, PipelineDefinition>();

  constructor(private readonly options: ValidationOptions) {}

  /** 注册已校验的定义；同版本内容不同则拒绝 */
  register(definition: PipelineDefinition): PipelineDefinition {
    const key = keyOf(definition);
    const existing = this.definitions.get(key);
    if (existing) {
      if (!isDeepStrictEqual(existing, definition)) {
        throw new DefinitionValidationError(`Pipeline ${key} is already registered with different content`, [
          { path: "version", message: "published versions are immutable; bump the version" },
        ]);
      }
      return existing;
    }
    this.definitions.set(key, definition);
    return definition;
  }

  /** 校验并注册原始文档 */
  registerRaw(raw: unknown): PipelineDefinition {
    return this.register(parseDefinition(raw, this.options));
  }

  /** 加载目录下所有定义文件 */
  loadDirectory(dir: string): PipelineDefinition[] {
    if (!fs.existsSync(dir)) {
      logger.warn({ dir }, "Pipeline directory not found");
      return [];
    }
    const files = fs
      .readdirSync(dir)
      .filter((f) => DEFINITION_EXTENSIONS.includes(path.extname(f).toLowerCase()))
      .sort();

    return files.map((file) => {
      const definition = this.register(loadDefinitionFile(path.join(dir, file), this.options));
      logger.info({ file, pipeline: keyOf(definition) }, "Pipeline definition loaded");
      return definition;
    });
  }

  /** 解析引用："name@version" 精确匹配，"name" 取最高版本 */
  resolve(ref: string): PipelineDefinition {
    const at = ref.lastIndexOf("@");
    if (at > 0) {
      const version = Number(ref.slice(at + 1));
      const found = Number.isInteger(version) ? this.get({ name: ref.slice(0, at), version }) : undefined;
      if (found) return found;
    } else {
      const latest = this.versionsOf(ref).at(-1);
      if (latest) return latest;
    }
    throw new DefinitionValidationError(`Unknown pipeline "${ref}"`, [
      { path: "pipeline", message: `no definition registered for "${ref}"` },
    ]);
  }

  get(ref: PipelineRef): PipelineDefinition | undefined {
    return this.definitions.get(keyOf(ref));
  }

  list(): PipelineSummary[] {
    return [...this.definitions.values()]
      .sort((a, b) => a.name.localeCompare(b.name) || a.version - b.version)
      .map((d) => ({
        name: d.name,
        version: d.version,
        description: d.description,
        stages: d.stages.map((s) => s.id),
      }));
  }

  private versionsOf(name: string): PipelineDefinition[] {
    return [...this.definitions.values()].filter((d) => d.name === name).sort((a, b) => a.version - b.version);
  }
}
