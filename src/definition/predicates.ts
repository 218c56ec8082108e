/**
 * 内置自定义断言
 */

import { PredicateRegistry } from "../pipeline/condition.js";

/** 创建带内置断言的注册表 */
export function createDefaultPredicates(): PredicateRegistry {
  return new PredicateRegistry()
    .register("has-changed-files", (context) => context.files.length > 0)
    .register("has-design-doc", (context) => {
      const doc = context.metadata.designDocUrl;
      return typeof doc === "string" && doc.trim() !== "";
    })
    .register("author-is-bot", (context) => context.author?.endsWith("[bot]") ?? false);
}
