/**
 * 依赖分层 — 按 dependsOn 把阶段内任务拆成若干波次
 *
 * 同一波次内的任务互不依赖，保持声明顺序；
 * 指向阶段外（更早阶段）的依赖在进入本阶段前已满足，这里忽略。
 */

import type { TaskSpec } from "../types/index.js";

export interface WavePlan {
  waves: TaskSpec[][];
  /** 形成环而无法排入任何波次的任务 */
  cyclic: string[];
}

export function planWaves(tasks: readonly TaskSpec[]): WavePlan {
  const local = new Set(tasks.map((t) => t.id));
  const pending = new Map<string, Set<string>>();
  for (const task of tasks) {
    pending.set(task.id, new Set(task.dependsOn.filter((dep) => local.has(dep))));
  }

  const waves: TaskSpec[][] = [];
  let remaining = [...tasks];

  while (remaining.length > 0) {
    const ready = remaining.filter((t) => pending.get(t.id)?.size === 0);
    if (ready.length === 0) {
      return { waves, cyclic: remaining.map((t) => t.id) };
    }
    waves.push(ready);
    const done = new Set(ready.map((t) => t.id));
    remaining = remaining.filter((t) => !done.has(t.id));
    for (const deps of pending.values()) {
      for (const id of done) deps.delete(id);
    }
  }

  return { waves, cyclic: [] };
}
