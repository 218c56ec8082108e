/**
 * 流水线定义语义校验
 *
 * 在运行创建前拒绝以下定义：
 *   - 阶段 / 任务 / 补偿动作 id 重复
 *   - dependsOn 指向不存在或更晚阶段的任务，或形成环
 *   - 引用未注册的自定义断言
 *   - matches 使用非法正则
 *   - result 条件 / requiredFailureBlocks 引用未知任务
 *   - result 条件引用的任务既不在更早阶段，也不是本任务（传递）依赖的任务
 *   - 补偿动作类型没有对应执行器
 */

import type { DefinitionIssue } from "../errors.js";
import type { Condition, PipelineDefinition, TaskSpec } from "../types/index.js";
import type { PredicateRegistry } from "../pipeline/condition.js";
import { planWaves } from "../pipeline/waves.js";

/** 条件求值时保证已有结果的任务 */
interface ConditionScope {
  stageIndex: number;
  /** 任务条件：同阶段内（传递）依赖的任务；阶段条件为空 */
  dependencies: ReadonlySet<string>;
  /** 条件所属对象的描述，用于报错 */
  owner: string;
}

export interface ValidationOptions {
  predicates: PredicateRegistry;
  /** 已注册的补偿执行器类型；未提供时不检查 */
  compensationTypes?: readonly string[];
}

export function validateDefinition(def: PipelineDefinition, options: ValidationOptions): DefinitionIssue[] {
  const issues: DefinitionIssue[] = [];

  // 任务 id → 所在阶段序号
  const taskStage = new Map<string, number>();
  const stageIds = new Set<string>();

  def.stages.forEach((stage, si) => {
    if (stageIds.has(stage.id)) {
      issues.push({ path: `stages.${si}.id`, message: `duplicate stage id "${stage.id}"` });
    }
    stageIds.add(stage.id);

    stage.tasks.forEach((task, ti) => {
      if (taskStage.has(task.id)) {
        issues.push({ path: `stages.${si}.tasks.${ti}.id`, message: `duplicate task id "${task.id}"` });
      } else {
        taskStage.set(task.id, si);
      }
    });
  });

  def.stages.forEach((stage, si) => {
    checkCondition(stage.condition, `stages.${si}.condition`, options, taskStage, issues, {
      stageIndex: si,
      dependencies: new Set(),
      owner: `stage "${stage.id}"`,
    });

    stage.tasks.forEach((task, ti) => {
      const base = `stages.${si}.tasks.${ti}`;
      checkCondition(task.condition, `${base}.condition`, options, taskStage, issues, {
        stageIndex: si,
        dependencies: transitiveDependencies(stage.tasks, task),
        owner: `"${task.id}"`,
      });

      task.dependsOn.forEach((dep, di) => {
        const depStage = taskStage.get(dep);
        if (depStage === undefined) {
          issues.push({ path: `${base}.dependsOn.${di}`, message: `unknown task "${dep}"` });
        } else if (depStage > si) {
          issues.push({
            path: `${base}.dependsOn.${di}`,
            message: `task "${dep}" runs in a later stage than "${task.id}"`,
          });
        }
      });
    });

    const { cyclic } = planWaves(stage.tasks);
    if (cyclic.length > 0) {
      issues.push({
        path: `stages.${si}.tasks`,
        message: `cyclic dependsOn between tasks: ${cyclic.join(", ")}`,
      });
    }
  });

  for (const taskId of Object.keys(def.policy.requiredFailureBlocks)) {
    if (!taskStage.has(taskId)) {
      issues.push({ path: `policy.requiredFailureBlocks.${taskId}`, message: `unknown task "${taskId}"` });
    }
  }

  const actionIds = new Set<string>();
  def.compensation.forEach((action, ai) => {
    if (actionIds.has(action.id)) {
      issues.push({ path: `compensation.${ai}.id`, message: `duplicate compensation action id "${action.id}"` });
    }
    actionIds.add(action.id);
    if (options.compensationTypes && !options.compensationTypes.includes(action.type)) {
      issues.push({ path: `compensation.${ai}.type`, message: `no executor registered for "${action.type}"` });
    }
  });

  return issues;
}

function checkCondition(
  condition: Condition | undefined,
  path: string,
  options: ValidationOptions,
  taskStage: Map<string, number>,
  issues: DefinitionIssue[],
  scope: ConditionScope,
): void {
  if (!condition) return;

  switch (condition.type) {
    case "custom":
      if (!options.predicates.has(condition.name)) {
        issues.push({ path: `${path}.name`, message: `unregistered custom predicate "${condition.name}"` });
      }
      return;
    case "result": {
      const target = taskStage.get(condition.taskId);
      if (target === undefined) {
        issues.push({ path: `${path}.taskId`, message: `unknown task "${condition.taskId}"` });
      } else if (target >= scope.stageIndex && !scope.dependencies.has(condition.taskId)) {
        issues.push({
          path: `${path}.taskId`,
          message: `task "${condition.taskId}" is not an earlier stage task or a dependency of ${scope.owner}`,
        });
      }
      checkOperand(condition.operator, condition.value, path, issues);
      return;
    }
    case "field":
      checkOperand(condition.operator, condition.value, path, issues);
      return;
    default:
      return;
  }
}

/** 同阶段内 task 直接或间接依赖的任务 id */
function transitiveDependencies(tasks: readonly TaskSpec[], task: TaskSpec): Set<string> {
  const byId = new Map(tasks.map((t) => [t.id, t]));
  const seen = new Set<string>();
  const stack = [...task.dependsOn];
  while (stack.length > 0) {
    const id = stack.pop();
    if (id === undefined || seen.has(id) || id === task.id) continue;
    seen.add(id);
    stack.push(...(byId.get(id)?.dependsOn ?? []));
  }
  return seen;
}

function checkOperand(operator: string, value: unknown, path: string, issues: DefinitionIssue[]): void {
  if (operator === "exists" || operator === "not_exists") return;
  if (value === undefined) {
    issues.push({ path: `${path}.value`, message: `operator "${operator}" requires a value` });
    return;
  }
  if (operator !== "matches") return;
  if (typeof value !== "string") {
    issues.push({ path: `${path}.value`, message: "matches requires a string pattern" });
    return;
  }
  try {
    new RegExp(value);
  } catch (err) {
    issues.push({ path: `${path}.value`, message: `invalid regular expression: ${err instanceof Error ? err.message : String(err)}` });
  }
}
