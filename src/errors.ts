/**
 * 错误分类
 *
 * 只有 DefinitionValidationError 与 StateCorruptionError 会作为硬错误抛给触发方；
 * 任务级错误被吸收进 TaskResult.status；CAS 冲突以 PutResult 表达，由写入方重试。
 */

export type PipelineErrorCode =
  | "DEFINITION_INVALID"
  | "TASK_TIMEOUT"
  | "TASK_INVOCATION_FAILED"
  | "STATE_CORRUPTED"
  | "LEASE_DENIED"
  | "RUN_NOT_FOUND"
  | "INVALID_SIGNAL";

export abstract class PipelineError extends Error {
  abstract readonly code: PipelineErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** 定义校验问题 */
export interface DefinitionIssue {
  path: string;
  message: string;
}

export class DefinitionValidationError extends PipelineError {
  readonly code = "DEFINITION_INVALID";

  constructor(
    message: string,
    readonly issues: DefinitionIssue[],
  ) {
    super(message);
  }
}

export class TaskTimeoutError extends PipelineError {
  readonly code = "TASK_TIMEOUT";

  constructor(
    readonly taskRef: string,
    readonly timeoutMs: number,
  ) {
    super(`Task "${taskRef}" timed out after ${timeoutMs}ms`);
  }
}

export class TaskInvocationError extends PipelineError {
  readonly code = "TASK_INVOCATION_FAILED";

  constructor(
    message: string,
    readonly retryable: boolean,
    readonly statusCode?: number,
  ) {
    super(message);
  }
}

export class StateCorruptionError extends PipelineError {
  readonly code = "STATE_CORRUPTED";

  constructor(
    readonly runId: string,
    readonly detail: string,
  ) {
    super(`Run ${runId} has corrupted state: ${detail}`);
  }
}

export class LeaseDeniedError extends PipelineError {
  readonly code = "LEASE_DENIED";

  constructor(
    readonly runId: string,
    readonly holder: string,
  ) {
    super(`Run ${runId} is owned by ${holder}`);
  }
}

export class RunNotFoundError extends PipelineError {
  readonly code = "RUN_NOT_FOUND";

  constructor(readonly runId: string) {
    super(`Run ${runId} not found`);
  }
}

export class InvalidSignalError extends PipelineError {
  readonly code = "INVALID_SIGNAL";
}

/** 统一提取错误信息 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
