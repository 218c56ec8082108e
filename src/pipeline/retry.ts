/**
 * 重试策略 — 指数退避
 */

export interface RetryOptions {
  maxRetries: number;
  baseDelay?: number;
  maxDelay?: number;
  /** 返回 false 时立即放弃，不再重试 */
  shouldRetry?: (err: Error) => boolean;
  onRetry?: (err: Error, attempt: number, delay: number) => void;
  /** 中止后不再发起新的尝试 */
  signal?: AbortSignal;
}

const DEFAULT_BASE_DELAY = 1000;
const DEFAULT_MAX_DELAY = 30_000;

/** 计算指数退避延迟 */
export function getRetryDelay(attempt: number, options?: Pick<RetryOptions, "baseDelay" | "maxDelay">): number {
  const base = options?.baseDelay ?? DEFAULT_BASE_DELAY;
  const max = options?.maxDelay ?? DEFAULT_MAX_DELAY;
  // 指数退避 + 随机抖动
  const delay = Math.min(base * Math.pow(2, attempt), max);
  const jitter = delay * 0.1 * Math.random();
  return delay + jitter;
}

/** 等待指定毫秒；signal 中止时立即以中止原因拒绝 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortReason(signal));
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(abortReason(signal));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

function abortReason(signal?: AbortSignal): Error {
  const reason: unknown = signal?.reason;
  return reason instanceof Error ? reason : new Error("aborted");
}

/** 带重试的执行，fn 收到从 0 开始的尝试序号 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  let lastError: Error | undefined;

  for (let attempt = 0; attempt <= options.maxRetries; attempt++) {
    if (options.signal?.aborted) {
      throw lastError ?? abortReason(options.signal);
    }
    try {
      return await fn(attempt);
    } catch (err) {
      lastError = err instanceof Error ? err : new Error(String(err));
      const retryable = options.shouldRetry?.(lastError) ?? true;
      if (!retryable || options.signal?.aborted || attempt >= options.maxRetries) {
        break;
      }
      const delay = getRetryDelay(attempt, options);
      options.onRetry?.(lastError, attempt + 1, delay);
      // 退避期间被中止：保留最后一次失败，不再发起新的尝试
      const slept = await sleep(delay, options.signal).then(
        () => true,
        () => false,
      );
      if (!slept) break;
    }
  }

  throw lastError;
}
