import { AbortError } from "./errors.js";

export const delayWithAbort = (ms: number, signal?: AbortSignal) =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) return reject(new AbortError());
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    const onAbort = () => {
      clearTimeout(timer);
      reject(new AbortError());
    };
    signal?.addEventListener("abort", onAbort, { once: true });
  });

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
}

export type RunWithRetryParams<T> = RetryPolicy & {
  runStep: (attempt: number) => Promise<T>;
  isRetryableError: (err: unknown) => boolean;
  signal?: AbortSignal;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  onRetry?: (params: {
    attempt: number;
    maxAttempts: number;
    error: unknown;
    delayMs: number;
  }) => void;
};

/**
 * Bounded attempt loop with exponential backoff (`baseDelayMs * 2^(n-1)`).
 * Non-retryable errors and the last failure are rethrown as-is.
 */
export async function runWithRetry<T>(params: RunWithRetryParams<T>): Promise<T> {
  const maxAttempts = Math.max(1, params.maxAttempts);
  const sleep = params.sleep ?? delayWithAbort;

  for (let attempt = 1; ; attempt++) {
    if (params.signal?.aborted) throw new AbortError();

    try {
      return await params.runStep(attempt);
    } catch (err) {
      if (err instanceof AbortError) throw err;
      if (!params.isRetryableError(err) || attempt >= maxAttempts) throw err;

      const delayMs = params.baseDelayMs * 2 ** (attempt - 1);
      params.onRetry?.({ attempt, maxAttempts, error: err, delayMs });
      await sleep(delayMs, params.signal);
    }
  }
}

export class TimeoutError extends Error {
  readonly timeoutMs: number;
  constructor(timeoutMs: number) {
    super(`timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Runs `fn` with a signal that aborts after `timeoutMs` or when `parent`
 * aborts. A fired timeout surfaces as `TimeoutError`, a parent abort as
 * `AbortError`, whatever `fn` itself threw.
 */
export async function withTimeout<T>(
  timeoutMs: number,
  parent: AbortSignal | undefined,
  fn: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
  if (parent?.aborted) throw new AbortError();

  const controller = new AbortController();
  let timedOut = false;
  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, timeoutMs);
  const onParentAbort = () => controller.abort();
  parent?.addEventListener("abort", onParentAbort, { once: true });

  try {
    return await fn(controller.signal);
  } catch (err) {
    if (parent?.aborted) throw new AbortError();
    if (timedOut) throw new TimeoutError(timeoutMs);
    throw err;
  } finally {
    clearTimeout(timer);
    parent?.removeEventListener("abort", onParentAbort);
  }
}
