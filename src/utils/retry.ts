export type RetryOptions<T> = {
  /** Total attempts including the first one. */
  maxAttempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  /** Decide from a resolved value whether it counts as a retryable failure. */
  retryOn?: (value: T) => boolean;
  /** Decide whether a thrown error is worth another attempt. Defaults to always. */
  shouldRetry?: (err: unknown) => boolean;
  onRetry?: (info: { attempt: number; delayMs: number; reason: unknown }) => void | Promise<void>;
  signal?: AbortSignal;
};

const DEFAULTS = {
  maxAttempts: 3,
  baseDelayMs: 500,
  maxDelayMs: 10_000,
};

export function backoffDelay(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
  return Math.min(baseDelayMs * 2 ** (attempt - 1), maxDelayMs);
}

/** Resolves after `ms`, or early when the signal aborts. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

export async function withRetry<T>(fn: (attempt: number) => Promise<T>, opts?: RetryOptions<T>): Promise<T> {
  const maxAttempts = opts?.maxAttempts ?? DEFAULTS.maxAttempts;
  const baseDelayMs = opts?.baseDelayMs ?? DEFAULTS.baseDelayMs;
  const maxDelayMs = opts?.maxDelayMs ?? DEFAULTS.maxDelayMs;

  let lastError: unknown;
  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    let reason: unknown;
    try {
      const value = await fn(attempt);
      if (attempt === maxAttempts || !opts?.retryOn?.(value) || opts?.signal?.aborted) return value;
      reason = value;
    } catch (err) {
      lastError = err;
      if (attempt === maxAttempts || opts?.shouldRetry?.(err) === false || opts?.signal?.aborted) break;
      reason = err;
    }
    const delayMs = backoffDelay(attempt, baseDelayMs, maxDelayMs);
    await opts?.onRetry?.({ attempt, delayMs, reason });
    await sleep(delayMs, opts?.signal);
  }
  throw lastError;
}
