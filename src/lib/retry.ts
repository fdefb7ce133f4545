import { CancelledError, isTransient } from './errors';

export type RetryPolicy = {
  /** Total attempts including the first one. */
  attempts: number;
  /** Delay before attempt n+1 is `min(backoffMs * n, maxBackoffMs)`. */
  backoffMs: number;
  maxBackoffMs: number;
};

export const DEFAULT_RETRY: RetryPolicy = { attempts: 3, backoffMs: 400, maxBackoffMs: 2000 };

export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  return Math.max(0, Math.min(policy.backoffMs * attempt, policy.maxBackoffMs));
}

/**
 * Run `fn` until it succeeds, a non-transient error is thrown, or the
 * attempts run out. `fn` receives the 1-based attempt number.
 * The last error is rethrown. `onAttempt` fires before every attempt.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  {
    policy = DEFAULT_RETRY,
    signal,
    retryable = isTransient,
    onAttempt,
  }: {
    policy?: RetryPolicy;
    signal?: AbortSignal;
    retryable?: (err: unknown) => boolean;
    onAttempt?: (attempt: number) => void;
  } = {},
): Promise<T> {
  const maxAttempts = Math.max(1, policy.attempts);
  for (let i = 1; ; i += 1) {
    if (signal?.aborted) throw new CancelledError();
    onAttempt?.(i);
    try {
      return await fn(i);
    } catch (error) {
      if (signal?.aborted) throw new CancelledError();
      if (i >= maxAttempts || !retryable(error)) throw error;
      await sleep(backoffDelay(policy, i), signal);
    }
  }
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError());
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new CancelledError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
