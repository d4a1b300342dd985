import { CallTimeoutError } from './errors.js';

/**
 * Shape shared by LLM call retries and sink write retries.
 * Delay before retry n (0-based) is `min(maxDelayMs, baseDelayMs * backoffFactor ** n)` plus up to `jitterMs`.
 */
export interface RetryPolicy {
  maxAttempts: number;
  backoffFactor: number;
  baseDelayMs: number;
  maxDelayMs: number;
  jitterMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  backoffFactor: 2,
  baseDelayMs: 500,
  maxDelayMs: 10_000,
  jitterMs: 250,
};

export function computeBackoffDelay(policy: RetryPolicy, retryIndex: number, random: () => number = Math.random): number {
  const exponential = Math.min(policy.maxDelayMs, policy.baseDelayMs * policy.backoffFactor ** retryIndex);
  const jitter = policy.jitterMs > 0 ? Math.floor(random() * policy.jitterMs) : 0;
  return exponential + jitter;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export interface RetryNotice {
  /** Attempts made so far. */
  attempt: number;
  delayMs: number;
  error: unknown;
}

export interface RetryOptions {
  policy: RetryPolicy;
  isRetryable: (error: unknown) => boolean;
  /** Server-requested minimum wait, e.g. from a Retry-After header. */
  retryAfterMs?: (error: unknown) => number | undefined;
  onRetry?: (notice: RetryNotice) => void;
  signal?: AbortSignal;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

export type RetryOutcome<T> = { ok: true; value: T; attempts: number } | { ok: false; error: unknown; attempts: number };

/**
 * Explicit bounded retry loop. Never throws: the last error comes back in the outcome.
 */
export async function retryWithBackoff<T>(fn: (attempt: number) => Promise<T>, options: RetryOptions): Promise<RetryOutcome<T>> {
  const wait = options.sleep ?? sleep;
  const maxAttempts = Math.max(1, options.policy.maxAttempts);
  let attempt = 0;

  while (true) {
    try {
      const value = await fn(attempt);
      return { ok: true, value, attempts: attempt + 1 };
    } catch (error) {
      attempt += 1;

      if (attempt >= maxAttempts || !options.isRetryable(error) || options.signal?.aborted) {
        return { ok: false, error, attempts: attempt };
      }

      const backoff = computeBackoffDelay(options.policy, attempt - 1, options.random);
      const requested = Math.min(options.retryAfterMs?.(error) ?? 0, options.policy.maxDelayMs);
      const delayMs = Math.max(backoff, requested);
      options.onRetry?.({ attempt, delayMs, error });
      await wait(delayMs);
    }
  }
}

/**
 * Run `fn` with an abort signal that fires after `timeoutMs`. The returned
 * promise rejects with CallTimeoutError at the deadline even if `fn` ignores the signal.
 */
export async function callWithTimeout<T>(fn: (signal: AbortSignal) => Promise<T>, timeoutMs: number): Promise<T> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;

  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new CallTimeoutError(timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([fn(controller.signal), deadline]);
  } finally {
    clearTimeout(timer);
  }
}
