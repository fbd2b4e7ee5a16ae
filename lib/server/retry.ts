export type RetryPolicy = {
  maxAttempts: number;
  baseDelayMs: number;
  multiplier: number;
  maxDelayMs: number;
};

export type Sleep = (ms: number) => Promise<void>;

export const DEFAULT_FETCH_RETRY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 500,
  multiplier: 2,
  maxDelayMs: 5_000,
};

export const DEFAULT_NOTIFY_RETRY: RetryPolicy = {
  maxAttempts: 4,
  baseDelayMs: 1_000,
  multiplier: 2,
  maxDelayMs: 15_000,
};

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, Math.max(0, ms)));
}

/** Delay before retry number `attempt` (1-based count of failures so far). */
export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  const raw = policy.baseDelayMs * Math.pow(policy.multiplier, Math.max(0, attempt - 1));
  return Math.min(raw, policy.maxDelayMs);
}

export type RetryOutcome<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; error: unknown; attempts: number };

/**
 * Runs `fn` until it succeeds, `isRetryable` rejects the error, or attempts run out.
 * Never throws; the last error is returned to the caller.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  opts: {
    policy: RetryPolicy;
    isRetryable: (err: unknown) => boolean;
    sleep?: Sleep;
    onRetry?: (info: { attempt: number; delayMs: number; error: unknown }) => void;
  },
): Promise<RetryOutcome<T>> {
  const wait = opts.sleep ?? sleep;
  const maxAttempts = Math.max(1, Math.floor(opts.policy.maxAttempts));
  let lastError: unknown = null;

  for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
    try {
      return { ok: true, value: await fn(attempt), attempts: attempt };
    } catch (err) {
      lastError = err;
      if (attempt === maxAttempts || !opts.isRetryable(err)) {
        return { ok: false, error: err, attempts: attempt };
      }
      const delayMs = backoffDelay(opts.policy, attempt);
      opts.onRetry?.({ attempt, delayMs, error: err });
      await wait(delayMs);
    }
  }

  return { ok: false, error: lastError, attempts: maxAttempts };
}
