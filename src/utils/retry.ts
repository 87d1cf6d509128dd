/**
 * Bounded retry with linear backoff: the delay after attempt `n` is
 * `n * baseDelayMs`, capped at `maxDelayMs`. No delay follows the last
 * attempt. The sleep function is injectable so callers and tests control
 * time.
 */
export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs?: number;
  isRetryable?: (err: unknown) => boolean;
  sleep?: (ms: number) => Promise<void>;
  onRetry?: (err: unknown, attempt: number, delayMs: number) => void;
}

export class RetryExhaustedError extends Error {
  readonly attempts: number;

  constructor(attempts: number, lastError: unknown) {
    const reason = lastError instanceof Error ? lastError.message : String(lastError);
    super(`Gave up after ${attempts} attempts: ${reason}`, { cause: lastError });
    this.name = 'RetryExhaustedError';
    this.attempts = attempts;
  }
}

export const sleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

export function backoffDelay(attempt: number, policy: Pick<RetryPolicy, 'baseDelayMs' | 'maxDelayMs'>): number {
  const delay = attempt * policy.baseDelayMs;
  return policy.maxDelayMs === undefined ? delay : Math.min(delay, policy.maxDelayMs);
}

export async function withRetry<T>(fn: (attempt: number) => Promise<T>, policy: RetryPolicy): Promise<T> {
  const wait = policy.sleep ?? sleep;
  const isRetryable = policy.isRetryable ?? (() => true);
  let lastError: unknown;

  for (let attempt = 1; attempt <= policy.maxAttempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (err) {
      if (!isRetryable(err)) throw err;
      lastError = err;
      if (attempt < policy.maxAttempts) {
        const delayMs = backoffDelay(attempt, policy);
        policy.onRetry?.(err, attempt, delayMs);
        await wait(delayMs);
      }
    }
  }

  throw new RetryExhaustedError(policy.maxAttempts, lastError);
}
