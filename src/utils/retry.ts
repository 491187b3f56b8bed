import { sleep as defaultSleep } from "./time";

export interface RetryPolicy {
  attempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  factor: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  attempts: 3,
  baseDelayMs: 500,
  maxDelayMs: 8000,
  factor: 2
};

export interface RetryOptions {
  isRetryable: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  sleep?: (ms: number) => Promise<void>;
}

export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  const delay = policy.baseDelayMs * Math.pow(policy.factor, attempt - 1);
  return Math.min(delay, policy.maxDelayMs);
}

/**
 * Runs `operation` up to `policy.attempts` times. The last error is rethrown
 * once attempts are exhausted or as soon as an error is not retryable.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  options: RetryOptions
): Promise<T> {
  const sleep = options.sleep ?? defaultSleep;
  const attempts = Math.max(1, policy.attempts);
  for (let attempt = 1; ; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      if (attempt >= attempts || !options.isRetryable(error)) {
        throw error;
      }
      const delayMs = backoffDelay(policy, attempt);
      options.onRetry?.(error, attempt, delayMs);
      await sleep(delayMs);
    }
  }
}
