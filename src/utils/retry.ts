/**
 * Retry with exponential backoff
 */

export interface RetryPolicy {
  /** Total attempts, including the first */
  maxAttempts: number;
  /** Delay before the second attempt, in milliseconds */
  initialDelay: number;
  /** Upper bound for any single delay, in milliseconds */
  maxDelay: number;
}

export interface RetryOptions extends RetryPolicy {
  shouldRetry: (error: unknown) => boolean;
  sleep?: (ms: number) => Promise<void>;
  onRetry?: (error: unknown, attempt: number, delay: number) => void;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 10,
  initialDelay: 1000,
  maxDelay: 10000,
};

export function sleep(ms: number): Promise<void> {
  return new Promise((r) => setTimeout(r, ms));
}

/**
 * Delay after failed attempt `attempt` (1-based): 1s, 2s, 4s, 8s, 10s, 10s...
 */
export function backoffDelay(attempt: number, policy: RetryPolicy): number {
  return Math.min(policy.initialDelay * Math.pow(2, attempt - 1), policy.maxDelay);
}

export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  const wait = options.sleep ?? sleep;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      if (attempt >= options.maxAttempts || !options.shouldRetry(error)) {
        throw error;
      }
      const delay = backoffDelay(attempt, options);
      options.onRetry?.(error, attempt, delay);
      await wait(delay);
    }
  }
}
