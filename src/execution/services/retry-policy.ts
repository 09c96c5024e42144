import type { RetryPolicy } from '../types/execution.types.js';

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 500,
  maxDelayMs: 5000,
  multiplier: 2,
  attemptTimeoutMs: 5000,
};

export class AttemptTimeoutError extends Error {
  constructor(public readonly timeoutMs: number) {
    super(`Attempt did not settle within ${timeoutMs}ms`);
    this.name = 'AttemptTimeoutError';
  }
}

/**
 * Delay before retrying after the given (1-based) failed attempt.
 */
export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  const delay = policy.baseDelayMs * Math.pow(policy.multiplier, attempt - 1);
  return Math.min(delay, policy.maxDelayMs);
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Races `promise` against a timer. The timer is cleared once either side
 * settles; the losing promise keeps running and is left to `onLateSettle`.
 */
export function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  onLateSettle?: (outcome: PromiseSettledResult<T>) => void
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  let timedOut = false;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      timedOut = true;
      reject(new AttemptTimeoutError(timeoutMs));
    }, timeoutMs);
  });

  void promise.then(
    value => {
      if (timedOut) onLateSettle?.({ status: 'fulfilled', value });
    },
    (reason: unknown) => {
      if (timedOut) onLateSettle?.({ status: 'rejected', reason });
    }
  );

  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

export function validateRetryPolicy(policy: RetryPolicy): string[] {
  const issues: string[] = [];
  if (!Number.isInteger(policy.maxAttempts) || policy.maxAttempts < 1) {
    issues.push('maxAttempts must be a positive integer');
  }
  if (policy.baseDelayMs < 0) issues.push('baseDelayMs must not be negative');
  if (policy.maxDelayMs < policy.baseDelayMs) issues.push('maxDelayMs must be at least baseDelayMs');
  if (policy.multiplier < 1) issues.push('multiplier must be at least 1');
  if (policy.attemptTimeoutMs <= 0) issues.push('attemptTimeoutMs must be positive');
  return issues;
}
