/**
 * Bounded exponential backoff.
 *
 * `maxAttempts` counts every call, the first one included. Only errors the
 * caller marks retryable are retried; anything else is rethrown at once.
 */

import type { RetryPolicy } from '@/config/env';

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export interface RetryHooks {
  isRetryable: (error: unknown) => boolean;
  /** Lower bound for the next delay, e.g. from a Retry-After header. */
  delayHint?: (error: unknown) => number | undefined;
  onRetry?: (info: { attempt: number; delayMs: number; error: unknown }) => void;
  sleep?: Sleep;
}

export interface RetryOutcome<T> {
  value: T;
  attempts: number;
}

/**
 * Delay before retry number `attempt` (1-based): base * 2^(attempt-1),
 * raised to the hint and capped at maxDelayMs.
 */
export function backoffDelay(policy: RetryPolicy, attempt: number, hintMs?: number): number {
  const exponential = policy.baseDelayMs * 2 ** (attempt - 1);
  return Math.min(Math.max(exponential, hintMs ?? 0), policy.maxDelayMs);
}

export class RetryExhaustedError extends Error {
  constructor(
    readonly attempts: number,
    readonly lastError: unknown,
  ) {
    super(`Gave up after ${attempts} attempts`, { cause: lastError });
    this.name = 'RetryExhaustedError';
  }
}

/**
 * Runs `operation` until it resolves, a non-retryable error escapes, or the
 * policy runs out of attempts (RetryExhaustedError).
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  hooks: RetryHooks,
): Promise<RetryOutcome<T>> {
  const wait = hooks.sleep ?? sleep;

  for (let attempt = 1; ; attempt++) {
    try {
      return { value: await operation(attempt), attempts: attempt };
    } catch (error) {
      if (!hooks.isRetryable(error)) {
        throw error;
      }
      if (attempt >= policy.maxAttempts) {
        throw new RetryExhaustedError(attempt, error);
      }

      const delayMs = backoffDelay(policy, attempt, hooks.delayHint?.(error));
      hooks.onRetry?.({ attempt, delayMs, error });
      await wait(delayMs);
    }
  }
}
