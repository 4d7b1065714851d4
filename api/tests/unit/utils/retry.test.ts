import { describe, it, expect, vi } from 'vitest';
import { RetryExhaustedError, backoffDelay, withRetry } from '@/utils/retry';

const policy = { maxAttempts: 4, baseDelayMs: 100, maxDelayMs: 500 };

class Throttled extends Error {
  constructor(readonly hintMs?: number) {
    super('throttled');
  }
}

describe('backoffDelay', () => {
  it('should double the delay on each retry', () => {
    expect([1, 2, 3].map((attempt) => backoffDelay(policy, attempt))).toEqual([100, 200, 400]);
  });

  it('should cap the delay at maxDelayMs', () => {
    expect(backoffDelay(policy, 4)).toBe(500);
    expect(backoffDelay(policy, 10)).toBe(500);
  });

  it('should honour a larger hint within the cap', () => {
    expect(backoffDelay(policy, 1, 300)).toBe(300);
    expect(backoffDelay(policy, 1, 50)).toBe(100);
    expect(backoffDelay(policy, 1, 5_000)).toBe(500);
  });
});

describe('withRetry', () => {
  it('should return the first successful value with the attempt count', async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    let calls = 0;

    const outcome = await withRetry(
      async () => {
        calls++;
        if (calls < 3) throw new Throttled();
        return 'done';
      },
      policy,
      { isRetryable: (e) => e instanceof Throttled, sleep },
    );

    expect(outcome).toEqual({ value: 'done', attempts: 3 });
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([100, 200]);
  });

  it('should rethrow non-retryable errors without waiting', async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    const boom = new Error('boom');

    await expect(
      withRetry(
        async () => {
          throw boom;
        },
        policy,
        { isRetryable: (e) => e instanceof Throttled, sleep },
      ),
    ).rejects.toBe(boom);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('should give up after maxAttempts with the last error attached', async () => {
    const last = new Throttled();
    const operation = vi.fn(async (attempt: number) => {
      throw attempt === policy.maxAttempts ? last : new Throttled();
    });

    const error = await withRetry(operation, policy, {
      isRetryable: (e) => e instanceof Throttled,
      sleep: async () => {},
    }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RetryExhaustedError);
    expect(error).toMatchObject({ attempts: 4, lastError: last });
    expect(operation).toHaveBeenCalledTimes(4);
  });

  it('should use the error hint and report each retry', async () => {
    const onRetry = vi.fn();
    let calls = 0;

    await withRetry(
      async () => {
        calls++;
        if (calls === 1) throw new Throttled(350);
        return calls;
      },
      policy,
      {
        isRetryable: (e) => e instanceof Throttled,
        delayHint: (e) => (e instanceof Throttled ? e.hintMs : undefined),
        onRetry,
        sleep: async () => {},
      },
    );

    expect(onRetry).toHaveBeenCalledTimes(1);
    expect(onRetry.mock.calls[0][0]).toMatchObject({ attempt: 1, delayMs: 350 });
  });
});
