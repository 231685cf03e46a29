import { describe, expect, it } from 'vitest';

import { jitteredDelay, withRetry, type RetryEvent } from '../src/crawler/retry/withRetry.js';

class Flaky extends Error {
  constructor(readonly retryable: boolean) {
    super(retryable ? 'temporary' : 'permanent');
  }
}

function options(sleeps: number[], overrides: { maxRetries?: number; onRetry?(event: RetryEvent): void } = {}) {
  return {
    maxRetries: overrides.maxRetries ?? 3,
    baseDelayMs: 100,
    backoffFactor: 2,
    jitter: 0.5,
    random: () => 0.5,
    sleep: async (ms: number) => {
      sleeps.push(ms);
    },
    isRetryable: (error: unknown) => error instanceof Flaky && error.retryable,
    onRetry: overrides.onRetry,
  };
}

describe('withRetry', () => {
  it('retries retryable failures with exponential backoff', async () => {
    const sleeps: number[] = [];
    const attempts: number[] = [];

    const result = await withRetry(async (attempt) => {
      attempts.push(attempt);
      if (attempt < 2) {
        throw new Flaky(true);
      }
      return 'done';
    }, options(sleeps));

    expect(result).toBe('done');
    expect(attempts).toEqual([0, 1, 2]);
    expect(sleeps).toEqual([100, 200]);
  });

  it('makes maxRetries + 1 attempts and rethrows the last failure', async () => {
    const sleeps: number[] = [];
    const failures: Flaky[] = [];

    const run = withRetry(async () => {
      const failure = new Flaky(true);
      failures.push(failure);
      throw failure;
    }, options(sleeps, { maxRetries: 2 }));

    await expect(run).rejects.toBeInstanceOf(Flaky);
    expect(failures).toHaveLength(3);
    await run.catch((error: unknown) => {
      expect(error).toBe(failures[2]);
    });
    expect(sleeps).toEqual([100, 200]);
  });

  it('propagates non-retryable failures immediately without sleeping', async () => {
    const sleeps: number[] = [];
    let calls = 0;

    await expect(
      withRetry(async () => {
        calls += 1;
        throw new Flaky(false);
      }, options(sleeps)),
    ).rejects.toThrow('permanent');

    expect(calls).toBe(1);
    expect(sleeps).toEqual([]);
  });

  it('reports each scheduled retry', async () => {
    const events: RetryEvent[] = [];

    await withRetry(async (attempt) => {
      if (attempt === 0) {
        throw new Flaky(true);
      }
      return attempt;
    }, options([], { onRetry: (event) => events.push(event) }));

    expect(events).toHaveLength(1);
    expect(events[0]).toMatchObject({ attempt: 0, delayMs: 100 });
  });
});

describe('jitteredDelay', () => {
  it('spreads the delay by up to the jitter fraction in both directions', () => {
    expect(jitteredDelay(100, 0.5, () => 0)).toBe(50);
    expect(jitteredDelay(100, 0.5, () => 1)).toBe(150);
    expect(jitteredDelay(100, 0, () => 0.9)).toBe(100);
  });

  it('never goes below zero', () => {
    expect(jitteredDelay(100, 1, () => 0)).toBe(0);
  });
});
