export interface RetryOptions {
  maxRetries: number;
  baseDelayMs: number;
  backoffFactor: number;
  jitter: number;
  isRetryable(error: unknown): boolean;
  onRetry?(event: RetryEvent): void;
  sleep?(ms: number): Promise<void>;
  random?(): number;
}

export interface RetryEvent {
  attempt: number;
  delayMs: number;
  error: unknown;
}

/**
 * Runs `operation` up to `maxRetries + 1` times. Only failures accepted by
 * `isRetryable` are retried; the last failure is rethrown unchanged.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  const sleep = options.sleep ?? delay;
  const random = options.random ?? Math.random;
  let nextDelayMs = options.baseDelayMs;

  for (let attempt = 0; ; attempt += 1) {
    try {
      return await operation(attempt);
    } catch (error) {
      if (attempt >= options.maxRetries || !options.isRetryable(error)) {
        throw error;
      }

      const delayMs = jitteredDelay(nextDelayMs, options.jitter, random);
      options.onRetry?.({ attempt, delayMs, error });
      await sleep(delayMs);
      nextDelayMs *= options.backoffFactor;
    }
  }
}

export function jitteredDelay(delayMs: number, jitter: number, random: () => number): number {
  const spread = (random() * 2 - 1) * jitter;
  return Math.max(0, delayMs * (1 + spread));
}

export async function delay(ms: number): Promise<void> {
  await new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
}
