import pLimit from 'p-limit';

import { delay } from '../retry/withRetry.js';

export interface DomainThrottleOptions {
  minDelayMs: number;
  maxDelayMs: number;
  maxConcurrentPerDomain: number;
  now?(): number;
  sleep?(ms: number): Promise<void>;
  random?(): number;
}

export interface AcquireOptions {
  /** Lower bound on the delay before this dispatch, such as a robots.txt Crawl-delay. */
  minDelayMs?: number;
}

export interface DomainPermit {
  readonly key: string;
  release(): void;
}

interface DomainState {
  readonly permits: ReturnType<typeof pLimit>;
  readonly bookkeeping: ReturnType<typeof pLimit>;
  lastDispatch: number;
}

class HeldPermit implements DomainPermit {
  private released = false;

  constructor(
    readonly key: string,
    private readonly onRelease: () => void,
  ) {}

  release(): void {
    if (this.released) {
      return;
    }
    this.released = true;
    this.onRelease();
  }
}

/**
 * Per-domain politeness: a permit limiter bounds in-flight operations and a
 * single-slot limiter serialises the delay bookkeeping. The bookkeeping slot
 * is released before the caller performs any network work.
 */
export class DomainThrottle {
  private readonly states = new Map<string, DomainState>();
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly random: () => number;

  constructor(private readonly options: DomainThrottleOptions) {
    this.now = options.now ?? (() => performance.now());
    this.sleep = options.sleep ?? delay;
    this.random = options.random ?? Math.random;
  }

  get trackedDomains(): number {
    return this.states.size;
  }

  acquire(key: string, options: AcquireOptions = {}): Promise<DomainPermit> {
    const state = this.stateFor(key);

    return new Promise<DomainPermit>((resolve, reject) => {
      state
        .permits(async () => {
          await state.bookkeeping(() => this.waitForDispatchSlot(state, options.minDelayMs ?? 0));
          await new Promise<void>((releasePermit) => {
            resolve(new HeldPermit(key, releasePermit));
          });
        })
        .catch(reject);
    });
  }

  async run<T>(key: string, task: () => Promise<T>, options: AcquireOptions = {}): Promise<T> {
    const permit = await this.acquire(key, options);
    try {
      return await task();
    } finally {
      permit.release();
    }
  }

  reset(): void {
    this.states.clear();
  }

  private stateFor(key: string): DomainState {
    let state = this.states.get(key);
    if (!state) {
      state = {
        permits: pLimit(this.options.maxConcurrentPerDomain),
        bookkeeping: pLimit(1),
        lastDispatch: Number.NEGATIVE_INFINITY,
      };
      this.states.set(key, state);
    }
    return state;
  }

  private async waitForDispatchSlot(state: DomainState, floorMs: number): Promise<void> {
    const minDelayMs = Math.max(this.options.minDelayMs, floorMs);
    const maxDelayMs = Math.max(this.options.maxDelayMs, minDelayMs);
    const targetMs = minDelayMs + this.random() * (maxDelayMs - minDelayMs);
    let elapsedMs = this.now() - state.lastDispatch;

    // timers may fire a fraction of a millisecond early
    while (elapsedMs < targetMs) {
      await this.sleep(Math.ceil(targetMs - elapsedMs));
      elapsedMs = this.now() - state.lastDispatch;
    }

    state.lastDispatch = this.now();
  }
}
