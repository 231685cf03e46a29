import { describe, expect, it } from 'vitest';

import { DomainThrottle } from '../src/crawler/throttle/domainThrottle.js';

function fakeClock() {
  let time = 0;
  const sleeps: number[] = [];
  return {
    sleeps,
    now: () => time,
    sleep: async (ms: number) => {
      sleeps.push(ms);
      time += ms;
    },
  };
}

function deferred(): { promise: Promise<void>; resolve(): void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}

const tick = () => new Promise<void>((resolve) => setTimeout(resolve, 0));

describe('DomainThrottle', () => {
  it('spaces dispatches to one domain by at least the minimum delay', async () => {
    const clock = fakeClock();
    const throttle = new DomainThrottle({
      minDelayMs: 100,
      maxDelayMs: 200,
      maxConcurrentPerDomain: 1,
      now: clock.now,
      sleep: clock.sleep,
      random: () => 0,
    });
    const dispatched: number[] = [];

    await Promise.all(
      [1, 2, 3].map(() =>
        throttle.run('example.com', async () => {
          dispatched.push(clock.now());
        }),
      ),
    );

    expect(dispatched).toEqual([0, 100, 200]);
    expect(clock.sleeps).toEqual([100, 100]);
  });

  it('draws the target delay from the configured range', async () => {
    const clock = fakeClock();
    const throttle = new DomainThrottle({
      minDelayMs: 100,
      maxDelayMs: 300,
      maxConcurrentPerDomain: 1,
      now: clock.now,
      sleep: clock.sleep,
      random: () => 0.5,
    });

    await throttle.run('example.com', async () => undefined);
    await throttle.run('example.com', async () => undefined);

    expect(clock.sleeps).toEqual([200]);
  });

  it('keeps domains independent', async () => {
    const clock = fakeClock();
    const throttle = new DomainThrottle({
      minDelayMs: 100,
      maxDelayMs: 100,
      maxConcurrentPerDomain: 1,
      now: clock.now,
      sleep: clock.sleep,
    });

    await Promise.all([
      throttle.run('a.test', async () => undefined),
      throttle.run('b.test', async () => undefined),
    ]);

    expect(clock.sleeps).toEqual([]);
    expect(throttle.trackedDomains).toBe(2);
    throttle.reset();
    expect(throttle.trackedDomains).toBe(0);
  });

  it('never lets more than maxConcurrentPerDomain tasks hold permits', async () => {
    const throttle = new DomainThrottle({ minDelayMs: 0, maxDelayMs: 0, maxConcurrentPerDomain: 2 });
    const gates = [deferred(), deferred(), deferred(), deferred()];
    let active = 0;
    let peak = 0;

    const runs = gates.map((gate) =>
      throttle.run('example.com', async () => {
        active += 1;
        peak = Math.max(peak, active);
        await gate.promise;
        active -= 1;
      }),
    );

    await tick();
    expect(active).toBe(2);
    for (const gate of gates) {
      gate.resolve();
      await tick();
    }
    await Promise.all(runs);

    expect(peak).toBe(2);
    expect(active).toBe(0);
  });

  it('ignores a second release of the same permit', async () => {
    const throttle = new DomainThrottle({ minDelayMs: 0, maxDelayMs: 0, maxConcurrentPerDomain: 1 });

    const first = await throttle.acquire('example.com');
    first.release();
    first.release();

    const second = await throttle.acquire('example.com');
    let thirdAcquired = false;
    const third = throttle.acquire('example.com').then((permit) => {
      thirdAcquired = true;
      return permit;
    });

    await tick();
    expect(thirdAcquired).toBe(false);

    second.release();
    (await third).release();
    expect(thirdAcquired).toBe(true);
  });

  it('releases the permit exactly once when the task throws', async () => {
    const throttle = new DomainThrottle({ minDelayMs: 0, maxDelayMs: 0, maxConcurrentPerDomain: 1 });

    await expect(
      throttle.run('example.com', async () => {
        throw new Error('task failed');
      }),
    ).rejects.toThrow('task failed');

    const gates = [deferred(), deferred()];
    let active = 0;
    let peak = 0;
    const runs = gates.map((gate) =>
      throttle.run('example.com', async () => {
        active += 1;
        peak = Math.max(peak, active);
        await gate.promise;
        active -= 1;
      }),
    );

    await tick();
    expect(active).toBe(1);
    for (const gate of gates) {
      gate.resolve();
      await tick();
    }
    await Promise.all(runs);

    expect(peak).toBe(1);
  });

  it('raises the delay to a per-dispatch floor such as a crawl delay', async () => {
    const clock = fakeClock();
    const throttle = new DomainThrottle({
      minDelayMs: 100,
      maxDelayMs: 200,
      maxConcurrentPerDomain: 1,
      now: clock.now,
      sleep: clock.sleep,
      random: () => 0,
    });

    await throttle.run('example.com', async () => undefined);
    await throttle.run('example.com', async () => undefined, { minDelayMs: 500 });
    await throttle.run('example.com', async () => undefined, { minDelayMs: 50 });

    expect(clock.sleeps).toEqual([500, 100]);
  });

  it('waits out the minimum delay on real timers', async () => {
    const throttle = new DomainThrottle({ minDelayMs: 50, maxDelayMs: 60, maxConcurrentPerDomain: 1 });
    const starts: number[] = [];

    for (let i = 0; i < 2; i += 1) {
      await throttle.run('example.com', async () => {
        starts.push(performance.now());
      });
    }

    const [first = 0, second = 0] = starts;
    expect(second - first).toBeGreaterThanOrEqual(45);
  });
});
