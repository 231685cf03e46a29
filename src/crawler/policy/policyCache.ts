import type { KeyStrategy } from '../../config.js';
import { componentLogger } from '../../logger.js';
import { domainKey, parseHttpUrl } from '../../util/url.js';
import { RobotsRules } from './robotsRules.js';

const MAX_CRAWL_DELAY_MS = 60_000;

export interface RobotsResponse {
  status: number;
  body: string;
}

export type RobotsFetcher = (url: string, options: { timeoutMs: number; userAgent: string }) => Promise<RobotsResponse>;

export interface PolicyCacheOptions {
  capacity: number;
  timeoutMs: number;
  keyBy: KeyStrategy;
  requestUserAgent: string;
  fetcher?: RobotsFetcher;
}

/**
 * Bounded LRU of parsed robots policies. Concurrent misses for the same key
 * share one in-flight load; the in-flight entry is dropped as soon as it
 * settles, so pending work is the only per-domain state outside the LRU.
 */
export class PolicyCache {
  private readonly entries = new Map<string, RobotsRules>();
  private readonly inFlight = new Map<string, Promise<RobotsRules>>();
  private readonly fetcher: RobotsFetcher;
  // bumped by clear(); loads started under an older generation do not insert
  private generation = 0;

  constructor(private readonly options: PolicyCacheOptions) {
    this.fetcher = options.fetcher ?? fetchRobotsTxt;
  }

  get size(): number {
    return this.entries.size;
  }

  get pendingLoads(): number {
    return this.inFlight.size;
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  keyFor(url: URL): string {
    return domainKey(url, this.options.keyBy);
  }

  async get(key: string): Promise<RobotsRules> {
    const cached = this.entries.get(key);
    if (cached) {
      this.entries.delete(key);
      this.entries.set(key, cached);
      return cached;
    }

    const pending = this.inFlight.get(key);
    if (pending) {
      return pending;
    }

    const load = this.load(key).finally(() => {
      if (this.inFlight.get(key) === load) {
        this.inFlight.delete(key);
      }
    });
    this.inFlight.set(key, load);
    return load;
  }

  async isAllowed(url: string, userAgent: string): Promise<boolean> {
    const parsed = parseHttpUrl(url);
    if (!parsed) {
      return true;
    }

    const rules = await this.get(this.keyFor(parsed));
    try {
      return rules.isAllowed(parsed.href, userAgent);
    } catch (error) {
      componentLogger('policy-cache').warn({ err: error, url }, 'Robots evaluation failed; allowing');
      return true;
    }
  }

  /** The Crawl-delay that applies to `userAgent` on this URL's domain, capped at one minute. */
  async crawlDelayMs(url: string, userAgent: string): Promise<number | undefined> {
    const parsed = parseHttpUrl(url);
    if (!parsed) {
      return undefined;
    }

    const seconds = (await this.get(this.keyFor(parsed))).crawlDelaySeconds(userAgent);
    return seconds === undefined ? undefined : Math.min(seconds * 1_000, MAX_CRAWL_DELAY_MS);
  }

  clear(): void {
    this.generation += 1;
    this.entries.clear();
    this.inFlight.clear();
  }

  private async load(key: string): Promise<RobotsRules> {
    const generation = this.generation;
    const rules = await this.retrieve(key);
    if (generation !== this.generation) {
      return rules;
    }

    this.entries.set(key, rules);
    while (this.entries.size > this.options.capacity) {
      const oldest = this.entries.keys().next();
      if (oldest.done) {
        break;
      }
      this.entries.delete(oldest.value);
    }
    return rules;
  }

  private async retrieve(key: string): Promise<RobotsRules> {
    const logger = componentLogger('policy-cache');

    for (const scheme of ['https', 'http']) {
      const robotsUrl = `${scheme}://${key}/robots.txt`;
      try {
        const response = await this.fetcher(robotsUrl, {
          timeoutMs: this.options.timeoutMs,
          userAgent: this.options.requestUserAgent,
        });

        if (response.status >= 200 && response.status < 300) {
          return RobotsRules.parse(response.body);
        }

        logger.debug({ robotsUrl, status: response.status }, 'Robots request did not succeed');
      } catch (error) {
        logger.debug({ robotsUrl, err: error }, 'Robots request failed');
      }
    }

    return RobotsRules.permissive();
  }
}

export async function fetchRobotsTxt(
  url: string,
  options: { timeoutMs: number; userAgent: string },
): Promise<RobotsResponse> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), options.timeoutMs);

  try {
    const response = await fetch(url, {
      redirect: 'follow',
      signal: controller.signal,
      headers: { 'user-agent': options.userAgent, accept: 'text/plain,*/*;q=0.8' },
    });
    if (!response.ok) {
      await response.body?.cancel();
      return { status: response.status, body: '' };
    }
    return { status: response.status, body: await response.text() };
  } finally {
    clearTimeout(timeoutId);
  }
}
