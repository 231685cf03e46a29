import type { Settings } from '../config.js';
import { FetchFailure, isFetchFailure } from '../errors.js';
import { componentLogger } from '../logger.js';
import type { FetchMode, FetchRequest, FetchResult } from '../types.js';
import { reportCrawlerError } from '../util/errorHandler.js';
import { domainKey, parseHttpUrl } from '../util/url.js';
import { detectChallenge } from './network/challenge.js';
import { buildRequestHeaders, pickUserAgent } from './network/headers.js';
import { HttpTransport } from './network/httpTransport.js';
import { RenderTransport } from './network/renderTransport.js';
import type { Transport } from './network/transport.js';
import { toFetchFailure } from './network/transportErrors.js';
import { PolicyCache } from './policy/policyCache.js';
import { withRetry } from './retry/withRetry.js';
import { DomainThrottle } from './throttle/domainThrottle.js';

export interface FetchSchedulerDependencies {
  throttle?: DomainThrottle;
  policyCache?: PolicyCache;
  httpTransport?: Transport;
  renderTransport?: Transport;
  random?(): number;
  sleep?(ms: number): Promise<void>;
}

/**
 * Policy-checked, throttled and retried page retrieval. `fetch` never throws:
 * every failure comes back as a FetchResult with `content: null`.
 */
export class FetchScheduler {
  readonly throttle: DomainThrottle;
  readonly policyCache: PolicyCache;
  private readonly transports: Record<FetchMode, Transport>;
  private readonly random: () => number;
  private readonly sleep?: (ms: number) => Promise<void>;

  constructor(
    private readonly settings: Settings,
    deps: FetchSchedulerDependencies = {},
  ) {
    this.random = deps.random ?? Math.random;
    this.sleep = deps.sleep;
    this.throttle =
      deps.throttle ??
      new DomainThrottle({
        minDelayMs: settings.throttle.minDelayMs,
        maxDelayMs: settings.throttle.maxDelayMs,
        maxConcurrentPerDomain: settings.throttle.maxConcurrentPerDomain,
        random: this.random,
      });
    this.policyCache =
      deps.policyCache ??
      new PolicyCache({
        capacity: settings.policy.cacheSize,
        timeoutMs: settings.policy.timeoutMs,
        keyBy: settings.policy.keyBy,
        requestUserAgent: pickUserAgent(settings.fetch.userAgents, this.random),
      });
    this.transports = {
      http: deps.httpTransport ?? new HttpTransport({ proxyUrl: settings.fetch.proxyUrl }),
      render:
        deps.renderTransport ??
        new RenderTransport({
          headless: settings.fetch.headless,
          proxyUrl: settings.fetch.proxyUrl,
          executablePath: settings.fetch.browserExecutablePath,
          random: this.random,
        }),
    };
  }

  async fetch(url: string, mode?: FetchMode): Promise<FetchResult> {
    const target = parseHttpUrl(url);
    if (!target) {
      componentLogger('fetch-scheduler').warn({ url }, 'Rejected URL without an http(s) scheme or host');
      return freezeResult({ content: null, outcome: 'InvalidInput', finalUrl: url });
    }

    const effectiveMode = mode ?? this.settings.fetch.defaultMode;
    const timeoutMs =
      effectiveMode === 'render' ? this.settings.fetch.timeoutMs * 2 : this.settings.fetch.timeoutMs;
    const retry = this.settings.retry;

    try {
      const response = await withRetry(
        (attempt) => this.attempt(target, effectiveMode, timeoutMs, attempt),
        {
          maxRetries: retry.maxRetries,
          baseDelayMs: retry.baseDelayMs,
          backoffFactor: retry.backoffFactor,
          jitter: retry.jitter,
          random: this.random,
          sleep: this.sleep,
          isRetryable: (error) => !isFetchFailure(error) || error.retryable,
          onRetry: ({ attempt, delayMs, error }) => {
            componentLogger('fetch-scheduler').debug(
              { url: target.href, attempt, delayMs: Math.round(delayMs), outcome: isFetchFailure(error) ? error.outcome : undefined },
              'Retrying fetch',
            );
          },
        },
      );

      return freezeResult({
        content: response.content,
        outcome: 'Ok',
        finalUrl: response.finalUrl,
        status: response.status,
      });
    } catch (error) {
      const failure = toFetchFailure(error, { url: target.href, mode: effectiveMode, timeoutMs });
      this.reportFailure(failure, target.href, effectiveMode);
      return freezeResult({
        content: null,
        outcome: failure.outcome,
        finalUrl: target.href,
        status: failure.status,
      });
    }
  }

  /** Closes the shared browser and proxy agent, and drops cached policies and per-domain state. */
  async shutdown(): Promise<void> {
    await Promise.all([this.transports.http.shutdown?.(), this.transports.render.shutdown?.()]);
    this.policyCache.clear();
    this.throttle.reset();
  }

  private async attempt(
    target: URL,
    mode: FetchMode,
    timeoutMs: number,
    attempt: number,
  ): Promise<{ content: string; finalUrl: string; status?: number }> {
    const userAgent = pickUserAgent(this.settings.fetch.userAgents, this.random);

    let crawlDelayMs: number | undefined;
    if (this.settings.policy.enabled) {
      const allowed = await this.policyCache.isAllowed(target.href, this.settings.policy.userAgent);
      if (!allowed) {
        throw new FetchFailure('PolicyDenied', 'Disallowed by robots.txt', { url: target.href });
      }
      crawlDelayMs = await this.policyCache.crawlDelayMs(target.href, this.settings.policy.userAgent);
    }

    const request: FetchRequest = Object.freeze({
      url: target.href,
      mode,
      timeoutMs,
      headers: Object.freeze(buildRequestHeaders(userAgent)),
    });

    const transport = this.transports[mode];
    const key = domainKey(target, this.settings.throttle.keyBy);
    const response = await this.throttle.run(key, () => transport.fetch(request), { minDelayMs: crawlDelayMs });

    const keyword = detectChallenge(response.content, this.settings.fetch.challengeScanChars);
    if (keyword) {
      componentLogger('fetch-scheduler').warn(
        { url: target.href, finalUrl: response.finalUrl, keyword, attempt },
        'Possible challenge page detected',
      );
    }

    return response;
  }

  private reportFailure(failure: FetchFailure, url: string, mode: FetchMode): void {
    if (failure.outcome === 'PolicyDenied') {
      componentLogger('fetch-scheduler').info({ url }, 'Skipping URL disallowed by robots.txt');
      return;
    }

    if (failure.outcome === 'Unexpected') {
      componentLogger('fetch-scheduler').error({ url, mode, err: failure.cause }, failure.message);
      return;
    }

    reportCrawlerError(failure, { stage: 'fetch', url, mode }, { throwOnFatal: false });
  }
}

function freezeResult(result: FetchResult): FetchResult {
  return Object.freeze(result);
}
