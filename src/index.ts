import { loadSettings, type Settings } from './config.js';
import { FetchScheduler } from './crawler/fetchScheduler.js';
import { createConfigurationError, FetchFailure } from './errors.js';
import { scrape, type ScrapeOptions } from './extraction/engine.js';
import { createDefaultHandlers } from './pipeline/handlers/defaultHandlers.js';
import { LeadPipeline } from './pipeline/pipeline.js';
import { loadSeedUrls } from './pipeline/seeds.js';
import { JsonLinesSink, type LeadSink } from './pipeline/sink.js';
import type { LeadRecord, OutputFormat, PipelineHandlers, PipelineSummary } from './types.js';
import { flushOutputBuffers, resetOutputConfig, setOutputConfig, writeSummary } from './util/output.js';

export const DEFAULT_OUTPUT_FILE = 'leads.jsonl';

export interface RunLeadPipelineConfig {
  settings?: Settings;
  outputFile?: string;
  /** Overrides the JSON Lines sink built from `outputFile`. */
  sink?: LeadSink;
  format?: OutputFormat;
  quiet?: boolean;
  render?: boolean;
  handlers?: PipelineHandlers;
  signal?: AbortSignal;
  /** Abort the run on Ctrl-C; in-flight URLs still finish and the summary is printed. */
  handleSigint?: boolean;
}

export interface ScrapeUrlConfig {
  settings?: Settings;
  render?: boolean;
}

/** Loads seeds from a file and runs them through the pipeline, printing records and the summary. */
export async function runLeadPipeline(seedFile: string, config: RunLeadPipelineConfig = {}): Promise<PipelineSummary> {
  const settings = config.settings ?? loadSettings();
  const format = config.format ?? 'text';
  const seeds = await loadSeedUrls(seedFile);
  if (seeds.length === 0) {
    throw createConfigurationError('Seed file contains no URLs.', { seedFile });
  }

  const handlers: PipelineHandlers = {
    ...createDefaultHandlers(format),
    ...(config.handlers ?? {}),
  };
  const scheduler = new FetchScheduler(settings);
  const sink = config.sink ?? new JsonLinesSink(config.outputFile ?? DEFAULT_OUTPUT_FILE);
  const pipeline = new LeadPipeline(
    scheduler,
    sink,
    {
      concurrency: settings.pipeline.concurrency,
      batchSize: settings.pipeline.batchSize,
      mode: config.render ? 'render' : undefined,
      scrapeOptions: scrapeOptionsFrom(settings),
    },
    handlers,
  );

  const controller = new AbortController();
  const abort = (): void => controller.abort();
  config.signal?.addEventListener('abort', abort, { once: true });
  if (config.signal?.aborted) {
    controller.abort();
  }
  if (config.handleSigint) {
    process.once('SIGINT', abort);
  }

  setOutputConfig({ quiet: config.quiet ?? false });
  try {
    const summary = await pipeline.run(seeds, { signal: controller.signal });
    if (!handlers.onComplete) {
      writeSummary(summary, format);
    }
    return summary;
  } finally {
    if (config.handleSigint) {
      process.removeListener('SIGINT', abort);
    }
    config.signal?.removeEventListener('abort', abort);
    try {
      await sink.close?.();
    } finally {
      await scheduler.shutdown();
      flushOutputBuffers();
      resetOutputConfig();
    }
  }
}

/** Fetches a single page and extracts its lead record. A failed fetch raises a FetchFailure. */
export async function scrapeUrl(url: string, config: ScrapeUrlConfig = {}): Promise<LeadRecord> {
  const settings = config.settings ?? loadSettings();
  const scheduler = new FetchScheduler(settings);
  try {
    const result = await scheduler.fetch(url, config.render ? 'render' : undefined);
    if (result.outcome !== 'Ok') {
      throw new FetchFailure(result.outcome, `Unable to fetch ${url}: ${result.outcome}`, { url }, { status: result.status });
    }
    return scrape(result.content ?? '', result.finalUrl, scrapeOptionsFrom(settings));
  } finally {
    await scheduler.shutdown();
  }
}

function scrapeOptionsFrom(settings: Settings): ScrapeOptions {
  return {
    defaultRegion: settings.extraction.defaultRegion,
    dropPlaceholders: settings.extraction.dropPlaceholders,
  };
}

export { loadSettings, SettingsSchema, DEFAULT_USER_AGENTS } from './config.js';
export type { Settings, SettingsInput, KeyStrategy } from './config.js';
export { FetchScheduler, type FetchSchedulerDependencies } from './crawler/fetchScheduler.js';
export { withRetry, type RetryOptions } from './crawler/retry/withRetry.js';
export { DomainThrottle, type DomainPermit } from './crawler/throttle/domainThrottle.js';
export { PolicyCache } from './crawler/policy/policyCache.js';
export { RobotsRules } from './crawler/policy/robotsRules.js';
export { HttpTransport } from './crawler/network/httpTransport.js';
export { RenderTransport } from './crawler/network/renderTransport.js';
export type { Transport, TransportResponse } from './crawler/network/transport.js';
export { scrape, hasContactSignal, type ScrapeOptions } from './extraction/engine.js';
export { noEntityRecognizer, type EntityRecognizer } from './extraction/entityRecognizer.js';
export { zodEmailValidator, type EmailValidator } from './extraction/emails.js';
export { LeadPipeline, dedupeSeeds, type PageFetcher, type LeadPipelineOptions } from './pipeline/pipeline.js';
export { JsonLinesSink, MemorySink, type LeadSink } from './pipeline/sink.js';
export { loadSeedUrls, parseSeedList } from './pipeline/seeds.js';
export { CrawlerError, FetchFailure, isCrawlerError, isFetchFailure } from './errors.js';
export { configureLogger, getLogger, setLoggerInstance, type LoggerLike } from './logger.js';
export type * from './types.js';
