import pLimit from 'p-limit';

import { createExtractionError, createPersistenceError, ensureCrawlerError } from '../errors.js';
import { hasContactSignal, scrape, type ScrapeOptions } from '../extraction/engine.js';
import type { FetchMode, FetchResult, LeadRecord, OutcomeKind, PipelineHandlers, PipelineSummary, SkipReason } from '../types.js';
import { reportCrawlerError } from '../util/errorHandler.js';
import { ProgressReporter } from './reporting/progress.js';
import { buildPipelineSummary } from './reporting/summary.js';
import type { LeadSink } from './sink.js';
import { initializeStats, recordFetchOutcome, recordSkip, type PipelineStats } from './stats.js';

/** The part of the fetch scheduler the pipeline depends on. */
export interface PageFetcher {
  fetch(url: string, mode?: FetchMode): Promise<FetchResult>;
}

export interface LeadPipelineOptions {
  concurrency: number;
  batchSize: number;
  mode?: FetchMode;
  scrapeOptions?: ScrapeOptions;
}

export interface PipelineRunOptions {
  signal?: AbortSignal;
}

/**
 * Fetches seed URLs with bounded concurrency, extracts a record from every page
 * that loads, and hands records that carry a contact signal to the sink in batches.
 */
export class LeadPipeline {
  constructor(
    private readonly fetcher: PageFetcher,
    private readonly sink: LeadSink,
    private readonly options: LeadPipelineOptions,
    private readonly handlers: PipelineHandlers = {},
  ) {}

  async run(seeds: readonly string[], runOptions: PipelineRunOptions = {}): Promise<PipelineSummary> {
    const run = new PipelineRun(this.fetcher, this.sink, this.options, this.handlers, runOptions.signal);
    const summary = await run.execute(dedupeSeeds(seeds));
    this.handlers.onComplete?.(summary);
    return summary;
  }
}

class PipelineRun {
  private readonly stats: PipelineStats = initializeStats();
  private readonly limiter: ReturnType<typeof pLimit>;
  private readonly commitLimiter = pLimit(1);
  private readonly startTime = Date.now();
  private buffer: LeadRecord[] = [];
  private pendingCommits: Promise<void>[] = [];
  private progress: ProgressReporter | undefined;
  private runningCount = 0;

  constructor(
    private readonly fetcher: PageFetcher,
    private readonly sink: LeadSink,
    private readonly options: LeadPipelineOptions,
    private readonly handlers: PipelineHandlers,
    private readonly signal: AbortSignal | undefined,
  ) {
    this.limiter = pLimit(Math.max(1, options.concurrency));
  }

  async execute(seeds: readonly string[]): Promise<PipelineSummary> {
    this.progress = new ProgressReporter(this.stats, seeds.length);
    await Promise.all(seeds.map((url) => this.schedule(url)));

    this.flush();
    await Promise.all(this.pendingCommits);

    return buildPipelineSummary({
      stats: this.stats,
      startTime: this.startTime,
      cancelled: this.signal?.aborted ?? false,
    });
  }

  private schedule(url: string): Promise<void> {
    return this.limiter(async () => {
      // URLs already queued when the signal fires are skipped; in-flight ones finish
      if (this.signal?.aborted) {
        this.skip(url, 'cancelled');
        return;
      }

      this.runningCount += 1;
      this.stats.actualMaxConcurrency = Math.max(this.stats.actualMaxConcurrency, this.runningCount);
      try {
        await this.handleUrl(url);
      } finally {
        this.runningCount -= 1;
      }
    })
      .catch((error: unknown) => {
        const crawlerError = ensureCrawlerError(error, {
          kind: 'internal',
          severity: 'recoverable',
          details: { url },
        });
        reportCrawlerError(crawlerError, { stage: 'pipeline', url }, { throwOnFatal: false });
      })
      .finally(() => {
        this.progress?.emit();
      });
  }

  private async handleUrl(url: string): Promise<void> {
    const result = await this.fetchPage(url);
    recordFetchOutcome(this.stats, result.outcome);

    if (result.outcome !== 'Ok' || result.content === null) {
      this.skip(url, 'fetch-failed', result.outcome);
      return;
    }

    let record: LeadRecord;
    try {
      record = scrape(result.content, result.finalUrl, this.options.scrapeOptions);
    } catch (error) {
      reportCrawlerError(
        createExtractionError('Extraction failed', { url: result.finalUrl }, { cause: error }),
        { stage: 'extract', url },
        { throwOnFatal: false },
      );
      this.skip(url, 'extract-failed');
      return;
    }

    if (!hasContactSignal(record)) {
      this.skip(url, 'no-contact-signal');
      return;
    }

    this.stats.recordsExtracted += 1;
    this.handlers.onRecord?.(record);
    this.buffer.push(record);
    if (this.buffer.length >= this.options.batchSize) {
      this.flush();
    }
  }

  private async fetchPage(url: string): Promise<FetchResult> {
    try {
      return await this.fetcher.fetch(url, this.options.mode);
    } catch (error) {
      reportCrawlerError(error, { stage: 'fetch', url }, { defaultSeverity: 'recoverable', throwOnFatal: false });
      return { content: null, outcome: 'Unexpected', finalUrl: url };
    }
  }

  private flush(): void {
    if (this.buffer.length === 0) {
      return;
    }
    const batch = this.buffer;
    this.buffer = [];
    this.pendingCommits.push(this.commitLimiter(() => this.commitBatch(batch)));
  }

  private async commitBatch(batch: readonly LeadRecord[]): Promise<void> {
    const staged: LeadRecord[] = [];
    for (const record of batch) {
      try {
        await this.sink.add(record);
        staged.push(record);
      } catch (error) {
        this.stats.saveFailures += 1;
        reportCrawlerError(
          createPersistenceError('Unable to stage record', { sourceUrl: record.sourceUrl }, { cause: error }),
          { stage: 'persist' },
          { throwOnFatal: false },
        );
      }
    }

    try {
      await this.sink.commit();
      this.stats.recordsSaved += staged.length;
    } catch (error) {
      this.stats.saveFailures += staged.length;
      reportCrawlerError(
        createPersistenceError('Unable to commit batch', { records: staged.length }, { cause: error }),
        { stage: 'persist' },
        { throwOnFatal: false },
      );
    }
  }

  private skip(url: string, reason: SkipReason, outcome?: OutcomeKind): void {
    recordSkip(this.stats, reason);
    this.handlers.onSkip?.({ url, reason, outcome });
  }
}

/** Trimmed, non-empty seeds in first-seen order. */
export function dedupeSeeds(seeds: readonly string[]): string[] {
  const seen = new Set<string>();
  const unique: string[] = [];
  for (const seed of seeds) {
    const trimmed = seed.trim();
    if (trimmed.length > 0 && !seen.has(trimmed)) {
      seen.add(trimmed);
      unique.push(trimmed);
    }
  }
  return unique;
}
