import type { OutcomeKind, SkipReason } from '../types.js';

export interface PipelineStats {
  urlsAttempted: number;
  pagesFetched: number;
  recordsExtracted: number;
  recordsSaved: number;
  urlsSkipped: number;
  saveFailures: number;
  outcomeCounts: Map<OutcomeKind, number>;
  skipReasons: Map<SkipReason, number>;
  actualMaxConcurrency: number;
}

export function initializeStats(): PipelineStats {
  return {
    urlsAttempted: 0,
    pagesFetched: 0,
    recordsExtracted: 0,
    recordsSaved: 0,
    urlsSkipped: 0,
    saveFailures: 0,
    outcomeCounts: new Map<OutcomeKind, number>(),
    skipReasons: new Map<SkipReason, number>(),
    actualMaxConcurrency: 0,
  };
}

export function recordFetchOutcome(stats: PipelineStats, outcome: OutcomeKind): void {
  stats.urlsAttempted += 1;
  stats.outcomeCounts.set(outcome, (stats.outcomeCounts.get(outcome) ?? 0) + 1);

  if (outcome === 'Ok') {
    stats.pagesFetched += 1;
  }
}

export function recordSkip(stats: PipelineStats, reason: SkipReason): void {
  stats.urlsSkipped += 1;
  stats.skipReasons.set(reason, (stats.skipReasons.get(reason) ?? 0) + 1);
}
