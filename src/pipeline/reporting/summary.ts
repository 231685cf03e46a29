import type { PipelineSummary } from '../../types.js';
import type { PipelineStats } from '../stats.js';

export function buildPipelineSummary(options: {
  stats: PipelineStats;
  startTime: number;
  cancelled: boolean;
  now?: number;
}): PipelineSummary {
  const { stats, startTime, cancelled, now = Date.now() } = options;

  return {
    urlsAttempted: stats.urlsAttempted,
    pagesFetched: stats.pagesFetched,
    recordsExtracted: stats.recordsExtracted,
    recordsSaved: stats.recordsSaved,
    urlsSkipped: stats.urlsSkipped,
    saveFailures: stats.saveFailures,
    outcomeCounts: Object.fromEntries(stats.outcomeCounts.entries()),
    skipReasons: Object.fromEntries(stats.skipReasons.entries()),
    durationMs: now - startTime,
    actualMaxConcurrency: stats.actualMaxConcurrency,
    cancelled,
  };
}
