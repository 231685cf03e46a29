import { updateQuietProgress } from '../../util/output.js';
import type { PipelineStats } from '../stats.js';

export class ProgressReporter {
  constructor(
    private readonly stats: PipelineStats,
    private readonly total: number,
  ) {}

  emit(): void {
    updateQuietProgress({
      urlsAttempted: this.stats.urlsAttempted,
      totalUrls: this.total,
      pagesFetched: this.stats.pagesFetched,
      recordsExtracted: this.stats.recordsExtracted,
      recordsSaved: this.stats.recordsSaved,
      urlsSkipped: this.stats.urlsSkipped,
      saveFailures: this.stats.saveFailures,
    });
  }
}
