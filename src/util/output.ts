import type { LeadRecord, OutputFormat, PipelineSummary, SkipEvent } from '../types.js';

const QUIET_PROGRESS_INTERVAL_MS = 250;

type QuietProgressSnapshot = {
  urlsAttempted: number;
  totalUrls: number;
  pagesFetched: number;
  recordsExtracted: number;
  recordsSaved: number;
  urlsSkipped: number;
  saveFailures: number;
};

let quietMode = false;
let quietProgressTimer: ReturnType<typeof setTimeout> | undefined;
let quietProgressPending: QuietProgressSnapshot | undefined;
let quietProgressLastTimestamp = -Infinity;
let quietProgressLastLength = 0;
let quietProgressRendered = false;

export function writeRecord(record: LeadRecord, format: OutputFormat): void {
  if (quietMode) {
    return;
  }

  process.stdout.write(format === 'json' ? `${JSON.stringify({ type: 'record', record })}\n` : renderRecord(record));
}

export function writeSkip(event: SkipEvent, format: OutputFormat): void {
  if (quietMode) {
    return;
  }

  if (format === 'json') {
    process.stdout.write(`${JSON.stringify({ type: 'skip', ...event })}\n`);
    return;
  }

  const detail = event.outcome ? `${event.reason}, ${event.outcome}` : event.reason;
  process.stdout.write(`SKIPPED: ${event.url} (${detail})\n`);
}

export function writeSummary(summary: PipelineSummary, format: OutputFormat): void {
  flushQuietProgress({ persist: true });
  process.stdout.write(
    format === 'json' ? `${JSON.stringify({ type: 'summary', summary })}\n` : renderTextSummary(summary),
  );
}

/** Pretty-printed JSON document, used by the single-URL command. */
export function writeJson(value: unknown): void {
  flushQuietProgress();
  process.stdout.write(`${JSON.stringify(value, null, 2)}\n`);
}

export function logError(message: string): void {
  flushQuietProgress();
  const payload = message.endsWith('\n') ? message : `${message}\n`;
  process.stderr.write(payload);
}

export function flushOutputBuffers(): void {
  flushQuietProgress();
}

export function setOutputConfig(config: { quiet: boolean }): void {
  if (quietMode && !config.quiet) {
    flushQuietProgress();
  }

  quietMode = config.quiet;
  resetQuietProgressState();
}

export function resetOutputConfig(): void {
  setOutputConfig({ quiet: false });
}

export function updateQuietProgress(snapshot: QuietProgressSnapshot): void {
  if (!quietMode) {
    return;
  }

  quietProgressPending = snapshot;
  scheduleQuietProgressRender();
}

export function flushQuietProgress(options: { persist?: boolean } = {}): void {
  if (quietProgressTimer) {
    clearTimeout(quietProgressTimer);
    quietProgressTimer = undefined;
  }

  if (quietProgressPending) {
    performQuietProgressRender();
  }

  if (!quietProgressRendered) {
    return;
  }

  if (options.persist) {
    process.stdout.write('\n');
  } else if (quietProgressLastLength > 0) {
    process.stdout.write(`\r${' '.repeat(quietProgressLastLength)}\r`);
  }

  quietProgressRendered = false;
  quietProgressLastLength = 0;
  quietProgressLastTimestamp = -Infinity;
}

export function renderRecord(record: LeadRecord): string {
  const lines: string[] = [`RECORD: ${record.sourceUrl}`];

  if (record.companyName) {
    lines.push(`  company: ${record.companyName}`);
  }
  if (record.website) {
    lines.push(`  website: ${record.website}`);
  }
  for (const phone of record.phoneNumbers) {
    lines.push(`  phone: ${phone}`);
  }
  for (const email of record.emails) {
    lines.push(`  email: ${email}`);
  }
  for (const address of record.addresses) {
    lines.push(`  address: ${address}`);
  }
  for (const [platform, url] of Object.entries(record.socialLinks)) {
    lines.push(`  ${platform}: ${url}`);
  }

  return `${lines.join('\n')}\n`;
}

function renderTextSummary(summary: PipelineSummary): string {
  const lines: string[] = [
    '',
    '--- Pipeline Summary ---',
    `URLs attempted: ${summary.urlsAttempted}`,
    `Pages fetched: ${summary.pagesFetched}`,
    `Records extracted: ${summary.recordsExtracted}`,
    `Records saved: ${summary.recordsSaved}`,
    `URLs skipped: ${summary.urlsSkipped}`,
    `Save failures: ${summary.saveFailures}`,
    `Duration: ${formatDuration(summary.durationMs)} (${Math.round(summary.durationMs)} ms)`,
    `Actual max concurrency: ${summary.actualMaxConcurrency}`,
    `Cancelled: ${summary.cancelled ? 'yes' : 'no'}`,
  ];

  const outcomeEntries = sortedCounts(summary.outcomeCounts);
  if (outcomeEntries.length > 0) {
    lines.push('Fetch outcomes:');
    for (const [outcome, count] of outcomeEntries) {
      lines.push(`  ${outcome}: ${count}`);
    }
  }

  const skipEntries = sortedCounts(summary.skipReasons);
  if (skipEntries.length > 0) {
    lines.push('Skip reasons:');
    for (const [reason, count] of skipEntries) {
      lines.push(`  ${reason}: ${count}`);
    }
  }

  return `${lines.join('\n')}\n`;
}

function sortedCounts(counts: Partial<Record<string, number>>): [string, number][] {
  const entries: [string, number][] = [];
  for (const [key, count] of Object.entries(counts)) {
    if (typeof count === 'number' && count > 0) {
      entries.push([key, count]);
    }
  }
  return entries.sort(([, countA], [, countB]) => countB - countA);
}

function scheduleQuietProgressRender(): void {
  if (quietProgressTimer) {
    return;
  }

  const now = Date.now();
  const elapsed = now - quietProgressLastTimestamp;
  const delay = elapsed >= QUIET_PROGRESS_INTERVAL_MS ? 0 : QUIET_PROGRESS_INTERVAL_MS - elapsed;

  quietProgressTimer = setTimeout(() => {
    quietProgressTimer = undefined;
    performQuietProgressRender();
  }, delay);
}

function performQuietProgressRender(): void {
  const snapshot = quietProgressPending;
  quietProgressPending = undefined;

  if (!snapshot) {
    return;
  }

  emitQuietProgress(snapshot);
  quietProgressLastTimestamp = Date.now();
}

function emitQuietProgress(snapshot: QuietProgressSnapshot): void {
  const line = renderQuietProgressLine(snapshot);
  const padded = padQuietProgressLine(line);
  process.stdout.write(`\r${padded}`);
  quietProgressLastLength = padded.length;
  quietProgressRendered = true;
}

function renderQuietProgressLine(snapshot: QuietProgressSnapshot): string {
  const parts = [
    `urls:${snapshot.urlsAttempted}/${snapshot.totalUrls}`,
    `fetched:${snapshot.pagesFetched}`,
    `records:${snapshot.recordsExtracted}`,
    `saved:${snapshot.recordsSaved}`,
    `skipped:${snapshot.urlsSkipped}`,
  ];

  if (snapshot.saveFailures > 0) {
    parts.push(`save-fail:${snapshot.saveFailures}`);
  }

  return `[quiet] ${parts.join(' ')}`;
}

function padQuietProgressLine(text: string): string {
  if (quietProgressLastLength > text.length) {
    return `${text}${' '.repeat(quietProgressLastLength - text.length)}`;
  }

  return text;
}

function resetQuietProgressState(): void {
  if (quietProgressTimer) {
    clearTimeout(quietProgressTimer);
    quietProgressTimer = undefined;
  }

  quietProgressPending = undefined;
  quietProgressLastTimestamp = -Infinity;
  quietProgressLastLength = 0;
  quietProgressRendered = false;
}

function formatDuration(durationMs: number): string {
  if (!Number.isFinite(durationMs) || durationMs <= 0) {
    return '0ms';
  }

  if (durationMs < 1_000) {
    return `${Math.round(durationMs)}ms`;
  }

  const seconds = durationMs / 1_000;
  if (seconds < 60) {
    const precision = seconds >= 10 ? 1 : 2;
    return `${seconds.toFixed(precision)}s`;
  }

  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = seconds % 60;
  const secondsPart = remainingSeconds >= 10 ? remainingSeconds.toFixed(0) : remainingSeconds.toFixed(1);
  return `${minutes}m ${secondsPart}s`;
}
