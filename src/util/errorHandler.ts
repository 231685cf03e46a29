import {
  CrawlerError,
  ensureCrawlerError,
  isFetchFailure,
  type ErrorKind,
  type ErrorSeverity,
} from '../errors.js';
import { componentLogger } from '../logger.js';

export interface ErrorContext extends Record<string, unknown> {
  stage?: string;
  url?: string;
  attempt?: number;
}

export interface ErrorHandlingOptions {
  defaultKind?: ErrorKind;
  defaultSeverity?: ErrorSeverity;
  throwOnFatal?: boolean;
}

/**
 * Logs an error on the logger of the stage it came from and returns it as a
 * CrawlerError. Recoverable errors are warnings; fatal ones are logged at
 * error level and rethrown unless `throwOnFatal` is false.
 */
export function reportCrawlerError(
  error: unknown,
  context: ErrorContext = {},
  options: ErrorHandlingOptions = {},
): CrawlerError {
  const crawlerError = ensureCrawlerError(error, {
    kind: options.defaultKind ?? 'internal',
    severity: options.defaultSeverity,
    details: context,
  });

  const message = buildLogMessage(crawlerError, { ...crawlerError.details, ...context });
  const logger = componentLogger(context.stage ?? 'crawler');
  const bindings = {
    kind: crawlerError.kind,
    url: context.url,
    outcome: isFetchFailure(crawlerError) ? crawlerError.outcome : undefined,
  };

  if (crawlerError.severity !== 'fatal') {
    logger.warn(bindings, message);
    return crawlerError;
  }

  logger.error({ ...bindings, err: crawlerError }, message);
  if (options.throwOnFatal ?? true) {
    throw crawlerError;
  }
  return crawlerError;
}

/** `[kind/severity] message (key=value ...)` with detail keys sorted and undefined values left out. */
export function buildLogMessage(error: CrawlerError, details: Record<string, unknown>): string {
  const entries = Object.entries(details)
    .filter(([, value]) => value !== undefined)
    .sort(([a], [b]) => a.localeCompare(b));

  const head = `[${error.kind}/${error.severity}] ${error.message}`;
  if (entries.length === 0) {
    return head;
  }
  return `${head} (${entries.map(([key, value]) => `${key}=${JSON.stringify(value)}`).join(' ')})`;
}
