import type { OutcomeKind } from './types.js';

export type ErrorKind = 'fetch' | 'extract' | 'config' | 'persist' | 'internal';

export type ErrorSeverity = 'recoverable' | 'fatal';

export interface CrawlerErrorProps {
  message: string;
  kind: ErrorKind;
  severity?: ErrorSeverity;
  details?: Record<string, unknown>;
  cause?: unknown;
}

export class CrawlerError extends Error {
  readonly kind: ErrorKind;
  readonly severity: ErrorSeverity;
  readonly details?: Record<string, unknown>;

  constructor({ message, kind, severity = 'recoverable', details, cause }: CrawlerErrorProps) {
    super(message, cause ? { cause } : undefined);
    this.name = `${capitalize(kind)}Error`;
    this.kind = kind;
    this.severity = severity;
    this.details = details;
  }
}

/**
 * A fetch-stage failure already classified into the outcome the scheduler reports.
 * Transports throw these; the scheduler turns them into a FetchResult.
 */
export class FetchFailure extends CrawlerError {
  readonly outcome: Exclude<OutcomeKind, 'Ok'>;
  readonly status?: number;

  constructor(
    outcome: Exclude<OutcomeKind, 'Ok'>,
    message: string,
    details: Record<string, unknown> = {},
    options: { cause?: unknown; status?: number } = {},
  ) {
    super({ message, kind: 'fetch', severity: 'recoverable', details: { ...details, outcome }, cause: options.cause });
    this.name = 'FetchFailure';
    this.outcome = outcome;
    this.status = options.status;
  }

  get retryable(): boolean {
    return RETRYABLE_OUTCOMES.has(this.outcome);
  }
}

const RETRYABLE_OUTCOMES: ReadonlySet<OutcomeKind> = new Set<OutcomeKind>([
  'Timeout',
  'TransportError',
  'ServerError',
  'RenderError',
  'Unexpected',
]);

export function isCrawlerError(value: unknown): value is CrawlerError {
  return value instanceof CrawlerError;
}

export function isFetchFailure(value: unknown): value is FetchFailure {
  return value instanceof FetchFailure;
}

export function ensureCrawlerError(
  error: unknown,
  fallback: Partial<CrawlerErrorProps> & Pick<CrawlerErrorProps, 'kind'> = { kind: 'internal' },
): CrawlerError {
  if (isCrawlerError(error)) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  return new CrawlerError({
    message,
    kind: fallback.kind,
    severity: fallback.severity ?? 'fatal',
    details: fallback.details,
    cause: error instanceof Error ? error : undefined,
  });
}

export function createExtractionError(
  message: string,
  details: Record<string, unknown> = {},
  options: { severity?: ErrorSeverity; cause?: unknown } = {},
): CrawlerError {
  return new CrawlerError({
    message,
    kind: 'extract',
    severity: options.severity ?? 'recoverable',
    details,
    cause: options.cause,
  });
}

export function createPersistenceError(
  message: string,
  details: Record<string, unknown> = {},
  options: { severity?: ErrorSeverity; cause?: unknown } = {},
): CrawlerError {
  return new CrawlerError({
    message,
    kind: 'persist',
    severity: options.severity ?? 'recoverable',
    details,
    cause: options.cause,
  });
}

export function createConfigurationError(
  message: string,
  details: Record<string, unknown> = {},
  options: { cause?: unknown } = {},
): CrawlerError {
  return new CrawlerError({
    message,
    kind: 'config',
    severity: 'fatal',
    details,
    cause: options.cause,
  });
}

function capitalize(value: string): string {
  if (!value) {
    return value;
  }
  return value.charAt(0).toUpperCase() + value.slice(1);
}
