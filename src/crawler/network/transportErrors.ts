import { errors as playwrightErrors } from 'playwright-core';

import { FetchFailure, isFetchFailure } from '../../errors.js';
import type { FetchMode } from '../../types.js';

const TIMEOUT_CODES = new Set(['ETIMEDOUT', 'UND_ERR_CONNECT_TIMEOUT', 'UND_ERR_HEADERS_TIMEOUT', 'UND_ERR_BODY_TIMEOUT']);

const TRANSPORT_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'EPIPE',
  'UND_ERR_SOCKET',
  'UND_ERR_CLOSED',
  'ERR_TLS_CERT_ALTNAME_INVALID',
  'CERT_HAS_EXPIRED',
  'DEPTH_ZERO_SELF_SIGNED_CERT',
  'UNABLE_TO_VERIFY_LEAF_SIGNATURE',
  'EPROTO',
]);

export interface TransportErrorContext {
  url: string;
  mode: FetchMode;
  timeoutMs: number;
}

/**
 * The only place that knows about fetch, undici and Playwright error shapes.
 * Everything past this point sees a {@link FetchFailure} and its outcome.
 */
export function toFetchFailure(error: unknown, context: TransportErrorContext): FetchFailure {
  if (isFetchFailure(error)) {
    return error;
  }

  const details = { url: context.url, mode: context.mode };

  if (isTimeout(error)) {
    return new FetchFailure('Timeout', `Request timed out after ${context.timeoutMs}ms`, details, { cause: error });
  }

  if (context.mode === 'render') {
    const message = error instanceof Error ? error.message : String(error);
    return new FetchFailure('RenderError', message || 'Render failed', details, { cause: error });
  }

  const code = extractErrorCode(error);
  if (code && TRANSPORT_CODES.has(code)) {
    return new FetchFailure('TransportError', `Connection failed (${code})`, { ...details, code }, { cause: error });
  }

  // undici reports every connection-level problem as `TypeError: fetch failed`
  if (error instanceof TypeError && error.message === 'fetch failed') {
    return new FetchFailure('TransportError', 'Connection failed', code ? { ...details, code } : details, {
      cause: error,
    });
  }

  const message = error instanceof Error ? error.message : String(error);
  return new FetchFailure('Unexpected', message || 'Unexpected fetch failure', details, { cause: error });
}

function isTimeout(error: unknown): boolean {
  if (error instanceof playwrightErrors.TimeoutError) {
    return true;
  }

  // DOMException from AbortController or AbortSignal.timeout
  if (
    typeof error === 'object' &&
    error !== null &&
    'name' in error &&
    (error.name === 'AbortError' || error.name === 'TimeoutError')
  ) {
    return true;
  }

  const code = extractErrorCode(error);
  return code !== undefined && TIMEOUT_CODES.has(code);
}

export function extractErrorCode(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null) {
    return undefined;
  }

  if ('code' in error && typeof error.code === 'string') {
    return error.code;
  }

  if ('cause' in error && error.cause !== error) {
    return extractErrorCode(error.cause);
  }

  return undefined;
}
