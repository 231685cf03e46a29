import { errors as playwrightErrors } from 'playwright-core';
import { describe, expect, it } from 'vitest';

import { extractErrorCode, toFetchFailure } from '../src/crawler/network/transportErrors.js';
import { FetchFailure } from '../src/errors.js';

const http = { url: 'https://example.com/', mode: 'http', timeoutMs: 1_000 } as const;
const render = { ...http, mode: 'render' } as const;

function withCode(message: string, code: string): Error {
  return Object.assign(new Error(message), { code });
}

describe('toFetchFailure', () => {
  it('passes classified failures through untouched', () => {
    const failure = new FetchFailure('ServerError', 'HTTP 503', {}, { status: 503 });
    expect(toFetchFailure(failure, http)).toBe(failure);
  });

  it('maps aborted requests to Timeout', () => {
    const failure = toFetchFailure(new DOMException('This operation was aborted', 'AbortError'), http);
    expect(failure.outcome).toBe('Timeout');
    expect(failure.message).toBe('Request timed out after 1000ms');
    expect(failure.retryable).toBe(true);
  });

  it('maps Playwright navigation timeouts to Timeout', () => {
    const failure = toFetchFailure(new playwrightErrors.TimeoutError('Timeout 2000ms exceeded.'), render);
    expect(failure.outcome).toBe('Timeout');
  });

  it('maps undici connection timeouts found in the cause chain to Timeout', () => {
    const error = new TypeError('fetch failed', { cause: withCode('Connect Timeout Error', 'UND_ERR_CONNECT_TIMEOUT') });
    expect(toFetchFailure(error, http).outcome).toBe('Timeout');
  });

  it('maps connection errors to TransportError with their code', () => {
    const error = new TypeError('fetch failed', { cause: withCode('connect ECONNREFUSED 127.0.0.1:9', 'ECONNREFUSED') });
    const failure = toFetchFailure(error, http);

    expect(failure.outcome).toBe('TransportError');
    expect(failure.message).toBe('Connection failed (ECONNREFUSED)');
    expect(failure.details).toMatchObject({ code: 'ECONNREFUSED', url: 'https://example.com/' });
  });

  it('maps a bare fetch failure to TransportError', () => {
    expect(toFetchFailure(new TypeError('fetch failed'), http).outcome).toBe('TransportError');
  });

  it('maps other render failures to RenderError', () => {
    const failure = toFetchFailure(new Error('net::ERR_NAME_NOT_RESOLVED'), render);
    expect(failure.outcome).toBe('RenderError');
    expect(failure.message).toBe('net::ERR_NAME_NOT_RESOLVED');
  });

  it('maps anything else to a retryable Unexpected failure', () => {
    const failure = toFetchFailure(new Error('boom'), http);
    expect(failure.outcome).toBe('Unexpected');
    expect(failure.retryable).toBe(true);
    expect(failure.cause).toBeInstanceOf(Error);
  });
});

describe('FetchFailure.retryable', () => {
  it('is false for invalid input and policy denials', () => {
    expect(new FetchFailure('InvalidInput', 'bad url').retryable).toBe(false);
    expect(new FetchFailure('PolicyDenied', 'denied').retryable).toBe(false);
    expect(new FetchFailure('ServerError', 'HTTP 500').retryable).toBe(true);
  });
});

describe('extractErrorCode', () => {
  it('walks nested causes', () => {
    const nested = new Error('outer', { cause: new Error('middle', { cause: withCode('inner', 'ENOTFOUND') }) });
    expect(extractErrorCode(nested)).toBe('ENOTFOUND');
    expect(extractErrorCode('plain string')).toBeUndefined();
  });
});
