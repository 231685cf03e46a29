import { fetch, ProxyAgent } from 'undici';

import { FetchFailure } from '../../errors.js';
import type { FetchRequest } from '../../types.js';
import type { Transport, TransportResponse } from './transport.js';
import { toFetchFailure } from './transportErrors.js';

export interface HttpTransportOptions {
  /** Every request is tunnelled through this proxy; `user:pass@` becomes Proxy-Authorization. */
  proxyUrl?: string;
}

/** Single request over undici's fetch; redirects are followed, non-2xx raises. */
export class HttpTransport implements Transport {
  private readonly proxyAgent: ProxyAgent | undefined;

  constructor(options: HttpTransportOptions = {}) {
    this.proxyAgent = options.proxyUrl ? new ProxyAgent(options.proxyUrl) : undefined;
  }

  async fetch(request: FetchRequest): Promise<TransportResponse> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), request.timeoutMs);

    try {
      const response = await fetch(request.url, {
        redirect: 'follow',
        signal: controller.signal,
        headers: { ...request.headers },
        dispatcher: this.proxyAgent,
      });

      if (!response.ok) {
        // release the socket before raising
        await response.body?.cancel();
        throw new FetchFailure(
          'ServerError',
          `HTTP ${response.status}`,
          { url: request.url, finalUrl: response.url },
          { status: response.status },
        );
      }

      const content = await response.text();
      return { content, finalUrl: response.url || request.url, status: response.status };
    } catch (error) {
      throw toFetchFailure(error, { url: request.url, mode: 'http', timeoutMs: request.timeoutMs });
    } finally {
      clearTimeout(timeoutId);
    }
  }

  async shutdown(): Promise<void> {
    await this.proxyAgent?.close();
  }
}
