import { chromium } from 'playwright-core';

import { FetchFailure } from '../../errors.js';
import { componentLogger } from '../../logger.js';
import type { FetchRequest } from '../../types.js';
import { safeDecodeURIComponent } from '../../util/url.js';
import type { Transport, TransportResponse } from './transport.js';
import { toFetchFailure } from './transportErrors.js';

export interface RenderResponse {
  status(): number;
}

export interface RenderPage {
  goto(url: string, options: { waitUntil: 'domcontentloaded'; timeout: number }): Promise<RenderResponse | null>;
  content(): Promise<string>;
  url(): string;
}

export interface RenderContext {
  addInitScript(script: string): Promise<unknown>;
  newPage(): Promise<RenderPage>;
  close(): Promise<void>;
}

export interface RenderContextOptions {
  userAgent: string;
  viewport: { width: number; height: number };
  bypassCSP: boolean;
  ignoreHTTPSErrors: boolean;
}

export interface RenderBrowser {
  newContext(options: RenderContextOptions): Promise<RenderContext>;
  isConnected(): boolean;
  close(): Promise<void>;
}

export interface BrowserProxy {
  server: string;
  username?: string;
  password?: string;
}

export interface BrowserLaunchOptions {
  headless: boolean;
  args: string[];
  proxy?: BrowserProxy;
  executablePath?: string;
}

export interface BrowserLauncher {
  launch(options: BrowserLaunchOptions): Promise<RenderBrowser>;
}

export interface RenderTransportOptions {
  headless: boolean;
  proxyUrl?: string;
  executablePath?: string;
  launcher?: BrowserLauncher;
  random?(): number;
}

const LAUNCH_ARGS = [
  '--no-sandbox',
  '--disable-setuid-sandbox',
  '--disable-dev-shm-usage',
  '--disable-blink-features=AutomationControlled',
  '--disable-infobars',
  '--disable-popup-blocking',
  '--disable-notifications',
  '--ignore-certificate-errors',
];

const HIDE_WEBDRIVER_SCRIPT = "Object.defineProperty(navigator, 'webdriver', { get: () => undefined });";

const chromiumLauncher: BrowserLauncher = {
  launch: (options) => chromium.launch(options),
};

/**
 * Headless Chromium transport. One browser process is shared by every call and
 * launched on first use; each navigation gets its own context, closed on every path.
 */
export class RenderTransport implements Transport {
  private browserPromise: Promise<RenderBrowser> | undefined;
  private readonly launcher: BrowserLauncher;
  private readonly random: () => number;

  constructor(private readonly options: RenderTransportOptions) {
    this.launcher = options.launcher ?? chromiumLauncher;
    this.random = options.random ?? Math.random;
  }

  get started(): boolean {
    return this.browserPromise !== undefined;
  }

  async fetch(request: FetchRequest): Promise<TransportResponse> {
    let context: RenderContext | undefined;

    try {
      const browser = await this.browser();
      context = await browser.newContext({
        userAgent: request.headers['user-agent'] ?? '',
        viewport: this.randomViewport(),
        bypassCSP: true,
        ignoreHTTPSErrors: true,
      });
      await context.addInitScript(HIDE_WEBDRIVER_SCRIPT);

      const page = await context.newPage();
      const response = await page.goto(request.url, {
        waitUntil: 'domcontentloaded',
        timeout: request.timeoutMs,
      });

      const status = response?.status();
      if (status !== undefined && (status < 200 || status >= 300)) {
        throw new FetchFailure('ServerError', `HTTP ${status}`, { url: request.url, mode: 'render' }, { status });
      }

      const content = await page.content();
      return { content, finalUrl: page.url() || request.url, status };
    } catch (error) {
      throw toFetchFailure(error, { url: request.url, mode: 'render', timeoutMs: request.timeoutMs });
    } finally {
      if (context) {
        await context.close().catch((error: unknown) => {
          componentLogger('render-transport').debug({ err: error }, 'Failed to close browser context');
        });
      }
    }
  }

  async shutdown(): Promise<void> {
    const pending = this.browserPromise;
    this.browserPromise = undefined;
    if (!pending) {
      return;
    }

    try {
      const browser = await pending;
      await browser.close();
    } catch (error) {
      componentLogger('render-transport').warn({ err: error }, 'Browser shutdown failed');
    }
  }

  private async browser(): Promise<RenderBrowser> {
    const current = this.browserPromise;
    if (current) {
      const existing = await current;
      if (existing.isConnected()) {
        return existing;
      }
      if (this.browserPromise === current) {
        this.browserPromise = undefined;
      }
    }

    if (!this.browserPromise) {
      const launching = this.launch();
      this.browserPromise = launching;
      // a failed launch must not poison later calls
      launching.catch(() => {
        if (this.browserPromise === launching) {
          this.browserPromise = undefined;
        }
      });
    }

    return this.browserPromise;
  }

  private async launch(): Promise<RenderBrowser> {
    const launchOptions: BrowserLaunchOptions = {
      headless: this.options.headless,
      args: [...LAUNCH_ARGS],
    };
    if (this.options.proxyUrl) {
      launchOptions.proxy = browserProxy(this.options.proxyUrl);
    }
    if (this.options.executablePath) {
      launchOptions.executablePath = this.options.executablePath;
    }

    componentLogger('render-transport').info({ headless: launchOptions.headless }, 'Launching browser');
    return this.launcher.launch(launchOptions);
  }

  private randomViewport(): { width: number; height: number } {
    return {
      width: 1280 + Math.floor(this.random() * (1920 - 1280 + 1)),
      height: 720 + Math.floor(this.random() * (1080 - 720 + 1)),
    };
  }
}

/** Chromium takes proxy credentials separately from the server address. */
export function browserProxy(proxyUrl: string): BrowserProxy {
  let parsed: URL;
  try {
    parsed = new URL(proxyUrl);
  } catch {
    return { server: proxyUrl };
  }
  // "host:port" parses with the host as a scheme
  if (!parsed.host) {
    return { server: proxyUrl };
  }

  const proxy: BrowserProxy = { server: `${parsed.protocol}//${parsed.host}` };
  if (parsed.username) {
    proxy.username = safeDecodeURIComponent(parsed.username);
    proxy.password = safeDecodeURIComponent(parsed.password);
  }
  return proxy;
}
