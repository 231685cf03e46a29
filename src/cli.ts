#!/usr/bin/env node
import { createRequire } from 'node:module';
import { Command } from 'commander';

import { loadSettings, type SettingsInput } from './config.js';
import { createConfigurationError } from './errors.js';
import { DEFAULT_OUTPUT_FILE, runLeadPipeline, scrapeUrl } from './index.js';
import { configureLogger, isLogLevel, type LogLevel } from './logger.js';
import type { OutputFormat } from './types.js';
import { reportCrawlerError } from './util/errorHandler.js';
import { logError, writeJson } from './util/output.js';

const require = createRequire(import.meta.url);
const pkg: unknown = require('../package.json');

const program = new Command();

program
  .name('leadgen-crawler')
  .description('Fetch business websites politely and extract contact leads.')
  .version(packageVersion(pkg));

program
  .command('run')
  .description('Run every URL in a seed file through the fetch and extraction pipeline.')
  .argument('<seedFile>', 'CSV file with a "url" column, or one URL per line.')
  .option('--output <path>', `JSON Lines file receiving saved records. (default: ${DEFAULT_OUTPUT_FILE})`)
  .option('--concurrency <number>', 'Maximum URLs processed at once. (default: 5)')
  .option('--batch-size <number>', 'Records per sink commit. (default: 25)')
  .option('--timeout-ms <number>', 'Timeout per request in milliseconds; doubled for rendered pages. (default: 30000)')
  .option('--min-delay-ms <number>', 'Minimum delay between requests to one domain. (default: 3000)')
  .option('--max-delay-ms <number>', 'Maximum delay between requests to one domain. (default: 10000)')
  .option('--max-retries <number>', 'Retries after a retryable failure. (default: 3)')
  .option('--render', 'Fetch pages with headless Chromium instead of plain HTTP.')
  .option('--no-robots', 'Skip robots.txt checks.')
  .option('--proxy <url>', 'Proxy server for the headless browser.')
  .option('--region <code>', 'Default region for phone numbers without a country code. (default: US)')
  .option('--drop-placeholders', 'Drop well-known placeholder phone numbers and emails.')
  .option('--quiet', 'Suppress per-record output and emit only periodic progress summaries.')
  .option('--format <format>', 'Output format to emit (text or json). Defaults to text.')
  .option('--log-level <level>', 'Set log verbosity (pino levels: trace|debug|info|warn|error|fatal|silent).')
  .action(async (seedFile: string, options: Record<string, unknown>) => {
    try {
      const settings = loadSettings(buildSettingsInput(options));
      configureLogger({ level: settings.logLevel });
      const summary = await runLeadPipeline(seedFile, {
        settings,
        outputFile: options.output === undefined ? undefined : String(options.output),
        format: parseFormat(options.format),
        quiet: options.quiet === true,
        render: options.render === true,
        handleSigint: true,
      });
      if (summary.cancelled) {
        process.exitCode = 130;
      }
    } catch (error) {
      reportCliError(error);
    }
  });

program
  .command('scrape')
  .description('Fetch one URL and print its lead record as JSON.')
  .argument('<url>', 'Page to fetch.')
  .option('--render', 'Fetch the page with headless Chromium instead of plain HTTP.')
  .option('--timeout-ms <number>', 'Timeout per request in milliseconds. (default: 30000)')
  .option('--no-robots', 'Skip robots.txt checks.')
  .option('--proxy <url>', 'Proxy server for the headless browser.')
  .option('--region <code>', 'Default region for phone numbers without a country code. (default: US)')
  .option('--log-level <level>', 'Set log verbosity (pino levels: trace|debug|info|warn|error|fatal|silent).')
  .action(async (url: string, options: Record<string, unknown>) => {
    try {
      const settings = loadSettings(buildSettingsInput(options));
      configureLogger({ level: settings.logLevel });
      const record = await scrapeUrl(url, { settings, render: options.render === true });
      writeJson(record);
    } catch (error) {
      reportCliError(error);
    }
  });

await program.parseAsync(process.argv);

function buildSettingsInput(rawOptions: Record<string, unknown>): SettingsInput {
  const fetch: NonNullable<SettingsInput['fetch']> = {};
  const throttle: NonNullable<SettingsInput['throttle']> = {};
  const retry: NonNullable<SettingsInput['retry']> = {};
  const policy: NonNullable<SettingsInput['policy']> = {};
  const pipeline: NonNullable<SettingsInput['pipeline']> = {};
  const extraction: NonNullable<SettingsInput['extraction']> = {};

  if (rawOptions.timeoutMs !== undefined) {
    fetch.timeoutMs = asNumber(rawOptions.timeoutMs, 'timeout-ms');
  }

  if (rawOptions.proxy !== undefined) {
    fetch.proxyUrl = String(rawOptions.proxy);
  }

  if (rawOptions.render === true) {
    fetch.defaultMode = 'render';
  }

  if (rawOptions.minDelayMs !== undefined) {
    throttle.minDelayMs = asNumber(rawOptions.minDelayMs, 'min-delay-ms');
  }

  if (rawOptions.maxDelayMs !== undefined) {
    throttle.maxDelayMs = asNumber(rawOptions.maxDelayMs, 'max-delay-ms');
  }

  if (rawOptions.maxRetries !== undefined) {
    retry.maxRetries = asNumber(rawOptions.maxRetries, 'max-retries');
  }

  // commander turns --no-robots into robots: false
  if (rawOptions.robots === false) {
    policy.enabled = false;
  }

  if (rawOptions.concurrency !== undefined) {
    pipeline.concurrency = asNumber(rawOptions.concurrency, 'concurrency');
  }

  if (rawOptions.batchSize !== undefined) {
    pipeline.batchSize = asNumber(rawOptions.batchSize, 'batch-size');
  }

  if (rawOptions.region !== undefined) {
    extraction.defaultRegion = String(rawOptions.region).toUpperCase();
  }

  if (rawOptions.dropPlaceholders === true) {
    extraction.dropPlaceholders = true;
  }

  return {
    fetch,
    throttle,
    retry,
    policy,
    pipeline,
    extraction,
    logLevel: parseLogLevel(rawOptions.logLevel),
  };
}

function parseFormat(value: unknown): OutputFormat {
  if (value === undefined) {
    return 'text';
  }
  const format = String(value).toLowerCase();
  if (!isOutputFormat(format)) {
    throw createConfigurationError(`Unsupported format: ${format}`, { value: format });
  }
  return format;
}

function parseLogLevel(value: unknown): LogLevel {
  if (value === undefined) {
    return 'info';
  }
  const level = String(value).toLowerCase();
  if (!isLogLevel(level)) {
    throw createConfigurationError(`Unsupported log level: ${level}`, { value: level });
  }
  return level;
}

function asNumber(value: unknown, label: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw createConfigurationError(`${label} must be a finite number.`, { value });
  }

  return parsed;
}

function packageVersion(manifest: unknown): string {
  if (typeof manifest === 'object' && manifest !== null && 'version' in manifest && typeof manifest.version === 'string') {
    return manifest.version;
  }
  return '0.0.0';
}

function reportCliError(error: unknown): void {
  const crawlerError = reportCrawlerError(error, { stage: 'cli' }, {
    defaultKind: 'config',
    defaultSeverity: 'fatal',
    throwOnFatal: false,
  });
  logError(`Error: ${crawlerError.message}`);
  process.exitCode = 1;
}

function isOutputFormat(value: string): value is OutputFormat {
  return value === 'text' || value === 'json';
}
