import pino, { type DestinationStream, type LoggerOptions } from 'pino';

export interface LoggerLike {
  info(...args: unknown[]): void;
  error(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  debug(...args: unknown[]): void;
  trace(...args: unknown[]): void;
  fatal(...args: unknown[]): void;
  child(bindings: Record<string, unknown>): LoggerLike;
}

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LoggerConfiguration {
  level?: LogLevel;
  base?: LoggerOptions['base'];
  /** Defaults to stderr: stdout carries records and summaries. */
  destination?: DestinationStream;
}

const DEFAULT_LEVEL: LogLevel = 'silent';
const DEFAULT_BASE = { service: 'leadgen-crawler' } as const;

// proxy URLs may carry credentials
const REDACTED_PATHS = ['proxyUrl', 'proxy.server', 'settings.fetch.proxyUrl', 'headers.cookie', 'headers.authorization'];

let activeLogger: LoggerLike = createPinoInstance();

export function configureLogger(config: LoggerConfiguration = {}): void {
  activeLogger = createPinoInstance(config);
}

export function setLoggerInstance(logger: LoggerLike): void {
  activeLogger = logger;
}

export function getLogger(): LoggerLike {
  return activeLogger;
}

/**
 * Child logger tagged with a component name. Resolved on every call, so a
 * logger swapped in later also reaches components built before the swap.
 */
export function componentLogger(component: string): LoggerLike {
  return getLogger().child({ component });
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function createPinoInstance(config: LoggerConfiguration = {}): LoggerLike {
  const options: LoggerOptions = {
    level: config.level ?? DEFAULT_LEVEL,
    base: config.base ?? DEFAULT_BASE,
    timestamp: pino.stdTimeFunctions.isoTime,
    redact: { paths: REDACTED_PATHS, censor: '[redacted]' },
  };

  return pino(options, config.destination ?? pino.destination(2));
}
