import { z, ZodError } from 'zod';

import { createConfigurationError } from './errors.js';
import { LOG_LEVELS } from './logger.js';

export const DEFAULT_USER_AGENTS: readonly string[] = [
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/125.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/125.0.0.0 Safari/537.36',
  'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/125.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:126.0) Gecko/20100101 Firefox/126.0',
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10.15; rv:126.0) Gecko/20100101 Firefox/126.0',
];

const KeyStrategySchema = z.enum(['registrable-domain', 'hostname']);

const FetchSettingsSchema = z.object({
  userAgents: z.array(z.string().min(1)).min(1).default(() => [...DEFAULT_USER_AGENTS]),
  timeoutMs: z.number().int().positive().default(30_000),
  defaultMode: z.enum(['http', 'render']).default('http'),
  headless: z.boolean().default(true),
  proxyUrl: z.string().url().optional(),
  browserExecutablePath: z.string().min(1).optional(),
  challengeScanChars: z.number().int().positive().default(2_000),
});

const ThrottleSettingsSchema = z
  .object({
    minDelayMs: z.number().int().nonnegative().default(3_000),
    maxDelayMs: z.number().int().nonnegative().default(10_000),
    maxConcurrentPerDomain: z.number().int().positive().default(1),
    keyBy: KeyStrategySchema.default('registrable-domain'),
  })
  .refine((value) => value.maxDelayMs >= value.minDelayMs, {
    message: 'maxDelayMs must be greater than or equal to minDelayMs',
    path: ['maxDelayMs'],
  });

const RetrySettingsSchema = z.object({
  maxRetries: z.number().int().nonnegative().default(3),
  baseDelayMs: z.number().int().nonnegative().default(1_000),
  backoffFactor: z.number().min(1).default(2),
  jitter: z.number().min(0).max(1).default(0.5),
});

const PolicySettingsSchema = z.object({
  enabled: z.boolean().default(true),
  userAgent: z.string().min(1).default('*'),
  cacheSize: z.number().int().min(1).max(1_000).default(100),
  timeoutMs: z.number().int().positive().default(10_000),
  keyBy: KeyStrategySchema.default('registrable-domain'),
});

const PipelineSettingsSchema = z.object({
  concurrency: z.number().int().positive().default(5),
  batchSize: z.number().int().positive().default(25),
});

const ExtractionSettingsSchema = z.object({
  defaultRegion: z
    .string()
    .regex(/^[A-Z]{2}$/, 'defaultRegion must be an ISO 3166-1 alpha-2 code')
    .default('US'),
  dropPlaceholders: z.boolean().default(false),
});

export const SettingsSchema = z.object({
  fetch: FetchSettingsSchema.default({}),
  throttle: ThrottleSettingsSchema.default({}),
  retry: RetrySettingsSchema.default({}),
  policy: PolicySettingsSchema.default({}),
  pipeline: PipelineSettingsSchema.default({}),
  extraction: ExtractionSettingsSchema.default({}),
  logLevel: z.enum(LOG_LEVELS).default('silent'),
});

export type KeyStrategy = z.infer<typeof KeyStrategySchema>;
export type SettingsInput = z.input<typeof SettingsSchema>;

type DeepReadonly<T> = T extends readonly (infer U)[]
  ? readonly DeepReadonly<U>[]
  : T extends object
    ? { readonly [K in keyof T]: DeepReadonly<T[K]> }
    : T;

export type Settings = DeepReadonly<z.infer<typeof SettingsSchema>>;

/**
 * Validates overrides against the defaults and returns a frozen settings value.
 * Components receive it by reference and never mutate it.
 */
export function loadSettings(overrides: SettingsInput = {}): Settings {
  try {
    return deepFreeze(SettingsSchema.parse(overrides));
  } catch (error) {
    if (error instanceof ZodError) {
      const issues = error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
      throw createConfigurationError(`Invalid configuration: ${issues.join('; ')}`, { issues }, { cause: error });
    }
    throw error;
  }
}

function deepFreeze<T extends object>(value: T): T {
  for (const key of Object.keys(value)) {
    const nested: unknown = Reflect.get(value, key);
    if (typeof nested === 'object' && nested !== null && !Object.isFrozen(nested)) {
      deepFreeze(nested);
    }
  }
  Object.freeze(value);
  return value;
}
