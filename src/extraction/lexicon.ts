import { readFileSync } from 'node:fs';
import { z } from 'zod';

import { createConfigurationError } from '../errors.js';

const SocialPlatformSchema = z.object({
  key: z.enum(['linkedin', 'twitter', 'facebook', 'instagram', 'youtube', 'pinterest', 'tiktok']),
  domain: z.string().min(1),
  altDomains: z.array(z.string().min(1)).default([]),
  pathPrefixes: z.array(z.string().min(1)).default([]),
  usernamePattern: z.string().min(1).optional(),
  prependAt: z.boolean().default(false),
  profileQuery: z.object({ path: z.string().min(1), param: z.string().min(1) }).optional(),
  exclusions: z.array(z.string().min(1)).default([]),
});

const SocialLexiconSchema = z.object({
  sharedExclusions: z.array(z.string().min(1)),
  platforms: z.array(SocialPlatformSchema).min(1),
});

const PlaceholderLexiconSchema = z.object({
  phoneDigitSuffixes: z.array(z.string().regex(/^\d+$/)),
  emails: z.array(z.string().min(3)),
  emailDomains: z.array(z.string().min(1)),
});

const GenericTitlesSchema = z.array(z.string().min(1));

export type SocialPlatformRule = z.infer<typeof SocialPlatformSchema>;
export type SocialLexicon = z.infer<typeof SocialLexiconSchema>;
export type PlaceholderLexicon = z.infer<typeof PlaceholderLexiconSchema>;

let genericTitles: ReadonlySet<string> | undefined;
let socialLexicon: SocialLexicon | undefined;
let placeholderLexicon: PlaceholderLexicon | undefined;

/** Lower-cased page titles and labels that never identify a company on their own. */
export function getGenericTitles(): ReadonlySet<string> {
  genericTitles ??= new Set(
    loadDataFile('generic-titles.json', GenericTitlesSchema).map((title) => title.toLowerCase()),
  );
  return genericTitles;
}

export function getSocialLexicon(): SocialLexicon {
  socialLexicon ??= loadDataFile('social-platforms.json', SocialLexiconSchema);
  return socialLexicon;
}

export function getPlaceholderLexicon(): PlaceholderLexicon {
  placeholderLexicon ??= loadDataFile('placeholders.json', PlaceholderLexiconSchema);
  return placeholderLexicon;
}

function loadDataFile<T>(name: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
  const location = new URL(`../../data/${name}`, import.meta.url);
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(location, 'utf8'));
  } catch (error) {
    throw createConfigurationError(`Unable to read data file ${name}`, { file: location.pathname }, { cause: error });
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw createConfigurationError(`Data file ${name} is malformed`, {
      file: location.pathname,
      issues: parsed.error.issues.map((issue) => issue.message),
    });
  }
  return parsed.data;
}
