import type { Element } from 'domhandler';
import { z } from 'zod';

import { safeDecodeURIComponent } from '../util/url.js';
import { blockText, type PageDocument } from './document.js';

/** Syntactic check applied to every lower-cased candidate; returns the normalised address or undefined. */
export interface EmailValidator {
  normalize(candidate: string): string | undefined;
}

const emailSchema = z.string().email();

export const zodEmailValidator: EmailValidator = {
  normalize(candidate) {
    const parsed = emailSchema.safeParse(candidate);
    return parsed.success ? parsed.data : undefined;
  },
};

const EMAIL_PATTERN = /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g;
const ASSET_SUFFIX = /\.(?:png|jpe?g|gif|svg|webp|avif|css|js)$/i;
const CLOUDFLARE_PATH = '/cdn-cgi/l/email-protection';

/**
 * Emails from Cloudflare-protected links and spans, `mailto:` targets and
 * de-obfuscated page text. Output is lower-case, validated, sorted and unique.
 */
export function extractEmails(doc: PageDocument, validator: EmailValidator = zodEmailValidator): string[] {
  const { $ } = doc;
  const candidates: string[] = [];

  $<Element, string>(`a[href*="${CLOUDFLARE_PATH}"]`).each((_idx: number, link: Element) => {
    const href = $(link).attr('href') ?? '';
    const hashIndex = href.indexOf('#');
    if (hashIndex !== -1) {
      const decoded = decodeCloudflareEmail(href.slice(hashIndex + 1));
      if (decoded) {
        candidates.push(decoded);
      }
    }
  });

  $('[data-cfemail]').each((_idx: number, element: Element) => {
    const decoded = decodeCloudflareEmail($(element).attr('data-cfemail') ?? '');
    if (decoded) {
      candidates.push(decoded);
    }
  });

  $('a[href^="mailto:" i]').each((_idx: number, link: Element) => {
    const href = $(link).attr('href') ?? '';
    const [addresses = ''] = href.replace(/^mailto:/i, '').split('?');
    for (const address of safeDecodeURIComponent(addresses).split(',')) {
      candidates.push(address.trim());
    }
  });

  const body = $('body').get(0) ?? $.root().get(0);
  if (body) {
    const text = deobfuscate(blockText(body));
    candidates.push(...(text.match(EMAIL_PATTERN) ?? []));
  }

  const emails = new Set<string>();
  for (const candidate of candidates) {
    const lowered = candidate.toLowerCase();
    if (!lowered || ASSET_SUFFIX.test(lowered)) {
      continue;
    }
    const normalized = validator.normalize(lowered);
    if (normalized) {
      emails.add(normalized.toLowerCase());
    }
  }
  return [...emails].sort();
}

/**
 * Cloudflare's email protection: the first hex byte is the key and every
 * following byte is XOR-ed with it.
 */
export function decodeCloudflareEmail(encoded: string): string | undefined {
  const hex = encoded.trim();
  if (hex.length < 4 || hex.length % 2 !== 0 || !/^[0-9a-f]+$/i.test(hex)) {
    return undefined;
  }

  const key = Number.parseInt(hex.slice(0, 2), 16);
  let decoded = '';
  for (let offset = 2; offset < hex.length; offset += 2) {
    decoded += String.fromCharCode(Number.parseInt(hex.slice(offset, offset + 2), 16) ^ key);
  }
  return decoded;
}

/** Undoes common address obfuscation: `[at]`, `(at)`, `<at>` and ` at ` become `@`; the `dot` forms become `.`. */
export function deobfuscate(text: string): string {
  return text
    .replace(/\s*[[(<{]\s*at\s*[\])>}]\s*/gi, '@')
    .replace(/\s*[[(<{]\s*dot\s*[\])>}]\s*/gi, '.')
    .replace(/\s+at\s+/gi, '@')
    .replace(/\s+dot\s+/gi, '.')
    .replace(/\s*@\s*/g, '@');
}
