import type { Element } from 'domhandler';
import {
  findPhoneNumbersInText,
  getCountries,
  parsePhoneNumberFromString,
  type CountryCode,
  type PhoneNumber,
} from 'libphonenumber-js';

import { safeDecodeURIComponent } from '../util/url.js';
import { blockText, cleanText, type PageDocument } from './document.js';

const CONTACT_SELECTORS = [
  '[itemprop="telephone"]',
  '.contact-info',
  '.phone',
  '[class*="contact"]',
  '[id*="contact"]',
  '[class*="phone"]',
  '[id*="phone"]',
  '[class~="tel"]',
  '[class^="tel-"]',
  '[class*=" tel-"]',
  '[id="tel"]',
  '[id^="tel-"]',
  'address',
  'footer',
  'header',
].join(', ');

const BROAD_SELECTORS = 'p, div, span, li, td';
const MIN_SPECIFIC_CONTAINERS = 2;
const MAX_BROAD_BLOCK_CHARS = 1_000;

/** Resolves a configured region string to a supported country code, defaulting to US. */
export function resolveRegion(region: string): CountryCode {
  return getCountries().find((code) => code === region.toUpperCase()) ?? 'US';
}

/**
 * Phones from `tel:` links, contact-like containers and, when the page has few
 * of those, short block elements. Every value is validated and returned as E.164.
 */
export function extractPhoneNumbers(doc: PageDocument, region: CountryCode): string[] {
  const { $ } = doc;
  const found = new Set<string>();
  const add = (phone: PhoneNumber | undefined): void => {
    if (phone?.isValid()) {
      found.add(phone.number);
    }
  };

  $('a[href^="tel:" i]').each((_idx: number, link: Element) => {
    const href = $(link).attr('href') ?? '';
    add(parseTelHref(href, region));
    const label = cleanText($(link).text());
    if (label) {
      add(parsePhoneNumberFromString(stripPhoneLabel(label), region));
    }
  });

  const containers = $<Element, string>(CONTACT_SELECTORS);
  containers.each((_idx: number, element: Element) => {
    scanText(blockText(element), region, add);
  });

  if (containers.length < MIN_SPECIFIC_CONTAINERS) {
    $(BROAD_SELECTORS).each((_idx: number, element: Element) => {
      const text = blockText(element);
      if (text.length <= MAX_BROAD_BLOCK_CHARS) {
        scanText(text, region, add);
      }
    });
  }

  return [...found].sort();
}

export function parseTelHref(href: string, region: CountryCode): PhoneNumber | undefined {
  const target = href.replace(/^tel:/i, '').split(/[;?]/)[0] ?? '';
  return parsePhoneNumberFromString(safeDecodeURIComponent(target).trim(), region);
}

export function stripPhoneLabel(text: string): string {
  return text
    .replace(/^\s*(?:telephone|phone|tel|call|fax|mobile)\s*[:.]?\s*/i, '')
    .replace(/\s*(?:ext|x|extension)\.?\s*\d+\s*$/i, '')
    .trim();
}

function scanText(text: string, region: CountryCode, add: (phone: PhoneNumber | undefined) => void): void {
  if (!/\d/.test(text)) {
    return;
  }
  for (const match of findPhoneNumbersInText(text, region)) {
    add(match.number);
  }
}
