import type { Element } from 'domhandler';

import type { EntityRecognizer } from './entityRecognizer.js';
import { cleanText, elementText, jsonLdNodes, jsonLdTypes, type PageDocument } from './document.js';
import { getGenericTitles } from './lexicon.js';

export interface NameCandidate {
  value: string;
  weight: number;
  source: string;
}

export const IDENTITY_WEIGHTS = {
  siteName: 10,
  structuredData: 9,
  titleMeta: 8,
  title: 7,
  copyright: 6,
  entity: 4,
} as const;

const MAX_WORDS = 5;
const ORGANIZATION_TYPES = new Set(['organization', 'corporation', 'localbusiness']);
const TITLE_SEPARATORS = /\s+[-–—]\s+|\s*[|:•·]\s*/;
const COPYRIGHT_PATTERN =
  /(?:©|\(c\)|\bcopyright\b)\s*(?:©\s*)?(?:\d{4}(?:\s*[-–]\s*(?:\d{4}|present))?\s*,?\s*)?([^|\n©]+?)\s*(?:[.|\n]|\ball rights reserved\b|$)/i;
const BRAND_SELECTORS = [
  '.site-title',
  '.logo-text',
  '.navbar-brand',
  '[class*="brand"]',
  '[id*="brand"]',
  '[class*="logo"]',
  '[id*="logo"]',
];

/** Resolves the page's company name from weighted candidates; undefined when none qualifies. */
export function extractCompanyName(doc: PageDocument, recognizer: EntityRecognizer): string | undefined {
  return pickWinner(collectNameCandidates(doc, recognizer));
}

export function collectNameCandidates(doc: PageDocument, recognizer: EntityRecognizer): NameCandidate[] {
  const { $ } = doc;
  const candidates: NameCandidate[] = [];
  const consider = (raw: string | undefined, weight: number, source: string): boolean => {
    const value = normaliseCandidate(raw);
    if (!value || !isAcceptableName(value)) {
      return false;
    }
    candidates.push({ value, weight, source });
    return true;
  };

  consider($('meta[property="og:site_name"]').first().attr('content'), IDENTITY_WEIGHTS.siteName, 'og:site_name');

  for (const name of structuredOrganizationNames(doc)) {
    consider(name, IDENTITY_WEIGHTS.structuredData, 'structured-data');
  }

  const ogTitle = cleanText($('meta[property="og:title"]').first().attr('content'));
  if (ogTitle) {
    const [firstClause] = splitTitle(ogTitle);
    consider(firstClause, IDENTITY_WEIGHTS.titleMeta, 'og:title');
  }

  const title = cleanText($('title').first().text());
  if (title) {
    for (const clause of splitTitle(title)) {
      if (consider(clause, IDENTITY_WEIGHTS.title, 'title')) {
        break;
      }
    }
  }

  const copyright = copyrightHolder(doc);
  consider(copyright, IDENTITY_WEIGHTS.copyright, 'copyright');

  for (const text of entitySourceTexts(doc, copyright)) {
    for (const organization of recognizer.organizations(text)) {
      consider(organization, IDENTITY_WEIGHTS.entity, 'entity');
    }
  }

  return candidates;
}

/**
 * Case-insensitive dedup keeping the higher weight, then the longer string;
 * the winner is the highest (weight, length).
 */
export function pickWinner(candidates: readonly NameCandidate[]): string | undefined {
  const best = new Map<string, NameCandidate>();
  for (const candidate of candidates) {
    const key = candidate.value.toLowerCase();
    const existing = best.get(key);
    if (!existing || outranks(candidate, existing)) {
      best.set(key, candidate);
    }
  }

  let winner: NameCandidate | undefined;
  for (const candidate of best.values()) {
    if (!winner || outranks(candidate, winner)) {
      winner = candidate;
    }
  }
  return winner?.value;
}

function outranks(a: NameCandidate, b: NameCandidate): boolean {
  if (a.weight !== b.weight) {
    return a.weight > b.weight;
  }
  return a.value.length > b.value.length;
}

export function isAcceptableName(value: string): boolean {
  if (value.length < 2 || /^\d+$/.test(value)) {
    return false;
  }
  if (value.split(' ').length > MAX_WORDS) {
    return false;
  }
  return !getGenericTitles().has(value.toLowerCase());
}

export function splitTitle(title: string): string[] {
  return title
    .split(TITLE_SEPARATORS)
    .map((clause) => clause.trim())
    .filter((clause) => clause.length > 0);
}

function normaliseCandidate(raw: string | undefined): string | undefined {
  const cleaned = cleanText(raw);
  return cleaned?.replace(/^[\s"'“”‘’]+|[\s"'“”‘’,;]+$/g, '') || undefined;
}

function structuredOrganizationNames(doc: PageDocument): string[] {
  const { $ } = doc;
  const names: string[] = [];

  $('[itemscope][itemtype]').each((_idx: number, scope: Element) => {
    const itemType = $(scope).attr('itemtype') ?? '';
    const typeName = itemType.split(/[\/#]/).pop()?.toLowerCase() ?? '';
    if (!ORGANIZATION_TYPES.has(typeName)) {
      return;
    }

    $(scope)
      .find('[itemprop="name"], [itemprop="legalName"]')
      .each((_i: number, prop: Element) => {
        // properties of nested items (an address, a person) belong to those items
        if ($(prop).parent().closest('[itemscope]').get(0) !== scope) {
          return;
        }
        const value = $(prop).attr('content') ?? elementText(doc, prop);
        if (value) {
          names.push(value);
        }
      });
  });

  for (const node of jsonLdNodes(doc)) {
    const types = jsonLdTypes(node).map((type) => type.toLowerCase());
    if (!types.some((type) => ORGANIZATION_TYPES.has(type))) {
      continue;
    }
    for (const field of ['name', 'legalName']) {
      const value = node[field];
      if (typeof value === 'string') {
        names.push(value);
      }
    }
  }

  return names;
}

function copyrightHolder(doc: PageDocument): string | undefined {
  const { $ } = doc;
  const footer = $('footer').first();
  const scope = footer.length > 0 ? footer : $('body');
  const text = scope.text().normalize('NFKC');
  const match = COPYRIGHT_PATTERN.exec(text);
  const holder = match?.[1]?.trim();
  return holder ? holder.replace(/\s+/g, ' ') : undefined;
}

function entitySourceTexts(doc: PageDocument, copyright: string | undefined): string[] {
  const { $ } = doc;
  const texts: string[] = [];

  const heading = cleanText($('h1').first().text());
  if (heading) {
    texts.push(heading);
  }

  $<Element, string>(BRAND_SELECTORS.join(', '))
    .slice(0, 10)
    .each((_idx: number, element: Element) => {
      const text = elementText(doc, element) ?? cleanText($(element).find('img[alt]').first().attr('alt'));
      if (text) {
        texts.push(text);
      }
    });

  if (copyright) {
    texts.push(copyright);
  }
  return texts;
}
