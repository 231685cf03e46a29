import { load, type CheerioAPI } from 'cheerio';
import { hasChildren, isTag, isText, type AnyNode, type Element } from 'domhandler';

import { componentLogger } from '../logger.js';

export interface PageDocument {
  readonly $: CheerioAPI;
  readonly sourceUrl: string;
}

const SKIPPED_TAGS = new Set(['script', 'style', 'noscript', 'template', 'svg', 'head']);

const BLOCK_TAGS = new Set([
  'address', 'article', 'aside', 'blockquote', 'dd', 'div', 'dl', 'dt', 'fieldset', 'figcaption',
  'figure', 'footer', 'form', 'h1', 'h2', 'h3', 'h4', 'h5', 'h6', 'header', 'hr', 'li', 'main',
  'nav', 'ol', 'p', 'pre', 'section', 'table', 'tbody', 'td', 'th', 'thead', 'tr', 'ul',
]);

export function parseDocument(html: string, sourceUrl: string): PageDocument {
  return { $: load(html), sourceUrl };
}

/** NFKC-normalises, collapses whitespace and trims; empty input yields undefined. */
export function cleanText(value: string | null | undefined): string | undefined {
  if (!value) {
    return undefined;
  }
  const cleaned = value.normalize('NFKC').replace(/\s+/g, ' ').trim();
  return cleaned.length > 0 ? cleaned : undefined;
}

/**
 * Text of a subtree with line structure kept: `<br>` ends a line and block
 * elements are separated by a blank line. Lines are whitespace-collapsed.
 */
export function blockText(node: AnyNode): string {
  const chunks: string[] = [];
  collectText(node, chunks);
  return chunks
    .join('')
    .normalize('NFKC')
    .split('\n')
    .map((line) => line.replace(/[^\S\n]+/g, ' ').trim())
    .join('\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

function collectText(node: AnyNode, chunks: string[]): void {
  if (isText(node)) {
    chunks.push(node.data.replace(/\s+/g, ' '));
    return;
  }

  if (!isTag(node)) {
    if (hasChildren(node)) {
      for (const child of node.children) {
        collectText(child, chunks);
      }
    }
    return;
  }

  const tag = node.name.toLowerCase();
  if (SKIPPED_TAGS.has(tag)) {
    return;
  }

  if (tag === 'br') {
    chunks.push('\n');
    return;
  }

  const block = BLOCK_TAGS.has(tag);
  if (block) {
    chunks.push('\n\n');
  }
  for (const child of node.children) {
    collectText(child, chunks);
  }
  if (block) {
    chunks.push('\n\n');
  }
}

export function elementText(doc: PageDocument, element: Element): string | undefined {
  return cleanText(doc.$(element).text());
}

/** First non-empty `content` among the given meta selectors, in order. */
export function firstMetaContent(doc: PageDocument, selectors: readonly string[]): string | undefined {
  for (const selector of selectors) {
    const content = cleanText(doc.$(selector).first().attr('content'));
    if (content) {
      return content;
    }
  }
  return undefined;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * All JSON-LD objects on the page, with `@graph` containers and top-level
 * arrays flattened. Blocks that fail to parse are skipped.
 */
export function jsonLdNodes(doc: PageDocument): Record<string, unknown>[] {
  const nodes: Record<string, unknown>[] = [];

  doc.$('script[type="application/ld+json"]').each((_idx: number, element: Element) => {
    const raw = doc.$(element).text().trim();
    if (!raw) {
      return;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      componentLogger('extraction').debug({ err: error, url: doc.sourceUrl }, 'Skipping malformed JSON-LD block');
      return;
    }
    flattenJsonLd(parsed, nodes);
  });

  return nodes;
}

function flattenJsonLd(value: unknown, into: Record<string, unknown>[]): void {
  if (Array.isArray(value)) {
    for (const item of value) {
      flattenJsonLd(item, into);
    }
    return;
  }

  if (!isRecord(value)) {
    return;
  }

  into.push(value);
  if (Array.isArray(value['@graph'])) {
    flattenJsonLd(value['@graph'], into);
  }
}

export function jsonLdTypes(node: Record<string, unknown>): string[] {
  const type = node['@type'];
  if (typeof type === 'string') {
    return [type];
  }
  if (Array.isArray(type)) {
    return type.filter((entry): entry is string => typeof entry === 'string');
  }
  return [];
}
