import { resolveHttpUrl } from '../util/url.js';
import { firstMetaContent, type PageDocument } from './document.js';

const DESCRIPTION_SELECTORS = [
  'meta[property="og:description"]',
  'meta[name="description"]',
  'meta[name="twitter:description"]',
  'meta[property="twitter:description"]',
] as const;

export function extractDescription(doc: PageDocument): string | undefined {
  return firstMetaContent(doc, DESCRIPTION_SELECTORS);
}

/** The page's declared canonical URL, resolved against the source URL; http(s) only. */
export function extractCanonicalUrl(doc: PageDocument): string | undefined {
  const href = doc.$('link[rel~="canonical"]').first().attr('href');
  return href ? resolveHttpUrl(href, doc.sourceUrl) : undefined;
}
