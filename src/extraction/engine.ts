import { componentLogger } from '../logger.js';
import type { LeadRecord } from '../types.js';
import { originOf } from '../util/url.js';
import { extractAddresses } from './addresses.js';
import { defaultAddressParsers, type AddressParsers } from './addressParsers.js';
import { parseDocument, type PageDocument } from './document.js';
import { extractEmails, zodEmailValidator, type EmailValidator } from './emails.js';
import { noEntityRecognizer, type EntityRecognizer } from './entityRecognizer.js';
import { extractCompanyName } from './identity.js';
import { extractCanonicalUrl, extractDescription } from './metadata.js';
import { extractPhoneNumbers, resolveRegion } from './phones.js';
import { isPlaceholderEmail, isPlaceholderPhone } from './placeholders.js';
import { extractSocialLinks, type SocialLinks } from './social.js';

export interface ScrapeOptions {
  recognizer?: EntityRecognizer;
  emailValidator?: EmailValidator;
  addressParsers?: AddressParsers;
  /** ISO 3166 alpha-2 region used for numbers written without a country code. */
  defaultRegion?: string;
  dropPlaceholders?: boolean;
}

/**
 * Extracts a lead record from a page. Every field is derived independently;
 * an extractor that throws leaves its field empty and the rest of the record intact.
 * The same input always yields an equal record.
 */
export function scrape(html: string, sourceUrl: string, options: ScrapeOptions = {}): LeadRecord {
  const {
    recognizer = noEntityRecognizer,
    emailValidator = zodEmailValidator,
    addressParsers = defaultAddressParsers,
    defaultRegion = 'US',
    dropPlaceholders = false,
  } = options;

  const doc = parseDocument(html, sourceUrl);
  const region = resolveRegion(defaultRegion);

  const companyName = runExtractor(doc, 'companyName', () => extractCompanyName(doc, recognizer), undefined);
  let phoneNumbers = runExtractor(doc, 'phoneNumbers', () => extractPhoneNumbers(doc, region), []);
  let emails = runExtractor(doc, 'emails', () => extractEmails(doc, emailValidator), []);
  const addresses = runExtractor(doc, 'addresses', () => extractAddresses(doc, addressParsers), []);
  const socialLinks = runExtractor<SocialLinks>(doc, 'socialLinks', () => extractSocialLinks(doc), {});
  const description = runExtractor(doc, 'description', () => extractDescription(doc), undefined);
  const canonicalUrl = runExtractor(doc, 'canonicalUrl', () => extractCanonicalUrl(doc), undefined);

  if (dropPlaceholders) {
    phoneNumbers = runExtractor(doc, 'phoneNumbers', () => phoneNumbers.filter((phone) => !isPlaceholderPhone(phone)), []);
    emails = runExtractor(doc, 'emails', () => emails.filter((email) => !isPlaceholderEmail(email)), []);
  }

  const website = (canonicalUrl ? originOf(canonicalUrl) : undefined) ?? originOf(sourceUrl);

  return Object.freeze({
    companyName: companyName ?? null,
    website: website ?? null,
    sourceUrl,
    canonicalUrl: canonicalUrl ?? null,
    description: description ?? null,
    phoneNumbers: Object.freeze(phoneNumbers),
    emails: Object.freeze(emails),
    addresses: Object.freeze(addresses),
    socialLinks: Object.freeze(socialLinks),
  });
}

export function hasContactSignal(record: LeadRecord): boolean {
  return record.companyName !== null || record.phoneNumbers.length > 0 || record.emails.length > 0;
}

function runExtractor<T>(doc: PageDocument, field: string, extractor: () => T, fallback: T): T {
  try {
    return extractor();
  } catch (error) {
    componentLogger('extraction').debug({ err: error, field, url: doc.sourceUrl }, 'Extractor failed; field left empty');
    return fallback;
  }
}
