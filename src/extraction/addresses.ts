import type { Element } from 'domhandler';

import {
  coreFieldCount,
  defaultAddressParsers,
  formatAddress,
  parseAddress,
  parseStreetLine,
  populatedFieldCount,
  type AddressFields,
  type AddressParsers,
} from './addressParsers.js';
import { blockText, cleanText, isRecord, jsonLdNodes, jsonLdTypes, type PageDocument } from './document.js';

const ADDRESS_CONTAINERS = [
  'address',
  '.address',
  '.location',
  '[class*="addr"]',
  '[id*="addr"]',
  'footer',
  '.contact-info',
  '.contact-details',
  '.widget_contact_info',
].join(', ');

const MIN_SEGMENT_CHARS = 10;
const MAX_SEGMENT_CHARS = 400;
const MIN_SEGMENT_FIELDS = 3;
const MIN_STRUCTURED_FIELDS = 2;

const PHONE_LINE = /^(?:(?:tel|phone|telephone|fax|call|mobile)\b.*|[\s+()\d./-]{7,})$/i;

interface StructuredAddress {
  /** A schema.org address given as one string rather than as sub-fields. */
  raw?: string;
  streetAddress?: string;
  locality?: string;
  region?: string;
  postalCode?: string;
  country?: string;
}

/**
 * Postal addresses from schema.org PostalAddress blocks, then from
 * address-like containers (or the whole body when there are none).
 * Free-text segments must parse into at least three fields and must not
 * overlap an address already found.
 */
export function extractAddresses(doc: PageDocument, parsers: AddressParsers = defaultAddressParsers): string[] {
  const found: string[] = [];
  const keep = (formatted: string): void => {
    const lowered = formatted.toLowerCase();
    const overlaps = found.some((existing) => {
      const other = existing.toLowerCase();
      return other.includes(lowered) || lowered.includes(other);
    });
    if (formatted && !overlaps) {
      found.push(formatted);
    }
  };

  for (const structured of structuredAddresses(doc)) {
    if (structured.raw) {
      const parsed = parseAddress(structured.raw, parsers);
      if (populatedFieldCount(parsed) >= MIN_STRUCTURED_FIELDS) {
        keep(formatAddress(parsed));
      }
      continue;
    }
    const fields = structuredFields(structured);
    if (populatedFieldCount(fields) >= MIN_STRUCTURED_FIELDS) {
      keep(formatAddress(fields));
      continue;
    }
    const flattened = Object.values(structured).filter(Boolean).join(', ');
    const parsed = parseAddress(flattened, parsers);
    if (populatedFieldCount(parsed) >= MIN_STRUCTURED_FIELDS) {
      keep(formatAddress(parsed));
    }
  }

  const { $ } = doc;
  const containers = $<Element, string>(ADDRESS_CONTAINERS).toArray();
  const body = $('body').get(0) ?? $.root().get(0);
  const scopes = containers.length > 0 ? containers : body ? [body] : [];

  for (const scope of scopes) {
    for (const segment of addressSegments(blockText(scope))) {
      const fields = parseAddress(segment, parsers);
      if (isPlausible(fields)) {
        keep(formatAddress(fields));
      }
    }
  }

  return found.sort();
}

/** Blank-line separated chunks of a block of text, with phone and email lines removed. */
export function addressSegments(text: string): string[] {
  return text
    .split(/\n\s*\n+/)
    .map((segment) =>
      segment
        .split('\n')
        .map((line) => line.trim())
        .filter((line) => line.length > 0 && !line.includes('@') && !PHONE_LINE.test(line))
        .join('\n'),
    )
    .filter((segment) => segment.length >= MIN_SEGMENT_CHARS && segment.length <= MAX_SEGMENT_CHARS);
}

function isPlausible(fields: AddressFields): boolean {
  // prose split on commas can fill locality fields; a road or postal code anchors a real address
  return (
    populatedFieldCount(fields) >= MIN_SEGMENT_FIELDS &&
    coreFieldCount(fields) >= 2 &&
    Boolean(fields.road ?? fields.postalCode)
  );
}

function structuredFields(structured: StructuredAddress): AddressFields {
  const fields: AddressFields = {};
  if (structured.streetAddress) {
    Object.assign(fields, parseStreetLine(structured.streetAddress).fields);
  }
  if (structured.locality) {
    fields.city = structured.locality;
  }
  if (structured.region) {
    fields.region = structured.region;
  }
  if (structured.postalCode) {
    fields.postalCode = structured.postalCode;
  }
  if (structured.country) {
    fields.country = structured.country;
  }
  return fields;
}

function structuredAddresses(doc: PageDocument): StructuredAddress[] {
  const { $ } = doc;
  const addresses: StructuredAddress[] = [];

  $('[itemscope][itemtype*="PostalAddress" i]').each((_idx: number, scope: Element) => {
    const prop = (name: string): string | undefined => {
      const element = $(scope).find(`[itemprop="${name}"]`).first();
      return cleanText(element.attr('content') ?? element.text());
    };
    addresses.push({
      streetAddress: prop('streetAddress'),
      locality: prop('addressLocality'),
      region: prop('addressRegion'),
      postalCode: prop('postalCode'),
      country: prop('addressCountry'),
    });
  });

  for (const node of jsonLdNodes(doc)) {
    if (jsonLdTypes(node).includes('PostalAddress')) {
      addresses.push(fromJsonLd(node));
      continue;
    }
    const nested: unknown[] = Array.isArray(node.address) ? node.address : [node.address];
    for (const entry of nested) {
      if (isRecord(entry)) {
        addresses.push(fromJsonLd(entry));
      } else if (typeof entry === 'string') {
        const text = cleanText(entry);
        if (text) {
          addresses.push({ raw: text });
        }
      }
    }
  }

  return addresses.filter((address) => Object.values(address).some(Boolean));
}

function fromJsonLd(node: Record<string, unknown>): StructuredAddress {
  const text = (value: unknown): string | undefined => {
    if (typeof value === 'string' || typeof value === 'number') {
      return cleanText(String(value));
    }
    // addressCountry may be a Country node
    return isRecord(value) ? text(value.name) : undefined;
  };
  return {
    streetAddress: text(node.streetAddress),
    locality: text(node.addressLocality),
    region: text(node.addressRegion),
    postalCode: text(node.postalCode),
    country: text(node.addressCountry),
  };
}
