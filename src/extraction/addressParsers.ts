export interface AddressFields {
  houseNumber?: string;
  road?: string;
  unit?: string;
  suburb?: string;
  district?: string;
  city?: string;
  region?: string;
  postalCode?: string;
  country?: string;
}

export interface AddressParser {
  parse(text: string): AddressFields;
}

export const ADDRESS_FIELD_ORDER = [
  'houseNumber',
  'road',
  'unit',
  'suburb',
  'district',
  'city',
  'region',
  'postalCode',
  'country',
] as const satisfies readonly (keyof AddressFields)[];

const CORE_FIELDS = ['road', 'houseNumber', 'city', 'postalCode', 'region'] as const;

const STREET_SUFFIX =
  /\b(?:street|st|avenue|ave|road|rd|boulevard|blvd|drive|dr|lane|ln|way|court|ct|place|pl|parkway|pkwy|highway|hwy|terrace|ter|circle|cir|square|sq|trail|trl|plaza|row|crescent|close)\b\.?/i;
const UNIT_PATTERN = /^(?:suite|ste|unit|apt|apartment|floor|fl|room|rm|bldg|building|#)\.?\s*#?\s*[\w-]+$/i;
const TRAILING_UNIT = /[,\s]+((?:suite|ste|unit|apt|apartment|floor|fl|room|rm|#)\.?\s*#?\s*[\w-]+)$/i;
const LEADING_NUMBER = /^(\d+[A-Za-z]?(?:-\d+[A-Za-z]?)?)\s+(.+)$/;
const TRAILING_NUMBER = /^(\D+?)\s+(\d+[A-Za-z]?(?:-\d+)?)$/;
const PO_BOX = /^(?:p\.?\s*o\.?\s*box|post office box)\s*\d+/i;

const POSTAL_PATTERNS: RegExp[] = [
  /\b\d{5}(?:-\d{4})?\b/,
  /\b[A-Z]\d[A-Z]\s?\d[A-Z]\d\b/i,
  /\b[A-Z]{1,2}\d[A-Z\d]?\s?\d[A-Z]{2}\b/,
  /\b\d{4}\b/,
  /\b\d{3}-\d{4}\b/,
  /\b\d{6}\b/,
];

const COUNTRIES = new Map<string, string>([
  ['usa', 'USA'],
  ['us', 'US'],
  ['u.s.a.', 'USA'],
  ['united states', 'United States'],
  ['united states of america', 'United States of America'],
  ['canada', 'Canada'],
  ['uk', 'UK'],
  ['united kingdom', 'United Kingdom'],
  ['england', 'England'],
  ['scotland', 'Scotland'],
  ['ireland', 'Ireland'],
  ['australia', 'Australia'],
  ['new zealand', 'New Zealand'],
  ['germany', 'Germany'],
  ['deutschland', 'Deutschland'],
  ['france', 'France'],
  ['spain', 'Spain'],
  ['italy', 'Italy'],
  ['netherlands', 'Netherlands'],
  ['mexico', 'Mexico'],
  ['india', 'India'],
  ['japan', 'Japan'],
]);

const US_ADDRESS = new RegExp(
  [
    '^(?<number>\\d+[A-Za-z]?(?:-\\d+)?)\\s+',
    `(?<street>.+?(?:${STREET_SUFFIX.source})?)`,
    '(?:[,\\s]+(?<unit>(?:suite|ste|unit|apt|floor|fl|room|#)\\.?\\s*#?\\s*[\\w-]+))?',
    '[,\\s]+(?<city>[A-Za-z][A-Za-z .\'-]*?)',
    ',?\\s+(?<state>[A-Z]{2})',
    '\\s+(?<zip>\\d{5}(?:-\\d{4})?)',
    '(?:[,\\s]+(?<country>USA|U\\.S\\.A\\.|US|United States(?: of America)?))?\\.?$',
  ].join(''),
  'i',
);

/**
 * Comma/line driven parser for addresses in most Western layouts:
 * street line, optional unit and locality lines, then postal code, region and country.
 */
export class GeneralAddressParser implements AddressParser {
  parse(text: string): AddressFields {
    const parts = splitParts(text);
    const fields: AddressFields = {};
    if (parts.length === 0) {
      return fields;
    }

    const last = parts[parts.length - 1];
    const country = last ? COUNTRIES.get(last.toLowerCase().replace(/\.$/, '')) : undefined;
    if (country && parts.length > 1) {
      fields.country = country;
      parts.pop();
    }

    const postalIndex = findLastIndex(parts, (part) => findPostalCode(part) !== undefined && !isStreetLine(part));
    if (postalIndex !== -1) {
      const part = parts[postalIndex] ?? '';
      const postal = findPostalCode(part) ?? '';
      fields.postalCode = postal.toUpperCase();
      const remainder = part.replace(postal, ' ').replace(/\s+/g, ' ').trim();
      const regionMatch = /^(.*?)\s*\b([A-Z]{2,3})$/.exec(remainder);
      if (regionMatch) {
        fields.region = regionMatch[2];
        const city = regionMatch[1]?.trim();
        if (city) {
          fields.city = city;
        }
      } else if (remainder) {
        fields.city = remainder;
      }
      parts.splice(postalIndex, 1);
    }

    const streetIndex = parts.findIndex(isStreetLine);
    if (streetIndex !== -1) {
      const street = parseStreetLine(parts[streetIndex] ?? '');
      Object.assign(fields, omitEmpty(street.fields));
      if (street.rest && !fields.city) {
        fields.city = street.rest;
      }
      parts.splice(streetIndex, 1);
    }

    const unitIndex = parts.findIndex((part) => UNIT_PATTERN.test(part));
    if (unitIndex !== -1 && !fields.unit) {
      fields.unit = parts[unitIndex];
      parts.splice(unitIndex, 1);
    }

    // whatever is left between street and postal line is locality information
    const leftovers = parts.filter((part) => !/\d{3,}/.test(part) && part.split(' ').length <= 4);
    if (!fields.city) {
      const city = leftovers.pop();
      if (city) {
        fields.city = city;
      }
    }
    if (!fields.region && fields.city && leftovers.length > 0 && /^[A-Z]{2,3}$/.test(fields.city)) {
      fields.region = fields.city;
      fields.city = leftovers.pop();
    }
    const suburb = leftovers.shift();
    if (suburb) {
      fields.suburb = suburb;
    }
    const district = leftovers.shift();
    if (district) {
      fields.district = district;
    }

    return omitEmpty(fields);
  }
}

/** Single-pattern parser for US layouts such as "1 Main St, Suite 2, Springfield, IL 62701". */
export class UsAddressParser implements AddressParser {
  parse(text: string): AddressFields {
    const flattened = splitParts(text).join(', ');
    const match = US_ADDRESS.exec(flattened);
    const groups = match?.groups;
    if (!groups) {
      return {};
    }

    return omitEmpty({
      houseNumber: groups.number,
      road: groups.street?.replace(/[,\s]+$/, ''),
      unit: groups.unit,
      city: groups.city?.trim(),
      region: groups.state?.toUpperCase(),
      postalCode: groups.zip,
      country: groups.country,
    });
  }
}

export interface AddressParsers {
  general: AddressParser;
  regional: AddressParser;
}

export const defaultAddressParsers: AddressParsers = {
  general: new GeneralAddressParser(),
  regional: new UsAddressParser(),
};

/**
 * General parser first; the regional parser is consulted when the general
 * result is thin and the text carries a region code or ZIP-like token.
 */
export function parseAddress(text: string, parsers: AddressParsers = defaultAddressParsers): AddressFields {
  const general = parsers.general.parse(text);
  if (coreFieldCount(general) >= 2 || !looksRegional(text)) {
    return general;
  }

  const regional = parsers.regional.parse(text);
  if (regional.houseNumber && regional.road && regional.city) {
    return regional;
  }
  return general;
}

export function parseStreetLine(line: string): { fields: AddressFields; rest?: string } {
  let text = line.trim().replace(/,$/, '');
  const fields: AddressFields = {};

  const unitMatch = TRAILING_UNIT.exec(text);
  if (unitMatch?.[1]) {
    fields.unit = unitMatch[1];
    text = text.slice(0, unitMatch.index).trim();
  }

  if (PO_BOX.test(text)) {
    fields.road = text;
    return { fields };
  }

  const leading = LEADING_NUMBER.exec(text);
  const trailing = leading ? undefined : TRAILING_NUMBER.exec(text);
  let road = leading?.[2] ?? trailing?.[1] ?? text;
  const houseNumber = leading?.[1] ?? trailing?.[2];
  if (houseNumber) {
    fields.houseNumber = houseNumber;
  }

  let rest: string | undefined;
  // the last suffix ends the road: "Court Street" is one road, "Main St Springfield" is not
  const suffix = lastMatch(STREET_SUFFIX, road);
  if (suffix) {
    const end = suffix.index + suffix[0].length;
    const tail = road.slice(end).trim();
    if (tail) {
      rest = tail;
      road = road.slice(0, end).trim();
    }
  }
  fields.road = road;
  return { fields, rest };
}

export function formatAddress(fields: AddressFields): string {
  return ADDRESS_FIELD_ORDER.map((field) => fields[field])
    .filter((value): value is string => typeof value === 'string' && value.length > 0)
    .join(', ');
}

export function populatedFieldCount(fields: AddressFields): number {
  return ADDRESS_FIELD_ORDER.filter((field) => Boolean(fields[field])).length;
}

export function coreFieldCount(fields: AddressFields): number {
  return CORE_FIELDS.filter((field) => Boolean(fields[field])).length;
}

export function looksRegional(text: string): boolean {
  return /\b[A-Z]{2}\b\s+\d{5}(?:-\d{4})?\b/.test(text) || /\b\d{5}(?:-\d{4})?\b/.test(text);
}

function splitParts(text: string): string[] {
  return text
    .split(/[\n,]+/)
    .map((part) => part.replace(/\s+/g, ' ').trim())
    .filter((part) => part.length > 0);
}

function isStreetLine(part: string): boolean {
  return PO_BOX.test(part) || LEADING_NUMBER.test(part) || (TRAILING_NUMBER.test(part) && STREET_SUFFIX.test(part));
}

function lastMatch(pattern: RegExp, text: string): RegExpExecArray | undefined {
  const global = new RegExp(pattern.source, pattern.flags.includes('g') ? pattern.flags : `${pattern.flags}g`);
  let last: RegExpExecArray | undefined;
  for (let match = global.exec(text); match; match = global.exec(text)) {
    last = match;
  }
  return last;
}

function findPostalCode(part: string): string | undefined {
  for (const pattern of POSTAL_PATTERNS) {
    const match = pattern.exec(part);
    if (match) {
      return match[0];
    }
  }
  return undefined;
}

function findLastIndex<T>(items: readonly T[], predicate: (item: T) => boolean): number {
  for (let index = items.length - 1; index >= 0; index -= 1) {
    const item = items[index];
    if (item !== undefined && predicate(item)) {
      return index;
    }
  }
  return -1;
}

function omitEmpty(fields: AddressFields): AddressFields {
  const result: AddressFields = {};
  for (const field of ADDRESS_FIELD_ORDER) {
    const value = fields[field]?.trim();
    if (value) {
      result[field] = value;
    }
  }
  return result;
}
