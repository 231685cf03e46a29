import { parsePhoneNumberFromString } from 'libphonenumber-js';

import { getPlaceholderLexicon, type PlaceholderLexicon } from './lexicon.js';

/** Template numbers such as 555-0100 and numbers made of a single repeated digit. */
export function isPlaceholderPhone(e164: string, lexicon: PlaceholderLexicon = getPlaceholderLexicon()): boolean {
  const digits = e164.replace(/\D/g, '');
  if (lexicon.phoneDigitSuffixes.some((suffix) => digits.endsWith(suffix))) {
    return true;
  }
  const national = parsePhoneNumberFromString(e164)?.nationalNumber ?? digits;
  return /^(\d)\1+$/.test(national);
}

export function isPlaceholderEmail(email: string, lexicon: PlaceholderLexicon = getPlaceholderLexicon()): boolean {
  const lowered = email.toLowerCase();
  if (lexicon.emails.includes(lowered)) {
    return true;
  }
  const domain = lowered.slice(lowered.lastIndexOf('@') + 1);
  return lexicon.emailDomains.includes(domain);
}
