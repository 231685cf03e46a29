import { isIP } from 'node:net';
import psl from 'psl';

import type { KeyStrategy } from '../config.js';

const HTTP_PROTOCOLS = new Set(['http:', 'https:']);

/**
 * Parses an absolute http(s) URL. Anything else, including URLs without a
 * hostname, yields undefined.
 */
export function parseHttpUrl(value: string): URL | undefined {
  let url: URL;
  try {
    url = new URL(value.trim());
  } catch {
    return undefined;
  }

  if (!HTTP_PROTOCOLS.has(url.protocol) || url.hostname.length === 0) {
    return undefined;
  }

  return url;
}

/**
 * Registrable domain (eTLD+1) of a hostname, e.g. "example.co.uk" for
 * "shop.example.co.uk". IP addresses and unlisted hosts fall back to the hostname.
 */
export function registrableDomain(hostname: string): string {
  const lowered = hostname.toLowerCase().replace(/\.$/, '');
  if (isIP(lowered.replace(/^\[|\]$/g, '')) !== 0) {
    return lowered;
  }
  const domain = psl.get(lowered);
  return domain ?? lowered;
}

export function domainKey(url: URL, strategy: KeyStrategy): string {
  if (strategy === 'hostname') {
    return url.host.toLowerCase();
  }
  const domain = registrableDomain(url.hostname);
  return url.port ? `${domain}:${url.port}` : domain;
}

/** Resolves an href against a base and keeps it only when it lands on http(s). */
export function resolveHttpUrl(href: string, base: string): string | undefined {
  const trimmed = href.trim();
  if (trimmed.length === 0) {
    return undefined;
  }

  let resolved: URL;
  try {
    resolved = new URL(trimmed, base);
  } catch {
    return undefined;
  }

  return HTTP_PROTOCOLS.has(resolved.protocol) ? resolved.href : undefined;
}

export function originOf(value: string): string | undefined {
  const url = parseHttpUrl(value);
  return url ? url.origin : undefined;
}

/** Percent-decodes, returning the input unchanged when it is not valid encoding. */
export function safeDecodeURIComponent(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}
