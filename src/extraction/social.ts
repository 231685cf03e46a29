import type { Element } from 'domhandler';

import type { SocialPlatform } from '../types.js';
import { resolveHttpUrl } from '../util/url.js';
import type { PageDocument } from './document.js';
import { getSocialLexicon, type SocialLexicon, type SocialPlatformRule } from './lexicon.js';

export type SocialLinks = Partial<Record<SocialPlatform, string>>;

/**
 * Profile links for each known platform. Links are visited in document order
 * and the first one that qualifies fills a platform's slot.
 */
export function extractSocialLinks(doc: PageDocument, lexicon: SocialLexicon = getSocialLexicon()): SocialLinks {
  const { $ } = doc;
  const links: SocialLinks = {};
  const seen = new Set<string>();

  $('a[href]').each((_idx: number, anchor: Element) => {
    const resolved = resolveHttpUrl($(anchor).attr('href') ?? '', doc.sourceUrl);
    if (!resolved || seen.has(resolved)) {
      return;
    }
    seen.add(resolved);

    const url = new URL(resolved);
    for (const platform of lexicon.platforms) {
      if (links[platform.key]) {
        continue;
      }
      const profile = matchProfile(url, platform, lexicon.sharedExclusions);
      if (profile) {
        links[platform.key] = profile;
        break;
      }
    }
  });

  return links;
}

/** The profile URL a link points at on the given platform, or undefined when it is not a profile. */
export function matchProfile(
  url: URL,
  platform: SocialPlatformRule,
  sharedExclusions: readonly string[] = [],
): string | undefined {
  if (!hostMatches(url.hostname, platform)) {
    return undefined;
  }

  const trimmed = url.pathname.replace(/^\/+|\/+$/g, '');
  if (!trimmed) {
    return undefined;
  }

  const wrapped = `/${trimmed}/`.toLowerCase();
  const excluded = [...sharedExclusions, ...platform.exclusions].some((exclusion) =>
    wrapped.includes(exclusion.toLowerCase()),
  );
  if (excluded) {
    return undefined;
  }

  const base = `${url.protocol}//${url.host}`;

  if (platform.profileQuery && trimmed.toLowerCase() === platform.profileQuery.path.toLowerCase()) {
    const id = url.searchParams.get(platform.profileQuery.param);
    return id && /^\d+$/.test(id) ? `${base}/${trimmed}?${platform.profileQuery.param}=${id}` : undefined;
  }

  const path = `/${trimmed}`;
  const lowered = path.toLowerCase();
  for (const prefix of platform.pathPrefixes) {
    if (lowered.startsWith(prefix.toLowerCase()) && path.length > prefix.length) {
      return `${base}${path}`;
    }
  }

  if (!platform.usernamePattern) {
    return undefined;
  }

  const [segment = ''] = trimmed.split('/');
  const username = platform.prependAt && !segment.startsWith('@') ? `@${segment}` : segment;
  return new RegExp(platform.usernamePattern, 'i').test(username) ? `${base}/${username}` : undefined;
}

function hostMatches(hostname: string, platform: SocialPlatformRule): boolean {
  const host = hostname.toLowerCase().replace(/^www\./, '');
  if (host === platform.domain || platform.altDomains.includes(host)) {
    return true;
  }
  return host.endsWith(`.${platform.domain}`);
}
