import { describe, expect, it } from 'vitest';

import { RobotsRules } from '../src/crawler/policy/robotsRules.js';

const BODY = `
# comments are ignored
User-agent: *
Disallow: /private/
Allow: /private/press/
Disallow: /*.pdf$
Crawl-delay: 5

User-agent: LeadBot
User-agent: OtherBot
Disallow: /
Allow: /contact
`;

describe('RobotsRules', () => {
  const rules = RobotsRules.parse(BODY);

  it('denies paths under a Disallow prefix', () => {
    expect(rules.isAllowed('https://example.com/private/page.html', '*')).toBe(false);
    expect(rules.isAllowed('https://example.com/ok.html', '*')).toBe(true);
  });

  it('lets the longest matching pattern decide', () => {
    expect(rules.isAllowed('https://example.com/private/press/kit.html', '*')).toBe(true);
  });

  it('supports wildcards and end anchors', () => {
    expect(rules.isAllowed('https://example.com/files/brochure.pdf', '*')).toBe(false);
    expect(rules.isAllowed('https://example.com/files/brochure.pdf?download=1', '*')).toBe(true);
  });

  it('selects the group whose agent token appears in the user agent', () => {
    const agent = 'Mozilla/5.0 (compatible; LeadBot/1.0)';
    expect(rules.isAllowed('https://example.com/about', agent)).toBe(false);
    expect(rules.isAllowed('https://example.com/contact', agent)).toBe(true);
    expect(rules.isAllowed('https://example.com/about', 'otherbot')).toBe(false);
  });

  it('records crawl delay per group', () => {
    expect(rules.crawlDelaySeconds('*')).toBe(5);
    expect(rules.crawlDelaySeconds('LeadBot')).toBeUndefined();
  });

  it('prefers Allow when patterns tie in length', () => {
    const tie = RobotsRules.parse('User-agent: *\nDisallow: /page\nAllow: /page\n');
    expect(tie.isAllowed('https://example.com/page', '*')).toBe(true);
  });

  it('treats an empty Disallow as allowing everything', () => {
    const open = RobotsRules.parse('User-agent: *\nDisallow:\n');
    expect(open.isPermissive).toBe(true);
    expect(open.isAllowed('https://example.com/anything', '*')).toBe(true);
  });

  it('allows everything for agents without a matching group', () => {
    const scoped = RobotsRules.parse('User-agent: SpecificBot\nDisallow: /\n');
    expect(scoped.isAllowed('https://example.com/', 'SomeoneElse')).toBe(true);
    expect(RobotsRules.permissive().isAllowed('https://example.com/private/', '*')).toBe(true);
  });
});
