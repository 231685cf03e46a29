import { describe, expect, it } from 'vitest';

import { hasContactSignal, scrape } from '../src/extraction/engine.js';
import type { EntityRecognizer } from '../src/extraction/entityRecognizer.js';

const PAGE = `<html><head>
  <title>Acme Widgets | Home</title>
  <meta property="og:site_name" content="Acme Widgets">
  <meta name="description" content="Industrial widgets since 1950.">
  <link rel="canonical" href="https://www.acme-widgets.com/">
</head><body>
  <h1>Welcome</h1>
  <a href="tel:+12015550123">Call us</a>
  <a href="mailto:Sales@Acme-Widgets.com">Email</a>
  <address>1 Main St<br>Springfield, IL 62701</address>
  <a href="https://www.linkedin.com/company/acme-widgets">LinkedIn</a>
</body></html>`;

describe('scrape', () => {
  it('builds a complete lead record', () => {
    const record = scrape(PAGE, 'https://acme-widgets.com/contact');

    expect(record).toEqual({
      companyName: 'Acme Widgets',
      website: 'https://www.acme-widgets.com',
      sourceUrl: 'https://acme-widgets.com/contact',
      canonicalUrl: 'https://www.acme-widgets.com/',
      description: 'Industrial widgets since 1950.',
      phoneNumbers: ['+12015550123'],
      emails: ['sales@acme-widgets.com'],
      addresses: ['1, Main St, Springfield, IL, 62701'],
      socialLinks: { linkedin: 'https://www.linkedin.com/company/acme-widgets' },
    });
  });

  it('returns a frozen record and equal records for equal input', () => {
    const first = scrape(PAGE, 'https://acme-widgets.com/contact');
    const second = scrape(PAGE, 'https://acme-widgets.com/contact');

    expect(second).toEqual(first);
    expect(Object.isFrozen(first)).toBe(true);
    expect(Object.isFrozen(first.phoneNumbers)).toBe(true);
    expect(Object.isFrozen(first.socialLinks)).toBe(true);
  });

  it('derives the website from the source URL without a canonical link', () => {
    const record = scrape('<html><body><p>Nothing here</p></body></html>', 'http://shop.example.net:8080/a/b?c=d');

    expect(record.website).toBe('http://shop.example.net:8080');
    expect(record.companyName).toBeNull();
    expect(record.canonicalUrl).toBeNull();
    expect(record.description).toBeNull();
    expect(record.phoneNumbers).toEqual([]);
  });

  it('leaves a field empty when its extractor throws', () => {
    const failing: EntityRecognizer = {
      organizations() {
        throw new Error('model unavailable');
      },
    };
    const html = '<html><body><h1>Globex</h1><a href="mailto:ops@globex.test">Mail</a></body></html>';

    const record = scrape(html, 'https://globex.test/', { recognizer: failing });

    expect(record.companyName).toBeNull();
    expect(record.emails).toEqual(['ops@globex.test']);
  });

  it('drops placeholder phones and emails when asked', () => {
    const html = `<html><body>
      <a href="tel:+1-201-555-0100">Call</a>
      <a href="mailto:info@example.com">Mail</a>
      <a href="mailto:owner@acme-widgets.com">Owner</a>
    </body></html>`;

    const kept = scrape(html, 'https://acme-widgets.com/');
    const dropped = scrape(html, 'https://acme-widgets.com/', { dropPlaceholders: true });

    expect(kept.phoneNumbers).toEqual(['+12015550100']);
    expect(kept.emails).toEqual(['info@example.com', 'owner@acme-widgets.com']);
    expect(dropped.phoneNumbers).toEqual([]);
    expect(dropped.emails).toEqual(['owner@acme-widgets.com']);
  });
});

describe('hasContactSignal', () => {
  it('requires a company name, a phone or an email', () => {
    const empty = scrape('<html><body><p>Under construction</p></body></html>', 'https://example.com/');
    const named = scrape('<html><head><meta property="og:site_name" content="Acme"></head></html>', 'https://example.com/');

    expect(hasContactSignal(empty)).toBe(false);
    expect(hasContactSignal(named)).toBe(true);
  });
});
