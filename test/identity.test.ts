import { describe, expect, it } from 'vitest';

import { parseDocument } from '../src/extraction/document.js';
import { noEntityRecognizer, type EntityRecognizer } from '../src/extraction/entityRecognizer.js';
import {
  collectNameCandidates,
  extractCompanyName,
  isAcceptableName,
  pickWinner,
  splitTitle,
} from '../src/extraction/identity.js';

function nameOf(html: string, recognizer: EntityRecognizer = noEntityRecognizer): string | undefined {
  return extractCompanyName(parseDocument(html, 'https://example.com/'), recognizer);
}

describe('extractCompanyName', () => {
  it('prefers og:site_name over the title', () => {
    const html =
      '<html><head><meta property="og:site_name" content="Acme Official"><title>Acme | Home</title></head><body></body></html>';

    expect(nameOf(html)).toBe('Acme Official');
  });

  it('skips generic title clauses', () => {
    expect(nameOf('<html><head><title>Home | Bright Bakery</title></head><body></body></html>')).toBe('Bright Bakery');
  });

  it('splits titles on spaced dashes only', () => {
    expect(nameOf('<html><head><title>Smith-Jones Law - Contact Us</title></head></html>')).toBe('Smith-Jones Law');
  });

  it('ranks structured organization data above og:title', () => {
    const html = `<html><head>
      <script type="application/ld+json">{"@context":"https://schema.org","@type":"Organization","name":"Northwind Traders"}</script>
      <meta property="og:title" content="Northwind | Quality Goods">
    </head><body></body></html>`;

    expect(nameOf(html)).toBe('Northwind Traders');
  });

  it('falls back to the copyright holder in the footer', () => {
    const html = '<html><body><p>Hello</p><footer><p>© 2023 Blue Fern Studio. All rights reserved.</p></footer></body></html>';

    expect(nameOf(html)).toBe('Blue Fern Studio');
  });

  it('asks the entity recognizer about headings', () => {
    const seen: string[] = [];
    const recognizer: EntityRecognizer = {
      organizations(text) {
        seen.push(text);
        return text.includes('Globex') ? ['Globex Corporation'] : [];
      },
    };

    expect(nameOf('<html><body><h1>Welcome to Globex Corporation</h1></body></html>', recognizer)).toBe(
      'Globex Corporation',
    );
    expect(seen).toEqual(['Welcome to Globex Corporation']);
  });

  it('returns undefined when only generic labels are present', () => {
    expect(nameOf('<html><head><title>Home</title></head><body><p>Hi</p></body></html>')).toBeUndefined();
  });
});

describe('collectNameCandidates', () => {
  it('ignores names that belong to nested microdata items', () => {
    const html = `<html><body>
      <div itemscope itemtype="https://schema.org/LocalBusiness">
        <span itemprop="name">Corner Deli</span>
        <div itemprop="address" itemscope itemtype="https://schema.org/PostalAddress">
          <span itemprop="name">Front Desk</span>
        </div>
      </div>
    </body></html>`;

    const candidates = collectNameCandidates(parseDocument(html, 'https://example.com/'), noEntityRecognizer);

    expect(candidates).toEqual([{ value: 'Corner Deli', weight: 9, source: 'structured-data' }]);
  });
});

describe('pickWinner', () => {
  it('keeps the heaviest spelling of a name and breaks ties by length', () => {
    expect(
      pickWinner([
        { value: 'ACME', weight: 7, source: 'title' },
        { value: 'Acme', weight: 9, source: 'structured-data' },
        { value: 'Acme Corp', weight: 9, source: 'structured-data' },
      ]),
    ).toBe('Acme Corp');
    expect(pickWinner([])).toBeUndefined();
  });
});

describe('name filters', () => {
  it('rejects numbers, long phrases and generic labels', () => {
    expect(isAcceptableName('Acme')).toBe(true);
    expect(isAcceptableName('2024')).toBe(false);
    expect(isAcceptableName('A')).toBe(false);
    expect(isAcceptableName('We build the best widgets around')).toBe(false);
    expect(isAcceptableName('Contact Us')).toBe(false);
  });

  it('splits titles on pipes, colons and bullets', () => {
    expect(splitTitle('Acme • Widgets: Shop | Home')).toEqual(['Acme', 'Widgets', 'Shop', 'Home']);
  });
});
