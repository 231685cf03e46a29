import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { isCrawlerError } from '../src/errors.js';
import { JsonLinesSink, MemorySink } from '../src/pipeline/sink.js';
import type { LeadRecord } from '../src/types.js';

function lead(name: string): LeadRecord {
  return {
    companyName: name,
    website: 'https://acme.test',
    sourceUrl: 'https://acme.test/',
    canonicalUrl: null,
    description: null,
    phoneNumbers: [],
    emails: [],
    addresses: [],
    socialLinks: {},
  };
}

function companyNameOf(line: string): unknown {
  const parsed: unknown = JSON.parse(line);
  return typeof parsed === 'object' && parsed !== null ? Reflect.get(parsed, 'companyName') : undefined;
}

describe('JsonLinesSink', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'sink-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('writes nothing until commit and appends one line per record', async () => {
    const path = join(dir, 'leads.jsonl');
    const sink = new JsonLinesSink(path);

    await sink.add(lead('Acme'));
    await sink.add(lead('Globex'));
    expect(sink.staged).toBe(2);
    await expect(readFile(path, 'utf8')).rejects.toThrow();

    await sink.commit();
    await sink.add(lead('Initech'));
    await sink.close();

    const lines = (await readFile(path, 'utf8')).trimEnd().split('\n');
    expect(lines.map(companyNameOf)).toEqual(['Acme', 'Globex', 'Initech']);
    expect(sink.staged).toBe(0);
  });

  it('raises a persistence error when the file cannot be written', async () => {
    const sink = new JsonLinesSink(join(dir, 'missing', 'leads.jsonl'));
    await sink.add(lead('Acme'));

    const error = await sink.commit().catch((caught: unknown) => caught);

    expect(isCrawlerError(error) && error.kind).toBe('persist');
    expect(sink.staged).toBe(0);
  });
});

describe('MemorySink', () => {
  it('exposes records only after commit', async () => {
    const sink = new MemorySink();
    await sink.add(lead('Acme'));
    expect(sink.records).toEqual([]);

    await sink.commit();
    expect(sink.records.map((record) => record.companyName)).toEqual(['Acme']);
  });
});
