import { readFile } from 'node:fs/promises';
import { parse } from 'csv-parse/sync';

import { createConfigurationError } from '../errors.js';

/**
 * Reads seed URLs from a CSV file with a `url` column, or from a plain list
 * with one URL per line. Blank lines and `#` comments are ignored.
 */
export async function loadSeedUrls(path: string): Promise<string[]> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    throw createConfigurationError(`Unable to read seed file ${path}`, { path }, { cause: error });
  }
  return parseSeedList(text);
}

export function parseSeedList(text: string): string[] {
  const [header = ''] = text.split(/\r?\n/, 1);
  if (/(^|,)\s*"?url"?\s*(,|$)/i.test(header)) {
    return parseCsvSeeds(text);
  }

  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith('#'));
}

function parseCsvSeeds(text: string): string[] {
  let rows: unknown;
  try {
    rows = parse(text, {
      columns: (header: string[]) => header.map((column) => column.trim().toLowerCase()),
      skip_empty_lines: true,
      trim: true,
      relax_column_count: true,
    });
  } catch (error) {
    throw createConfigurationError('Seed file is not valid CSV', {}, { cause: error });
  }

  const entries: unknown[] = Array.isArray(rows) ? rows : [];
  const urls: string[] = [];
  for (const row of entries) {
    const url: unknown = typeof row === 'object' && row !== null ? Reflect.get(row, 'url') : undefined;
    if (typeof url === 'string' && url.length > 0) {
      urls.push(url);
    }
  }
  return urls;
}
