import { appendFile } from 'node:fs/promises';

import { createPersistenceError } from '../errors.js';
import type { LeadRecord } from '../types.js';

/**
 * Destination for extracted records. `add` stages a record, `commit` makes the
 * staged batch durable. A failed `commit` loses the whole batch.
 */
export interface LeadSink {
  add(record: LeadRecord): Promise<void>;
  commit(): Promise<void>;
  close?(): Promise<void>;
}

/** Appends each committed batch to a JSON Lines file, one record per line. */
export class JsonLinesSink implements LeadSink {
  private pending: string[] = [];

  constructor(private readonly path: string) {}

  get staged(): number {
    return this.pending.length;
  }

  async add(record: LeadRecord): Promise<void> {
    this.pending.push(JSON.stringify(record));
  }

  async commit(): Promise<void> {
    if (this.pending.length === 0) {
      return;
    }

    const batch = this.pending;
    this.pending = [];
    try {
      await appendFile(this.path, `${batch.join('\n')}\n`, 'utf8');
    } catch (error) {
      throw createPersistenceError(`Unable to write ${batch.length} records to ${this.path}`, { path: this.path }, { cause: error });
    }
  }

  async close(): Promise<void> {
    await this.commit();
  }
}

/** Keeps committed records in memory; useful for library callers and tests. */
export class MemorySink implements LeadSink {
  readonly records: LeadRecord[] = [];
  private pending: LeadRecord[] = [];

  async add(record: LeadRecord): Promise<void> {
    this.pending.push(record);
  }

  async commit(): Promise<void> {
    this.records.push(...this.pending);
    this.pending = [];
  }
}
