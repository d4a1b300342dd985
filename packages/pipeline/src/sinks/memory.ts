import { randomUUID } from 'node:crypto';
import type { Sink, SinkResult } from '../sink.js';
import type { ProcessedRecord } from '../types.js';

/** Keeps records in a map keyed by fingerprint. Used by dry runs and tests. */
export class MemorySink implements Sink {
  readonly name = 'memory';
  readonly records = new Map<string, { id: string; record: ProcessedRecord }>();

  async write(record: ProcessedRecord): Promise<SinkResult> {
    const existing = this.records.get(record.fingerprint);
    const id = existing?.id ?? randomUUID();
    this.records.set(record.fingerprint, { id, record });
    return { ok: true, recordId: id };
  }
}
