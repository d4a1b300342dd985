import { archivedItems, type Database } from '@digestline/db';
import { isRecord } from '@digestline/source-sdk';
import { sql } from 'drizzle-orm';
import { errorMessage } from '../errors.js';
import { permanentSinkError, transientSinkError, type Sink, type SinkResult } from '../sink.js';
import type { ProcessedRecord } from '../types.js';

const TRANSIENT_NODE_CODES = new Set(['ECONNREFUSED', 'ECONNRESET', 'ETIMEDOUT', 'EPIPE', 'CONNECTION_CLOSED', 'CONNECT_TIMEOUT']);

/**
 * Connection problems, serialization failures and deadlocks are worth a retry;
 * constraint and data errors are not.
 */
export function isTransientDatabaseError(error: unknown): boolean {
  if (!isRecord(error) || typeof error.code !== 'string') {
    return false;
  }

  const code = error.code;
  return TRANSIENT_NODE_CODES.has(code) || code.startsWith('08') || code === '40001' || code === '40P01' || code === '57P01';
}

/**
 * Archives records into `archived_items`, upserting on fingerprint so a
 * re-run of an item overwrites the earlier row.
 */
export class PostgresArchiveSink implements Sink {
  readonly name = 'postgres-archive';

  constructor(private readonly db: Database) {}

  async write(record: ProcessedRecord, options: { signal?: AbortSignal } = {}): Promise<SinkResult> {
    if (options.signal?.aborted) {
      return { ok: false, error: transientSinkError('write aborted before it started') };
    }

    const row = {
      fingerprint: record.fingerprint,
      sourceId: record.sourceId,
      externalId: record.externalId,
      sourceType: record.sourceType,
      sourceName: record.sourceName ?? null,
      category: record.category ?? null,
      url: record.url,
      title: record.title,
      body: record.body,
      publishedAt: record.publishedAt ?? null,
      topics: record.classification.topics,
      priority: record.classification.priority,
      summary: record.summary ?? null,
      translations: Object.keys(record.translations).length > 0 ? record.translations : null,
      provenance: { ...record.provenance, keywordClassification: record.keywordClassification },
      qualityScore: record.quality?.score ?? null,
      qualityGrade: record.quality?.grade ?? null,
      priorityScore: record.ranking?.score ?? null,
      rankingReason: record.ranking?.reason ?? null,
      costUsd: record.costUsd,
    };

    try {
      const [stored] = await this.db
        .insert(archivedItems)
        .values(row)
        .onConflictDoUpdate({
          target: archivedItems.fingerprint,
          set: {
            sourceId: sql.raw(`excluded.source_id`),
            externalId: sql.raw(`excluded.external_id`),
            sourceName: sql.raw(`excluded.source_name`),
            category: sql.raw(`excluded.category`),
            url: sql.raw(`excluded.url`),
            title: sql.raw(`excluded.title`),
            body: sql.raw(`excluded.body`),
            publishedAt: sql.raw(`excluded.published_at`),
            topics: sql.raw(`excluded.topics`),
            priority: sql.raw(`excluded.priority`),
            summary: sql.raw(`excluded.summary`),
            translations: sql.raw(`excluded.translations`),
            provenance: sql.raw(`excluded.provenance`),
            qualityScore: sql.raw(`excluded.quality_score`),
            qualityGrade: sql.raw(`excluded.quality_grade`),
            priorityScore: sql.raw(`excluded.priority_score`),
            rankingReason: sql.raw(`excluded.ranking_reason`),
            costUsd: sql.raw(`excluded.cost_usd`),
            updatedAt: sql`now()`,
          },
        })
        .returning({ id: archivedItems.id });

      if (!stored) {
        return { ok: false, error: permanentSinkError('upsert returned no row') };
      }

      return { ok: true, recordId: stored.id };
    } catch (error) {
      const message = errorMessage(error);
      return { ok: false, error: isTransientDatabaseError(error) ? transientSinkError(message, error) : permanentSinkError(message, error) };
    }
  }
}
