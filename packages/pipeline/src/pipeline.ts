import type { KeywordClassifier } from './classify.js';
import type { Deduplicator } from './dedup.js';
import type { EnhancedResult, Enhancer } from './enhancer.js';
import { errorMessage } from './errors.js';
import { fingerprintItem, type FingerprintOptions } from './fingerprint.js';
import { clean, extractSummary, type CleaningOptions } from './normalize.js';
import type { QualityAssessment, QualityGate } from './quality.js';
import type { PriorityRanker, Ranking } from './ranking.js';
import type { RetryPolicy } from './retry.js';
import { writeWithRetry, type Notifier, type Sink } from './sink.js';
import {
  consoleLogger,
  type BatchCounts,
  type BatchResult,
  type Classification,
  type ExecutionMode,
  type FingerprintedItem,
  type ItemOutcome,
  type PipelineLogger,
  type PipelineStage,
  type ProcessedRecord,
} from './types.js';
import { validateItem } from './validate.js';

export const DEFAULT_CONCURRENCY = 5;
export const DEFAULT_SINK_TIMEOUT_MS = 15_000;

export interface PipelineOptions {
  classifier: KeywordClassifier;
  deduplicator: Deduplicator;
  sink: Sink;
  /** Omitted when the quality filter is off. */
  qualityGate?: QualityGate;
  /** Omitted when priority ranking is off. */
  ranker?: PriorityRanker;
  /** Omitted when LLM features are off. */
  enhancer?: Enhancer;
  notifiers?: Notifier[];
  mode?: ExecutionMode;
  concurrency?: number;
  fingerprint?: FingerprintOptions;
  cleaning?: CleaningOptions;
  sinkRetryPolicy?: RetryPolicy;
  sinkTimeoutMs?: number;
  logger?: PipelineLogger;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

export interface RunOptions {
  /** Once aborted, no further items are started; in-flight items finish. */
  signal?: AbortSignal;
  sourceId?: string;
}

function keywordOnly(keyword: Classification): EnhancedResult {
  return {
    classification: keyword,
    translations: {},
    provenance: { classification: 'keyword', translations: {} },
    costUsd: 0,
    tokensIn: 0,
    tokensOut: 0,
    fallbacks: [],
  };
}

// Without a model summary the record carries the body's opening sentences.
function summarize(entry: FingerprintedItem, enhanced: EnhancedResult): Pick<ProcessedRecord, 'summary' | 'provenance'> {
  if (enhanced.summary !== undefined || !entry.item.body) {
    return { summary: enhanced.summary, provenance: enhanced.provenance };
  }

  return {
    summary: extractSummary(entry.item.body),
    provenance: { ...enhanced.provenance, summary: enhanced.provenance.summary ?? 'keyword' },
  };
}

interface Scoring {
  quality?: QualityAssessment;
  ranking?: Ranking;
}

function buildRecord(
  entry: FingerprintedItem,
  keyword: Classification,
  enhanced: EnhancedResult,
  scoring: Scoring,
): ProcessedRecord {
  const { item } = entry;
  const { summary, provenance } = summarize(entry, enhanced);
  return {
    fingerprint: entry.fingerprint,
    sourceId: item.sourceId,
    externalId: item.externalId,
    sourceType: item.sourceType,
    sourceName: item.sourceName,
    category: item.category,
    url: item.url,
    title: item.title,
    body: item.body,
    publishedAt: item.publishedAt,
    classification: enhanced.classification,
    keywordClassification: keyword,
    summary,
    translations: enhanced.translations,
    provenance,
    quality: scoring.quality ? { score: scoring.quality.overall, grade: scoring.quality.grade } : undefined,
    ranking: scoring.ranking ? { score: scoring.ranking.score, reason: scoring.ranking.reason } : undefined,
    costUsd: enhanced.costUsd,
    tokensIn: enhanced.tokensIn,
    tokensOut: enhanced.tokensOut,
  };
}

function externalIdOf(raw: unknown): string | undefined {
  if (typeof raw === 'object' && raw !== null && 'externalId' in raw && typeof raw.externalId === 'string') {
    return raw.externalId;
  }

  return undefined;
}

export function countOutcomes(received: number, outcomes: readonly ItemOutcome[]): BatchCounts {
  const counts: BatchCounts = { received, archived: 0, duplicates: 0, filtered: 0, failed: 0, unprocessed: 0 };
  for (const outcome of outcomes) {
    if (outcome.status === 'archived') counts.archived += 1;
    else if (outcome.status === 'duplicate') counts.duplicates += 1;
    else if (outcome.status === 'filtered') counts.filtered += 1;
    else counts.failed += 1;
  }

  counts.unprocessed = received - outcomes.length;
  return counts;
}

/**
 * Runs a batch of raw items through
 * validate → clean → fingerprint → dedup → classify → quality → rank → enhance → sink.
 * The quality and rank stages run only when configured.
 *
 * Every item is isolated: whatever it throws becomes a `failed` outcome and the
 * batch carries on. Sequential and concurrent modes yield the same counts for
 * the same input: dedup claims are taken in scheduling order, and a copy of an
 * item still in flight waits for that item to be archived or released.
 */
export class Pipeline {
  private readonly options: PipelineOptions;
  private readonly logger: PipelineLogger;

  constructor(options: PipelineOptions) {
    this.options = options;
    this.logger = options.logger ?? consoleLogger;
  }

  async run(items: readonly unknown[], runOptions: RunOptions = {}): Promise<BatchResult> {
    const start = performance.now();
    const { signal, sourceId } = runOptions;
    const label = `[pipeline:${sourceId ?? 'batch'}]`;
    const slots: Array<ItemOutcome | undefined> = new Array(items.length).fill(undefined);

    const width =
      this.options.mode === 'sequential'
        ? 1
        : Math.max(1, Math.min(this.options.concurrency ?? DEFAULT_CONCURRENCY, items.length));

    let next = 0;
    const worker = async (): Promise<void> => {
      while (next < items.length && !signal?.aborted) {
        const index = next;
        next += 1;
        slots[index] = await this.processItem(items[index], index, label);
      }
    };

    this.logger.info(`${label} Processing ${items.length} items (${width === 1 ? 'sequential' : `concurrency ${width}`})`);
    await Promise.all(Array.from({ length: width }, () => worker()));

    const outcomes = slots.filter((outcome): outcome is ItemOutcome => outcome !== undefined);
    const counts = countOutcomes(items.length, outcomes);
    const totalCostUsd = outcomes.reduce(
      (sum, outcome) => sum + (outcome.status === 'archived' || outcome.status === 'failed' ? outcome.costUsd : 0),
      0,
    );
    const cancelled = signal?.aborted === true && counts.unprocessed > 0;

    this.logger.info(
      `${label} Done: ${counts.archived} archived, ${counts.duplicates} duplicates, ` +
        `${counts.filtered} filtered, ${counts.failed} failed` +
        `${counts.unprocessed > 0 ? `, ${counts.unprocessed} not started` : ''}; cost $${totalCostUsd.toFixed(6)}`,
    );

    return {
      sourceId,
      outcomes,
      counts,
      totalCostUsd,
      cancelled,
      durationMs: performance.now() - start,
    };
  }

  private async processItem(raw: unknown, index: number, label: string): Promise<ItemOutcome> {
    const { classifier, deduplicator, qualityGate, ranker, enhancer, sink } = this.options;
    let stage: PipelineStage = 'validate';
    let entry: FingerprintedItem | undefined;
    let claimed = false;
    let costUsd = 0;

    try {
      const validation = validateItem(raw);
      if (!validation.ok) {
        this.logger.warn(`${label} Item ${index} failed validation: ${validation.error}`);
        return { status: 'failed', index, stage, error: validation.error, externalId: externalIdOf(raw), costUsd };
      }

      stage = 'clean';
      const cleaned = clean(validation.item, this.options.cleaning);

      stage = 'fingerprint';
      entry = fingerprintItem(cleaned, this.options.fingerprint);

      stage = 'dedup';
      const decision = await deduplicator.isDuplicate(entry);
      if (decision.duplicate) {
        return {
          status: 'duplicate',
          index,
          fingerprint: entry.fingerprint,
          externalId: cleaned.externalId,
          reason: decision.reason,
        };
      }
      claimed = true;

      stage = 'classify';
      const keyword = classifier.classify(cleaned);
      const scoring: Scoring = {};

      if (qualityGate) {
        stage = 'quality';
        const verdict = qualityGate.assess(cleaned, keyword);
        scoring.quality = verdict.assessment;
        if (!verdict.pass) {
          claimed = false;
          deduplicator.release(entry);
          const score = verdict.assessment.overall;
          this.logger.info(`${label} Filtered ${cleaned.externalId} (${verdict.reason}, score ${score.toFixed(2)})`);
          return {
            status: 'filtered',
            index,
            fingerprint: entry.fingerprint,
            externalId: cleaned.externalId,
            reason: verdict.reason,
            qualityScore: score,
          };
        }
      }

      let baseline = keyword;
      if (ranker) {
        stage = 'rank';
        scoring.ranking = ranker.rank(keyword, cleaned.publishedAt, scoring.quality);
        baseline = ranker.refine(keyword, scoring.ranking);
      }

      stage = 'enhance';
      const enhanced = enhancer ? await enhancer.enhance(entry, baseline) : keywordOnly(baseline);
      costUsd = enhanced.costUsd;
      const record = buildRecord(entry, keyword, enhanced, scoring);

      stage = 'sink';
      const recordId = await writeWithRetry(sink, record, {
        policy: this.options.sinkRetryPolicy,
        timeoutMs: this.options.sinkTimeoutMs ?? DEFAULT_SINK_TIMEOUT_MS,
        sleep: this.options.sleep,
        random: this.options.random,
        onRetry: (attempt, delayMs, error) => {
          this.logger.warn(`${label} ${sink.name} attempt ${attempt} failed (${error.message}), retrying in ${delayMs}ms`);
        },
      });

      // The record is archived from here on; a lost seen marker only means a re-check next run.
      claimed = false;
      try {
        await deduplicator.markSeen(entry);
      } catch (error) {
        this.logger.warn(`${label} Could not mark ${cleaned.externalId} as seen: ${errorMessage(error)}`);
      }

      await this.notify(record, label);

      return {
        status: 'archived',
        index,
        fingerprint: entry.fingerprint,
        externalId: cleaned.externalId,
        recordId,
        costUsd,
      };
    } catch (error) {
      if (entry && claimed) {
        deduplicator.release(entry);
      }

      const message = errorMessage(error);
      this.logger.error(`${label} Item ${index} failed at ${stage}: ${message}`);
      return {
        status: 'failed',
        index,
        stage,
        error: message,
        fingerprint: entry?.fingerprint,
        externalId: entry?.item.externalId ?? externalIdOf(raw),
        costUsd,
      };
    }
  }

  private async notify(record: ProcessedRecord, label: string): Promise<void> {
    const notifiers = this.options.notifiers ?? [];
    if (notifiers.length === 0) {
      return;
    }

    const results = await Promise.allSettled(notifiers.map((notifier) => notifier.notify(record)));
    results.forEach((result, position) => {
      if (result.status === 'rejected') {
        this.logger.warn(`${label} ${notifiers[position].name} notification failed: ${errorMessage(result.reason)}`);
      }
    });
  }
}
