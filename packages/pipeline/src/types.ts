import type { ValidatedRawItem } from '@digestline/source-sdk';

/**
 * After cleaning: title and body are plain text, body capped. Branded type to
 * prevent mixing with raw validated items.
 */
export interface CleanItem extends ValidatedRawItem {
  readonly _cleaned: true;
}

/**
 * After fingerprinting: cleaned item + computed sha256 hash.
 */
export interface FingerprintedItem {
  item: CleanItem;
  fingerprint: string;
}

export interface Classification {
  topics: string[];
  priority: string;
}

/** Which stage produced a field. */
export type Provenance = 'keyword' | 'llm' | 'cache' | 'keyword-fallback';

export interface RecordProvenance {
  classification: Provenance;
  summary?: Provenance;
  translations: Record<string, Provenance>;
}

/**
 * The pipeline's output for one item. Handed to the sink, then discarded.
 */
export interface ProcessedRecord {
  fingerprint: string;
  sourceId: string;
  externalId: string;
  sourceType: CleanItem['sourceType'];
  sourceName?: string;
  category?: string;
  url: string;
  title: string;
  body: string;
  publishedAt?: Date;
  classification: Classification;
  keywordClassification: Classification;
  summary?: string;
  translations: Record<string, string>;
  provenance: RecordProvenance;
  /** Set when the quality gate ran. */
  quality?: { score: number; grade: string };
  /** Set when priority ranking ran. */
  ranking?: { score: number; reason: string };
  costUsd: number;
  tokensIn: number;
  tokensOut: number;
}

export type PipelineStage =
  | 'validate'
  | 'clean'
  | 'fingerprint'
  | 'dedup'
  | 'classify'
  | 'quality'
  | 'rank'
  | 'enhance'
  | 'sink';

export type ItemOutcome =
  | {
      status: 'archived';
      index: number;
      fingerprint: string;
      externalId: string;
      recordId: string;
      costUsd: number;
    }
  | {
      status: 'duplicate';
      index: number;
      fingerprint: string;
      externalId: string;
      reason: string;
    }
  | {
      status: 'filtered';
      index: number;
      fingerprint: string;
      externalId: string;
      reason: string;
      qualityScore: number;
    }
  | {
      status: 'failed';
      index: number;
      stage: PipelineStage;
      error: string;
      fingerprint?: string;
      externalId?: string;
      costUsd: number;
    };

export interface BatchCounts {
  received: number;
  archived: number;
  duplicates: number;
  /** Dropped by the quality gate. */
  filtered: number;
  failed: number;
  unprocessed: number;
}

export interface BatchResult {
  sourceId?: string;
  /** Outcomes of processed items, in input order. */
  outcomes: ItemOutcome[];
  counts: BatchCounts;
  totalCostUsd: number;
  cancelled: boolean;
  durationMs: number;
}

export type ExecutionMode = 'sequential' | 'concurrent';

/**
 * Minimal logger interface, defaults to console.
 */
export interface PipelineLogger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export const consoleLogger: PipelineLogger = {
  info: (msg) => console.log(msg),
  warn: (msg) => console.warn(msg),
  error: (msg) => console.error(msg),
};
