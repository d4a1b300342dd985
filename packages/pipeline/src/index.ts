// Orchestration
export { Pipeline, countOutcomes, DEFAULT_CONCURRENCY, DEFAULT_SINK_TIMEOUT_MS } from './pipeline.js';
export type { PipelineOptions, RunOptions } from './pipeline.js';
export { runSources } from './run-sources.js';
export type { RunSummary, SourceRunResult, SourceRunStatus, RunSourcesOptions } from './run-sources.js';
export { createDigest } from './runtime.js';
export type { DigestRuntime, DigestRuntimeOptions } from './runtime.js';

// Configuration
export { loadDigestConfig, parseDigestConfig, digestConfigSchema, DEFAULT_CONFIG_PATH, DEFAULT_RULES_PATH } from './config.js';
export type { DigestConfig, LoadedConfig, WebhookNotifierConfig } from './config.js';
export { readRequiredEnv, readOptionalEnv, readIntEnv, readBoolEnv } from './env.js';
export type { Env } from './env.js';

// Stages
export { validateItem } from './validate.js';
export { clean, normalizeWhitespace, decodeHtmlEntities, stripHtml, truncateText, extractSummary } from './normalize.js';
export { computeFingerprint, fingerprintItem, normalizeUrl, normalizeTitle } from './fingerprint.js';
export { Deduplicator, tokenSignature, jaccardSimilarity } from './dedup.js';
export type { DedupDecision } from './dedup.js';
export { KeywordClassifier, parseClassificationRules, classificationRulesSchema } from './classify.js';
export type { ClassificationRules } from './classify.js';
export { QualityGate, AUTHORITATIVE_DOMAINS } from './quality.js';
export type { QualityAssessment, QualityGateOptions, QualityGrade, QualityVerdict } from './quality.js';
export { PriorityRanker, DEFAULT_RANKING_WEIGHTS } from './ranking.js';
export type { PriorityRankerOptions, Ranking, RankingWeights } from './ranking.js';
export { Enhancer } from './enhancer.js';
export type { EnhancedResult, EnhancerOptions, FallbackReason, FeatureOutcome } from './enhancer.js';

// Shared stores
export { CacheStore, DEDUP_DISCRIMINATOR } from './cache-store.js';
export type { CacheBackend, CacheEntry } from './cache-store.js';
export { CostLedger } from './ledger.js';
export type { LedgerBackend, LedgerDay, LedgerSummary, Reservation } from './ledger.js';
export { MemoryCacheBackend, MemoryLedgerBackend } from './stores/memory.js';
export { PostgresCacheBackend, PostgresLedgerBackend } from './stores/postgres.js';

// Sinks
export { writeWithRetry } from './sink.js';
export type { Sink, SinkResult, Notifier } from './sink.js';
export { MemorySink } from './sinks/memory.js';
export { PostgresArchiveSink } from './sinks/postgres-archive.js';
export { WebhookNotifier } from './sinks/webhook.js';

// LLM
export { OpenAiCompletionClient, resolveLlmEndpoint } from './llm/client.js';
export type { CompletionClient, CompletionRequest, CompletionResponse } from './llm/client.js';
export { retryWithBackoff, callWithTimeout, DEFAULT_RETRY_POLICY } from './retry.js';
export type { RetryPolicy } from './retry.js';

// Errors
export {
  ConfigError,
  TransientSourceError,
  CompletionError,
  CallTimeoutError,
  EnhancementFailure,
  SinkFailure,
  errorMessage,
} from './errors.js';

// Types
export { consoleLogger } from './types.js';
export type {
  BatchCounts,
  BatchResult,
  Classification,
  CleanItem,
  ExecutionMode,
  FingerprintedItem,
  ItemOutcome,
  PipelineLogger,
  PipelineStage,
  ProcessedRecord,
  Provenance,
  RecordProvenance,
} from './types.js';
