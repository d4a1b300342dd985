import type { Database } from '@digestline/db';
import { CacheStore } from './cache-store.js';
import { KeywordClassifier, type ClassificationRules } from './classify.js';
import { DAY_MS, type Clock } from './clock.js';
import type { DigestConfig } from './config.js';
import { Deduplicator } from './dedup.js';
import { Enhancer } from './enhancer.js';
import { readOptionalEnv, type Env } from './env.js';
import { CostLedger } from './ledger.js';
import { OpenAiCompletionClient, resolveLlmEndpoint, type CompletionClient } from './llm/client.js';
import { Pipeline } from './pipeline.js';
import { QualityGate } from './quality.js';
import { PriorityRanker } from './ranking.js';
import type { Notifier, Sink } from './sink.js';
import { MemorySink } from './sinks/memory.js';
import { PostgresArchiveSink } from './sinks/postgres-archive.js';
import { WebhookNotifier } from './sinks/webhook.js';
import { MemoryCacheBackend, MemoryLedgerBackend } from './stores/memory.js';
import { PostgresCacheBackend, PostgresLedgerBackend } from './stores/postgres.js';
import { consoleLogger, type PipelineLogger } from './types.js';

export interface DigestRuntimeOptions {
  /** Without a database everything lives in memory for the life of the process. */
  db?: Database;
  env?: Env;
  logger?: PipelineLogger;
  completionClient?: CompletionClient;
  sink?: Sink;
  fetchImpl?: typeof fetch;
  clock?: Clock;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

export interface DigestRuntime {
  pipeline: Pipeline;
  cache: CacheStore;
  ledger: CostLedger;
  classifier: KeywordClassifier;
  sink: Sink;
  notifiers: Notifier[];
  enhancer?: Enhancer;
}

/**
 * Wire the shared stores, stages and sinks from validated configuration.
 * One runtime per process: the ledger assumes it is the only writer.
 */
export function createDigest(config: DigestConfig, rules: ClassificationRules, options: DigestRuntimeOptions = {}): DigestRuntime {
  const env = options.env ?? process.env;
  const logger = options.logger ?? consoleLogger;
  const { db, clock } = options;

  const cache = new CacheStore({
    backend: db ? new PostgresCacheBackend(db) : new MemoryCacheBackend(),
    defaultTtlMs: config.cache.ttlDays * DAY_MS,
    clock,
  });

  const ledger = new CostLedger({
    backend: db ? new PostgresLedgerBackend(db) : new MemoryLedgerBackend(),
    limits: config.budget,
    clock,
  });

  const classifier = new KeywordClassifier(rules);
  const deduplicator = new Deduplicator({
    cache,
    ttlMs: config.dedup.ttlDays * DAY_MS,
    semantic: config.dedup.semantic,
  });

  const qualityGate = config.quality.enabled
    ? new QualityGate({
        minScore: config.quality.minScore,
        minContentLength: config.quality.minContentLength,
        sourceWhitelist: config.quality.sourceWhitelist,
        sourceBlacklist: config.quality.sourceBlacklist,
        clock,
      })
    : undefined;
  const ranker = config.ranking.enabled
    ? new PriorityRanker({
        weights: config.ranking.weights,
        labels: config.ranking.labels,
        defaultPriority: classifier.defaultPriority,
        priorityLevels: classifier.priorityLevels,
        clock,
      })
    : undefined;

  const { features } = config;
  const anyFeature = features.summarization || features.translation || features.classification;
  let enhancer: Enhancer | undefined;

  if (config.llm.enabled && anyFeature) {
    const endpoint = resolveLlmEndpoint({ env, config: { baseUrl: config.llm.baseUrl, model: config.llm.model } });
    const client =
      options.completionClient ??
      new OpenAiCompletionClient({
        apiKey: readOptionalEnv('OPENAI_API_KEY', env),
        baseUrl: endpoint.baseUrl,
        timeoutMs: config.llm.callTimeoutMs,
        provider: config.llm.provider,
      });

    enhancer = new Enhancer({
      client,
      ledger,
      cache,
      model: endpoint.model,
      features,
      priorityLevels: classifier.priorityLevels,
      knownTopics: Object.keys(rules.topics),
      cacheTtlMs: config.cache.ttlDays * DAY_MS,
      callTimeoutMs: config.llm.callTimeoutMs,
      retryPolicy: config.retry,
      maxTokens: config.llm.maxTokens,
      prices: Object.keys(config.llm.prices).length > 0 ? config.llm.prices : undefined,
      logger,
      sleep: options.sleep,
      random: options.random,
    });
    logger.info(`[pipeline] LLM features on (model ${endpoint.model}${endpoint.baseUrl ? ` at ${endpoint.baseUrl}` : ''})`);
  }

  const sink = options.sink ?? (db ? new PostgresArchiveSink(db) : new MemorySink());
  const notifiers: Notifier[] = config.notifiers.map(
    (notifier) =>
      new WebhookNotifier({
        name: notifier.name,
        url: notifier.url,
        secret: notifier.secretEnv ? readOptionalEnv(notifier.secretEnv, env) : undefined,
        minPriority: notifier.minPriority,
        rank: (priority) => classifier.rank(priority),
        timeoutMs: notifier.timeoutMs,
        fetchImpl: options.fetchImpl,
        clock,
      }),
  );

  const pipeline = new Pipeline({
    classifier,
    deduplicator,
    sink,
    qualityGate,
    ranker,
    enhancer,
    notifiers,
    mode: config.pipeline.mode,
    concurrency: config.pipeline.concurrency,
    fingerprint: { includeTitle: config.dedup.includeTitle },
    cleaning: config.cleaning,
    sinkRetryPolicy: config.retry,
    sinkTimeoutMs: config.pipeline.sinkTimeoutMs,
    logger,
    sleep: options.sleep,
    random: options.random,
  });

  return { pipeline, cache, ledger, classifier, sink, notifiers, enhancer };
}
