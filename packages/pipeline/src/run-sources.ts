import type { Source } from '@digestline/source-sdk';
import type { CacheStore } from './cache-store.js';
import { errorMessage, TransientSourceError } from './errors.js';
import type { CostLedger, LedgerSummary } from './ledger.js';
import type { Pipeline } from './pipeline.js';
import { consoleLogger, type BatchCounts, type BatchResult, type PipelineLogger } from './types.js';

export type SourceRunStatus = 'processed' | 'empty' | 'fetch-failed' | 'skipped';

export interface SourceRunResult {
  sourceId: string;
  sourceName: string;
  status: SourceRunStatus;
  fetched: number;
  batch?: BatchResult;
  error?: string;
}

export interface RunSummary {
  sources: SourceRunResult[];
  counts: BatchCounts;
  totalCostUsd: number;
  cancelled: boolean;
  purgedCacheEntries: number;
  ledger: LedgerSummary;
  durationMs: number;
}

export interface RunSourcesOptions {
  pipeline: Pipeline;
  cache: CacheStore;
  ledger: CostLedger;
  logger?: PipelineLogger;
  signal?: AbortSignal;
}

function emptyCounts(): BatchCounts {
  return { received: 0, archived: 0, duplicates: 0, filtered: 0, failed: 0, unprocessed: 0 };
}

async function runSource(source: Source, options: RunSourcesOptions, logger: PipelineLogger): Promise<SourceRunResult> {
  const { id, name } = source.manifest;
  const label = `[pipeline:${id}]`;

  logger.info(`${label} Fetching items from ${name}...`);
  let items: unknown[];
  try {
    const result = await source.fetch();
    items = result.items;
  } catch (error) {
    const message = errorMessage(error);
    if (error instanceof TransientSourceError) {
      logger.warn(`${label} Fetch failed, nothing to process this run: ${message}`);
    } else {
      logger.error(`${label} Unexpected fetch error, nothing to process this run: ${message}`);
    }

    return { sourceId: id, sourceName: name, status: 'fetch-failed', fetched: 0, error: message };
  }

  if (items.length === 0) {
    logger.info(`${label} No items this run`);
    return { sourceId: id, sourceName: name, status: 'empty', fetched: 0 };
  }

  logger.info(`${label} Received ${items.length} items`);
  const batch = await options.pipeline.run(items, { signal: options.signal, sourceId: id });
  return { sourceId: id, sourceName: name, status: 'processed', fetched: items.length, batch };
}

/**
 * Fetch and process each source in turn, then purge expired cache entries,
 * flush the cache and log the spend summary. A source that fails to fetch is
 * skipped; store failures during maintenance propagate.
 */
export async function runSources(sources: readonly Source[], options: RunSourcesOptions): Promise<RunSummary> {
  const logger = options.logger ?? consoleLogger;
  const start = performance.now();
  const results: SourceRunResult[] = [];
  const counts = emptyCounts();
  let totalCostUsd = 0;

  for (const source of sources) {
    if (options.signal?.aborted) {
      results.push({ sourceId: source.manifest.id, sourceName: source.manifest.name, status: 'skipped', fetched: 0 });
      continue;
    }

    const result = await runSource(source, options, logger);
    results.push(result);
    if (result.batch) {
      const batchCounts = result.batch.counts;
      counts.received += batchCounts.received;
      counts.archived += batchCounts.archived;
      counts.duplicates += batchCounts.duplicates;
      counts.filtered += batchCounts.filtered;
      counts.failed += batchCounts.failed;
      counts.unprocessed += batchCounts.unprocessed;
      totalCostUsd += result.batch.totalCostUsd;
    }
  }

  const purgedCacheEntries = await options.cache.purgeExpired();
  await options.cache.flush();
  const ledger = await options.ledger.summary();

  logger.info(
    `[pipeline] Run done: ${counts.archived} archived, ${counts.duplicates} duplicates, ` +
      `${counts.filtered} filtered, ${counts.failed} failed ` +
      `across ${sources.length} source(s); run cost $${totalCostUsd.toFixed(6)}; ` +
      `today $${ledger.dailySpentUsd.toFixed(4)} (remaining $${ledger.dailyRemainingUsd.toFixed(4)}), ` +
      `month $${ledger.monthlySpentUsd.toFixed(4)} (remaining $${ledger.monthlyRemainingUsd.toFixed(4)})`,
  );

  const fetchFailures = results.filter((result) => result.status === 'fetch-failed').map((result) => result.sourceId);
  if (fetchFailures.length > 0) {
    logger.warn(`[pipeline] ${fetchFailures.length} source(s) could not be fetched: ${fetchFailures.join(', ')}`);
  }

  return {
    sources: results,
    counts,
    totalCostUsd,
    cancelled: options.signal?.aborted === true,
    purgedCacheEntries,
    ledger,
    durationMs: performance.now() - start,
  };
}
