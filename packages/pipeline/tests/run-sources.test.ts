import type { RawItem, Source } from '@digestline/source-sdk';
import { describe, it, expect, vi } from 'vitest';
import { KeywordClassifier, parseClassificationRules } from '../src/classify.js';
import { DAY_MS } from '../src/clock.js';
import { Deduplicator } from '../src/dedup.js';
import { TransientSourceError } from '../src/errors.js';
import { CostLedger } from '../src/ledger.js';
import { Pipeline } from '../src/pipeline.js';
import { runSources } from '../src/run-sources.js';
import { MemorySink } from '../src/sinks/memory.js';
import { MemoryLedgerBackend } from '../src/stores/memory.js';
import { createLogger, FAST_RETRY, manualClock, memoryCache, noSleep, rawItem } from './helpers.js';

function source(id: string, fetch: () => Promise<{ items: RawItem[] }>): Source {
  return {
    manifest: { id, name: `Source ${id}`, version: '0.1.0', schedule: '0 * * * *', type: 'feed' },
    fetch,
  };
}

function setup() {
  const time = manualClock();
  const { cache, backend } = memoryCache(time.clock);
  const ledger = new CostLedger({
    backend: new MemoryLedgerBackend(),
    limits: { dailyLimitUsd: 1, monthlyBudgetUsd: 10 },
    clock: time.clock,
  });
  const sink = new MemorySink();
  const logger = createLogger();
  const pipeline = new Pipeline({
    classifier: new KeywordClassifier(parseClassificationRules({ topics: { AI: ['GPT'] } })),
    deduplicator: new Deduplicator({ cache, ttlMs: 30 * DAY_MS }),
    sink,
    sinkRetryPolicy: FAST_RETRY,
    logger,
    sleep: noSleep,
  });

  return { time, cache, backend, ledger, sink, logger, pipeline };
}

describe('runSources', () => {
  it('treats a failed fetch like an empty one and carries on', async () => {
    const { pipeline, cache, ledger, sink, logger } = setup();
    const sources = [
      source('down', async () => {
        throw new TransientSourceError('down', 'HTTP 503', { status: 503 });
      }),
      source('quiet', async () => ({ items: [] })),
      source('blog', async () => ({
        items: [
          rawItem({ sourceId: 'blog', externalId: 'blog:1', url: 'https://blog.example.com/1' }),
          rawItem({ sourceId: 'blog', externalId: 'blog:2', url: 'https://blog.example.com/2' }),
        ],
      })),
    ];

    const summary = await runSources(sources, { pipeline, cache, ledger, logger });

    expect(summary.sources.map((result) => [result.sourceId, result.status, result.fetched])).toEqual([
      ['down', 'fetch-failed', 0],
      ['quiet', 'empty', 0],
      ['blog', 'processed', 2],
    ]);
    expect(summary.sources[0].error).toBe('HTTP 503');
    expect(summary.counts).toEqual({ received: 2, archived: 2, duplicates: 0, filtered: 0, failed: 0, unprocessed: 0 });
    expect(sink.records.size).toBe(2);
    expect(logger.warn).toHaveBeenCalledWith('[pipeline:down] Fetch failed, nothing to process this run: HTTP 503');
    expect(logger.warn).toHaveBeenCalledWith('[pipeline] 1 source(s) could not be fetched: down');
  });

  it('logs an unexpected fetch error as an error', async () => {
    const { pipeline, cache, ledger, logger } = setup();

    const summary = await runSources(
      [
        source('broken', async () => {
          throw new Error('parser exploded');
        }),
      ],
      { pipeline, cache, ledger, logger },
    );

    expect(summary.sources[0]).toEqual({
      sourceId: 'broken',
      sourceName: 'Source broken',
      status: 'fetch-failed',
      fetched: 0,
      error: 'parser exploded',
    });
    expect(logger.error).toHaveBeenCalledWith(
      '[pipeline:broken] Unexpected fetch error, nothing to process this run: parser exploded',
    );
  });

  it('purges expired cache entries after the run', async () => {
    const { pipeline, cache, backend, ledger, logger, time } = setup();
    await cache.put('old', 'dedup-seen', {}, DAY_MS);
    time.advance(2 * DAY_MS);

    const summary = await runSources([], { pipeline, cache, ledger, logger });

    expect(summary.purgedCacheEntries).toBe(1);
    expect(backend.entries.size).toBe(0);
    expect(summary.ledger).toMatchObject({ dailySpentUsd: 0, dailyRemainingUsd: 1, monthlyRemainingUsd: 10 });
  });

  it('skips the remaining sources once cancelled', async () => {
    const { pipeline, cache, ledger, logger } = setup();
    const controller = new AbortController();
    const second = vi.fn(async () => ({ items: [] }));
    const sources = [
      source('first', async () => {
        controller.abort();
        return { items: [] };
      }),
      source('second', second),
    ];

    const summary = await runSources(sources, { pipeline, cache, ledger, logger, signal: controller.signal });

    expect(second).not.toHaveBeenCalled();
    expect(summary.sources.map((result) => result.status)).toEqual(['empty', 'skipped']);
    expect(summary.cancelled).toBe(true);
  });

  it('propagates a maintenance failure', async () => {
    const { pipeline, cache, ledger, logger } = setup();
    vi.spyOn(cache, 'purgeExpired').mockRejectedValue(new Error('connection refused'));

    await expect(runSources([], { pipeline, cache, ledger, logger })).rejects.toThrow('connection refused');
  });
});
