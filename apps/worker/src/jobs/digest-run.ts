import { runSources, type CacheStore, type CostLedger, type Pipeline, type RunSummary } from '@digestline/pipeline';
import type { Job } from 'bullmq';
import type { Logger } from 'pino';
import { createPipelineLogger } from '../observability/pipeline-logger.js';
import type { DigestRunJobData } from '../queues.js';
import type { SourceCatalog } from '../sources/catalog.js';

export interface DigestRunJobDeps {
  catalog: SourceCatalog;
  pipeline: Pipeline;
  cache: CacheStore;
  ledger: CostLedger;
  logger: Logger;
  signal?: AbortSignal;
}

/**
 * Fetch one source and run its items through the pipeline.
 * Throws when items failed, so the job is retried; archived items are skipped
 * as duplicates on the next attempt.
 */
export async function handleDigestRunJob(job: Job<DigestRunJobData>, deps: DigestRunJobDeps): Promise<RunSummary> {
  const source = deps.catalog.get(job.data.sourceId);
  const logger = deps.logger.child({ sourceId: source.manifest.id });

  const summary = await runSources([source], {
    pipeline: deps.pipeline,
    cache: deps.cache,
    ledger: deps.ledger,
    logger: createPipelineLogger(logger),
    signal: deps.signal,
  });

  if (summary.counts.failed > 0) {
    throw new Error(`[digest.run:${source.manifest.id}] ${summary.counts.failed} item(s) failed`);
  }

  return summary;
}
