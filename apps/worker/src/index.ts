import { Worker, type Job } from 'bullmq';
import { createDatabase, type Database } from '@digestline/db';
import { createDigest, loadDigestConfig, readRequiredEnv, type RunSummary } from '@digestline/pipeline';
import { handleDigestRunJob } from './jobs/digest-run.js';
import { closeQueues, createQueues, DIGEST_RUN_QUEUE, type DigestRunJobData, type Queues } from './queues.js';
import { createRedisConnection, DEFAULT_REDIS_URL } from './redis.js';
import { scheduleAllSources } from './scheduler.js';
import { createSourceCatalog } from './sources/catalog.js';
import { createWorkerLogger } from './observability/logger.js';
import { createPipelineLogger } from './observability/pipeline-logger.js';
import { withLogger } from './observability/with-logger.js';

interface RuntimeState {
  db: Database | null;
  redis: ReturnType<typeof createRedisConnection> | null;
  queues: Queues | null;
  worker: Worker<DigestRunJobData, RunSummary> | null;
  shutdown: AbortController;
}

const runtimeState: RuntimeState = {
  db: null,
  redis: null,
  queues: null,
  worker: null,
  shutdown: new AbortController(),
};

async function closeDbConnection(db: Database | null): Promise<void> {
  if (!db) {
    return;
  }

  await db.$client.end();
}

async function cleanupRuntimeState(state: RuntimeState): Promise<void> {
  state.shutdown.abort();

  if (state.worker) {
    await Promise.allSettled([state.worker.close()]);
  }

  if (state.queues) {
    await Promise.allSettled([closeQueues(state.queues)]);
  }

  if (state.redis) {
    await Promise.allSettled([state.redis.quit()]);
  }

  await Promise.allSettled([closeDbConnection(state.db)]);
}

async function run(): Promise<void> {
  const logger = createWorkerLogger();
  const { config, rules } = await loadDigestConfig();
  const databaseUrl = readRequiredEnv('DATABASE_URL');
  const redisUrl = process.env.REDIS_URL ?? DEFAULT_REDIS_URL;

  const db = createDatabase(databaseUrl);
  runtimeState.db = db;

  const digest = createDigest(config, rules, { db, logger: createPipelineLogger(logger) });
  await digest.ledger.open();
  const catalog = createSourceCatalog(config.sources);

  const redis = createRedisConnection(redisUrl);
  runtimeState.redis = redis;
  const queues = createQueues(redis);
  runtimeState.queues = queues;

  // One job at a time: the cost ledger expects a single writer.
  const worker = new Worker<DigestRunJobData, RunSummary>(
    DIGEST_RUN_QUEUE,
    (job: Job<DigestRunJobData>) =>
      withLogger({
        logger,
        queue: DIGEST_RUN_QUEUE,
        job,
        context: () => ({ sourceId: job.data.sourceId }),
        summary: (result) => ({
          sourceId: job.data.sourceId,
          status: result.sources[0]?.status,
          archived: result.counts.archived,
          duplicates: result.counts.duplicates,
          filtered: result.counts.filtered,
          failed: result.counts.failed,
          costUsd: result.totalCostUsd,
          dailySpentUsd: result.ledger.dailySpentUsd,
          monthlySpentUsd: result.ledger.monthlySpentUsd,
        }),
        run: (jobLogger) =>
          handleDigestRunJob(job, {
            catalog,
            pipeline: digest.pipeline,
            cache: digest.cache,
            ledger: digest.ledger,
            logger: jobLogger,
            signal: runtimeState.shutdown.signal,
          }),
      }),
    { connection: redis, concurrency: 1 },
  );
  runtimeState.worker = worker;

  worker.on('error', (error) => {
    logger.error(
      {
        event: 'worker_runtime_error',
        queue: worker.name,
        error,
      },
      'Worker runtime error',
    );
  });

  const schedulerResult = await scheduleAllSources(queues, catalog.all());
  if (schedulerResult.errors.length === 0) {
    logger.info(
      {
        event: 'scheduler_configured',
        scheduled: schedulerResult.scheduled,
      },
      'Scheduler configured',
    );
  } else {
    logger.warn(
      {
        event: 'scheduler_partially_configured',
        scheduled: schedulerResult.scheduled,
        errors: schedulerResult.errors,
      },
      'Scheduler partially configured: some sources could not be scheduled',
    );
  }

  let shuttingDown = false;
  const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
    if (shuttingDown) {
      return;
    }

    shuttingDown = true;
    logger.info({ event: 'shutdown_requested', signal }, 'Shutdown requested');

    await cleanupRuntimeState(runtimeState);

    logger.info({ event: 'shutdown_completed', signal }, 'Shutdown completed');
    process.exit(0);
  };

  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });

  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });

  logger.info(
    {
      event: 'worker_started',
      redisUrl,
      sources: catalog.all().length,
      llmEnabled: digest.enhancer !== undefined,
    },
    'Worker started',
  );
}

run().catch(async (error) => {
  await cleanupRuntimeState(runtimeState);
  const logger = createWorkerLogger();
  logger.error(
    {
      event: 'worker_fatal_error',
      error,
    },
    'Worker fatal error',
  );
  process.exit(1);
});
