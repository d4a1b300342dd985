import { loadDigestConfig } from '@digestline/pipeline';
import { closeQueues, createQueues, DIGEST_RUN_JOB } from '../../apps/worker/src/queues.js';
import { createRedisConnection, DEFAULT_REDIS_URL } from '../../apps/worker/src/redis.js';

async function main(): Promise<void> {
  const requestedSources = process.argv.slice(2);
  const sources =
    requestedSources.length > 0
      ? requestedSources
      : (await loadDigestConfig()).config.sources.filter((source) => source.enabled).map((source) => source.id);
  const redisUrl = process.env.REDIS_URL ?? DEFAULT_REDIS_URL;

  const redis = createRedisConnection(redisUrl);
  const queues = createQueues(redis);

  try {
    for (const sourceId of sources) {
      const traceId = `manual-${sourceId}-${Date.now()}`;

      await queues.digestRunQueue.add(
        DIGEST_RUN_JOB,
        { sourceId, traceId },
        {
          jobId: `manual-digest-run-${sourceId}-${Date.now()}`,
          attempts: 1,
          removeOnComplete: true,
          removeOnFail: 1000,
        },
      );

      console.log(`queued digest.run for ${sourceId}`);
    }
  } finally {
    await closeQueues(queues);
    await redis.quit();
  }
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
