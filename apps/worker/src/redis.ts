import { Redis as IORedis } from 'ioredis';

export const DEFAULT_REDIS_URL = 'redis://localhost:6379';

/** bullmq workers need `maxRetriesPerRequest: null` on their connection. */
export function createRedisConnection(redisUrl: string = DEFAULT_REDIS_URL): IORedis {
  return new IORedis(redisUrl, {
    maxRetriesPerRequest: null,
    enableReadyCheck: true,
    connectionName: 'digestline-worker',
  });
}
