import { Queue } from 'bullmq';
import type { Redis as IORedis } from 'ioredis';

export const DIGEST_RUN_QUEUE = 'digest.run';
export const DIGEST_RUN_JOB = 'digest-run';

export interface DigestRunJobData {
  sourceId: string;
  traceId?: string;
}

export interface Queues {
  digestRunQueue: Queue<DigestRunJobData>;
}

export function createQueues(connection: IORedis): Queues {
  return {
    digestRunQueue: new Queue<DigestRunJobData>(DIGEST_RUN_QUEUE, { connection }),
  };
}

export async function closeQueues(queues: Queues): Promise<void> {
  await queues.digestRunQueue.close();
}
