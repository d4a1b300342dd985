import type { Job } from 'bullmq';
import type { Logger } from 'pino';
import { withTrace, type TraceableData } from './trace.js';

interface SerializedError {
  name?: string;
  message: string;
  stack?: string;
}

export function serializeError(error: unknown): SerializedError {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }

  return {
    message: String(error),
  };
}

function computeWaitMs(timestamp: number, now: number): number | undefined {
  if (!Number.isFinite(timestamp) || timestamp <= 0) {
    return undefined;
  }

  return Math.max(0, now - timestamp);
}

export interface WithLoggerOptions<TData extends TraceableData, TResult> {
  logger: Logger;
  queue: string;
  job: Job<TData>;
  context?: (traceId: string) => Record<string, unknown>;
  summary?: (result: TResult) => Record<string, unknown>;
  /** Receives a child logger bound to the job's queue, id and trace id. */
  run: (jobLogger: Logger) => Promise<TResult>;
  now?: () => number;
}

/**
 * Log `job_started`, then `job_completed` or `job_failed` around one job.
 * Errors are logged and rethrown so bullmq applies its retry policy.
 */
export async function withLogger<TData extends TraceableData, TResult>({
  logger,
  queue,
  job,
  context,
  summary,
  run,
  now = Date.now,
}: WithLoggerOptions<TData, TResult>): Promise<TResult> {
  const traceId = withTrace(job);
  const jobId = String(job.id ?? 'unknown');
  const attempt = job.attemptsMade + 1;
  const startedAt = now();
  const common = {
    queue,
    jobName: job.name,
    jobId,
    attempt,
    traceId,
    ...(context ? context(traceId) : {}),
  };
  const jobLogger = logger.child({ queue, jobId, traceId });

  logger.info({ event: 'job_started', ...common, waitMs: computeWaitMs(job.timestamp, startedAt) }, 'Job started');

  try {
    const result = await run(jobLogger);
    logger.info(
      {
        event: 'job_completed',
        ...common,
        durationMs: now() - startedAt,
        ...(summary ? summary(result) : {}),
      },
      'Job completed',
    );
    return result;
  } catch (error) {
    logger.error(
      {
        event: 'job_failed',
        ...common,
        durationMs: now() - startedAt,
        error: serializeError(error),
      },
      'Job failed',
    );
    throw error;
  }
}
