import type { Job } from 'bullmq';
import { describe, expect, it, vi } from 'vitest';
import { withLogger } from '../../src/observability/with-logger.js';
import { createLoggerMock, stub } from '../test-helpers.js';

describe('withLogger', () => {
  it('logs start/completion and returns handler result', async () => {
    const logger = createLoggerMock();
    const job = stub<Job<{ sourceId: string; traceId?: string }>>({
      id: 'job-1',
      name: 'digest-run',
      attemptsMade: 0,
      timestamp: 1000,
      data: { sourceId: 'blog' },
    });
    const now = vi.fn().mockReturnValueOnce(1250).mockReturnValueOnce(1400);

    const result = await withLogger({
      logger,
      queue: 'digest.run',
      job,
      context: () => ({ sourceId: 'blog' }),
      summary: () => ({ archived: 5 }),
      run: async () => ({ ok: true }),
      now,
    });

    expect(result).toEqual({ ok: true });
    expect(job.data.traceId).toBeTruthy();
    expect(vi.mocked(logger.info)).toHaveBeenCalledTimes(2);

    const [startPayload] = vi.mocked(logger.info).mock.calls[0]!;
    expect(startPayload).toMatchObject({
      event: 'job_started',
      queue: 'digest.run',
      jobId: 'job-1',
      attempt: 1,
      sourceId: 'blog',
      waitMs: 250,
    });

    const [completedPayload] = vi.mocked(logger.info).mock.calls[1]!;
    expect(completedPayload).toMatchObject({
      event: 'job_completed',
      queue: 'digest.run',
      archived: 5,
      durationMs: 150,
    });
  });

  it('hands the job a child logger bound to the trace id', async () => {
    const logger = createLoggerMock();
    const job = stub<Job<{ traceId?: string }>>({
      id: 'job-3',
      name: 'digest-run',
      attemptsMade: 0,
      timestamp: 0,
      data: { traceId: 'trace-7' },
    });

    await withLogger({ logger, queue: 'digest.run', job, run: async () => undefined });

    expect(logger.child).toHaveBeenCalledWith({ queue: 'digest.run', jobId: 'job-3', traceId: 'trace-7' });
  });

  it('logs failure and rethrows', async () => {
    const logger = createLoggerMock();
    const job = stub<Job<{ traceId?: string }>>({
      id: 'job-2',
      name: 'digest-run',
      attemptsMade: 1,
      timestamp: Date.now() - 100,
      data: {},
    });

    await expect(
      withLogger({
        logger,
        queue: 'digest.run',
        job,
        run: async () => {
          throw new Error('boom');
        },
      }),
    ).rejects.toThrow('boom');

    expect(vi.mocked(logger.error)).toHaveBeenCalledTimes(1);
    const [errorPayload] = vi.mocked(logger.error).mock.calls[0]!;
    expect(errorPayload).toMatchObject({
      event: 'job_failed',
      queue: 'digest.run',
      attempt: 2,
      error: { name: 'Error', message: 'boom' },
    });
  });
});
