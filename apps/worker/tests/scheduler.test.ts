import type { Source } from '@digestline/source-sdk';
import { describe, expect, it, vi } from 'vitest';
import type { Queues } from '../src/queues.js';
import { resolveSourceSchedule, scheduleAllSources, sourceScheduleEnvKey } from '../src/scheduler.js';
import { stub } from './test-helpers.js';

function createQueuesMock(add = vi.fn().mockResolvedValue(undefined)): Queues {
  return {
    digestRunQueue: stub<Queues['digestRunQueue']>({ add }),
  };
}

function source(id: string, schedule: string): Source {
  return {
    manifest: { id, name: id, version: '0.1.0', schedule, type: 'feed' },
    fetch: vi.fn(),
  };
}

describe('sourceScheduleEnvKey', () => {
  it('upper-cases the id and replaces other characters', () => {
    expect(sourceScheduleEnvKey('hacker-news')).toBe('SOURCE_SCHEDULE_HACKER_NEWS');
    expect(sourceScheduleEnvKey('arxiv.cs_cl')).toBe('SOURCE_SCHEDULE_ARXIV_CS_CL');
  });
});

describe('resolveSourceSchedule', () => {
  const blog = source('blog', '0 * * * *');

  it('prefers an explicit override, then the environment, then the source', () => {
    const env = { SOURCE_SCHEDULE_BLOG: '*/10 * * * *' };

    expect(resolveSourceSchedule(blog, { schedules: { blog: '*/5 * * * *' }, env })).toBe('*/5 * * * *');
    expect(resolveSourceSchedule(blog, { env })).toBe('*/10 * * * *');
    expect(resolveSourceSchedule(blog, { env: {} })).toBe('0 * * * *');
  });

  it('falls back to the source schedule when the env override is empty', () => {
    expect(resolveSourceSchedule(blog, { env: { SOURCE_SCHEDULE_BLOG: '  ' } })).toBe('0 * * * *');
  });
});

describe('scheduleAllSources', () => {
  it('adds one repeatable job per source', async () => {
    const queues = createQueuesMock();

    const result = await scheduleAllSources(queues, [source('blog', '0 * * * *'), source('videos', '0 */3 * * *')], {
      env: { SOURCE_SCHEDULE_VIDEOS: '30 */6 * * *' },
    });

    expect(result).toEqual({
      scheduled: [
        { sourceId: 'blog', pattern: '0 * * * *' },
        { sourceId: 'videos', pattern: '30 */6 * * *' },
      ],
      errors: [],
    });
    expect(vi.mocked(queues.digestRunQueue.add)).toHaveBeenCalledWith(
      'digest-run',
      { sourceId: 'blog' },
      expect.objectContaining({
        jobId: 'digest-run-blog',
        repeat: { pattern: '0 * * * *' },
        attempts: 3,
      }),
    );
  });

  it('keeps scheduling the other sources when one fails', async () => {
    const add = vi.fn().mockRejectedValueOnce(new Error('redis unavailable')).mockResolvedValue(undefined);
    const queues = createQueuesMock(add);

    const result = await scheduleAllSources(queues, [source('blog', '0 * * * *'), source('videos', '0 */3 * * *')], {
      env: {},
    });

    expect(result.errors).toEqual([{ sourceId: 'blog', error: 'redis unavailable' }]);
    expect(result.scheduled).toEqual([{ sourceId: 'videos', pattern: '0 */3 * * *' }]);
  });
});
