import type { Source } from '@digestline/source-sdk';
import { DIGEST_RUN_JOB, type Queues } from './queues.js';

const DIGEST_RUN_ATTEMPTS = 3;
const DIGEST_RUN_BACKOFF_MS = 5000;

export interface SchedulerOptions {
  /** Per-source cron overrides; win over `SOURCE_SCHEDULE_<ID>` and the configured schedule. */
  schedules?: Record<string, string>;
  env?: NodeJS.ProcessEnv;
}

export interface ScheduledSource {
  sourceId: string;
  pattern: string;
}

export interface SchedulerResult {
  scheduled: ScheduledSource[];
  errors: Array<{ sourceId: string; error: string }>;
}

export function sourceScheduleEnvKey(sourceId: string): string {
  return `SOURCE_SCHEDULE_${sourceId.replaceAll(/[^a-z0-9]/gi, '_').toUpperCase()}`;
}

export function resolveSourceSchedule(source: Source, options: SchedulerOptions = {}): string {
  const sourceId = source.manifest.id;
  const configOverride = options.schedules?.[sourceId]?.trim();
  if (configOverride) {
    return configOverride;
  }

  const envOverride = (options.env ?? process.env)[sourceScheduleEnvKey(sourceId)]?.trim();
  if (envOverride) {
    return envOverride;
  }

  return source.manifest.schedule;
}

/**
 * Register one repeatable `digest.run` job per source. A source that cannot be
 * scheduled is reported and the others still are.
 */
export async function scheduleAllSources(
  queues: Queues,
  sources: readonly Source[],
  options: SchedulerOptions = {},
): Promise<SchedulerResult> {
  const result: SchedulerResult = { scheduled: [], errors: [] };

  for (const source of sources) {
    const sourceId = source.manifest.id;
    const pattern = resolveSourceSchedule(source, options);

    try {
      await queues.digestRunQueue.add(
        DIGEST_RUN_JOB,
        { sourceId },
        {
          jobId: `digest-run-${sourceId}`,
          repeat: { pattern },
          attempts: DIGEST_RUN_ATTEMPTS,
          backoff: { type: 'exponential', delay: DIGEST_RUN_BACKOFF_MS },
          removeOnComplete: true,
          removeOnFail: 1000,
        },
      );
      result.scheduled.push({ sourceId, pattern });
    } catch (error) {
      result.errors.push({ sourceId, error: error instanceof Error ? error.message : String(error) });
    }
  }

  return result;
}
