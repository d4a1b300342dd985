import type { PipelineLogger } from '@digestline/pipeline';
import type { Logger } from 'pino';

/**
 * Bridge the pipeline's string logger onto pino. Per-item chatter goes to debug.
 */
export function createPipelineLogger(logger: Logger): PipelineLogger {
  return {
    info: (message) => logger.debug({ event: 'pipeline_stage' }, message),
    warn: (message) => logger.warn({ event: 'pipeline_stage' }, message),
    error: (message) => logger.error({ event: 'pipeline_stage' }, message),
  };
}
