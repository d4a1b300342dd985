import { randomUUID } from 'node:crypto';
import type { Job } from 'bullmq';

export interface TraceableData {
  traceId?: string;
}

export function ensureTraceId(traceId?: string): string {
  if (traceId && traceId.trim().length > 0) {
    return traceId;
  }

  return randomUUID();
}

/** Stamp the job with a trace id, keeping the one it was enqueued with. */
export function withTrace<TData extends TraceableData>(job: Job<TData>): string {
  const traceId = ensureTraceId(job.data.traceId);
  job.data.traceId = traceId;
  return traceId;
}
