import { SinkFailure, errorMessage, type SinkError } from './errors.js';
import { callWithTimeout, DEFAULT_RETRY_POLICY, retryWithBackoff, type RetryPolicy } from './retry.js';
import type { ProcessedRecord } from './types.js';

export type SinkResult = { ok: true; recordId: string } | { ok: false; error: SinkError };

/** Where processed records end up. Must not throw: failures come back as results. */
export interface Sink {
  readonly name: string;
  write(record: ProcessedRecord, options?: { signal?: AbortSignal }): Promise<SinkResult>;
}

/** Fire-and-forget fan-out after a record is archived. */
export interface Notifier {
  readonly name: string;
  notify(record: ProcessedRecord): Promise<void>;
}

export function transientSinkError(message: string, cause?: unknown): SinkError {
  return { kind: 'transient', message, cause };
}

export function permanentSinkError(message: string, cause?: unknown): SinkError {
  return { kind: 'permanent', message, cause };
}

export interface SinkWriteOptions {
  policy?: RetryPolicy;
  timeoutMs: number;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
  onRetry?: (attempt: number, delayMs: number, error: SinkError) => void;
}

class SinkAttemptError extends Error {
  readonly sinkError: SinkError;

  constructor(sinkError: SinkError) {
    super(sinkError.message);
    this.name = 'SinkAttemptError';
    this.sinkError = sinkError;
  }
}

function toSinkError(error: unknown): SinkError {
  if (error instanceof SinkAttemptError) {
    return error.sinkError;
  }

  // A timeout or an unexpected throw may be worth another attempt.
  return transientSinkError(errorMessage(error), error);
}

/**
 * Write one record, retrying transient failures only.
 * Resolves with the record id, or throws SinkFailure once retries are spent.
 */
export async function writeWithRetry(sink: Sink, record: ProcessedRecord, options: SinkWriteOptions): Promise<string> {
  const outcome = await retryWithBackoff(
    async () => {
      const result = await callWithTimeout((signal) => sink.write(record, { signal }), options.timeoutMs);
      if (!result.ok) {
        throw new SinkAttemptError(result.error);
      }

      return result.recordId;
    },
    {
      policy: options.policy ?? DEFAULT_RETRY_POLICY,
      isRetryable: (error) => toSinkError(error).kind === 'transient',
      onRetry: ({ attempt, delayMs, error }) => options.onRetry?.(attempt, delayMs, toSinkError(error)),
      sleep: options.sleep,
      random: options.random,
    },
  );

  if (!outcome.ok) {
    throw new SinkFailure(sink.name, outcome.attempts, toSinkError(outcome.error));
  }

  return outcome.value;
}
