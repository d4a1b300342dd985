export { TransientSourceError } from '@digestline/source-sdk';

/**
 * Malformed classification rules or configuration. Raised at startup only.
 */
export class ConfigError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export type CompletionErrorKind = 'timeout' | 'rate_limit' | 'server_error' | 'auth_error' | 'invalid_request';

export interface CompletionUsage {
  tokensIn: number;
  tokensOut: number;
}

export class CompletionError extends Error {
  readonly kind: CompletionErrorKind;
  readonly status?: number;
  readonly retryAfterMs?: number;
  /** Set when the provider billed the failed call. */
  readonly usage?: CompletionUsage;

  constructor(
    kind: CompletionErrorKind,
    message: string,
    options: { status?: number; retryAfterMs?: number; usage?: CompletionUsage; cause?: unknown } = {},
  ) {
    super(message, { cause: options.cause });
    this.name = 'CompletionError';
    this.kind = kind;
    this.status = options.status;
    this.retryAfterMs = options.retryAfterMs;
    this.usage = options.usage;
  }
}

export class CallTimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`call timed out after ${timeoutMs}ms`);
    this.name = 'CallTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Retries for one enhancement feature ran out. Logged, never thrown to the orchestrator.
 */
export class EnhancementFailure extends Error {
  readonly feature: string;
  readonly attempts: number;

  constructor(feature: string, attempts: number, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`${feature} failed after ${attempts} attempt(s): ${reason}`, { cause });
    this.name = 'EnhancementFailure';
    this.feature = feature;
    this.attempts = attempts;
  }
}

export type SinkErrorKind = 'transient' | 'permanent';

export interface SinkError {
  kind: SinkErrorKind;
  message: string;
  cause?: unknown;
}

export class SinkFailure extends Error {
  readonly sink: string;
  readonly attempts: number;
  readonly sinkError: SinkError;

  constructor(sink: string, attempts: number, sinkError: SinkError) {
    super(`${sink} write failed after ${attempts} attempt(s): ${sinkError.message}`, { cause: sinkError.cause });
    this.name = 'SinkFailure';
    this.sink = sink;
    this.attempts = attempts;
    this.sinkError = sinkError;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
