/**
 * A source could not be fetched this run. The pipeline treats it the same as an
 * empty result: log, skip this source, continue with the others.
 */
export class TransientSourceError extends Error {
  readonly sourceId: string;
  readonly status?: number;

  constructor(sourceId: string, message: string, options?: { status?: number; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = 'TransientSourceError';
    this.sourceId = sourceId;
    this.status = options?.status;
  }
}
