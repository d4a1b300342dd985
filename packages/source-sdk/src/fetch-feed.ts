import { TransientSourceError } from './errors.js';

const DEFAULT_TIMEOUT_MS = 15_000;
const DEFAULT_MAX_ATTEMPTS = 3;
const DEFAULT_RETRY_DELAYS_MS = [500, 1500];
export const DEFAULT_USER_AGENT = 'digestline/0.1 (+feed collector)';

export interface FetchFeedOptions {
  sourceId: string;
  fetchImpl?: typeof fetch;
  userAgent?: string;
  timeoutMs?: number;
  maxAttempts?: number;
  retryDelaysMs?: number[];
  sleep?: (ms: number) => Promise<void>;
}

function shouldRetryStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * GET a feed document, retrying network errors, 429 and 5xx responses.
 * Every failure surfaces as a TransientSourceError.
 */
export async function fetchFeedText(url: string, options: FetchFeedOptions): Promise<string> {
  const fetchImpl = options.fetchImpl ?? fetch;
  const maxAttempts = options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
  const retryDelaysMs = options.retryDelaysMs ?? DEFAULT_RETRY_DELAYS_MS;
  const sleep = options.sleep ?? defaultSleep;
  let lastError: TransientSourceError | undefined;

  const waitBeforeRetry = async (attempt: number): Promise<void> => {
    if (attempt < maxAttempts) {
      const delay = retryDelaysMs[attempt - 1] ?? retryDelaysMs[retryDelaysMs.length - 1] ?? 0;
      await sleep(delay);
    }
  };

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    let res: Response;

    try {
      res = await fetchImpl(url, {
        headers: {
          'User-Agent': options.userAgent ?? DEFAULT_USER_AGENT,
          Accept: 'application/rss+xml, application/atom+xml, application/xml;q=0.9, */*;q=0.8',
        },
        signal: AbortSignal.timeout(options.timeoutMs ?? DEFAULT_TIMEOUT_MS),
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      lastError = new TransientSourceError(options.sourceId, `request to ${url} failed: ${message}`, { cause: error });
      await waitBeforeRetry(attempt);
      continue;
    }

    if (!res.ok) {
      const statusError = new TransientSourceError(options.sourceId, `${url} returned ${res.status}`, {
        status: res.status,
      });
      if (!shouldRetryStatus(res.status)) {
        throw statusError;
      }

      lastError = statusError;
      await waitBeforeRetry(attempt);
      continue;
    }

    return res.text();
  }

  throw (
    lastError ?? new TransientSourceError(options.sourceId, `${url} request failed after ${maxAttempts} attempts`)
  );
}
