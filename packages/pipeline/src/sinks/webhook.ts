import { createHmac } from 'node:crypto';
import { systemClock, type Clock } from '../clock.js';
import type { Notifier } from '../sink.js';
import type { ProcessedRecord } from '../types.js';

const MAX_TITLE_LENGTH = 100;
const MAX_TOPICS = 5;
const MAX_SUMMARY_LENGTH = 200;

export interface WebhookNotifierOptions {
  name?: string;
  url: string;
  secret?: string;
  /** Only records at this priority or more urgent are sent. */
  minPriority?: string;
  /** Rank of a priority label, lower is more urgent. Needed with `minPriority`. */
  rank?: (priority: string) => number;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
  clock?: Clock;
}

export interface WebhookMessage {
  msgtype: 'markdown';
  markdown: {
    title: string;
    text: string;
  };
}

/** `sign` is base64(HMAC-SHA256(secret, "<timestamp>\n<secret>")). */
export function signWebhookUrl(url: string, secret: string, timestamp: number): string {
  const sign = createHmac('sha256', secret).update(`${timestamp}\n${secret}`).digest('base64');
  const signed = new URL(url);
  signed.searchParams.set('timestamp', String(timestamp));
  signed.searchParams.set('sign', sign);
  return signed.toString();
}

export function buildWebhookMessage(record: ProcessedRecord): WebhookMessage {
  const title = record.title.slice(0, MAX_TITLE_LENGTH);
  const topics = record.classification.topics.slice(0, MAX_TOPICS).join(', ');
  const summary = record.summary ? record.summary.slice(0, MAX_SUMMARY_LENGTH) : 'No summary';
  const heading = `[${record.classification.priority}] ${title}`;

  const text = [
    `## ${heading}`,
    `**Source**: ${record.sourceName ?? record.sourceId}`,
    `**Type**: ${record.sourceType}`,
    `**Topics**: ${topics || 'None'}`,
    `**Priority**: ${record.classification.priority}`,
    `**Link**: [${record.url}](${record.url})`,
    `**Summary**: ${summary}`,
  ].join('\n\n');

  return { msgtype: 'markdown', markdown: { title: heading, text } };
}

/**
 * Posts a markdown message per archived record to a chat webhook.
 * Throws on a non-2xx response; the pipeline logs it and moves on.
 */
export class WebhookNotifier implements Notifier {
  readonly name: string;
  private readonly options: WebhookNotifierOptions;
  private readonly fetchImpl: typeof fetch;
  private readonly clock: Clock;

  constructor(options: WebhookNotifierOptions) {
    this.name = options.name ?? 'webhook';
    this.options = options;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.clock = options.clock ?? systemClock;
  }

  accepts(record: ProcessedRecord): boolean {
    const { minPriority, rank } = this.options;
    if (!minPriority || !rank) {
      return true;
    }

    return rank(record.classification.priority) <= rank(minPriority);
  }

  async notify(record: ProcessedRecord): Promise<void> {
    if (!this.accepts(record)) {
      return;
    }

    const { url, secret, timeoutMs = 10_000 } = this.options;
    const target = secret ? signWebhookUrl(url, secret, this.clock()) : url;

    const response = await this.fetchImpl(target, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(buildWebhookMessage(record)),
      signal: AbortSignal.timeout(timeoutMs),
    });

    if (!response.ok) {
      throw new Error(`${this.name} responded ${response.status}`);
    }
  }
}
