import { z } from 'zod';
import type { CacheStore } from './cache-store.js';
import { CompletionError, EnhancementFailure, errorMessage } from './errors.js';
import type { CostLedger, Reservation } from './ledger.js';
import {
  completionRetryAfterMs,
  isRetryableCompletionError,
  type ChatMessage,
  type CompletionClient,
} from './llm/client.js';
import { computeCostUsd, estimateCallCostUsd, priceFor, type ModelPrice, type PriceTable } from './llm/pricing.js';
import {
  classificationMessages,
  contentOf,
  MIN_SUMMARY_INPUT_CHARS,
  MIN_TRANSLATION_INPUT_CHARS,
  parseClassificationResponse,
  summaryMessages,
  translationMessages,
} from './llm/prompts.js';
import { callWithTimeout, DEFAULT_RETRY_POLICY, retryWithBackoff, type RetryPolicy } from './retry.js';
import {
  consoleLogger,
  type Classification,
  type FingerprintedItem,
  type PipelineLogger,
  type Provenance,
  type RecordProvenance,
} from './types.js';

export type FallbackReason = 'budget-exceeded' | 'call-failed' | 'invalid-response' | 'input-too-short';

interface Spend {
  costUsd: number;
  tokensIn: number;
  tokensOut: number;
}

const NO_SPEND: Spend = { costUsd: 0, tokensIn: 0, tokensOut: 0 };

export type FeatureOutcome<T> =
  | ({ status: 'ok'; value: T; provenance: 'llm' | 'cache' } & Spend)
  | ({ status: 'fallback'; reason: FallbackReason; provenance: 'keyword-fallback'; error?: string } & Spend);

export interface EnhancerFeatures {
  summarization: boolean;
  translation: boolean;
  classification: boolean;
  targetLanguages: string[];
}

export interface FeatureMaxTokens {
  summary: number;
  translation: number;
  classification: number;
}

export const DEFAULT_MAX_TOKENS: FeatureMaxTokens = {
  summary: 300,
  translation: 1000,
  classification: 150,
};

export interface EnhancerOptions {
  client: CompletionClient;
  ledger: CostLedger;
  cache: CacheStore;
  model: string;
  features: EnhancerFeatures;
  /** Allowed priority labels, most urgent first. */
  priorityLevels: string[];
  knownTopics?: string[];
  cacheTtlMs: number;
  callTimeoutMs: number;
  retryPolicy?: RetryPolicy;
  maxTokens?: Partial<FeatureMaxTokens>;
  prices?: PriceTable;
  logger?: PipelineLogger;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

export interface EnhancementFallback {
  feature: string;
  reason: FallbackReason;
}

export interface EnhancedResult {
  classification: Classification;
  summary?: string;
  translations: Record<string, string>;
  provenance: RecordProvenance;
  costUsd: number;
  tokensIn: number;
  tokensOut: number;
  fallbacks: EnhancementFallback[];
}

interface FeatureCall<T> {
  name: string;
  messages: ChatMessage[];
  maxTokens: number;
  temperature: number;
  inputLength: number;
  minInputChars: number;
  parse(text: string): T | undefined;
  encode(value: T): unknown;
  decode(payload: unknown): T | undefined;
}

const textPayloadSchema = z.object({ text: z.string().min(1) });
const classificationPayloadSchema = z.object({ topics: z.array(z.string()), priority: z.string().min(1) });

function encodeText(text: string): unknown {
  return { text };
}

function decodeText(payload: unknown): string | undefined {
  const parsed = textPayloadSchema.safeParse(payload);
  return parsed.success ? parsed.data.text : undefined;
}

function parseText(text: string): string | undefined {
  const trimmed = text.trim();
  return trimmed ? trimmed : undefined;
}

function ok<T>(value: T, provenance: 'llm' | 'cache', spend: Spend): FeatureOutcome<T> {
  return { status: 'ok', value, provenance, ...spend };
}

function fallback<T>(reason: FallbackReason, spend: Spend = NO_SPEND, error?: string): FeatureOutcome<T> {
  return { status: 'fallback', reason, provenance: 'keyword-fallback', error, ...spend };
}

/**
 * Optional LLM stage. Each feature runs
 * cache check → budget reservation → call with retries → cache write,
 * and degrades to keyword output instead of failing. `enhance` never throws.
 */
export class Enhancer {
  private readonly options: EnhancerOptions;
  private readonly retryPolicy: RetryPolicy;
  private readonly maxTokens: FeatureMaxTokens;
  private readonly price: ModelPrice;
  private readonly logger: PipelineLogger;

  constructor(options: EnhancerOptions) {
    this.options = options;
    this.retryPolicy = options.retryPolicy ?? DEFAULT_RETRY_POLICY;
    this.maxTokens = { ...DEFAULT_MAX_TOKENS, ...options.maxTokens };
    this.price = priceFor(options.model, options.prices);
    this.logger = options.logger ?? consoleLogger;
  }

  get model(): string {
    return this.options.model;
  }

  async enhance(entry: FingerprintedItem, keyword: Classification): Promise<EnhancedResult> {
    const { features } = this.options;
    const content = contentOf(entry.item);
    const result: EnhancedResult = {
      classification: keyword,
      translations: {},
      provenance: { classification: 'keyword', translations: {} },
      costUsd: 0,
      tokensIn: 0,
      tokensOut: 0,
      fallbacks: [],
    };

    const absorb = <T>(feature: string, outcome: FeatureOutcome<T>): Provenance => {
      result.costUsd += outcome.costUsd;
      result.tokensIn += outcome.tokensIn;
      result.tokensOut += outcome.tokensOut;
      if (outcome.status === 'fallback') {
        result.fallbacks.push({ feature, reason: outcome.reason });
      }

      return outcome.provenance;
    };

    if (features.summarization) {
      const outcome = await this.runFeature(entry, {
        name: 'summary',
        messages: summaryMessages(content),
        maxTokens: this.maxTokens.summary,
        temperature: 0.3,
        inputLength: content.length,
        minInputChars: MIN_SUMMARY_INPUT_CHARS,
        parse: parseText,
        encode: encodeText,
        decode: decodeText,
      });
      result.provenance.summary = absorb('summary', outcome);
      if (outcome.status === 'ok') {
        result.summary = outcome.value;
      }
    }

    if (features.translation) {
      for (const language of features.targetLanguages) {
        const feature = `translation:${language}`;
        const outcome = await this.runFeature(entry, {
          name: feature,
          messages: translationMessages(content, language),
          maxTokens: this.maxTokens.translation,
          temperature: 0.2,
          inputLength: content.length,
          minInputChars: MIN_TRANSLATION_INPUT_CHARS,
          parse: parseText,
          encode: encodeText,
          decode: decodeText,
        });
        result.provenance.translations[language] = absorb(feature, outcome);
        if (outcome.status === 'ok') {
          result.translations[language] = outcome.value;
        }
      }
    }

    if (features.classification) {
      const levels = this.options.priorityLevels;
      const outcome = await this.runFeature<Classification>(entry, {
        name: 'classification',
        messages: classificationMessages(content, levels, this.options.knownTopics ?? []),
        maxTokens: this.maxTokens.classification,
        temperature: 0.3,
        inputLength: content.length,
        minInputChars: 1,
        parse: (text) => parseClassificationResponse(text, levels),
        encode: (value) => value,
        decode: (payload) => {
          const parsed = classificationPayloadSchema.safeParse(payload);
          return parsed.success ? parsed.data : undefined;
        },
      });
      result.provenance.classification = absorb('classification', outcome);
      if (outcome.status === 'ok') {
        result.classification = outcome.value;
      }
    }

    return result;
  }

  private async runFeature<T>(entry: FingerprintedItem, call: FeatureCall<T>): Promise<FeatureOutcome<T>> {
    if (call.inputLength < call.minInputChars) {
      return fallback('input-too-short');
    }

    const discriminator = `${call.name}:${this.options.model}`;
    const label = `[pipeline:${entry.item.sourceId}] ${entry.item.externalId} ${call.name}`;

    try {
      const cached = await this.options.cache.lookup(entry.fingerprint, discriminator);
      const cachedValue = cached ? call.decode(cached.payload) : undefined;
      if (cachedValue !== undefined) {
        return ok(cachedValue, 'cache', NO_SPEND);
      }

      const estimate = estimateCallCostUsd(this.price, call.messages, call.maxTokens);
      const reservation = await this.options.ledger.reserve(estimate);
      if (!reservation) {
        this.logger.info(`${label}: budget exhausted (estimate $${estimate.toFixed(6)}), using keyword output`);
        return fallback('budget-exceeded');
      }

      return await this.callReserved(entry, call, discriminator, reservation, label);
    } catch (error) {
      const message = errorMessage(error);
      this.logger.error(`${label}: ${message}`);
      return fallback('call-failed', NO_SPEND, message);
    }
  }

  // The reservation is held across retries and settled exactly once.
  private async callReserved<T>(
    entry: FingerprintedItem,
    call: FeatureCall<T>,
    discriminator: string,
    reservation: Reservation,
    label: string,
  ): Promise<FeatureOutcome<T>> {
    const { client, ledger, cache, model } = this.options;

    const outcome = await retryWithBackoff(
      () =>
        callWithTimeout(
          (signal) =>
            client.complete(
              { messages: call.messages, model, maxTokens: call.maxTokens, temperature: call.temperature },
              { signal },
            ),
          this.options.callTimeoutMs,
        ),
      {
        policy: this.retryPolicy,
        isRetryable: isRetryableCompletionError,
        retryAfterMs: completionRetryAfterMs,
        onRetry: ({ attempt, delayMs, error }) => {
          this.logger.warn(`${label}: attempt ${attempt} failed (${errorMessage(error)}), retrying in ${delayMs}ms`);
        },
        sleep: this.options.sleep,
        random: this.options.random,
      },
    );

    if (!outcome.ok) {
      const failure = new EnhancementFailure(call.name, outcome.attempts, outcome.error);
      const usage = outcome.error instanceof CompletionError ? outcome.error.usage : undefined;
      let spend = NO_SPEND;

      if (usage) {
        spend = { costUsd: computeCostUsd(this.price, usage.tokensIn, usage.tokensOut), ...usage };
        await ledger.record(reservation, { provider: client.provider, ...spend });
      } else {
        await ledger.release(reservation);
      }

      this.logger.warn(`${label}: ${failure.message}; using keyword output`);
      return fallback('call-failed', spend, failure.message);
    }

    const response = outcome.value;
    const spend: Spend = {
      costUsd: computeCostUsd(this.price, response.tokensIn, response.tokensOut),
      tokensIn: response.tokensIn,
      tokensOut: response.tokensOut,
    };
    await ledger.record(reservation, { provider: client.provider, ...spend });

    const value = call.parse(response.text);
    if (value === undefined) {
      this.logger.warn(`${label}: unusable model response, using keyword output`);
      return fallback('invalid-response', spend);
    }

    try {
      await cache.put(entry.fingerprint, discriminator, call.encode(value), this.options.cacheTtlMs);
    } catch (error) {
      this.logger.warn(`${label}: cache write failed: ${errorMessage(error)}`);
    }

    return ok(value, 'llm', spend);
  }
}
