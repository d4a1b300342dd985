import type { RawItem } from '@digestline/source-sdk';
import { vi } from 'vitest';
import { CacheStore } from '../src/cache-store.js';
import { fingerprintItem } from '../src/fingerprint.js';
import { clean } from '../src/normalize.js';
import type { RetryPolicy } from '../src/retry.js';
import { MemoryCacheBackend } from '../src/stores/memory.js';
import type { FingerprintedItem, ProcessedRecord } from '../src/types.js';
import { validateItem } from '../src/validate.js';

export const noSleep = async (): Promise<void> => undefined;

export const FAST_RETRY: RetryPolicy = {
  maxAttempts: 3,
  backoffFactor: 2,
  baseDelayMs: 0,
  maxDelayMs: 0,
  jitterMs: 0,
};

// 2026-03-15T12:00:00Z
export const T0 = Date.UTC(2026, 2, 15, 12, 0, 0);

export function createLogger() {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

export function manualClock(start = T0) {
  let now = start;
  return {
    clock: () => now,
    advance(ms: number) {
      now += ms;
    },
    set(value: number) {
      now = value;
    },
  };
}

export function rawItem(overrides: Partial<RawItem> = {}): RawItem {
  return {
    sourceId: 'example-blog',
    externalId: 'example-blog:1',
    url: 'https://example.com/posts/1',
    title: 'A post',
    body: 'Some body text for the post.',
    sourceType: 'feed',
    ...overrides,
  };
}

export function fingerprinted(overrides: Partial<RawItem> = {}): FingerprintedItem {
  const validation = validateItem(rawItem(overrides));
  if (!validation.ok) {
    throw new Error(validation.error);
  }

  return fingerprintItem(clean(validation.item));
}

export function memoryCache(clock: () => number, defaultTtlMs = 30 * 24 * 60 * 60 * 1000) {
  const backend = new MemoryCacheBackend();
  const cache = new CacheStore({ backend, defaultTtlMs, clock });
  return { backend, cache };
}

export function processedRecord(overrides: Partial<ProcessedRecord> = {}): ProcessedRecord {
  return {
    fingerprint: 'f'.repeat(64),
    sourceId: 'example-blog',
    externalId: 'example-blog:1',
    sourceType: 'feed',
    sourceName: 'Example Blog',
    url: 'https://a.com/1',
    title: 'GPT-4 release',
    body: 'Body text.',
    classification: { topics: ['AI'], priority: 'High' },
    keywordClassification: { topics: ['AI'], priority: 'High' },
    summary: 'Short summary.',
    translations: {},
    provenance: { classification: 'keyword', summary: 'llm', translations: {} },
    costUsd: 0,
    tokensIn: 0,
    tokensOut: 0,
    ...overrides,
  };
}
