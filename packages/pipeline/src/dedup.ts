import { isRecord } from '@digestline/source-sdk';
import { DEDUP_DISCRIMINATOR, type CacheStore } from './cache-store.js';
import type { FingerprintedItem } from './types.js';

export const DEFAULT_SIMILARITY_THRESHOLD = 0.85;
const SIGNATURE_MAX_TOKENS = 400;

export interface SemanticDedupOptions {
  enabled: boolean;
  threshold?: number;
}

export interface DeduplicatorOptions {
  cache: CacheStore;
  /** Lookback window; seen entries older than this no longer count. */
  ttlMs: number;
  semantic?: SemanticDedupOptions;
}

export type DedupDecision =
  | { duplicate: false }
  | { duplicate: true; reason: 'seen' }
  | { duplicate: true; reason: 'similar'; similarity: number; matchedKey: string };

interface Claim {
  signature: string[];
  settled: Promise<void>;
  settle: () => void;
}

function openClaim(signature: string[]): Claim {
  let settle: () => void = () => undefined;
  const settled = new Promise<void>((resolve) => {
    settle = resolve;
  });
  return { signature, settled, settle };
}

interface SeenPayload {
  url: string;
  sourceId: string;
  externalId: string;
  signature: string[];
}

/**
 * Distinct lower-case word tokens of a text, in first-seen order.
 */
export function tokenSignature(text: string): string[] {
  const tokens = text
    .toLowerCase()
    .split(/[^\p{L}\p{N}]+/u)
    .filter((token) => token.length > 1);

  return [...new Set(tokens)].slice(0, SIGNATURE_MAX_TOKENS);
}

export function jaccardSimilarity(a: readonly string[], b: readonly string[]): number {
  if (a.length === 0 || b.length === 0) {
    return 0;
  }

  const left = new Set(a);
  const right = new Set(b);
  let shared = 0;
  for (const token of left) {
    if (right.has(token)) {
      shared += 1;
    }
  }

  return shared / (left.size + right.size - shared);
}

function readSignature(payload: unknown): string[] {
  if (!isRecord(payload) || !Array.isArray(payload.signature)) {
    return [];
  }

  return payload.signature.filter((token): token is string => typeof token === 'string');
}

function signatureOf(entry: FingerprintedItem): string[] {
  return tokenSignature(`${entry.item.title} ${entry.item.body}`);
}

/**
 * Drops items already archived within the lookback window.
 *
 * The check claims the fingerprint before its first await. A concurrent item
 * with the same fingerprint (or, in semantic mode, a similar signature) waits
 * until that claim settles and then checks again, so it sees whatever the
 * claimant left behind: a seen marker after `markSeen`, nothing after
 * `release`.
 */
export class Deduplicator {
  private readonly cache: CacheStore;
  private readonly ttlMs: number;
  private readonly semantic: Required<SemanticDedupOptions>;
  private readonly inFlight = new Map<string, Claim>();

  constructor(options: DeduplicatorOptions) {
    this.cache = options.cache;
    this.ttlMs = options.ttlMs;
    this.semantic = {
      enabled: options.semantic?.enabled ?? false,
      threshold: options.semantic?.threshold ?? DEFAULT_SIMILARITY_THRESHOLD,
    };
  }

  async isDuplicate(entry: FingerprintedItem): Promise<DedupDecision> {
    const { fingerprint } = entry;
    const signature = this.semantic.enabled ? signatureOf(entry) : [];

    for (;;) {
      const pending = this.inFlight.get(fingerprint) ?? this.findSimilarInFlight(signature);
      if (!pending) {
        break;
      }
      await pending.settled;
    }

    this.inFlight.set(fingerprint, openClaim(signature));

    try {
      const seen = await this.cache.lookup(fingerprint, DEDUP_DISCRIMINATOR);
      if (seen) {
        this.settle(fingerprint);
        return { duplicate: true, reason: 'seen' };
      }

      if (this.semantic.enabled) {
        const similar = await this.findSimilarSeen(signature);
        if (similar) {
          this.settle(fingerprint);
          return similar;
        }
      }
    } catch (error) {
      this.settle(fingerprint);
      throw error;
    }

    return { duplicate: false };
  }

  async markSeen(entry: FingerprintedItem): Promise<void> {
    const payload: SeenPayload = {
      url: entry.item.url,
      sourceId: entry.item.sourceId,
      externalId: entry.item.externalId,
      signature: this.inFlight.get(entry.fingerprint)?.signature ?? (this.semantic.enabled ? signatureOf(entry) : []),
    };

    try {
      await this.cache.put(entry.fingerprint, DEDUP_DISCRIMINATOR, payload, this.ttlMs);
    } finally {
      this.settle(entry.fingerprint);
    }
  }

  release(entry: FingerprintedItem): void {
    this.settle(entry.fingerprint);
  }

  private settle(fingerprint: string): void {
    const claim = this.inFlight.get(fingerprint);
    this.inFlight.delete(fingerprint);
    claim?.settle();
  }

  private findSimilarInFlight(signature: string[]): Claim | undefined {
    if (!this.semantic.enabled || signature.length === 0) {
      return undefined;
    }

    for (const claim of this.inFlight.values()) {
      if (jaccardSimilarity(signature, claim.signature) >= this.semantic.threshold) {
        return claim;
      }
    }

    return undefined;
  }

  private async findSimilarSeen(signature: string[]): Promise<DedupDecision | null> {
    if (signature.length === 0) {
      return null;
    }

    const seen = await this.cache.listFresh(DEDUP_DISCRIMINATOR);
    for (const entry of seen) {
      const similarity = jaccardSimilarity(signature, readSignature(entry.payload));
      if (similarity >= this.semantic.threshold) {
        return { duplicate: true, reason: 'similar', similarity, matchedKey: entry.key };
      }
    }

    return null;
  }
}
