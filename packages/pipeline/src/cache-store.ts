import { systemClock, type Clock } from './clock.js';
import { SerialQueue } from './serial.js';

export const DEDUP_DISCRIMINATOR = 'dedup-seen';

export interface CacheEntry {
  key: string;
  discriminator: string;
  payload: unknown;
  createdAt: number;
  ttlMs: number;
}

/**
 * Persistence behind the cache store. Implementations need no locking of their
 * own: the store serializes every call.
 */
export interface CacheBackend {
  get(key: string): Promise<CacheEntry | undefined>;
  set(entry: CacheEntry): Promise<void>;
  delete(key: string): Promise<void>;
  /** Entries of one discriminator that have not expired at `now`. */
  listByDiscriminator(discriminator: string, now: number): Promise<CacheEntry[]>;
  deleteExpired(now: number): Promise<number>;
  flush?(): Promise<void>;
}

export interface CacheStoreOptions {
  backend: CacheBackend;
  defaultTtlMs: number;
  clock?: Clock;
}

export function cacheKey(fingerprint: string, discriminator: string): string {
  return `${fingerprint}:${discriminator}`;
}

export function isExpired(entry: CacheEntry, now: number): boolean {
  return now - entry.createdAt >= entry.ttlMs;
}

/**
 * Fingerprint-keyed store with time-based expiry. An entry at or past its ttl
 * is never returned; reading it evicts it.
 */
export class CacheStore {
  private readonly backend: CacheBackend;
  private readonly defaultTtlMs: number;
  private readonly clock: Clock;
  private readonly queue = new SerialQueue();

  constructor(options: CacheStoreOptions) {
    this.backend = options.backend;
    this.defaultTtlMs = options.defaultTtlMs;
    this.clock = options.clock ?? systemClock;
  }

  lookup(fingerprint: string, discriminator: string): Promise<CacheEntry | undefined> {
    const key = cacheKey(fingerprint, discriminator);

    return this.queue.run(async () => {
      const entry = await this.backend.get(key);
      if (!entry) {
        return undefined;
      }

      if (isExpired(entry, this.clock())) {
        await this.backend.delete(key);
        return undefined;
      }

      return entry;
    });
  }

  put(fingerprint: string, discriminator: string, payload: unknown, ttlMs = this.defaultTtlMs): Promise<CacheEntry> {
    const entry: CacheEntry = {
      key: cacheKey(fingerprint, discriminator),
      discriminator,
      payload,
      createdAt: this.clock(),
      ttlMs,
    };

    return this.queue.run(async () => {
      await this.backend.set(entry);
      return entry;
    });
  }

  listFresh(discriminator: string): Promise<CacheEntry[]> {
    return this.queue.run(async () => {
      const now = this.clock();
      const entries = await this.backend.listByDiscriminator(discriminator, now);
      return entries.filter((entry) => !isExpired(entry, now));
    });
  }

  purgeExpired(): Promise<number> {
    return this.queue.run(() => this.backend.deleteExpired(this.clock()));
  }

  flush(): Promise<void> {
    return this.queue.run(async () => {
      await this.backend.flush?.();
    });
  }
}
