import type { CacheBackend, CacheEntry } from '../cache-store.js';
import { isExpired } from '../cache-store.js';
import type { LedgerBackend, LedgerDay } from '../ledger.js';

export class MemoryCacheBackend implements CacheBackend {
  readonly entries = new Map<string, CacheEntry>();

  async get(key: string): Promise<CacheEntry | undefined> {
    return this.entries.get(key);
  }

  async set(entry: CacheEntry): Promise<void> {
    this.entries.set(entry.key, entry);
  }

  async delete(key: string): Promise<void> {
    this.entries.delete(key);
  }

  async listByDiscriminator(discriminator: string, now: number): Promise<CacheEntry[]> {
    return [...this.entries.values()].filter((entry) => entry.discriminator === discriminator && !isExpired(entry, now));
  }

  async deleteExpired(now: number): Promise<number> {
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (isExpired(entry, now)) {
        this.entries.delete(key);
        removed += 1;
      }
    }

    return removed;
  }
}

export class MemoryLedgerBackend implements LedgerBackend {
  readonly days = new Map<string, LedgerDay>();

  async loadSince(fromDate: string): Promise<LedgerDay[]> {
    return [...this.days.values()].filter((day) => day.date >= fromDate).map((day) => ({ ...day }));
  }

  async saveDay(day: LedgerDay): Promise<void> {
    this.days.set(`${day.date}|${day.provider}`, { ...day });
  }

  async deleteBefore(date: string): Promise<number> {
    let removed = 0;
    for (const [key, day] of this.days) {
      if (day.date < date) {
        this.days.delete(key);
        removed += 1;
      }
    }

    return removed;
  }
}
