import { cacheEntries, costLedgerDays, type Database } from '@digestline/db';
import { and, eq, gt, gte, lt, lte, sql } from 'drizzle-orm';
import type { CacheBackend, CacheEntry } from '../cache-store.js';
import type { LedgerBackend, LedgerDay } from '../ledger.js';

type CacheRow = typeof cacheEntries.$inferSelect;
type LedgerRow = typeof costLedgerDays.$inferSelect;

function toCacheEntry(row: CacheRow): CacheEntry {
  const createdAt = row.createdAt.getTime();
  return {
    key: row.key,
    discriminator: row.discriminator,
    payload: row.payload,
    createdAt,
    ttlMs: row.expiresAt.getTime() - createdAt,
  };
}

function toLedgerDay(row: LedgerRow): LedgerDay {
  return {
    date: row.date,
    provider: row.provider,
    calls: row.calls,
    tokensIn: row.tokensIn,
    tokensOut: row.tokensOut,
    costUsd: row.costUsd,
  };
}

/** `cache_entries` table; expiry is stored as an absolute `expires_at`. */
export class PostgresCacheBackend implements CacheBackend {
  constructor(private readonly db: Database) {}

  async get(key: string): Promise<CacheEntry | undefined> {
    const rows = await this.db.select().from(cacheEntries).where(eq(cacheEntries.key, key)).limit(1);
    const row = rows[0];
    return row ? toCacheEntry(row) : undefined;
  }

  async set(entry: CacheEntry): Promise<void> {
    const createdAt = new Date(entry.createdAt);
    const expiresAt = new Date(entry.createdAt + entry.ttlMs);

    await this.db
      .insert(cacheEntries)
      .values({ key: entry.key, discriminator: entry.discriminator, payload: entry.payload, createdAt, expiresAt })
      .onConflictDoUpdate({
        target: cacheEntries.key,
        set: { discriminator: entry.discriminator, payload: entry.payload, createdAt, expiresAt },
      });
  }

  async delete(key: string): Promise<void> {
    await this.db.delete(cacheEntries).where(eq(cacheEntries.key, key));
  }

  async listByDiscriminator(discriminator: string, now: number): Promise<CacheEntry[]> {
    const rows = await this.db
      .select()
      .from(cacheEntries)
      .where(and(eq(cacheEntries.discriminator, discriminator), gt(cacheEntries.expiresAt, new Date(now))));
    return rows.map(toCacheEntry);
  }

  async deleteExpired(now: number): Promise<number> {
    const removed = await this.db
      .delete(cacheEntries)
      .where(lte(cacheEntries.expiresAt, new Date(now)))
      .returning({ key: cacheEntries.key });
    return removed.length;
  }
}

/** `cost_ledger_days` table, one row per (date, provider). */
export class PostgresLedgerBackend implements LedgerBackend {
  constructor(private readonly db: Database) {}

  async loadSince(fromDate: string): Promise<LedgerDay[]> {
    const rows = await this.db.select().from(costLedgerDays).where(gte(costLedgerDays.date, fromDate));
    return rows.map(toLedgerDay);
  }

  async saveDay(day: LedgerDay): Promise<void> {
    await this.db
      .insert(costLedgerDays)
      .values(day)
      .onConflictDoUpdate({
        target: [costLedgerDays.date, costLedgerDays.provider],
        set: {
          calls: day.calls,
          tokensIn: day.tokensIn,
          tokensOut: day.tokensOut,
          costUsd: day.costUsd,
          updatedAt: sql`now()`,
        },
      });
  }

  async deleteBefore(date: string): Promise<number> {
    const removed = await this.db
      .delete(costLedgerDays)
      .where(lt(costLedgerDays.date, date))
      .returning({ date: costLedgerDays.date });
    return removed.length;
  }
}
