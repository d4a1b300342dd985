import { cacheEntries, type Database } from '@digestline/db';
import { and, eq, gt } from 'drizzle-orm';
import { describe, it, expect, vi } from 'vitest';
import { isTransientDatabaseError, PostgresArchiveSink } from '../src/sinks/postgres-archive.js';
import { PostgresCacheBackend, PostgresLedgerBackend } from '../src/stores/postgres.js';
import { processedRecord, T0 } from './helpers.js';

function mockInsert(result: unknown = []) {
  const returning = vi.fn().mockResolvedValue(result);
  const onConflictDoUpdate = vi.fn().mockReturnValue(Object.assign(Promise.resolve([]), { returning }));
  const values = vi.fn().mockReturnValue({ onConflictDoUpdate });
  const insert = vi.fn().mockReturnValue({ values });
  return { insert, values, onConflictDoUpdate, returning };
}

function mockSelect(rows: unknown[]) {
  const limit = vi.fn().mockResolvedValue(rows);
  const where = vi.fn().mockReturnValue(Object.assign(Promise.resolve(rows), { limit }));
  const from = vi.fn().mockReturnValue({ where });
  const select = vi.fn().mockReturnValue({ from });
  return { select, from, where, limit };
}

function mockDelete(removed: unknown[] = []) {
  const returning = vi.fn().mockResolvedValue(removed);
  const where = vi.fn().mockReturnValue(Object.assign(Promise.resolve(undefined), { returning }));
  const del = vi.fn().mockReturnValue({ where });
  return { delete: del, where, returning };
}

describe('PostgresCacheBackend', () => {
  it('maps a row to an entry with its ttl', async () => {
    const { select, limit } = mockSelect([
      {
        key: 'fp:summary:m',
        discriminator: 'summary:m',
        payload: { text: 'hi' },
        createdAt: new Date(T0),
        expiresAt: new Date(T0 + 5000),
      },
    ]);
    const backend = new PostgresCacheBackend({ select } as unknown as Database);

    expect(await backend.get('fp:summary:m')).toEqual({
      key: 'fp:summary:m',
      discriminator: 'summary:m',
      payload: { text: 'hi' },
      createdAt: T0,
      ttlMs: 5000,
    });
    expect(limit).toHaveBeenCalledWith(1);
  });

  it('returns undefined for a missing key', async () => {
    const { select } = mockSelect([]);
    const backend = new PostgresCacheBackend({ select } as unknown as Database);

    expect(await backend.get('nope')).toBeUndefined();
  });

  it('upserts with an absolute expiry', async () => {
    const { insert, values, onConflictDoUpdate } = mockInsert();
    const backend = new PostgresCacheBackend({ insert } as unknown as Database);

    await backend.set({ key: 'fp:dedup-seen', discriminator: 'dedup-seen', payload: { url: 'u' }, createdAt: T0, ttlMs: 1000 });

    expect(values).toHaveBeenCalledWith({
      key: 'fp:dedup-seen',
      discriminator: 'dedup-seen',
      payload: { url: 'u' },
      createdAt: new Date(T0),
      expiresAt: new Date(T0 + 1000),
    });
    expect(onConflictDoUpdate).toHaveBeenCalledTimes(1);
  });

  it('lists only unexpired rows of a discriminator', async () => {
    const { select, where } = mockSelect([
      {
        key: 'fp:dedup-seen',
        discriminator: 'dedup-seen',
        payload: { url: 'u' },
        createdAt: new Date(T0),
        expiresAt: new Date(T0 + 5000),
      },
    ]);
    const backend = new PostgresCacheBackend({ select } as unknown as Database);

    const entries = await backend.listByDiscriminator('dedup-seen', T0 + 1000);

    expect(entries).toEqual([
      { key: 'fp:dedup-seen', discriminator: 'dedup-seen', payload: { url: 'u' }, createdAt: T0, ttlMs: 5000 },
    ]);
    expect(where).toHaveBeenCalledWith(
      and(eq(cacheEntries.discriminator, 'dedup-seen'), gt(cacheEntries.expiresAt, new Date(T0 + 1000))),
    );
  });

  it('counts purged rows', async () => {
    const { delete: del, returning } = mockDelete([{ key: 'a' }, { key: 'b' }]);
    const backend = new PostgresCacheBackend({ delete: del } as unknown as Database);

    expect(await backend.deleteExpired(T0)).toBe(2);
    expect(returning).toHaveBeenCalledTimes(1);
  });
});

describe('PostgresLedgerBackend', () => {
  it('loads days since a date', async () => {
    const { select } = mockSelect([
      { date: '2026-03-14', provider: 'openai', calls: 3, tokensIn: 300, tokensOut: 60, costUsd: 0.5, updatedAt: new Date(T0) },
    ]);
    const backend = new PostgresLedgerBackend({ select } as unknown as Database);

    expect(await backend.loadSince('2025-12-15')).toEqual([
      { date: '2026-03-14', provider: 'openai', calls: 3, tokensIn: 300, tokensOut: 60, costUsd: 0.5 },
    ]);
  });

  it('upserts a day on (date, provider)', async () => {
    const { insert, values, onConflictDoUpdate } = mockInsert();
    const backend = new PostgresLedgerBackend({ insert } as unknown as Database);
    const day = { date: '2026-03-15', provider: 'openai', calls: 1, tokensIn: 10, tokensOut: 5, costUsd: 0.01 };

    await backend.saveDay(day);

    expect(values).toHaveBeenCalledWith(day);
    expect(onConflictDoUpdate.mock.calls[0][0].set).toMatchObject({ calls: 1, tokensIn: 10, tokensOut: 5, costUsd: 0.01 });
  });

  it('counts pruned days', async () => {
    const { delete: del } = mockDelete([{ date: '2025-11-01' }]);
    const backend = new PostgresLedgerBackend({ delete: del } as unknown as Database);

    expect(await backend.deleteBefore('2025-12-15')).toBe(1);
  });
});

describe('PostgresArchiveSink', () => {
  it('upserts on fingerprint and returns the row id', async () => {
    const { insert, values, returning } = mockInsert([{ id: 'row-1' }]);
    const sink = new PostgresArchiveSink({ insert } as unknown as Database);

    const result = await sink.write(processedRecord({ translations: { fr: 'Bonjour' } }));

    expect(result).toEqual({ ok: true, recordId: 'row-1' });
    expect(returning).toHaveBeenCalledTimes(1);
    expect(values).toHaveBeenCalledWith(
      expect.objectContaining({
        fingerprint: 'f'.repeat(64),
        topics: ['AI'],
        priority: 'High',
        summary: 'Short summary.',
        translations: { fr: 'Bonjour' },
        sourceName: 'Example Blog',
        category: null,
      }),
    );
  });

  it('stores null translations when there are none', async () => {
    const { insert, values } = mockInsert([{ id: 'row-1' }]);
    const sink = new PostgresArchiveSink({ insert } as unknown as Database);

    await sink.write(processedRecord());

    expect(values).toHaveBeenCalledWith(expect.objectContaining({ translations: null }));
  });

  it('stores quality and ranking scores when present', async () => {
    const { insert, values } = mockInsert([{ id: 'row-1' }]);
    const sink = new PostgresArchiveSink({ insert } as unknown as Database);

    await sink.write(
      processedRecord({
        quality: { score: 0.82, grade: 'A' },
        ranking: { score: 0.75, reason: 'Ranked High due to: high quality' },
      }),
    );

    expect(values).toHaveBeenCalledWith(
      expect.objectContaining({
        qualityScore: 0.82,
        qualityGrade: 'A',
        priorityScore: 0.75,
        rankingReason: 'Ranked High due to: high quality',
      }),
    );
  });

  it('classifies connection errors as transient', async () => {
    const { insert, returning } = mockInsert();
    returning.mockRejectedValueOnce(Object.assign(new Error('connect ECONNREFUSED'), { code: 'ECONNREFUSED' }));
    const sink = new PostgresArchiveSink({ insert } as unknown as Database);

    const result = await sink.write(processedRecord());

    expect(result).toMatchObject({ ok: false, error: { kind: 'transient', message: 'connect ECONNREFUSED' } });
  });

  it('classifies constraint errors as permanent', async () => {
    const { insert, returning } = mockInsert();
    returning.mockRejectedValueOnce(Object.assign(new Error('value too long'), { code: '22001' }));
    const sink = new PostgresArchiveSink({ insert } as unknown as Database);

    const result = await sink.write(processedRecord());

    expect(result).toMatchObject({ ok: false, error: { kind: 'permanent' } });
  });

  it('does not start a write after its signal fired', async () => {
    const { insert } = mockInsert([{ id: 'row-1' }]);
    const sink = new PostgresArchiveSink({ insert } as unknown as Database);
    const controller = new AbortController();
    controller.abort();

    const result = await sink.write(processedRecord(), { signal: controller.signal });

    expect(result.ok).toBe(false);
    expect(insert).not.toHaveBeenCalled();
  });

  it('knows transient database error codes', () => {
    expect(isTransientDatabaseError({ code: '08006' })).toBe(true);
    expect(isTransientDatabaseError({ code: '40001' })).toBe(true);
    expect(isTransientDatabaseError({ code: '23505' })).toBe(false);
    expect(isTransientDatabaseError(new Error('no code'))).toBe(false);
  });
});
