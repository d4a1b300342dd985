import {
  pgTable,
  uuid,
  text,
  varchar,
  timestamp,
  integer,
  doublePrecision,
  jsonb,
  index,
  uniqueIndex,
  primaryKey,
} from 'drizzle-orm/pg-core';

export const archivedItems = pgTable(
  'archived_items',
  {
    id: uuid().primaryKey().defaultRandom(),
    fingerprint: varchar({ length: 64 }).notNull(),
    sourceId: varchar('source_id', { length: 100 }).notNull(),
    externalId: varchar('external_id', { length: 512 }).notNull(),
    sourceType: varchar('source_type', { length: 20 }).notNull(),
    sourceName: varchar('source_name', { length: 255 }),
    category: varchar({ length: 100 }),
    url: text().notNull(),
    title: text().notNull(),
    body: text().notNull(),
    publishedAt: timestamp('published_at'),
    topics: text().array().notNull(),
    priority: varchar({ length: 50 }).notNull(),
    summary: text(),
    translations: jsonb().$type<Record<string, string>>(),
    provenance: jsonb().$type<Record<string, unknown>>().notNull(),
    qualityScore: doublePrecision('quality_score'),
    qualityGrade: varchar('quality_grade', { length: 1 }),
    priorityScore: doublePrecision('priority_score'),
    rankingReason: text('ranking_reason'),
    costUsd: doublePrecision('cost_usd').default(0).notNull(),
    createdAt: timestamp('created_at').defaultNow().notNull(),
    updatedAt: timestamp('updated_at').defaultNow().notNull(),
  },
  (t) => [
    uniqueIndex('uq_archived_items_fingerprint').on(t.fingerprint),
    index('idx_archived_items_source').on(t.sourceId),
    index('idx_archived_items_published_at').on(t.publishedAt),
    index('idx_archived_items_priority').on(t.priority),
  ],
);

export const cacheEntries = pgTable(
  'cache_entries',
  {
    key: varchar({ length: 255 }).primaryKey(),
    discriminator: varchar({ length: 150 }).notNull(),
    payload: jsonb().notNull(),
    createdAt: timestamp('created_at').notNull(),
    expiresAt: timestamp('expires_at').notNull(),
  },
  (t) => [
    index('idx_cache_entries_discriminator_expires_at').on(t.discriminator, t.expiresAt),
    index('idx_cache_entries_expires_at').on(t.expiresAt),
  ],
);

export const costLedgerDays = pgTable(
  'cost_ledger_days',
  {
    date: varchar({ length: 10 }).notNull(),
    provider: varchar({ length: 100 }).notNull(),
    calls: integer().default(0).notNull(),
    tokensIn: integer('tokens_in').default(0).notNull(),
    tokensOut: integer('tokens_out').default(0).notNull(),
    costUsd: doublePrecision('cost_usd').default(0).notNull(),
    updatedAt: timestamp('updated_at').defaultNow().notNull(),
  },
  (t) => [primaryKey({ columns: [t.date, t.provider] })],
);
