/**
 * Corpus Database Schema Definitions
 * Drizzle ORM schema for PostgreSQL + pgvector
 *
 * Typed definitions for the two corpus tables. The DDL that actually creates
 * them (extension, trigger, IVFFlat index) lives in ./migrate.ts because the
 * embedding dimension and index parameters are chosen at runtime.
 */

import {
  pgTable,
  varchar,
  text,
  integer,
  timestamp,
  vector,
  index,
  unique,
} from 'drizzle-orm/pg-core';
import { sql } from 'drizzle-orm';

/**
 * Default embedding dimension (text-embedding-3-large).
 * NOTE: the stored column dimension is set by ensureSchema() from config.
 */
export const DEFAULT_EMBEDDING_DIMENSIONS = 3072;

/**
 * Topical series; identified by the top three tag levels
 */
export const documentSeries = pgTable(
  'document_series',
  {
    id: varchar('id', { length: 50 }).primaryKey(),
    title: varchar('title', { length: 300 }).notNull(),
    tagMagazine: varchar('tag_magazine', { length: 50 }).notNull(),
    tagScience: varchar('tag_science', { length: 50 }).notNull(),
    tagTopic: varchar('tag_topic', { length: 50 }).notNull(),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    tagsIdx: index('idx_document_series_tags').on(table.tagMagazine, table.tagScience, table.tagTopic),
  })
);

/**
 * Ingested documents with tags and embedding
 */
export const documents = pgTable(
  'documents',
  {
    id: varchar('id', { length: 50 }).primaryKey(),
    title: varchar('title', { length: 300 }).notNull(),
    tagMagazine: varchar('tag_magazine', { length: 50 }).notNull(),
    tagScience: varchar('tag_science', { length: 50 }).notNull(),
    tagTopic: varchar('tag_topic', { length: 50 }).notNull(),
    tagContent: varchar('tag_content', { length: 100 }).notNull(),
    summaryText: text('summary_text').notNull(),
    embedding: vector('embedding', { dimensions: DEFAULT_EMBEDDING_DIMENSIONS }).notNull(),
    sourceUrl: varchar('source_url', { length: 500 }),
    seriesId: varchar('series_id', { length: 50 }).references(() => documentSeries.id),
    seriesOrder: integer('series_order'),
    externalPostId: integer('external_post_id'),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    tagsIdx: index('idx_documents_tags').on(
      table.tagMagazine,
      table.tagScience,
      table.tagTopic,
      table.tagContent
    ),
    magazineIdx: index('idx_documents_tag_magazine').on(table.tagMagazine),
    scienceIdx: index('idx_documents_tag_science').on(table.tagScience),
    createdIdx: index('idx_documents_created').on(table.createdAt.desc()),
    seriesIdx: index('idx_documents_series')
      .on(table.seriesId, table.seriesOrder)
      .where(sql`${table.seriesId} IS NOT NULL`),
    seriesOrderUnique: unique('uq_documents_series_order').on(table.seriesId, table.seriesOrder),
  })
);

export type DocumentRow = typeof documents.$inferSelect;
export type SeriesRow = typeof documentSeries.$inferSelect;
