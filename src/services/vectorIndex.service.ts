/**
 * Vector Index Service
 *
 * Persistence contract for documents and series, backed by Postgres + pgvector.
 *
 * - Typed CRUD goes through Drizzle
 * - Similarity, centroid and frontier queries use raw parameterised SQL
 *   because Drizzle does not model the `<=>` operator or AVG(vector)
 * - Embeddings are passed as JSON text and cast with `$n::vector`
 * - Every driver failure is rethrown as StorageError; callers decide
 *   whether a path fails open
 */

import { randomUUID } from 'node:crypto';
import { and, asc, desc, eq, ne, sql as drizzleSql } from 'drizzle-orm';
import { z } from 'zod';
import type { Db } from '@/db/client';
import { documents, documentSeries, type DocumentRow, type SeriesRow } from '@/db/schema';
import { StorageError } from '@/errors/corpus';
import type {
  DocumentPatch,
  DocumentRecord,
  DuplicateMatch,
  Embedding,
  FrontierDocument,
  NewDocument,
  NewSeries,
  RecentSimilarDocument,
  SeriesRecord,
  TagMatchedDocument,
  TagSet,
  TaggedDate,
  TopTags,
} from '@/types/corpus';
import { errorMessage } from '@/utils/logger';

// =====================================================
// CONTRACT
// =====================================================

export interface FindRelatedOptions {
  excludeId?: string;
  limit: number;
  minTagMatches: number;
}

export interface VectorIndex {
  insert(document: NewDocument): Promise<DocumentRecord>;
  get(id: string): Promise<DocumentRecord | null>;
  getByUrl(url: string): Promise<DocumentRecord | null>;
  count(): Promise<number>;
  listRecentTitles(limit: number): Promise<string[]>;
  listAllTagsWithDates(): Promise<TaggedDate[]>;
  computeCentroid(): Promise<Embedding | null>;
  findFrontier(centroid: Embedding, limit: number): Promise<FrontierDocument[]>;
  findRelated(tags: TagSet, embedding: Embedding, options: FindRelatedOptions): Promise<TagMatchedDocument[]>;
  findNearest(embedding: Embedding, excludeId?: string): Promise<DuplicateMatch | null>;
  findCandidateSeries(tags: TopTags): Promise<SeriesRecord[]>;
  getSeriesMembers(seriesId: string): Promise<DocumentRecord[]>;
  getSeriesMemberEmbeddings(seriesId: string, excludeId?: string): Promise<Embedding[]>;
  findRecentSimilar(
    tags: TopTags,
    embedding: Embedding,
    lookbackDays: number,
    threshold: number,
    excludeId?: string
  ): Promise<RecentSimilarDocument[]>;
  createSeries(series: NewSeries): Promise<SeriesRecord>;
  addToSeries(documentId: string, seriesId: string, order: number): Promise<void>;
  updateDocument(id: string, patch: DocumentPatch): Promise<boolean>;
  getExternalPostId(id: string): Promise<number | null>;
}

/**
 * Minimal slice of the postgres.js client used for raw queries
 */
export type QueryParam = string | number | boolean | null;

export interface QueryRunner {
  unsafe(query: string, params?: QueryParam[]): Promise<readonly unknown[]>;
}

/** 12-character prefix of a random UUID v4 */
export function generateId(): string {
  return randomUUID().slice(0, 12);
}

// =====================================================
// RAW ROW SCHEMAS
// =====================================================

const vectorTextSchema = z.array(z.number());

/**
 * pgvector values arrive as their text form '[0.1,0.2,...]'
 */
export function parseVector(value: unknown): Embedding {
  if (Array.isArray(value)) return vectorTextSchema.parse(value);
  if (typeof value !== 'string') {
    throw new TypeError(`Expected pgvector text, got ${typeof value}`);
  }
  return vectorTextSchema.parse(JSON.parse(value));
}

const tagColumns = {
  tag_magazine: z.string(),
  tag_science: z.string(),
  tag_topic: z.string(),
  tag_content: z.string(),
};

const relatedRowSchema = z.object({
  id: z.string(),
  title: z.string(),
  summary_text: z.string(),
  source_url: z.string().nullable(),
  series_id: z.string().nullable(),
  series_order: z.coerce.number().nullable(),
  external_post_id: z.coerce.number().nullable(),
  created_at: z.coerce.date(),
  ...tagColumns,
  tag_match_count: z.coerce.number(),
  similarity: z.coerce.number(),
});

const nearestRowSchema = z.object({
  id: z.string(),
  title: z.string(),
  source_url: z.string().nullable(),
  similarity: z.coerce.number(),
});

const centroidRowSchema = z.object({
  centroid: z.unknown(),
});

const frontierRowSchema = z.object({
  id: z.string(),
  title: z.string(),
  ...tagColumns,
  dist_centroid: z.coerce.number(),
  nn_similarity: z.coerce.number().nullable(),
});

const recentSimilarRowSchema = z.object({
  id: z.string(),
  title: z.string(),
  source_url: z.string().nullable(),
  external_post_id: z.coerce.number().nullable(),
  created_at: z.coerce.date(),
  similarity: z.coerce.number(),
});

function tagsFromColumns(row: {
  tag_magazine: string;
  tag_science: string;
  tag_topic: string;
  tag_content: string;
}): TagSet {
  return {
    magazine: row.tag_magazine,
    science: row.tag_science,
    topic: row.tag_topic,
    content: row.tag_content,
  };
}

// =====================================================
// DRIZZLE ROW MAPPING
// =====================================================

/** Every column except the embedding, for list queries */
const documentSummaryColumns = {
  id: documents.id,
  title: documents.title,
  tagMagazine: documents.tagMagazine,
  tagScience: documents.tagScience,
  tagTopic: documents.tagTopic,
  tagContent: documents.tagContent,
  summaryText: documents.summaryText,
  sourceUrl: documents.sourceUrl,
  seriesId: documents.seriesId,
  seriesOrder: documents.seriesOrder,
  externalPostId: documents.externalPostId,
  createdAt: documents.createdAt,
  updatedAt: documents.updatedAt,
};

type DocumentSummaryRow = Omit<DocumentRow, 'embedding'> & { embedding?: number[] };

function toDocumentRecord(row: DocumentSummaryRow): DocumentRecord {
  return {
    id: row.id,
    title: row.title,
    tags: {
      magazine: row.tagMagazine,
      science: row.tagScience,
      topic: row.tagTopic,
      content: row.tagContent,
    },
    summaryText: row.summaryText,
    embedding: row.embedding,
    sourceUrl: row.sourceUrl,
    seriesId: row.seriesId,
    seriesOrder: row.seriesOrder,
    externalPostId: row.externalPostId,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

function toSeriesRecord(row: SeriesRow): SeriesRecord {
  return {
    id: row.id,
    title: row.title,
    tags: { magazine: row.tagMagazine, science: row.tagScience, topic: row.tagTopic },
    createdAt: row.createdAt,
  };
}

function patchToColumns(patch: DocumentPatch): Partial<typeof documents.$inferInsert> {
  const columns: Partial<typeof documents.$inferInsert> = {};
  if (patch.title !== undefined) columns.title = patch.title;
  if (patch.summaryText !== undefined) columns.summaryText = patch.summaryText;
  if (patch.embedding !== undefined) columns.embedding = patch.embedding;
  if (patch.sourceUrl !== undefined) columns.sourceUrl = patch.sourceUrl;
  if (patch.seriesId !== undefined) columns.seriesId = patch.seriesId;
  if (patch.seriesOrder !== undefined) columns.seriesOrder = patch.seriesOrder;
  if (patch.externalPostId !== undefined) columns.externalPostId = patch.externalPostId;
  if (patch.tags !== undefined) {
    columns.tagMagazine = patch.tags.magazine;
    columns.tagScience = patch.tags.science;
    columns.tagTopic = patch.tags.topic;
    columns.tagContent = patch.tags.content;
  }
  return columns;
}

// =====================================================
// POSTGRES IMPLEMENTATION
// =====================================================

export class PgVectorIndex implements VectorIndex {
  constructor(
    private readonly sql: QueryRunner,
    private readonly db: Db
  ) {}

  async insert(document: NewDocument): Promise<DocumentRecord> {
    if (document.embedding.length === 0) {
      throw new StorageError('Refusing to store a document without an embedding');
    }

    return this.run('insert', async () => {
      const [row] = await this.db
        .insert(documents)
        .values({
          id: document.id ?? generateId(),
          title: document.title,
          tagMagazine: document.tags.magazine,
          tagScience: document.tags.science,
          tagTopic: document.tags.topic,
          tagContent: document.tags.content,
          summaryText: document.summaryText,
          embedding: document.embedding,
          sourceUrl: document.sourceUrl ?? null,
          seriesId: document.seriesId ?? null,
          seriesOrder: document.seriesOrder ?? null,
          externalPostId: document.externalPostId ?? null,
        })
        .returning();
      return toDocumentRecord(row);
    });
  }

  async get(id: string): Promise<DocumentRecord | null> {
    return this.run('get', async () => {
      const [row] = await this.db.select().from(documents).where(eq(documents.id, id)).limit(1);
      return row ? toDocumentRecord(row) : null;
    });
  }

  async getByUrl(url: string): Promise<DocumentRecord | null> {
    return this.run('getByUrl', async () => {
      const [row] = await this.db
        .select(documentSummaryColumns)
        .from(documents)
        .where(eq(documents.sourceUrl, url))
        .orderBy(asc(documents.createdAt))
        .limit(1);
      return row ? toDocumentRecord(row) : null;
    });
  }

  async count(): Promise<number> {
    return this.run('count', async () => {
      const [row] = await this.db
        .select({ count: drizzleSql<number>`count(*)`.mapWith(Number) })
        .from(documents);
      return row?.count ?? 0;
    });
  }

  async listRecentTitles(limit: number): Promise<string[]> {
    return this.run('listRecentTitles', async () => {
      const rows = await this.db
        .select({ title: documents.title })
        .from(documents)
        .orderBy(desc(documents.createdAt))
        .limit(limit);
      return rows.map((row) => row.title);
    });
  }

  async listAllTagsWithDates(): Promise<TaggedDate[]> {
    return this.run('listAllTagsWithDates', async () => {
      const rows = await this.db
        .select({
          tagMagazine: documents.tagMagazine,
          tagScience: documents.tagScience,
          tagTopic: documents.tagTopic,
          tagContent: documents.tagContent,
          createdAt: documents.createdAt,
        })
        .from(documents)
        .orderBy(desc(documents.createdAt));
      return rows.map((row) => ({
        tags: {
          magazine: row.tagMagazine,
          science: row.tagScience,
          topic: row.tagTopic,
          content: row.tagContent,
        },
        createdAt: row.createdAt,
      }));
    });
  }

  async computeCentroid(): Promise<Embedding | null> {
    return this.run('computeCentroid', async () => {
      const rows = await this.sql.unsafe(`SELECT AVG(embedding)::text AS centroid FROM documents`);
      const [row] = z.array(centroidRowSchema).parse(rows);
      if (!row || row.centroid === null || row.centroid === undefined) return null;
      return parseVector(row.centroid);
    });
  }

  async findFrontier(centroid: Embedding, limit: number): Promise<FrontierDocument[]> {
    return this.run('findFrontier', async () => {
      const rows = await this.sql.unsafe(
        `
        SELECT f.id, f.title,
               f.tag_magazine, f.tag_science, f.tag_topic, f.tag_content,
               f.dist_centroid,
               nn.nn_similarity
        FROM (
          SELECT id, title, embedding,
                 tag_magazine, tag_science, tag_topic, tag_content,
                 embedding <=> $1::vector AS dist_centroid
          FROM documents
          ORDER BY embedding <=> $1::vector DESC
          LIMIT $2::int
        ) f
        LEFT JOIN LATERAL (
          SELECT 1 - (d.embedding <=> f.embedding) AS nn_similarity
          FROM documents d
          WHERE d.id <> f.id
          ORDER BY d.embedding <=> f.embedding
          LIMIT 1
        ) nn ON true
        ORDER BY f.dist_centroid DESC
      `,
        [JSON.stringify(centroid), limit]
      );

      return z
        .array(frontierRowSchema)
        .parse(rows)
        .map((row) => ({
          id: row.id,
          title: row.title,
          tags: tagsFromColumns(row),
          distanceFromCentroid: row.dist_centroid,
          // A lone document has no neighbour
          nearestNeighborSimilarity: row.nn_similarity ?? 0,
        }));
    });
  }

  /**
   * Two-stage related-document query
   *
   * Pre-filters on magazine OR science, counts exact tag-level matches,
   * drops rows below `minTagMatches` and ranks the rest by cosine distance.
   * Documents matching only on topic + content never reach the count.
   */
  async findRelated(
    tags: TagSet,
    embedding: Embedding,
    options: FindRelatedOptions
  ): Promise<TagMatchedDocument[]> {
    return this.run('findRelated', async () => {
      const rows = await this.sql.unsafe(
        `
        WITH candidates AS (
          SELECT
            id, title, summary_text, source_url, series_id, series_order,
            external_post_id, created_at, embedding,
            tag_magazine, tag_science, tag_topic, tag_content,
            (
              CASE WHEN tag_magazine = $1 THEN 1 ELSE 0 END +
              CASE WHEN tag_science  = $2 THEN 1 ELSE 0 END +
              CASE WHEN tag_topic    = $3 THEN 1 ELSE 0 END +
              CASE WHEN tag_content  = $4 THEN 1 ELSE 0 END
            ) AS tag_match_count
          FROM documents
          WHERE id <> $6
            AND (tag_magazine = $1 OR tag_science = $2)
        )
        SELECT
          id, title, summary_text, source_url, series_id, series_order,
          external_post_id, created_at,
          tag_magazine, tag_science, tag_topic, tag_content,
          tag_match_count,
          1 - (embedding <=> $5::vector) AS similarity
        FROM candidates
        WHERE tag_match_count >= $7::int
        ORDER BY embedding <=> $5::vector
        LIMIT $8::int
      `,
        [
          tags.magazine,
          tags.science,
          tags.topic,
          tags.content,
          JSON.stringify(embedding),
          options.excludeId ?? '',
          options.minTagMatches,
          options.limit,
        ]
      );

      return z
        .array(relatedRowSchema)
        .parse(rows)
        .map((row) => ({
          document: {
            id: row.id,
            title: row.title,
            tags: tagsFromColumns(row),
            summaryText: row.summary_text,
            sourceUrl: row.source_url,
            seriesId: row.series_id,
            seriesOrder: row.series_order,
            externalPostId: row.external_post_id,
            createdAt: row.created_at,
          },
          tagMatchCount: row.tag_match_count,
          similarity: row.similarity,
        }));
    });
  }

  async findNearest(embedding: Embedding, excludeId?: string): Promise<DuplicateMatch | null> {
    return this.run('findNearest', async () => {
      const rows = await this.sql.unsafe(
        `
        SELECT id, title, source_url,
               1 - (embedding <=> $1::vector) AS similarity
        FROM documents
        WHERE id <> $2
        ORDER BY embedding <=> $1::vector
        LIMIT 1
      `,
        [JSON.stringify(embedding), excludeId ?? '']
      );

      const [row] = z.array(nearestRowSchema).parse(rows);
      if (!row) return null;
      return { id: row.id, title: row.title, sourceUrl: row.source_url, similarity: row.similarity };
    });
  }

  async findCandidateSeries(tags: TopTags): Promise<SeriesRecord[]> {
    return this.run('findCandidateSeries', async () => {
      const rows = await this.db
        .select()
        .from(documentSeries)
        .where(
          and(
            eq(documentSeries.tagMagazine, tags.magazine),
            eq(documentSeries.tagScience, tags.science),
            eq(documentSeries.tagTopic, tags.topic)
          )
        )
        .orderBy(asc(documentSeries.createdAt));
      return rows.map(toSeriesRecord);
    });
  }

  async getSeriesMembers(seriesId: string): Promise<DocumentRecord[]> {
    return this.run('getSeriesMembers', async () => {
      const rows = await this.db
        .select(documentSummaryColumns)
        .from(documents)
        .where(eq(documents.seriesId, seriesId))
        .orderBy(asc(documents.seriesOrder));
      return rows.map(toDocumentRecord);
    });
  }

  async getSeriesMemberEmbeddings(seriesId: string, excludeId?: string): Promise<Embedding[]> {
    return this.run('getSeriesMemberEmbeddings', async () => {
      const rows = await this.db
        .select({ embedding: documents.embedding })
        .from(documents)
        .where(and(eq(documents.seriesId, seriesId), ne(documents.id, excludeId ?? '')))
        .orderBy(asc(documents.seriesOrder));
      return rows.map((row) => row.embedding).filter((embedding) => embedding.length > 0);
    });
  }

  /**
   * Unseriesed documents sharing the top three tags, created within the
   * lookback window, at or above `threshold` similarity
   */
  async findRecentSimilar(
    tags: TopTags,
    embedding: Embedding,
    lookbackDays: number,
    threshold: number,
    excludeId?: string
  ): Promise<RecentSimilarDocument[]> {
    return this.run('findRecentSimilar', async () => {
      const rows = await this.sql.unsafe(
        `
        SELECT id, title, source_url, external_post_id, created_at,
               1 - (embedding <=> $1::vector) AS similarity
        FROM documents
        WHERE tag_magazine = $2 AND tag_science = $3 AND tag_topic = $4
          AND series_id IS NULL
          AND created_at >= NOW() - $5::int * INTERVAL '1 day'
          AND id <> $6
        ORDER BY embedding <=> $1::vector
        LIMIT 5
      `,
        [JSON.stringify(embedding), tags.magazine, tags.science, tags.topic, lookbackDays, excludeId ?? '']
      );

      return z
        .array(recentSimilarRowSchema)
        .parse(rows)
        .filter((row) => row.similarity >= threshold)
        .map((row) => ({
          id: row.id,
          title: row.title,
          sourceUrl: row.source_url,
          externalPostId: row.external_post_id,
          createdAt: row.created_at,
          similarity: row.similarity,
        }));
    });
  }

  async createSeries(series: NewSeries): Promise<SeriesRecord> {
    return this.run('createSeries', async () => {
      const [row] = await this.db
        .insert(documentSeries)
        .values({
          id: series.id ?? generateId(),
          title: series.title,
          tagMagazine: series.tags.magazine,
          tagScience: series.tags.science,
          tagTopic: series.tags.topic,
        })
        .returning();
      return toSeriesRecord(row);
    });
  }

  async addToSeries(documentId: string, seriesId: string, order: number): Promise<void> {
    const updated = await this.updateDocument(documentId, { seriesId, seriesOrder: order });
    if (!updated) {
      throw new StorageError(`Cannot add missing document ${documentId} to series ${seriesId}`);
    }
  }

  async updateDocument(id: string, patch: DocumentPatch): Promise<boolean> {
    const columns = patchToColumns(patch);
    if (Object.keys(columns).length === 0) {
      return (await this.get(id)) !== null;
    }

    return this.run('updateDocument', async () => {
      const rows = await this.db
        .update(documents)
        .set(columns)
        .where(eq(documents.id, id))
        .returning({ id: documents.id });
      return rows.length > 0;
    });
  }

  async getExternalPostId(id: string): Promise<number | null> {
    return this.run('getExternalPostId', async () => {
      const [row] = await this.db
        .select({ externalPostId: documents.externalPostId })
        .from(documents)
        .where(eq(documents.id, id))
        .limit(1);
      return row?.externalPostId ?? null;
    });
  }

  private async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (error instanceof StorageError) throw error;
      throw new StorageError(`Vector index ${operation} failed: ${errorMessage(error)}`, { cause: error });
    }
  }
}
