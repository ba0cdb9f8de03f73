/**
 * Schema bootstrap
 *
 * Idempotent DDL for the corpus tables. Safe to run on every startup:
 * every statement is IF NOT EXISTS / OR REPLACE.
 *
 * The IVFFlat index is sized from the row count at creation time
 * (lists = clamp(sqrt(n), 10, 1000), 100 on an empty table), so it
 * drifts as the corpus grows; rebuildVectorIndex() re-tunes it.
 * pgvector refuses IVFFlat above 2000 dimensions; bootstrap then carries
 * on without the index and similarity queries scan.
 */

import { z } from 'zod';
import { errorMessage, logger } from '@/utils/logger';

/**
 * The slice of the postgres.js client that DDL needs
 */
export interface SchemaRunner {
  unsafe(query: string): Promise<readonly unknown[]>;
}

export interface TransactionalSchemaRunner extends SchemaRunner {
  begin(work: (tx: SchemaRunner) => Promise<void>): Promise<unknown>;
}

export const VECTOR_INDEX_NAME = 'idx_documents_embedding';

export const IVFFLAT_CONFIG = {
  minLists: 10,
  maxLists: 1000,
  emptyTableLists: 100,
} as const;

/**
 * IVFFlat `lists` parameter for a table of `rowCount` rows
 */
export function ivfflatLists(rowCount: number): number {
  if (rowCount <= 0) return IVFFLAT_CONFIG.emptyTableLists;
  const lists = Math.floor(Math.sqrt(rowCount));
  return Math.max(IVFFLAT_CONFIG.minLists, Math.min(IVFFLAT_CONFIG.maxLists, lists));
}

function schemaStatements(dimensions: number): string[] {
  return [
    `CREATE EXTENSION IF NOT EXISTS vector`,
    `CREATE TABLE IF NOT EXISTS document_series (
      id VARCHAR(50) PRIMARY KEY,
      title VARCHAR(300) NOT NULL,
      tag_magazine VARCHAR(50) NOT NULL,
      tag_science VARCHAR(50) NOT NULL,
      tag_topic VARCHAR(50) NOT NULL,
      created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
      updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )`,
    `CREATE TABLE IF NOT EXISTS documents (
      id VARCHAR(50) PRIMARY KEY,
      title VARCHAR(300) NOT NULL,
      tag_magazine VARCHAR(50) NOT NULL,
      tag_science VARCHAR(50) NOT NULL,
      tag_topic VARCHAR(50) NOT NULL,
      tag_content VARCHAR(100) NOT NULL,
      summary_text TEXT NOT NULL,
      embedding vector(${dimensions}) NOT NULL,
      source_url VARCHAR(500),
      series_id VARCHAR(50) REFERENCES document_series(id),
      series_order INTEGER,
      external_post_id INTEGER,
      created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
      updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
      CONSTRAINT uq_documents_series_order UNIQUE (series_id, series_order)
    )`,
    `CREATE OR REPLACE FUNCTION touch_updated_at() RETURNS TRIGGER AS $$
    BEGIN
      NEW.updated_at = NOW();
      RETURN NEW;
    END;
    $$ LANGUAGE plpgsql`,
    `DROP TRIGGER IF EXISTS trg_documents_updated_at ON documents`,
    `CREATE TRIGGER trg_documents_updated_at
      BEFORE UPDATE ON documents
      FOR EACH ROW EXECUTE FUNCTION touch_updated_at()`,
    `DROP TRIGGER IF EXISTS trg_document_series_updated_at ON document_series`,
    `CREATE TRIGGER trg_document_series_updated_at
      BEFORE UPDATE ON document_series
      FOR EACH ROW EXECUTE FUNCTION touch_updated_at()`,
    `CREATE INDEX IF NOT EXISTS idx_documents_tags
      ON documents (tag_magazine, tag_science, tag_topic, tag_content)`,
    `CREATE INDEX IF NOT EXISTS idx_documents_tag_magazine ON documents (tag_magazine)`,
    `CREATE INDEX IF NOT EXISTS idx_documents_tag_science ON documents (tag_science)`,
    `CREATE INDEX IF NOT EXISTS idx_documents_created ON documents (created_at DESC)`,
    `CREATE INDEX IF NOT EXISTS idx_documents_source_url ON documents (source_url)`,
    `CREATE INDEX IF NOT EXISTS idx_documents_series
      ON documents (series_id, series_order) WHERE series_id IS NOT NULL`,
    `CREATE INDEX IF NOT EXISTS idx_documents_unseriesed
      ON documents (tag_magazine, tag_science, tag_topic, created_at DESC) WHERE series_id IS NULL`,
    `CREATE INDEX IF NOT EXISTS idx_document_series_tags
      ON document_series (tag_magazine, tag_science, tag_topic)`,
  ];
}

const countRowsSchema = z.array(z.object({ count: z.coerce.number() }));

async function countDocuments(sql: SchemaRunner): Promise<number> {
  const [row] = countRowsSchema.parse(await sql.unsafe(`SELECT COUNT(*) AS count FROM documents`));
  return row?.count ?? 0;
}

function vectorIndexStatement(lists: number): string {
  return `CREATE INDEX IF NOT EXISTS ${VECTOR_INDEX_NAME}
    ON documents USING ivfflat (embedding vector_cosine_ops) WITH (lists = ${lists})`;
}

/**
 * Create extension, tables, trigger and indexes if missing
 */
export async function ensureSchema(sql: SchemaRunner, dimensions: number): Promise<void> {
  if (!Number.isInteger(dimensions) || dimensions <= 0) {
    throw new RangeError(`Embedding dimensions must be a positive integer, got ${dimensions}`);
  }

  for (const statement of schemaStatements(dimensions)) {
    await sql.unsafe(statement);
  }

  const lists = ivfflatLists(await countDocuments(sql));
  try {
    await sql.unsafe(vectorIndexStatement(lists));
  } catch (error) {
    logger.warn('Vector index not created, similarity queries will scan', {
      dimensions,
      ivfflatLists: lists,
      error: errorMessage(error),
    });
  }

  logger.info('Corpus schema ensured', { dimensions, ivfflatLists: lists });
}

/**
 * Drop and recreate the IVFFlat index sized for the current row count
 *
 * @throws the driver error; the transaction then keeps the previous index
 */
export async function rebuildVectorIndex(sql: TransactionalSchemaRunner): Promise<number> {
  const lists = ivfflatLists(await countDocuments(sql));

  await sql.begin(async (tx) => {
    await tx.unsafe(`DROP INDEX IF EXISTS ${VECTOR_INDEX_NAME}`);
    await tx.unsafe(vectorIndexStatement(lists));
  });

  logger.info('Vector index rebuilt', { ivfflatLists: lists });
  return lists;
}
