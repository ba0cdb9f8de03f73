/**
 * corpus-compass
 *
 * Tag- and embedding-based corpus engine:
 * - related-document retrieval and near-duplicate detection
 * - topical series detection with navigation backfill
 * - content gap analysis
 *
 * createCorpusEngine() wires every component from parsed config. External
 * collaborators (text analyzer, narrative renderer, series confirmer, CMS)
 * are injected; none is required to construct the engine.
 */

import { createDatabase, type DatabaseHandle } from '@/db/client';
import { ensureSchema, rebuildVectorIndex } from '@/db/migrate';
import { AssociationRetriever } from '@/services/association.service';
import { ContentGapAnalyzer, type NarrativeRenderer } from '@/services/contentGap.service';
import {
  EmbeddingStore,
  OpenAiEmbeddingProvider,
  type EmbeddingProvider,
} from '@/services/embedding.service';
import { DocumentIngestor, type TextAnalyzer } from '@/services/ingestion.service';
import { SeriesDetector, type CmsClient, type SeriesConfirmer } from '@/services/series.service';
import { fileSynonymSource, TagSynonymCache, type SynonymSource } from '@/services/tagTaxonomy';
import { PgVectorIndex, type VectorIndex } from '@/services/vectorIndex.service';
import type { CorpusConfig } from '@/utils/config';
import { logger } from '@/utils/logger';

export interface CorpusCollaborators {
  analyzer?: TextAnalyzer;
  renderer?: NarrativeRenderer;
  confirmer?: SeriesConfirmer;
  cms?: CmsClient;
  /** Overrides the OpenAI-compatible provider built from config */
  provider?: EmbeddingProvider;
  /** Overrides the Postgres index; no connection pool is created */
  index?: VectorIndex;
  synonymSource?: SynonymSource;
}

export interface CorpusEngine {
  index: VectorIndex;
  embeddings: EmbeddingStore;
  synonyms: TagSynonymCache;
  association: AssociationRetriever;
  gaps: ContentGapAnalyzer;
  series: SeriesDetector;
  ingestor: DocumentIngestor;
  /** Create tables and indexes when missing (no-op without a database) */
  ensureSchema(): Promise<void>;
  /** Re-tune the IVFFlat index for the current row count */
  rebuildVectorIndex(): Promise<number | null>;
  close(): Promise<void>;
}

export function createCorpusEngine(config: CorpusConfig, collaborators: CorpusCollaborators = {}): CorpusEngine {
  let database: DatabaseHandle | null = null;
  let index: VectorIndex;
  if (collaborators.index) {
    index = collaborators.index;
  } else {
    database = createDatabase(config.database);
    index = new PgVectorIndex(database.sql, database.db);
  }

  const provider =
    collaborators.provider ??
    new OpenAiEmbeddingProvider({
      apiKey: config.embedding.apiKey,
      apiBase: config.embedding.apiBase,
      model: config.embedding.model,
      dimensions: config.embedding.dimensions,
    });

  const embeddings = new EmbeddingStore(provider, {
    cacheSize: config.embedding.cacheSize,
    batchSize: config.embedding.batchSize,
    maxAttempts: config.embedding.maxAttempts,
  });

  const synonyms = new TagSynonymCache(collaborators.synonymSource ?? fileSynonymSource(config.tagSynonymsPath));
  const association = new AssociationRetriever(index);
  const gaps = new ContentGapAnalyzer(index, { renderer: collaborators.renderer });
  const series = new SeriesDetector(index, { confirmer: collaborators.confirmer });
  const ingestor = new DocumentIngestor({
    index,
    embeddings,
    synonyms,
    association,
    series,
    analyzer: collaborators.analyzer,
    cms: collaborators.cms,
  });

  return {
    index,
    embeddings,
    synonyms,
    association,
    gaps,
    series,
    ingestor,
    async ensureSchema() {
      if (!database) return;
      await ensureSchema(database.sql, config.embedding.dimensions);
    },
    async rebuildVectorIndex() {
      if (!database) return null;
      return rebuildVectorIndex(database.sql);
    },
    async close() {
      if (!database) return;
      await database.close();
      logger.info('Database connections closed');
    },
  };
}

export { loadConfig, loadConfigFromDotenv, type CorpusConfig } from '@/utils/config';
export { createLogger, type Logger } from '@/utils/logger';
export * from '@/errors/corpus';
export * from '@/types/corpus';
export {
  normalizeTag,
  validateTagSet,
  canonicalizeTag,
  buildSynonymMap,
  prepareTagSet,
  fileSynonymSource,
  TagSynonymCache,
  DEFAULT_TAG_LIMITS,
} from '@/services/tagTaxonomy';
export {
  EmbeddingStore,
  OpenAiEmbeddingProvider,
  isRetryableProviderError,
  type EmbeddingProvider,
} from '@/services/embedding.service';
export { PgVectorIndex, generateId, type VectorIndex } from '@/services/vectorIndex.service';
export {
  AssociationRetriever,
  ASSOCIATION_CONFIG,
  countTagMatches,
  relationTierFor,
} from '@/services/association.service';
export {
  ContentGapAnalyzer,
  GAP_CONFIG,
  describeGaps,
  mergeGaps,
  type NarrativeRenderer,
  type GapRunStats,
} from '@/services/contentGap.service';
export {
  SeriesDetector,
  SERIES_CONFIG,
  hasSeriesTitlePattern,
  parseSeriesJudgment,
  buildSeriesNavigation,
  injectSeriesNavigation,
  replaceSeriesNavigation,
  buildBackfillNavigation,
  type CmsClient,
  type SeriesConfirmer,
} from '@/services/series.service';
export {
  DocumentIngestor,
  type TextAnalyzer,
  type IngestionResult,
  type CandidateEvaluation,
} from '@/services/ingestion.service';
export { cosineSimilarity, averageSimilarity } from '@/utils/similarity';
export { ensureSchema, rebuildVectorIndex, ivfflatLists } from '@/db/migrate';
