/**
 * Document Ingestion Service
 *
 * Turns raw text into a stored document and evaluates publish candidates
 * against the corpus.
 *
 *   ingestDocument   URL dedup → analysis → tag preparation → embedding → insert
 *   evaluateCandidate  duplicate check + related documents + series decision
 *   recordPublished  insert a published document with its series position,
 *                    then backfill the previous member's navigation
 *
 * Ingestion reports failures per document instead of throwing, so a batch
 * keeps going past a bad input.
 */

import { z } from 'zod';
import { CorpusError, ValidationError } from '@/errors/corpus';
import type {
  AssociationResult,
  DocumentRecord,
  DuplicateMatch,
  Embedding,
  SeriesOutcome,
  TagSet,
} from '@/types/corpus';
import { createLogger, errorMessage, type Logger } from '@/utils/logger';
import type { AssociationRetriever } from './association.service';
import type { EmbeddingStore } from './embedding.service';
import type { CmsClient, SeriesDetector } from './series.service';
import { prepareTagSet, type TagSynonymCache } from './tagTaxonomy';
import type { VectorIndex } from './vectorIndex.service';

// =====================================================
// TYPES
// =====================================================

/**
 * Extracts title, tags and a summary from document text (typically an LLM).
 * The response is validated before use.
 */
export interface TextAnalyzer {
  analyze(rawText: string): Promise<unknown>;
}

export interface TextAnalysis {
  title: string;
  summaryText: string;
  tags: TagSet;
}

const textAnalysisSchema = z.object({
  title: z.string().trim().min(1),
  summaryText: z.string().trim().min(1),
  tags: z.object({
    magazine: z.string(),
    science: z.string(),
    topic: z.string(),
    content: z.string(),
  }),
});

export function parseTextAnalysis(raw: unknown): TextAnalysis {
  return textAnalysisSchema.parse(raw);
}

export interface IngestInput {
  rawText: string;
  sourceUrl?: string;
  id?: string;
}

export type IngestionStage = 'analysis' | 'tags' | 'embedding' | 'storage';

export type IngestionResult =
  | { status: 'ingested'; document: DocumentRecord }
  | { status: 'existing'; document: DocumentRecord }
  | { status: 'failed'; stage: IngestionStage; error: string; sourceUrl?: string };

export type IngestProgress = (completed: number, total: number, result: IngestionResult) => void;

export interface PublishCandidate {
  tags: TagSet;
  embedding: Embedding;
  title: string;
  excludeId?: string;
}

export interface CandidateEvaluation {
  /** Tags after normalization and canonicalization */
  tags: TagSet;
  duplicate: DuplicateMatch | null;
  related: AssociationResult[];
  series: SeriesOutcome;
}

export interface PublishedDocument {
  candidate: PublishCandidate;
  summaryText: string;
  sourceUrl: string;
  externalPostId?: number | null;
  series: SeriesOutcome;
}

export interface PublishRecord {
  document: DocumentRecord;
  backfilled: boolean;
}

export interface DocumentIngestorDeps {
  index: VectorIndex;
  embeddings: EmbeddingStore;
  synonyms: TagSynonymCache;
  association: AssociationRetriever;
  series: SeriesDetector;
  analyzer?: TextAnalyzer;
  cms?: CmsClient;
  logger?: Logger;
}

// =====================================================
// INGESTOR
// =====================================================

class StageError extends Error {
  constructor(
    readonly stage: IngestionStage,
    readonly original: unknown
  ) {
    super(errorMessage(original));
    this.name = 'StageError';
  }
}

async function atStage<T>(stage: IngestionStage, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    throw new StageError(stage, error);
  }
}

export class DocumentIngestor {
  private readonly log: Logger;

  constructor(private readonly deps: DocumentIngestorDeps) {
    this.log = deps.logger ?? createLogger('ingestion');
  }

  async ingestDocument(input: IngestInput): Promise<IngestionResult> {
    const { index, embeddings, synonyms } = this.deps;

    if (input.sourceUrl) {
      const existing = await this.safeGetByUrl(input.sourceUrl);
      if (existing) {
        this.log.info('Document already ingested', { id: existing.id, sourceUrl: input.sourceUrl });
        return { status: 'existing', document: existing };
      }
    }

    try {
      const analysis = await atStage('analysis', () => this.analyze(input.rawText));
      const tags = await atStage('tags', () => prepareTagSet(analysis.tags, synonyms));
      const embedding = await atStage('embedding', () => embeddings.getEmbedding(analysis.summaryText));
      const document = await atStage('storage', () =>
        index.insert({
          id: input.id,
          title: analysis.title,
          tags,
          summaryText: analysis.summaryText,
          embedding,
          sourceUrl: input.sourceUrl ?? null,
        })
      );

      this.log.info('Document ingested', { id: document.id, title: document.title });
      return { status: 'ingested', document };
    } catch (error) {
      if (!(error instanceof StageError)) throw error;

      this.log.error('Document ingestion failed', {
        stage: error.stage,
        code: error.original instanceof CorpusError ? error.original.code : undefined,
        sourceUrl: input.sourceUrl,
        error: error.message,
      });
      return { status: 'failed', stage: error.stage, error: error.message, sourceUrl: input.sourceUrl };
    }
  }

  /**
   * Sequential; one result per input, in input order
   */
  async ingestBatch(inputs: IngestInput[], onProgress?: IngestProgress): Promise<IngestionResult[]> {
    const results: IngestionResult[] = [];

    for (const input of inputs) {
      const result = await this.ingestDocument(input);
      results.push(result);
      onProgress?.(results.length, inputs.length, result);
    }

    const summary = { ingested: 0, existing: 0, failed: 0 };
    for (const result of results) summary[result.status] += 1;
    this.log.info('Batch ingestion complete', { total: inputs.length, ...summary });

    return results;
  }

  /**
   * Duplicate check, related documents and series decision for a candidate
   *
   * @throws TagValidationError when the candidate tags are unusable
   */
  async evaluateCandidate(candidate: PublishCandidate): Promise<CandidateEvaluation> {
    const tags = await prepareTagSet(candidate.tags, this.deps.synonyms);

    const duplicate = await this.deps.association.findDuplicate(
      candidate.embedding,
      undefined,
      candidate.excludeId
    );
    const related = await this.deps.association.findRelated(tags, candidate.embedding, candidate.excludeId);

    // Duplicates never reach series detection
    if (duplicate) {
      return { tags, duplicate, related, series: { kind: 'NO_SERIES' } };
    }

    const series = await this.deps.series.detectSeriesSafe({
      tags,
      embedding: candidate.embedding,
      title: candidate.title,
      excludeId: candidate.excludeId,
    });

    return { tags, duplicate, related, series };
  }

  /**
   * Store a published document at its series position; backfill is best-effort
   *
   * @throws StorageError when the insert fails
   */
  async recordPublished(published: PublishedDocument): Promise<PublishRecord> {
    const tags = await prepareTagSet(published.candidate.tags, this.deps.synonyms);
    const decision = published.series.kind === 'NO_SERIES' ? null : published.series.decision;

    const document = await this.deps.index.insert({
      title: published.candidate.title,
      tags,
      summaryText: published.summaryText,
      embedding: published.candidate.embedding,
      sourceUrl: published.sourceUrl,
      seriesId: decision?.seriesId ?? null,
      seriesOrder: decision?.order ?? null,
      externalPostId: published.externalPostId ?? null,
    });
    this.log.info('Published document recorded', {
      id: document.id,
      seriesId: document.seriesId,
      seriesOrder: document.seriesOrder,
    });

    let backfilled = false;
    if (decision?.previousDocument && this.deps.cms) {
      backfilled = await this.deps.series.backfillPreviousDocument(
        decision,
        { title: published.candidate.title, url: published.sourceUrl },
        this.deps.cms
      );
    }

    return { document, backfilled };
  }

  private async analyze(rawText: string): Promise<TextAnalysis> {
    const analyzer = this.deps.analyzer;
    if (!analyzer) {
      throw new ValidationError('No text analyzer configured');
    }
    if (rawText.trim().length === 0) {
      throw new ValidationError('Document text is empty');
    }
    return parseTextAnalysis(await analyzer.analyze(rawText));
  }

  private async safeGetByUrl(url: string): Promise<DocumentRecord | null> {
    try {
      return await this.deps.index.getByUrl(url);
    } catch (error) {
      this.log.warn('Source URL lookup failed, continuing ingestion', {
        sourceUrl: url,
        error: errorMessage(error),
      });
      return null;
    }
  }
}
