/**
 * Corpus domain types shared by the services and the vector index.
 */

export const TAG_LEVELS = ['magazine', 'science', 'topic', 'content'] as const;

export type TagLevel = (typeof TAG_LEVELS)[number];

/**
 * Four-level taxonomic tag, most significant level first
 */
export interface TagSet {
  readonly magazine: string;
  readonly science: string;
  readonly topic: string;
  readonly content: string;
}

/** Top three levels; identifies a series and a tag-gap group */
export type TopTags = Pick<TagSet, 'magazine' | 'science' | 'topic'>;

/** Fixed-length vector; `[]` marks a failed batch item and is never stored */
export type Embedding = number[];

export interface DocumentRecord {
  id: string;
  title: string;
  tags: TagSet;
  summaryText: string;
  embedding?: Embedding; // Omitted by list/relation queries
  sourceUrl?: string | null;
  seriesId?: string | null;
  seriesOrder?: number | null;
  externalPostId?: number | null;
  createdAt: Date;
  updatedAt?: Date;
}

export interface NewDocument {
  id?: string;
  title: string;
  tags: TagSet;
  summaryText: string;
  embedding: Embedding;
  sourceUrl?: string | null;
  seriesId?: string | null;
  seriesOrder?: number | null;
  externalPostId?: number | null;
}

export type DocumentPatch = Partial<
  Pick<
    NewDocument,
    'title' | 'tags' | 'summaryText' | 'embedding' | 'sourceUrl' | 'seriesId' | 'seriesOrder' | 'externalPostId'
  >
>;

export type RelationTier = 'STRONG' | 'MEDIUM' | 'WEAK';

export interface AssociationResult {
  document: DocumentRecord;
  tagMatchCount: number;
  relationTier: RelationTier;
  similarity: number;
}

/** Candidate returned by the index; the retriever assigns the tier */
export interface TagMatchedDocument {
  document: DocumentRecord;
  tagMatchCount: number;
  similarity: number;
}

export interface DuplicateMatch {
  id: string;
  title: string;
  sourceUrl?: string | null;
  similarity: number;
}

export type ContentGapKind = 'TAG_GAP' | 'VECTOR_GAP' | 'MERGED';

/** Tag-gap groups carry no content level */
export type GapTags = TopTags & { readonly content?: string };

export interface ContentGap {
  kind: ContentGapKind;
  description: string;
  score: number;
  tags?: GapTags;
  referenceTitle?: string;
}

export type RecommendationPriority = 'high' | 'medium' | 'low';

/** One rendered topic suggestion; produced by an external renderer */
export interface TopicRecommendation {
  topic: string;
  rationale: string;
  suggestedTags: TagSet;
  priority: RecommendationPriority;
}

export interface SeriesRecord {
  id: string;
  title: string;
  tags: TopTags;
  createdAt: Date;
}

export interface NewSeries {
  id?: string;
  title: string;
  tags: TopTags;
}

export interface SeriesDecision {
  seriesId: string;
  seriesTitle: string;
  order: number; // 1-based position of the new document
  total: number;
  previousDocument?: DocumentRecord | null;
}

export type SeriesOutcome =
  | {
      kind: 'JOINED_EXISTING';
      decision: SeriesDecision;
      averageSimilarity: number;
      confirmedBy: 'similarity' | 'confirmation';
    }
  | { kind: 'CREATED_NEW'; decision: SeriesDecision; adoptedDocumentIds: string[] }
  | { kind: 'NO_SERIES' };

/** Row shape of the tag-gap scan */
export interface TaggedDate {
  tags: TagSet;
  createdAt: Date | null;
}

/** Document far from the corpus centroid, with its nearest-neighbour similarity */
export interface FrontierDocument {
  id: string;
  title: string;
  tags: TagSet;
  distanceFromCentroid: number;
  nearestNeighborSimilarity: number;
}

/** Recent unseriesed document similar to a candidate */
export interface RecentSimilarDocument {
  id: string;
  title: string;
  sourceUrl?: string | null;
  externalPostId?: number | null;
  createdAt: Date;
  similarity: number;
}
