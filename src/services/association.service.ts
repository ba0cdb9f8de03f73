/**
 * Association Service
 *
 * Related-document retrieval and near-duplicate detection.
 *
 * Related documents come from a single indexed query: tag pre-filter
 * (magazine OR science), exact tag-level match count, cut at two matches,
 * cosine ranking. Both lookups enhance a publish flow, so storage failures
 * are logged and degrade to "nothing found".
 */

import type {
  AssociationResult,
  DuplicateMatch,
  Embedding,
  RelationTier,
  TagSet,
} from '@/types/corpus';
import { TAG_LEVELS } from '@/types/corpus';
import { createLogger, errorMessage, type Logger } from '@/utils/logger';
import type { VectorIndex } from './vectorIndex.service';

export const ASSOCIATION_CONFIG = {
  topK: 5,
  minTagMatches: 2,
  duplicateThreshold: 0.95,
} as const;

const TIER_BY_MATCH_COUNT: Record<number, RelationTier> = {
  4: 'STRONG',
  3: 'MEDIUM',
  2: 'WEAK',
};

/**
 * Number of the four tag levels that are exactly equal
 */
export function countTagMatches(a: TagSet, b: TagSet): number {
  return TAG_LEVELS.filter((level) => a[level] === b[level]).length;
}

/**
 * 4 → STRONG, 3 → MEDIUM, 2 → WEAK, anything else → null
 */
export function relationTierFor(tagMatchCount: number): RelationTier | null {
  return TIER_BY_MATCH_COUNT[tagMatchCount] ?? null;
}

export class AssociationRetriever {
  private readonly log: Logger;

  constructor(
    private readonly index: VectorIndex,
    logger?: Logger
  ) {
    this.log = logger ?? createLogger('association');
  }

  /**
   * Up to `topK` related documents, most similar first
   */
  async findRelated(
    tags: TagSet,
    embedding: Embedding,
    excludeId?: string,
    topK: number = ASSOCIATION_CONFIG.topK
  ): Promise<AssociationResult[]> {
    if (topK <= 0 || embedding.length === 0) return [];

    try {
      const rows = await this.index.findRelated(tags, embedding, {
        excludeId,
        limit: topK,
        minTagMatches: ASSOCIATION_CONFIG.minTagMatches,
      });

      const results: AssociationResult[] = [];
      for (const row of rows) {
        const relationTier = relationTierFor(row.tagMatchCount);
        if (relationTier === null) continue;
        results.push({ ...row, relationTier });
      }

      this.log.info('Related documents found', { count: results.length, excludeId });
      return results;
    } catch (error) {
      this.log.error('Related document query failed', { error: errorMessage(error) });
      return [];
    }
  }

  /**
   * Nearest stored document when its similarity reaches `threshold`
   */
  async findDuplicate(
    embedding: Embedding,
    threshold: number = ASSOCIATION_CONFIG.duplicateThreshold,
    excludeId?: string
  ): Promise<DuplicateMatch | null> {
    if (embedding.length === 0) return null;

    try {
      const nearest = await this.index.findNearest(embedding, excludeId);
      if (nearest && nearest.similarity >= threshold) {
        this.log.warn('Near-duplicate document detected', {
          id: nearest.id,
          similarity: nearest.similarity,
          threshold,
        });
        return nearest;
      }
      return null;
    } catch (error) {
      this.log.error('Duplicate query failed', { error: errorMessage(error) });
      return null;
    }
  }
}
