/**
 * Content Gap Service
 *
 * Finds under-served areas of the corpus from two independent signals:
 *
 *   Tag gaps     (magazine, science, topic) groups that are rare and stale
 *                score = 1/(count+1) × clamp(days/30, 0.1, 3.0)
 *   Vector gaps  documents far from the corpus centroid whose nearest
 *                neighbour is not close; score = distance × (1 − nnSim)
 *
 * Each signal is min–max normalized, weighted (0.6 tag / 0.4 vector),
 * merged on the top-three tag key and truncated. Turning gaps into prose
 * is left to an injected NarrativeRenderer.
 */

import { InsufficientCorpusError } from '@/errors/corpus';
import type { ContentGap, GapTags, TaggedDate, TopicRecommendation } from '@/types/corpus';
import { createLogger, type Logger } from '@/utils/logger';
import type { VectorIndex } from './vectorIndex.service';

// =====================================================
// CONFIG
// =====================================================

export const GAP_CONFIG = {
  minDocuments: 10,
  defaultTopN: 5,
  frontierMultiplier: 3,
  sparseThreshold: 0.7,
  tagWeight: 0.6,
  vectorWeight: 0.4,
  stalenessPeriodDays: 30,
  stalenessMin: 0.1,
  stalenessCap: 3.0,
  recentTitlesCount: 20,
} as const;

const MS_PER_DAY = 24 * 60 * 60 * 1000;

// =====================================================
// COLLABORATORS
// =====================================================

export interface NarrativeRequest {
  gaps: ContentGap[];
  recentTitles: string[];
  topN: number;
}

/**
 * Turns gap data into topic suggestions (typically an LLM call).
 * Output is passed through unchecked.
 */
export interface NarrativeRenderer {
  render(request: NarrativeRequest): Promise<TopicRecommendation[]>;
}

export interface GapRunStats {
  documentCount: number;
  /** Distinct (magazine, science) pairs seen by the tag scan */
  tagComboCount: number;
}

// =====================================================
// PURE SCORING
// =====================================================

/**
 * clamp(days / 30, 0.1, 3.0); 1.0 when the group has no timestamp
 */
export function stalenessWeight(mostRecent: Date | null, now: Date): number {
  if (mostRecent === null) return 1.0;
  const days = Math.floor((now.getTime() - mostRecent.getTime()) / MS_PER_DAY);
  const weight = Math.min(days / GAP_CONFIG.stalenessPeriodDays, GAP_CONFIG.stalenessCap);
  return Math.max(weight, GAP_CONFIG.stalenessMin);
}

function topKey(tags: GapTags): string {
  return JSON.stringify([tags.magazine, tags.science, tags.topic]);
}

interface TagGroup {
  tags: GapTags;
  count: number;
  mostRecent: Date | null;
}

export function analyzeTagGaps(rows: TaggedDate[], now: Date = new Date()): ContentGap[] {
  const groups = new Map<string, TagGroup>();

  for (const row of rows) {
    const tags: GapTags = {
      magazine: row.tags.magazine,
      science: row.tags.science,
      topic: row.tags.topic,
    };
    const key = topKey(tags);
    const group = groups.get(key) ?? { tags, count: 0, mostRecent: null };
    group.count += 1;
    if (row.createdAt && (group.mostRecent === null || row.createdAt > group.mostRecent)) {
      group.mostRecent = row.createdAt;
    }
    groups.set(key, group);
  }

  const gaps = [...groups.values()].map((group): ContentGap => ({
    kind: 'TAG_GAP',
    description: `${group.tags.magazine}/${group.tags.science}/${group.tags.topic} (${group.count} documents)`,
    score: (1 / (group.count + 1)) * stalenessWeight(group.mostRecent, now),
    tags: group.tags,
  }));

  return gaps.sort((a, b) => b.score - a.score);
}

/**
 * Distinct (magazine, science) pairs
 */
export function countTagCombos(rows: TaggedDate[]): number {
  return new Set(rows.map((row) => JSON.stringify([row.tags.magazine, row.tags.science]))).size;
}

/**
 * Min–max normalize scores to [0, 1]; a constant signal maps to 1.0
 */
export function normalizeScores(gaps: ContentGap[]): ContentGap[] {
  if (gaps.length === 0) return [];
  const scores = gaps.map((gap) => gap.score);
  const lo = Math.min(...scores);
  const hi = Math.max(...scores);

  if (hi === lo) {
    return gaps.map((gap) => ({ ...gap, score: 1.0 }));
  }
  return gaps.map((gap) => ({ ...gap, score: (gap.score - lo) / (hi - lo) }));
}

/**
 * Normalize, weight and sum both signals per top-three tag key
 */
export function mergeGaps(
  tagGaps: ContentGap[],
  vectorGaps: ContentGap[],
  topN: number = GAP_CONFIG.defaultTopN
): ContentGap[] {
  const merged = new Map<string, ContentGap>();

  const accumulate = (gaps: ContentGap[], weight: number) => {
    for (const gap of normalizeScores(gaps)) {
      const key = gap.tags ? topKey(gap.tags) : gap.description;
      const score = gap.score * weight;
      const existing = merged.get(key);

      if (existing) {
        merged.set(key, {
          kind: 'MERGED',
          description: `${existing.description} + ${gap.description}`,
          score: existing.score + score,
          tags: existing.tags ?? gap.tags,
          referenceTitle: existing.referenceTitle ?? gap.referenceTitle,
        });
      } else {
        merged.set(key, { ...gap, score });
      }
    }
  };

  accumulate(tagGaps, GAP_CONFIG.tagWeight);
  accumulate(vectorGaps, GAP_CONFIG.vectorWeight);

  return [...merged.values()].sort((a, b) => b.score - a.score).slice(0, Math.max(0, topN));
}

/**
 * Numbered plain-text digest of gaps, as handed to renderers
 */
export function describeGaps(gaps: ContentGap[]): string {
  return gaps
    .map((gap, i) => {
      const lines = [`${i + 1}. [${gap.kind}] ${gap.description} (score: ${gap.score.toFixed(3)})`];
      if (gap.tags) {
        lines.push(`   tags: ${gap.tags.magazine}/${gap.tags.science}/${gap.tags.topic}`);
      }
      if (gap.referenceTitle) {
        lines.push(`   reference: "${gap.referenceTitle}"`);
      }
      return lines.join('\n');
    })
    .join('\n');
}

// =====================================================
// ANALYZER
// =====================================================

export interface ContentGapAnalyzerOptions {
  renderer?: NarrativeRenderer;
  logger?: Logger;
  now?: () => Date;
}

export class ContentGapAnalyzer {
  private readonly renderer?: NarrativeRenderer;
  private readonly log: Logger;
  private readonly now: () => Date;
  private stats: GapRunStats | null = null;

  constructor(
    private readonly index: VectorIndex,
    options: ContentGapAnalyzerOptions = {}
  ) {
    this.renderer = options.renderer;
    this.log = options.logger ?? createLogger('content-gap');
    this.now = options.now ?? (() => new Date());
  }

  /** Stats of the most recent analyze() call */
  get lastRun(): GapRunStats | null {
    return this.stats;
  }

  /**
   * Merged gaps for the current corpus
   *
   * @throws InsufficientCorpusError below GAP_CONFIG.minDocuments documents
   */
  async analyze(topN: number = GAP_CONFIG.defaultTopN): Promise<ContentGap[]> {
    const documentCount = await this.index.count();
    if (documentCount < GAP_CONFIG.minDocuments) {
      throw new InsufficientCorpusError(documentCount, GAP_CONFIG.minDocuments);
    }

    const rows = await this.index.listAllTagsWithDates();
    const tagGaps = analyzeTagGaps(rows, this.now());
    this.stats = { documentCount, tagComboCount: countTagCombos(rows) };
    this.log.info('Tag gap analysis complete', { groups: tagGaps.length });

    const vectorGaps = await this.analyzeVectorGaps(topN);
    const merged = mergeGaps(tagGaps, vectorGaps, topN);

    this.log.info('Content gap analysis complete', {
      documentCount,
      tagGaps: tagGaps.length,
      vectorGaps: vectorGaps.length,
      merged: merged.length,
    });
    return merged;
  }

  async analyzeVectorGaps(topN: number = GAP_CONFIG.defaultTopN): Promise<ContentGap[]> {
    const centroid = await this.index.computeCentroid();
    if (centroid === null) {
      this.log.warn('No centroid available, skipping vector gap analysis');
      return [];
    }

    const frontier = await this.index.findFrontier(centroid, topN * GAP_CONFIG.frontierMultiplier);

    const gaps = frontier
      .filter((doc) => doc.nearestNeighborSimilarity < GAP_CONFIG.sparseThreshold)
      .map((doc): ContentGap => ({
        kind: 'VECTOR_GAP',
        description: `sparse region (centroid distance ${doc.distanceFromCentroid.toFixed(3)}, nearest neighbour similarity ${doc.nearestNeighborSimilarity.toFixed(3)})`,
        score: doc.distanceFromCentroid * (1 - doc.nearestNeighborSimilarity),
        tags: doc.tags,
        referenceTitle: doc.title,
      }));

    gaps.sort((a, b) => b.score - a.score);
    this.log.info('Vector gap analysis complete', { frontier: frontier.length, sparse: gaps.length });
    return gaps;
  }

  /**
   * Analyze, then hand gaps and recent titles to the renderer
   */
  async recommendTopics(topN: number = GAP_CONFIG.defaultTopN): Promise<TopicRecommendation[]> {
    const gaps = await this.analyze(topN);
    if (gaps.length === 0) {
      this.log.warn('No content gaps found, skipping rendering');
      return [];
    }
    if (!this.renderer) {
      this.log.warn('No narrative renderer configured');
      return [];
    }

    const recentTitles = await this.index.listRecentTitles(GAP_CONFIG.recentTitlesCount);
    return this.renderer.render({ gaps, recentTitles, topN });
  }
}
