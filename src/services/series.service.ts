/**
 * Series Service
 *
 * Decides whether a new document continues a topical series, creates a
 * series from recent similar documents, and renders the navigation block
 * published with each series member.
 *
 * Decision order:
 *   1. candidate series sharing the top three tags, average similarity
 *      against every member ≥ threshold           → JOINED_EXISTING
 *   2. candidates just below threshold, confirmed by an optional
 *      SeriesConfirmer                               → JOINED_EXISTING
 *   3. unseriesed documents from the last 30 days
 *      with similarity ≥ 0.85                        → CREATED_NEW
 *   4. otherwise                                     → NO_SERIES
 *
 * The threshold drops from 0.80 to 0.70 when the title itself looks like
 * a series instalment ("Part 3", "第二篇", "（上）", ...).
 */

import { z } from 'zod';
import { SeriesDetectionError } from '@/errors/corpus';
import type {
  DocumentRecord,
  Embedding,
  SeriesDecision,
  SeriesOutcome,
  SeriesRecord,
  TopTags,
} from '@/types/corpus';
import { createLogger, errorMessage, type Logger } from '@/utils/logger';
import { averageSimilarity } from '@/utils/similarity';
import { generateId, type VectorIndex } from './vectorIndex.service';

// =====================================================
// CONFIG
// =====================================================

export const SERIES_CONFIG = {
  similarityThreshold: 0.8,
  titlePatternThreshold: 0.7,
  confirmationBand: 0.1,
  confirmationMinConfidence: 0.7,
  confirmationMaxTitles: 10,
  newSeriesThreshold: 0.85,
  lookbackDays: 30,
  navCssClass: 'series-navigation',
} as const;

const SERIES_TITLE_PATTERNS: readonly RegExp[] = [
  /part\s*\d+/i,
  /[(（]\s*\d+\s*[)）]/,
  /第\s*[\d一二三四五六七八九十百零两]+\s*(?:篇|章|部分|集|期|讲|回)/,
  /[(（]\s*[上中下]\s*[)）]/,
  /\bseries\b/i,
  /系列/,
  /连载/,
];

export function hasSeriesTitlePattern(title: string): boolean {
  return SERIES_TITLE_PATTERNS.some((pattern) => pattern.test(title));
}

/** Avoids 0.8 - 0.1 = 0.7000000000000001 */
function roundThreshold(value: number): number {
  return Math.round(value * 1e9) / 1e9;
}

// =====================================================
// CONFIRMATION
// =====================================================

export interface SeriesConfirmationRequest {
  title: string;
  candidateTitles: string[];
}

/**
 * Binary "same series?" judgment, usually an LLM call. The response may
 * be the raw model text or an already-parsed object.
 */
export interface SeriesConfirmer {
  confirm(request: SeriesConfirmationRequest): Promise<unknown>;
}

export interface SeriesJudgment {
  isSeries: boolean;
  confidence: number;
  reason?: string;
}

const seriesJudgmentSchema = z
  .object({
    is_series: z.boolean().optional(),
    isSeries: z.boolean().optional(),
    confidence: z.coerce.number().min(0).max(1).default(0),
    reason: z.string().optional(),
  })
  .transform(
    (value): SeriesJudgment => ({
      isSeries: value.isSeries ?? value.is_series ?? false,
      confidence: value.confidence,
      reason: value.reason,
    })
  );

/**
 * Accepts an object or text containing one JSON object (prose and code
 * fences around it are ignored)
 */
export function parseSeriesJudgment(raw: unknown): SeriesJudgment {
  let candidate = raw;
  if (typeof raw === 'string') {
    const first = raw.indexOf('{');
    const last = raw.lastIndexOf('}');
    if (first === -1 || last <= first) {
      throw new SeriesDetectionError(`No JSON object in confirmation response: ${raw.slice(0, 200)}`);
    }
    try {
      candidate = JSON.parse(raw.slice(first, last + 1));
    } catch (error) {
      throw new SeriesDetectionError('Confirmation response is not valid JSON', { cause: error });
    }
  }

  const parsed = seriesJudgmentSchema.safeParse(candidate);
  if (!parsed.success) {
    throw new SeriesDetectionError('Malformed series confirmation response', { cause: parsed.error });
  }
  return parsed.data;
}

// =====================================================
// NAVIGATION HTML
// =====================================================

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#x27;',
};

export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char);
}

export interface NavigationLink {
  title: string;
  url: string;
}

const LINK_STYLE = 'color:#1a73e8;text-decoration:none;';

function previousLink(previous: { title: string; sourceUrl?: string | null } | null | undefined): string {
  if (!previous?.sourceUrl) return '';
  return (
    `    <a href="${escapeHtml(previous.sourceUrl)}" style="${LINK_STYLE}">` +
    `← Previous: ${escapeHtml(previous.title)}</a>\n`
  );
}

function nextLink(next: NavigationLink): string {
  return (
    `    <a href="${escapeHtml(next.url)}" style="${LINK_STYLE}">` +
    `Next: ${escapeHtml(next.title)} →</a>\n`
  );
}

function navigationBlock(seriesTitle: string, order: number, total: number, links: string): string {
  return (
    `<div class="${SERIES_CONFIG.navCssClass}" style="margin:2em 0;padding:1.5em;` +
    `border:1px solid #e0e0e0;border-radius:8px;background:#f9f9f9;">\n` +
    `  <p style="margin:0 0 0.8em;font-weight:bold;color:#333;">\n` +
    `    \u{1F4DA} Part of the series: ${escapeHtml(seriesTitle)} (${order}/${total})\n` +
    `  </p>\n` +
    `  <div style="display:flex;justify-content:space-between;gap:1em;">\n` +
    links +
    `  </div>\n` +
    `</div>`
  );
}

/**
 * Navigation block for a newly published series member
 */
export function buildSeriesNavigation(decision: SeriesDecision): string {
  return navigationBlock(
    decision.seriesTitle,
    decision.order,
    decision.total,
    previousLink(decision.previousDocument)
  );
}

export function injectSeriesNavigation(html: string, decision: SeriesDecision): string {
  return `${html.trimEnd()}\n\n${buildSeriesNavigation(decision)}`;
}

const NAV_BLOCK_PATTERN = new RegExp(
  `<div class="${SERIES_CONFIG.navCssClass}"[^>]*>[\\s\\S]*?</div>\\s*</div>`
);

/**
 * Replace a previously injected navigation block, or append one
 */
export function replaceSeriesNavigation(html: string, navigation: string): string {
  const match = NAV_BLOCK_PATTERN.exec(html);
  if (match) {
    return html.slice(0, match.index) + navigation + html.slice(match.index + match[0].length);
  }
  return `${html.trimEnd()}\n\n${navigation}`;
}

export interface BackfillNavigationInput {
  seriesTitle: string;
  order: number;
  total: number;
  previous?: DocumentRecord | null;
  next: NavigationLink;
}

/**
 * Navigation for an already published member, linking forward to its successor
 */
export function buildBackfillNavigation(input: BackfillNavigationInput): string {
  return navigationBlock(
    input.seriesTitle,
    input.order,
    input.total,
    previousLink(input.previous) + nextLink(input.next)
  );
}

// =====================================================
// CMS
// =====================================================

/**
 * Access to already published content
 */
export interface CmsClient {
  getRenderedContent(postId: number): Promise<string | null>;
  replaceContent(postId: number, content: string): Promise<boolean>;
}

// =====================================================
// DETECTOR
// =====================================================

export interface SeriesCandidate {
  tags: TopTags;
  embedding: Embedding;
  title: string;
  /** Stored document being re-evaluated; never matched against itself */
  excludeId?: string;
}

export interface SeriesDetectorOptions {
  confirmer?: SeriesConfirmer;
  logger?: Logger;
}

interface ScoredSeries {
  series: SeriesRecord;
  averageSimilarity: number;
}

export class SeriesDetector {
  private readonly confirmer?: SeriesConfirmer;
  private readonly log: Logger;

  constructor(
    private readonly index: VectorIndex,
    options: SeriesDetectorOptions = {}
  ) {
    this.confirmer = options.confirmer;
    this.log = options.logger ?? createLogger('series');
  }

  /**
   * @throws SeriesDetectionError wrapping any unexpected failure
   */
  async detectSeries(candidate: SeriesCandidate): Promise<SeriesOutcome> {
    try {
      return await this.decide(candidate);
    } catch (error) {
      if (error instanceof SeriesDetectionError) throw error;
      throw new SeriesDetectionError(`Series detection failed: ${errorMessage(error)}`, { cause: error });
    }
  }

  /**
   * detectSeries that never throws; failures resolve to NO_SERIES
   */
  async detectSeriesSafe(candidate: SeriesCandidate): Promise<SeriesOutcome> {
    try {
      return await this.detectSeries(candidate);
    } catch (error) {
      this.log.warn('Series detection failed, continuing without series', {
        title: candidate.title,
        error: errorMessage(error),
      });
      return { kind: 'NO_SERIES' };
    }
  }

  /**
   * Rewrite the previous member's navigation so it links to the new document.
   * Returns whether the CMS accepted the update; never throws.
   */
  async backfillPreviousDocument(
    decision: SeriesDecision,
    next: NavigationLink,
    cms: CmsClient
  ): Promise<boolean> {
    const previous = decision.previousDocument;
    if (!previous) return false;

    try {
      const postId = await this.index.getExternalPostId(previous.id);
      if (postId === null) {
        this.log.info('Previous document was never published, skipping backfill', { id: previous.id });
        return false;
      }

      const content = await cms.getRenderedContent(postId);
      if (!content) {
        this.log.warn('Previous document has no content to backfill', { postId });
        return false;
      }

      let previousOfPrevious: DocumentRecord | null = null;
      if (decision.order > 2) {
        const members = await this.index.getSeriesMembers(decision.seriesId);
        const position = members.findIndex((member) => member.id === previous.id);
        if (position > 0) {
          previousOfPrevious = members[position - 1];
        }
      }

      const navigation = buildBackfillNavigation({
        seriesTitle: decision.seriesTitle,
        order: decision.order - 1,
        total: decision.total,
        previous: previousOfPrevious,
        next,
      });

      const updated = await cms.replaceContent(postId, replaceSeriesNavigation(content, navigation));
      this.log.info('Backfilled previous series navigation', { postId, updated });
      return updated;
    } catch (error) {
      this.log.warn('Series navigation backfill failed', {
        seriesId: decision.seriesId,
        error: errorMessage(error),
      });
      return false;
    }
  }

  private async decide(candidate: SeriesCandidate): Promise<SeriesOutcome> {
    const threshold = hasSeriesTitlePattern(candidate.title)
      ? SERIES_CONFIG.titlePatternThreshold
      : SERIES_CONFIG.similarityThreshold;

    const candidates = await this.index.findCandidateSeries(candidate.tags);
    const scored: ScoredSeries[] = [];

    for (const series of candidates) {
      const memberEmbeddings = await this.index.getSeriesMemberEmbeddings(series.id, candidate.excludeId);
      const average = averageSimilarity(candidate.embedding, memberEmbeddings);
      scored.push({ series, averageSimilarity: average });

      if (average >= threshold) {
        const decision = await this.joinDecision(series);
        this.log.info('Matched existing series', {
          seriesId: series.id,
          averageSimilarity: average,
          order: decision.order,
        });
        return { kind: 'JOINED_EXISTING', decision, averageSimilarity: average, confirmedBy: 'similarity' };
      }
    }

    const confirmed = await this.confirmBorderline(candidate.title, scored, threshold);
    if (confirmed) return confirmed;

    return this.createFromRecent(candidate);
  }

  private async confirmBorderline(
    title: string,
    scored: ScoredSeries[],
    threshold: number
  ): Promise<SeriesOutcome | null> {
    const confirmer = this.confirmer;
    if (!confirmer) return null;

    const floor = roundThreshold(threshold - SERIES_CONFIG.confirmationBand);

    for (const { series, averageSimilarity: average } of scored) {
      if (average < floor) continue;

      const members = await this.index.getSeriesMembers(series.id);
      const candidateTitles = members.map((member) => member.title).slice(0, SERIES_CONFIG.confirmationMaxTitles);
      if (candidateTitles.length === 0) continue;

      let judgment: SeriesJudgment;
      try {
        judgment = parseSeriesJudgment(await confirmer.confirm({ title, candidateTitles }));
      } catch (error) {
        this.log.warn('Series confirmation failed', { seriesId: series.id, error: errorMessage(error) });
        continue;
      }

      this.log.info('Series confirmation judgment', {
        seriesId: series.id,
        isSeries: judgment.isSeries,
        confidence: judgment.confidence,
        reason: judgment.reason,
      });

      if (judgment.isSeries && judgment.confidence >= SERIES_CONFIG.confirmationMinConfidence) {
        const decision = this.decisionFromMembers(series, members);
        return { kind: 'JOINED_EXISTING', decision, averageSimilarity: average, confirmedBy: 'confirmation' };
      }
    }

    return null;
  }

  private async createFromRecent(candidate: SeriesCandidate): Promise<SeriesOutcome> {
    const similar = await this.index.findRecentSimilar(
      candidate.tags,
      candidate.embedding,
      SERIES_CONFIG.lookbackDays,
      SERIES_CONFIG.newSeriesThreshold,
      candidate.excludeId
    );
    if (similar.length === 0) return { kind: 'NO_SERIES' };

    const series = await this.index.createSeries({
      id: generateId(),
      title: `${candidate.tags.topic} series`,
      tags: candidate.tags,
    });

    // Earliest document becomes part 1
    const ordered = [...similar].sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime());
    for (const [i, match] of ordered.entries()) {
      await this.index.addToSeries(match.id, series.id, i + 1);
    }

    const order = ordered.length + 1;
    const latest = ordered[ordered.length - 1];
    const previousDocument = await this.index.get(latest.id);

    this.log.info('Created new series', {
      seriesId: series.id,
      title: series.title,
      adopted: ordered.length,
      order,
    });

    return {
      kind: 'CREATED_NEW',
      decision: {
        seriesId: series.id,
        seriesTitle: series.title,
        order,
        total: order,
        previousDocument,
      },
      adoptedDocumentIds: ordered.map((match) => match.id),
    };
  }

  private async joinDecision(series: SeriesRecord): Promise<SeriesDecision> {
    const members = await this.index.getSeriesMembers(series.id);
    return this.decisionFromMembers(series, members);
  }

  private decisionFromMembers(series: SeriesRecord, members: DocumentRecord[]): SeriesDecision {
    const order = members.length + 1;
    return {
      seriesId: series.id,
      seriesTitle: series.title,
      order,
      total: order,
      previousDocument: members.length > 0 ? members[members.length - 1] : null,
    };
  }
}
