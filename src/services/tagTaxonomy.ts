/**
 * Tag Taxonomy
 *
 * Normalization, validation and synonym canonicalization for the
 * four-level tag tuple (magazine / science / topic / content).
 *
 * The synonym map is owned by a TagSynonymCache instance that the engine
 * constructs once and injects wherever tags are prepared for storage.
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { TagValidationError } from '@/errors/corpus';
import { TAG_LEVELS, type TagLevel, type TagSet } from '@/types/corpus';
import { createLogger, errorMessage, type Logger } from '@/utils/logger';

// =====================================================
// NORMALIZATION
// =====================================================

export type TagLimits = Record<TagLevel, number>;

export const DEFAULT_TAG_LIMITS: TagLimits = {
  magazine: 50,
  science: 50,
  topic: 50,
  content: 100,
};

/**
 * Trim, fold full-width spaces (U+3000) and collapse whitespace runs
 */
export function normalizeTag(tag: string): string {
  return tag.replace(/\u3000/g, ' ').replace(/\s+/g, ' ').trim();
}

/** Length in code points, matching VARCHAR(n) semantics */
function tagLength(value: string): number {
  return Array.from(value).length;
}

/**
 * Normalize every level and enforce non-empty / length limits
 *
 * @throws TagValidationError naming the first failing level
 */
export function validateTagSet(tags: TagSet, limits: TagLimits = DEFAULT_TAG_LIMITS): TagSet {
  const normalized = normalizeTagSet(tags);

  for (const level of TAG_LEVELS) {
    const value = normalized[level];
    if (value.length === 0) {
      throw new TagValidationError(level, 'empty', `Tag level "${level}" is empty`);
    }
    const length = tagLength(value);
    if (length > limits[level]) {
      throw new TagValidationError(
        level,
        'too_long',
        `Tag level "${level}" exceeds ${limits[level]} characters (got ${length})`
      );
    }
  }

  return normalized;
}

function normalizeTagSet(tags: TagSet): TagSet {
  return {
    magazine: normalizeTag(tags.magazine),
    science: normalizeTag(tags.science),
    topic: normalizeTag(tags.topic),
    content: normalizeTag(tags.content),
  };
}

// =====================================================
// SYNONYMS
// =====================================================

export type SynonymMap = ReadonlyMap<string, string>;

/** `{ canonical: [synonym, ...] }` */
const synonymTableSchema = z.record(z.string(), z.array(z.string()));

export type SynonymTable = z.infer<typeof synonymTableSchema>;

/** Resolves the raw synonym table; null when no table exists */
export type SynonymSource = () => Promise<unknown>;

/**
 * Look up a tag's canonical form; unknown tags pass through unchanged
 */
export function canonicalizeTag(tag: string, synonyms: SynonymMap): string {
  return synonyms.get(tag) ?? tag;
}

/**
 * Build the synonym → canonical lookup. Canonical tags map to themselves.
 */
export function buildSynonymMap(table: SynonymTable): Map<string, string> {
  const map = new Map<string, string>();
  for (const [rawCanonical, synonyms] of Object.entries(table)) {
    const canonical = normalizeTag(rawCanonical);
    for (const synonym of synonyms) {
      map.set(normalizeTag(synonym), canonical);
    }
    map.set(canonical, canonical);
  }
  return map;
}

/**
 * Synonym source backed by a JSON file; a missing file means "no synonyms"
 */
export function fileSynonymSource(path: string): SynonymSource {
  return async () => {
    try {
      const raw = await readFile(path, 'utf-8');
      return JSON.parse(raw);
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return null;
      }
      throw error;
    }
  };
}

/**
 * Process-scoped synonym cache
 *
 * Loads lazily on first use, keeps the built map until reload().
 * Load failures are logged and produce an empty map so ingestion proceeds
 * with uncanonicalized tags.
 */
export class TagSynonymCache {
  private map: SynonymMap | null = null;
  private pending: Promise<SynonymMap> | null = null;
  private readonly log: Logger;

  constructor(
    private readonly source: SynonymSource,
    log?: Logger,
  ) {
    this.log = log ?? createLogger('tag-taxonomy');
  }

  async get(): Promise<SynonymMap> {
    if (this.map) return this.map;
    if (!this.pending) {
      this.pending = this.load().finally(() => {
        this.pending = null;
      });
    }
    return this.pending;
  }

  /**
   * Drop the cached map and load the table again
   */
  async reload(): Promise<SynonymMap> {
    this.map = null;
    return this.get();
  }

  /** Entries in the cached map, 0 before the first load */
  get size(): number {
    return this.map?.size ?? 0;
  }

  private async load(): Promise<SynonymMap> {
    let map: SynonymMap = new Map();

    try {
      const raw = await this.source();
      if (raw !== null) {
        const parsed = synonymTableSchema.safeParse(raw);
        if (parsed.success) {
          map = buildSynonymMap(parsed.data);
          this.log.info('Tag synonyms loaded', { mappings: map.size });
        } else {
          this.log.warn('Tag synonym table has an invalid shape', {
            issues: parsed.error.issues.map((issue) => issue.message),
          });
        }
      }
    } catch (error) {
      this.log.warn('Tag synonym load failed', { error: errorMessage(error) });
    }

    this.map = map;
    return map;
  }
}

// =====================================================
// PREPARATION
// =====================================================

/**
 * Normalize → canonicalize → validate; the form every stored TagSet takes
 */
export async function prepareTagSet(
  raw: TagSet,
  synonyms: TagSynonymCache,
  limits: TagLimits = DEFAULT_TAG_LIMITS
): Promise<TagSet> {
  const map = await synonyms.get();
  const canonical: TagSet = {
    magazine: canonicalizeTag(normalizeTag(raw.magazine), map),
    science: canonicalizeTag(normalizeTag(raw.science), map),
    topic: canonicalizeTag(normalizeTag(raw.topic), map),
    content: canonicalizeTag(normalizeTag(raw.content), map),
  };
  return validateTagSet(canonical, limits);
}
