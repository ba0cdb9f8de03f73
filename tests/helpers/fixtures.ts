import { vi } from 'vitest';
import type { Embedding, TagSet } from '@/types/corpus';
import type { Logger } from '@/utils/logger';

export function silentLogger(): Logger {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

export const BASE_TAGS: TagSet = {
  magazine: 'Weekly',
  science: 'Stellar physics',
  topic: 'Exoplanets',
  content: 'Transit photometry',
};

export function tags(overrides: Partial<TagSet> = {}): TagSet {
  return { ...BASE_TAGS, ...overrides };
}

/**
 * Unit vector in 4 dimensions at `degrees` from the x axis, in the x/y plane.
 * cos(angle between two of them) is their similarity.
 */
export function angled(degrees: number): Embedding {
  const radians = (degrees * Math.PI) / 180;
  return [Math.cos(radians), Math.sin(radians), 0, 0];
}

/**
 * Vector whose cosine similarity with [1, 0, 0, 0] is exactly `similarity`
 */
export function withSimilarity(similarity: number): Embedding {
  return [similarity, Math.sqrt(1 - similarity * similarity), 0, 0];
}

export function daysAgo(days: number, now: Date): Date {
  return new Date(now.getTime() - days * 24 * 60 * 60 * 1000);
}
