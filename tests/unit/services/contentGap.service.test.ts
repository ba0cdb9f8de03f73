import { beforeEach, describe, expect, it, vi } from 'vitest';
import { InsufficientCorpusError } from '@/errors/corpus';
import {
  analyzeTagGaps,
  ContentGapAnalyzer,
  countTagCombos,
  describeGaps,
  mergeGaps,
  normalizeScores,
  stalenessWeight,
  type NarrativeRenderer,
} from '@/services/contentGap.service';
import type { ContentGap, TaggedDate, TopicRecommendation } from '@/types/corpus';
import { MemoryVectorIndex } from '../../helpers/memoryIndex';
import { angled, daysAgo, silentLogger, tags } from '../../helpers/fixtures';

const NOW = new Date('2026-01-31T00:00:00Z');

function gap(overrides: Partial<ContentGap>): ContentGap {
  return { kind: 'TAG_GAP', description: 'gap', score: 0, ...overrides };
}

function seedCorpus(index: MemoryVectorIndex, count: number): void {
  for (let i = 0; i < count; i += 1) {
    index.seed({
      id: `doc-${i}`,
      title: `Doc ${i}`,
      summaryText: `summary ${i}`,
      tags: tags({ magazine: i % 2 === 0 ? 'Weekly' : 'Monthly', topic: `Topic ${i % 3}` }),
      embedding: angled(i * 10),
      createdAt: daysAgo(i * 5, NOW),
    });
  }
}

describe('stalenessWeight', () => {
  it('scales by whole days over a 30-day period', () => {
    expect(stalenessWeight(daysAgo(45, NOW), NOW)).toBe(1.5);
    expect(stalenessWeight(daysAgo(45.9, NOW), NOW)).toBe(1.5);
  });

  it('clamps to [0.1, 3.0]', () => {
    expect(stalenessWeight(daysAgo(0, NOW), NOW)).toBe(0.1);
    expect(stalenessWeight(daysAgo(2, NOW), NOW)).toBe(0.1);
    expect(stalenessWeight(daysAgo(120, NOW), NOW)).toBe(3.0);
  });

  it('is neutral without a timestamp', () => {
    expect(stalenessWeight(null, NOW)).toBe(1.0);
  });
});

describe('analyzeTagGaps', () => {
  const rows: TaggedDate[] = [
    { tags: tags(), createdAt: daysAgo(90, NOW) },
    { tags: tags({ content: 'Radial velocity' }), createdAt: daysAgo(60, NOW) },
    { tags: tags(), createdAt: daysAgo(120, NOW) },
    { tags: tags({ topic: 'Pulsars' }), createdAt: daysAgo(3, NOW) },
    { tags: tags({ topic: 'Quasars' }), createdAt: null },
    { tags: tags({ topic: 'Quasars' }), createdAt: null },
  ];

  it('groups by the top three levels and scores rarity times staleness', () => {
    const gaps = analyzeTagGaps(rows, NOW);

    expect(gaps.map((g) => [g.description, g.score])).toEqual([
      ['Weekly/Stellar physics/Exoplanets (3 documents)', 0.5],
      ['Weekly/Stellar physics/Quasars (2 documents)', 1 / 3],
      ['Weekly/Stellar physics/Pulsars (1 documents)', 0.05],
    ]);
    expect(gaps[0].tags).toEqual({ magazine: 'Weekly', science: 'Stellar physics', topic: 'Exoplanets' });
  });

  it('counts distinct magazine/science pairs', () => {
    expect(countTagCombos(rows)).toBe(1);
    expect(countTagCombos([...rows, { tags: tags({ magazine: 'Monthly' }), createdAt: null }])).toBe(2);
  });
});

describe('normalizeScores', () => {
  it('maps scores onto [0, 1]', () => {
    const normalized = normalizeScores([gap({ score: 2 }), gap({ score: 4 }), gap({ score: 6 })]);
    expect(normalized.map((g) => g.score)).toEqual([0, 0.5, 1]);
  });

  it('maps a constant signal to 1.0', () => {
    expect(normalizeScores([gap({ score: 0.3 }), gap({ score: 0.3 })]).map((g) => g.score)).toEqual([1, 1]);
    expect(normalizeScores([])).toEqual([]);
  });
});

describe('mergeGaps', () => {
  const exoplanets = { magazine: 'Weekly', science: 'Stellar physics', topic: 'Exoplanets' };
  const pulsars = { magazine: 'Weekly', science: 'Stellar physics', topic: 'Pulsars' };
  const quasars = { magazine: 'Weekly', science: 'Stellar physics', topic: 'Quasars' };

  const tagGaps = [
    gap({ description: 'exoplanet tags', score: 4, tags: exoplanets }),
    gap({ description: 'pulsar tags', score: 2, tags: pulsars }),
  ];
  const vectorGaps = [
    gap({
      kind: 'VECTOR_GAP',
      description: 'sparse exoplanet region',
      score: 0.3,
      tags: { ...exoplanets, content: 'Direct imaging' },
      referenceTitle: 'Imaging a cold giant',
    }),
    gap({ kind: 'VECTOR_GAP', description: 'sparse quasar region', score: 0.1, tags: quasars }),
  ];

  it('weights both signals and sums entries sharing a top-three key', () => {
    const merged = mergeGaps(tagGaps, vectorGaps, 5);

    expect(merged).toHaveLength(3);
    expect(merged[0]).toMatchObject({
      kind: 'MERGED',
      description: 'exoplanet tags + sparse exoplanet region',
      tags: exoplanets,
      referenceTitle: 'Imaging a cold giant',
    });
    expect(merged[0].score).toBeCloseTo(1.0, 10);
    expect(merged.slice(1).map((g) => [g.description, g.score])).toEqual([
      ['pulsar tags', 0],
      ['sparse quasar region', 0],
    ]);
  });

  it('truncates to topN', () => {
    expect(mergeGaps(tagGaps, vectorGaps, 1)).toHaveLength(1);
    expect(mergeGaps(tagGaps, vectorGaps, 0)).toEqual([]);
  });

  it('keys untagged gaps by description', () => {
    const merged = mergeGaps([gap({ description: 'loose', score: 1 })], [gap({ description: 'loose', score: 1 })]);
    expect(merged).toHaveLength(1);
    expect(merged[0].score).toBeCloseTo(1.0, 10);
  });
});

describe('describeGaps', () => {
  it('renders a numbered digest', () => {
    const text = describeGaps([
      gap({
        description: 'Weekly/Stellar physics/Exoplanets (3 documents)',
        score: 0.5,
        tags: { magazine: 'Weekly', science: 'Stellar physics', topic: 'Exoplanets' },
      }),
      gap({ kind: 'VECTOR_GAP', description: 'sparse', score: 0.12345, referenceTitle: 'Ref' }),
    ]);

    expect(text).toBe(
      [
        '1. [TAG_GAP] Weekly/Stellar physics/Exoplanets (3 documents) (score: 0.500)',
        '   tags: Weekly/Stellar physics/Exoplanets',
        '2. [VECTOR_GAP] sparse (score: 0.123)',
        '   reference: "Ref"',
      ].join('\n')
    );
  });
});

describe('ContentGapAnalyzer', () => {
  let index: MemoryVectorIndex;

  beforeEach(() => {
    index = new MemoryVectorIndex(() => NOW);
  });

  function analyzer(renderer?: NarrativeRenderer) {
    return new ContentGapAnalyzer(index, { renderer, logger: silentLogger(), now: () => NOW });
  }

  it('refuses to analyze a corpus under ten documents', async () => {
    seedCorpus(index, 9);

    const error = await analyzer()
      .analyze()
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(InsufficientCorpusError);
    expect(error).toMatchObject({ documentCount: 9, minimum: 10, code: 'INSUFFICIENT_CORPUS' });
  });

  it('analyzes a corpus of exactly ten documents', async () => {
    seedCorpus(index, 10);
    const gapAnalyzer = analyzer();

    const gaps = await gapAnalyzer.analyze(3);

    expect(gaps.length).toBeGreaterThan(0);
    expect(gaps.length).toBeLessThanOrEqual(3);
    const scores = gaps.map((g) => g.score);
    expect(scores).toEqual([...scores].sort((a, b) => b - a));
    expect(gapAnalyzer.lastRun).toEqual({ documentCount: 10, tagComboCount: 2 });
  });

  it('keeps only sparse frontier documents as vector gaps', async () => {
    const centroid = [1, 0, 0, 0];
    vi.spyOn(index, 'computeCentroid').mockResolvedValue(centroid);
    const frontier = vi.spyOn(index, 'findFrontier').mockResolvedValue([
      { id: 'a', title: 'Alone', tags: tags(), distanceFromCentroid: 0.8, nearestNeighborSimilarity: 0.5 },
      { id: 'b', title: 'Crowded', tags: tags(), distanceFromCentroid: 0.9, nearestNeighborSimilarity: 0.7 },
      { id: 'c', title: 'Remote', tags: tags(), distanceFromCentroid: 0.3, nearestNeighborSimilarity: 0.2 },
    ]);

    const gaps = await analyzer().analyzeVectorGaps(2);

    expect(frontier).toHaveBeenCalledWith(centroid, 6);
    expect(gaps.map((g) => g.referenceTitle)).toEqual(['Alone', 'Remote']);
    expect(gaps[0]).toMatchObject({
      kind: 'VECTOR_GAP',
      description: 'sparse region (centroid distance 0.800, nearest neighbour similarity 0.500)',
      score: 0.4,
      tags: tags(),
    });
    expect(gaps[1].score).toBeCloseTo(0.24, 10);
  });

  it('skips vector gaps when there is no centroid', async () => {
    expect(await analyzer().analyzeVectorGaps()).toEqual([]);
  });

  it('passes gaps and recent titles to the renderer', async () => {
    seedCorpus(index, 10);
    const recommendation: TopicRecommendation = {
      topic: 'Pulsar timing arrays',
      rationale: 'Not covered for months',
      suggestedTags: tags({ topic: 'Pulsars', content: 'Timing arrays' }),
      priority: 'high',
    };
    const render = vi.fn<NarrativeRenderer['render']>().mockResolvedValue([recommendation]);

    const result = await analyzer({ render }).recommendTopics(3);

    expect(result).toEqual([recommendation]);
    expect(render).toHaveBeenCalledTimes(1);
    const [request] = render.mock.calls[0];
    expect(request.topN).toBe(3);
    expect(request.recentTitles).toEqual(Array.from({ length: 10 }, (_, i) => `Doc ${i}`));
    expect(request.gaps.length).toBeGreaterThan(0);
  });

  it('returns no recommendations without a renderer', async () => {
    seedCorpus(index, 10);
    expect(await analyzer().recommendTopics()).toEqual([]);
  });
});
