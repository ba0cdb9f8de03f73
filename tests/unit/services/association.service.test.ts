import { beforeEach, describe, expect, it, vi } from 'vitest';
import {
  AssociationRetriever,
  countTagMatches,
  relationTierFor,
} from '@/services/association.service';
import { MemoryVectorIndex } from '../../helpers/memoryIndex';
import { angled, silentLogger, tags } from '../../helpers/fixtures';

describe('countTagMatches', () => {
  it('counts exactly equal levels', () => {
    expect(countTagMatches(tags(), tags())).toBe(4);
    expect(countTagMatches(tags(), tags({ content: 'Radial velocity' }))).toBe(3);
    expect(countTagMatches(tags(), tags({ magazine: 'Monthly', topic: 'Pulsars', content: 'Timing' }))).toBe(1);
  });

  it('is case sensitive', () => {
    expect(countTagMatches(tags({ topic: 'exoplanets' }), tags())).toBe(3);
  });
});

describe('relationTierFor', () => {
  it('maps match counts to tiers', () => {
    expect([4, 3, 2, 1, 0].map(relationTierFor)).toEqual(['STRONG', 'MEDIUM', 'WEAK', null, null]);
  });
});

describe('AssociationRetriever.findRelated', () => {
  let index: MemoryVectorIndex;
  let retriever: AssociationRetriever;

  beforeEach(() => {
    index = new MemoryVectorIndex();
    retriever = new AssociationRetriever(index, silentLogger());
  });

  it('classifies a three-level match as MEDIUM', async () => {
    index.seed({
      id: 'doc-nlp',
      title: 'Tokenizers compared',
      summaryText: 'summary',
      tags: { magazine: 'Tech', science: 'AI', topic: 'NLP', content: 'X' },
      embedding: angled(10),
    });

    const related = await retriever.findRelated(
      { magazine: 'Tech', science: 'AI', topic: 'NLP', content: 'GPT' },
      angled(0)
    );

    expect(related).toHaveLength(1);
    expect(related[0].document.id).toBe('doc-nlp');
    expect(related[0].tagMatchCount).toBe(3);
    expect(related[0].relationTier).toBe('MEDIUM');
    expect(related[0].similarity).toBeCloseTo(Math.cos((10 * Math.PI) / 180), 10);
  });

  it('ranks by similarity, drops single matches and honours topK', async () => {
    index.seed({ id: 'far', title: 'far', summaryText: 's', tags: tags(), embedding: angled(60) });
    index.seed({ id: 'near', title: 'near', summaryText: 's', tags: tags({ content: 'Other' }), embedding: angled(5) });
    index.seed({ id: 'mid', title: 'mid', summaryText: 's', tags: tags({ topic: 'T', content: 'C' }), embedding: angled(30) });
    index.seed({
      id: 'single',
      title: 'single',
      summaryText: 's',
      tags: tags({ science: 'S', topic: 'T', content: 'C' }),
      embedding: angled(0),
    });

    const related = await retriever.findRelated(tags(), angled(0), undefined, 2);

    expect(related.map((row) => [row.document.id, row.relationTier])).toEqual([
      ['near', 'MEDIUM'],
      ['mid', 'WEAK'],
    ]);
  });

  it('excludes the document itself', async () => {
    index.seed({ id: 'self', title: 'self', summaryText: 's', tags: tags(), embedding: angled(0) });

    expect(await retriever.findRelated(tags(), angled(0), 'self')).toEqual([]);
  });

  it('misses documents matching only on topic and content', async () => {
    index.seed({
      id: 'lower-levels',
      title: 'lower levels only',
      summaryText: 's',
      tags: tags({ magazine: 'Monthly', science: 'Planetary science' }),
      embedding: angled(0),
    });

    expect(await retriever.findRelated(tags(), angled(0))).toEqual([]);
  });

  it('returns nothing for a non-positive topK or an empty embedding', async () => {
    const spy = vi.spyOn(index, 'findRelated');

    expect(await retriever.findRelated(tags(), angled(0), undefined, 0)).toEqual([]);
    expect(await retriever.findRelated(tags(), [])).toEqual([]);
    expect(spy).not.toHaveBeenCalled();
  });

  it('fails open when the index is unavailable', async () => {
    const log = silentLogger();
    retriever = new AssociationRetriever(index, log);
    index.failing = true;

    expect(await retriever.findRelated(tags(), angled(0))).toEqual([]);
    expect(log.error).toHaveBeenCalledWith('Related document query failed', {
      error: 'Vector index unavailable',
    });
  });
});

describe('AssociationRetriever.findDuplicate', () => {
  const match = { id: 'dup', title: 'Duplicate', sourceUrl: null };
  let index: MemoryVectorIndex;
  let retriever: AssociationRetriever;

  beforeEach(() => {
    index = new MemoryVectorIndex();
    retriever = new AssociationRetriever(index, silentLogger());
  });

  it('reports a neighbour at exactly the threshold', async () => {
    vi.spyOn(index, 'findNearest').mockResolvedValue({ ...match, similarity: 0.95 });

    expect(await retriever.findDuplicate(angled(0))).toEqual({ ...match, similarity: 0.95 });
  });

  it('ignores a neighbour just below the threshold', async () => {
    vi.spyOn(index, 'findNearest').mockResolvedValue({ ...match, similarity: 0.9499 });

    expect(await retriever.findDuplicate(angled(0))).toBeNull();
  });

  it('passes the excluded id to the index and accepts a custom threshold', async () => {
    const spy = vi.spyOn(index, 'findNearest').mockResolvedValue({ ...match, similarity: 0.9 });

    expect(await retriever.findDuplicate(angled(0), 0.85, 'candidate')).toEqual({ ...match, similarity: 0.9 });
    expect(spy).toHaveBeenCalledWith(angled(0), 'candidate');
  });

  it('finds an identical stored document', async () => {
    index.seed({ id: 'twin', title: 'Twin', summaryText: 's', tags: tags(), embedding: angled(20) });

    const duplicate = await retriever.findDuplicate(angled(20));
    expect(duplicate?.id).toBe('twin');
  });

  it('returns null for an empty corpus or a failing index', async () => {
    expect(await retriever.findDuplicate(angled(0))).toBeNull();

    index.failing = true;
    expect(await retriever.findDuplicate(angled(0))).toBeNull();
  });
});
