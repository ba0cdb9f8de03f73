import { describe, expect, it, vi } from 'vitest';
import { ConfigError, InvalidInputError, ProviderError } from '@/errors/corpus';
import {
  EmbeddingStore,
  isRetryableProviderError,
  OpenAiEmbeddingProvider,
  type EmbeddingProvider,
} from '@/services/embedding.service';
import type { Embedding } from '@/types/corpus';
import { silentLogger } from '../../helpers/fixtures';

/** Deterministic embedding: [length, first char code] */
function fakeVector(text: string): Embedding {
  return [text.length, text.charCodeAt(0)];
}

function fakeProvider(impl?: (texts: string[]) => Promise<Embedding[]>) {
  const embed = vi.fn(impl ?? (async (texts: string[]) => texts.map(fakeVector)));
  const provider: EmbeddingProvider = { model: 'test-embedding', embed };
  return { provider, embed };
}

const noSleep = () => Promise.resolve();

function store(provider: EmbeddingProvider, options: { batchSize?: number; cacheSize?: number } = {}) {
  return new EmbeddingStore(provider, { ...options, backoff: () => 0, sleep: noSleep, logger: silentLogger() });
}

describe('EmbeddingStore.getEmbedding', () => {
  it('rejects empty and whitespace-only text', async () => {
    const { provider, embed } = fakeProvider();
    const embeddings = store(provider);

    await expect(embeddings.getEmbedding('')).rejects.toBeInstanceOf(InvalidInputError);
    await expect(embeddings.getEmbedding(' \n\t')).rejects.toBeInstanceOf(InvalidInputError);
    expect(embed).not.toHaveBeenCalled();
  });

  it('serves repeated text from the cache', async () => {
    const { provider, embed } = fakeProvider();
    const embeddings = store(provider);

    expect(await embeddings.getEmbedding('hello')).toEqual([5, 104]);
    expect(await embeddings.getEmbedding('hello')).toEqual([5, 104]);

    expect(embed).toHaveBeenCalledTimes(1);
    expect(embeddings.cacheStats()).toEqual({ size: 1, capacity: 1000, hits: 1, misses: 1 });
  });

  it('coalesces concurrent requests for the same text', async () => {
    const { provider, embed } = fakeProvider();
    const embeddings = store(provider);

    const [a, b] = await Promise.all([embeddings.getEmbedding('same'), embeddings.getEmbedding('same')]);

    expect(a).toEqual(b);
    expect(embed).toHaveBeenCalledTimes(1);
  });

  it('retries rate limiting and surfaces the error once attempts run out', async () => {
    const { provider, embed } = fakeProvider(async () => {
      throw new ProviderError('rate limited', { status: 429 });
    });
    const embeddings = store(provider);

    await expect(embeddings.getEmbedding('hello')).rejects.toMatchObject({ status: 429 });
    expect(embed).toHaveBeenCalledTimes(3);
  });

  it('does not retry client errors', async () => {
    const { provider, embed } = fakeProvider(async () => {
      throw new ProviderError('bad request', { status: 400 });
    });
    const embeddings = store(provider);

    await expect(embeddings.getEmbedding('hello')).rejects.toThrow('bad request');
    expect(embed).toHaveBeenCalledTimes(1);
  });
});

describe('EmbeddingStore.getEmbeddingsBatch', () => {
  it('keeps input order and marks blank inputs with an empty vector', async () => {
    const { provider, embed } = fakeProvider();
    const embeddings = store(provider);

    const result = await embeddings.getEmbeddingsBatch(['alpha', '', 'gamma']);

    expect(result).toEqual([[5, 97], [], [5, 103]]);
    expect(embed).toHaveBeenCalledWith(['alpha', 'gamma']);
  });

  it('serves cached texts and fetches the rest in chunks', async () => {
    const { provider, embed } = fakeProvider();
    const embeddings = store(provider, { batchSize: 2 });
    await embeddings.getEmbedding('b');

    const result = await embeddings.getEmbeddingsBatch(['a', 'b', 'cc', 'ddd', 'a']);

    expect(result).toEqual([[1, 97], [1, 98], [2, 99], [3, 100], [1, 97]]);
    expect(embed.mock.calls.map(([texts]) => texts)).toEqual([['b'], ['a', 'cc'], ['ddd']]);
  });

  it('falls back to per-item calls when a chunk fails', async () => {
    const { provider, embed } = fakeProvider(async (texts) => {
      if (texts.length > 1) throw new ProviderError('payload too large', { status: 413 });
      if (texts[0] === 'poison') throw new ProviderError('rejected', { status: 400 });
      return texts.map(fakeVector);
    });
    const embeddings = store(provider);

    const result = await embeddings.getEmbeddingsBatch(['one', 'poison', 'three']);

    expect(result).toEqual([[3, 111], [], [5, 116]]);
    expect(embed.mock.calls.map(([texts]) => texts)).toEqual([
      ['one', 'poison', 'three'],
      ['one'],
      ['poison'],
      ['three'],
    ]);
  });

  it('treats a short provider response as a failure', async () => {
    const { provider } = fakeProvider(async () => [[1, 2]]);
    const embeddings = store(provider);

    const result = await embeddings.getEmbeddingsBatch(['x', 'y']);

    // Chunk fails on count, each single-item retry then succeeds
    expect(result).toEqual([
      [1, 2],
      [1, 2],
    ]);
  });
});

describe('isRetryableProviderError', () => {
  it('retries 429, 5xx and status-less failures only', () => {
    expect(isRetryableProviderError(new ProviderError('x', { status: 429 }))).toBe(true);
    expect(isRetryableProviderError(new ProviderError('x', { status: 503 }))).toBe(true);
    expect(isRetryableProviderError(new ProviderError('network down'))).toBe(true);
    expect(isRetryableProviderError(new ProviderError('x', { status: 401 }))).toBe(false);
    expect(isRetryableProviderError(new Error('other'))).toBe(false);
  });
});

describe('OpenAiEmbeddingProvider', () => {
  const options = {
    apiKey: 'test-secret',
    apiBase: 'https://embeddings.test/v1',
    model: 'text-embedding-3-large',
    dimensions: 3,
    logger: silentLogger(),
  };

  it('requires an API key', () => {
    expect(() => new OpenAiEmbeddingProvider({ ...options, apiKey: undefined })).toThrow(ConfigError);
  });

  it('posts the batch and orders results by index', async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () =>
      Response.json({
        data: [
          { index: 1, embedding: [0, 1, 0] },
          { index: 0, embedding: [1, 0, 0] },
        ],
        usage: { total_tokens: 4 },
      })
    );
    const provider = new OpenAiEmbeddingProvider({ ...options, fetchImpl });

    const result = await provider.embed(['first', 'second']);

    expect(result).toEqual([
      [1, 0, 0],
      [0, 1, 0],
    ]);
    const [url, init] = fetchImpl.mock.calls[0];
    expect(url).toBe('https://embeddings.test/v1/embeddings');
    expect(init?.headers).toEqual({
      'Content-Type': 'application/json',
      Authorization: 'Bearer test-secret',
    });
    expect(init?.body).toBe(
      JSON.stringify({ input: ['first', 'second'], model: 'text-embedding-3-large', dimensions: 3 })
    );
  });

  it('raises ProviderError carrying the HTTP status', async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => new Response('slow down', { status: 429 }));
    const provider = new OpenAiEmbeddingProvider({ ...options, fetchImpl });

    await expect(provider.embed(['x'])).rejects.toMatchObject({
      name: 'ProviderError',
      status: 429,
      message: 'Embedding API error 429: slow down',
    });
  });

  it('raises a status-less ProviderError on network failure', async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => {
      throw new TypeError('fetch failed');
    });
    const provider = new OpenAiEmbeddingProvider({ ...options, fetchImpl });

    const error = await provider.embed(['x']).catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(ProviderError);
    expect(isRetryableProviderError(error)).toBe(true);
  });
});
