/**
 * Embedding Service
 *
 * Content-addressed cache + batched retrieval around an embedding provider.
 *
 * Features:
 * - OpenAI-compatible /embeddings provider (text-embedding-3-large, 3072 dims)
 * - SHA-256 keyed LRU cache consulted before every network call
 * - Bounded exponential retry on 429 / 5xx / network failures
 * - Batch calls split into provider-sized chunks; a failed chunk degrades to
 *   per-item calls and items that still fail come back as `[]`
 * - Concurrent requests for the same text share one in-flight fetch
 */

import { createHash } from 'node:crypto';
import { z } from 'zod';
import { ConfigError, InvalidInputError, ProviderError } from '@/errors/corpus';
import type { Embedding } from '@/types/corpus';
import { LruCache, type CacheStats } from '@/utils/lruCache';
import { createLogger, errorMessage, type Logger } from '@/utils/logger';
import { exponentialBackoff, withRetry } from '@/utils/retry';

// =====================================================
// PROVIDER
// =====================================================

/**
 * One provider round-trip: embeddings for `texts`, same length and order
 */
export interface EmbeddingProvider {
  readonly model: string;
  embed(texts: string[]): Promise<Embedding[]>;
}

export interface OpenAiEmbeddingProviderOptions {
  apiKey?: string;
  apiBase: string;
  model: string;
  dimensions: number;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
  logger?: Logger;
}

const embeddingResponseSchema = z.object({
  data: z
    .array(
      z.object({
        index: z.number().int().nonnegative(),
        embedding: z.array(z.number()),
      })
    )
    .min(1),
  usage: z.object({ total_tokens: z.number() }).optional(),
});

/**
 * OpenAI-compatible embeddings endpoint
 */
export class OpenAiEmbeddingProvider implements EmbeddingProvider {
  readonly model: string;
  private readonly apiKey: string;
  private readonly fetchImpl: typeof fetch;
  private readonly log: Logger;

  constructor(private readonly options: OpenAiEmbeddingProviderOptions) {
    if (!options.apiKey) {
      throw new ConfigError('EMBEDDING_API_KEY is not set. Cannot generate embeddings.');
    }
    this.apiKey = options.apiKey;
    this.model = options.model;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.log = options.logger ?? createLogger('embedding');
  }

  async embed(texts: string[]): Promise<Embedding[]> {
    let response: Response;
    try {
      response = await this.fetchImpl(`${this.options.apiBase}/embeddings`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${this.apiKey}`,
        },
        body: JSON.stringify({
          input: texts,
          model: this.model,
          dimensions: this.options.dimensions,
        }),
        signal: AbortSignal.timeout(this.options.timeoutMs ?? 60_000),
      });
    } catch (error) {
      // Network failure or timeout; no status
      throw new ProviderError(`Embedding request failed: ${errorMessage(error)}`, { cause: error });
    }

    if (!response.ok) {
      const body = await response.text();
      throw new ProviderError(`Embedding API error ${response.status}: ${body.slice(0, 500)}`, {
        status: response.status,
      });
    }

    const parsed = embeddingResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new ProviderError('Embedding API returned an unexpected payload', { cause: parsed.error });
    }

    const ordered = [...parsed.data.data].sort((a, b) => a.index - b.index);
    this.log.debug('Embedding request complete', {
      items: ordered.length,
      tokens: parsed.data.usage?.total_tokens,
      dimensions: ordered[0]?.embedding.length,
    });
    return ordered.map((item) => item.embedding);
  }
}

/**
 * Retry on rate limiting, server errors and status-less (network) failures
 */
export function isRetryableProviderError(error: unknown): boolean {
  if (!(error instanceof ProviderError)) return false;
  if (error.status === undefined) return true;
  return error.status === 429 || error.status >= 500;
}

// =====================================================
// STORE
// =====================================================

export interface EmbeddingStoreOptions {
  cacheSize?: number;
  batchSize?: number;
  maxAttempts?: number;
  backoff?: (attempt: number) => number;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

interface PendingText {
  key: string;
  text: string;
  indices: number[];
}

function hashText(text: string): string {
  return createHash('sha256').update(text, 'utf8').digest('hex');
}

function isBlank(text: string): boolean {
  return text.trim().length === 0;
}

export class EmbeddingStore {
  private readonly cache: LruCache<string, Embedding>;
  private readonly inFlight = new Map<string, Promise<Embedding>>();
  private readonly batchSize: number;
  private readonly maxAttempts: number;
  private readonly backoff: (attempt: number) => number;
  private readonly sleep?: (ms: number) => Promise<void>;
  private readonly log: Logger;

  constructor(
    private readonly provider: EmbeddingProvider,
    options: EmbeddingStoreOptions = {}
  ) {
    this.cache = new LruCache(options.cacheSize ?? 1000);
    this.batchSize = Math.max(1, options.batchSize ?? 100);
    this.maxAttempts = options.maxAttempts ?? 3;
    this.backoff = options.backoff ?? exponentialBackoff(2000, 30000);
    this.sleep = options.sleep;
    this.log = options.logger ?? createLogger('embedding');
  }

  /**
   * Embedding for a single text
   *
   * @throws InvalidInputError for empty or whitespace-only text
   * @throws ProviderError once the retry budget is exhausted
   */
  async getEmbedding(text: string): Promise<Embedding> {
    if (isBlank(text)) {
      throw new InvalidInputError('Embedding input text must not be empty');
    }

    const key = hashText(text);
    const cached = this.cache.get(key);
    if (cached) {
      this.log.debug('Embedding cache hit');
      return cached;
    }

    const existing = this.inFlight.get(key);
    if (existing) return existing;

    const request = this.fetchWithRetry([text])
      .then(([embedding]) => {
        this.cache.set(key, embedding);
        return embedding;
      })
      .finally(() => {
        this.inFlight.delete(key);
      });

    this.inFlight.set(key, request);
    return request;
  }

  /**
   * Embeddings for many texts, positionally aligned with the input
   *
   * Blank inputs and items the provider keeps rejecting come back as `[]`.
   */
  async getEmbeddingsBatch(texts: string[]): Promise<Embedding[]> {
    const results: Embedding[] = texts.map(() => []);
    const pending: PendingText[] = [];
    const pendingByKey = new Map<string, PendingText>();

    texts.forEach((text, index) => {
      if (isBlank(text)) return;

      const key = hashText(text);
      const queued = pendingByKey.get(key);
      if (queued) {
        queued.indices.push(index);
        return;
      }

      const cached = this.cache.get(key);
      if (cached) {
        results[index] = cached;
        return;
      }

      const entry: PendingText = { key, text, indices: [index] };
      pending.push(entry);
      pendingByKey.set(key, entry);
    });

    for (let start = 0; start < pending.length; start += this.batchSize) {
      const chunk = pending.slice(start, start + this.batchSize);
      const embeddings = await this.fetchChunk(chunk.map((entry) => entry.text));

      chunk.forEach((entry, offset) => {
        const embedding = embeddings[offset];
        if (embedding.length === 0) return;
        this.cache.set(entry.key, embedding);
        for (const index of entry.indices) {
          results[index] = embedding;
        }
      });
    }

    const failed = results.filter((embedding) => embedding.length === 0).length;
    this.log.info('Batch embedding complete', {
      requested: texts.length,
      fetched: pending.length,
      failed,
    });

    return results;
  }

  cacheStats(): CacheStats {
    return this.cache.stats();
  }

  clearCache(): void {
    this.cache.clear();
  }

  /**
   * One chunk; on failure every item is retried on its own
   */
  private async fetchChunk(texts: string[]): Promise<Embedding[]> {
    try {
      return await this.fetchWithRetry(texts);
    } catch (error) {
      this.log.warn('Embedding chunk failed, retrying items individually', {
        items: texts.length,
        error: errorMessage(error),
      });
    }

    const embeddings: Embedding[] = [];
    for (const [offset, text] of texts.entries()) {
      try {
        const [embedding] = await this.fetchWithRetry([text]);
        embeddings.push(embedding);
      } catch (error) {
        this.log.error('Embedding item failed', { offset, error: errorMessage(error) });
        embeddings.push([]);
      }
    }
    return embeddings;
  }

  private async fetchWithRetry(texts: string[]): Promise<Embedding[]> {
    try {
      return await withRetry(
        async () => {
          const embeddings = await this.provider.embed(texts);
          if (embeddings.length !== texts.length || embeddings.some((e) => e.length === 0)) {
            throw new ProviderError(
              `Embedding provider returned ${embeddings.length} vectors for ${texts.length} inputs`
            );
          }
          return embeddings;
        },
        {
          maxAttempts: this.maxAttempts,
          backoff: this.backoff,
          shouldRetry: isRetryableProviderError,
          sleep: this.sleep,
          onRetry: (error, attempt, delayMs) => {
            this.log.warn('Embedding call failed, backing off', {
              attempt,
              delayMs,
              error: errorMessage(error),
            });
          },
        }
      );
    } catch (error) {
      if (error instanceof ProviderError) throw error;
      throw new ProviderError(`Embedding provider failed: ${errorMessage(error)}`, { cause: error });
    }
  }
}
