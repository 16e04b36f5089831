import { createHash } from 'crypto';
import { z } from 'zod';
import type { EmbeddingsConfig } from './config-types.js';
import { NetworkError, ValidationError } from './errors.js';
import { logWarn } from './fault-logger.js';
import { assertDimensions, normalizeVector } from './vectors.js';

/**
 * Text -> fixed-length vector. Must be deterministic enough for rankings to
 * be stable across runs; callers add their own retry policy.
 */
export type EmbedFn = (text: string) => Promise<number[]>;

const EmbeddingResponseSchema = z.object({
  data: z
    .array(
      z.object({
        embedding: z.array(z.number()),
        index: z.number().optional(),
      })
    )
    .min(1),
});

/**
 * Build the OpenAI-compatible /embeddings endpoint from a base URL.
 * A URL that already ends in /embeddings is used as-is.
 */
export function embeddingsEndpoint(apiUrl: string): string {
  const base = apiUrl.replace(/\/+$/, '');
  return base.endsWith('/embeddings') ? base : `${base}/embeddings`;
}

export function buildApiHeaders(apiKey?: string): Record<string, string> {
  const headers: Record<string, string> = {
    'Content-Type': 'application/json',
  };
  if (apiKey) {
    headers['Authorization'] = `Bearer ${apiKey}`;
  }
  return headers;
}

/**
 * Fetch with timeout
 */
export async function fetchWithTimeout(
  url: string,
  options: RequestInit,
  timeoutMs: number
): Promise<Response> {
  try {
    return await fetch(url, { ...options, signal: AbortSignal.timeout(timeoutMs) });
  } catch (error) {
    if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
      throw new NetworkError(`Request timeout after ${timeoutMs}ms`, undefined, { url });
    }
    throw error;
  }
}

/**
 * Simple LRU cache keyed by SHA-256 of model + text.
 */
export class EmbeddingCache {
  private readonly entries = new Map<string, number[]>();

  constructor(private readonly maxSize: number) {}

  static key(model: string, text: string): string {
    return `${model}:${createHash('sha256').update(text).digest('hex')}`;
  }

  get(key: string): number[] | undefined {
    const value = this.entries.get(key);
    if (value) {
      // Move to end (most recently used)
      this.entries.delete(key);
      this.entries.set(key, value);
    }
    return value;
  }

  set(key: string, value: number[]): void {
    if (this.maxSize <= 0) return;
    if (this.entries.has(key)) {
      this.entries.delete(key);
    } else if (this.entries.size >= this.maxSize) {
      // Evict oldest
      const firstKey = this.entries.keys().next().value;
      if (firstKey !== undefined) this.entries.delete(firstKey);
    }
    this.entries.set(key, value);
  }

  get size(): number {
    return this.entries.size;
  }
}

/**
 * Embedder backed by an OpenAI-compatible /embeddings endpoint (Ollama,
 * LM Studio, llama.cpp, OpenAI). Every vector is checked against
 * `dimensions`; a mismatch throws DimensionMismatchError. With
 * `normalize` set, vectors are scaled to unit length before they are
 * cached and returned.
 */
export function createApiEmbedder(config: EmbeddingsConfig, dimensions: number): EmbedFn {
  const endpoint = embeddingsEndpoint(config.api_url);
  const headers = buildApiHeaders(config.api_key);
  const cache = new EmbeddingCache(config.cache_size);

  return async (text: string): Promise<number[]> => {
    const cacheKey = EmbeddingCache.key(config.model, text);
    const cached = cache.get(cacheKey);
    if (cached) return cached;

    const response = await fetchWithTimeout(
      endpoint,
      {
        method: 'POST',
        headers,
        body: JSON.stringify({ model: config.model, input: [text] }),
      },
      config.timeout_ms
    );

    if (!response.ok) {
      const error = await response.text().catch(() => '');
      throw new NetworkError(
        `Embedding API error: ${response.status} - ${error}`,
        response.status
      );
    }

    const parsed = EmbeddingResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      logWarn('embeddings', 'Unexpected embedding response shape', { endpoint });
      throw new ValidationError('Embedding API returned an unexpected response');
    }

    const raw = parsed.data.data[0].embedding;
    assertDimensions(raw, dimensions);
    const embedding = config.normalize ? normalizeVector(raw) : raw;
    cache.set(cacheKey, embedding);
    return embedding;
  };
}
