import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  EmbeddingCache,
  buildApiHeaders,
  createApiEmbedder,
  embeddingsEndpoint,
  fetchWithTimeout,
} from './embeddings.js';
import type { EmbeddingsConfig } from './config-types.js';
import { DimensionMismatchError, NetworkError, ValidationError } from './errors.js';

const CONFIG: EmbeddingsConfig = {
  api_url: 'http://localhost:11434/v1/',
  model: 'test-embed',
  api_key: 'test-key',
  timeout_ms: 1000,
  cache_size: 2,
  normalize: false,
};

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

describe('embeddings', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('helpers', () => {
    it('derives the /embeddings endpoint', () => {
      expect(embeddingsEndpoint('http://localhost:11434/v1/')).toBe('http://localhost:11434/v1/embeddings');
      expect(embeddingsEndpoint('https://api.example.com/v1/embeddings')).toBe(
        'https://api.example.com/v1/embeddings'
      );
    });

    it('adds a bearer token only when a key is set', () => {
      expect(buildApiHeaders()).toEqual({ 'Content-Type': 'application/json' });
      expect(buildApiHeaders('test-key')).toEqual({
        'Content-Type': 'application/json',
        Authorization: 'Bearer test-key',
      });
    });

    it('turns a timeout into NetworkError', async () => {
      const timeout = new Error('timed out');
      timeout.name = 'TimeoutError';
      vi.spyOn(globalThis, 'fetch').mockRejectedValue(timeout);
      await expect(fetchWithTimeout('http://localhost/x', {}, 250)).rejects.toThrow(
        'Request timeout after 250ms'
      );
    });
  });

  describe('EmbeddingCache', () => {
    it('evicts the least recently used entry', () => {
      const cache = new EmbeddingCache(2);
      cache.set('a', [1]);
      cache.set('b', [2]);
      cache.get('a');
      cache.set('c', [3]);
      expect(cache.get('b')).toBeUndefined();
      expect(cache.get('a')).toEqual([1]);
      expect(cache.size).toBe(2);
    });

    it('stores nothing with size 0', () => {
      const cache = new EmbeddingCache(0);
      cache.set('a', [1]);
      expect(cache.size).toBe(0);
    });

    it('keys by model and text', () => {
      expect(EmbeddingCache.key('m', 'hello')).not.toBe(EmbeddingCache.key('n', 'hello'));
      expect(EmbeddingCache.key('m', 'hello')).toBe(EmbeddingCache.key('m', 'hello'));
    });
  });

  describe('createApiEmbedder', () => {
    it('posts the text and returns the vector', async () => {
      const fetchSpy = vi
        .spyOn(globalThis, 'fetch')
        .mockResolvedValue(jsonResponse({ data: [{ embedding: [0.5, 1, 2], index: 0 }] }));

      const embed = createApiEmbedder(CONFIG, 3);
      expect(await embed('quarterly report')).toEqual([0.5, 1, 2]);

      const [url, init] = fetchSpy.mock.calls[0];
      expect(url).toBe('http://localhost:11434/v1/embeddings');
      expect(init?.method).toBe('POST');
      expect(JSON.parse(String(init?.body))).toEqual({ model: 'test-embed', input: ['quarterly report'] });
    });

    it('serves repeated texts from the cache', async () => {
      const fetchSpy = vi
        .spyOn(globalThis, 'fetch')
        .mockImplementation(async () => jsonResponse({ data: [{ embedding: [1, 1] }] }));

      const embed = createApiEmbedder(CONFIG, 2);
      await embed('same');
      await embed('same');
      expect(fetchSpy).toHaveBeenCalledTimes(1);
    });

    it('scales vectors to unit length when normalize is set', async () => {
      vi.spyOn(globalThis, 'fetch').mockResolvedValue(jsonResponse({ data: [{ embedding: [3, 4] }] }));
      const embed = createApiEmbedder({ ...CONFIG, normalize: true }, 2);
      expect(await embed('text')).toEqual([0.6, 0.8]);
    });

    it('rejects vectors of the wrong dimension', async () => {
      vi.spyOn(globalThis, 'fetch').mockResolvedValue(jsonResponse({ data: [{ embedding: [1, 2] }] }));
      await expect(createApiEmbedder(CONFIG, 3)('text')).rejects.toThrow(DimensionMismatchError);
    });

    it('throws NetworkError on an HTTP error', async () => {
      vi.spyOn(globalThis, 'fetch').mockResolvedValue(new Response('model not found', { status: 404 }));
      const err = await createApiEmbedder(CONFIG, 3)('text').catch((e: unknown) => e);
      expect(err).toBeInstanceOf(NetworkError);
      expect(err).toMatchObject({
        message: 'Embedding API error: 404 - model not found',
        statusCode: 404,
      });
    });

    it('throws ValidationError on an unexpected body', async () => {
      vi.spyOn(globalThis, 'fetch').mockResolvedValue(jsonResponse({ data: [] }));
      await expect(createApiEmbedder(CONFIG, 3)('text')).rejects.toThrow(ValidationError);
    });
  });
});
