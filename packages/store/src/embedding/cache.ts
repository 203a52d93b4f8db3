import { createLogger } from '../utils/logger.js';
import type { EmbeddingProvider } from './interface.js';

const log = createLogger('embed-cache');

interface CacheEntry {
  embedding: number[];
  usedAt: number;
}

/**
 * LRU cache wrapper around an EmbeddingProvider, keyed by the exact text.
 * Vectors are copied on the way in and out, so callers may mutate what they get.
 */
export class CachedEmbeddingProvider implements EmbeddingProvider {
  readonly name: string;
  readonly dimensions: number;
  private cache = new Map<string, CacheEntry>();

  constructor(private inner: EmbeddingProvider, private maxSize = 1000) {
    this.name = `cached(${inner.name})`;
    this.dimensions = inner.dimensions;
  }

  private evictIfNeeded(): void {
    if (this.cache.size <= this.maxSize) return;

    // Drop the least recently used fifth
    const entries = Array.from(this.cache.entries());
    entries.sort((a, b) => a[1].usedAt - b[1].usedAt);
    const toEvict = entries.slice(0, Math.max(1, Math.floor(this.maxSize * 0.2)));
    for (const [key] of toEvict) {
      this.cache.delete(key);
    }
    log.debug({ evicted: toEvict.length, remaining: this.cache.size }, 'Cache eviction');
  }

  private lookup(text: string): number[] | undefined {
    const cached = this.cache.get(text);
    if (!cached) return undefined;
    cached.usedAt = Date.now();
    return [...cached.embedding];
  }

  private store(text: string, embedding: number[]): void {
    this.cache.set(text, { embedding: [...embedding], usedAt: Date.now() });
    this.evictIfNeeded();
  }

  async embed(text: string): Promise<number[]> {
    const cached = this.lookup(text);
    if (cached) return cached;

    const embedding = await this.inner.embed(text);
    this.store(text, embedding);
    return embedding;
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    const hits = texts.map(text => this.lookup(text));
    const missing = [...new Set(texts.filter((_, i) => hits[i] === undefined))];

    const fetched = new Map<string, number[]>();
    if (missing.length > 0) {
      const embeddings = await this.inner.embedBatch(missing);
      missing.forEach((text, j) => {
        const embedding = embeddings[j];
        if (embedding === undefined) return;
        fetched.set(text, embedding);
        this.store(text, embedding);
      });
      log.debug({ cached: texts.length - missing.length, fetched: missing.length }, 'Batch embed with cache');
    }

    const results: number[][] = [];
    texts.forEach((text, i) => {
      const embedding = hits[i] ?? fetched.get(text);
      if (embedding !== undefined) results.push([...embedding]);
    });
    return results;
  }

  get cacheSize(): number {
    return this.cache.size;
  }

  clearCache(): void {
    this.cache.clear();
  }
}
