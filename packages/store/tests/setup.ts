/**
 * Test setup: one in-memory store per test, with a scripted embedding provider.
 */
import { afterEach, beforeEach, vi } from 'vitest';
import { createHybridStore, type HybridStore } from '../src/hybrid.js';
import { parseConfig, type LoamConfigInput } from '../src/utils/config.js';
import type { EmbeddingProvider } from '../src/embedding/interface.js';

export type VectorTable = Record<string, number[]>;

/** Returns the vector listed for each text, or a zero vector for unknown texts. */
export function fakeEmbeddingProvider(vectors: VectorTable = {}, dimensions = 2) {
  const embedBatch = vi.fn(async (texts: string[]) =>
    texts.map(text => vectors[text] ?? new Array<number>(dimensions).fill(0)),
  );
  const provider: EmbeddingProvider = {
    name: 'fake',
    dimensions,
    embedBatch,
    async embed(text: string) {
      const [vector] = await embedBatch([text]);
      return vector ?? [];
    },
  };
  return { provider, embedBatch };
}

export function testConfig(overrides: LoamConfigInput = {}) {
  return parseConfig({
    ...overrides,
    storage: { dbPath: ':memory:', walMode: false },
    embedding: { provider: 'none' },
  });
}

export class TestStore {
  private current: HybridStore | null = null;

  open(provider: EmbeddingProvider | null, overrides: LoamConfigInput = {}): HybridStore {
    this.current = createHybridStore(testConfig(overrides), { embedding: provider });
    return this.current;
  }

  get store(): HybridStore {
    if (!this.current) throw new Error('Test store not opened');
    return this.current;
  }

  async close(): Promise<void> {
    await this.current?.close();
    this.current = null;
  }
}

/**
 * Register a fresh store for each test. Pass `null` for a store without an
 * embedding engine.
 */
export function setupTestStore(vectors: VectorTable | null = {}, overrides: LoamConfigInput = {}) {
  const ctx = new TestStore();
  const fake = fakeEmbeddingProvider(vectors ?? {});

  beforeEach(() => {
    fake.embedBatch.mockClear();
    ctx.open(vectors === null ? null : fake.provider, overrides);
  });

  afterEach(async () => {
    await ctx.close();
  });

  return { ctx, embedBatch: fake.embedBatch };
}
