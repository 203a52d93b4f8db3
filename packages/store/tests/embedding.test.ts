import { describe, it, expect, vi, afterEach } from 'vitest';
import { EmbeddingGateway } from '../src/embedding/gateway.js';
import { CachedEmbeddingProvider } from '../src/embedding/cache.js';
import { OpenAIEmbeddingProvider } from '../src/embedding/openai.js';
import { OllamaEmbeddingProvider } from '../src/embedding/ollama.js';
import { createEmbeddingProvider } from '../src/embedding/index.js';
import { EmbeddingFailedError, EmbeddingUnavailableError } from '../src/errors.js';
import { parseConfig } from '../src/utils/config.js';
import { fakeEmbeddingProvider } from './setup.js';

describe('EmbeddingGateway', () => {
  it('should be unavailable without a provider', async () => {
    const gateway = new EmbeddingGateway(null);
    expect(gateway.isAvailable).toBe(false);
    expect(gateway.dimensions).toBeNull();
    await expect(gateway.embed(['x'])).rejects.toBeInstanceOf(EmbeddingUnavailableError);
  });

  it('should return one vector per text in order', async () => {
    const { provider } = fakeEmbeddingProvider({ a: [1, 0], b: [0, 1] });
    const gateway = new EmbeddingGateway(provider);
    expect(gateway.dimensions).toBe(2);
    expect(await gateway.embed(['b', 'a'])).toEqual([[0, 1], [1, 0]]);
  });

  it('should not call the provider for an empty batch', async () => {
    const { provider, embedBatch } = fakeEmbeddingProvider();
    expect(await new EmbeddingGateway(provider).embed([])).toEqual([]);
    expect(embedBatch).not.toHaveBeenCalled();
  });

  it('should wrap provider failures', async () => {
    const { provider, embedBatch } = fakeEmbeddingProvider();
    const cause = new Error('boom');
    embedBatch.mockRejectedValueOnce(cause);

    const error = await new EmbeddingGateway(provider).embed(['x']).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(EmbeddingFailedError);
    expect(error).toMatchObject({ message: 'Embedding failed: boom', cause });
  });

  it('should reject a response with the wrong number of vectors', async () => {
    const { provider, embedBatch } = fakeEmbeddingProvider();
    embedBatch.mockResolvedValueOnce([[1, 0]]);
    await expect(new EmbeddingGateway(provider).embed(['a', 'b'])).rejects.toBeInstanceOf(EmbeddingFailedError);
  });

  it('should report no dimensions when the provider declares none', () => {
    const { provider } = fakeEmbeddingProvider({}, 0);
    expect(new EmbeddingGateway(provider).dimensions).toBeNull();
  });
});

describe('CachedEmbeddingProvider', () => {
  it('should only fetch texts it has not seen', async () => {
    const { provider, embedBatch } = fakeEmbeddingProvider({ a: [1, 0], b: [0, 1], c: [1, 1] });
    const cached = new CachedEmbeddingProvider(provider, 10);

    expect(await cached.embedBatch(['a', 'b', 'a'])).toEqual([[1, 0], [0, 1], [1, 0]]);
    expect(await cached.embedBatch(['b', 'c'])).toEqual([[0, 1], [1, 1]]);

    expect(embedBatch).toHaveBeenNthCalledWith(1, ['a', 'b']);
    expect(embedBatch).toHaveBeenNthCalledWith(2, ['c']);
    expect(cached.cacheSize).toBe(3);
  });

  it('should serve single embeds from the cache', async () => {
    const { provider, embedBatch } = fakeEmbeddingProvider({ a: [1, 0] });
    const cached = new CachedEmbeddingProvider(provider, 10);

    await cached.embed('a');
    expect(await cached.embed('a')).toEqual([1, 0]);
    expect(embedBatch).toHaveBeenCalledTimes(1);
  });

  it('should hand out copies of cached vectors', async () => {
    const { provider } = fakeEmbeddingProvider({ a: [1, 0] });
    const cached = new CachedEmbeddingProvider(provider, 10);

    const [first] = await cached.embedBatch(['a']);
    first?.fill(9);
    const again = await cached.embed('a');
    again.fill(7);

    expect(await cached.embedBatch(['a', 'a'])).toEqual([[1, 0], [1, 0]]);
  });

  it('should keep texts with the same length apart', async () => {
    const { provider } = fakeEmbeddingProvider({ ab: [1, 0], ba: [0, 1] });
    const cached = new CachedEmbeddingProvider(provider, 10);

    await cached.embedBatch(['ab', 'ba']);
    expect(await cached.embedBatch(['ba', 'ab'])).toEqual([[0, 1], [1, 0]]);
    expect(cached.cacheSize).toBe(2);
  });

  it('should evict once it grows past its size', async () => {
    const { provider } = fakeEmbeddingProvider();
    const cached = new CachedEmbeddingProvider(provider, 5);

    await cached.embedBatch(['1', '2', '3', '4', '5', '6']);
    expect(cached.cacheSize).toBe(5);

    cached.clearCache();
    expect(cached.cacheSize).toBe(0);
  });
});

describe('createEmbeddingProvider', () => {
  const embeddingConfig = (input: Record<string, unknown>) => parseConfig({ embedding: input }).embedding;

  it('should return null for provider none', () => {
    expect(createEmbeddingProvider(embeddingConfig({ provider: 'none' }))).toBeNull();
  });

  it('should build the configured provider', () => {
    const provider = createEmbeddingProvider(embeddingConfig({ provider: 'ollama', cacheSize: 0, dimensions: 8 }));
    expect(provider).toBeInstanceOf(OllamaEmbeddingProvider);
    expect(provider?.dimensions).toBe(8);
  });

  it('should wrap the provider in a cache when cacheSize is set', () => {
    const provider = createEmbeddingProvider(embeddingConfig({ provider: 'openai', apiKey: 'test-secret', cacheSize: 10 }));
    expect(provider).toBeInstanceOf(CachedEmbeddingProvider);
    expect(provider?.name).toBe('cached(openai)');
  });
});

describe('HTTP embedding providers', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
    vi.unstubAllEnvs();
  });

  it('should restore input order from the OpenAI response', async () => {
    const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) => new Response(JSON.stringify({
      data: [
        { index: 1, embedding: [0, 1] },
        { index: 0, embedding: [1, 0] },
      ],
    })));
    vi.stubGlobal('fetch', fetchMock);

    const provider = new OpenAIEmbeddingProvider({ apiKey: 'test-secret', dimensions: 2 });
    expect(await provider.embedBatch(['a', 'b'])).toEqual([[1, 0], [0, 1]]);
    expect(fetchMock).toHaveBeenCalledWith('https://api.openai.com/v1/embeddings', expect.objectContaining({ method: 'POST' }));
  });

  it('should fail without an OpenAI key', async () => {
    vi.stubEnv('OPENAI_API_KEY', '');
    const provider = new OpenAIEmbeddingProvider({});
    await expect(provider.embedBatch(['a'])).rejects.toThrow('OpenAI API key not configured');
  });

  it('should surface OpenAI HTTP errors', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('nope', { status: 401 })));
    const provider = new OpenAIEmbeddingProvider({ apiKey: 'test-secret' });
    await expect(provider.embedBatch(['a'])).rejects.toThrow('OpenAI Embedding error 401: nope');
  });

  it('should send the whole batch to Ollama', async () => {
    const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) =>
      new Response(JSON.stringify({ embeddings: [[1, 2], [3, 4]] })));
    vi.stubGlobal('fetch', fetchMock);

    const provider = new OllamaEmbeddingProvider({});
    expect(await provider.embedBatch(['hello', 'world'])).toEqual([[1, 2], [3, 4]]);
    expect(fetchMock).toHaveBeenCalledWith('http://localhost:11434/api/embed', expect.objectContaining({
      body: JSON.stringify({ model: 'bge-m3', input: ['hello', 'world'] }),
    }));
  });

  it('should reject a malformed Ollama response', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response(JSON.stringify({ embedding: [1, 2] }))));
    await expect(new OllamaEmbeddingProvider({}).embedBatch(['a'])).rejects.toBeInstanceOf(EmbeddingFailedError);
  });
});
