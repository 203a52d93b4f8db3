import { z } from 'zod';
import type { EmbeddingProvider } from './interface.js';
import { createLogger } from '../utils/logger.js';
import { EmbeddingFailedError } from '../errors.js';

const log = createLogger('embed-openai');

const EmbeddingResponseSchema = z.object({
  data: z.array(z.object({ index: z.number(), embedding: z.array(z.number()) })),
});

export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  readonly name = 'openai';
  readonly dimensions: number;
  private apiKey: string;
  private model: string;
  private baseUrl: string;
  private timeoutMs: number;

  constructor(opts: { apiKey?: string; model?: string; dimensions?: number; baseUrl?: string; timeoutMs?: number }) {
    this.apiKey = opts.apiKey || process.env.OPENAI_API_KEY || '';
    this.model = opts.model || 'text-embedding-3-small';
    this.dimensions = opts.dimensions || 1536;
    this.baseUrl = (opts.baseUrl || 'https://api.openai.com/v1').replace(/\/$/, '');
    this.timeoutMs = opts.timeoutMs || 15000;
  }

  async embed(text: string): Promise<number[]> {
    const [embedding] = await this.embedBatch([text]);
    if (!embedding) throw new EmbeddingFailedError('OpenAI returned no embedding');
    return embedding;
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    if (!this.apiKey) throw new EmbeddingFailedError('OpenAI API key not configured');

    const res = await fetch(`${this.baseUrl}/embeddings`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'Authorization': `Bearer ${this.apiKey}`,
      },
      body: JSON.stringify({
        model: this.model,
        input: texts,
        dimensions: this.dimensions,
      }),
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    if (!res.ok) {
      const body = await res.text();
      log.error({ status: res.status, model: this.model }, 'Embedding request failed');
      throw new EmbeddingFailedError(`OpenAI Embedding error ${res.status}: ${body}`, { status: res.status });
    }

    const parsed = EmbeddingResponseSchema.safeParse(await res.json());
    if (!parsed.success) {
      throw new EmbeddingFailedError('OpenAI Embedding response has an unexpected shape', undefined, parsed.error);
    }
    // The API may return items out of input order
    return [...parsed.data.data].sort((a, b) => a.index - b.index).map(d => d.embedding);
  }
}
