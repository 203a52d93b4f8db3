import { z } from 'zod';
import type { EmbeddingProvider } from './interface.js';
import { createLogger } from '../utils/logger.js';
import { EmbeddingFailedError } from '../errors.js';

const log = createLogger('embed-ollama');

const EmbedResponseSchema = z.object({
  embeddings: z.array(z.array(z.number())),
});

export class OllamaEmbeddingProvider implements EmbeddingProvider {
  readonly name = 'ollama';
  readonly dimensions: number;
  private model: string;
  private baseUrl: string;
  private timeoutMs: number;

  constructor(opts: { model?: string; dimensions?: number; baseUrl?: string; timeoutMs?: number }) {
    this.model = opts.model || 'bge-m3';
    this.dimensions = opts.dimensions || 1024;
    this.baseUrl = (opts.baseUrl || 'http://localhost:11434').replace(/\/$/, '');
    this.timeoutMs = opts.timeoutMs || 30000;
  }

  async embed(text: string): Promise<number[]> {
    const [embedding] = await this.embedBatch([text]);
    if (!embedding) throw new EmbeddingFailedError('Ollama returned no embedding');
    return embedding;
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    const res = await fetch(`${this.baseUrl}/api/embed`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ model: this.model, input: texts }),
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    if (!res.ok) {
      const body = await res.text();
      log.error({ status: res.status, model: this.model }, 'Embedding request failed');
      throw new EmbeddingFailedError(`Ollama Embedding error ${res.status}: ${body}`, { status: res.status });
    }

    const parsed = EmbedResponseSchema.safeParse(await res.json());
    if (!parsed.success) {
      throw new EmbeddingFailedError('Ollama Embedding response has an unexpected shape', undefined, parsed.error);
    }
    return parsed.data.embeddings;
  }
}
