import { createLogger } from '../utils/logger.js';
import { EmbeddingFailedError, EmbeddingUnavailableError, StoreError, errorMessage } from '../errors.js';
import type { EmbeddingProvider } from './interface.js';

const log = createLogger('embedding');

/**
 * Boundary to the embedding engine: text in, one vector per text out, same order.
 * No retry or batching policy is applied here.
 */
export class EmbeddingGateway {
  constructor(private readonly provider: EmbeddingProvider | null) {}

  get isAvailable(): boolean {
    return this.provider !== null;
  }

  /** Dimensionality promised by the provider, or null without one */
  get dimensions(): number | null {
    return this.provider && this.provider.dimensions > 0 ? this.provider.dimensions : null;
  }

  async embed(texts: readonly string[]): Promise<number[][]> {
    if (!this.provider) throw new EmbeddingUnavailableError();
    if (texts.length === 0) return [];

    let vectors: number[][];
    try {
      vectors = await this.provider.embedBatch([...texts]);
    } catch (e) {
      log.error({ provider: this.provider.name, count: texts.length, error: errorMessage(e) }, 'Embedding failed');
      if (e instanceof StoreError) throw e;
      throw new EmbeddingFailedError(`Embedding failed: ${errorMessage(e)}`, { provider: this.provider.name }, e);
    }

    if (vectors.length !== texts.length) {
      throw new EmbeddingFailedError(
        `Embedding provider returned ${vectors.length} vectors for ${texts.length} texts`,
        { provider: this.provider.name, expected: texts.length, actual: vectors.length },
      );
    }
    return vectors;
  }
}
