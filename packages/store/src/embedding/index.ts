export type { EmbeddingProvider } from './interface.js';
export { OpenAIEmbeddingProvider } from './openai.js';
export { OllamaEmbeddingProvider } from './ollama.js';
export { CachedEmbeddingProvider } from './cache.js';
export { EmbeddingGateway } from './gateway.js';

import type { EmbeddingProvider } from './interface.js';
import type { EmbeddingConfig } from '../utils/config.js';
import { OpenAIEmbeddingProvider } from './openai.js';
import { OllamaEmbeddingProvider } from './ollama.js';
import { CachedEmbeddingProvider } from './cache.js';

function createBaseProvider(config: EmbeddingConfig): EmbeddingProvider | null {
  switch (config.provider) {
    case 'openai':
      return new OpenAIEmbeddingProvider(config);
    case 'ollama':
      return new OllamaEmbeddingProvider(config);
    case 'none':
      return null;
  }
}

/** Build the configured provider; `none` yields null (searches by text then fail with EmbeddingUnavailable). */
export function createEmbeddingProvider(config: EmbeddingConfig): EmbeddingProvider | null {
  const provider = createBaseProvider(config);
  if (!provider) return null;
  return config.cacheSize > 0 ? new CachedEmbeddingProvider(provider, config.cacheSize) : provider;
}
