export { loadConfig, getConfig, parseConfig, LoamConfigSchema, type LoamConfig, type LoamConfigInput, type EmbeddingConfig, type StorageConfig, type SearchConfig } from './config.js';
export { logger, createLogger, type Logger } from './logger.js';
export { generateId, chunk, placeholders } from './helpers.js';
export { toCollectionName, quoteIdentifier, toJsonSafe, toJsonObject } from './sanitize.js';
