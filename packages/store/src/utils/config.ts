// Loam Configuration System
import { z } from 'zod';
import { config as loadDotenv } from 'dotenv';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { ConfigurationError, errorMessage } from '../errors.js';
import { createLogger } from './logger.js';

const log = createLogger('config');

const EmbeddingProviderSchema = z.object({
  provider: z.enum(['openai', 'ollama', 'none']).default('none'),
  model: z.string().optional(),
  dimensions: z.number().int().positive().optional(),
  apiKey: z.string().optional(),
  baseUrl: z.string().optional(),
  timeoutMs: z.number().int().positive().default(15000),
  cacheSize: z.number().int().min(0).default(1000),
});

export const LoamConfigSchema = z.object({
  storage: z.object({
    dbPath: z.string().min(1).default(':memory:'),
    walMode: z.boolean().default(true),
    busyTimeoutMs: z.number().int().min(0).default(5000),
  }).default({}),
  embedding: EmbeddingProviderSchema.default({}),
  search: z.object({
    defaultLimit: z.number().int().min(0).default(10),
    batchScoreThreshold: z.number().min(-1).max(1).default(0.7),
  }).default({}),
});

export type LoamConfig = z.infer<typeof LoamConfigSchema>;
export type LoamConfigInput = z.input<typeof LoamConfigSchema>;
export type EmbeddingConfig = LoamConfig['embedding'];
export type StorageConfig = LoamConfig['storage'];
export type SearchConfig = LoamConfig['search'];

type PlainObject = Record<string, unknown>;

let _config: LoamConfig | null = null;

function isPlainObject(value: unknown): value is PlainObject {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function deepMerge(target: PlainObject, source: PlainObject): PlainObject {
  const result: PlainObject = { ...target };
  for (const [key, value] of Object.entries(source)) {
    if (value === undefined) continue;
    const current = result[key];
    result[key] = isPlainObject(value) && isPlainObject(current) ? deepMerge(current, value) : value;
  }
  return result;
}

function readConfigFile(): PlainObject {
  const configPaths = [
    ...(process.env.LOAM_CONFIG ? [path.resolve(process.env.LOAM_CONFIG)] : []),
    path.resolve('loam.json'),
    path.resolve('loam.config.json'),
    path.join(os.homedir(), '.config/loam/config.json'),
  ];

  for (const p of configPaths) {
    if (!fs.existsSync(p)) continue;
    try {
      const parsed: unknown = JSON.parse(fs.readFileSync(p, 'utf-8'));
      if (isPlainObject(parsed)) {
        log.debug({ path: p }, 'Loaded config file');
        return parsed;
      }
      log.warn({ path: p }, 'Config file is not a JSON object, skipping');
    } catch (e) {
      log.warn({ path: p, error: errorMessage(e) }, 'Unreadable config file, skipping');
    }
  }
  return {};
}

function readEnv(env: NodeJS.ProcessEnv): PlainObject {
  const overrides: PlainObject = {};
  if (env.LOAM_DB_PATH) overrides.storage = { dbPath: env.LOAM_DB_PATH };

  const embedding: PlainObject = {};
  if (env.LOAM_EMBEDDING_PROVIDER) embedding.provider = env.LOAM_EMBEDDING_PROVIDER;
  if (env.LOAM_EMBEDDING_MODEL) embedding.model = env.LOAM_EMBEDDING_MODEL;
  if (env.LOAM_EMBEDDING_DIMENSIONS) embedding.dimensions = Number(env.LOAM_EMBEDDING_DIMENSIONS);
  if (env.LOAM_EMBEDDING_BASE_URL) embedding.baseUrl = env.LOAM_EMBEDDING_BASE_URL;
  if (Object.keys(embedding).length > 0) overrides.embedding = embedding;

  return overrides;
}

/** Validate a raw config object, raising ConfigurationError with one line per zod issue. */
export function parseConfig(raw: unknown): LoamConfig {
  const result = LoamConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new ConfigurationError(`Invalid configuration: ${issues.join('; ')}`, issues);
  }
  return result.data;
}

/**
 * Load config: file < environment (.env included) < explicit overrides.
 */
export function loadConfig(overrides: LoamConfigInput = {}, opts: { env?: NodeJS.ProcessEnv; readFiles?: boolean } = {}): LoamConfig {
  if (!opts.env) loadDotenv();
  const env = opts.env ?? process.env;

  const fileConfig = opts.readFiles === false ? {} : readConfigFile();
  const merged = deepMerge(deepMerge(fileConfig, readEnv(env)), overrides);
  _config = parseConfig(merged);
  return _config;
}

export function getConfig(): LoamConfig {
  if (!_config) {
    return loadConfig();
  }
  return _config;
}
