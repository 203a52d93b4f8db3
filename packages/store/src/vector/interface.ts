/**
 * VectorStore: the capability pipeline and query code depend on, whatever
 * engine backs it.
 */
import type { AnyDataPoint } from '../models/data-point.js';
import type { JsonObject } from '../models/json.js';

export interface ScoredResult {
  id: string;
  payload: JsonObject;
  /** Cosine similarity, higher is more similar */
  score: number;
  vector?: number[];
}

export interface StoredDataPoint {
  id: string;
  text: string | null;
  payload: JsonObject;
  createdAt: string;
}

export interface SearchOptions {
  queryText?: string;
  queryVector?: readonly number[];
  limit?: number;
  withVector?: boolean;
}

export interface BatchSearchOptions {
  limit?: number;
  withVectors?: boolean;
}

export interface VectorStore {
  embedData(texts: readonly string[]): Promise<number[][]>;
  hasCollection(name: string): Promise<boolean>;
  createCollection(name: string): Promise<void>;
  /** Upsert into an existing collection; raises CollectionNotFoundError otherwise */
  createDataPoints(collection: string, points: readonly AnyDataPoint[]): Promise<void>;
  createVectorIndex(indexName: string, propertyName: string): Promise<void>;
  /** Upsert `{ id, text }` of each point's first index field into `<indexName>_<propertyName>` */
  indexDataPoints(indexName: string, propertyName: string, points: readonly AnyDataPoint[]): Promise<void>;
  retrieve(collection: string, ids: readonly string[]): Promise<StoredDataPoint[]>;
  search(collection: string, options: SearchOptions): Promise<ScoredResult[]>;
  batchSearch(collection: string, queryTexts: readonly string[], options?: BatchSearchOptions): Promise<ScoredResult[][]>;
  deleteDataPoints(collection: string, ids: readonly string[]): Promise<{ deleted: number }>;
  prune(): Promise<void>;
}
