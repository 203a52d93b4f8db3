import { createLogger } from '../utils/logger.js';
import { chunk, placeholders } from '../utils/helpers.js';
import { quoteIdentifier, toCollectionName } from '../utils/sanitize.js';
import {
  CollectionNotFoundError,
  EngineError,
  MissingQueryParameterError,
  VectorDimensionMismatchError,
  errorMessage,
} from '../errors.js';
import { IndexedField, snapshotDataPoint, type AnyDataPoint } from '../models/data-point.js';
import { JsonObjectSchema, VectorSchema, type JsonObject } from '../models/json.js';
import { rankBySimilarity } from './similarity.js';
import type { ConnectionGuard, SqlStatement } from '../db/connection.js';
import type { CollectionManager } from '../db/collections.js';
import type { EmbeddingGateway } from '../embedding/gateway.js';
import type { SearchConfig } from '../utils/config.js';
import type {
  BatchSearchOptions,
  ScoredResult,
  SearchOptions,
  StoredDataPoint,
  VectorStore,
} from './interface.js';

const log = createLogger('vector');

/** Keeps IN (...) lists well under SQLite's bound-parameter limit */
const MAX_IDS_PER_STATEMENT = 500;

interface CollectionRow {
  id: string;
  text: string | null;
  vector: string;
  payload: string;
  created_at: string;
}

interface ParsedRow {
  id: string;
  text: string | null;
  vector: number[];
  payload: JsonObject;
  createdAt: string;
}

type Query =
  | { kind: 'vector'; vector: readonly number[] }
  | { kind: 'text'; text: string };

function toQuery(options: SearchOptions): Query {
  if (options.queryVector !== undefined) return { kind: 'vector', vector: options.queryVector };
  if (options.queryText !== undefined) return { kind: 'text', text: options.queryText };
  throw new MissingQueryParameterError();
}

function parseRow(row: CollectionRow, collection: string): ParsedRow | null {
  try {
    return {
      id: row.id,
      text: row.text,
      vector: VectorSchema.parse(JSON.parse(row.vector)),
      payload: JsonObjectSchema.parse(JSON.parse(row.payload)),
      createdAt: row.created_at,
    };
  } catch (e) {
    log.warn({ collection, id: row.id, error: errorMessage(e) }, 'Skipping unreadable row');
    return null;
  }
}

/**
 * Vector store over plain SQLite tables. Similarity search is exhaustive: every
 * row of the collection is scored in JS, there is no ANN index.
 */
export class SqliteVectorStore implements VectorStore {
  readonly name = 'sqlite';

  constructor(
    private readonly guard: ConnectionGuard,
    private readonly collections: CollectionManager,
    private readonly gateway: EmbeddingGateway,
    private readonly options: SearchConfig,
  ) {}

  async embedData(texts: readonly string[]): Promise<number[][]> {
    return this.gateway.embed(texts);
  }

  async hasCollection(name: string): Promise<boolean> {
    return this.collections.hasCollection(name);
  }

  async createCollection(name: string): Promise<void> {
    await this.collections.createCollection(name);
  }

  async createDataPoints(collection: string, points: readonly AnyDataPoint[]): Promise<void> {
    const table = await this.requireCollection(collection);
    if (points.length === 0) return;

    const vectors = await this.gateway.embed(points.map(p => p.embeddableText));
    const expected = this.gateway.dimensions ?? vectors[0]?.length ?? 0;

    const insert = `INSERT OR REPLACE INTO ${quoteIdentifier(table)} (id, text, vector, payload) VALUES (?, ?, ?, ?)`;
    const statements = points.map((point, i): SqlStatement => {
      const vector = vectors[i] ?? [];
      if (vector.length !== expected) {
        throw new VectorDimensionMismatchError(point.id, expected, vector.length);
      }
      return [insert, [point.id, point.embeddableText, JSON.stringify(vector), JSON.stringify(snapshotDataPoint(point))]];
    });

    await this.guard.executeTransaction(statements);
    log.info({ collection: table, count: points.length }, 'Upserted data points');
  }

  async createVectorIndex(indexName: string, propertyName: string): Promise<void> {
    await this.collections.createCollection(`${indexName}_${propertyName}`);
  }

  async indexDataPoints(indexName: string, propertyName: string, points: readonly AnyDataPoint[]): Promise<void> {
    const name = `${indexName}_${propertyName}`;
    await this.collections.createCollection(name);
    await this.createDataPoints(
      name,
      points.map(point => IndexedField.create({ text: point.indexText }, { id: point.id })),
    );
  }

  /** Rows in the order of `ids`; unknown ids and unreadable rows are skipped. */
  async retrieve(collection: string, ids: readonly string[]): Promise<StoredDataPoint[]> {
    const table = await this.requireCollection(collection);
    if (ids.length === 0) return [];

    const found = new Map<string, StoredDataPoint>();
    for (const batch of chunk([...new Set(ids)], MAX_IDS_PER_STATEMENT)) {
      const rows = await this.guard.execute<CollectionRow>(
        `SELECT id, text, vector, payload, created_at FROM ${quoteIdentifier(table)} WHERE id IN (${placeholders(batch.length)})`,
        batch,
      );
      for (const row of rows) {
        const parsed = parseRow(row, table);
        if (parsed) found.set(parsed.id, { id: parsed.id, text: parsed.text, payload: parsed.payload, createdAt: parsed.createdAt });
      }
    }

    return ids.flatMap(id => found.get(id) ?? []);
  }

  async search(collection: string, options: SearchOptions): Promise<ScoredResult[]> {
    const query = toQuery(options);
    const limit = options.limit ?? this.options.defaultLimit;
    const withVector = options.withVector ?? false;

    if (!(await this.collections.hasCollection(collection))) {
      log.debug({ collection }, 'Search on missing collection');
      return [];
    }
    if (limit <= 0) return [];

    const queryVector = query.kind === 'vector' ? query.vector : await this.embedQuery(query.text);
    const rows = await this.scan(toCollectionName(collection));

    return rankBySimilarity(queryVector, rows, limit).map(({ item, score }) => ({
      id: item.id,
      payload: item.payload,
      score,
      ...(withVector ? { vector: item.vector } : {}),
    }));
  }

  /**
   * One embedding call for all queries; each group keeps only results scoring
   * above `search.batchScoreThreshold`.
   */
  async batchSearch(collection: string, queryTexts: readonly string[], options: BatchSearchOptions = {}): Promise<ScoredResult[][]> {
    if (queryTexts.length === 0) return [];

    const vectors = await this.gateway.embed(queryTexts);
    const groups = await Promise.all(
      vectors.map(queryVector => this.search(collection, {
        queryVector,
        limit: options.limit,
        withVector: options.withVectors,
      })),
    );

    const threshold = this.options.batchScoreThreshold;
    return groups.map(group => group.filter(result => result.score > threshold));
  }

  async deleteDataPoints(collection: string, ids: readonly string[]): Promise<{ deleted: number }> {
    const table = await this.requireCollection(collection);
    if (ids.length === 0) return { deleted: 0 };

    const statements = chunk([...new Set(ids)], MAX_IDS_PER_STATEMENT).map((batch): SqlStatement => [
      `DELETE FROM ${quoteIdentifier(table)} WHERE id IN (${placeholders(batch.length)})`,
      batch,
    ]);
    const deleted = await this.guard.executeTransaction(statements);
    log.info({ collection: table, deleted }, 'Deleted data points');
    return { deleted };
  }

  async prune(): Promise<void> {
    await this.collections.dropAll();
  }

  private async requireCollection(collection: string): Promise<string> {
    if (!(await this.collections.hasCollection(collection))) {
      throw new CollectionNotFoundError(collection);
    }
    return toCollectionName(collection);
  }

  private async embedQuery(text: string): Promise<number[]> {
    const [vector] = await this.gateway.embed([text]);
    return vector ?? [];
  }

  /**
   * Rows of a collection. A collection dropped after the caller's existence
   * check (prune or dropCollection on another task) scans as empty.
   */
  private async scan(table: string): Promise<ParsedRow[]> {
    let rows: CollectionRow[];
    try {
      rows = await this.guard.execute<CollectionRow>(
        `SELECT id, text, vector, payload, created_at FROM ${quoteIdentifier(table)}`,
      );
    } catch (e) {
      if (e instanceof EngineError && !(await this.collections.hasCollection(table))) {
        log.debug({ collection: table }, 'Collection dropped during search');
        return [];
      }
      throw e;
    }
    return rows.flatMap(row => parseRow(row, table) ?? []);
  }
}
