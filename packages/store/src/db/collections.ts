import { createLogger } from '../utils/logger.js';
import { quoteIdentifier, toCollectionName } from '../utils/sanitize.js';
import { InvalidCollectionNameError, StoreClosedError, errorMessage } from '../errors.js';
import type { ConnectionGuard } from './connection.js';

const log = createLogger('collections');

/**
 * Names of user tables. Internal tables (graph storage) start with `_`, which a
 * sanitized collection name never does.
 */
const USER_TABLES_SQL = `
  SELECT name FROM sqlite_master
  WHERE type = 'table' AND name NOT LIKE 'sqlite\\_%' ESCAPE '\\'
  ORDER BY name
`;

const COLLECTIONS_SQL = `
  SELECT name FROM sqlite_master
  WHERE type = 'table' AND name NOT LIKE 'sqlite\\_%' ESCAPE '\\' AND name NOT LIKE '\\_%' ESCAPE '\\'
  ORDER BY name
`;

/**
 * Creates, probes and drops collections. Each collection is one table with a
 * fixed schema: id, text, vector (JSON array), payload (JSON), created_at.
 */
export class CollectionManager {
  constructor(private readonly guard: ConnectionGuard) {}

  /**
   * False for names that cannot be a collection and for a closed store.
   * Any other engine failure propagates.
   */
  async hasCollection(name: string): Promise<boolean> {
    let table: string;
    try {
      table = toCollectionName(name);
    } catch (e) {
      if (e instanceof InvalidCollectionNameError) return false;
      throw e;
    }

    try {
      const row = await this.guard.executeOne<{ name: string }>(
        "SELECT name FROM sqlite_master WHERE type = 'table' AND name = ?",
        [table],
      );
      return row !== null;
    } catch (e) {
      if (e instanceof StoreClosedError) return false;
      throw e;
    }
  }

  /** Idempotent; returns the physical table name. */
  async createCollection(name: string): Promise<string> {
    const table = toCollectionName(name);
    await this.guard.execute(`
      CREATE TABLE IF NOT EXISTS ${quoteIdentifier(table)} (
        id         TEXT PRIMARY KEY,
        text       TEXT,
        vector     TEXT NOT NULL,
        payload    TEXT NOT NULL DEFAULT '{}',
        created_at DATETIME NOT NULL DEFAULT (datetime('now'))
      )
    `);
    log.debug({ collection: table }, 'Collection ready');
    return table;
  }

  async listCollections(): Promise<string[]> {
    const rows = await this.guard.execute<{ name: string }>(COLLECTIONS_SQL);
    return rows.map(r => r.name);
  }

  async dropCollection(name: string): Promise<boolean> {
    if (!(await this.hasCollection(name))) return false;
    const table = toCollectionName(name);
    await this.guard.execute(`DROP TABLE IF EXISTS ${quoteIdentifier(table)}`);
    log.info({ collection: table }, 'Collection dropped');
    return true;
  }

  /**
   * Drop every user table, internal graph tables included. Best-effort: a
   * failure on one table is logged and the rest are still dropped.
   */
  async dropAll(): Promise<string[]> {
    const rows = await this.guard.execute<{ name: string }>(USER_TABLES_SQL);
    const dropped: string[] = [];

    for (const { name } of rows) {
      try {
        await this.guard.execute(`DROP TABLE IF EXISTS ${quoteIdentifier(name)}`);
        dropped.push(name);
      } catch (e) {
        log.warn({ table: name, error: errorMessage(e) }, 'Failed to drop table, continuing');
      }
    }

    log.info({ dropped: dropped.length }, 'Dropped all tables');
    return dropped;
  }
}
