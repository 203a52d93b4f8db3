import Database from 'better-sqlite3';
import { Mutex } from 'async-mutex';
import path from 'node:path';
import fs from 'node:fs';
import { createLogger } from '../utils/logger.js';
import { EngineError, StoreClosedError, StoreError, errorMessage } from '../errors.js';
import type { StorageConfig } from '../utils/config.js';

const log = createLogger('db');

export type SqlParam = string | number | bigint | Buffer | null;
export type Row = Record<string, unknown>;
export type SqlStatement = readonly [sql: string, params?: readonly SqlParam[]];

export function openDatabase(storage: StorageConfig): Database.Database {
  const inMemory = storage.dbPath === ':memory:';

  if (!inMemory) {
    const dir = path.dirname(storage.dbPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }

  log.info({ path: storage.dbPath }, 'Opening SQLite database');
  const db = new Database(storage.dbPath);

  if (storage.walMode && !inMemory) {
    db.pragma('journal_mode = WAL');
  }
  db.pragma(`busy_timeout = ${storage.busyTimeoutMs}`);
  return db;
}

function compact(sql: string): string {
  return sql.replace(/\s+/g, ' ').trim();
}

/**
 * Owns the single SQLite handle. Every statement or transaction runs inside one
 * mutex section, so callers on concurrently scheduled tasks never interleave on
 * the connection. There is no timeout: a stuck statement holds the gate.
 */
export class ConnectionGuard {
  private db: Database.Database | null;
  private readonly mutex = new Mutex();

  constructor(db: Database.Database) {
    this.db = db;
  }

  static open(storage: StorageConfig): ConnectionGuard {
    return new ConnectionGuard(openDatabase(storage));
  }

  get isOpen(): boolean {
    return this.db !== null;
  }

  /** Run one statement; returns every row for reads, `[]` for writes. */
  async execute<T = Row>(sql: string, params: readonly SqlParam[] = []): Promise<T[]> {
    return this.mutex.runExclusive(() => {
      const db = this.handle();
      try {
        const stmt = db.prepare<SqlParam[], T>(sql);
        if (!stmt.reader) {
          stmt.run(...params);
          return [];
        }
        return stmt.all(...params);
      } catch (e) {
        throw this.fail(sql, e);
      }
    });
  }

  /** Run one read statement and return its first row, or null. */
  async executeOne<T = Row>(sql: string, params: readonly SqlParam[] = []): Promise<T | null> {
    return this.mutex.runExclusive(() => {
      const db = this.handle();
      try {
        return db.prepare<SqlParam[], T>(sql).get(...params) ?? null;
      } catch (e) {
        throw this.fail(sql, e);
      }
    });
  }

  /**
   * Run statements in order inside BEGIN/COMMIT. Any failure rolls the whole
   * batch back and is re-raised. Returns the total number of changed rows.
   */
  async executeTransaction(statements: readonly SqlStatement[]): Promise<number> {
    return this.mutex.runExclusive(() => {
      const db = this.handle();
      let current = 'BEGIN';
      const apply = db.transaction((batch: readonly SqlStatement[]) => {
        let changes = 0;
        for (const [sql, params = []] of batch) {
          current = sql;
          changes += db.prepare<SqlParam[]>(sql).run(...params).changes;
        }
        return changes;
      });

      try {
        return apply(statements);
      } catch (e) {
        throw this.fail(current, e);
      }
    });
  }

  async close(): Promise<void> {
    await this.mutex.runExclusive(() => {
      if (this.db) {
        this.db.close();
        this.db = null;
        log.info('Database closed');
      }
    });
  }

  private handle(): Database.Database {
    if (!this.db) throw new StoreClosedError();
    return this.db;
  }

  private fail(sql: string, e: unknown): StoreError {
    if (e instanceof StoreError) return e;
    const statement = compact(sql);
    log.error({ sql: statement, error: errorMessage(e) }, 'Statement failed');
    return new EngineError(`SQLite error: ${errorMessage(e)}`, statement, e);
  }
}
