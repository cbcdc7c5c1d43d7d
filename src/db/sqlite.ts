// src/db/sqlite.ts
// SQLite adapter: wraps better-sqlite3 behind the async DbAdapter interface.
// better-sqlite3 is synchronous, so every Promise here is already settled.

import Database from 'better-sqlite3';
import type { DbAdapter, RunResult } from './types';
import { createLogger } from '../observability/logger';

const log = createLogger('db');

export class SqliteAdapter implements DbAdapter {
  private _db: Database.Database;

  constructor(db: Database.Database) {
    this._db = db;
  }

  /** Underlying driver handle. Used only for pragmas at open time. */
  get raw(): Database.Database {
    return this._db;
  }

  queryOne<T = Record<string, unknown>>(
    sql: string,
    params: unknown[] = []
  ): Promise<T | undefined> {
    const row = this._db.prepare(sql).get(...params) as T | undefined;
    return Promise.resolve(row);
  }

  queryAll<T = Record<string, unknown>>(
    sql: string,
    params: unknown[] = []
  ): Promise<T[]> {
    const rows = this._db.prepare(sql).all(...params) as T[];
    return Promise.resolve(rows);
  }

  run(sql: string, params: unknown[] = []): Promise<RunResult> {
    const result = this._db.prepare(sql).run(...params);
    return Promise.resolve({
      changes: result.changes,
      lastInsertRowid: result.lastInsertRowid,
    });
  }

  exec(sql: string): Promise<void> {
    this._db.exec(sql);
    return Promise.resolve();
  }

  async transaction<T>(fn: (tx: DbAdapter) => Promise<T>): Promise<T> {
    // db.transaction() takes only sync callbacks; BEGIN/COMMIT by hand so
    // async store code can run inside.
    this._db.exec('BEGIN');
    try {
      const result = await fn(this);
      this._db.exec('COMMIT');
      return result;
    } catch (e) {
      try {
        this._db.exec('ROLLBACK');
      } catch (rollbackErr) {
        log.warn({ err: rollbackErr }, 'rollback failed');
      }
      throw e;
    }
  }

  close(): Promise<void> {
    this._db.close();
    return Promise.resolve();
  }
}
