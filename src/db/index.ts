// src/db/index.ts
// Database factory: opens SQLite at a path (or ':memory:') and bootstraps the schema.

import path from 'node:path';
import fs from 'node:fs';
import Database from 'better-sqlite3';
import { SqliteAdapter } from './sqlite';
import { createLogger } from '../observability/logger';

export type { DbAdapter, RunResult } from './types';
export { SqliteAdapter } from './sqlite';

const log = createLogger('db');

export const MEMORY_DB = ':memory:';

/* ---------- Schema (idempotent) ---------- */

const SCHEMA = `
CREATE TABLE IF NOT EXISTS analyses (
  id TEXT PRIMARY KEY,
  source_kind TEXT NOT NULL,           -- 'upload' | 'text'
  filename TEXT,
  status TEXT NOT NULL,                -- compliant label, non-compliant label, or 'error'
  confidence REAL NOT NULL,
  document_length INTEGER NOT NULL,
  sections_total INTEGER NOT NULL,
  sections_with_errors INTEGER NOT NULL,
  report_json TEXT NOT NULL,
  search_text TEXT NOT NULL DEFAULT '',  -- previews, finding contexts, citation titles
  created_at INTEGER NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_analyses_created ON analyses(created_at DESC);
CREATE INDEX IF NOT EXISTS idx_analyses_status ON analyses(status);
`;

/**
 * Open a database and create the tables it needs.
 * File databases get their parent directory created and WAL journaling.
 */
export function createDatabase(dbPath: string = MEMORY_DB): SqliteAdapter {
  if (dbPath !== MEMORY_DB) {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }

  const rawDb = new Database(dbPath);
  if (dbPath !== MEMORY_DB) {
    rawDb.pragma('journal_mode = WAL');
  }
  rawDb.exec(SCHEMA);

  log.info({ path: dbPath }, 'database ready');
  return new SqliteAdapter(rawDb);
}
