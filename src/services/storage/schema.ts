/**
 * Session index schema
 *
 * One SQLite file per session. Vectors are float32 BLOBs compared with
 * sqlite-vec's vec_distance_cosine(); no virtual table is needed because
 * session indexes are small enough for an exact scan.
 *
 * @module services/storage/schema
 */

import type Database from 'better-sqlite3';
import { createRequire } from 'module';
import type { SqliteVecModule } from './types.js';

const require = createRequire(import.meta.url);

export const SCHEMA_VERSION = 1;

export const INDEX_FILE_NAME = 'index.db';

/**
 * Per-connection pragmas. WAL so a reader (chat) never blocks on the
 * checkpointed writer (upload) of the same session.
 */
export const INDEX_PRAGMAS = [
  'PRAGMA journal_mode = WAL',
  'PRAGMA foreign_keys = ON',
  'PRAGMA synchronous = NORMAL',
  'PRAGMA busy_timeout = 30000',
] as const;

export const CREATE_INDEX_META_TABLE = `
CREATE TABLE IF NOT EXISTS index_meta (
  key TEXT PRIMARY KEY,
  value TEXT NOT NULL
)`;

export const CREATE_CHUNKS_TABLE = `
CREATE TABLE IF NOT EXISTS chunks (
  fingerprint TEXT PRIMARY KEY,
  seq INTEGER NOT NULL UNIQUE,
  text TEXT NOT NULL,
  source_id TEXT NOT NULL,
  chunk_index INTEGER NOT NULL CHECK (chunk_index >= 0),
  character_start INTEGER NOT NULL CHECK (character_start >= 0),
  character_end INTEGER NOT NULL CHECK (character_end >= character_start),
  created_at TEXT NOT NULL
)`;

export const CREATE_VECTORS_TABLE = `
CREATE TABLE IF NOT EXISTS vectors (
  fingerprint TEXT PRIMARY KEY REFERENCES chunks(fingerprint) ON DELETE CASCADE,
  dimensions INTEGER NOT NULL CHECK (dimensions > 0),
  vector BLOB NOT NULL
)`;

export const CREATE_INDEXES = [
  'CREATE INDEX IF NOT EXISTS idx_chunks_source_id ON chunks(source_id)',
] as const;

export const REQUIRED_TABLES = ['index_meta', 'chunks', 'vectors'] as const;

/** Keys written to index_meta */
export const META_KEYS = {
  SCHEMA_VERSION: 'schema_version',
  SESSION_ID: 'session_id',
  CREATED_AT: 'created_at',
  DIMENSIONS: 'dimensions',
  EMBEDDING_MODEL: 'embedding_model',
} as const;

/**
 * Load the sqlite-vec extension into a connection.
 * FAIL FAST if not available - no workarounds.
 */
export function loadSqliteVec(db: Database.Database): void {
  try {
    const sqliteVec: SqliteVecModule = require('sqlite-vec');
    sqliteVec.load(db);
  } catch (error) {
    throw new Error(
      `Failed to load sqlite-vec extension: ${String(error)}. Ensure sqlite-vec is installed for your platform.`,
      { cause: error }
    );
  }
}

export function configurePragmas(db: Database.Database): void {
  for (const pragma of INDEX_PRAGMAS) {
    db.exec(pragma);
  }
}

/**
 * Create tables and stamp the schema version. Runs in one transaction so a
 * crash mid-init leaves no version stamp.
 */
export function createSchema(db: Database.Database, sessionId: string): void {
  const init = db.transaction(() => {
    db.exec(CREATE_INDEX_META_TABLE);
    db.exec(CREATE_CHUNKS_TABLE);
    db.exec(CREATE_VECTORS_TABLE);
    for (const statement of CREATE_INDEXES) {
      db.exec(statement);
    }

    const insertMeta = db.prepare<[string, string]>(
      'INSERT OR REPLACE INTO index_meta (key, value) VALUES (?, ?)'
    );
    insertMeta.run(META_KEYS.SESSION_ID, sessionId);
    insertMeta.run(META_KEYS.CREATED_AT, new Date().toISOString());
    insertMeta.run(META_KEYS.SCHEMA_VERSION, String(SCHEMA_VERSION));
  });
  init();
}

/**
 * Names of required tables missing from the database
 */
export function findMissingTables(db: Database.Database): string[] {
  const stmt = db.prepare<[string], { name: string }>(
    "SELECT name FROM sqlite_master WHERE type = 'table' AND name = ?"
  );
  return REQUIRED_TABLES.filter((table) => stmt.get(table) === undefined);
}
