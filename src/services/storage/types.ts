/**
 * Shared types for storage services
 */

import type Database from 'better-sqlite3';

/**
 * Type definition for the sqlite-vec module, loaded through createRequire
 */
export interface SqliteVecModule {
  load: (db: Database.Database) => void;
}

/**
 * Row shape of the chunks table
 */
export interface ChunkRow {
  fingerprint: string;
  seq: number;
  text: string;
  source_id: string;
  chunk_index: number;
  character_start: number;
  character_end: number;
  created_at: string;
}

/**
 * Chunk row joined with its vector and cosine distance to a query
 */
export interface CandidateRow extends ChunkRow {
  vector: Buffer;
  distance: number;
}
