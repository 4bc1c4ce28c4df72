/**
 * SessionIndex - one session's chunks and vectors
 *
 * Wraps an open better-sqlite3 connection to `<sessionDir>/index.db`.
 * Reads are synchronous. Writes go through VectorIndexManager.addDocuments,
 * which owns deduplication and embedding; `insertEmbedded` here only writes
 * what it is given, in one transaction.
 *
 * @module services/storage/session-index
 */

import type Database from 'better-sqlite3';
import type { Chunk, RetrievalCandidate, StoredChunk } from '../../models/chunk.js';
import { EmbeddingError } from '../embedding/provider.js';
import { META_KEYS } from './schema.js';
import type { CandidateRow, ChunkRow } from './types.js';

function rowToStoredChunk(row: ChunkRow): StoredChunk {
  return {
    text: row.text,
    sourceId: row.source_id,
    chunkIndex: row.chunk_index,
    characterStart: row.character_start,
    characterEnd: row.character_end,
    fingerprint: row.fingerprint,
    seq: row.seq,
    createdAt: row.created_at,
  };
}

/** Copy a BLOB into an aligned Float32Array */
export function bufferToVector(buffer: Buffer): Float32Array {
  const copy = buffer.buffer.slice(buffer.byteOffset, buffer.byteOffset + buffer.byteLength);
  return new Float32Array(copy);
}

export function vectorToBuffer(vector: Float32Array): Buffer {
  return Buffer.from(vector.buffer, vector.byteOffset, vector.byteLength);
}

export class SessionIndex {
  private closed = false;

  constructor(
    private readonly db: Database.Database,
    /** Session directory holding index.db */
    readonly path: string,
    readonly sessionId: string
  ) {}

  // ═══════════════════════════════════════════════════════════════════════════
  // READ OPERATIONS
  // ═══════════════════════════════════════════════════════════════════════════

  /** Number of stored chunks */
  size(): number {
    const row = this.db
      .prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM chunks')
      .get();
    return row?.count ?? 0;
  }

  /** Stored fingerprints in insertion order */
  fingerprints(): string[] {
    return this.db
      .prepare<[], { fingerprint: string }>('SELECT fingerprint FROM chunks ORDER BY seq')
      .all()
      .map((r) => r.fingerprint);
  }

  has(fingerprint: string): boolean {
    return (
      this.db
        .prepare<[string], { found: number }>(
          'SELECT 1 AS found FROM chunks WHERE fingerprint = ?'
        )
        .get(fingerprint) !== undefined
    );
  }

  /** Vector dimension, or null before the first insert */
  dimensions(): number | null {
    const value = this.getMeta(META_KEYS.DIMENSIONS);
    return value === null ? null : parseInt(value, 10);
  }

  /** Name of the embedding provider that wrote the vectors, or null when empty */
  embeddingModel(): string | null {
    return this.getMeta(META_KEYS.EMBEDDING_MODEL);
  }

  getMeta(key: string): string | null {
    const row = this.db
      .prepare<[string], { value: string }>('SELECT value FROM index_meta WHERE key = ?')
      .get(key);
    return row?.value ?? null;
  }

  /** All stored chunks in insertion order */
  chunks(): StoredChunk[] {
    return this.db
      .prepare<[], ChunkRow>(
        `SELECT fingerprint, seq, text, source_id, chunk_index, character_start, character_end, created_at
         FROM chunks ORDER BY seq`
      )
      .all()
      .map(rowToStoredChunk);
  }

  /**
   * Nearest neighbours by cosine similarity.
   *
   * @param queryVector - Must match the index dimension
   * @param fetchK - Maximum candidates
   * @returns Candidates by descending similarity (score = 1 - cosine distance),
   * ties by insertion order
   * @throws EmbeddingError when the query dimension differs from the index
   */
  searchSimilar(queryVector: Float32Array, fetchK: number): RetrievalCandidate[] {
    const dimensions = this.dimensions();
    if (dimensions === null || fetchK <= 0) {
      return [];
    }
    if (queryVector.length !== dimensions) {
      throw new EmbeddingError(
        `Query vector has ${queryVector.length} dimensions, index has ${dimensions}`,
        'DIMENSION_MISMATCH',
        { expected: dimensions, actual: queryVector.length, sessionId: this.sessionId }
      );
    }

    const rows = this.db
      .prepare<[Buffer, number], CandidateRow>(
        `SELECT c.fingerprint, c.seq, c.text, c.source_id, c.chunk_index,
                c.character_start, c.character_end, c.created_at,
                v.vector,
                vec_distance_cosine(v.vector, ?) AS distance
         FROM chunks c
         JOIN vectors v ON v.fingerprint = c.fingerprint
         ORDER BY distance ASC, c.seq ASC
         LIMIT ?`
      )
      .all(vectorToBuffer(queryVector), fetchK);

    return rows.map((row) => ({
      chunk: rowToStoredChunk(row),
      vector: bufferToVector(row.vector),
      score: 1 - row.distance,
    }));
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // WRITE OPERATIONS
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * Insert chunks with their vectors in one transaction. Fingerprints already
   * present are ignored. Records dimension and embedding model on first insert.
   *
   * @returns Number of chunks actually inserted
   */
  insertEmbedded(chunks: readonly Chunk[], vectors: readonly Float32Array[], model: string): number {
    const insertChunk = this.db.prepare<[string, number, string, string, number, number, number, string]>(
      `INSERT OR IGNORE INTO chunks
         (fingerprint, seq, text, source_id, chunk_index, character_start, character_end, created_at)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?)`
    );
    const insertVector = this.db.prepare<[string, number, Buffer]>(
      'INSERT INTO vectors (fingerprint, dimensions, vector) VALUES (?, ?, ?)'
    );
    const setMeta = this.db.prepare<[string, string]>(
      'INSERT OR IGNORE INTO index_meta (key, value) VALUES (?, ?)'
    );
    const maxSeq = this.db.prepare<[], { seq: number | null }>('SELECT MAX(seq) AS seq FROM chunks');

    const run = this.db.transaction(() => {
      let seq = maxSeq.get()?.seq ?? 0;
      const createdAt = new Date().toISOString();
      let inserted = 0;

      chunks.forEach((chunk, i) => {
        const vector = vectors[i];
        const result = insertChunk.run(
          chunk.fingerprint,
          seq + 1,
          chunk.text,
          chunk.sourceId,
          chunk.chunkIndex,
          chunk.characterStart,
          chunk.characterEnd,
          createdAt
        );
        if (result.changes === 0) {
          return;
        }
        seq++;
        insertVector.run(chunk.fingerprint, vector.length, vectorToBuffer(vector));
        inserted++;
      });

      if (inserted > 0 && vectors.length > 0) {
        setMeta.run(META_KEYS.DIMENSIONS, String(vectors[0].length));
        setMeta.run(META_KEYS.EMBEDDING_MODEL, model);
      }
      return inserted;
    });

    return run();
  }

  /** Flush the WAL into index.db */
  checkpoint(): void {
    this.db.pragma('wal_checkpoint(TRUNCATE)');
  }

  isClosed(): boolean {
    return this.closed;
  }

  close(): void {
    if (this.closed) return;
    this.db.close();
    this.closed = true;
  }
}
