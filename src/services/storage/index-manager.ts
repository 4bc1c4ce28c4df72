/**
 * VectorIndexManager - creates, loads, grows and persists session indexes
 *
 * Layout: `<indexRoot>/<sessionId>/index.db`. The manager owns the embedding
 * provider: `addDocuments` dedupes by fingerprint (against the index and
 * within the batch), embeds only new chunks, inserts them in one transaction
 * and checkpoints, so a second identical call writes nothing.
 *
 * Single writer per session is assumed; the tool layer serializes writers
 * with SessionLockRegistry.
 *
 * @module services/storage/index-manager
 */

import Database from 'better-sqlite3';
import { existsSync, mkdirSync, readdirSync, rmSync, statSync } from 'fs';
import path from 'path';
import type { Chunk } from '../../models/chunk.js';
import { IndexCorruptError, IndexNotFoundError, InvalidParameterError } from '../errors.js';
import { EmbeddingError, type EmbeddingProvider, assertEmbeddingBatch } from '../embedding/provider.js';
import { isValidSessionId } from '../session/session-id.js';
import { TimeoutError, withTimeout } from '../../utils/timeout.js';
import {
  INDEX_FILE_NAME,
  META_KEYS,
  SCHEMA_VERSION,
  configurePragmas,
  createSchema,
  findMissingTables,
  loadSqliteVec,
} from './schema.js';
import { SessionIndex } from './session-index.js';

export interface VectorIndexManagerOptions {
  /** Directory holding one subdirectory per session */
  indexRoot: string;
  embeddingProvider: EmbeddingProvider;
  /** Timeout around each embedDocuments call; 0 disables */
  embedTimeoutMs?: number;
}

export interface IndexedSessionInfo {
  sessionId: string;
  path: string;
  /** Null when the index could not be read */
  chunkCount: number | null;
}

export class VectorIndexManager {
  readonly indexRoot: string;
  private readonly embeddingProvider: EmbeddingProvider;
  private readonly embedTimeoutMs: number;

  constructor(options: VectorIndexManagerOptions) {
    this.indexRoot = path.resolve(options.indexRoot);
    this.embeddingProvider = options.embeddingProvider;
    this.embedTimeoutMs = options.embedTimeoutMs ?? 0;
  }

  get provider(): EmbeddingProvider {
    return this.embeddingProvider;
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // PATHS
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * Session directory under the index root
   *
   * @throws InvalidParameterError when the id is not a safe path segment
   */
  resolveSessionDir(sessionId: string): string {
    if (!isValidSessionId(sessionId)) {
      throw new InvalidParameterError(`Invalid session id: "${sessionId}"`, { sessionId });
    }
    return path.join(this.indexRoot, sessionId);
  }

  exists(sessionId: string): boolean {
    return existsSync(path.join(this.resolveSessionDir(sessionId), INDEX_FILE_NAME));
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // OPEN / CREATE
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * Open the session's persisted index, or initialize an empty one.
   *
   * @throws IndexCorruptError when the file exists but is unreadable or inconsistent
   */
  createOrOpen(sessionId: string): SessionIndex {
    const dir = this.resolveSessionDir(sessionId);
    const dbPath = path.join(dir, INDEX_FILE_NAME);

    if (existsSync(dbPath)) {
      return this.openVerified(dir, sessionId);
    }

    mkdirSync(dir, { recursive: true });
    const db = new Database(dbPath);
    try {
      loadSqliteVec(db);
      configurePragmas(db);
      createSchema(db, sessionId);
    } catch (error) {
      db.close();
      throw error;
    }
    console.error(`[IndexManager] Created index for session ${sessionId} at ${dir}`);
    return new SessionIndex(db, dir, sessionId);
  }

  /**
   * Open an existing index directory.
   *
   * @param indexPath - Session directory containing index.db
   * @throws IndexNotFoundError when the directory or its index.db is missing
   * @throws IndexCorruptError when the index is unreadable or inconsistent
   */
  load(indexPath: string): SessionIndex {
    const dir = path.resolve(indexPath);
    if (!existsSync(dir) || !statSync(dir).isDirectory()) {
      throw new IndexNotFoundError(dir);
    }
    if (!existsSync(path.join(dir, INDEX_FILE_NAME))) {
      throw new IndexNotFoundError(dir);
    }
    return this.openVerified(dir, path.basename(dir));
  }

  private openVerified(dir: string, fallbackSessionId: string): SessionIndex {
    const dbPath = path.join(dir, INDEX_FILE_NAME);

    let db: Database.Database;
    try {
      db = new Database(dbPath, { fileMustExist: true });
    } catch (error) {
      throw new IndexCorruptError(`Cannot open index at ${dbPath}`, dir, { cause: error });
    }

    try {
      loadSqliteVec(db);
    } catch (error) {
      db.close();
      throw error;
    }

    try {
      configurePragmas(db);
      this.verify(db, dir);
    } catch (error) {
      db.close();
      if (error instanceof IndexCorruptError) throw error;
      throw new IndexCorruptError(`Index at ${dbPath} is unreadable`, dir, { cause: error });
    }

    const recorded = db
      .prepare<[string], { value: string }>('SELECT value FROM index_meta WHERE key = ?')
      .get(META_KEYS.SESSION_ID);
    return new SessionIndex(db, dir, recorded?.value ?? fallbackSessionId);
  }

  /**
   * Structural checks run on every open
   */
  private verify(db: Database.Database, dir: string): void {
    const missing = findMissingTables(db);
    if (missing.length > 0) {
      throw new IndexCorruptError(`Index schema incomplete, missing: ${missing.join(', ')}`, dir, {
        details: { missingTables: missing },
      });
    }

    const version = db
      .prepare<[string], { value: string }>('SELECT value FROM index_meta WHERE key = ?')
      .get(META_KEYS.SCHEMA_VERSION);
    if (version === undefined || parseInt(version.value, 10) !== SCHEMA_VERSION) {
      throw new IndexCorruptError(
        `Unsupported index schema version: ${version?.value ?? 'missing'} (expected ${SCHEMA_VERSION})`,
        dir
      );
    }

    const counts = db
      .prepare<[], { chunks: number; vectors: number }>(
        'SELECT (SELECT COUNT(*) FROM chunks) AS chunks, (SELECT COUNT(*) FROM vectors) AS vectors'
      )
      .get();
    if (counts === undefined || counts.chunks !== counts.vectors) {
      throw new IndexCorruptError(
        `Index inconsistent: ${counts?.chunks ?? '?'} chunks but ${counts?.vectors ?? '?'} vectors`,
        dir,
        { details: { chunks: counts?.chunks, vectors: counts?.vectors } }
      );
    }

    const dims = db
      .prepare<[string], { value: string }>('SELECT value FROM index_meta WHERE key = ?')
      .get(META_KEYS.DIMENSIONS);
    if (dims !== undefined) {
      const ragged = db
        .prepare<[number], { count: number }>(
          'SELECT COUNT(*) AS count FROM vectors WHERE dimensions != ? OR length(vector) != dimensions * 4'
        )
        .get(parseInt(dims.value, 10));
      if (ragged !== undefined && ragged.count > 0) {
        throw new IndexCorruptError(`Index has ${ragged.count} vectors of the wrong dimension`, dir, {
          details: { dimensions: dims.value, ragged: ragged.count },
        });
      }
    } else if (counts.chunks > 0) {
      throw new IndexCorruptError('Index has chunks but no recorded dimension', dir);
    }
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // WRITE
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * Add chunks not already present. Embeds only the new ones, inserts them in
   * one transaction, then persists.
   *
   * @returns Number of chunks inserted (0 when everything was a duplicate)
   * @throws EmbeddingError when the provider fails or returns vectors of the
   * wrong count or dimension; nothing is written in that case
   */
  async addDocuments(index: SessionIndex, chunks: readonly Chunk[]): Promise<number> {
    const seen = new Set<string>();
    const fresh: Chunk[] = [];
    for (const chunk of chunks) {
      if (seen.has(chunk.fingerprint) || index.has(chunk.fingerprint)) {
        continue;
      }
      seen.add(chunk.fingerprint);
      fresh.push(chunk);
    }

    if (fresh.length === 0) {
      console.error(
        `[IndexManager] addDocuments session=${index.sessionId} offered=${chunks.length} added=0 (all duplicates)`
      );
      return 0;
    }

    this.assertProviderMatches(index);

    let vectors: Float32Array[];
    try {
      vectors = await withTimeout(
        this.embeddingProvider.embedDocuments(fresh.map((c) => c.text)),
        this.embedTimeoutMs,
        `Embedding ${fresh.length} chunks`
      );
    } catch (error) {
      if (error instanceof EmbeddingError) throw error;
      if (error instanceof TimeoutError) {
        throw new EmbeddingError(error.message, 'TIMEOUT', { sessionId: index.sessionId }, { cause: error });
      }
      throw new EmbeddingError(
        `Embedding failed: ${error instanceof Error ? error.message : String(error)}`,
        'EMBEDDING_FAILED',
        { sessionId: index.sessionId, chunks: fresh.length },
        { cause: error }
      );
    }
    assertEmbeddingBatch(vectors, fresh.length, index.dimensions());

    const inserted = index.insertEmbedded(fresh, vectors, this.embeddingProvider.name);
    this.persist(index);

    console.error(
      `[IndexManager] addDocuments session=${index.sessionId} offered=${chunks.length} added=${inserted} size=${index.size()}`
    );
    return inserted;
  }

  /**
   * Reject an index whose recorded embedding model differs from the current
   * provider. An index with no vectors yet has no model and always passes.
   *
   * @throws EmbeddingError with code MODEL_MISMATCH
   */
  assertProviderMatches(index: SessionIndex): void {
    const model = index.embeddingModel();
    if (model !== null && model !== this.embeddingProvider.name) {
      throw new EmbeddingError(
        `Index was built with ${model}, current provider is ${this.embeddingProvider.name}`,
        'MODEL_MISMATCH',
        { sessionId: index.sessionId, indexModel: model, provider: this.embeddingProvider.name }
      );
    }
  }

  /**
   * Make the on-disk file hold the complete state
   */
  persist(index: SessionIndex): void {
    index.checkpoint();
  }

  close(index: SessionIndex): void {
    index.close();
  }

  /**
   * Remove a session's directory and everything in it. The index must be closed.
   */
  removeSession(sessionId: string): void {
    const dir = this.resolveSessionDir(sessionId);
    rmSync(dir, { recursive: true, force: true });
    console.error(`[IndexManager] Removed session directory ${dir}`);
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // LISTING
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * Sessions with an index under the root, sorted by id
   */
  listSessions(): IndexedSessionInfo[] {
    if (!existsSync(this.indexRoot)) {
      return [];
    }

    const sessions: IndexedSessionInfo[] = [];
    for (const entry of readdirSync(this.indexRoot, { withFileTypes: true })) {
      if (!entry.isDirectory() || !isValidSessionId(entry.name)) continue;
      const dir = path.join(this.indexRoot, entry.name);
      if (!existsSync(path.join(dir, INDEX_FILE_NAME))) continue;

      let chunkCount: number | null = null;
      try {
        const index = this.load(dir);
        try {
          chunkCount = index.size();
        } finally {
          index.close();
        }
      } catch (error) {
        console.error(
          `[IndexManager] Skipping unreadable index ${dir}: ${error instanceof Error ? error.message : String(error)}`
        );
      }
      sessions.push({ sessionId: entry.name, path: dir, chunkCount });
    }
    return sessions.sort((a, b) => a.sessionId.localeCompare(b.sessionId));
  }
}
