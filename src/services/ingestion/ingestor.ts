/**
 * Upload pipeline: load → split → add to the session index
 *
 * Loading and splitting run without any lock. Opening the index, embedding
 * the new chunks, inserting and persisting run under the session's write
 * lock so readers never see a partial batch.
 *
 * @module services/ingestion/ingestor
 */

import type { Chunk } from '../../models/chunk.js';
import { splitDocuments, validateSplitterConfig } from '../chunking/splitter.js';
import { ConfigurationError, SessionNotFoundError } from '../errors.js';
import type { SessionLockRegistry } from '../session/locks.js';
import { generateSessionId } from '../session/session-id.js';
import type { VectorIndexManager } from '../storage/index-manager.js';
import {
  type InlineDocument,
  type SkippedDocument,
  loadDocuments,
  loadInlineDocuments,
} from './loader.js';

export interface IngestRequest {
  /** Existing session to extend; a new session is created when absent */
  sessionId?: string;
  filePaths?: string[];
  documents?: InlineDocument[];
  chunkSize: number;
  chunkOverlap: number;
}

export interface IngestResult {
  sessionId: string;
  /** True when this call created the session */
  created: boolean;
  documents: number;
  chunks: number;
  /** Chunks newly stored */
  added: number;
  /** Chunks already present (by fingerprint) */
  duplicates: number;
  /** Index size after the upload */
  indexSize: number;
  skipped: SkippedDocument[];
}

export class DocumentIngestor {
  constructor(
    private readonly indexManager: VectorIndexManager,
    private readonly locks: SessionLockRegistry
  ) {}

  /**
   * @throws ConfigurationError on bad chunk parameters or when nothing loadable was supplied
   * @throws SessionNotFoundError when request.sessionId names no existing index
   * @throws DocumentLoadError when a file cannot be read
   * @throws EmbeddingError when embedding fails; an existing index is left unchanged
   * and a session created by this call is removed
   */
  async ingest(request: IngestRequest): Promise<IngestResult> {
    validateSplitterConfig({ chunkSize: request.chunkSize, chunkOverlap: request.chunkOverlap });

    const created = request.sessionId === undefined;
    const sessionId = request.sessionId ?? generateSessionId();
    if (!created && !this.indexManager.exists(sessionId)) {
      throw new SessionNotFoundError(sessionId);
    }

    const fromFiles = loadDocuments(request.filePaths ?? []);
    const inline = loadInlineDocuments(request.documents ?? []);
    const documents = [...fromFiles.documents, ...inline.documents];
    const skipped = [...fromFiles.skipped, ...inline.skipped];

    if (documents.length === 0) {
      throw new ConfigurationError('No valid documents loaded', {
        skipped: skipped.map((s) => s.source),
      });
    }

    const chunks: Chunk[] = splitDocuments(documents, request.chunkSize, request.chunkOverlap);

    const { added, indexSize } = await this.locks.withWrite(sessionId, async () => {
      const index = this.indexManager.createOrOpen(sessionId);
      let result: { added: number; indexSize: number };
      try {
        const inserted = await this.indexManager.addDocuments(index, chunks);
        result = { added: inserted, indexSize: index.size() };
      } catch (error) {
        this.indexManager.close(index);
        // A new session whose first upload failed was never handed to the caller
        if (created) {
          this.indexManager.removeSession(sessionId);
        }
        throw error;
      }
      this.indexManager.close(index);
      return result;
    });

    console.error(
      `[Ingestor] Upload complete: session=${sessionId} created=${created} documents=${documents.length} chunks=${chunks.length} added=${added} index_size=${indexSize}`
    );

    return {
      sessionId,
      created,
      documents: documents.length,
      chunks: chunks.length,
      added,
      duplicates: chunks.length - added,
      indexSize,
      skipped,
    };
  }
}
