/**
 * Unit Tests for the document loader and upload pipeline
 *
 * @module tests/unit/ingestion/ingestor
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, readdirSync, writeFileSync } from 'fs';
import { join } from 'path';
import {
  DocumentLoadError,
  loadDocuments,
  loadInlineDocuments,
} from '../../../src/services/ingestion/loader.js';
import { DocumentIngestor } from '../../../src/services/ingestion/ingestor.js';
import { HashingEmbeddingProvider } from '../../../src/services/embedding/hashing.js';
import { EmbeddingError } from '../../../src/services/embedding/provider.js';
import { ConfigurationError, SessionNotFoundError } from '../../../src/services/errors.js';
import { SessionLockRegistry } from '../../../src/services/session/locks.js';
import { VectorIndexManager } from '../../../src/services/storage/index-manager.js';
import {
  BrokenEmbeddingProvider,
  cleanupTempDir,
  createTempDir,
  sqliteVecAvailable,
} from '../../helpers.js';

// ═══════════════════════════════════════════════════════════════════════════════
// LOADER
// ═══════════════════════════════════════════════════════════════════════════════

describe('loadDocuments', () => {
  let dir: string;

  beforeEach(() => {
    dir = createTempDir('loader-');
  });

  afterEach(() => {
    cleanupTempDir(dir);
  });

  it('reads text files with the base name as source id', () => {
    const file = join(dir, 'notes.md');
    writeFileSync(file, '# Notes\n\nSome text.');

    const { documents, skipped } = loadDocuments([file]);

    expect(skipped).toEqual([]);
    expect(documents).toHaveLength(1);
    expect(documents[0].sourceId).toBe('notes.md');
    expect(documents[0].text).toBe('# Notes\n\nSome text.');
    expect(documents[0].origin).toEqual({
      kind: 'file',
      filePath: file,
      extension: '.md',
      sizeBytes: 19,
    });
  });

  it('strips a byte order mark and normalizes line endings', () => {
    const file = join(dir, 'windows.txt');
    writeFileSync(file, '\ufeffline one\r\nline two\rline three');

    expect(loadDocuments([file]).documents[0].text).toBe('line one\nline two\nline three');
  });

  it('skips unsupported extensions without failing', () => {
    const text = join(dir, 'keep.txt');
    const binary = join(dir, 'scan.pdf');
    writeFileSync(text, 'kept');
    writeFileSync(binary, '%PDF-1.7');

    const { documents, skipped } = loadDocuments([text, binary]);

    expect(documents.map((d) => d.sourceId)).toEqual(['keep.txt']);
    expect(skipped).toHaveLength(1);
    expect(skipped[0].source).toBe(binary);
    expect(skipped[0].reason).toContain('Unsupported extension ".pdf"');
  });

  it('throws PATH_NOT_FOUND for a missing file', () => {
    const missing = join(dir, 'missing.txt');
    const error = (() => {
      try {
        loadDocuments([missing]);
        return null;
      } catch (e) {
        return e;
      }
    })();

    expect(error).toBeInstanceOf(DocumentLoadError);
    expect(error).toMatchObject({ code: 'PATH_NOT_FOUND', message: `Path does not exist: ${missing}` });
  });

  it('throws NOT_A_FILE for a directory with a text extension', () => {
    const folder = join(dir, 'folder.txt');
    mkdirSync(folder);
    expect(() => loadDocuments([folder])).toThrow(`Not a regular file: ${folder}`);
  });
});

describe('loadInlineDocuments', () => {
  it('uses the trimmed name as source id', () => {
    const { documents } = loadInlineDocuments([{ name: ' faq.txt ', content: 'Q\r\nA' }]);
    expect(documents).toEqual([{ text: 'Q\nA', sourceId: 'faq.txt', origin: { kind: 'inline' } }]);
  });

  it('skips documents without a name', () => {
    const { documents, skipped } = loadInlineDocuments([{ name: '   ', content: 'orphan' }]);
    expect(documents).toEqual([]);
    expect(skipped).toEqual([{ source: '(unnamed)', reason: 'Inline document name is empty' }]);
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// INGESTOR
// ═══════════════════════════════════════════════════════════════════════════════

const POLICY =
  'All visitors must sign in at reception and wear a badge at all times.\n\n' +
  'Badges are returned at the end of the visit and logged by security staff.';

describe.skipIf(!sqliteVecAvailable)('DocumentIngestor', () => {
  let root: string;
  let manager: VectorIndexManager;
  let ingestor: DocumentIngestor;

  beforeEach(() => {
    root = createTempDir('ingest-');
    manager = new VectorIndexManager({
      indexRoot: root,
      embeddingProvider: new HashingEmbeddingProvider(64),
    });
    ingestor = new DocumentIngestor(manager, new SessionLockRegistry());
  });

  afterEach(() => {
    cleanupTempDir(root);
  });

  it('creates a new session on first upload', async () => {
    const result = await ingestor.ingest({
      documents: [{ name: 'policy.txt', content: POLICY }],
      chunkSize: 100,
      chunkOverlap: 10,
    });

    expect(result.created).toBe(true);
    expect(result.documents).toBe(1);
    expect(result.chunks).toBe(2);
    expect(result.added).toBe(2);
    expect(result.duplicates).toBe(0);
    expect(result.indexSize).toBe(2);
    expect(manager.exists(result.sessionId)).toBe(true);
  });

  it('reports every chunk as duplicate on re-upload', async () => {
    const request = {
      documents: [{ name: 'policy.txt', content: POLICY }],
      chunkSize: 100,
      chunkOverlap: 10,
    };
    const first = await ingestor.ingest(request);
    const second = await ingestor.ingest({ ...request, sessionId: first.sessionId });

    expect(second.created).toBe(false);
    expect(second.added).toBe(0);
    expect(second.duplicates).toBe(2);
    expect(second.indexSize).toBe(2);
  });

  it('extends an existing session with new content', async () => {
    const first = await ingestor.ingest({
      documents: [{ name: 'policy.txt', content: POLICY }],
      chunkSize: 100,
      chunkOverlap: 10,
    });
    const second = await ingestor.ingest({
      sessionId: first.sessionId,
      documents: [{ name: 'parking.txt', content: 'Visitor parking is behind the east building.' }],
      chunkSize: 100,
      chunkOverlap: 10,
    });

    expect(second.added).toBe(1);
    expect(second.indexSize).toBe(3);
  });

  it('rejects an unknown session id', async () => {
    await expect(
      ingestor.ingest({
        sessionId: 'no-such-session',
        documents: [{ name: 'a.txt', content: 'text' }],
        chunkSize: 100,
        chunkOverlap: 10,
      })
    ).rejects.toThrow(SessionNotFoundError);
  });

  it('validates chunk parameters before loading anything', async () => {
    await expect(
      ingestor.ingest({ filePaths: ['/does/not/exist.txt'], chunkSize: 100, chunkOverlap: 0 })
    ).rejects.toThrow('chunk_overlap must be a positive integer, got 0');
    await expect(
      ingestor.ingest({ filePaths: ['/does/not/exist.txt'], chunkSize: 50, chunkOverlap: 50 })
    ).rejects.toThrow('chunk_overlap (50) must be smaller than chunk_size (50)');
  });

  it('fails when nothing loadable was supplied', async () => {
    const error = await ingestor
      .ingest({ filePaths: [join(root, 'image.png')], chunkSize: 100, chunkOverlap: 10 })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error).toMatchObject({ message: 'No valid documents loaded' });
  });

  it('propagates embedding failures', async () => {
    const broken = new DocumentIngestor(
      new VectorIndexManager({ indexRoot: root, embeddingProvider: new BrokenEmbeddingProvider('throw') }),
      new SessionLockRegistry()
    );

    await expect(
      broken.ingest({
        documents: [{ name: 'policy.txt', content: POLICY }],
        chunkSize: 100,
        chunkOverlap: 10,
      })
    ).rejects.toThrow(EmbeddingError);
  });

  it('removes a new session whose first upload fails', async () => {
    const brokenManager = new VectorIndexManager({
      indexRoot: root,
      embeddingProvider: new BrokenEmbeddingProvider('throw'),
    });
    const broken = new DocumentIngestor(brokenManager, new SessionLockRegistry());

    await expect(
      broken.ingest({
        documents: [{ name: 'policy.txt', content: POLICY }],
        chunkSize: 100,
        chunkOverlap: 10,
      })
    ).rejects.toThrow(EmbeddingError);

    expect(brokenManager.listSessions()).toEqual([]);
    expect(readdirSync(root)).toEqual([]);
  });

  it('keeps an existing session when a later upload fails', async () => {
    const first = await ingestor.ingest({
      documents: [{ name: 'policy.txt', content: POLICY }],
      chunkSize: 100,
      chunkOverlap: 10,
    });
    const broken = new DocumentIngestor(
      new VectorIndexManager({ indexRoot: root, embeddingProvider: new BrokenEmbeddingProvider('throw', 'hashing:64') }),
      new SessionLockRegistry()
    );

    await expect(
      broken.ingest({
        sessionId: first.sessionId,
        documents: [{ name: 'extra.txt', content: 'Visitors must sign in at reception.' }],
        chunkSize: 100,
        chunkOverlap: 10,
      })
    ).rejects.toThrow(EmbeddingError);

    expect(manager.exists(first.sessionId)).toBe(true);
    expect(manager.listSessions()).toEqual([
      { sessionId: first.sessionId, path: join(root, first.sessionId), chunkCount: 2 },
    ]);
  });
});
