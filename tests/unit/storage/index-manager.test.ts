/**
 * Unit Tests for VectorIndexManager and SessionIndex
 *
 * Uses REAL session indexes in temp directories with sqlite-vec loaded.
 * Skipped when the sqlite-vec extension is not available on this platform.
 *
 * @module tests/unit/storage/index-manager
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import { existsSync, mkdirSync, writeFileSync } from 'fs';
import { join } from 'path';
import { splitDocuments } from '../../../src/services/chunking/splitter.js';
import { EmbeddingError } from '../../../src/services/embedding/provider.js';
import { HashingEmbeddingProvider } from '../../../src/services/embedding/hashing.js';
import {
  IndexCorruptError,
  IndexNotFoundError,
  InvalidParameterError,
} from '../../../src/services/errors.js';
import { VectorIndexManager } from '../../../src/services/storage/index-manager.js';
import { INDEX_FILE_NAME } from '../../../src/services/storage/schema.js';
import type { SessionIndex } from '../../../src/services/storage/session-index.js';
import {
  BrokenEmbeddingProvider,
  cleanupTempDir,
  createTempDir,
  doc,
  sqliteVecAvailable,
} from '../../helpers.js';

const TEXT_A =
  'Solar panels convert sunlight into electricity.\n\nBatteries store the surplus for the night.\n\nInverters feed the grid.';
const TEXT_B = 'Sourdough needs a lively starter.\n\nLong fermentation develops flavour.';

function chunksOf(text: string, sourceId: string) {
  return splitDocuments([doc(text, sourceId)], 60, 10);
}

describe.skipIf(!sqliteVecAvailable)('VectorIndexManager', () => {
  let root: string;
  let manager: VectorIndexManager;
  const open: SessionIndex[] = [];

  function track(index: SessionIndex): SessionIndex {
    open.push(index);
    return index;
  }

  beforeEach(() => {
    root = createTempDir('index-');
    manager = new VectorIndexManager({
      indexRoot: root,
      embeddingProvider: new HashingEmbeddingProvider(64),
    });
  });

  afterEach(() => {
    for (const index of open.splice(0)) index.close();
    cleanupTempDir(root);
  });

  // ═══════════════════════════════════════════════════════════════════════════
  // PATHS
  // ═══════════════════════════════════════════════════════════════════════════

  describe('resolveSessionDir', () => {
    it('places each session in its own directory under the root', () => {
      expect(manager.resolveSessionDir('s1')).toBe(join(root, 's1'));
    });

    it('rejects ids that are not a single path segment', () => {
      expect(() => manager.resolveSessionDir('../escape')).toThrow(InvalidParameterError);
      expect(() => manager.exists('a/b')).toThrow(InvalidParameterError);
    });
  });

  // ═══════════════════════════════════════════════════════════════════════════
  // CREATE / LOAD
  // ═══════════════════════════════════════════════════════════════════════════

  describe('createOrOpen', () => {
    it('initializes an empty index', () => {
      expect(manager.exists('s1')).toBe(false);
      const index = track(manager.createOrOpen('s1'));

      expect(manager.exists('s1')).toBe(true);
      expect(existsSync(join(root, 's1', INDEX_FILE_NAME))).toBe(true);
      expect(index.size()).toBe(0);
      expect(index.dimensions()).toBeNull();
      expect(index.embeddingModel()).toBeNull();
      expect(index.sessionId).toBe('s1');
    });

    it('reopens an existing index with its content', async () => {
      const first = manager.createOrOpen('s1');
      const added = await manager.addDocuments(first, chunksOf(TEXT_A, 'solar.txt'));
      first.close();

      const again = track(manager.createOrOpen('s1'));
      expect(again.size()).toBe(added);
    });
  });

  describe('load', () => {
    it('fails with IndexNotFoundError for a missing directory', () => {
      expect(() => manager.load(join(root, 'nope'))).toThrow(IndexNotFoundError);
    });

    it('fails with IndexNotFoundError for a directory without index.db', () => {
      mkdirSync(join(root, 'empty-dir'));
      expect(() => manager.load(join(root, 'empty-dir'))).toThrow(IndexNotFoundError);
    });

    it('sees everything persisted by addDocuments', async () => {
      const chunks = chunksOf(TEXT_A, 'solar.txt');
      const index = track(manager.createOrOpen('s1'));
      await manager.addDocuments(index, chunks);

      const loaded = track(manager.load(join(root, 's1')));
      expect(loaded.size()).toBe(chunks.length);
      expect(loaded.fingerprints()).toEqual(chunks.map((c) => c.fingerprint));
      expect(loaded.chunks().map((c) => c.text)).toEqual(chunks.map((c) => c.text));
      expect(loaded.dimensions()).toBe(64);
      expect(loaded.embeddingModel()).toBe('hashing:64');
    });

    it('reports an inconsistent index as corrupt', async () => {
      const index = manager.createOrOpen('s1');
      await manager.addDocuments(index, chunksOf(TEXT_A, 'solar.txt'));
      index.close();

      const raw = new Database(join(root, 's1', INDEX_FILE_NAME));
      raw.exec('DELETE FROM vectors WHERE rowid IN (SELECT rowid FROM vectors LIMIT 1)');
      raw.close();

      expect(() => manager.load(join(root, 's1'))).toThrow(IndexCorruptError);
      expect(() => manager.load(join(root, 's1'))).toThrow(/Index inconsistent/);
    });

    it('reports a missing table as corrupt', () => {
      manager.createOrOpen('s1').close();

      const raw = new Database(join(root, 's1', INDEX_FILE_NAME));
      raw.exec('DROP TABLE vectors');
      raw.close();

      expect(() => manager.createOrOpen('s1')).toThrow('Index schema incomplete, missing: vectors');
    });

    it('reports an unknown schema version as corrupt', () => {
      manager.createOrOpen('s1').close();

      const raw = new Database(join(root, 's1', INDEX_FILE_NAME));
      raw.prepare("UPDATE index_meta SET value = '99' WHERE key = 'schema_version'").run();
      raw.close();

      expect(() => manager.load(join(root, 's1'))).toThrow(
        'Unsupported index schema version: 99 (expected 1)'
      );
    });
  });

  // ═══════════════════════════════════════════════════════════════════════════
  // addDocuments
  // ═══════════════════════════════════════════════════════════════════════════

  describe('addDocuments', () => {
    it('is idempotent for the same chunks', async () => {
      const chunks = chunksOf(TEXT_A, 'solar.txt');
      const index = track(manager.createOrOpen('s1'));

      expect(await manager.addDocuments(index, chunks)).toBe(chunks.length);
      expect(await manager.addDocuments(index, chunks)).toBe(0);
      expect(index.size()).toBe(chunks.length);
    });

    it('dedupes within one batch', async () => {
      const chunks = chunksOf(TEXT_B, 'bread.txt');
      const index = track(manager.createOrOpen('s1'));

      expect(await manager.addDocuments(index, [...chunks, ...chunks])).toBe(chunks.length);
    });

    it('appends only new chunks in insertion order', async () => {
      const a = chunksOf(TEXT_A, 'solar.txt');
      const b = chunksOf(TEXT_B, 'bread.txt');
      const index = track(manager.createOrOpen('s1'));

      await manager.addDocuments(index, a);
      expect(await manager.addDocuments(index, [...a, ...b])).toBe(b.length);
      expect(index.fingerprints()).toEqual([...a, ...b].map((c) => c.fingerprint));
      expect(index.chunks().map((c) => c.seq)).toEqual(
        Array.from({ length: a.length + b.length }, (_, i) => i + 1)
      );
    });

    it('embeds only chunks that are not yet stored', async () => {
      const texts: string[][] = [];
      const provider = new HashingEmbeddingProvider(64);
      const recording = new VectorIndexManager({
        indexRoot: root,
        embeddingProvider: {
          name: provider.name,
          dimensions: provider.dimensions,
          embedDocuments: async (batch: string[]) => {
            texts.push(batch);
            return provider.embedDocuments(batch);
          },
          embedQuery: (q: string) => provider.embedQuery(q),
        },
      });
      const a = chunksOf(TEXT_A, 'solar.txt');
      const b = chunksOf(TEXT_B, 'bread.txt');
      const index = track(recording.createOrOpen('s1'));

      await recording.addDocuments(index, a);
      await recording.addDocuments(index, a);
      await recording.addDocuments(index, [...a, ...b]);

      expect(texts).toEqual([a.map((c) => c.text), b.map((c) => c.text)]);
    });

    it('keeps sessions isolated', async () => {
      const one = track(manager.createOrOpen('one'));
      const two = track(manager.createOrOpen('two'));

      await manager.addDocuments(one, chunksOf(TEXT_A, 'solar.txt'));
      expect(two.size()).toBe(0);

      // Same content in the other session is new there
      expect(await manager.addDocuments(two, chunksOf(TEXT_A, 'solar.txt'))).toBeGreaterThan(0);
    });

    it('writes nothing when the provider fails', async () => {
      const broken = new VectorIndexManager({
        indexRoot: root,
        embeddingProvider: new BrokenEmbeddingProvider('throw'),
      });
      const index = track(broken.createOrOpen('s1'));

      await expect(broken.addDocuments(index, chunksOf(TEXT_A, 'solar.txt'))).rejects.toThrow(
        'Embedding failed: provider unavailable'
      );
      expect(index.size()).toBe(0);
    });

    it('writes nothing when the provider returns too few vectors', async () => {
      const broken = new VectorIndexManager({
        indexRoot: root,
        embeddingProvider: new BrokenEmbeddingProvider('short-batch'),
      });
      const index = track(broken.createOrOpen('s1'));

      await expect(broken.addDocuments(index, chunksOf(TEXT_A, 'solar.txt'))).rejects.toMatchObject({
        name: 'EmbeddingError',
        code: 'COUNT_MISMATCH',
      });
      expect(index.size()).toBe(0);
    });

    it('rejects vectors whose dimension differs from the index', async () => {
      const first = new VectorIndexManager({
        indexRoot: root,
        embeddingProvider: new BrokenEmbeddingProvider('wrong-dimension', 'shared-name'),
      });
      const seeded = new VectorIndexManager({
        indexRoot: root,
        embeddingProvider: {
          name: 'shared-name',
          embedDocuments: async (batch: string[]) => batch.map(() => new Float32Array([1, 0, 0, 0])),
          embedQuery: async () => new Float32Array([1, 0, 0, 0]),
        },
      });
      const index = track(seeded.createOrOpen('s1'));
      await seeded.addDocuments(index, chunksOf(TEXT_A, 'solar.txt'));
      const before = index.size();

      await expect(first.addDocuments(index, chunksOf(TEXT_B, 'bread.txt'))).rejects.toMatchObject({
        code: 'DIMENSION_MISMATCH',
      });
      expect(index.size()).toBe(before);
    });

    it('rejects a different embedding model than the one that built the index', async () => {
      const index = track(manager.createOrOpen('s1'));
      await manager.addDocuments(index, chunksOf(TEXT_A, 'solar.txt'));

      const other = new VectorIndexManager({
        indexRoot: root,
        embeddingProvider: new HashingEmbeddingProvider(32),
      });
      const error = await other.addDocuments(index, chunksOf(TEXT_B, 'bread.txt')).catch((e: unknown) => e);
      expect(error).toBeInstanceOf(EmbeddingError);
      expect(error).toMatchObject({ code: 'MODEL_MISMATCH' });
    });

    it('times out a slow provider without writing', async () => {
      const slow = new VectorIndexManager({
        indexRoot: root,
        embedTimeoutMs: 20,
        embeddingProvider: {
          name: 'slow',
          embedDocuments: (batch: string[]) =>
            new Promise<Float32Array[]>((resolve) =>
              setTimeout(() => resolve(batch.map(() => new Float32Array([1, 0]))), 200)
            ),
          embedQuery: async () => new Float32Array([1, 0]),
        },
      });
      const index = track(slow.createOrOpen('s1'));

      await expect(slow.addDocuments(index, chunksOf(TEXT_B, 'bread.txt'))).rejects.toMatchObject({
        code: 'TIMEOUT',
      });
      expect(index.size()).toBe(0);
    });
  });

  // ═══════════════════════════════════════════════════════════════════════════
  // SEARCH
  // ═══════════════════════════════════════════════════════════════════════════

  describe('searchSimilar', () => {
    it('returns nothing for an empty index', () => {
      const index = track(manager.createOrOpen('s1'));
      expect(index.searchSimilar(new Float32Array(64), 5)).toEqual([]);
    });

    it('ranks an exact text match first with similarity 1', async () => {
      const chunks = chunksOf(TEXT_A, 'solar.txt');
      const index = track(manager.createOrOpen('s1'));
      await manager.addDocuments(index, chunks);

      const query = await manager.provider.embedQuery(chunks[1].text);
      const results = index.searchSimilar(query, 3);

      expect(results[0].chunk.fingerprint).toBe(chunks[1].fingerprint);
      expect(results[0].score).toBeCloseTo(1, 4);
      expect(results[0].vector).toHaveLength(64);
      for (let i = 1; i < results.length; i++) {
        expect(results[i].score).toBeLessThanOrEqual(results[i - 1].score);
      }
    });

    it('caps results at fetchK', async () => {
      const chunks = chunksOf(TEXT_A, 'solar.txt');
      const index = track(manager.createOrOpen('s1'));
      await manager.addDocuments(index, chunks);

      const query = await manager.provider.embedQuery('electricity');
      expect(index.searchSimilar(query, 1)).toHaveLength(1);
    });

    it('rejects a query of the wrong dimension', async () => {
      const index = track(manager.createOrOpen('s1'));
      await manager.addDocuments(index, chunksOf(TEXT_A, 'solar.txt'));

      expect(() => index.searchSimilar(new Float32Array(8), 3)).toThrow(
        'Query vector has 8 dimensions, index has 64'
      );
    });
  });

  // ═══════════════════════════════════════════════════════════════════════════
  // LISTING
  // ═══════════════════════════════════════════════════════════════════════════

  describe('listSessions', () => {
    it('returns nothing when the root does not exist', () => {
      const missing = new VectorIndexManager({
        indexRoot: join(root, 'not-created'),
        embeddingProvider: new HashingEmbeddingProvider(64),
      });
      expect(missing.listSessions()).toEqual([]);
    });

    it('lists indexed sessions sorted by id with chunk counts', async () => {
      const b = manager.createOrOpen('beta');
      const added = await manager.addDocuments(b, chunksOf(TEXT_B, 'bread.txt'));
      b.close();
      manager.createOrOpen('alpha').close();
      mkdirSync(join(root, 'no-index'));

      expect(manager.listSessions().map((s) => [s.sessionId, s.chunkCount])).toEqual([
        ['alpha', 0],
        ['beta', added],
      ]);
    });

    it('marks an unreadable index with a null chunk count', () => {
      mkdirSync(join(root, 'broken'));
      writeFileSync(join(root, 'broken', INDEX_FILE_NAME), 'this is not a database');

      expect(manager.listSessions()).toEqual([
        { sessionId: 'broken', path: join(root, 'broken'), chunkCount: null },
      ]);
    });
  });
});
