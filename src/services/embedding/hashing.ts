/**
 * HashingEmbeddingProvider - deterministic feature-hashing embeddings
 *
 * Offline provider for tests and air-gapped use. Each lowercase word token is
 * hashed (FNV-1a) into one of `dimensions` buckets with a hash-derived sign,
 * and the result is L2-normalized. Texts sharing vocabulary get high cosine
 * similarity; no semantics beyond that.
 *
 * @module services/embedding/hashing
 */

import type { EmbeddingProvider } from './provider.js';

export const DEFAULT_HASHING_DIMENSIONS = 256;

const TOKEN_PATTERN = /[\p{L}\p{N}]+/gu;

/**
 * 32-bit FNV-1a over UTF-16 code units
 */
export function fnv1a(text: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < text.length; i++) {
    hash ^= text.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}

export function tokenize(text: string): string[] {
  return text.toLowerCase().match(TOKEN_PATTERN) ?? [];
}

export class HashingEmbeddingProvider implements EmbeddingProvider {
  readonly name: string;
  readonly dimensions: number;

  constructor(dimensions: number = DEFAULT_HASHING_DIMENSIONS) {
    if (!Number.isInteger(dimensions) || dimensions < 2) {
      throw new Error(`Hashing embedding dimensions must be an integer >= 2, got ${dimensions}`);
    }
    this.dimensions = dimensions;
    this.name = `hashing:${dimensions}`;
  }

  embed(text: string): Float32Array {
    const vector = new Float32Array(this.dimensions);
    for (const token of tokenize(text)) {
      const hash = fnv1a(token);
      const bucket = hash % this.dimensions;
      vector[bucket] += (hash & 0x80000000) === 0 ? 1 : -1;
    }

    let norm = 0;
    for (const value of vector) norm += value * value;
    if (norm === 0) {
      // No tokens: fixed unit vector so cosine stays defined
      vector[0] = 1;
      return vector;
    }

    const scale = 1 / Math.sqrt(norm);
    for (let i = 0; i < vector.length; i++) vector[i] *= scale;
    return vector;
  }

  async embedDocuments(texts: string[]): Promise<Float32Array[]> {
    return texts.map((t) => this.embed(t));
  }

  async embedQuery(text: string): Promise<Float32Array> {
    return this.embed(text);
  }
}
