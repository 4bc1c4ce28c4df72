/**
 * Embedding capability shared by ingestion and retrieval.
 *
 * The same provider (and model) must be used for the lifetime of a session
 * index: the index records the dimension on first insert and rejects
 * vectors of any other size.
 *
 * @module services/embedding/provider
 */

export interface EmbeddingProvider {
  /** Provider/model label, recorded in index metadata */
  readonly name: string;
  /** Known output dimension, if fixed ahead of the first call */
  readonly dimensions?: number;
  /** One vector per text, same order */
  embedDocuments(texts: string[]): Promise<Float32Array[]>;
  embedQuery(text: string): Promise<Float32Array>;
}

export type EmbeddingErrorCode =
  | 'EMBEDDING_FAILED'
  | 'DIMENSION_MISMATCH'
  | 'COUNT_MISMATCH'
  | 'INVALID_VECTOR'
  | 'MODEL_MISMATCH'
  | 'TIMEOUT';

export class EmbeddingError extends Error {
  constructor(
    message: string,
    public readonly code: EmbeddingErrorCode,
    public readonly details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'EmbeddingError';
  }
}

/**
 * Check a provider batch before anything reaches storage.
 *
 * @throws EmbeddingError on count mismatch, ragged dimensions, or non-finite values
 */
export function assertEmbeddingBatch(
  vectors: readonly Float32Array[],
  expectedCount: number,
  expectedDimensions: number | null
): number {
  if (vectors.length !== expectedCount) {
    throw new EmbeddingError(
      `Embedding provider returned ${vectors.length} vectors for ${expectedCount} texts`,
      'COUNT_MISMATCH',
      { expected: expectedCount, actual: vectors.length }
    );
  }
  if (vectors.length === 0) {
    return expectedDimensions ?? 0;
  }

  const dimensions = expectedDimensions ?? vectors[0].length;
  if (dimensions === 0) {
    throw new EmbeddingError('Embedding provider returned empty vectors', 'INVALID_VECTOR');
  }

  vectors.forEach((vector, i) => {
    if (vector.length !== dimensions) {
      throw new EmbeddingError(
        `Embedding dimension mismatch at position ${i}: expected ${dimensions}, got ${vector.length}`,
        'DIMENSION_MISMATCH',
        { expected: dimensions, actual: vector.length, position: i }
      );
    }
    for (const value of vector) {
      if (!Number.isFinite(value)) {
        throw new EmbeddingError(
          `Embedding at position ${i} contains a non-finite value`,
          'INVALID_VECTOR',
          { position: i }
        );
      }
    }
  });
  return dimensions;
}
