/**
 * Chunk interfaces
 *
 * A chunk is a contiguous, immutable slice of one source document.
 * Identity for deduplication is the content fingerprint.
 */

/**
 * Configuration for text splitting
 */
export interface SplitterConfig {
  /** Maximum characters per chunk (default: 1000) */
  chunkSize: number;

  /** Characters shared with the previous chunk of the same document (default: 200) */
  chunkOverlap: number;
}

/**
 * Default splitter configuration
 */
export const DEFAULT_SPLITTER_CONFIG: SplitterConfig = {
  chunkSize: 1000,
  chunkOverlap: 200,
};

/**
 * A chunk produced by the splitter
 */
export interface Chunk {
  /** The chunk text */
  readonly text: string;

  /** Source document identifier */
  readonly sourceId: string;

  /** 0-indexed position among the chunks of its source document */
  readonly chunkIndex: number;

  /** Start offset in the source text */
  readonly characterStart: number;

  /** End offset (exclusive) in the source text */
  readonly characterEnd: number;

  /** sha256 fingerprint of source identity + normalized text */
  readonly fingerprint: string;
}

/**
 * A stored chunk as read back from a session index
 */
export interface StoredChunk extends Chunk {
  /** Insertion sequence within the index (stable fetch order) */
  readonly seq: number;

  /** ISO 8601 insertion time */
  readonly createdAt: string;
}

/**
 * Transient query-time tuple. Not persisted.
 */
export interface RetrievalCandidate {
  chunk: StoredChunk;
  vector: Float32Array;
  /** Cosine similarity to the query */
  score: number;
}

/**
 * A chunk selected by the retriever, in final ranking order
 */
export interface RetrievedChunk {
  chunk: StoredChunk;
  /** Cosine similarity to the query */
  score: number;
  /** 0-indexed selection rank */
  rank: number;
}
