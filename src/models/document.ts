/**
 * Loaded document interfaces
 *
 * The normalized form every document loader produces. The retrieval core
 * never branches on the original file type.
 */

/**
 * Where a loaded document came from
 */
export type DocumentOrigin =
  | { kind: 'file'; filePath: string; extension: string; sizeBytes: number }
  | { kind: 'inline' };

/**
 * A document ready for splitting
 */
export interface LoadedDocument {
  /** Full extracted text */
  text: string;

  /** Stable source identifier (file name for uploads) */
  sourceId: string;

  /** Where the text came from, informational only */
  origin?: DocumentOrigin;
}
