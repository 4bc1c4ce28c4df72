/**
 * Recursive Character Splitter
 *
 * Splits loaded documents into fixed-size overlapping chunks, preferring
 * paragraph breaks, then line breaks, then spaces, and falling back to a hard
 * cut only when no boundary exists inside the window. Every chunk carries a
 * content fingerprint used as the deduplication key by the vector index.
 *
 * Deterministic: same input + same parameters => same chunks, same order.
 *
 * @module services/chunking/splitter
 */

import type { Chunk, SplitterConfig } from '../../models/chunk.js';
import type { LoadedDocument } from '../../models/document.js';
import { ConfigurationError } from '../errors.js';
import { computeFingerprint } from '../../utils/hash.js';

/**
 * Boundary preference order. The empty separator means "between any two characters".
 * There is no sentence level: a window that holds no line break falls back to
 * spaces, so a cut may land mid-sentence but never mid-word.
 */
export const DEFAULT_SEPARATORS: readonly string[] = ['\n\n', '\n', ' ', ''];

// ---------------------------------------------------------------------------
// Parameter validation
// ---------------------------------------------------------------------------

/**
 * Validate splitter parameters - FAIL FAST
 *
 * @throws ConfigurationError when either value is not a positive integer or
 * chunkOverlap >= chunkSize
 */
export function validateSplitterConfig(config: SplitterConfig): void {
  const { chunkSize, chunkOverlap } = config;

  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new ConfigurationError(`chunk_size must be a positive integer, got ${chunkSize}`, {
      chunkSize,
    });
  }
  if (!Number.isInteger(chunkOverlap) || chunkOverlap <= 0) {
    throw new ConfigurationError(`chunk_overlap must be a positive integer, got ${chunkOverlap}`, {
      chunkOverlap,
    });
  }
  if (chunkOverlap >= chunkSize) {
    throw new ConfigurationError(
      `chunk_overlap (${chunkOverlap}) must be smaller than chunk_size (${chunkSize})`,
      { chunkSize, chunkOverlap }
    );
  }
}

// ---------------------------------------------------------------------------
// Separator handling
// ---------------------------------------------------------------------------

/**
 * Split on a literal separator, keeping the separator at the start of the
 * piece that follows it. Pieces concatenate back to the input exactly.
 * Empty pieces are dropped.
 */
function splitKeepingSeparator(text: string, separator: string): string[] {
  if (separator === '') {
    return Array.from(text);
  }

  const raw = text.split(separator);
  const pieces: string[] = [raw[0]];
  for (let i = 1; i < raw.length; i++) {
    pieces.push(separator + raw[i]);
  }
  return pieces.filter((p) => p.length > 0);
}

/**
 * Pick the first separator present in the text. Returns the separator and the
 * finer separators to recurse with.
 */
function chooseSeparator(
  text: string,
  separators: readonly string[]
): { separator: string; rest: readonly string[] } {
  for (let i = 0; i < separators.length; i++) {
    const candidate = separators[i];
    if (candidate === '') {
      return { separator: '', rest: [] };
    }
    if (text.includes(candidate)) {
      return { separator: candidate, rest: separators.slice(i + 1) };
    }
  }
  return { separator: separators[separators.length - 1] ?? '', rest: [] };
}

// ---------------------------------------------------------------------------
// Merging
// ---------------------------------------------------------------------------

function joinPieces(pieces: string[]): string | null {
  const text = pieces.join('').trim();
  return text.length > 0 ? text : null;
}

/**
 * Greedily merge small pieces into chunks of at most chunkSize characters.
 * When a chunk is emitted, pieces are dropped from its front until at most
 * chunkOverlap characters remain; those carry into the next chunk.
 */
function mergePieces(pieces: string[], config: SplitterConfig): string[] {
  const { chunkSize, chunkOverlap } = config;
  const chunks: string[] = [];
  let current: string[] = [];
  let total = 0;

  for (const piece of pieces) {
    if (total + piece.length > chunkSize && current.length > 0) {
      const chunk = joinPieces(current);
      if (chunk !== null) {
        chunks.push(chunk);
      }
      while (total > chunkOverlap || (total + piece.length > chunkSize && total > 0)) {
        total -= current[0].length;
        current = current.slice(1);
      }
    }
    current.push(piece);
    total += piece.length;
  }

  const last = joinPieces(current);
  if (last !== null) {
    chunks.push(last);
  }
  return chunks;
}

// ---------------------------------------------------------------------------
// Recursive split
// ---------------------------------------------------------------------------

function splitRecursive(
  text: string,
  separators: readonly string[],
  config: SplitterConfig
): string[] {
  const { separator, rest } = chooseSeparator(text, separators);
  const pieces = splitKeepingSeparator(text, separator);

  const result: string[] = [];
  let pending: string[] = [];

  for (const piece of pieces) {
    if (piece.length < config.chunkSize) {
      pending.push(piece);
      continue;
    }

    if (pending.length > 0) {
      result.push(...mergePieces(pending, config));
      pending = [];
    }

    if (rest.length === 0) {
      // Single character at chunkSize 1; cannot be split further
      result.push(piece);
    } else {
      result.push(...splitRecursive(piece, rest, config));
    }
  }

  if (pending.length > 0) {
    result.push(...mergePieces(pending, config));
  }
  return result;
}

/**
 * Split one text into chunk strings.
 *
 * @param text - Full document text
 * @param config - Chunk size and overlap in characters
 * @param separators - Boundary preference order
 * @returns Chunk texts, each at most config.chunkSize characters
 * @throws ConfigurationError on invalid parameters
 */
export function splitText(
  text: string,
  config: SplitterConfig,
  separators: readonly string[] = DEFAULT_SEPARATORS
): string[] {
  validateSplitterConfig(config);
  if (text.trim().length === 0) {
    return [];
  }
  return splitRecursive(text, separators, config);
}

// ---------------------------------------------------------------------------
// Document splitting
// ---------------------------------------------------------------------------

/**
 * Locate each chunk in its source text. The search for chunk i starts where
 * chunk i-1 ended minus the overlap, so repeated passages resolve to the
 * occurrence that follows the previous chunk.
 */
function locateChunks(
  text: string,
  chunkTexts: string[],
  chunkOverlap: number
): Array<{ start: number; end: number }> {
  const spans: Array<{ start: number; end: number }> = [];
  let index = 0;
  let previousLength = 0;

  for (const chunkText of chunkTexts) {
    const from = Math.max(0, index + previousLength - chunkOverlap);
    let found = text.indexOf(chunkText, from);
    if (found === -1) {
      found = text.indexOf(chunkText);
    }
    index = Math.max(0, found);
    previousLength = chunkText.length;
    spans.push({ start: index, end: index + chunkText.length });
  }
  return spans;
}

/**
 * Split documents into fingerprinted chunks.
 *
 * @param documents - Loaded documents in upload order
 * @param chunkSize - Maximum characters per chunk
 * @param chunkOverlap - Approximate characters shared by consecutive chunks
 * @returns Chunks in document order, then position order
 * @throws ConfigurationError when chunkOverlap >= chunkSize or either is non-positive
 */
export function splitDocuments(
  documents: LoadedDocument[],
  chunkSize: number,
  chunkOverlap: number
): Chunk[] {
  const config: SplitterConfig = { chunkSize, chunkOverlap };
  validateSplitterConfig(config);

  const chunks: Chunk[] = [];
  for (const document of documents) {
    const texts = splitText(document.text, config);
    const spans = locateChunks(document.text, texts, chunkOverlap);

    texts.forEach((text, i) => {
      chunks.push({
        text,
        sourceId: document.sourceId,
        chunkIndex: i,
        characterStart: spans[i].start,
        characterEnd: spans[i].end,
        fingerprint: computeFingerprint(text, document.sourceId),
      });
    });
  }

  console.error(
    `[Splitter] Documents split: documents=${documents.length} chunks=${chunks.length} chunk_size=${chunkSize} overlap=${chunkOverlap}`
  );
  return chunks;
}
