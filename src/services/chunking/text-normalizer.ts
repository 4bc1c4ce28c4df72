/**
 * Text Normalizer for Fingerprints
 *
 * Fingerprints are computed over normalized text so that re-extracting a
 * document with different line endings or trailing whitespace does not
 * defeat deduplication. The raw text is what gets stored and embedded.
 *
 * @module services/chunking/text-normalizer
 */

/** Any run of whitespace, including NBSP and line separators */
const WHITESPACE_RUN = /\s+/g;

/**
 * Normalize chunk text for fingerprinting.
 *
 * Applies Unicode NFC, collapses whitespace runs to a single space and trims.
 * Case is preserved.
 */
export function normalizeForFingerprint(text: string): string {
  if (text.length === 0) {
    return text;
  }
  return text.normalize('NFC').replace(WHITESPACE_RUN, ' ').trim();
}

/**
 * Normalize line endings of loaded text to '\n'.
 * Applied once by the loader so chunk offsets refer to the normalized text.
 */
export function normalizeLineEndings(text: string): string {
  return text.replace(/\r\n?/g, '\n');
}
