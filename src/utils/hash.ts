/**
 * SHA-256 Hash Utilities for Chunk Fingerprints
 *
 * All hashes use the format: 'sha256:' + 64-character lowercase hex string.
 *
 * @module utils/hash
 */

import crypto from 'crypto';
import { normalizeForFingerprint } from '../services/chunking/text-normalizer.js';

/**
 * Hash prefix used for all SHA-256 hashes in this system
 */
const HASH_PREFIX = 'sha256:';

/**
 * Separator between source identity and text. Cannot appear in a normalized
 * source id, so ("a", "b c") and ("a b", "c") never collide.
 */
const FINGERPRINT_SEPARATOR = '\u0000';

/**
 * Compute SHA-256 hash of content
 *
 * @param content - String or Buffer to hash
 * @returns Hash in format 'sha256:' + 64-char lowercase hex string
 * @example
 * computeHash('hello')
 * // Returns: 'sha256:2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824'
 */
export function computeHash(content: string | Buffer): string {
  const hash = crypto.createHash('sha256').update(content).digest('hex');

  return HASH_PREFIX + hash;
}

/**
 * Compute the deduplication fingerprint of a chunk.
 *
 * Whitespace-only differences in the text produce the same fingerprint;
 * the same text under two different source ids does not.
 *
 * @param text - Raw chunk text
 * @param sourceId - Source document identifier
 */
export function computeFingerprint(text: string, sourceId: string): string {
  const source = sourceId.split(FINGERPRINT_SEPARATOR).join('');
  return computeHash(source + FINGERPRINT_SEPARATOR + normalizeForFingerprint(text));
}
