/**
 * Unit tests for computeHash and chunk fingerprints
 *
 * @see src/utils/hash.ts
 * @see src/services/chunking/text-normalizer.ts
 */

import { describe, it, expect } from 'vitest';
import { computeFingerprint, computeHash } from '../../../src/utils/hash.js';
import {
  normalizeForFingerprint,
  normalizeLineEndings,
} from '../../../src/services/chunking/text-normalizer.js';

describe('computeHash', () => {
  it('should compute correct hash for known string', () => {
    // Known SHA-256 hash for 'hello'
    expect(computeHash('hello')).toBe(
      'sha256:2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824'
    );
  });

  it('should handle empty string', () => {
    expect(computeHash('')).toBe(
      'sha256:e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855'
    );
  });

  it('should hash Buffer and string input alike', () => {
    expect(computeHash(Buffer.from('hello'))).toBe(computeHash('hello'));
  });
});

describe('normalizeForFingerprint', () => {
  it('should collapse whitespace runs and trim', () => {
    expect(normalizeForFingerprint('  a \t b\n\nc  ')).toBe('a b c');
  });

  it('should preserve case', () => {
    expect(normalizeForFingerprint('Hello World')).toBe('Hello World');
  });

  it('should apply NFC so composed and decomposed forms match', () => {
    expect(normalizeForFingerprint('cafe\u0301')).toBe('caf\u00e9');
  });
});

describe('normalizeLineEndings', () => {
  it('should convert CRLF and lone CR to LF', () => {
    expect(normalizeLineEndings('a\r\nb\rc\n')).toBe('a\nb\nc\n');
  });
});

describe('computeFingerprint', () => {
  it('should be deterministic', () => {
    expect(computeFingerprint('some chunk', 'doc.txt')).toBe(computeFingerprint('some chunk', 'doc.txt'));
  });

  it('should ignore whitespace-only differences', () => {
    expect(computeFingerprint('line one\n  line two ', 'doc.txt')).toBe(
      computeFingerprint('line one line two', 'doc.txt')
    );
  });

  it('should differ by source id', () => {
    expect(computeFingerprint('same', 'a.txt')).not.toBe(computeFingerprint('same', 'b.txt'));
  });

  it('should not collide across the source/text boundary', () => {
    expect(computeFingerprint('b c', 'a')).not.toBe(computeFingerprint('c', 'a b'));
  });

  it('should produce a prefixed lowercase sha256 hex digest', () => {
    expect(computeFingerprint('text', 'src')).toMatch(/^sha256:[0-9a-f]{64}$/);
  });
});
