/**
 * Document loader
 *
 * Reads UTF-8 text files into LoadedDocuments. Unsupported extensions are
 * skipped with a warning rather than failing the whole upload; PDF and DOCX
 * text extraction is not performed here.
 *
 * @module services/ingestion/loader
 */

import { existsSync, readFileSync, statSync } from 'fs';
import path from 'path';
import type { LoadedDocument } from '../../models/document.js';
import { normalizeLineEndings } from '../chunking/text-normalizer.js';

export const SUPPORTED_TEXT_EXTENSIONS = ['.txt', '.md', '.markdown', '.csv', '.json', '.log'] as const;

/** Per-file cap */
export const MAX_DOCUMENT_BYTES = 20 * 1024 * 1024;

export type DocumentLoadErrorCode = 'PATH_NOT_FOUND' | 'NOT_A_FILE' | 'TOO_LARGE' | 'READ_FAILED';

export class DocumentLoadError extends Error {
  constructor(
    message: string,
    public readonly code: DocumentLoadErrorCode,
    public readonly details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'DocumentLoadError';
  }
}

export interface SkippedDocument {
  source: string;
  reason: string;
}

export interface LoadResult {
  documents: LoadedDocument[];
  skipped: SkippedDocument[];
}

export interface InlineDocument {
  name: string;
  content: string;
}

function isSupportedExtension(ext: string): boolean {
  return SUPPORTED_TEXT_EXTENSIONS.some((supported) => supported === ext);
}

/** Strip a UTF-8 byte order mark and normalize line endings */
function cleanText(text: string): string {
  return normalizeLineEndings(text.charCodeAt(0) === 0xfeff ? text.slice(1) : text);
}

/**
 * Load files from disk.
 *
 * @throws DocumentLoadError when a path does not exist, is not a regular
 * file, exceeds MAX_DOCUMENT_BYTES, or cannot be read
 */
export function loadDocuments(filePaths: readonly string[]): LoadResult {
  const documents: LoadedDocument[] = [];
  const skipped: SkippedDocument[] = [];

  for (const filePath of filePaths) {
    const resolved = path.resolve(filePath);
    const extension = path.extname(resolved).toLowerCase();

    if (!isSupportedExtension(extension)) {
      console.error(`[Loader] Unsupported extension skipped: ${resolved}`);
      skipped.push({
        source: resolved,
        reason: `Unsupported extension "${extension || '(none)'}". Supported: ${SUPPORTED_TEXT_EXTENSIONS.join(', ')}`,
      });
      continue;
    }

    if (!existsSync(resolved)) {
      throw new DocumentLoadError(`Path does not exist: ${resolved}`, 'PATH_NOT_FOUND', {
        path: resolved,
      });
    }
    const stats = statSync(resolved);
    if (!stats.isFile()) {
      throw new DocumentLoadError(`Not a regular file: ${resolved}`, 'NOT_A_FILE', { path: resolved });
    }
    if (stats.size > MAX_DOCUMENT_BYTES) {
      throw new DocumentLoadError(
        `File too large: ${stats.size} bytes (max ${MAX_DOCUMENT_BYTES})`,
        'TOO_LARGE',
        { path: resolved, sizeBytes: stats.size }
      );
    }

    let text: string;
    try {
      text = readFileSync(resolved, 'utf-8');
    } catch (error) {
      throw new DocumentLoadError(`Failed to read ${resolved}: ${String(error)}`, 'READ_FAILED', {
        path: resolved,
      }, { cause: error });
    }

    documents.push({
      text: cleanText(text),
      sourceId: path.basename(resolved),
      origin: { kind: 'file', filePath: resolved, extension, sizeBytes: stats.size },
    });
  }

  console.error(`[Loader] Documents loaded: count=${documents.length} skipped=${skipped.length}`);
  return { documents, skipped };
}

/**
 * Accept documents passed as text. The name becomes the source id.
 */
export function loadInlineDocuments(inputs: readonly InlineDocument[]): LoadResult {
  const documents: LoadedDocument[] = [];
  const skipped: SkippedDocument[] = [];

  for (const input of inputs) {
    const name = input.name.trim();
    if (name.length === 0) {
      skipped.push({ source: '(unnamed)', reason: 'Inline document name is empty' });
      continue;
    }
    documents.push({ text: cleanText(input.content), sourceId: name, origin: { kind: 'inline' } });
  }
  return { documents, skipped };
}
