/**
 * Document Chat MCP Server - Zod Validation Schemas
 *
 * Input validation for all MCP tool inputs. Each schema carries its
 * constraints and defaults; cross-field rules (chunk_overlap < chunk_size,
 * k <= fetch_k) are enforced by the services so tool input and direct
 * callers fail the same way.
 *
 * @module utils/validation
 */

import { z } from 'zod';
import * as path from 'path';
import { homedir, tmpdir } from 'os';

// ═══════════════════════════════════════════════════════════════════════════════
// CUSTOM ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Custom validation error with descriptive message
 */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELPER FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Validate input against schema and throw descriptive error if invalid
 *
 * @returns Validated and typed input data
 * @throws ValidationError with descriptive message if validation fails
 */
export function validateInput<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    const errors = result.error.errors.map((e) => {
      const path = e.path.length > 0 ? `${e.path.join('.')}: ` : '';
      return `${path}${e.message}`;
    });
    throw new ValidationError(errors.join('; '));
  }
  return result.data;
}

// ═══════════════════════════════════════════════════════════════════════════════
// SHARED BASE SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Session id: letters, digits, underscore, hyphen; no path separators
 */
export const SessionId = z
  .string()
  .min(1, 'session_id is required')
  .max(128, 'session_id must be 128 characters or less')
  .regex(
    /^[A-Za-z0-9][A-Za-z0-9_-]*$/,
    'session_id may only contain letters, digits, underscores and hyphens'
  );

const ChunkSize = z.number().int().min(1).max(100000);
const ChunkOverlap = z.number().int().min(0).max(100000);

const K = z.number().int().min(1).max(100);
const FetchK = z.number().int().min(1).max(1000);
const LambdaMult = z.number().min(0).max(1);

/**
 * Configuration keys that can be read and set
 */
export const ConfigKey = z.enum([
  'chunk_size',
  'chunk_overlap',
  'k',
  'fetch_k',
  'lambda_mult',
  'max_context_chars',
  'history_window',
  'embedding_provider',
  'history_store',
  'provider_timeout_ms',
]);

// ═══════════════════════════════════════════════════════════════════════════════
// SESSION SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * A document passed as text rather than a path
 */
export const InlineDocumentInput = z.object({
  name: z.string().min(1, 'Document name is required').max(512),
  content: z.string(),
});

/**
 * Fields of the upload schema (the tool's advertised input shape)
 */
export const SessionUploadFields = z.object({
  session_id: SessionId.optional().describe(
    'Existing session to add documents to. Omit to create a new session.'
  ),
  file_paths: z
    .array(z.string().min(1))
    .max(1000)
    .optional()
    .describe('Absolute paths of UTF-8 text files (.txt, .md, .markdown, .csv, .json, .log)'),
  documents: z
    .array(InlineDocumentInput)
    .max(1000)
    .optional()
    .describe('Documents given as text; name becomes the source id'),
  chunk_size: ChunkSize.optional().describe('Chunk size in characters (default from config)'),
  chunk_overlap: ChunkOverlap.optional().describe(
    'Characters shared by consecutive chunks, 1 <= overlap < chunk_size (default from config)'
  ),
});

/**
 * Schema for uploading documents into a session
 */
export const SessionUploadInput = SessionUploadFields.refine(
  (input) => (input.file_paths?.length ?? 0) + (input.documents?.length ?? 0) > 0,
  { message: 'Provide at least one entry in file_paths or documents' }
);

/**
 * Schema for one chat turn
 */
export const ChatInput = z.object({
  session_id: SessionId,
  message: z
    .string()
    .max(32000, 'message must be 32000 characters or less')
    .refine((m) => m.trim().length > 0, 'message must not be empty'),
  k: K.optional(),
  fetch_k: FetchK.optional(),
  lambda_mult: LambdaMult.optional(),
});

/**
 * Schema for reading session history
 */
export const SessionHistoryInput = z.object({
  session_id: SessionId,
  limit: z.number().int().min(1).max(1000).optional(),
});

/**
 * Schema for clearing session history
 */
export const SessionClearInput = z.object({
  session_id: SessionId,
});

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIG SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Schema for getting configuration
 */
export const ConfigGetInput = z.object({
  key: ConfigKey.optional(),
});

/**
 * Schema for setting configuration
 */
export const ConfigSetInput = z.object({
  key: ConfigKey,
  value: z.union([z.string(), z.number(), z.boolean()]),
});

// ═══════════════════════════════════════════════════════════════════════════════
// PATH SANITIZATION
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Allowed base directories: DOCCHAT_ALLOWED_DIRS (comma-separated) plus the
 * home directory, the temp directory and the working directory.
 */
export function getDefaultAllowedBaseDirs(): string[] {
  const dirs = [homedir(), tmpdir(), process.cwd()].map((d) => path.resolve(d));

  const extra = process.env.DOCCHAT_ALLOWED_DIRS;
  if (extra) {
    for (const entry of extra.split(',')) {
      const trimmed = entry.trim();
      if (trimmed) {
        dirs.push(path.resolve(trimmed));
      }
    }
  }
  return dirs;
}

/**
 * Resolve a file path and verify it lies inside an allowed directory.
 *
 * @throws ValidationError if the path contains null bytes or escapes allowed directories
 */
export function sanitizePath(filePath: string, allowedBaseDirs?: string[]): string {
  if (filePath.includes('\0')) {
    throw new ValidationError('Path contains null bytes');
  }

  const resolved = path.resolve(filePath);

  const baseDirs =
    allowedBaseDirs && allowedBaseDirs.length > 0 ? allowedBaseDirs : getDefaultAllowedBaseDirs();

  const resolvedBases = baseDirs.map((d) => path.resolve(d));
  const withinAllowed = resolvedBases.some(
    (base) => resolved === base || resolved.startsWith(base + path.sep)
  );
  if (!withinAllowed) {
    throw new ValidationError(
      `Path "${resolved}" is outside allowed directories: ${resolvedBases.join(', ')}. ` +
        `To allow this path, set DOCCHAT_ALLOWED_DIRS (comma-separated list of directories).`
    );
  }

  return resolved;
}
