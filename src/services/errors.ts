/**
 * Retrieval Core Error Classes
 *
 * FAIL FAST: every error carries the originating cause for logging.
 * None of these are used for normal control flow.
 *
 * Client-side (caller must fix input): ConfigurationError, InvalidParameterError,
 * IndexNotFoundError, SessionNotFoundError.
 * Server-side: IndexCorruptError, NotInitializedError, GenerationError.
 *
 * @module services/errors
 */

/**
 * Base class for retrieval core errors
 */
export abstract class RetrievalError extends Error {
  public readonly details?: Record<string, unknown>;

  constructor(message: string, options?: { cause?: unknown; details?: Record<string, unknown> }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.details = options?.details;
  }
}

/**
 * Bad caller-supplied parameters (e.g. chunk_overlap >= chunk_size). Never retried.
 */
export class ConfigurationError extends RetrievalError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, { details });
    this.name = 'ConfigurationError';
  }
}

/**
 * Bad MMR parameters (k, fetch_k, lambda_mult)
 */
export class InvalidParameterError extends RetrievalError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, { details });
    this.name = 'InvalidParameterError';
  }
}

/**
 * No persisted index at the requested path
 */
export class IndexNotFoundError extends RetrievalError {
  constructor(
    public readonly indexPath: string,
    cause?: unknown
  ) {
    super(`Index not found: ${indexPath}`, { cause, details: { indexPath } });
    this.name = 'IndexNotFoundError';
  }
}

/**
 * No index exists for the session id
 */
export class SessionNotFoundError extends RetrievalError {
  constructor(
    public readonly sessionId: string,
    cause?: unknown
  ) {
    super(`Session not found: ${sessionId}. Upload documents to create it.`, {
      cause,
      details: { sessionId },
    });
    this.name = 'SessionNotFoundError';
  }
}

/**
 * On-disk index exists but is unreadable or inconsistent. Fatal for that session.
 */
export class IndexCorruptError extends RetrievalError {
  constructor(
    message: string,
    public readonly indexPath: string,
    options?: { cause?: unknown; details?: Record<string, unknown> }
  ) {
    super(message, { cause: options?.cause, details: { indexPath, ...options?.details } });
    this.name = 'IndexCorruptError';
  }
}

/**
 * Orchestrator used out of sequence (invoke before loadRetriever)
 */
export class NotInitializedError extends RetrievalError {
  constructor(message: string) {
    super(message);
    this.name = 'NotInitializedError';
  }
}

/**
 * Wraps any embedding or language model failure during reformulation,
 * retrieval or answer synthesis. Safe to retry at the caller's discretion.
 */
export class GenerationError extends RetrievalError {
  constructor(
    message: string,
    public readonly stage: 'reformulate' | 'retrieve' | 'answer',
    cause: unknown
  ) {
    super(message, { cause, details: { stage } });
    this.name = 'GenerationError';
  }
}

/**
 * Render an error and its cause chain on one line for logs
 */
export function describeError(error: unknown): string {
  const parts: string[] = [];
  let current: unknown = error;
  for (let depth = 0; current !== undefined && depth < 5; depth++) {
    if (current instanceof Error) {
      parts.push(`${current.name}: ${current.message}`);
      current = current.cause;
    } else {
      parts.push(String(current));
      current = undefined;
    }
  }
  return parts.join(' <- ');
}
