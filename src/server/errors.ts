/**
 * MCP Server Error Handling
 *
 * FAIL FAST: All errors throw immediately with descriptive context.
 * Tool handlers convert them into structured error responses; nothing is
 * retried or degraded at this layer.
 *
 * @module server/errors
 */

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR CATEGORIES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Error categories for MCP tool errors
 * Each category maps to specific failure modes for debugging
 */
export type ErrorCategory =
  // Input errors (caller must fix)
  | 'VALIDATION_ERROR'
  | 'CONFIGURATION_ERROR'
  | 'INVALID_PARAMETER'

  // Lookup errors
  | 'SESSION_NOT_FOUND'
  | 'INDEX_NOT_FOUND'
  | 'PATH_NOT_FOUND'

  // Index state errors
  | 'INDEX_CORRUPT'
  | 'NOT_INITIALIZED'

  // Provider errors
  | 'GENERATION_FAILED'
  | 'EMBEDDING_FAILED'
  | 'LLM_API_ERROR'

  // File errors
  | 'DOCUMENT_LOAD_FAILED'

  // Internal errors
  | 'INTERNAL_ERROR';

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR NAME TO CATEGORY MAPPING
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Map error class names to MCPError categories so clients can tell a bad
 * session id from a provider outage without parsing messages.
 *
 * DocumentLoadError is resolved in fromUnknown() from its code.
 */
const ERROR_NAME_TO_CATEGORY: Record<string, ErrorCategory> = {
  // Tool input
  ValidationError: 'VALIDATION_ERROR',

  // Retrieval core
  ConfigurationError: 'CONFIGURATION_ERROR',
  InvalidParameterError: 'INVALID_PARAMETER',
  SessionNotFoundError: 'SESSION_NOT_FOUND',
  IndexNotFoundError: 'INDEX_NOT_FOUND',
  IndexCorruptError: 'INDEX_CORRUPT',
  NotInitializedError: 'NOT_INITIALIZED',
  GenerationError: 'GENERATION_FAILED',

  // Providers
  EmbeddingError: 'EMBEDDING_FAILED',
  LanguageModelError: 'LLM_API_ERROR',
  CircuitBreakerOpenError: 'LLM_API_ERROR',
  TimeoutError: 'GENERATION_FAILED',

  // Files
  DocumentLoadError: 'DOCUMENT_LOAD_FAILED',
};

/** Categories the caller can fix by changing the request (HTTP 4xx) */
const CLIENT_ERROR_CATEGORIES = new Set<ErrorCategory>([
  'VALIDATION_ERROR',
  'CONFIGURATION_ERROR',
  'INVALID_PARAMETER',
  'SESSION_NOT_FOUND',
  'INDEX_NOT_FOUND',
  'PATH_NOT_FOUND',
  'DOCUMENT_LOAD_FAILED',
]);

function readStringProperty(error: Error, key: string): string | undefined {
  if (!(key in error)) return undefined;
  const value: unknown = Reflect.get(error, key);
  return typeof value === 'string' ? value : undefined;
}

function readDetails(error: Error): Record<string, unknown> | undefined {
  if (!('details' in error)) return undefined;
  const value: unknown = error.details;
  if (value === null || typeof value !== 'object' || Array.isArray(value)) return undefined;
  return Object.fromEntries(Object.entries(value));
}

// ═══════════════════════════════════════════════════════════════════════════════
// MCP ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * MCPError - Structured error class for all MCP tool failures
 *
 * FAIL FAST: Thrown immediately when any error condition is detected.
 * Provides category, message, and optional details for debugging.
 */
export class MCPError extends Error {
  public readonly category: ErrorCategory;
  public readonly details?: Record<string, unknown>;

  constructor(category: ErrorCategory, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'MCPError';
    this.category = category;
    this.details = details;

    // Preserve stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, MCPError);
    }
  }

  /**
   * Create error from unknown caught value
   * FAIL FAST: Always produces a typed error
   */
  static fromUnknown(error: unknown, defaultCategory: ErrorCategory = 'INTERNAL_ERROR'): MCPError {
    if (error instanceof MCPError) {
      return error;
    }

    if (error instanceof Error) {
      const customCode = readStringProperty(error, 'code');
      let category = ERROR_NAME_TO_CATEGORY[error.name] ?? defaultCategory;
      if (error.name === 'DocumentLoadError' && customCode === 'PATH_NOT_FOUND') {
        category = 'PATH_NOT_FOUND';
      }

      // Preserve diagnostic properties from custom error classes
      const customDetails = readDetails(error);
      const stage = readStringProperty(error, 'stage');
      return new MCPError(category, error.message, {
        originalName: error.name,
        ...(customCode && { errorCode: customCode }),
        ...(stage && { stage }),
        ...(customDetails && { errorDetails: customDetails }),
        stack: error.stack,
      });
    }

    return new MCPError(defaultCategory, String(error), {
      originalValue: error,
    });
  }

  /**
   * Convert to JSON for logging/serialization
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      category: this.category,
      message: this.message,
      details: this.details,
      stack: this.stack,
    };
  }
}

/**
 * True when the failure is the caller's to fix (bad input, unknown session)
 */
export function isClientErrorCategory(category: ErrorCategory): boolean {
  return CLIENT_ERROR_CATEGORIES.has(category);
}

/**
 * HTTP status for an error category. Not-found categories are 404, other
 * caller errors 400, everything else 500.
 */
export function httpStatusForCategory(category: ErrorCategory): number {
  switch (category) {
    case 'SESSION_NOT_FOUND':
    case 'INDEX_NOT_FOUND':
    case 'PATH_NOT_FOUND':
      return 404;
    default:
      return isClientErrorCategory(category) ? 400 : 500;
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// RECOVERY HINTS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Recovery hint for AI agents to self-correct after errors.
 * Every ErrorCategory maps to a suggested tool and human-readable hint.
 */
export interface RecoveryHint {
  tool: string;
  hint: string;
}

const RECOVERY_HINTS: Record<ErrorCategory, RecoveryHint> = {
  VALIDATION_ERROR: { tool: 'rag_config_get', hint: 'Check parameter types and required fields' },
  CONFIGURATION_ERROR: {
    tool: 'rag_config_get',
    hint: 'chunk_overlap must be >= 1 and smaller than chunk_size; upload at least one readable document',
  },
  INVALID_PARAMETER: {
    tool: 'rag_config_get',
    hint: 'Require 1 <= k <= fetch_k and 0 <= lambda_mult <= 1',
  },
  SESSION_NOT_FOUND: {
    tool: 'rag_session_list',
    hint: 'Use rag_session_list to find session ids, or rag_session_upload without session_id to start one',
  },
  INDEX_NOT_FOUND: {
    tool: 'rag_session_upload',
    hint: 'Upload documents to create the session index',
  },
  PATH_NOT_FOUND: { tool: 'rag_session_upload', hint: 'Verify the file path exists on the filesystem' },
  INDEX_CORRUPT: {
    tool: 'rag_health_check',
    hint: 'The session index failed verification; start a new session and re-upload the documents',
  },
  NOT_INITIALIZED: { tool: 'rag_chat', hint: 'Load the session retriever before invoking a chat turn' },
  GENERATION_FAILED: {
    tool: 'rag_health_check',
    hint: 'The language model call failed; check OLLAMA_BASE_URL and retry the message',
  },
  EMBEDDING_FAILED: {
    tool: 'rag_health_check',
    hint: 'Check the embedding provider (OLLAMA_EMBED_MODEL) and that the session was indexed with the same model',
  },
  LLM_API_ERROR: {
    tool: 'rag_health_check',
    hint: 'Check that Ollama is running and the chat model is pulled; the circuit breaker may be open',
  },
  DOCUMENT_LOAD_FAILED: {
    tool: 'rag_session_upload',
    hint: 'Check the file is a readable UTF-8 text file under the size limit',
  },
  INTERNAL_ERROR: { tool: 'rag_health_check', hint: 'Run rag_health_check for diagnostics' },
};

/**
 * Get recovery hint for an error category.
 */
export function getRecoveryHint(category: ErrorCategory): RecoveryHint {
  return RECOVERY_HINTS[category];
}

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR RESPONSE FORMATTING
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Format MCPError for tool response
 * ALWAYS includes category, message, status, recovery hint, and optional details.
 * `status` is the HTTP status the failure would carry on a REST surface.
 */
export function formatErrorResponse(error: MCPError): {
  success: false;
  error: {
    category: ErrorCategory;
    message: string;
    status: number;
    client_error: boolean;
    recovery: RecoveryHint;
    details?: Record<string, unknown>;
  };
} {
  return {
    success: false,
    error: {
      category: error.category,
      message: error.message,
      status: httpStatusForCategory(error.category),
      client_error: isClientErrorCategory(error.category),
      recovery: getRecoveryHint(error.category),
      details: error.details,
    },
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR FACTORY FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Create validation error
 */
export function validationError(message: string, details?: Record<string, unknown>): MCPError {
  return new MCPError('VALIDATION_ERROR', message, details);
}

/**
 * Create session not found error
 */
export function sessionNotFoundError(sessionId: string): MCPError {
  return new MCPError(
    'SESSION_NOT_FOUND',
    `Session not found: ${sessionId}. Use rag_session_list to see available sessions.`,
    { sessionId }
  );
}
