/**
 * MCP Server Type Definitions
 *
 * Defines interfaces for tool results, server configuration, and state.
 *
 * @module server/types
 */

import type { EmbeddingProviderKind } from '../services/embedding/index.js';
import type { LanguageModelProvider } from '../services/llm/provider.js';
import type { SessionLockRegistry } from '../services/session/locks.js';
import type { HistoryStoreKind, SessionStore } from '../services/session/store.js';
import type { VectorIndexManager } from '../services/storage/index-manager.js';

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL RESULT TYPES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Successful tool result
 */
interface ToolResultSuccess<T = unknown> {
  success: true;
  data: T;
}

/**
 * Helper to create success result
 */
export function successResult<T>(data: T): ToolResultSuccess<T> {
  return { success: true, data };
}

// ═══════════════════════════════════════════════════════════════════════════════
// SERVER CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Server configuration options
 */
export interface ServerConfig {
  /** Directory holding one index directory per session */
  indexRoot: string;

  /** Chunk size in characters */
  chunkSize: number;

  /** Characters shared by consecutive chunks (1 <= overlap < chunkSize) */
  chunkOverlap: number;

  /** Chunks returned by MMR retrieval */
  k: number;

  /** Candidate pool size fetched before MMR */
  fetchK: number;

  /** MMR relevance/diversity trade-off in [0, 1] */
  lambdaMult: number;

  /** Upper bound on context characters passed to the answer prompt */
  maxContextChars: number;

  /** Recent history messages included in prompts */
  historyWindow: number;

  /** Embedding backend */
  embeddingProvider: EmbeddingProviderKind;

  /** Where chat history lives */
  historyStore: HistoryStoreKind;

  /** Timeout per provider call in milliseconds; 0 disables */
  providerTimeoutMs: number;
}

// ═══════════════════════════════════════════════════════════════════════════════
// SERVER STATE
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Server state tracking. Services are created on first use from the
 * current config and dropped when a config change invalidates them.
 */
export interface ServerState {
  config: ServerConfig;

  /** Chat history store */
  sessionStore: SessionStore | null;

  /** Opens and writes per-session indexes */
  indexManager: VectorIndexManager | null;

  /** Answers and reformulates */
  languageModel: LanguageModelProvider | null;

  /** Per-session read/write locks shared by all tools */
  locks: SessionLockRegistry;
}
