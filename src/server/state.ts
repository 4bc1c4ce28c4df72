/**
 * MCP Server State Management
 *
 * Holds the server configuration and the long-lived services built from it:
 * the chat history store, the vector index manager, the language model and
 * the per-session lock registry.
 * FAIL FAST: service construction errors propagate to the calling tool.
 *
 * @module server/state
 */

import { homedir } from 'os';
import { join } from 'path';
import { DEFAULT_SPLITTER_CONFIG } from '../models/chunk.js';
import { getEmbeddingProvider, resetEmbeddingProvider } from '../services/embedding/index.js';
import { OllamaLanguageModel, resetSharedCircuitBreaker } from '../services/llm/client.js';
import type { LanguageModelProvider } from '../services/llm/provider.js';
import { DEFAULT_MMR_PARAMS } from '../services/search/mmr.js';
import { SessionLockRegistry } from '../services/session/locks.js';
import { type SessionStore, createSessionStore } from '../services/session/store.js';
import { VectorIndexManager } from '../services/storage/index-manager.js';
import type { ServerState, ServerConfig } from './types.js';

// ═══════════════════════════════════════════════════════════════════════════════
// DEFAULT CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Default directory for session indexes
 */
export const DEFAULT_INDEX_ROOT =
  process.env.DOCCHAT_INDEX_PATH ?? join(homedir(), '.docchat', 'indexes');

/**
 * Default server configuration
 */
const defaultConfig: ServerConfig = {
  indexRoot: DEFAULT_INDEX_ROOT,
  ...DEFAULT_SPLITTER_CONFIG,
  ...DEFAULT_MMR_PARAMS,
  maxContextChars: 12000,
  historyWindow: 6,
  embeddingProvider: 'ollama',
  historyStore: 'memory',
  providerTimeoutMs: 120000,
};

// ═══════════════════════════════════════════════════════════════════════════════
// GLOBAL STATE
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Global server state
 */
export const state: ServerState = {
  config: { ...defaultConfig },
  sessionStore: null,
  indexManager: null,
  languageModel: null,
  locks: new SessionLockRegistry(),
};

// ═══════════════════════════════════════════════════════════════════════════════
// SERVICE ACCESS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Chat history store for the configured backend, created on first use
 */
export function requireSessionStore(): SessionStore {
  if (!state.sessionStore) {
    state.sessionStore = createSessionStore(state.config.historyStore, state.config.indexRoot);
    console.error(`[state] History store opened: ${state.config.historyStore}`);
  }
  return state.sessionStore;
}

/**
 * Index manager bound to the configured index root and embedding provider
 */
export function requireIndexManager(): VectorIndexManager {
  if (!state.indexManager) {
    state.indexManager = new VectorIndexManager({
      indexRoot: state.config.indexRoot,
      embeddingProvider: getEmbeddingProvider(state.config.embeddingProvider),
      embedTimeoutMs: state.config.providerTimeoutMs,
    });
  }
  return state.indexManager;
}

/**
 * Language model, created on first use
 */
export function requireLanguageModel(): LanguageModelProvider {
  if (!state.languageModel) {
    state.languageModel = new OllamaLanguageModel();
  }
  return state.languageModel;
}

/**
 * Replace the language model (tests inject fakes here)
 */
export function setLanguageModel(model: LanguageModelProvider | null): void {
  state.languageModel = model;
}

/**
 * Per-session lock registry
 */
export function getLocks(): SessionLockRegistry {
  return state.locks;
}

function closeSessionStore(): void {
  if (state.sessionStore) {
    state.sessionStore.close();
    state.sessionStore = null;
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Get current server configuration
 */
export function getConfig(): ServerConfig {
  return { ...state.config };
}

/**
 * Update server configuration. Cached services built from a changed key are
 * dropped and rebuilt on next use.
 */
export function updateConfig(updates: Partial<ServerConfig>): void {
  const previous = state.config;
  state.config = { ...state.config, ...updates };

  if (
    previous.indexRoot !== state.config.indexRoot ||
    previous.embeddingProvider !== state.config.embeddingProvider ||
    previous.providerTimeoutMs !== state.config.providerTimeoutMs
  ) {
    state.indexManager = null;
  }
  if (
    previous.historyStore !== state.config.historyStore ||
    previous.indexRoot !== state.config.indexRoot
  ) {
    closeSessionStore();
  }
}

/**
 * Reset configuration to defaults
 */
export function resetConfig(): void {
  updateConfig({ ...defaultConfig });
}

// ═══════════════════════════════════════════════════════════════════════════════
// STATE RESET (FOR TESTING)
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Reset all server state - ONLY USE IN TESTS
 */
export function resetState(): void {
  closeSessionStore();
  state.indexManager = null;
  state.languageModel = null;
  state.locks = new SessionLockRegistry();
  state.config = { ...defaultConfig };
  resetEmbeddingProvider();
  resetSharedCircuitBreaker();
}

// ═══════════════════════════════════════════════════════════════════════════════
// PROCESS EXIT CLEANUP
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Close the history database on exit so its WAL is checkpointed
 */
process.on('exit', () => {
  if (state.sessionStore) {
    try {
      state.sessionStore.close();
    } catch (error) {
      console.error(
        `[state] Failed to close history store on exit: ${error instanceof Error ? error.message : String(error)}`
      );
    }
  }
});
