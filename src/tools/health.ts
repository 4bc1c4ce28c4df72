/**
 * Health Check MCP Tools
 *
 * Tools: rag_health_check
 *
 * Reports provider configuration, index root status and sqlite-vec
 * availability. Makes no provider calls.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module tools/health
 */

import { getConfig, getLocks, requireIndexManager, requireLanguageModel } from '../server/state.js';
import { checkIndexRootWritable, checkSqliteVec, getStartupStatus } from '../server/startup.js';
import { successResult } from '../server/types.js';
import { OllamaLanguageModel } from '../services/llm/client.js';
import { loadOllamaConfig } from '../services/llm/config.js';
import { formatResponse, handleError, type ToolResponse, type ToolDefinition } from './shared.js';

// ═══════════════════════════════════════════════════════════════════════════════
// HANDLER: rag_health_check
// ═══════════════════════════════════════════════════════════════════════════════

export async function handleHealthCheck(_params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const config = getConfig();
    const indexManager = requireIndexManager();
    const languageModel = requireLanguageModel();

    const sqliteVec = checkSqliteVec();
    const indexRootWritable = checkIndexRootWritable(config.indexRoot);
    const sessions = sqliteVec.available ? indexManager.listSessions() : [];
    const unreadable = sessions.filter((s) => s.chunkCount === null).map((s) => s.sessionId);

    const ollama = loadOllamaConfig();
    const circuitBreaker =
      languageModel instanceof OllamaLanguageModel ? languageModel.getStatus().circuitBreaker : null;

    const warnings: string[] = [];
    if (!sqliteVec.available) {
      warnings.push(`sqlite-vec unavailable: ${sqliteVec.error ?? 'unknown error'}`);
    }
    if (!indexRootWritable) {
      warnings.push(`Index root is not writable: ${config.indexRoot}`);
    }
    if (unreadable.length > 0) {
      warnings.push(`${unreadable.length} session index(es) failed verification`);
    }
    if (circuitBreaker?.state === 'OPEN') {
      warnings.push('Language model circuit breaker is OPEN; chat requests are rejected until it recovers');
    }

    return formatResponse(
      successResult({
        healthy: warnings.length === 0,
        warnings,
        providers: {
          embedding: indexManager.provider.name,
          embedding_dimensions: indexManager.provider.dimensions ?? null,
          language_model: languageModel.name,
          ollama_base_url: ollama.baseUrl,
          circuit_breaker: circuitBreaker,
        },
        index: {
          root: indexManager.indexRoot,
          writable: indexRootWritable,
          sessions: sessions.length,
          unreadable_sessions: unreadable,
        },
        sqlite_vec: sqliteVec,
        active_locks: getLocks().activeSessions().length,
        history_store: config.historyStore,
        startup_check: getStartupStatus(),
        next_steps: [
          { tool: 'rag_session_upload', description: 'Upload documents to start a session' },
          { tool: 'rag_config_get', description: 'Inspect retrieval and chunking settings' },
        ],
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL DEFINITIONS EXPORT
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Health check tools collection for MCP server registration
 */
export const healthTools: Record<string, ToolDefinition> = {
  rag_health_check: {
    description:
      'Report server health: embedding and language model configuration, index root, sqlite-vec status and unreadable session indexes.',
    inputSchema: {},
    handler: handleHealthCheck,
  },
};
