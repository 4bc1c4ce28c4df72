/**
 * Chat MCP Tools
 *
 * Tools: rag_chat
 *
 * One turn: load the session retriever under the session read lock, answer
 * with the stored history, then append the user message and the answer.
 * A failed turn appends nothing, so the client can resend the message.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module tools/chat
 */

import { createMessage } from '../models/session.js';
import {
  getConfig,
  getLocks,
  requireIndexManager,
  requireLanguageModel,
  requireSessionStore,
} from '../server/state.js';
import { successResult } from '../server/types.js';
import { sessionNotFoundError } from '../server/errors.js';
import { ConversationalRetrievalOrchestrator } from '../services/chat/orchestrator.js';
import { ChatInput, validateInput } from '../utils/validation.js';
import { formatResponse, handleError, type ToolResponse, type ToolDefinition } from './shared.js';

// ═══════════════════════════════════════════════════════════════════════════════
// HANDLER: rag_chat
// ═══════════════════════════════════════════════════════════════════════════════

export async function handleChat(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(ChatInput, params);
    const config = getConfig();
    const indexManager = requireIndexManager();
    const sessionId = input.session_id;

    if (!indexManager.exists(sessionId)) {
      throw sessionNotFoundError(sessionId);
    }

    const locks = getLocks();
    const orchestrator = new ConversationalRetrievalOrchestrator(sessionId, {
      indexManager,
      languageModel: requireLanguageModel(),
      maxContextChars: config.maxContextChars,
      historyWindow: config.historyWindow,
      providerTimeoutMs: config.providerTimeoutMs,
      retrievalGuard: <T>(fn: () => Promise<T>) => locks.withRead<T>(sessionId, fn),
    });

    try {
      await locks.withRead(sessionId, () =>
        orchestrator.loadRetriever(sessionId, {
          k: input.k ?? config.k,
          fetchK: input.fetch_k ?? config.fetchK,
          lambdaMult: input.lambda_mult ?? config.lambdaMult,
        })
      );

      const store = requireSessionStore();
      const history = store.get(sessionId);
      const turn = await orchestrator.run(input.message, history);

      store.append(sessionId, createMessage('user', input.message), createMessage('assistant', turn.answer));

      return formatResponse(
        successResult({
          answer: turn.answer,
          session_id: sessionId,
          standalone_query: turn.standaloneQuery,
          sources: turn.sources.map((s) => ({
            source_id: s.chunk.sourceId,
            chunk_index: s.chunk.chunkIndex,
            fingerprint: s.chunk.fingerprint,
            score: Math.round(s.score * 10000) / 10000,
          })),
        })
      );
    } finally {
      orchestrator.close();
    }
  } catch (error) {
    return handleError(error);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL DEFINITIONS EXPORT
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Chat tools collection for MCP server registration
 */
export const chatTools: Record<string, ToolDefinition> = {
  rag_chat: {
    description:
      '[ESSENTIAL] Ask a question about a session\'s documents. Uses the session history to resolve follow-ups, retrieves diverse relevant chunks (MMR) and returns the answer with its sources.',
    inputSchema: ChatInput.shape,
    handler: handleChat,
  },
};
