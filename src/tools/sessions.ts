/**
 * Session MCP Tools
 *
 * Tools: rag_session_upload, rag_session_history, rag_session_clear, rag_session_list
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module tools/sessions
 */

import { getConfig, getLocks, requireIndexManager, requireSessionStore } from '../server/state.js';
import { successResult } from '../server/types.js';
import { sessionNotFoundError } from '../server/errors.js';
import { DocumentIngestor } from '../services/ingestion/ingestor.js';
import {
  SessionClearInput,
  SessionHistoryInput,
  SessionUploadFields,
  SessionUploadInput,
  sanitizePath,
  validateInput,
} from '../utils/validation.js';
import { formatResponse, handleError, type ToolResponse, type ToolDefinition } from './shared.js';

/**
 * A session exists when it has an index on disk or history in the store.
 * In-memory history does not survive a restart; the index does.
 */
function sessionExists(sessionId: string): boolean {
  return requireIndexManager().exists(sessionId) || requireSessionStore().has(sessionId);
}

// ═══════════════════════════════════════════════════════════════════════════════
// HANDLER: rag_session_upload
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Load, split and index documents. Without session_id a new session is
 * created; with one, documents are added to that session's index and
 * chunks already present are skipped by fingerprint.
 */
export async function handleSessionUpload(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(SessionUploadInput, params);
    const config = getConfig();
    const filePaths = (input.file_paths ?? []).map((p) => sanitizePath(p));

    const ingestor = new DocumentIngestor(requireIndexManager(), getLocks());
    const result = await ingestor.ingest({
      sessionId: input.session_id,
      filePaths,
      documents: input.documents,
      chunkSize: input.chunk_size ?? config.chunkSize,
      chunkOverlap: input.chunk_overlap ?? config.chunkOverlap,
    });

    // History starts empty on the first upload
    requireSessionStore().create(result.sessionId);

    const message =
      result.added === 0
        ? `No new content: all ${result.chunks} chunks were already indexed`
        : `Indexed ${result.added} new chunks from ${result.documents} document(s)`;

    return formatResponse(
      successResult({
        session_id: result.sessionId,
        indexed: true,
        created: result.created,
        documents: result.documents,
        chunks: result.chunks,
        added: result.added,
        duplicates: result.duplicates,
        index_size: result.indexSize,
        skipped: result.skipped,
        message,
        next_steps: [
          { tool: 'rag_chat', description: 'Ask a question about the uploaded documents' },
          { tool: 'rag_session_upload', description: 'Add more documents to this session' },
        ],
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// HANDLER: rag_session_history
// ═══════════════════════════════════════════════════════════════════════════════

export async function handleSessionHistory(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(SessionHistoryInput, params);
    if (!sessionExists(input.session_id)) {
      throw sessionNotFoundError(input.session_id);
    }

    const history = requireSessionStore().get(input.session_id);
    const messages = input.limit !== undefined ? history.slice(-input.limit) : history;

    return formatResponse(
      successResult({
        session_id: input.session_id,
        total: history.length,
        returned: messages.length,
        messages: messages.map((m) => ({
          role: m.role,
          content: m.content,
          created_at: m.createdAt,
        })),
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// HANDLER: rag_session_clear
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Drop a session's chat history. The index is kept.
 */
export async function handleSessionClear(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(SessionClearInput, params);
    if (!sessionExists(input.session_id)) {
      throw sessionNotFoundError(input.session_id);
    }

    const store = requireSessionStore();
    const cleared = store.get(input.session_id).length;
    store.clear(input.session_id);
    console.error(`[Sessions] History cleared: session=${input.session_id} messages=${cleared}`);

    return formatResponse(
      successResult({
        session_id: input.session_id,
        cleared_messages: cleared,
        index_kept: true,
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// HANDLER: rag_session_list
// ═══════════════════════════════════════════════════════════════════════════════

export async function handleSessionList(_params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const indexed = requireIndexManager().listSessions();
    const histories = new Map(requireSessionStore().list().map((s) => [s.sessionId, s]));

    const sessions = indexed.map((info) => ({
      session_id: info.sessionId,
      chunk_count: info.chunkCount,
      readable: info.chunkCount !== null,
      message_count: histories.get(info.sessionId)?.messageCount ?? 0,
    }));

    return formatResponse(
      successResult({
        index_root: requireIndexManager().indexRoot,
        total: sessions.length,
        sessions,
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
 * Session tools collection for MCP server registration
 */
export const sessionTools: Record<string, ToolDefinition> = {
  rag_session_upload: {
    description:
      '[ESSENTIAL] Upload text documents into a session and index them. Omit session_id to start a new session; pass one to add documents to it (duplicate chunks are skipped).',
    inputSchema: SessionUploadFields.shape,
    handler: handleSessionUpload,
  },
  rag_session_history: {
    description: 'Return the chat history of a session, oldest first. limit keeps the most recent messages.',
    inputSchema: SessionHistoryInput.shape,
    handler: handleSessionHistory,
  },
  rag_session_clear: {
    description: 'Clear the chat history of a session. The document index is kept.',
    inputSchema: SessionClearInput.shape,
    handler: handleSessionClear,
  },
  rag_session_list: {
    description: 'List sessions that have a document index, with chunk and message counts.',
    inputSchema: {},
    handler: handleSessionList,
  },
};
