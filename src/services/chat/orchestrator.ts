/**
 * Conversational Retrieval Orchestrator
 *
 * One chat turn:
 *   1. history non-empty → reformulate the message into a standalone query (LLM)
 *   2. MMR retrieval on the standalone query
 *   3. bounded context from the retrieved chunks + recent history window
 *   4. answer (LLM)
 *   5. validate: trim, empty → "no answer generated.", clip to 4096 chars
 *
 * The orchestrator never touches session history; the caller appends the
 * turn. A failed invoke leaves nothing behind, so callers may retry it.
 *
 * States: UNINITIALIZED → RETRIEVER_LOADED (loadRetriever may be repeated).
 *
 * @module services/chat/orchestrator
 */

import type { RetrievedChunk } from '../../models/chunk.js';
import type { ChatMessage } from '../../models/session.js';
import {
  GenerationError,
  IndexNotFoundError,
  NotInitializedError,
  RetrievalError,
  SessionNotFoundError,
  describeError,
} from '../errors.js';
import type { LanguageModelProvider } from '../llm/provider.js';
import { buildContextualizePrompt, buildQaPrompt } from '../llm/prompts.js';
import { DEFAULT_MMR_PARAMS, type MmrParams, validateMmrParams } from '../search/mmr.js';
import { MmrRetriever } from '../search/retriever.js';
import { isValidSessionId } from '../session/session-id.js';
import type { VectorIndexManager } from '../storage/index-manager.js';
import type { SessionIndex } from '../storage/session-index.js';
import { withTimeout } from '../../utils/timeout.js';
import { buildContext, recentHistory } from './context.js';

export type OrchestratorState = 'UNINITIALIZED' | 'RETRIEVER_LOADED';

export const NO_ANSWER = 'no answer generated.';
export const MAX_ANSWER_LENGTH = 4096;

type GenerationStage = GenerationError['stage'];

/**
 * Wraps the retrieval stage, e.g. to hold a session read lock while the
 * index is queried. LLM calls always run outside it.
 */
export type RetrievalGuard = <T>(fn: () => Promise<T>) => Promise<T>;

export interface OrchestratorOptions {
  indexManager: VectorIndexManager;
  languageModel: LanguageModelProvider;
  /** Upper bound on context characters (default 12000) */
  maxContextChars?: number;
  /** Recent history messages shown to the LLM (default 6) */
  historyWindow?: number;
  /** Timeout per provider call; 0 disables (default 0) */
  providerTimeoutMs?: number;
  retrievalGuard?: RetrievalGuard;
}

export interface ChatTurnResult {
  answer: string;
  standaloneQuery: string;
  /** Chunks placed in the answer context, in MMR order */
  sources: RetrievedChunk[];
}

/**
 * Trim, substitute the fallback for empty output, clip to MAX_ANSWER_LENGTH
 */
export function finalizeAnswer(raw: string): string {
  const trimmed = raw.trim();
  if (trimmed.length === 0) {
    return NO_ANSWER;
  }
  return trimmed.length > MAX_ANSWER_LENGTH ? trimmed.slice(0, MAX_ANSWER_LENGTH) : trimmed;
}

export class ConversationalRetrievalOrchestrator {
  private state: OrchestratorState = 'UNINITIALIZED';
  private retriever: MmrRetriever | null = null;
  private sessionId: string | null;

  private readonly indexManager: VectorIndexManager;
  private readonly languageModel: LanguageModelProvider;
  private readonly maxContextChars: number;
  private readonly historyWindow: number;
  private readonly providerTimeoutMs: number;
  private readonly retrievalGuard: RetrievalGuard;

  constructor(sessionId: string | null, options: OrchestratorOptions) {
    this.sessionId = sessionId;
    this.indexManager = options.indexManager;
    this.languageModel = options.languageModel;
    this.maxContextChars = options.maxContextChars ?? 12000;
    this.historyWindow = options.historyWindow ?? 6;
    this.providerTimeoutMs = options.providerTimeoutMs ?? 0;
    this.retrievalGuard = options.retrievalGuard ?? ((fn) => fn());
  }

  getState(): OrchestratorState {
    return this.state;
  }

  getSessionId(): string | null {
    return this.sessionId;
  }

  /**
   * Load the session's index and bind an MMR retriever to it. Replaces (and
   * closes) any previously loaded index.
   *
   * @throws InvalidParameterError on bad MMR parameters
   * @throws SessionNotFoundError when the session has no index or the id is malformed
   * @throws IndexCorruptError when the index cannot be trusted
   * @throws EmbeddingError (MODEL_MISMATCH) when the index was built with another model
   */
  loadRetriever(sessionId: string, params: Partial<MmrParams> = {}): MmrRetriever {
    const merged: MmrParams = { ...DEFAULT_MMR_PARAMS, ...params };
    validateMmrParams(merged.k, merged.fetchK, merged.lambdaMult);

    // An id that cannot name a session directory names no session
    if (!isValidSessionId(sessionId)) {
      throw new SessionNotFoundError(sessionId);
    }
    const dir = this.indexManager.resolveSessionDir(sessionId);
    let index: SessionIndex;
    try {
      index = this.indexManager.load(dir);
    } catch (error) {
      if (error instanceof IndexNotFoundError) {
        throw new SessionNotFoundError(sessionId, error);
      }
      throw error;
    }
    try {
      this.indexManager.assertProviderMatches(index);
    } catch (error) {
      this.indexManager.close(index);
      throw error;
    }

    const previous = this.retriever;
    this.retriever = new MmrRetriever(index, this.indexManager.provider, merged);
    this.sessionId = sessionId;
    this.state = 'RETRIEVER_LOADED';
    if (previous !== null && previous.index !== index) {
      this.indexManager.close(previous.index);
    }

    console.error(
      `[Orchestrator] Retriever loaded: session=${sessionId} chunks=${index.size()} k=${merged.k} fetch_k=${merged.fetchK} lambda=${merged.lambdaMult}`
    );
    return this.retriever;
  }

  /**
   * Answer a message given prior history.
   *
   * @throws NotInitializedError before loadRetriever
   * @throws GenerationError when reformulation, retrieval or answering fails
   */
  async invoke(message: string, history: readonly ChatMessage[] = []): Promise<string> {
    const result = await this.run(message, history);
    return result.answer;
  }

  /**
   * invoke() plus the standalone query and the chunks used as context
   */
  async run(message: string, history: readonly ChatMessage[] = []): Promise<ChatTurnResult> {
    const retriever = this.retriever;
    if (this.state !== 'RETRIEVER_LOADED' || retriever === null) {
      throw new NotInitializedError(
        'Retriever not loaded. Call loadRetriever() before invoke().'
      );
    }

    const window = recentHistory(history, this.historyWindow);

    // 1) Standalone query
    let standaloneQuery = message;
    if (history.length > 0) {
      const rewritten = await this.stage('reformulate', () =>
        this.languageModel.generate(buildContextualizePrompt(message, window))
      );
      standaloneQuery = rewritten.trim().length > 0 ? rewritten.trim() : message;
    }

    // 2) Retrieval; the query is embedded before the guard is taken
    const queryVector = await this.stage('retrieve', () => retriever.embedQuery(standaloneQuery));
    const retrieved = await this.stage('retrieve', () =>
      this.retrievalGuard(async () => retriever.selectByVector(queryVector))
    );

    // 3) Context
    const context = buildContext(retrieved, this.maxContextChars);

    // 4) Answer
    const raw = await this.stage('answer', () =>
      this.languageModel.generate(buildQaPrompt(standaloneQuery, context.text, window))
    );

    // 5) Validate
    const answer = finalizeAnswer(raw);
    if (answer === NO_ANSWER) {
      console.error(`[Orchestrator] No answer generated: session=${this.sessionId}`);
    }

    console.error(
      `[Orchestrator] Turn complete: session=${this.sessionId} reformulated=${standaloneQuery !== message} retrieved=${retrieved.length} context_chunks=${context.included.length} context_truncated=${context.truncated} answer_chars=${answer.length}`
    );
    return { answer, standaloneQuery, sources: context.included };
  }

  /**
   * Release the loaded index and return to UNINITIALIZED
   */
  close(): void {
    if (this.retriever !== null) {
      this.indexManager.close(this.retriever.index);
      this.retriever = null;
    }
    this.state = 'UNINITIALIZED';
  }

  private async stage<T>(stage: GenerationStage, fn: () => Promise<T>): Promise<T> {
    try {
      return await withTimeout(fn(), this.providerTimeoutMs, `${stage} step`);
    } catch (error) {
      // Domain errors (corrupt index, bad parameters) pass through unchanged
      if (error instanceof RetrievalError) throw error;
      console.error(`[Orchestrator] ${stage} failed: ${describeError(error)}`);
      throw new GenerationError(
        `Generation failed during ${stage}: ${error instanceof Error ? error.message : String(error)}`,
        stage,
        error
      );
    }
  }
}
