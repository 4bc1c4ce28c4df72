/**
 * Prompt templates for the two LLM calls of a chat turn.
 *
 * @module services/llm/prompts
 */

import type { ChatMessage } from '../../models/session.js';

export const CONTEXTUALIZE_INSTRUCTIONS =
  'Given a conversation history and the most recent user query, rewrite the query as a ' +
  'standalone question that makes sense without the history. Do NOT answer the question. ' +
  'If the query is already standalone, return it unchanged. Return only the question.';

export const QA_INSTRUCTIONS =
  'You are an assistant answering questions about the uploaded documents. Use only the ' +
  'retrieved context below to answer. If the answer is not in the context, say that you ' +
  "don't know. Keep the answer concise.";

/**
 * Render history as "User: ..." / "Assistant: ..." lines
 */
export function renderHistory(history: readonly ChatMessage[]): string {
  return history
    .map((m) => `${m.role === 'user' ? 'User' : 'Assistant'}: ${m.content}`)
    .join('\n');
}

export function buildContextualizePrompt(
  message: string,
  history: readonly ChatMessage[]
): string {
  return [
    CONTEXTUALIZE_INSTRUCTIONS,
    '',
    'Conversation history:',
    renderHistory(history),
    '',
    `Latest user query: ${message}`,
    '',
    'Standalone question:',
  ].join('\n');
}

export function buildQaPrompt(
  message: string,
  context: string,
  history: readonly ChatMessage[]
): string {
  const lines = [QA_INSTRUCTIONS, '', 'Context:', context.length > 0 ? context : '(no context)'];
  if (history.length > 0) {
    lines.push('', 'Conversation history:', renderHistory(history));
  }
  lines.push('', `Question: ${message}`, '', 'Answer:');
  return lines.join('\n');
}
