/**
 * Bounded prompt context from retrieved chunks
 *
 * @module services/chat/context
 */

import type { RetrievedChunk } from '../../models/chunk.js';
import type { ChatMessage } from '../../models/session.js';

export const CONTEXT_SEPARATOR = '\n\n';

export interface BuiltContext {
  text: string;
  /** Retrieved chunks that made it into the context, in order */
  included: RetrievedChunk[];
  truncated: boolean;
}

/**
 * Join chunk texts in retrieval order, stopping before the bound would be
 * exceeded. A first chunk longer than the bound is cut to fit.
 */
export function buildContext(retrieved: readonly RetrievedChunk[], maxChars: number): BuiltContext {
  const parts: string[] = [];
  const included: RetrievedChunk[] = [];
  let length = 0;
  let truncated = false;

  for (const item of retrieved) {
    const text = item.chunk.text;
    const added = parts.length === 0 ? text.length : CONTEXT_SEPARATOR.length + text.length;

    if (length + added > maxChars) {
      if (parts.length === 0 && maxChars > 0) {
        parts.push(text.slice(0, maxChars));
        included.push(item);
        length = maxChars;
      }
      truncated = true;
      break;
    }

    parts.push(text);
    included.push(item);
    length += added;
  }

  return { text: parts.join(CONTEXT_SEPARATOR), included, truncated };
}

/**
 * Most recent `window` messages, oldest first
 */
export function recentHistory(history: readonly ChatMessage[], window: number): ChatMessage[] {
  if (window <= 0) return [];
  return history.slice(-window);
}
