/**
 * Session and conversation interfaces
 */

export type MessageRole = 'user' | 'assistant';

/**
 * One role-tagged message in a session history
 */
export interface ChatMessage {
  role: MessageRole;
  content: string;
  /** ISO 8601 */
  createdAt: string;
}

/**
 * Summary of a known session
 */
export interface SessionSummary {
  sessionId: string;
  messageCount: number;
  createdAt: string;
}

/**
 * Build a message stamped with the current time
 */
export function createMessage(role: MessageRole, content: string): ChatMessage {
  return { role, content, createdAt: new Date().toISOString() };
}
