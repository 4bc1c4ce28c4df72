/**
 * Conversation history stores
 *
 * History lives outside the orchestrator: the chat tool reads it before a
 * turn and appends the user message and the answer afterwards.
 *
 * InMemorySessionStore is the default and is lost on restart (the session
 * index survives; history starts empty again). SqliteSessionStore keeps
 * history in `<indexRoot>/sessions.db`.
 *
 * @module services/session/store
 */

import Database from 'better-sqlite3';
import { mkdirSync } from 'fs';
import path from 'path';
import type { ChatMessage, MessageRole, SessionSummary } from '../../models/session.js';

export interface SessionStore {
  has(sessionId: string): boolean;
  /** Register a session with empty history; no-op when it exists */
  create(sessionId: string): void;
  /** Messages oldest first; empty for unknown sessions */
  get(sessionId: string): ChatMessage[];
  /** Append messages, creating the session if needed */
  append(sessionId: string, ...messages: ChatMessage[]): void;
  /** Drop history, keep the session */
  clear(sessionId: string): void;
  list(): SessionSummary[];
  close(): void;
}

// ═══════════════════════════════════════════════════════════════════════════════
// IN-MEMORY
// ═══════════════════════════════════════════════════════════════════════════════

interface MemorySession {
  createdAt: string;
  messages: ChatMessage[];
}

export class InMemorySessionStore implements SessionStore {
  private readonly sessions = new Map<string, MemorySession>();

  has(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  create(sessionId: string): void {
    if (!this.sessions.has(sessionId)) {
      this.sessions.set(sessionId, { createdAt: new Date().toISOString(), messages: [] });
    }
  }

  get(sessionId: string): ChatMessage[] {
    return [...(this.sessions.get(sessionId)?.messages ?? [])];
  }

  append(sessionId: string, ...messages: ChatMessage[]): void {
    this.create(sessionId);
    this.sessions.get(sessionId)?.messages.push(...messages.map((m) => ({ ...m })));
  }

  clear(sessionId: string): void {
    const session = this.sessions.get(sessionId);
    if (session) {
      session.messages = [];
    }
  }

  list(): SessionSummary[] {
    return [...this.sessions.entries()]
      .map(([sessionId, s]) => ({
        sessionId,
        messageCount: s.messages.length,
        createdAt: s.createdAt,
      }))
      .sort((a, b) => a.sessionId.localeCompare(b.sessionId));
  }

  close(): void {
    this.sessions.clear();
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// SQLITE
// ═══════════════════════════════════════════════════════════════════════════════

export const SESSIONS_DB_FILE = 'sessions.db';

const SESSION_STORE_SCHEMA = `
CREATE TABLE IF NOT EXISTS sessions (
  session_id TEXT PRIMARY KEY,
  created_at TEXT NOT NULL
);
CREATE TABLE IF NOT EXISTS messages (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  session_id TEXT NOT NULL REFERENCES sessions(session_id) ON DELETE CASCADE,
  role TEXT NOT NULL CHECK (role IN ('user', 'assistant')),
  content TEXT NOT NULL,
  created_at TEXT NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_messages_session ON messages(session_id, id);
`;

interface MessageRow {
  role: MessageRole;
  content: string;
  created_at: string;
}

interface SummaryRow {
  session_id: string;
  created_at: string;
  message_count: number;
}

export class SqliteSessionStore implements SessionStore {
  private readonly db: Database.Database;
  readonly dbPath: string;

  /**
   * @param indexRoot - Directory that holds sessions.db
   */
  constructor(indexRoot: string) {
    mkdirSync(indexRoot, { recursive: true });
    this.dbPath = path.join(indexRoot, SESSIONS_DB_FILE);
    this.db = new Database(this.dbPath);
    this.db.exec('PRAGMA journal_mode = WAL');
    this.db.exec('PRAGMA foreign_keys = ON');
    this.db.exec(SESSION_STORE_SCHEMA);
  }

  has(sessionId: string): boolean {
    return (
      this.db
        .prepare<[string], { found: number }>('SELECT 1 AS found FROM sessions WHERE session_id = ?')
        .get(sessionId) !== undefined
    );
  }

  create(sessionId: string): void {
    this.db
      .prepare<[string, string]>(
        'INSERT OR IGNORE INTO sessions (session_id, created_at) VALUES (?, ?)'
      )
      .run(sessionId, new Date().toISOString());
  }

  get(sessionId: string): ChatMessage[] {
    return this.db
      .prepare<[string], MessageRow>(
        'SELECT role, content, created_at FROM messages WHERE session_id = ? ORDER BY id'
      )
      .all(sessionId)
      .map((row) => ({ role: row.role, content: row.content, createdAt: row.created_at }));
  }

  append(sessionId: string, ...messages: ChatMessage[]): void {
    const insert = this.db.prepare<[string, MessageRole, string, string]>(
      'INSERT INTO messages (session_id, role, content, created_at) VALUES (?, ?, ?, ?)'
    );
    const run = this.db.transaction(() => {
      this.create(sessionId);
      for (const message of messages) {
        insert.run(sessionId, message.role, message.content, message.createdAt);
      }
    });
    run();
  }

  clear(sessionId: string): void {
    this.db.prepare<[string]>('DELETE FROM messages WHERE session_id = ?').run(sessionId);
  }

  list(): SessionSummary[] {
    return this.db
      .prepare<[], SummaryRow>(
        `SELECT s.session_id, s.created_at, COUNT(m.id) AS message_count
         FROM sessions s LEFT JOIN messages m ON m.session_id = s.session_id
         GROUP BY s.session_id
         ORDER BY s.session_id`
      )
      .all()
      .map((row) => ({
        sessionId: row.session_id,
        messageCount: row.message_count,
        createdAt: row.created_at,
      }));
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }
}

export type HistoryStoreKind = 'memory' | 'sqlite';

export function createSessionStore(kind: HistoryStoreKind, indexRoot: string): SessionStore {
  return kind === 'sqlite' ? new SqliteSessionStore(indexRoot) : new InMemorySessionStore();
}
