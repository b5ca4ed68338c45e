/**
 * Transcript Stores
 *
 * Durable copies of group chat histories, keyed by session id. The session
 * manager appends every message a chat records and clears the transcript
 * when the chat is reset.
 *
 * - MemoryTranscriptStore: process-local, for tests and short-lived hosts
 * - SQLiteTranscriptStore: better-sqlite3 file, WAL mode, embedded migrations
 */

import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { z } from 'zod';
import type { Message } from '../types.js';
import { createMessage } from '../types.js';
import { applyMigrations } from '../persistence/schema.js';
import { createComponentLogger } from '../observability/logger.js';

const log = createComponentLogger('TranscriptStore');

// =============================================================================
// TYPES
// =============================================================================

export interface SessionRecord {
  id: string;
  chatName: string;
  createdAt: Date;
  lastActiveAt: Date;
  messageCount: number;
}

export interface TranscriptStore {
  append(sessionId: string, chatName: string, message: Message): void;
  /** Messages in append order; empty for an unknown session */
  load(sessionId: string): Message[];
  /** Drop the messages, keep the session */
  clear(sessionId: string): void;
  /** Drop the session and its messages */
  delete(sessionId: string): boolean;
  /** Most recently active first */
  listSessions(): SessionRecord[];
  close(): void;
}

// =============================================================================
// MEMORY STORE
// =============================================================================

export class MemoryTranscriptStore implements TranscriptStore {
  private sessions = new Map<string, { record: SessionRecord; messages: Message[] }>();

  append(sessionId: string, chatName: string, message: Message): void {
    const now = new Date();
    let entry = this.sessions.get(sessionId);
    if (!entry) {
      entry = {
        record: { id: sessionId, chatName, createdAt: now, lastActiveAt: now, messageCount: 0 },
        messages: [],
      };
      this.sessions.set(sessionId, entry);
    }
    entry.messages.push(message);
    entry.record.lastActiveAt = now;
    entry.record.messageCount = entry.messages.length;
  }

  load(sessionId: string): Message[] {
    return [...(this.sessions.get(sessionId)?.messages ?? [])];
  }

  clear(sessionId: string): void {
    const entry = this.sessions.get(sessionId);
    if (entry) {
      entry.messages = [];
      entry.record.messageCount = 0;
    }
  }

  delete(sessionId: string): boolean {
    return this.sessions.delete(sessionId);
  }

  listSessions(): SessionRecord[] {
    return [...this.sessions.values()]
      .map((entry) => ({ ...entry.record }))
      .sort(
        (a, b) => b.lastActiveAt.getTime() - a.lastActiveAt.getTime() || (a.id < b.id ? -1 : a.id > b.id ? 1 : 0)
      );
  }

  close(): void {
    this.sessions.clear();
  }
}

// =============================================================================
// SQLITE STORE
// =============================================================================

const MessageRowSchema = z.object({
  id: z.string(),
  role: z.enum(['user', 'assistant', 'system']),
  content: z.string(),
  agent_name: z.string().nullable(),
  metadata: z.string(),
  timestamp: z.string(),
});

const SessionRowSchema = z.object({
  id: z.string(),
  chat_name: z.string(),
  created_at: z.string(),
  last_active_at: z.string(),
  message_count: z.number(),
});

const MetadataSchema = z.record(z.unknown());

export interface SQLiteTranscriptStoreConfig {
  /** File path, or ':memory:' */
  dbPath: string;
  /** WAL journal for file databases (default: true) */
  wal?: boolean;
}

export class SQLiteTranscriptStore implements TranscriptStore {
  private db: Database.Database;

  constructor(config: SQLiteTranscriptStoreConfig) {
    if (config.dbPath !== ':memory:') {
      mkdirSync(dirname(config.dbPath), { recursive: true });
    }
    this.db = new Database(config.dbPath);
    if ((config.wal ?? true) && config.dbPath !== ':memory:') {
      this.db.pragma('journal_mode = WAL');
    }
    this.db.pragma('foreign_keys = ON');

    const result = applyMigrations(this.db);
    if (result.applied > 0) {
      log.debug('Applied migrations', { migrations: result.appliedMigrations, version: result.currentVersion });
    }
  }

  append(sessionId: string, chatName: string, message: Message): void {
    const now = new Date().toISOString();
    this.db.transaction(() => {
      this.db
        .prepare(
          `INSERT INTO sessions (id, chat_name, created_at, last_active_at, message_count)
           VALUES (?, ?, ?, ?, 0)
           ON CONFLICT(id) DO NOTHING`
        )
        .run(sessionId, chatName, now, now);

      this.db
        .prepare(
          `INSERT INTO messages (id, session_id, seq, role, content, agent_name, metadata, timestamp)
           VALUES (?, ?, (SELECT COALESCE(MAX(seq), 0) + 1 FROM messages WHERE session_id = ?), ?, ?, ?, ?, ?)`
        )
        .run(
          message.id,
          sessionId,
          sessionId,
          message.role,
          message.content,
          message.agentName ?? null,
          JSON.stringify(message.metadata),
          message.timestamp.toISOString()
        );

      this.db
        .prepare('UPDATE sessions SET last_active_at = ?, message_count = message_count + 1 WHERE id = ?')
        .run(now, sessionId);
    })();
  }

  load(sessionId: string): Message[] {
    const rows = this.db
      .prepare(
        `SELECT id, role, content, agent_name, metadata, timestamp
         FROM messages WHERE session_id = ? ORDER BY seq ASC`
      )
      .all(sessionId);

    return rows.map((raw) => {
      const row = MessageRowSchema.parse(raw);
      const metadata: unknown = JSON.parse(row.metadata);
      return createMessage({
        id: row.id,
        role: row.role,
        content: row.content,
        ...(row.agent_name !== null && { agentName: row.agent_name }),
        metadata: MetadataSchema.parse(metadata),
        timestamp: new Date(row.timestamp),
      });
    });
  }

  clear(sessionId: string): void {
    this.db.transaction(() => {
      this.db.prepare('DELETE FROM messages WHERE session_id = ?').run(sessionId);
      this.db.prepare('UPDATE sessions SET message_count = 0 WHERE id = ?').run(sessionId);
    })();
  }

  delete(sessionId: string): boolean {
    const result = this.db.transaction(() => {
      this.db.prepare('DELETE FROM messages WHERE session_id = ?').run(sessionId);
      return this.db.prepare('DELETE FROM sessions WHERE id = ?').run(sessionId);
    })();
    return result.changes > 0;
  }

  listSessions(): SessionRecord[] {
    const rows = this.db
      .prepare(
        `SELECT id, chat_name, created_at, last_active_at, message_count
         FROM sessions ORDER BY last_active_at DESC, id ASC`
      )
      .all();

    return rows.map((raw) => {
      const row = SessionRowSchema.parse(raw);
      return {
        id: row.id,
        chatName: row.chat_name,
        createdAt: new Date(row.created_at),
        lastActiveAt: new Date(row.last_active_at),
        messageCount: row.message_count,
      };
    });
  }

  close(): void {
    this.db.close();
  }
}
