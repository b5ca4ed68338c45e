/**
 * Session Manager
 *
 * Maps external session ids (an HTTP client, a chat thread) to GroupChat
 * instances. Chats are created on first use, calls on one session run one
 * after another, and sessions idle past the timeout are cleaned up by
 * `sweepIdle()`.
 */

import type { GroupChat } from '../group-chat/group-chat.js';
import type { Message } from '../types.js';
import { toError } from '../errors/index.js';
import type { TranscriptStore } from './transcript-store.js';
import { createComponentLogger } from '../observability/logger.js';

const log = createComponentLogger('SessionManager');

export const DEFAULT_IDLE_TIMEOUT_MS = 30 * 60 * 1000;

export interface SessionManagerOptions {
  /** Builds the chat for a new session */
  createChat: (sessionId: string) => GroupChat;
  store?: TranscriptStore;
  idleTimeoutMs?: number;
  /** Clock, in epoch milliseconds */
  now?: () => number;
}

interface SessionEntry {
  chat: GroupChat;
  lastUsed: number;
  unsubscribe: () => void;
}

const settle = (): undefined => undefined;

export class SessionManager {
  private sessions = new Map<string, SessionEntry>();
  private tails = new Map<string, Promise<undefined>>();
  private createChat: (sessionId: string) => GroupChat;
  private store?: TranscriptStore;
  private idleTimeoutMs: number;
  private now: () => number;

  constructor(options: SessionManagerOptions) {
    this.createChat = options.createChat;
    this.store = options.store;
    this.idleTimeoutMs = options.idleTimeoutMs ?? DEFAULT_IDLE_TIMEOUT_MS;
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.sessions.size;
  }

  list(): string[] {
    return [...this.sessions.keys()];
  }

  get(sessionId: string): GroupChat | undefined {
    return this.sessions.get(sessionId)?.chat;
  }

  getOrCreate(sessionId: string): GroupChat {
    const existing = this.sessions.get(sessionId);
    if (existing) {
      existing.lastUsed = this.now();
      return existing.chat;
    }

    const chat = this.createChat(sessionId);
    const unsubscribe = this.persist(sessionId, chat);
    this.sessions.set(sessionId, { chat, lastUsed: this.now(), unsubscribe });
    log.info('Session created', { session: sessionId, chat: chat.name });
    return chat;
  }

  /**
   * Run `fn` against the session's chat once every earlier call on the same
   * session has settled.
   */
  async run<T>(sessionId: string, fn: (chat: GroupChat) => Promise<T>): Promise<T> {
    const previous = this.tails.get(sessionId) ?? Promise.resolve(undefined);
    const result = previous.then(() => {
      const chat = this.getOrCreate(sessionId);
      return fn(chat);
    });
    const tail = result.then(settle, settle);
    this.tails.set(sessionId, tail);

    try {
      return await result;
    } finally {
      if (this.tails.get(sessionId) === tail) {
        this.tails.delete(sessionId);
      }
      const entry = this.sessions.get(sessionId);
      if (entry) entry.lastUsed = this.now();
    }
  }

  isBusy(sessionId: string): boolean {
    return this.tails.has(sessionId);
  }

  /** The stored transcript, which outlives the in-memory chat */
  getTranscript(sessionId: string): Message[] {
    return this.store?.load(sessionId) ?? [];
  }

  /**
   * Clean up the session's chat and drop its transcript.
   */
  delete(sessionId: string): boolean {
    const entry = this.sessions.get(sessionId);
    const stored = this.store?.delete(sessionId) ?? false;
    if (!entry) return stored;

    entry.unsubscribe();
    entry.chat.cleanup();
    this.sessions.delete(sessionId);
    log.info('Session deleted', { session: sessionId });
    return true;
  }

  /**
   * Delete sessions unused for longer than the idle timeout. Sessions with
   * a call in progress or queued are kept.
   * @returns the deleted session ids
   */
  sweepIdle(now: number = this.now()): string[] {
    const expired: string[] = [];
    for (const [sessionId, entry] of this.sessions) {
      if (now - entry.lastUsed > this.idleTimeoutMs && !this.tails.has(sessionId)) {
        expired.push(sessionId);
      }
    }
    for (const sessionId of expired) {
      const entry = this.sessions.get(sessionId);
      if (!entry) continue;
      entry.unsubscribe();
      entry.chat.cleanup();
      this.sessions.delete(sessionId);
    }
    if (expired.length > 0) {
      log.info('Swept idle sessions', { sessions: expired });
    }
    return expired;
  }

  /**
   * Clean up every chat. Stored transcripts are kept.
   */
  closeAll(): void {
    for (const entry of this.sessions.values()) {
      entry.unsubscribe();
      entry.chat.cleanup();
    }
    this.sessions.clear();
  }

  private persist(sessionId: string, chat: GroupChat): () => void {
    const store = this.store;
    if (!store) return settle;

    return chat.on((event) => {
      try {
        if (event.type === 'message.appended') {
          store.append(sessionId, chat.name, event.message);
        } else if (event.type === 'conversation.reset') {
          store.clear(sessionId);
        }
      } catch (err) {
        log.error('Failed to persist transcript', { session: sessionId, error: toError(err).message });
      }
    });
  }
}
