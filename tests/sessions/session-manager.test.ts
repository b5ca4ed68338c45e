/**
 * Session manager tests
 */

import { describe, it, expect } from 'vitest';
import { SessionManager, type SessionManagerOptions } from '../../src/sessions/session-manager.js';
import { MemoryTranscriptStore } from '../../src/sessions/transcript-store.js';
import { GroupChat } from '../../src/group-chat/group-chat.js';
import type { Message } from '../../src/types.js';
import { FakeAgent, FakeRegistry } from '../helpers/fakes.js';

const MESSAGE = 'Plan the offsite';

function createManager(options: Partial<SessionManagerOptions> = {}) {
  const registry = new FakeRegistry([new FakeAgent('alpha'), new FakeAgent('beta')]);
  const created: string[] = [];
  const manager = new SessionManager({
    createChat: (sessionId) => {
      created.push(sessionId);
      const chat = new GroupChat({
        config: { name: 'test', maxTurns: 1, responseWaitTime: 0 },
        registry,
        sessionId,
      });
      chat.addParticipant('alpha');
      chat.addParticipant('beta');
      return chat;
    },
    ...options,
  });
  return { manager, created };
}

class FailingStore extends MemoryTranscriptStore {
  override append(_sessionId: string, _chatName: string, _message: Message): void {
    throw new Error('disk full');
  }
}

describe('SessionManager', () => {
  it('creates one chat per session id', () => {
    const { manager, created } = createManager();

    const first = manager.getOrCreate('s1');

    expect(manager.getOrCreate('s1')).toBe(first);
    expect(manager.getOrCreate('s2')).not.toBe(first);
    expect(created).toEqual(['s1', 's2']);
    expect(manager.size).toBe(2);
    expect(manager.list()).toEqual(['s1', 's2']);
    expect(manager.get('s3')).toBeUndefined();
  });

  it('runs calls on one session one after another', async () => {
    const { manager } = createManager();
    const order: string[] = [];
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });

    const first = manager.run('s1', async () => {
      order.push('first started');
      await gate;
      order.push('first finished');
    });
    const second = manager.run('s1', async () => {
      order.push('second');
    });

    expect(manager.isBusy('s1')).toBe(true);
    release();
    await Promise.all([first, second]);

    expect(order).toEqual(['first started', 'first finished', 'second']);
    expect(manager.isBusy('s1')).toBe(false);
  });

  it('keeps serving a session after a failed call', async () => {
    const { manager } = createManager();

    await expect(
      manager.run('s1', async () => {
        throw new Error('handler failed');
      })
    ).rejects.toThrow('handler failed');

    const responses = await manager.run('s1', (chat) => chat.send(MESSAGE));
    expect(responses.map((r) => r.content)).toEqual(['alpha reply 1']);
  });

  it('stamps responses with the session id', async () => {
    const { manager } = createManager();

    const [response] = await manager.run('s7', (chat) => chat.send(MESSAGE));

    expect(response.sessionId).toBe('s7');
  });

  describe('with a transcript store', () => {
    it('persists every message the chat records', async () => {
      const store = new MemoryTranscriptStore();
      const { manager } = createManager({ store });

      await manager.run('s1', (chat) => chat.send(MESSAGE));

      expect(manager.getTranscript('s1').map((m) => m.content)).toEqual([MESSAGE, 'alpha reply 1']);
      expect(store.listSessions().map((r) => [r.id, r.chatName, r.messageCount])).toEqual([['s1', 'test', 2]]);
    });

    it('clears the transcript when the chat is reset', async () => {
      const store = new MemoryTranscriptStore();
      const { manager } = createManager({ store });

      await manager.run('s1', async (chat) => {
        await chat.send(MESSAGE);
        chat.reset();
      });

      expect(manager.getTranscript('s1')).toEqual([]);
    });

    it('keeps the chat working when the store fails', async () => {
      const { manager } = createManager({ store: new FailingStore() });

      const responses = await manager.run('s1', (chat) => chat.send(MESSAGE));

      expect(responses).toHaveLength(1);
    });

    it('deletes the chat and its transcript', async () => {
      const store = new MemoryTranscriptStore();
      const { manager } = createManager({ store });
      const chat = manager.getOrCreate('s1');
      await manager.run('s1', (c) => c.send(MESSAGE));

      expect(manager.delete('s1')).toBe(true);

      expect(manager.get('s1')).toBeUndefined();
      expect(manager.getTranscript('s1')).toEqual([]);
      expect(chat.getState()).toBe('closed');
      expect(manager.delete('s1')).toBe(false);
    });

    it('closeAll keeps stored transcripts', async () => {
      const store = new MemoryTranscriptStore();
      const { manager } = createManager({ store });
      await manager.run('s1', (chat) => chat.send(MESSAGE));

      manager.closeAll();

      expect(manager.size).toBe(0);
      expect(manager.getTranscript('s1')).toHaveLength(2);
    });
  });

  it('returns no transcript without a store', () => {
    const { manager } = createManager();

    expect(manager.getTranscript('s1')).toEqual([]);
    expect(manager.delete('s1')).toBe(false);
  });

  it('sweeps sessions idle past the timeout', () => {
    let clock = 1000;
    const { manager } = createManager({ idleTimeoutMs: 100, now: () => clock });
    const stale = manager.getOrCreate('stale');
    clock = 1050;
    manager.getOrCreate('fresh');

    expect(manager.sweepIdle(1120)).toEqual(['stale']);
    expect(manager.list()).toEqual(['fresh']);
    expect(stale.getState()).toBe('closed');
  });

  it('does not sweep a busy session', async () => {
    let clock = 0;
    const { manager } = createManager({ idleTimeoutMs: 10, now: () => clock });
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const pending = manager.run('s1', () => gate);
    await Promise.resolve();
    await Promise.resolve();

    clock = 500;
    expect(manager.sweepIdle()).toEqual([]);

    release();
    await pending;
    expect(manager.sweepIdle(1000)).toEqual(['s1']);
  });
});
