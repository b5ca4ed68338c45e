/**
 * Application wiring tests
 */

import { describe, it, expect } from 'vitest';
import { buildRegistry, createChatFactory, DEFAULT_CHAT_NAME, DEMO_AGENTS } from '../src/setup.js';
import type { ValidatedUserConfig } from '../src/config/schema.js';

describe('buildRegistry', () => {
  it('falls back to the demo agents', async () => {
    const registry = await buildRegistry({});

    expect(registry.getAvailableAgents()).toEqual(DEMO_AGENTS.map((d) => d.name));
  });

  it('registers configured agents only', async () => {
    const registry = await buildRegistry({
      agents: [{ name: 'helper', instructions: 'Help.', enabled: true, model: { type: 'mock' } }],
    });

    expect(registry.getAvailableAgents()).toEqual(['helper']);
  });
});

describe('createChatFactory', () => {
  it('enrols every available agent by default', async () => {
    const config: ValidatedUserConfig = {};
    const registry = await buildRegistry(config);
    const createChat = createChatFactory({ config, registry, env: {} });

    const chat = createChat('s1');

    expect(chat.name).toBe(DEFAULT_CHAT_NAME);
    expect(chat.sessionId).toBe('s1');
    expect(chat.getParticipants().map((p) => p.agentName)).toEqual(['people_lookup', 'knowledge_finder']);
  });

  it('applies chat settings, participants and the turn override', async () => {
    const config: ValidatedUserConfig = {
      chat: { name: 'support', maxTurns: 8, responseWaitTime: 0 },
      participants: [{ name: 'knowledge_finder', role: 'facilitator', priority: 5, maxConsecutiveTurns: 2 }],
    };
    const registry = await buildRegistry(config);
    const createChat = createChatFactory({ config, registry, maxTurns: 2, env: {} });

    const chat = createChat('s2');

    expect(chat.config.name).toBe('support');
    expect(chat.config.maxTurns).toBe(2);
    expect(chat.getParticipants()).toEqual([
      { agentName: 'knowledge_finder', role: 'facilitator', priority: 5, maxConsecutiveTurns: 2 },
    ]);
  });

  it('creates chats that answer with the demo agents', async () => {
    const config: ValidatedUserConfig = { chat: { maxTurns: 1, responseWaitTime: 0 } };
    const registry = await buildRegistry(config);
    const chat = createChatFactory({ config, registry, env: {} })('s3');

    const responses = await chat.send('Who is the manager of the Sales team?');

    expect(responses.map((r) => r.agentName)).toEqual(['people_lookup']);
    expect(responses[0].sessionId).toBe('s3');
  });
});
