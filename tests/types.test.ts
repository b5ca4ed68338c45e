/**
 * Message and response record tests
 */

import { describe, it, expect } from 'vitest';
import { createMessage, createResponse, withResponseMetadata, isErrorResponse } from '../src/types.js';

describe('createMessage', () => {
  it('assigns an id and timestamp and freezes the record', () => {
    const message = createMessage({ role: 'user', content: 'hello', metadata: { sender: 'Ana' } });

    expect(message.id).toMatch(/^[0-9a-f-]{36}$/);
    expect(message.timestamp).toBeInstanceOf(Date);
    expect(message.metadata).toEqual({ sender: 'Ana' });
    expect(Object.isFrozen(message)).toBe(true);
    expect(Object.isFrozen(message.metadata)).toBe(true);
  });

  it('keeps a given id and omits an absent agent name', () => {
    const message = createMessage({ id: 'm-1', role: 'assistant', content: 'hi' });

    expect(message.id).toBe('m-1');
    expect('agentName' in message).toBe(false);
    expect(message.metadata).toEqual({});
  });

  it('copies metadata so later changes to the input do not leak in', () => {
    const metadata: Record<string, unknown> = { turn: 1 };
    const message = createMessage({ role: 'user', content: 'x', metadata });
    metadata.turn = 2;

    expect(message.metadata.turn).toBe(1);
  });
});

describe('createResponse', () => {
  it('gives every response its own message id', () => {
    const a = createResponse({ content: 'a', agentName: 'one' });
    const b = createResponse({ content: 'a', agentName: 'one' });

    expect(a.messageId).not.toBe(b.messageId);
    expect('sessionId' in a).toBe(false);
    expect('usage' in a).toBe(false);
  });

  it('keeps usage and session id when given', () => {
    const response = createResponse({
      content: 'a',
      agentName: 'one',
      usage: { inputTokens: 3, outputTokens: 4 },
      sessionId: 's-1',
    });

    expect(response.usage).toEqual({ inputTokens: 3, outputTokens: 4 });
    expect(response.sessionId).toBe('s-1');
  });
});

describe('withResponseMetadata', () => {
  it('merges metadata over the original and stamps a missing session id', () => {
    const original = createResponse({ content: 'a', agentName: 'one', metadata: { turn: 0, provider: 'mock' } });
    const enriched = withResponseMetadata(original, { turn: 2 }, 's-9');

    expect(enriched.metadata).toEqual({ turn: 2, provider: 'mock' });
    expect(enriched.sessionId).toBe('s-9');
    expect(enriched.messageId).toBe(original.messageId);
    expect(original.metadata.turn).toBe(0);
  });

  it('does not overwrite an existing session id', () => {
    const original = createResponse({ content: 'a', agentName: 'one', sessionId: 'own' });

    expect(withResponseMetadata(original, {}, 'other').sessionId).toBe('own');
  });
});

describe('isErrorResponse', () => {
  it('is true only for error: true', () => {
    expect(isErrorResponse(createResponse({ content: 'x', agentName: 'a', metadata: { error: true } }))).toBe(true);
    expect(isErrorResponse(createResponse({ content: 'x', agentName: 'a', metadata: { error: 'yes' } }))).toBe(false);
    expect(isErrorResponse(createResponse({ content: 'x', agentName: 'a' }))).toBe(false);
  });
});
