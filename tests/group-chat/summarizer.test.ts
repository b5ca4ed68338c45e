/**
 * Summarizer tests
 */

import { describe, it, expect } from 'vitest';
import {
  EMPTY_SUMMARY,
  SUMMARY_PROMPT,
  buildTranscript,
  heuristicSummary,
  resolveSummarizerOptions,
  summarizeConversation,
} from '../../src/group-chat/summarizer.js';
import { ValidationError } from '../../src/errors/index.js';
import type { Message } from '../../src/types.js';
import { FakeCompletionModel, agentMessage, userMessage } from '../helpers/fakes.js';

const history = [userMessage('hi'), agentMessage('alpha', 'hello')];
const context = { participants: ['alpha', 'beta'], turnCount: 1 };

describe('buildTranscript', () => {
  it('labels lines by agent, then sender, then role', () => {
    const system: Message = {
      id: 'sys',
      role: 'system',
      content: 'note',
      metadata: {},
      timestamp: new Date('2024-01-01T00:00:00Z'),
    };

    expect(buildTranscript([userMessage('hi', 'Dana'), agentMessage('alpha', 'hello\nthere'), system], 10, 1000)).toBe(
      'Dana: hi\nalpha: hello there\nsystem: note'
    );
  });

  it('keeps only the newest messages', () => {
    expect(buildTranscript(history, 1, 1000)).toBe('alpha: hello');
  });

  it('stops at the first line over the character budget', () => {
    expect(buildTranscript(history, 10, 20)).toBe('User: hi');
  });

  it('caps long lines', () => {
    const line = buildTranscript([agentMessage('alpha', 'x'.repeat(1200))], 10, 5000);

    expect(line).toBe(`alpha: ${'x'.repeat(997)}...`);
  });
});

describe('heuristicSummary', () => {
  it('lists participants and turns above the excerpt', () => {
    expect(heuristicSummary('User: hi', context)).toBe(
      'Conversation Summary (heuristic)\nParticipants: alpha, beta\nTurns: 1\nRecent Excerpt (truncated):\nUser: hi'
    );
  });

  it('truncates the excerpt', () => {
    const text = heuristicSummary('y'.repeat(2000), context, 'fallback');

    expect(text.split('\n')[0]).toBe('Conversation Summary (fallback)');
    expect(text.split('\n')[4]).toHaveLength(1500);
  });
});

describe('resolveSummarizerOptions', () => {
  it('fills defaults', () => {
    expect(resolveSummarizerOptions()).toEqual({ maxMessages: 120, charBudget: 6000 });
  });

  it('rejects non-positive limits', () => {
    expect(() => resolveSummarizerOptions({ maxMessages: 0 })).toThrow(ValidationError);
  });
});

describe('summarizeConversation', () => {
  it('reports an empty conversation without calling a model', async () => {
    const model = new FakeCompletionModel(['unused']);

    const result = await summarizeConversation([], {}, { ...context, summaryModel: model });

    expect(result).toEqual({ text: EMPTY_SUMMARY, source: 'empty' });
    expect(model.calls).toHaveLength(0);
  });

  it('uses the summary model first', async () => {
    const summaryModel = new FakeCompletionModel(['  Summary text \n']);
    const routingModel = new FakeCompletionModel(['unused']);

    const result = await summarizeConversation(history, {}, { ...context, summaryModel, routingModel });

    expect(result).toEqual({ text: 'Summary text', source: 'summary' });
    expect(summaryModel.calls).toEqual([
      { prompt: SUMMARY_PROMPT, inputs: { transcript: 'User: hi\nalpha: hello' } },
    ]);
    expect(routingModel.calls).toHaveLength(0);
  });

  it('uses the routing model when there is no summary model', async () => {
    const routingModel = new FakeCompletionModel(['Routed summary']);

    const result = await summarizeConversation(history, {}, { ...context, routingModel });

    expect(result).toEqual({ text: 'Routed summary', source: 'routing' });
  });

  it('falls back to the heuristic summary when the summary model fails', async () => {
    const summaryModel = new FakeCompletionModel([new Error('rate limited')]);
    const routingModel = new FakeCompletionModel(['Routed summary']);

    const result = await summarizeConversation(history, {}, { ...context, summaryModel, routingModel });

    expect(result).toEqual({
      text: 'Conversation Summary (fallback)\nParticipants: alpha, beta\nTurns: 1\nRecent Excerpt (truncated):\nUser: hi\nalpha: hello',
      source: 'fallback',
    });
    expect(routingModel.calls).toHaveLength(0);
  });

  it('treats an empty answer as a failure', async () => {
    const routingModel = new FakeCompletionModel(['   ']);

    const result = await summarizeConversation(history, {}, { ...context, routingModel });

    expect(result.source).toBe('fallback');
    expect(result.text.split('\n')[0]).toBe('Conversation Summary (fallback)');
    expect(routingModel.calls).toHaveLength(1);
  });

  it('summarizes heuristically without models', async () => {
    const result = await summarizeConversation(history, { maxMessages: 1 }, context);

    expect(result).toEqual({
      text: 'Conversation Summary (heuristic)\nParticipants: alpha, beta\nTurns: 1\nRecent Excerpt (truncated):\nalpha: hello',
      source: 'heuristic',
    });
  });
});
