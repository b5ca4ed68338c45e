/**
 * Speaker selector tests
 */

import { describe, it, expect } from 'vitest';
import {
  SpeakerSelector,
  ROUTING_PROMPT,
  fallbackSelection,
  matchRoutingAnswer,
} from '../../src/group-chat/speaker-selector.js';
import { ParticipantDirectory } from '../../src/group-chat/participant-directory.js';
import { NoActiveParticipantsError } from '../../src/errors/index.js';
import type { ParticipantInfo } from '../../src/types.js';
import { FakeAgent, FakeCompletionModel, FakeRegistry } from '../helpers/fakes.js';

function info(agentName: string, overrides: Partial<ParticipantInfo> = {}): ParticipantInfo {
  return { agentName, role: 'participant', priority: 1, maxConsecutiveTurns: 3, ...overrides };
}

function setup(participants: ParticipantInfo[], routingModel?: FakeCompletionModel, autoSelectSpeaker = true) {
  const registry = new FakeRegistry(participants.map((p) => new FakeAgent(p.agentName)));
  const directory = new ParticipantDirectory();
  for (const p of participants) directory.add(p);
  const selector = new SpeakerSelector({ chatName: 'test', registry, routingModel, autoSelectSpeaker });
  return { directory, selector };
}

describe('SpeakerSelector', () => {
  describe('keyword hints', () => {
    it('routes identity questions to the people participant without asking the model', async () => {
      const model = new FakeCompletionModel(['knowledge_y']);
      const { directory, selector } = setup([info('people_x'), info('knowledge_y')], model);

      const selection = await selector.selectWithReason('Who is the manager of the Sales team?', directory);

      expect(selection).toEqual({ speaker: 'people_x', strategy: 'keyword' });
      expect(model.calls).toHaveLength(0);
    });

    it('routes how-to questions to the knowledge participant', async () => {
      const { directory, selector } = setup([info('people_x'), info('knowledge_y')]);

      expect(await selector.select('How do I file expenses?', directory)).toBe('knowledge_y');
    });

    it('matches trigger words only at the start of a word', async () => {
      const { directory, selector } = setup([info('people_x', { priority: 0 }), info('knowledge_y', { priority: 5 })]);

      const selection = await selector.selectWithReason('Show me somewhere nice', directory);

      expect(selection).toEqual({ speaker: 'knowledge_y', strategy: 'priority' });
    });

    it('matches inflected trigger words without asking the model', async () => {
      const model = new FakeCompletionModel(['knowledge_y']);
      const { directory, selector } = setup([info('people_x'), info('knowledge_y')], model);

      const selection = await selector.selectWithReason('Which teams and employees own billing?', directory);

      expect(selection).toEqual({ speaker: 'people_x', strategy: 'keyword' });
      expect(model.calls).toHaveLength(0);
    });

    it('skips a hinted participant that is at its turn limit', async () => {
      const { directory, selector } = setup([info('people_x', { maxConsecutiveTurns: 1 }), info('knowledge_y')]);
      directory.recordTurn('people_x');

      expect(await selector.select('Who owns this?', directory, 'people_x')).toBe('knowledge_y');
    });

    it('uses custom hints', async () => {
      const registry = new FakeRegistry([new FakeAgent('billing_bot'), new FakeAgent('people_x')]);
      const directory = new ParticipantDirectory();
      directory.add(info('people_x'));
      directory.add(info('billing_bot'));
      const selector = new SpeakerSelector({ chatName: 'test', registry, hints: { billing: ['invoice'] } });

      expect(await selector.select('Where is my INVOICE?', directory)).toBe('billing_bot');
      expect(await selector.select('Who is on call?', directory)).toBe('people_x');
    });

    it('is skipped when auto selection is off', async () => {
      const model = new FakeCompletionModel(['knowledge_y']);
      const { directory, selector } = setup([info('people_x'), info('knowledge_y')], model, false);

      const selection = await selector.selectWithReason('Who is the manager?', directory, 'knowledge_y');

      expect(selection).toEqual({ speaker: 'people_x', strategy: 'round_robin' });
      expect(model.calls).toHaveLength(0);
    });
  });

  describe('routing model', () => {
    it('asks the model with agent descriptions and accepts a candidate name', async () => {
      const model = new FakeCompletionModel(['  Knowledge_Y \n']);
      const { directory, selector } = setup([info('alpha'), info('knowledge_y')], model);

      const selection = await selector.selectWithReason('Summarize the Q3 plan', directory);

      expect(selection).toEqual({ speaker: 'knowledge_y', strategy: 'model' });
      expect(model.calls).toEqual([
        {
          prompt: ROUTING_PROMPT,
          inputs: {
            agents: 'alpha: alpha instructions\nknowledge_y: knowledge_y instructions',
            message: 'Summarize the Q3 plan',
          },
        },
      ]);
    });

    it('falls back when the answer names nobody', async () => {
      const model = new FakeCompletionModel(['the finance team']);
      const { directory, selector } = setup([info('alpha'), info('beta', { priority: 2 })], model);

      expect(await selector.selectWithReason('Summarize', directory)).toEqual({
        speaker: 'beta',
        strategy: 'priority',
      });
    });

    it('falls back when the model fails', async () => {
      const model = new FakeCompletionModel([new Error('timeout')]);
      const { directory, selector } = setup([info('alpha'), info('beta')], model);

      expect(await selector.selectWithReason('Summarize', directory, 'alpha')).toEqual({
        speaker: 'beta',
        strategy: 'round_robin',
      });
    });

    it('is not consulted for a single candidate', async () => {
      const model = new FakeCompletionModel(['alpha']);
      const { directory, selector } = setup([info('alpha'), info('watcher', { role: 'observer' })], model);

      expect(await selector.select('Summarize', directory)).toBe('alpha');
      expect(model.calls).toHaveLength(0);
    });
  });

  describe('availability', () => {
    it('resets counters when every active participant is saturated', async () => {
      const { directory, selector } = setup([
        info('alpha', { maxConsecutiveTurns: 1 }),
        info('watcher', { role: 'observer' }),
      ]);
      directory.recordTurn('alpha');

      expect(await selector.select('Summarize', directory, 'alpha')).toBe('alpha');
      expect(directory.getConsecutiveTurns('alpha')).toBe(0);
    });

    it('never deadlocks when two participants take turns at limit 1', async () => {
      const { directory, selector } = setup([
        info('alpha', { maxConsecutiveTurns: 1 }),
        info('beta', { maxConsecutiveTurns: 1 }),
      ]);

      const speakers: string[] = [];
      let current: string | undefined;
      for (let i = 0; i < 4; i++) {
        current = await selector.select('Summarize', directory, current);
        directory.recordTurn(current);
        speakers.push(current);
      }

      expect(speakers).toEqual(['alpha', 'beta', 'alpha', 'beta']);
    });

    it('fails when there are no active participants', async () => {
      const { directory, selector } = setup([info('watcher', { role: 'observer' })]);

      await expect(selector.select('hi', directory)).rejects.toBeInstanceOf(NoActiveParticipantsError);
    });
  });
});

describe('matchRoutingAnswer', () => {
  const candidates = ['people_lookup', 'knowledge_finder'];

  it('prefers an exact match, ignoring case', () => {
    expect(matchRoutingAnswer('PEOPLE_LOOKUP', candidates)).toBe('people_lookup');
  });

  it('accepts an answer that contains a name', () => {
    expect(matchRoutingAnswer('I would pick knowledge_finder.', candidates)).toBe('knowledge_finder');
  });

  it('accepts a fragment of a name', () => {
    expect(matchRoutingAnswer('knowledge', candidates)).toBe('knowledge_finder');
  });

  it('rejects empty and unrelated answers', () => {
    expect(matchRoutingAnswer('   ', candidates)).toBeUndefined();
    expect(matchRoutingAnswer('finance', candidates)).toBeUndefined();
  });
});

describe('fallbackSelection', () => {
  const available = [info('a'), info('b', { priority: 3 }), info('c', { priority: 3 })];

  it('goes round-robin after the current speaker, wrapping around', () => {
    expect(fallbackSelection(available, 'a')).toEqual({ speaker: 'b', strategy: 'round_robin' });
    expect(fallbackSelection(available, 'c')).toEqual({ speaker: 'a', strategy: 'round_robin' });
  });

  it('picks the highest priority, earliest on ties', () => {
    expect(fallbackSelection(available)).toEqual({ speaker: 'b', strategy: 'priority' });
    expect(fallbackSelection(available, 'gone')).toEqual({ speaker: 'b', strategy: 'priority' });
  });
});
