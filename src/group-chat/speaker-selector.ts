/**
 * Speaker Selector
 *
 * Picks who speaks next. Candidates are the active participants that have
 * not hit their consecutive-turn limit; among them, in order:
 *
 * 1. keyword hints: a word starting with a trigger word ("team",
 *    "teams") routes to the first candidate whose name contains the hint
 *    domain
 * 2. the routing model, asked to name the best candidate
 * 3. round-robin after the previous speaker, else highest priority
 *
 * Steps 1 and 2 only run with `autoSelectSpeaker`.
 */

import type { AgentRegistry, CompletionModel, ParticipantInfo } from '../types.js';
import type { SpeakerHints } from '../config/schema.js';
import { NoActiveParticipantsError, toError } from '../errors/index.js';
import type { ParticipantDirectory } from './participant-directory.js';
import { createComponentLogger } from '../observability/logger.js';

const log = createComponentLogger('SpeakerSelector');

// =============================================================================
// CONFIGURATION
// =============================================================================

/**
 * Hint domain → trigger words. A domain matches participants whose name
 * contains it, e.g. `people_lookup` for `people`.
 */
export const DEFAULT_SPEAKER_HINTS: SpeakerHints = {
  people: ['who', 'person', 'people', 'team', 'member', 'employee', 'colleague'],
  knowledge: ['what', 'how', 'explain', 'documentation', 'knowledge', 'information', 'guide', 'tutorial'],
};

export const ROUTING_PROMPT = `Select the most appropriate agent to respond to the message.

Available agents:
{agents}

User message: {message}

Respond with ONLY the agent name.`;

const DESCRIPTION_LIMIT = 200;

export type SelectionStrategy = 'keyword' | 'model' | 'round_robin' | 'priority';

export interface SpeakerSelection {
  speaker: string;
  strategy: SelectionStrategy;
}

export interface SpeakerSelectorOptions {
  chatName: string;
  registry: AgentRegistry;
  autoSelectSpeaker?: boolean;
  hints?: SpeakerHints;
  routingModel?: CompletionModel;
}

// =============================================================================
// SELECTOR
// =============================================================================

export class SpeakerSelector {
  private chatName: string;
  private registry: AgentRegistry;
  private autoSelectSpeaker: boolean;
  private hintMatchers: Array<{ domain: string; pattern: RegExp }>;
  private routingModel?: CompletionModel;

  constructor(options: SpeakerSelectorOptions) {
    this.chatName = options.chatName;
    this.registry = options.registry;
    this.autoSelectSpeaker = options.autoSelectSpeaker ?? true;
    this.hintMatchers = compileHints(options.hints ?? DEFAULT_SPEAKER_HINTS);
    this.routingModel = options.routingModel;
  }

  setRoutingModel(model: CompletionModel | undefined): void {
    this.routingModel = model;
  }

  async select(message: string, directory: ParticipantDirectory, currentSpeaker?: string): Promise<string> {
    const selection = await this.selectWithReason(message, directory, currentSpeaker);
    return selection.speaker;
  }

  async selectWithReason(
    message: string,
    directory: ParticipantDirectory,
    currentSpeaker?: string
  ): Promise<SpeakerSelection> {
    const available = this.availableParticipants(directory);

    if (this.autoSelectSpeaker) {
      const hinted = this.matchHints(message, available);
      if (hinted) {
        log.debug('Selected speaker by keyword hint', { chat: this.chatName, speaker: hinted });
        return { speaker: hinted, strategy: 'keyword' };
      }

      if (this.routingModel && available.length > 1) {
        const routed = await this.askRoutingModel(this.routingModel, message, available);
        if (routed) {
          log.debug('Routing model selected speaker', { chat: this.chatName, speaker: routed });
          return { speaker: routed, strategy: 'model' };
        }
      }
    }

    return fallbackSelection(available, currentSpeaker);
  }

  /**
   * Active participants under their consecutive-turn limit. When nobody
   * qualifies, every active counter is reset and all of them are eligible.
   */
  availableParticipants(directory: ParticipantDirectory): ParticipantInfo[] {
    const active = directory.active();
    if (active.length === 0) {
      throw new NoActiveParticipantsError(this.chatName);
    }

    const available = active.filter(
      (p) => directory.getConsecutiveTurns(p.agentName) < p.maxConsecutiveTurns
    );
    if (available.length > 0) {
      return available;
    }

    directory.resetCounters(active.map((p) => p.agentName));
    return active;
  }

  private matchHints(message: string, available: ParticipantInfo[]): string | undefined {
    for (const { domain, pattern } of this.hintMatchers) {
      if (!pattern.test(message)) continue;
      const match = available.find((p) => p.agentName.toLowerCase().includes(domain));
      if (match) return match.agentName;
    }
    return undefined;
  }

  private async askRoutingModel(
    model: CompletionModel,
    message: string,
    available: ParticipantInfo[]
  ): Promise<string | undefined> {
    const agents = available
      .map((p) => {
        const instructions = this.registry.getAgent(p.agentName)?.instructions ?? '';
        return `${p.agentName}: ${instructions.slice(0, DESCRIPTION_LIMIT)}`;
      })
      .join('\n');

    let answer: string;
    try {
      answer = (await model.complete(ROUTING_PROMPT, { agents, message })).trim();
    } catch (err) {
      log.warn('Routing model failed; falling back', {
        chat: this.chatName,
        error: toError(err).message,
      });
      return undefined;
    }

    return matchRoutingAnswer(answer, available.map((p) => p.agentName));
  }
}

// =============================================================================
// HELPERS
// =============================================================================

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function compileHints(hints: SpeakerHints): Array<{ domain: string; pattern: RegExp }> {
  return Object.entries(hints)
    .filter(([, words]) => words.length > 0)
    .map(([domain, words]) => ({
      domain: domain.toLowerCase(),
      pattern: new RegExp(`\\b(?:${words.map(escapeRegExp).join('|')})`, 'i'),
    }));
}

/**
 * Map a routing model's answer onto a candidate name: exact match first
 * (ignoring case), then a name the answer contains, then a name that
 * contains the answer.
 */
export function matchRoutingAnswer(answer: string, candidates: string[]): string | undefined {
  const normalized = answer.trim().toLowerCase();
  if (normalized === '') return undefined;

  return (
    candidates.find((name) => name.toLowerCase() === normalized) ??
    candidates.find((name) => normalized.includes(name.toLowerCase())) ??
    candidates.find((name) => name.toLowerCase().includes(normalized))
  );
}

/**
 * Next after the previous speaker when it is still a candidate, otherwise
 * the highest priority (earliest enrolled on ties).
 */
export function fallbackSelection(available: ParticipantInfo[], currentSpeaker?: string): SpeakerSelection {
  const index = available.findIndex((p) => p.agentName === currentSpeaker);
  if (index >= 0) {
    return { speaker: available[(index + 1) % available.length].agentName, strategy: 'round_robin' };
  }

  let best = available[0];
  for (const candidate of available) {
    if (candidate.priority > best.priority) {
      best = candidate;
    }
  }
  return { speaker: best.agentName, strategy: 'priority' };
}
