/**
 * Conversation Summarizer
 *
 * Rolls a conversation history up into a summary. A bounded transcript is
 * sent to the summary model, or the routing model when there is none; any
 * failure falls back to the heuristic summary, which needs no model.
 */

import type { CompletionModel, Message } from '../types.js';
import { SummarizationError, ValidationError, toError } from '../errors/index.js';
import { SummarizerOptionsSchema, type SummarizerOptions, type SummarizerOptionsInput } from '../config/schema.js';
import { createComponentLogger } from '../observability/logger.js';

const log = createComponentLogger('Summarizer');

export const EMPTY_SUMMARY = 'No conversation yet.';

/** Per-line cap, so one huge message cannot crowd out the rest */
const LINE_LIMIT = 1000;
const EXCERPT_LIMIT = 1500;

export const SUMMARY_PROMPT = `You are an expert analyst summarizing a multi-agent discussion. Produce a structured summary with the following sections in Markdown:

**Objective**: one concise sentence.
**Key Points**: bullet list of pivotal facts/findings.
**Agent Contributions**: bullet list per agent <AgentName>: their unique inputs (skip redundancy).
**Risks / Gaps**: bullet list (or 'None').
**Next Steps**: actionable bullets.
Keep total length proportionate to transcript; do not hallucinate.

Transcript (recent tail):
{transcript}

Generate the structured summary now.`;

export interface SummaryContext {
  /** Every enrolled participant, observers included */
  participants: string[];
  turnCount: number;
  summaryModel?: CompletionModel;
  routingModel?: CompletionModel;
}

export type SummarySource = 'empty' | 'summary' | 'routing' | 'heuristic' | 'fallback';

export interface SummaryResult {
  text: string;
  source: SummarySource;
}

export function resolveSummarizerOptions(options: SummarizerOptionsInput = {}): SummarizerOptions {
  const parsed = SummarizerOptionsSchema.safeParse(options);
  if (!parsed.success) {
    throw ValidationError.fromZodError(parsed.error);
  }
  return parsed.data;
}

// =============================================================================
// TRANSCRIPT
// =============================================================================

function speakerLabel(message: Message): string {
  if (message.agentName) return message.agentName;
  const sender = message.metadata.sender;
  if (typeof sender === 'string' && sender !== '') return sender;
  return message.role;
}

/**
 * `"{speaker}: {content}"` per message, newest `maxMessages` only. Stops at
 * the first line that would push the total past `charBudget`.
 */
export function buildTranscript(history: readonly Message[], maxMessages: number, charBudget: number): string {
  const lines: string[] = [];
  let total = 0;

  for (const message of history.slice(-maxMessages)) {
    let content = message.content.trim().replace(/\r?\n/g, ' ');
    if (content.length > LINE_LIMIT) {
      content = `${content.slice(0, LINE_LIMIT - 3)}...`;
    }

    const line = `${speakerLabel(message)}: ${content}`;
    if (total + line.length > charBudget) break;

    lines.push(line);
    total += line.length + 1;
  }

  return lines.join('\n');
}

export function heuristicSummary(
  transcript: string,
  context: Pick<SummaryContext, 'participants' | 'turnCount'>,
  header: 'heuristic' | 'fallback' = 'heuristic'
): string {
  return [
    `Conversation Summary (${header})`,
    `Participants: ${context.participants.join(', ')}`,
    `Turns: ${context.turnCount}`,
    `Recent Excerpt (truncated):`,
    transcript.slice(0, EXCERPT_LIMIT),
  ].join('\n');
}

// =============================================================================
// SUMMARIZE
// =============================================================================

export async function summarizeConversation(
  history: readonly Message[],
  options: SummarizerOptionsInput,
  context: SummaryContext
): Promise<SummaryResult> {
  if (history.length === 0) {
    return { text: EMPTY_SUMMARY, source: 'empty' };
  }

  const { maxMessages, charBudget } = resolveSummarizerOptions(options);
  const transcript = buildTranscript(history, maxMessages, charBudget);

  const tier = context.summaryModel ? 'summary' : 'routing';
  const model = context.summaryModel ?? context.routingModel;
  if (!model) {
    return { text: heuristicSummary(transcript, context), source: 'heuristic' };
  }

  try {
    const text = (await model.complete(SUMMARY_PROMPT, { transcript })).trim();
    if (text === '') {
      throw new Error(`${tier} model returned an empty summary`);
    }
    return { text, source: tier };
  } catch (err) {
    const error = new SummarizationError(tier, toError(err));
    log.warn('Summary generation failed, falling back', { error: error.toLogString() });
    return { text: heuristicSummary(transcript, context, 'fallback'), source: 'fallback' };
  }
}
