/**
 * Shared Types
 *
 * Message and response records, the collaborator capabilities the group chat
 * consumes (Agent, AgentRegistry, CompletionModel), and chat/participant
 * configuration.
 */

import { randomUUID } from 'node:crypto';

// =============================================================================
// MESSAGES
// =============================================================================

export type MessageRole = 'user' | 'assistant' | 'system';

/**
 * One entry in a conversation history. Frozen once created.
 */
export interface Message {
  readonly id: string;
  readonly role: MessageRole;
  readonly content: string;
  /** Name of the agent that produced this message (assistant turns) */
  readonly agentName?: string;
  readonly metadata: Readonly<Record<string, unknown>>;
  readonly timestamp: Date;
}

/**
 * Token usage reported by an agent, if its backend provides it.
 */
export interface ResponseUsage {
  inputTokens?: number;
  outputTokens?: number;
  [key: string]: unknown;
}

/**
 * The result of one agent invocation.
 */
export interface AgentResponse {
  readonly content: string;
  readonly agentName: string;
  readonly usage?: Readonly<ResponseUsage>;
  readonly metadata: Readonly<Record<string, unknown>>;
  readonly sessionId?: string;
  readonly messageId: string;
}

export function createMessage(init: {
  /** Kept when restoring a stored message */
  id?: string;
  role: MessageRole;
  content: string;
  agentName?: string;
  metadata?: Record<string, unknown>;
  timestamp?: Date;
}): Message {
  return Object.freeze({
    id: init.id ?? randomUUID(),
    role: init.role,
    content: init.content,
    ...(init.agentName !== undefined && { agentName: init.agentName }),
    metadata: Object.freeze({ ...init.metadata }),
    timestamp: init.timestamp ?? new Date(),
  });
}

export function createResponse(init: {
  content: string;
  agentName: string;
  usage?: ResponseUsage;
  metadata?: Record<string, unknown>;
  sessionId?: string;
}): AgentResponse {
  return Object.freeze({
    content: init.content,
    agentName: init.agentName,
    ...(init.usage && { usage: Object.freeze({ ...init.usage }) }),
    metadata: Object.freeze({ ...init.metadata }),
    ...(init.sessionId !== undefined && { sessionId: init.sessionId }),
    messageId: randomUUID(),
  });
}

/**
 * Copy a response with extra metadata merged over its own.
 */
export function withResponseMetadata(
  response: AgentResponse,
  metadata: Record<string, unknown>,
  sessionId?: string
): AgentResponse {
  return Object.freeze({
    ...response,
    metadata: Object.freeze({ ...response.metadata, ...metadata }),
    ...(sessionId !== undefined && response.sessionId === undefined && { sessionId }),
  });
}

/** Whether a response was synthesized from a failure. */
export function isErrorResponse(response: AgentResponse): boolean {
  return response.metadata.error === true;
}

// =============================================================================
// COLLABORATOR CAPABILITIES
// =============================================================================

/**
 * Anything that turns a message plus history into a reply.
 *
 * Implementations should report ordinary generation failures as
 * error-flagged responses; the group chat also tolerates a thrown error.
 */
export interface Agent {
  readonly name: string;
  /** Used to describe the agent to the routing model */
  readonly instructions?: string;
  readonly isAvailable: boolean;
  processMessage(
    message: string,
    history: readonly Message[],
    metadata: Record<string, unknown>
  ): Promise<AgentResponse>;
}

/**
 * Name → agent lookup. Must tolerate use from several sessions at once.
 */
export interface AgentRegistry {
  getAgent(name: string): Agent | undefined;
  getAvailableAgents(): string[];
}

/**
 * A text-in, text-out model used for speaker routing and summaries.
 * `{key}` placeholders in the prompt are filled from `inputs`.
 */
export interface CompletionModel {
  complete(prompt: string, inputs?: Record<string, string>): Promise<string>;
}

// =============================================================================
// GROUP CHAT CONFIGURATION
// =============================================================================

export type ParticipantRole = 'facilitator' | 'participant' | 'observer';

export interface ParticipantInfo {
  readonly agentName: string;
  readonly role: ParticipantRole;
  /** Higher is preferred */
  readonly priority: number;
  readonly maxConsecutiveTurns: number;
}

export interface ChatConfig {
  readonly name: string;
  readonly description: string;
  readonly maxTurns: number;
  readonly terminationKeyword: string;
  readonly enableTerminationKeyword: boolean;
  /** Pause between sequential turns, in milliseconds */
  readonly responseWaitTime: number;
  readonly autoSelectSpeaker: boolean;
}

/**
 * What happens when a selected speaker no longer resolves in the registry.
 * - skip: log and move on to the next turn
 * - abort: record an error response and stop the call
 */
export type MissingAgentPolicy = 'skip' | 'abort';

/**
 * Stats returned by `GroupChat.getConversationSummary()`.
 */
export interface ConversationStats {
  name: string;
  totalTurns: number;
  participants: string[];
  activeParticipants: string[];
  conversationActive: boolean;
  messageCount: number;
}
