/**
 * Group Chat
 *
 * One multi-agent conversation session. `send()` runs a turn loop: each
 * turn the selector picks a speaker, the registry resolves it, the agent
 * answers the previous reply, and the loop stops on the turn budget, the
 * termination keyword, an agent failure, `stop()` or an abort signal.
 * `broadcast()` asks every active participant at once instead.
 *
 * @example
 * ```typescript
 * const chat = new GroupChat({
 *   config: { name: 'planning', maxTurns: 4, terminationKeyword: 'DONE' },
 *   registry,
 * });
 * chat.addParticipant('people_lookup', { priority: 2 });
 * chat.addParticipant('knowledge_finder');
 *
 * const responses = await chat.send('Who owns the onboarding guide?');
 * console.log(await chat.summarize());
 * ```
 */

import { setTimeout as delay } from 'node:timers/promises';
import type {
  AgentRegistry,
  AgentResponse,
  ChatConfig,
  CompletionModel,
  ConversationStats,
  Message,
  MissingAgentPolicy,
  ParticipantInfo,
  ParticipantRole,
} from '../types.js';
import { createMessage, createResponse, isErrorResponse, withResponseMetadata } from '../types.js';
import {
  AgentInvocationError,
  AgentNotFoundError,
  CancellationError,
  InitializationError,
  NoActiveParticipantsError,
  NoParticipantsError,
  SessionBusyError,
  SessionClosedError,
  TurnBudgetExhaustedError,
  ValidationError,
  toError,
} from '../errors/index.js';
import {
  ChatConfigSchema,
  ParticipantOptionsSchema,
  type ChatConfigInput,
  type ModelSettingsInput,
  type ParticipantOptionsInput,
  type SpeakerHints,
  type SummarizerOptionsInput,
} from '../config/schema.js';
import {
  createCompletionModel,
  ROUTING_GENERATION,
  SUMMARY_GENERATION,
  type CompletionModelOptions,
} from '../providers/completion-model.js';
import { ParticipantDirectory } from './participant-directory.js';
import { SpeakerSelector, type SelectionStrategy } from './speaker-selector.js';
import { summarizeConversation } from './summarizer.js';
import {
  ConversationStateMachine,
  type ConversationState,
  type TransitionReason,
} from './conversation-state.js';
import { createComponentLogger } from '../observability/logger.js';

const log = createComponentLogger('GroupChat');

// =============================================================================
// TYPES
// =============================================================================

/** A ready model, or settings to build one from on first use */
export type ModelSource = CompletionModel | ModelSettingsInput;

export type ModelFactory = (
  settings: ModelSettingsInput,
  defaults: CompletionModelOptions
) => Promise<CompletionModel>;

export interface GroupChatOptions {
  config: ChatConfigInput;
  registry: AgentRegistry;
  routingModel?: ModelSource;
  summaryModel?: ModelSource;
  speakerHints?: SpeakerHints;
  /** Default: 'skip' */
  missingAgentPolicy?: MissingAgentPolicy;
  summarizer?: SummarizerOptionsInput;
  /** Stamped on every response */
  sessionId?: string;
  /** Builds models from settings; defaults to the provider factory */
  modelFactory?: ModelFactory;
}

export interface SendOptions {
  /** Checked between turns and during the pause after each reply */
  signal?: AbortSignal;
}

export type GroupChatEvent =
  | { type: 'state.changed'; from: ConversationState; to: ConversationState; reason: TransitionReason }
  | { type: 'message.appended'; message: Message }
  | { type: 'speaker.selected'; speaker: string; strategy: SelectionStrategy; turn: number }
  | { type: 'agent.responded'; response: AgentResponse; turn: number }
  | { type: 'agent.missing'; agentName: string; turn: number }
  | { type: 'agent.failed'; agentName: string; error: string; turn: number }
  | { type: 'conversation.reset' }
  | { type: 'conversation.closed' };

export type GroupChatEventListener = (event: GroupChatEvent) => void;

function isCompletionModel(source: ModelSource): source is CompletionModel {
  return 'complete' in source && typeof source.complete === 'function';
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}

// =============================================================================
// GROUP CHAT
// =============================================================================

export class GroupChat {
  readonly config: ChatConfig;
  readonly sessionId?: string;

  private registry: AgentRegistry;
  private directory = new ParticipantDirectory();
  private selector: SpeakerSelector;
  private machine = new ConversationStateMachine();
  private history: Message[] = [];
  private listeners: GroupChatEventListener[] = [];

  private turns = 0;
  private speaker?: string;

  private missingAgentPolicy: MissingAgentPolicy;
  private summarizerOptions: SummarizerOptionsInput;
  private modelFactory: ModelFactory;
  private routingSource?: ModelSource;
  private summarySource?: ModelSource;
  private routingModel?: CompletionModel;
  private summaryModel?: CompletionModel;

  private initialized = false;
  private initializing?: Promise<void>;
  private initError?: InitializationError;

  private inFlight = false;
  private stopRequested = false;
  private pauseController?: AbortController;

  constructor(options: GroupChatOptions) {
    const parsed = ChatConfigSchema.safeParse(options.config);
    if (!parsed.success) {
      throw ValidationError.fromZodError(parsed.error);
    }
    this.config = Object.freeze(parsed.data);
    this.sessionId = options.sessionId;
    this.registry = options.registry;
    this.missingAgentPolicy = options.missingAgentPolicy ?? 'skip';
    this.summarizerOptions = options.summarizer ?? {};
    this.modelFactory = options.modelFactory ?? createCompletionModel;
    this.routingSource = options.routingModel;
    this.summarySource = options.summaryModel;

    this.selector = new SpeakerSelector({
      chatName: this.config.name,
      registry: this.registry,
      autoSelectSpeaker: this.config.autoSelectSpeaker,
      hints: options.speakerHints,
    });

    this.machine.onTransition((t) => {
      this.emit({ type: 'state.changed', from: t.from, to: t.to, reason: t.reason });
    });
  }

  // ---------------------------------------------------------------------------
  // Accessors
  // ---------------------------------------------------------------------------

  get name(): string {
    return this.config.name;
  }

  get turnCount(): number {
    return this.turns;
  }

  get currentSpeaker(): string | undefined {
    return this.speaker;
  }

  get conversationActive(): boolean {
    return this.machine.isActive;
  }

  get isInitialized(): boolean {
    return this.initialized;
  }

  getState(): ConversationState {
    return this.machine.state;
  }

  /** Reason for the latest state change, e.g. why the last send ended */
  getLastTransitionReason(): TransitionReason | undefined {
    return this.machine.lastReason;
  }

  getHistory(): readonly Message[] {
    return [...this.history];
  }

  getParticipants(): ParticipantInfo[] {
    return this.directory.list();
  }

  getConsecutiveTurns(agentName: string): number {
    return this.directory.getConsecutiveTurns(agentName);
  }

  getConversationSummary(): ConversationStats {
    return {
      name: this.config.name,
      totalTurns: this.turns,
      participants: this.directory.names(),
      activeParticipants: this.directory.active().map((p) => p.agentName),
      conversationActive: this.conversationActive,
      messageCount: this.history.length,
    };
  }

  // ---------------------------------------------------------------------------
  // Initialization
  // ---------------------------------------------------------------------------

  /**
   * Build the routing and summary models. A failure is kept and rethrown by
   * every later call; the session is unusable until recreated.
   */
  async initialize(): Promise<void> {
    this.assertOpen();
    if (this.initError) throw this.initError;
    if (this.initialized) return;

    this.initializing ??= this.buildModels();
    try {
      await this.initializing;
    } finally {
      this.initializing = undefined;
    }
  }

  private async buildModels(): Promise<void> {
    try {
      this.routingModel = await this.resolveModel(this.routingSource, ROUTING_GENERATION);
      this.summaryModel = await this.resolveModel(this.summarySource, SUMMARY_GENERATION);
    } catch (err) {
      const cause = toError(err);
      this.initError = new InitializationError(
        `Failed to initialize group chat "${this.config.name}": ${cause.message}`,
        this.config.name,
        cause
      );
      log.error('Initialization failed', { chat: this.config.name, error: cause.message });
      throw this.initError;
    }

    this.selector.setRoutingModel(this.routingModel);
    this.initialized = true;
    log.debug('Initialized', {
      chat: this.config.name,
      routingModel: this.routingModel !== undefined,
      summaryModel: this.summaryModel !== undefined,
    });
  }

  private async resolveModel(
    source: ModelSource | undefined,
    defaults: CompletionModelOptions
  ): Promise<CompletionModel | undefined> {
    if (!source) return undefined;
    if (isCompletionModel(source)) return source;
    return this.modelFactory(source, defaults);
  }

  // ---------------------------------------------------------------------------
  // Participants
  // ---------------------------------------------------------------------------

  /**
   * Enrol a registered agent. Re-adding a participant updates its options.
   */
  addParticipant(agentName: string, options: ParticipantOptionsInput = {}): ParticipantInfo {
    this.assertOpen();

    const parsed = ParticipantOptionsSchema.safeParse(options);
    if (!parsed.success) {
      throw ValidationError.fromZodError(parsed.error);
    }
    if (!this.registry.getAgent(agentName)) {
      throw new AgentNotFoundError(agentName, { chat: this.config.name });
    }

    const info: ParticipantInfo = { agentName, ...parsed.data };
    const replaced = this.directory.add(info);
    log.info(replaced ? 'Updated participant' : 'Added participant', {
      chat: this.config.name,
      agent: agentName,
      role: info.role,
    });
    return info;
  }

  removeParticipant(agentName: string): boolean {
    this.assertOpen();
    const removed = this.directory.remove(agentName);
    if (removed) {
      log.info('Removed participant', { chat: this.config.name, agent: agentName });
    }
    return removed;
  }

  // ---------------------------------------------------------------------------
  // Conversation
  // ---------------------------------------------------------------------------

  /**
   * Post a message and run turns until the conversation terminates.
   * @returns the agent responses in turn order
   */
  async send(
    message: string,
    sender = 'User',
    metadata: Record<string, unknown> = {},
    options: SendOptions = {}
  ): Promise<AgentResponse[]> {
    return this.exclusive(async () => {
      await this.checkPreconditions(options.signal);

      this.appendMessage(
        createMessage({ role: 'user', content: message, metadata: { ...metadata, sender } })
      );
      this.machine.transition('active', 'send');

      try {
        return await this.runTurns(message, metadata, options.signal);
      } catch (err) {
        if (err instanceof CancellationError) {
          this.leaveActive('terminated', 'cancelled');
        } else {
          this.leaveActive('idle', 'error');
        }
        throw err;
      }
    });
  }

  /**
   * Ask every active participant the same message concurrently. Counts as
   * one turn; replies come back in enrolment order.
   */
  async broadcast(
    message: string,
    sender = 'User',
    metadata: Record<string, unknown> = {},
    options: SendOptions = {}
  ): Promise<AgentResponse[]> {
    return this.exclusive(async () => {
      await this.checkPreconditions(options.signal);

      const active = this.directory.active();

      this.appendMessage(
        createMessage({ role: 'user', content: message, metadata: { ...metadata, sender, mode: 'broadcast' } })
      );
      this.machine.transition('active', 'broadcast');
      this.turns += 1;
      const turn = this.turns;
      const snapshot = this.getHistory();

      const outcomes = await Promise.all(
        active.map(async (participant) => {
          const agent = this.registry.getAgent(participant.agentName);
          if (!agent) {
            this.reportMissing(participant.agentName, turn);
            return undefined;
          }
          try {
            const response = await agent.processMessage(message, snapshot, {
              ...metadata,
              groupChat: this.config.name,
              turn,
              mode: 'broadcast',
            });
            return { participant, response };
          } catch (err) {
            const failure = new AgentInvocationError(participant.agentName, toError(err), {
              chat: this.config.name,
              turn,
            });
            this.reportFailure(failure, turn);
            return { participant, response: this.errorResponse(participant.agentName, failure.message) };
          }
        })
      );

      if (this.machine.isClosed) {
        return [];
      }

      const responses: AgentResponse[] = [];
      for (const outcome of outcomes) {
        if (!outcome) continue;
        const { participant, response } = outcome;
        responses.push(
          this.recordReply(
            participant.agentName,
            participant.role,
            response,
            turn,
            { mode: 'broadcast' },
            active.length
          )
        );
      }

      if (this.turns >= this.config.maxTurns) {
        this.leaveActive('terminated', 'max_turns');
      } else {
        this.leaveActive('idle', 'broadcast_complete');
      }

      const missing = active.filter((p) => !outcomes.some((o) => o?.participant === p));
      if (responses.length === 0 && missing.length > 0) {
        throw new AgentNotFoundError(missing[0].agentName, {
          chat: this.config.name,
          skipped: missing.map((p) => p.agentName),
        });
      }
      return responses;
    });
  }

  /**
   * Ask a running `send()` to end after the current turn.
   * @returns whether a call was in flight
   */
  stop(): boolean {
    if (!this.inFlight) return false;
    this.stopRequested = true;
    this.pauseController?.abort();
    return true;
  }

  /**
   * Clear history, counters, turn count and current speaker. Participants
   * and initialized models are kept.
   */
  reset(): void {
    this.assertOpen();
    if (this.inFlight) {
      throw new SessionBusyError(this.config.name);
    }

    this.history = [];
    this.turns = 0;
    this.speaker = undefined;
    this.directory.resetCounters();
    this.machine.reset();
    this.emit({ type: 'conversation.reset' });
    log.info('Conversation reset', { chat: this.config.name });
  }

  /**
   * Summarize the conversation. Never throws for model problems: failures
   * fall back to the heuristic summary.
   */
  async summarize(options: SummarizerOptionsInput = {}): Promise<string> {
    this.assertOpen();

    if (this.history.length > 0 && !this.initialized) {
      try {
        await this.initialize();
      } catch (err) {
        log.warn('Summarizing without models', { chat: this.config.name, error: toError(err).message });
      }
    }

    const result = await summarizeConversation(
      this.history,
      { ...this.summarizerOptions, ...options },
      {
        participants: this.directory.names(),
        turnCount: this.turns,
        summaryModel: this.summaryModel,
        routingModel: this.routingModel,
      }
    );
    return result.text;
  }

  /**
   * Release everything. The chat cannot be used afterwards.
   */
  cleanup(): void {
    if (this.machine.isClosed) return;

    this.stop();
    this.history = [];
    this.directory.clear();
    this.speaker = undefined;
    this.routingModel = undefined;
    this.summaryModel = undefined;
    this.selector.setRoutingModel(undefined);
    this.machine.transition('closed', 'cleanup');
    this.emit({ type: 'conversation.closed' });
    this.listeners = [];
    log.info('Cleaned up', { chat: this.config.name });
  }

  /**
   * Subscribe to events.
   */
  on(listener: GroupChatEventListener): () => void {
    this.listeners.push(listener);
    return () => {
      const idx = this.listeners.indexOf(listener);
      if (idx >= 0) this.listeners.splice(idx, 1);
    };
  }

  // ---------------------------------------------------------------------------
  // Turn loop
  // ---------------------------------------------------------------------------

  private async runTurns(
    message: string,
    metadata: Record<string, unknown>,
    signal?: AbortSignal
  ): Promise<AgentResponse[]> {
    const { maxTurns, terminationKeyword, enableTerminationKeyword } = this.config;
    const keyword = terminationKeyword.toLowerCase();
    const responses: AgentResponse[] = [];
    const skipped: string[] = [];
    let current = message;
    let reason: TransitionReason = 'max_turns';

    while (this.turns < maxTurns && this.machine.isActive) {
      if (signal?.aborted) {
        throw new CancellationError('Send cancelled', responses);
      }
      if (this.stopRequested) {
        reason = 'stopped';
        break;
      }

      const selection = await this.selector.selectWithReason(current, this.directory, this.speaker);
      if (!this.machine.isActive) break;

      this.turns += 1;
      const turn = this.turns;
      this.directory.recordTurn(selection.speaker);
      this.speaker = selection.speaker;
      this.emit({ type: 'speaker.selected', speaker: selection.speaker, strategy: selection.strategy, turn });

      const participant = this.directory.get(selection.speaker);
      const agent = this.registry.getAgent(selection.speaker);
      if (!agent || !participant) {
        this.reportMissing(selection.speaker, turn);
        if (this.missingAgentPolicy === 'abort') {
          const error = new AgentNotFoundError(selection.speaker, { chat: this.config.name, turn });
          responses.push(this.recordFailure(selection.speaker, error.message, turn));
          reason = 'agent_missing';
          break;
        }
        skipped.push(selection.speaker);
        continue;
      }

      let response: AgentResponse;
      try {
        response = await agent.processMessage(current, this.getHistory(), {
          ...metadata,
          groupChat: this.config.name,
          turn,
        });
      } catch (err) {
        const failure = new AgentInvocationError(selection.speaker, toError(err), {
          chat: this.config.name,
          turn,
        });
        this.reportFailure(failure, turn);
        responses.push(this.recordFailure(selection.speaker, failure.message, turn));
        reason = 'agent_error';
        break;
      }
      if (!this.machine.isActive) break;

      responses.push(this.recordReply(participant.agentName, participant.role, response, turn));

      if (isErrorResponse(response)) {
        log.error('Agent returned an error response', {
          chat: this.config.name,
          agent: selection.speaker,
          turn,
        });
        reason = 'agent_error';
        break;
      }
      if (this.turns >= maxTurns) {
        reason = 'max_turns';
        break;
      }
      if (enableTerminationKeyword && keyword !== '' && response.content.toLowerCase().includes(keyword)) {
        reason = 'keyword';
        break;
      }

      current = response.content;
      await this.pause(signal);
    }

    if (this.machine.isClosed) {
      return responses;
    }
    this.leaveActive('terminated', reason);
    log.info('Conversation terminated', { chat: this.config.name, reason, turns: this.turns });

    if (responses.length === 0 && skipped.length > 0) {
      throw new AgentNotFoundError(skipped[0], { chat: this.config.name, skipped });
    }
    return responses;
  }

  /**
   * Wait `responseWaitTime` ms. Ends early on abort or `stop()`; the loop
   * checks both before the next turn.
   */
  private async pause(signal?: AbortSignal): Promise<void> {
    if (this.config.responseWaitTime <= 0) return;

    const controller = new AbortController();
    const forward = () => controller.abort();
    signal?.addEventListener('abort', forward, { once: true });
    this.pauseController = controller;
    if (signal?.aborted || this.stopRequested) controller.abort();

    try {
      await delay(this.config.responseWaitTime, undefined, { signal: controller.signal });
    } catch (err) {
      if (!isAbortError(err)) throw err;
    } finally {
      signal?.removeEventListener('abort', forward);
      this.pauseController = undefined;
    }
  }

  // ---------------------------------------------------------------------------
  // Helpers
  // ---------------------------------------------------------------------------

  private async exclusive<T>(fn: () => Promise<T>): Promise<T> {
    this.assertOpen();
    if (this.inFlight) {
      throw new SessionBusyError(this.config.name);
    }
    this.inFlight = true;
    this.stopRequested = false;
    try {
      return await fn();
    } finally {
      this.inFlight = false;
      this.stopRequested = false;
    }
  }

  private async checkPreconditions(signal?: AbortSignal): Promise<void> {
    await this.initialize();
    if (this.directory.size === 0) {
      throw new NoParticipantsError(this.config.name);
    }
    if (this.directory.active().length === 0) {
      throw new NoActiveParticipantsError(this.config.name);
    }
    if (this.turns >= this.config.maxTurns) {
      throw new TurnBudgetExhaustedError(this.config.name, this.config.maxTurns);
    }
    if (signal?.aborted) {
      throw new CancellationError('Send cancelled before start');
    }
  }

  private assertOpen(): void {
    if (this.machine.isClosed) {
      throw new SessionClosedError(this.config.name);
    }
  }

  private leaveActive(to: 'idle' | 'terminated', reason: TransitionReason): void {
    if (this.machine.isActive) {
      this.machine.transition(to, reason);
    }
  }

  private appendMessage(message: Message): void {
    this.history.push(message);
    this.emit({ type: 'message.appended', message });
  }

  /**
   * Append the reply to history and return it with turn metadata. A
   * broadcast counts only the participants it asked.
   */
  private recordReply(
    agentName: string,
    role: ParticipantRole,
    response: AgentResponse,
    turn: number,
    extra: Record<string, unknown> = {},
    totalParticipants: number = this.directory.size
  ): AgentResponse {
    const failed = isErrorResponse(response);
    this.appendMessage(
      createMessage({
        role: 'assistant',
        content: response.content,
        agentName,
        metadata: { agent: agentName, turn, ...extra, ...(failed && { error: true }) },
      })
    );

    const enriched = withResponseMetadata(
      response,
      {
        turn,
        groupChat: this.config.name,
        speakerRole: role,
        totalParticipants,
      },
      this.sessionId
    );
    this.emit({ type: 'agent.responded', response: enriched, turn });
    return enriched;
  }

  /**
   * Error response for a speaker that could not answer, mirrored into history.
   */
  private recordFailure(agentName: string, errorMessage: string, turn: number): AgentResponse {
    const role = this.directory.get(agentName)?.role ?? 'participant';
    return this.recordReply(agentName, role, this.errorResponse(agentName, errorMessage), turn);
  }

  private errorResponse(agentName: string, errorMessage: string): AgentResponse {
    return createResponse({
      content: errorMessage,
      agentName,
      metadata: { error: true, errorMessage },
      ...(this.sessionId !== undefined && { sessionId: this.sessionId }),
    });
  }

  private reportMissing(agentName: string, turn: number): void {
    const error = new AgentNotFoundError(agentName, { chat: this.config.name, turn });
    log.warn('Agent not found; skipping turn', { error: error.toLogString() });
    this.emit({ type: 'agent.missing', agentName, turn });
  }

  private reportFailure(failure: AgentInvocationError, turn: number): void {
    log.error('Agent failed', { error: failure.toLogString() });
    this.emit({ type: 'agent.failed', agentName: failure.agentName, error: failure.message, turn });
  }

  private emit(event: GroupChatEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (err) {
        log.warn('Group chat listener failed', { event: event.type, error: toError(err).message });
      }
    }
  }
}

export function createGroupChat(options: GroupChatOptions): GroupChat {
  return new GroupChat(options);
}
