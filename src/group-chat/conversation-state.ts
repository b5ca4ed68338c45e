/**
 * Conversation State Machine
 *
 *   idle ──send/broadcast──▶ active ──max_turns/keyword/stopped/…──▶ terminated
 *    ▲                         │                                        │
 *    └── broadcast_complete ───┘◀──────────── send / broadcast ─────────┘
 *
 * `reset` returns any open state to idle; `cleanup` closes the conversation
 * for good.
 */

import { GroupChatError, ErrorCategory } from '../errors/index.js';

export type ConversationState = 'idle' | 'active' | 'terminated' | 'closed';

export type TransitionReason =
  | 'send'
  | 'broadcast'
  | 'broadcast_complete'
  | 'max_turns'
  | 'keyword'
  | 'stopped'
  | 'agent_error'
  | 'agent_missing'
  | 'cancelled'
  | 'error'
  | 'reset'
  | 'cleanup';

export interface StateTransition {
  from: ConversationState;
  to: ConversationState;
  reason: TransitionReason;
  at: Date;
}

const TRANSITIONS: Record<ConversationState, readonly ConversationState[]> = {
  idle: ['active', 'closed'],
  active: ['idle', 'terminated', 'closed'],
  terminated: ['active', 'idle', 'closed'],
  closed: [],
};

export class InvalidTransitionError extends GroupChatError {
  constructor(from: ConversationState, to: ConversationState, reason: TransitionReason) {
    super(`Invalid conversation transition ${from} → ${to} (${reason})`, ErrorCategory.INTERNAL, false, {
      from,
      to,
      reason,
    });
    this.name = 'InvalidTransitionError';
  }
}

export type TransitionListener = (transition: StateTransition) => void;

export class ConversationStateMachine {
  private current: ConversationState = 'idle';
  private transitions: StateTransition[] = [];
  private listeners: TransitionListener[] = [];

  /** Transitions kept for inspection; older ones are dropped */
  constructor(private readonly historyLimit = 100) {}

  get state(): ConversationState {
    return this.current;
  }

  get isActive(): boolean {
    return this.current === 'active';
  }

  get isClosed(): boolean {
    return this.current === 'closed';
  }

  /** Reason for the most recent transition */
  get lastReason(): TransitionReason | undefined {
    return this.transitions[this.transitions.length - 1]?.reason;
  }

  canTransition(to: ConversationState): boolean {
    return TRANSITIONS[this.current].includes(to);
  }

  transition(to: ConversationState, reason: TransitionReason): StateTransition {
    if (!this.canTransition(to)) {
      throw new InvalidTransitionError(this.current, to, reason);
    }

    const transition: StateTransition = { from: this.current, to, reason, at: new Date() };
    this.current = to;
    this.transitions.push(transition);
    if (this.transitions.length > this.historyLimit) {
      this.transitions.shift();
    }

    for (const listener of this.listeners) {
      listener(transition);
    }
    return transition;
  }

  /**
   * Back to idle from any open state. No-op when already idle.
   */
  reset(): void {
    if (this.current === 'idle') return;
    this.transition('idle', 'reset');
  }

  getTransitions(): StateTransition[] {
    return [...this.transitions];
  }

  onTransition(listener: TransitionListener): () => void {
    this.listeners.push(listener);
    return () => {
      const idx = this.listeners.indexOf(listener);
      if (idx >= 0) this.listeners.splice(idx, 1);
    };
  }
}
