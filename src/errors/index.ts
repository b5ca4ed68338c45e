/**
 * Centralized Error Types
 *
 * Typed, categorized errors for the group chat. Each boundary of the
 * orchestrator has its own error type so that "logged and continued" and
 * "propagated to the caller" are visible in the types:
 *
 * - InitializationError: missing model configuration, fatal to the session
 * - NoParticipantsError / NoActiveParticipantsError: fatal to the call
 * - AgentNotFoundError: registry miss, the turn is skipped
 * - AgentInvocationError: agent failure, becomes an error response
 * - SummarizationError: recovered into the heuristic summary
 *
 * @example
 * ```typescript
 * throw new AgentNotFoundError('people_lookup', { turn: 3 });
 * ```
 */

import type { AgentResponse } from '../types.js';

// =============================================================================
// ERROR CATEGORIES
// =============================================================================

export enum ErrorCategory {
  /** May resolve on retry (network, timeout) */
  TRANSIENT = 'TRANSIENT',

  /** Will not resolve on retry (missing config, unknown agent) */
  PERMANENT = 'PERMANENT',

  /** A budget was used up */
  RESOURCE = 'RESOURCE',

  /** Invalid input, configuration or call sequence */
  VALIDATION = 'VALIDATION',

  /** A collaborator (agent, model) failed */
  DEPENDENCY = 'DEPENDENCY',

  INTERNAL = 'INTERNAL',

  CANCELLED = 'CANCELLED',
}

// =============================================================================
// BASE ERROR CLASS
// =============================================================================

/**
 * Base class for all group chat errors.
 */
export class GroupChatError extends Error {
  readonly category: ErrorCategory;

  /** Whether the same call may succeed if repeated */
  readonly recoverable: boolean;

  readonly timestamp: Date;

  readonly context: Record<string, unknown>;

  readonly cause?: Error;

  constructor(
    message: string,
    category: ErrorCategory,
    recoverable: boolean,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message);
    this.name = 'GroupChatError';
    this.category = category;
    this.recoverable = recoverable;
    this.timestamp = new Date();
    this.context = context ?? {};
    this.cause = cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      category: this.category,
      recoverable: this.recoverable,
      timestamp: this.timestamp.toISOString(),
      context: this.context,
      cause: this.cause?.message,
    };
  }

  /**
   * Format error for logging.
   */
  toLogString(): string {
    const parts = [`[${this.name}]`, `(${this.category})`, this.message];

    if (Object.keys(this.context).length > 0) {
      parts.push(`context=${JSON.stringify(this.context)}`);
    }

    return parts.join(' ');
  }
}

// =============================================================================
// SESSION ERRORS
// =============================================================================

/**
 * Required model connection parameters are missing or a model could not be
 * constructed. The session stays unusable until its configuration is fixed.
 */
export class InitializationError extends GroupChatError {
  readonly chatName: string;

  constructor(message: string, chatName: string, cause?: Error) {
    super(message, ErrorCategory.PERMANENT, false, { chat: chatName }, cause);
    this.name = 'InitializationError';
    this.chatName = chatName;
  }
}

export class NoParticipantsError extends GroupChatError {
  constructor(chatName: string) {
    super(`No participants in group chat "${chatName}"`, ErrorCategory.VALIDATION, false, {
      chat: chatName,
    });
    this.name = 'NoParticipantsError';
  }
}

/**
 * Every participant is an observer (or there are none), so nobody can speak.
 */
export class NoActiveParticipantsError extends GroupChatError {
  constructor(chatName: string) {
    super(`No active participants in group chat "${chatName}"`, ErrorCategory.VALIDATION, false, {
      chat: chatName,
    });
    this.name = 'NoActiveParticipantsError';
  }
}

export class TurnBudgetExhaustedError extends GroupChatError {
  readonly maxTurns: number;

  constructor(chatName: string, maxTurns: number) {
    super(
      `Group chat "${chatName}" has used all ${maxTurns} turns; reset it to continue`,
      ErrorCategory.RESOURCE,
      false,
      { chat: chatName, maxTurns }
    );
    this.name = 'TurnBudgetExhaustedError';
    this.maxTurns = maxTurns;
  }
}

export class SessionBusyError extends GroupChatError {
  constructor(chatName: string) {
    super(
      `Group chat "${chatName}" is already processing a message`,
      ErrorCategory.VALIDATION,
      true,
      { chat: chatName }
    );
    this.name = 'SessionBusyError';
  }
}

export class SessionClosedError extends GroupChatError {
  constructor(chatName: string) {
    super(`Group chat "${chatName}" has been cleaned up`, ErrorCategory.PERMANENT, false, {
      chat: chatName,
    });
    this.name = 'SessionClosedError';
  }
}

// =============================================================================
// AGENT ERRORS
// =============================================================================

export class AgentNotFoundError extends GroupChatError {
  readonly agentName: string;

  constructor(agentName: string, context?: Record<string, unknown>) {
    super(`Agent not found in registry: ${agentName}`, ErrorCategory.PERMANENT, false, {
      ...context,
      agent: agentName,
    });
    this.name = 'AgentNotFoundError';
    this.agentName = agentName;
  }
}

/**
 * An agent threw while producing its turn.
 */
export class AgentInvocationError extends GroupChatError {
  readonly agentName: string;

  constructor(agentName: string, cause: Error, context?: Record<string, unknown>) {
    super(
      `Agent ${agentName} failed: ${cause.message}`,
      categorizeError(cause).category,
      false,
      { ...context, agent: agentName },
      cause
    );
    this.name = 'AgentInvocationError';
    this.agentName = agentName;
  }
}

export class SummarizationError extends GroupChatError {
  /** Which model tier failed */
  readonly tier: 'summary' | 'routing';

  constructor(tier: 'summary' | 'routing', cause: Error) {
    super(`Summary generation failed: ${cause.message}`, ErrorCategory.DEPENDENCY, true, { tier }, cause);
    this.name = 'SummarizationError';
    this.tier = tier;
  }
}

// =============================================================================
// GENERIC ERRORS
// =============================================================================

export class ValidationError extends GroupChatError {
  readonly fields?: string[];

  constructor(message: string, fields?: string[], context?: Record<string, unknown>) {
    super(message, ErrorCategory.VALIDATION, false, { ...context, fields });
    this.name = 'ValidationError';
    this.fields = fields;
  }

  /**
   * Create error from Zod validation result.
   */
  static fromZodError(error: {
    issues: Array<{ path: PropertyKey[]; message: string }>;
  }): ValidationError {
    const fields = error.issues.map((i) => i.path.map(String).join('.'));
    const messages = error.issues.map((i) => `${i.path.map(String).join('.')}: ${i.message}`);
    return new ValidationError(`Validation failed: ${messages.join(', ')}`, fields);
  }
}

/**
 * A send/broadcast was aborted between turns. Responses produced before the
 * abort are kept on the error.
 */
export class CancellationError extends GroupChatError {
  readonly reason: string;
  readonly partialResponses: readonly AgentResponse[];

  constructor(reason: string = 'Operation cancelled', partialResponses: readonly AgentResponse[] = []) {
    super(reason, ErrorCategory.CANCELLED, false, { reason });
    this.name = 'CancellationError';
    this.reason = reason;
    this.partialResponses = partialResponses;
  }
}

// =============================================================================
// ERROR UTILITIES
// =============================================================================

function errnoCode(error: Error): string | undefined {
  const code: unknown = Reflect.get(error, 'code');
  return typeof code === 'string' ? code : undefined;
}

/**
 * Determine error category from a generic error.
 */
export function categorizeError(error: Error): {
  category: ErrorCategory;
  recoverable: boolean;
} {
  if (error instanceof GroupChatError) {
    return { category: error.category, recoverable: error.recoverable };
  }

  const message = error.message.toLowerCase();
  const code = errnoCode(error);

  if (
    code === 'ETIMEDOUT' ||
    code === 'ECONNRESET' ||
    code === 'ECONNREFUSED' ||
    code === 'ENOTFOUND' ||
    message.includes('timeout') ||
    message.includes('timed out') ||
    message.includes('socket hang up') ||
    message.includes('network error') ||
    message.includes('temporarily unavailable') ||
    message.includes('rate limit') ||
    message.includes('too many requests')
  ) {
    return { category: ErrorCategory.TRANSIENT, recoverable: true };
  }

  if (
    message.includes('unauthorized') ||
    message.includes('authentication') ||
    message.includes('forbidden')
  ) {
    return { category: ErrorCategory.PERMANENT, recoverable: false };
  }

  if (message.includes('invalid') || message.includes('validation') || message.includes('required')) {
    return { category: ErrorCategory.VALIDATION, recoverable: false };
  }

  if (message.includes('cancelled') || message.includes('aborted')) {
    return { category: ErrorCategory.CANCELLED, recoverable: false };
  }

  return { category: ErrorCategory.DEPENDENCY, recoverable: false };
}

/**
 * Normalize any thrown value to an Error.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Wrap an unknown error as a GroupChatError.
 */
export function wrapError(error: unknown, context?: Record<string, unknown>): GroupChatError {
  if (error instanceof GroupChatError) {
    return error;
  }

  const err = toError(error);
  const { category, recoverable } = categorizeError(err);

  return new GroupChatError(err.message, category, recoverable, context, err);
}

export function isGroupChatError(error: unknown): error is GroupChatError {
  return error instanceof GroupChatError;
}

export function isRecoverable(error: unknown): boolean {
  if (error instanceof GroupChatError) {
    return error.recoverable;
  }
  if (error instanceof Error) {
    return categorizeError(error).recoverable;
  }
  return false;
}
