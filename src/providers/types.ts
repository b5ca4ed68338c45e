/**
 * Provider Abstraction Types
 *
 * The hosted chat-completion backends an agent, the speaker router or the
 * summarizer can run on. Every backend is normalized to `LLMProvider`.
 */

// =============================================================================
// MESSAGE TYPES
// =============================================================================

export interface ProviderMessage {
  role: 'user' | 'assistant' | 'system';
  content: string;
}

// =============================================================================
// PROVIDER INTERFACE
// =============================================================================

export interface ChatOptions {
  maxTokens?: number;

  /** Temperature for randomness (0-1) */
  temperature?: number;

  stopSequences?: string[];

  /** Model override (uses provider default if not specified) */
  model?: string;

  /** Aborts the request, including pending retries */
  signal?: AbortSignal;
}

export interface ChatResponse {
  content: string;

  stopReason: 'end_turn' | 'max_tokens' | 'stop_sequence';

  usage?: {
    inputTokens: number;
    outputTokens: number;
  };
}

/**
 * The core LLM provider interface.
 */
export interface LLMProvider {
  /** Provider name for logging/debugging */
  readonly name: string;

  readonly defaultModel: string;

  chat(messages: ProviderMessage[], options?: ChatOptions): Promise<ChatResponse>;

  isConfigured(): boolean;
}

// =============================================================================
// PROVIDER CONFIGURATION
// =============================================================================

export type ProviderType = 'azure' | 'openai' | 'anthropic' | 'mock';

/**
 * Azure OpenAI. Unset fields fall back to AZURE_OPENAI_* environment variables.
 */
export interface AzureOpenAIConfig {
  apiKey?: string;
  endpoint?: string;
  deployment?: string;
  apiVersion?: string;
}

export interface OpenAIConfig {
  apiKey?: string;
  model?: string;
  organization?: string;
  baseUrl?: string;
}

export interface AnthropicConfig {
  apiKey?: string;
  model?: string;
  baseUrl?: string;
}

/**
 * Scripted provider for tests and offline demos.
 */
export interface MockProviderConfig {
  /** Replies returned in order, cycling when exhausted */
  responses?: string[];
  /** Simulated latency per call in ms (default: 0) */
  latencyMs?: number;
}

export type ProviderConfig =
  | ({ type: 'azure' } & AzureOpenAIConfig)
  | ({ type: 'openai' } & OpenAIConfig)
  | ({ type: 'anthropic' } & AnthropicConfig)
  | ({ type: 'mock' } & MockProviderConfig);

/**
 * Sampling settings applied when a provider is used through a model wrapper.
 */
export interface GenerationSettings {
  temperature?: number;
  maxTokens?: number;
}

export type ModelSettings = ProviderConfig & GenerationSettings;

// =============================================================================
// PROVIDER ERRORS
// =============================================================================

export class ProviderError extends Error {
  constructor(
    message: string,
    public readonly provider: string,
    public readonly code: ProviderErrorCode,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'ProviderError';
  }
}

export type ProviderErrorCode =
  | 'NOT_CONFIGURED'
  | 'AUTHENTICATION_FAILED'
  | 'RATE_LIMITED'
  | 'CONTEXT_LENGTH_EXCEEDED'
  | 'INVALID_REQUEST'
  | 'SERVER_ERROR'
  | 'NETWORK_ERROR'
  | 'UNKNOWN';

/**
 * Map an HTTP error status from an OpenAI-style API to an error code.
 */
export function errorCodeForStatus(status: number, body: string): ProviderErrorCode {
  if (status === 401 || status === 403) return 'AUTHENTICATION_FAILED';
  if (status === 429) return 'RATE_LIMITED';
  if (status === 400) {
    return body.includes('context_length') || body.includes('maximum context length')
      ? 'CONTEXT_LENGTH_EXCEEDED'
      : 'INVALID_REQUEST';
  }
  if (status === 404) return 'INVALID_REQUEST';
  if (status >= 500) return 'SERVER_ERROR';
  return 'UNKNOWN';
}
