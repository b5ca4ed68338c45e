/**
 * Chat Agent
 *
 * The LLM-backed Agent: instructions become the system prompt, the shared
 * conversation history is replayed from this agent's point of view, and
 * provider failures come back as error-flagged responses.
 */

import type { Agent, AgentResponse, Message } from '../types.js';
import { createResponse } from '../types.js';
import type { LLMProvider, ProviderMessage, GenerationSettings } from '../providers/types.js';
import { createComponentLogger } from '../observability/logger.js';

const log = createComponentLogger('ChatAgent');

export interface ChatAgentOptions extends GenerationSettings {
  name: string;
  instructions: string;
  provider: LLMProvider;
  /** Disabled agents stay registered but are not listed as available */
  enabled?: boolean;
  /** Most recent history messages replayed to the model (default: 20) */
  historyLimit?: number;
}

export class ChatAgent implements Agent {
  readonly name: string;
  readonly instructions: string;

  private provider: LLMProvider;
  private enabled: boolean;
  private historyLimit: number;
  private generation: GenerationSettings;

  constructor(options: ChatAgentOptions) {
    this.name = options.name;
    this.instructions = options.instructions;
    this.provider = options.provider;
    this.enabled = options.enabled ?? true;
    this.historyLimit = options.historyLimit ?? 20;
    this.generation = { temperature: options.temperature, maxTokens: options.maxTokens };
  }

  get isAvailable(): boolean {
    return this.enabled && this.provider.isConfigured();
  }

  get providerName(): string {
    return this.provider.name;
  }

  setEnabled(enabled: boolean): void {
    this.enabled = enabled;
  }

  async processMessage(
    message: string,
    history: readonly Message[],
    metadata: Record<string, unknown>
  ): Promise<AgentResponse> {
    const messages = this.buildMessages(message, history);

    try {
      const response = await this.provider.chat(messages, this.generation);
      log.debug('Generated response', { agent: this.name, length: response.content.length });

      return createResponse({
        content: response.content,
        agentName: this.name,
        ...(response.usage && { usage: { ...response.usage } }),
        metadata: { ...metadata, provider: this.provider.name, stopReason: response.stopReason },
      });
    } catch (err) {
      const errorMessage = err instanceof Error ? err.message : String(err);
      log.error('Error processing message', { agent: this.name, error: errorMessage });

      return createResponse({
        content: `I apologize, but I encountered an error: ${errorMessage}`,
        agentName: this.name,
        metadata: { ...metadata, error: true, errorMessage, provider: this.provider.name },
      });
    }
  }

  /**
   * System prompt, recent history, then the message to answer. This agent's
   * own replies are assistant turns; everyone else speaks as the user, named.
   */
  buildMessages(message: string, history: readonly Message[]): ProviderMessage[] {
    let recent = history.slice(-this.historyLimit);

    // The message being answered is usually the last history entry already
    const last = recent[recent.length - 1];
    if (last && last.content === message) {
      recent = recent.slice(0, -1);
    }

    const messages: ProviderMessage[] = [{ role: 'system', content: this.instructions }];

    for (const entry of recent) {
      if (entry.role === 'system') continue;
      if (entry.role === 'assistant' && entry.agentName === this.name) {
        messages.push({ role: 'assistant', content: entry.content });
        continue;
      }
      messages.push({ role: 'user', content: `${speakerOf(entry)}: ${entry.content}` });
    }

    messages.push({ role: 'user', content: message });
    return messages;
  }
}

function speakerOf(message: Message): string {
  if (message.agentName) return message.agentName;
  const sender = message.metadata.sender;
  return typeof sender === 'string' && sender !== '' ? sender : message.role;
}
