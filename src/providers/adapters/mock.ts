/**
 * Mock Provider
 *
 * Scripted provider for tests and offline demos. Always available.
 */

import { setTimeout as delay } from 'node:timers/promises';
import type { LLMProvider, ChatOptions, ChatResponse, ProviderMessage, MockProviderConfig } from '../types.js';

export class MockProvider implements LLMProvider {
  readonly name = 'mock';
  readonly defaultModel = 'mock-model';

  /** Every message list this provider has been called with */
  readonly calls: ProviderMessage[][] = [];

  private responses: string[];
  private latencyMs: number;

  constructor(config?: MockProviderConfig) {
    this.responses = config?.responses ?? [];
    this.latencyMs = config?.latencyMs ?? 0;
  }

  isConfigured(): boolean {
    return true;
  }

  async chat(messages: ProviderMessage[], options?: ChatOptions): Promise<ChatResponse> {
    this.calls.push(messages);

    if (this.latencyMs > 0) {
      await delay(this.latencyMs, undefined, { signal: options?.signal });
    }

    const content =
      this.responses.length > 0
        ? this.responses[(this.calls.length - 1) % this.responses.length]
        : this.defaultReply(messages);

    return {
      content,
      stopReason: 'end_turn',
      usage: {
        inputTokens: messages.reduce((sum, m) => sum + Math.ceil(m.content.length / 4), 0),
        outputTokens: Math.ceil(content.length / 4),
      },
    };
  }

  private defaultReply(messages: ProviderMessage[]): string {
    const lastUser = [...messages].reverse().find((m) => m.role === 'user');
    const text = (lastUser?.content ?? '').replace(/\s+/g, ' ').trim();
    const preview = text.length > 80 ? `${text.slice(0, 77)}...` : text;
    return `Mock reply #${this.calls.length} to: ${preview}`;
  }
}
