/**
 * OpenAI Provider Adapter
 */

import type { LLMProvider, ChatOptions, ChatResponse, ProviderMessage, OpenAIConfig } from '../types.js';
import { requireSetting } from '../provider.js';
import type { NetworkConfig } from '../resilient-fetch.js';
import { postChatCompletion } from './openai-compatible.js';
import { createComponentLogger } from '../../observability/logger.js';

const log = createComponentLogger('providers.openai');

export class OpenAIProvider implements LLMProvider {
  readonly name = 'openai';
  readonly defaultModel: string;

  private apiKey: string;
  private baseUrl: string;
  private organization?: string;
  private networkConfig: NetworkConfig;

  constructor(config?: OpenAIConfig) {
    this.apiKey = requireSetting(config?.apiKey, 'OPENAI_API_KEY', this.name);
    this.defaultModel = config?.model ?? 'gpt-4o-mini';
    this.baseUrl = (config?.baseUrl ?? 'https://api.openai.com').replace(/\/+$/, '');
    this.organization = config?.organization;
    this.networkConfig = { timeout: 120000, maxRetries: 3 };
  }

  isConfigured(): boolean {
    return this.apiKey !== '';
  }

  async chat(messages: ProviderMessage[], options?: ChatOptions): Promise<ChatResponse> {
    return postChatCompletion({
      provider: this.name,
      url: `${this.baseUrl}/v1/chat/completions`,
      headers: {
        Authorization: `Bearer ${this.apiKey}`,
        ...(this.organization !== undefined && { 'OpenAI-Organization': this.organization }),
      },
      messages,
      options,
      model: options?.model ?? this.defaultModel,
      networkConfig: this.networkConfig,
      log,
    });
  }
}
