/**
 * Azure OpenAI Provider Adapter
 *
 * Azure uses a per-deployment endpoint and an `api-key` header instead of
 * OpenAI's bearer token; the request and response bodies are the same.
 */

import type { LLMProvider, ChatOptions, ChatResponse, ProviderMessage, AzureOpenAIConfig } from '../types.js';
import { requireSetting } from '../provider.js';
import type { NetworkConfig } from '../resilient-fetch.js';
import { postChatCompletion } from './openai-compatible.js';
import { createComponentLogger } from '../../observability/logger.js';

const log = createComponentLogger('providers.azure');

export const DEFAULT_AZURE_API_VERSION = '2024-02-01';

export class AzureOpenAIProvider implements LLMProvider {
  readonly name = 'azure';
  readonly defaultModel: string;

  private apiKey: string;
  private endpoint: string;
  private deployment: string;
  private apiVersion: string;
  private networkConfig: NetworkConfig;

  constructor(config?: AzureOpenAIConfig) {
    this.apiKey = requireSetting(config?.apiKey, 'AZURE_OPENAI_API_KEY', this.name);
    this.endpoint = requireSetting(config?.endpoint, 'AZURE_OPENAI_ENDPOINT', this.name).replace(/\/+$/, '');
    this.deployment = requireSetting(config?.deployment, 'AZURE_OPENAI_DEPLOYMENT_NAME', this.name);
    this.apiVersion =
      config?.apiVersion || process.env.AZURE_OPENAI_API_VERSION || DEFAULT_AZURE_API_VERSION;
    this.defaultModel = this.deployment;

    this.networkConfig = {
      timeout: 120000,
      maxRetries: 3,
      baseRetryDelay: 1000,
    };
  }

  isConfigured(): boolean {
    return this.apiKey !== '' && this.endpoint !== '' && this.deployment !== '';
  }

  /**
   * Format: {endpoint}/openai/deployments/{deployment}/chat/completions?api-version={apiVersion}
   */
  buildUrl(): string {
    return `${this.endpoint}/openai/deployments/${this.deployment}/chat/completions?api-version=${this.apiVersion}`;
  }

  async chat(messages: ProviderMessage[], options?: ChatOptions): Promise<ChatResponse> {
    // The deployment determines the model; options.model is ignored
    return postChatCompletion({
      provider: this.name,
      url: this.buildUrl(),
      headers: { 'api-key': this.apiKey },
      messages,
      options,
      networkConfig: this.networkConfig,
      log,
    });
  }
}
