/**
 * Anthropic Provider Adapter
 *
 * The Messages API takes the system prompt as a top-level field rather than
 * as a message.
 */

import { z } from 'zod';
import type { LLMProvider, ChatOptions, ChatResponse, ProviderMessage, AnthropicConfig } from '../types.js';
import { ProviderError, errorCodeForStatus } from '../types.js';
import { requireSetting } from '../provider.js';
import { resilientFetch, isResilientFetchError, type NetworkConfig } from '../resilient-fetch.js';
import { createComponentLogger } from '../../observability/logger.js';

const log = createComponentLogger('providers.anthropic');

const MessagesResponseSchema = z.object({
  content: z.array(z.object({ type: z.string(), text: z.string().optional() })),
  stop_reason: z.string().nullable(),
  usage: z
    .object({
      input_tokens: z.number(),
      output_tokens: z.number(),
    })
    .optional(),
});

export class AnthropicProvider implements LLMProvider {
  readonly name = 'anthropic';
  readonly defaultModel: string;

  private apiKey: string;
  private baseUrl: string;
  private networkConfig: NetworkConfig;

  constructor(config?: AnthropicConfig) {
    this.apiKey = requireSetting(config?.apiKey, 'ANTHROPIC_API_KEY', this.name);
    this.defaultModel = config?.model ?? 'claude-3-5-haiku-latest';
    this.baseUrl = (config?.baseUrl ?? 'https://api.anthropic.com').replace(/\/+$/, '');
    this.networkConfig = { timeout: 120000, maxRetries: 3 };
  }

  isConfigured(): boolean {
    return this.apiKey !== '';
  }

  async chat(messages: ProviderMessage[], options?: ChatOptions): Promise<ChatResponse> {
    const system = messages
      .filter((m) => m.role === 'system')
      .map((m) => m.content)
      .join('\n\n');
    const conversation = messages
      .filter((m) => m.role !== 'system')
      .map((m) => ({ role: m.role, content: m.content }));

    const body = {
      model: options?.model ?? this.defaultModel,
      max_tokens: options?.maxTokens ?? 4096,
      messages: conversation,
      ...(system !== '' && { system }),
      ...(options?.temperature !== undefined && { temperature: options.temperature }),
      ...(options?.stopSequences && { stop_sequences: options.stopSequences }),
    };

    try {
      const { response } = await resilientFetch({
        url: `${this.baseUrl}/v1/messages`,
        init: {
          method: 'POST',
          headers: {
            'Content-Type': 'application/json',
            'x-api-key': this.apiKey,
            'anthropic-version': '2023-06-01',
          },
          body: JSON.stringify(body),
        },
        providerName: this.name,
        networkConfig: this.networkConfig,
        signal: options?.signal,
        onRetry: (attempt, delay, error) => {
          log.warn('Anthropic retry attempt', { attempt, delayMs: delay, error: error.message });
        },
      });

      if (!response.ok) {
        const text = await response.text();
        throw new ProviderError(
          `Anthropic API error (${response.status}): ${text}`,
          this.name,
          errorCodeForStatus(response.status, text)
        );
      }

      const parsed = MessagesResponseSchema.safeParse(await response.json());
      if (!parsed.success) {
        throw new ProviderError(
          `Anthropic returned an unexpected response: ${parsed.error.message}`,
          this.name,
          'UNKNOWN'
        );
      }

      const data = parsed.data;
      return {
        content: data.content
          .filter((block) => block.type === 'text')
          .map((block) => block.text ?? '')
          .join(''),
        stopReason: this.mapStopReason(data.stop_reason),
        ...(data.usage && {
          usage: { inputTokens: data.usage.input_tokens, outputTokens: data.usage.output_tokens },
        }),
      };
    } catch (error) {
      if (error instanceof ProviderError) throw error;
      if (isResilientFetchError(error)) {
        throw new ProviderError(error.message, this.name, 'NETWORK_ERROR', error);
      }
      throw new ProviderError(
        `Anthropic request failed: ${error instanceof Error ? error.message : String(error)}`,
        this.name,
        'NETWORK_ERROR',
        error instanceof Error ? error : undefined
      );
    }
  }

  private mapStopReason(reason: string | null): ChatResponse['stopReason'] {
    switch (reason) {
      case 'max_tokens':
        return 'max_tokens';
      case 'stop_sequence':
        return 'stop_sequence';
      default:
        return 'end_turn';
    }
  }
}
