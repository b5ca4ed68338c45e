/**
 * OpenAI chat-completions wire format, shared by the OpenAI and Azure OpenAI
 * adapters. Only the request URL and auth header differ between the two.
 */

import { z } from 'zod';
import type { ChatOptions, ChatResponse, ProviderMessage } from '../types.js';
import { ProviderError, errorCodeForStatus } from '../types.js';
import { resilientFetch, isResilientFetchError, type NetworkConfig } from '../resilient-fetch.js';
import type { StructuredLogger } from '../../observability/logger.js';

// =============================================================================
// RESPONSE SCHEMA
// =============================================================================

const ChatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable(),
        }),
        finish_reason: z.string().nullable(),
      })
    )
    .min(1),
  usage: z
    .object({
      prompt_tokens: z.number(),
      completion_tokens: z.number(),
    })
    .optional(),
});

// =============================================================================
// REQUEST
// =============================================================================

export interface OpenAICompatibleRequest {
  provider: string;
  url: string;
  headers: Record<string, string>;
  messages: ProviderMessage[];
  options?: ChatOptions;
  /** Sent as `model`; Azure routes by deployment and omits it */
  model?: string;
  networkConfig: NetworkConfig;
  log: StructuredLogger;
}

export async function postChatCompletion(request: OpenAICompatibleRequest): Promise<ChatResponse> {
  const { provider, options, log } = request;

  const body = {
    ...(request.model !== undefined && { model: request.model }),
    messages: request.messages.map((m) => ({ role: m.role, content: m.content })),
    max_tokens: options?.maxTokens ?? 4096,
    temperature: options?.temperature ?? 0.7,
    ...(options?.stopSequences && { stop: options.stopSequences }),
  };

  try {
    const { response } = await resilientFetch({
      url: request.url,
      init: {
        method: 'POST',
        headers: { 'Content-Type': 'application/json', ...request.headers },
        body: JSON.stringify(body),
      },
      providerName: provider,
      networkConfig: request.networkConfig,
      signal: options?.signal,
      onRetry: (attempt, delay, error) => {
        log.warn('Provider retry attempt', { provider, attempt, delayMs: delay, error: error.message });
      },
    });

    if (!response.ok) {
      const text = await response.text();
      throw new ProviderError(
        `${provider} API error (${response.status}): ${text}`,
        provider,
        errorCodeForStatus(response.status, text)
      );
    }

    const parsed = ChatCompletionSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new ProviderError(
        `${provider} returned an unexpected response: ${parsed.error.message}`,
        provider,
        'UNKNOWN'
      );
    }

    const choice = parsed.data.choices[0];
    const usage = parsed.data.usage;
    return {
      content: choice.message.content ?? '',
      stopReason: mapFinishReason(choice.finish_reason),
      ...(usage && {
        usage: { inputTokens: usage.prompt_tokens, outputTokens: usage.completion_tokens },
      }),
    };
  } catch (error) {
    if (error instanceof ProviderError) throw error;
    if (isResilientFetchError(error)) {
      throw new ProviderError(error.message, provider, 'NETWORK_ERROR', error);
    }
    throw new ProviderError(
      `${provider} request failed: ${error instanceof Error ? error.message : String(error)}`,
      provider,
      'NETWORK_ERROR',
      error instanceof Error ? error : undefined
    );
  }
}

function mapFinishReason(reason: string | null): ChatResponse['stopReason'] {
  switch (reason) {
    case 'length':
      return 'max_tokens';
    case 'stop':
    default:
      return 'end_turn';
  }
}
