/**
 * Completion Model
 *
 * Text-in, text-out wrapper over an LLMProvider, used for speaker routing
 * and conversation summaries.
 */

import type { CompletionModel } from '../types.js';
import type { GenerationSettings, LLMProvider, ModelSettings, ProviderMessage } from './types.js';
import { createProvider } from './provider.js';

/**
 * Replace `{key}` placeholders that have a value in `inputs`. Unknown
 * placeholders are left as written.
 */
export function fillTemplate(prompt: string, inputs: Record<string, string> = {}): string {
  return prompt.replace(/\{(\w+)\}/g, (match, key: string) =>
    Object.prototype.hasOwnProperty.call(inputs, key) ? inputs[key] : match
  );
}

export interface CompletionModelOptions extends GenerationSettings {
  /** Sent as a system message ahead of the prompt */
  systemPrompt?: string;
}

export class ProviderCompletionModel implements CompletionModel {
  constructor(
    private readonly provider: LLMProvider,
    private readonly settings: CompletionModelOptions = {}
  ) {}

  get providerName(): string {
    return this.provider.name;
  }

  async complete(prompt: string, inputs?: Record<string, string>): Promise<string> {
    const messages: ProviderMessage[] = [];
    if (this.settings.systemPrompt) {
      messages.push({ role: 'system', content: this.settings.systemPrompt });
    }
    messages.push({ role: 'user', content: fillTemplate(prompt, inputs) });

    const response = await this.provider.chat(messages, {
      temperature: this.settings.temperature,
      maxTokens: this.settings.maxTokens,
    });
    return response.content;
  }
}

/** Routing answers are a single agent name */
export const ROUTING_GENERATION: GenerationSettings = { temperature: 0.3, maxTokens: 50 };

export const SUMMARY_GENERATION: GenerationSettings = { temperature: 0.2, maxTokens: 800 };

/**
 * Build a completion model from settings; sampling values in `settings`
 * override `defaults`.
 */
export async function createCompletionModel(
  settings: ModelSettings,
  defaults: CompletionModelOptions = {}
): Promise<ProviderCompletionModel> {
  const provider = await createProvider(settings);
  return new ProviderCompletionModel(provider, {
    ...defaults,
    temperature: settings.temperature ?? defaults.temperature,
    maxTokens: settings.maxTokens ?? defaults.maxTokens,
  });
}
