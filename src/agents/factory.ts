/**
 * Agent Factory
 *
 * Builds a ChatAgent from a definition. The definition's provider tag picks
 * the backend; definitions without a model use the factory default, then
 * whatever provider the environment configures.
 */

import type { AgentDefinition, ModelSettingsInput } from '../config/schema.js';
import type { LLMProvider } from '../providers/types.js';
import { ProviderError } from '../providers/types.js';
import { createProvider, detectProviderType } from '../providers/provider.js';
import { ChatAgent } from './chat-agent.js';

export type ProviderFactory = (settings: ModelSettingsInput) => Promise<LLMProvider>;

export interface AgentFactoryOptions {
  /** Model for definitions that name none */
  defaultModel?: ModelSettingsInput;
  /** Replaces `createProvider`, mainly for tests */
  providerFactory?: ProviderFactory;
  historyLimit?: number;
}

export function resolveAgentModel(
  definition: AgentDefinition,
  options: AgentFactoryOptions = {}
): ModelSettingsInput {
  if (definition.model) return definition.model;
  if (options.defaultModel) return options.defaultModel;

  const detected = detectProviderType();
  if (detected) return { type: detected };

  throw new ProviderError(
    `No model configured for agent "${definition.name}" and no provider credentials in the environment`,
    'none',
    'NOT_CONFIGURED'
  );
}

export async function createAgent(
  definition: AgentDefinition,
  options: AgentFactoryOptions = {}
): Promise<ChatAgent> {
  const model = resolveAgentModel(definition, options);
  const factory = options.providerFactory ?? createProvider;
  const provider = await factory(model);

  return new ChatAgent({
    name: definition.name,
    instructions: definition.instructions,
    provider,
    enabled: definition.enabled,
    temperature: model.temperature,
    maxTokens: model.maxTokens,
    historyLimit: options.historyLimit,
  });
}
