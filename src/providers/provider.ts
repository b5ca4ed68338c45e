/**
 * Provider Factory
 *
 * Creates LLM providers from explicit settings, and detects which provider
 * the environment has credentials for.
 */

import type { LLMProvider, ProviderConfig, ProviderType } from './types.js';
import { ProviderError } from './types.js';
import { createComponentLogger } from '../observability/logger.js';

const log = createComponentLogger('providers');

// =============================================================================
// PROVIDER DETECTION
// =============================================================================

interface ProviderDetection {
  type: ProviderType;
  detect: (env: NodeJS.ProcessEnv) => boolean;
  priority: number; // Lower = higher priority
}

const DETECTION: ProviderDetection[] = [
  {
    type: 'azure',
    detect: (env) => hasEnv('AZURE_OPENAI_API_KEY', env) && hasEnv('AZURE_OPENAI_ENDPOINT', env),
    priority: 1,
  },
  { type: 'openai', detect: (env) => hasEnv('OPENAI_API_KEY', env), priority: 2 },
  { type: 'anthropic', detect: (env) => hasEnv('ANTHROPIC_API_KEY', env), priority: 3 },
];

/**
 * The first provider type whose credentials are in the environment.
 *
 * Detection order:
 * 1. Azure OpenAI (AZURE_OPENAI_API_KEY + AZURE_OPENAI_ENDPOINT)
 * 2. OpenAI (OPENAI_API_KEY)
 * 3. Anthropic (ANTHROPIC_API_KEY)
 */
export function detectProviderType(env: NodeJS.ProcessEnv = process.env): ProviderType | undefined {
  const sorted = [...DETECTION].sort((a, b) => a.priority - b.priority);
  const type = sorted.find((entry) => entry.detect(env))?.type;
  if (type) {
    log.debug(`Detected provider: ${type}`);
  }
  return type;
}

/**
 * Create a provider from explicit configuration. Settings left unset fall
 * back to the provider's environment variables.
 */
export async function createProvider(config: ProviderConfig): Promise<LLMProvider> {
  switch (config.type) {
    case 'azure': {
      const { AzureOpenAIProvider } = await import('./adapters/azure.js');
      return new AzureOpenAIProvider(config);
    }
    case 'openai': {
      const { OpenAIProvider } = await import('./adapters/openai.js');
      return new OpenAIProvider(config);
    }
    case 'anthropic': {
      const { AnthropicProvider } = await import('./adapters/anthropic.js');
      return new AnthropicProvider(config);
    }
    case 'mock': {
      const { MockProvider } = await import('./adapters/mock.js');
      return new MockProvider(config);
    }
  }
}

// =============================================================================
// ENVIRONMENT HELPERS
// =============================================================================

/**
 * Check if an environment variable is set and non-empty.
 */
export function hasEnv(key: string, env: NodeJS.ProcessEnv = process.env): boolean {
  const value = env[key];
  return value !== undefined && value.trim() !== '';
}

/**
 * Explicit value, else the environment variable, else a NOT_CONFIGURED error.
 */
export function requireSetting(value: string | undefined, envKey: string, provider: string): string {
  if (value !== undefined && value.trim() !== '') {
    return value;
  }
  const fromEnv = process.env[envKey];
  if (fromEnv === undefined || fromEnv.trim() === '') {
    throw new ProviderError(`Missing required setting: ${envKey}`, provider, 'NOT_CONFIGURED');
  }
  return fromEnv;
}
