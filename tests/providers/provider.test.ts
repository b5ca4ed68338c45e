/**
 * Provider factory and completion model tests
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  createProvider,
  detectProviderType,
  hasEnv,
  requireSetting,
} from '../../src/providers/provider.js';
import {
  createCompletionModel,
  fillTemplate,
  ProviderCompletionModel,
  ROUTING_GENERATION,
} from '../../src/providers/completion-model.js';
import { MockProvider } from '../../src/providers/adapters/mock.js';
import { errorCodeForStatus } from '../../src/providers/types.js';

afterEach(() => {
  vi.unstubAllEnvs();
});

describe('detectProviderType', () => {
  it('prefers Azure, then OpenAI, then Anthropic', () => {
    expect(
      detectProviderType({
        AZURE_OPENAI_API_KEY: 'test-key',
        AZURE_OPENAI_ENDPOINT: 'https://example.test',
        OPENAI_API_KEY: 'test-key',
      })
    ).toBe('azure');
    expect(detectProviderType({ OPENAI_API_KEY: 'test-key', ANTHROPIC_API_KEY: 'test-key' })).toBe('openai');
    expect(detectProviderType({ ANTHROPIC_API_KEY: 'test-key' })).toBe('anthropic');
  });

  it('needs both the Azure key and endpoint', () => {
    expect(detectProviderType({ AZURE_OPENAI_API_KEY: 'test-key' })).toBeUndefined();
  });

  it('ignores blank values', () => {
    expect(detectProviderType({ OPENAI_API_KEY: '   ' })).toBeUndefined();
    expect(hasEnv('OPENAI_API_KEY', { OPENAI_API_KEY: '' })).toBe(false);
  });
});

describe('createProvider', () => {
  it('creates the adapter named by the tag', async () => {
    const mock = await createProvider({ type: 'mock', responses: ['hi'] });
    const openai = await createProvider({ type: 'openai', apiKey: 'test-key', model: 'gpt-test' });

    expect(mock).toBeInstanceOf(MockProvider);
    expect(openai.name).toBe('openai');
    expect(openai.defaultModel).toBe('gpt-test');
  });

  it('rejects with NOT_CONFIGURED when credentials are missing', async () => {
    vi.stubEnv('ANTHROPIC_API_KEY', '');

    await expect(createProvider({ type: 'anthropic' })).rejects.toMatchObject({
      name: 'ProviderError',
      code: 'NOT_CONFIGURED',
    });
  });
});

describe('requireSetting', () => {
  it('prefers the explicit value, then the environment', () => {
    vi.stubEnv('EXAMPLE_SETTING', 'from-env');

    expect(requireSetting('explicit', 'EXAMPLE_SETTING', 'test')).toBe('explicit');
    expect(requireSetting(undefined, 'EXAMPLE_SETTING', 'test')).toBe('from-env');
  });
});

describe('errorCodeForStatus', () => {
  it('maps HTTP statuses', () => {
    expect(errorCodeForStatus(403, '')).toBe('AUTHENTICATION_FAILED');
    expect(errorCodeForStatus(429, '')).toBe('RATE_LIMITED');
    expect(errorCodeForStatus(400, 'maximum context length exceeded')).toBe('CONTEXT_LENGTH_EXCEEDED');
    expect(errorCodeForStatus(400, 'bad field')).toBe('INVALID_REQUEST');
    expect(errorCodeForStatus(502, '')).toBe('SERVER_ERROR');
    expect(errorCodeForStatus(418, '')).toBe('UNKNOWN');
  });
});

describe('fillTemplate', () => {
  it('fills known placeholders and leaves the rest', () => {
    expect(fillTemplate('{greeting}, {name}! {unknown}', { greeting: 'Hello', name: 'team' })).toBe(
      'Hello, team! {unknown}'
    );
  });
});

describe('ProviderCompletionModel', () => {
  it('sends the filled prompt with its generation settings', async () => {
    const provider = new MockProvider({ responses: ['people_lookup'] });
    const chat = vi.spyOn(provider, 'chat');
    const model = new ProviderCompletionModel(provider, { ...ROUTING_GENERATION, systemPrompt: 'Route.' });

    const answer = await model.complete('Message: {message}', { message: 'who?' });

    expect(answer).toBe('people_lookup');
    expect(chat).toHaveBeenCalledWith(
      [
        { role: 'system', content: 'Route.' },
        { role: 'user', content: 'Message: who?' },
      ],
      { temperature: 0.3, maxTokens: 50 }
    );
  });

  it('lets model settings override the defaults', async () => {
    const model = await createCompletionModel({ type: 'mock', maxTokens: 10 }, ROUTING_GENERATION);
    const chat = vi.spyOn(MockProvider.prototype, 'chat');

    await model.complete('x');

    expect(model.providerName).toBe('mock');
    expect(chat).toHaveBeenCalledWith([{ role: 'user', content: 'x' }], { temperature: 0.3, maxTokens: 10 });
    chat.mockRestore();
  });
});
