/**
 * convene - multi-agent group chat orchestration
 *
 * @example
 * ```typescript
 * import { createAgentRegistry, createGroupChat } from 'convene';
 *
 * const registry = createAgentRegistry();
 * await registry.registerDefinition({ name: 'people_lookup', instructions: '...' });
 *
 * const chat = createGroupChat({ config: { name: 'support' }, registry });
 * chat.addParticipant('people_lookup');
 * const responses = await chat.send('Who is on call this week?');
 * ```
 */

export * from './types.js';
export * from './errors/index.js';
export * from './group-chat/index.js';
export * from './agents/index.js';
export * from './config/index.js';
export * from './sessions/index.js';

export {
  createProvider,
  detectProviderType,
} from './providers/provider.js';
export {
  ProviderCompletionModel,
  createCompletionModel,
  fillTemplate,
  ROUTING_GENERATION,
  SUMMARY_GENERATION,
  type CompletionModelOptions,
} from './providers/completion-model.js';
export {
  ProviderError,
  type LLMProvider,
  type ProviderMessage,
  type ChatOptions,
  type ChatResponse,
  type ProviderType,
  type ProviderConfig,
  type ProviderErrorCode,
  type GenerationSettings,
  type ModelSettings,
} from './providers/types.js';
export { resilientFetch, ResilientFetchError, type NetworkConfig } from './providers/resilient-fetch.js';

export {
  logger,
  configureLogger,
  createComponentLogger,
  StructuredLogger,
  ConsoleSink,
  MemorySink,
  FileSink,
  type LogLevel,
  type LogEntry,
  type LogSink,
} from './observability/logger.js';

export { buildRegistry, createChatFactory, DEMO_AGENTS, type ChatFactoryOptions } from './setup.js';
