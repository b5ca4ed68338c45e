export { ChatAgent, type ChatAgentOptions } from './chat-agent.js';
export { createAgent, resolveAgentModel, type AgentFactoryOptions, type ProviderFactory } from './factory.js';
export {
  InMemoryAgentRegistry,
  createAgentRegistry,
  type RegistryEvent,
  type RegistryEventListener,
} from './agent-registry.js';
