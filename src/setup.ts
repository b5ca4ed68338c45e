/**
 * Application Wiring
 *
 * Turns a loaded config into the pieces a host needs: an agent registry
 * built from the `agents` section, and a factory that creates one group
 * chat per session with the configured participants and models.
 */

import type { AgentDefinition, ValidatedUserConfig } from './config/schema.js';
import { resolveModelSettings } from './config/config-manager.js';
import { createAgentRegistry, type InMemoryAgentRegistry } from './agents/agent-registry.js';
import type { AgentFactoryOptions } from './agents/factory.js';
import { GroupChat } from './group-chat/group-chat.js';
import { createComponentLogger } from './observability/logger.js';

const log = createComponentLogger('Setup');

export const DEFAULT_CHAT_NAME = 'group_chat';

/**
 * Offline agents used when the config defines none.
 */
export const DEMO_AGENTS: AgentDefinition[] = [
  {
    name: 'people_lookup',
    instructions: 'You find people: owners, team members and who to ask about a topic.',
    enabled: true,
    model: { type: 'mock' },
  },
  {
    name: 'knowledge_finder',
    instructions: 'You answer questions from internal documentation, guides and tutorials.',
    enabled: true,
    model: { type: 'mock' },
  },
];

export async function buildRegistry(
  config: ValidatedUserConfig,
  factoryOptions: AgentFactoryOptions = {}
): Promise<InMemoryAgentRegistry> {
  const registry = createAgentRegistry(factoryOptions);
  const definitions = config.agents && config.agents.length > 0 ? config.agents : DEMO_AGENTS;
  if (definitions === DEMO_AGENTS) {
    log.info('No agents configured; using demo agents', { agents: DEMO_AGENTS.map((d) => d.name) });
  }
  await registry.loadDefinitions(definitions);
  return registry;
}

export interface ChatFactoryOptions {
  config: ValidatedUserConfig;
  registry: InMemoryAgentRegistry;
  /** Overrides `chat.maxTurns` */
  maxTurns?: number;
  env?: NodeJS.ProcessEnv;
}

/**
 * Session id → new GroupChat. Participants come from the `participants`
 * section, or every available agent with default options.
 */
export function createChatFactory(options: ChatFactoryOptions): (sessionId: string) => GroupChat {
  const { config, registry, maxTurns, env = process.env } = options;
  const warnings: string[] = [];
  const models = resolveModelSettings(config, env, warnings);
  for (const warning of warnings) {
    log.warn('Model settings', { warning });
  }

  return (sessionId) => {
    const chat = new GroupChat({
      config: {
        name: DEFAULT_CHAT_NAME,
        ...config.chat,
        ...(maxTurns !== undefined && { maxTurns }),
      },
      registry,
      routingModel: models.routing,
      summaryModel: models.summary,
      speakerHints: config.speakerHints,
      missingAgentPolicy: config.missingAgentPolicy,
      summarizer: config.summarizer,
      sessionId,
    });

    if (config.participants) {
      for (const { name, ...participant } of config.participants) {
        chat.addParticipant(name, participant);
      }
    } else {
      for (const name of registry.getAvailableAgents()) {
        chat.addParticipant(name);
      }
    }
    return chat;
  };
}
