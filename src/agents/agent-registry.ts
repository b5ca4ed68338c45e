/**
 * Agent Registry
 *
 * Name → Agent lookup shared by every group chat session. Agents are kept
 * in registration order, and `getAvailableAgents()` lists the ones whose
 * `isAvailable` is true.
 */

import { z } from 'zod';
import type { Agent, AgentRegistry } from '../types.js';
import { AgentDefinitionSchema, type AgentDefinitionInput } from '../config/schema.js';
import { ValidationError } from '../errors/index.js';
import { createAgent, type AgentFactoryOptions } from './factory.js';
import { createComponentLogger } from '../observability/logger.js';

const log = createComponentLogger('AgentRegistry');

// =============================================================================
// EVENTS
// =============================================================================

export type RegistryEvent =
  | { type: 'agent.registered'; name: string; replaced: boolean }
  | { type: 'agent.removed'; name: string }
  | { type: 'agent.error'; name: string; error: string };

export type RegistryEventListener = (event: RegistryEvent) => void;

// =============================================================================
// REGISTRY
// =============================================================================

export class InMemoryAgentRegistry implements AgentRegistry {
  private agents = new Map<string, Agent>();
  private listeners: RegistryEventListener[] = [];
  private factoryOptions: AgentFactoryOptions;

  constructor(factoryOptions: AgentFactoryOptions = {}) {
    this.factoryOptions = factoryOptions;
  }

  getAgent(name: string): Agent | undefined {
    return this.agents.get(name);
  }

  getAvailableAgents(): string[] {
    return [...this.agents.values()].filter((agent) => agent.isAvailable).map((agent) => agent.name);
  }

  has(name: string): boolean {
    return this.agents.has(name);
  }

  list(): Agent[] {
    return [...this.agents.values()];
  }

  get size(): number {
    return this.agents.size;
  }

  /**
   * Register an agent, replacing any agent with the same name in place.
   */
  register(agent: Agent): void {
    const replaced = this.agents.has(agent.name);
    this.agents.set(agent.name, agent);
    this.emit({ type: 'agent.registered', name: agent.name, replaced });
  }

  unregister(name: string): boolean {
    const existed = this.agents.delete(name);
    if (existed) {
      this.emit({ type: 'agent.removed', name });
    }
    return existed;
  }

  /**
   * Build an agent from inline instructions through the provider factory
   * and register it.
   */
  async registerDefinition(definition: AgentDefinitionInput): Promise<Agent> {
    const parsed = AgentDefinitionSchema.safeParse(definition);
    if (!parsed.success) {
      throw ValidationError.fromZodError(parsed.error);
    }

    try {
      const agent = await createAgent(parsed.data, this.factoryOptions);
      this.register(agent);
      return agent;
    } catch (err) {
      const error = err instanceof Error ? err.message : String(err);
      this.emit({ type: 'agent.error', name: parsed.data.name, error });
      throw err;
    }
  }

  /**
   * Validate a list of definitions (e.g. the `agents` section of a config
   * file) and register them all. Nothing is registered if any is invalid.
   */
  async loadDefinitions(definitions: unknown): Promise<string[]> {
    const parsed = z.array(AgentDefinitionSchema).safeParse(definitions);
    if (!parsed.success) {
      throw ValidationError.fromZodError(parsed.error);
    }

    const names: string[] = [];
    for (const definition of parsed.data) {
      const agent = await this.registerDefinition(definition);
      names.push(agent.name);
    }
    return names;
  }

  clear(): void {
    for (const name of [...this.agents.keys()]) {
      this.unregister(name);
    }
  }

  /**
   * Subscribe to events.
   */
  on(listener: RegistryEventListener): () => void {
    this.listeners.push(listener);
    return () => {
      const idx = this.listeners.indexOf(listener);
      if (idx >= 0) this.listeners.splice(idx, 1);
    };
  }

  private emit(event: RegistryEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (err) {
        log.warn('Registry listener failed', {
          event: event.type,
          error: err instanceof Error ? err.message : String(err),
        });
      }
    }
  }
}

export function createAgentRegistry(factoryOptions?: AgentFactoryOptions): InMemoryAgentRegistry {
  return new InMemoryAgentRegistry(factoryOptions);
}
