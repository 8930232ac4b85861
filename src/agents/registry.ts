// Agent Registry - maps agent names to the callables datasets run against

import { NotFoundError, ValidationError } from '../errors.js';
import type { Agent, AgentSummary } from './types.js';

/**
 * Built-in agents, always registered
 */
const BUILTIN_AGENTS: Agent[] = [
  {
    name: 'echo',
    description: 'Returns its input unchanged. Useful for checking datasets and evaluators.',
    async run(input) {
      return { output: input };
    },
  },
];

export class AgentRegistry {
  private agents: Map<string, Agent> = new Map();

  constructor(options: { builtins?: boolean } = {}) {
    if (options.builtins ?? true) {
      for (const agent of BUILTIN_AGENTS) {
        this.register(agent);
      }
    }
  }

  /**
   * Register an agent. Names are unique; re-registering requires unregister() first.
   */
  register(agent: Agent): void {
    const name = agent.name.trim();
    if (!name) {
      throw new ValidationError('Agent name is required');
    }
    if (this.agents.has(name)) {
      throw new ValidationError(`Agent '${name}' is already registered`);
    }
    this.agents.set(name, agent);
  }

  unregister(name: string): boolean {
    return this.agents.delete(name);
  }

  has(name: string): boolean {
    return this.agents.has(name);
  }

  get(name: string): Agent {
    const agent = this.agents.get(name);
    if (!agent) {
      throw new NotFoundError('Agent', name);
    }
    return agent;
  }

  list(): AgentSummary[] {
    return Array.from(this.agents.values())
      .map(agent => ({ name: agent.name, description: agent.description ?? '' }))
      .sort((a, b) => a.name.localeCompare(b.name));
  }
}

// Singleton instance
let registryInstance: AgentRegistry | null = null;

export function getAgentRegistry(): AgentRegistry {
  if (!registryInstance) {
    registryInstance = new AgentRegistry();
  }
  return registryInstance;
}
