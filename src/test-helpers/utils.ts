/**
 * Test Utilities
 *
 * Helper functions and patterns used across multiple test files.
 */

import { AgentRegistry } from '../agents/registry.js';
import type { Agent } from '../agents/types.js';
import { closeDb, initDb } from '../db/index.js';
import { initSchemas } from '../db/schema.js';
import { createServices } from '../services/index.js';
import type { ServiceOptions, Services } from '../services/index.js';
import { TEST_AGENT_NAME } from './constants.js';

/**
 * Reset to a fresh in-memory database with every table created.
 * Call from beforeEach.
 */
export async function setupTestDb(): Promise<void> {
  await closeDb();
  await initDb(':memory:');
  initSchemas();
}

/**
 * Agent that answers with `respond(input)`; throws when `respond` throws.
 */
export function createTestAgent(
  respond: (input: unknown) => unknown = input => input,
  name: string = TEST_AGENT_NAME,
): Agent {
  return {
    name,
    async run(input) {
      return { output: respond(input), usage: { inputTokens: 10, outputTokens: 5, cost: 0.01 } };
    },
  };
}

/**
 * Services wired to a private agent registry holding the built-ins plus
 * `agents` (a pass-through test agent by default).
 */
export function createTestServices(agents: Agent[] = [createTestAgent()], options: ServiceOptions = {}): Services {
  const registry = new AgentRegistry();
  for (const agent of agents) {
    registry.register(agent);
  }
  return createServices({ ...options, agents: registry });
}
