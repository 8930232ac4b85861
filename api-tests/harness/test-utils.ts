/**
 * Shared test utilities for API integration tests
 *
 * Seed helpers go through the services rather than raw SQL so the seeded
 * rows pass the same validation the API applies.
 */

import type { Services } from '../../src/services/index.js';
import type { Dataset, DatasetItem } from '../../src/datasets/types.js';
import { STUB_AGENT_NAME } from './test-constants.js';

export interface SeedDatasetOptions {
  name?: string;
  agentReference?: string;
  /** Item inputs; each item's expected output is the upper-cased input */
  inputs?: string[];
  metadata?: Record<string, unknown>;
}

/**
 * Create a dataset bound to the stub agent with one item per input.
 */
export function seedDataset(
  services: Services,
  options: SeedDatasetOptions = {},
): { dataset: Dataset; items: DatasetItem[] } {
  const dataset = services.datasets.create({
    name: options.name ?? 'qa',
    agentReference: options.agentReference ?? STUB_AGENT_NAME,
    metadata: options.metadata,
  });
  const items = (options.inputs ?? ['one', 'two', 'three']).map(input =>
    services.items.create(dataset.id, { input, expectedOutput: input.toUpperCase() })
  );
  return { dataset, items };
}

/**
 * Create and promote `count` versions of a prompt; the last one ends up in
 * production.
 */
export function seedPromptVersions(services: Services, name: string, count: number): void {
  for (let i = 1; i <= count; i++) {
    services.prompts.createVersion({ name, text: `v${i}: Hello {{name}}`, promoteToProduction: true });
  }
}
