/**
 * Test Data Builders
 *
 * Factory functions for creating common test objects with sensible defaults.
 * Reduces duplication and improves test readability.
 */

import type { AgentContext } from '../agents/types.js';
import type { RunItemView } from '../datasets/types.js';
import type { PromptVersion } from '../prompts/types.js';
import {
  TEST_DATASET_ITEM_ID,
  TEST_RUN_ID,
  TEST_RUN_ITEM_ID,
  TEST_SESSION_ID,
  TEST_TIMESTAMP,
  TEST_TRACE_ID,
} from './constants.js';

/**
 * Build a PromptVersion for cache and store tests.
 * Override any field by passing partial object.
 */
export function buildPromptVersion(overrides?: Partial<PromptVersion>): PromptVersion {
  return {
    id: 'prompt-1',
    name: 'greeting',
    version: 1,
    state: 'draft',
    text: 'Hello {{name}}',
    config: {},
    commitMessage: null,
    createdBy: null,
    createdAt: TEST_TIMESTAMP,
    updatedAt: TEST_TIMESTAMP,
    ...overrides,
  };
}

export function buildAgentContext(overrides?: Partial<AgentContext>): AgentContext {
  return {
    datasetRunId: TEST_RUN_ID,
    runItemId: TEST_RUN_ITEM_ID,
    datasetItemId: TEST_DATASET_ITEM_ID,
    sessionId: TEST_SESSION_ID,
    traceId: TEST_TRACE_ID,
    ...overrides,
  };
}

/**
 * Build a succeeded RunItemView for evaluator tests. `outputMatches` is
 * not derived from the outputs; set it when the test depends on it.
 */
export function buildRunItemView(overrides?: Partial<RunItemView>): RunItemView {
  return {
    id: TEST_RUN_ITEM_ID,
    datasetRunId: TEST_RUN_ID,
    datasetItemId: TEST_DATASET_ITEM_ID,
    traceId: TEST_TRACE_ID,
    error: null,
    createdAt: TEST_TIMESTAMP,
    updatedAt: TEST_TIMESTAMP,
    status: 'succeeded',
    input: 'question',
    expectedOutput: 'answer',
    actualOutput: 'answer',
    cost: 0,
    tokens: 0,
    durationMs: 0,
    outputMatches: true,
    ...overrides,
  };
}
