/**
 * Test Constants
 *
 * Centralized constants used across test files to avoid magic numbers
 * and improve maintainability.
 */

// Default Test Values
export const DEFAULT_TEST_PORT = 3000;
export const ALTERNATIVE_TEST_PORT = 8080;
export const DEFAULT_BIND_ADDRESS = '127.0.0.1';

// Test Score Values
export const PERFECT_SCORE = 1.0;
export const HALF_SCORE = 0.5;
export const ZERO_SCORE = 0.0;

// Test Identifiers
export const TEST_RUN_ID = 'run-1';
export const TEST_RUN_ITEM_ID = 'run-item-1';
export const TEST_DATASET_ITEM_ID = 'item-1';
export const TEST_SESSION_ID = 'session-1';
export const TEST_TRACE_ID = 'trace-1';
export const TEST_TIMESTAMP = '2025-01-01T00:00:00.000Z';

// Agent used by dataset tests; registered by createTestServices()
export const TEST_AGENT_NAME = 'test-agent';
