/**
 * API Test Harness: barrel exports
 */

export { ServerHarness, createStubAgent } from './server-harness.js';
export { ApiClient } from './api-client.js';

// Test utilities and constants
export { HTTP_STATUS, STUB_AGENT_NAME, TEST_SIZES } from './test-constants.js';
export { seedDataset, seedPromptVersions } from './test-utils.js';
export type { SeedDatasetOptions } from './test-utils.js';
