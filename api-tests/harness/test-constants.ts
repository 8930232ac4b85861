/**
 * Shared test constants for API integration tests
 */

// ---------------------------------------------------------------------------
// HTTP Status Codes
// ---------------------------------------------------------------------------

export const HTTP_STATUS = {
  OK: 200,
  CREATED: 201,
  ACCEPTED: 202,
  BAD_REQUEST: 400,
  NOT_FOUND: 404,
  CONFLICT: 409,
  UNPROCESSABLE_ENTITY: 422,
  INTERNAL_SERVER_ERROR: 500,
} as const;

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

export const STUB_AGENT_NAME = 'stub-agent';

export const TEST_SIZES = {
  /** Items in a seeded dataset */
  SMALL: 3,
  /** Datasets for pagination tests */
  MEDIUM: 12,
} as const;
