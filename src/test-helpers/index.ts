/**
 * Test Helpers - Shared utilities for unit tests
 *
 * Centralized test utilities, constants, and builders to reduce
 * duplication and improve test maintainability.
 */

export * from './constants.js';
export * from './builders.js';
export * from './utils.js';
