/**
 * Run item helpers: derived status and output comparison.
 */

import { isDeepStrictEqual } from 'util';
import type { DatasetRunItem, RunItemStatus } from './types.js';

export function runItemStatus(item: Pick<DatasetRunItem, 'traceId' | 'error'>): RunItemStatus {
  if (item.error) return 'failed';
  if (item.traceId) return 'succeeded';
  return 'pending';
}

/**
 * null, undefined, false, whitespace-only strings, and empty arrays or objects.
 */
export function isBlank(value: unknown): boolean {
  if (value === null || value === undefined || value === false) return true;
  if (typeof value === 'string') return value.trim() === '';
  if (Array.isArray(value)) return value.length === 0;
  if (typeof value === 'object') return Object.keys(value).length === 0;
  return false;
}

/**
 * Strings holding JSON are parsed so '{"a":1}' and { a: 1 } compare equal;
 * other strings are trimmed.
 */
export function normalizeOutput(value: unknown): unknown {
  if (typeof value !== 'string') return value;
  try {
    return JSON.parse(value);
  } catch {
    return value.trim();
  }
}

/**
 * Structural equality of expected and actual output after normalisation.
 * Object key order does not matter. null when either side is blank.
 */
export function outputsMatch(expected: unknown, actual: unknown): boolean | null {
  if (isBlank(expected) || isBlank(actual)) return null;
  return isDeepStrictEqual(normalizeOutput(expected), normalizeOutput(actual));
}

/**
 * Text form of an output for substring checks: strings as-is, everything
 * else as JSON.
 */
export function stringifyOutput(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'string') return value;
  return JSON.stringify(value);
}
