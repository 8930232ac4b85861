/**
 * Prompt config validation
 *
 * Model parameters are stored as a free-form map but the well-known keys are
 * type and range checked. Numeric strings (as submitted by forms) are coerced
 * before checking. A known key set to null is left unchecked. Unknown keys
 * pass through unless strict mode is on.
 */

import { z } from 'zod';
import type { PromptConfig } from './types.js';

const NUMERIC_STRING = /^-?\d+(?:\.\d+)?$/;

function coerceNumeric(value: unknown): unknown {
  return typeof value === 'string' && NUMERIC_STRING.test(value.trim()) ? Number(value) : value;
}

function float(min: number, max: number) {
  const range = `must be between ${min} and ${max}`;
  return z.preprocess(
    coerceNumeric,
    z.number({ invalid_type_error: 'must be a number' }).min(min, range).max(max, range),
  );
}

function integer(min?: number, max?: number) {
  let schema = z.number({ invalid_type_error: 'must be an integer' }).int('must be an integer');
  if (min !== undefined && max !== undefined) {
    const range = `must be between ${min} and ${max}`;
    schema = schema.min(min, range).max(max, range);
  }
  return z.preprocess(coerceNumeric, schema);
}

const promptConfigSchema = z.object({
  temperature: float(0, 2).nullish(),
  max_tokens: integer(1, 100_000).nullish(),
  top_p: float(0, 1).nullish(),
  frequency_penalty: float(-2, 2).nullish(),
  presence_penalty: float(-2, 2).nullish(),
  stop_sequences: z.array(
    z.string({ invalid_type_error: 'must be a string' }),
    { invalid_type_error: 'must be an array' },
  ).nullish(),
  model: z.string({ invalid_type_error: 'must be a string' }).nullish(),
  response_format: z.record(z.unknown(), { invalid_type_error: 'must be an object' }).nullish(),
  seed: integer().nullish(),
  stream: z.boolean({ invalid_type_error: 'must be a boolean' }).nullish(),
}).passthrough();

export const KNOWN_CONFIG_KEYS: readonly string[] = Object.keys(promptConfigSchema.shape);

export type ConfigValidationResult =
  | { valid: true; config: PromptConfig }
  | { valid: false; errors: string[] };

function formatPath(path: Array<string | number>): string {
  return path
    .map((segment, i) => (typeof segment === 'number' ? `[${segment}]` : i === 0 ? segment : `.${segment}`))
    .join('');
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate and coerce a prompt config. `null`/`undefined` are an empty config.
 */
export function validatePromptConfig(config: unknown, options: { strict?: boolean } = {}): ConfigValidationResult {
  if (config === null || config === undefined) {
    return { valid: true, config: {} };
  }
  if (!isPlainObject(config)) {
    return { valid: false, errors: ['Config must be an object'] };
  }

  const errors: string[] = [];

  if (options.strict) {
    const unknownKeys = Object.keys(config).filter(key => !KNOWN_CONFIG_KEYS.includes(key));
    if (unknownKeys.length > 0) {
      errors.push(`Unknown configuration keys: ${unknownKeys.join(', ')}`);
    }
  }

  const result = promptConfigSchema.safeParse(config);
  if (!result.success) {
    for (const issue of result.error.issues) {
      errors.push(`${formatPath(issue.path)} ${issue.message}`);
    }
  }

  if (errors.length > 0 || !result.success) {
    return { valid: false, errors };
  }
  return { valid: true, config: result.data };
}
