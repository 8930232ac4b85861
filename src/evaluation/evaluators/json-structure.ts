import { z } from 'zod';
import type { RunItemView } from '../../datasets/types.js';
import { BaseEvaluator, baseOptionsSchema, parseEvaluatorOptions } from './base.js';

const jsonStructureOptionsSchema = baseOptionsSchema.extend({
  requiredKeys: z.array(z.string()).optional(),
});

type JsonStructureOptions = z.infer<typeof jsonStructureOptionsSchema>;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function outputAsObject(output: unknown): Record<string, unknown> {
  if (isPlainObject(output)) return output;
  if (typeof output === 'string') {
    try {
      const parsed: unknown = JSON.parse(output);
      return isPlainObject(parsed) ? parsed : {};
    } catch {
      return {};
    }
  }
  return {};
}

/**
 * Fraction of required keys present at the top level of the actual output.
 * Required keys default to the keys of an object-shaped expected output.
 */
export class JsonStructureEvaluator extends BaseEvaluator<JsonStructureOptions> {
  static readonly type = 'json_structure';
  readonly type = JsonStructureEvaluator.type;

  static create(options: unknown): JsonStructureEvaluator {
    return new JsonStructureEvaluator(parseEvaluatorOptions(JsonStructureEvaluator.type, jsonStructureOptionsSchema, options));
  }

  evaluate(item: RunItemView): number | null {
    const required = this.options.requiredKeys
      ?? (isPlainObject(item.expectedOutput) ? Object.keys(item.expectedOutput) : []);
    if (required.length === 0) return null;

    const output = outputAsObject(item.actualOutput);
    const present = required.filter(key => Object.prototype.hasOwnProperty.call(output, key)).length;
    return present / required.length;
  }
}
