import { z } from 'zod';
import type { RunItemView } from '../../datasets/types.js';
import { isBlank, stringifyOutput } from '../../datasets/run-item.js';
import { BaseEvaluator, baseOptionsSchema, parseEvaluatorOptions } from './base.js';

const containsOptionsSchema = baseOptionsSchema.extend({
  keywords: z.array(z.string()).optional(),
});

type ContainsOptions = z.infer<typeof containsOptionsSchema>;

/**
 * Keywords taken from the expected output when no `keywords` option is set:
 * an array is the keyword list, an object contributes its `keywords` array
 * and a string is a single keyword.
 */
function keywordsFromExpected(expected: unknown): string[] {
  if (isBlank(expected)) return [];
  if (Array.isArray(expected)) return expected.map(stringifyOutput);
  if (typeof expected === 'string') return [expected];
  if (typeof expected === 'object' && expected !== null && 'keywords' in expected) {
    const { keywords } = expected;
    return Array.isArray(keywords) ? keywords.map(stringifyOutput) : [];
  }
  return [];
}

/**
 * Fraction of keywords found in the actual output, case-insensitively.
 */
export class ContainsEvaluator extends BaseEvaluator<ContainsOptions> {
  static readonly type = 'contains';
  readonly type = ContainsEvaluator.type;

  static create(options: unknown): ContainsEvaluator {
    return new ContainsEvaluator(parseEvaluatorOptions(ContainsEvaluator.type, containsOptionsSchema, options));
  }

  evaluate(item: RunItemView): number | null {
    const keywords = this.options.keywords ?? keywordsFromExpected(item.expectedOutput);
    if (keywords.length === 0) return null;

    const output = stringifyOutput(item.actualOutput);
    if (output.trim() === '') return 0.0;

    const haystack = output.toLowerCase();
    const matched = keywords.filter(keyword => haystack.includes(keyword.toLowerCase())).length;
    return matched / keywords.length;
  }
}
