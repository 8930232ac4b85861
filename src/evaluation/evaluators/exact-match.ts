import type { RunItemView } from '../../datasets/types.js';
import { isBlank } from '../../datasets/run-item.js';
import type { ScoreDataType } from '../../scores/types.js';
import { BaseEvaluator, baseOptionsSchema, parseEvaluatorOptions } from './base.js';

/**
 * 1 when the actual output matches the expected output, 0 otherwise.
 */
export class ExactMatchEvaluator extends BaseEvaluator {
  static readonly type = 'exact_match';
  readonly type = ExactMatchEvaluator.type;
  override readonly dataType: ScoreDataType = 'boolean';

  static create(options: unknown): ExactMatchEvaluator {
    return new ExactMatchEvaluator(parseEvaluatorOptions(ExactMatchEvaluator.type, baseOptionsSchema, options));
  }

  evaluate(item: RunItemView): number | null {
    if (isBlank(item.expectedOutput)) return null;
    return item.outputMatches ? 1.0 : 0.0;
  }
}
