/**
 * Base evaluator
 *
 * Subclasses implement evaluate(); call() turns the value into a
 * programmatic score on the run item, replacing an earlier score with the
 * same name.
 */

import { z } from 'zod';
import { ValidationError } from '../../errors.js';
import type { RunItemView } from '../../datasets/types.js';
import type { ScoreRepository } from '../../scores/repository.js';
import type { Score, ScoreDataType } from '../../scores/types.js';
import type { Evaluator } from '../types.js';

export const baseOptionsSchema = z.object({
  name: z.string().trim().min(1, 'must not be blank').optional(),
  comment: z.string().optional(),
});

export type BaseEvaluatorOptions = z.infer<typeof baseOptionsSchema>;

/**
 * Parse evaluator options, reporting zod issues as a ValidationError
 * prefixed with the evaluator type.
 */
export function parseEvaluatorOptions<T extends z.ZodTypeAny>(type: string, schema: T, options: unknown): z.infer<T> {
  const result = schema.safeParse(options ?? {});
  if (!result.success) {
    throw new ValidationError(result.error.issues.map(issue => {
      const path = issue.path.join('.');
      return path ? `${type}: ${path} ${issue.message}` : `${type}: ${issue.message}`;
    }));
  }
  return result.data;
}

export abstract class BaseEvaluator<O extends BaseEvaluatorOptions = BaseEvaluatorOptions> implements Evaluator {
  abstract readonly type: string;
  readonly dataType: ScoreDataType = 'numeric';

  constructor(protected readonly options: O) {}

  get name(): string {
    return this.options.name ?? this.type;
  }

  abstract evaluate(item: RunItemView): number | null;

  /**
   * Score the item. Returns null, writing nothing, when the item has no
   * trace or the evaluator has no opinion.
   */
  call(item: RunItemView, scores: ScoreRepository): Score | null {
    if (!item.traceId) return null;

    const value = this.evaluate(item);
    if (value === null) return null;

    return scores.upsert({
      scoreable: { type: 'dataset_run_item', id: item.id },
      name: this.name,
      value,
      dataType: this.dataType,
      source: 'programmatic',
      comment: this.options.comment ?? null,
    });
  }
}
