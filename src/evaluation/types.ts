/**
 * Evaluation types
 */

import type { ScoreDataType } from '../scores/types.js';
import type { RunItemView } from '../datasets/types.js';

/**
 * One entry of a dataset's `metadata.evaluators` list. Everything besides
 * `type` is passed to the evaluator as options.
 */
export interface EvaluatorConfig {
  type: string;
  [option: string]: unknown;
}

export interface Evaluator {
  readonly type: string;
  /** Score name written by this evaluator */
  readonly name: string;
  readonly dataType: ScoreDataType;
  /** Score for the item, or null when the item cannot be judged */
  evaluate(item: RunItemView): number | null;
}

export interface EvaluatorFailure {
  runItemId: string;
  evaluatorType: string;
  error: string;
}

export interface EvaluationSummary {
  itemsEvaluated: number;
  scoresWritten: number;
  /** Run items left unscored because they are pending or failed */
  skippedItems: number;
  failures: EvaluatorFailure[];
}
