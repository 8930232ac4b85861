/**
 * Evaluation
 *
 * Programmatic evaluators and the runner that applies them to the run items
 * of a dataset run.
 */

export * from './types.js';
export { BaseEvaluator, baseOptionsSchema, parseEvaluatorOptions, type BaseEvaluatorOptions } from './evaluators/base.js';
export { ExactMatchEvaluator } from './evaluators/exact-match.js';
export { ContainsEvaluator } from './evaluators/contains.js';
export { JsonStructureEvaluator } from './evaluators/json-structure.js';
export {
  createEvaluator,
  evaluatorTypes,
  hasEvaluator,
  registerEvaluator,
  unregisterEvaluator,
  type EvaluatorFactory,
} from './registry.js';
export {
  EvaluatorRunner,
  DEFAULT_EVALUATOR_CONFIGS,
  evaluatorConfigsFromMetadata,
  type EvaluatorRunnerConfig,
} from './evaluator-runner.js';
