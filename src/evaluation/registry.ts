/**
 * Evaluator registry
 *
 * Maps an evaluator type to the factory that builds it from options.
 * Built-in evaluators are registered when the module loads.
 */

import { ValidationError } from '../errors.js';
import { ContainsEvaluator } from './evaluators/contains.js';
import { ExactMatchEvaluator } from './evaluators/exact-match.js';
import { JsonStructureEvaluator } from './evaluators/json-structure.js';
import type { BaseEvaluator } from './evaluators/base.js';
import type { EvaluatorConfig } from './types.js';

export type EvaluatorFactory = (options: Record<string, unknown>) => BaseEvaluator;

const factories = new Map<string, EvaluatorFactory>([
  [ExactMatchEvaluator.type, options => ExactMatchEvaluator.create(options)],
  [ContainsEvaluator.type, options => ContainsEvaluator.create(options)],
  [JsonStructureEvaluator.type, options => JsonStructureEvaluator.create(options)],
]);

export function registerEvaluator(type: string, factory: EvaluatorFactory): void {
  if (factories.has(type)) {
    throw new ValidationError(`Evaluator type '${type}' is already registered`);
  }
  factories.set(type, factory);
}

export function unregisterEvaluator(type: string): boolean {
  return factories.delete(type);
}

export function hasEvaluator(type: string): boolean {
  return factories.has(type);
}

export function evaluatorTypes(): string[] {
  return [...factories.keys()];
}

export function createEvaluator(config: EvaluatorConfig): BaseEvaluator {
  const { type, ...options } = config;
  const factory = factories.get(type);
  if (!factory) {
    throw new ValidationError(`Unknown evaluator type '${type}'. Available: ${evaluatorTypes().join(', ')}`);
  }
  return factory(options);
}
