/**
 * EvaluatorRunner - scores the run items of a dataset run
 *
 * Best-effort batch: each (run item, evaluator) pair is isolated, so one
 * failing evaluator never stops the others. Only succeeded run items are
 * scored; unknown evaluator types are skipped.
 */

import { z } from 'zod';
import { EvaluatorExecutionError } from '../errors.js';
import type { DatasetRepository } from '../datasets/dataset-repository.js';
import type { DatasetRunService } from '../datasets/run-service.js';
import type { ScoreRepository } from '../scores/repository.js';
import { createEvaluator, hasEvaluator } from './registry.js';
import type { EvaluationSummary, EvaluatorConfig } from './types.js';

export const DEFAULT_EVALUATOR_CONFIGS: readonly EvaluatorConfig[] = [{ type: 'exact_match' }];

const evaluatorConfigsSchema = z.array(z.object({ type: z.string() }).passthrough());

/**
 * Evaluator configs stored under a dataset's `metadata.evaluators`, or
 * undefined when absent or malformed.
 */
export function evaluatorConfigsFromMetadata(metadata: Record<string, unknown>): EvaluatorConfig[] | undefined {
  const result = evaluatorConfigsSchema.safeParse(metadata.evaluators);
  return result.success ? result.data : undefined;
}

export interface EvaluatorRunnerConfig {
  datasets: DatasetRepository;
  runs: DatasetRunService;
  scores: ScoreRepository;
}

export class EvaluatorRunner {
  private readonly datasets: DatasetRepository;
  private readonly runs: DatasetRunService;
  private readonly scores: ScoreRepository;

  constructor(config: EvaluatorRunnerConfig) {
    this.datasets = config.datasets;
    this.runs = config.runs;
    this.scores = config.scores;
  }

  run(runId: string, configs: readonly EvaluatorConfig[] = DEFAULT_EVALUATOR_CONFIGS): EvaluationSummary {
    const items = this.runs.runItems(runId);
    const summary: EvaluationSummary = {
      itemsEvaluated: 0,
      scoresWritten: 0,
      skippedItems: 0,
      failures: [],
    };

    const known = configs.filter(config => {
      if (hasEvaluator(config.type)) return true;
      console.warn(`[EvaluatorRunner] Skipping unknown evaluator type '${config.type}'`);
      return false;
    });

    for (const item of items) {
      if (item.status !== 'succeeded') {
        summary.skippedItems++;
        continue;
      }
      summary.itemsEvaluated++;

      for (const config of known) {
        try {
          const score = createEvaluator(config).call(item, this.scores);
          if (score) summary.scoresWritten++;
        } catch (error) {
          const failure = new EvaluatorExecutionError(config.type, item.id, error);
          console.error(`[EvaluatorRunner] ${failure.message}`);
          summary.failures.push({ runItemId: item.id, evaluatorType: config.type, error: failure.message });
        }
      }
    }

    console.log(
      `[EvaluatorRunner] Run ${runId}: ${summary.itemsEvaluated} items evaluated, ` +
      `${summary.scoresWritten} scores written, ${summary.failures.length} failures`
    );
    return summary;
  }

  /** Run with the evaluators configured on the run's dataset. */
  runForDataset(runId: string): EvaluationSummary {
    const run = this.runs.requireRun(runId);
    const dataset = this.datasets.requireById(run.datasetId);
    return this.run(runId, evaluatorConfigsFromMetadata(dataset.metadata) ?? DEFAULT_EVALUATOR_CONFIGS);
  }
}
