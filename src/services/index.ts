/**
 * Service wiring
 *
 * Builds every repository and service once and hands them to the HTTP layer
 * and the entry point. Repositories share the database opened by initDb().
 */

import { AgentRegistry, getAgentRegistry } from '../agents/registry.js';
import type { AppConfig } from '../config/index.js';
import { DatasetRepository } from '../datasets/dataset-repository.js';
import { DatasetRunner } from '../datasets/dataset-runner.js';
import { DatasetRunnerJob } from '../datasets/dataset-runner-job.js';
import { DatasetItemRepository } from '../datasets/item-repository.js';
import { DatasetRunRepository } from '../datasets/run-repository.js';
import { DatasetRunService } from '../datasets/run-service.js';
import { EvaluatorRunner } from '../evaluation/evaluator-runner.js';
import { PromptCache } from '../prompts/cache.js';
import { PromptVersionStore } from '../prompts/store.js';
import { ScoreRepository } from '../scores/repository.js';
import { TraceStore } from '../tracing/trace-store.js';

export interface ServiceOptions {
  promptCache?: Partial<AppConfig['promptCache']>;
  prompts?: Partial<AppConfig['prompts']>;
  /** Defaults to the process-wide registry */
  agents?: AgentRegistry;
}

export interface Services {
  agents: AgentRegistry;
  prompts: PromptVersionStore;
  traces: TraceStore;
  scores: ScoreRepository;
  datasets: DatasetRepository;
  items: DatasetItemRepository;
  runRepository: DatasetRunRepository;
  runs: DatasetRunService;
  evaluators: EvaluatorRunner;
  runner: DatasetRunner;
  jobs: DatasetRunnerJob;
}

export function createServices(options: ServiceOptions = {}): Services {
  const agents = options.agents ?? getAgentRegistry();

  const cache = new PromptCache({
    ttlSeconds: options.promptCache?.ttlSeconds ?? 300,
    namespace: options.promptCache?.namespace ?? 'promptlab:prompt',
    monitoring: options.promptCache?.monitoring ?? true,
  });
  const prompts = new PromptVersionStore({
    cache,
    defaultState: options.prompts?.defaultState,
    allowProductionDeletion: options.prompts?.allowProductionDeletion,
    strictConfig: options.prompts?.configSchemaStrict,
    criticalPrompts: options.promptCache?.criticalPrompts,
  });

  const traces = new TraceStore();
  const datasets = new DatasetRepository(agents);
  const items = new DatasetItemRepository();
  const runRepository = new DatasetRunRepository();
  const scores = new ScoreRepository({
    session: id => traces.getSessionById(id),
    trace: id => traces.getTraceById(id),
    dataset_run_item: id => runRepository.findRunItemById(id),
  });

  const runs = new DatasetRunService({ datasets, items, runs: runRepository, scores });
  const evaluators = new EvaluatorRunner({ datasets, runs, scores });
  const runner = new DatasetRunner({ agents, datasets, items, runRepository, runs, traces });
  const jobs = new DatasetRunnerJob({ runner, runs });

  return { agents, prompts, traces, scores, datasets, items, runRepository, runs, evaluators, runner, jobs };
}
