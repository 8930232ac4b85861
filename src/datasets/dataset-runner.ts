/**
 * DatasetRunner - executes a dataset run against its agent
 *
 * Run items are processed one at a time in creation order. Each item gets
 * its own session and trace; an agent error fails that item only. Anything
 * thrown outside the per-item handling fails the whole run and is rethrown.
 */

import { errorMessage, errorName } from '../errors.js';
import type { AgentRegistry } from '../agents/registry.js';
import type { Agent } from '../agents/types.js';
import type { TraceStore } from '../tracing/trace-store.js';
import type { DatasetRepository } from './dataset-repository.js';
import type { DatasetItemRepository } from './item-repository.js';
import type { DatasetRunRepository } from './run-repository.js';
import { isInProgress } from './run-service.js';
import type { DatasetRunService } from './run-service.js';
import type { Dataset, DatasetRun, DatasetRunItem } from './types.js';

export const DATASET_TRACE_NAME = 'dataset_evaluation';

export interface DatasetRunnerConfig {
  agents: AgentRegistry;
  datasets: DatasetRepository;
  items: DatasetItemRepository;
  runRepository: DatasetRunRepository;
  runs: DatasetRunService;
  traces: TraceStore;
}

export class DatasetRunner {
  private readonly agents: AgentRegistry;
  private readonly datasets: DatasetRepository;
  private readonly items: DatasetItemRepository;
  private readonly runRepository: DatasetRunRepository;
  private readonly runs: DatasetRunService;
  private readonly traces: TraceStore;

  constructor(config: DatasetRunnerConfig) {
    this.agents = config.agents;
    this.datasets = config.datasets;
    this.items = config.items;
    this.runRepository = config.runRepository;
    this.runs = config.runs;
    this.traces = config.traces;
  }

  async execute(runId: string): Promise<DatasetRun> {
    let run = this.runs.start(runId);
    console.log(`[DatasetRunner] Starting run ${run.id} (${run.name})`);

    try {
      const dataset = this.datasets.requireById(run.datasetId);
      const agent = this.agents.get(dataset.agentReference);

      for (const runItem of this.runRepository.findRunItems(run.id)) {
        await this.processItem(dataset, run, agent, runItem);
      }

      run = this.runs.updateMetrics(run.id);
      run = run.failedItems === run.totalItems
        ? this.runs.fail(run.id)
        : this.runs.complete(run.id);

      console.log(
        `[DatasetRunner] Run ${run.id} ${run.status}: ` +
        `${run.completedItems} succeeded, ${run.failedItems} failed of ${run.totalItems}`
      );
      return run;
    } catch (error) {
      console.error(`[DatasetRunner] Run ${runId} failed:`, error);
      this.markFailed(runId, error);
      throw error;
    }
  }

  private async processItem(dataset: Dataset, run: DatasetRun, agent: Agent, runItem: DatasetRunItem): Promise<void> {
    const item = this.items.requireById(runItem.datasetItemId);
    const session = this.traces.createSession({
      userId: `dataset_run_${run.id}`,
      metadata: {
        datasetId: dataset.id,
        datasetRunId: run.id,
        datasetItemId: item.id,
        source: DATASET_TRACE_NAME,
      },
    });
    const trace = this.traces.startTrace({
      sessionId: session.id,
      name: DATASET_TRACE_NAME,
      input: item.input,
      metadata: {
        datasetId: dataset.id,
        datasetName: dataset.name,
        datasetRunId: run.id,
        datasetRunName: run.name,
        datasetItemId: item.id,
        agent: agent.name,
      },
      tags: [DATASET_TRACE_NAME, dataset.name, run.name],
    });

    try {
      const response = await agent.run(item.input, {
        datasetRunId: run.id,
        runItemId: runItem.id,
        datasetItemId: item.id,
        sessionId: session.id,
        traceId: trace.id,
      });
      this.traces.endTrace(trace.id, {
        output: response.output,
        usage: response.usage,
        metadata: response.metadata,
      });
      this.runRepository.updateRunItem(runItem.id, { traceId: trace.id, error: null });
    } catch (error) {
      const message = errorMessage(error);
      const name = errorName(error);
      this.traces.endTrace(trace.id, {
        error: message,
        metadata: { error: message, errorClass: name },
      });
      this.runRepository.updateRunItem(runItem.id, { traceId: trace.id, error: `${name}: ${message}` });
      console.warn(`[DatasetRunner] Item ${item.id} failed: ${name}: ${message}`);
    }
  }

  private markFailed(runId: string, error: unknown): void {
    const run = this.runs.getRun(runId);
    if (run && isInProgress(run)) {
      this.runs.fail(runId, error);
    }
  }
}
