/**
 * DatasetRunnerJob - background wrapper around DatasetRunner
 *
 * enqueue() returns at once and executes the run in the same process,
 * tracking the job's status by id.
 */

import { errorMessage } from '../errors.js';
import type { DatasetRunner } from './dataset-runner.js';
import { isFinished } from './run-service.js';
import type { DatasetRunService } from './run-service.js';
import type { DatasetRun } from './types.js';

export type JobStatus = 'running' | 'completed' | 'failed';

export interface JobRecord {
  jobId: string;
  runId: string;
  status: JobStatus;
  startedAt: Date;
  completedAt?: Date;
  /** false when the run was already finished or running */
  executed?: boolean;
  error?: string;
}

export interface DatasetRunnerJobConfig {
  runner: DatasetRunner;
  runs: DatasetRunService;
}

export class DatasetRunnerJob {
  private readonly runner: DatasetRunner;
  private readonly runs: DatasetRunService;
  private readonly jobs = new Map<string, JobRecord>();
  private readonly pending = new Set<Promise<void>>();

  constructor(config: DatasetRunnerJobConfig) {
    this.runner = config.runner;
    this.runs = config.runs;
  }

  /**
   * Execute the run unless it is already finished or running.
   * Returns the finished run, or null when skipped.
   */
  async perform(runId: string): Promise<DatasetRun | null> {
    const run = this.runs.requireRun(runId);
    if (isFinished(run) || run.status === 'running') {
      console.log(`[DatasetRunnerJob] Skipping run ${runId} (${run.status})`);
      return null;
    }
    return this.runner.execute(runId);
  }

  enqueue(runId: string): JobRecord {
    const job: JobRecord = {
      jobId: `run-${Date.now()}-${Math.random().toString(36).slice(2, 8)}`,
      runId,
      status: 'running',
      startedAt: new Date(),
    };
    this.jobs.set(job.jobId, job);

    const task = this.perform(runId)
      .then((result) => {
        job.status = 'completed';
        job.executed = result !== null;
        job.completedAt = new Date();
      })
      .catch((error: unknown) => {
        console.error(`[DatasetRunnerJob] Run ${runId} failed:`, error);
        job.status = 'failed';
        job.error = errorMessage(error);
        job.completedAt = new Date();
      })
      .finally(() => {
        this.pending.delete(task);
      });
    this.pending.add(task);

    return job;
  }

  getJob(jobId: string): JobRecord | undefined {
    return this.jobs.get(jobId);
  }

  listJobs(): JobRecord[] {
    return Array.from(this.jobs.values());
  }

  /** Resolves once every enqueued job has settled. */
  async drain(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all(this.pending);
    }
  }

  /**
   * Forget settled jobs that started more than `maxAgeMs` ago.
   */
  prune(maxAgeMs: number): number {
    const cutoff = Date.now() - maxAgeMs;
    let removed = 0;
    for (const [jobId, job] of this.jobs.entries()) {
      if (job.status !== 'running' && job.startedAt.getTime() < cutoff) {
        this.jobs.delete(jobId);
        removed++;
      }
    }
    return removed;
  }
}
