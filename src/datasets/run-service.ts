/**
 * Dataset Run Service
 *
 * Owns the run lifecycle (pending -> running -> completed | failed), run item
 * initialisation, metric roll-ups, score aggregates and the manual review
 * queue.
 */

import { v4 as uuid } from 'uuid';
import { isUniqueViolation } from '../db/index.js';
import { NotFoundError, ValidationError, errorMessage, errorName } from '../errors.js';
import type { ScoreRepository } from '../scores/repository.js';
import { PASS_THRESHOLD } from '../scores/types.js';
import type { ScoreSummary } from '../scores/types.js';
import { StateMachine } from '../utils/state-machine.js';
import { roundTo } from '../utils/round.js';
import type { DatasetRepository } from './dataset-repository.js';
import type { DatasetItemRepository } from './item-repository.js';
import type { DatasetRunRepository } from './run-repository.js';
import type {
  CreateRunInput,
  DatasetRun,
  DatasetRunEvent,
  DatasetRunStatus,
  ReviewProgress,
  RunItemStatus,
  RunItemView,
} from './types.js';

/** Score name and source the review queue looks for */
export const MANUAL_REVIEW_SCORE = 'manual';

export const datasetRunLifecycle = new StateMachine<DatasetRunStatus, DatasetRunEvent>('dataset run', {
  start: { from: ['pending'], to: 'running' },
  complete: { from: ['running'], to: 'completed' },
  fail: { from: ['pending', 'running'], to: 'failed' },
});

// ============================================================
// Derived run metrics
// ============================================================

function percentOfTotal(run: DatasetRun, count: number): number {
  if (run.totalItems === 0) return 0;
  return roundTo((count / run.totalItems) * 100, 1);
}

export function progressPercentage(run: DatasetRun): number {
  return percentOfTotal(run, run.completedItems + run.failedItems);
}

export function successRate(run: DatasetRun): number {
  return percentOfTotal(run, run.completedItems);
}

export function failureRate(run: DatasetRun): number {
  return percentOfTotal(run, run.failedItems);
}

export function pendingItemsCount(run: DatasetRun): number {
  return run.totalItems - run.completedItems - run.failedItems;
}

export function isFinished(run: Pick<DatasetRun, 'status'>): boolean {
  return run.status === 'completed' || run.status === 'failed';
}

export function isInProgress(run: Pick<DatasetRun, 'status'>): boolean {
  return run.status === 'pending' || run.status === 'running';
}

export interface DatasetRunServiceDeps {
  datasets: DatasetRepository;
  items: DatasetItemRepository;
  runs: DatasetRunRepository;
  scores: ScoreRepository;
}

export class DatasetRunService {
  private readonly datasets: DatasetRepository;
  private readonly items: DatasetItemRepository;
  private readonly runs: DatasetRunRepository;
  private readonly scores: ScoreRepository;

  constructor(deps: DatasetRunServiceDeps) {
    this.datasets = deps.datasets;
    this.items = deps.items;
    this.runs = deps.runs;
    this.scores = deps.scores;
  }

  // ============================================================
  // Runs
  // ============================================================

  createRun(datasetId: string, input: CreateRunInput): DatasetRun {
    this.datasets.requireById(datasetId);
    const name = (input.name ?? '').trim();
    if (!name) {
      throw new ValidationError('Name is required');
    }

    const now = new Date().toISOString();
    const run: DatasetRun = {
      id: uuid(),
      datasetId,
      name,
      description: input.description ?? null,
      status: 'pending',
      totalItems: 0,
      completedItems: 0,
      failedItems: 0,
      totalCost: 0,
      totalTokens: 0,
      metadata: input.metadata ?? {},
      createdAt: now,
      updatedAt: now,
    };

    try {
      this.runs.insertRun(run);
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ValidationError(`Run name '${name}' has already been taken for this dataset`);
      }
      throw error;
    }
    return run;
  }

  getRun(runId: string): DatasetRun | undefined {
    return this.runs.findById(runId);
  }

  requireRun(runId: string): DatasetRun {
    const run = this.runs.findById(runId);
    if (!run) {
      throw new NotFoundError('Dataset run', runId);
    }
    return run;
  }

  listRuns(datasetId: string, status?: DatasetRunStatus): DatasetRun[] {
    return this.runs.findByDataset(datasetId, status);
  }

  lastRun(datasetId: string): DatasetRun | undefined {
    return this.runs.findLatestForDataset(datasetId);
  }

  deleteRun(runId: string): boolean {
    return this.runs.delete(runId);
  }

  /**
   * Create a run item for every active dataset item that lacks one, then
   * set totalItems to the run item count. Calling it again adds nothing.
   */
  initializeRunItems(runId: string): DatasetRun {
    const run = this.requireRun(runId);
    let created = 0;
    for (const item of this.items.activeItems(run.datasetId)) {
      if (this.runs.insertRunItemIfMissing(run.id, item.id)) created++;
    }

    const totalItems = this.runs.countRunItems(run.id);
    this.runs.update(run.id, { totalItems });
    if (created > 0) {
      console.log(`[DatasetRun] Initialized ${created} run items for run ${run.id}`);
    }
    return this.requireRun(run.id);
  }

  /** Recompute counters and trace totals from the run items. */
  updateMetrics(runId: string): DatasetRun {
    this.requireRun(runId);
    this.runs.update(runId, this.runs.computeMetrics(runId));
    return this.requireRun(runId);
  }

  // ============================================================
  // State transitions
  // ============================================================

  start(runId: string): DatasetRun {
    return this.transition(runId, 'start');
  }

  complete(runId: string): DatasetRun {
    return this.transition(runId, 'complete');
  }

  /**
   * Mark a run failed, recording the error in its metadata.
   */
  fail(runId: string, error?: unknown, extraMetadata: Record<string, unknown> = {}): DatasetRun {
    const run = this.requireRun(runId);
    const status = datasetRunLifecycle.fire(run.status, 'fail');
    const metadata = error === undefined
      ? { ...run.metadata, ...extraMetadata }
      : {
        ...run.metadata,
        error: errorMessage(error),
        errorClass: errorName(error),
        failedAt: new Date().toISOString(),
        ...extraMetadata,
      };
    this.runs.update(runId, { status, metadata });
    return this.requireRun(runId);
  }

  private transition(runId: string, event: DatasetRunEvent): DatasetRun {
    const run = this.requireRun(runId);
    const status = datasetRunLifecycle.fire(run.status, event);
    this.runs.update(runId, { status });
    return this.requireRun(runId);
  }

  /**
   * Seconds from the first run item's creation to the last run item update.
   * null until the run has finished or when it has no items.
   */
  durationSeconds(runId: string): number | null {
    const run = this.requireRun(runId);
    if (!isFinished(run)) return null;

    const span = this.runs.itemTimeSpan(runId);
    if (!span.firstCreatedAt || !span.lastUpdatedAt) return null;
    const ms = Date.parse(span.lastUpdatedAt) - Date.parse(span.firstCreatedAt);
    return roundTo(ms / 1000, 1);
  }

  // ============================================================
  // Run items
  // ============================================================

  runItems(runId: string, status?: RunItemStatus): RunItemView[] {
    this.requireRun(runId);
    return this.runs.findRunItemViews(runId, status);
  }

  runItem(runItemId: string): RunItemView {
    const view = this.runs.findRunItemView(runItemId);
    if (!view) {
      throw new NotFoundError('Dataset run item', runItemId);
    }
    return view;
  }

  // ============================================================
  // Score aggregation
  // ============================================================

  averageScore(runId: string, name: string): number | null {
    const scores = this.scores.findForDatasetRun(runId, { name });
    if (scores.length === 0) return null;
    const total = scores.reduce((sum, score) => sum + score.value, 0);
    return roundTo(total / scores.length, 4);
  }

  scoreSummary(runId: string): ScoreSummary {
    const grouped = new Map<string, number[]>();
    for (const score of this.scores.findForDatasetRun(runId)) {
      const values = grouped.get(score.name) ?? [];
      values.push(score.value);
      grouped.set(score.name, values);
    }

    const summary: ScoreSummary = {};
    for (const name of [...grouped.keys()].sort()) {
      const values = grouped.get(name) ?? [];
      summary[name] = roundTo(values.reduce((sum, v) => sum + v, 0) / values.length, 4);
    }
    return summary;
  }

  /** Percent of scores at or above the pass threshold; null when there are none. */
  passRate(runId: string, name?: string): number | null {
    const scores = this.scores.findForDatasetRun(runId, name ? { name } : {});
    if (scores.length === 0) return null;
    const passed = scores.filter(score => score.value >= PASS_THRESHOLD).length;
    return roundTo((passed / scores.length) * 100, 1);
  }

  itemsWithScoresCount(runId: string): number {
    const scored = new Set(this.scores.findForDatasetRun(runId).map(score => score.scoreable.id));
    return scored.size;
  }

  itemsWithoutScoresCount(runId: string): number {
    return this.requireRun(runId).totalItems - this.itemsWithScoresCount(runId);
  }

  // ============================================================
  // Review queue
  // ============================================================

  /**
   * First succeeded run item, in creation order, without a manual review
   * score. With `afterItemId` the search starts after that item and wraps
   * around to the beginning when nothing later is unscored.
   */
  nextItemToReview(runId: string, afterItemId?: string): RunItemView | undefined {
    const succeeded = this.runItems(runId, 'succeeded');
    const reviewed = this.reviewedItemIds(runId);
    const unreviewed = (item: RunItemView) => !reviewed.has(item.id);

    if (afterItemId) {
      const index = succeeded.findIndex(item => item.id === afterItemId);
      const later = index >= 0 ? succeeded.slice(index + 1) : succeeded;
      const next = later.find(unreviewed);
      if (next) return next;
    }
    return succeeded.find(unreviewed);
  }

  reviewProgress(runId: string): ReviewProgress {
    const succeeded = this.runItems(runId, 'succeeded');
    const reviewed = this.reviewedItemIds(runId);
    return {
      scored: succeeded.filter(item => reviewed.has(item.id)).length,
      total: succeeded.length,
    };
  }

  private reviewedItemIds(runId: string): Set<string> {
    const scores = this.scores.findForDatasetRun(runId, { name: MANUAL_REVIEW_SCORE, source: 'manual' });
    return new Set(scores.map(score => score.scoreable.id));
  }
}
