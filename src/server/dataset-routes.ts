/**
 * Dataset API Routes
 *
 * Datasets, their items, runs, run items, evaluation and the manual review
 * queue. Creating a run initialises its items and queues its execution.
 */

import type { Context, Hono } from 'hono';
import { z } from 'zod';
import { NotFoundError } from '../errors.js';
import type { Services } from '../services/index.js';
import { DATASET_ITEM_STATUSES, DATASET_RUN_STATUSES } from '../datasets/types.js';
import type { Dataset, DatasetItem, DatasetRun } from '../datasets/types.js';
import {
  MANUAL_REVIEW_SCORE,
  failureRate,
  pendingItemsCount,
  progressPercentage,
  successRate,
} from '../datasets/run-service.js';
import { parseBody, parseEnumParam, parsePage, route } from './http.js';

export interface DatasetRoutesConfig {
  services: Services;
  perPage: number;
}

const metadataSchema = z.record(z.unknown());

const createDatasetSchema = z.object({
  name: z.string(),
  description: z.string().nullish(),
  agentReference: z.string(),
  metadata: metadataSchema.optional(),
});

const updateDatasetSchema = createDatasetSchema.partial();

const createItemSchema = z.object({
  input: z.unknown(),
  expectedOutput: z.unknown().optional(),
  status: z.enum(DATASET_ITEM_STATUSES).optional(),
  sourceTraceId: z.string().nullish(),
  metadata: metadataSchema.optional(),
});

const updateItemSchema = createItemSchema.partial();

const createRunSchema = z.object({
  name: z.string(),
  description: z.string().nullish(),
  metadata: metadataSchema.optional(),
  /** Queue execution right away */
  execute: z.boolean().default(true),
});

const evaluateSchema = z.object({
  evaluators: z.array(z.object({ type: z.string() }).passthrough()).optional(),
});

const RUN_ITEM_STATUSES = ['pending', 'succeeded', 'failed'] as const;

export function setupDatasetRoutes(app: Hono, config: DatasetRoutesConfig): void {
  const { services, perPage } = config;
  const { agents, datasets, items, runs, evaluators, jobs, scores } = services;

  // ========================================================================
  // Lookup helpers
  // ========================================================================

  function datasetParam(c: Context): Dataset {
    return datasets.requireById(c.req.param('id'));
  }

  function itemParam(c: Context): DatasetItem {
    const dataset = datasetParam(c);
    const item = items.findById(c.req.param('itemId'));
    if (!item || item.datasetId !== dataset.id) {
      throw new NotFoundError('Dataset item', c.req.param('itemId'));
    }
    return item;
  }

  function runParam(c: Context): DatasetRun {
    const dataset = datasetParam(c);
    const run = runs.getRun(c.req.param('runId'));
    if (!run || run.datasetId !== dataset.id) {
      throw new NotFoundError('Dataset run', c.req.param('runId'));
    }
    return run;
  }

  function runStats(run: DatasetRun) {
    return {
      progressPercentage: progressPercentage(run),
      successRate: successRate(run),
      failureRate: failureRate(run),
      pendingItemsCount: pendingItemsCount(run),
      durationSeconds: runs.durationSeconds(run.id),
      scoreSummary: runs.scoreSummary(run.id),
      passRate: runs.passRate(run.id),
      itemsWithScoresCount: runs.itemsWithScoresCount(run.id),
      itemsWithoutScoresCount: runs.itemsWithoutScoresCount(run.id),
    };
  }

  // ========================================================================
  // Agents and jobs
  // ========================================================================

  app.get('/api/agents', route('List agents', (c) => {
    return c.json({ agents: agents.list() });
  }));

  app.get('/api/jobs/:jobId', route('Get job', (c) => {
    const job = jobs.getJob(c.req.param('jobId'));
    if (!job) {
      throw new NotFoundError('Job', c.req.param('jobId'));
    }
    return c.json(job);
  }));

  // ========================================================================
  // Datasets
  // ========================================================================

  app.get('/api/datasets', route('List datasets', (c) => {
    const page = parsePage(c, perPage);
    return c.json({
      datasets: datasets.findAll({ limit: page.limit, offset: page.offset }),
      total: datasets.count(),
      page: page.page,
      perPage: page.perPage,
    });
  }));

  app.post('/api/datasets', route('Create dataset', async (c) => {
    const body = await parseBody(c, createDatasetSchema);
    return c.json({ dataset: datasets.create(body) }, 201);
  }));

  app.get('/api/datasets/:id', route('Get dataset', (c) => {
    const dataset = datasetParam(c);
    return c.json({
      dataset,
      itemCount: items.countByDataset(dataset.id),
      activeItemCount: items.countByDataset(dataset.id, 'active'),
      lastRun: runs.lastRun(dataset.id) ?? null,
    });
  }));

  app.patch('/api/datasets/:id', route('Update dataset', async (c) => {
    const body = await parseBody(c, updateDatasetSchema);
    return c.json({ dataset: datasets.update(c.req.param('id'), body) });
  }));

  app.delete('/api/datasets/:id', route('Delete dataset', (c) => {
    const dataset = datasetParam(c);
    datasets.delete(dataset.id);
    return c.json({ success: true });
  }));

  // ========================================================================
  // Items
  // ========================================================================

  app.get('/api/datasets/:id/items', route('List dataset items', (c) => {
    const dataset = datasetParam(c);
    const status = parseEnumParam(DATASET_ITEM_STATUSES, c.req.query('status'), 'status');
    return c.json({ items: items.findByDataset(dataset.id, status) });
  }));

  app.post('/api/datasets/:id/items', route('Create dataset item', async (c) => {
    const body = await parseBody(c, createItemSchema);
    return c.json({ item: items.create(c.req.param('id'), body) }, 201);
  }));

  app.get('/api/datasets/:id/items/:itemId', route('Get dataset item', (c) => {
    return c.json({ item: itemParam(c) });
  }));

  app.patch('/api/datasets/:id/items/:itemId', route('Update dataset item', async (c) => {
    const item = itemParam(c);
    const body = await parseBody(c, updateItemSchema);
    return c.json({ item: items.update(item.id, body) });
  }));

  app.post('/api/datasets/:id/items/:itemId/archive', route('Archive dataset item', (c) => {
    return c.json({ item: items.archive(itemParam(c).id) });
  }));

  app.post('/api/datasets/:id/items/:itemId/activate', route('Activate dataset item', (c) => {
    return c.json({ item: items.activate(itemParam(c).id) });
  }));

  app.delete('/api/datasets/:id/items/:itemId', route('Delete dataset item', (c) => {
    items.delete(itemParam(c).id);
    return c.json({ success: true });
  }));

  // ========================================================================
  // Runs
  // ========================================================================

  app.get('/api/datasets/:id/runs', route('List dataset runs', (c) => {
    const dataset = datasetParam(c);
    const status = parseEnumParam(DATASET_RUN_STATUSES, c.req.query('status'), 'status');
    return c.json({ runs: runs.listRuns(dataset.id, status) });
  }));

  app.post('/api/datasets/:id/runs', route('Create dataset run', async (c) => {
    const body = await parseBody(c, createRunSchema);
    const created = runs.createRun(c.req.param('id'), body);
    const run = runs.initializeRunItems(created.id);
    const job = body.execute ? jobs.enqueue(run.id) : null;
    return c.json({ run, jobId: job?.jobId ?? null }, 201);
  }));

  app.get('/api/datasets/:id/runs/:runId', route('Get dataset run', (c) => {
    const run = runParam(c);
    return c.json({ run, stats: runStats(run) });
  }));

  app.delete('/api/datasets/:id/runs/:runId', route('Delete dataset run', (c) => {
    runs.deleteRun(runParam(c).id);
    return c.json({ success: true });
  }));

  app.post('/api/datasets/:id/runs/:runId/execute', route('Execute dataset run', (c) => {
    const job = jobs.enqueue(runParam(c).id);
    return c.json(job, 202);
  }));

  app.post('/api/datasets/:id/runs/:runId/evaluate', route('Evaluate dataset run', async (c) => {
    const run = runParam(c);
    const body = await parseBody(c, evaluateSchema);
    const summary = body.evaluators
      ? evaluators.run(run.id, body.evaluators)
      : evaluators.runForDataset(run.id);
    return c.json({ summary, itemsWithScoresCount: runs.itemsWithScoresCount(run.id) });
  }));

  app.get('/api/datasets/:id/runs/:runId/items', route('List run items', (c) => {
    const run = runParam(c);
    const status = parseEnumParam(RUN_ITEM_STATUSES, c.req.query('status'), 'status');
    return c.json({ items: runs.runItems(run.id, status) });
  }));

  // Next succeeded item still lacking a manual review score
  app.get('/api/datasets/:id/runs/:runId/review', route('Review queue', (c) => {
    const run = runParam(c);
    const progress = runs.reviewProgress(run.id);
    const item = runs.nextItemToReview(run.id, c.req.query('after'));
    if (!item) {
      return c.json({ item: null, progress, message: 'All items have been reviewed' });
    }

    const existingManual = scores.scoreFor({ type: 'dataset_run_item', id: item.id }, MANUAL_REVIEW_SCORE, 'manual');
    return c.json({ item, progress, existingManual: existingManual ?? null });
  }));
}
