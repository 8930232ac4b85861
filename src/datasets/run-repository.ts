/**
 * Dataset Run Repository
 *
 * Data access for dataset_runs and dataset_run_items. Run items are always
 * returned in creation order (rowid), which is the order runs execute them.
 */

import { v4 as uuid } from 'uuid';
import { getDb, parseEnumColumn, parseJsonColumn } from '../db/index.js';
import { outputsMatch, runItemStatus } from './run-item.js';
import { DATASET_RUN_STATUSES } from './types.js';
import type { DatasetRun, DatasetRunItem, DatasetRunStatus, RunItemStatus, RunItemView } from './types.js';

interface DatasetRunRow {
  id: string;
  datasetId: string;
  name: string;
  description: string | null;
  status: string;
  totalItems: number;
  completedItems: number;
  failedItems: number;
  totalCost: number;
  totalTokens: number;
  metadata: string;
  createdAt: string;
  updatedAt: string;
}

interface RunItemRow {
  id: string;
  datasetRunId: string;
  datasetItemId: string;
  traceId: string | null;
  error: string | null;
  createdAt: string;
  updatedAt: string;
}

interface RunItemViewRow extends RunItemRow {
  itemInput: string;
  itemExpectedOutput: string | null;
  traceOutput: string | null;
  traceCost: number | null;
  traceTokens: number | null;
  traceDurationMs: number | null;
}

const RUN_ITEM_VIEW_SELECT = `
  SELECT ri.*,
    di.input AS itemInput,
    di.expectedOutput AS itemExpectedOutput,
    t.output AS traceOutput,
    t.totalCost AS traceCost,
    t.totalTokens AS traceTokens,
    t.durationMs AS traceDurationMs
  FROM dataset_run_items ri
  JOIN dataset_items di ON di.id = ri.datasetItemId
  LEFT JOIN traces t ON t.id = ri.traceId
`;

// SQL predicates matching runItemStatus()
const STATUS_PREDICATES: Record<RunItemStatus, string> = {
  failed: 'ri.error IS NOT NULL',
  succeeded: 'ri.traceId IS NOT NULL AND ri.error IS NULL',
  pending: 'ri.traceId IS NULL AND ri.error IS NULL',
};

function rowToRun(row: DatasetRunRow): DatasetRun {
  return {
    id: row.id,
    datasetId: row.datasetId,
    name: row.name,
    description: row.description,
    status: parseEnumColumn(DATASET_RUN_STATUSES, row.status, 'dataset_runs.status'),
    totalItems: row.totalItems,
    completedItems: row.completedItems,
    failedItems: row.failedItems,
    totalCost: row.totalCost,
    totalTokens: row.totalTokens,
    metadata: parseJsonColumn<Record<string, unknown>>(row.metadata, {}),
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

function rowToRunItem(row: RunItemRow): DatasetRunItem {
  return {
    id: row.id,
    datasetRunId: row.datasetRunId,
    datasetItemId: row.datasetItemId,
    traceId: row.traceId,
    error: row.error,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

function rowToRunItemView(row: RunItemViewRow): RunItemView {
  const item = rowToRunItem(row);
  const expectedOutput = parseJsonColumn<unknown>(row.itemExpectedOutput, null);
  const actualOutput = item.traceId ? parseJsonColumn<unknown>(row.traceOutput, null) : null;
  return {
    ...item,
    status: runItemStatus(item),
    input: parseJsonColumn<unknown>(row.itemInput, null),
    expectedOutput,
    actualOutput,
    cost: row.traceCost,
    tokens: row.traceTokens,
    durationMs: row.traceDurationMs,
    outputMatches: outputsMatch(expectedOutput, actualOutput),
  };
}

export class DatasetRunRepository {
  // ============================================================
  // Runs
  // ============================================================

  insertRun(run: DatasetRun): void {
    getDb().rawRun(
      `INSERT INTO dataset_runs (id, datasetId, name, description, status, totalItems, completedItems, failedItems, totalCost, totalTokens, metadata, createdAt, updatedAt)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      [
        run.id,
        run.datasetId,
        run.name,
        run.description,
        run.status,
        run.totalItems,
        run.completedItems,
        run.failedItems,
        run.totalCost,
        run.totalTokens,
        JSON.stringify(run.metadata),
        run.createdAt,
        run.updatedAt,
      ]
    );
  }

  findById(id: string): DatasetRun | undefined {
    const rows = getDb().rawQuery('SELECT * FROM dataset_runs WHERE id = ?', [id]) as DatasetRunRow[];
    return rows.length > 0 ? rowToRun(rows[0]) : undefined;
  }

  /** Runs of a dataset, newest first. */
  findByDataset(datasetId: string, status?: DatasetRunStatus): DatasetRun[] {
    const rows = status
      ? getDb().rawQuery(
        'SELECT * FROM dataset_runs WHERE datasetId = ? AND status = ? ORDER BY rowid DESC',
        [datasetId, status]
      ) as DatasetRunRow[]
      : getDb().rawQuery(
        'SELECT * FROM dataset_runs WHERE datasetId = ? ORDER BY rowid DESC',
        [datasetId]
      ) as DatasetRunRow[];
    return rows.map(rowToRun);
  }

  findLatestForDataset(datasetId: string): DatasetRun | undefined {
    const rows = getDb().rawQuery(
      'SELECT * FROM dataset_runs WHERE datasetId = ? ORDER BY rowid DESC LIMIT 1',
      [datasetId]
    ) as DatasetRunRow[];
    return rows.length > 0 ? rowToRun(rows[0]) : undefined;
  }

  update(id: string, updates: Partial<Omit<DatasetRun, 'id' | 'datasetId' | 'createdAt' | 'updatedAt'>>): void {
    const setClauses: string[] = [];
    const values: unknown[] = [];

    for (const [key, value] of Object.entries(updates)) {
      if (value === undefined) continue;
      setClauses.push(`${key} = ?`);
      values.push(key === 'metadata' ? JSON.stringify(value) : value);
    }

    setClauses.push('updatedAt = ?');
    values.push(new Date().toISOString(), id);
    getDb().rawRun(`UPDATE dataset_runs SET ${setClauses.join(', ')} WHERE id = ?`, values);
  }

  /**
   * Delete a run with its run items and their scores.
   */
  delete(id: string): boolean {
    const db = getDb();
    return db.transaction(() => {
      db.rawRun(
        `DELETE FROM scores WHERE scoreableType = 'dataset_run_item' AND scoreableId IN (
           SELECT id FROM dataset_run_items WHERE datasetRunId = ?
         )`,
        [id]
      );
      return db.rawRun('DELETE FROM dataset_runs WHERE id = ?', [id]) > 0;
    });
  }

  // ============================================================
  // Run items
  // ============================================================

  /**
   * Create the run item for (run, dataset item) unless it already exists.
   * Returns true when a row was inserted.
   */
  insertRunItemIfMissing(runId: string, datasetItemId: string): boolean {
    const now = new Date().toISOString();
    return getDb().rawRun(
      `INSERT INTO dataset_run_items (id, datasetRunId, datasetItemId, traceId, error, createdAt, updatedAt)
       VALUES (?, ?, ?, NULL, NULL, ?, ?)
       ON CONFLICT(datasetRunId, datasetItemId) DO NOTHING`,
      [uuid(), runId, datasetItemId, now, now]
    ) > 0;
  }

  findRunItemById(id: string): DatasetRunItem | undefined {
    const rows = getDb().rawQuery('SELECT * FROM dataset_run_items WHERE id = ?', [id]) as RunItemRow[];
    return rows.length > 0 ? rowToRunItem(rows[0]) : undefined;
  }

  findRunItems(runId: string): DatasetRunItem[] {
    const rows = getDb().rawQuery(
      'SELECT * FROM dataset_run_items WHERE datasetRunId = ? ORDER BY rowid ASC',
      [runId]
    ) as RunItemRow[];
    return rows.map(rowToRunItem);
  }

  countRunItems(runId: string): number {
    const row = getDb().rawGet('SELECT COUNT(*) AS cnt FROM dataset_run_items WHERE datasetRunId = ?', [runId]) as { cnt: number };
    return row.cnt;
  }

  updateRunItem(id: string, fields: { traceId: string | null; error: string | null }): void {
    getDb().rawRun(
      'UPDATE dataset_run_items SET traceId = ?, error = ?, updatedAt = ? WHERE id = ?',
      [fields.traceId, fields.error, new Date().toISOString(), id]
    );
  }

  findRunItemView(id: string): RunItemView | undefined {
    const rows = getDb().rawQuery(`${RUN_ITEM_VIEW_SELECT} WHERE ri.id = ?`, [id]) as RunItemViewRow[];
    return rows.length > 0 ? rowToRunItemView(rows[0]) : undefined;
  }

  findRunItemViews(runId: string, status?: RunItemStatus): RunItemView[] {
    const statusClause = status ? ` AND ${STATUS_PREDICATES[status]}` : '';
    const rows = getDb().rawQuery(
      `${RUN_ITEM_VIEW_SELECT} WHERE ri.datasetRunId = ?${statusClause} ORDER BY ri.rowid ASC`,
      [runId]
    ) as RunItemViewRow[];
    return rows.map(rowToRunItemView);
  }

  /**
   * Counters and trace totals recomputed from the run items.
   * Cost and tokens only count succeeded items.
   */
  computeMetrics(runId: string): { completedItems: number; failedItems: number; totalCost: number; totalTokens: number } {
    const row = getDb().rawGet(
      `SELECT
         COALESCE(SUM(CASE WHEN ${STATUS_PREDICATES.succeeded} THEN 1 ELSE 0 END), 0) AS completedItems,
         COALESCE(SUM(CASE WHEN ${STATUS_PREDICATES.failed} THEN 1 ELSE 0 END), 0) AS failedItems,
         COALESCE(SUM(CASE WHEN ${STATUS_PREDICATES.succeeded} THEN t.totalCost ELSE 0 END), 0) AS totalCost,
         COALESCE(SUM(CASE WHEN ${STATUS_PREDICATES.succeeded} THEN t.totalTokens ELSE 0 END), 0) AS totalTokens
       FROM dataset_run_items ri
       LEFT JOIN traces t ON t.id = ri.traceId
       WHERE ri.datasetRunId = ?`,
      [runId]
    ) as { completedItems: number; failedItems: number; totalCost: number; totalTokens: number };
    return row;
  }

  /** First creation and last update time across the run's items. */
  itemTimeSpan(runId: string): { firstCreatedAt: string | null; lastUpdatedAt: string | null } {
    return getDb().rawGet(
      'SELECT MIN(createdAt) AS firstCreatedAt, MAX(updatedAt) AS lastUpdatedAt FROM dataset_run_items WHERE datasetRunId = ?',
      [runId]
    ) as { firstCreatedAt: string | null; lastUpdatedAt: string | null };
  }
}
