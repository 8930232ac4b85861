/**
 * Dataset database schema setup
 *
 * Creates datasets, dataset_items, dataset_runs and dataset_run_items.
 * Deleting a dataset cascades to its items and runs; deleting a run
 * cascades to its run items.
 */

import { getDb } from '../db/index.js';

export function initDatasetSchema(): void {
  const db = getDb();

  db.rawExec('PRAGMA foreign_keys = ON');

  db.rawExec(`
    CREATE TABLE IF NOT EXISTS datasets (
      id TEXT PRIMARY KEY,
      name TEXT NOT NULL UNIQUE,
      description TEXT,
      agentReference TEXT NOT NULL,
      metadata TEXT NOT NULL DEFAULT '{}',
      createdAt TEXT NOT NULL,
      updatedAt TEXT NOT NULL
    )
  `);

  db.rawExec(`
    CREATE TABLE IF NOT EXISTS dataset_items (
      id TEXT PRIMARY KEY,
      datasetId TEXT NOT NULL REFERENCES datasets(id) ON DELETE CASCADE,
      input TEXT NOT NULL,
      expectedOutput TEXT,
      status TEXT NOT NULL DEFAULT 'active' CHECK(status IN ('active', 'archived')),
      sourceTraceId TEXT,
      metadata TEXT NOT NULL DEFAULT '{}',
      createdAt TEXT NOT NULL,
      updatedAt TEXT NOT NULL
    )
  `);

  db.rawExec(`
    CREATE TABLE IF NOT EXISTS dataset_runs (
      id TEXT PRIMARY KEY,
      datasetId TEXT NOT NULL REFERENCES datasets(id) ON DELETE CASCADE,
      name TEXT NOT NULL,
      description TEXT,
      status TEXT NOT NULL DEFAULT 'pending' CHECK(status IN ('pending', 'running', 'completed', 'failed')),
      totalItems INTEGER NOT NULL DEFAULT 0,
      completedItems INTEGER NOT NULL DEFAULT 0,
      failedItems INTEGER NOT NULL DEFAULT 0,
      totalCost REAL NOT NULL DEFAULT 0,
      totalTokens INTEGER NOT NULL DEFAULT 0,
      metadata TEXT NOT NULL DEFAULT '{}',
      createdAt TEXT NOT NULL,
      updatedAt TEXT NOT NULL,
      UNIQUE(datasetId, name)
    )
  `);

  db.rawExec(`
    CREATE TABLE IF NOT EXISTS dataset_run_items (
      id TEXT PRIMARY KEY,
      datasetRunId TEXT NOT NULL REFERENCES dataset_runs(id) ON DELETE CASCADE,
      datasetItemId TEXT NOT NULL REFERENCES dataset_items(id) ON DELETE CASCADE,
      traceId TEXT,
      error TEXT,
      createdAt TEXT NOT NULL,
      updatedAt TEXT NOT NULL,
      UNIQUE(datasetRunId, datasetItemId)
    )
  `);

  db.rawExec(`
    CREATE INDEX IF NOT EXISTS idx_dataset_items_dataset ON dataset_items(datasetId, status);
    CREATE INDEX IF NOT EXISTS idx_dataset_runs_dataset ON dataset_runs(datasetId, createdAt DESC);
    CREATE INDEX IF NOT EXISTS idx_dataset_run_items_run ON dataset_run_items(datasetRunId);
  `);
}
