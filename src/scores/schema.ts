/**
 * Score database schema setup
 *
 * (scoreableType, scoreableId, name, source) is unique: re-scoring the same
 * dimension from the same source updates the existing row.
 */

import { getDb } from '../db/index.js';

export function initScoreSchema(): void {
  const db = getDb();

  db.rawExec(`
    CREATE TABLE IF NOT EXISTS scores (
      id TEXT PRIMARY KEY,
      scoreableType TEXT NOT NULL CHECK(scoreableType IN ('session', 'trace', 'dataset_run_item')),
      scoreableId TEXT NOT NULL,
      observationId TEXT,
      name TEXT NOT NULL,
      value REAL NOT NULL,
      dataType TEXT NOT NULL DEFAULT 'numeric' CHECK(dataType IN ('numeric', 'boolean', 'categorical')),
      source TEXT NOT NULL DEFAULT 'programmatic' CHECK(source IN ('programmatic', 'manual', 'llm_judge')),
      comment TEXT,
      stringValue TEXT,
      createdBy TEXT,
      createdAt TEXT NOT NULL,
      updatedAt TEXT NOT NULL,
      UNIQUE(scoreableType, scoreableId, name, source)
    )
  `);

  db.rawExec(`
    CREATE INDEX IF NOT EXISTS idx_scores_scoreable ON scores(scoreableType, scoreableId);
  `);
}
