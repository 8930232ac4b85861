/**
 * Tracing database schema setup
 */

import { getDb } from '../db/index.js';

export function initTracingSchema(): void {
  const db = getDb();

  db.rawExec(`
    CREATE TABLE IF NOT EXISTS sessions (
      id TEXT PRIMARY KEY,
      userId TEXT,
      metadata TEXT NOT NULL DEFAULT '{}',
      createdAt TEXT NOT NULL
    )
  `);

  db.rawExec(`
    CREATE TABLE IF NOT EXISTS traces (
      id TEXT PRIMARY KEY,
      sessionId TEXT REFERENCES sessions(id) ON DELETE CASCADE,
      name TEXT NOT NULL,
      input TEXT,
      output TEXT,
      metadata TEXT NOT NULL DEFAULT '{}',
      tags TEXT NOT NULL DEFAULT '[]',
      status TEXT NOT NULL DEFAULT 'running' CHECK(status IN ('running', 'completed', 'error')),
      error TEXT,
      startedAt TEXT NOT NULL,
      completedAt TEXT,
      durationMs INTEGER,
      totalCost REAL NOT NULL DEFAULT 0,
      totalTokens INTEGER NOT NULL DEFAULT 0
    )
  `);

  db.rawExec(`
    CREATE INDEX IF NOT EXISTS idx_traces_session ON traces(sessionId, startedAt);
    CREATE INDEX IF NOT EXISTS idx_traces_started ON traces(startedAt DESC);
  `);
}
