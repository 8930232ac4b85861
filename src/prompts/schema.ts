/**
 * Prompt version database schema setup
 *
 * Creates the prompt_versions table. The partial unique index on
 * (name) WHERE state = 'production' keeps at most one live version per name.
 */

import { getDb } from '../db/index.js';

export function initPromptSchema(): void {
  const db = getDb();

  db.rawExec(`
    CREATE TABLE IF NOT EXISTS prompt_versions (
      id TEXT PRIMARY KEY,
      name TEXT NOT NULL,
      version INTEGER NOT NULL CHECK(version > 0),
      state TEXT NOT NULL DEFAULT 'draft' CHECK(state IN ('draft', 'production', 'archived')),
      text TEXT NOT NULL,
      config TEXT NOT NULL DEFAULT '{}',
      commitMessage TEXT,
      createdBy TEXT,
      createdAt TEXT NOT NULL,
      updatedAt TEXT NOT NULL,
      UNIQUE(name, version)
    )
  `);

  db.rawExec(`
    CREATE UNIQUE INDEX IF NOT EXISTS idx_prompt_versions_single_production
      ON prompt_versions(name) WHERE state = 'production';
    CREATE INDEX IF NOT EXISTS idx_prompt_versions_name_state
      ON prompt_versions(name, state, version DESC);
  `);
}
