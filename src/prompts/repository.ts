/**
 * Prompt Version Repository
 *
 * Data access for prompt_versions. Business rules (state machine, config
 * validation, caching) live in PromptVersionStore.
 */

import { getDb, parseEnumColumn, parseJsonColumn } from '../db/index.js';
import { PROMPT_STATES } from './types.js';
import type { PromptConfig, PromptState, PromptSummary, PromptVersion } from './types.js';

interface PromptVersionRow {
  id: string;
  name: string;
  version: number;
  state: string;
  text: string;
  config: string;
  commitMessage: string | null;
  createdBy: string | null;
  createdAt: string;
  updatedAt: string;
}

function rowToPromptVersion(row: PromptVersionRow): PromptVersion {
  return {
    id: row.id,
    name: row.name,
    version: row.version,
    state: parseEnumColumn(PROMPT_STATES, row.state, 'prompt_versions.state'),
    text: row.text,
    config: parseJsonColumn<PromptConfig>(row.config, {}),
    commitMessage: row.commitMessage,
    createdBy: row.createdBy,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

export class PromptVersionRepository {
  insert(prompt: PromptVersion): void {
    getDb().rawRun(
      `INSERT INTO prompt_versions (id, name, version, state, text, config, commitMessage, createdBy, createdAt, updatedAt)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      [
        prompt.id,
        prompt.name,
        prompt.version,
        prompt.state,
        prompt.text,
        JSON.stringify(prompt.config),
        prompt.commitMessage,
        prompt.createdBy,
        prompt.createdAt,
        prompt.updatedAt,
      ]
    );
  }

  findById(id: string): PromptVersion | undefined {
    const rows = getDb().rawQuery('SELECT * FROM prompt_versions WHERE id = ?', [id]) as PromptVersionRow[];
    return rows.length > 0 ? rowToPromptVersion(rows[0]) : undefined;
  }

  findByVersion(name: string, version: number): PromptVersion | undefined {
    const rows = getDb().rawQuery(
      'SELECT * FROM prompt_versions WHERE name = ? AND version = ?',
      [name, version]
    ) as PromptVersionRow[];
    return rows.length > 0 ? rowToPromptVersion(rows[0]) : undefined;
  }

  /**
   * Highest version of `name` in `state`. For production there is at most one.
   */
  findInState(name: string, state: PromptState): PromptVersion | undefined {
    const rows = getDb().rawQuery(
      'SELECT * FROM prompt_versions WHERE name = ? AND state = ? ORDER BY version DESC LIMIT 1',
      [name, state]
    ) as PromptVersionRow[];
    return rows.length > 0 ? rowToPromptVersion(rows[0]) : undefined;
  }

  findByName(name: string): PromptVersion[] {
    const rows = getDb().rawQuery(
      'SELECT * FROM prompt_versions WHERE name = ? ORDER BY version DESC',
      [name]
    ) as PromptVersionRow[];
    return rows.map(rowToPromptVersion);
  }

  findLatest(name: string): PromptVersion | undefined {
    const rows = getDb().rawQuery(
      'SELECT * FROM prompt_versions WHERE name = ? ORDER BY version DESC LIMIT 1',
      [name]
    ) as PromptVersionRow[];
    return rows.length > 0 ? rowToPromptVersion(rows[0]) : undefined;
  }

  /** Closest lower (`before`) or higher (`after`) version of the same name. */
  findAdjacent(name: string, version: number, direction: 'before' | 'after'): PromptVersion | undefined {
    const sql = direction === 'before'
      ? 'SELECT * FROM prompt_versions WHERE name = ? AND version < ? ORDER BY version DESC LIMIT 1'
      : 'SELECT * FROM prompt_versions WHERE name = ? AND version > ? ORDER BY version ASC LIMIT 1';
    const rows = getDb().rawQuery(sql, [name, version]) as PromptVersionRow[];
    return rows.length > 0 ? rowToPromptVersion(rows[0]) : undefined;
  }

  namesInState(state: PromptState): string[] {
    const rows = getDb().rawQuery(
      'SELECT DISTINCT name FROM prompt_versions WHERE state = ? ORDER BY name ASC',
      [state]
    ) as Array<{ name: string }>;
    return rows.map(r => r.name);
  }

  maxVersion(name: string): number {
    const row = getDb().rawGet(
      'SELECT COALESCE(MAX(version), 0) AS maxVersion FROM prompt_versions WHERE name = ?',
      [name]
    ) as { maxVersion: number };
    return row.maxVersion;
  }

  summaries(): PromptSummary[] {
    const rows = getDb().rawQuery(`
      SELECT
        name,
        MAX(version) AS latestVersion,
        MAX(CASE WHEN state = 'production' THEN version END) AS productionVersion,
        COUNT(*) AS versionCount,
        MAX(updatedAt) AS updatedAt
      FROM prompt_versions
      GROUP BY name
      ORDER BY MAX(updatedAt) DESC, name ASC
    `) as PromptSummary[];
    return rows;
  }

  update(id: string, updates: Partial<Pick<PromptVersion, 'state' | 'text' | 'config' | 'commitMessage'>>, updatedAt: string): void {
    const setClauses: string[] = [];
    const values: unknown[] = [];

    for (const [key, value] of Object.entries(updates)) {
      if (value === undefined) continue;
      setClauses.push(`${key} = ?`);
      values.push(key === 'config' ? JSON.stringify(value) : value);
    }

    setClauses.push('updatedAt = ?');
    values.push(updatedAt, id);
    getDb().rawRun(`UPDATE prompt_versions SET ${setClauses.join(', ')} WHERE id = ?`, values);
  }

  delete(id: string): boolean {
    return getDb().rawRun('DELETE FROM prompt_versions WHERE id = ?', [id]) > 0;
  }
}
