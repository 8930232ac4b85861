/**
 * Score Repository
 *
 * Data access for scores. create() refuses a second score for the same
 * (owner, name, source); upsert() updates that score in place instead.
 */

import { v4 as uuid } from 'uuid';
import { z } from 'zod';
import { getDb, isUniqueViolation, parseEnumColumn } from '../db/index.js';
import { ValidationError } from '../errors.js';
import { roundTo } from '../utils/round.js';
import { makeScoreable, resolveScoreable } from './scoreable.js';
import type { ScoreableLookups } from './scoreable.js';
import { PASS_THRESHOLD, SCORE_DATA_TYPES, SCORE_SOURCES, SCOREABLE_TYPES } from './types.js';
import type { Score, ScoreInput, ScoreSource, ScoreSummary, Scoreable } from './types.js';

interface ScoreRow {
  id: string;
  scoreableType: string;
  scoreableId: string;
  observationId: string | null;
  name: string;
  value: number;
  dataType: string;
  source: string;
  comment: string | null;
  stringValue: string | null;
  createdBy: string | null;
  createdAt: string;
  updatedAt: string;
}

const scoreFieldsSchema = z.object({
  name: z.string({ required_error: 'Name is required', invalid_type_error: 'Name must be a string' })
    .trim()
    .min(1, 'Name is required'),
  value: z.number({ required_error: 'Value is required', invalid_type_error: 'Value must be a number' })
    .finite('Value must be a number'),
  dataType: z.enum(SCORE_DATA_TYPES, {
    errorMap: () => ({ message: `Data type must be one of: ${SCORE_DATA_TYPES.join(', ')}` }),
  }).default('numeric'),
  source: z.enum(SCORE_SOURCES, {
    errorMap: () => ({ message: `Source must be one of: ${SCORE_SOURCES.join(', ')}` }),
  }).default('programmatic'),
  comment: z.string().nullish(),
  stringValue: z.string().nullish(),
  observationId: z.string().nullish(),
  createdBy: z.string().nullish(),
});

type ScoreFields = z.infer<typeof scoreFieldsSchema>;

function rowToScore(row: ScoreRow): Score {
  return {
    id: row.id,
    scoreable: makeScoreable(parseEnumColumn(SCOREABLE_TYPES, row.scoreableType, 'scores.scoreableType'), row.scoreableId),
    observationId: row.observationId,
    name: row.name,
    value: row.value,
    dataType: parseEnumColumn(SCORE_DATA_TYPES, row.dataType, 'scores.dataType'),
    source: parseEnumColumn(SCORE_SOURCES, row.source, 'scores.source'),
    comment: row.comment,
    stringValue: row.stringValue,
    createdBy: row.createdBy,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

export function scorePassed(score: Pick<Score, 'value'>): boolean {
  return score.value >= PASS_THRESHOLD;
}

export function displayScoreValue(score: Pick<Score, 'value' | 'dataType' | 'stringValue'>): string {
  switch (score.dataType) {
    case 'boolean':
      return scorePassed(score) ? 'Pass' : 'Fail';
    case 'categorical':
      return score.stringValue || String(score.value);
    case 'numeric':
      return score.value.toFixed(2);
  }
}

export class ScoreRepository {
  /**
   * @param lookups When given, writes verify that the owner exists.
   */
  constructor(private readonly lookups?: ScoreableLookups) {}

  create(input: ScoreInput): Score {
    const fields = this.validate(input);
    const now = new Date().toISOString();
    const id = uuid();

    try {
      getDb().rawRun(
        `INSERT INTO scores (id, scoreableType, scoreableId, observationId, name, value, dataType, source, comment, stringValue, createdBy, createdAt, updatedAt)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
        [
          id,
          input.scoreable.type,
          input.scoreable.id,
          fields.observationId ?? null,
          fields.name,
          fields.value,
          fields.dataType,
          fields.source,
          fields.comment ?? null,
          fields.stringValue ?? null,
          fields.createdBy ?? null,
          now,
          now,
        ]
      );
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ValidationError(`Score '${fields.name}' from source '${fields.source}' already exists for this ${input.scoreable.type}`);
      }
      throw error;
    }

    return this.requireById(id);
  }

  /**
   * Insert, or update the existing score with the same (owner, name, source).
   */
  upsert(input: ScoreInput): Score {
    const fields = this.validate(input);
    const now = new Date().toISOString();

    getDb().rawRun(
      `INSERT INTO scores (id, scoreableType, scoreableId, observationId, name, value, dataType, source, comment, stringValue, createdBy, createdAt, updatedAt)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
       ON CONFLICT(scoreableType, scoreableId, name, source) DO UPDATE SET
         observationId = excluded.observationId,
         value = excluded.value,
         dataType = excluded.dataType,
         comment = excluded.comment,
         stringValue = excluded.stringValue,
         createdBy = excluded.createdBy,
         updatedAt = excluded.updatedAt`,
      [
        uuid(),
        input.scoreable.type,
        input.scoreable.id,
        fields.observationId ?? null,
        fields.name,
        fields.value,
        fields.dataType,
        fields.source,
        fields.comment ?? null,
        fields.stringValue ?? null,
        fields.createdBy ?? null,
        now,
        now,
      ]
    );

    const score = this.findByKey(input.scoreable, fields.name, fields.source);
    if (!score) {
      throw new Error(`Score '${fields.name}' missing after upsert`);
    }
    return score;
  }

  findById(id: string): Score | undefined {
    const rows = getDb().rawQuery('SELECT * FROM scores WHERE id = ?', [id]) as ScoreRow[];
    return rows.length > 0 ? rowToScore(rows[0]) : undefined;
  }

  findByKey(scoreable: Scoreable, name: string, source: ScoreSource): Score | undefined {
    const rows = getDb().rawQuery(
      'SELECT * FROM scores WHERE scoreableType = ? AND scoreableId = ? AND name = ? AND source = ?',
      [scoreable.type, scoreable.id, name, source]
    ) as ScoreRow[];
    return rows.length > 0 ? rowToScore(rows[0]) : undefined;
  }

  findForScoreable(scoreable: Scoreable): Score[] {
    const rows = getDb().rawQuery(
      'SELECT * FROM scores WHERE scoreableType = ? AND scoreableId = ? ORDER BY name ASC, createdAt ASC, rowid ASC',
      [scoreable.type, scoreable.id]
    ) as ScoreRow[];
    return rows.map(rowToScore);
  }

  /**
   * Most recent score with `name`, optionally from one source only.
   */
  scoreFor(scoreable: Scoreable, name: string, source?: ScoreSource): Score | undefined {
    const conditions = ['scoreableType = ?', 'scoreableId = ?', 'name = ?'];
    const params: unknown[] = [scoreable.type, scoreable.id, name];
    if (source) {
      conditions.push('source = ?');
      params.push(source);
    }

    const rows = getDb().rawQuery(
      `SELECT * FROM scores WHERE ${conditions.join(' AND ')} ORDER BY createdAt DESC, rowid DESC LIMIT 1`,
      params
    ) as ScoreRow[];
    return rows.length > 0 ? rowToScore(rows[0]) : undefined;
  }

  /** Average value per score name, rounded to 4 decimals. */
  summaryFor(scoreable: Scoreable): ScoreSummary {
    const rows = getDb().rawQuery(
      'SELECT name, AVG(value) AS average FROM scores WHERE scoreableType = ? AND scoreableId = ? GROUP BY name ORDER BY name ASC',
      [scoreable.type, scoreable.id]
    ) as Array<{ name: string; average: number }>;

    const summary: ScoreSummary = {};
    for (const row of rows) {
      summary[row.name] = roundTo(row.average, 4);
    }
    return summary;
  }

  /**
   * Scores attached to the run items of a dataset run.
   */
  findForDatasetRun(runId: string, filter: { name?: string; source?: ScoreSource } = {}): Score[] {
    const conditions = [`s.scoreableType = 'dataset_run_item'`, 'ri.datasetRunId = ?'];
    const params: unknown[] = [runId];
    if (filter.name) {
      conditions.push('s.name = ?');
      params.push(filter.name);
    }
    if (filter.source) {
      conditions.push('s.source = ?');
      params.push(filter.source);
    }

    const rows = getDb().rawQuery(
      `SELECT s.* FROM scores s
       JOIN dataset_run_items ri ON ri.id = s.scoreableId
       WHERE ${conditions.join(' AND ')}
       ORDER BY ri.rowid ASC, s.name ASC`,
      params
    ) as ScoreRow[];
    return rows.map(rowToScore);
  }

  count(): number {
    const row = getDb().rawGet('SELECT COUNT(*) AS cnt FROM scores') as { cnt: number };
    return row.cnt;
  }

  delete(id: string): boolean {
    return getDb().rawRun('DELETE FROM scores WHERE id = ?', [id]) > 0;
  }

  deleteForScoreable(scoreable: Scoreable): number {
    return getDb().rawRun(
      'DELETE FROM scores WHERE scoreableType = ? AND scoreableId = ?',
      [scoreable.type, scoreable.id]
    );
  }

  private requireById(id: string): Score {
    const score = this.findById(id);
    if (!score) {
      throw new Error(`Score ${id} missing after insert`);
    }
    return score;
  }

  private validate(input: ScoreInput): ScoreFields {
    const result = scoreFieldsSchema.safeParse(input);
    if (!result.success) {
      throw new ValidationError(result.error.issues.map(issue => issue.message));
    }
    if (this.lookups) {
      resolveScoreable(input.scoreable, this.lookups);
    }
    return result.data;
  }
}
