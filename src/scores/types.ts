/**
 * Score types
 *
 * A score is a judgment attached to exactly one owner: a session, a trace or
 * a dataset run item. The owner is a tagged union rather than a free-form
 * (type, id) pair so every consumer handles the same fixed set of variants.
 */

export const SCOREABLE_TYPES = ['session', 'trace', 'dataset_run_item'] as const;
export type ScoreableType = typeof SCOREABLE_TYPES[number];

export type Scoreable =
  | { type: 'session'; id: string }
  | { type: 'trace'; id: string }
  | { type: 'dataset_run_item'; id: string };

export const SCORE_DATA_TYPES = ['numeric', 'boolean', 'categorical'] as const;
export type ScoreDataType = typeof SCORE_DATA_TYPES[number];

export const SCORE_SOURCES = ['programmatic', 'manual', 'llm_judge'] as const;
export type ScoreSource = typeof SCORE_SOURCES[number];

/** Values at or above this count as a pass */
export const PASS_THRESHOLD = 0.5;

export interface Score {
  id: string;
  scoreable: Scoreable;
  observationId: string | null;
  name: string;
  value: number;
  dataType: ScoreDataType;
  source: ScoreSource;
  comment: string | null;
  stringValue: string | null;
  createdBy: string | null;
  createdAt: string;
  updatedAt: string;
}

export interface ScoreInput {
  scoreable: Scoreable;
  name: string;
  value: number;
  dataType?: ScoreDataType;
  source?: ScoreSource;
  comment?: string | null;
  stringValue?: string | null;
  observationId?: string | null;
  createdBy?: string | null;
}

/** Average value per score name */
export type ScoreSummary = Record<string, number>;
