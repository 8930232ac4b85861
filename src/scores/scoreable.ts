/**
 * Score owners
 *
 * One lookup per owner variant. resolveScoreable() dispatches on the tag and
 * fails with NotFoundError when the owner does not exist.
 */

import { NotFoundError } from '../errors.js';
import type { DatasetRunItem } from '../datasets/types.js';
import type { SessionRecord, TraceRecord } from '../tracing/types.js';
import type { Scoreable, ScoreableType } from './types.js';

export interface ScoreableLookups {
  session(id: string): SessionRecord | undefined;
  trace(id: string): TraceRecord | undefined;
  dataset_run_item(id: string): DatasetRunItem | undefined;
}

export type ResolvedScoreable =
  | { type: 'session'; record: SessionRecord }
  | { type: 'trace'; record: TraceRecord }
  | { type: 'dataset_run_item'; record: DatasetRunItem };

export function resolveScoreable(scoreable: Scoreable, lookups: ScoreableLookups): ResolvedScoreable {
  switch (scoreable.type) {
    case 'session': {
      const record = lookups.session(scoreable.id);
      if (!record) throw new NotFoundError('Session', scoreable.id);
      return { type: 'session', record };
    }
    case 'trace': {
      const record = lookups.trace(scoreable.id);
      if (!record) throw new NotFoundError('Trace', scoreable.id);
      return { type: 'trace', record };
    }
    case 'dataset_run_item': {
      const record = lookups.dataset_run_item(scoreable.id);
      if (!record) throw new NotFoundError('Dataset run item', scoreable.id);
      return { type: 'dataset_run_item', record };
    }
  }
}

export function makeScoreable(type: ScoreableType, id: string): Scoreable {
  return { type, id };
}
