/**
 * Dataset Item Repository
 *
 * Data access for dataset items. Input and expected output are arbitrary
 * JSON values stored as TEXT.
 */

import { v4 as uuid } from 'uuid';
import { getDb, parseEnumColumn, parseJsonColumn } from '../db/index.js';
import { NotFoundError, ValidationError } from '../errors.js';
import { isBlank } from './run-item.js';
import { DATASET_ITEM_STATUSES } from './types.js';
import type { CreateDatasetItemInput, DatasetItem, DatasetItemStatus, UpdateDatasetItemInput } from './types.js';

interface DatasetItemRow {
  id: string;
  datasetId: string;
  input: string;
  expectedOutput: string | null;
  status: string;
  sourceTraceId: string | null;
  metadata: string;
  createdAt: string;
  updatedAt: string;
}

function rowToDatasetItem(row: DatasetItemRow): DatasetItem {
  return {
    id: row.id,
    datasetId: row.datasetId,
    input: parseJsonColumn<unknown>(row.input, null),
    expectedOutput: parseJsonColumn<unknown>(row.expectedOutput, null),
    status: parseEnumColumn(DATASET_ITEM_STATUSES, row.status, 'dataset_items.status'),
    sourceTraceId: row.sourceTraceId,
    metadata: parseJsonColumn<Record<string, unknown>>(row.metadata, {}),
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

function serializeOptional(value: unknown): string | null {
  return value === undefined || value === null ? null : JSON.stringify(value);
}

export class DatasetItemRepository {
  create(datasetId: string, input: CreateDatasetItemInput): DatasetItem {
    this.requireDataset(datasetId);
    if (isBlank(input.input)) {
      throw new ValidationError('Input is required');
    }

    const now = new Date().toISOString();
    const item: DatasetItem = {
      id: uuid(),
      datasetId,
      input: input.input,
      expectedOutput: input.expectedOutput ?? null,
      status: input.status ?? 'active',
      sourceTraceId: input.sourceTraceId ?? null,
      metadata: input.metadata ?? {},
      createdAt: now,
      updatedAt: now,
    };

    getDb().rawRun(
      `INSERT INTO dataset_items (id, datasetId, input, expectedOutput, status, sourceTraceId, metadata, createdAt, updatedAt)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      [
        item.id,
        item.datasetId,
        JSON.stringify(item.input),
        serializeOptional(item.expectedOutput),
        item.status,
        item.sourceTraceId,
        JSON.stringify(item.metadata),
        item.createdAt,
        item.updatedAt,
      ]
    );

    return item;
  }

  findById(id: string): DatasetItem | undefined {
    const rows = getDb().rawQuery('SELECT * FROM dataset_items WHERE id = ?', [id]) as DatasetItemRow[];
    return rows.length > 0 ? rowToDatasetItem(rows[0]) : undefined;
  }

  requireById(id: string): DatasetItem {
    const item = this.findById(id);
    if (!item) {
      throw new NotFoundError('Dataset item', id);
    }
    return item;
  }

  /** Items of a dataset in creation order, optionally filtered by status. */
  findByDataset(datasetId: string, status?: DatasetItemStatus): DatasetItem[] {
    const rows = status
      ? getDb().rawQuery(
        'SELECT * FROM dataset_items WHERE datasetId = ? AND status = ? ORDER BY rowid ASC',
        [datasetId, status]
      ) as DatasetItemRow[]
      : getDb().rawQuery(
        'SELECT * FROM dataset_items WHERE datasetId = ? ORDER BY rowid ASC',
        [datasetId]
      ) as DatasetItemRow[];
    return rows.map(rowToDatasetItem);
  }

  activeItems(datasetId: string): DatasetItem[] {
    return this.findByDataset(datasetId, 'active');
  }

  countByDataset(datasetId: string, status?: DatasetItemStatus): number {
    const row = status
      ? getDb().rawGet('SELECT COUNT(*) AS cnt FROM dataset_items WHERE datasetId = ? AND status = ?', [datasetId, status])
      : getDb().rawGet('SELECT COUNT(*) AS cnt FROM dataset_items WHERE datasetId = ?', [datasetId]);
    return (row as { cnt: number }).cnt;
  }

  update(id: string, input: UpdateDatasetItemInput): DatasetItem {
    const current = this.requireById(id);
    if (input.input !== undefined && isBlank(input.input)) {
      throw new ValidationError('Input is required');
    }

    const next: DatasetItem = {
      ...current,
      input: input.input !== undefined ? input.input : current.input,
      expectedOutput: input.expectedOutput !== undefined ? input.expectedOutput : current.expectedOutput,
      status: input.status ?? current.status,
      sourceTraceId: input.sourceTraceId !== undefined ? input.sourceTraceId : current.sourceTraceId,
      metadata: input.metadata ?? current.metadata,
      updatedAt: new Date().toISOString(),
    };

    getDb().rawRun(
      `UPDATE dataset_items SET input = ?, expectedOutput = ?, status = ?, sourceTraceId = ?, metadata = ?, updatedAt = ? WHERE id = ?`,
      [
        JSON.stringify(next.input),
        serializeOptional(next.expectedOutput),
        next.status,
        next.sourceTraceId,
        JSON.stringify(next.metadata),
        next.updatedAt,
        id,
      ]
    );
    return next;
  }

  archive(id: string): DatasetItem {
    return this.update(id, { status: 'archived' });
  }

  activate(id: string): DatasetItem {
    return this.update(id, { status: 'active' });
  }

  delete(id: string): boolean {
    const db = getDb();
    return db.transaction(() => {
      db.rawRun(
        `DELETE FROM scores WHERE scoreableType = 'dataset_run_item' AND scoreableId IN (
           SELECT id FROM dataset_run_items WHERE datasetItemId = ?
         )`,
        [id]
      );
      return db.rawRun('DELETE FROM dataset_items WHERE id = ?', [id]) > 0;
    });
  }

  private requireDataset(datasetId: string): void {
    const row = getDb().rawGet('SELECT id FROM datasets WHERE id = ?', [datasetId]);
    if (!row) {
      throw new NotFoundError('Dataset', datasetId);
    }
  }
}
