/**
 * Dataset Repository
 *
 * Data access for datasets. A dataset names the agent its items are run
 * against; the name must be registered with the AgentRegistry.
 */

import { v4 as uuid } from 'uuid';
import { getDb, isUniqueViolation, parseJsonColumn } from '../db/index.js';
import { NotFoundError, ValidationError } from '../errors.js';
import type { AgentRegistry } from '../agents/registry.js';
import type { CreateDatasetInput, Dataset, UpdateDatasetInput } from './types.js';

interface DatasetRow {
  id: string;
  name: string;
  description: string | null;
  agentReference: string;
  metadata: string;
  createdAt: string;
  updatedAt: string;
}

function rowToDataset(row: DatasetRow): Dataset {
  return {
    id: row.id,
    name: row.name,
    description: row.description,
    agentReference: row.agentReference,
    metadata: parseJsonColumn<Record<string, unknown>>(row.metadata, {}),
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

export class DatasetRepository {
  constructor(private readonly agents: AgentRegistry) {}

  create(input: CreateDatasetInput): Dataset {
    const name = (input.name ?? '').trim();
    const agentReference = (input.agentReference ?? '').trim();
    this.validate(name, agentReference);

    const now = new Date().toISOString();
    const dataset: Dataset = {
      id: uuid(),
      name,
      description: input.description ?? null,
      agentReference,
      metadata: input.metadata ?? {},
      createdAt: now,
      updatedAt: now,
    };

    try {
      getDb().rawRun(
        `INSERT INTO datasets (id, name, description, agentReference, metadata, createdAt, updatedAt)
         VALUES (?, ?, ?, ?, ?, ?, ?)`,
        [dataset.id, dataset.name, dataset.description, dataset.agentReference, JSON.stringify(dataset.metadata), dataset.createdAt, dataset.updatedAt]
      );
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ValidationError(`Dataset name '${name}' has already been taken`);
      }
      throw error;
    }

    return dataset;
  }

  findById(id: string): Dataset | undefined {
    const rows = getDb().rawQuery('SELECT * FROM datasets WHERE id = ?', [id]) as DatasetRow[];
    return rows.length > 0 ? rowToDataset(rows[0]) : undefined;
  }

  findByName(name: string): Dataset | undefined {
    const rows = getDb().rawQuery('SELECT * FROM datasets WHERE name = ?', [name]) as DatasetRow[];
    return rows.length > 0 ? rowToDataset(rows[0]) : undefined;
  }

  requireById(id: string): Dataset {
    const dataset = this.findById(id);
    if (!dataset) {
      throw new NotFoundError('Dataset', id);
    }
    return dataset;
  }

  findAll(options?: { limit?: number; offset?: number }): Dataset[] {
    const rows = getDb().rawQuery(
      'SELECT * FROM datasets ORDER BY createdAt DESC, rowid DESC LIMIT ? OFFSET ?',
      [options?.limit ?? -1, options?.offset ?? 0]
    ) as DatasetRow[];
    return rows.map(rowToDataset);
  }

  count(): number {
    const row = getDb().rawGet('SELECT COUNT(*) AS cnt FROM datasets') as { cnt: number };
    return row.cnt;
  }

  update(id: string, input: UpdateDatasetInput): Dataset {
    const current = this.requireById(id);
    const next: Dataset = {
      ...current,
      name: input.name !== undefined ? input.name.trim() : current.name,
      description: input.description !== undefined ? input.description : current.description,
      agentReference: input.agentReference !== undefined ? input.agentReference.trim() : current.agentReference,
      metadata: input.metadata ?? current.metadata,
      updatedAt: new Date().toISOString(),
    };
    this.validate(next.name, next.agentReference);

    try {
      getDb().rawRun(
        'UPDATE datasets SET name = ?, description = ?, agentReference = ?, metadata = ?, updatedAt = ? WHERE id = ?',
        [next.name, next.description, next.agentReference, JSON.stringify(next.metadata), next.updatedAt, id]
      );
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ValidationError(`Dataset name '${next.name}' has already been taken`);
      }
      throw error;
    }
    return next;
  }

  /**
   * Delete a dataset with its items, runs and the scores of its run items.
   */
  delete(id: string): boolean {
    const db = getDb();
    return db.transaction(() => {
      db.rawRun(
        `DELETE FROM scores WHERE scoreableType = 'dataset_run_item' AND scoreableId IN (
           SELECT ri.id FROM dataset_run_items ri
           JOIN dataset_runs r ON r.id = ri.datasetRunId
           WHERE r.datasetId = ?
         )`,
        [id]
      );
      return db.rawRun('DELETE FROM datasets WHERE id = ?', [id]) > 0;
    });
  }

  private validate(name: string, agentReference: string): void {
    const errors: string[] = [];
    if (!name) errors.push('Name is required');
    if (!agentReference) {
      errors.push('Agent reference is required');
    } else if (!this.agents.has(agentReference)) {
      errors.push(`Agent '${agentReference}' is not registered`);
    }
    if (errors.length > 0) {
      throw new ValidationError(errors);
    }
  }
}
