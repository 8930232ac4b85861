/**
 * Dataset, item, run and run item types
 */

export const DATASET_ITEM_STATUSES = ['active', 'archived'] as const;
export type DatasetItemStatus = typeof DATASET_ITEM_STATUSES[number];

export const DATASET_RUN_STATUSES = ['pending', 'running', 'completed', 'failed'] as const;
export type DatasetRunStatus = typeof DATASET_RUN_STATUSES[number];

export type DatasetRunEvent = 'start' | 'complete' | 'fail';

export type RunItemStatus = 'pending' | 'succeeded' | 'failed';

export interface Dataset {
  id: string;
  name: string;
  description: string | null;
  /** Name of a registered agent */
  agentReference: string;
  metadata: Record<string, unknown>;
  createdAt: string;
  updatedAt: string;
}

export interface DatasetItem {
  id: string;
  datasetId: string;
  input: unknown;
  expectedOutput: unknown;
  status: DatasetItemStatus;
  sourceTraceId: string | null;
  metadata: Record<string, unknown>;
  createdAt: string;
  updatedAt: string;
}

export interface DatasetRun {
  id: string;
  datasetId: string;
  name: string;
  description: string | null;
  status: DatasetRunStatus;
  totalItems: number;
  completedItems: number;
  failedItems: number;
  totalCost: number;
  totalTokens: number;
  metadata: Record<string, unknown>;
  createdAt: string;
  updatedAt: string;
}

export interface DatasetRunItem {
  id: string;
  datasetRunId: string;
  datasetItemId: string;
  traceId: string | null;
  error: string | null;
  createdAt: string;
  updatedAt: string;
}

/**
 * Run item joined with its dataset item and trace. This is what evaluators
 * score and what the API returns.
 */
export interface RunItemView extends DatasetRunItem {
  status: RunItemStatus;
  input: unknown;
  expectedOutput: unknown;
  actualOutput: unknown;
  cost: number | null;
  tokens: number | null;
  durationMs: number | null;
  /** null when either side is blank */
  outputMatches: boolean | null;
}

export interface CreateDatasetInput {
  name: string;
  description?: string | null;
  agentReference: string;
  metadata?: Record<string, unknown>;
}

export type UpdateDatasetInput = Partial<CreateDatasetInput>;

export interface CreateDatasetItemInput {
  input: unknown;
  expectedOutput?: unknown;
  status?: DatasetItemStatus;
  sourceTraceId?: string | null;
  metadata?: Record<string, unknown>;
}

export type UpdateDatasetItemInput = Partial<CreateDatasetItemInput>;

export interface CreateRunInput {
  name: string;
  description?: string | null;
  metadata?: Record<string, unknown>;
}

export interface ReviewProgress {
  scored: number;
  total: number;
}
