/**
 * Datasets module exports
 */

export * from './types.js';
export { initDatasetSchema } from './schema.js';
export { DatasetRepository } from './dataset-repository.js';
export { DatasetItemRepository } from './item-repository.js';
export { DatasetRunRepository } from './run-repository.js';
export {
  DatasetRunService,
  MANUAL_REVIEW_SCORE,
  datasetRunLifecycle,
  failureRate,
  isFinished,
  isInProgress,
  pendingItemsCount,
  progressPercentage,
  successRate,
} from './run-service.js';
export type { DatasetRunServiceDeps } from './run-service.js';
export { isBlank, normalizeOutput, outputsMatch, runItemStatus, stringifyOutput } from './run-item.js';
export { DatasetRunner, DATASET_TRACE_NAME, type DatasetRunnerConfig } from './dataset-runner.js';
export { DatasetRunnerJob, type DatasetRunnerJobConfig, type JobRecord, type JobStatus } from './dataset-runner-job.js';
