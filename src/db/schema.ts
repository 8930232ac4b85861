/**
 * Creates every table the service uses. Safe to call repeatedly.
 */

import { initDatasetSchema } from '../datasets/schema.js';
import { initPromptSchema } from '../prompts/schema.js';
import { initScoreSchema } from '../scores/schema.js';
import { initTracingSchema } from '../tracing/schema.js';

export function initSchemas(): void {
  initPromptSchema();
  initTracingSchema();
  initDatasetSchema();
  initScoreSchema();
}
