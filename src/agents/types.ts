/**
 * Agent types
 *
 * An agent is whatever a dataset is evaluated against: a registered async
 * function from an item's input to an output, optionally reporting usage.
 */

import type { TraceUsage } from '../tracing/types.js';

export interface AgentContext {
  datasetRunId: string;
  runItemId: string;
  datasetItemId: string;
  sessionId: string;
  traceId: string;
}

export interface AgentResponse {
  output: unknown;
  usage?: TraceUsage;
  metadata?: Record<string, unknown>;
}

export interface Agent {
  name: string;
  description?: string;
  run(input: unknown, context: AgentContext): Promise<AgentResponse>;
}

export interface AgentSummary {
  name: string;
  description: string;
}
