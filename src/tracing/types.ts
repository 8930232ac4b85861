/**
 * Tracing Types
 *
 * Sessions group traces; a trace records one execution (input, output,
 * timing, token usage and cost). Dataset runs create one session per run
 * and one trace per run item.
 */

export const TRACE_STATUSES = ['running', 'completed', 'error'] as const;
export type TraceStatus = typeof TRACE_STATUSES[number];

export interface SessionRecord {
  id: string;
  userId: string | null;
  metadata: Record<string, unknown>;
  createdAt: string;
}

export interface TraceRecord {
  id: string;
  sessionId: string | null;
  name: string;
  input: unknown;
  output: unknown;
  metadata: Record<string, unknown>;
  tags: string[];

  status: TraceStatus;
  error: string | null;

  startedAt: string;
  completedAt: string | null;
  durationMs: number | null;

  totalCost: number;
  totalTokens: number;
}

/** Usage reported by an agent for one execution */
export interface TraceUsage {
  inputTokens?: number;
  outputTokens?: number;
  /** Overrides inputTokens + outputTokens when given */
  totalTokens?: number;
  cost?: number;
}

export interface CreateSessionInput {
  userId?: string | null;
  metadata?: Record<string, unknown>;
}

export interface CreateTraceInput {
  sessionId?: string | null;
  name: string;
  input?: unknown;
  metadata?: Record<string, unknown>;
  tags?: string[];
}

export interface FinalizeTraceInput {
  output?: unknown;
  metadata?: Record<string, unknown>;
  usage?: TraceUsage;
  /** Marks the trace as errored */
  error?: string;
}

export interface TraceQueryOptions {
  sessionId?: string;
  status?: TraceStatus;
  limit?: number;
}
