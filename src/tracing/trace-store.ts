/**
 * TraceStore - sessions and execution traces.
 *
 * Records what an agent was given, what it returned, how long it took and
 * what it cost. Run orchestration reads cost, tokens and duration from here
 * and never computes them itself.
 */

import { v4 as uuid } from 'uuid';
import { DEFAULT_QUERY_LIMIT, MAX_QUERY_LIMIT } from '../constants.js';
import { getDb, parseEnumColumn, parseJsonColumn } from '../db/index.js';
import { NotFoundError } from '../errors.js';
import { TRACE_STATUSES } from './types.js';
import type {
  CreateSessionInput,
  CreateTraceInput,
  FinalizeTraceInput,
  SessionRecord,
  TraceQueryOptions,
  TraceRecord,
  TraceUsage,
} from './types.js';

interface SessionRow {
  id: string;
  userId: string | null;
  metadata: string;
  createdAt: string;
}

interface TraceRow {
  id: string;
  sessionId: string | null;
  name: string;
  input: string | null;
  output: string | null;
  metadata: string;
  tags: string;
  status: string;
  error: string | null;
  startedAt: string;
  completedAt: string | null;
  durationMs: number | null;
  totalCost: number;
  totalTokens: number;
}

function rowToSession(row: SessionRow): SessionRecord {
  return {
    id: row.id,
    userId: row.userId,
    metadata: parseJsonColumn<Record<string, unknown>>(row.metadata, {}),
    createdAt: row.createdAt,
  };
}

function rowToTrace(row: TraceRow): TraceRecord {
  return {
    id: row.id,
    sessionId: row.sessionId,
    name: row.name,
    input: parseJsonColumn<unknown>(row.input, null),
    output: parseJsonColumn<unknown>(row.output, null),
    metadata: parseJsonColumn<Record<string, unknown>>(row.metadata, {}),
    tags: parseJsonColumn<string[]>(row.tags, []),
    status: parseEnumColumn(TRACE_STATUSES, row.status, 'traces.status'),
    error: row.error,
    startedAt: row.startedAt,
    completedAt: row.completedAt,
    durationMs: row.durationMs,
    totalCost: row.totalCost,
    totalTokens: row.totalTokens,
  };
}

function serialize(value: unknown): string | null {
  return value === undefined ? null : JSON.stringify(value);
}

function totalTokensOf(usage: TraceUsage | undefined): number {
  if (!usage) return 0;
  return usage.totalTokens ?? (usage.inputTokens ?? 0) + (usage.outputTokens ?? 0);
}

export class TraceStore {
  // ============================================================
  // Sessions
  // ============================================================

  createSession(input: CreateSessionInput = {}): SessionRecord {
    const session: SessionRecord = {
      id: uuid(),
      userId: input.userId ?? null,
      metadata: input.metadata ?? {},
      createdAt: new Date().toISOString(),
    };

    getDb().rawRun(
      'INSERT INTO sessions (id, userId, metadata, createdAt) VALUES (?, ?, ?, ?)',
      [session.id, session.userId, JSON.stringify(session.metadata), session.createdAt]
    );
    return session;
  }

  getSessionById(sessionId: string): SessionRecord | undefined {
    const rows = getDb().rawQuery('SELECT * FROM sessions WHERE id = ?', [sessionId]) as SessionRow[];
    return rows.length > 0 ? rowToSession(rows[0]) : undefined;
  }

  // ============================================================
  // Trace lifecycle
  // ============================================================

  startTrace(input: CreateTraceInput): TraceRecord {
    const trace: TraceRecord = {
      id: uuid(),
      sessionId: input.sessionId ?? null,
      name: input.name,
      input: input.input ?? null,
      output: null,
      metadata: input.metadata ?? {},
      tags: input.tags ?? [],
      status: 'running',
      error: null,
      startedAt: new Date().toISOString(),
      completedAt: null,
      durationMs: null,
      totalCost: 0,
      totalTokens: 0,
    };

    getDb().rawRun(
      `INSERT INTO traces (id, sessionId, name, input, output, metadata, tags, status, error, startedAt, completedAt, durationMs, totalCost, totalTokens)
       VALUES (?, ?, ?, ?, NULL, ?, ?, 'running', NULL, ?, NULL, NULL, 0, 0)`,
      [
        trace.id,
        trace.sessionId,
        trace.name,
        serialize(input.input),
        JSON.stringify(trace.metadata),
        JSON.stringify(trace.tags),
        trace.startedAt,
      ]
    );
    return trace;
  }

  /**
   * Record the outcome of a trace: output, usage and completion time.
   * Metadata is merged into what the trace already has.
   */
  endTrace(traceId: string, result: FinalizeTraceInput = {}): TraceRecord {
    const trace = this.getTraceById(traceId);
    if (!trace) {
      throw new NotFoundError('Trace', traceId);
    }

    const now = new Date().toISOString();
    const durationMs = Math.max(0, new Date(now).getTime() - new Date(trace.startedAt).getTime());
    const status = result.error !== undefined ? 'error' : 'completed';
    const metadata = { ...trace.metadata, ...(result.metadata ?? {}) };
    const totalTokens = totalTokensOf(result.usage);
    const totalCost = result.usage?.cost ?? 0;

    getDb().rawRun(
      `UPDATE traces
       SET output = ?, metadata = ?, status = ?, error = ?, completedAt = ?, durationMs = ?, totalCost = ?, totalTokens = ?
       WHERE id = ?`,
      [serialize(result.output), JSON.stringify(metadata), status, result.error ?? null, now, durationMs, totalCost, totalTokens, traceId]
    );

    return {
      ...trace,
      output: result.output ?? null,
      metadata,
      status,
      error: result.error ?? null,
      completedAt: now,
      durationMs,
      totalCost,
      totalTokens,
    };
  }

  // ============================================================
  // Query methods
  // ============================================================

  getTraceById(traceId: string): TraceRecord | undefined {
    const rows = getDb().rawQuery('SELECT * FROM traces WHERE id = ?', [traceId]) as TraceRow[];
    return rows.length > 0 ? rowToTrace(rows[0]) : undefined;
  }

  getTraces(options?: TraceQueryOptions): TraceRecord[] {
    const limit = Math.min(options?.limit || DEFAULT_QUERY_LIMIT, MAX_QUERY_LIMIT);
    const conditions: string[] = [];
    const params: unknown[] = [];

    if (options?.sessionId) {
      conditions.push('sessionId = ?');
      params.push(options.sessionId);
    }
    if (options?.status) {
      conditions.push('status = ?');
      params.push(options.status);
    }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    params.push(limit);
    const rows = getDb().rawQuery(
      `SELECT * FROM traces ${where} ORDER BY startedAt DESC, rowid DESC LIMIT ?`,
      params
    ) as TraceRow[];
    return rows.map(rowToTrace);
  }

  getTracesBySession(sessionId: string): TraceRecord[] {
    const rows = getDb().rawQuery(
      'SELECT * FROM traces WHERE sessionId = ? ORDER BY startedAt ASC, rowid ASC',
      [sessionId]
    ) as TraceRow[];
    return rows.map(rowToTrace);
  }
}
