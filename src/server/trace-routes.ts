/**
 * Trace API Routes
 */

import type { Hono } from 'hono';
import { NotFoundError } from '../errors.js';
import type { ScoreRepository } from '../scores/repository.js';
import type { TraceStore } from '../tracing/trace-store.js';
import { TRACE_STATUSES } from '../tracing/types.js';
import { parseEnumParam, parseOptionalPositiveInt, route } from './http.js';

export interface TraceRoutesConfig {
  traces: TraceStore;
  scores: ScoreRepository;
}

export function setupTraceRoutes(app: Hono, config: TraceRoutesConfig): void {
  const { traces, scores } = config;

  app.get('/api/traces', route('List traces', (c) => {
    return c.json({
      traces: traces.getTraces({
        sessionId: c.req.query('sessionId'),
        status: parseEnumParam(TRACE_STATUSES, c.req.query('status'), 'status'),
        limit: parseOptionalPositiveInt(c.req.query('limit'), 'limit'),
      }),
    });
  }));

  app.get('/api/traces/:id', route('Get trace', (c) => {
    const trace = traces.getTraceById(c.req.param('id'));
    if (!trace) {
      throw new NotFoundError('Trace', c.req.param('id'));
    }
    return c.json({ trace, scores: scores.findForScoreable({ type: 'trace', id: trace.id }) });
  }));

  app.get('/api/sessions/:id', route('Get session', (c) => {
    const session = traces.getSessionById(c.req.param('id'));
    if (!session) {
      throw new NotFoundError('Session', c.req.param('id'));
    }
    return c.json({
      session,
      traces: traces.getTracesBySession(session.id),
      scores: scores.findForScoreable({ type: 'session', id: session.id }),
    });
  }));
}
