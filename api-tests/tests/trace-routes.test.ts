/**
 * API Tests: Trace Routes
 *
 * Tests exercise:
 *   - Listing traces with session, status and limit filters
 *   - Trace detail with its scores
 *   - Session detail with its traces
 *   - Traces written by a dataset run
 */

import { describe, it, expect, beforeAll, afterEach, afterAll } from 'vitest';
import { HTTP_STATUS, ServerHarness, seedDataset } from '../harness/index.js';

const harness = new ServerHarness();

beforeAll(() => harness.start());
afterEach(() => harness.reset());
afterAll(() => harness.stop());

interface TraceBody {
  id: string;
  name: string;
  status: string;
  sessionId: string | null;
  output: unknown;
  totalTokens: number;
  totalCost: number;
  error: string | null;
}

describe('GET /api/traces', () => {
  it('filters by session and status', async () => {
    const { traces } = harness.services;
    const session = traces.createSession();
    const done = traces.startTrace({ sessionId: session.id, name: 'done' });
    traces.endTrace(done.id, { output: 'ok' });
    traces.startTrace({ sessionId: session.id, name: 'open' });
    traces.startTrace({ name: 'elsewhere' });

    const bySession = await harness.api().getJson<{ traces: TraceBody[] }>(`/api/traces?sessionId=${session.id}`);
    expect(bySession.body.traces.map(t => t.name).sort()).toEqual(['done', 'open']);

    const completed = await harness.api().getJson<{ traces: TraceBody[] }>('/api/traces?status=completed');
    expect(completed.body.traces.map(t => t.name)).toEqual(['done']);

    const limited = await harness.api().getJson<{ traces: TraceBody[] }>('/api/traces?limit=1');
    expect(limited.body.traces).toHaveLength(1);
  });

  it('rejects an unknown status', async () => {
    const { status } = await harness.api().getJson('/api/traces?status=paused');
    expect(status).toBe(HTTP_STATUS.UNPROCESSABLE_ENTITY);
  });
});

describe('GET /api/traces/:id', () => {
  it('returns the trace with its scores', async () => {
    const trace = harness.services.traces.startTrace({ name: 'chat', input: 'hi' });
    harness.services.traces.endTrace(trace.id, { output: 'hello', usage: { inputTokens: 4, outputTokens: 6, cost: 0.01 } });
    harness.services.scores.create({ scoreable: { type: 'trace', id: trace.id }, name: 'quality', value: 1 });

    const { body } = await harness.api().getJson<{ trace: TraceBody; scores: Array<{ name: string }> }>(`/api/traces/${trace.id}`);

    expect(body.trace).toMatchObject({ id: trace.id, status: 'completed', output: 'hello', totalTokens: 10, totalCost: 0.01 });
    expect(body.scores.map(s => s.name)).toEqual(['quality']);
  });

  it('404s for an unknown trace', async () => {
    const { status, body } = await harness.api().getJson('/api/traces/missing');

    expect(status).toBe(HTTP_STATUS.NOT_FOUND);
    expect(body).toEqual({ error: "Trace 'missing' not found" });
  });
});

describe('GET /api/sessions/:id', () => {
  it('returns the session with its traces in start order', async () => {
    const { traces } = harness.services;
    const session = traces.createSession({ userId: 'user-1' });
    traces.startTrace({ sessionId: session.id, name: 'first' });
    traces.startTrace({ sessionId: session.id, name: 'second' });

    const { body } = await harness.api().getJson<{ session: { userId: string }; traces: TraceBody[]; scores: unknown[] }>(
      `/api/sessions/${session.id}`
    );

    expect(body.session.userId).toBe('user-1');
    expect(body.traces.map(t => t.name)).toEqual(['first', 'second']);
    expect(body.scores).toEqual([]);
  });
});

describe('dataset run traces', () => {
  it('records one trace per run item, erroring for failed items', async () => {
    const { dataset } = seedDataset(harness.services, { inputs: ['one', 'fail'] });
    await harness.api().post(`/api/datasets/${dataset.id}/runs`, { name: 'baseline' });
    await harness.services.jobs.drain();

    const errored = await harness.api().getJson<{ traces: TraceBody[] }>('/api/traces?status=error');
    expect(errored.body.traces.map(t => t.error)).toEqual(['stub agent failure']);

    const completed = await harness.api().getJson<{ traces: TraceBody[] }>('/api/traces?status=completed');
    expect(completed.body.traces).toHaveLength(1);
    expect(completed.body.traces[0]).toMatchObject({ output: 'ONE', totalTokens: 5, totalCost: 0.001 });
  });
});
