/**
 * API Tests: Health, CORS and error mapping
 *
 * Tests exercise:
 *   - Health endpoint
 *   - JSON 404 for unknown routes
 *   - CORS origin allow-list
 *   - Error-to-status mapping (422, 404, 409) and malformed bodies
 */

import { describe, it, expect, beforeAll, afterEach, afterAll } from 'vitest';
import { HTTP_STATUS, ServerHarness } from '../harness/index.js';

const harness = new ServerHarness();

beforeAll(() => harness.start());
afterEach(() => harness.reset());
afterAll(() => harness.stop());

describe('Health', () => {
  it('GET /api/health reports ok', async () => {
    const { status, body } = await harness.api().getJson<{ status: string; timestamp: string }>('/api/health');

    expect(status).toBe(HTTP_STATUS.OK);
    expect(body.status).toBe('ok');
    expect(Number.isNaN(Date.parse(body.timestamp))).toBe(false);
  });

  it('unknown routes answer with a JSON 404', async () => {
    const { status, body } = await harness.api().getJson('/api/nope');

    expect(status).toBe(HTTP_STATUS.NOT_FOUND);
    expect(body).toEqual({ error: 'Not found' });
  });
});

describe('CORS', () => {
  it('echoes an allowed origin', async () => {
    const res = await harness.api().get('/api/health', { Origin: 'http://localhost:5173' });
    expect(res.headers.get('Access-Control-Allow-Origin')).toBe('http://localhost:5173');
  });

  it('omits the header for other origins', async () => {
    const res = await harness.api().get('/api/health', { Origin: 'http://evil.example' });
    expect(res.headers.get('Access-Control-Allow-Origin')).toBeNull();
  });
});

describe('Error mapping', () => {
  it('validation failures are 422 with details', async () => {
    const { status, body } = await harness.api().postJson('/api/prompts', { name: ' ', text: '' });

    expect(status).toBe(HTTP_STATUS.UNPROCESSABLE_ENTITY);
    expect(body).toEqual({
      error: 'Name is required; Text is required',
      details: ['Name is required', 'Text is required'],
    });
  });

  it('schema failures name the offending field', async () => {
    const { status, body } = await harness.api().postJson('/api/prompts', { name: 'greeting', text: 5 });

    expect(status).toBe(HTTP_STATUS.UNPROCESSABLE_ENTITY);
    expect(body).toEqual({
      error: 'text: Expected string, received number',
      details: ['text: Expected string, received number'],
    });
  });

  it('malformed JSON is a 422', async () => {
    const res = await harness.api().postRaw('/api/prompts', '{not json');

    expect(res.status).toBe(HTTP_STATUS.UNPROCESSABLE_ENTITY);
    expect(await res.json()).toEqual({
      error: 'Request body must be valid JSON',
      details: ['Request body must be valid JSON'],
    });
  });

  it('missing resources are 404', async () => {
    const { status, body } = await harness.api().getJson('/api/prompts/missing');

    expect(status).toBe(HTTP_STATUS.NOT_FOUND);
    expect(body).toEqual({ error: "Prompt 'missing@production' not found" });
  });

  it('strict invalid transitions are 409', async () => {
    harness.services.prompts.createVersion({ name: 'greeting', text: 'Hello' });

    const { status, body } = await harness.api().postJson('/api/prompts/greeting/versions/1/demote?strict=true');

    expect(status).toBe(HTTP_STATUS.CONFLICT);
    expect(body).toEqual({ error: "Cannot demote prompt version in state 'draft'" });
  });

  it('bad path parameters are 422', async () => {
    const { status, body } = await harness.api().getJson('/api/prompts/greeting/versions/abc');

    expect(status).toBe(HTTP_STATUS.UNPROCESSABLE_ENTITY);
    expect(body).toEqual({ error: 'version must be a positive integer', details: ['version must be a positive integer'] });
  });
});
