/**
 * API Tests: Prompt Routes
 *
 * Tests exercise:
 *   - Creating versions and listing prompts
 *   - Resolving by state, version and fallback
 *   - Lifecycle transitions, rollback and clone
 *   - Draft editing and deletion rules
 *   - Compilation with and without validation
 *   - Cache stats, invalidation and warming
 */

import { describe, it, expect, beforeAll, afterEach, afterAll } from 'vitest';
import { HTTP_STATUS, ServerHarness, seedPromptVersions } from '../harness/index.js';

const harness = new ServerHarness();

beforeAll(() => harness.start());
afterEach(() => harness.reset());
afterAll(() => harness.stop());

interface PromptBody {
  prompt: { name: string; version: number | null; state: string; text: string; config: Record<string, unknown> };
}

describe('POST /api/prompts', () => {
  it('creates a draft at version 1', async () => {
    const { status, body } = await harness.api().postJson<PromptBody>('/api/prompts', {
      name: 'greeting',
      text: 'Hello {{name}}',
      config: { temperature: '0.3' },
      commitMessage: 'initial',
    });

    expect(status).toBe(HTTP_STATUS.CREATED);
    expect(body.prompt).toMatchObject({ name: 'greeting', version: 1, state: 'draft', config: { temperature: 0.3 } });
  });

  it('can promote on creation', async () => {
    const { body } = await harness.api().postJson<PromptBody>('/api/prompts', {
      name: 'greeting',
      text: 'Hello',
      promoteToProduction: true,
    });
    expect(body.prompt.state).toBe('production');
  });

  it('rejects invalid config values', async () => {
    const { status, body } = await harness.api().postJson<{ details: string[] }>('/api/prompts', {
      name: 'greeting',
      text: 'Hello',
      config: { max_tokens: 0 },
    });

    expect(status).toBe(HTTP_STATUS.UNPROCESSABLE_ENTITY);
    expect(body.details).toEqual(['max_tokens must be between 1 and 100000']);
  });
});

describe('GET /api/prompts', () => {
  it('summarises every prompt name', async () => {
    seedPromptVersions(harness.services, 'greeting', 2);
    harness.services.prompts.createVersion({ name: 'farewell', text: 'Bye' });

    const { body } = await harness.api().getJson<{ prompts: Array<Record<string, unknown>> }>('/api/prompts');
    const byName = [...body.prompts].sort((a, b) => String(a.name).localeCompare(String(b.name)));
    expect(byName.map(p => [p.name, p.latestVersion, p.productionVersion, p.versionCount])).toEqual([
      ['farewell', 1, null, 1],
      ['greeting', 2, 2, 2],
    ]);
  });
});

describe('GET /api/prompts/:name', () => {
  it('resolves production by default and versions on request', async () => {
    seedPromptVersions(harness.services, 'greeting', 2);

    const production = await harness.api().getJson<PromptBody>('/api/prompts/greeting');
    expect(production.body.prompt.version).toBe(2);

    const v1 = await harness.api().getJson<PromptBody>('/api/prompts/greeting?version=1');
    expect(v1.body.prompt).toMatchObject({ version: 1, state: 'archived' });

    const archived = await harness.api().getJson<PromptBody>('/api/prompts/greeting?state=archived');
    expect(archived.body.prompt.version).toBe(1);
  });

  it('returns the fallback when nothing matches', async () => {
    const { status, body } = await harness.api().getJson<PromptBody>('/api/prompts/unknown?fallback=Hi');

    expect(status).toBe(HTTP_STATUS.OK);
    expect(body.prompt).toEqual({ name: 'unknown', version: null, state: 'fallback', text: 'Hi', config: {} });
  });

  it('rejects an unknown state', async () => {
    const { status } = await harness.api().getJson('/api/prompts/greeting?state=live');
    expect(status).toBe(HTTP_STATUS.UNPROCESSABLE_ENTITY);
  });
});

describe('versions', () => {
  it('lists versions newest first with neighbours on detail', async () => {
    seedPromptVersions(harness.services, 'greeting', 3);

    const list = await harness.api().getJson<{ versions: Array<{ version: number }> }>('/api/prompts/greeting/versions');
    expect(list.body.versions.map(v => v.version)).toEqual([3, 2, 1]);

    const detail = await harness.api().getJson<{ previousVersion: number | null; nextVersion: number | null }>(
      '/api/prompts/greeting/versions/2'
    );
    expect(detail.body).toMatchObject({ previousVersion: 1, nextVersion: 3 });
  });

  it('exports a version without ids or timestamps', async () => {
    seedPromptVersions(harness.services, 'greeting', 1);

    const { body } = await harness.api().getJson('/api/prompts/greeting/versions/1/export');
    expect(body).toEqual({
      name: 'greeting',
      version: 1,
      state: 'production',
      text: 'v1: Hello {{name}}',
      config: {},
      commitMessage: null,
      createdBy: null,
    });
  });

  it('compares two versions line by line', async () => {
    seedPromptVersions(harness.services, 'greeting', 2);

    const { body } = await harness.api().getJson<{ diff: unknown }>('/api/prompts/greeting/compare?a=1&b=2');
    expect(body.diff).toEqual({
      addedLines: ['v2: Hello {{name}}'],
      removedLines: ['v1: Hello {{name}}'],
      changed: true,
    });
  });

  it('compare requires both versions', async () => {
    const { status } = await harness.api().getJson('/api/prompts/greeting/compare?a=1');
    expect(status).toBe(HTTP_STATUS.UNPROCESSABLE_ENTITY);
  });
});

describe('lifecycle', () => {
  it('promote archives the current production version', async () => {
    seedPromptVersions(harness.services, 'greeting', 1);
    harness.services.prompts.createVersion({ name: 'greeting', text: 'draft' });

    const { status, body } = await harness.api().postJson<{ changed: boolean; prompt: { state: string }; archived: { version: number } | null }>(
      '/api/prompts/greeting/versions/2/promote'
    );

    expect(status).toBe(HTTP_STATUS.OK);
    expect(body.changed).toBe(true);
    expect(body.prompt.state).toBe('production');
    expect(body.archived?.version).toBe(1);
  });

  it('a non-strict invalid transition is an unchanged 200', async () => {
    harness.services.prompts.createVersion({ name: 'greeting', text: 'draft' });

    const { status, body } = await harness.api().postJson<{ changed: boolean }>('/api/prompts/greeting/versions/1/restore');
    expect(status).toBe(HTTP_STATUS.OK);
    expect(body.changed).toBe(false);
  });

  it('rollback restores an archived version', async () => {
    seedPromptVersions(harness.services, 'greeting', 2);

    await harness.api().post('/api/prompts/greeting/versions/1/rollback');
    const { body } = await harness.api().getJson<PromptBody>('/api/prompts/greeting');
    expect(body.prompt.version).toBe(1);
  });

  it('rollback to a draft is a conflict', async () => {
    harness.services.prompts.createVersion({ name: 'greeting', text: 'draft' });

    const { status } = await harness.api().postJson('/api/prompts/greeting/versions/1/rollback');
    expect(status).toBe(HTTP_STATUS.CONFLICT);
  });

  it('clone creates a draft at the next version', async () => {
    seedPromptVersions(harness.services, 'greeting', 1);

    const { status, body } = await harness.api().postJson<PromptBody>('/api/prompts/greeting/versions/1/clone', { createdBy: 'ana' });
    expect(status).toBe(HTTP_STATUS.CREATED);
    expect(body.prompt).toMatchObject({ version: 2, state: 'draft', text: 'v1: Hello {{name}}' });
  });
});

describe('editing and deletion', () => {
  it('edits a draft', async () => {
    harness.services.prompts.createVersion({ name: 'greeting', text: 'draft' });

    const { status, body } = await harness.api().patchJson<PromptBody>('/api/prompts/greeting/versions/1', { text: 'edited' });
    expect(status).toBe(HTTP_STATUS.OK);
    expect(body.prompt.text).toBe('edited');
  });

  it('refuses to edit production', async () => {
    seedPromptVersions(harness.services, 'greeting', 1);

    const { status, body } = await harness.api().patchJson<{ error: string }>('/api/prompts/greeting/versions/1', { text: 'x' });
    expect(status).toBe(HTTP_STATUS.UNPROCESSABLE_ENTITY);
    expect(body.error).toBe('Cannot edit production prompt. Clone to draft first.');
  });

  it('deletes drafts but not production', async () => {
    seedPromptVersions(harness.services, 'greeting', 1);
    harness.services.prompts.createVersion({ name: 'greeting', text: 'draft' });

    const draft = await harness.api().deleteJson<{ deleted: { version: number } }>('/api/prompts/greeting/versions/2');
    expect(draft.status).toBe(HTTP_STATUS.OK);
    expect(draft.body.deleted.version).toBe(2);

    const production = await harness.api().deleteJson('/api/prompts/greeting/versions/1');
    expect(production.status).toBe(HTTP_STATUS.UNPROCESSABLE_ENTITY);
  });
});

describe('POST /api/prompts/:name/compile', () => {
  it('compiles the production version', async () => {
    seedPromptVersions(harness.services, 'greeting', 1);

    const { body } = await harness.api().postJson('/api/prompts/greeting/compile', { variables: { name: 'Ana' } });
    expect(body).toEqual({ name: 'greeting', version: 1, state: 'production', compiled: 'v1: Hello Ana' });
  });

  it('reports missing variables when validating', async () => {
    seedPromptVersions(harness.services, 'greeting', 1);

    const { status, body } = await harness.api().postJson('/api/prompts/greeting/compile', { validate: true });
    expect(status).toBe(HTTP_STATUS.UNPROCESSABLE_ENTITY);
    expect(body).toEqual({ error: 'Missing variables: name', missing: ['name'] });
  });

  it('returns fallback text unchanged', async () => {
    const { body } = await harness.api().postJson('/api/prompts/unknown/compile', {
      fallback: 'Hi {{name}}',
      variables: { name: 'Ana' },
    });
    expect(body).toEqual({ name: 'unknown', version: null, state: 'fallback', compiled: 'Hi {{name}}' });
  });
});

describe('cache endpoints', () => {
  it('tracks hits and misses per prompt', async () => {
    seedPromptVersions(harness.services, 'greeting', 1);
    await harness.api().get('/api/prompts/greeting');
    await harness.api().get('/api/prompts/greeting');

    const { body } = await harness.api().getJson('/api/prompts/greeting/cache-stats');
    expect(body).toEqual({ name: 'greeting', hits: 1, misses: 1, total: 2, hitRate: 50 });
  });

  it('invalidates cached lookups', async () => {
    seedPromptVersions(harness.services, 'greeting', 1);
    await harness.api().get('/api/prompts/greeting');

    const { body } = await harness.api().deleteJson('/api/prompts/greeting/cache');
    expect(body).toEqual({ invalidated: 1 });
  });

  it('warms the given names', async () => {
    seedPromptVersions(harness.services, 'greeting', 1);

    const { body } = await harness.api().postJson('/api/prompts/cache/warm', { names: ['greeting', 'missing'] });
    expect(body).toEqual({
      success: ['greeting'],
      failed: [{ name: 'missing', error: "Prompt 'missing@production' not found" }],
    });
  });
});
