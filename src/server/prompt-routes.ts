/**
 * Prompt API Routes
 *
 * Versions, lifecycle transitions, compilation and cache management for
 * named prompt templates.
 */

import type { Context, Hono } from 'hono';
import { z } from 'zod';
import type { PromptVersionStore } from '../prompts/store.js';
import { PROMPT_STATES } from '../prompts/types.js';
import type { TransitionResult } from '../prompts/types.js';
import { parseBody, parseEnumParam, parseFlag, parseOptionalPositiveInt, parsePositiveInt, route } from './http.js';

export interface PromptRoutesConfig {
  prompts: PromptVersionStore;
}

const createVersionSchema = z.object({
  name: z.string(),
  text: z.string(),
  config: z.unknown().optional(),
  commitMessage: z.string().nullish(),
  createdBy: z.string().nullish(),
  promoteToProduction: z.boolean().optional(),
});

const updateDraftSchema = z.object({
  text: z.string().optional(),
  config: z.unknown().optional(),
  commitMessage: z.string().nullish(),
});

const cloneSchema = z.object({
  createdBy: z.string().nullish(),
});

const compileSchema = z.object({
  variables: z.record(z.unknown()).default({}),
  validate: z.boolean().default(false),
  version: z.number().int().positive().optional(),
  state: z.enum(PROMPT_STATES).optional(),
  fallback: z.string().optional(),
});

const warmSchema = z.object({
  names: z.array(z.string()).optional(),
});

type TransitionName = 'promote' | 'demote' | 'restore';

export function setupPromptRoutes(app: Hono, config: PromptRoutesConfig): void {
  const { prompts } = config;

  function versionParam(c: Context): number {
    return parsePositiveInt(c.req.param('version'), 'version');
  }

  app.get('/api/prompts', route('List prompts', (c) => {
    return c.json({ prompts: prompts.listPrompts() });
  }));

  app.post('/api/prompts', route('Create prompt version', async (c) => {
    const body = await parseBody(c, createVersionSchema);
    const prompt = prompts.createVersion(body);
    return c.json({ prompt }, 201);
  }));

  app.post('/api/prompts/cache/warm', route('Warm prompt cache', async (c) => {
    const body = await parseBody(c, warmSchema);
    return c.json(prompts.warmCache(body.names));
  }));

  // Resolve by version or state, with an optional fallback text
  app.get('/api/prompts/:name', route('Fetch prompt', (c) => {
    const prompt = prompts.fetch(c.req.param('name'), {
      version: parseOptionalPositiveInt(c.req.query('version'), 'version'),
      state: parseEnumParam(PROMPT_STATES, c.req.query('state'), 'state'),
      fallback: c.req.query('fallback'),
    });
    return c.json({ prompt });
  }));

  app.get('/api/prompts/:name/versions', route('List prompt versions', (c) => {
    return c.json({ versions: prompts.listVersions(c.req.param('name')) });
  }));

  app.get('/api/prompts/:name/versions/:version', route('Get prompt version', (c) => {
    const name = c.req.param('name');
    const version = versionParam(c);
    const prompt = prompts.getVersion(name, version);
    return c.json({
      prompt,
      previousVersion: prompts.previousVersion(name, version)?.version ?? null,
      nextVersion: prompts.nextVersion(name, version)?.version ?? null,
    });
  }));

  app.get('/api/prompts/:name/versions/:version/export', route('Export prompt version', (c) => {
    const prompt = prompts.getVersion(c.req.param('name'), versionParam(c));
    return c.json(prompts.exportVersion(prompt));
  }));

  app.get('/api/prompts/:name/compare', route('Compare prompt versions', (c) => {
    const a = parsePositiveInt(c.req.query('a'), 'a');
    const b = parsePositiveInt(c.req.query('b'), 'b');
    return c.json(prompts.compareVersions(c.req.param('name'), a, b));
  }));

  const transitions: TransitionName[] = ['promote', 'demote', 'restore'];
  for (const transition of transitions) {
    app.post(`/api/prompts/:name/versions/:version/${transition}`, route(`Prompt ${transition}`, (c) => {
      const options = { strict: parseFlag(c.req.query('strict')) };
      const name = c.req.param('name');
      const version = versionParam(c);
      const result: TransitionResult = transition === 'promote'
        ? prompts.promote(name, version, options)
        : transition === 'demote'
          ? prompts.demote(name, version, options)
          : prompts.restore(name, version, options);
      return c.json(result);
    }));
  }

  app.post('/api/prompts/:name/versions/:version/rollback', route('Prompt rollback', (c) => {
    return c.json(prompts.rollback(c.req.param('name'), versionParam(c)));
  }));

  app.post('/api/prompts/:name/versions/:version/clone', route('Clone prompt version', async (c) => {
    const body = await parseBody(c, cloneSchema);
    const prompt = prompts.cloneToDraft(c.req.param('name'), versionParam(c), body.createdBy);
    return c.json({ prompt }, 201);
  }));

  app.patch('/api/prompts/:name/versions/:version', route('Update draft', async (c) => {
    const body = await parseBody(c, updateDraftSchema);
    const prompt = prompts.updateDraft(c.req.param('name'), versionParam(c), body);
    return c.json({ prompt });
  }));

  app.delete('/api/prompts/:name/versions/:version', route('Delete prompt version', (c) => {
    const prompt = prompts.deleteVersion(c.req.param('name'), versionParam(c));
    return c.json({ deleted: prompt });
  }));

  app.post('/api/prompts/:name/compile', route('Compile prompt', async (c) => {
    const body = await parseBody(c, compileSchema);
    const prompt = prompts.fetch(c.req.param('name'), {
      version: body.version,
      state: body.state,
      fallback: body.fallback,
    });
    const compiled = prompts.render(prompt, body.variables, { validate: body.validate });
    return c.json({
      name: prompt.name,
      version: prompt.version,
      state: prompt.state,
      compiled,
    });
  }));

  app.get('/api/prompts/:name/cache-stats', route('Prompt cache stats', (c) => {
    return c.json(prompts.cacheStats(c.req.param('name')));
  }));

  app.delete('/api/prompts/:name/cache', route('Invalidate prompt cache', (c) => {
    return c.json({ invalidated: prompts.invalidateCache(c.req.param('name')) });
  }));
}
