/**
 * Score API Routes
 */

import type { Hono } from 'hono';
import { z } from 'zod';
import { NotFoundError } from '../errors.js';
import type { ScoreRepository } from '../scores/repository.js';
import { makeScoreable } from '../scores/scoreable.js';
import { SCORE_DATA_TYPES, SCORE_SOURCES, SCOREABLE_TYPES } from '../scores/types.js';
import { parseBody, parseEnumParam, route } from './http.js';

export interface ScoreRoutesConfig {
  scores: ScoreRepository;
}

const scoreBodySchema = z.object({
  scoreableType: z.enum(SCOREABLE_TYPES),
  scoreableId: z.string().min(1),
  name: z.string(),
  value: z.number(),
  dataType: z.enum(SCORE_DATA_TYPES).optional(),
  source: z.enum(SCORE_SOURCES).optional(),
  comment: z.string().nullish(),
  stringValue: z.string().nullish(),
  observationId: z.string().nullish(),
  createdBy: z.string().nullish(),
});

export function setupScoreRoutes(app: Hono, config: ScoreRoutesConfig): void {
  const { scores } = config;

  // Creates the score, or replaces the one with the same owner, name and source
  app.post('/api/scores', route('Upsert score', async (c) => {
    const { scoreableType, scoreableId, ...fields } = await parseBody(c, scoreBodySchema);
    const score = scores.upsert({ ...fields, scoreable: makeScoreable(scoreableType, scoreableId) });
    return c.json({ score });
  }));

  app.get('/api/scores', route('List scores', (c) => {
    const type = parseEnumParam(SCOREABLE_TYPES, c.req.query('type'), 'type');
    const id = c.req.query('id');
    if (!type || !id) {
      return c.json({ error: 'type and id query parameters are required' }, 400);
    }
    const scoreable = makeScoreable(type, id);
    return c.json({ scores: scores.findForScoreable(scoreable), summary: scores.summaryFor(scoreable) });
  }));

  app.get('/api/scores/:id', route('Get score', (c) => {
    const score = scores.findById(c.req.param('id'));
    if (!score) {
      throw new NotFoundError('Score', c.req.param('id'));
    }
    return c.json({ score });
  }));

  app.delete('/api/scores/:id', route('Delete score', (c) => {
    if (!scores.delete(c.req.param('id'))) {
      throw new NotFoundError('Score', c.req.param('id'));
    }
    return c.json({ success: true });
  }));
}
