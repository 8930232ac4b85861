/**
 * Route helpers shared by the API modules: error-to-status mapping, body
 * validation and query parsing.
 */

import type { Context } from 'hono';
import type { z } from 'zod';
import {
  InvalidStateTransitionError,
  MissingVariablesError,
  NotFoundError,
  ValidationError,
} from '../errors.js';

export type RouteHandler = (c: Context) => Response | Promise<Response>;

/**
 * Answer with the status that matches the error. Unexpected errors are
 * logged and reported as 500 without their message.
 */
export function errorResponse(c: Context, error: unknown, tag: string): Response {
  if (error instanceof ValidationError) {
    return c.json({ error: error.message, details: error.errors }, 422);
  }
  if (error instanceof MissingVariablesError) {
    return c.json({ error: error.message, missing: error.missing }, 422);
  }
  if (error instanceof NotFoundError) {
    return c.json({ error: error.message }, 404);
  }
  if (error instanceof InvalidStateTransitionError) {
    return c.json({ error: error.message }, 409);
  }
  console.error(`[API] ${tag} failed:`, error);
  return c.json({ error: 'Internal server error' }, 500);
}

/** Wraps a handler so thrown errors become JSON error responses */
export function route(tag: string, handler: RouteHandler): RouteHandler {
  return async (c: Context) => {
    try {
      return await handler(c);
    } catch (error) {
      return errorResponse(c, error, tag);
    }
  };
}

/**
 * Parse and validate the JSON body. An empty body is treated as `{}`.
 */
export async function parseBody<T extends z.ZodTypeAny>(c: Context, schema: T): Promise<z.infer<T>> {
  const raw = await c.req.text();
  let body: unknown = {};
  if (raw.trim() !== '') {
    try {
      body = JSON.parse(raw);
    } catch {
      throw new ValidationError('Request body must be valid JSON');
    }
  }

  const result = schema.safeParse(body);
  if (!result.success) {
    throw new ValidationError(result.error.issues.map(issue => {
      const path = issue.path.join('.');
      return path ? `${path}: ${issue.message}` : issue.message;
    }));
  }
  return result.data;
}

/** Positive integer from a path or query parameter */
export function parsePositiveInt(value: string | undefined, label: string): number {
  const parsed = Number(value);
  if (!value || !Number.isInteger(parsed) || parsed < 1) {
    throw new ValidationError(`${label} must be a positive integer`);
  }
  return parsed;
}

export function parseOptionalPositiveInt(value: string | undefined, label: string): number | undefined {
  return value === undefined || value === '' ? undefined : parsePositiveInt(value, label);
}

/** One of `values`, or undefined when the parameter is absent */
export function parseEnumParam<T extends string>(values: readonly T[], value: string | undefined, label: string): T | undefined {
  if (value === undefined || value === '') return undefined;
  const match = values.find(candidate => candidate === value);
  if (match === undefined) {
    throw new ValidationError(`${label} must be one of: ${values.join(', ')}`);
  }
  return match;
}

export function parseFlag(value: string | undefined): boolean {
  return value === 'true' || value === '1';
}

export interface Page {
  page: number;
  perPage: number;
  limit: number;
  offset: number;
}

export function parsePage(c: Context, defaultPerPage: number): Page {
  const page = parseOptionalPositiveInt(c.req.query('page'), 'page') ?? 1;
  const perPage = parseOptionalPositiveInt(c.req.query('perPage'), 'perPage') ?? defaultPerPage;
  return { page, perPage, limit: perPage, offset: (page - 1) * perPage };
}
