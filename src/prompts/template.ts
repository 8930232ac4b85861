/**
 * Prompt template compiler
 *
 * Templates use double-brace tokens:
 *   {{name}} / {{user.name}}   placeholder (dotted paths index nested objects)
 *   {{#items}}…{{/items}}      section, {{^items}}…{{/items}} inverted section
 *   {{! note }}                comment
 *   {{> partial }}             partial
 *
 * Only placeholders are substituted. Block, comment and partial tokens pass
 * through untouched, and so does any placeholder whose path does not resolve.
 */

import { MissingVariablesError } from '../errors.js';
import type { TemplateVariables } from './types.js';

const TOKEN_PATTERN = /\{\{\s*([#^/!>]?)\s*([^{}]*?)\s*\}\}/g;
const PATH_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*(?:\.[A-Za-z0-9_]+)*$/;

interface Token {
  sigil: string;
  body: string;
}

function tokenize(text: string): Token[] {
  const tokens: Token[] = [];
  for (const match of text.matchAll(TOKEN_PATTERN)) {
    tokens.push({ sigil: match[1], body: match[2] });
  }
  return tokens;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function resolvePath(variables: TemplateVariables, path: string): { found: boolean; value: unknown } {
  let current: unknown = variables;
  for (const segment of path.split('.')) {
    if (!isRecord(current) || !Object.prototype.hasOwnProperty.call(current, segment)) {
      return { found: false, value: undefined };
    }
    current = current[segment];
  }
  return { found: true, value: current };
}

function formatValue(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}

/**
 * Placeholders the template requires, in order of first appearance.
 * Section tokens and anything nested inside a section are optional.
 */
export function extractPlaceholders(text: string): string[] {
  const required: string[] = [];
  let depth = 0;

  for (const token of tokenize(text)) {
    switch (token.sigil) {
      case '#':
      case '^':
        depth++;
        break;
      case '/':
        depth = Math.max(0, depth - 1);
        break;
      case '':
        if (depth === 0 && PATH_PATTERN.test(token.body) && !required.includes(token.body)) {
          required.push(token.body);
        }
        break;
      default:
        // comments and partials
        break;
    }
  }

  return required;
}

/**
 * Root keys of required placeholders that `variables` does not provide.
 * A dotted path counts as provided when its root key is present.
 */
export function findMissingVariables(text: string, variables: TemplateVariables): string[] {
  const missing: string[] = [];
  for (const path of extractPlaceholders(text)) {
    const root = path.split('.')[0];
    if (!Object.prototype.hasOwnProperty.call(variables, root) && !missing.includes(root)) {
      missing.push(root);
    }
  }
  return missing;
}

/**
 * Substitute every placeholder whose path resolves in `variables`.
 * Unresolved placeholders stay verbatim.
 */
export function compile(text: string, variables: TemplateVariables = {}): string {
  return text.replace(TOKEN_PATTERN, (raw: string, sigil: string, body: string) => {
    if (sigil !== '' || !PATH_PATTERN.test(body)) return raw;
    const resolved = resolvePath(variables, body);
    return resolved.found ? formatValue(resolved.value) : raw;
  });
}

/**
 * Like compile(), but throws MissingVariablesError naming every absent
 * root key before substituting anything.
 */
export function compileWithValidation(text: string, variables: TemplateVariables = {}): string {
  const missing = findMissingVariables(text, variables);
  if (missing.length > 0) {
    throw new MissingVariablesError(missing);
  }
  return compile(text, variables);
}
