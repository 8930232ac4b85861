/**
 * Prompt version types
 */

export const PROMPT_STATES = ['draft', 'production', 'archived'] as const;
export type PromptState = typeof PROMPT_STATES[number];

export type PromptEvent = 'promote' | 'demote' | 'restore';

/** Model parameters stored with a version (temperature, max_tokens, ...). */
export type PromptConfig = Record<string, unknown>;

export type TemplateVariables = Record<string, unknown>;

export interface PromptVersion {
  id: string;
  name: string;
  version: number;
  state: PromptState;
  text: string;
  config: PromptConfig;
  commitMessage: string | null;
  createdBy: string | null;
  createdAt: string;
  updatedAt: string;
}

/**
 * Stand-in returned by fetch() when nothing matches and the caller supplied
 * fallback text. Shares the read fields of PromptVersion; `state` tells the
 * two apart.
 */
export interface FallbackPrompt {
  name: string;
  version: null;
  state: 'fallback';
  text: string;
  config: PromptConfig;
}

export type ResolvedPrompt = PromptVersion | FallbackPrompt;

export function isFallback(prompt: ResolvedPrompt): prompt is FallbackPrompt {
  return prompt.state === 'fallback';
}

export interface CreateVersionInput {
  name: string;
  text: string;
  config?: unknown;
  commitMessage?: string | null;
  createdBy?: string | null;
  promoteToProduction?: boolean;
}

export interface UpdateDraftInput {
  text?: string;
  config?: unknown;
  commitMessage?: string | null;
}

export interface FetchOptions {
  version?: number;
  state?: PromptState;
  fallback?: string;
}

export interface TransitionOptions {
  /** Throw InvalidStateTransitionError instead of returning an unchanged result. */
  strict?: boolean;
}

export interface TransitionResult {
  prompt: PromptVersion;
  changed: boolean;
  /** Production version archived as a side effect, if any. */
  archived: PromptVersion | null;
}

export interface PromptSummary {
  name: string;
  latestVersion: number;
  productionVersion: number | null;
  versionCount: number;
  updatedAt: string;
}

export interface VersionDiff {
  addedLines: string[];
  removedLines: string[];
  changed: boolean;
}

export interface VersionComparison {
  from: PromptVersion;
  to: PromptVersion;
  diff: VersionDiff;
}

export interface PromptExport {
  name: string;
  version: number;
  state: PromptState;
  text: string;
  config: PromptConfig;
  commitMessage: string | null;
  createdBy: string | null;
}

export interface CacheStats {
  name: string;
  hits: number;
  misses: number;
  total: number;
  hitRate: number;
}

export interface WarmCacheResult {
  success: string[];
  failed: Array<{ name: string; error: string }>;
}
