/**
 * PromptVersionStore - versioned lifecycle of named prompt templates.
 *
 * Versions are created as drafts (max version + 1) and move through
 *   draft --promote--> production --demote--> archived --restore--> production
 * Promoting or restoring archives the current production version of the
 * same name in the same transaction; the partial unique index in schema.ts
 * rejects any write that would leave two production versions.
 *
 * Every mutating call invalidates the cached lookups for the prompt name.
 */

import { v4 as uuid } from 'uuid';
import { getDb, isUniqueViolation } from '../db/index.js';
import { InvalidStateTransitionError, NotFoundError, ValidationError, errorMessage } from '../errors.js';
import { StateMachine } from '../utils/state-machine.js';
import { PromptCache } from './cache.js';
import type { PromptCacheKey } from './cache.js';
import { validatePromptConfig } from './config-validator.js';
import { PromptVersionRepository } from './repository.js';
import { compile, compileWithValidation } from './template.js';
import { isFallback } from './types.js';
import type {
  CacheStats,
  CreateVersionInput,
  FallbackPrompt,
  FetchOptions,
  PromptConfig,
  PromptEvent,
  PromptExport,
  PromptState,
  PromptSummary,
  PromptVersion,
  ResolvedPrompt,
  TemplateVariables,
  TransitionOptions,
  TransitionResult,
  UpdateDraftInput,
  VersionComparison,
  WarmCacheResult,
} from './types.js';

export const promptLifecycle = new StateMachine<PromptState, PromptEvent>('prompt version', {
  promote: { from: ['draft'], to: 'production' },
  demote: { from: ['production'], to: 'archived' },
  restore: { from: ['archived'], to: 'production' },
});

export interface PromptStoreOptions {
  cache: PromptCache;
  /** State fetch() resolves when neither version nor state is given. */
  defaultState?: PromptState;
  allowProductionDeletion?: boolean;
  /** Reject config keys outside the known schema. */
  strictConfig?: boolean;
  /** Names warmCache() loads when called without arguments. */
  criticalPrompts?: string[];
}

function splitLines(text: string): string[] {
  return text.split(/\r?\n/);
}

export class PromptVersionStore {
  readonly cache: PromptCache;
  private repo = new PromptVersionRepository();
  private defaultState: PromptState;
  private allowProductionDeletion: boolean;
  private strictConfig: boolean;
  private criticalPrompts: string[];

  constructor(options: PromptStoreOptions) {
    this.cache = options.cache;
    this.defaultState = options.defaultState ?? 'production';
    this.allowProductionDeletion = options.allowProductionDeletion ?? false;
    this.strictConfig = options.strictConfig ?? false;
    this.criticalPrompts = options.criticalPrompts ?? [];
  }

  // ============================================================
  // Creation
  // ============================================================

  createVersion(input: CreateVersionInput): PromptVersion {
    const name = (input.name ?? '').trim();
    const errors: string[] = [];
    if (!name) errors.push('Name is required');
    if (!input.text || !input.text.trim()) errors.push('Text is required');
    const config = this.validateConfig(input.config, errors);
    if (errors.length > 0) {
      throw new ValidationError(errors);
    }

    const prompt = this.insertNextVersion({
      name,
      text: input.text,
      config,
      commitMessage: input.commitMessage ?? null,
      createdBy: input.createdBy ?? null,
      promoteToProduction: input.promoteToProduction ?? false,
    });
    console.log(`[PromptStore] Created ${name} v${prompt.version} (${prompt.state})`);
    return prompt;
  }

  /**
   * Copy a version's text and config into a new draft at the next version.
   */
  cloneToDraft(name: string, version: number, createdBy?: string | null): PromptVersion {
    const source = this.requireVersion(name, version);
    const prompt = this.insertNextVersion({
      name,
      text: source.text,
      config: source.config,
      commitMessage: `Cloned from v${source.version} (${source.state})`,
      createdBy: createdBy ?? null,
      promoteToProduction: false,
    });
    console.log(`[PromptStore] Cloned ${name} v${source.version} to draft v${prompt.version}`);
    return prompt;
  }

  private insertNextVersion(fields: {
    name: string;
    text: string;
    config: PromptConfig;
    commitMessage: string | null;
    createdBy: string | null;
    promoteToProduction: boolean;
  }): PromptVersion {
    try {
      const prompt = getDb().transaction(() => {
        const now = new Date().toISOString();
        const draft: PromptVersion = {
          id: uuid(),
          name: fields.name,
          version: this.repo.maxVersion(fields.name) + 1,
          state: 'draft',
          text: fields.text,
          config: fields.config,
          commitMessage: fields.commitMessage,
          createdBy: fields.createdBy,
          createdAt: now,
          updatedAt: now,
        };
        this.repo.insert(draft);
        return fields.promoteToProduction ? this.applyTransition(draft, 'promote').prompt : draft;
      });
      return prompt;
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ValidationError(`Version conflict for prompt '${fields.name}', retry the request`);
      }
      throw error;
    } finally {
      this.cache.invalidate(fields.name);
    }
  }

  // ============================================================
  // Lookup
  // ============================================================

  /**
   * Version lookup without fallback: by number when `version` is given,
   * otherwise the version in `state` (default state when omitted).
   */
  find(name: string, options: Omit<FetchOptions, 'fallback'> = {}): PromptVersion | undefined {
    const key: PromptCacheKey = options.version !== undefined
      ? { name, version: options.version }
      : { name, state: options.state ?? this.defaultState };

    const cached = this.cache.get(key);
    if (cached) return cached;

    const prompt = 'version' in key
      ? this.repo.findByVersion(name, key.version)
      : this.repo.findInState(name, key.state);
    if (prompt) {
      this.cache.set(key, prompt);
    }
    return prompt;
  }

  /**
   * Resolve a prompt, falling back to caller-supplied text when nothing
   * matches. Throws NotFoundError when there is no match and no fallback.
   */
  fetch(name: string, options: FetchOptions = {}): ResolvedPrompt {
    const prompt = this.find(name, options);
    if (prompt) return prompt;

    if (options.fallback !== undefined) {
      const fallback: FallbackPrompt = { name, version: null, state: 'fallback', text: options.fallback, config: {} };
      return fallback;
    }

    const identifier = options.version !== undefined
      ? `${name}@v${options.version}`
      : `${name}@${options.state ?? this.defaultState}`;
    throw new NotFoundError('Prompt', identifier);
  }

  /** Versions of each name in `state`, keyed by name. Names with no match are omitted. */
  fetchAll(names: string[], state: PromptState = 'production'): Record<string, PromptVersion> {
    const result: Record<string, PromptVersion> = {};
    for (const name of names) {
      const prompt = this.find(name, { state });
      if (prompt) result[name] = prompt;
    }
    return result;
  }

  getVersion(name: string, version: number): PromptVersion {
    return this.requireVersion(name, version);
  }

  listVersions(name: string): PromptVersion[] {
    return this.repo.findByName(name);
  }

  listPrompts(): PromptSummary[] {
    return this.repo.summaries();
  }

  previousVersion(name: string, version: number): PromptVersion | undefined {
    return this.repo.findAdjacent(name, version, 'before');
  }

  nextVersion(name: string, version: number): PromptVersion | undefined {
    return this.repo.findAdjacent(name, version, 'after');
  }

  latestVersion(name: string): PromptVersion | undefined {
    return this.repo.findLatest(name);
  }

  // ============================================================
  // State transitions
  // ============================================================

  promote(name: string, version: number, options: TransitionOptions = {}): TransitionResult {
    return this.transition(name, version, 'promote', options);
  }

  demote(name: string, version: number, options: TransitionOptions = {}): TransitionResult {
    return this.transition(name, version, 'demote', options);
  }

  restore(name: string, version: number, options: TransitionOptions = {}): TransitionResult {
    return this.transition(name, version, 'restore', options);
  }

  /**
   * Make `toVersion` the production version again. Archived versions are
   * restored, a production version is left as is, drafts are rejected.
   */
  rollback(name: string, toVersion: number): TransitionResult {
    const prompt = this.requireVersion(name, toVersion);
    switch (prompt.state) {
      case 'archived':
        return this.transition(name, toVersion, 'restore', { strict: true });
      case 'production':
        return { prompt, changed: false, archived: null };
      case 'draft':
        throw new InvalidStateTransitionError('prompt version', prompt.state, 'rollback');
    }
  }

  private transition(name: string, version: number, event: PromptEvent, options: TransitionOptions): TransitionResult {
    try {
      const result = getDb().transaction(() => {
        const prompt = this.requireVersion(name, version);
        if (options.strict) {
          promptLifecycle.fire(prompt.state, event);
        }
        return this.applyTransition(prompt, event);
      });

      if (result.changed) {
        const archivedNote = result.archived ? `, archived v${result.archived.version}` : '';
        console.log(`[PromptStore] ${event} ${name} v${version} -> ${result.prompt.state}${archivedNote}`);
      }
      return result;
    } finally {
      this.cache.invalidate(name);
    }
  }

  /** Must run inside a transaction. */
  private applyTransition(prompt: PromptVersion, event: PromptEvent): TransitionResult {
    const to = promptLifecycle.next(prompt.state, event);
    if (to === null) {
      return { prompt, changed: false, archived: null };
    }

    const now = new Date().toISOString();
    let archived: PromptVersion | null = null;

    if (to === 'production') {
      const current = this.repo.findInState(prompt.name, 'production');
      if (current && current.id !== prompt.id) {
        this.repo.update(current.id, { state: 'archived' }, now);
        archived = { ...current, state: 'archived', updatedAt: now };
      }
    }

    this.repo.update(prompt.id, { state: to }, now);
    return { prompt: { ...prompt, state: to, updatedAt: now }, changed: true, archived };
  }

  // ============================================================
  // Editing and deletion
  // ============================================================

  /**
   * Edit a draft in place. Production and archived versions are immutable.
   */
  updateDraft(name: string, version: number, input: UpdateDraftInput): PromptVersion {
    const prompt = this.requireVersion(name, version);
    if (prompt.state !== 'draft') {
      throw new ValidationError(`Cannot edit ${prompt.state} prompt. Clone to draft first.`);
    }

    const errors: string[] = [];
    if (input.text !== undefined && !input.text.trim()) errors.push('Text is required');
    const config = input.config !== undefined ? this.validateConfig(input.config, errors) : undefined;
    if (errors.length > 0) {
      throw new ValidationError(errors);
    }

    const now = new Date().toISOString();
    this.repo.update(prompt.id, { text: input.text, config, commitMessage: input.commitMessage }, now);
    this.cache.invalidate(name);

    return {
      ...prompt,
      text: input.text ?? prompt.text,
      config: config ?? prompt.config,
      commitMessage: input.commitMessage !== undefined ? input.commitMessage : prompt.commitMessage,
      updatedAt: now,
    };
  }

  deleteVersion(name: string, version: number): PromptVersion {
    const prompt = this.requireVersion(name, version);
    if (prompt.state === 'production' && !this.allowProductionDeletion) {
      throw new ValidationError('Cannot delete production prompt. Demote it first.');
    }

    this.repo.delete(prompt.id);
    this.cache.invalidate(name);
    console.log(`[PromptStore] Deleted ${name} v${version} (${prompt.state})`);
    return prompt;
  }

  // ============================================================
  // Compilation
  // ============================================================

  compile(text: string, variables: TemplateVariables = {}): string {
    return compile(text, variables);
  }

  compileWithValidation(text: string, variables: TemplateVariables = {}): string {
    return compileWithValidation(text, variables);
  }

  /**
   * Compile a resolved prompt. Fallback text is returned unchanged.
   */
  render(prompt: ResolvedPrompt, variables: TemplateVariables = {}, options: { validate?: boolean } = {}): string {
    if (isFallback(prompt)) return prompt.text;
    return options.validate ? compileWithValidation(prompt.text, variables) : compile(prompt.text, variables);
  }

  // ============================================================
  // Comparison and export
  // ============================================================

  compareVersions(name: string, versionA: number, versionB: number): VersionComparison {
    const from = this.requireVersion(name, versionA);
    const to = this.requireVersion(name, versionB);

    const fromLines = splitLines(from.text);
    const toLines = splitLines(to.text);
    const fromSet = new Set(fromLines);
    const toSet = new Set(toLines);

    return {
      from,
      to,
      diff: {
        addedLines: toLines.filter(line => !fromSet.has(line)),
        removedLines: fromLines.filter(line => !toSet.has(line)),
        changed: from.text !== to.text,
      },
    };
  }

  exportVersion(prompt: PromptVersion): PromptExport {
    return {
      name: prompt.name,
      version: prompt.version,
      state: prompt.state,
      text: prompt.text,
      config: prompt.config,
      commitMessage: prompt.commitMessage,
      createdBy: prompt.createdBy,
    };
  }

  // ============================================================
  // Cache management
  // ============================================================

  invalidateCache(name: string): number {
    return this.cache.invalidate(name);
  }

  /**
   * Load production versions into the cache. Defaults to the configured
   * critical prompts, or every name with a production version.
   */
  warmCache(names?: string[]): WarmCacheResult {
    const targets = names
      ?? (this.criticalPrompts.length > 0 ? this.criticalPrompts : this.repo.namesInState('production'));
    const result: WarmCacheResult = { success: [], failed: [] };

    for (const name of targets) {
      try {
        this.fetch(name, { state: 'production' });
        result.success.push(name);
      } catch (error) {
        const message = errorMessage(error);
        result.failed.push({ name, error: message });
        console.error(`[PromptStore] Failed to warm cache for ${name}: ${message}`);
      }
    }

    console.log(`[PromptStore] Cache warming completed: ${result.success.length} success, ${result.failed.length} failed`);
    return result;
  }

  cacheStats(name: string): CacheStats {
    return this.cache.getStats(name);
  }

  clearStats(): void {
    this.cache.clearStats();
  }

  // ============================================================
  // Helpers
  // ============================================================

  private requireVersion(name: string, version: number): PromptVersion {
    const prompt = this.repo.findByVersion(name, version);
    if (!prompt) {
      throw new NotFoundError('Prompt', `${name}@v${version}`);
    }
    return prompt;
  }

  private validateConfig(config: unknown, errors: string[]): PromptConfig {
    const result = validatePromptConfig(config, { strict: this.strictConfig });
    if (!result.valid) {
      errors.push(...result.errors);
      return {};
    }
    return result.config;
  }
}
