export { PromptVersionStore, promptLifecycle, type PromptStoreOptions } from './store.js';
export { PromptCache, type PromptCacheOptions, type PromptCacheKey } from './cache.js';
export { PromptVersionRepository } from './repository.js';
export { initPromptSchema } from './schema.js';
export { validatePromptConfig, KNOWN_CONFIG_KEYS, type ConfigValidationResult } from './config-validator.js';
export { compile, compileWithValidation, extractPlaceholders, findMissingVariables } from './template.js';
export * from './types.js';
