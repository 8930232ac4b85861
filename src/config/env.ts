/**
 * Environment Variable Validation
 *
 * Validates and types all environment variables at startup using Zod.
 * This ensures invalid config values are caught early with clear error messages.
 */

import { z } from 'zod';
import { join } from 'path';

const booleanFlag = (defaultValue: 'true' | 'false') =>
  z.enum(['true', 'false']).default(defaultValue).transform(v => v === 'true');

/**
 * Prompt states a fetch may default to
 */
const PromptStateSchema = z.enum(['draft', 'production', 'archived']);

/**
 * Environment variable schema with defaults and validation
 */
const envSchema = z.object({
  // Server
  PORT: z.string().regex(/^\d+$/).transform(Number).default('3000'),
  DB_PATH: z.string().optional(),
  BIND_ADDRESS: z.string().default('127.0.0.1'),

  // Prompt cache
  PROMPT_CACHE_TTL_SECONDS: z.string().regex(/^\d+$/).transform(Number).default('300'),
  PROMPT_CACHE_NAMESPACE: z.string().min(1).default('promptlab:prompt'),
  PROMPT_CACHE_MONITORING: booleanFlag('true'),
  PROMPT_CACHE_WARMING: booleanFlag('true'),
  // Comma-separated prompt names warmed on startup
  PROMPT_CACHE_CRITICAL_PROMPTS: z.string().default(''),

  // Prompt versioning
  PROMPT_DEFAULT_STATE: PromptStateSchema.default('production'),
  PROMPT_ALLOW_PRODUCTION_DELETION: booleanFlag('false'),
  PROMPT_CONFIG_SCHEMA_STRICT: booleanFlag('false'),

  // API
  PAGINATION_PER_PAGE: z.string().regex(/^\d+$/).transform(Number).default('25'),
});

/**
 * Parsed and validated environment type
 */
export type ValidatedEnv = z.infer<typeof envSchema>;

/**
 * Validate environment variables at startup.
 * Throws with detailed messages logged if validation fails.
 */
export function validateEnv(): ValidatedEnv {
  const result = envSchema.safeParse(process.env);

  if (!result.success) {
    console.error('[Config] Environment variable validation failed:');
    for (const issue of result.error.issues) {
      console.error(`  - ${issue.path.join('.')}: ${issue.message}`);
    }
    throw new Error('Invalid environment configuration. See errors above.');
  }

  return result.data;
}

/**
 * Build the CONFIG object from validated environment variables.
 */
export function buildConfig(env: ValidatedEnv) {
  return {
    port: env.PORT,
    dbPath: env.DB_PATH || join(process.cwd(), 'data', 'promptlab.db'),
    bindAddress: env.BIND_ADDRESS,

    promptCache: {
      ttlSeconds: env.PROMPT_CACHE_TTL_SECONDS,
      namespace: env.PROMPT_CACHE_NAMESPACE,
      monitoring: env.PROMPT_CACHE_MONITORING,
      warming: env.PROMPT_CACHE_WARMING,
      criticalPrompts: env.PROMPT_CACHE_CRITICAL_PROMPTS
        .split(',')
        .map(name => name.trim())
        .filter(name => name.length > 0),
    },

    prompts: {
      defaultState: env.PROMPT_DEFAULT_STATE,
      allowProductionDeletion: env.PROMPT_ALLOW_PRODUCTION_DELETION,
      configSchemaStrict: env.PROMPT_CONFIG_SCHEMA_STRICT,
    },

    perPage: Math.max(1, env.PAGINATION_PER_PAGE),
  };
}

export type AppConfig = ReturnType<typeof buildConfig>;
