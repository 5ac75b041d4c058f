/**
 * Configuration Module
 *
 * Loads and validates environment variables for Shorts Trendwatch.
 * Uses Zod for runtime validation with sensible defaults.
 *
 * Unlike a process-wide singleton, the configuration is built once by the
 * entry point (`loadConfig`) and handed to every component that needs it.
 *
 * @module config
 */

import { z } from 'zod';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { resolveModelConfig, type ModelConfig, type ModelProvider, type TaskType } from './models.js';

// Environment schema with optional values and defaults
const envSchema = z.object({
  // API Keys
  YOUTUBE_API_KEY: z.string().optional(),
  OPENAI_API_KEY: z.string().optional(),
  GOOGLE_AI_API_KEY: z.string().optional(),

  // Data directory and lookup corpus
  TRENDWATCH_DATA_DIR: z.string().optional(),
  DATA_PATH: z.string().optional(),

  // Model overrides
  TEXT_MODEL: z.string().optional(),
  VISION_MODEL: z.string().optional(),

  // Lookup server
  PORT: z.coerce.number().int().min(0).max(65535).default(8000),
  API_TOKEN: z.string().optional(),

  // Runtime options
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
});

type Env = z.infer<typeof envSchema>;

/**
 * API key names understood by the application.
 */
export type ApiKeyName = 'youtube' | 'openai' | 'googleAi';

/**
 * Environment variable behind each API key.
 */
export const API_KEY_ENV: Record<ApiKeyName, string> = {
  youtube: 'YOUTUBE_API_KEY',
  openai: 'OPENAI_API_KEY',
  googleAi: 'GOOGLE_AI_API_KEY',
};

/**
 * Immutable application configuration.
 */
export interface AppConfig {
  nodeEnv: Env['NODE_ENV'];
  isTest: boolean;

  apiKeys: Readonly<Record<ApiKeyName, string | undefined>>;

  /** Base data directory (default ~/.trendwatch) */
  dataDir: string;

  /** Corpus file served by the lookup server */
  dataPath: string;

  models: Readonly<Record<TaskType, ModelConfig>>;

  server: {
    port: number;
    /** Bearer token required by the lookup server, if set */
    apiToken?: string;
  };
}

/**
 * Thrown when the environment fails validation.
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: string[]
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Thrown when required credentials are not configured.
 */
export class MissingCredentialsError extends Error {
  constructor(public readonly missing: string[]) {
    super(
      `Missing API keys: ${missing.join(', ')}. ` +
        'Set them in your environment or .env file.'
    );
    this.name = 'MissingCredentialsError';
  }
}

/**
 * Build the application configuration from an environment map.
 *
 * @param source - Environment variables (defaults to process.env)
 * @throws ConfigError if a variable has an invalid value
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const parseResult = envSchema.safeParse(source);

  if (!parseResult.success) {
    const issues = parseResult.error.issues.map(
      (issue) => `${issue.path.join('.')}: ${issue.message}`
    );
    throw new ConfigError(`Invalid environment variables: ${issues.join('; ')}`, issues);
  }

  const env = parseResult.data;
  const dataDir = nonEmpty(env.TRENDWATCH_DATA_DIR) ?? join(homedir(), '.trendwatch');

  return Object.freeze({
    nodeEnv: env.NODE_ENV,
    isTest: env.NODE_ENV === 'test',
    apiKeys: Object.freeze({
      youtube: nonEmpty(env.YOUTUBE_API_KEY),
      openai: nonEmpty(env.OPENAI_API_KEY),
      googleAi: nonEmpty(env.GOOGLE_AI_API_KEY),
    }),
    dataDir,
    dataPath: nonEmpty(env.DATA_PATH) ?? join(dataDir, 'trendwatch.json'),
    models: Object.freeze({
      analysis: resolveModelConfig('analysis', nonEmpty(env.TEXT_MODEL)),
      vision: resolveModelConfig('vision', nonEmpty(env.VISION_MODEL)),
    }),
    server: {
      port: env.PORT,
      apiToken: nonEmpty(env.API_TOKEN),
    },
  });
}

/**
 * Check if a specific API is configured
 */
export function hasApiKey(config: AppConfig, api: ApiKeyName): boolean {
  return !!config.apiKeys[api];
}

/**
 * Get an API key or throw if not configured
 */
export function requireApiKey(config: AppConfig, api: ApiKeyName): string {
  const key = config.apiKeys[api];
  if (!key) {
    throw new MissingCredentialsError([API_KEY_ENV[api]]);
  }
  return key;
}

/**
 * API key needed to talk to a model provider.
 */
export function providerKeyName(provider: ModelProvider): ApiKeyName {
  return provider === 'openai' ? 'openai' : 'googleAi';
}

/**
 * List every key the pipeline needs that is not configured.
 *
 * The YouTube key is always needed; model keys depend on which
 * providers the configured models route to.
 */
export function findMissingCredentials(config: AppConfig): string[] {
  const needed = new Set<ApiKeyName>(['youtube']);
  for (const model of Object.values(config.models)) {
    needed.add(providerKeyName(model.provider));
  }
  return [...needed].filter((api) => !hasApiKey(config, api)).map((api) => API_KEY_ENV[api]);
}

/**
 * Fail before any network activity when credentials are missing.
 *
 * @throws MissingCredentialsError listing every missing variable
 */
export function assertCredentials(config: AppConfig): void {
  const missing = findMissingCredentials(config);
  if (missing.length > 0) {
    throw new MissingCredentialsError(missing);
  }
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

export { resolveModelConfig, getProviderFromModelId } from './models.js';
export type { ModelConfig, ModelProvider, TaskType } from './models.js';
