/**
 * Configuration management using Zod for validation.
 */

import { z } from 'zod';
import dotenv from 'dotenv';
import { fileURLToPath } from 'url';
import { dirname, isAbsolute, join } from 'path';
import { existsSync } from 'fs';
import { ConfigError } from './types/errors.js';

// Get directory name in ES modules
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
export const rootDir = join(__dirname, '..');

// Load .env file if it exists
const envPath = join(rootDir, '.env');
if (existsSync(envPath)) {
  dotenv.config({ path: envPath });
}

/**
 * Configuration schema with validation and defaults.
 */
const ConfigSchema = z.object({
  // Generation service
  LLM_PROVIDER: z.enum(['openai', 'anthropic']).default('openai'),
  LLM_MODEL: z.string().default('gpt-4o'),
  OPENAI_API_KEY: z.string().optional(),
  ANTHROPIC_API_KEY: z.string().optional(),
  LLM_MAX_TOKENS: z.coerce.number().int().positive().default(2048),
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  LLM_MAX_RETRIES: z.coerce.number().int().min(0).max(5).default(1),

  // Field catalog and evaluation fixtures
  FIELD_CATALOG_PATH: z.string().default('data/fields.json'),
  EVAL_DATASET_PATH: z.string().default('data/eval-dataset.json'),

  // Trace store
  WEAVE_TRACE_URL: z.string().url().default('https://trace.wandb.ai'),
  WEAVE_PROJECT: z
    .string()
    .regex(/^[^/]+\/[^/]+$/, 'expected "entity/project"')
    .optional(),
  WEAVE_OP_NAME: z.string().optional(),
  WANDB_API_KEY: z.string().optional(),
  RESULT_LIMIT: z.coerce.number().int().positive().max(10000).default(10000),

  // Server Configuration
  LOG_LEVEL: z
    .enum(['DEBUG', 'INFO', 'WARN', 'ERROR', 'FATAL', 'SILENT'])
    .default('INFO'),
  PORT: z.coerce.number().int().positive().default(8000),
});

type BaseConfig = z.infer<typeof ConfigSchema>;

/**
 * Extended configuration with resolved paths and grouped LLM_CONFIG.
 */
export interface Config extends Omit<BaseConfig,
  'LLM_PROVIDER' | 'LLM_MODEL' | 'OPENAI_API_KEY' | 'ANTHROPIC_API_KEY' |
  'LLM_MAX_TOKENS' | 'LLM_TIMEOUT_MS' | 'LLM_MAX_RETRIES'
> {
  LLM_CONFIG: {
    provider: 'openai' | 'anthropic';
    model: string;
    apiKey?: string;
    maxTokens: number;
    timeoutMs: number;
    maxRetries: number;
  };
}

function resolvePath(path: string): string {
  return isAbsolute(path) ? path : join(rootDir, path);
}

/**
 * Parse and validate configuration from environment variables.
 *
 * API keys are optional here; the service that needs one checks for it, so
 * commands that never call out (listing fields) run without credentials.
 *
 * @throws ConfigError listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = ConfigSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      'Configuration validation failed:',
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const {
    LLM_PROVIDER,
    LLM_MODEL,
    OPENAI_API_KEY,
    ANTHROPIC_API_KEY,
    LLM_MAX_TOKENS,
    LLM_TIMEOUT_MS,
    LLM_MAX_RETRIES,
    ...rest
  } = parsed.data;

  return {
    ...rest,
    FIELD_CATALOG_PATH: resolvePath(rest.FIELD_CATALOG_PATH),
    EVAL_DATASET_PATH: resolvePath(rest.EVAL_DATASET_PATH),
    LLM_CONFIG: {
      provider: LLM_PROVIDER,
      model: LLM_MODEL,
      apiKey: LLM_PROVIDER === 'openai' ? OPENAI_API_KEY : ANTHROPIC_API_KEY,
      maxTokens: LLM_MAX_TOKENS,
      timeoutMs: LLM_TIMEOUT_MS,
      maxRetries: LLM_MAX_RETRIES,
    },
  };
}

let _config: Config | null = null;

/**
 * Global configuration instance (lazy-loaded).
 */
export function getConfig(): Config {
  if (!_config) {
    _config = loadConfig();
  }
  return _config;
}
