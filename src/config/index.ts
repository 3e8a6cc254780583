/**
 * Configuration - environment parsed once into a typed AppConfig
 */

import { z } from 'zod';
import { CLAUDE_MODELS } from '../integrations/llm/models.js';

// =============================================================================
// SCHEMA
// =============================================================================

const intFromEnv = (fallback: number) => z.coerce.number().int().positive().default(fallback);

/** Width of the vector(...) columns in schema.sql */
export const EMBEDDING_COLUMN_DIMENSIONS = 1536;

// Unset and empty variables both mean "not configured"
const optionalString = z.preprocess(
  (value) => (value === '' ? undefined : value),
  z.string().optional()
);

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),

  DATABASE_URL: z.preprocess(
    (value) => (value === '' ? undefined : value),
    z.string().url().optional()
  ),
  REDIS_URL: z.string().url().default('redis://localhost:6379'),
  QUEUE_PREFIX: z.string().min(1).default('matching'),
  TASK_REGISTRY: z.enum(['memory', 'redis']).default('memory'),

  ANTHROPIC_API_KEY: optionalString,
  PROFILE_MODEL: z.enum(CLAUDE_MODELS).default('claude-3-5-haiku-20241022'),
  EVALUATION_MODEL: z.enum(CLAUDE_MODELS).default('claude-sonnet-4-20250514'),
  LLM_TIMEOUT_MS: intFromEnv(60_000),

  OPENAI_API_KEY: optionalString,
  EMBEDDING_MODEL: z.string().min(1).default('text-embedding-3-small'),
  EMBEDDING_DIMENSIONS: intFromEnv(EMBEDDING_COLUMN_DIMENSIONS).refine(
    (dimensions) => dimensions === EMBEDDING_COLUMN_DIMENSIONS,
    `must be ${EMBEDDING_COLUMN_DIMENSIONS} to fit the embedding columns`
  ),
  EMBEDDING_TIMEOUT_MS: intFromEnv(60_000),

  MATCH_CATEGORY: z.string().min(1).default('FINANCE'),
  MATCH_TOP_K: intFromEnv(10),
  MATCH_MAX_DISTANCE_KM: z.coerce.number().positive().default(30),
  BATCH_COMMIT_SIZE: intFromEnv(20),
  ERROR_LIST_LIMIT: intFromEnv(50),
  PROFILE_REEXTRACTION_POLICY: z.enum(['never', 'on_owner_change']).default('never'),
});

export type Env = z.infer<typeof envSchema>;

// =============================================================================
// APP CONFIG
// =============================================================================

export interface AppConfig {
  env: Env['NODE_ENV'];
  database: {
    url?: string;
  };
  queue: {
    redisUrl: string;
    prefix: string;
    registry: Env['TASK_REGISTRY'];
  };
  llm: {
    apiKey?: string;
    profileModel: Env['PROFILE_MODEL'];
    evaluationModel: Env['EVALUATION_MODEL'];
    timeoutMs: number;
  };
  embedding: {
    apiKey?: string;
    model: string;
    dimensions: number;
    timeoutMs: number;
  };
  matching: {
    category: string;
    topK: number;
    maxDistanceKm: number;
    batchCommitSize: number;
    errorListLimit: number;
    reextractionPolicy: Env['PROFILE_REEXTRACTION_POLICY'];
  };
}

export class ConfigError extends Error {
  constructor(
    message: string,
    public issues: string[]
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function parseConfig(source: NodeJS.ProcessEnv): AppConfig {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`, issues);
  }

  const env = parsed.data;
  return Object.freeze({
    env: env.NODE_ENV,
    database: { url: env.DATABASE_URL },
    queue: {
      redisUrl: env.REDIS_URL,
      prefix: env.QUEUE_PREFIX,
      registry: env.TASK_REGISTRY,
    },
    llm: {
      apiKey: env.ANTHROPIC_API_KEY,
      profileModel: env.PROFILE_MODEL,
      evaluationModel: env.EVALUATION_MODEL,
      timeoutMs: env.LLM_TIMEOUT_MS,
    },
    embedding: {
      apiKey: env.OPENAI_API_KEY,
      model: env.EMBEDDING_MODEL,
      dimensions: env.EMBEDDING_DIMENSIONS,
      timeoutMs: env.EMBEDDING_TIMEOUT_MS,
    },
    matching: {
      category: env.MATCH_CATEGORY,
      topK: env.MATCH_TOP_K,
      maxDistanceKm: env.MATCH_MAX_DISTANCE_KM,
      batchCommitSize: env.BATCH_COMMIT_SIZE,
      errorListLimit: env.ERROR_LIST_LIMIT,
      reextractionPolicy: env.PROFILE_REEXTRACTION_POLICY,
    },
  });
}

// =============================================================================
// SINGLETON
// =============================================================================

let configInstance: AppConfig | null = null;

export function getConfig(): AppConfig {
  if (!configInstance) {
    configInstance = parseConfig(process.env);
  }
  return configInstance;
}

export function resetConfig(): void {
  configInstance = null;
}
