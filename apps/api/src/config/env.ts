/**
 * Environment configuration
 *
 * Parses process.env once at startup into a typed config object that is
 * passed explicitly to every service. Nothing below the composition root
 * reads process.env.
 */

import { z } from 'zod'
import { isSafeIdentifier } from '@resource-guide/db'

const identifier = z.string().refine(isSafeIdentifier, { message: 'must be a plain SQL identifier' })

const EnvSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    PORT: z.coerce.number().int().positive().default(8000),
    FRONTEND_URL: z.string().url().optional(),

    DATABASE_URL: z.string().min(1),

    ANTHROPIC_API_KEY: z.string().min(1),
    ANTHROPIC_MODEL: z.string().min(1).default('claude-sonnet-4-20250514'),
    GENERATION_MAX_TOKENS: z.coerce.number().int().positive().default(1024),

    EMBEDDING_PROVIDER: z.enum(['local', 'openai']).default('local'),
    OPENAI_API_KEY: z.string().min(1).optional(),
    OPENAI_EMBEDDING_MODEL: z.string().min(1).default('text-embedding-3-small'),

    VECTOR_INDEX_TABLE: identifier.default('catalog_entries'),
    VECTOR_FIELD: identifier.default('embedding'),
    VECTOR_SEARCH_CANDIDATES: z.coerce.number().int().positive().default(100),
    SEARCH_RESULT_LIMIT: z.coerce.number().int().min(1).max(20).default(3),
    SEARCH_LOG_TABLE: identifier.default('search_logs'),

    REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  })
  .superRefine((env, ctx) => {
    if (env.EMBEDDING_PROVIDER === 'openai' && !env.OPENAI_API_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['OPENAI_API_KEY'],
        message: 'OPENAI_API_KEY is required when EMBEDDING_PROVIDER=openai',
      })
    }
  })

export interface AppConfig {
  env: 'development' | 'production' | 'test'
  port: number
  frontendUrl?: string
  databaseUrl: string
  generation: {
    apiKey: string
    model: string
    maxTokens: number
  }
  embedding:
    | { provider: 'local' }
    | { provider: 'openai'; apiKey: string; model: string }
  vectorIndex: {
    table: string
    vectorField: string
    candidates: number
  }
  searchResultLimit: number
  searchLogTable: string
  requestTimeoutMs: number
}

export class ConfigError extends Error {
  constructor(public readonly issues: z.ZodIssue[]) {
    super(
      `Invalid configuration: ${issues
        .map(issue => `${issue.path.join('.') || '(root)'} ${issue.message}`)
        .join('; ')}`
    )
    this.name = 'ConfigError'
  }
}

export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = EnvSchema.safeParse(source)
  if (!result.success) {
    throw new ConfigError(result.error.issues)
  }
  const env = result.data

  return {
    env: env.NODE_ENV,
    port: env.PORT,
    frontendUrl: env.FRONTEND_URL,
    databaseUrl: env.DATABASE_URL,
    generation: {
      apiKey: env.ANTHROPIC_API_KEY,
      model: env.ANTHROPIC_MODEL,
      maxTokens: env.GENERATION_MAX_TOKENS,
    },
    embedding:
      env.EMBEDDING_PROVIDER === 'openai' && env.OPENAI_API_KEY
        ? { provider: 'openai', apiKey: env.OPENAI_API_KEY, model: env.OPENAI_EMBEDDING_MODEL }
        : { provider: 'local' },
    vectorIndex: {
      table: env.VECTOR_INDEX_TABLE,
      vectorField: env.VECTOR_FIELD,
      candidates: env.VECTOR_SEARCH_CANDIDATES,
    },
    searchResultLimit: env.SEARCH_RESULT_LIMIT,
    searchLogTable: env.SEARCH_LOG_TABLE,
    requestTimeoutMs: env.REQUEST_TIMEOUT_MS,
  }
}
