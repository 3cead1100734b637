/**
 * Application Configuration
 *
 * All settings come from environment variables and are validated with zod.
 * Scripts load `.env` files through dotenv before calling `loadAppConfig`;
 * serverless handlers read the platform environment directly.
 */

import { z } from 'zod';

// =============================================================================
// Environment Schema
// =============================================================================

/** Empty strings count as unset so `.default()` applies */
const optionalString = z
  .string()
  .optional()
  .transform((value) => (value === undefined || value.trim() === '' ? undefined : value.trim()));

/** Blank values of defaulted settings fall back to the default */
function withDefault<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess(
    (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
    schema
  );
}

export const EnvSchema = z.object({
  OPENAI_API_KEY: z.string().min(1, 'OPENAI_API_KEY is required'),
  OPEN_AI_CHAT_MODEL: withDefault(z.string().min(1).default('gpt-4o-mini')),
  OPEN_AI_EMBEDDING_MODEL: withDefault(z.string().min(1).default('text-embedding-3-small')),
  EMBEDDING_DIMENSIONS: withDefault(z.coerce.number().int().positive().default(1536)),
  OPENAI_TIMEOUT_MS: withDefault(z.coerce.number().int().positive().default(60_000)),

  QDRANT_URL: z.string().url('QDRANT_URL must be a valid URL'),
  QDRANT_API_KEY: optionalString,
  QDRANT_COLLECTION: withDefault(z.string().min(1).default('hr_documents')),
  QDRANT_TIMEOUT_MS: withDefault(z.coerce.number().int().positive().default(30_000)),

  FIRECRAWL_API_KEY: optionalString,
  FIRECRAWL_API_URL: withDefault(z.string().url().default('https://api.firecrawl.dev')),
  FIRECRAWL_TIMEOUT_MS: withDefault(z.coerce.number().int().positive().default(60_000)),

  CHUNK_SIZE: withDefault(z.coerce.number().int().positive().default(1000)),
  CHUNK_OVERLAP: withDefault(z.coerce.number().int().nonnegative().default(200)),
  RETRIEVAL_TOP_K: withDefault(z.coerce.number().int().positive().default(5)),
  CHAT_TEMPERATURE: withDefault(z.coerce.number().min(0).max(2).default(0.3)),
  MAX_SOURCES: withDefault(z.coerce.number().int().positive().default(3)),
  SESSION_TTL_MS: withDefault(z.coerce.number().int().nonnegative().default(0)),

  ALLOWED_ORIGINS: optionalString,
  ADMIN_API_KEY: optionalString,
});

export type Env = z.infer<typeof EnvSchema>;

// =============================================================================
// Structured Configuration
// =============================================================================

export interface OpenAISettings {
  apiKey: string;
  chatModel: string;
  embeddingModel: string;
  embeddingDimensions: number;
  timeoutMs: number;
  temperature: number;
}

export interface QdrantSettings {
  url: string;
  apiKey: string | undefined;
  collectionName: string;
  timeoutMs: number;
}

export interface FirecrawlSettings {
  apiKey: string | undefined;
  baseUrl: string;
  timeoutMs: number;
}

export interface ChunkingSettings {
  chunkSize: number;
  chunkOverlap: number;
}

export interface AppConfig {
  openai: OpenAISettings;
  qdrant: QdrantSettings;
  firecrawl: FirecrawlSettings;
  chunking: ChunkingSettings;
  retrieval: { topK: number; maxSources: number };
  sessions: { ttlMs: number };
  http: { allowedOrigins: string[]; adminApiKey: string | undefined };
}

/**
 * Parse the environment into the application configuration.
 *
 * @throws {z.ZodError} If a required variable is missing or a value is invalid
 */
export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.superRefine((value, ctx) => {
    if (value.CHUNK_OVERLAP >= value.CHUNK_SIZE) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['CHUNK_OVERLAP'],
        message: 'CHUNK_OVERLAP must be smaller than CHUNK_SIZE',
      });
    }
  }).parse(env);

  return {
    openai: {
      apiKey: parsed.OPENAI_API_KEY,
      chatModel: parsed.OPEN_AI_CHAT_MODEL,
      embeddingModel: parsed.OPEN_AI_EMBEDDING_MODEL,
      embeddingDimensions: parsed.EMBEDDING_DIMENSIONS,
      timeoutMs: parsed.OPENAI_TIMEOUT_MS,
      temperature: parsed.CHAT_TEMPERATURE,
    },
    qdrant: {
      url: parsed.QDRANT_URL,
      apiKey: parsed.QDRANT_API_KEY,
      collectionName: parsed.QDRANT_COLLECTION,
      timeoutMs: parsed.QDRANT_TIMEOUT_MS,
    },
    firecrawl: {
      apiKey: parsed.FIRECRAWL_API_KEY,
      baseUrl: parsed.FIRECRAWL_API_URL,
      timeoutMs: parsed.FIRECRAWL_TIMEOUT_MS,
    },
    chunking: {
      chunkSize: parsed.CHUNK_SIZE,
      chunkOverlap: parsed.CHUNK_OVERLAP,
    },
    retrieval: {
      topK: parsed.RETRIEVAL_TOP_K,
      maxSources: parsed.MAX_SOURCES,
    },
    sessions: {
      ttlMs: parsed.SESSION_TTL_MS,
    },
    http: {
      allowedOrigins: splitList(parsed.ALLOWED_ORIGINS),
      adminApiKey: parsed.ADMIN_API_KEY,
    },
  };
}

// =============================================================================
// Validation Without Throwing
// =============================================================================

export interface EnvValidationResult {
  isValid: boolean;
  missingVars: string[];
  errors: string[];
}

const REQUIRED_VARS = ['OPENAI_API_KEY', 'QDRANT_URL'] as const;

/**
 * Check the environment and report problems instead of throwing.
 *
 * @param options.requireScraper - also require FIRECRAWL_API_KEY
 */
export function validateEnv(
  env: NodeJS.ProcessEnv = process.env,
  options?: { requireScraper?: boolean }
): EnvValidationResult {
  const required: string[] = [...REQUIRED_VARS];
  if (options?.requireScraper) {
    required.push('FIRECRAWL_API_KEY');
  }

  const missingVars = required.filter((name) => !env[name]?.trim());
  const errors: string[] = [];

  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    for (const issue of result.error.issues) {
      const field = issue.path.join('.');
      if (missingVars.includes(field)) {
        continue;
      }
      errors.push(`${field}: ${issue.message}`);
    }
  }

  return {
    isValid: missingVars.length === 0 && errors.length === 0,
    missingVars,
    errors,
  };
}

function splitList(value: string | undefined): string[] {
  if (!value) {
    return [];
  }
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}
