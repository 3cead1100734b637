export {
  EnvSchema,
  type Env,
  type AppConfig,
  type OpenAISettings,
  type QdrantSettings,
  type FirecrawlSettings,
  type ChunkingSettings,
  type EnvValidationResult,
  loadAppConfig,
  validateEnv,
} from './env.js';
