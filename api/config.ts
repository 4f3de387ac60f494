/**
 * api/config.ts
 *
 * Runtime settings read from the environment (.env is loaded by the CLI
 * entry points before this module is used).
 */
import { ConfigurationError } from './services/errors';

export type EmbeddingProvider = 'openai' | 'http';
export type CatalogSource = 'file' | 'gcs';

export type AppConfig = {
  openaiApiKey?: string;
  embeddingProvider: EmbeddingProvider;
  embeddingModel: string;
  embeddingApiUrl: string;
  embeddingRequestTimeoutMs: number;
  llmModel: string;
  threshold: number;
  topK: number;
  catalogSource: CatalogSource;
  catalogPath: string;
  catalogGcsObject: string;
  gcsBucketName: string;
}

function numberFrom(env: NodeJS.ProcessEnv, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigurationError(`${key} must be a number, got "${raw}"`);
  }
  return value;
}

function oneOf<T extends string>(env: NodeJS.ProcessEnv, key: string, allowed: readonly T[], fallback: T): T {
  const raw = env[key]?.trim();
  if (!raw) return fallback;
  const match = allowed.find(a => a === raw);
  if (!match) {
    throw new ConfigurationError(`${key} must be one of ${allowed.join(', ')}, got "${raw}"`);
  }
  return match;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const embeddingProvider = oneOf(env, 'EMBEDDING_PROVIDER', ['openai', 'http'] as const, 'openai');

  return {
    openaiApiKey: env.OPENAI_API_KEY || undefined,
    embeddingProvider,
    embeddingModel: env.EMBEDDING_MODEL || (embeddingProvider === 'openai' ? 'text-embedding-3-small' : 'all-MiniLM-L6-v2'),
    embeddingApiUrl: env.EMBEDDING_API_URL || 'http://127.0.0.1:8001',
    embeddingRequestTimeoutMs: numberFrom(env, 'EMBEDDING_REQUEST_TIMEOUT_MS', 30000),
    llmModel: env.LLM_MODEL || 'gpt-4o-mini',
    threshold: numberFrom(env, 'MATCH_THRESHOLD', 0.75),
    topK: numberFrom(env, 'LLM_TOP_K', 5),
    catalogSource: oneOf(env, 'CATALOG_SOURCE', ['file', 'gcs'] as const, 'file'),
    catalogPath: env.CATALOG_PATH || 'tests_with_embeddings.json',
    catalogGcsObject: env.CATALOG_GCS_OBJECT || 'catalog/tests_with_embeddings.json',
    gcsBucketName: env.GCS_BUCKET_NAME || env.GCS_BUCKET || '',
  };
}

export default { loadConfig };
