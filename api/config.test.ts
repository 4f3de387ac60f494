import { describe, it, expect } from 'vitest';
import { loadConfig } from './config';
import { ConfigurationError } from './services/errors';

describe('loadConfig', () => {
  it('falls back to defaults', () => {
    expect(loadConfig({})).toEqual({
      openaiApiKey: undefined,
      embeddingProvider: 'openai',
      embeddingModel: 'text-embedding-3-small',
      embeddingApiUrl: 'http://127.0.0.1:8001',
      embeddingRequestTimeoutMs: 30000,
      llmModel: 'gpt-4o-mini',
      threshold: 0.75,
      topK: 5,
      catalogSource: 'file',
      catalogPath: 'tests_with_embeddings.json',
      catalogGcsObject: 'catalog/tests_with_embeddings.json',
      gcsBucketName: '',
    });
  });

  it('picks the sentence-transformer model for the http provider', () => {
    expect(loadConfig({ EMBEDDING_PROVIDER: 'http' }).embeddingModel).toBe('all-MiniLM-L6-v2');
    expect(loadConfig({ EMBEDDING_PROVIDER: 'http', EMBEDDING_MODEL: 'bge-small' }).embeddingModel).toBe('bge-small');
  });

  it('reads numbers and the bucket alias', () => {
    const config = loadConfig({ MATCH_THRESHOLD: '0.8', LLM_TOP_K: '3', GCS_BUCKET: 'test-bucket', OPENAI_API_KEY: 'test-secret' });
    expect(config.threshold).toBe(0.8);
    expect(config.topK).toBe(3);
    expect(config.gcsBucketName).toBe('test-bucket');
    expect(config.openaiApiKey).toBe('test-secret');
  });

  it('rejects malformed values', () => {
    expect(() => loadConfig({ MATCH_THRESHOLD: 'high' })).toThrow(ConfigurationError);
    expect(() => loadConfig({ CATALOG_SOURCE: 's3' })).toThrow('CATALOG_SOURCE must be one of file, gcs, got "s3"');
  });
});
