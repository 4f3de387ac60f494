import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { loadConfig } from '../config';
import { disambiguate } from './disambiguator';
import { ConfigurationError } from './errors';
import { catalogTarget, createMatcherRuntime } from './runtime';

describe('createMatcherRuntime', () => {
  beforeEach(() => {
    vi.stubEnv('OPENAI_API_KEY', '');
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('builds an http-encoder runtime without an OpenAI key', () => {
    const runtime = createMatcherRuntime(loadConfig({ EMBEDDING_PROVIDER: 'http' }));
    expect(runtime.encoder.model).toBe('all-MiniLM-L6-v2');
  });

  it('treats the missing key as an unavailable disambiguator', async () => {
    const runtime = createMatcherRuntime(loadConfig({ EMBEDDING_PROVIDER: 'http' }));
    const logger = { log: vi.fn(), warn: vi.fn(), error: vi.fn() };

    await expect(disambiguate('check kidney numbers', ['RFT'], runtime.disambiguator, logger)).resolves.toEqual(['Other']);
    expect(logger.warn).toHaveBeenCalledWith('   Disambiguator failed: OPENAI_API_KEY is not set (treating as "Other")');
  });

  it('fails the openai encoder only when it is used', async () => {
    const runtime = createMatcherRuntime(loadConfig({}));
    expect(runtime.encoder.model).toBe('text-embedding-3-small');
    await expect(runtime.encoder.encode('check CBC')).rejects.toThrow(ConfigurationError);
  });

  it('requires a bucket for the gcs catalog', () => {
    expect(() => createMatcherRuntime(loadConfig({ CATALOG_SOURCE: 'gcs', EMBEDDING_PROVIDER: 'http' })))
      .toThrow(ConfigurationError);
  });
});

describe('catalogTarget', () => {
  it('points at the configured file or object', () => {
    expect(catalogTarget(loadConfig({ CATALOG_PATH: 'catalog.json' }))).toEqual({ kind: 'file', path: 'catalog.json' });
    expect(catalogTarget(loadConfig({ CATALOG_SOURCE: 'gcs', GCS_BUCKET_NAME: 'test-bucket' }))).toEqual({
      kind: 'gcs',
      bucketName: 'test-bucket',
      objectPath: 'catalog/tests_with_embeddings.json',
    });
  });
});
