import type { AppConfig } from '../config';
import { createFileCatalogStore, createGcsCatalogStore, type CatalogStore, type CatalogTarget } from './catalog';
import { createOpenAIDisambiguator, type Disambiguator } from './disambiguator';
import { createHttpEncoder, createOpenAIEncoder, type EmbeddingEncoder } from './encoder';

export type MatcherRuntime = {
  catalog: CatalogStore;
  encoder: EmbeddingEncoder;
  disambiguator: Disambiguator;
}

export function catalogTarget(config: AppConfig): CatalogTarget {
  return config.catalogSource === 'gcs'
    ? { kind: 'gcs', bucketName: config.gcsBucketName, objectPath: config.catalogGcsObject }
    : { kind: 'file', path: config.catalogPath };
}

export function createCatalogStore(config: AppConfig): CatalogStore {
  const target = catalogTarget(config);
  return target.kind === 'gcs'
    ? createGcsCatalogStore(target.bucketName, target.objectPath)
    : createFileCatalogStore(target.path);
}

export function createEncoder(config: AppConfig): EmbeddingEncoder {
  if (config.embeddingProvider === 'http') {
    return createHttpEncoder({
      baseUrl: config.embeddingApiUrl,
      model: config.embeddingModel,
      timeout: config.embeddingRequestTimeoutMs,
    });
  }
  return createOpenAIEncoder({ model: config.embeddingModel, apiKey: config.openaiApiKey });
}

export function createMatcherRuntime(config: AppConfig): MatcherRuntime {
  return {
    catalog: createCatalogStore(config),
    encoder: createEncoder(config),
    disambiguator: createOpenAIDisambiguator({
      model: config.llmModel,
      apiKey: config.openaiApiKey,
    }),
  };
}
