import type {
  CatalogNotReady,
  Logger,
  MatchTranscriptResult,
  TestRecord,
  Vocabulary,
} from '../types/matching';
import { applyChunkOutcome, createAggregationState, finalizeAggregation, type ChunkOutcome } from './aggregator';
import { matchChunk, type MatcherDeps } from './candidateMatcher';
import type { CatalogStore } from './catalog';
import { segmentTranscript } from './chunkSegmenter';
import { ConfigurationError } from './errors';
import { classifyChunk } from './intentClassifier';
import { isOther } from './disambiguator';
import { resolveVocabulary } from './vocabulary';

export type MatchTranscriptDeps = MatcherDeps & {
  /** a store is read once per call; the snapshot is used for every chunk */
  catalog: readonly TestRecord[] | CatalogStore;
}

export type MatchTranscriptOptions = {
  threshold?: number;
  topK?: number;
  vocabulary?: Partial<Vocabulary>;
}

export const DEFAULT_THRESHOLD = 0.75;
export const DEFAULT_TOP_K = 5;

export const CATALOG_NOT_READY_MESSAGE = 'Test catalog is empty. Load a catalog with embeddings (npm run generate-embeddings) first.';

function isCatalogStore(catalog: MatchTranscriptDeps['catalog']): catalog is CatalogStore {
  return !Array.isArray(catalog);
}

async function snapshotCatalog(catalog: MatchTranscriptDeps['catalog']): Promise<TestRecord[]> {
  if (isCatalogStore(catalog)) return catalog.listTestsWithEmbeddings();
  return [...catalog];
}

export function validateMatchOptions(threshold: number, topK: number): void {
  if (!Number.isFinite(threshold) || threshold < 0 || threshold > 1) {
    throw new ConfigurationError(`threshold must be between 0 and 1, got ${threshold}`);
  }
  if (!Number.isInteger(topK) || topK < 1) {
    throw new ConfigurationError(`topK must be a positive integer, got ${topK}`);
  }
}

export function isCatalogNotReady(result: MatchTranscriptResult): result is CatalogNotReady {
  return 'error' in result;
}

type ResolvedChunk = {
  outcome: ChunkOutcome;
  usedFallback: boolean;
}

async function resolveChunk(
  chunk: string,
  catalog: readonly TestRecord[],
  deps: MatcherDeps,
  options: { threshold: number; topK: number; vocabulary: Vocabulary }
): Promise<ResolvedChunk> {
  const { intent, referencedTests } = classifyChunk(chunk, catalog, options.vocabulary);

  switch (intent) {
    case 'negation':
      return { outcome: { kind: 'negation', referencedTests }, usedFallback: false };
    case 'symptom':
      return { outcome: { kind: 'skip', reason: 'symptom_not_test' }, usedFallback: false };
    case 'no_intent':
      return { outcome: { kind: 'skip', reason: 'no_intent' }, usedFallback: false };
    case 'action_without_test':
      return { outcome: { kind: 'skip', reason: 'action_without_test' }, usedFallback: false };
    case 'eligible': {
      const result = await matchChunk(chunk, catalog, deps, options);
      if (result.matches.length > 0) {
        return { outcome: { kind: 'embedding', matches: result.matches }, usedFallback: false };
      }
      if (result.llmResult && !isOther(result.llmResult)) {
        return {
          outcome: { kind: 'llm', matches: result.llmResult, candidates: result.candidates },
          usedFallback: true,
        };
      }
      return { outcome: { kind: 'skip', reason: 'no_clear_test' }, usedFallback: result.usedFallback };
    }
  }
}

/**
 * Main API: detect the tests ordered in a transcript.
 *
 * Chunks are classified and matched one after another against a fixed
 * catalog snapshot and folded into a single report. An empty catalog gives
 * the catalog_not_ready payload instead of an empty match list.
 */
export async function matchTranscript(
  transcript: string,
  deps: MatchTranscriptDeps,
  options: MatchTranscriptOptions = {}
): Promise<MatchTranscriptResult> {
  const { threshold = DEFAULT_THRESHOLD, topK = DEFAULT_TOP_K } = options;
  const logger: Logger = deps.logger ?? console;
  validateMatchOptions(threshold, topK);

  const catalog = await snapshotCatalog(deps.catalog);
  if (catalog.length === 0) {
    logger.warn('matchTranscript: catalog is empty, nothing to match against');
    return { error: 'catalog_not_ready', message: CATALOG_NOT_READY_MESSAGE };
  }

  const vocabulary = resolveVocabulary(options.vocabulary);
  const chunks = segmentTranscript(transcript, vocabulary);
  logger.log(`\n🔍 Processing ${chunks.length} chunks against ${catalog.length} tests (threshold ${threshold})`);

  const t0 = Date.now();
  const state = createAggregationState();
  let fallbacks = 0;

  for (const chunk of chunks) {
    const { outcome, usedFallback } = await resolveChunk(chunk, catalog, deps, { threshold, topK, vocabulary });
    if (usedFallback) fallbacks++;
    applyChunkOutcome(state, chunk, outcome);
  }

  const report = finalizeAggregation(state, transcript);
  logger.log(
    `✓ ${report.detected_tests.length} tests detected, ${report.removed_tests.length} removed, ` +
    `${fallbacks} LLM fallbacks (${Date.now() - t0}ms)`
  );

  return report;
}

export type CatalogStatus = {
  status: 'ready' | 'empty';
  tests_loaded: number;
  tests_with_embeddings: number;
  embedding_model: string;
  categories: string[];
}

export function catalogStatus(catalog: readonly TestRecord[], embeddingModel: string): CatalogStatus {
  return {
    status: catalog.length > 0 ? 'ready' : 'empty',
    tests_loaded: catalog.length,
    tests_with_embeddings: catalog.filter(t => t.embeddings.length > 0).length,
    embedding_model: embeddingModel,
    categories: [...new Set(catalog.map(t => t.category).filter(Boolean))].sort(),
  };
}

export default { matchTranscript, catalogStatus };
