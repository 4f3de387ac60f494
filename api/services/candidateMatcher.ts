import type { Logger, MatchCandidate, TestRecord } from '../types/matching';
import { disambiguate, isOther, OTHER, type Disambiguator } from './disambiguator';
import { embeddingMatch, embeddingTopK } from './embeddings';
import type { EmbeddingEncoder } from './encoder';
import { EncoderUnavailableError, errorMessage } from './errors';

export type ChunkMatch = {
  matches: MatchCandidate[];
  usedFallback: boolean;
  /** names chosen by the disambiguator, ["Other"] when nothing fit; null without fallback */
  llmResult: string[] | null;
  /** candidate list shown to the disambiguator */
  candidates: string[];
}

export type MatcherDeps = {
  encoder: EmbeddingEncoder;
  disambiguator: Disambiguator;
  logger?: Logger;
}

export type MatcherOptions = {
  threshold?: number;
  topK?: number;
}

async function encodeChunk(chunk: string, encoder: EmbeddingEncoder): Promise<number[]> {
  try {
    return await encoder.encode(chunk);
  } catch (err) {
    throw new EncoderUnavailableError(`Embedding encoder unavailable: ${errorMessage(err)}`, {
      model: encoder.model,
    });
  }
}

/**
 * Score one chunk against the catalog. Embedding matches at or above the
 * threshold win outright; otherwise the top-K nearest records go to the
 * disambiguator. One encoder call and at most one disambiguator call.
 */
export async function matchChunk(
  chunk: string,
  catalog: readonly TestRecord[],
  deps: MatcherDeps,
  options: MatcherOptions = {}
): Promise<ChunkMatch> {
  const { threshold = 0.75, topK = 5 } = options;
  const query = await encodeChunk(chunk, deps.encoder);

  const matches = embeddingMatch(query, catalog, threshold);
  if (matches.length > 0) {
    return { matches, usedFallback: false, llmResult: null, candidates: [] };
  }

  const candidates = embeddingTopK(query, catalog, topK);
  const llmResult = await disambiguate(chunk, candidates, deps.disambiguator, deps.logger);

  return {
    matches: [],
    usedFallback: true,
    llmResult: isOther(llmResult) ? [OTHER] : llmResult,
    candidates,
  };
}

export default { matchChunk };
