import type { MatchCandidate, TestRecord } from '../types/matching';
import { ConfigurationError } from './errors';

/**
 * api/services/embeddings.ts
 *
 * Similarity scoring of a chunk embedding against the test catalog.
 * A record scores the best cosine similarity over all of its phrasings
 * (name + synonyms), so "best phrasing wins". Linear scan per chunk.
 *
 * Exports:
 * - cosineSimilarity(vecA, vecB): number
 * - scoreCatalog(query, catalog): ScoredTest[]
 * - embeddingMatch(query, catalog, threshold): MatchCandidate[]
 * - embeddingTopK(query, catalog, topK): string[]
 */

export type ScoredTest = {
  name: string;
  score: number;
}

export function cosineSimilarity(vecA: number[], vecB: number[]): number {
  if (vecA.length !== vecB.length) {
    throw new ConfigurationError(
      `Embedding dimensions differ (${vecA.length} vs ${vecB.length}); catalog and encoder must use the same model`
    );
  }
  let dot = 0, na = 0, nb = 0;
  for (let i = 0; i < vecA.length; i++) {
    dot += vecA[i] * vecB[i];
    na += vecA[i] * vecA[i];
    nb += vecB[i] * vecB[i];
  }
  if (na === 0 || nb === 0) return 0;
  return dot / (Math.sqrt(na) * Math.sqrt(nb));
}

export function bestSimilarity(query: number[], vectors: number[][]): number {
  let best = -Infinity;
  for (const v of vectors) {
    best = Math.max(best, cosineSimilarity(query, v));
  }
  return best;
}

/**
 * Raw best-phrasing score for every record that has embeddings, catalog order.
 */
export function scoreCatalog(query: number[], catalog: readonly TestRecord[]): ScoredTest[] {
  return catalog
    .filter(test => test.embeddings.length > 0)
    .map(test => ({ name: test.name, score: bestSimilarity(query, test.embeddings) }));
}

function byScoreDesc(a: ScoredTest, b: ScoredTest): number {
  return b.score - a.score;
}

/**
 * Records scoring at or above `threshold`, best first, scores rounded to 3 places.
 * The threshold is compared against the unrounded score.
 */
export function embeddingMatch(
  query: number[],
  catalog: readonly TestRecord[],
  threshold = 0.75
): MatchCandidate[] {
  return scoreCatalog(query, catalog)
    .filter(s => s.score >= threshold)
    .sort(byScoreDesc)
    .map(s => ({ name: s.name, score: Number(s.score.toFixed(3)) }));
}

/**
 * Names of the `topK` best-scoring records regardless of threshold.
 */
export function embeddingTopK(query: number[], catalog: readonly TestRecord[], topK = 5): string[] {
  return scoreCatalog(query, catalog)
    .sort(byScoreDesc)
    .slice(0, topK)
    .map(s => s.name);
}

export default { cosineSimilarity, scoreCatalog, embeddingMatch, embeddingTopK };
