/**
 * api/services/encoder.ts
 *
 * Embedding encoders behind one interface:
 * - createOpenAIEncoder: OpenAI embeddings API
 * - createHttpEncoder: a self-hosted sentence-embedding service
 *   (POST {baseUrl}/encode { text } -> { embedding })
 *
 * The catalog's stored vectors must come from the same model as the encoder.
 */
import axios from 'axios';
import type OpenAI from 'openai';
import { z } from 'zod';
import { getEmbeddings, getOpenAIClient } from './openai';

export interface EmbeddingEncoder {
  readonly model: string;
  encode(text: string): Promise<number[]>;
}

const encodeResponseSchema = z.object({
  embedding: z.array(z.number()).min(1),
});

export const EMBEDDING_CACHE_SIZE = 1000;

/**
 * Wrap an encoder with an in-memory cache keyed by the exact text. Encoders
 * are deterministic per model, so identical text never needs a second round
 * trip. Holds at most `maxEntries` vectors; the oldest entry goes first.
 */
export function withEmbeddingCache(encoder: EmbeddingEncoder, maxEntries = EMBEDDING_CACHE_SIZE): EmbeddingEncoder {
  const cache = new Map<string, number[]>();
  return {
    model: encoder.model,
    async encode(text: string) {
      const cached = cache.get(text);
      if (cached) return cached;
      const embedding = await encoder.encode(text);
      cache.set(text, embedding);
      if (cache.size > maxEntries) {
        const oldest = cache.keys().next();
        if (!oldest.done) cache.delete(oldest.value);
      }
      return embedding;
    },
  };
}

export function createOpenAIEncoder(
  options: { model?: string; client?: OpenAI; apiKey?: string } = {}
): EmbeddingEncoder {
  const model = options.model ?? 'text-embedding-3-small';
  return withEmbeddingCache({
    model,
    async encode(text: string) {
      const client = options.client ?? getOpenAIClient(options.apiKey);
      const [embedding] = await getEmbeddings([text], model, client);
      if (!embedding) throw new Error('OpenAI returned no embedding');
      return embedding;
    },
  });
}

export function createHttpEncoder(options: { baseUrl: string; model?: string; timeout?: number }): EmbeddingEncoder {
  const model = options.model ?? 'all-MiniLM-L6-v2';
  const timeout = options.timeout ?? 30000;
  return withEmbeddingCache({
    model,
    async encode(text: string) {
      const response = await axios.post<unknown>(`${options.baseUrl}/encode`, { text, model }, { timeout });
      return encodeResponseSchema.parse(response.data).embedding;
    },
  });
}

export default { createOpenAIEncoder, createHttpEncoder, withEmbeddingCache };
