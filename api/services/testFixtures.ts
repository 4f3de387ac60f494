/**
 * In-process stand-ins for the catalog, encoder and disambiguator.
 *
 * Vectors live in a 4-dimension space where each axis is one test, so
 * expected cosine scores can be worked out by hand.
 */
import type { Logger, TestRecord } from '../types/matching';
import type { DisambiguationRequest, Disambiguator } from './disambiguator';
import type { EmbeddingEncoder } from './encoder';

export const AXIS = {
  CBC: [1, 0, 0, 0],
  RBS: [0, 1, 0, 0],
  RFT: [0, 0, 1, 0],
  NONE: [0, 0, 0, 1],
};

export const TEST_CATALOG: TestRecord[] = [
  { id: 'cbc', name: 'CBC', category: 'Hematology', synonyms: ['complete blood count'], embeddings: [AXIS.CBC, AXIS.CBC] },
  { id: 'rbs', name: 'RBS', category: 'Biochemistry', synonyms: ['random blood sugar'], embeddings: [AXIS.RBS, AXIS.RBS] },
  { id: 'rft', name: 'RFT', category: 'Biochemistry', synonyms: ['kidney function test'], embeddings: [AXIS.RFT, AXIS.RFT] },
  // cosine 0.6 against AXIS.NONE and 0.8 against AXIS.RFT
  { id: 'serum-creatinine', name: 'Serum Creatinine', category: 'Biochemistry', synonyms: ['creatinine'], embeddings: [[0, 0, 0.8, 0.6], [0, 0, 0.8, 0.6]] },
  // literal matching only
  { id: 'lft', name: 'LFT', category: 'Biochemistry', synonyms: ['liver panel'], embeddings: [] },
];

export const silentLogger: Logger = {
  log: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

export type FakeEncoder = EmbeddingEncoder & { calls: string[] };

/** Texts missing from `vectors` encode to AXIS.NONE. */
export function createFakeEncoder(vectors: Record<string, number[]> = {}): FakeEncoder {
  const calls: string[] = [];
  return {
    model: 'fake-encoder',
    calls,
    async encode(text: string) {
      calls.push(text);
      return vectors[text] ?? AXIS.NONE;
    },
  };
}

export function createFailingEncoder(message = 'connect ECONNREFUSED'): EmbeddingEncoder {
  return {
    model: 'fake-encoder',
    async encode() {
      throw new Error(message);
    },
  };
}

export type FakeDisambiguator = Disambiguator & { requests: DisambiguationRequest[] };

/** Replies with the raw text from `reply`; a thrown error simulates an outage. */
export function createFakeDisambiguator(
  reply: string | ((request: DisambiguationRequest) => string) = '{"matches": ["Other"]}'
): FakeDisambiguator {
  const requests: DisambiguationRequest[] = [];
  return {
    requests,
    async chooseTests(request: DisambiguationRequest) {
      requests.push(request);
      return typeof reply === 'string' ? reply : reply(request);
    },
  };
}
