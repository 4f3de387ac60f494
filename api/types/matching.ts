export type TestRecord = {
  id: string;
  name: string;
  category: string;
  synonyms: string[];
  /** index 0 is the name embedding, then one per synonym in synonym order */
  embeddings: number[][];
}

export type MatchCandidate = {
  name: string;
  score: number;
}

export type MatchMethod = 'embedding' | 'llm';

export type AggregatedMatch = {
  name: string;
  method: MatchMethod;
  score: number | null;
}

export type SkipReason =
  | 'negation'
  | 'symptom_not_test'
  | 'no_intent'
  | 'action_without_test'
  | 'no_clear_test';

export type TraceEntry =
  | { chunk: string; method: 'skipped'; reason: SkipReason }
  | { chunk: string; method: 'negation'; removed: string[] }
  | { chunk: string; method: 'embedding'; matches: MatchCandidate[] }
  | { chunk: string; method: 'llm'; matches: string[]; candidates: string[] };

export type MatchReport = {
  transcript: string;
  detected_tests: AggregatedMatch[];
  removed_tests: string[];
  trace: TraceEntry[];
}

export type CatalogNotReady = {
  error: 'catalog_not_ready';
  message: string;
}

export type MatchTranscriptResult = MatchReport | CatalogNotReady;

export type Vocabulary = {
  negationPhrases: readonly string[];
  orderKeywords: readonly string[];
  symptomWords: readonly string[];
}

export type Logger = Pick<Console, 'log' | 'warn' | 'error'>;
