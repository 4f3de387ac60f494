import type { Vocabulary } from '../types/matching';

// Matched as substrings of normalized text, so entries are lower-case ASCII.

export const NEGATION_PHRASES = [
  "don't", 'dont', 'do not', 'no need', 'not required',
  'not needed', 'avoid', 'skip', 'no longer', 'stop', 'already have',
  'already done', 'cancel', 'remove', 'drop', 'exclude',
] as const;

// Order matters: the first keyword found is the one inherited by split chunks.
export const ORDER_KEYWORDS = [
  'check', 'test', 'do', 'order', 'send', 'investigate', 'take', 'include', 'add',
] as const;

export const SYMPTOM_WORDS = [
  'pain', 'pressure', 'heaviness', 'fatigue', 'breathlessness',
  'dizziness', 'weakness', 'palpitation', 'swelling',
] as const;

export const DEFAULT_VOCABULARY: Vocabulary = {
  negationPhrases: NEGATION_PHRASES,
  orderKeywords: ORDER_KEYWORDS,
  symptomWords: SYMPTOM_WORDS,
};

export function resolveVocabulary(overrides: Partial<Vocabulary> = {}): Vocabulary {
  return { ...DEFAULT_VOCABULARY, ...overrides };
}
