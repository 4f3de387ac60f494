import type { TestRecord, Vocabulary } from '../types/matching';
import { containsAny, normalizeText } from './textNormalizer';
import { DEFAULT_VOCABULARY } from './vocabulary';

export type ChunkIntent =
  | 'negation'
  | 'symptom'
  | 'no_intent'
  | 'action_without_test'
  | 'eligible';

export type ChunkClassification = {
  intent: ChunkIntent;
  /** catalog names literally mentioned in the chunk, catalog order */
  referencedTests: string[];
}

type ChunkFacts = {
  normalized: string;
  hasOrderIntent: boolean;
  referencedTests: string[];
}

type IntentRule = {
  intent: ChunkIntent;
  applies: (facts: ChunkFacts, vocabulary: Vocabulary) => boolean;
}

// Evaluated top to bottom, first match wins. Negation outranks everything,
// including an explicit order keyword in the same chunk.
const INTENT_RULES: readonly IntentRule[] = [
  { intent: 'negation', applies: (f, v) => containsAny(f.normalized, v.negationPhrases) },
  { intent: 'symptom', applies: (f, v) => containsAny(f.normalized, v.symptomWords) },
  { intent: 'no_intent', applies: f => !f.hasOrderIntent && f.referencedTests.length === 0 },
  // An order without a literal catalog term is not sent on to semantic matching.
  { intent: 'action_without_test', applies: f => f.hasOrderIntent && f.referencedTests.length === 0 },
  { intent: 'eligible', applies: () => true },
];

export function isOrderIntent(text: string, vocabulary: Vocabulary = DEFAULT_VOCABULARY): boolean {
  return containsAny(normalizeText(text), vocabulary.orderKeywords);
}

function mentions(normalized: string, term: string): boolean {
  const needle = term.trim().toLowerCase();
  return needle.length > 0 && normalized.includes(needle);
}

/**
 * Names of catalog tests whose name or a synonym appears verbatim
 * (case-insensitive) in the chunk.
 */
export function findReferencedTests(text: string, catalog: readonly TestRecord[]): string[] {
  const norm = normalizeText(text);
  const names: string[] = [];

  for (const test of catalog) {
    if (mentions(norm, test.name) || test.synonyms.some(syn => mentions(norm, syn))) {
      names.push(test.name);
    }
  }

  return names;
}

export function classifyChunk(
  chunk: string,
  catalog: readonly TestRecord[],
  vocabulary: Vocabulary = DEFAULT_VOCABULARY
): ChunkClassification {
  const facts: ChunkFacts = {
    normalized: normalizeText(chunk),
    hasOrderIntent: isOrderIntent(chunk, vocabulary),
    referencedTests: findReferencedTests(chunk, catalog),
  };

  const rule = INTENT_RULES.find(r => r.applies(facts, vocabulary));
  return {
    intent: rule ? rule.intent : 'eligible',
    referencedTests: facts.referencedTests,
  };
}

export default { classifyChunk, findReferencedTests, isOrderIntent };
