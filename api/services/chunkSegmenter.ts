import type { Vocabulary } from '../types/matching';
import { containsAny, normalizeText } from './textNormalizer';
import { DEFAULT_VOCABULARY } from './vocabulary';

const SENTENCE_BOUNDARY = /[.?!\n]/;
const CONJUNCTION = /\b(?:and|&|plus|along with|with|as well as|also)\b|,/i;
const HAS_WORD_CHARACTER = /[\p{L}\p{N}]/u;

/**
 * First order keyword (in vocabulary order) contained in the sentence, or null.
 */
export function findActionWord(
  text: string,
  vocabulary: Vocabulary = DEFAULT_VOCABULARY
): string | null {
  const norm = normalizeText(text);
  return vocabulary.orderKeywords.find(w => norm.includes(w)) ?? null;
}

/**
 * Split a transcript into chunks that each carry at most one test mention.
 *
 * Sentences are split on conjunctions and commas; a part that lost the
 * sentence's action word gets it back as a prefix, so
 * "Check CBC and RBS." -> ["Check CBC", "check RBS"].
 * Output order follows the transcript, which negation handling relies on.
 */
export function segmentTranscript(
  transcript: string,
  vocabulary: Vocabulary = DEFAULT_VOCABULARY
): string[] {
  const chunks: string[] = [];

  for (const raw of transcript.split(SENTENCE_BOUNDARY)) {
    const sentence = raw.trim();
    if (!sentence) continue;

    const actionWord = findActionWord(sentence, vocabulary);

    for (const rawPart of sentence.split(CONJUNCTION)) {
      const part = rawPart.trim();
      if (!HAS_WORD_CHARACTER.test(part)) continue;

      if (actionWord && !containsAny(normalizeText(part), vocabulary.orderKeywords)) {
        chunks.push(`${actionWord} ${part}`);
      } else {
        chunks.push(part);
      }
    }
  }

  return chunks;
}

export default { segmentTranscript, findActionWord };
