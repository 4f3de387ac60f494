import type OpenAI from 'openai';
import { z } from 'zod';
import type { Logger } from '../types/matching';
import { DisambiguatorError, errorMessage } from './errors';
import { completeJson, getOpenAIClient } from './openai';

export const OTHER = 'Other';
export const MAX_LLM_MATCHES = 2;

export const DISAMBIGUATION_RULES = [
  'Pick the SINGLE most appropriate test.',
  'If the doctor clearly mentioned multiple distinct tests (e.g., fasting sugar + post-meal sugar), return both.',
  'Prefer the broader panel/profile if both a panel and its components are in candidates (e.g., choose RFT instead of Creatinine).',
  'Do NOT include tests that were explicitly negated (e.g., "don\'t do CBC").',
  `Return max ${MAX_LLM_MATCHES} items.`,
].join('\n- ');

export type DisambiguationRequest = {
  utterance: string;
  candidates: string[];
  rules: string;
}

export interface Disambiguator {
  /** Raw model output; parsing and validation happen in parseDisambiguation. */
  chooseTests(request: DisambiguationRequest): Promise<string>;
}

const disambiguationSchema = z.object({
  matches: z.array(z.string()),
});

export function buildDisambiguationPrompt(request: DisambiguationRequest): string {
  return `
Doctor said: "${request.utterance}"

Candidate tests: ${request.candidates.join(', ')}

Rules:
- ${request.rules}

Return JSON only in this format:
{ "matches": ["TEST_NAME1", "TEST_NAME2"] }
If nothing fits, return:
{ "matches": ["${OTHER}"] }
`;
}

/**
 * Turn raw model output into at most two candidate names, spelled as in the
 * candidate list. Anything unusable (bad JSON, wrong shape, "Other", names
 * outside the candidate list) collapses to ["Other"].
 */
export function parseDisambiguation(raw: string, candidates: readonly string[]): string[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw.trim());
  } catch {
    return [OTHER];
  }

  const result = disambiguationSchema.safeParse(parsed);
  if (!result.success) return [OTHER];

  const byLowerName = new Map(candidates.map(c => [c.toLowerCase(), c]));
  const picked: string[] = [];
  for (const name of result.data.matches) {
    const canonical = byLowerName.get(name.trim().toLowerCase());
    if (canonical && !picked.includes(canonical)) picked.push(canonical);
  }

  return picked.length > 0 ? picked.slice(0, MAX_LLM_MATCHES) : [OTHER];
}

export function isOther(matches: readonly string[]): boolean {
  return matches.length === 0 || (matches.length === 1 && matches[0] === OTHER);
}

/**
 * Ask the disambiguator once, never throwing: transport failures are logged
 * and read as ["Other"] for this chunk only.
 */
export async function disambiguate(
  utterance: string,
  candidates: string[],
  disambiguator: Disambiguator,
  logger: Logger = console
): Promise<string[]> {
  if (candidates.length === 0) return [OTHER];

  let raw: string;
  try {
    raw = await disambiguator.chooseTests({ utterance, candidates, rules: DISAMBIGUATION_RULES });
  } catch (err) {
    const error = new DisambiguatorError(`Disambiguator failed: ${errorMessage(err)}`, { utterance });
    logger.warn(`   ${error.message} (treating as "${OTHER}")`);
    return [OTHER];
  }

  return parseDisambiguation(raw, candidates);
}

/** The client is resolved per call, so a missing key only fails the chunk that needs the LLM. */
export function createOpenAIDisambiguator(
  options: { model?: string; client?: OpenAI; apiKey?: string } = {}
): Disambiguator {
  const model = options.model ?? 'gpt-4o-mini';
  return {
    async chooseTests(request: DisambiguationRequest) {
      const client = options.client ?? getOpenAIClient(options.apiKey);
      return completeJson(buildDisambiguationPrompt(request), model, client);
    },
  };
}

export default { disambiguate, parseDisambiguation, buildDisambiguationPrompt, createOpenAIDisambiguator };
