import type {
  AggregatedMatch,
  MatchCandidate,
  MatchMethod,
  MatchReport,
  SkipReason,
  TraceEntry,
} from '../types/matching';

export type ChunkOutcome =
  | { kind: 'negation'; referencedTests: string[] }
  | { kind: 'skip'; reason: SkipReason }
  | { kind: 'embedding'; matches: MatchCandidate[] }
  | { kind: 'llm'; matches: string[]; candidates: string[] };

export type AggregationState = {
  aggregated: Map<string, { method: MatchMethod; score: number | null }>;
  /** names cancelled anywhere in the transcript; never re-admitted */
  removed: Set<string>;
  trace: TraceEntry[];
}

export function createAggregationState(): AggregationState {
  return { aggregated: new Map(), removed: new Set(), trace: [] };
}

function byCodePoint(a: string, b: string): number {
  if (a < b) return -1;
  return a > b ? 1 : 0;
}

/**
 * Fold one chunk's outcome into the transcript state. Chunks must be applied
 * in transcript order: a negation retracts matches from earlier chunks and
 * blocks the same names in later ones.
 */
export function applyChunkOutcome(state: AggregationState, chunk: string, outcome: ChunkOutcome): void {
  switch (outcome.kind) {
    case 'negation': {
      if (outcome.referencedTests.length === 0) {
        state.trace.push({ chunk, method: 'skipped', reason: 'negation' });
        return;
      }
      for (const name of outcome.referencedTests) {
        state.removed.add(name);
        state.aggregated.delete(name);
      }
      state.trace.push({ chunk, method: 'negation', removed: [...outcome.referencedTests] });
      return;
    }

    case 'skip':
      state.trace.push({ chunk, method: 'skipped', reason: outcome.reason });
      return;

    case 'embedding': {
      for (const m of outcome.matches) {
        if (state.removed.has(m.name)) continue;
        const existing = state.aggregated.get(m.name);
        // Embedding beats any LLM entry; among embedding entries the best score stays.
        if (!existing || existing.method === 'llm' || (existing.score ?? -Infinity) < m.score) {
          state.aggregated.set(m.name, { method: 'embedding', score: m.score });
        }
      }
      state.trace.push({ chunk, method: 'embedding', matches: outcome.matches });
      return;
    }

    case 'llm': {
      for (const name of outcome.matches) {
        if (state.removed.has(name) || state.aggregated.has(name)) continue;
        state.aggregated.set(name, { method: 'llm', score: null });
      }
      state.trace.push({ chunk, method: 'llm', matches: outcome.matches, candidates: outcome.candidates });
      return;
    }
  }
}

export function finalizeAggregation(state: AggregationState, transcript: string): MatchReport {
  const detected: AggregatedMatch[] = [...state.aggregated.entries()]
    .map(([name, entry]) => ({ name, method: entry.method, score: entry.score }))
    .sort((a, b) => byCodePoint(a.name, b.name));

  return {
    transcript,
    detected_tests: detected,
    removed_tests: [...state.removed].sort(byCodePoint),
    trace: state.trace,
  };
}

export default { createAggregationState, applyChunkOutcome, finalizeAggregation };
