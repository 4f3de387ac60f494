import { describe, it, expect } from 'vitest';
import { applyChunkOutcome, createAggregationState, finalizeAggregation } from './aggregator';

describe('aggregator', () => {
  it('keeps the best embedding score for a test, in either order', () => {
    for (const scores of [[0.8, 0.9], [0.9, 0.8]]) {
      const state = createAggregationState();
      for (const score of scores) {
        applyChunkOutcome(state, 'check CBC', { kind: 'embedding', matches: [{ name: 'CBC', score }] });
      }
      expect(finalizeAggregation(state, '').detected_tests).toEqual([
        { name: 'CBC', method: 'embedding', score: 0.9 },
      ]);
    }
  });

  it('never lets an LLM result replace an embedding match', () => {
    const state = createAggregationState();
    applyChunkOutcome(state, 'check CBC', { kind: 'embedding', matches: [{ name: 'CBC', score: 0.81 }] });
    applyChunkOutcome(state, 'blood work', { kind: 'llm', matches: ['CBC'], candidates: ['CBC', 'RBS'] });

    expect(finalizeAggregation(state, '').detected_tests).toEqual([
      { name: 'CBC', method: 'embedding', score: 0.81 },
    ]);
  });

  it('lets a later embedding match replace an LLM entry', () => {
    const state = createAggregationState();
    applyChunkOutcome(state, 'blood work', { kind: 'llm', matches: ['CBC'], candidates: ['CBC'] });
    applyChunkOutcome(state, 'check CBC', { kind: 'embedding', matches: [{ name: 'CBC', score: 0.77 }] });

    expect(finalizeAggregation(state, '').detected_tests).toEqual([
      { name: 'CBC', method: 'embedding', score: 0.77 },
    ]);
  });

  it('retracts earlier matches on negation and blocks them afterwards', () => {
    const state = createAggregationState();
    applyChunkOutcome(state, 'check CBC', { kind: 'embedding', matches: [{ name: 'CBC', score: 0.95 }] });
    applyChunkOutcome(state, "don't do CBC", { kind: 'negation', referencedTests: ['CBC'] });
    applyChunkOutcome(state, 'send CBC', { kind: 'embedding', matches: [{ name: 'CBC', score: 0.99 }] });
    applyChunkOutcome(state, 'blood count', { kind: 'llm', matches: ['CBC'], candidates: ['CBC'] });

    const report = finalizeAggregation(state, 'transcript');
    expect(report.detected_tests).toEqual([]);
    expect(report.removed_tests).toEqual(['CBC']);
    expect(report.trace).toEqual([
      { chunk: 'check CBC', method: 'embedding', matches: [{ name: 'CBC', score: 0.95 }] },
      { chunk: "don't do CBC", method: 'negation', removed: ['CBC'] },
      { chunk: 'send CBC', method: 'embedding', matches: [{ name: 'CBC', score: 0.99 }] },
      { chunk: 'blood count', method: 'llm', matches: ['CBC'], candidates: ['CBC'] },
    ]);
  });

  it('records a negation without a test as a skip', () => {
    const state = createAggregationState();
    applyChunkOutcome(state, 'no need for that', { kind: 'negation', referencedTests: [] });

    const report = finalizeAggregation(state, '');
    expect(report.removed_tests).toEqual([]);
    expect(report.trace).toEqual([{ chunk: 'no need for that', method: 'skipped', reason: 'negation' }]);
  });

  it('sorts detected and removed names by code point', () => {
    const state = createAggregationState();
    applyChunkOutcome(state, 'a', { kind: 'negation', referencedTests: ['TSH', 'ECG'] });
    applyChunkOutcome(state, 'b', { kind: 'llm', matches: ['RBS', 'HbA1c'], candidates: [] });
    applyChunkOutcome(state, 'c', { kind: 'embedding', matches: [{ name: 'CBC', score: 0.9 }] });

    const report = finalizeAggregation(state, 'x');
    expect(report.detected_tests.map(t => t.name)).toEqual(['CBC', 'HbA1c', 'RBS']);
    expect(report.detected_tests[1]).toEqual({ name: 'HbA1c', method: 'llm', score: null });
    expect(report.removed_tests).toEqual(['ECG', 'TSH']);
    expect(report.transcript).toBe('x');
  });
});
