import { describe, it, expect } from '@jest/globals';
import { CorpusEmptyError, InsufficientCandidatesError } from '../src/agents/errors';
import { compareTieBreak, selectCandidates } from '../src/pipeline/selector';
import type { CandidateScore } from '../src/pipeline/types';

function candidate(paper_id: string, initial_score: number): CandidateScore {
  return { paper_id, initial_score, matched_terms: [] };
}

const signals: Record<string, number | null> = { a: 0.5, b: 0.9, c: null, d: 0.5, e: 0.1 };
const lookup = (id: string) => signals[id] ?? null;
const options = { topK: 10, minRelevanceScore: 0, venue: 'NeurIPS', year: 2025 };

describe('compareTieBreak', () => {
  it('orders by review signal, missing last, then by id', () => {
    expect(['c', 'd', 'a', 'b'].sort((x, y) => compareTieBreak(x, y, lookup))).toEqual(['b', 'a', 'd', 'c']);
  });
});

describe('selectCandidates', () => {
  const candidates = [
    candidate('a', 0.5),
    candidate('b', 0.5),
    candidate('c', 1),
    candidate('d', 0.5),
    candidate('e', 0),
  ];

  it('sorts by score then by the tie-break chain, keeping zero scores', () => {
    expect(selectCandidates(candidates, lookup, options).map((c) => c.paper_id)).toEqual(['c', 'b', 'a', 'd', 'e']);
  });

  it('caps the selection at top_k and applies the relevance floor', () => {
    expect(selectCandidates(candidates, lookup, { ...options, topK: 2 }).map((c) => c.paper_id)).toEqual(['c', 'b']);
    expect(
      selectCandidates(candidates, lookup, { ...options, minRelevanceScore: 0.5 }).map((c) => c.paper_id)
    ).toEqual(['c', 'b', 'a', 'd']);
  });

  it('drops papers under the reviewer-score floor and keeps unreviewed ones', () => {
    const averages: Record<string, number | null> = { a: 5.5, b: 7, c: null, d: 6, e: 3 };
    const selected = selectCandidates(candidates, lookup, {
      ...options,
      minReviewScore: 6,
      reviewAverage: (id) => averages[id] ?? null,
    });
    expect(selected.map((c) => c.paper_id)).toEqual(['c', 'b', 'd']);
  });

  it('is idempotent', () => {
    const once = selectCandidates(candidates, lookup, { ...options, topK: 3 });
    const twice = selectCandidates(once, lookup, { ...options, topK: 3 });
    expect(twice).toEqual(once);
  });

  it('does not mutate its input', () => {
    const before = candidates.map((c) => c.paper_id);
    selectCandidates(candidates, lookup, options);
    expect(candidates.map((c) => c.paper_id)).toEqual(before);
  });

  it('fails only when there are no candidates at all', () => {
    expect(() => selectCandidates([], lookup, options)).toThrow(InsufficientCandidatesError);
    expect(() => selectCandidates([], lookup, options)).toThrow(CorpusEmptyError);
    expect(selectCandidates([candidate('e', 0)], lookup, { ...options, minRelevanceScore: 0.5 })).toEqual([]);
  });
});
