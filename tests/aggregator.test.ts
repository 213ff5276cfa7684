import { describe, it, expect } from '@jest/globals';
import { loadPipelineConfig } from '../src/config/pipeline';
import { aggregateRanking, fastScore, finalScore, rubricComposite } from '../src/pipeline/aggregator';
import type { CandidateScore, RubricScore } from '../src/pipeline/types';

const config = loadPipelineConfig({}, {});

function candidate(paper_id: string, initial_score: number): CandidateScore {
  return { paper_id, initial_score, matched_terms: [] };
}

function rubric(paper_id: string, value: number, schema_valid = true): RubricScore {
  return {
    paper_id,
    relevance: value,
    novelty: value,
    impact: value,
    practicality: value,
    rationale: schema_valid ? 'ok' : 'Evaluation unavailable: test',
    review_summary: '',
    field_insights: '',
    schema_valid,
  };
}

describe('rubricComposite', () => {
  it('is the weighted sum of the four dimensions', () => {
    const dims = { relevance: 0.95, novelty: 0.85, impact: 0.825, practicality: 0.85 };
    expect(rubricComposite(dims, config)).toBeCloseTo(0.88375, 10);
    expect(rubricComposite({ ...dims, practicality: 0.775 }, config)).toBeCloseTo(0.87625, 10);
  });

  it('reproduces exactly for fixed inputs', () => {
    const dims = { relevance: 0.95, novelty: 0.85, impact: 0.825, practicality: 0.85 };
    expect(rubricComposite(dims, config)).toBe(rubricComposite({ ...dims }, { ...config }));
  });
});

describe('finalScore', () => {
  const dims = { relevance: 0.8, novelty: 0.8, impact: 0.8, practicality: 0.8 };

  it('is the rubric composite when no blend is configured', () => {
    expect(finalScore(0.1, dims, 0.9, config)).toBe(rubricComposite(dims, config));
  });

  it('blends retrieval and review signals and renormalizes a missing signal', () => {
    const blended = { ...config, blend_initial_weight: 0.2, blend_review_weight: 0.2 };
    const composite = rubricComposite(dims, blended);
    expect(finalScore(0.5, dims, 1, blended)).toBeCloseTo(0.6 * composite + 0.2 * 0.5 + 0.2 * 1, 10);
    expect(finalScore(0.5, dims, null, blended)).toBeCloseTo((0.6 * composite + 0.2 * 0.5) / 0.8, 10);
  });
});

describe('fastScore', () => {
  it('combines retrieval and review signals', () => {
    expect(fastScore(1, 0.5, config)).toBeCloseTo(0.85, 10);
    expect(fastScore(0.5, null, config)).toBeCloseTo(0.5, 10);
  });
});

describe('aggregateRanking', () => {
  const signals: Record<string, number | null> = { a: 0.5, b: null, c: 1, d: 0 };
  const lookup = (id: string) => signals[id] ?? null;
  const selected = [candidate('a', 1), candidate('b', 0.5), candidate('c', 0.5), candidate('d', 0)];
  const scores = new Map<string, RubricScore>([
    ['a', rubric('a', 0.9)],
    ['b', rubric('b', 0.5, false)],
    ['d', rubric('d', 1)],
  ]);

  it('ranks rubric-scored candidates first and unevaluated ones after', () => {
    const ranked = aggregateRanking(selected, scores, lookup, config);

    expect(ranked.map((r) => [r.paper_id, r.rank, r.status])).toEqual([
      ['d', 1, 'evaluated'],
      ['a', 2, 'evaluated'],
      ['b', 3, 'degraded'],
      ['c', 4, 'unevaluated'],
    ]);
    expect(ranked[3]?.final_score).toBeCloseTo(0.65, 10);
    expect(ranked[3]?.components).toEqual({ initial_score: 0.5, rubric_scores: null, review_signal: 1 });
    expect(ranked[2]?.components.rubric_scores?.schema_valid).toBe(false);
  });

  it('breaks equal final scores by review signal then paper id', () => {
    const tied = new Map<string, RubricScore>([
      ['a', rubric('a', 0.7)],
      ['b', rubric('b', 0.7)],
      ['c', rubric('c', 0.7)],
    ]);
    const ranked = aggregateRanking(selected.slice(0, 3), tied, lookup, config);
    expect(ranked.map((r) => r.paper_id)).toEqual(['c', 'a', 'b']);
  });

  it('uses the fast score for everything when evaluation is skipped', () => {
    const ranked = aggregateRanking(selected, scores, lookup, { ...config, skip_llm_evaluation: true });

    expect(ranked.map((r) => r.paper_id)).toEqual(['a', 'c', 'b', 'd']);
    expect(ranked.every((r) => r.status === 'unevaluated' && r.components.rubric_scores === null)).toBe(true);
    expect(ranked.map((r) => r.final_score)[0]).toBeCloseTo(0.85, 10);
  });

  it('is idempotent', () => {
    const first = aggregateRanking(selected, scores, lookup, config);
    const second = aggregateRanking([...selected].reverse(), scores, lookup, config);
    expect(JSON.stringify(second)).toBe(JSON.stringify(first));
  });
});
