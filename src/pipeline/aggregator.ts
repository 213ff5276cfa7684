import type { PipelineConfig } from '../config/pipeline';
import { compareTieBreak, ReviewSignalLookup } from './selector';
import type { CandidateScore, RankedResult, ResultStatus, RubricDimensions, RubricScore } from './types';

export type RubricWeights = Pick<
  PipelineConfig,
  'weight_relevance' | 'weight_novelty' | 'weight_impact' | 'weight_practicality'
>;

export type AggregationConfig = RubricWeights &
  Pick<
    PipelineConfig,
    | 'blend_initial_weight'
    | 'blend_review_weight'
    | 'fast_initial_weight'
    | 'fast_review_weight'
    | 'skip_llm_evaluation'
  >;

export function rubricComposite(rubric: RubricDimensions, weights: RubricWeights): number {
  return (
    weights.weight_relevance * rubric.relevance +
    weights.weight_novelty * rubric.novelty +
    weights.weight_impact * rubric.impact +
    weights.weight_practicality * rubric.practicality
  );
}

/**
 * Weighted mean over the parts that have a value; a missing value gives up
 * its weight to the rest. Null when no weighted part remains.
 */
function weightedMean(parts: Array<[weight: number, value: number | null]>): number | null {
  let total = 0;
  let sum = 0;
  for (const [weight, value] of parts) {
    if (value === null || weight <= 0) continue;
    total += weight;
    sum += weight * value;
  }
  return total > 0 ? sum / total : null;
}

/** Score from retrieval and review signals only, used without a rubric. */
export function fastScore(initialScore: number, reviewSignal: number | null, config: AggregationConfig): number {
  return (
    weightedMean([
      [config.fast_initial_weight, initialScore],
      [config.fast_review_weight, reviewSignal],
    ]) ?? initialScore
  );
}

export function finalScore(
  initialScore: number,
  rubric: RubricDimensions,
  reviewSignal: number | null,
  config: AggregationConfig
): number {
  const composite = rubricComposite(rubric, config);
  const rubricWeight = 1 - config.blend_initial_weight - config.blend_review_weight;
  if (config.blend_initial_weight === 0 && config.blend_review_weight === 0) {
    return composite;
  }
  return (
    weightedMean([
      [rubricWeight, composite],
      [config.blend_initial_weight, initialScore],
      [config.blend_review_weight, reviewSignal],
    ]) ?? composite
  );
}

interface Scored {
  candidate: CandidateScore;
  rubric: RubricScore | null;
  review: number | null;
  score: number;
  status: ResultStatus;
}

const TIER: Record<ResultStatus, number> = { evaluated: 0, degraded: 0, unevaluated: 1 };

/**
 * Final ordering of the selected candidates. Rubric-scored candidates come
 * first; candidates the evaluator never reached (cancellation, or the whole
 * evaluator skipped) follow, scored on retrieval and review signals. Within
 * a tier: final score, then the selector's tie-break chain.
 */
export function aggregateRanking(
  candidates: readonly CandidateScore[],
  rubricScores: ReadonlyMap<string, RubricScore>,
  reviewSignal: ReviewSignalLookup,
  config: AggregationConfig
): RankedResult[] {
  const scored: Scored[] = candidates.map((candidate) => {
    const review = reviewSignal(candidate.paper_id);
    const rubric = config.skip_llm_evaluation ? null : rubricScores.get(candidate.paper_id) ?? null;
    if (!rubric) {
      return {
        candidate,
        rubric: null,
        review,
        score: fastScore(candidate.initial_score, review, config),
        status: 'unevaluated',
      };
    }
    return {
      candidate,
      rubric,
      review,
      score: finalScore(candidate.initial_score, rubric, review, config),
      status: rubric.schema_valid ? 'evaluated' : 'degraded',
    };
  });

  scored.sort((a, b) => {
    const tier = TIER[a.status] - TIER[b.status];
    if (tier !== 0) return tier;
    if (a.score !== b.score) return b.score - a.score;
    return compareTieBreak(a.candidate.paper_id, b.candidate.paper_id, reviewSignal);
  });

  return scored.map((entry, i) => ({
    paper_id: entry.candidate.paper_id,
    final_score: entry.score,
    rank: i + 1,
    status: entry.status,
    components: {
      initial_score: entry.candidate.initial_score,
      rubric_scores: entry.rubric,
      review_signal: entry.review,
    },
  }));
}
