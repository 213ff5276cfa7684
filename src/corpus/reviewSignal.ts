import type { PaperRecord } from './types';

/**
 * Venues expose their reviewer score under different field names and scales.
 * A strategy knows both, and turns a record's raw scores into a [0,1] signal.
 */
export interface ReviewSignalStrategy {
  readonly name: string;
  /** Raw review fields that may hold the score, in priority order. */
  readonly scoreFields: readonly string[];
  readonly minScore: number;
  readonly maxScore: number;
  matches(venue: string): boolean;
}

function venueStrategy(
  name: string,
  venues: string[],
  scoreFields: string[],
  minScore: number,
  maxScore: number
): ReviewSignalStrategy {
  const prefixes = venues.map((v) => v.toLowerCase());
  return {
    name,
    scoreFields,
    minScore,
    maxScore,
    matches: (venue) => {
      const lower = venue.toLowerCase();
      return prefixes.some((prefix) => lower.startsWith(prefix));
    },
  };
}

export const RATING_TEN_POINT = venueStrategy(
  'rating-10',
  ['neurips', 'iclr'],
  ['rating', 'score'],
  1,
  10
);

export const OVERALL_RECOMMENDATION_FIVE_POINT = venueStrategy(
  'overall-recommendation-5',
  ['icml'],
  ['overall_recommendation', 'recommendation', 'rating'],
  1,
  5
);

export const GENERIC_TEN_POINT: ReviewSignalStrategy = {
  name: 'generic-10',
  scoreFields: ['rating', 'overall_recommendation', 'score', 'recommendation'],
  minScore: 1,
  maxScore: 10,
  matches: () => true,
};

export const DEFAULT_STRATEGIES: readonly ReviewSignalStrategy[] = [
  RATING_TEN_POINT,
  OVERALL_RECOMMENDATION_FIVE_POINT,
  GENERIC_TEN_POINT,
];

export function selectStrategy(
  venue: string,
  strategies: readonly ReviewSignalStrategy[] = DEFAULT_STRATEGIES
): ReviewSignalStrategy {
  return strategies.find((s) => s.matches(venue)) ?? GENERIC_TEN_POINT;
}

export function averageReviewScore(paper: PaperRecord): number | null {
  const scores = paper.review_scores.filter((s) => Number.isFinite(s));
  if (scores.length === 0) return null;
  return scores.reduce((sum, s) => sum + s, 0) / scores.length;
}

/**
 * Mean reviewer score mapped onto [0,1] with the venue's scale, or null
 * when the paper has no usable scores.
 */
export function extractReviewSignal(
  paper: PaperRecord,
  strategies: readonly ReviewSignalStrategy[] = DEFAULT_STRATEGIES
): number | null {
  const avg = averageReviewScore(paper);
  if (avg === null) return null;
  const strategy = selectStrategy(paper.venue, strategies);
  const span = strategy.maxScore - strategy.minScore;
  if (span <= 0) return null;
  const normalized = (avg - strategy.minScore) / span;
  return Math.min(1, Math.max(0, normalized));
}

/**
 * Parses reviewer score values such as 8, "8", "8: accept" or "3: weak accept".
 */
export function parseScoreValue(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value !== 'string') return null;
  const head = value.split(':')[0]?.split('/')[0]?.trim() ?? '';
  if (!head) return null;
  const parsed = Number(head);
  return Number.isFinite(parsed) ? parsed : null;
}

/**
 * Picks the first score field the strategy knows about from one raw review.
 */
export function scoreFromReview(
  review: Record<string, unknown>,
  strategy: ReviewSignalStrategy
): number | null {
  for (const field of strategy.scoreFields) {
    if (field in review) {
      const score = parseScoreValue(review[field]);
      if (score !== null) return score;
    }
  }
  return null;
}
