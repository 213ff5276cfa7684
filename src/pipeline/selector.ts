import { InsufficientCandidatesError } from '../agents/errors';
import type { CandidateScore } from './types';

export type ReviewSignalLookup = (paperId: string) => number | null;

export interface SelectionOptions {
  topK: number;
  minRelevanceScore: number;
  /** Floor on the raw mean reviewer score; papers without scores pass. */
  minReviewScore?: number | null;
  reviewAverage?: ReviewSignalLookup;
  venue: string;
  year: number;
}

/**
 * Tie-break chain shared by selection and final ranking: review signal
 * descending (missing signals last), then paper id ascending.
 */
export function compareTieBreak(a: string, b: string, reviewSignal: ReviewSignalLookup): number {
  const signalA = reviewSignal(a);
  const signalB = reviewSignal(b);
  if (signalA !== signalB) {
    if (signalA === null) return 1;
    if (signalB === null) return -1;
    return signalB - signalA;
  }
  return a < b ? -1 : a > b ? 1 : 0;
}

export function compareCandidates(
  a: CandidateScore,
  b: CandidateScore,
  reviewSignal: ReviewSignalLookup
): number {
  if (a.initial_score !== b.initial_score) {
    return b.initial_score - a.initial_score;
  }
  return compareTieBreak(a.paper_id, b.paper_id, reviewSignal);
}

/**
 * Orders candidates and keeps the best `topK`. The matcher emits one
 * candidate per paper, so no candidates at all means the corpus was empty.
 * A short or all-zero selection is valid output.
 */
export function selectCandidates(
  candidates: readonly CandidateScore[],
  reviewSignal: ReviewSignalLookup,
  options: SelectionOptions
): CandidateScore[] {
  if (candidates.length === 0) {
    throw new InsufficientCandidatesError(options.venue, options.year);
  }
  const { minReviewScore, reviewAverage } = options;
  const passesReviewFloor = (paperId: string): boolean => {
    if (minReviewScore == null || !reviewAverage) return true;
    const average = reviewAverage(paperId);
    return average === null || average >= minReviewScore;
  };
  return candidates
    .filter((candidate) => candidate.initial_score >= options.minRelevanceScore)
    .filter((candidate) => passesReviewFloor(candidate.paper_id))
    .sort((a, b) => compareCandidates(a, b, reviewSignal))
    .slice(0, options.topK);
}
