import { runAgent, AgentContext } from '../agents/runAgent';
import { RubricResponseSchema } from '../agents/schemas';
import { RUBRIC_EVALUATION_PROMPT } from '../agents/prompts';
import { EVALUATION_LIMITS } from '../agents/config';
import { PROMPT_VERSIONS, SCHEMA_VERSIONS } from '../agents/versions';
import { CancelledError } from '../agents/errors';
import { averageReviewScore } from '../corpus/reviewSignal';
import type { PaperRecord } from '../corpus/types';
import { fingerprint, KeyValueStore } from '../utils/cache';
import { createConsoleLogger, errorMessage } from '../utils/logger';
import type { CandidateScore, Keyword, Query, RubricScore } from './types';

const defaultLogger = createConsoleLogger('Evaluator');

export interface EvaluationContext {
  title: string;
  abstract: string;
  decision: string;
  presentation_type: string;
  user_interest: string;
  review_score_average: number | null;
  review_digest: string;
}

export interface EvaluationOutcome {
  scores: Map<string, RubricScore>;
  degraded: number;
  cancelled: boolean;
}

function truncate(text: string, max: number): string {
  const trimmed = text.trim();
  return trimmed.length > max ? `${trimmed.slice(0, max)}...` : trimmed;
}

function distillReviews(paper: PaperRecord): string {
  const parts: string[] = [];
  if (paper.meta_review_text.trim()) {
    parts.push(`Meta-review: ${truncate(paper.meta_review_text, EVALUATION_LIMITS.metaReviewChars)}`);
  }
  paper.review_texts
    .filter((text) => text.trim())
    .slice(0, EVALUATION_LIMITS.maxReviews)
    .forEach((text, i) => {
      parts.push(`Review ${i + 1}: ${truncate(text, EVALUATION_LIMITS.reviewChars)}`);
    });
  return parts.join('\n');
}

export function buildEvaluationContext(
  paper: PaperRecord,
  query: Query,
  keywords: readonly Keyword[]
): EvaluationContext {
  const average = averageReviewScore(paper);
  return {
    title: paper.title,
    abstract: truncate(paper.abstract, EVALUATION_LIMITS.abstractChars),
    decision: paper.decision || 'N/A',
    presentation_type: paper.presentation_type || 'N/A',
    user_interest: query.raw_description?.trim() || `Keywords: ${keywords.join(', ')}`,
    review_score_average: average === null ? null : Math.round(average * 100) / 100,
    review_digest: distillReviews(paper),
  };
}

export function formatEvaluationMessage(context: EvaluationContext): string {
  return [
    `# Paper`,
    `Title: ${context.title}`,
    `Decision: ${context.decision}`,
    `Presentation: ${context.presentation_type}`,
    `Abstract:\n${context.abstract || 'N/A'}`,
    ``,
    `# Reviews`,
    `Average reviewer score: ${context.review_score_average ?? 'N/A'}`,
    context.review_digest || 'No review data available.',
    ``,
    `# Researcher interests`,
    context.user_interest,
  ].join('\n');
}

/**
 * Fallback once every attempt has failed: relevance falls back to the
 * retrieval score, the other dimensions sit at the neutral midpoint.
 */
export function degradedRubric(candidate: CandidateScore, reason: string): RubricScore {
  return {
    paper_id: candidate.paper_id,
    relevance: candidate.initial_score,
    novelty: EVALUATION_LIMITS.neutralScore,
    impact: EVALUATION_LIMITS.neutralScore,
    practicality: EVALUATION_LIMITS.neutralScore,
    rationale: `Evaluation unavailable: ${reason.slice(0, 200)}`,
    review_summary: '',
    field_insights: '',
    schema_valid: false,
  };
}

/**
 * Scores one candidate. Returns null only when the run was cancelled before
 * the candidate finished; every other failure yields a degraded score.
 */
export async function evaluateCandidate(
  candidate: CandidateScore,
  paper: PaperRecord,
  query: Query,
  keywords: readonly Keyword[],
  context: AgentContext,
  cache?: KeyValueStore
): Promise<RubricScore | null> {
  const logger = context.logger ?? defaultLogger;
  if (context.signal?.aborted) {
    return null;
  }
  const evaluationContext = buildEvaluationContext(paper, query, keywords);

  try {
    const output = await runAgent(
      'RubricEvaluation',
      RUBRIC_EVALUATION_PROMPT,
      formatEvaluationMessage(evaluationContext),
      RubricResponseSchema,
      { ...context, logger },
      cache
        ? {
            store: cache,
            input: { paper_id: paper.id, context_hash: fingerprint(evaluationContext) },
            promptVersion: PROMPT_VERSIONS.rubricEvaluation,
            schemaVersion: SCHEMA_VERSIONS.rubricEvaluation,
          }
        : undefined
    );
    return {
      paper_id: candidate.paper_id,
      relevance: output.relevance,
      novelty: output.novelty,
      impact: output.impact,
      practicality: output.practicality,
      rationale: output.rationale,
      review_summary: output.review_summary,
      field_insights: output.field_insights,
      schema_valid: true,
    };
  } catch (error) {
    if (error instanceof CancelledError || context.signal?.aborted) {
      return null;
    }
    logger.warn(`Degraded score for ${candidate.paper_id}`, { error: errorMessage(error) });
    return degradedRubric(candidate, errorMessage(error));
  }
}

/**
 * Evaluates all candidates concurrently; the limiter in `context` bounds how
 * many calls are in flight. Results are keyed by paper id, so completion
 * order does not matter.
 */
export async function evaluateCandidates(
  candidates: readonly CandidateScore[],
  papers: ReadonlyMap<string, PaperRecord>,
  query: Query,
  keywords: readonly Keyword[],
  context: AgentContext,
  cache?: KeyValueStore
): Promise<EvaluationOutcome> {
  const logger = context.logger ?? defaultLogger;
  logger.info(`Evaluating ${candidates.length} candidates (model: ${context.generator.model})`);

  const results = await Promise.all(
    candidates.map(async (candidate) => {
      const paper = papers.get(candidate.paper_id);
      if (!paper) {
        logger.warn(`No paper record for candidate ${candidate.paper_id}`);
        return degradedRubric(candidate, 'paper record missing');
      }
      return evaluateCandidate(candidate, paper, query, keywords, context, cache);
    })
  );

  const scores = new Map<string, RubricScore>();
  for (const score of results) {
    if (score) scores.set(score.paper_id, score);
  }
  const degraded = [...scores.values()].filter((s) => !s.schema_valid).length;
  const cancelled = Boolean(context.signal?.aborted) && scores.size < candidates.length;

  if (cancelled) {
    logger.warn(`Evaluation cancelled after ${scores.size}/${candidates.length} candidates`);
  } else {
    logger.info(`Evaluated ${scores.size} candidates (${degraded} degraded)`);
  }
  return { scores, degraded, cancelled };
}
