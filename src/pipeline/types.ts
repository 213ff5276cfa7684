import type { PaperRecord } from '../corpus/types';
import type { PipelineConfig } from '../config/pipeline';
import type { PipelineStageError } from '../agents/errors';

export interface Query {
  readonly raw_description: string | null;
  readonly explicit_terms: readonly string[];
  readonly language_hint: string;
}

export type Keyword = string;

/** Keyword → variants; the first variant is always the keyword itself. */
export type SynonymSet = Record<Keyword, string[]>;

export interface CandidateScore {
  paper_id: string;
  initial_score: number;
  matched_terms: string[];
}

export interface RubricDimensions {
  relevance: number;
  novelty: number;
  impact: number;
  practicality: number;
}

export interface RubricScore extends RubricDimensions {
  paper_id: string;
  rationale: string;
  review_summary: string;
  /** Which review material the evaluation drew on. */
  field_insights: string;
  schema_valid: boolean;
}

export type ResultStatus = 'evaluated' | 'degraded' | 'unevaluated';

export interface RankedResult {
  paper_id: string;
  final_score: number;
  rank: number;
  status: ResultStatus;
  components: {
    initial_score: number;
    rubric_scores: RubricScore | null;
    review_signal: number | null;
  };
}

export type RunState =
  | 'Init'
  | 'KeywordsReady'
  | 'SynonymsReady'
  | 'CandidatesScored'
  | 'CandidatesSelected'
  | 'RubricScored'
  | 'Ranked'
  | 'Done'
  | 'Failed';

export type PipelineStage =
  | 'keywords'
  | 'synonyms'
  | 'corpus'
  | 'matching'
  | 'selection'
  | 'evaluation'
  | 'ranking';

export interface PipelineInput {
  venue: string;
  year: number;
  query: Query;
}

export interface PipelineSuccess {
  success: true;
  state: 'Done';
  history: RunState[];
  cancelled: boolean;
  keywords: Keyword[];
  synonyms: SynonymSet;
  candidates: CandidateScore[];
  selected: CandidateScore[];
  rubricScores: RubricScore[];
  ranked: RankedResult[];
  papers: Map<string, PaperRecord>;
  config: PipelineConfig;
  stats: {
    corpusSize: number;
    degradedEvaluations: number;
    processingTimeMs: number;
  };
}

export interface PipelineFailure {
  success: false;
  state: 'Failed';
  history: RunState[];
  stage: PipelineStage;
  error: PipelineStageError;
}

export type PipelineResult = PipelineSuccess | PipelineFailure;

export function createQuery(params: {
  description?: string | null;
  terms?: readonly string[];
  languageHint?: string;
}): Query {
  return Object.freeze({
    raw_description: params.description?.trim() ? params.description : null,
    explicit_terms: Object.freeze([...(params.terms ?? [])]),
    language_hint: params.languageHint ?? 'en',
  });
}
