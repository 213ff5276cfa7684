import { AGENT_CONFIG, AgentConfig } from '../agents/config';
import {
  AgentExecutionError,
  CorpusEmptyError,
  PipelineStageError,
  SchemaValidationError,
  TimeoutError,
  UpstreamUnavailableError,
} from '../agents/errors';
import type { AgentContext } from '../agents/runAgent';
import { loadPipelineConfig, PipelineConfig } from '../config/pipeline';
import {
  averageReviewScore,
  DEFAULT_STRATEGIES,
  extractReviewSignal,
  ReviewSignalStrategy,
} from '../corpus/reviewSignal';
import type { CorpusProvider, PaperRecord } from '../corpus/types';
import type { TextGenerator } from '../llm/types';
import { KeyValueStore, MemoryKeyValueStore } from '../utils/cache';
import { LaneLimiter } from '../utils/limiter';
import { createConsoleLogger, errorMessage, Logger } from '../utils/logger';
import { withRetry } from '../utils/retry';
import { aggregateRanking } from './aggregator';
import { evaluateCandidates } from './evaluator';
import { extractKeywords } from './keywords';
import { scoreCandidates } from './matcher';
import { RunStateMachine } from './runState';
import { expandSynonyms } from './synonyms';
import { selectCandidates, ReviewSignalLookup } from './selector';
import type {
  CandidateScore,
  Keyword,
  PipelineInput,
  PipelineResult,
  PipelineStage,
  RubricScore,
  SynonymSet,
} from './types';

const defaultLogger = createConsoleLogger('Pipeline');

export interface PipelineDependencies {
  corpus: CorpusProvider;
  generator: TextGenerator;
  /** Run-scoped memory store when omitted. */
  cache?: KeyValueStore;
  logger?: Logger;
  agentConfig?: AgentConfig;
  signal?: AbortSignal;
  reviewStrategies?: readonly ReviewSignalStrategy[];
}

function logFailure(logger: Logger, stage: PipelineStage, error: unknown): void {
  if (error instanceof TimeoutError) {
    logger.error('Agent timeout', { stage, agent: error.agent, timeoutMs: error.timeoutMs });
  } else if (error instanceof SchemaValidationError) {
    logger.error('Schema validation failed after retries', {
      stage,
      agent: error.agent,
      attempts: error.attempts,
    });
  } else if (error instanceof AgentExecutionError) {
    logger.error('Agent execution failed', {
      stage,
      agent: error.agent,
      originalError: error.originalError.message,
    });
  } else if (error instanceof UpstreamUnavailableError) {
    logger.error('Upstream unavailable', { stage, upstream: error.upstream, status: error.status });
  } else {
    logger.error(`Run failed during ${stage}`, { error: errorMessage(error) });
  }
}

async function fetchCorpus(
  input: PipelineInput,
  corpus: CorpusProvider,
  config: AgentConfig,
  logger: Logger,
  signal?: AbortSignal
): Promise<PaperRecord[]> {
  const papers = await withRetry(() => corpus.fetch(input.venue, input.year), {
    tries: config.upstreamTries,
    baseMs: config.backoffBaseMs,
    maxMs: config.backoffMaxMs,
    jitterMs: config.backoffJitterMs,
    signal,
    isRetryable: (error) => error instanceof UpstreamUnavailableError,
    onRetry: (error, retry, delayMs) =>
      logger.warn(`Corpus unavailable, backing off ${delayMs}ms`, { retry, error: errorMessage(error) }),
  });
  if (papers.length === 0) {
    throw new CorpusEmptyError(input.venue, input.year);
  }
  return papers;
}

interface StageProgress {
  stage: PipelineStage;
}

interface Selection {
  keywords: Keyword[];
  synonyms: SynonymSet;
  corpus: PaperRecord[];
  candidates: CandidateScore[];
  papers: Map<string, PaperRecord>;
  reviewSignal: ReviewSignalLookup;
  selected: CandidateScore[];
}

/** Every stage up to and including selection; any throw here is fatal. */
async function prepareCandidates(
  input: PipelineInput,
  deps: PipelineDependencies,
  config: PipelineConfig,
  context: AgentContext,
  machine: RunStateMachine,
  progress: StageProgress
): Promise<Selection> {
  const logger = context.logger ?? defaultLogger;
  const cache = deps.cache;
  const agentConfig = context.config ?? AGENT_CONFIG;

  const keywords = await extractKeywords(input.query, context);
  machine.advance('KeywordsReady');

  progress.stage = 'synonyms';
  const synonyms = await expandSynonyms(
    keywords,
    { maxSynonyms: config.max_synonyms_per_keyword, cache },
    context
  );
  machine.advance('SynonymsReady');

  progress.stage = 'corpus';
  const corpus = await fetchCorpus(input, deps.corpus, agentConfig, logger, deps.signal);
  logger.info(`Loaded ${corpus.length} papers`);

  progress.stage = 'matching';
  const candidates = scoreCandidates(corpus, synonyms);
  machine.advance('CandidatesScored');

  progress.stage = 'selection';
  const strategies = deps.reviewStrategies ?? DEFAULT_STRATEGIES;
  const papers = new Map(corpus.map((paper) => [paper.id, paper]));
  const signals = new Map(corpus.map((paper) => [paper.id, extractReviewSignal(paper, strategies)]));
  const reviewSignal: ReviewSignalLookup = (paperId) => signals.get(paperId) ?? null;
  const selected = selectCandidates(candidates, reviewSignal, {
    topK: config.top_k,
    minRelevanceScore: config.min_relevance_score,
    minReviewScore: config.min_review_score,
    reviewAverage: (paperId) => {
      const paper = papers.get(paperId);
      return paper ? averageReviewScore(paper) : null;
    },
    venue: input.venue,
    year: input.year,
  });
  machine.advance('CandidatesSelected');
  logger.info(`Selected ${selected.length}/${candidates.length} candidates`);

  return { keywords, synonyms, corpus, candidates, papers, reviewSignal, selected };
}

/**
 * Runs one query against one venue/year corpus:
 * keywords → synonyms → matching → selection → rubric evaluation → ranking.
 *
 * Anything that goes wrong before candidates are selected fails the run with
 * the stage named. From selection on, failures are absorbed per candidate and
 * the run always produces a ranking.
 */
export async function runPipeline(
  input: PipelineInput,
  deps: PipelineDependencies,
  config: PipelineConfig = loadPipelineConfig()
): Promise<PipelineResult> {
  const startTime = Date.now();
  const logger = deps.logger ?? defaultLogger;
  const cache = deps.cache ?? new MemoryKeyValueStore();
  const agentConfig = deps.agentConfig ?? AGENT_CONFIG;
  const machine = new RunStateMachine();
  const context: AgentContext = {
    generator: deps.generator,
    config: agentConfig,
    logger,
    limiter: new LaneLimiter({ llm: config.evaluation_concurrency }),
    signal: deps.signal,
  };

  logger.info(`Ranking ${input.venue} ${input.year}`, {
    model: deps.generator.model,
    top_k: config.top_k,
    skip_llm_evaluation: config.skip_llm_evaluation,
  });

  const progress: StageProgress = { stage: 'keywords' };
  let selection: Selection;
  try {
    selection = await prepareCandidates(input, { ...deps, cache }, config, context, machine, progress);
  } catch (error) {
    const { stage } = progress;
    logFailure(logger, stage, error);
    machine.fail();
    const cause = error instanceof Error ? error : new Error(String(error));
    return {
      success: false,
      state: 'Failed',
      history: machine.history,
      stage,
      error: new PipelineStageError(stage, cause),
    };
  }

  const { keywords, synonyms, corpus, candidates, papers, reviewSignal, selected } = selection;

  let rubricScores = new Map<string, RubricScore>();
  let degradedEvaluations = 0;
  let cancelled = Boolean(deps.signal?.aborted);
  if (config.skip_llm_evaluation) {
    logger.info('Skipping rubric evaluation, ranking on retrieval and review signals');
  } else {
    const outcome = await evaluateCandidates(selected, papers, input.query, keywords, context, cache);
    rubricScores = outcome.scores;
    degradedEvaluations = outcome.degraded;
    cancelled = outcome.cancelled;
  }
  machine.advance('RubricScored');

  const ranked = aggregateRanking(selected, rubricScores, reviewSignal, config);
  machine.advance('Ranked');
  machine.advance('Done');

  const processingTimeMs = Date.now() - startTime;
  logger.info(`Ranked ${ranked.length} papers in ${processingTimeMs}ms`, {
    degraded: degradedEvaluations,
    cancelled,
  });

  return {
    success: true,
    state: 'Done',
    history: machine.history,
    cancelled,
    keywords,
    synonyms,
    candidates,
    selected,
    rubricScores: selected.flatMap((candidate) => {
      const score = rubricScores.get(candidate.paper_id);
      return score ? [score] : [];
    }),
    ranked,
    papers,
    config,
    stats: {
      corpusSize: corpus.length,
      degradedEvaluations,
      processingTimeMs,
    },
  };
}
