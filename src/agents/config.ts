import { envNumber } from '../utils/env';

export const AGENT_CONFIG = {
  maxRetries: envNumber(process.env.AGENT_MAX_RETRIES, 2),
  timeoutMs: envNumber(process.env.AGENT_TIMEOUT_MS, 60000),
  maxTokens: 2000,
  upstreamTries: envNumber(process.env.UPSTREAM_TRIES, 4),
  backoffBaseMs: 500,
  backoffMaxMs: 8000,
  backoffJitterMs: 250,
};

export type AgentConfig = typeof AGENT_CONFIG;

export const EVALUATION_LIMITS = {
  abstractChars: 1500,
  metaReviewChars: 500,
  reviewChars: 300,
  maxReviews: 5,
  rationaleChars: 500,
  reviewSummaryChars: 500,
  fieldInsightsChars: 300,
  maxExtractedKeywords: 10,
  neutralScore: 0.5,
} as const;
