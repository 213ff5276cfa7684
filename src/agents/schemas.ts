import { z } from 'zod';
import { EVALUATION_LIMITS } from './config';

export const KeywordListSchema = z.object({
  keywords: z.array(z.string()).min(1),
});

export const SynonymListSchema = z.object({
  synonyms: z.array(z.string()),
});

const dimension = z.number().finite().min(0).max(1);

export const RubricResponseSchema = z.object({
  relevance: dimension,
  novelty: dimension,
  impact: dimension,
  practicality: dimension,
  rationale: z.string().transform((s) => s.trim().slice(0, EVALUATION_LIMITS.rationaleChars)),
  review_summary: z
    .string()
    .optional()
    .transform((s) => (s ?? '').trim().slice(0, EVALUATION_LIMITS.reviewSummaryChars)),
  field_insights: z
    .string()
    .optional()
    .transform((s) => (s ?? '').trim().slice(0, EVALUATION_LIMITS.fieldInsightsChars)),
});

export type KeywordListOutput = z.infer<typeof KeywordListSchema>;
export type SynonymListOutput = z.infer<typeof SynonymListSchema>;
export type RubricResponseOutput = z.infer<typeof RubricResponseSchema>;
