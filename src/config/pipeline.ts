import { z } from 'zod';

const weight = z.number().min(0).max(1);

export const PipelineConfigSchema = z
  .object({
    top_k: z.number().int().positive().default(100),
    min_relevance_score: z.number().min(0).max(1).default(0),
    // on the venue's own scale, e.g. 6 for a 10-point rating
    min_review_score: z.number().min(0).nullable().default(null),
    model_identifier: z.string().min(1).default('gemini-2.5-flash'),
    skip_llm_evaluation: z.boolean().default(false),
    weight_relevance: weight.default(0.4),
    weight_novelty: weight.default(0.25),
    weight_impact: weight.default(0.25),
    weight_practicality: weight.default(0.1),
    max_synonyms_per_keyword: z.number().int().min(0).default(10),
    evaluation_concurrency: z.number().int().positive().default(4),
    blend_initial_weight: weight.default(0),
    blend_review_weight: weight.default(0),
    fast_initial_weight: weight.default(0.7),
    fast_review_weight: weight.default(0.3),
  })
  .refine(
    (c) =>
      Math.abs(c.weight_relevance + c.weight_novelty + c.weight_impact + c.weight_practicality - 1) <= 0.01,
    { message: 'weight_relevance + weight_novelty + weight_impact + weight_practicality must equal 1.0' }
  )
  .refine((c) => c.blend_initial_weight + c.blend_review_weight <= 1, {
    message: 'blend_initial_weight + blend_review_weight must not exceed 1.0',
  })
  .refine((c) => c.fast_initial_weight + c.fast_review_weight > 0, {
    message: 'fast_initial_weight + fast_review_weight must be positive',
  });

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;
export type PipelineConfigInput = z.input<typeof PipelineConfigSchema>;

type Env = Record<string, string | undefined>;

const NUMBER_ENV: Array<[string, keyof PipelineConfigInput]> = [
  ['TOP_K', 'top_k'],
  ['MIN_RELEVANCE_SCORE', 'min_relevance_score'],
  ['MIN_REVIEW_SCORE', 'min_review_score'],
  ['WEIGHT_RELEVANCE', 'weight_relevance'],
  ['WEIGHT_NOVELTY', 'weight_novelty'],
  ['WEIGHT_IMPACT', 'weight_impact'],
  ['WEIGHT_PRACTICALITY', 'weight_practicality'],
  ['MAX_SYNONYMS_PER_KEYWORD', 'max_synonyms_per_keyword'],
  ['EVALUATION_CONCURRENCY', 'evaluation_concurrency'],
  ['BLEND_INITIAL_WEIGHT', 'blend_initial_weight'],
  ['BLEND_REVIEW_WEIGHT', 'blend_review_weight'],
  ['FAST_INITIAL_WEIGHT', 'fast_initial_weight'],
  ['FAST_REVIEW_WEIGHT', 'fast_review_weight'],
];

export function configFromEnv(env: Env = process.env): Record<string, unknown> {
  const fromEnv: Record<string, unknown> = {};
  for (const [name, key] of NUMBER_ENV) {
    const raw = env[name];
    if (raw !== undefined && raw.trim() !== '') {
      fromEnv[key] = Number(raw);
    }
  }
  if (env.LLM_MODEL) {
    fromEnv.model_identifier = env.LLM_MODEL;
  }
  if (env.SKIP_LLM_EVALUATION !== undefined) {
    fromEnv.skip_llm_evaluation = env.SKIP_LLM_EVALUATION === 'true';
  }
  return fromEnv;
}

/**
 * Defaults, then environment, then explicit overrides; the merged result is validated.
 */
export function loadPipelineConfig(
  overrides: PipelineConfigInput = {},
  env: Env = process.env
): PipelineConfig {
  const result = PipelineConfigSchema.safeParse({ ...configFromEnv(env), ...overrides });
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `- ${issue.path.join('.') || 'config'}: ${issue.message}`)
      .join('\n');
    throw new Error(`Invalid pipeline configuration:\n${issues}`);
  }
  return result.data;
}
