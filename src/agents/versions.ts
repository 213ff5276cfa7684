export const PROMPT_VERSIONS = {
  keywordExtraction: 'v1',
  synonymExpansion: 'v1',
  rubricEvaluation: 'v2',
} as const;

export const SCHEMA_VERSIONS = {
  keywordExtraction: 'v1',
  synonymExpansion: 'v1',
  rubricEvaluation: 'v2',
} as const;
