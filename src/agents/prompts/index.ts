export { KEYWORD_EXTRACTION_PROMPT, buildKeywordExtractionMessage } from './keywordExtraction';
export { SYNONYM_EXPANSION_PROMPT, buildSynonymExpansionMessage } from './synonymExpansion';
export { RUBRIC_EVALUATION_PROMPT } from './rubricEvaluation';
