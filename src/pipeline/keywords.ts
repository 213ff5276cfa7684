import { runAgent, AgentContext } from '../agents/runAgent';
import { KeywordListSchema } from '../agents/schemas';
import { buildKeywordExtractionMessage, KEYWORD_EXTRACTION_PROMPT } from '../agents/prompts';
import { EVALUATION_LIMITS } from '../agents/config';
import { CancelledError, EmptyInputError } from '../agents/errors';
import { normalizeTerms } from '../utils/canonicalize';
import { createConsoleLogger, errorMessage } from '../utils/logger';
import type { Keyword, Query } from './types';

const defaultLogger = createConsoleLogger('Keywords');

/**
 * Explicit terms are used as given, normalized and deduplicated. A free-text
 * description costs one generation call; when that yields nothing usable the
 * run cannot continue.
 */
export async function extractKeywords(query: Query, context: AgentContext): Promise<Keyword[]> {
  const logger = context.logger ?? defaultLogger;

  if (query.explicit_terms.length > 0) {
    const keywords = normalizeTerms(query.explicit_terms);
    if (keywords.length === 0) {
      throw new EmptyInputError('Explicit terms are empty after normalization');
    }
    logger.info(`Using ${keywords.length} explicit keywords`, { keywords });
    return keywords;
  }

  const description = query.raw_description?.trim();
  if (!description) {
    throw new EmptyInputError('Query has neither explicit terms nor a description');
  }

  let extracted: string[];
  try {
    const output = await runAgent(
      'KeywordExtraction',
      KEYWORD_EXTRACTION_PROMPT,
      buildKeywordExtractionMessage(description, query.language_hint),
      KeywordListSchema,
      { ...context, logger }
    );
    extracted = output.keywords;
  } catch (error) {
    if (error instanceof CancelledError) {
      throw error;
    }
    logger.error('Keyword extraction failed', { error: errorMessage(error) });
    const failure = new EmptyInputError(`No keywords could be derived: ${errorMessage(error)}`);
    failure.cause = error;
    throw failure;
  }

  const keywords = normalizeTerms(extracted).slice(0, EVALUATION_LIMITS.maxExtractedKeywords);
  if (keywords.length === 0) {
    throw new EmptyInputError('Generated keyword list is empty after normalization');
  }
  logger.info(`Extracted ${keywords.length} keywords from description`, { keywords });
  return keywords;
}
