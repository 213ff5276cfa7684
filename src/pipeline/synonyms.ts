import { runAgent, AgentContext } from '../agents/runAgent';
import { SynonymListSchema } from '../agents/schemas';
import { buildSynonymExpansionMessage, SYNONYM_EXPANSION_PROMPT } from '../agents/prompts';
import { PROMPT_VERSIONS, SCHEMA_VERSIONS } from '../agents/versions';
import { extractAliases, normalizeTerms } from '../utils/canonicalize';
import type { KeyValueStore } from '../utils/cache';
import { createConsoleLogger, errorMessage } from '../utils/logger';
import type { Keyword, SynonymSet } from './types';

const defaultLogger = createConsoleLogger('Synonyms');

export interface SynonymOptions {
  maxSynonyms: number;
  cache?: KeyValueStore;
}

/**
 * Keyword first, then up to `maxSynonyms` distinct variants. Parenthetical
 * aliases are split so "graph neural network (gnn)" contributes both forms.
 */
export function buildVariantList(keyword: Keyword, generated: readonly string[], maxSynonyms: number): string[] {
  const variants = normalizeTerms(generated.flatMap((term) => extractAliases(term))).filter(
    (variant) => variant !== keyword
  );
  return [keyword, ...variants.slice(0, maxSynonyms)];
}

async function expandKeyword(
  keyword: Keyword,
  options: SynonymOptions,
  context: AgentContext
): Promise<string[]> {
  const logger = context.logger ?? defaultLogger;
  if (options.maxSynonyms === 0) {
    return [keyword];
  }
  try {
    const output = await runAgent(
      'SynonymExpansion',
      SYNONYM_EXPANSION_PROMPT,
      buildSynonymExpansionMessage(keyword, options.maxSynonyms),
      SynonymListSchema,
      { ...context, logger },
      options.cache
        ? {
            store: options.cache,
            input: { keyword, maxSynonyms: options.maxSynonyms },
            promptVersion: PROMPT_VERSIONS.synonymExpansion,
            schemaVersion: SCHEMA_VERSIONS.synonymExpansion,
          }
        : undefined
    );
    return buildVariantList(keyword, output.synonyms, options.maxSynonyms);
  } catch (error) {
    logger.warn(`Synonym expansion failed for "${keyword}", matching on the keyword alone`, {
      error: errorMessage(error),
    });
    return [keyword];
  }
}

/**
 * Expands every keyword independently and concurrently. Never throws for a
 * single keyword: a failed expansion leaves that keyword's set as just itself.
 */
export async function expandSynonyms(
  keywords: readonly Keyword[],
  options: SynonymOptions,
  context: AgentContext
): Promise<SynonymSet> {
  const logger = context.logger ?? defaultLogger;
  const expanded = await Promise.all(keywords.map((keyword) => expandKeyword(keyword, options, context)));

  const synonyms: SynonymSet = {};
  keywords.forEach((keyword, i) => {
    synonyms[keyword] = expanded[i] ?? [keyword];
  });

  const enriched = Object.values(synonyms).filter((variants) => variants.length > 1).length;
  logger.info(`Expanded synonyms for ${enriched}/${keywords.length} keywords`);
  return synonyms;
}
